/**
 * Core domain types for subject analytics events.
 *
 * These types define the canonical shape of an event as it flows
 * through ingestion, storage and activation evaluation. They carry
 * no framework dependencies.
 */

/** Free-form key/value properties attached to every event. */
export type EventProperties = Record<string, unknown>;

/**
 * Canonical subject event.
 *
 * `event_id` is assigned at ingestion time if the producer does not
 * supply one. Events are ordered by `occurred_at`; ties are broken by
 * arrival order.
 */
export interface SubjectEvent {
  readonly event_id: string;
  readonly workspace_id: string;
  readonly subject_id: string;
  readonly name: string;
  readonly occurred_at: string; // ISO-8601
  readonly properties: EventProperties;
}
