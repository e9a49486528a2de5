import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { ActivationDefinition } from '../../domain/index.js';
import type { Database, DefinitionRow } from '../db/index.js';
import { findActiveDefinitions } from '../db/index.js';
import { DEFINITIONS_CHANNEL } from '../redis/definition-notifier.js';
import type { DefinitionStore } from '../../application/definition-store.js';
import { toDefinition } from '../../application/definition-crud.js';

/**
 * Loads every active definition, skipping rows whose stored rule no longer
 * validates (logged). One bad row never empties the snapshot.
 */
export async function loadActiveDefinitions(db: Database, log: Logger): Promise<ActivationDefinition[]> {
  const rows: DefinitionRow[] = await findActiveDefinitions(db);
  const definitions: ActivationDefinition[] = [];
  for (const row of rows) {
    try {
      definitions.push(toDefinition(row));
    } catch (err: unknown) {
      log.warn({ err, definition_id: row.definition_id }, 'Skipping definition with invalid stored rule');
    }
  }
  return definitions;
}

/**
 * Subscribes to the definitions Pub/Sub channel and reloads active
 * definitions from Postgres whenever a notification arrives.
 *
 * ioredis needs a dedicated connection for subscriptions: a client in
 * subscriber mode cannot issue regular commands.
 *
 * The consumer keeps using the last snapshot while a reload runs; the
 * new snapshot is swapped in via `store.set()`.
 *
 * Returns a cleanup function that unsubscribes and disconnects.
 */
export async function startDefinitionSubscriber(
  redisUrl: string,
  db: Database,
  log: Logger,
  store: DefinitionStore,
  signal: AbortSignal,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();
  log.info('Definition subscriber Redis connection established');

  // One reload at a time; notifications during a reload queue one more pass
  const state: ReloadState = { reloading: false, rerun: false };

  sub.on('message', (channel: string, message: string) => {
    if (channel !== DEFINITIONS_CHANNEL) return;
    if (signal.aborted) return;

    // Errors are caught inside reloadDefinitions
    void reloadDefinitions(db, log, store, message, state);
  });

  await sub.subscribe(DEFINITIONS_CHANNEL);
  log.info({ channel: DEFINITIONS_CHANNEL }, 'Subscribed to definition change notifications');

  return async () => {
    try {
      await sub.unsubscribe(DEFINITIONS_CHANNEL);
      await sub.quit();
    } catch (err: unknown) {
      log.warn({ err }, 'Definition subscriber did not close cleanly');
    }
    log.info('Definition subscriber disconnected');
  };
}

function describeChange(rawMessage: string): { reason?: unknown; definition_id?: unknown } {
  try {
    const parsed: unknown = JSON.parse(rawMessage);
    if (typeof parsed === 'object' && parsed !== null) {
      return {
        reason: Reflect.get(parsed, 'reason'),
        definition_id: Reflect.get(parsed, 'definition_id'),
      };
    }
  } catch (err: unknown) {
    void err; // Non-JSON message: still reload, just without context
  }
  return {};
}

export interface ReloadState {
  reloading: boolean;
  /** Set when a notification arrives mid-reload. */
  rerun: boolean;
}

/**
 * Reloads active definitions from Postgres and swaps the store snapshot.
 * A notification that arrives while a reload runs triggers one more pass
 * once the current one ends, so the final snapshot never predates it.
 *
 * Exported for unit testing; callers outside this module should use
 * `startDefinitionSubscriber()`.
 */
export async function reloadDefinitions(
  db: Database,
  log: Logger,
  store: DefinitionStore,
  rawMessage: string,
  state: ReloadState,
): Promise<void> {
  if (state.reloading) {
    state.rerun = true;
    log.debug('Reload already in progress, queued another pass');
    return;
  }

  state.reloading = true;
  log.info(describeChange(rawMessage), 'Definition change detected, reloading definitions from database…');
  try {
    do {
      state.rerun = false;
      try {
        const definitions = await loadActiveDefinitions(db, log);
        store.set(definitions);

        log.info(
          { definitionCount: definitions.length, definitionIds: definitions.map((d) => d.definition_id) },
          'Definitions reloaded successfully',
        );
      } catch (err: unknown) {
        log.error({ err }, 'Failed to reload definitions from database');
      }
    } while (state.rerun);
  } finally {
    state.reloading = false;
  }
}
