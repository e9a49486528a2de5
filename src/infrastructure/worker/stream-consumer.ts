import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { SubjectEvent } from '../../domain/index.js';
import type { Database } from '../db/index.js';
import { insertSubjectEvent } from '../db/index.js';
import { publishActivation } from '../redis/activation-notifier.js';
import { STREAM_KEY } from '../redis/event-producer.js';
import type { DefinitionStore } from '../../application/definition-store.js';
import { recordActivations } from '../../application/record-activations.js';

const GROUP_NAME = 'activation_recorder';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

export interface ConsumerOptions {
  consumerName: string;
  lookbackDays: number;
}

/** Dependencies bundled for internal functions. */
export interface ConsumerDeps {
  redis: Redis;
  db: Database;
  log: Logger;
  store: DefinitionStore;
  options: ConsumerOptions;
}

/**
 * Ensures the consumer group exists on the stream.
 *
 * Start ID "$" = only deliver messages arriving after group creation.
 * Crash recovery re-reads this consumer's own pending entries list
 * (cursor "0") in processPending().
 *
 * MKSTREAM creates the stream if it doesn't exist yet; BUSYGROUP
 * (group already exists) is not an error.
 */
async function ensureConsumerGroup(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', STREAM_KEY, GROUP_NAME, '$', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream: STREAM_KEY }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

function parseProperties(raw: string | undefined): Record<string, unknown> {
  if (raw === undefined) return {};
  const value: unknown = JSON.parse(raw);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

/**
 * Parses a raw Redis Stream entry into a subject event.
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 */
export function parseStreamEntry(fields: readonly string[]): SubjectEvent {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  return {
    event_id: map.get('event_id') ?? '',
    workspace_id: map.get('workspace_id') ?? '',
    subject_id: map.get('subject_id') ?? '',
    name: map.get('name') ?? '',
    occurred_at: map.get('occurred_at') ?? '',
    properties: parseProperties(map.get('properties')),
  };
}

/**
 * Main consumer loop.
 *
 * 1. XREADGROUP with BLOCK waits for new messages on the stream.
 * 2. For each message: parse → insert into Postgres (idempotent) → XACK.
 * 3. After insert+ACK: re-evaluate the subject's pending definitions and
 *    record new activations.
 *
 * Never ACK before a successful insert. The loop runs until `signal`
 * is aborted.
 */
export async function startConsumer(
  redis: Redis,
  db: Database,
  log: Logger,
  signal: AbortSignal,
  store: DefinitionStore,
  options: ConsumerOptions,
): Promise<void> {
  const deps: ConsumerDeps = { redis, db, log, store, options };

  await ensureConsumerGroup(redis, log);

  log.info(
    { consumer: options.consumerName, group: GROUP_NAME, stream: STREAM_KEY, definitionCount: store.get().length },
    'Consumer started',
  );

  // First, claim any pending messages from previous crashes
  await processPending(deps);

  while (!signal.aborted) {
    try {
      const response = await redis.xreadgroup(
        'GROUP', GROUP_NAME, options.consumerName,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', STREAM_KEY,
        '>',  // only new, undelivered messages
      );

      // null = timeout with no new messages
      if (response === null) continue;

      for (const [, entries] of readEntries(response)) {
        for (const [streamId, fields] of entries) {
          await processEntry(deps, streamId, fields);
        }
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Consumer stopped');
}

type StreamReply = [stream: string, entries: [id: string, fields: string[]][]][];

/** Narrows ioredis' loosely typed XREADGROUP reply to [stream, [id, fields][]][]. */
function readEntries(response: unknown): StreamReply {
  if (!Array.isArray(response)) return [];
  const streams: StreamReply = [];
  for (const stream of response) {
    if (!Array.isArray(stream) || typeof stream[0] !== 'string' || !Array.isArray(stream[1])) continue;
    const entries: [string, string[]][] = [];
    for (const entry of stream[1]) {
      if (!Array.isArray(entry) || typeof entry[0] !== 'string') continue;
      const fields = Array.isArray(entry[1])
        ? entry[1].filter((f): f is string => typeof f === 'string')
        : [];
      entries.push([entry[0], fields]);
    }
    streams.push([stream[0], entries]);
  }
  return streams;
}

/**
 * Processes pending (previously delivered but unacknowledged) entries.
 * This handles recovery after a crash or restart.
 */
async function processPending(deps: ConsumerDeps): Promise<void> {
  deps.log.info('Checking for pending entries...');

  const response = await deps.redis.xreadgroup(
    'GROUP', GROUP_NAME, deps.options.consumerName,
    'COUNT', BATCH_SIZE,
    'STREAMS', STREAM_KEY,
    '0',  // '0' = re-read pending entries for this consumer
  );

  if (response === null) return;

  let count = 0;
  for (const [, entries] of readEntries(response)) {
    for (const [streamId, fields] of entries) {
      if (fields.length === 0) continue; // already acked, skip nil entries
      await processEntry(deps, streamId, fields);
      count++;
    }
  }

  if (count > 0) {
    deps.log.info({ count }, 'Recovered pending entries');
  }
}

/**
 * Processes a single stream entry: parse → insert → ACK → record activations.
 *
 * Persistence and activation recording have separate error boundaries:
 * - unparseable entry: logged and ACKed, redelivery would fail the same way;
 * - insert failure: no XACK, the entry stays pending for redelivery;
 * - activation failure: logged only, the ACK is already done.
 *
 * Exported for unit testing.
 */
export async function processEntry(
  deps: ConsumerDeps,
  streamId: string,
  fields: readonly string[],
): Promise<void> {
  let event: SubjectEvent;
  try {
    event = parseStreamEntry(fields);
  } catch (err: unknown) {
    deps.log.error({ err, streamId }, 'Dropping unparseable stream entry');
    await deps.redis.xack(STREAM_KEY, GROUP_NAME, streamId);
    return;
  }

  // --- Persistence boundary: insert + ACK ---
  try {
    const inserted = await insertSubjectEvent(deps.db, event);
    await deps.redis.xack(STREAM_KEY, GROUP_NAME, streamId);

    if (!inserted) {
      // Duplicate delivery: activations were recorded the first time.
      deps.log.debug({ event_id: event.event_id, streamId }, 'Duplicate event skipped');
      return;
    }
    deps.log.debug({ event_id: event.event_id, streamId }, 'Event persisted');
  } catch (err: unknown) {
    deps.log.error({ err, event_id: event.event_id, streamId }, 'Failed to persist event');
    return;
  }

  // --- Activation boundary (post-ACK, never blocks persistence) ---
  const definitions = deps.store.forWorkspace(event.workspace_id);
  if (definitions.length === 0) return;

  try {
    const { recorded, failures } = await recordActivations(
      deps.db,
      event,
      definitions,
      deps.options.lookbackDays,
    );

    for (const failure of failures) {
      deps.log.warn(
        { err: failure.error, definition_id: failure.definition_id, subject_id: event.subject_id },
        'Failed to evaluate activation definition',
      );
    }

    for (const activation of recorded) {
      deps.log.info(
        { ...activation, event_id: event.event_id },
        'Subject activated',
      );
      await publishActivation(deps.redis, deps.log, activation);
    }
  } catch (err: unknown) {
    deps.log.error({ err, event_id: event.event_id, streamId }, 'Failed to record activations');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
