import { Redis } from 'ioredis';
import pino from 'pino';
import { loadConfig } from './config/env.js';
import { createDbClient, ensureSchema } from './infrastructure/db/index.js';
import { startConsumer, startDefinitionSubscriber, loadActiveDefinitions } from './infrastructure/worker/index.js';
import { DefinitionStore } from './application/definition-store.js';
import { WORKER_HEALTH_KEY } from './infrastructure/redis/index.js';

/**
 * Standalone worker process: consumes subject events from the Redis
 * Stream, persists them to PostgreSQL and records activation transitions.
 *
 * Scales horizontally by launching instances with different WORKER_ID values.
 */
const config = loadConfig();
const log = pino({ level: config.LOG_LEVEL });

const HEALTH_TTL_SECONDS = 30;
const HEARTBEAT_MS = 10_000;

const redis = new Redis(config.REDIS_URL, {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
});

const { sql, db } = createDbClient(config.DATABASE_URL);

// Abort controller for graceful shutdown
const ac = new AbortController();

let heartbeat: NodeJS.Timeout | null = null;
let stopSubscriber: (() => Promise<void>) | null = null;

async function beat(): Promise<void> {
  try {
    await redis.set(WORKER_HEALTH_KEY, 'ok', 'EX', HEALTH_TTL_SECONDS);
  } catch (err: unknown) {
    log.warn({ err }, 'Failed to write worker heartbeat');
  }
}

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  await ensureSchema(sql);
  log.info('Database ready (subject_events + activation_definitions + subject_activations + audit_logs)');

  const store = new DefinitionStore(await loadActiveDefinitions(db, log));
  log.info(
    { definitionCount: store.get().length, definitionIds: store.get().map((d) => d.definition_id) },
    'Activation definitions loaded from database',
  );

  stopSubscriber = await startDefinitionSubscriber(config.REDIS_URL, db, log, store, ac.signal);

  await beat();
  heartbeat = setInterval(() => { void beat(); }, HEARTBEAT_MS);

  await startConsumer(redis, db, log, ac.signal, store, {
    consumerName: config.WORKER_ID,
    lookbackDays: config.LOOKBACK_DAYS,
  });
}

async function close(): Promise<void> {
  if (heartbeat !== null) clearInterval(heartbeat);
  if (stopSubscriber !== null) await stopSubscriber();
  await redis.quit();
  await sql.end();
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give the in-flight XREADGROUP block a moment to return, then close.
  setTimeout(() => {
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during worker shutdown');
        process.exit(1);
      },
    );
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
