export { redisPlugin, enqueueEvent, publishDefinitionChange, publishActivation, WORKER_HEALTH_KEY } from './redis/index.js';
export type { DefinitionChangeReason, DefinitionChangePayload, ActivationNotificationPayload } from './redis/index.js';
export { createDbClient, ensureSchema, dbPlugin } from './db/index.js';
export type { Database } from './db/index.js';
export { startConsumer, startDefinitionSubscriber, reloadDefinitions, loadActiveDefinitions } from './worker/index.js';
