export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { enqueueEvent, STREAM_KEY } from './event-producer.js';
export { publishDefinitionChange, DEFINITIONS_CHANNEL } from './definition-notifier.js';
export type { DefinitionChangeReason, DefinitionChangePayload } from './definition-notifier.js';
export { publishActivation, ACTIVATIONS_CHANNEL } from './activation-notifier.js';
export type { ActivationNotificationPayload } from './activation-notifier.js';
export { WORKER_HEALTH_KEY } from './worker-health.js';
