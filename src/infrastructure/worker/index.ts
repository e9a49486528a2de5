export { startConsumer, parseStreamEntry } from './stream-consumer.js';
export type { ConsumerOptions } from './stream-consumer.js';
export { startDefinitionSubscriber, reloadDefinitions, loadActiveDefinitions } from './definition-subscriber.js';
