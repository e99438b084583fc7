export type { Notifier } from './notifier.js';
export { AmqpNotifier, type AmqpNotifierOptions } from './amqp-notifier.js';
export { MemoryNotifier } from './memory-notifier.js';
