export { AsyncQueue, QueueGetAbortedError } from './async-queue.js';
export { CompletionSignal } from './completion-signal.js';
export { InternalProducer } from './producer.js';
export type { QueuedCommand, ErrorQueue, InternalProducerOptions } from './producer.js';
export { InternalConsumer } from './consumer.js';
export type { CommandHandler } from './consumer.js';
export { sleep } from './sleep.js';
export { whenAborted, waitUnlessAborted, isAbortError } from './abort.js';
