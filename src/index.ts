export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { Bus, createBus } from './bus.js';
export type { CreateBusOptions } from './bus.js';
