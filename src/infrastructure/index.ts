export * from './config/index.js';
export * from './logging/index.js';
export * from './messaging/index.js';
export * from './transports/index.js';
