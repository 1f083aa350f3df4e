export { createLogger } from './logger.js';
export type { CreateLoggerOptions } from './logger.js';
