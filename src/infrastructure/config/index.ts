export { Config, configSchema, loadConfig, DEFAULT_API_CONFIG } from './config.js';
export type { ApiConfig, ApiConfigOverrides, ConfigData } from './config.js';
