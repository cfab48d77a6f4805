export { loadServerConfig, loadEnv, DEFAULT_CONFIG, ConfigError } from './config.js';
export type { ServerConfig, EnvConfig } from './config.js';
