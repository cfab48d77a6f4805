export { dbPlugin, createDbClient, ensureTables, createSchemaStore, createLogStore } from './db/index.js';
export type { Database, Stores, DbPluginOptions } from './db/index.js';
export { default as servicesPlugin } from './services-plugin.js';
export type { ServicesPluginOptions } from './services-plugin.js';
export { createLogger, SERVICE_NAME } from './logger.js';
export { loadServerConfig, loadEnv, ConfigError, DEFAULT_CONFIG } from './config/index.js';
export type { ServerConfig, EnvConfig } from './config/index.js';
