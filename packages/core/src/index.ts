export * from './types/index.js';
export * from './queries/index.js';
export * from './format/index.js';
export * from './storage/index.js';
export * from './services/index.js';
export * from './state/index.js';
export * from './parsers/index.js';
export { createDb, createTestDb, closeDb, getRawDb, seedDefaults, DEFAULT_CATEGORIES, DEFAULT_TAGS, CREATE_SCHEMA_SQL } from './db.js';
export type { TickboxDb } from './db.js';
export { loadConfig, resolveDatabasePath, ConfigError, DEFAULT_BUCKET_NAME, DEFAULT_SIGNED_URL_TTL_SECONDS, DEFAULT_MAX_FILE_SIZE_MB } from './config.js';
export type { TickboxConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
