export { loadConfig, getDefaultConfig, DEFAULT_CONFIG_PATH } from './loader.js';
export { ConfigSchema, LogLevelSchema, TransformDefaultsSchema } from './schema.js';
export type { Config, TransformDefaults } from './schema.js';
