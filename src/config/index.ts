export { ConfigSchema, DEFAULT_PRICING_FILE } from './schema.js';
export type { Config, ConfigInput } from './schema.js';
export { loadConfig, applyEnvOverrides, applyCliOverrides } from './loader.js';
export type { CliOverrides, LoadConfigOptions } from './loader.js';
