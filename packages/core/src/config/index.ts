// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG, DEFAULT_TEST_STEP_PATTERN, DEFAULT_SUMMARY_LOG_NAME } from './defaults.js';
export { buildstatConfigSchema, validateConfig } from './schema.js';
export type { BuildstatConfigInput } from './schema.js';
export { loadConfig, writeConfig, CONFIG_FILENAME } from './loader.js';
