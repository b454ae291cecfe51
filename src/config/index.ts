/**
 * Configuration exports
 */
export {
  ConfigManager,
  DEFAULT_SETTINGS_FILE,
  parseConfig,
  readJsonFile,
  toConfigurationIssues,
  type ConfigManagerOptions,
  type Environment,
} from './ConfigManager.js';
export * from './schema.js';
