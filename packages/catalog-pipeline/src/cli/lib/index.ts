/**
 * CLI Library Index
 *
 * @module cli/lib
 */

export {
  type CLIConfig,
  type LoadConfigOptions,
  type PathsConfig,
  type StorageBackend,
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  STORAGE_BACKENDS,
  findConfigFile,
  loadConfig,
  parseConfigContent,
  resolvePath,
  validateConfig,
} from './config.js';

export { CLILogger, createCLILogger, formatDuration, type CLILoggerConfig } from './logger.js';

export {
  type TableColumn,
  formatJson,
  formatMetricsTable,
  formatTable,
  formatters,
  printError,
  printOutput,
} from './output.js';
