/**
 * @opendata-linker/cli
 *
 * Config loading, logging and the opendata-linker command.
 */

export { runCli, EXIT_OK, EXIT_ABORTED, EXIT_PARTIAL } from './run.js';
export type { CliDeps } from './run.js';
export { parseArgs, USAGE } from './args.js';
export type { CliArgs, ReportFormat } from './args.js';
export {
  ConfigError,
  configFileSchema,
  catalogEntrySchema,
  rosterEntrySchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, CatalogEntry, RosterConfigEntry, EnvExpansionOptions } from './config.js';
export { createCatalogDatabase, createSpreadsheetHandle } from './handles.js';
export { Logger, redactSecrets, createRunId } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
