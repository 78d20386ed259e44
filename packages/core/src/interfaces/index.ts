export type {
  ConnectionState,
  IHandle,
  CatalogDatabase,
  SpreadsheetHandle,
} from './connector.js';
export type { RunLogger } from './logger.js';
export { silentLogger } from './logger.js';
