/**
 * MySQL catalog handle
 */

export { MySQLClient, createMySQLClient } from './client.js';
export type { MySQLClientConfig } from './client.js';
