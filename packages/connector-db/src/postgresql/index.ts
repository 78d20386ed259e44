/**
 * PostgreSQL catalog handle
 */

export { PostgresClient, createPostgresClient } from './client.js';
export type { PostgresClientConfig } from './client.js';
