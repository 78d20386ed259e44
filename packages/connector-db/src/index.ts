/**
 * @opendata-linker/connector-db
 *
 * Catalog database handles for PostgreSQL and MySQL
 */

export * from './postgresql/index.js';
export * from './mysql/index.js';
