/**
 * SQL identifier checks shared by the database clients
 */

import { ConnectorError, type CatalogTable } from '@opendata-linker/core';

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Validate that a string is a safe SQL identifier
 */
export function validateIdentifier(name: string, type: string, handle: string): void {
  if (!VALID_IDENTIFIER.test(name)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      handle,
      suggestion: `Use only valid SQL identifiers for ${type} names.`,
    });
  }
}

/**
 * Validate every identifier of a catalog table descriptor
 */
export function validateTable(table: CatalogTable, handle: string): void {
  if (table.schema !== undefined) {
    validateIdentifier(table.schema, 'schema', handle);
  }
  validateIdentifier(table.name, 'table', handle);
  validateIdentifier(table.idColumn, 'column', handle);
  validateIdentifier(table.keyColumn, 'column', handle);
  validateIdentifier(table.linkColumn, 'column', handle);
  for (const column of table.extraColumns ?? []) {
    validateIdentifier(column, 'column', handle);
  }
}

/**
 * Validate column names against the columns the table actually has
 */
export function validateColumns(
  columns: string[],
  allowedColumns: Set<string>,
  tableName: string,
  handle: string
): void {
  for (const col of columns) {
    if (!allowedColumns.has(col)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Column "${col}" does not exist in table ${tableName}.`,
        handle,
        suggestion: allowedColumns.size > 0
          ? `Valid columns: ${Array.from(allowedColumns).join(', ')}`
          : 'Check the schema and table names; no columns were found.',
      });
    }
  }
}
