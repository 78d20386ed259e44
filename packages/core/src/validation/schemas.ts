/**
 * Zod schemas for validating rows at the read boundary
 */

import { z } from 'zod';
import type { CatalogTable, Row } from '../types/index.js';

/** Catalog id: non-blank text kept verbatim, or an integer JS can hold exactly */
export const rowIdSchema = z.union([
  z.string().refine((value) => value.trim() !== '', 'must not be blank'),
  z.number().int().safe(),
]);

/** Nullable text cell; NULL and missing read as '' */
export const textCellSchema = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

export const catalogItemSchema = z.object({
  id: rowIdSchema,
  sourceTableName: textCellSchema,
  openDataLink: textCellSchema,
});

/** SQL identifier: letters, digits and underscores, not starting with a digit */
export const identifierSchema = z
  .string()
  .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'must be a plain SQL identifier');

export const catalogTableSchema = z.object({
  schema: identifierSchema.optional(),
  name: identifierSchema,
  idColumn: identifierSchema,
  keyColumn: identifierSchema,
  linkColumn: identifierSchema,
  extraColumns: z.array(identifierSchema).optional(),
});

export const rosterSheetSchema = z.object({
  name: z.string().min(1),
  keyHeader: z.string().min(1),
  linkHeader: z.string().min(1),
  headerRow: z.number().int().min(1).optional(),
});

/**
 * Pick the catalog columns out of a raw row and validate them
 */
export function parseCatalogRow(row: Row, table: CatalogTable) {
  return catalogItemSchema.safeParse({
    id: row[table.idColumn],
    sourceTableName: row[table.keyColumn],
    openDataLink: row[table.linkColumn],
  });
}
