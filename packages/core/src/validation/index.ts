export {
  rowIdSchema,
  textCellSchema,
  catalogItemSchema,
  identifierSchema,
  catalogTableSchema,
  rosterSheetSchema,
  parseCatalogRow,
} from './schemas.js';
