export {
  GoogleSheetsClient,
  createGoogleSheetsClient,
  quoteSheetName,
  SHEETS_READONLY_SCOPE,
} from './client.js';
export type { GoogleSheetsClientConfig, ServiceAccountCredentials } from './client.js';
