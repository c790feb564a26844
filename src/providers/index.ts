export { GoogleSheetsProvider, sheetRange, SHEETS_SCOPES } from './google.js';
export type { GoogleSheetsConfig } from './google.js';
