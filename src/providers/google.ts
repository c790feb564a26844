import * as fs from 'node:fs/promises';
import { google } from 'googleapis';
import type { ContactEntry, ContactSink } from '../types/index.js';
import { toSheetRow } from '../types/index.js';
import { ConfigError, UploadError, errorMessage, logger } from '../utils/index.js';

export const SHEETS_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
];

export interface GoogleSheetsConfig {
  spreadsheetId: string;
  sheetTab: string;
  /** Service-account key file. */
  credentialsPath?: string;
}

/** A1 range naming a whole tab; quotes in the name are doubled. */
export function sheetRange(tab: string): string {
  return `'${tab.replace(/'/g, "''")}'`;
}

/**
 * Appends contacts to one tab of a Google spreadsheet through the Sheets API,
 * authenticating as a service account. Existing rows are never read or updated.
 */
export class GoogleSheetsProvider implements ContactSink {
  readonly name = 'google-sheets';
  private config: GoogleSheetsConfig;

  constructor(config: GoogleSheetsConfig) {
    this.config = config;
  }

  private async assertCredentials(): Promise<string> {
    const keyFile = this.config.credentialsPath;
    if (!keyFile) {
      throw new ConfigError('Missing GOOGLE_CREDS_JSON environment variable or file');
    }
    try {
      await fs.access(keyFile);
    } catch {
      throw new ConfigError(`Credential file not found: ${keyFile}`);
    }
    return keyFile;
  }

  private getClient(keyFile: string) {
    const auth = new google.auth.GoogleAuth({ keyFile, scopes: SHEETS_SCOPES });
    return google.sheets({ version: 'v4', auth });
  }

  async append(entries: ContactEntry[]): Promise<number> {
    const keyFile = await this.assertCredentials();
    if (entries.length === 0) return 0;

    const { spreadsheetId, sheetTab } = this.config;
    const values = entries.map(toSheetRow);
    logger.debug(`Appending ${values.length} rows to ${spreadsheetId}`);

    const sheets = this.getClient(keyFile);
    try {
      const res = await sheets.spreadsheets.values.append({
        spreadsheetId,
        range: sheetRange(sheetTab),
        // parsed as if typed into the sheet UI
        valueInputOption: 'USER_ENTERED',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values },
      });
      const appended = res.data.updates?.updatedRows ?? values.length;
      logger.info(`Google Sheets: appended ${appended} rows to "${sheetTab}"`);
      return appended;
    } catch (err) {
      throw new UploadError(this.name, `Append to "${sheetTab}" failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
