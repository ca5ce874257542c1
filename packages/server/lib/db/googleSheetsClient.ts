import { google, sheets_v4 } from 'googleapis';
import { StoreError, toError } from '../errors.js';
import { debugStorage } from '../debugLogger.js';

const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

/**
 * The two spreadsheet operations the result store needs.
 * Ranges use A1 notation including the sheet name, e.g. `Sheet1!E:E`.
 */
export interface SheetRangeClient {
  /** First cell of every row in the range; empty rows read as '' */
  readColumn(range: string): Promise<string[]>;
  /** Write one value to one cell without any parsing by Sheets */
  writeCell(range: string, value: string): Promise<void>;
}

/**
 * SheetRangeClient backed by the Sheets v4 API and a service-account key file
 */
export class GoogleSheetsClient implements SheetRangeClient {
  private readonly sheets: sheets_v4.Sheets;
  private readonly spreadsheetId: string;

  constructor(spreadsheetId: string, credentialsPath: string) {
    this.spreadsheetId = spreadsheetId;
    const auth = new google.auth.GoogleAuth({
      keyFile: credentialsPath,
      scopes: SHEETS_SCOPES,
    });
    this.sheets = google.sheets({ version: 'v4', auth });
  }

  async readColumn(range: string): Promise<string[]> {
    try {
      const response = await this.sheets.spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range,
      });
      const rows = response.data.values ?? [];
      debugStorage('Read sheet column', { range, rows: rows.length });
      return rows.map(row => (Array.isArray(row) && row.length > 0 ? String(row[0]) : ''));
    } catch (error) {
      throw new StoreError(`Failed to read ${range}: ${toError(error).message}`);
    }
  }

  async writeCell(range: string, value: string): Promise<void> {
    try {
      await this.sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values: [[value]] },
      });
      debugStorage('Wrote sheet cell', { range, length: value.length });
    } catch (error) {
      throw new StoreError(`Failed to write ${range}: ${toError(error).message}`);
    }
  }
}
