import * as fs from 'fs';
import { google } from 'googleapis';
import { DataProcessor } from './dataProcessor';
import { ConfigError, DataLoadError, SheetsError, errorMessage, httpStatusOf } from './errors';
import type { Dataset } from './types';

const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets.readonly',
  'https://www.googleapis.com/auth/drive.readonly',
];

const URL_ID_PATTERN = /\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/;
const BARE_ID_PATTERN = /^[a-zA-Z0-9-_]{20,}$/;

export interface WorksheetValues {
  title: string;
  sheetName: string;
  values: unknown[][];
}

/** Reads the first worksheet of a spreadsheet. */
export interface SheetFetcher {
  fetchFirstWorksheet(spreadsheetId: string): Promise<WorksheetValues>;
}

export class GoogleSheetFetcher implements SheetFetcher {
  constructor(private readonly credentialsFile: string) {}

  async fetchFirstWorksheet(spreadsheetId: string): Promise<WorksheetValues> {
    if (!fs.existsSync(this.credentialsFile)) {
      throw new ConfigError(
        `Google Sheets credentials not found at ${this.credentialsFile}`,
        503
      );
    }

    const auth = new google.auth.GoogleAuth({ keyFile: this.credentialsFile, scopes: SCOPES });
    const sheets = google.sheets({ version: 'v4', auth });

    const meta = await sheets.spreadsheets.get({
      spreadsheetId,
      fields: 'properties.title,sheets.properties.title',
    });
    const sheetName = meta.data.sheets?.[0]?.properties?.title;
    if (!sheetName) {
      throw new DataLoadError('The spreadsheet has no worksheets');
    }

    // A bare sheet name as the range returns every filled cell of that sheet.
    const response = await sheets.spreadsheets.values.get({
      spreadsheetId,
      range: `'${sheetName.replace(/'/g, "''")}'`,
    });

    return {
      title: meta.data.properties?.title || spreadsheetId,
      sheetName,
      values: response.data.values ?? [],
    };
  }
}

export class SheetsLoader {
  constructor(private readonly fetcher: SheetFetcher) {}

  static parseSpreadsheetId(reference: string): string {
    const trimmed = reference.trim();
    const match = URL_ID_PATTERN.exec(trimmed);
    if (match) return match[1];
    if (BARE_ID_PATTERN.test(trimmed)) return trimmed;
    throw new DataLoadError('Invalid Google Sheet URL', `Could not find a spreadsheet id in "${trimmed}"`);
  }

  async loadGoogleSheet(reference: string): Promise<Dataset> {
    const spreadsheetId = SheetsLoader.parseSpreadsheetId(reference);

    let worksheet: WorksheetValues;
    try {
      console.log('📄 Fetching Google Sheet:', spreadsheetId);
      worksheet = await this.fetcher.fetchFirstWorksheet(spreadsheetId);
    } catch (error) {
      throw toSheetsError(error);
    }

    console.log(`✅ Sheet "${worksheet.sheetName}" fetched, ${worksheet.values.length} rows`);
    return DataProcessor.processRows(worksheet.values, {
      originalName: worksheet.title,
      source: 'google-sheet',
      sheetName: worksheet.sheetName,
    });
  }
}

export function toSheetsError(error: unknown): Error {
  if (error instanceof ConfigError || error instanceof DataLoadError || error instanceof SheetsError) {
    return error;
  }

  const status = httpStatusOf(error);
  const details = errorMessage(error);
  if (status === 401 || status === 403) {
    return new SheetsError(
      'Permission denied: share the spreadsheet with the service account',
      403,
      details
    );
  }
  if (status === 404) {
    return new SheetsError('Spreadsheet not found', 404, details);
  }
  return new SheetsError('Error loading Google Sheet', 502, details);
}
