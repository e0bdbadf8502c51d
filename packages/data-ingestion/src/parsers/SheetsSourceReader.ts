/**
 * Google Sheets source reader
 * Reads whole tabs as raw text grids; cleaning and blank-row handling happen downstream
 */

import { google, sheets_v4, drive_v3 } from 'googleapis';
import { SheetContents, SourceReader } from '@sheetreplica/types';
import { SourceError } from '../utils/errors';
import { getErrorMessage } from '../utils/errorUtils';
import defaultLogger, { Logger } from '../utils/logger';

export const SHEETS_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets.readonly',
  'https://www.googleapis.com/auth/drive.metadata.readonly'
];

const SPREADSHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';

export interface SheetsSourceOptions {
  spreadsheetId?: string;
  spreadsheetName?: string;
  keyFile?: string;
  sheets?: sheets_v4.Sheets;
  drive?: drive_v3.Drive;
  logger?: Logger;
}

/**
 * Quote a tab name for use as an A1 range covering the whole tab
 */
export function quoteSheetName(sheetName: string): string {
  return `'${sheetName.replace(/'/g, "''")}'`;
}

export function toCellText(cell: unknown): string {
  if (cell === null || cell === undefined) return '';
  return String(cell);
}

/**
 * Split a value grid into its header row and data rows, every cell as text
 */
export function splitGrid(values: unknown[][] | null | undefined): SheetContents {
  if (!values || values.length === 0) {
    return { headers: [], rows: [] };
  }

  const [headerRow, ...dataRows] = values;
  return {
    headers: (headerRow ?? []).map(toCellText),
    rows: dataRows.map((row) => (row ?? []).map(toCellText))
  };
}

export class SheetsSourceReader implements SourceReader {
  private readonly sheets: sheets_v4.Sheets;
  private readonly drive: drive_v3.Drive;
  private readonly logger: Logger;
  private spreadsheetIdPromise: Promise<string> | null = null;

  constructor(private readonly options: SheetsSourceOptions) {
    if (!options.spreadsheetId && !options.spreadsheetName) {
      throw new SourceError('Either a spreadsheet id or a spreadsheet name is required');
    }

    this.logger = options.logger ?? defaultLogger;

    if (options.sheets && options.drive) {
      this.sheets = options.sheets;
      this.drive = options.drive;
    } else {
      const auth = new google.auth.GoogleAuth({
        keyFile: options.keyFile,
        scopes: SHEETS_SCOPES
      });
      this.sheets = options.sheets ?? google.sheets({ version: 'v4', auth });
      this.drive = options.drive ?? google.drive({ version: 'v3', auth });
    }
  }

  /**
   * Spreadsheet id, resolved once from the spreadsheet name when no id was configured
   */
  getSpreadsheetId(): Promise<string> {
    if (!this.spreadsheetIdPromise) {
      this.spreadsheetIdPromise = this.resolveSpreadsheetId().catch((error: unknown) => {
        this.spreadsheetIdPromise = null;
        throw error;
      });
    }
    return this.spreadsheetIdPromise;
  }

  private async resolveSpreadsheetId(): Promise<string> {
    if (this.options.spreadsheetId) {
      return this.options.spreadsheetId;
    }

    const name = this.options.spreadsheetName ?? '';
    const escaped = name.replace(/\\/g, '\\\\').replace(/'/g, "\\'");

    let files: drive_v3.Schema$File[];
    try {
      const response = await this.drive.files.list({
        q: `name = '${escaped}' and mimeType = '${SPREADSHEET_MIME_TYPE}' and trashed = false`,
        fields: 'files(id, name)',
        pageSize: 10,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true
      });
      files = response.data.files ?? [];
    } catch (error) {
      throw new SourceError(`Could not search for spreadsheet '${name}': ${getErrorMessage(error)}`, undefined, error);
    }

    const id = files.find((file) => file.id)?.id;
    if (!id) {
      throw new SourceError(`Spreadsheet '${name}' not found or not shared with the service account`);
    }
    if (files.length > 1) {
      this.logger.warn('Several spreadsheets share this name, using the first one', { name, id });
    }

    this.logger.debug('Spreadsheet resolved', { name, id });
    return id;
  }

  async listRows(sheetName: string): Promise<SheetContents> {
    const spreadsheetId = await this.getSpreadsheetId();

    try {
      const response = await this.sheets.spreadsheets.values.get({
        spreadsheetId,
        range: quoteSheetName(sheetName),
        majorDimension: 'ROWS',
        valueRenderOption: 'FORMATTED_VALUE'
      });
      return splitGrid(response.data.values);
    } catch (error) {
      throw new SourceError(`Could not read sheet '${sheetName}': ${getErrorMessage(error)}`, sheetName, error);
    }
  }

  async listSheets(): Promise<string[]> {
    const spreadsheetId = await this.getSpreadsheetId();

    try {
      const response = await this.sheets.spreadsheets.get({
        spreadsheetId,
        fields: 'sheets.properties.title'
      });
      return (response.data.sheets ?? [])
        .map((sheet) => sheet.properties?.title)
        .filter((title): title is string => !!title);
    } catch (error) {
      throw new SourceError(`Could not list sheets: ${getErrorMessage(error)}`, undefined, error);
    }
  }
}

export default SheetsSourceReader;
