import { google, type sheets_v4 } from 'googleapis';
import { SHEETS_SCOPE } from '../constants.ts';
import { SheetsApiError } from '../lib/errors.ts';
import type {
  Cell,
  Row,
  ServerConfig,
  SheetAppendRequest,
  SheetAppendResponse,
  SheetData,
  SheetRange,
  SheetsPort,
  SheetUpdateRequest,
  SheetUpdateResponse,
  ValueInputOption,
} from '../types.ts';
import { toA1Notation } from './range-operations.ts';

/**
 * The slice of `sheets_v4.Sheets` the service calls. A real client satisfies it as is.
 */
export interface SheetsApiClient {
  spreadsheets: {
    get(params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    values: {
      get(params: sheets_v4.Params$Resource$Spreadsheets$Values$Get): Promise<{ data: sheets_v4.Schema$ValueRange }>;
      update(params: sheets_v4.Params$Resource$Spreadsheets$Values$Update): Promise<{ data: sheets_v4.Schema$UpdateValuesResponse }>;
      append(params: sheets_v4.Params$Resource$Spreadsheets$Values$Append): Promise<{ data: sheets_v4.Schema$AppendValuesResponse }>;
      batchUpdate(params: sheets_v4.Params$Resource$Spreadsheets$Values$Batchupdate): Promise<{ data: sheets_v4.Schema$BatchUpdateValuesResponse }>;
      clear(params: sheets_v4.Params$Resource$Spreadsheets$Values$Clear): Promise<{ data: sheets_v4.Schema$ClearValuesResponse }>;
    };
  };
}

function toCell(value: unknown): Cell {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return value === null || value === undefined ? null : String(value);
}

export function toRows(values: unknown[][] | null | undefined): Row[] {
  return (values ?? []).map((row) => row.map(toCell));
}

/**
 * SheetsPort over the Google Sheets v4 values API, bound to one spreadsheet.
 */
export class GoogleSheetsService implements SheetsPort {
  private readonly client: SheetsApiClient;
  readonly spreadsheetId: string;

  constructor(client: SheetsApiClient, spreadsheetId: string) {
    this.client = client;
    this.spreadsheetId = spreadsheetId;
  }

  async getValues(range: SheetRange): Promise<SheetData> {
    const a1 = toA1Notation(range);
    try {
      const response = await this.client.spreadsheets.values.get({ spreadsheetId: this.spreadsheetId, range: a1 });
      return { range: a1, values: toRows(response.data.values) };
    } catch (error) {
      throw new SheetsApiError('get sheet data', error);
    }
  }

  async updateValues(request: SheetUpdateRequest): Promise<SheetUpdateResponse> {
    try {
      const response = await this.client.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: toA1Notation(request.range),
        valueInputOption: request.valueInputOption ?? 'USER_ENTERED',
        requestBody: { values: request.values },
      });
      return {
        updatedCells: response.data.updatedCells ?? 0,
        updatedRange: response.data.updatedRange ?? '',
      };
    } catch (error) {
      throw new SheetsApiError('update sheet data', error);
    }
  }

  async appendValues(request: SheetAppendRequest): Promise<SheetAppendResponse> {
    try {
      const response = await this.client.spreadsheets.values.append({
        spreadsheetId: this.spreadsheetId,
        range: toA1Notation(request.range),
        valueInputOption: request.valueInputOption ?? 'USER_ENTERED',
        requestBody: { values: request.values },
      });
      return {
        appendedCells: response.data.updates?.updatedCells ?? 0,
        appendedRange: response.data.updates?.updatedRange ?? '',
      };
    } catch (error) {
      throw new SheetsApiError('append sheet data', error);
    }
  }

  async batchUpdateValues(updates: Record<string, Row[]>, valueInputOption: ValueInputOption = 'USER_ENTERED'): Promise<Record<string, number>> {
    const entries = Object.entries(updates);
    if (entries.length === 0) return {};

    try {
      const response = await this.client.spreadsheets.values.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          valueInputOption,
          data: entries.map(([range, values]) => ({ range, values })),
        },
      });
      const responses = response.data.responses ?? [];
      // Responses come back in request order
      const counts: Record<string, number> = {};
      entries.forEach(([range], index) => {
        counts[range] = responses[index]?.updatedCells ?? 0;
      });
      return counts;
    } catch (error) {
      throw new SheetsApiError('batch update sheet data', error);
    }
  }

  async getSheetNames(): Promise<string[]> {
    try {
      const response = await this.client.spreadsheets.get({
        spreadsheetId: this.spreadsheetId,
        fields: 'sheets.properties.title',
      });
      return (response.data.sheets ?? []).map((sheet) => sheet.properties?.title ?? '');
    } catch (error) {
      throw new SheetsApiError('get sheet names', error);
    }
  }

  async clearValues(range: SheetRange): Promise<string> {
    try {
      const response = await this.client.spreadsheets.values.clear({
        spreadsheetId: this.spreadsheetId,
        range: toA1Notation(range),
        requestBody: {},
      });
      return response.data.clearedRange ?? '';
    } catch (error) {
      throw new SheetsApiError('clear sheet data', error);
    }
  }
}

/**
 * Build a service authenticated with Application Default Credentials, or a
 * service account key file when one is configured.
 */
export function createGoogleSheetsService(config: Pick<ServerConfig, 'spreadsheetId' | 'keyFile'>): GoogleSheetsService {
  if (!config.spreadsheetId) {
    throw new Error('Spreadsheet id is required. Set GOOGLE_SHEETS_SPREADSHEET_ID or use --spreadsheet-id.');
  }
  const auth = new google.auth.GoogleAuth({
    scopes: [SHEETS_SCOPE],
    ...(config.keyFile && { keyFile: config.keyFile }),
  });
  const sheets = google.sheets({ version: 'v4', auth });
  return new GoogleSheetsService(sheets, config.spreadsheetId);
}
