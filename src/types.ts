import type { BaseLogger } from 'pino';

export type Logger = Pick<BaseLogger, 'info' | 'error' | 'warn' | 'debug'>;

// Cells as the Sheets API hands them back; null marks an empty cell
export type Cell = string | number | boolean | null;
export type Row = Cell[];

export type ValueInputOption = 'RAW' | 'USER_ENTERED';

/**
 * A range on a named sheet, e.g. sheetName='Intake', startCell='A1', endCell='Z100'.
 */
export interface SheetRange {
  sheetName: string;
  startCell: string;
  endCell?: string;
}

export interface SheetData {
  range: string;
  values: Row[];
}

export interface SheetUpdateRequest {
  range: SheetRange;
  values: Row[];
  valueInputOption?: ValueInputOption;
}

export interface SheetUpdateResponse {
  updatedCells: number;
  updatedRange: string;
}

export interface SheetAppendRequest {
  range: SheetRange;
  values: Row[];
  valueInputOption?: ValueInputOption;
}

export interface SheetAppendResponse {
  appendedCells: number;
  appendedRange: string;
}

/**
 * Sheet Access Port. Everything the transfer job and the HTTP relay need from a spreadsheet.
 * Ranges passed to batchUpdateValues are absolute A1 strings ('Sheet'!B7).
 */
export interface SheetsPort {
  getValues(range: SheetRange): Promise<SheetData>;
  updateValues(request: SheetUpdateRequest): Promise<SheetUpdateResponse>;
  appendValues(request: SheetAppendRequest): Promise<SheetAppendResponse>;
  batchUpdateValues(updates: Record<string, Row[]>, valueInputOption?: ValueInputOption): Promise<Record<string, number>>;
  getSheetNames(): Promise<string[]>;
  clearValues(range: SheetRange): Promise<string>;
}

/**
 * Application config composed from CLI flags and environment
 */
export interface ServerConfig {
  name: string;
  version: string;
  logLevel: string;
  port: number;
  spreadsheetId: string;
  corsOrigins: string[];
  ipHashSalt: string;
  keyFile?: string;
  enableSpreadsheetApi: boolean;
  transferConfigPath?: string;
  maxExecutionTime: number;
}

export interface GoogleApiError {
  response?: { status?: number };
  status?: number;
  statusCode?: number;
  code?: number | string;
  message?: string;
}

/** Runtime dependencies shared by the HTTP server and the job runner. */
export interface RuntimeDeps {
  config: ServerConfig;
  logger: Logger;
  createSheets: () => SheetsPort;
}

export interface RuntimeOverrides {
  logger?: Logger;
  createSheets?: () => SheetsPort;
}
