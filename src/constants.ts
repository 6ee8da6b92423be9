/**
 * Sheet relay constants
 *
 * The OAuth scope is fixed: the relay and the transfer job only ever touch spreadsheet values.
 */

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export const DEFAULT_PORT = 8080;

// Graceful stop before the scheduler's 5 minute hard timeout
export const DEFAULT_MAX_EXECUTION_TIME = 240;

export const API_PREFIX = '/api';

// Server-side timestamps for location logs are written in GMT+4
export const LOCATION_TIME_ZONE = '+04:00';

export const LOCATION_LOG_RANGE = { sheetName: 'gps_logs', startCell: 'A1', endCell: 'L3000' } as const;
