export { createConfig, handleVersionHelp, normalizeSpreadsheetId, parseConfig, parseCorsOrigins } from './config.ts';
export { createHTTPServer } from './http.ts';
export * from './runtime.ts';
