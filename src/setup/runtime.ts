import pino from 'pino';
import { createGoogleSheetsService } from '../spreadsheet/sheets-service.ts';
import type { Logger, RuntimeDeps, RuntimeOverrides, ServerConfig, SheetsPort } from '../types.ts';

// Never let secrets reach the log stream
export const REDACT_PATHS = ['ipHashSalt', 'config.ipHashSalt', 'req.headers.authorization', 'headers.authorization', 'private_key', '*.private_key'];

export function createLogger(config: Pick<ServerConfig, 'logLevel' | 'name'>): Logger {
  return pino({ name: config.name, level: config.logLevel ?? 'info', redact: { paths: REDACT_PATHS, censor: '[redacted]' } }, pino.destination(1));
}

/**
 * Shared wiring for the HTTP server and the job runner. The Sheets client is built lazily and once,
 * so a missing spreadsheet id only fails the operations that need it.
 */
export function createDefaultRuntime(config: ServerConfig, overrides?: RuntimeOverrides): RuntimeDeps {
  const logger = overrides?.logger ?? createLogger(config);
  const factory = overrides?.createSheets ?? (() => createGoogleSheetsService(config));

  let sheets: SheetsPort | undefined;
  const createSheets = (): SheetsPort => {
    if (!sheets) sheets = factory();
    return sheets;
  };

  return { config, logger, createSheets };
}
