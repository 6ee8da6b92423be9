import * as fs from 'fs';
import { type ParseArgsConfig, parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_MAX_EXECUTION_TIME, DEFAULT_PORT } from '../constants.ts';
import type { ServerConfig } from '../types.ts';

const PackageJsonSchema = z.object({ name: z.string(), version: z.string() });
const pkg = PackageJsonSchema.parse(JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')));

const HELP_TEXT = `
Usage: sheet-relay [options]

HTTP relay for a Google Sheets spreadsheet: location logging and optional spreadsheet endpoints.

Options:
  --version                    Show version number
  --help                       Show this help message
  --port=<port>                HTTP port (default: ${DEFAULT_PORT})
  --log-level=<level>          Logging level (default: info)
  --spreadsheet-id=<id|url>    Spreadsheet to read and write
  --cors-origins=<origins>     Allowed origins: * or a comma separated list
  --ip-hash-salt=<salt>        Salt for hashing client IP addresses
  --key-file=<path>            Service account key file (default: application default credentials)
  --enable-spreadsheet-api     Mount the /api/spreadsheet endpoints
  --transfer-config=<path>     JSON file overriding transfer job settings
  --max-time=<seconds>         Transfer job time budget (default: ${DEFAULT_MAX_EXECUTION_TIME})

Environment Variables:
  PORT, LOG_LEVEL, DEBUG, GOOGLE_SHEETS_SPREADSHEET_ID, CORS_ORIGINS, IP_HASH_SALT,
  GOOGLE_APPLICATION_CREDENTIALS, ENABLE_SPREADSHEET_API, TRANSFER_CONFIG, MAX_EXECUTION_TIME

Examples:
  sheet-relay --port=3000
  GOOGLE_SHEETS_SPREADSHEET_ID=abc123 IP_HASH_SALT=change-me sheet-relay
`.trim();

/**
 * Handle --version and --help flags before config parsing.
 * These should work without requiring any configuration.
 */
export function handleVersionHelp(args: string[], helpText = HELP_TEXT): { handled: boolean; output?: string } {
  const { values } = parseArgs({
    args,
    options: {
      version: { type: 'boolean' },
      help: { type: 'boolean' },
    },
    strict: false,
    allowPositionals: true,
  });

  if (values.version) return { handled: true, output: pkg.version };
  if (values.help) return { handled: true, output: helpText };
  return { handled: false };
}

/**
 * Reduce a full Sheets URL to the bare spreadsheet id.
 *
 * @example normalizeSpreadsheetId('https://docs.google.com/spreadsheets/d/abc-123/edit#gid=0') // 'abc-123'
 */
export function normalizeSpreadsheetId(raw: string): string {
  const trimmed = raw.trim();
  const match = trimmed.match(/\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/);
  return match?.[1] ?? trimmed;
}

/** `*` allows every origin; otherwise a comma separated list. */
export function parseCorsOrigins(raw: string | undefined): string[] {
  if (!raw) return [];
  if (raw.trim() === '*') return ['*'];
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

function parseBoolean(value: string | boolean | undefined): boolean {
  if (typeof value === 'boolean') return value;
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) throw new Error(`Invalid ${name}: "${value}" (expected a positive integer)`);
  return parsed;
}

export const CONFIG_OPTIONS = {
  port: { type: 'string' },
  'log-level': { type: 'string' },
  'spreadsheet-id': { type: 'string' },
  'cors-origins': { type: 'string' },
  'ip-hash-salt': { type: 'string' },
  'key-file': { type: 'string' },
  'enable-spreadsheet-api': { type: 'boolean' },
  'transfer-config': { type: 'string' },
  'max-time': { type: 'string' },
} as const satisfies ParseArgsConfig['options'];

const stringFlag = (value: string | boolean | undefined): string | undefined => (typeof value === 'string' ? value : undefined);

/**
 * Parse relay and job configuration from CLI arguments and environment.
 * CLI flags win over environment variables.
 */
export function parseConfig(args: string[], env: Record<string, string | undefined>): ServerConfig {
  const { values } = parseArgs({
    args,
    options: CONFIG_OPTIONS,
    strict: false, // Allow other arguments
    allowPositionals: true,
  });

  const name = pkg.name.replace(/^@[^/]+\//, '');
  const logLevel = stringFlag(values['log-level']) ?? env.LOG_LEVEL ?? (parseBoolean(env.DEBUG) ? 'debug' : 'info');
  const port = parsePositiveInt('port', stringFlag(values.port) ?? env.PORT, DEFAULT_PORT);
  const maxExecutionTime = parsePositiveInt('max-time', stringFlag(values['max-time']) ?? env.MAX_EXECUTION_TIME, DEFAULT_MAX_EXECUTION_TIME);
  const spreadsheetId = normalizeSpreadsheetId(stringFlag(values['spreadsheet-id']) ?? env.GOOGLE_SHEETS_SPREADSHEET_ID ?? '');
  const corsOrigins = parseCorsOrigins(stringFlag(values['cors-origins']) ?? env.CORS_ORIGINS);
  const ipHashSalt = stringFlag(values['ip-hash-salt']) ?? env.IP_HASH_SALT ?? '';
  const keyFile = stringFlag(values['key-file']) ?? env.GOOGLE_APPLICATION_CREDENTIALS;
  const transferConfigPath = stringFlag(values['transfer-config']) ?? env.TRANSFER_CONFIG;
  const enableSpreadsheetApi = values['enable-spreadsheet-api'] !== undefined ? parseBoolean(values['enable-spreadsheet-api']) : parseBoolean(env.ENABLE_SPREADSHEET_API);

  return {
    name,
    version: pkg.version,
    logLevel,
    port,
    spreadsheetId,
    corsOrigins,
    ipHashSalt,
    enableSpreadsheetApi,
    maxExecutionTime,
    ...(keyFile && { keyFile }),
    ...(transferConfigPath && { transferConfigPath }),
  };
}

/**
 * Build production configuration from process globals.
 * Entry point for production server.
 */
export function createConfig(args: string[] = process.argv.slice(2)): ServerConfig {
  return parseConfig(args, process.env);
}
