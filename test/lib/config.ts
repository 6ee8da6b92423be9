import { parseConfig } from '../../src/setup/config.ts';
import type { ServerConfig } from '../../src/types.ts';

export function createConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return { ...parseConfig([], { IP_HASH_SALT: 'test-secret', GOOGLE_SHEETS_SPREADSHEET_ID: 'test-spreadsheet' }), ...overrides };
}
