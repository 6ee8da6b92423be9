import assert from 'assert';
import { handleVersionHelp, normalizeSpreadsheetId, parseConfig, parseCorsOrigins } from '../../../src/setup/config.ts';

describe('parseConfig', () => {
  it('applies defaults with no args or env', () => {
    const config = parseConfig([], {});

    assert.deepStrictEqual(config, {
      name: 'sheet-relay',
      version: '0.1.0',
      logLevel: 'info',
      port: 8080,
      spreadsheetId: '',
      corsOrigins: [],
      ipHashSalt: '',
      enableSpreadsheetApi: false,
      maxExecutionTime: 240,
    });
  });

  it('reads the environment', () => {
    const config = parseConfig([], {
      PORT: '9000',
      GOOGLE_SHEETS_SPREADSHEET_ID: 'sheet-123',
      CORS_ORIGINS: 'https://a.example, https://b.example',
      IP_HASH_SALT: 'test-secret',
      GOOGLE_APPLICATION_CREDENTIALS: '/secrets/key.json',
      ENABLE_SPREADSHEET_API: 'true',
      TRANSFER_CONFIG: './transfer.json',
      MAX_EXECUTION_TIME: '120',
    });

    assert.strictEqual(config.port, 9000);
    assert.strictEqual(config.spreadsheetId, 'sheet-123');
    assert.deepStrictEqual(config.corsOrigins, ['https://a.example', 'https://b.example']);
    assert.strictEqual(config.ipHashSalt, 'test-secret');
    assert.strictEqual(config.keyFile, '/secrets/key.json');
    assert.strictEqual(config.enableSpreadsheetApi, true);
    assert.strictEqual(config.transferConfigPath, './transfer.json');
    assert.strictEqual(config.maxExecutionTime, 120);
  });

  it('lets CLI flags override env vars', () => {
    const config = parseConfig(['--port', '3000', '--max-time=60', '--log-level=warn', '--enable-spreadsheet-api'], {
      PORT: '4000',
      MAX_EXECUTION_TIME: '120',
      LOG_LEVEL: 'error',
      ENABLE_SPREADSHEET_API: 'false',
    });

    assert.strictEqual(config.port, 3000);
    assert.strictEqual(config.maxExecutionTime, 60);
    assert.strictEqual(config.logLevel, 'warn');
    assert.strictEqual(config.enableSpreadsheetApi, true);
  });

  it('switches to debug logging when DEBUG is set', () => {
    assert.strictEqual(parseConfig([], { DEBUG: 'True' }).logLevel, 'debug');
    assert.strictEqual(parseConfig([], { DEBUG: 'True', LOG_LEVEL: 'info' }).logLevel, 'info');
  });

  it('ignores unrelated arguments', () => {
    const config = parseConfig(['run', 'transfer_data', '--unknown'], {});
    assert.strictEqual(config.port, 8080);
  });

  it('rejects a port that is not a positive integer', () => {
    assert.throws(() => parseConfig(['--port=http'], {}), /Invalid port: "http"/);
    assert.throws(() => parseConfig([], { MAX_EXECUTION_TIME: '-1' }), /Invalid max-time: "-1"/);
  });
});

describe('normalizeSpreadsheetId', () => {
  it('extracts the id from a full URL', () => {
    assert.strictEqual(normalizeSpreadsheetId('https://docs.google.com/spreadsheets/d/abc-123_X/edit#gid=0'), 'abc-123_X');
  });

  it('trims a bare id', () => {
    assert.strictEqual(normalizeSpreadsheetId('  abc123  '), 'abc123');
  });
});

describe('parseCorsOrigins', () => {
  it('handles wildcard, lists and empty values', () => {
    assert.deepStrictEqual(parseCorsOrigins('*'), ['*']);
    assert.deepStrictEqual(parseCorsOrigins('https://a.example'), ['https://a.example']);
    assert.deepStrictEqual(parseCorsOrigins('https://a.example,,https://b.example,'), ['https://a.example', 'https://b.example']);
    assert.deepStrictEqual(parseCorsOrigins(undefined), []);
  });
});

describe('handleVersionHelp', () => {
  it('prints the package version', () => {
    assert.deepStrictEqual(handleVersionHelp(['--version']), { handled: true, output: '0.1.0' });
  });

  it('prints help text', () => {
    const result = handleVersionHelp(['--help'], 'custom help');
    assert.deepStrictEqual(result, { handled: true, output: 'custom help' });
  });

  it('does nothing for other arguments', () => {
    assert.deepStrictEqual(handleVersionHelp(['--port=3000']), { handled: false });
  });
});
