import assert from 'assert';
import { clientIp, hashIpAddress, sanitizeInput, sanitizeObject } from '../../../src/api/security.ts';

describe('hashIpAddress', () => {
  it('returns the first 8 hex characters of the HMAC-SHA256', () => {
    assert.strictEqual(hashIpAddress('203.0.113.7', 'test-secret'), '65c1c903');
  });

  it('passes a missing address through', () => {
    assert.strictEqual(hashIpAddress(null, ''), null);
    assert.strictEqual(hashIpAddress(undefined, 'test-secret'), null);
  });

  it('refuses to hash without a salt', () => {
    assert.throws(() => hashIpAddress('203.0.113.7', ''), { message: 'IP_HASH_SALT environment variable is not set' });
  });
});

describe('sanitizeInput', () => {
  it('strips markup and script content', () => {
    assert.strictEqual(sanitizeInput('<script>alert(1)</script>Hello'), 'Hello');
    assert.strictEqual(sanitizeInput('<b>Hi</b> there'), 'Hi there');
  });

  it('removes a leading equals sign', () => {
    assert.strictEqual(sanitizeInput('=SUM(A1)'), 'SUM(A1)');
    assert.strictEqual(sanitizeInput('1+1=2'), '1+1=2');
  });

  it('turns line breaks into spaces', () => {
    assert.strictEqual(sanitizeInput('line1\nline2'), 'line1 line2');
    assert.strictEqual(sanitizeInput('line1\r\nline2'), 'line1 line2');
  });

  it('passes non-strings through', () => {
    assert.strictEqual(sanitizeInput(42), 42);
    assert.strictEqual(sanitizeInput(null), null);
  });
});

describe('sanitizeObject', () => {
  it('sanitizes nested strings only', () => {
    const result = sanitizeObject({ message: '=cmd', tags: ['<i>a</i>', 3], nested: { note: 'x\ny', ok: true } });
    assert.deepStrictEqual(result, { message: 'cmd', tags: ['a', 3], nested: { note: 'x y', ok: true } });
  });
});

describe('clientIp', () => {
  it('prefers the first forwarded address', () => {
    assert.strictEqual(clientIp({ headers: { 'x-forwarded-for': ' 203.0.113.7 , 10.0.0.1' }, socket: { remoteAddress: '127.0.0.1' } }), '203.0.113.7');
  });

  it('falls back to the socket address', () => {
    assert.strictEqual(clientIp({ headers: {}, socket: { remoteAddress: '127.0.0.1' } }), '127.0.0.1');
    assert.strictEqual(clientIp({ headers: {}, socket: {} }), null);
  });
});
