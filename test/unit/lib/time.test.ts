import assert from 'assert';
import { formatIsoWithOffset, formatSheetTimestamp } from '../../../src/lib/time.ts';

describe('time formatting', () => {
  it('formats local time the way the sheets display it', () => {
    assert.strictEqual(formatSheetTimestamp(new Date(2025, 1, 5, 8, 4, 9)), '02/05/2025 08:04:09');
  });

  it('renders ISO timestamps in a fixed offset', () => {
    const instant = new Date(Date.UTC(2025, 1, 25, 16, 15, 27));
    assert.strictEqual(formatIsoWithOffset(instant, '+04:00'), '2025-02-25T20:15:27.000+04:00');
    assert.strictEqual(formatIsoWithOffset(instant, '-03:00'), '2025-02-25T13:15:27.000-03:00');
    assert.strictEqual(formatIsoWithOffset(instant, '+00:00'), '2025-02-25T16:15:27.000+00:00');
  });

  it('accepts IANA zone names', () => {
    assert.strictEqual(formatIsoWithOffset(new Date(Date.UTC(2025, 6, 1, 9, 0, 0, 250)), 'Asia/Tbilisi'), '2025-07-01T13:00:00.250+04:00');
  });
});
