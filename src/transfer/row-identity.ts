import { createHash } from 'crypto';
import type { Row } from '../types.ts';
import { type ColumnMap, fieldValue } from './column-mapper.ts';

export const ROW_ID_LENGTH = 8;

/** First 8 hex characters of the SHA-1 of `data`, like a short commit hash. */
export function createShortHash(data: string): string {
  return createHash('sha1').update(data, 'utf8').digest('hex').slice(0, ROW_ID_LENGTH);
}

/**
 * The row's identifier: its `id` cell when filled, otherwise a hash of its content.
 *
 * Name, district and village always feed the hash. Phone and exact location are
 * added when present; only when both are blank does the timestamp go in, so that
 * otherwise identical submissions still get distinct ids.
 */
export function generateRowId(row: Row, columnMap: ColumnMap): string {
  const existingId = fieldValue(row, columnMap, 'id');
  if (existingId) return existingId;

  const components = [fieldValue(row, columnMap, 'name'), fieldValue(row, columnMap, 'district'), fieldValue(row, columnMap, 'village')];

  const phone = fieldValue(row, columnMap, 'phone');
  const exactLocation = fieldValue(row, columnMap, 'exact_location');
  if (phone) components.push(phone);
  if (exactLocation) components.push(exactLocation);

  if (!phone && !exactLocation) {
    const timestamp = fieldValue(row, columnMap, 'timestamp');
    if (timestamp) components.push(timestamp);
  }

  return createShortHash(components.join('|'));
}
