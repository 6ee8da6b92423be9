import assert from 'assert';
import { createShortHash, generateRowId, ROW_ID_LENGTH } from '../../../src/transfer/row-identity.ts';

const MAP = { timestamp: 0, name: 1, district: 2, village: 3, phone: 4, exact_location: 5, id: 6 };

describe('createShortHash', () => {
  it('returns the first 8 hex characters of the SHA-1', () => {
    assert.strictEqual(createShortHash('a|b|c'), 'c74a3276');
    assert.strictEqual(createShortHash('a|b|c').length, ROW_ID_LENGTH);
  });
});

describe('generateRowId', () => {
  it('returns an existing id unchanged', () => {
    assert.strictEqual(generateRowId(['t', 'Ana', 'Gori', 'Ateni', '', '', 'keep-me'], MAP), 'keep-me');
  });

  it('hashes name, district, village and phone', () => {
    assert.strictEqual(generateRowId(['2/1/2025 10:00:00', 'Ana', 'Gori', 'Ateni', '555-0101'], MAP), '71df23a3');
  });

  it('uses the timestamp only when phone and exact location are blank', () => {
    assert.strictEqual(generateRowId(['2/1/2025 12:00:00', 'Dato', 'Khashuri', 'Surami', '', ''], MAP), '226f4bf8');
  });

  it('leaves the timestamp out when phone is present', () => {
    const first = generateRowId(['2/1/2025 10:00:00', 'Ana', 'Gori', 'Ateni', '555-0101'], MAP);
    const second = generateRowId(['3/1/2025 09:30:00', 'Ana', 'Gori', 'Ateni', '555-0101'], MAP);
    assert.strictEqual(first, second);
  });

  it('treats unmapped fields as empty', () => {
    assert.strictEqual(generateRowId(['Nino', 'Gori', 'Tkviavi'], { name: 0, district: 1, village: 2 }), '71ae33fa');
  });

  it('is deterministic', () => {
    const row = ['t', 'Eka', 'Mtskheta', 'Saguramo', '555-0103'];
    assert.strictEqual(generateRowId(row, MAP), generateRowId([...row], MAP));
  });
});
