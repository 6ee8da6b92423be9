import assert from 'assert';
import { appendSheetData, clearSheetData, getSheetData, getSheetNames, updateSheetData } from '../../../src/api/routes/spreadsheet.ts';
import { HttpError, SheetsApiError } from '../../../src/lib/errors.ts';
import { MemorySheets } from '../../lib/memory-sheets.ts';

function createDeps() {
  const sheets = new MemorySheets({
    List: [
      ['Name', 'Phone'],
      ['Ana', '555-0101'],
    ],
    gps_logs: [],
  });
  return { sheets, deps: { createSheets: () => sheets } };
}

describe('spreadsheet handlers', () => {
  it('lists sheet names', async () => {
    const { deps } = createDeps();
    assert.deepStrictEqual(await getSheetNames(deps), ['List', 'gps_logs']);
  });

  it('reads a range from query parameters', async () => {
    const { deps } = createDeps();
    const data = await getSheetData({ sheet_name: 'List', start_cell: 'A1', end_cell: 'B2' }, deps);
    assert.deepStrictEqual(data, {
      range: "'List'!A1:B2",
      values: [
        ['Name', 'Phone'],
        ['Ana', '555-0101'],
      ],
    });
  });

  it('updates cells', async () => {
    const { sheets, deps } = createDeps();
    const result = await updateSheetData({ range: { sheet_name: 'List', start_cell: 'B2' }, values: [['555-0199']] }, deps);

    assert.deepStrictEqual(result, { updated_cells: 1, updated_range: "'List'!B2" });
    assert.deepStrictEqual(sheets.rows('List')[1], ['Ana', '555-0199']);
  });

  it('appends rows', async () => {
    const { deps } = createDeps();
    const result = await appendSheetData({ range: { sheet_name: 'List', start_cell: 'A1' }, values: [['Dato', '555-0102']], value_input_option: 'RAW' }, deps);

    assert.deepStrictEqual(result, { appended_cells: 2, appended_range: "'List'!A3:B3" });
  });

  it('clears a range', async () => {
    const { sheets, deps } = createDeps();
    const result = await clearSheetData({ sheet_name: 'List', start_cell: 'A2', end_cell: 'B2' }, deps);

    assert.deepStrictEqual(result, { message: "Range 'List'!A2:B2 cleared successfully" });
    assert.strictEqual(sheets.rows('List').length, 1);
  });

  it('turns Sheets failures into a 500 with the API message', async () => {
    const { sheets, deps } = createDeps();
    sheets.failures.set('getValues', new SheetsApiError('get sheet data', new Error('boom')));

    await assert.rejects(
      () => getSheetData({ sheet_name: 'List', start_cell: 'A1' }, deps),
      (error: unknown) => error instanceof HttpError && error.status === 500 && error.message === 'Google Sheets API error: Failed to get sheet data: boom'
    );
  });

  it('reports a service that cannot be created', async () => {
    const deps = {
      createSheets: () => {
        throw new Error('Spreadsheet id is required');
      },
    };

    await assert.rejects(
      () => getSheetNames(deps),
      (error: unknown) => error instanceof HttpError && error.status === 500 && error.message === 'Google Sheets service error: Spreadsheet id is required'
    );
  });

  it('validates query parameters', async () => {
    const { sheets, deps } = createDeps();
    await assert.rejects(() => getSheetData({ sheet_name: 'List' }, deps), { name: 'ZodError' });
    assert.strictEqual(sheets.calls.length, 0);
  });
});
