import type { Cell, Logger, Row } from '../types.ts';

/** logical field name → 0-based column index. Absent keys mean the column was not found. */
export type ColumnMap = Record<string, number>;

export function cellText(cell: Cell | undefined): string {
  return cell === null || cell === undefined ? '' : String(cell);
}

/**
 * The cell of `row` under `field`, or '' when the field is unmapped or the row is short
 */
export function fieldValue(row: Row, columnMap: ColumnMap, field: string): string {
  const index = columnMap[field];
  return index === undefined ? '' : cellText(row[index]);
}

/**
 * Remove parenthesized annotations (line breaks included) and collapse whitespace.
 *
 * @example stripParentheses('Needs(Multiple)\n(Food, Medicine)') // 'Needs'
 */
export function stripParentheses(text: string): string {
  return text
    .replace(/\([^)]*\)/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Map logical field names to column positions in a human-edited header row.
 *
 * Each field takes the first header that equals its expected text after trimming,
 * or failing that, equals it once both sides have had parentheses stripped.
 * When nothing claims column 0 the unlabeled first column is taken as `timestamp`.
 */
export function mapColumns(headers: Row, expected: Record<string, string>, logger?: Logger): ColumnMap {
  const columnMap: ColumnMap = {};
  const actual = headers.map((header) => cellText(header).trim());

  for (const [field, expectedHeader] of Object.entries(expected)) {
    const expectedTrimmed = expectedHeader.trim();
    const cleanExpected = stripParentheses(expectedTrimmed);

    for (let i = 0; i < actual.length; i++) {
      const header = actual[i] ?? '';
      if (header === expectedTrimmed) {
        columnMap[field] = i;
        break;
      }

      const cleanActual = stripParentheses(header);
      if (cleanExpected && cleanActual === cleanExpected) {
        columnMap[field] = i;
        logger?.info({ field, header, cleaned: cleanActual }, 'Matched column by removing parentheses');
        break;
      }
    }
  }

  if (columnMap.timestamp === undefined && headers.length > 0 && !Object.values(columnMap).includes(0)) {
    columnMap.timestamp = 0;
  }

  for (const [field, expectedHeader] of Object.entries(expected)) {
    if (columnMap[field] === undefined) {
      logger?.warn({ field, expectedHeader }, 'Could not map column');
    }
  }

  return columnMap;
}
