/**
 * Range Operations Utilities for Google Sheets
 *
 * A1 notation validation, cell reference parsing and the absolute
 * `'Sheet name'!A1:B2` form used for every read and batch write.
 */

import type { SheetRange } from '../types.ts';
import { columnLetter, columnStringToIndex } from './column-utilities.ts';

// Google Sheets constants and limits
export const GOOGLE_SHEETS_LIMITS = {
  MAX_ROWS: 10_000_000,
  MAX_COLUMNS: 18_278, // ZZZ in base-26
} as const;

/**
 * Represents a parsed cell reference (e.g., A1, B5)
 */
export interface CellReference {
  column: string;
  columnIndex: number; // 1-based
  row: number; // 1-based
}

const CELL_PATTERN = /^([A-Z]{1,3})([1-9]\d{0,6}|10000000)$/;

/**
 * Validates if a string is a valid A1 notation (cell, cell range, column range or row range)
 */
export function isValidA1Notation(notation: string): boolean {
  if (!notation || typeof notation !== 'string') {
    return false;
  }

  const a1Pattern = /^(?:[A-Z]{1,3}(?:[1-9]\d{0,6}|10000000)(?::[A-Z]{1,3}(?:[1-9]\d{0,6}|10000000))?|[A-Z]{1,3}:[A-Z]{1,3}|(?:[1-9]\d{0,6}|10000000):(?:[1-9]\d{0,6}|10000000))$/;

  if (!a1Pattern.test(notation)) {
    return false;
  }

  for (const part of notation.split(':')) {
    const cellMatch = part.match(CELL_PATTERN);
    if (cellMatch && cellMatch[1] && cellMatch[2]) {
      if (columnStringToIndex(cellMatch[1]) > GOOGLE_SHEETS_LIMITS.MAX_COLUMNS) return false;
      if (parseInt(cellMatch[2], 10) > GOOGLE_SHEETS_LIMITS.MAX_ROWS) return false;
    }

    const colMatch = part.match(/^([A-Z]{1,3})$/);
    if (colMatch && colMatch[1] && columnStringToIndex(colMatch[1]) > GOOGLE_SHEETS_LIMITS.MAX_COLUMNS) {
      return false;
    }

    const rowMatch = part.match(/^([1-9]\d{0,6}|10000000)$/);
    if (rowMatch && rowMatch[1] && parseInt(rowMatch[1], 10) > GOOGLE_SHEETS_LIMITS.MAX_ROWS) {
      return false;
    }
  }

  return true;
}

/**
 * Validates A1 notation and throws detailed error if invalid
 */
export function validateA1Notation(notation: string): void {
  if (!isValidA1Notation(notation)) {
    throw new Error(`Invalid A1 notation: "${notation}". Valid formats: A1, A1:B2, A:B, 1:2`);
  }
}

/**
 * Parses a cell reference (e.g., "A1", "Z999") into its components
 */
export function parseCellReference(cellRef: string): CellReference {
  const match = cellRef.match(CELL_PATTERN);
  const column = match?.[1];
  const rowStr = match?.[2];
  if (!column || !rowStr) {
    throw new Error(`Invalid cell reference: ${cellRef}`);
  }

  return {
    column,
    columnIndex: columnStringToIndex(column),
    row: parseInt(rowStr, 10),
  };
}

/**
 * Quotes a sheet name for A1 notation; embedded single quotes are doubled
 */
export function quoteSheetName(sheetName: string): string {
  return `'${sheetName.replace(/'/g, "''")}'`;
}

export function toA1Notation(range: SheetRange): string {
  const cells = range.endCell ? `${range.startCell}:${range.endCell}` : range.startCell;
  return `${quoteSheetName(range.sheetName)}!${cells}`;
}

/**
 * Absolute address of one cell from a 0-based column index and a 1-based sheet row
 *
 * @example cellAddress('Intake', 9, 2) // "'Intake'!J2"
 */
export function cellAddress(sheetName: string, columnIndex: number, rowNumber: number): string {
  return toA1Notation({ sheetName, startCell: `${columnLetter(columnIndex)}${rowNumber}` });
}
