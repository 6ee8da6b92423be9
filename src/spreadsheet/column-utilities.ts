/**
 * Bijective base-26 column codec. a1Col/columnStringToIndex work on 1-based
 * indices (1 → A, 27 → AA); columnLetter takes the 0-based indices a column map holds.
 */
export function a1Col(colIndex: number): string {
  let col = '';
  let i = colIndex;
  while (i > 0) {
    const rem = (i - 1) % 26;
    col = String.fromCharCode(65 + rem) + col;
    i = Math.floor((i - 1) / 26);
  }
  return col;
}

export function columnStringToIndex(colStr: string): number {
  let colNum = 0;
  for (let i = 0; i < colStr.length; i++) {
    colNum = colNum * 26 + (colStr.charCodeAt(i) - 64);
  }
  return colNum;
}

export function columnLetter(zeroBasedIndex: number): string {
  if (!Number.isInteger(zeroBasedIndex) || zeroBasedIndex < 0) {
    throw new Error(`Invalid column index: ${zeroBasedIndex}`);
  }
  return a1Col(zeroBasedIndex + 1);
}
