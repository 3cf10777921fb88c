/**
 * Convert column index (0-based) to Excel letter(s): 0→A, 25→Z, 26→AA
 */
export function colIndexToLetter(index: number): string {
  let result = '';
  let n = index;
  while (n >= 0) {
    result = String.fromCharCode((n % 26) + 65) + result;
    n = Math.floor(n / 26) - 1;
  }
  return result;
}

/**
 * Build cell reference from col/row indices: (0, 0) → "A1"
 */
export function buildCellRef(col: number, row: number): string {
  return `${colIndexToLetter(col)}${row + 1}`;
}

/** Header used when the header row has no text for a column (1-based) */
export function syntheticHeader(columnIndex: number): string {
  return `Column_${columnIndex + 1}`;
}

/** Resolve the header for a column, synthesizing one past the end of the header list */
export function columnHeaderFor(headers: readonly string[], columnIndex: number): string {
  return headers[columnIndex] ?? syntheticHeader(columnIndex);
}

/** Case-folded copy of a display value, used only for matching */
export function toSearchValue(value: string): string {
  return value.toLowerCase();
}
