import type { ParsedSheet, ParsedWorkbook } from '../types/document-types';

/** Number of values in a row that will become index entries */
export function countNonEmpty(values: readonly string[]): number {
  let n = 0;
  for (const v of values) {
    if (v.trim() !== '') n++;
  }
  return n;
}

export function countSheetCells(sheet: ParsedSheet): number {
  return sheet.rows.reduce((sum, row) => sum + countNonEmpty(row.values), 0);
}

export function countWorkbookRows(doc: ParsedWorkbook): number {
  return doc.sheets.reduce((sum, sheet) => sum + sheet.rows.length, 0);
}

export function countWorkbookCells(doc: ParsedWorkbook): number {
  return doc.sheets.reduce((sum, sheet) => sum + countSheetCells(sheet), 0);
}
