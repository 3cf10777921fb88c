export { colIndexToLetter, buildCellRef, syntheticHeader, columnHeaderFor, toSearchValue } from './cell-utils';
export { isDateNumberFormat, excelSerialToDate, dateToExcelSerial, formatDateValue } from './date-utils';
export { normalizeCell, safeNormalizeCell, formatNumericValue } from './cell-normalizer';
export { parseKeywords, escapeLikePattern, containsPattern } from './keyword-utils';
export { countNonEmpty, countSheetCells, countWorkbookRows, countWorkbookCells } from './document-utils';
