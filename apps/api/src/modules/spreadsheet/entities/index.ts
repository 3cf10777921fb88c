import { SpreadsheetFile } from './spreadsheet-file.entity';
import { SpreadsheetSheet } from './spreadsheet-sheet.entity';
import { SpreadsheetCell } from './spreadsheet-cell.entity';

export { SpreadsheetFile, SpreadsheetSheet, SpreadsheetCell };

export const SPREADSHEET_ENTITIES = [SpreadsheetFile, SpreadsheetSheet, SpreadsheetCell];
