export type FileStatus = 'ACTIVE' | 'DELETED';

export interface SpreadsheetFileSummary {
  id: string;
  originalFilename: string;
  fileSize: number;
  uploadedBy: string;
  uploadedAt: string;
  sheetCount: number;
  rowCount: number;
  cellCount: number;
  status: FileStatus;
}

export interface SheetInfo {
  sheetId: string;
  sheetName: string;
  sheetIndex: number;
  rowCount: number;
  columnCount: number;
  headers: string[];
}

export interface SpreadsheetFileDetail extends SpreadsheetFileSummary {
  sheets: SheetInfo[];
}

export interface RowCellData {
  columnHeader: string;
  columnIndex: number;
  cellValue: string;
  isMatchedCell: boolean;
}

export interface SearchResult {
  cellId: string;
  fileId: string;
  fileName: string;
  sheetId: string;
  sheetName: string;
  columnHeader: string;
  rowNumber: number;
  columnIndex: number;
  cellValue: string;
  /** Every stored cell of the matched row, ordered by column */
  rowData: RowCellData[];
}

export interface SpreadsheetStats {
  totalFiles: number;
  activeFiles: number;
  totalSheets: number;
  totalCells: number;
  totalStorageBytes: number;
}

export interface SearchQuery {
  keywords: string[];
  fileId?: string;
  sheetName?: string;
  page: number;
  pageSize: number;
}
