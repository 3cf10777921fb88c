import type {
  PaginatedResult,
  SheetInfo,
  SpreadsheetFileDetail,
  SpreadsheetFileSummary,
} from '@gridsearch/shared';
import type { SpreadsheetFile, SpreadsheetSheet } from './entities';

/** API shape of a file row; the storage path never leaves the service */
export function toSummary(file: SpreadsheetFile): SpreadsheetFileSummary {
  return {
    id: file.id,
    originalFilename: file.originalFilename,
    fileSize: file.fileSize,
    uploadedBy: file.uploadedBy,
    uploadedAt: file.uploadedAt.toISOString(),
    sheetCount: file.sheetCount,
    rowCount: file.rowCount,
    cellCount: file.cellCount,
    status: file.status,
  };
}

export function toSheetInfo(sheet: SpreadsheetSheet): SheetInfo {
  return {
    sheetId: sheet.id,
    sheetName: sheet.sheetName,
    sheetIndex: sheet.sheetIndex,
    rowCount: sheet.rowCount,
    columnCount: sheet.columnCount,
    headers: sheet.headers,
  };
}

export function toDetail(file: SpreadsheetFile, sheets: SpreadsheetSheet[]): SpreadsheetFileDetail {
  return { ...toSummary(file), sheets: sheets.map(toSheetInfo) };
}

export function toPage<T>(items: T[], total: number, page: number, pageSize: number): PaginatedResult<T> {
  return {
    items,
    pagination: {
      total,
      page,
      pageSize,
      totalPages: Math.ceil(total / pageSize),
    },
  };
}
