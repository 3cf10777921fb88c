export type {
  RawCell,
  TextCell,
  NumericCell,
  DateCell,
  BooleanCell,
  FormulaCell,
  FormulaResult,
  FormulaEvaluator,
  BlankCell,
  ErrorCell,
  UnknownCell,
} from './cell-types';

export type { ParsedWorkbook, ParsedSheet, ParsedRow } from './document-types';

export type { Principal, UserRole } from './auth-types';
export { USER_ROLES } from './auth-types';

export type {
  FileStatus,
  SpreadsheetFileSummary,
  SpreadsheetFileDetail,
  SheetInfo,
  RowCellData,
  SearchResult,
  SpreadsheetStats,
  SearchQuery,
} from './spreadsheet-types';

export type { ApiResponse, ApiError, Pagination, PaginatedResult } from './api-types';
