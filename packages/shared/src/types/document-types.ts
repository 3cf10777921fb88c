/** One retained data row. `values` holds one normalized string per column, blanks included. */
export interface ParsedRow {
  /** 1-based; the header row is row 0 and never appears here */
  rowNumber: number;
  values: string[];
}

export interface ParsedSheet {
  name: string;
  /** 0-based position within the workbook */
  index: number;
  headers: string[];
  rows: ParsedRow[];
}

/** In-memory document tree produced by the parser, before any persistence */
export interface ParsedWorkbook {
  originalFilename: string;
  fileSize: number;
  sheets: ParsedSheet[];
}
