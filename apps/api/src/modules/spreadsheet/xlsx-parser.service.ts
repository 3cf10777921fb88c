import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import ExcelJS from 'exceljs';
import {
  PARSE_LIMITS,
  buildCellRef,
  countWorkbookCells,
  excelSerialToDate,
  isDateNumberFormat,
  safeNormalizeCell,
  syntheticHeader,
} from '@gridsearch/shared';
import type { FormulaResult, ParsedRow, ParsedSheet, ParsedWorkbook, RawCell } from '@gridsearch/shared';
import { WorkbookFormulaEvaluator } from './formula-evaluator';

@Injectable()
export class XlsxParserService {
  private readonly logger = new Logger(XlsxParserService.name);

  /**
   * Parse an .xlsx buffer into the in-memory document tree. Nothing is
   * persisted here. Rejects unreadable files and workbooks over the shape limits.
   */
  async parse(buffer: Buffer, originalFilename: string, fileSize: number): Promise<ParsedWorkbook> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.load(buffer as unknown as ExcelJS.Buffer);
    } catch (err) {
      throw new BadRequestException(
        `Failed to parse spreadsheet: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const date1904 = workbook.properties.date1904 === true;
    const evaluator = new WorkbookFormulaEvaluator(workbook, date1904);
    let sheets: ParsedSheet[];
    try {
      sheets = workbook.worksheets.map((ws, index) => this.parseSheet(ws, index, evaluator, date1904));
    } finally {
      evaluator.destroy();
    }

    const document: ParsedWorkbook = { originalFilename, fileSize, sheets };
    this.enforceLimits(document);

    this.logger.log(
      `Parsed ${originalFilename}: ${sheets.length} sheets, ${countWorkbookCells(document)} non-empty cells`,
    );
    return document;
  }

  private parseSheet(
    ws: ExcelJS.Worksheet,
    index: number,
    evaluator: WorkbookFormulaEvaluator,
    date1904: boolean,
  ): ParsedSheet {
    const headers: string[] = [];
    const headerRow = ws.findRow(1);
    if (headerRow) {
      for (let c = 0; c < headerRow.cellCount; c++) {
        const value = this.readCell(ws, headerRow.getCell(c + 1), 0, c, evaluator, date1904);
        headers.push(value === '' ? syntheticHeader(c) : value);
      }
    }

    const rows: ParsedRow[] = [];
    for (let r = 2; r <= ws.rowCount; r++) {
      const row = ws.findRow(r);
      if (!row) continue;

      const width = Math.max(row.cellCount, headers.length);
      const values: string[] = [];
      for (let c = 0; c < width; c++) {
        values.push(this.readCell(ws, row.getCell(c + 1), r - 1, c, evaluator, date1904));
      }
      if (values.some((v) => v !== '')) {
        rows.push({ rowNumber: r - 1, values });
      }
    }

    this.logger.debug(`Sheet "${ws.name}": ${headers.length} columns, ${rows.length} data rows`);
    return { name: ws.name, index, headers, rows };
  }

  /** Normalized value of one cell; a failing cell is logged and reads as empty */
  private readCell(
    ws: ExcelJS.Worksheet,
    cell: ExcelJS.Cell,
    row: number,
    col: number,
    evaluator: WorkbookFormulaEvaluator,
    date1904: boolean,
  ): string {
    const onError = (err: unknown): void => {
      this.logger.warn(
        `Unreadable cell ${ws.name}!${buildCellRef(col, row)}: ${err instanceof Error ? err.message : String(err)}`,
      );
    };

    let raw: RawCell;
    try {
      raw = this.toRawCell(cell, date1904);
    } catch (err) {
      onError(err);
      return '';
    }

    const asDate = isDateNumberFormat(cell.numFmt);
    return safeNormalizeCell(raw, () => evaluator.evaluate(ws.name, row, col, asDate), onError);
  }

  private toRawCell(cell: ExcelJS.Cell, date1904: boolean): RawCell {
    // Only the top-left cell of a merged range carries the value
    if (cell.isMerged && cell.master.address !== cell.address) return { kind: 'blank' };

    const value = cell.value;
    const asDate = isDateNumberFormat(cell.numFmt);

    if (value === null || value === undefined) return { kind: 'blank' };
    if (typeof value === 'string') return { kind: 'text', value };
    if (typeof value === 'boolean') return { kind: 'boolean', value };
    if (typeof value === 'number') {
      return asDate
        ? { kind: 'date', value: excelSerialToDate(value, date1904) }
        : { kind: 'numeric', value };
    }
    if (value instanceof Date) return { kind: 'date', value };
    if ('error' in value) return { kind: 'error', code: value.error };
    if ('richText' in value) return { kind: 'text', value: value.richText.map((r) => r.text).join('') };
    if ('hyperlink' in value) return { kind: 'text', value: value.text };
    if ('formula' in value || 'sharedFormula' in value) {
      return { kind: 'formula', formula: cell.formula, cached: this.toCachedResult(value.result, asDate, date1904) };
    }
    return { kind: 'unknown' };
  }

  /** The result Excel saved with a formula, if any */
  private toCachedResult(result: unknown, asDate: boolean, date1904: boolean): FormulaResult | undefined {
    if (result === undefined || result === null) return undefined;
    if (typeof result === 'string') return { kind: 'text', value: result };
    if (typeof result === 'boolean') return { kind: 'boolean', value: result };
    if (typeof result === 'number') {
      return asDate
        ? { kind: 'date', value: excelSerialToDate(result, date1904) }
        : { kind: 'numeric', value: result };
    }
    if (result instanceof Date) return { kind: 'date', value: result };
    if (typeof result === 'object' && 'error' in result) {
      const code = result.error;
      return { kind: 'error', code: typeof code === 'string' ? code : undefined };
    }
    return undefined;
  }

  private enforceLimits(document: ParsedWorkbook): void {
    if (document.sheets.length > PARSE_LIMITS.MAX_SHEETS) {
      throw new BadRequestException(
        `Workbook has ${document.sheets.length} sheets (max: ${PARSE_LIMITS.MAX_SHEETS})`,
      );
    }
    const cells = countWorkbookCells(document);
    if (cells > PARSE_LIMITS.MAX_CELLS) {
      throw new BadRequestException(
        `Workbook has ${cells.toLocaleString('en-US')} non-empty cells (max: ${PARSE_LIMITS.MAX_CELLS.toLocaleString('en-US')})`,
      );
    }
  }
}
