import { HyperFormula, DetailedCellError } from 'hyperformula';
import type { CellValue as HfCellValue } from 'hyperformula';
import type ExcelJS from 'exceljs';
import { dateToExcelSerial, excelSerialToDate } from '@gridsearch/shared';
import type { FormulaResult } from '@gridsearch/shared';

type MatrixValue = string | number | boolean | null;

/** Map a HyperFormula value to a formula result; numbers become dates when the cell is date-formatted */
export function toFormulaResult(value: HfCellValue, asDate: boolean, date1904 = false): FormulaResult {
  if (value instanceof DetailedCellError) return { kind: 'error', code: value.value };
  if (value === null) return { kind: 'blank' };
  if (typeof value === 'number') {
    return asDate ? { kind: 'date', value: excelSerialToDate(value, date1904) } : { kind: 'numeric', value };
  }
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  return { kind: 'text', value };
}

/** Raw input HyperFormula understands for one ExcelJS cell */
function toMatrixValue(cell: ExcelJS.Cell, date1904: boolean): MatrixValue {
  const value = cell.value;
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') return value;
  if (value instanceof Date) return dateToExcelSerial(value, date1904);
  if ('error' in value) return value.error;
  if ('richText' in value) return value.richText.map((r) => r.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('formula' in value || 'sharedFormula' in value) return `=${cell.formula}`;
  return null;
}

function toMatrix(ws: ExcelJS.Worksheet, date1904: boolean): MatrixValue[][] {
  const matrix: MatrixValue[][] = [];
  ws.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    while (matrix.length < rowNumber) matrix.push([]);
    const line: MatrixValue[] = [];
    row.eachCell({ includeEmpty: false }, (cell, colNumber) => {
      while (line.length < colNumber - 1) line.push(null);
      line[colNumber - 1] = toMatrixValue(cell, date1904);
    });
    matrix[rowNumber - 1] = line;
  });
  return matrix;
}

/**
 * Evaluates formulas that were saved without a cached result. The
 * HyperFormula instance is built on first use, from the whole workbook,
 * so cross-sheet references resolve.
 */
export class WorkbookFormulaEvaluator {
  private hf: HyperFormula | null = null;
  /** Set when the build failed; later cells fail with it instead of rebuilding */
  private buildError: Error | null = null;

  constructor(
    private readonly workbook: ExcelJS.Workbook,
    private readonly date1904 = false,
  ) {}

  /** `row` and `col` are 0-based */
  evaluate(sheetName: string, row: number, col: number, asDate: boolean): FormulaResult | undefined {
    const hf = this.instance();
    const sheet = hf.getSheetId(sheetName);
    if (sheet === undefined) return undefined;
    return toFormulaResult(hf.getCellValue({ sheet, row, col }), asDate, this.date1904);
  }

  destroy(): void {
    if (this.hf) {
      this.hf.destroy();
      this.hf = null;
    }
  }

  private instance(): HyperFormula {
    if (this.hf) return this.hf;
    if (this.buildError) throw this.buildError;

    const sheets: Record<string, MatrixValue[][]> = {};
    for (const ws of this.workbook.worksheets) {
      sheets[ws.name] = toMatrix(ws, this.date1904);
    }
    let hf: HyperFormula;
    try {
      hf = HyperFormula.buildFromSheets(sheets, { licenseKey: 'gpl-v3' });
    } catch (err) {
      this.buildError = err instanceof Error ? err : new Error(String(err));
      throw this.buildError;
    }
    this.hf = hf;
    return hf;
  }
}
