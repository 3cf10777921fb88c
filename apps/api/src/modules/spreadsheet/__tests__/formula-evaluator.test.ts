import { describe, it, expect, vi, afterEach } from 'vitest';
import ExcelJS from 'exceljs';
import { HyperFormula } from 'hyperformula';
import { WorkbookFormulaEvaluator } from '../formula-evaluator';

function workbookWithFormulas(): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const ws = workbook.addWorksheet('Totals');
  ws.getCell('A1').value = 2;
  ws.getCell('B1').value = 3;
  ws.getCell('C1').value = { formula: 'A1*B1' };
  ws.getCell('D1').value = { formula: 'C1+1' };
  return workbook;
}

describe('WorkbookFormulaEvaluator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('evaluates formulas against the workbook values', () => {
    const evaluator = new WorkbookFormulaEvaluator(workbookWithFormulas());

    expect(evaluator.evaluate('Totals', 0, 2, false)).toEqual({ kind: 'numeric', value: 6 });
    expect(evaluator.evaluate('Totals', 0, 3, false)).toEqual({ kind: 'numeric', value: 7 });
    evaluator.destroy();
  });

  it('returns undefined for an unknown sheet', () => {
    const evaluator = new WorkbookFormulaEvaluator(workbookWithFormulas());

    expect(evaluator.evaluate('Missing', 0, 0, false)).toBeUndefined();
    evaluator.destroy();
  });

  it('attempts the engine build only once when it fails', () => {
    const build = vi.spyOn(HyperFormula, 'buildFromSheets').mockImplementation(() => {
      throw new Error('Sheet size limit exceeded');
    });
    const evaluator = new WorkbookFormulaEvaluator(workbookWithFormulas());

    expect(() => evaluator.evaluate('Totals', 0, 2, false)).toThrow('Sheet size limit exceeded');
    expect(() => evaluator.evaluate('Totals', 0, 3, false)).toThrow('Sheet size limit exceeded');
    expect(build).toHaveBeenCalledTimes(1);
  });
});
