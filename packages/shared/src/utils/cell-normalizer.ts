import type { RawCell, FormulaCell, FormulaEvaluator, FormulaResult } from '../types/cell-types';
import { formatDateValue } from './date-utils';

const MAX_FRACTION_DIGITS = 10;

/** Display string for a number: integer literal when whole, else up to 10 fractional digits */
export function formatNumericValue(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Number.isInteger(value)) return BigInt(value).toString();

  const fixed = value.toFixed(MAX_FRACTION_DIGITS);
  const trimmed = fixed.replace(/\.?0+$/, '');
  return trimmed === '-0' ? '0' : trimmed;
}

function normalizeResult(result: FormulaResult): string {
  switch (result.kind) {
    case 'text':
      return result.value.trim();
    case 'numeric':
      return formatNumericValue(result.value);
    case 'date':
      return formatDateValue(result.value);
    case 'boolean':
      return String(result.value);
    // A formula that evaluates to an error has no usable value
    case 'error':
    case 'blank':
      return '';
  }
}

function normalizeFormula(cell: FormulaCell, evaluate?: FormulaEvaluator): string {
  const result = cell.cached ?? evaluate?.(cell);
  if (!result) return '';
  return normalizeResult(result);
}

/**
 * Canonical search/display string for a raw cell.
 * Throws only if the formula evaluator throws; callers use {@link safeNormalizeCell}.
 */
export function normalizeCell(cell: RawCell, evaluate?: FormulaEvaluator): string {
  switch (cell.kind) {
    case 'text':
    case 'numeric':
    case 'date':
    case 'boolean':
    case 'blank':
      return normalizeResult(cell);
    case 'formula':
      return normalizeFormula(cell, evaluate);
    case 'error':
      return 'ERROR';
    case 'unknown':
      return '';
  }
}

/**
 * {@link normalizeCell} that never throws: a failing cell degrades to an
 * empty string and is reported through `onError`.
 */
export function safeNormalizeCell(
  cell: RawCell,
  evaluate?: FormulaEvaluator,
  onError?: (err: unknown) => void,
): string {
  try {
    return normalizeCell(cell, evaluate);
  } catch (err) {
    onError?.(err);
    return '';
  }
}
