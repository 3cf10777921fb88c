import { describe, it, expect, vi } from 'vitest';
import { normalizeCell, safeNormalizeCell, formatNumericValue } from '../cell-normalizer';
import type { FormulaCell, FormulaEvaluator } from '../../types/cell-types';

describe('normalizeCell: text', () => {
  it('trims surrounding whitespace', () => {
    expect(normalizeCell({ kind: 'text', value: '  Alpha-Server \n' })).toBe('Alpha-Server');
  });

  it('keeps inner whitespace', () => {
    expect(normalizeCell({ kind: 'text', value: 'rack  12' })).toBe('rack  12');
  });
});

describe('normalizeCell: numeric', () => {
  it('renders whole numbers without a decimal point', () => {
    expect(normalizeCell({ kind: 'numeric', value: 42 })).toBe('42');
    expect(normalizeCell({ kind: 'numeric', value: -7 })).toBe('-7');
    expect(normalizeCell({ kind: 'numeric', value: 3.0 })).toBe('3');
  });

  it('trims trailing zeros from fractions', () => {
    expect(normalizeCell({ kind: 'numeric', value: 1.5 })).toBe('1.5');
    expect(normalizeCell({ kind: 'numeric', value: 10.25 })).toBe('10.25');
  });

  it('keeps at most 10 fractional digits', () => {
    expect(normalizeCell({ kind: 'numeric', value: 1 / 3 })).toBe('0.3333333333');
  });

  it('does not use exponent notation for large whole numbers', () => {
    expect(formatNumericValue(1e21)).toBe('1000000000000000000000');
  });

  it('collapses values below the precision to zero', () => {
    expect(formatNumericValue(0.00000000001)).toBe('0');
    expect(formatNumericValue(-0.00000000001)).toBe('0');
  });
});

describe('normalizeCell: dates', () => {
  it('formats midnight as a calendar date', () => {
    const value = new Date(Date.UTC(2024, 0, 15));
    expect(normalizeCell({ kind: 'date', value })).toBe('2024-01-15');
  });

  it('formats other times to the second', () => {
    const value = new Date(Date.UTC(2024, 0, 15, 9, 5, 7, 400));
    expect(normalizeCell({ kind: 'date', value })).toBe('2024-01-15 09:05:07');
  });

  it('renders an invalid date as empty', () => {
    expect(normalizeCell({ kind: 'date', value: new Date(Number.NaN) })).toBe('');
  });
});

describe('normalizeCell: other kinds', () => {
  it('renders booleans as literals', () => {
    expect(normalizeCell({ kind: 'boolean', value: true })).toBe('true');
    expect(normalizeCell({ kind: 'boolean', value: false })).toBe('false');
  });

  it('renders blank as empty', () => {
    expect(normalizeCell({ kind: 'blank' })).toBe('');
  });

  it('renders error cells as ERROR', () => {
    expect(normalizeCell({ kind: 'error', code: '#DIV/0!' })).toBe('ERROR');
  });

  it('renders unknown cells as empty', () => {
    expect(normalizeCell({ kind: 'unknown' })).toBe('');
  });
});

describe('normalizeCell: formulas', () => {
  const formula = (cached?: FormulaCell['cached']): FormulaCell => ({ kind: 'formula', formula: 'A1*2', cached });

  it('uses the cached result with the rules of its kind', () => {
    expect(normalizeCell(formula({ kind: 'numeric', value: 8 }))).toBe('8');
    expect(normalizeCell(formula({ kind: 'text', value: ' ok ' }))).toBe('ok');
    expect(normalizeCell(formula({ kind: 'boolean', value: false }))).toBe('false');
    expect(normalizeCell(formula({ kind: 'date', value: new Date(Date.UTC(2023, 5, 1)) }))).toBe('2023-06-01');
  });

  it('renders an error result as empty', () => {
    expect(normalizeCell(formula({ kind: 'error', code: '#REF!' }))).toBe('');
  });

  it('falls back to the evaluator when nothing is cached', () => {
    const evaluate = vi.fn<FormulaEvaluator>(() => ({
      kind: 'numeric',
      value: 2.5,
    }));
    expect(normalizeCell(formula(), evaluate)).toBe('2.5');
    expect(evaluate).toHaveBeenCalledOnce();
  });

  it('does not evaluate when a cached result exists', () => {
    const evaluate = vi.fn<FormulaEvaluator>(() => undefined);
    normalizeCell(formula({ kind: 'numeric', value: 1 }), evaluate);
    expect(evaluate).not.toHaveBeenCalled();
  });

  it('renders as empty without cache or evaluator', () => {
    expect(normalizeCell(formula())).toBe('');
  });
});

describe('safeNormalizeCell', () => {
  it('degrades to empty and reports when evaluation throws', () => {
    const onError = vi.fn();
    const failure = new Error('circular reference');
    const result = safeNormalizeCell(
      { kind: 'formula', formula: 'A1' },
      () => {
        throw failure;
      },
      onError,
    );
    expect(result).toBe('');
    expect(onError).toHaveBeenCalledWith(failure);
  });

  it('passes through normal values', () => {
    expect(safeNormalizeCell({ kind: 'numeric', value: 12 })).toBe('12');
  });
});
