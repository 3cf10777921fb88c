/**
 * Raw spreadsheet cell as read from the workbook, before normalization.
 * One variant per source cell kind; the normalizer dispatches on `kind`.
 */
export type RawCell =
  | TextCell
  | NumericCell
  | DateCell
  | BooleanCell
  | FormulaCell
  | BlankCell
  | ErrorCell
  | UnknownCell;

export interface TextCell {
  kind: 'text';
  value: string;
}

export interface NumericCell {
  kind: 'numeric';
  value: number;
}

/** Numeric cell carrying a date/time number format */
export interface DateCell {
  kind: 'date';
  value: Date;
}

export interface BooleanCell {
  kind: 'boolean';
  value: boolean;
}

export interface BlankCell {
  kind: 'blank';
}

export interface ErrorCell {
  kind: 'error';
  code?: string;
}

export interface UnknownCell {
  kind: 'unknown';
}

/** Concrete value a formula resolves to */
export type FormulaResult = TextCell | NumericCell | DateCell | BooleanCell | BlankCell | ErrorCell;

export interface FormulaCell {
  kind: 'formula';
  formula: string;
  /** Result cached in the file by the authoring application, if any */
  cached?: FormulaResult;
}

/** Evaluates a formula that has no cached result. Throwing means evaluation failed. */
export type FormulaEvaluator = (cell: FormulaCell) => FormulaResult | undefined;
