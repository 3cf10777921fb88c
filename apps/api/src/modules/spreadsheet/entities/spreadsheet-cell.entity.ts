import {
  Entity,
  Column,
  PrimaryColumn,
  ManyToOne,
  JoinColumn,
  Index,
  BeforeInsert,
  BeforeUpdate,
} from 'typeorm';
import { createId } from '@paralleldrive/cuid2';
import { toSearchValue } from '@gridsearch/shared';
import { SpreadsheetSheet } from './spreadsheet-sheet.entity';

/** One non-empty cell. The header row is never stored. */
@Entity({ name: 'spreadsheet_cells' })
@Index(['sheetId', 'rowNumber'])
@Index(['cellValueLower'])
export class SpreadsheetCell {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  id!: string;

  @Column({ type: 'varchar', length: 32, name: 'sheet_id' })
  sheetId!: string;

  @ManyToOne(() => SpreadsheetSheet, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sheet_id' })
  sheet!: SpreadsheetSheet;

  /** 1-based data row; Excel row minus one */
  @Column({ type: 'integer', name: 'row_number' })
  rowNumber!: number;

  @Column({ type: 'integer', name: 'column_index' })
  columnIndex!: number;

  @Column({ type: 'text', name: 'column_header' })
  columnHeader!: string;

  @Column({ type: 'text', name: 'cell_value' })
  cellValue!: string;

  @Column({ type: 'text', name: 'cell_value_lower' })
  cellValueLower!: string;

  @BeforeInsert()
  assignId(): void {
    if (!this.id) this.id = createId();
  }

  @BeforeInsert()
  @BeforeUpdate()
  syncSearchValue(): void {
    this.cellValueLower = toSearchValue(this.cellValue);
  }
}
