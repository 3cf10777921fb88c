import { Entity, Column, PrimaryColumn, ManyToOne, JoinColumn, Index, BeforeInsert, BeforeUpdate } from 'typeorm';
import { createId } from '@paralleldrive/cuid2';
import { toSearchValue } from '@gridsearch/shared';
import { SpreadsheetFile } from './spreadsheet-file.entity';

@Entity({ name: 'spreadsheet_sheets' })
@Index(['fileId', 'sheetIndex'])
@Index(['sheetNameLower'])
export class SpreadsheetSheet {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  id!: string;

  @Column({ type: 'varchar', length: 32, name: 'file_id' })
  fileId!: string;

  @ManyToOne(() => SpreadsheetFile, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'file_id' })
  file!: SpreadsheetFile;

  @Column({ type: 'varchar', length: 255, name: 'sheet_name' })
  sheetName!: string;

  /** Case-folded in JavaScript; SQLite LOWER() folds ASCII only */
  @Column({ type: 'varchar', length: 255, name: 'sheet_name_lower' })
  sheetNameLower!: string;

  /** 0-based position in the workbook */
  @Column({ type: 'integer', name: 'sheet_index' })
  sheetIndex!: number;

  @Column({ type: 'integer', name: 'row_count' })
  rowCount!: number;

  @Column({ type: 'integer', name: 'column_count' })
  columnCount!: number;

  @Column({ type: 'simple-json' })
  headers!: string[];

  @BeforeInsert()
  assignId(): void {
    if (!this.id) this.id = createId();
  }

  @BeforeInsert()
  @BeforeUpdate()
  syncSearchName(): void {
    this.sheetNameLower = toSearchValue(this.sheetName);
  }
}
