import { Entity, Column, PrimaryColumn, Index, BeforeInsert } from 'typeorm';
import { createId } from '@paralleldrive/cuid2';
import type { FileStatus } from '@gridsearch/shared';

/**
 * One uploaded workbook. Counters are fixed at creation; only `status`
 * changes afterwards (soft delete).
 */
@Entity({ name: 'spreadsheet_files' })
@Index(['status', 'uploadedAt'])
@Index(['uploadedBy'])
export class SpreadsheetFile {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  id!: string;

  @Column({ type: 'varchar', length: 255, name: 'original_filename' })
  originalFilename!: string;

  @Column({ type: 'varchar', length: 255, name: 'stored_filename' })
  storedFilename!: string;

  @Column({ type: 'varchar', length: 1000, name: 'storage_path' })
  storagePath!: string;

  @Column({ type: 'integer', name: 'file_size' })
  fileSize!: number;

  @Column({ type: 'varchar', length: 255, name: 'uploaded_by' })
  uploadedBy!: string;

  @Column({ type: 'datetime', name: 'uploaded_at' })
  uploadedAt!: Date;

  @Column({ type: 'integer', name: 'sheet_count' })
  sheetCount!: number;

  @Column({ type: 'integer', name: 'row_count' })
  rowCount!: number;

  @Column({ type: 'integer', name: 'cell_count' })
  cellCount!: number;

  @Column({ type: 'varchar', length: 16, default: 'ACTIVE' })
  status!: FileStatus;

  @BeforeInsert()
  assignId(): void {
    if (!this.id) this.id = createId();
  }
}
