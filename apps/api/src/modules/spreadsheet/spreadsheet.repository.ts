import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import type { Repository } from 'typeorm';
import type { SpreadsheetStats } from '@gridsearch/shared';
import { SpreadsheetCell, SpreadsheetFile, SpreadsheetSheet } from './entities';

interface ListActiveParams {
  uploadedBy?: string;
  page: number;
  pageSize: number;
}

/** Read and maintenance queries over the index tables. Writes during ingestion go through the indexer. */
@Injectable()
export class SpreadsheetRepository {
  constructor(private readonly dataSource: DataSource) {}

  private get files(): Repository<SpreadsheetFile> {
    return this.dataSource.getRepository(SpreadsheetFile);
  }

  private get sheets(): Repository<SpreadsheetSheet> {
    return this.dataSource.getRepository(SpreadsheetSheet);
  }

  private get cells(): Repository<SpreadsheetCell> {
    return this.dataSource.getRepository(SpreadsheetCell);
  }

  async findById(id: string): Promise<SpreadsheetFile | null> {
    return this.files.findOne({ where: { id } });
  }

  async findSheets(fileId: string): Promise<SpreadsheetSheet[]> {
    return this.sheets.find({ where: { fileId }, order: { sheetIndex: 'ASC' } });
  }

  /** Active files, newest first */
  async listActive(params: ListActiveParams): Promise<[SpreadsheetFile[], number]> {
    return this.files.findAndCount({
      where: { status: 'ACTIVE', ...(params.uploadedBy ? { uploadedBy: params.uploadedBy } : {}) },
      order: { uploadedAt: 'DESC', id: 'DESC' },
      skip: params.page * params.pageSize,
      take: params.pageSize,
    });
  }

  async markDeleted(id: string): Promise<void> {
    await this.files.update({ id }, { status: 'DELETED' });
  }

  async getStats(): Promise<SpreadsheetStats> {
    const [totalFiles, activeFiles] = await Promise.all([
      this.files.count(),
      this.files.count({ where: { status: 'ACTIVE' } }),
    ]);

    const totalSheets = await this.sheets
      .createQueryBuilder('sheet')
      .innerJoin('sheet.file', 'file')
      .where('file.status = :status', { status: 'ACTIVE' })
      .getCount();

    const totalCells = await this.cells
      .createQueryBuilder('cell')
      .innerJoin('cell.sheet', 'sheet')
      .innerJoin('sheet.file', 'file')
      .where('file.status = :status', { status: 'ACTIVE' })
      .getCount();

    const bytes = await this.files
      .createQueryBuilder('file')
      .select('COALESCE(SUM(file.fileSize), 0)', 'total')
      .where('file.status = :status', { status: 'ACTIVE' })
      .getRawOne<{ total: number | string | null }>();

    return {
      totalFiles,
      activeFiles,
      totalSheets,
      totalCells,
      totalStorageBytes: Number(bytes?.total ?? 0),
    };
  }

  /** Storage paths still owned by an active file */
  async findActiveStoragePaths(): Promise<Set<string>> {
    const rows = await this.files.find({ select: { storagePath: true }, where: { status: 'ACTIVE' } });
    return new Set(rows.map((r) => r.storagePath));
  }

  async findSheetIdsOfDeletedFiles(): Promise<string[]> {
    const rows = await this.sheets
      .createQueryBuilder('sheet')
      .innerJoin('sheet.file', 'file')
      .select('sheet.id', 'id')
      .where('file.status = :status', { status: 'DELETED' })
      .getRawMany<{ id: string }>();
    return rows.map((r) => r.id);
  }

  /** Delete up to `batchSize` cells of a sheet; returns how many went */
  async deleteCellBatch(sheetId: string, batchSize: number): Promise<number> {
    const batch = await this.cells.find({ select: { id: true }, where: { sheetId }, take: batchSize });
    if (batch.length === 0) return 0;
    await this.cells.delete(batch.map((c) => c.id));
    return batch.length;
  }

  async deleteSheet(sheetId: string): Promise<void> {
    await this.sheets.delete({ id: sheetId });
  }
}
