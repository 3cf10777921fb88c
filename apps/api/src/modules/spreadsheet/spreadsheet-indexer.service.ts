import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import type { EntityManager } from 'typeorm';
import { createId } from '@paralleldrive/cuid2';
import * as path from 'path';
import {
  INDEX_TUNING,
  columnHeaderFor,
  countWorkbookCells,
  countWorkbookRows,
  toSearchValue,
} from '@gridsearch/shared';
import type { ParsedSheet, ParsedWorkbook } from '@gridsearch/shared';
import { SpreadsheetCell, SpreadsheetFile, SpreadsheetSheet } from './entities';

/**
 * Writes a parsed workbook to the index in a single transaction. Either the
 * file, all its sheets and all its cells become visible together, or nothing does.
 */
@Injectable()
export class SpreadsheetIndexerService {
  private readonly logger = new Logger(SpreadsheetIndexerService.name);

  constructor(private readonly dataSource: DataSource) {}

  async index(document: ParsedWorkbook, storagePath: string, uploadedBy: string): Promise<SpreadsheetFile> {
    return this.dataSource.transaction(async (manager) => {
      const file = manager.create(SpreadsheetFile, {
        id: createId(),
        originalFilename: document.originalFilename,
        storedFilename: path.basename(storagePath),
        storagePath,
        fileSize: document.fileSize,
        uploadedBy,
        uploadedAt: new Date(),
        sheetCount: document.sheets.length,
        rowCount: countWorkbookRows(document),
        cellCount: countWorkbookCells(document),
        status: 'ACTIVE',
      });
      await manager.insert(SpreadsheetFile, file);

      const writer = new CellBatchWriter(manager, INDEX_TUNING.CELL_BATCH_SIZE);
      for (const parsed of document.sheets) {
        await this.indexSheet(manager, writer, file.id, parsed);
      }
      await writer.flush();

      this.logger.log(
        `Indexed ${file.originalFilename} as ${file.id}: ${file.sheetCount} sheets, ${file.rowCount} rows, ${writer.written} cells`,
      );
      return file;
    });
  }

  private async indexSheet(
    manager: EntityManager,
    writer: CellBatchWriter,
    fileId: string,
    parsed: ParsedSheet,
  ): Promise<void> {
    const sheet = manager.create(SpreadsheetSheet, {
      id: createId(),
      fileId,
      sheetName: parsed.name,
      sheetNameLower: toSearchValue(parsed.name),
      sheetIndex: parsed.index,
      rowCount: parsed.rows.length,
      columnCount: parsed.headers.length,
      headers: parsed.headers,
    });
    await manager.insert(SpreadsheetSheet, sheet);

    for (const row of parsed.rows) {
      for (let c = 0; c < row.values.length; c++) {
        const value = row.values[c];
        if (value === undefined || value.trim() === '') continue;
        await writer.add(
          manager.create(SpreadsheetCell, {
            id: createId(),
            sheetId: sheet.id,
            rowNumber: row.rowNumber,
            columnIndex: c,
            columnHeader: columnHeaderFor(parsed.headers, c),
            cellValue: value,
            cellValueLower: toSearchValue(value),
          }),
        );
      }
    }
    this.logger.debug(`Indexed sheet "${parsed.name}" (${parsed.rows.length} rows)`);
  }
}

/** Buffers cell rows and inserts them in fixed-size chunks */
class CellBatchWriter {
  private buffer: SpreadsheetCell[] = [];
  written = 0;

  constructor(
    private readonly manager: EntityManager,
    private readonly batchSize: number,
  ) {}

  async add(cell: SpreadsheetCell): Promise<void> {
    this.buffer.push(cell);
    if (this.buffer.length >= this.batchSize) await this.flush();
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;
    const batch = this.buffer;
    this.buffer = [];
    await this.manager.insert(SpreadsheetCell, batch);
    this.written += batch.length;
  }
}
