import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { INDEX_TUNING } from '@gridsearch/shared';
import { BLOB_STORE } from '../../common/storage/blob-store';
import type { BlobStore } from '../../common/storage/blob-store';
import { SpreadsheetRepository } from '../spreadsheet/spreadsheet.repository';

export interface CleanupReport {
  orphanBlobs: number;
  purgedSheets: number;
  purgedCells: number;
}

/**
 * Periodic maintenance: removes stored files no active upload references,
 * and physically purges sheets and cells of soft-deleted files. File rows
 * stay so deletion history and `totalFiles` survive.
 */
@Injectable()
export class CleanupService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CleanupService.name);
  private intervalHandle: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly repo: SpreadsheetRepository,
    @Inject(BLOB_STORE) private readonly blobs: BlobStore,
    private readonly config: ConfigService,
  ) {}

  onModuleInit(): void {
    const minutes = this.config.get<number>('CLEANUP_INTERVAL_MINUTES') ?? 60;
    if (minutes <= 0) {
      this.logger.log('Cleanup scheduler disabled');
      return;
    }

    this.intervalHandle = setInterval(() => {
      this.runCleanup().catch((err: unknown) => {
        this.logger.error(`Cleanup failed: ${String(err)}`, err instanceof Error ? err.stack : undefined);
      });
    }, minutes * 60 * 1000);

    this.logger.log(`Cleanup scheduler started (every ${minutes} minutes)`);
  }

  onModuleDestroy(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  async runCleanup(now: Date = new Date()): Promise<CleanupReport> {
    const orphanBlobs = await this.sweepOrphanBlobs(now);
    const { sheets, cells } = await this.purgeDeletedContent();

    if (orphanBlobs > 0 || sheets > 0) {
      this.logger.log(`Cleanup: ${orphanBlobs} orphan files, ${sheets} sheets, ${cells} cells removed`);
    }
    return { orphanBlobs, purgedSheets: sheets, purgedCells: cells };
  }

  /**
   * Stored files with no active owner. Recent files are left alone, since an
   * upload stores its blob before the index transaction commits.
   */
  async sweepOrphanBlobs(now: Date = new Date()): Promise<number> {
    const graceMinutes = this.config.get<number>('ORPHAN_GRACE_MINUTES') ?? 60;
    const cutoff = now.getTime() - graceMinutes * 60 * 1000;

    const referenced = await this.repo.findActiveStoragePaths();
    const blobs = await this.blobs.list();

    let deleted = 0;
    for (const blob of blobs) {
      if (referenced.has(blob.path)) continue;
      if (blob.lastModified.getTime() >= cutoff) continue;
      await this.blobs.delete(blob.path);
      deleted++;
    }
    return deleted;
  }

  /** Remove sheets and cells of DELETED files, one bounded batch at a time */
  async purgeDeletedContent(): Promise<{ sheets: number; cells: number }> {
    const sheetIds = await this.repo.findSheetIdsOfDeletedFiles();
    let cells = 0;

    for (const sheetId of sheetIds) {
      let removed: number;
      do {
        removed = await this.repo.deleteCellBatch(sheetId, INDEX_TUNING.PURGE_BATCH_SIZE);
        cells += removed;
      } while (removed > 0);
      await this.repo.deleteSheet(sheetId);
    }

    return { sheets: sheetIds.length, cells };
  }
}
