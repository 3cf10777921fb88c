import {
  BadRequestException,
  ForbiddenException,
  HttpException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FILE_LIMITS } from '@gridsearch/shared';
import type {
  FileListQueryInput,
  PaginatedResult,
  Principal,
  SpreadsheetFileDetail,
  SpreadsheetFileSummary,
  SpreadsheetStats,
} from '@gridsearch/shared';
import { BLOB_STORE } from '../../common/storage/blob-store';
import type { BlobStore } from '../../common/storage/blob-store';
import { BlobStorageException, IndexingException } from '../../common/errors/storage.exceptions';
import type { SpreadsheetFile } from './entities';
import { SpreadsheetRepository } from './spreadsheet.repository';
import { XlsxParserService } from './xlsx-parser.service';
import { SpreadsheetIndexerService } from './spreadsheet-indexer.service';
import { SpreadsheetPermissionService } from './spreadsheet-permission.service';
import { toDetail, toPage, toSummary } from './spreadsheet.mapper';

export interface UploadedSpreadsheet {
  buffer: Buffer;
  filename: string;
  mimetype: string;
}

export interface DownloadedSpreadsheet {
  filename: string;
  bytes: Buffer;
}

/**
 * Upload saga: validate → parse (memory only) → store blob → index.
 * The only compensation is deleting the blob when indexing fails.
 */
@Injectable()
export class SpreadsheetService {
  private readonly logger = new Logger(SpreadsheetService.name);

  constructor(
    private readonly repo: SpreadsheetRepository,
    private readonly parser: XlsxParserService,
    private readonly indexer: SpreadsheetIndexerService,
    private readonly permissions: SpreadsheetPermissionService,
    @Inject(BLOB_STORE) private readonly blobs: BlobStore,
    private readonly config: ConfigService,
  ) {}

  async upload(upload: UploadedSpreadsheet, principal: Principal): Promise<SpreadsheetFileSummary> {
    if (!this.permissions.canUpload(principal.roles)) {
      throw new ForbiddenException('You do not have permission to upload files');
    }
    this.validateUpload(upload);

    const document = await this.parser.parse(upload.buffer, upload.filename, upload.buffer.length);

    let storagePath: string;
    try {
      storagePath = await this.blobs.store(upload.buffer, upload.filename);
    } catch (err) {
      if (err instanceof BlobStorageException) throw err;
      throw new BlobStorageException(`Failed to store file: ${upload.filename}`, err);
    }

    let file: SpreadsheetFile;
    try {
      file = await this.indexer.index(document, storagePath, principal.username);
    } catch (err) {
      this.logger.error(
        `Indexing failed for ${upload.filename}, removing stored file`,
        err instanceof Error ? err.stack : undefined,
      );
      await this.blobs.delete(storagePath);
      if (err instanceof HttpException) throw err;
      throw new IndexingException(`Failed to index spreadsheet: ${upload.filename}`, err);
    }

    this.logger.log(`Uploaded ${upload.filename} as ${file.id} by ${principal.username}`);
    return toSummary(file);
  }

  async getById(id: string): Promise<SpreadsheetFileDetail> {
    const file = await this.findActive(id);
    const sheets = await this.repo.findSheets(file.id);
    return toDetail(file, sheets);
  }

  async list(query: FileListQueryInput): Promise<PaginatedResult<SpreadsheetFileSummary>> {
    const [files, total] = await this.repo.listActive(query);
    return toPage(files.map(toSummary), total, query.page, query.pageSize);
  }

  async download(id: string): Promise<DownloadedSpreadsheet> {
    const file = await this.findActive(id);
    const bytes = await this.blobs.read(file.storagePath);
    return { filename: file.originalFilename, bytes };
  }

  async getStats(): Promise<SpreadsheetStats> {
    return this.repo.getStats();
  }

  /** Soft delete; the stored blob is removed best-effort afterwards */
  async delete(id: string, principal: Principal): Promise<void> {
    const file = await this.repo.findById(id);
    if (!file) {
      throw new NotFoundException(`Spreadsheet file not found: ${id}`);
    }
    if (file.status === 'DELETED') {
      throw new NotFoundException(`Spreadsheet file already deleted: ${id}`);
    }
    if (!(await this.permissions.canDelete(id, principal.username, principal.roles))) {
      this.logger.warn(`Delete of ${id} denied for ${principal.username}`);
      throw new ForbiddenException('You do not have permission to delete this file');
    }

    await this.repo.markDeleted(id);
    await this.blobs.delete(file.storagePath);
    this.logger.log(`Deleted ${file.originalFilename} (${id}) by ${principal.username}`);
  }

  maxUploadBytes(): number {
    const maxMb = this.config.get<number>('MAX_UPLOAD_SIZE_MB');
    return maxMb ? maxMb * 1024 * 1024 : FILE_LIMITS.MAX_UPLOAD_SIZE_BYTES;
  }

  /** Raised for uploads over the configured ceiling, whichever layer notices first */
  oversizeError(): BadRequestException {
    return new BadRequestException(`File exceeds maximum size of ${this.maxUploadBytes() / 1024 / 1024}MB`);
  }

  private async findActive(id: string): Promise<SpreadsheetFile> {
    const file = await this.repo.findById(id);
    if (!file || file.status !== 'ACTIVE') {
      throw new NotFoundException(`Spreadsheet file not found: ${id}`);
    }
    return file;
  }

  private validateUpload(upload: UploadedSpreadsheet): void {
    if (upload.buffer.length === 0) {
      throw new BadRequestException('File is empty');
    }

    if (upload.buffer.length > this.maxUploadBytes()) {
      throw this.oversizeError();
    }

    const isXlsxMime = upload.mimetype === FILE_LIMITS.XLSX_MIME_TYPE;
    const isXlsxName = upload.filename.toLowerCase().endsWith(FILE_LIMITS.ALLOWED_EXTENSION);
    if (!isXlsxMime && !isXlsxName) {
      throw new BadRequestException('Only .xlsx files are supported');
    }
  }
}
