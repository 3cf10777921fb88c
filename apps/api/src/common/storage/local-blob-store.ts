import { BadRequestException, Logger, NotFoundException } from '@nestjs/common';
import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { BlobStorageException } from '../errors/storage.exceptions';
import { buildBlobKey, isBlobKey, isErrnoException } from './blob-store';
import type { BlobStore, StoredBlob } from './blob-store';

/** Filesystem driver rooted at `STORAGE_BASE_DIR` */
export class LocalBlobStore implements BlobStore {
  private readonly logger = new Logger(LocalBlobStore.name);
  private readonly root: string;

  constructor(baseDir: string) {
    this.root = path.resolve(baseDir);
  }

  async store(bytes: Buffer, originalName: string): Promise<string> {
    const target = this.resolve(buildBlobKey());
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, bytes, { flag: 'wx' });
    } catch (err) {
      throw new BlobStorageException(`Failed to store file: ${originalName}`, err);
    }
    this.logger.log(`Stored ${originalName} → ${target} (${bytes.length} bytes)`);
    return target;
  }

  async read(blobPath: string): Promise<Buffer> {
    const target = this.resolve(blobPath);
    try {
      return await fs.readFile(target);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new NotFoundException('Stored file not found');
      }
      throw err;
    }
  }

  async delete(blobPath: string): Promise<void> {
    let target: string;
    try {
      target = this.resolve(blobPath);
    } catch (err) {
      this.logger.warn(`Refusing to delete ${blobPath}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    try {
      await fs.unlink(target);
      this.logger.log(`Deleted stored file ${target}`);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        this.logger.warn(`Stored file already gone: ${target}`);
      } else {
        this.logger.error(`Failed to delete stored file ${target}: ${String(err)}`);
        return;
      }
    }

    await this.pruneEmptyParents(target);
  }

  async exists(blobPath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(blobPath));
      return true;
    } catch {
      return false;
    }
  }

  async size(blobPath: string): Promise<number> {
    try {
      const stat = await fs.stat(this.resolve(blobPath));
      return stat.size;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new NotFoundException('Stored file not found');
      }
      throw err;
    }
  }

  async list(): Promise<StoredBlob[]> {
    const blobs: StoredBlob[] = [];
    await this.walk(this.root, blobs);
    return blobs;
  }

  private async walk(dir: string, out: StoredBlob[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return;
      throw err;
    }

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(full, out);
      } else if (entry.isFile() && isBlobKey(path.relative(this.root, full).split(path.sep).join('/'))) {
        const stat = await fs.stat(full);
        out.push({ path: full, size: stat.size, lastModified: stat.mtime });
      }
    }
  }

  /** Remove the month and then the year directory when they become empty */
  private async pruneEmptyParents(file: string): Promise<void> {
    let dir = path.dirname(file);
    for (let depth = 0; depth < 2 && dir !== this.root && dir.startsWith(this.root + path.sep); depth++) {
      try {
        await fs.rmdir(dir);
      } catch {
        // not empty, or raced with another upload
        return;
      }
      dir = path.dirname(dir);
    }
  }

  /** Absolute path for a stored blob; anything outside the root is rejected */
  private resolve(blobPath: string): string {
    const absolute = path.resolve(this.root, blobPath);
    if (!absolute.startsWith(this.root + path.sep)) {
      throw new BadRequestException('Storage path is outside the storage root');
    }
    return absolute;
  }
}
