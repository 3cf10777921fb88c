import { Logger, NotFoundException } from '@nestjs/common';
import {
  S3Client,
  S3ServiceException,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import type { _Object } from '@aws-sdk/client-s3';
import { FILE_LIMITS } from '@gridsearch/shared';
import { BlobStorageException } from '../errors/storage.exceptions';
import { buildBlobKey, isBlobKey } from './blob-store';
import type { BlobStore, StoredBlob } from './blob-store';

function isMissing(err: unknown): boolean {
  return err instanceof S3ServiceException && err.$metadata.httpStatusCode === 404;
}

/** Object key under an optional prefix: `<prefix>/<yyyy>/<MM>/<id>.xlsx` */
export function buildObjectKey(prefix: string, now?: Date): string {
  const trimmed = prefix.replace(/^\/+|\/+$/g, '');
  const key = buildBlobKey(now);
  return trimmed ? `${trimmed}/${key}` : key;
}

/** Listed objects laid out by `store` under `prefix` (already trimmed) */
export function toStoredBlobs(contents: readonly _Object[], prefix: string): StoredBlob[] {
  const blobs: StoredBlob[] = [];
  for (const obj of contents) {
    if (!obj.Key) continue;
    const relative = prefix ? obj.Key.slice(prefix.length + 1) : obj.Key;
    if (!isBlobKey(relative)) continue;
    blobs.push({
      path: obj.Key,
      size: obj.Size ?? 0,
      lastModified: obj.LastModified ?? new Date(0),
    });
  }
  return blobs;
}

/** S3-compatible driver (AWS, MinIO, LocalStack). Paths are object keys. */
export class S3BlobStore implements BlobStore {
  private readonly logger = new Logger(S3BlobStore.name);

  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly prefix: string = '',
  ) {}

  async store(bytes: Buffer, originalName: string): Promise<string> {
    const key = buildObjectKey(this.prefix);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: bytes,
          ContentType: FILE_LIMITS.XLSX_MIME_TYPE,
        }),
      );
    } catch (err) {
      throw new BlobStorageException(`Failed to store file: ${originalName}`, err);
    }
    this.logger.log(`Stored ${originalName} → s3://${this.bucket}/${key} (${bytes.length} bytes)`);
    return key;
  }

  async read(key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) throw new NotFoundException('Stored file not found');
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (err) {
      if (isMissing(err)) throw new NotFoundException('Stored file not found');
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
      this.logger.log(`Deleted s3://${this.bucket}/${key}`);
    } catch (err) {
      this.logger.error(`Failed to delete s3://${this.bucket}/${key}: ${String(err)}`);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async size(key: string): Promise<number> {
    try {
      const head = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return head.ContentLength ?? 0;
    } catch (err) {
      if (isMissing(err)) throw new NotFoundException('Stored file not found');
      throw err;
    }
  }

  /** Every object under the prefix, following continuation tokens */
  async list(): Promise<StoredBlob[]> {
    const blobs: StoredBlob[] = [];
    const prefix = this.prefix.replace(/^\/+|\/+$/g, '');
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix ? `${prefix}/` : undefined,
          ContinuationToken: continuationToken,
        }),
      );
      blobs.push(...toStoredBlobs(response.Contents ?? [], prefix));
      continuationToken = response.NextContinuationToken;
    } while (continuationToken);

    return blobs;
  }
}
