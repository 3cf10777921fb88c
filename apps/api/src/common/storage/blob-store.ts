import { createId } from '@paralleldrive/cuid2';
import { FILE_LIMITS } from '@gridsearch/shared';

/** DI token for the active {@link BlobStore} driver */
export const BLOB_STORE = Symbol('BLOB_STORE');

export interface StoredBlob {
  /** The same opaque path `store` returned */
  path: string;
  size: number;
  lastModified: Date;
}

/**
 * Byte storage for original uploads. Paths are opaque to callers and only
 * ever come from `store` or `list`.
 */
export interface BlobStore {
  /** Persist bytes under a fresh `<yyyy>/<MM>/<id>.xlsx` key and return its path */
  store(bytes: Buffer, originalName: string): Promise<string>;
  /** NotFoundException when absent */
  read(path: string): Promise<Buffer>;
  /** Idempotent; never throws */
  delete(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** NotFoundException when absent */
  size(path: string): Promise<number>;
  /** Only blobs laid out by `store`; other files under the root are left out */
  list(): Promise<StoredBlob[]>;
}

/** Relative key for a new blob, partitioned by upload year and month (UTC) */
export function buildBlobKey(now: Date = new Date()): string {
  const year = String(now.getUTCFullYear());
  const month = String(now.getUTCMonth() + 1).padStart(2, '0');
  return `${year}/${month}/${createId()}.${FILE_LIMITS.STORED_EXTENSION}`;
}

const BLOB_KEY_PATTERN = new RegExp(`^\\d{4}/\\d{2}/[a-z0-9]+\\.${FILE_LIMITS.STORED_EXTENSION}$`);

/** True for keys `buildBlobKey` produces; anything else under the root is not ours */
export function isBlobKey(relativeKey: string): boolean {
  return BLOB_KEY_PATTERN.test(relativeKey);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
