import { InternalServerErrorException } from '@nestjs/common';

/** Writing the original file to blob storage failed */
export class BlobStorageException extends InternalServerErrorException {
  constructor(message: string, cause?: unknown) {
    super({ error: 'BLOB_STORAGE_ERROR', message }, { cause });
  }
}

/** Persisting the cell index failed; the transaction has been rolled back */
export class IndexingException extends InternalServerErrorException {
  constructor(message: string, cause?: unknown) {
    super({ error: 'INDEXING_ERROR', message }, { cause });
  }
}
