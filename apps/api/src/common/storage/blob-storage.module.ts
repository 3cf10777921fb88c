import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client } from '@aws-sdk/client-s3';
import { BLOB_STORE } from './blob-store';
import type { BlobStore } from './blob-store';
import { LocalBlobStore } from './local-blob-store';
import { S3BlobStore } from './s3-blob-store';

/** Pick the driver named by `STORAGE_DRIVER` */
export function createBlobStore(config: ConfigService): BlobStore {
  const logger = new Logger('BlobStorage');
  const driver = config.get<string>('STORAGE_DRIVER') ?? 'local';

  if (driver === 's3') {
    const bucket = config.getOrThrow<string>('S3_BUCKET');
    const region = config.getOrThrow<string>('S3_REGION');
    const endpoint = config.get<string>('S3_ENDPOINT');

    const client = new S3Client({
      region,
      endpoint: endpoint || undefined,
      forcePathStyle: !!endpoint, // needed for MinIO / LocalStack
      credentials: {
        accessKeyId: config.getOrThrow<string>('S3_ACCESS_KEY_ID'),
        secretAccessKey: config.getOrThrow<string>('S3_SECRET_ACCESS_KEY'),
      },
    });

    logger.log(`Using S3 storage, bucket: ${bucket}, region: ${region}`);
    return new S3BlobStore(client, bucket, config.get<string>('S3_PREFIX') ?? '');
  }

  const baseDir = config.get<string>('STORAGE_BASE_DIR') ?? './data/spreadsheets';
  logger.log(`Using local storage under ${baseDir}`);
  return new LocalBlobStore(baseDir);
}

/** Global so every module shares one driver instance */
@Global()
@Module({
  providers: [
    {
      provide: BLOB_STORE,
      inject: [ConfigService],
      useFactory: createBlobStore,
    },
  ],
  exports: [BLOB_STORE],
})
export class BlobStorageModule {}
