import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.config';
import { DatabaseModule } from './database/database.module';
import { BlobStorageModule } from './common/storage/blob-storage.module';
import { SpreadsheetModule } from './modules/spreadsheet/spreadsheet.module';
import { CleanupModule } from './modules/cleanup/cleanup.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    DatabaseModule,
    BlobStorageModule,
    SpreadsheetModule,
    CleanupModule,
  ],
})
export class AppModule { }
