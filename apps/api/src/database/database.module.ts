import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import * as fs from 'fs';
import * as path from 'path';
import { SPREADSHEET_ENTITIES } from '../modules/spreadsheet/entities';

export const IN_MEMORY_DATABASE = ':memory:';

/** better-sqlite3 connection options; creates the database directory on first boot */
export function buildDataSourceOptions(database: string, synchronize: boolean): TypeOrmModuleOptions {
  if (database !== IN_MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(path.resolve(database)), { recursive: true });
  }
  return {
    type: 'better-sqlite3',
    database,
    entities: SPREADSHEET_ENTITIES,
    synchronize,
  };
}

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        buildDataSourceOptions(
          config.get<string>('DATABASE_PATH') ?? './data/gridsearch.sqlite',
          config.get<boolean>('DATABASE_SYNCHRONIZE') ?? true,
        ),
    }),
  ],
})
export class DatabaseModule {}
