import { Module } from '@nestjs/common';
import { SpreadsheetController } from './spreadsheet.controller';
import { SpreadsheetService } from './spreadsheet.service';
import { SpreadsheetRepository } from './spreadsheet.repository';
import { SpreadsheetSearchService } from './spreadsheet-search.service';
import { SpreadsheetIndexerService } from './spreadsheet-indexer.service';
import { SpreadsheetPermissionService } from './spreadsheet-permission.service';
import { XlsxParserService } from './xlsx-parser.service';

@Module({
  controllers: [SpreadsheetController],
  providers: [
    SpreadsheetService,
    SpreadsheetRepository,
    SpreadsheetSearchService,
    SpreadsheetIndexerService,
    SpreadsheetPermissionService,
    XlsxParserService,
  ],
  exports: [SpreadsheetRepository],
})
export class SpreadsheetModule {}
