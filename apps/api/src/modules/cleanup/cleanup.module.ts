import { Module } from '@nestjs/common';
import { SpreadsheetModule } from '../spreadsheet/spreadsheet.module';
import { CleanupService } from './cleanup.service';

@Module({
  imports: [SpreadsheetModule],
  providers: [CleanupService],
})
export class CleanupModule {}
