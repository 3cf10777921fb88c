import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { containsPattern, toSearchValue } from '@gridsearch/shared';
import type { PaginatedResult, RowCellData, SearchQuery, SearchResult } from '@gridsearch/shared';
import { SpreadsheetCell } from './entities';
import { toPage } from './spreadsheet.mapper';

/**
 * AND-of-substrings search over the cell index. Results come in storage
 * order (file upload time, sheet, row, column), never by relevance.
 */
@Injectable()
export class SpreadsheetSearchService {
  private readonly logger = new Logger(SpreadsheetSearchService.name);

  constructor(private readonly dataSource: DataSource) {}

  async search(query: SearchQuery): Promise<PaginatedResult<SearchResult>> {
    const qb = this.dataSource
      .getRepository(SpreadsheetCell)
      .createQueryBuilder('cell')
      .innerJoinAndSelect('cell.sheet', 'sheet')
      .innerJoinAndSelect('sheet.file', 'file')
      .where('file.status = :status', { status: 'ACTIVE' });

    if (query.fileId) {
      qb.andWhere('file.id = :fileId', { fileId: query.fileId });
    }
    if (query.sheetName) {
      qb.andWhere('sheet.sheetNameLower = :sheetName', { sheetName: toSearchValue(query.sheetName) });
    }
    query.keywords.forEach((keyword, i) => {
      qb.andWhere(`cell.cellValueLower LIKE :kw${i} ESCAPE '\\'`, { [`kw${i}`]: containsPattern(keyword) });
    });

    const [matches, total] = await qb
      .orderBy('file.uploadedAt', 'ASC')
      .addOrderBy('file.id', 'ASC')
      .addOrderBy('sheet.sheetIndex', 'ASC')
      .addOrderBy('cell.rowNumber', 'ASC')
      .addOrderBy('cell.columnIndex', 'ASC')
      .offset(query.page * query.pageSize)
      .limit(query.pageSize)
      .getManyAndCount();

    const items: SearchResult[] = [];
    for (const match of matches) {
      items.push({
        cellId: match.id,
        fileId: match.sheet.file.id,
        fileName: match.sheet.file.originalFilename,
        sheetId: match.sheet.id,
        sheetName: match.sheet.sheetName,
        columnHeader: match.columnHeader,
        rowNumber: match.rowNumber,
        columnIndex: match.columnIndex,
        cellValue: match.cellValue,
        rowData: await this.loadRow(match),
      });
    }

    this.logger.debug(`Search [${query.keywords.join(', ')}]: ${total} matches, returning ${items.length}`);
    return toPage(items, total, query.page, query.pageSize);
  }

  /** Every stored cell of the matched row; exactly the match is flagged */
  private async loadRow(match: SpreadsheetCell): Promise<RowCellData[]> {
    const cells = await this.dataSource.getRepository(SpreadsheetCell).find({
      where: { sheetId: match.sheetId, rowNumber: match.rowNumber },
      order: { columnIndex: 'ASC' },
    });
    return cells.map((cell) => ({
      columnHeader: cell.columnHeader,
      columnIndex: cell.columnIndex,
      cellValue: cell.cellValue,
      isMatchedCell: cell.id === match.id,
    }));
  }
}
