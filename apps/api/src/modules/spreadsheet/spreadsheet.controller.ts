import {
  BadRequestException,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  Req,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { ApiBasicAuth, ApiConsumes, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { FastifyRequest } from 'fastify';
import { FILE_LIMITS, fileListQuerySchema, searchQuerySchema } from '@gridsearch/shared';
import type {
  FileListQueryInput,
  PaginatedResult,
  Principal,
  SearchQueryInput,
  SearchResult,
  SpreadsheetFileDetail,
  SpreadsheetFileSummary,
  SpreadsheetStats,
} from '@gridsearch/shared';
import { BasicAuthGuard } from '../../common/guards/basic-auth.guard';
import { CurrentPrincipal } from '../../common/decorators/current-principal.decorator';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { SpreadsheetService } from './spreadsheet.service';
import type { UploadedSpreadsheet } from './spreadsheet.service';
import { SpreadsheetSearchService } from './spreadsheet-search.service';

function multipartErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

@ApiTags('spreadsheets')
@ApiBasicAuth()
@Controller('api/spreadsheets')
@UseGuards(BasicAuthGuard)
export class SpreadsheetController {
  constructor(
    private readonly spreadsheetService: SpreadsheetService,
    private readonly searchService: SpreadsheetSearchService,
  ) {}

  @Post('upload')
  @ApiOperation({ summary: 'Upload an .xlsx file', description: 'Parses, stores and indexes every sheet of the workbook.' })
  @ApiConsumes('multipart/form-data')
  @ApiResponse({ status: 201, description: 'File indexed' })
  @ApiResponse({ status: 400, description: 'Empty, oversized, unreadable or not an .xlsx file' })
  @ApiResponse({ status: 403, description: 'Caller may not upload' })
  async upload(
    @Req() request: FastifyRequest,
    @CurrentPrincipal() principal: Principal,
  ): Promise<SpreadsheetFileSummary> {
    return this.spreadsheetService.upload(await this.readUpload(request), principal);
  }

  /** Multipart plugin errors carry their own status; they surface here as 400s */
  private async readUpload(request: FastifyRequest): Promise<UploadedSpreadsheet> {
    try {
      const file = await request.file();
      if (!file) {
        throw new BadRequestException('No file provided');
      }
      const buffer = await file.toBuffer();
      return { buffer, filename: file.filename, mimetype: file.mimetype };
    } catch (err) {
      const code = multipartErrorCode(err);
      if (code === 'FST_REQ_FILE_TOO_LARGE') throw this.spreadsheetService.oversizeError();
      if (code === 'FST_INVALID_MULTIPART_CONTENT_TYPE') {
        throw new BadRequestException('Upload must be multipart/form-data with a "file" field');
      }
      if (code?.startsWith('FST_')) {
        throw new BadRequestException(err instanceof Error ? err.message : 'Malformed upload');
      }
      throw err;
    }
  }

  @Get()
  @ApiOperation({ summary: 'List active files', description: 'Newest first, optionally filtered by uploader.' })
  @ApiQuery({ name: 'uploadedBy', required: false })
  @ApiQuery({ name: 'page', required: false, description: '0-based page' })
  @ApiQuery({ name: 'pageSize', required: false })
  async list(
    @Query(new ZodValidationPipe(fileListQuerySchema)) query: FileListQueryInput,
  ): Promise<PaginatedResult<SpreadsheetFileSummary>> {
    return this.spreadsheetService.list(query);
  }

  @Get('search')
  @ApiOperation({
    summary: 'Search cells',
    description: 'Cells containing every comma-separated keyword (case-insensitive), with their full rows.',
  })
  @ApiQuery({ name: 'keywords', required: true, description: 'Up to 5 comma-separated terms' })
  @ApiQuery({ name: 'fileId', required: false })
  @ApiQuery({ name: 'sheetName', required: false })
  @ApiQuery({ name: 'page', required: false, description: '0-based page' })
  @ApiQuery({ name: 'pageSize', required: false })
  @ApiResponse({ status: 400, description: 'Missing, too many or too long keywords' })
  async search(
    @Query(new ZodValidationPipe(searchQuerySchema)) query: SearchQueryInput,
  ): Promise<PaginatedResult<SearchResult>> {
    return this.searchService.search(query);
  }

  @Get('stats')
  @ApiOperation({ summary: 'Index statistics' })
  async stats(): Promise<SpreadsheetStats> {
    return this.spreadsheetService.getStats();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get file with its sheets' })
  @ApiParam({ name: 'id', description: 'File ID' })
  @ApiResponse({ status: 404, description: 'File not found or deleted' })
  async getById(@Param('id') id: string): Promise<SpreadsheetFileDetail> {
    return this.spreadsheetService.getById(id);
  }

  @Get(':id/download')
  @ApiOperation({ summary: 'Download the original upload' })
  @ApiParam({ name: 'id', description: 'File ID' })
  @ApiResponse({ status: 404, description: 'File not found, deleted or missing from storage' })
  async download(@Param('id') id: string): Promise<StreamableFile> {
    const { filename, bytes } = await this.spreadsheetService.download(id);
    return new StreamableFile(bytes, {
      type: FILE_LIMITS.XLSX_MIME_TYPE,
      disposition: `attachment; filename*=UTF-8''${encodeURIComponent(filename)}`,
      length: bytes.length,
    });
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete file', description: 'ADMIN, or the OPERATOR who uploaded it.' })
  @ApiParam({ name: 'id', description: 'File ID' })
  @ApiResponse({ status: 204, description: 'File deleted' })
  @ApiResponse({ status: 403, description: 'Caller may not delete this file' })
  @ApiResponse({ status: 404, description: 'File not found or already deleted' })
  async delete(@Param('id') id: string, @CurrentPrincipal() principal: Principal): Promise<void> {
    await this.spreadsheetService.delete(id, principal);
  }
}
