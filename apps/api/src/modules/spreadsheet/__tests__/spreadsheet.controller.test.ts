import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { Test } from '@nestjs/testing';
import { FastifyAdapter } from '@nestjs/platform-fastify';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import multipart from '@fastify/multipart';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { GlobalExceptionFilter } from '../../../common/filters/global-exception.filter';
import { ResponseTransformInterceptor } from '../../../common/interceptors/response-transform.interceptor';
import { XLSX_MIME, inventoryWorkbook } from '../../../__tests__/support/workbooks';

const OPERATOR_AUTH = `Basic ${Buffer.from('operator1:test-secret').toString('base64')}`;
const VIEWER_AUTH = `Basic ${Buffer.from('viewer:test-secret').toString('base64')}`;
const BOUNDARY = '----gridsearch-test-boundary';

function multipartBody(filename: string, bytes: Buffer): Buffer {
  return Buffer.concat([
    Buffer.from(
      `--${BOUNDARY}\r\n` +
        `Content-Disposition: form-data; name="file"; filename="${filename}"\r\n` +
        `Content-Type: ${XLSX_MIME}\r\n\r\n`,
    ),
    bytes,
    Buffer.from(`\r\n--${BOUNDARY}--\r\n`),
  ]);
}

describe('SpreadsheetController (HTTP)', () => {
  let app: NestFastifyApplication;
  let storageDir: string;

  beforeAll(async () => {
    storageDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gridsearch-http-'));
    vi.stubEnv('DATABASE_PATH', ':memory:');
    vi.stubEnv('STORAGE_BASE_DIR', storageDir);
    vi.stubEnv('AUTH_USERS', 'operator1:test-secret:OPERATOR,viewer:test-secret:USER');
    vi.stubEnv('CLEANUP_INTERVAL_MINUTES', '0');
    vi.stubEnv('MAX_UPLOAD_SIZE_MB', '1');
    vi.stubEnv('NODE_ENV', 'test');

    // Config is read when the module is first imported
    const { AppModule } = await import('../../../app.module');
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();

    app = moduleRef.createNestApplication<NestFastifyApplication>(new FastifyAdapter());
    // Same ceiling rule as main.ts: configured limit plus 1 MiB
    await app.register(multipart as never, { limits: { fileSize: 2 * 1024 * 1024, files: 1 } });
    app.useGlobalFilters(new GlobalExceptionFilter());
    app.useGlobalInterceptors(new ResponseTransformInterceptor());
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterAll(async () => {
    await app.close();
    vi.unstubAllEnvs();
    await fs.rm(storageDir, { recursive: true, force: true });
  });

  async function uploadInventory(bytes?: Buffer): Promise<string> {
    const res = await app.inject({
      method: 'POST',
      url: '/api/spreadsheets/upload',
      headers: {
        authorization: OPERATOR_AUTH,
        'content-type': `multipart/form-data; boundary=${BOUNDARY}`,
      },
      payload: multipartBody('inventory.xlsx', bytes ?? (await inventoryWorkbook())),
    });
    expect(res.statusCode).toBe(201);
    return res.json<{ data: { id: string } }>().data.id;
  }

  it('rejects requests without credentials', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/spreadsheets/stats' });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({
      success: false,
      error: { code: 'UNAUTHORIZED', message: 'Missing Basic Auth credentials' },
    });
  });

  it('uploads, describes and searches a workbook', async () => {
    const id = await uploadInventory();

    const detail = await app.inject({
      method: 'GET',
      url: `/api/spreadsheets/${id}`,
      headers: { authorization: VIEWER_AUTH },
    });
    expect(detail.statusCode).toBe(200);
    expect(detail.json<{ data: { sheetCount: number } }>().data.sheetCount).toBe(2);

    const search = await app.inject({
      method: 'GET',
      url: `/api/spreadsheets/search?keywords=${encodeURIComponent('alpha, server')}&fileId=${id}`,
      headers: { authorization: VIEWER_AUTH },
    });
    expect(search.statusCode).toBe(200);
    const body = search.json<{
      success: boolean;
      data: { items: Array<{ cellValue: string }>; pagination: { total: number } };
    }>();
    expect(body.success).toBe(true);
    expect(body.data.items.map((i) => i.cellValue)).toEqual(['alpha-server']);
    expect(body.data.pagination.total).toBe(1);
  });

  it('rejects searches with too many keywords', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/spreadsheets/search?keywords=a,b,c,d,e,f',
      headers: { authorization: VIEWER_AUTH },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json<{ error: { code: string; message: string } }>().error).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Too many keywords: 6 (max: 5)',
    });
  });

  it('answers 400 when the upload passes the multipart ceiling', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/spreadsheets/upload',
      headers: {
        authorization: OPERATOR_AUTH,
        'content-type': `multipart/form-data; boundary=${BOUNDARY}`,
      },
      payload: multipartBody('big.xlsx', Buffer.alloc(3 * 1024 * 1024, 1)),
    });

    expect(res.statusCode).toBe(400);
    expect(res.json<{ error: { code: string; message: string } }>().error).toMatchObject({
      code: 'BAD_REQUEST',
      message: 'File exceeds maximum size of 1MB',
    });
  });

  it('answers 400 when the upload is not multipart', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/spreadsheets/upload',
      headers: { authorization: OPERATOR_AUTH, 'content-type': 'application/json' },
      payload: JSON.stringify({ file: 'inventory.xlsx' }),
    });

    expect(res.statusCode).toBe(400);
    expect(res.json<{ error: { code: string; message: string } }>().error).toMatchObject({
      code: 'BAD_REQUEST',
      message: 'Upload must be multipart/form-data with a "file" field',
    });
  });

  it('forbids uploads by plain users', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/spreadsheets/upload',
      headers: {
        authorization: VIEWER_AUTH,
        'content-type': `multipart/form-data; boundary=${BOUNDARY}`,
      },
      payload: multipartBody('inventory.xlsx', await inventoryWorkbook()),
    });

    expect(res.statusCode).toBe(403);
  });

  it('downloads the original bytes', async () => {
    const uploaded = await inventoryWorkbook();
    const id = await uploadInventory(uploaded);

    const res = await app.inject({
      method: 'GET',
      url: `/api/spreadsheets/${id}/download`,
      headers: { authorization: VIEWER_AUTH },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe(XLSX_MIME);
    expect(res.headers['content-disposition']).toBe("attachment; filename*=UTF-8''inventory.xlsx");
    expect(res.rawPayload.equals(uploaded)).toBe(true);
  });

  it('deletes with 204 and then answers 404', async () => {
    const id = await uploadInventory();

    const denied = await app.inject({
      method: 'DELETE',
      url: `/api/spreadsheets/${id}`,
      headers: { authorization: VIEWER_AUTH },
    });
    expect(denied.statusCode).toBe(403);

    const deleted = await app.inject({
      method: 'DELETE',
      url: `/api/spreadsheets/${id}`,
      headers: { authorization: OPERATOR_AUTH },
    });
    expect(deleted.statusCode).toBe(204);

    const again = await app.inject({
      method: 'DELETE',
      url: `/api/spreadsheets/${id}`,
      headers: { authorization: OPERATOR_AUTH },
    });
    expect(again.statusCode).toBe(404);
    expect(again.json<{ error: { code: string } }>().error.code).toBe('NOT_FOUND');
  });

  it('lists files with 0-based pagination', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/spreadsheets?page=0&pageSize=1',
      headers: { authorization: VIEWER_AUTH },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json<{ data: { items: unknown[]; pagination: { page: number; pageSize: number } } }>();
    expect(body.data.items).toHaveLength(1);
    expect(body.data.pagination).toMatchObject({ page: 0, pageSize: 1 });
  });
});
