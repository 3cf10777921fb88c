import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import multipart from '@fastify/multipart';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { ResponseTransformInterceptor } from './common/interceptors/response-transform.interceptor';

/** Multipart ceiling sits above the service limit so oversize uploads get the service's message */
const MULTIPART_SLACK_BYTES = 1024 * 1024;

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: false }),
  );
  const config = app.get(ConfigService);

  const maxUploadMb = config.get<number>('MAX_UPLOAD_SIZE_MB') ?? 10;
  await app.register(multipart as never, {
    limits: { fileSize: maxUploadMb * 1024 * 1024 + MULTIPART_SLACK_BYTES, files: 1 },
  });

  app.useGlobalFilters(new GlobalExceptionFilter());
  app.useGlobalInterceptors(new ResponseTransformInterceptor());

  // Swagger UI outside production (served through @fastify/static)
  if (config.get<string>('NODE_ENV') !== 'production') {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Gridsearch API')
      .setDescription('Spreadsheet ingestion with cell-level keyword search.')
      .setVersion('0.1.0')
      .addBasicAuth()
      .addTag('spreadsheets', 'Upload, list, search, download and delete spreadsheets')
      .build();
    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('api/docs', app, document);
  }

  const rawOrigins = config.get<string>('FRONTEND_URL') ?? 'http://localhost:3000';
  const allowedOrigins = rawOrigins
    .split(',')
    .map((o) => o.trim().replace(/\/+$/, ''))
    .filter(Boolean);
  app.enableCors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // No origin: server-to-server, health checks, curl
      if (!origin) {
        callback(null, true);
        return;
      }
      const normalizedOrigin = origin.replace(/\/+$/, '');
      if (allowedOrigins.includes(normalizedOrigin)) {
        callback(null, true);
      } else {
        logger.warn(`CORS blocked origin: ${origin} (allowed: ${allowedOrigins.join(', ')})`);
        callback(null, false);
      }
    },
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  // Unauthenticated health endpoint for container healthchecks
  const fastifyInstance = app.getHttpAdapter().getInstance();
  fastifyInstance.get('/api/health', (_req: unknown, reply: { send: (body: unknown) => void }) => {
    reply.send({ status: 'ok' });
  });

  app.enableShutdownHooks();

  const port = config.get<number>('PORT') ?? 4000;
  await app.listen(port, '0.0.0.0');
  logger.log(`Gridsearch API running on http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed:', err);
  process.exit(1);
});
