import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import type { ApiError } from '@gridsearch/shared';

/** "Not Found" → "NOT_FOUND"; codes already in that form pass through */
function toErrorCode(error: string): string {
  return error
    .trim()
    .replace(/[^A-Za-z0-9]+/g, '_')
    .toUpperCase();
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let code = 'INTERNAL_ERROR';
    let message = 'An unexpected error occurred';
    let details: unknown = undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const response = exception.getResponse();
      if (typeof response === 'string') {
        message = response;
      } else if (typeof response === 'object' && response !== null) {
        if ('message' in response) {
          const raw = response.message;
          if (typeof raw === 'string') message = raw;
          else if (Array.isArray(raw)) message = raw.join('; ');
        }
        if ('error' in response && typeof response.error === 'string') {
          code = toErrorCode(response.error);
        }
        if ('details' in response) details = response.details;
      }
    } else if (exception instanceof ZodError) {
      status = HttpStatus.BAD_REQUEST;
      code = 'VALIDATION_ERROR';
      message = 'Request validation failed';
      details = exception.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      }));
    }

    if (status >= 500) {
      this.logger.error(
        `[${code}] ${exception instanceof Error ? exception.message : message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const body: ApiError = {
      success: false,
      error: { code, message, details },
    };
    reply.status(status).send(body);
  }
}
