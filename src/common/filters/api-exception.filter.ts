import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ApiError } from '../errors/api-errors.js';

export type ErrorBody = {
  code: string;
  message: string;
  details: Record<string, unknown> | null;
};

function messageOf(body: object, fallback: string): string {
  if (!('message' in body)) return fallback;
  const { message } = body;
  if (typeof message === 'string') return message;
  // ValidationPipe-style array of messages
  if (Array.isArray(message)) return message.join('; ');
  return fallback;
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.toErrorResponse(exception);
    res.status(status).json(body);
  }

  toErrorResponse(exception: unknown): { status: number; body: ErrorBody } {
    if (exception instanceof ApiError) {
      return {
        status: exception.httpStatus,
        body: {
          code: exception.code,
          message: exception.message,
          details: exception.details ?? null,
        },
      };
    }

    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      return {
        status: exception.getStatus(),
        body: {
          code: 'HTTP_ERROR',
          message:
            typeof response === 'string'
              ? response
              : messageOf(response, exception.message),
          details:
            typeof response === 'object'
              ? Object.fromEntries(Object.entries(response))
              : null,
        },
      };
    }

    this.logger.error(
      'Unhandled exception',
      exception instanceof Error ? exception.stack : String(exception),
    );
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
        details: null,
      },
    };
  }
}
