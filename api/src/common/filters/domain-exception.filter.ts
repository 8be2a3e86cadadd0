import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { DomainError, ErrorContext } from '../errors/domain.errors';

/** Consistent error envelope returned to clients */
export interface ApiError {
  statusCode: number;
  kind: string;
  message: string;
  context?: ErrorContext;
  timestamp: string;
  path: string;
}

function extractNestMessage(payload: unknown): string | undefined {
  // Nest returns { message: string | string[], statusCode, error }
  if (typeof payload === 'string') return payload;
  if (payload && typeof payload === 'object' && 'message' in payload) {
    const msg = payload.message;
    if (Array.isArray(msg)) return msg.join(', ');
    if (typeof msg === 'string') return msg;
  }
  return undefined;
}

/**
 * Maps domain errors and Nest HTTP exceptions onto one JSON envelope.
 * Unknown errors become a generic 500; their stack is logged, never returned.
 */
@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<Request>();

    const body = this.toApiError(exception, req.url);

    if (body.statusCode >= 500) {
      this.logger.error(
        `${req.method} ${req.url} -> ${body.statusCode} ${body.kind}: ${body.message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${req.method} ${req.url} -> ${body.statusCode} ${body.kind}`);
    }

    res.status(body.statusCode).json(body);
  }

  toApiError(exception: unknown, path: string): ApiError {
    const timestamp = new Date().toISOString();

    if (exception instanceof DomainError) {
      return {
        statusCode: exception.status,
        kind: exception.kind,
        message: exception.message,
        context: exception.context,
        timestamp,
        path,
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        statusCode: status,
        kind: status === HttpStatus.BAD_REQUEST ? 'BadRequest' : 'HttpError',
        message: extractNestMessage(exception.getResponse()) ?? exception.message,
        timestamp,
        path,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      kind: 'InternalError',
      message: 'An internal server error occurred',
      timestamp,
      path,
    };
  }
}
