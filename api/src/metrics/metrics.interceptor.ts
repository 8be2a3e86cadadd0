import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';
import { DomainError } from '../common/errors/domain.errors';
import { METRIC, MetricsService } from './metrics.service';

function routePattern(req: Request): string {
  const route: unknown = req.route;
  if (route && typeof route === 'object' && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return req.path;
}

function statusOf(err: unknown): number {
  if (err instanceof DomainError) return err.status;
  if (err instanceof HttpException) return err.getStatus();
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

/**
 * Records request count and latency per route pattern and status code.
 */
@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metrics: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') return next.handle();

    const http = context.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();
    const started = process.hrtime.bigint();

    const record = (status: number) => {
      const seconds = Number(process.hrtime.bigint() - started) / 1e9;
      const labels = { endpoint: `${req.method} ${routePattern(req)}`, status: String(status) };
      this.metrics.increment(METRIC.httpRequests, labels);
      this.metrics.observe(METRIC.httpDuration, seconds, labels);
    };

    return next.handle().pipe(
      tap({
        next: () => record(res.statusCode),
        error: (err: unknown) => record(statusOf(err)),
      }),
    );
  }
}
