import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { Observable, tap } from 'rxjs';
import { LoggerService } from '@/infrastructure/logger';

function nonEmpty(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value ?? undefined;
  return Object.keys(value).length ? value : undefined;
}

/** Lists are summarised by size; single records are logged whole. */
function summarise(data: unknown): unknown {
  return Array.isArray(data) ? { count: data.length } : data;
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new LoggerService('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const response = ctx.getResponse<FastifyReply>();

    const { method, url, body, query, params } = request;
    const startTime = Date.now();

    this.logger.log('Request', {
      method,
      url,
      params: nonEmpty(params),
      query: nonEmpty(query),
      body: nonEmpty(body),
    });

    return next.handle().pipe(
      tap({
        next: (data: unknown) => {
          this.logger.log('Response', {
            method,
            url,
            statusCode: response.statusCode,
            duration: `${Date.now() - startTime}ms`,
            body: summarise(data),
          });
        },
        // errors are logged by HttpExceptionFilter
      }),
    );
  }
}
