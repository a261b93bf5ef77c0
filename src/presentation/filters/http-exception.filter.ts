import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { DataValidationError, MissingIdError } from '@/domain/errors';
import { LoggerService } from '@/infrastructure/logger';

interface ErrorResponse {
  statusCode: number;
  message: string | string[];
  error: string;
  timestamp: string;
  path: string;
}

/**
 * Maps HTTP status codes to standard error names (RFC 7231).
 */
const HTTP_STATUS_NAMES: Record<number, string> = {
  [HttpStatus.BAD_REQUEST]: 'Bad Request',
  [HttpStatus.NOT_FOUND]: 'Not Found',
  [HttpStatus.METHOD_NOT_ALLOWED]: 'Method Not Allowed',
  [HttpStatus.CONFLICT]: 'Conflict',
  [HttpStatus.UNSUPPORTED_MEDIA_TYPE]: 'Unsupported Media Type',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  [HttpStatus.TOO_MANY_REQUESTS]: 'Too Many Requests',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
};

interface ResolvedError {
  status: number;
  message: string | string[];
  error: string;
}

function isMessage(value: unknown): value is string | string[] {
  return typeof value === 'string' || (Array.isArray(value) && value.every((item) => typeof item === 'string'));
}

function resolveHttpException(exception: HttpException): ResolvedError {
  const status = exception.getStatus();
  const body = exception.getResponse();
  const fallbackName = HTTP_STATUS_NAMES[status] || exception.name;

  if (typeof body === 'string') {
    return { status, message: body, error: fallbackName };
  }

  const message = 'message' in body ? body.message : undefined;
  const error = 'error' in body ? body.error : undefined;
  return {
    status,
    message: isMessage(message) ? message : exception.message,
    error: typeof error === 'string' ? error : exception.name,
  };
}

/** Domain validation and persistence errors are the caller's fault: 400. */
function resolve(exception: unknown): ResolvedError {
  if (exception instanceof HttpException) {
    return resolveHttpException(exception);
  }
  if (exception instanceof DataValidationError || exception instanceof MissingIdError) {
    return {
      status: HttpStatus.BAD_REQUEST,
      message: exception.message,
      error: HTTP_STATUS_NAMES[HttpStatus.BAD_REQUEST],
    };
  }
  if (exception instanceof Error) {
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: exception.message, error: exception.name };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    message: 'Internal server error',
    error: HTTP_STATUS_NAMES[HttpStatus.INTERNAL_SERVER_ERROR],
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new LoggerService(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    const { status, message, error } = resolve(exception);

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    if (status >= 500) {
      this.logger.error('Internal error', {
        error: errorResponse,
        stack: exception instanceof Error ? exception.stack : undefined,
      });
    } else {
      this.logger.warn('Request error', { error: errorResponse });
    }

    response.status(status).send(errorResponse);
  }
}
