import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';

import { getUniqueViolation } from '@/database/database-errors';
import { ActorRequest } from '@/common/types/actor-request';

export interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string | string[];
  details?: Record<string, unknown>;
  timestamp: string;
  path: string;
  requestId?: string;
}

interface ResolvedError {
  status: number;
  error: string;
  message: string | string[];
  details?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMessage(value: unknown): value is string | string[] {
  return (
    typeof value === 'string' ||
    (Array.isArray(value) && value.every((item) => typeof item === 'string'))
  );
}

const SENSITIVE_FIELDS = ['password', 'passwordHash', 'token', 'secret', 'authorization', 'apiKey'];

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<ActorRequest>();

    const requestIdHeader = request.headers['x-request-id'];
    const requestId = typeof requestIdHeader === 'string' ? requestIdHeader : undefined;
    const requestContext = {
      requestId,
      path: request.url,
      method: request.method,
      actorId: request.actor?.id,
    };

    const { status, error, message, details } = this.resolve(exception, requestContext);

    const errorResponse: ErrorResponse = {
      statusCode: status,
      error,
      message,
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    if (details) {
      errorResponse.details = details;
    }

    if (requestId) {
      errorResponse.requestId = requestId;
    }

    // Client errors at warn level, server errors at error level
    if (status >= 500) {
      this.logger.error('Server error response', {
        ...errorResponse,
        method: request.method,
        body: this.sanitizeBody(request.body),
      });
    } else if (status >= 400) {
      this.logger.warn('Client error response', {
        ...errorResponse,
        method: request.method,
      });
    }

    response.status(status).json(errorResponse);
  }

  private resolve(exception: unknown, requestContext: Record<string, unknown>): ResolvedError {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        return { status, error: this.getErrorName(status), message: exceptionResponse };
      }

      if (isRecord(exceptionResponse)) {
        return {
          status,
          error:
            typeof exceptionResponse.error === 'string'
              ? exceptionResponse.error
              : this.getErrorName(status),
          message: isMessage(exceptionResponse.message)
            ? exceptionResponse.message
            : exception.message,
          details: isRecord(exceptionResponse.details) ? exceptionResponse.details : undefined,
        };
      }

      return { status, error: this.getErrorName(status), message: exception.message };
    }

    // A unique index rejected a write no service anticipated
    const violation = getUniqueViolation(exception);
    if (violation) {
      return {
        status: HttpStatus.CONFLICT,
        error: 'Conflict',
        message: 'A record with the same unique value already exists',
        details: violation.column ? { field: violation.column } : undefined,
      };
    }

    if (exception instanceof Error) {
      this.logger.error(`Unhandled exception: ${exception.message}`, exception.stack, requestContext);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Internal server error',
      };
    }

    this.logger.error('Unknown exception type', { exception, ...requestContext });
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    };
  }

  private getErrorName(status: number): string {
    const statusNames: Record<number, string> = {
      [HttpStatus.BAD_REQUEST]: 'Bad Request',
      [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
      [HttpStatus.FORBIDDEN]: 'Forbidden',
      [HttpStatus.NOT_FOUND]: 'Not Found',
      [HttpStatus.METHOD_NOT_ALLOWED]: 'Method Not Allowed',
      [HttpStatus.CONFLICT]: 'Conflict',
      [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
      [HttpStatus.TOO_MANY_REQUESTS]: 'Too Many Requests',
      [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
      [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
    };

    return statusNames[status] || 'Error';
  }

  private sanitizeBody(body: unknown): unknown {
    if (!isRecord(body)) {
      return body;
    }

    const sanitized = { ...body };
    for (const field of SENSITIVE_FIELDS) {
      if (field in sanitized) {
        sanitized[field] = '[REDACTED]';
      }
    }

    return sanitized;
  }
}
