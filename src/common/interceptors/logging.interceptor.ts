import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
  HttpException,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

import { ActorRequest } from '@/common/types/actor-request';

export const REQUEST_ID_HEADER = 'x-request-id';

export interface RequestLogContext {
  requestId: string;
  method: string;
  path: string;
  actorId?: string;
  userAgent?: string;
  ip?: string;
}

export interface ResponseLogContext extends RequestLogContext {
  statusCode: number;
  durationMs: number;
}

/**
 * Returns the caller's request id, or a fresh one when the header is absent
 * or repeated.
 */
export function resolveRequestId(header: string | string[] | undefined): string {
  return typeof header === 'string' && header.length > 0 ? header : uuidv4();
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<ActorRequest>();
    const response = ctx.getResponse<Response>();

    const requestId = resolveRequestId(request.headers[REQUEST_ID_HEADER]);
    request.headers[REQUEST_ID_HEADER] = requestId;
    response.setHeader('X-Request-Id', requestId);

    const startTime = Date.now();

    const requestContext: RequestLogContext = {
      requestId,
      method: request.method,
      path: request.url,
      userAgent: request.headers['user-agent'],
      ip: request.ip,
    };

    this.logger.debug({
      message: `Incoming ${request.method} ${request.url}`,
      ...requestContext,
      type: 'request',
    });

    return next.handle().pipe(
      tap(() => {
        const durationMs = Date.now() - startTime;
        const responseContext: ResponseLogContext = {
          ...requestContext,
          // Guards run before the handler, so the actor is known by now
          actorId: request.actor?.id,
          statusCode: response.statusCode,
          durationMs,
        };

        this.logger.log({
          message: `${request.method} ${request.url} ${response.statusCode} - ${durationMs}ms`,
          ...responseContext,
          type: 'response',
        });
      }),
      catchError((error: unknown) => {
        const durationMs = Date.now() - startTime;
        const statusCode = error instanceof HttpException ? error.getStatus() : 500;

        const errorContext = {
          message: `${request.method} ${request.url} ${statusCode} - ${durationMs}ms`,
          ...requestContext,
          actorId: request.actor?.id,
          statusCode,
          durationMs,
          error:
            error instanceof Error
              ? { name: error.name, message: error.message }
              : { name: 'Unknown', message: String(error) },
          type: 'error',
        };

        if (statusCode >= 500) {
          this.logger.error(errorContext);
        } else {
          this.logger.warn(errorContext);
        }

        throw error;
      }),
    );
  }
}
