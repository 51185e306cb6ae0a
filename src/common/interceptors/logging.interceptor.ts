import { Injectable, NestInterceptor, ExecutionContext, CallHandler, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { AuthenticatedRequest } from '../../modules/auth/interfaces/authenticated-user.interface';

const SENSITIVE_FIELDS = ['password', 'client_secret', 'access_token', 'authorization'];

/** Masks credential fields at the top level of a request or response body. */
export const sanitizeData = (data: unknown): unknown => {
  if (!data || typeof data !== 'object' || Array.isArray(data)) return data;

  const sanitized: Record<string, unknown> = { ...data };
  for (const field of SENSITIVE_FIELDS) {
    if (sanitized[field]) {
      sanitized[field] = '*****';
    }
  }
  return sanitized;
};

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<AuthenticatedRequest>();
    const response = httpContext.getResponse<Response>();

    const { method, originalUrl, ip, headers } = request;
    const body: unknown = request.body;
    const userAgent = headers['user-agent'] || '';
    const now = Date.now();

    this.logger.log(
      `Incoming Request: ${method} ${originalUrl} IP: ${ip} User Agent: ${userAgent} ` +
        `Body: ${JSON.stringify(sanitizeData(body))}`,
    );

    return next.handle().pipe(
      tap({
        next: (responseBody: unknown) => {
          const responseTime = Date.now() - now;
          // the guard has run by now, so the caller is known
          const userId = request.user?.username ?? 'anonymous';

          this.logger.log(
            `Outgoing Response: ${method} ${originalUrl} Status: ${response.statusCode} ` +
              `User: ${userId} Response Time: ${responseTime}ms ` +
              `Response: ${JSON.stringify(sanitizeData(responseBody))}`,
          );
        },
        error: (error: unknown) => {
          const responseTime = Date.now() - now;
          this.logger.error(
            `Request Error: ${method} ${originalUrl} Response Time: ${responseTime}ms ` +
              `Error: ${error instanceof Error ? error.message : String(error)}`,
          );
        },
      }),
    );
  }
}
