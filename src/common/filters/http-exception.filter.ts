import { ExceptionFilter, Catch, ArgumentsHost, HttpException, Logger, HttpStatus } from '@nestjs/common';
import type { Request, Response } from 'express';

interface ExceptionResponse {
  message?: string | string[];
  error?: string;
}

export interface ErrorResponseBody {
  success: false;
  statusCode: number;
  message: string;
  error: string;
  path: string;
  timestamp: string;
}

const isExceptionResponse = (value: unknown): value is ExceptionResponse =>
  typeof value === 'object' && value !== null;

@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: HttpException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const status = exception.getStatus();
    const exceptionResponse: unknown = exception.getResponse();

    // Client errors are expected traffic; server errors need a stack
    const isOperationalError = status < HttpStatus.INTERNAL_SERVER_ERROR;

    if (isOperationalError) {
      this.logger.warn(`Client Error: ${exception.message} Path: ${request.url}`);
    } else {
      this.logger.error(
        `Server Error: ${exception.message} Path: ${request.url}`,
        exception.stack,
      );
    }

    let message = exception.message;
    let error = exception.name;

    if (isExceptionResponse(exceptionResponse)) {
      // class-validator errors arrive as a string array
      if (Array.isArray(exceptionResponse.message)) {
        message = exceptionResponse.message.join(', ');
      } else if (exceptionResponse.message) {
        message = exceptionResponse.message;
      }
      error = exceptionResponse.error ?? error;
    } else if (typeof exceptionResponse === 'string' && exceptionResponse) {
      message = exceptionResponse;
    }

    const responseBody: ErrorResponseBody = {
      success: false,
      statusCode: status,
      message,
      error,
      path: request.url,
      timestamp: new Date().toISOString(),
    };

    if (process.env.NODE_ENV === 'production' && !isOperationalError) {
      responseBody.message = 'Internal server error';
    }

    if (status === HttpStatus.UNAUTHORIZED) {
      response.setHeader('WWW-Authenticate', 'Bearer');
    }

    response.status(status).json(responseBody);
  }
}
