import type { ArgumentsHost } from '@nestjs/common';
import { Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';

export interface ErrorResponseBody {
  statusCode: number;
  code?: string;
  message: string;
  error: string;
  timestamp: string;
  path: string;
}

function flattenMessage(message: unknown, fallback: string): string {
  if (Array.isArray(message)) {
    return message.map((part) => String(part)).join(', ');
  }
  return typeof message === 'string' ? message : fallback;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body: ErrorResponseBody = {
      ...this.describe(exception),
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`${request.method} ${request.url} failed: ${body.message}`, stack);
    }

    response.status(body.statusCode).json(body);
  }

  private describe(exception: unknown): Pick<ErrorResponseBody, 'statusCode' | 'code' | 'message' | 'error'> {
    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        const code = 'code' in exceptionResponse ? exceptionResponse.code : undefined;
        const error = 'error' in exceptionResponse ? exceptionResponse.error : undefined;
        const message = 'message' in exceptionResponse ? exceptionResponse.message : undefined;
        return {
          statusCode: exception.getStatus(),
          code: typeof code === 'string' ? code : undefined,
          message: flattenMessage(message, exception.message),
          error: typeof error === 'string' ? error : exception.name,
        };
      }

      return {
        statusCode: exception.getStatus(),
        message: String(exceptionResponse),
        error: exception.name,
      };
    }

    const isProduction = process.env.NODE_ENV === 'production';
    if (exception instanceof Error) {
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: isProduction ? 'Internal server error' : exception.message,
        error: 'InternalServerError',
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Unknown error occurred',
      error: 'InternalServerError',
    };
  }
}
