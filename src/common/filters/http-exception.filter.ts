import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { createLogger } from '../utils/logger';
import {
  BACKEND_ERROR_MESSAGE,
  INVALID_PAYLOAD_MESSAGE,
} from '../constants/error-messages.constants';
import '../types/express';

export interface ErrorResponseBody {
  ok: false;
  message: string;
  requestId?: string;
  /** Field-level messages from request validation. */
  errors?: string[];
}

export interface DescribedException {
  status: number;
  message: string;
  errors?: string[];
}

/**
 * Status and client-safe message for any thrown value. Validation failures
 * keep their per-field messages under `errors`; anything that is not an
 * `HttpException` is a 500 with the generic backend message.
 */
export function describeException(exception: unknown): DescribedException {
  if (!(exception instanceof HttpException)) {
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: BACKEND_ERROR_MESSAGE };
  }

  const status = exception.getStatus();
  const response = exception.getResponse();

  if (typeof response === 'string') {
    return { status, message: response };
  }

  if (typeof response === 'object' && response !== null && 'message' in response) {
    const { message } = response;
    if (typeof message === 'string') {
      return { status, message };
    }
    if (Array.isArray(message)) {
      const errors = message.filter((entry): entry is string => typeof entry === 'string');
      return {
        status,
        message: status === HttpStatus.BAD_REQUEST ? INVALID_PAYLOAD_MESSAGE : BACKEND_ERROR_MESSAGE,
        ...(errors.length > 0 && { errors }),
      };
    }
  }

  return {
    status,
    message: status === HttpStatus.BAD_REQUEST ? INVALID_PAYLOAD_MESSAGE : BACKEND_ERROR_MESSAGE,
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = createLogger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const { status, message, errors } = describeException(exception);
    const meta = {
      method: request.method,
      path: request.path,
      request_id: request.requestId,
      status,
    };

    if (status >= 500) {
      this.logger.error(
        'unhandled_exception',
        exception instanceof Error ? exception : undefined,
        meta,
      );
    } else {
      this.logger.warn('request_rejected', { ...meta, type: 'http', reason: message, errors });
    }

    const body: ErrorResponseBody = {
      ok: false,
      message,
      requestId: request.requestId,
      ...(errors && { errors }),
    };
    response.status(status).json(body);
  }
}
