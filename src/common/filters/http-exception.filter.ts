import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { createLogger } from '../utils/logger';
import { BACKEND_ERROR_MESSAGE, INVALID_PAYLOAD_MESSAGE } from '../constants/error-messages.constants';

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = createLogger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;

    const message =
      exception instanceof HttpException ? this.safeHttpMessage(exception) : BACKEND_ERROR_MESSAGE;

    if (status >= 500) {
      this.logger.error('unhandled_exception', exception instanceof Error ? exception : undefined, {
        event: 'unhandled_exception',
        path: request.path,
        request_id: request.requestId,
        status,
      });
    }

    const details = exception instanceof HttpException ? this.readDetails(exception) : undefined;

    response.status(status).json({
      ok: false,
      message,
      requestId: request.requestId,
      ...(details ? { details } : {}),
    });
  }

  private readDetails(exception: HttpException): Record<string, unknown> | undefined {
    const response = exception.getResponse();

    if (
      typeof response === 'object' &&
      response !== null &&
      'details' in response &&
      typeof response.details === 'object' &&
      response.details !== null &&
      !Array.isArray(response.details)
    ) {
      return { ...response.details };
    }

    return undefined;
  }

  private safeHttpMessage(exception: HttpException): string {
    const response = exception.getResponse();

    if (typeof response === 'string') {
      return response;
    }

    if (
      typeof response === 'object' &&
      response !== null &&
      'message' in response &&
      typeof response.message === 'string'
    ) {
      return response.message;
    }

    if (exception.getStatus() === HttpStatus.BAD_REQUEST) {
      return INVALID_PAYLOAD_MESSAGE;
    }

    return BACKEND_ERROR_MESSAGE;
  }
}
