import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ApiErrorResponse } from '../types/api-response';

function describeHttpException(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') return body;
  if ('message' in body) {
    const { message } = body;
    if (Array.isArray(message)) return message.join(', ');
    if (typeof message === 'string') return message;
  }
  return JSON.stringify(body);
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const errorMsg =
      exception instanceof HttpException
        ? describeHttpException(exception)
        : 'Internal server error';

    if (status >= 500) {
      const detail = exception instanceof Error ? exception.message : errorMsg;
      this.logger.error(
        `[${request.method} ${request.url}] Internal Server Error: ${detail}`,
        exception instanceof Error ? exception.stack : '',
      );
    } else if (status >= 400) {
      this.logger.warn(
        `[${request.method} ${request.url}] Client Error (${status}): ${errorMsg}`,
      );
    }
    response.locals.errorMessage = errorMsg;

    const body: ApiErrorResponse = {
      success: false,
      result: null,
      error: errorMsg,
      path: request.url,
      timestamp: new Date().toISOString(),
    };
    // A handler may already have set headers for the body it meant to send
    response.removeHeader('Content-Disposition');
    response.status(status).type('json').json(body);
  }
}
