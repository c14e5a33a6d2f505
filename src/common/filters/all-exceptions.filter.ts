import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { FetchError, ParseError } from '../../modules/cricket/errors/feed.errors';

interface ErrorDetails {
  name: string;
  message: string;
  upstreamStatus?: number | null;
  datapath?: string;
  stack?: string;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const requestId = request.headers['x-request-id'] || 'unknown';

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let error: ErrorDetails | object | null = null;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else {
        const responseMessage: unknown = Reflect.get(exceptionResponse, 'message');
        if (typeof responseMessage === 'string') {
          message = responseMessage;
        } else if (Array.isArray(responseMessage)) {
          message = responseMessage.join(', ');
        }
        error = exceptionResponse;
      }
    } else if (exception instanceof FetchError) {
      // The upstream feed is at fault, not this service
      status = HttpStatus.BAD_GATEWAY;
      message = exception.message;
      error = { name: exception.name, message: exception.message, upstreamStatus: exception.status };
    } else if (exception instanceof ParseError) {
      status = HttpStatus.BAD_GATEWAY;
      message = exception.message;
      error = { name: exception.name, message: exception.message, datapath: exception.datapath };
    } else if (exception instanceof Error) {
      message = exception.message;
      error = {
        name: exception.name,
        message: exception.message,
        stack: process.env.NODE_ENV === 'development' ? exception.stack : undefined,
      };
    }

    const errorResponse = {
      success: false,
      statusCode: status,
      message,
      error: error || message,
      requestId,
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    // Log error
    if (status >= 500) {
      this.logger.error(
        `${request.method} ${request.url} - ${status} - ${message}`,
        exception instanceof Error ? exception.stack : JSON.stringify(exception),
        'ExceptionFilter',
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - ${status} - ${message}`,
        'ExceptionFilter',
      );
    }

    response.status(status).json(errorResponse);
  }
}
