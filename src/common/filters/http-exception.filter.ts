import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

interface ReplyLike {
  status(code: number): { json(body: unknown): unknown };
}

interface RequestLike {
  url: string;
}

// Renders every error as HttpExceptionResponse. Unknown errors become 500s.
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<ReplyLike>();
    const request = http.getRequest<RequestLike>();

    const body = this.toBody(exception);
    body.timestamp = new Date().toISOString();
    body.path = request.url;

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`${request.url} failed: ${String(body.message)}`, stack);
    }

    response.status(body.statusCode).json(body);
  }

  private toBody(exception: unknown): HttpExceptionResponse {
    if (!(exception instanceof HttpException)) {
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Internal server error',
        error: 'InternalServerError',
      };
    }

    const statusCode = exception.getStatus();
    const payload = exception.getResponse();

    if (typeof payload === 'string') {
      return { statusCode, message: payload, error: exception.name };
    }

    const message = 'message' in payload ? payload.message : exception.message;
    const error = 'error' in payload ? payload.error : exception.name;
    return {
      statusCode,
      message: Array.isArray(message) ? message.map(String) : String(message),
      error: String(error),
    };
  }
}
