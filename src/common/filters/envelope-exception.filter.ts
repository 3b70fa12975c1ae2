import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { DatabaseError } from '../database/database.error';
import { exposeErrorDetails } from '../config/app-config';
import { errorMessage, errorStack } from '../errors';
import { createEnvelope } from '../response/envelope';

const GENERIC_FAILURE_MESSAGE = 'Internal server error';

function httpExceptionMessage(exception: HttpException): string {
  const payload = exception.getResponse();
  if (typeof payload === 'string') {
    return payload;
  }
  if (typeof payload === 'object' && payload !== null && 'message' in payload) {
    const { message } = payload;
    if (Array.isArray(message)) {
      return message.map(String).join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return exception.message;
}

/** Renders every failure in the response envelope with `body.code` set to the HTTP status. */
@Catch()
@Injectable()
export class EnvelopeExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('ExceptionFilter');

  constructor(private readonly configService: ConfigService) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    let status: number;
    let message: string;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = httpExceptionMessage(exception);
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`[${request.method}] ${request.originalUrl} - ${status}: ${message}`, exception.stack);
      } else {
        this.logger.warn(`[${request.method}] ${request.originalUrl} - ${status}: ${message}`);
      }
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      const detail = exception instanceof DatabaseError
        ? `Database ${exception.action} on ${exception.table} failed: ${exception.message}`
        : errorMessage(exception);
      this.logger.error(`[${request.method}] ${request.originalUrl} - ${status}: ${detail}`, errorStack(exception));
      message = detail;
    }

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR && !exposeErrorDetails(this.configService)) {
      message = GENERIC_FAILURE_MESSAGE;
    }

    response.status(status).json(createEnvelope(null, message, status));
  }
}
