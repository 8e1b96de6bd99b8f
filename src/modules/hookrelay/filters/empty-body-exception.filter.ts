import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { toError } from '../../../core';

/**
 * Renders every error as a bare status code
 *
 * Unexpected exceptions become 500 and are logged.
 */
@Catch()
export class EmptyBodyExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(EmptyBodyExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    let status: number;
    if (exception instanceof HttpException) {
      status = exception.getStatus();
    } else {
      const error = toError(exception);
      this.logger.error(`Unhandled error: ${error.message}`, error.stack);
      status = HttpStatus.INTERNAL_SERVER_ERROR;
    }

    if (response.headersSent) {
      response.end();
      return;
    }
    response.status(status).end();
  }
}
