import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { DateError } from '../recurrence/domain/date.error';

/**
 * Turns an unparsable schedule or date into a 400 response carrying the
 * parser's message.
 */
@Catch(DateError)
export class DateErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(DateErrorFilter.name);

  catch(exception: DateError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { method, url } = request;
    const path = url.split('?')[0];
    const status = HttpStatus.BAD_REQUEST;

    this.logger.warn(
      `Request ${method} ${url} failed with status ${status}: ${exception.message}`,
    );

    response.status(status).json({
      statusCode: status,
      message: exception.message,
      path,
      timestamp: new Date().toISOString(),
    });
  }
}
