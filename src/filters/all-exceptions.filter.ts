import {
  ArgumentsHost,
  Catch,
  HttpException,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { Request } from 'express';
import { errorMessage } from '../helpers/error-message';

/**
 * HTTP errors pass through unchanged. Anything else (usually a document
 * store failure) is logged with the request it broke and answered with a
 * plain 500.
 */
@Catch()
export class AllExceptionsFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    if (exception instanceof HttpException) {
      super.catch(exception, host);
      return;
    }

    const request = host.switchToHttp().getRequest<Request>();
    this.logger.error(
      `Unhandled error in ${request.method} ${request.originalUrl}: ${errorMessage(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    super.catch(new InternalServerErrorException(), host);
  }
}
