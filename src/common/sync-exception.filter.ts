import { Catch, HttpStatus, Logger } from '@nestjs/common';
import type { ArgumentsHost, ExceptionFilter } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { SyncError } from './errors.js';
import type { SyncErrorCode } from './errors.js';

const STATUS_BY_CODE: Record<SyncErrorCode, HttpStatus> = {
  UPSTREAM_UNAVAILABLE: HttpStatus.BAD_GATEWAY,
  UPSTREAM_RATE_LIMITED: HttpStatus.TOO_MANY_REQUESTS,
  UPSTREAM_NOT_FOUND: HttpStatus.NOT_FOUND,
  MALFORMED_URL: HttpStatus.BAD_REQUEST,
  MALFORMED_INPUT: HttpStatus.BAD_REQUEST,
  OWNERSHIP_MISMATCH: HttpStatus.BAD_REQUEST,
  PERSISTENCE_CONFLICT: HttpStatus.CONFLICT,
  RECORD_NOT_FOUND: HttpStatus.NOT_FOUND,
  ACCOUNT_ALREADY_MONITORED: HttpStatus.CONFLICT,
  SYNC_IN_PROGRESS: HttpStatus.CONFLICT,
  JOB_TIMEOUT: HttpStatus.GATEWAY_TIMEOUT,
  JOB_REVOKED: HttpStatus.CONFLICT,
  QUEUE_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
};

export function httpStatusFor(error: SyncError): HttpStatus {
  return STATUS_BY_CODE[error.code];
}

/** Renders core errors as JSON; Nest's own HttpExceptions keep the default handling. */
@Catch(SyncError)
export class SyncExceptionFilter implements ExceptionFilter<SyncError> {
  private readonly logger = new Logger(SyncExceptionFilter.name);

  catch(error: SyncError, host: ArgumentsHost) {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const status = httpStatusFor(error);

    if (status >= 500) {
      this.logger.error(`${error.name}: ${error.message}`, error.stack);
    }

    void reply.status(status).send({
      statusCode: status,
      error: error.code,
      message: error.message,
    });
  }
}
