import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  ConfigurationError,
  RequestValidationError,
  UnauthorizedError,
  UpstreamDomainError,
  UpstreamTransferError,
  errorMessage,
} from './errors';

export const BASIC_AUTH_CHALLENGE = 'Basic realm="Login Required"';

export interface ErrorResponse {
  status: number;
  message: string;
  headers: Record<string, string>;
}

/** Map an upstream transfer failure onto the status the caller sees. */
function fromTransferError(err: UpstreamTransferError): ErrorResponse {
  switch (err.statusCode) {
    case HttpStatus.FORBIDDEN:
      return { status: HttpStatus.FORBIDDEN, message: 'Invalid Polygon.io API key', headers: {} };
    case HttpStatus.NOT_FOUND:
      return { status: HttpStatus.NOT_FOUND, message: 'Ticker not found', headers: {} };
    default:
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Error fetching stock data',
        headers: {},
      };
  }
}

export function toErrorResponse(exception: unknown): ErrorResponse {
  if (exception instanceof UnauthorizedError) {
    return {
      status: HttpStatus.UNAUTHORIZED,
      message: exception.message,
      headers: { 'WWW-Authenticate': BASIC_AUTH_CHALLENGE },
    };
  }
  if (exception instanceof ConfigurationError) {
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: exception.message, headers: {} };
  }
  if (exception instanceof RequestValidationError || exception instanceof UpstreamDomainError) {
    return { status: HttpStatus.BAD_REQUEST, message: exception.message, headers: {} };
  }
  if (exception instanceof UpstreamTransferError) {
    return fromTransferError(exception);
  }
  if (exception instanceof HttpException) {
    return { status: exception.getStatus(), message: exception.message, headers: {} };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    message: `Internal server error: ${errorMessage(exception)}`,
    headers: {},
  };
}

/**
 * Global filter: every failure becomes `{ error: "<message>" }` with the
 * status from {@link toErrorResponse}. Nothing is written before this runs,
 * so a response is either a complete image or an error body.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, message, headers } = toErrorResponse(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${status} ${message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    for (const [name, value] of Object.entries(headers)) {
      res.setHeader(name, value);
    }
    res.status(status).json({ error: message });
  }
}
