/**
 * Error taxonomy for the chart endpoint. `ApiExceptionFilter` turns each
 * class into a status code and a `{ error }` body.
 */

/** A required secret or setting is missing. Fatal for the request (500). */
export class ConfigurationError extends Error {
  readonly setting: string;

  constructor(setting: string) {
    super(`${setting} not configured`);
    this.name = 'ConfigurationError';
    this.setting = setting;
  }
}

/** Bad query input the caller can correct (400). */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

/** Missing or wrong Basic credentials (401 with a challenge). */
export class UnauthorizedError extends Error {
  constructor() {
    super('Unauthorized');
    this.name = 'UnauthorizedError';
  }
}

/**
 * The market-data provider answered with a non-2xx status, or could not be
 * reached at all (`statusCode` undefined).
 */
export class UpstreamTransferError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'UpstreamTransferError';
    this.statusCode = statusCode;
  }
}

/** The provider answered 2xx but the payload carries no usable data (400). */
export class UpstreamDomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UpstreamDomainError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
