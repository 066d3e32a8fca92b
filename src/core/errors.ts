export const SERVICE_ERROR_CODES = Object.freeze({
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const);

export type ServiceErrorCode = (typeof SERVICE_ERROR_CODES)[keyof typeof SERVICE_ERROR_CODES];

export class ServiceError extends Error {
  readonly errorCode: ServiceErrorCode;
  readonly httpStatus: number;

  constructor(
    message: string,
    input: { readonly errorCode: ServiceErrorCode; readonly httpStatus: number; readonly cause?: unknown }
  ) {
    super(message, 'cause' in input ? { cause: input.cause } : undefined);
    this.name = 'ServiceError';
    this.errorCode = input.errorCode;
    this.httpStatus = input.httpStatus;
  }
}

/** Raised while wiring things up; fatal to startup. */
export class ConfigurationError extends ServiceError {
  constructor(message: string) {
    super(message, { errorCode: SERVICE_ERROR_CODES.CONFIGURATION_ERROR, httpStatus: 500 });
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string) {
    super(message, { errorCode: SERVICE_ERROR_CODES.NOT_FOUND, httpStatus: 404 });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string) {
    super(message, { errorCode: SERVICE_ERROR_CODES.VALIDATION_ERROR, httpStatus: 422 });
    this.name = 'ValidationError';
  }
}

function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }
  return new ServiceError(asMessage(error), {
    errorCode: SERVICE_ERROR_CODES.INTERNAL_ERROR,
    httpStatus: 500,
    cause: error
  });
}
