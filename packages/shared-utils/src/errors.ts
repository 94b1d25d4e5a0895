export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode = 500, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super('NOT_FOUND', id ? `${resource} not found: ${id}` : `${resource} not found`, 404, { resource, id });
  }
}

/**
 * A recognised request the system deliberately does not handle yet. Kept apart
 * from {@link ValidationError} so callers can say "not yet supported" instead
 * of reporting bad input.
 */
export class NotImplementedError extends AppError {
  constructor(message: string, details?: unknown) {
    super('NOT_IMPLEMENTED', message, 501, details);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, details?: unknown) {
    super('EXTERNAL_SERVICE_ERROR', `${service}: ${message}`, 502, { service, ...toRecord(details) });
  }
}

function toRecord(details: unknown): Record<string, unknown> {
  if (details && typeof details === 'object' && !Array.isArray(details)) {
    return Object.fromEntries(Object.entries(details));
  }
  return details === undefined ? {} : { cause: details };
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AppError('INTERNAL_ERROR', message || 'Internal server error', 500);
}
