/**
 * Application-level errors for HTTP layer mapping.
 * Every error the engine lets escape belongs to one of these categories.
 */
export type ErrorCategory = 'InvalidInput' | 'Unauthorized' | 'Conflict' | 'RateLimited' | 'Unavailable';

export abstract class ApplicationError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidInputError extends ApplicationError {
  readonly category = 'InvalidInput';

  constructor(message = 'Invalid input') {
    super(message);
  }
}

export class UnauthorizedError extends ApplicationError {
  readonly category = 'Unauthorized';

  constructor(message = 'Unauthorized') {
    super(message);
  }
}

export class ConflictError extends ApplicationError {
  readonly category = 'Conflict';

  constructor(message = 'Conflict') {
    super(message);
  }
}

export class RateLimitedError extends ApplicationError {
  readonly category = 'RateLimited';

  constructor(
    public readonly retryAfterSeconds: number,
    message = 'Too many requests, please try again later.'
  ) {
    super(message);
  }
}

export class UnavailableError extends ApplicationError {
  readonly category = 'Unavailable';

  constructor(message = 'Service temporarily unavailable', options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Raised by store adapters when a unique constraint rejects a write.
 */
export class DuplicateRecordError extends Error {
  constructor(
    public readonly entity: string,
    message = `${entity} already exists`
  ) {
    super(message);
    this.name = 'DuplicateRecordError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised by store adapters when an update targets a row that does not exist.
 */
export class RecordNotFoundError extends Error {
  constructor(
    public readonly entity: string,
    message = `${entity} not found`
  ) {
    super(message);
    this.name = 'RecordNotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Runs a store call, re-classifying anything outside the application
 * taxonomy as {@link UnavailableError}. Duplicate and not-found signals are
 * left for the caller to interpret.
 */
export async function storeCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (
      error instanceof ApplicationError ||
      error instanceof DuplicateRecordError ||
      error instanceof RecordNotFoundError
    ) {
      throw error;
    }
    throw new UnavailableError(`${operation} failed`, { cause: error });
  }
}
