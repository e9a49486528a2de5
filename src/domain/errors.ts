/**
 * Base class for errors the service surfaces to its callers.
 * `statusCode` is the HTTP status the routes answer with.
 */
export class ActivationError extends Error {
  constructor(message: string, public readonly code: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = new.target.name;
  }
}

/** A rule or event slice is structurally invalid. `field` is the offending path. */
export class ValidationError extends ActivationError {
  constructor(message: string, public readonly field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class NotFoundError extends ActivationError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

/** The resource changed between read and write. */
export class ConflictError extends ActivationError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}
