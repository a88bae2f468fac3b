/**
 * Domain error taxonomy
 *
 * Every error a service raises on purpose extends AppError, which carries the
 * HTTP status and the machine readable code the error middleware responds with.
 * Anything else reaching the middleware is treated as an infrastructure failure.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** Malformed or out-of-range input */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/** Missing, invalid or expired credentials */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Could not validate credentials') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'AuthenticationError';
  }
}

/** Role is not allowed to perform the action */
export class AuthorizationError extends AppError {
  constructor(message: string = 'You are not allowed to perform this action') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** Uniqueness violation (username, email, product name) */
export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 409, 'CONFLICT', details);
    this.name = 'ConflictError';
  }
}

/** Operation not permitted in the entity's current status */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 409, 'INVALID_STATE', details);
    this.name = 'InvalidStateError';
  }
}

/** Requested status change is not an edge of the order state machine */
export class InvalidTransitionError extends AppError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`Cannot move order from '${from}' to '${to}'`, 409, 'INVALID_TRANSITION', { from, to });
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}
