// =============================================================================
// PUBLISHING DESK — Error Taxonomy
//
// Every rejection the service produces maps to one of these classes.
// The central error handler translates them to HTTP status + code.
// =============================================================================

export type ErrorCode =
  | 'UNAUTHENTICATED'
  | 'FORBIDDEN'
  | 'INVALID_TRANSITION'
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR';

export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: ErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing, malformed, expired or tampered credentials. */
export class UnauthenticatedError extends AppError {
  readonly status = 401;
  readonly code = 'UNAUTHENTICATED' as const;
}

/**
 * Authenticated but not allowed. Always recorded as ACCESS_DENIED
 * before the response is sent.
 */
export class ForbiddenError extends AppError {
  readonly status = 403;
  readonly code = 'FORBIDDEN' as const;

  constructor(
    message: string,
    readonly permission?: string,
    readonly reason: 'missing_permission' | 'not_owner' = 'missing_permission',
  ) {
    super(message);
  }
}

/** Workflow precondition not met. No mutation, no audit entry. */
export class InvalidTransitionError extends AppError {
  readonly status = 409;
  readonly code = 'INVALID_TRANSITION' as const;

  constructor(
    message: string,
    readonly from: string,
    readonly action: string,
  ) {
    super(message);
  }
}

/** Duplicate unique identity (username, email, category name). */
export class ConflictError extends AppError {
  readonly status = 409;
  readonly code = 'CONFLICT' as const;
}

export class NotFoundError extends AppError {
  readonly status = 404;
  readonly code = 'NOT_FOUND' as const;
}

export class ValidationError extends AppError {
  readonly status = 400;
  readonly code = 'VALIDATION_ERROR' as const;
}
