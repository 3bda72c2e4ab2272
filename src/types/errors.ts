// =============================================================================
// PATHGUARD — Error Taxonomy
//
// Every error raised by the administration layer or the configuration
// boundary carries a machine-readable code and the HTTP status the API
// answers with. The deriver and evaluator never raise.
// =============================================================================

export const ErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export abstract class PathguardError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed tag vocabulary. Fatal at startup. */
export class ConfigurationError extends PathguardError {
  readonly code = ErrorCodes.CONFIGURATION_ERROR;
  readonly status = 500;
}

export class ValidationError extends PathguardError {
  readonly code = ErrorCodes.VALIDATION_ERROR;
  readonly status = 400;

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

export class AuthenticationError extends PathguardError {
  readonly code = ErrorCodes.UNAUTHORIZED;
  readonly status = 401;
}

export class AuthorizationError extends PathguardError {
  readonly code = ErrorCodes.FORBIDDEN;
  readonly status = 403;
}

export class NotFoundError extends PathguardError {
  readonly code = ErrorCodes.NOT_FOUND;
  readonly status = 404;
}

/** Message of an unknown thrown value, for logs and wrapped errors */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
