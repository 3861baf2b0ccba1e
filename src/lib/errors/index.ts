export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    isOperational: boolean = true
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static validation(message: string): ValidationError {
    return new ValidationError(message);
  }

  static unauthorized(message: string): AuthenticationError {
    return new AuthenticationError(message);
  }

  static forbidden(message: string): AuthorizationError {
    return new AuthorizationError(message);
  }

  static invalidRule(message: string, fields: readonly RuleField[] = []): InvalidRuleError {
    return new InvalidRuleError(message, fields);
  }

  static sourceUnavailable(sourceName: string, cause?: unknown): SourceUnavailableError {
    return new SourceUnavailableError(sourceName, cause);
  }

  static internal(message: string = 'Internal server error'): InternalError {
    return new InternalError(message);
  }
}

export type RuleField = 'fromLocation' | 'toLocation' | 'condition';

export class ValidationError extends AppError {
  constructor(
    message: string,
    code: string = 'VALIDATION_ERROR',
    statusCode: number = 400
  ) {
    super(message, code, statusCode, true);
  }
}

export class AuthenticationError extends AppError {
  constructor(
    message: string,
    code: string = 'AUTHENTICATION_ERROR',
    statusCode: number = 401
  ) {
    super(message, code, statusCode, true);
  }
}

export class AuthorizationError extends AppError {
  constructor(
    message: string,
    code: string = 'AUTHORIZATION_ERROR',
    statusCode: number = 403
  ) {
    super(message, code, statusCode, true);
  }
}

/**
 * A navigation rule with an empty origin, destination or condition.
 * Raised when a source is loaded and when a rule is created.
 */
export class InvalidRuleError extends ValidationError {
  public readonly fields: readonly RuleField[];

  constructor(message: string, fields: readonly RuleField[] = []) {
    super(message, 'INVALID_RULE', 400);
    this.fields = fields;
  }
}

/**
 * A rule source failed to answer (store error, timeout, open circuit).
 * Never conflated with an unresolved navigation.
 */
export class SourceUnavailableError extends AppError {
  public readonly sourceName: string;
  public readonly cause: unknown;

  constructor(sourceName: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Rule source "${sourceName}" is unavailable${reason}`, 'SOURCE_UNAVAILABLE', 503, true);
    this.sourceName = sourceName;
    this.cause = cause;
  }
}

export class InternalError extends AppError {
  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    statusCode: number = 500,
    isOperational: boolean = false
  ) {
    super(message, code, statusCode, isOperational);
  }
}
