import { HttpException, HttpStatus } from '@nestjs/common';

export type AuthErrorCode =
  | 'INVALID_CREDENTIALS'
  | 'INACTIVE_USER'
  | 'DUPLICATE_EMAIL'
  | 'NOT_FOUND'
  | 'EXPIRED_TOKEN'
  | 'REVOKED_TOKEN'
  | 'BAD_SIGNATURE'
  | 'MALFORMED_TOKEN'
  | 'WRONG_TOKEN_TYPE'
  | 'FORBIDDEN'
  | 'VALIDATION_FAILED'
  | 'UNAVAILABLE'
  | 'INTERNAL';

/**
 * Body sent to clients for every domain error
 */
export interface AuthErrorBody {
  statusCode: number;
  error: AuthErrorCode;
  message: string;
}

/**
 * Base class of the error taxonomy.
 *
 * Each subclass is an HttpException, so Nest's default exception filter maps it
 * to its status and the stable `{ statusCode, error, message }` body.
 */
export abstract class AuthError extends HttpException {
  protected constructor(
    readonly code: AuthErrorCode,
    message: string,
    status: HttpStatus,
  ) {
    const body: AuthErrorBody = { statusCode: status, error: code, message };
    super(body, status);
  }
}

export class InvalidCredentialsError extends AuthError {
  constructor() {
    super('INVALID_CREDENTIALS', 'Invalid email or password', HttpStatus.UNAUTHORIZED);
  }
}

export class InactiveUserError extends AuthError {
  constructor() {
    super('INACTIVE_USER', 'Account is inactive', HttpStatus.FORBIDDEN);
  }
}

export class DuplicateEmailError extends AuthError {
  constructor() {
    super('DUPLICATE_EMAIL', 'User with this email already exists', HttpStatus.CONFLICT);
  }
}

export class NotFoundError extends AuthError {
  constructor(message = 'Resource not found') {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND);
  }
}

export class ExpiredTokenError extends AuthError {
  constructor() {
    super('EXPIRED_TOKEN', 'Token has expired', HttpStatus.UNAUTHORIZED);
  }
}

export class RevokedTokenError extends AuthError {
  constructor() {
    super('REVOKED_TOKEN', 'Token has been revoked', HttpStatus.UNAUTHORIZED);
  }
}

export class BadSignatureError extends AuthError {
  constructor() {
    super('BAD_SIGNATURE', 'Token signature is invalid', HttpStatus.UNAUTHORIZED);
  }
}

export class MalformedTokenError extends AuthError {
  constructor(message = 'Token is malformed') {
    super('MALFORMED_TOKEN', message, HttpStatus.UNAUTHORIZED);
  }
}

export class WrongTokenTypeError extends AuthError {
  constructor(expected: string) {
    super('WRONG_TOKEN_TYPE', `Token type must be ${expected}`, HttpStatus.UNAUTHORIZED);
  }
}

export class ForbiddenError extends AuthError {
  constructor(message = 'Access denied') {
    super('FORBIDDEN', message, HttpStatus.FORBIDDEN);
  }
}

export class ValidationError extends AuthError {
  constructor(message: string) {
    super('VALIDATION_FAILED', message, HttpStatus.BAD_REQUEST);
  }
}

export class UnavailableError extends AuthError {
  constructor(message = 'Identity store is unavailable') {
    super('UNAVAILABLE', message, HttpStatus.SERVICE_UNAVAILABLE);
  }
}

export class InternalError extends AuthError {
  constructor(message = 'Internal error') {
    super('INTERNAL', message, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
