import { HttpException, HttpStatus } from '@nestjs/common';
import { ERROR_MESSAGES } from '../constants/error-messages.constant';

/**
 * Error kinds reported in the `error` field of a failed command
 */
export type ErrorKind =
  | 'NotConfigured'
  | 'InvalidCredentials'
  | 'InvalidPhone'
  | 'InvalidCode'
  | 'ExpiredCode'
  | 'InvalidPassword'
  | 'NotAuthenticated'
  | 'TransportError'
  | 'NotFound'
  | 'AmbiguousMatch'
  | 'LockContention'
  | 'CorruptState'
  | 'InvalidState'
  | 'ValidationError'
  | 'InvalidFile'
  | 'InternalError';

/**
 * Base application exception
 * All custom exceptions should extend this class
 */
export class AppException extends HttpException {
  constructor(
    message: string,
    status: HttpStatus,
    public readonly errorCode: ErrorKind,
  ) {
    super(
      {
        success: false,
        message,
        errorCode,
      },
      status,
    );
  }
}

const withDetail = (base: string, detail?: string): string =>
  detail ? `${base}: ${detail}` : base;

// ============================================
// Credential Exceptions
// ============================================

export class NotConfiguredException extends AppException {
  constructor() {
    super(
      ERROR_MESSAGES.CREDENTIALS.NOT_CONFIGURED,
      HttpStatus.PRECONDITION_REQUIRED,
      'NotConfigured',
    );
  }
}

export class InvalidCredentialsException extends AppException {
  constructor(detail?: string) {
    super(
      withDetail(ERROR_MESSAGES.CREDENTIALS.INVALID, detail),
      HttpStatus.BAD_REQUEST,
      'InvalidCredentials',
    );
  }
}

// ============================================
// Authentication Exceptions
// ============================================

export class InvalidPhoneException extends AppException {
  constructor(message: string = ERROR_MESSAGES.AUTH.PHONE_INVALID) {
    super(message, HttpStatus.BAD_REQUEST, 'InvalidPhone');
  }
}

export class InvalidCodeException extends AppException {
  constructor(message: string = ERROR_MESSAGES.AUTH.CODE_INVALID) {
    super(message, HttpStatus.BAD_REQUEST, 'InvalidCode');
  }
}

export class ExpiredCodeException extends AppException {
  constructor() {
    super(ERROR_MESSAGES.AUTH.CODE_EXPIRED, HttpStatus.GONE, 'ExpiredCode');
  }
}

export class InvalidPasswordException extends AppException {
  constructor(message: string = ERROR_MESSAGES.AUTH.PASSWORD_INVALID) {
    super(message, HttpStatus.UNAUTHORIZED, 'InvalidPassword');
  }
}

export class NotAuthenticatedException extends AppException {
  constructor(message: string = ERROR_MESSAGES.AUTH.NOT_AUTHENTICATED) {
    super(message, HttpStatus.UNAUTHORIZED, 'NotAuthenticated');
  }
}

/**
 * Raised when an operation is attempted from a login state that does not allow it
 */
export class InvalidStateException extends AppException {
  constructor(message: string) {
    super(message, HttpStatus.CONFLICT, 'InvalidState');
  }
}

// ============================================
// Contact Exceptions
// ============================================

export class ContactNotFoundException extends AppException {
  constructor(message: string = ERROR_MESSAGES.CONTACT.NOT_FOUND) {
    super(message, HttpStatus.NOT_FOUND, 'NotFound');
  }
}

export class AmbiguousMatchException extends AppException {
  constructor(
    query: string,
    public readonly candidates: ReadonlyArray<{ id: number; name: string }>,
  ) {
    super(
      `${ERROR_MESSAGES.CONTACT.AMBIGUOUS} '${query}': ${candidates
        .map((c) => `${c.name} (${c.id})`)
        .join(', ')}`,
      HttpStatus.CONFLICT,
      'AmbiguousMatch',
    );
  }
}

// ============================================
// Storage Exceptions
// ============================================

export class LockContentionException extends AppException {
  constructor(record: string) {
    super(
      `${ERROR_MESSAGES.STORAGE.LOCKED} ${record}. Try again shortly`,
      HttpStatus.CONFLICT,
      'LockContention',
    );
  }
}

export class CorruptStateException extends AppException {
  constructor(record: string, detail?: string) {
    super(
      withDetail(`${ERROR_MESSAGES.STORAGE.CORRUPT} (${record})`, detail),
      HttpStatus.INTERNAL_SERVER_ERROR,
      'CorruptState',
    );
  }
}

// ============================================
// Transport Exceptions
// ============================================

export class TransportException extends AppException {
  constructor(message: string = ERROR_MESSAGES.TRANSPORT.FAILED) {
    super(message, HttpStatus.BAD_GATEWAY, 'TransportError');
  }
}

// ============================================
// Input Exceptions
// ============================================

export class ValidationException extends AppException {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, HttpStatus.BAD_REQUEST, 'ValidationError');
  }
}

export class InvalidFileException extends AppException {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST, 'InvalidFile');
  }
}

/**
 * Normalizes anything thrown into an AppException
 */
export function toAppException(error: unknown): AppException {
  if (error instanceof AppException) {
    return error;
  }
  const message =
    error instanceof Error && error.message
      ? error.message
      : ERROR_MESSAGES.GENERIC.INTERNAL_ERROR;
  return new AppException(
    message,
    HttpStatus.INTERNAL_SERVER_ERROR,
    'InternalError',
  );
}
