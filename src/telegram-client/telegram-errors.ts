import { FloodWaitError } from 'telegram/errors';
import { ERROR_MESSAGES } from '../common/constants/error-messages.constant';
import {
  AppException,
  ExpiredCodeException,
  InvalidCodeException,
  InvalidCredentialsException,
  InvalidPasswordException,
  InvalidPhoneException,
  NotAuthenticatedException,
  TransportException,
} from '../common/exceptions/base.exception';

type ErrorRule = {
  codes: string[];
  toException: (text: string) => AppException;
};

// Order matters: the first rule whose code appears in the error text wins
const ERROR_RULES: ErrorRule[] = [
  {
    codes: ['PHONE_NUMBER_INVALID', 'PHONE_NUMBER_BANNED', 'PHONE_NUMBER_FLOOD'],
    toException: (text) =>
      new InvalidPhoneException(`${ERROR_MESSAGES.AUTH.PHONE_INVALID} (${text})`),
  },
  {
    codes: ['PHONE_CODE_EXPIRED'],
    toException: () => new ExpiredCodeException(),
  },
  {
    codes: ['PHONE_CODE_INVALID', 'PHONE_CODE_EMPTY'],
    toException: () => new InvalidCodeException(),
  },
  {
    codes: ['PASSWORD_HASH_INVALID'],
    toException: () => new InvalidPasswordException(),
  },
  {
    codes: ['API_ID_INVALID', 'API_ID_PUBLISHED_FLOOD'],
    toException: (text) =>
      new InvalidCredentialsException(
        `${ERROR_MESSAGES.CREDENTIALS.REJECTED} (${text})`,
      ),
  },
  {
    codes: [
      'AUTH_KEY_UNREGISTERED',
      'SESSION_REVOKED',
      'SESSION_EXPIRED',
      'USER_DEACTIVATED',
    ],
    toException: () =>
      new NotAuthenticatedException(ERROR_MESSAGES.AUTH.SESSION_REVOKED),
  },
];

/**
 * Best-effort text of anything thrown by gramjs
 */
export function errorText(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Whether the error means the stored session is no longer authorized
 */
export function isSessionInvalid(error: unknown): boolean {
  return mapTelegramError(error) instanceof NotAuthenticatedException;
}

/**
 * Maps Telegram RPC failures onto the application error taxonomy.
 * Anything unrecognised (network, rate limit, server errors) is a TransportError.
 */
export function mapTelegramError(error: unknown): AppException {
  if (error instanceof AppException) {
    return error;
  }

  if (error instanceof FloodWaitError) {
    return new TransportException(
      `${ERROR_MESSAGES.TRANSPORT.RATE_LIMITED}: retry in ${error.seconds}s`,
    );
  }

  const text = errorText(error);
  for (const rule of ERROR_RULES) {
    const code = rule.codes.find((candidate) => text.includes(candidate));
    if (code) {
      return rule.toException(code);
    }
  }

  if (text.includes('FLOOD_WAIT')) {
    return new TransportException(
      `${ERROR_MESSAGES.TRANSPORT.RATE_LIMITED} (${text})`,
    );
  }

  return new TransportException(`${ERROR_MESSAGES.TRANSPORT.FAILED}: ${text}`);
}

/**
 * Rejects with a TransportError when `promise` does not settle in time
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new TransportException(
          `${ERROR_MESSAGES.TRANSPORT.TIMEOUT} (${label}, ${timeoutMs}ms)`,
        ),
      );
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
