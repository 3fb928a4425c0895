import {
  ExpiredCodeException,
  InvalidCodeException,
  InvalidCredentialsException,
  InvalidPasswordException,
  InvalidPhoneException,
  NotAuthenticatedException,
  TransportException,
} from '../../src/common/exceptions/base.exception';
import {
  isSessionInvalid,
  mapTelegramError,
  withTimeout,
} from '../../src/telegram-client/telegram-errors';

const rpcError = (code: string) =>
  new Error(`400: ${code} (caused by auth.SignIn)`);

describe('telegram errors', () => {
  describe('mapTelegramError', () => {
    it('should map login failures', () => {
      expect(mapTelegramError(rpcError('PHONE_CODE_INVALID'))).toBeInstanceOf(
        InvalidCodeException,
      );
      expect(mapTelegramError(rpcError('PHONE_CODE_EXPIRED'))).toBeInstanceOf(
        ExpiredCodeException,
      );
      expect(mapTelegramError(rpcError('PASSWORD_HASH_INVALID'))).toBeInstanceOf(
        InvalidPasswordException,
      );
    });

    it('should name the rejected phone code', () => {
      const error = mapTelegramError(rpcError('PHONE_NUMBER_INVALID'));

      expect(error).toBeInstanceOf(InvalidPhoneException);
      expect(error.message).toBe(
        'Phone number was rejected by Telegram (PHONE_NUMBER_INVALID)',
      );
    });

    it('should map rejected API credentials', () => {
      expect(mapTelegramError(rpcError('API_ID_INVALID'))).toBeInstanceOf(
        InvalidCredentialsException,
      );
    });

    it('should map revoked sessions', () => {
      const error = mapTelegramError(new Error('401: AUTH_KEY_UNREGISTERED'));

      expect(error).toBeInstanceOf(NotAuthenticatedException);
      expect(error.message).toBe(
        'Session expired or was revoked. Please re-authenticate',
      );
    });

    it('should report flood waits as rate limiting', () => {
      expect(mapTelegramError(new Error('420: FLOOD_WAIT_30')).message).toBe(
        'Rate limited by Telegram (420: FLOOD_WAIT_30)',
      );
    });

    it('should report anything else as a transport failure', () => {
      const error = mapTelegramError('connection reset');

      expect(error).toBeInstanceOf(TransportException);
      expect(error.message).toBe('Telegram request failed: connection reset');
    });

    it('should pass application errors through', () => {
      const error = new InvalidCodeException();

      expect(mapTelegramError(error)).toBe(error);
    });
  });

  describe('isSessionInvalid', () => {
    it('should detect revoked sessions only', () => {
      expect(isSessionInvalid(new Error('401: SESSION_REVOKED'))).toBe(true);
      expect(isSessionInvalid(new Error('500: INTERNAL'))).toBe(false);
    });
  });

  describe('withTimeout', () => {
    it('should resolve with the value', async () => {
      await expect(withTimeout(Promise.resolve(5), 1000, 'test')).resolves.toBe(5);
    });

    it('should reject with a TransportError when too slow', async () => {
      const never = new Promise<never>(() => undefined);

      await expect(withTimeout(never, 10, 'messages.GetDialogs')).rejects.toThrow(
        new TransportException(
          'Telegram request timed out (messages.GetDialogs, 10ms)',
        ),
      );
    });
  });
});
