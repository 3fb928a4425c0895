import { Test, TestingModule } from '@nestjs/testing';
import { promises as fs } from 'fs';
import { join } from 'path';
import { AppConfigService } from '../../src/common/config/app-config.service';
import {
  ExpiredCodeException,
  InvalidCodeException,
  InvalidPasswordException,
  InvalidPhoneException,
  InvalidStateException,
  NotAuthenticatedException,
  NotConfiguredException,
} from '../../src/common/exceptions/base.exception';
import { CredentialsService } from '../../src/credentials/credentials.service';
import { MESSAGING_TRANSPORT } from '../../src/telegram-client/interfaces/messaging-transport.interface';
import { AuthService } from '../../src/telegram-client/services/auth.service';
import { SessionStoreService } from '../../src/telegram-client/services/session-store.service';
import {
  EXPIRED_CODE,
  FakeTransport,
  TEST_PASSWORD,
  TEST_PHONE,
  TEST_USER,
  VALID_CODE,
} from '../mocks/fake-transport';
import { createConfig, createTempHome, removeTempHome } from '../test.utils';

describe('AuthService', () => {
  let home: string;
  let config: AppConfigService;
  let transport: FakeTransport;
  let service: AuthService;

  const createService = async (
    fake: FakeTransport,
  ): Promise<AuthService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        CredentialsService,
        SessionStoreService,
        { provide: AppConfigService, useValue: config },
        { provide: MESSAGING_TRANSPORT, useValue: fake },
      ],
    }).compile();
    return module.get<AuthService>(AuthService);
  };

  const persistedState = () => new SessionStoreService(config).load();

  const authorize = async () => {
    await service.requestCode(TEST_PHONE);
    await service.submitCode(TEST_PHONE, VALID_CODE);
  };

  beforeEach(async () => {
    home = await createTempHome();
    config = createConfig(home);
    await new CredentialsService(config).save({
      apiId: 12345,
      apiHash: 'test-hash',
    });
    transport = new FakeTransport();
    service = await createService(transport);
  });

  afterEach(async () => {
    await removeTempHome(home);
  });

  describe('unconfigured', () => {
    beforeEach(async () => {
      await fs.rm(join(home, 'credentials.json'));
      service = await createService(transport);
    });

    it('should report not configured', async () => {
      await expect(service.currentStatus()).resolves.toEqual({
        configured: false,
        authenticated: false,
        state: 'unconfigured',
      });
    });

    it('should refuse to request a code', async () => {
      await expect(service.requestCode(TEST_PHONE)).rejects.toBeInstanceOf(
        NotConfiguredException,
      );
      expect(transport.codeRequests).toBe(0);
    });

    it('should not be able to authorize', async () => {
      await expect(
        service.submitCode(TEST_PHONE, VALID_CODE),
      ).rejects.toBeInstanceOf(NotConfiguredException);
      await expect(service.requireAuthorized()).rejects.toBeInstanceOf(
        NotConfiguredException,
      );
    });
  });

  describe('requestCode', () => {
    it('should persist the pending login', async () => {
      await expect(service.requestCode(TEST_PHONE)).resolves.toEqual({
        phoneCodeHash: 'hash-1',
      });

      const state = await persistedState();
      expect(state).toMatchObject({
        kind: 'code_requested',
        phone: TEST_PHONE,
        phoneCodeHash: 'hash-1',
        sessionToken: 'session-0',
      });
      await expect(service.getState()).resolves.toEqual(state);
    });

    it('should reject an empty phone without calling Telegram', async () => {
      await expect(service.requestCode('   ')).rejects.toBeInstanceOf(
        InvalidPhoneException,
      );
      expect(transport.codeRequests).toBe(0);
    });

    it('should propagate a rejected phone number and keep the state', async () => {
      await expect(service.requestCode('5550001111')).rejects.toBeInstanceOf(
        InvalidPhoneException,
      );
      await expect(persistedState()).resolves.toEqual({
        kind: 'unauthenticated',
      });
    });

    it('should allow requesting a new code while one is pending', async () => {
      await service.requestCode(TEST_PHONE);

      await expect(service.requestCode(TEST_PHONE)).resolves.toEqual({
        phoneCodeHash: 'hash-2',
      });
    });

    it('should allow restarting while a password is pending', async () => {
      transport.requirePassword = true;
      await service.requestCode(TEST_PHONE);
      await service.submitCode(TEST_PHONE, VALID_CODE);

      await service.requestCode(TEST_PHONE);

      await expect(persistedState()).resolves.toMatchObject({
        kind: 'code_requested',
        phoneCodeHash: 'hash-2',
      });
    });

    it('should refuse when already authorized', async () => {
      await authorize();

      await expect(service.requestCode(TEST_PHONE)).rejects.toBeInstanceOf(
        InvalidStateException,
      );
    });

    it('should start a new login when the stored session was revoked', async () => {
      await authorize();
      transport.revoked = true;

      await expect(service.requestCode(TEST_PHONE)).resolves.toEqual({
        phoneCodeHash: 'hash-2',
      });

      expect(transport.connectedWith).toEqual([undefined, undefined]);
      await expect(persistedState()).resolves.toMatchObject({
        kind: 'code_requested',
        sessionToken: 'session-0',
      });
    });
  });

  describe('submitCode', () => {
    beforeEach(async () => {
      await service.requestCode(TEST_PHONE);
    });

    it('should authorize with a valid code', async () => {
      await expect(service.submitCode(TEST_PHONE, VALID_CODE)).resolves.toEqual(
        { status: 'authorized', user: TEST_USER },
      );

      await expect(persistedState()).resolves.toMatchObject({
        kind: 'authorized',
        phone: TEST_PHONE,
        sessionToken: 'session-authorized',
        user: TEST_USER,
      });
    });

    it('should keep the login pending after a wrong code', async () => {
      await expect(
        service.submitCode(TEST_PHONE, '99999'),
      ).rejects.toBeInstanceOf(InvalidCodeException);

      await expect(persistedState()).resolves.toMatchObject({
        kind: 'code_requested',
        phoneCodeHash: 'hash-1',
      });
    });

    it('should keep the login pending after an expired code', async () => {
      await expect(
        service.submitCode(TEST_PHONE, EXPIRED_CODE),
      ).rejects.toBeInstanceOf(ExpiredCodeException);

      await expect(persistedState()).resolves.toMatchObject({
        kind: 'code_requested',
      });
    });

    it('should reject an empty code', async () => {
      await expect(service.submitCode(TEST_PHONE, ' ')).rejects.toBeInstanceOf(
        InvalidCodeException,
      );
    });

    it('should accept the phone written differently', async () => {
      await expect(
        service.submitCode('+1 555 000-1111', VALID_CODE),
      ).resolves.toMatchObject({ status: 'authorized' });
    });

    it('should reject a different phone', async () => {
      await expect(
        service.submitCode('+15559999999', VALID_CODE),
      ).rejects.toBeInstanceOf(InvalidPhoneException);
    });

    it('should reject a hash from another request', async () => {
      await expect(
        service.submitCode(TEST_PHONE, VALID_CODE, 'hash-other'),
      ).rejects.toBeInstanceOf(InvalidStateException);
    });

    it('should accept the pending hash passed explicitly', async () => {
      await expect(
        service.submitCode(TEST_PHONE, VALID_CODE, 'hash-1'),
      ).resolves.toMatchObject({ status: 'authorized' });
    });

    it('should ask for the password when 2FA is enabled', async () => {
      transport.requirePassword = true;

      await expect(service.submitCode(TEST_PHONE, VALID_CODE)).resolves.toEqual(
        { status: 'password_required', hint: 'test hint' },
      );
      await expect(persistedState()).resolves.toMatchObject({
        kind: 'password_required',
        phone: TEST_PHONE,
        passwordHint: 'test hint',
      });
    });
  });

  it('should refuse a code when none was requested', async () => {
    await expect(
      service.submitCode(TEST_PHONE, VALID_CODE),
    ).rejects.toBeInstanceOf(InvalidStateException);
  });

  describe('submitPassword', () => {
    beforeEach(async () => {
      transport.requirePassword = true;
      await service.requestCode(TEST_PHONE);
      await service.submitCode(TEST_PHONE, VALID_CODE);
    });

    it('should authorize with the right password', async () => {
      await expect(service.submitPassword(TEST_PASSWORD)).resolves.toEqual({
        status: 'authorized',
        user: TEST_USER,
      });
      await expect(persistedState()).resolves.toMatchObject({
        kind: 'authorized',
        sessionToken: 'session-authorized',
      });
    });

    it('should keep waiting for the password after a wrong one', async () => {
      await expect(service.submitPassword('wrong')).rejects.toBeInstanceOf(
        InvalidPasswordException,
      );
      await expect(persistedState()).resolves.toMatchObject({
        kind: 'password_required',
      });
    });

    it('should reject an empty password', async () => {
      await expect(service.submitPassword('')).rejects.toBeInstanceOf(
        InvalidPasswordException,
      );
    });
  });

  it('should refuse a password when none is pending', async () => {
    await expect(service.submitPassword(TEST_PASSWORD)).rejects.toBeInstanceOf(
      InvalidStateException,
    );
  });

  describe('currentStatus', () => {
    it('should report a pending login as not authenticated', async () => {
      await service.requestCode(TEST_PHONE);

      await expect(service.currentStatus()).resolves.toEqual({
        configured: true,
        authenticated: false,
        state: 'code_requested',
      });
    });

    it('should verify an authorized session', async () => {
      await authorize();

      await expect(service.currentStatus()).resolves.toEqual({
        configured: true,
        authenticated: true,
        state: 'authorized',
        user: TEST_USER,
      });
    });

    it('should report a revoked session without rewriting state', async () => {
      await authorize();
      transport.revoked = true;

      await expect(service.currentStatus()).resolves.toEqual({
        configured: true,
        authenticated: false,
        state: 'authorized',
        sessionRevoked: true,
      });
      await expect(persistedState()).resolves.toMatchObject({
        kind: 'authorized',
      });
    });
  });

  describe('refreshState', () => {
    it('should keep a live session', async () => {
      await authorize();

      await expect(service.refreshState()).resolves.toMatchObject({
        kind: 'authorized',
        user: TEST_USER,
      });
      expect(transport.isConnected()).toBe(true);
    });

    it('should drop a revoked session', async () => {
      await authorize();
      transport.revoked = true;

      await expect(service.refreshState()).resolves.toEqual({
        kind: 'unauthenticated',
      });

      expect(transport.isConnected()).toBe(false);
      await expect(persistedState()).resolves.toEqual({
        kind: 'unauthenticated',
      });
      await expect(service.getState()).resolves.toEqual({
        kind: 'unauthenticated',
      });
    });

    it('should log in again after a revoked session was dropped', async () => {
      await authorize();
      transport.revoked = true;
      await service.refreshState();

      await service.requestCode(TEST_PHONE);

      await expect(
        service.submitCode(TEST_PHONE, VALID_CODE),
      ).resolves.toEqual({ status: 'authorized', user: TEST_USER });
      await expect(service.currentStatus()).resolves.toMatchObject({
        authenticated: true,
      });
    });

    it('should not verify a pending login', async () => {
      await service.requestCode(TEST_PHONE);

      await expect(service.refreshState()).resolves.toMatchObject({
        kind: 'code_requested',
      });
    });
  });

  describe('requireAuthorized', () => {
    it('should throw NotAuthenticated before login', async () => {
      await expect(service.requireAuthorized()).rejects.toBeInstanceOf(
        NotAuthenticatedException,
      );
    });

    it('should reconnect with the stored session in a new process', async () => {
      await authorize();

      const nextTransport = new FakeTransport();
      const nextService = await createService(nextTransport);

      await expect(nextService.requireAuthorized()).resolves.toMatchObject({
        kind: 'authorized',
        user: TEST_USER,
      });
      expect(nextTransport.connectedWith).toEqual(['session-authorized']);
    });
  });

  it('should resume a pending login in a new process', async () => {
    await service.requestCode(TEST_PHONE);

    const nextTransport = new FakeTransport();
    const nextService = await createService(nextTransport);

    await expect(
      nextService.submitCode(TEST_PHONE, VALID_CODE),
    ).resolves.toMatchObject({ status: 'authorized' });
    expect(nextTransport.connectedWith).toEqual(['session-0']);
  });

  describe('logout', () => {
    it('should log out and forget the session', async () => {
      await authorize();

      await expect(service.logout()).resolves.toEqual({ wasAuthorized: true });

      expect(transport.logOutCalls).toBe(1);
      await expect(persistedState()).resolves.toEqual({
        kind: 'unauthenticated',
      });
      await expect(service.currentStatus()).resolves.toMatchObject({
        authenticated: false,
        state: 'unauthenticated',
      });
    });

    it('should clear the session even when Telegram fails', async () => {
      await authorize();
      transport.failLogOut = true;

      await expect(service.logout()).resolves.toEqual({ wasAuthorized: true });
      await expect(persistedState()).resolves.toEqual({
        kind: 'unauthenticated',
      });
    });

    it('should only clear a pending login', async () => {
      await service.requestCode(TEST_PHONE);

      await expect(service.logout()).resolves.toEqual({ wasAuthorized: false });

      expect(transport.logOutCalls).toBe(0);
      await expect(persistedState()).resolves.toEqual({
        kind: 'unauthenticated',
      });
    });
  });
});
