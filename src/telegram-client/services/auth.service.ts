import { Inject, Injectable, Logger } from '@nestjs/common';
import { ERROR_MESSAGES } from '../../common/constants/error-messages.constant';
import {
  InvalidCodeException,
  InvalidPasswordException,
  InvalidPhoneException,
  InvalidStateException,
  NotAuthenticatedException,
  NotConfiguredException,
} from '../../common/exceptions/base.exception';
import { RecordUpdate } from '../../common/storage/json-record.store';
import { CredentialsService } from '../../credentials/credentials.service';
import { Credentials } from '../../credentials/interfaces/credentials.interface';
import {
  AuthState,
  AuthStatus,
  AuthorizedState,
  SessionState,
  SignInOutcome,
} from '../interfaces/auth-state.interface';
import { UserInfo } from '../interfaces/contact.interface';
import {
  MESSAGING_TRANSPORT,
  MessagingTransport,
} from '../interfaces/messaging-transport.interface';
import { SessionStoreService, UNAUTHENTICATED } from './session-store.service';

const normalizePhone = (phone: string): string => phone.replace(/[\s()-]/g, '');

/**
 * Authentication Service for Telegram Client
 * Drives the phone login state machine:
 *
 *   unconfigured -> unauthenticated -> code_requested -> authorized
 *                                                     \-> password_required -> authorized
 *
 * Each transition is one locked read-modify-write of session.json and is
 * persisted before the method returns.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private state: AuthState | null = null;

  constructor(
    private readonly credentialsService: CredentialsService,
    private readonly sessionStore: SessionStoreService,
    @Inject(MESSAGING_TRANSPORT)
    private readonly transport: MessagingTransport,
  ) {}

  /**
   * Current login state. Once credentials exist the session state is
   * loaded once and cached for the process lifetime.
   */
  async getState(): Promise<AuthState> {
    if (this.state) {
      return this.state;
    }
    if (!(await this.credentialsService.isConfigured())) {
      return { kind: 'unconfigured' };
    }
    this.state = await this.sessionStore.load();
    return this.state;
  }

  /**
   * Like getState, but an authorized session is first verified against
   * Telegram. A revoked session is dropped and the state returns to
   * unauthenticated so the login can start over.
   */
  async refreshState(): Promise<AuthState> {
    const state = await this.getState();
    if (state.kind !== 'authorized') {
      return state;
    }
    const credentials = await this.credentialsService.load();
    if (await this.isSessionAlive(credentials, state)) {
      return state;
    }

    this.logger.warn('Stored session was revoked, clearing it');
    const next = await this.transition<SessionState>(async (current) => {
      // another process may have logged in again meanwhile
      if (
        current.kind === 'authorized' &&
        current.sessionToken === state.sessionToken
      ) {
        return { next: UNAUTHENTICATED, result: UNAUTHENTICATED };
      }
      return { result: current };
    });
    this.state = next;
    await this.transport.disconnect();
    return next;
  }

  /**
   * Ask Telegram to send a login code to `phone`
   * @returns Hash that has to accompany the code
   */
  async requestCode(phone: string): Promise<{ phoneCodeHash: string }> {
    const trimmed = phone.trim();
    if (!trimmed) {
      throw new InvalidPhoneException(ERROR_MESSAGES.AUTH.PHONE_REQUIRED);
    }
    const credentials = await this.credentialsService.load();

    return this.transition(async (current) => {
      let sessionToken = current.sessionToken;
      if (current.kind === 'authorized') {
        if (await this.isSessionAlive(credentials, current)) {
          throw new InvalidStateException(
            ERROR_MESSAGES.AUTH.ALREADY_AUTHORIZED,
          );
        }
        this.logger.warn('Stored session was revoked, starting a new login');
        await this.transport.disconnect();
        sessionToken = undefined;
      }

      await this.ensureConnected(credentials, sessionToken);
      const { phoneCodeHash } = await this.transport.requestCode(trimmed);

      return {
        next: {
          kind: 'code_requested',
          phone: trimmed,
          phoneCodeHash,
          sessionToken: this.transport.exportSession(),
          requestedAt: new Date().toISOString(),
        },
        result: { phoneCodeHash },
      };
    });
  }

  /**
   * Redeem a login code. InvalidCode/ExpiredCode leave the login pending.
   * @param phoneCodeHash - Defaults to the hash of the pending request
   */
  async submitCode(
    phone: string,
    code: string,
    phoneCodeHash?: string,
  ): Promise<SignInOutcome> {
    const trimmedCode = code.trim();
    if (!trimmedCode) {
      throw new InvalidCodeException(ERROR_MESSAGES.AUTH.CODE_REQUIRED);
    }
    const credentials = await this.credentialsService.load();

    return this.transition<SignInOutcome>(async (current) => {
      if (current.kind === 'authorized') {
        throw new InvalidStateException(ERROR_MESSAGES.AUTH.ALREADY_AUTHORIZED);
      }
      if (current.kind !== 'code_requested') {
        throw new InvalidStateException(ERROR_MESSAGES.AUTH.NO_PENDING_CODE);
      }
      if (normalizePhone(phone) !== normalizePhone(current.phone)) {
        throw new InvalidPhoneException(ERROR_MESSAGES.AUTH.PHONE_MISMATCH);
      }
      const hash = phoneCodeHash?.trim() || current.phoneCodeHash;
      if (hash !== current.phoneCodeHash) {
        throw new InvalidStateException(
          ERROR_MESSAGES.AUTH.CODE_HASH_MISMATCH,
        );
      }

      await this.ensureConnected(credentials, current.sessionToken);
      const outcome = await this.transport.submitCode(
        current.phone,
        trimmedCode,
        hash,
      );

      if (outcome.status === 'authorized') {
        this.logger.log(`User ${outcome.user.id} authenticated successfully`);
        return {
          next: this.authorized(current.phone, outcome.user),
          result: outcome,
        };
      }

      return {
        next: {
          kind: 'password_required',
          phone: current.phone,
          sessionToken: this.transport.exportSession(),
          passwordHint: outcome.hint,
        },
        result: outcome,
      };
    });
  }

  /**
   * Complete a login that requires the 2FA password
   */
  async submitPassword(
    password: string,
  ): Promise<{ status: 'authorized'; user: UserInfo }> {
    if (!password) {
      throw new InvalidPasswordException(ERROR_MESSAGES.AUTH.PASSWORD_REQUIRED);
    }
    const credentials = await this.credentialsService.load();

    return this.transition(async (current) => {
      if (current.kind === 'authorized') {
        throw new InvalidStateException(ERROR_MESSAGES.AUTH.ALREADY_AUTHORIZED);
      }
      if (current.kind !== 'password_required') {
        throw new InvalidStateException(
          ERROR_MESSAGES.AUTH.NO_PENDING_PASSWORD,
        );
      }

      await this.ensureConnected(credentials, current.sessionToken);
      const user = await this.transport.submitPassword(password);
      this.logger.log(`User ${user.id} authenticated with 2FA`);

      return {
        next: this.authorized(current.phone, user),
        result: { status: 'authorized' as const, user },
      };
    });
  }

  /**
   * Check authentication status. An authorized session is verified against
   * Telegram, since it may have been revoked remotely. Never writes state.
   */
  async currentStatus(): Promise<AuthStatus> {
    const state = await this.getState();
    if (state.kind === 'unconfigured') {
      return { configured: false, authenticated: false, state: state.kind };
    }
    if (state.kind !== 'authorized') {
      return { configured: true, authenticated: false, state: state.kind };
    }

    const user = await this.currentUser(
      await this.credentialsService.load(),
      state,
    );
    if (!user) {
      return {
        configured: true,
        authenticated: false,
        state: state.kind,
        sessionRevoked: true,
      };
    }
    return { configured: true, authenticated: true, state: state.kind, user };
  }

  /**
   * Authorized state with a connected transport
   * @throws NotConfiguredException / NotAuthenticatedException
   */
  async requireAuthorized(): Promise<AuthorizedState> {
    const state = await this.getState();
    if (state.kind === 'unconfigured') {
      throw new NotConfiguredException();
    }
    if (state.kind !== 'authorized') {
      throw new NotAuthenticatedException();
    }
    await this.ensureConnected(
      await this.credentialsService.load(),
      state.sessionToken,
    );
    return state;
  }

  /**
   * Logout user and clear session
   * @returns Whether an authorized session was logged out
   */
  async logout(): Promise<{ wasAuthorized: boolean }> {
    const result = await this.transition(async (current) => {
      if (current.kind === 'authorized') {
        try {
          await this.ensureConnected(
            await this.credentialsService.load(),
            current.sessionToken,
          );
          await this.transport.logOut();
        } catch (error) {
          this.logger.warn(
            `Failed to logout from Telegram: ${
              error instanceof Error ? error.message : String(error)
            }`,
          );
        }
      }
      return {
        next: UNAUTHENTICATED,
        result: { wasAuthorized: current.kind === 'authorized' },
      };
    });

    await this.transport.disconnect();
    return result;
  }

  private authorized(phone: string, user: UserInfo): AuthorizedState {
    return {
      kind: 'authorized',
      phone,
      sessionToken: this.transport.exportSession(),
      user,
      authorizedAt: new Date().toISOString(),
    };
  }

  private async currentUser(
    credentials: Credentials,
    state: AuthorizedState,
  ): Promise<UserInfo | null> {
    await this.ensureConnected(credentials, state.sessionToken);
    return this.transport.getCurrentUser();
  }

  private async isSessionAlive(
    credentials: Credentials,
    state: AuthorizedState,
  ): Promise<boolean> {
    return (await this.currentUser(credentials, state)) !== null;
  }

  private async ensureConnected(
    credentials: Credentials,
    sessionToken?: string,
  ): Promise<void> {
    if (!this.transport.isConnected()) {
      await this.transport.connect(credentials, sessionToken);
    }
  }

  /**
   * Run one state transition under the session lock and refresh the cache
   * with whatever was persisted
   */
  private async transition<R>(
    fn: (current: SessionState) => Promise<RecordUpdate<SessionState, R>>,
  ): Promise<R> {
    const { next, result } = await this.sessionStore.transact(
      async (current) => {
        const update = await fn(current);
        return { next: update.next, result: update };
      },
    );
    if (next) {
      this.state = next;
    }
    return result;
  }
}
