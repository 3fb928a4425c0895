import { Injectable } from '@nestjs/common';
import { AppConfigService } from '../../common/config/app-config.service';
import { CorruptStateException } from '../../common/exceptions/base.exception';
import { createDtoCodec } from '../../common/storage/dto-codec';
import {
  JsonRecordStore,
  RecordUpdate,
} from '../../common/storage/json-record.store';
import { RECORD_FILES } from '../../common/storage/record-names.constant';
import { SessionRecordDto } from '../dto/session-record.dto';
import { SessionState } from '../interfaces/auth-state.interface';

const required = <T>(value: T | undefined, field: string): T => {
  if (value === undefined) {
    throw new CorruptStateException(RECORD_FILES.SESSION, `${field} missing`);
  }
  return value;
};

function toSessionState(record: SessionRecordDto): SessionState {
  switch (record.state) {
    case 'unauthenticated':
      return record.sessionToken
        ? { kind: 'unauthenticated', sessionToken: record.sessionToken }
        : { kind: 'unauthenticated' };
    case 'code_requested':
      return {
        kind: 'code_requested',
        phone: required(record.phone, 'phone'),
        phoneCodeHash: required(record.phoneCodeHash, 'phoneCodeHash'),
        sessionToken: required(record.sessionToken, 'sessionToken'),
        requestedAt: required(record.requestedAt, 'requestedAt'),
      };
    case 'password_required':
      return {
        kind: 'password_required',
        phone: required(record.phone, 'phone'),
        sessionToken: required(record.sessionToken, 'sessionToken'),
        passwordHint: record.passwordHint,
      };
    case 'authorized': {
      const user = required(record.user, 'user');
      return {
        kind: 'authorized',
        phone: required(record.phone, 'phone'),
        sessionToken: required(record.sessionToken, 'sessionToken'),
        user: {
          id: user.id,
          firstName: user.firstName,
          lastName: user.lastName,
          username: user.username,
          phone: user.phone,
        },
        authorizedAt: required(record.authorizedAt, 'authorizedAt'),
      };
    }
  }
}

function toSessionRecord(state: SessionState): SessionRecordDto {
  const { kind, ...fields } = state;
  return Object.assign(new SessionRecordDto(), {
    version: 1,
    state: kind,
    ...fields,
  });
}

const sessionCodec = createDtoCodec<SessionRecordDto, SessionState>(
  SessionRecordDto,
  { toValue: toSessionState, toRecord: toSessionRecord },
);

export const UNAUTHENTICATED: SessionState = { kind: 'unauthenticated' };

/**
 * Persists the login state machine in session.json
 */
@Injectable()
export class SessionStoreService {
  private readonly store: JsonRecordStore<SessionState>;

  constructor(config: AppConfigService) {
    this.store = new JsonRecordStore(
      config.recordPath(RECORD_FILES.SESSION),
      sessionCodec,
      { retries: config.lockRetries, staleMs: config.lockStaleMs },
    );
  }

  /**
   * Current persisted state; a missing record means no login was started
   */
  async load(): Promise<SessionState> {
    return (await this.store.read()) ?? UNAUTHENTICATED;
  }

  /**
   * Locked read-modify-write of the session record. The lock is held
   * for the whole of `fn`, including any provider call made inside it.
   */
  async transact<R>(
    fn: (current: SessionState) => Promise<RecordUpdate<SessionState, R>>,
  ): Promise<R> {
    return this.store.update((current) => fn(current ?? UNAUTHENTICATED));
  }
}
