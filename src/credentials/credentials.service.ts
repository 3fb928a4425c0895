import { Injectable, Logger } from '@nestjs/common';
import { AppConfigService } from '../common/config/app-config.service';
import {
  InvalidCredentialsException,
  NotConfiguredException,
} from '../common/exceptions/base.exception';
import { createDtoCodec } from '../common/storage/dto-codec';
import { JsonRecordStore } from '../common/storage/json-record.store';
import { RECORD_FILES } from '../common/storage/record-names.constant';
import { transformAndValidate } from '../common/validation/validate-dto';
import { CredentialsDto } from './dto/credentials.dto';
import { Credentials } from './interfaces/credentials.interface';

const credentialsCodec = createDtoCodec<CredentialsDto, Credentials>(
  CredentialsDto,
  {
    toValue: (record) => ({ apiId: record.apiId, apiHash: record.apiHash }),
    toRecord: (value) => ({ apiId: value.apiId, apiHash: value.apiHash }),
  },
);

/**
 * Credential store
 * Persists the Telegram API id/hash pair used to create clients
 */
@Injectable()
export class CredentialsService {
  private readonly logger = new Logger(CredentialsService.name);
  private readonly store: JsonRecordStore<Credentials>;
  private cached: Credentials | null = null;

  constructor(config: AppConfigService) {
    this.store = new JsonRecordStore(
      config.recordPath(RECORD_FILES.CREDENTIALS),
      credentialsCodec,
      { retries: config.lockRetries, staleMs: config.lockStaleMs },
    );
  }

  /**
   * Load saved credentials
   * @throws NotConfiguredException when nothing was ever saved
   * @throws CorruptStateException when the stored record is malformed
   */
  async load(): Promise<Credentials> {
    if (this.cached) {
      return this.cached;
    }
    const credentials = await this.store.read();
    if (!credentials) {
      throw new NotConfiguredException();
    }
    this.cached = credentials;
    return credentials;
  }

  /**
   * Whether credentials have been saved. A corrupt record still throws.
   */
  async isConfigured(): Promise<boolean> {
    return (await this.store.read()) !== null;
  }

  /**
   * Validate and atomically replace the stored credentials
   */
  async save(credentials: Credentials): Promise<Credentials> {
    const result = transformAndValidate(CredentialsDto, {
      apiId: credentials.apiId,
      apiHash: credentials.apiHash.trim(),
    });
    if (!result.ok) {
      throw new InvalidCredentialsException(result.errors.join('; '));
    }

    const value: Credentials = {
      apiId: result.value.apiId,
      apiHash: result.value.apiHash,
    };
    await this.store.withLock(() => this.store.write(value));
    this.cached = value;

    this.logger.log(`Credentials saved for API ID ${value.apiId}`);
    return value;
  }
}
