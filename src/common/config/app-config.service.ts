import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { homedir } from 'os';
import { join, resolve } from 'path';

export type AppConfig = {
  homeDir: string;
  requestTimeoutMs: number;
  connectionRetries: number;
  dialogLimit: number;
  lockRetries: number;
  lockStaleMs: number;
  debug: boolean;
};

export const DEFAULT_HOME_DIRNAME = '.telegram_file_sender';

@Injectable()
export class AppConfigService {
  private readonly cfg: Readonly<AppConfig>;

  constructor(private readonly configService: ConfigService) {
    const home = this.getString('TGSEND_HOME');

    const cfg: AppConfig = {
      homeDir: home ? resolve(home) : join(homedir(), DEFAULT_HOME_DIRNAME),
      requestTimeoutMs: this.getNumber('TGSEND_REQUEST_TIMEOUT', {
        defaultValue: 30000,
        min: 1000,
      }),
      connectionRetries: this.getNumber('TGSEND_CONNECTION_RETRIES', {
        defaultValue: 5,
        min: 0,
      }),
      dialogLimit: this.getNumber('TGSEND_DIALOG_LIMIT', {
        defaultValue: 100,
        min: 1,
        max: 1000,
      }),
      lockRetries: this.getNumber('TGSEND_LOCK_RETRIES', {
        defaultValue: 3,
        min: 0,
      }),
      lockStaleMs: this.getNumber('TGSEND_LOCK_STALE_MS', {
        defaultValue: 30000,
        min: 5000,
      }),
      debug: this.getBoolean('TGSEND_DEBUG', { defaultValue: false }),
    };

    this.cfg = Object.freeze(cfg);
  }

  get homeDir(): string {
    return this.cfg.homeDir;
  }

  get requestTimeoutMs(): number {
    return this.cfg.requestTimeoutMs;
  }

  get connectionRetries(): number {
    return this.cfg.connectionRetries;
  }

  get dialogLimit(): number {
    return this.cfg.dialogLimit;
  }

  get lockRetries(): number {
    return this.cfg.lockRetries;
  }

  get lockStaleMs(): number {
    return this.cfg.lockStaleMs;
  }

  get debug(): boolean {
    return this.cfg.debug;
  }

  /**
   * Absolute path of a record file inside the home directory
   */
  recordPath(fileName: string): string {
    return join(this.cfg.homeDir, fileName);
  }

  private getString(key: string): string | undefined {
    const raw = this.configService.get<string>(key);
    if (raw === undefined || raw === null) return undefined;
    const value = String(raw).trim();
    return value === '' ? undefined : value;
  }

  private getNumber(
    key: string,
    options: { defaultValue: number; min?: number; max?: number },
  ): number {
    const raw = this.getString(key);
    const candidate = raw === undefined ? options.defaultValue : Number(raw);
    if (!Number.isFinite(candidate)) {
      throw new Error(`${key} must be a valid number.`);
    }
    if (options.min !== undefined && candidate < options.min) {
      throw new Error(`${key} must be >= ${options.min}.`);
    }
    if (options.max !== undefined && candidate > options.max) {
      throw new Error(`${key} must be <= ${options.max}.`);
    }
    return candidate;
  }

  private getBoolean(key: string, options: { defaultValue: boolean }): boolean {
    const raw = this.getString(key);
    if (raw === undefined) {
      return options.defaultValue;
    }
    const normalized = raw.toLowerCase();
    if (['true', '1', 'yes', 'y'].includes(normalized)) return true;
    if (['false', '0', 'no', 'n'].includes(normalized)) return false;
    throw new Error(`${key} must be a valid boolean (true/false).`);
  }
}
