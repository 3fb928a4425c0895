import { Injectable } from '@nestjs/common';
import { AppConfigService } from '../common/config/app-config.service';

/**
 * Configuration for the Telegram client transport
 */
@Injectable()
export class TelegramClientConfig {
  constructor(private readonly appConfig: AppConfigService) {}

  /**
   * Get request timeout in milliseconds
   */
  get requestTimeoutMs(): number {
    return this.appConfig.requestTimeoutMs;
  }

  /**
   * Get connection retries used while establishing the MTProto connection
   */
  get connectionRetries(): number {
    return this.appConfig.connectionRetries;
  }

  /**
   * Get max dialogs fetched per contact listing
   */
  get dialogLimit(): number {
    return this.appConfig.dialogLimit;
  }

  /**
   * Check if debug mode is enabled
   */
  get isDebugEnabled(): boolean {
    return this.appConfig.debug;
  }
}
