import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common';
import { AppConfigService } from '../config/app-config.service';

const DEFAULT_LEVELS: LogLevel[] = ['fatal', 'error', 'warn'];
const DEBUG_LEVELS: LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
];

/**
 * Nest logger for a CLI: stdout carries command output, so every log line
 * goes to stderr
 */
@Injectable()
export class CliLogger extends ConsoleLogger {
  constructor(config: AppConfigService) {
    super('tgsend', {
      logLevels: config.debug ? DEBUG_LEVELS : DEFAULT_LEVELS,
    });
  }

  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
