import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs, Stats } from 'fs';
import { basename, resolve } from 'path';
import { ERROR_MESSAGES } from '../../common/constants/error-messages.constant';
import { InvalidFileException } from '../../common/exceptions/base.exception';
import { Contact } from '../interfaces/contact.interface';
import {
  MESSAGING_TRANSPORT,
  MessagingTransport,
  UploadProgressCallback,
} from '../interfaces/messaging-transport.interface';
import { AuthService } from './auth.service';

export interface LocalFile {
  path: string;
  name: string;
  size: number;
}

export interface SendResult {
  file: LocalFile;
  messageId?: number;
}

const SIZE_UNITS = ['KB', 'MB', 'GB'] as const;

/**
 * Human readable size: bytes below 1 KB, otherwise two decimals
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

/**
 * Uploads a local file to a contact
 */
@Injectable()
export class FileSenderService {
  private readonly logger = new Logger(FileSenderService.name);

  constructor(
    private readonly authService: AuthService,
    @Inject(MESSAGING_TRANSPORT)
    private readonly transport: MessagingTransport,
  ) {}

  /**
   * Check that `filePath` names a readable regular file
   * @throws InvalidFileException
   */
  async inspect(filePath: string): Promise<LocalFile> {
    const path = resolve(filePath);
    let stats: Stats;
    try {
      stats = await fs.stat(path);
    } catch (error) {
      this.logger.debug(
        `stat ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new InvalidFileException(
        `${ERROR_MESSAGES.FILE.NOT_FOUND}: ${filePath}`,
      );
    }
    if (!stats.isFile()) {
      throw new InvalidFileException(
        `${ERROR_MESSAGES.FILE.NOT_A_FILE}: ${filePath}`,
      );
    }
    return { path, name: basename(path), size: stats.size };
  }

  /**
   * Send the file as a single message; the upload itself is not retried
   */
  async send(
    contact: Contact,
    filePath: string,
    onProgress?: UploadProgressCallback,
  ): Promise<SendResult> {
    const file = await this.inspect(filePath);
    await this.authService.requireAuthorized();

    const sent = await this.transport.sendFile(contact.id, file.path, onProgress);
    this.logger.log(
      `Sent ${file.name} (${formatSize(file.size)}) to ${contact.name || contact.id}`,
    );
    return { file, messageId: sent.messageId };
  }
}
