import { Injectable, Logger } from '@nestjs/common';
import {
  AppException,
  ErrorKind,
  NotConfiguredException,
  toAppException,
} from '../common/exceptions/base.exception';
import { ContactSelectionService } from '../contacts/contact-selection.service';
import { CredentialsService } from '../credentials/credentials.service';
import { Contact, UserInfo } from '../telegram-client/interfaces/contact.interface';
import { AuthService } from '../telegram-client/services/auth.service';
import {
  FileSenderService,
  LocalFile,
  formatSize,
} from '../telegram-client/services/file-sender.service';
import { Prompter } from './prompter';

export type InteractiveOutcome = 'sent' | 'cancelled';

/** Most contacts offered in one pick list */
export const PICK_LIMIT = 20;
const SEARCH_AGAIN = '__search_again__';

// appended to messages that do not already say what to do
const HINTS: Partial<Record<ErrorKind, string>> = {
  CorruptState: 'Fix or delete the file and try again',
  TransportError: 'Check your connection and try again',
};

/**
 * One readable line for an error shown in interactive mode
 */
export function describeError(error: unknown): string {
  const exception = toAppException(error);
  const hint = HINTS[exception.errorCode];
  return hint ? `${exception.message}. ${hint}` : exception.message;
}

class PromptCancelledError extends Error {
  constructor() {
    super('Cancelled');
  }
}

const displayName = (user: UserInfo): string =>
  [user.firstName, user.lastName].filter(Boolean).join(' ') ||
  (user.username ? `@${user.username}` : String(user.id));

const isPositiveInteger = (value: string): boolean =>
  /^\d+$/.test(value.trim()) && Number(value) > 0;

/**
 * Interactive mode: credentials, login, contact pick, upload
 */
@Injectable()
export class InteractiveService {
  private readonly logger = new Logger(InteractiveService.name);

  constructor(
    private readonly credentialsService: CredentialsService,
    private readonly authService: AuthService,
    private readonly selection: ContactSelectionService,
    private readonly fileSender: FileSenderService,
  ) {}

  /**
   * Walk the user through sending `filePath`. Cancelling any prompt stops
   * the flow and resolves 'cancelled'; other failures are thrown.
   */
  async run(filePath: string, prompter: Prompter): Promise<InteractiveOutcome> {
    prompter.intro('tgsend');
    try {
      const file = await this.fileSender.inspect(filePath);
      await this.ensureCredentials(prompter);
      const user = await this.login(prompter);
      prompter.note(`Logged in as ${displayName(user)}`);

      const contact = await this.pickContact(prompter, file);
      await this.sendWithProgress(prompter, contact, file);
      prompter.outro('Done');
      return 'sent';
    } catch (error) {
      if (error instanceof PromptCancelledError) {
        prompter.cancel('Cancelled');
        return 'cancelled';
      }
      throw error;
    }
  }

  private async ensureCredentials(prompter: Prompter): Promise<void> {
    if (await this.credentialsService.isConfigured()) {
      return;
    }

    prompter.note(
      'Create an application at https://my.telegram.org/apps to get an API ID and hash.',
      'Telegram API credentials',
    );
    const apiId = await this.ask(
      prompter.text({
        message: 'API ID',
        validate: (value) =>
          isPositiveInteger(value) ? undefined : 'API ID must be a positive integer',
      }),
    );
    const apiHash = await this.ask(
      prompter.text({
        message: 'API hash',
        validate: (value) => (value.trim() ? undefined : 'API hash is required'),
      }),
    );
    await this.credentialsService.save({
      apiId: Number(apiId.trim()),
      apiHash,
    });
  }

  /**
   * Prompt through the login states until authorized
   */
  private async login(prompter: Prompter): Promise<UserInfo> {
    // a revoked session falls back to unauthenticated and is logged in again
    let state = await this.authService.refreshState();

    while (state.kind !== 'authorized') {
      switch (state.kind) {
        case 'unconfigured':
          throw new NotConfiguredException();

        case 'unauthenticated': {
          const phone = await this.ask(
            prompter.text({
              message: 'Phone number',
              placeholder: '+15551234567',
            }),
          );
          await this.retryOn(prompter, ['InvalidPhone'], () =>
            this.authService.requestCode(phone),
          );
          break;
        }

        case 'code_requested': {
          const code = await this.ask(
            prompter.text({
              message: `Code sent to ${state.phone} (leave empty to request a new one)`,
            }),
          );
          if (!code.trim()) {
            await this.authService.requestCode(state.phone);
            break;
          }
          const phone = state.phone;
          const expired = await this.retryOn(
            prompter,
            ['InvalidCode', 'ExpiredCode'],
            () => this.authService.submitCode(phone, code),
          );
          if (expired === 'ExpiredCode') {
            await this.authService.requestCode(phone);
          }
          break;
        }

        case 'password_required': {
          const hint = state.passwordHint ? ` (hint: ${state.passwordHint})` : '';
          const password = await this.ask(
            prompter.password({ message: `Two-factor password${hint}` }),
          );
          await this.retryOn(prompter, ['InvalidPassword'], () =>
            this.authService.submitPassword(password),
          );
          break;
        }
      }
      state = await this.authService.getState();
    }

    return state.user;
  }

  private async pickContact(
    prompter: Prompter,
    file: LocalFile,
  ): Promise<Contact> {
    for (;;) {
      const query = await this.ask(
        prompter.text({
          message: 'Search contacts',
          placeholder: 'name, or empty for all',
        }),
      );
      const ranked = await this.selection.search(query);
      if (ranked.length === 0) {
        prompter.note(`No contacts match '${query.trim()}'`);
        continue;
      }

      const shown = ranked.slice(0, PICK_LIMIT);
      const choice = await this.ask(
        prompter.select({
          message: `Send ${file.name} to`,
          options: [
            ...shown.map(({ contact, pinned }) => ({
              value: String(contact.id),
              label: `${pinned ? '* ' : ''}${contact.name || '(unnamed)'}`,
              hint: contact.kind,
            })),
            { value: SEARCH_AGAIN, label: 'Search again' },
          ],
        }),
      );

      const picked = shown.find(({ contact }) => String(contact.id) === choice);
      if (picked) {
        return picked.contact;
      }
    }
  }

  private async sendWithProgress(
    prompter: Prompter,
    contact: Contact,
    file: LocalFile,
  ): Promise<void> {
    const label = `Uploading ${file.name}`;
    const progress = prompter.progress(label);
    try {
      await this.fileSender.send(contact, file.path, (sent, total) => {
        const percent = total > 0 ? Math.floor((sent / total) * 100) : 100;
        progress.update(`${label} ${percent}%`);
      });
    } catch (error) {
      progress.stop('Upload failed');
      throw error;
    }
    progress.stop(
      `Sent ${file.name} (${formatSize(file.size)}) to ${contact.name || contact.id}`,
    );
  }

  /**
   * Run a step whose listed error kinds are shown and retried by the
   * surrounding loop; returns the kind that occurred, if any
   */
  private async retryOn(
    prompter: Prompter,
    kinds: ErrorKind[],
    step: () => Promise<unknown>,
  ): Promise<ErrorKind | null> {
    try {
      await step();
      return null;
    } catch (error) {
      if (error instanceof AppException && kinds.includes(error.errorCode)) {
        this.logger.debug(`Retrying after ${error.errorCode}`);
        prompter.error(error.message);
        return error.errorCode;
      }
      throw error;
    }
  }

  private async ask<T>(answer: Promise<T | null>): Promise<T> {
    const value = await answer;
    if (value === null) {
      throw new PromptCancelledError();
    }
    return value;
  }
}
