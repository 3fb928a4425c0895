import { Inject, Injectable, Logger } from '@nestjs/common';
import { ERROR_MESSAGES } from '../../common/constants/error-messages.constant';
import {
  AppException,
  ContactNotFoundException,
  TransportException,
} from '../../common/exceptions/base.exception';
import { Contact } from '../interfaces/contact.interface';
import {
  MESSAGING_TRANSPORT,
  MessagingTransport,
} from '../interfaces/messaging-transport.interface';
import { TelegramClientConfig } from '../telegram-client.config';
import { AuthService } from './auth.service';

/**
 * Contacts Service for Telegram Client
 * Fetches the account's dialogs and keeps the last snapshot for the
 * lifetime of the process
 */
@Injectable()
export class ContactsService {
  private readonly logger = new Logger(ContactsService.name);
  private snapshot: readonly Contact[] | null = null;
  private snapshotLimit = 0;

  constructor(
    private readonly authService: AuthService,
    private readonly config: TelegramClientConfig,
    @Inject(MESSAGING_TRANSPORT)
    private readonly transport: MessagingTransport,
  ) {}

  /**
   * Get the account's contacts
   * @param forceRefresh - Bypass the cached snapshot
   * @param limit - Most dialogs to fetch; a snapshot taken with another
   * limit is fetched again
   * @throws NotAuthenticatedException unless logged in
   */
  async fetch(
    forceRefresh = false,
    limit: number = this.config.dialogLimit,
  ): Promise<readonly Contact[]> {
    await this.authService.requireAuthorized();

    if (this.snapshot && !forceRefresh && this.snapshotLimit === limit) {
      return this.snapshot;
    }

    let contacts: Contact[];
    try {
      contacts = await this.transport.listContacts(limit);
    } catch (error) {
      if (error instanceof AppException) {
        throw error;
      }
      this.logger.error('Failed to fetch contacts from Telegram:', error);
      throw new TransportException(
        `${ERROR_MESSAGES.TRANSPORT.FAILED}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }

    this.snapshotLimit = limit;
    this.snapshot = Object.freeze(
      contacts.map((contact) => Object.freeze({ ...contact })),
    );
    this.logger.debug(`Cached ${this.snapshot.length} contacts`);
    return this.snapshot;
  }

  /**
   * Find a contact in the current snapshot by id
   */
  async resolveById(id: number): Promise<Contact> {
    const contacts = await this.fetch();
    const contact = contacts.find((candidate) => candidate.id === id);
    if (!contact) {
      throw new ContactNotFoundException(
        `${ERROR_MESSAGES.CONTACT.NOT_FOUND}: ${id}`,
      );
    }
    return contact;
  }
}
