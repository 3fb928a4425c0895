import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { promises as fs } from 'fs';
import { Api, TelegramClient } from 'telegram';
import { LogLevel } from 'telegram/extensions/Logger';
import { computeCheck } from 'telegram/Password';
import { StringSession } from 'telegram/sessions';
import { ERROR_MESSAGES } from '../common/constants/error-messages.constant';
import {
  ContactNotFoundException,
  InvalidPhoneException,
  TransportException,
} from '../common/exceptions/base.exception';
import { Credentials } from '../credentials/interfaces/credentials.interface';
import { SignInOutcome } from './interfaces/auth-state.interface';
import { Contact, ContactKind, UserInfo } from './interfaces/contact.interface';
import {
  MessagingTransport,
  SentFile,
  UploadProgressCallback,
} from './interfaces/messaging-transport.interface';
import { TelegramClientConfig } from './telegram-client.config';
import {
  errorText,
  isSessionInvalid,
  mapTelegramError,
  withTimeout,
} from './telegram-errors';

/**
 * The parts of a gramjs Dialog used to build a contact
 */
export interface DialogLike {
  id?: { toString(): string };
  name?: string;
  title?: string;
  isUser: boolean;
  isGroup: boolean;
  isChannel: boolean;
  entity?: unknown;
}

/**
 * Map a gramjs dialog to a contact; null for dialogs without an id
 */
export function dialogToContact(dialog: DialogLike): Contact | null {
  if (dialog.id === undefined) {
    return null;
  }
  const id = Number(dialog.id.toString());
  if (!Number.isSafeInteger(id)) {
    return null;
  }

  let kind: ContactKind;
  if (dialog.isUser) {
    kind =
      dialog.entity instanceof Api.User && dialog.entity.bot
        ? ContactKind.BOT
        : ContactKind.USER;
  } else if (dialog.isChannel && !dialog.isGroup) {
    kind = ContactKind.CHANNEL;
  } else {
    kind = ContactKind.GROUP;
  }

  return { id, name: dialog.name || dialog.title || '', kind };
}

/**
 * Map a gramjs user to the account summary
 */
export function toUserInfo(user: Api.TypeUser): UserInfo {
  if (!(user instanceof Api.User)) {
    return { id: Number(user.id.toString()) };
  }
  return {
    id: Number(user.id.toString()),
    firstName: user.firstName,
    lastName: user.lastName,
    username: user.username,
    phone: user.phone,
  };
}

/**
 * Telegram Client Service
 * gramjs implementation of the messaging transport. One client per process,
 * bound to the session token it was connected with.
 */
@Injectable()
export class TelegramClientService
  implements MessagingTransport, OnModuleDestroy
{
  private readonly logger = new Logger(TelegramClientService.name);
  private client: TelegramClient | null = null;
  private session: StringSession | null = null;
  private credentials: Credentials | null = null;
  private readonly peers = new Map<number, Api.TypeInputPeer>();

  constructor(private readonly config: TelegramClientConfig) {}

  async onModuleDestroy() {
    await this.disconnect();
  }

  /**
   * Create and connect a client
   * @param credentials - API id/hash
   * @param sessionToken - Serialized StringSession from a previous run
   */
  async connect(credentials: Credentials, sessionToken?: string): Promise<void> {
    if (this.client) {
      return;
    }

    const session = new StringSession(sessionToken || '');
    const client = new TelegramClient(
      session,
      credentials.apiId,
      credentials.apiHash,
      {
        connectionRetries: this.config.connectionRetries,
        retryDelay: 1000,
        autoReconnect: false,
        timeout: Math.ceil(this.config.requestTimeoutMs / 1000),
      },
    );
    client.setLogLevel(this.config.isDebugEnabled ? LogLevel.ERROR : LogLevel.NONE);

    try {
      await this.call('connect', () => client.connect());
    } catch (error) {
      await this.safeDisconnect(client);
      throw error;
    }

    this.client = client;
    this.session = session;
    this.credentials = credentials;
    this.logger.debug('Telegram client connected');
  }

  isConnected(): boolean {
    return this.client !== null;
  }

  exportSession(): string {
    if (!this.session) {
      throw new TransportException(ERROR_MESSAGES.TRANSPORT.NOT_CONNECTED);
    }
    return this.session.save();
  }

  async requestCode(phone: string): Promise<{ phoneCodeHash: string }> {
    const client = this.requireClient();
    const credentials = this.requireCredentials();

    const result = await this.call('auth.SendCode', () =>
      client.invoke(
        new Api.auth.SendCode({
          phoneNumber: phone,
          apiId: credentials.apiId,
          apiHash: credentials.apiHash,
          settings: new Api.CodeSettings({
            allowFlashcall: false,
            currentNumber: false,
            allowAppHash: false,
            allowMissedCall: false,
            logoutTokens: [],
          }),
        }),
      ),
    );

    if (!(result instanceof Api.auth.SentCode)) {
      throw new TransportException(
        `${ERROR_MESSAGES.TRANSPORT.FAILED}: unexpected response to auth.SendCode`,
      );
    }

    this.logger.log(`Authentication code sent to ${phone}`);
    return { phoneCodeHash: result.phoneCodeHash };
  }

  async submitCode(
    phone: string,
    code: string,
    phoneCodeHash: string,
  ): Promise<SignInOutcome> {
    const client = this.requireClient();

    let result: Api.auth.TypeAuthorization;
    try {
      result = await withTimeout(
        client.invoke(
          new Api.auth.SignIn({
            phoneNumber: phone,
            phoneCodeHash,
            phoneCode: code,
          }),
        ),
        this.config.requestTimeoutMs,
        'auth.SignIn',
      );
    } catch (error) {
      if (errorText(error).includes('SESSION_PASSWORD_NEEDED')) {
        const password = await this.call('account.GetPassword', () =>
          client.invoke(new Api.account.GetPassword()),
        );
        this.logger.log('Two-factor authentication required');
        return { status: 'password_required', hint: password.hint };
      }
      throw mapTelegramError(error);
    }

    if (!(result instanceof Api.auth.Authorization)) {
      throw new InvalidPhoneException(
        `${ERROR_MESSAGES.AUTH.PHONE_INVALID}: account is not registered`,
      );
    }
    return { status: 'authorized', user: toUserInfo(result.user) };
  }

  async submitPassword(password: string): Promise<UserInfo> {
    const client = this.requireClient();

    const passwordInfo = await this.call('account.GetPassword', () =>
      client.invoke(new Api.account.GetPassword()),
    );
    const check = await computeCheck(passwordInfo, password);
    const result = await this.call('auth.CheckPassword', () =>
      client.invoke(new Api.auth.CheckPassword({ password: check })),
    );

    if (!(result instanceof Api.auth.Authorization)) {
      throw new TransportException(
        `${ERROR_MESSAGES.TRANSPORT.FAILED}: unexpected response to auth.CheckPassword`,
      );
    }
    return toUserInfo(result.user);
  }

  async getCurrentUser(): Promise<UserInfo | null> {
    const client = this.requireClient();
    try {
      const me = await withTimeout(
        client.getMe(),
        this.config.requestTimeoutMs,
        'users.GetUsers',
      );
      return me instanceof Api.User ? toUserInfo(me) : null;
    } catch (error) {
      if (isSessionInvalid(error)) {
        this.logger.warn(`Stored session is no longer valid: ${errorText(error)}`);
        return null;
      }
      throw mapTelegramError(error);
    }
  }

  async logOut(): Promise<void> {
    const client = this.requireClient();
    await this.call('auth.LogOut', () => client.invoke(new Api.auth.LogOut()));
    this.logger.log('Logged out from Telegram');
  }

  async listContacts(limit: number): Promise<Contact[]> {
    const client = this.requireClient();
    const dialogs = await this.call('messages.GetDialogs', () =>
      client.getDialogs({ limit }),
    );

    const contacts: Contact[] = [];
    this.peers.clear();
    for (const dialog of dialogs) {
      const contact = dialogToContact(dialog);
      if (!contact) {
        continue;
      }
      contacts.push(contact);
      this.peers.set(contact.id, dialog.inputEntity);
    }

    this.logger.debug(`Fetched ${contacts.length} dialogs`);
    return contacts;
  }

  async sendFile(
    recipientId: number,
    filePath: string,
    onProgress?: UploadProgressCallback,
  ): Promise<SentFile> {
    const client = this.requireClient();
    const peer = this.peers.get(recipientId);
    if (!peer) {
      throw new ContactNotFoundException(
        `${ERROR_MESSAGES.CONTACT.NOT_FOUND}: ${recipientId}`,
      );
    }

    const { size } = await fs.stat(filePath);
    try {
      const message = await client.sendFile(peer, {
        file: filePath,
        forceDocument: false,
        progressCallback: onProgress
          ? (progress: number) => onProgress(Math.round(progress * size), size)
          : undefined,
      });
      this.logger.log(`Sent ${filePath} to ${recipientId}`);
      return { messageId: message.id };
    } catch (error) {
      throw mapTelegramError(error);
    }
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.session = null;
    this.credentials = null;
    this.peers.clear();
    if (client) {
      await this.safeDisconnect(client);
    }
  }

  /**
   * Run a single provider request with the configured timeout,
   * translating failures to application errors
   */
  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.config.requestTimeoutMs, label);
    } catch (error) {
      this.logger.debug(`${label} failed: ${errorText(error)}`);
      throw mapTelegramError(error);
    }
  }

  private requireClient(): TelegramClient {
    if (!this.client) {
      throw new TransportException(ERROR_MESSAGES.TRANSPORT.NOT_CONNECTED);
    }
    return this.client;
  }

  private requireCredentials(): Credentials {
    if (!this.credentials) {
      throw new TransportException(ERROR_MESSAGES.TRANSPORT.NOT_CONNECTED);
    }
    return this.credentials;
  }

  /**
   * Disconnect client safely
   */
  private async safeDisconnect(client: TelegramClient): Promise<void> {
    try {
      await client.destroy();
      this.logger.debug('Client disconnected successfully');
    } catch (error) {
      this.logger.error(`Error disconnecting client: ${errorText(error)}`);
    }
  }
}
