import { Injectable } from '@nestjs/common';
import { ERROR_MESSAGES } from '../common/constants/error-messages.constant';
import {
  NotConfiguredException,
  ValidationException,
} from '../common/exceptions/base.exception';
import { validateOrThrow } from '../common/validation/validate-dto';
import { ContactSelectionService } from '../contacts/contact-selection.service';
import { CredentialsService } from '../credentials/credentials.service';
import { PinsService } from '../pins/pins.service';
import { Contact } from '../telegram-client/interfaces/contact.interface';
import { AuthService } from '../telegram-client/services/auth.service';
import {
  FileSenderService,
  formatSize,
} from '../telegram-client/services/file-sender.service';
import {
  AuthOptionsDto,
  ConfigOptionsDto,
  ContactsOptionsDto,
  SendOptionsDto,
} from './dto';
import {
  ContactPayload,
  UserPayload,
  toContactPayload,
  toUserPayload,
} from './output';

const NUMERIC_REFERENCE = /^-?\d+$/;

export interface ConfigPayload {
  success: true;
  configured: boolean;
  api_id?: number;
}

export interface StatusPayload {
  success: true;
  configured: boolean;
  authenticated: boolean;
  user?: UserPayload;
}

export type AuthPayload =
  | { success: true; status: 'need_phone' }
  | { success: true; status: 'code_sent'; phone_code_hash: string }
  | { success: true; status: 'password_required'; hint?: string }
  | { success: true; status: 'authorized'; user: UserPayload };

export interface ContactListEntry extends ContactPayload {
  pinned: boolean;
  match_score?: number;
}

export interface ContactsPayload {
  success: true;
  count: number;
  contacts: ContactListEntry[];
}

export interface SendPayload {
  success: true;
  recipient: ContactPayload;
  message_id?: number;
  file: { name: string; size: number; size_human: string };
}

export interface PinPayload {
  success: true;
  pinned: boolean;
  contact?: ContactPayload;
}

export type PinnedListEntry =
  | (ContactPayload & { pinned: true })
  | { id: number; stale: true };

export interface PinnedPayload {
  success: true;
  count: number;
  contacts: PinnedListEntry[];
}

/**
 * Non-interactive commands. Each returns the JSON payload printed on
 * success; failures propagate as AppException.
 */
@Injectable()
export class CommandsService {
  constructor(
    private readonly credentialsService: CredentialsService,
    private readonly authService: AuthService,
    private readonly selection: ContactSelectionService,
    private readonly pinsService: PinsService,
    private readonly fileSender: FileSenderService,
  ) {}

  /**
   * Save API credentials, or report whether they are saved
   */
  async config(options: ConfigOptionsDto): Promise<ConfigPayload> {
    const { apiId, apiHash } = validateOrThrow(ConfigOptionsDto, options);

    if (apiId === undefined && apiHash === undefined) {
      if (!(await this.credentialsService.isConfigured())) {
        return { success: true, configured: false };
      }
      const credentials = await this.credentialsService.load();
      return { success: true, configured: true, api_id: credentials.apiId };
    }
    if (apiId === undefined || apiHash === undefined) {
      throw new ValidationException(
        ERROR_MESSAGES.CREDENTIALS.INCOMPLETE,
        apiId === undefined ? 'apiId' : 'apiHash',
      );
    }

    await this.credentialsService.save({
      apiId: Number(apiId.trim()),
      apiHash,
    });
    return { success: true, configured: true };
  }

  async status(): Promise<StatusPayload> {
    const status = await this.authService.currentStatus();
    return {
      success: true,
      configured: status.configured,
      authenticated: status.authenticated,
      ...(status.user ? { user: toUserPayload(status.user) } : {}),
    };
  }

  /**
   * Advance the login by as many steps as the given flags allow
   */
  async auth(options: AuthOptionsDto): Promise<AuthPayload> {
    const { phone, code, password, phoneCodeHash } = validateOrThrow(
      AuthOptionsDto,
      options,
    );

    const state = await this.authService.refreshState();
    if (state.kind === 'unconfigured') {
      throw new NotConfiguredException();
    }
    if (state.kind === 'authorized') {
      return {
        success: true,
        status: 'authorized',
        user: toUserPayload(state.user),
      };
    }

    if (password !== undefined && phone === undefined && code === undefined) {
      const { user } = await this.authService.submitPassword(password);
      return { success: true, status: 'authorized', user: toUserPayload(user) };
    }

    if (code !== undefined) {
      const codePhone =
        phone ?? (state.kind === 'code_requested' ? state.phone : undefined);
      if (codePhone === undefined) {
        throw new ValidationException(
          ERROR_MESSAGES.AUTH.PHONE_REQUIRED,
          'phone',
        );
      }
      const outcome = await this.authService.submitCode(
        codePhone,
        code,
        phoneCodeHash,
      );
      if (outcome.status === 'authorized') {
        return {
          success: true,
          status: 'authorized',
          user: toUserPayload(outcome.user),
        };
      }
      if (password !== undefined) {
        const { user } = await this.authService.submitPassword(password);
        return {
          success: true,
          status: 'authorized',
          user: toUserPayload(user),
        };
      }
      return {
        success: true,
        status: 'password_required',
        ...(outcome.hint ? { hint: outcome.hint } : {}),
      };
    }

    if (phone !== undefined) {
      const { phoneCodeHash: hash } = await this.authService.requestCode(phone);
      return { success: true, status: 'code_sent', phone_code_hash: hash };
    }

    return { success: true, status: 'need_phone' };
  }

  async logout(): Promise<{ success: true; status: 'logged_out' }> {
    await this.authService.logout();
    return { success: true, status: 'logged_out' };
  }

  /**
   * List contacts, pinned first; with a search only matching ones, scored
   */
  async contacts(options: ContactsOptionsDto): Promise<ContactsPayload> {
    const { search, pinnedOnly, refresh, limit } = validateOrThrow(
      ContactsOptionsDto,
      options,
    );
    const query = search?.trim() ?? '';

    const ranked = await this.selection.search(query, {
      pinnedOnly,
      refresh,
      limit,
    });
    const contacts = ranked.map(
      ({ contact, score, pinned }): ContactListEntry => ({
        ...toContactPayload(contact),
        pinned,
        ...(query ? { match_score: score } : {}),
      }),
    );
    return { success: true, count: contacts.length, contacts };
  }

  /**
   * Send `filePath` to the contact named by --to or --to-id
   */
  async send(filePath: string, options: SendOptionsDto): Promise<SendPayload> {
    const { to, toId } = validateOrThrow(SendOptionsDto, options);
    if (to !== undefined && toId !== undefined) {
      throw new ValidationException('Use either --to or --to-id, not both', 'to');
    }
    if (to === undefined && toId === undefined) {
      throw new ValidationException(
        ERROR_MESSAGES.CONTACT.RECIPIENT_REQUIRED,
        'to',
      );
    }

    await this.fileSender.inspect(filePath);
    const recipient = await this.selection.resolveRecipient({
      to,
      toId: toId === undefined ? undefined : Number(toId),
    });
    const { file, messageId } = await this.fileSender.send(recipient, filePath);

    return {
      success: true,
      recipient: toContactPayload(recipient),
      ...(messageId !== undefined ? { message_id: messageId } : {}),
      file: { name: file.name, size: file.size, size_human: formatSize(file.size) },
    };
  }

  async pin(reference: string): Promise<PinPayload> {
    const contact = await this.selection.resolveReference(reference);
    await this.pinsService.pin(contact.id);
    return { success: true, pinned: true, contact: toContactPayload(contact) };
  }

  /**
   * Unpin by name or id. An id is unpinned even when the contact no longer
   * appears in the dialog list.
   */
  async unpin(reference: string): Promise<PinPayload> {
    const trimmed = reference.trim();
    let contact: Contact | undefined;
    let id: number;
    if (NUMERIC_REFERENCE.test(trimmed)) {
      id = Number(trimmed);
      contact = await this.selection.findById(id);
    } else {
      contact = await this.selection.resolveReference(trimmed);
      id = contact.id;
    }

    await this.pinsService.unpin(id);
    return {
      success: true,
      pinned: false,
      ...(contact ? { contact: toContactPayload(contact) } : {}),
    };
  }

  async pinned(): Promise<PinnedPayload> {
    const entries = await this.selection.listPinned();
    const contacts = entries.map(
      (entry): PinnedListEntry =>
        entry.stale
          ? { id: entry.id, stale: true }
          : { ...toContactPayload(entry.contact), pinned: true },
    );
    return { success: true, count: contacts.length, contacts };
  }
}
