import { Injectable } from '@nestjs/common';
import { ERROR_MESSAGES } from '../common/constants/error-messages.constant';
import {
  AmbiguousMatchException,
  ContactNotFoundException,
  ValidationException,
} from '../common/exceptions/base.exception';
import { PinsService } from '../pins/pins.service';
import { Contact } from '../telegram-client/interfaces/contact.interface';
import { ContactsService } from '../telegram-client/services/contacts.service';
import { FuzzyMatcher, MatchResult, RESOLVE_THRESHOLD } from './fuzzy-matcher';

export interface RankedContact extends MatchResult {
  pinned: boolean;
}

export type PinnedEntry =
  | { stale: false; contact: Contact }
  | { stale: true; id: number };

export interface SearchOptions {
  pinnedOnly?: boolean;
  refresh?: boolean;
  /** Most dialogs to fetch, instead of the configured limit */
  limit?: number;
}

export interface RecipientQuery {
  to?: string;
  toId?: number;
}

const NUMERIC_REFERENCE = /^-?\d+$/;

/**
 * Contact selection
 * Combines the dialog snapshot, fuzzy ranking and pins into the views the
 * commands and the interactive picker use
 */
@Injectable()
export class ContactSelectionService {
  constructor(
    private readonly contactsService: ContactsService,
    private readonly matcher: FuzzyMatcher,
    private readonly pinsService: PinsService,
  ) {}

  /**
   * Matches for `query`, pinned ones first in pin order, then the rest in
   * ranking order
   */
  async search(
    query: string,
    options: SearchOptions = {},
  ): Promise<RankedContact[]> {
    const contacts = await this.contactsService.fetch(
      options.refresh,
      options.limit,
    );
    const matches = this.matcher.search(query, contacts);
    const pinnedIds = await this.pinsService.listPinned();

    const pinned: RankedContact[] = [];
    for (const id of pinnedIds) {
      const match = matches.find((candidate) => candidate.contact.id === id);
      if (match) {
        pinned.push({ ...match, pinned: true });
      }
    }
    if (options.pinnedOnly) {
      return pinned;
    }

    const pinnedSet = new Set(pinnedIds);
    const rest = matches
      .filter((match) => !pinnedSet.has(match.contact.id))
      .map((match) => ({ ...match, pinned: false }));

    return [...pinned, ...rest];
  }

  /**
   * Resolve the recipient of a non-interactive send.
   * An id must be in the snapshot; a name must score at least
   * RESOLVE_THRESHOLD and be the single best match.
   */
  async resolveRecipient(query: RecipientQuery): Promise<Contact> {
    if (query.toId !== undefined) {
      return this.contactsService.resolveById(query.toId);
    }

    const name = query.to?.trim();
    if (!name) {
      throw new ValidationException(
        ERROR_MESSAGES.CONTACT.RECIPIENT_REQUIRED,
        'to',
      );
    }

    const contacts = await this.contactsService.fetch();
    const matches = this.matcher.search(name, contacts);
    if (matches.length === 0) {
      throw new ContactNotFoundException(
        `${ERROR_MESSAGES.CONTACT.NOT_FOUND}: '${name}'`,
      );
    }

    const [best] = matches;
    if (best.score < RESOLVE_THRESHOLD) {
      throw new ContactNotFoundException(
        `${ERROR_MESSAGES.CONTACT.NO_GOOD_MATCH} for '${name}' (best candidate: ${best.contact.name}, score ${best.score})`,
      );
    }

    const top = matches.filter((match) => match.score === best.score);
    if (top.length > 1) {
      throw new AmbiguousMatchException(
        name,
        top.map(({ contact }) => ({ id: contact.id, name: contact.name })),
      );
    }
    return best.contact;
  }

  /**
   * Resolve a pin reference: digits are an id, anything else a name
   */
  async resolveReference(ref: string): Promise<Contact> {
    const trimmed = ref.trim();
    if (NUMERIC_REFERENCE.test(trimmed)) {
      return this.contactsService.resolveById(Number(trimmed));
    }
    return this.resolveRecipient({ to: trimmed });
  }

  /**
   * Contact for `id` in the current snapshot, if any
   */
  async findById(id: number): Promise<Contact | undefined> {
    const contacts = await this.contactsService.fetch();
    return contacts.find((contact) => contact.id === id);
  }

  /**
   * Pinned entries in pin order; ids missing from the snapshot are marked stale
   */
  async listPinned(): Promise<PinnedEntry[]> {
    const ids = await this.pinsService.listPinned();
    if (ids.length === 0) {
      return [];
    }
    const contacts = await this.contactsService.fetch();
    return ids.map((id): PinnedEntry => {
      const contact = contacts.find((candidate) => candidate.id === id);
      return contact ? { stale: false, contact } : { stale: true, id };
    });
  }
}
