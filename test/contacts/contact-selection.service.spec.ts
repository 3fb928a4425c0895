import { Test, TestingModule } from '@nestjs/testing';
import {
  AmbiguousMatchException,
  ContactNotFoundException,
  ValidationException,
} from '../../src/common/exceptions/base.exception';
import { ContactSelectionService } from '../../src/contacts/contact-selection.service';
import { FuzzyMatcher } from '../../src/contacts/fuzzy-matcher';
import { PinsService } from '../../src/pins/pins.service';
import {
  Contact,
  ContactKind,
} from '../../src/telegram-client/interfaces/contact.interface';
import { ContactsService } from '../../src/telegram-client/services/contacts.service';
import { SAMPLE_CONTACTS } from '../mocks/fake-transport';

describe('ContactSelectionService', () => {
  let service: ContactSelectionService;
  let contacts: Contact[];
  let pinnedIds: number[];

  const mockContactsService = {
    fetch: jest.fn(),
    resolveById: jest.fn(),
  };

  const mockPinsService = {
    listPinned: jest.fn(),
  };

  beforeEach(async () => {
    contacts = [...SAMPLE_CONTACTS];
    pinnedIds = [];
    mockContactsService.fetch.mockImplementation(async () => contacts);
    mockContactsService.resolveById.mockImplementation(async (id: number) => {
      const contact = contacts.find((candidate) => candidate.id === id);
      if (!contact) {
        throw new ContactNotFoundException(`Contact not found: ${id}`);
      }
      return contact;
    });
    mockPinsService.listPinned.mockImplementation(async () => [...pinnedIds]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ContactSelectionService,
        FuzzyMatcher,
        { provide: ContactsService, useValue: mockContactsService },
        { provide: PinsService, useValue: mockPinsService },
      ],
    }).compile();

    service = module.get<ContactSelectionService>(ContactSelectionService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('search', () => {
    it('should list every contact for an empty query', async () => {
      const results = await service.search('');

      expect(results.map(({ contact }) => contact.id)).toEqual([1, 2, 3, 4]);
      expect(results.every(({ pinned }) => !pinned)).toBe(true);
    });

    it('should put pinned matches first in pin order', async () => {
      pinnedIds = [3, 4, 2];

      const results = await service.search('jo');

      expect(
        results.map(({ contact, score, pinned }) => [contact.id, score, pinned]),
      ).toEqual([
        [3, 77, true],
        [2, 91, true],
        [1, 92, false],
      ]);
    });

    it('should return only pinned matches when asked', async () => {
      pinnedIds = [4, 1];

      const results = await service.search('', { pinnedOnly: true });

      expect(results.map(({ contact }) => contact.id)).toEqual([4, 1]);
    });

    it('should pass the refresh flag to the contact fetch', async () => {
      await service.search('', { refresh: true });

      expect(mockContactsService.fetch).toHaveBeenCalledWith(true, undefined);
    });

    it('should pass the dialog limit to the contact fetch', async () => {
      await service.search('', { limit: 2 });

      expect(mockContactsService.fetch).toHaveBeenCalledWith(undefined, 2);
    });
  });

  describe('resolveRecipient', () => {
    it('should resolve the best name match', async () => {
      await expect(service.resolveRecipient({ to: 'john' })).resolves.toEqual(
        SAMPLE_CONTACTS[0],
      );
    });

    it('should resolve by id', async () => {
      await expect(service.resolveRecipient({ toId: 3 })).resolves.toEqual(
        SAMPLE_CONTACTS[2],
      );
      expect(mockContactsService.resolveById).toHaveBeenCalledWith(3);
    });

    it('should reject an unknown id', async () => {
      await expect(service.resolveRecipient({ toId: 99 })).rejects.toThrow(
        'Contact not found: 99',
      );
    });

    it('should require a name or id', async () => {
      await expect(service.resolveRecipient({ to: '  ' })).rejects.toBeInstanceOf(
        ValidationException,
      );
    });

    it('should report a name without matches', async () => {
      await expect(service.resolveRecipient({ to: 'xyz' })).rejects.toThrow(
        new ContactNotFoundException("Contact not found: 'xyz'"),
      );
    });

    it('should refuse a weak match', async () => {
      await expect(service.resolveRecipient({ to: 'jd' })).rejects.toThrow(
        "No good match found for 'jd' (best candidate: John Doe, score 20)",
      );
    });

    it('should refuse a tie between the best matches', async () => {
      contacts = [
        { id: 10, name: 'John X', kind: ContactKind.USER },
        { id: 11, name: 'John Y', kind: ContactKind.USER },
      ];

      const result = service.resolveRecipient({ to: 'John' });

      await expect(result).rejects.toBeInstanceOf(AmbiguousMatchException);
      await expect(result).rejects.toMatchObject({
        candidates: [
          { id: 10, name: 'John X' },
          { id: 11, name: 'John Y' },
        ],
      });
    });
  });

  describe('resolveReference', () => {
    it('should treat digits as an id', async () => {
      await expect(service.resolveReference(' 2 ')).resolves.toEqual(
        SAMPLE_CONTACTS[1],
      );
    });

    it('should treat a negative number as an id', async () => {
      contacts = [{ id: -100123, name: 'Team', kind: ContactKind.GROUP }];

      await expect(service.resolveReference('-100123')).resolves.toEqual(
        contacts[0],
      );
    });

    it('should treat anything else as a name', async () => {
      await expect(service.resolveReference('mark')).resolves.toEqual(
        SAMPLE_CONTACTS[2],
      );
    });
  });

  describe('listPinned', () => {
    it('should not fetch contacts when nothing is pinned', async () => {
      await expect(service.listPinned()).resolves.toEqual([]);
      expect(mockContactsService.fetch).not.toHaveBeenCalled();
    });

    it('should mark pins missing from the dialog list as stale', async () => {
      pinnedIds = [2, 77];

      await expect(service.listPinned()).resolves.toEqual([
        { stale: false, contact: SAMPLE_CONTACTS[1] },
        { stale: true, id: 77 },
      ]);
    });
  });
});
