import { Injectable, Logger } from '@nestjs/common';
import { AppConfigService } from '../common/config/app-config.service';
import { createDtoCodec } from '../common/storage/dto-codec';
import { JsonRecordStore } from '../common/storage/json-record.store';
import { RECORD_FILES } from '../common/storage/record-names.constant';
import { PinRecordDto } from './dto/pin-record.dto';

export interface PinChange {
  changed: boolean;
  pinned: boolean;
}

const pinsCodec = createDtoCodec<PinRecordDto, readonly number[]>(
  PinRecordDto,
  {
    // duplicates in a hand-edited file collapse to the first position
    toValue: (record) => [...new Set(record.ids)],
    toRecord: (ids) =>
      Object.assign(new PinRecordDto(), { version: 1, ids: [...ids] }),
  },
);

/**
 * Pin store
 * Ordered set of pinned contact ids. Ids are kept even when the contact
 * no longer shows up in the dialog list.
 */
@Injectable()
export class PinsService {
  private readonly logger = new Logger(PinsService.name);
  private readonly store: JsonRecordStore<readonly number[]>;

  constructor(config: AppConfigService) {
    this.store = new JsonRecordStore(
      config.recordPath(RECORD_FILES.PINS),
      pinsCodec,
      { retries: config.lockRetries, staleMs: config.lockStaleMs },
    );
  }

  /**
   * Pinned ids in insertion order
   */
  async listPinned(): Promise<number[]> {
    return [...((await this.store.read()) ?? [])];
  }

  async isPinned(id: number): Promise<boolean> {
    return (await this.listPinned()).includes(id);
  }

  /**
   * Append `id` to the pins; no-op when already pinned
   */
  async pin(id: number): Promise<PinChange> {
    return this.store.update<PinChange>(async (current) => {
      const ids = current ?? [];
      if (ids.includes(id)) {
        return { result: { changed: false, pinned: true } };
      }
      this.logger.log(`Pinned contact ${id}`);
      return {
        next: [...ids, id],
        result: { changed: true, pinned: true },
      };
    });
  }

  /**
   * Remove `id` from the pins; no-op when not pinned
   */
  async unpin(id: number): Promise<PinChange> {
    return this.store.update<PinChange>(async (current) => {
      const ids = current ?? [];
      if (!ids.includes(id)) {
        return { result: { changed: false, pinned: false } };
      }
      this.logger.log(`Unpinned contact ${id}`);
      return {
        next: ids.filter((pinned) => pinned !== id),
        result: { changed: true, pinned: false },
      };
    });
  }
}
