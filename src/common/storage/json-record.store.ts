import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import * as lockfile from 'proper-lockfile';
import {
  CorruptStateException,
  LockContentionException,
} from '../exceptions/base.exception';

export interface RecordLockOptions {
  retries: number;
  staleMs: number;
}

/**
 * Converts between the on-disk JSON shape and the in-memory value.
 * `decode` throws CorruptStateException on anything it cannot accept.
 */
export interface RecordCodec<T> {
  decode(raw: unknown, record: string): T;
  encode(value: T): unknown;
}

export interface RecordUpdate<T, R> {
  next?: T;
  result: R;
}

// errors raised by core modules may come from another realm, so match the shape
const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  typeof error === 'object' && error !== null && 'code' in error;

/**
 * A single JSON record on disk.
 *
 * Writes go to a temp file that is renamed over the record, so a reader never
 * observes a half-written file. Read-modify-write sequences hold an advisory
 * lock (`<file>.lock`) for their whole duration.
 */
export class JsonRecordStore<T> {
  private readonly logger = new Logger(JsonRecordStore.name);
  readonly name: string;

  constructor(
    readonly filePath: string,
    private readonly codec: RecordCodec<T>,
    private readonly lockOptions: RecordLockOptions,
  ) {
    this.name = basename(filePath);
  }

  /**
   * Read the record; null when it has never been written
   */
  async read(): Promise<T | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new CorruptStateException(
        this.name,
        error instanceof Error ? error.message : 'invalid JSON',
      );
    }
    return this.codec.decode(raw, this.name);
  }

  /**
   * Atomically replace the record
   */
  async write(value: T): Promise<void> {
    const dir = dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true, mode: 0o700 });
    const tmp = join(dir, `${this.name}.${randomUUID()}.tmp`);
    const payload = `${JSON.stringify(this.codec.encode(value), null, 2)}\n`;
    try {
      await fs.writeFile(tmp, payload, { encoding: 'utf8', mode: 0o600 });
      await fs.rename(tmp, this.filePath);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw error;
    }
    this.logger.debug(`Wrote ${this.name}`);
  }

  /**
   * Run `fn` while holding the record's advisory lock
   */
  async withLock<R>(fn: () => Promise<R>): Promise<R> {
    await fs.mkdir(dirname(this.filePath), { recursive: true, mode: 0o700 });

    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(this.filePath, {
        realpath: false,
        stale: this.lockOptions.staleMs,
        retries: {
          retries: this.lockOptions.retries,
          factor: 2,
          minTimeout: 100,
          maxTimeout: 1000,
        },
      });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ELOCKED') {
        throw new LockContentionException(this.name);
      }
      throw error;
    }

    try {
      return await fn();
    } finally {
      try {
        await release();
      } catch (error) {
        this.logger.warn(
          `Failed to release lock on ${this.name}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    }
  }

  /**
   * Locked read-modify-write. `fn` receives the current value (null when
   * absent) and may return a `next` value to persist before the lock is
   * released. Nothing is written when `fn` throws or returns no `next`.
   */
  async update<R>(
    fn: (current: T | null) => Promise<RecordUpdate<T, R>>,
  ): Promise<R> {
    return this.withLock(async () => {
      const current = await this.read();
      const { next, result } = await fn(current);
      if (next !== undefined) {
        await this.write(next);
      }
      return result;
    });
  }
}

