/**
 * Log - append-only record file, the only source of truth for key-value data.
 *
 * Every call opens the file, does its work and closes it again, so no handle
 * outlives a single append, replay or read.
 */

import * as fs from 'fs/promises';
import { AsyncMutex } from '../../common/AsyncMutex';
import { RecordLimits } from '../../common/Config';
import {
  CorruptRecordError,
  InvalidArgumentError,
  InvalidEncodingError,
  IOFailureError,
  isErrnoException,
} from '../../common/Errors';
import { Logger, logger as defaultLogger } from '../../common/Logger';
import { ILog } from '../../interfaces/Storage';
import { RECORD_HEADER_SIZE, RecordCodec } from './RecordCodec';
import { ReplayedRecord, ReplayStopReason, ReplaySummary } from './LogRecord';

export interface LogConfig extends RecordLimits {
  readonly filePath: string;
  readonly logger?: Logger | undefined;
}

export class Log implements ILog {
  readonly filePath: string;
  private readonly limits: RecordLimits;
  private readonly logger: Logger;

  private readonly writeLock = new AsyncMutex();

  constructor(config: LogConfig) {
    this.filePath = config.filePath;
    this.limits = {
      maxKeyBytes: config.maxKeyBytes,
      maxValueBytes: config.maxValueBytes,
    };
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Appends one record and fsyncs before resolving.
   *
   * @returns the record's address, i.e. the end of file before the write
   */
  async append(key: Buffer, value: Buffer): Promise<number> {
    this.validateLengths(key.length, value.length);
    const record = RecordCodec.encode(key, value);

    return this.writeLock.runExclusive(() => this.appendRecord(record));
  }

  /**
   * Yields every complete record from offset 0 in file order. Stops quietly at
   * the first record that is incomplete or fails validation; the summary
   * returned at the end says why.
   */
  async *replay(): AsyncGenerator<ReplayedRecord, ReplaySummary, undefined> {
    const handle = await this.openForRead();
    if (handle === null) {
      return { recordsRead: 0, validBytes: 0, fileSize: 0, stopReason: 'eof' };
    }

    try {
      const fileSize = await this.sizeOf(handle);
      const header = Buffer.allocUnsafe(RECORD_HEADER_SIZE);
      let offset = 0;
      let recordsRead = 0;
      let stopReason: ReplayStopReason = 'eof';

      while (offset < fileSize) {
        const headerBytes = await this.readAt(handle, header, RECORD_HEADER_SIZE, offset);
        if (headerBytes < RECORD_HEADER_SIZE) {
          stopReason = 'truncated_header';
          break;
        }

        const recordHeader = RecordCodec.decodeHeader(header);
        const { keyLength, valueLength } = recordHeader;
        const invalid = this.checkHeader(keyLength, valueLength);
        if (invalid !== null) {
          stopReason = invalid;
          break;
        }

        const keyStart = offset + RECORD_HEADER_SIZE;
        const keyBuffer = Buffer.allocUnsafe(keyLength);
        const keyBytes = await this.readAt(handle, keyBuffer, keyLength, keyStart);
        if (keyBytes < keyLength) {
          stopReason = 'truncated_key';
          break;
        }

        const key = RecordCodec.decodeText(keyBuffer);
        if (key === null) {
          stopReason = 'invalid_key_encoding';
          break;
        }

        const next = offset + RecordCodec.recordSize(recordHeader);
        if (next > fileSize) {
          stopReason = 'truncated_value';
          break;
        }

        yield { key, offset, valueLength };
        recordsRead++;
        offset = next;
      }

      this.logger.debug('log.replayed', { file: this.filePath, recordsRead, stopReason });
      return { recordsRead, validBytes: offset, fileSize, stopReason };
    } finally {
      await this.closeHandle(handle);
    }
  }

  /**
   * Reads the value of the record at `address`.
   *
   * When `expectedKey` is given the stored key bytes are compared with it, so
   * a plausible but foreign record is reported as corrupt instead of being
   * returned.
   */
  async readValue(address: number, valueLength: number, expectedKey?: string): Promise<string> {
    const handle = await this.openForRead();
    if (handle === null) {
      throw new IOFailureError(`Log file ${this.filePath} does not exist`);
    }

    try {
      const header = Buffer.allocUnsafe(RECORD_HEADER_SIZE);
      const headerBytes = await this.readAt(handle, header, RECORD_HEADER_SIZE, address);
      if (headerBytes < RECORD_HEADER_SIZE) {
        throw new CorruptRecordError(address, 'header extends past end of file');
      }

      const stored = RecordCodec.decodeHeader(header);
      if (stored.keyLength === 0 || stored.keyLength > this.limits.maxKeyBytes) {
        throw new CorruptRecordError(address, `implausible key length ${stored.keyLength}`);
      }
      if (stored.valueLength !== valueLength) {
        throw new CorruptRecordError(
          address,
          `value length ${stored.valueLength} does not match expected ${valueLength}`
        );
      }

      const body = Buffer.allocUnsafe(stored.keyLength + valueLength);
      const bodyBytes = await this.readAt(handle, body, body.length, address + RECORD_HEADER_SIZE);
      if (bodyBytes < body.length) {
        throw new CorruptRecordError(address, `expected ${body.length} bytes after header, found ${bodyBytes}`);
      }

      if (expectedKey !== undefined) {
        const storedKey = body.subarray(0, stored.keyLength);
        if (!storedKey.equals(Buffer.from(expectedKey, 'utf8'))) {
          throw new CorruptRecordError(address, 'stored key does not match the index');
        }
      }

      const value = RecordCodec.decodeText(body.subarray(stored.keyLength));
      if (value === null) {
        throw new InvalidEncodingError(address);
      }
      return value;
    } finally {
      await this.closeHandle(handle);
    }
  }

  /** Cuts the file down to `length` bytes and syncs. */
  async truncate(length: number): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      let handle: fs.FileHandle;
      try {
        handle = await fs.open(this.filePath, 'r+');
      } catch (err) {
        throw new IOFailureError(`Cannot open ${this.filePath} for truncation`, err);
      }

      try {
        await handle.truncate(length);
        await handle.sync();
      } catch (err) {
        throw new IOFailureError(`Cannot truncate ${this.filePath} to ${length} bytes`, err);
      } finally {
        await this.closeHandle(handle);
      }
    });
  }

  private async appendRecord(record: Buffer): Promise<number> {
    let handle: fs.FileHandle;
    try {
      handle = await fs.open(this.filePath, 'a');
    } catch (err) {
      throw new IOFailureError(`Cannot open ${this.filePath} for append`, err);
    }

    try {
      const address = await this.sizeOf(handle);

      try {
        const { bytesWritten } = await handle.write(record, 0, record.length);
        if (bytesWritten !== record.length) {
          throw new IOFailureError(`Short write to ${this.filePath}: ${bytesWritten} of ${record.length} bytes`);
        }
        await handle.sync();
      } catch (err) {
        await this.rollback(handle, address);
        throw err instanceof IOFailureError ? err : new IOFailureError(`Append to ${this.filePath} failed`, err);
      }

      return address;
    } finally {
      await this.closeHandle(handle);
    }
  }

  // A fragment left here would hide every later append from the next replay.
  private async rollback(handle: fs.FileHandle, address: number): Promise<void> {
    try {
      await handle.truncate(address);
    } catch (err) {
      this.logger.error('log.rollback_failed', {
        file: this.filePath,
        address,
        err_message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private validateLengths(keyLength: number, valueLength: number): void {
    if (keyLength === 0) {
      throw new InvalidArgumentError('Key must not be empty');
    }
    if (keyLength > this.limits.maxKeyBytes) {
      throw new InvalidArgumentError(`Key is ${keyLength} bytes, limit is ${this.limits.maxKeyBytes}`);
    }
    if (valueLength > this.limits.maxValueBytes) {
      throw new InvalidArgumentError(`Value is ${valueLength} bytes, limit is ${this.limits.maxValueBytes}`);
    }
  }

  private checkHeader(keyLength: number, valueLength: number): ReplayStopReason | null {
    if (keyLength === 0) return 'empty_key';
    if (keyLength > this.limits.maxKeyBytes) return 'key_too_large';
    if (valueLength > this.limits.maxValueBytes) return 'value_too_large';
    return null;
  }

  private async openForRead(): Promise<fs.FileHandle | null> {
    try {
      return await fs.open(this.filePath, 'r');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return null;
      }
      throw new IOFailureError(`Cannot open ${this.filePath}`, err);
    }
  }

  private async sizeOf(handle: fs.FileHandle): Promise<number> {
    try {
      const stats = await handle.stat();
      return stats.size;
    } catch (err) {
      throw new IOFailureError(`Cannot stat ${this.filePath}`, err);
    }
  }

  private async readAt(handle: fs.FileHandle, buffer: Buffer, length: number, position: number): Promise<number> {
    try {
      const { bytesRead } = await handle.read(buffer, 0, length, position);
      return bytesRead;
    } catch (err) {
      throw new IOFailureError(`Cannot read ${this.filePath} at offset ${position}`, err);
    }
  }

  private async closeHandle(handle: fs.FileHandle): Promise<void> {
    try {
      await handle.close();
    } catch (err) {
      this.logger.warn('log.close_failed', {
        file: this.filePath,
        err_message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
