/**
 * KVStore - storage engine over one append-only log and one in-memory index
 * Write Path: validate → Log.append (fsync) → Index.update
 * Read Path: Index.lookup → Log.readValue at the indexed address
 */

import { StoreConfig, TailRecoveryPolicy, resolveConfig } from '../common/Config';
import { InvalidArgumentError, StorageError } from '../common/Errors';
import { Logger, logger as defaultLogger } from '../common/Logger';
import { GetResult } from '../common/Types';
import { IKeyIndex, ILog, IStorageEngine, StoreStats } from '../interfaces/Storage';
import { KeyIndex } from './index/KeyIndex';
import { Log } from './log/Log';
import { ReplaySummary, isTornTail } from './log/LogRecord';
import { RecordCodec } from './log/RecordCodec';

export interface KVStoreDependencies {
  log?: ILog;
  index?: IKeyIndex;
  logger?: Logger;
}

export class KVStore implements IStorageEngine {
  private readonly config: StoreConfig;
  private readonly log: ILog;
  private readonly index: IKeyIndex;
  private readonly logger: Logger;

  private lastReplay: ReplaySummary | null = null;
  // Set while unreadable bytes remain after the last usable record: an
  // append would land behind them and be invisible to the next replay.
  private writeBlock: string | null = null;
  private initialized: boolean = false;
  private closed: boolean = false;

  /**
   * @param config - Store configuration, merged over the defaults
   * @param dependencies - Optional injected dependencies (for testing)
   */
  constructor(config: Partial<StoreConfig> = {}, dependencies?: KVStoreDependencies) {
    this.config = resolveConfig(config);
    this.logger = dependencies?.logger ?? defaultLogger;
    this.log = dependencies?.log ?? new Log({
      filePath: this.config.dataFile,
      maxKeyBytes: this.config.maxKeyBytes,
      maxValueBytes: this.config.maxValueBytes,
      logger: this.logger,
    });
    this.index = dependencies?.index ?? new KeyIndex();
  }

  /**
   * Rebuild the index from the log.
   *
   * A missing log file is an empty store. A log file that exists but cannot
   * be read rejects, leaving the store unusable rather than silently empty.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      throw new StorageError('KVStore already initialized');
    }
    if (this.closed) {
      throw new StorageError('KVStore is closed');
    }

    const summary = await this.index.rebuild(this.log);
    this.lastReplay = summary;

    if (summary.stopReason !== 'eof') {
      await this.recoverTail(summary);
    }

    this.initialized = true;
    this.logger.info('store.ready', {
      file: this.log.filePath,
      records: summary.recordsRead,
      keys: this.index.size(),
    });
  }

  /**
   * Durably write `value` under `key`.
   *
   * The index is only touched after the append has been synced, so a failed
   * append never leaves an entry pointing at a record that is not on disk.
   */
  async set(key: string, value: string): Promise<void> {
    this.ensureInitialized();
    if (this.writeBlock !== null) {
      throw new StorageError(this.writeBlock);
    }

    const keyBytes = this.encodeKey(key);
    const valueBytes = RecordCodec.encodeText(value);
    if (valueBytes === null) {
      throw new InvalidArgumentError('Value is not valid text');
    }

    const address = await this.log.append(keyBytes, valueBytes);
    this.index.update(key, address, valueBytes.length);
    this.logger.debug('store.set', { key, address, valueLength: valueBytes.length });
  }

  async get(key: string): Promise<GetResult> {
    this.ensureInitialized();

    if (key.length === 0) {
      return { kind: 'error', error: new InvalidArgumentError('Key must not be empty') };
    }

    const entry = this.index.lookup(key);
    if (entry === null) {
      return { kind: 'not_found' };
    }

    try {
      const value = await this.log.readValue(entry.offset, entry.valueLength, key);
      return { kind: 'found', value };
    } catch (err) {
      if (err instanceof StorageError) {
        this.logger.error('store.read_failed', {
          key,
          offset: entry.offset,
          err_code: err.kind,
          err_message: err.message,
        });
        return { kind: 'error', error: err };
      }
      throw err;
    }
  }

  stats(): StoreStats {
    return {
      dataFile: this.log.filePath,
      keys: this.index.size(),
      replay: this.lastReplay,
      writable: this.writeBlock === null,
    };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.initialized = false;
    this.index.clear();
    this.logger.debug('store.closed', { file: this.log.filePath });
  }

  /**
   * Only a torn tail is cut off, and only under the truncate policy. Bytes
   * that are complete but rejected (over the current size limits, bad key
   * encoding) are never deleted; they stay on disk and writes are refused
   * until the file is repaired or the limits are raised.
   */
  private async recoverTail(summary: ReplaySummary): Promise<void> {
    const unreadableBytes = summary.fileSize - summary.validBytes;

    if (isTornTail(summary.stopReason) && this.config.tailRecovery === TailRecoveryPolicy.TRUNCATE) {
      await this.log.truncate(summary.validBytes);
      this.logger.warn('store.tail_truncated', {
        file: this.log.filePath,
        reason: summary.stopReason,
        validBytes: summary.validBytes,
        discardedBytes: unreadableBytes,
      });
      return;
    }

    this.writeBlock =
      `Log ${this.log.filePath} has ${unreadableBytes} unreadable bytes at offset ${summary.validBytes} ` +
      `(${summary.stopReason}); writes are disabled until it is repaired`;
    this.logger.warn('store.replay_stopped_early', {
      file: this.log.filePath,
      reason: summary.stopReason,
      validBytes: summary.validBytes,
      unreadableBytes,
      writable: false,
    });
  }

  private encodeKey(key: string): Buffer {
    if (key.length === 0) {
      throw new InvalidArgumentError('Key must not be empty');
    }
    const bytes = RecordCodec.encodeText(key);
    if (bytes === null) {
      throw new InvalidArgumentError('Key is not valid text');
    }
    return bytes;
  }

  private ensureInitialized(): void {
    if (this.closed) {
      throw new StorageError('KVStore is closed');
    }
    if (!this.initialized) {
      throw new StorageError('KVStore not initialized');
    }
  }
}
