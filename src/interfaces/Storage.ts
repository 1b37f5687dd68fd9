import { GetResult } from '../common/Types';
import { ReplayedRecord, ReplaySummary } from '../storage/log/LogRecord';
import { IndexEntry } from '../storage/index/IndexEntry';

export interface ILog {
  readonly filePath: string;
  append(key: Buffer, value: Buffer): Promise<number>;
  replay(): AsyncGenerator<ReplayedRecord, ReplaySummary, undefined>;
  readValue(address: number, valueLength: number, expectedKey?: string): Promise<string>;
  truncate(length: number): Promise<void>;
}

export interface IKeyIndex {
  /**
   * Replace the whole mapping with one rebuilt from the log.
   * Later records overwrite earlier ones for the same key.
   *
   * @returns how replay ended
   */
  rebuild(log: ILog): Promise<ReplaySummary>;
  lookup(key: string): IndexEntry | null;
  update(key: string, offset: number, valueLength: number): void;
  size(): number;
  entries(): Array<[string, IndexEntry]>;
  clear(): void;
}

export interface StoreStats {
  readonly dataFile: string;
  readonly keys: number;
  readonly replay: ReplaySummary | null;
  /** False when unreadable bytes after the last usable record block appends. */
  readonly writable: boolean;
}

export interface IStorageEngine {
  initialize(): Promise<void>;
  set(key: string, value: string): Promise<void>;
  get(key: string): Promise<GetResult>;
  stats(): StoreStats;
  close(): Promise<void>;
}
