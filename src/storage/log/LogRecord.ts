/**
 * Log record types.
 *
 * On disk a record is `u32 BE key length | u32 BE value length | key | value`.
 * A record's byte offset in the file is its address.
 */

export interface RecordHeader {
  readonly keyLength: number;
  readonly valueLength: number;
}

/** What replay yields per record. The value itself is skipped, not read. */
export interface ReplayedRecord {
  readonly key: string;
  readonly offset: number;
  readonly valueLength: number;
}

export type ReplayStopReason =
  | 'eof'
  | 'truncated_header'
  | 'truncated_key'
  | 'truncated_value'
  | 'empty_key'
  | 'key_too_large'
  | 'value_too_large'
  | 'invalid_key_encoding';

export interface ReplaySummary {
  readonly recordsRead: number;
  /** Offset just past the last complete record. */
  readonly validBytes: number;
  readonly fileSize: number;
  readonly stopReason: ReplayStopReason;
}

/**
 * A torn tail is an incomplete final record, the trace of an interrupted
 * append. Other stops sit on bytes that are complete but rejected by the
 * current limits or by UTF-8 validation.
 */
export function isTornTail(reason: ReplayStopReason): boolean {
  return reason === 'truncated_header' || reason === 'truncated_key' || reason === 'truncated_value';
}
