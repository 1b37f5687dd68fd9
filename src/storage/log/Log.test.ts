import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, appendFile, mkdir, open, stat, truncate } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Log } from './Log';
import { RecordCodec } from './RecordCodec';
import { ReplayedRecord, ReplaySummary } from './LogRecord';
import {
  CorruptRecordError,
  InvalidArgumentError,
  InvalidEncodingError,
  IOFailureError,
} from '../../common/Errors';
import { Logger } from '../../common/Logger';

const quiet = new Logger('silent');

function record(key: string, value: string): Buffer {
  return RecordCodec.encode(Buffer.from(key, 'utf8'), Buffer.from(value, 'utf8'));
}

async function collect(log: Log): Promise<{ records: ReplayedRecord[]; summary: ReplaySummary }> {
  const records: ReplayedRecord[] = [];
  const replay = log.replay();

  let step = await replay.next();
  while (!step.done) {
    records.push(step.value);
    step = await replay.next();
  }
  return { records, summary: step.value };
}

describe('Log', () => {
  let testDir: string;
  let filePath: string;
  let log: Log;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'appendlog-kv-log-'));
    filePath = join(testDir, 'data.db');
    log = new Log({ filePath, maxKeyBytes: 64, maxValueBytes: 1024, logger: quiet });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  // Every handle Log opens shares this prototype, so spies on it reach them.
  async function fileHandlePrototype(): Promise<FileHandle> {
    const handle = await open(filePath, 'r');
    try {
      return Object.getPrototypeOf(handle);
    } finally {
      await handle.close();
    }
  }

  describe('append', () => {
    it('creates the file and returns the prior end of file as the address', async () => {
      expect(await log.append(Buffer.from('a'), Buffer.from('1'))).toBe(0);
      expect(await log.append(Buffer.from('b'), Buffer.from('hello world'))).toBe(10);

      const contents = await readFile(filePath);
      expect(contents.equals(Buffer.concat([record('a', '1'), record('b', 'hello world')]))).toBe(true);
    });

    it('hands out distinct addresses to overlapping appends', async () => {
      const addresses = await Promise.all([
        log.append(Buffer.from('x'), Buffer.from('1')),
        log.append(Buffer.from('y'), Buffer.from('2')),
        log.append(Buffer.from('z'), Buffer.from('3')),
      ]);

      expect(addresses).toEqual([0, 10, 20]);
      expect((await stat(filePath)).size).toBe(30);
    });

    it('rejects an empty key without creating the file', async () => {
      await expect(log.append(Buffer.alloc(0), Buffer.from('v'))).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(stat(filePath)).rejects.toThrow(/ENOENT/);
    });

    it('rejects keys and values over the configured limits', async () => {
      await expect(log.append(Buffer.alloc(65, 'k'), Buffer.from('v')))
        .rejects.toThrow('Key is 65 bytes, limit is 64');
      await expect(log.append(Buffer.from('k'), Buffer.alloc(1025, 'v')))
        .rejects.toThrow('Value is 1025 bytes, limit is 1024');
    });

    it('fails with IOFailureError when the file cannot be opened', async () => {
      await mkdir(filePath);

      await expect(log.append(Buffer.from('a'), Buffer.from('1'))).rejects.toBeInstanceOf(IOFailureError);
    });

    it('rolls back a record whose sync failed', async () => {
      await log.append(Buffer.from('a'), Buffer.from('1'));
      const proto = await fileHandlePrototype();
      vi.spyOn(proto, 'sync').mockRejectedValueOnce(new Error('EIO: i/o error'));

      const failed = log.append(Buffer.from('b'), Buffer.from('2'));

      await expect(failed).rejects.toBeInstanceOf(IOFailureError);
      await expect(failed).rejects.toThrow(`Append to ${filePath} failed: EIO: i/o error`);
      expect((await stat(filePath)).size).toBe(10);
      expect(await log.append(Buffer.from('c'), Buffer.from('3'))).toBe(10);
      expect((await readFile(filePath)).equals(Buffer.concat([record('a', '1'), record('c', '3')]))).toBe(true);
    });

    it('rolls back a record whose write failed', async () => {
      await log.append(Buffer.from('a'), Buffer.from('1'));
      const proto = await fileHandlePrototype();
      vi.spyOn(proto, 'write').mockRejectedValueOnce(new Error('ENOSPC: no space left on device'));

      await expect(log.append(Buffer.from('b'), Buffer.from('2'))).rejects.toThrow(
        `Append to ${filePath} failed: ENOSPC: no space left on device`
      );
      expect((await stat(filePath)).size).toBe(10);
      expect(await log.append(Buffer.from('b'), Buffer.from('2'))).toBe(10);
    });
  });

  describe('replay', () => {
    it('treats a missing file as an empty log', async () => {
      const { records, summary } = await collect(log);

      expect(records).toEqual([]);
      expect(summary).toEqual({ recordsRead: 0, validBytes: 0, fileSize: 0, stopReason: 'eof' });
    });

    it('yields keys, offsets and value lengths in file order', async () => {
      await log.append(Buffer.from('a'), Buffer.from('1'));
      await log.append(Buffer.from('b'), Buffer.from('hello world'));
      await log.append(Buffer.from('a'), Buffer.from('2'));

      const { records, summary } = await collect(log);

      expect(records).toEqual([
        { key: 'a', offset: 0, valueLength: 1 },
        { key: 'b', offset: 10, valueLength: 11 },
        { key: 'a', offset: 30, valueLength: 1 },
      ]);
      expect(summary).toEqual({ recordsRead: 3, validBytes: 40, fileSize: 40, stopReason: 'eof' });
    });

    it('starts over from offset 0 on every call', async () => {
      await log.append(Buffer.from('a'), Buffer.from('1'));

      const first = await collect(log);
      const second = await collect(log);

      expect(second).toEqual(first);
    });

    it('stops before a partial length field', async () => {
      await writeFile(filePath, Buffer.concat([record('a', '1'), record('b', 'hello world').subarray(0, 5)]));

      const { records, summary } = await collect(log);

      expect(records).toEqual([{ key: 'a', offset: 0, valueLength: 1 }]);
      expect(summary).toEqual({ recordsRead: 1, validBytes: 10, fileSize: 15, stopReason: 'truncated_header' });
    });

    it('stops before a partial key', async () => {
      await writeFile(filePath, Buffer.concat([record('a', '1'), record('carrot', 'v').subarray(0, 10)]));

      const { summary } = await collect(log);

      expect(summary.stopReason).toBe('truncated_key');
      expect(summary.validBytes).toBe(10);
    });

    it('stops when the value runs past the end of the file', async () => {
      const torn = record('b', 'hello world');
      await writeFile(filePath, Buffer.concat([record('a', '1'), torn.subarray(0, torn.length - 1)]));

      const { records, summary } = await collect(log);

      expect(records).toHaveLength(1);
      expect(summary.stopReason).toBe('truncated_value');
    });

    it('stops at length fields over the sanity bounds', async () => {
      const hugeKey = Buffer.from([0, 0, 0, 65, 0, 0, 0, 0]);
      await writeFile(filePath, Buffer.concat([record('a', '1'), hugeKey, Buffer.alloc(65, 'k')]));
      expect((await collect(log)).summary.stopReason).toBe('key_too_large');

      const hugeValue = Buffer.from([0, 0, 0, 1, 0, 0, 4, 1]);
      await writeFile(filePath, Buffer.concat([record('a', '1'), hugeValue, Buffer.from('k')]));
      expect((await collect(log)).summary.stopReason).toBe('value_too_large');
    });

    it('stops at a zero-length key', async () => {
      await writeFile(filePath, Buffer.concat([record('a', '1'), Buffer.alloc(8)]));

      const { records, summary } = await collect(log);

      expect(records).toHaveLength(1);
      expect(summary.stopReason).toBe('empty_key');
    });

    it('stops at a key that is not valid UTF-8', async () => {
      const badKey = RecordCodec.encode(Buffer.from([0xff]), Buffer.from('v'));
      await writeFile(filePath, Buffer.concat([record('a', '1'), badKey, record('c', '3')]));

      const { records, summary } = await collect(log);

      expect(records.map(r => r.key)).toEqual(['a']);
      expect(summary).toEqual({ recordsRead: 1, validBytes: 10, fileSize: 30, stopReason: 'invalid_key_encoding' });
    });
  });

  describe('readValue', () => {
    it('returns the value stored at an address', async () => {
      await log.append(Buffer.from('a'), Buffer.from('1'));
      const address = await log.append(Buffer.from('greeting'), Buffer.from('héllo wörld'));

      expect(await log.readValue(address, 13, 'greeting')).toBe('héllo wörld');
    });

    it('reports a value length that disagrees with the stored one', async () => {
      await log.append(Buffer.from('a'), Buffer.from('hello'));

      await expect(log.readValue(0, 4)).rejects.toThrow(
        new CorruptRecordError(0, 'value length 5 does not match expected 4')
      );
    });

    it('reports a record cut short after startup', async () => {
      await log.append(Buffer.from('a'), Buffer.from('hello'));
      await truncate(filePath, 10);

      const read = log.readValue(0, 5, 'a');

      await expect(read).rejects.toBeInstanceOf(CorruptRecordError);
      await expect(read).rejects.toThrow('Corrupt record at offset 0: expected 6 bytes after header, found 2');
    });

    it('reports an address past the end of the file', async () => {
      await log.append(Buffer.from('a'), Buffer.from('1'));

      await expect(log.readValue(100, 1)).rejects.toThrow('Corrupt record at offset 100: header extends past end of file');
    });

    it('reports a stored key that differs from the expected one', async () => {
      await log.append(Buffer.from('a'), Buffer.from('1'));

      await expect(log.readValue(0, 1, 'b')).rejects.toThrow('stored key does not match the index');
    });

    it('fails with InvalidEncodingError for a value that is not UTF-8', async () => {
      await writeFile(filePath, RecordCodec.encode(Buffer.from('a'), Buffer.from([0xc3, 0x28])));

      await expect(log.readValue(0, 2, 'a')).rejects.toBeInstanceOf(InvalidEncodingError);
    });

    it('fails with IOFailureError when the file is gone', async () => {
      await expect(log.readValue(0, 1)).rejects.toBeInstanceOf(IOFailureError);
    });
  });

  describe('truncate', () => {
    it('drops everything past the given length', async () => {
      await log.append(Buffer.from('a'), Buffer.from('1'));
      await appendFile(filePath, Buffer.from([0, 0, 0]));

      await log.truncate(10);

      expect((await readFile(filePath)).equals(record('a', '1'))).toBe(true);
      expect(await log.append(Buffer.from('b'), Buffer.from('2'))).toBe(10);
    });
  });
});
