/**
 * KeyIndex - in-memory map from key to the address of its latest record.
 *
 * Hash-based, so lookup and update are O(1) amortized. Replay order is write
 * order, which makes a plain overwrite per record the whole last-write-wins
 * mechanism.
 */

import { IKeyIndex, ILog } from '../../interfaces/Storage';
import { ReplaySummary } from '../log/LogRecord';
import { IndexEntry } from './IndexEntry';

export class KeyIndex implements IKeyIndex {
  private data = new Map<string, IndexEntry>();

  /**
   * The new mapping is only swapped in once replay finishes, so a replay that
   * rejects leaves the current contents alone.
   */
  async rebuild(log: ILog): Promise<ReplaySummary> {
    const rebuilt = new Map<string, IndexEntry>();
    const replay = log.replay();

    let step = await replay.next();
    while (!step.done) {
      const { key, offset, valueLength } = step.value;
      rebuilt.set(key, { offset, valueLength });
      step = await replay.next();
    }

    this.data = rebuilt;
    return step.value;
  }

  lookup(key: string): IndexEntry | null {
    return this.data.get(key) ?? null;
  }

  update(key: string, offset: number, valueLength: number): void {
    this.data.set(key, { offset, valueLength });
  }

  size(): number {
    return this.data.size;
  }

  entries(): Array<[string, IndexEntry]> {
    return [...this.data.entries()];
  }

  clear(): void {
    this.data.clear();
  }
}
