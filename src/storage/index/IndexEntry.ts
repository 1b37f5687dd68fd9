/**
 * Location of a key's latest record in the log. Never persisted; replay
 * rebuilds it.
 */

export interface IndexEntry {
  readonly offset: number;
  readonly valueLength: number;
}
