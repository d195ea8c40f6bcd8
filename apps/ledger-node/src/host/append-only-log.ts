/**
 * Append-only record list.
 * Snapshot is the length; restore truncates, so rollbacks cost O(1).
 */

import type { Snapshotable } from "./host-ledger.js";

export class AppendOnlyLog<T> implements Snapshotable<number> {
  private readonly entries: T[] = [];

  append(entry: T): T {
    this.entries.push(entry);
    return entry;
  }

  get length(): number {
    return this.entries.length;
  }

  at(index: number): T | undefined {
    return this.entries[index];
  }

  slice(offset = 0, limit = this.entries.length): T[] {
    return this.entries.slice(offset, offset + limit);
  }

  filter(predicate: (entry: T) => boolean): T[] {
    return this.entries.filter(predicate);
  }

  snapshot(): number {
    return this.entries.length;
  }

  restore(length: number): void {
    this.entries.length = length;
  }
}
