/**
 * Map whose entries take part in the host transaction.
 *
 * The first time a key is read or written inside a transaction, its prior
 * value (or its absence) goes into the host's undo journal. Rollback puts
 * back exactly the entries the operation touched, so the cost of a
 * transaction follows what it touches, not how much the map holds.
 *
 * Values handed out by get() may be mutated in place: the journal already
 * holds a copy taken before the caller saw them.
 */

import type { Journal } from "./host-ledger.js";

export class JournaledMap<K, V> {
  private readonly entries: Map<K, V>;
  private readonly touched = new Set<K>();
  private touchedIn = -1;

  constructor(
    private readonly journal: Journal,
    init?: Iterable<readonly [K, V]>,
  ) {
    this.entries = new Map(init);
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get(key: K): V | undefined {
    this.touch(key);
    return this.entries.get(key);
  }

  set(key: K, value: V): this {
    this.touch(key);
    this.entries.set(key, value);
    return this;
  }

  delete(key: K): boolean {
    this.touch(key);
    return this.entries.delete(key);
  }

  values(): V[] {
    return Array.from(this.entries, ([key, value]) => {
      this.touch(key);
      return value;
    });
  }

  /** Read-only view for pure lookups; reading through it journals nothing. */
  get view(): ReadonlyMap<K, V> {
    return this.entries;
  }

  private touch(key: K): void {
    if (!this.journal.inTransaction) return;
    const tx = this.journal.transactionId;
    if (this.touchedIn !== tx) {
      this.touched.clear();
      this.touchedIn = tx;
    }
    if (this.touched.has(key)) return;
    this.touched.add(key);

    const current = this.entries.get(key);
    if (current === undefined) {
      this.journal.recordUndo(() => {
        this.entries.delete(key);
      });
    } else {
      const saved = structuredClone(current);
      this.journal.recordUndo(() => {
        this.entries.set(key, saved);
      });
    }
  }
}
