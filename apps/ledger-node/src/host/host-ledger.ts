/**
 * Host ledger: transaction boundary for every ledger operation.
 *
 * Keyed state lives in JournaledMaps, which record the prior value of
 * every entry an operation touches. Append-only logs and small scalar
 * records register as participants and snapshot in O(1). If the outermost
 * atomic() throws, the journal is replayed backwards and every participant
 * restored, so a failed operation leaves no partial state behind. Nested
 * atomic() calls join the outer transaction.
 *
 * Operations are synchronous. The event loop never interleaves two of them,
 * which gives single-writer ordering without locks.
 */

import { ValueBook } from "./value-book.js";
import { EventLog } from "../event-log/writer.js";
import type { Clock } from "./clock.js";

export interface Snapshotable<S> {
  snapshot(): S;
  restore(snapshot: S): void;
}

type Restorer = () => void;

/** Undo log of the transaction in progress. */
export interface Journal {
  readonly inTransaction: boolean;
  /** Changes at the start of every outermost transaction. */
  readonly transactionId: number;
  recordUndo(undo: Restorer): void;
}

export class HostLedger implements Journal {
  readonly book = new ValueBook(this);
  readonly events = new EventLog();
  private readonly participants: Array<() => Restorer> = [];
  private undo: Restorer[] = [];
  private depth = 0;
  private transactions = 0;

  constructor(readonly clock: Clock) {
    this.register(this.events);
  }

  now(): number {
    return this.clock.now();
  }

  register<S>(participant: Snapshotable<S>): void {
    this.participants.push(() => {
      const saved = participant.snapshot();
      return () => participant.restore(saved);
    });
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  get transactionId(): number {
    return this.transactions;
  }

  recordUndo(undo: Restorer): void {
    if (this.depth > 0) this.undo.push(undo);
  }

  atomic<T>(fn: () => T): T {
    if (this.depth > 0) return fn();

    const restorers = this.participants.map((take) => take());
    this.transactions++;
    this.depth++;
    try {
      return fn();
    } catch (err) {
      for (const undo of this.undo.reverse()) undo();
      for (const restore of restorers) restore();
      throw err;
    } finally {
      this.undo = [];
      this.depth--;
    }
  }
}
