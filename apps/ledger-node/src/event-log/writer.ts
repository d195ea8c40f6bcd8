/**
 * Event log writer: in-memory append-only store.
 *
 * Every ledger mutation appends one event. The log takes part in the
 * host transaction, so reverted operations leave no events.
 */

import { toWire } from "../json.js";
import { AppendOnlyLog } from "../host/append-only-log.js";
import type { Snapshotable } from "../host/host-ledger.js";
import type { LedgerEvent } from "./schemas.js";

export interface EventQuery {
  fromSeq?: number;
  type?: string;
  limit?: number;
}

export class EventLog implements Snapshotable<number> {
  private readonly log = new AppendOnlyLog<LedgerEvent>();

  append(
    type: string,
    timestamp: number,
    actor: string,
    payload: Record<string, unknown>,
  ): LedgerEvent {
    return this.log.append({
      seq: this.log.length + 1,
      type,
      timestamp,
      actor,
      payload: toWire(payload),
    });
  }

  query(q: EventQuery = {}): LedgerEvent[] {
    const fromSeq = q.fromSeq ?? 1;
    const limit = q.limit ?? 100;
    return this.log
      .filter((e) => e.seq >= fromSeq && (q.type === undefined || e.type === q.type))
      .slice(0, limit);
  }

  count(): number {
    return this.log.length;
  }

  snapshot(): number {
    return this.log.snapshot();
  }

  restore(length: number): void {
    this.log.restore(length);
  }
}
