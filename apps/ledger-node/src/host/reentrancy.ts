/**
 * Per-engine re-entrancy guard.
 *
 * Value transfers can run a recipient hook, and a hook can call back into
 * the ledger. Guarded entry points reject nested entry into the same engine
 * while one of its guarded operations is still running.
 */

import { rejected } from "../errors.js";

export class ReentrancyGuard {
  private entered = false;

  constructor(private readonly label: string) {}

  run<T>(fn: () => T): T {
    if (this.entered) {
      throw rejected("reentrant_call", `${this.label}: reentrant call`);
    }
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
