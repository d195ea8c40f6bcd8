/**
 * Scheduled-transfer keeper: executes due recurring transfers.
 *
 * Every `checkIntervalMs` it collects the schedules whose next execution
 * time has passed and executes each one in its own transaction. One
 * failing schedule (say, underfunded) does not block the others; it is
 * reported through onError and retried on the next tick.
 */

import type { AuthContext } from "./auth.js";
import type { LedgerSystem } from "./system.js";
import type { ScheduledTransfer } from "./views/transfer-engine.js";

export interface KeeperOptions {
  /** How often to look for due schedules (ms). Default: 60_000 (1 min). */
  checkIntervalMs?: number;
  /** Callback for each executed schedule. */
  onExecute?: (schedule: ScheduledTransfer) => void;
  /** Callback for errors, with the schedule id that failed. */
  onError?: (error: unknown, scheduleId: number) => void;
}

export interface TickResult {
  executed: ScheduledTransfer[];
  failed: number[];
}

export interface TransferKeeper {
  start(): void;
  stop(): void;
  /** Run one pass now (tests call this directly). */
  tick(): TickResult;
  running(): boolean;
}

const DEFAULT_CHECK_INTERVAL_MS = 60_000;

export function createTransferKeeper(
  system: LedgerSystem,
  keeper: AuthContext,
  options: KeeperOptions = {},
): TransferKeeper {
  const checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
  const onExecute = options.onExecute;
  const onError = options.onError ?? ((err, id) => console.error(`[keeper] schedule ${id}:`, err));

  let timer: ReturnType<typeof setInterval> | null = null;

  function tick(): TickResult {
    const result: TickResult = { executed: [], failed: [] };
    for (const due of system.transfers.dueScheduledTransfers()) {
      try {
        const schedule = system.transfers.executeScheduledTransfer(keeper, due.id);
        result.executed.push(schedule);
        if (onExecute) onExecute(schedule);
      } catch (err) {
        result.failed.push(due.id);
        onError(err, due.id);
      }
    }
    return result;
  }

  return {
    start() {
      if (timer) return;
      timer = setInterval(tick, checkIntervalMs);
      tick();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    tick,

    running() {
      return timer !== null;
    },
  };
}
