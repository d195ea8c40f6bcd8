/**
 * Treasury ledger: weighted funds, deposits, expenses, profit sharing.
 *
 * Active fund allocations always total 10000 bps. The built-in
 * Unallocated fund absorbs whatever the other active funds leave, plus the
 * rounding remainder of every apportioned deposit.
 */

import {
  NATIVE_ASSET,
  UNALLOCATED_FUND_NAME,
  apportionDeposit,
  deriveAccount,
  fundIdFromName,
  isBps,
  planProportionalDraw,
  sumBigInt,
  unallocatedRemainder,
  BPS_DENOMINATOR,
  type Address,
  type Hash32,
} from "@tapa/economics";
import { requireCapability, type AuthContext } from "../auth.js";
import { invalid, notFound, rejected } from "../errors.js";
import { AppendOnlyLog } from "../host/append-only-log.js";
import { JournaledMap } from "../host/journaled-map.js";
import { ReentrancyGuard } from "../host/reentrancy.js";
import type { HostLedger } from "../host/host-ledger.js";
import {
  TREASURY_ALLOCATIONS_EVENT,
  TREASURY_DEPOSIT_EVENT,
  TREASURY_EXPENSE_EVENT,
  TREASURY_FUND_CREATED_EVENT,
  TREASURY_FUND_DEACTIVATED_EVENT,
  TREASURY_FUND_UPDATED_EVENT,
} from "../event-log/schemas.js";
import { requireAccount, requirePositive } from "./validate.js";

// ── Types ──────────────────────────────────────────────────────────

export interface Fund {
  /** keccak256 of the name; the name never changes. */
  id: Hash32;
  name: string;
  allocationBps: bigint;
  balance: bigint;
  active: boolean;
  /** Set once at creation; a drained fund still exists. */
  exists: true;
  createdAt: number;
}

export type DepositSource = "funds" | "fees";

export interface Deposit {
  id: number;
  sender: Address;
  amount: bigint;
  description: string;
  source: DepositSource;
  /** Target fund of a directed deposit; null when apportioned. */
  fundId: Hash32 | null;
  timestamp: number;
}

export interface Expense {
  id: number;
  fundId: Hash32;
  recipient: Address;
  amount: bigint;
  approver: Address;
  description: string;
  timestamp: number;
}

export interface InitialFund {
  name: string;
  allocationBps: bigint;
}

export interface TreasuryOptions {
  initialFunds?: readonly InitialFund[];
}

// ── Ledger ─────────────────────────────────────────────────────────

export class TreasuryLedger {
  readonly account: Address = deriveAccount("treasury");
  readonly unallocatedId: Hash32 = fundIdFromName(UNALLOCATED_FUND_NAME);

  private readonly funds: JournaledMap<Hash32, Fund>;
  /** Creation order, used for listings and deterministic apportionment. */
  private readonly order = new AppendOnlyLog<Hash32>();
  private readonly deposits = new AppendOnlyLog<Deposit>();
  private readonly expenses = new AppendOnlyLog<Expense>();
  private readonly guard = new ReentrancyGuard("treasury");

  constructor(
    private readonly host: HostLedger,
    options: TreasuryOptions = {},
  ) {
    this.funds = new JournaledMap(host);
    host.register(this.order);
    host.register(this.deposits);
    host.register(this.expenses);

    this.insertFund(UNALLOCATED_FUND_NAME, BPS_DENOMINATOR);
    for (const f of options.initialFunds ?? []) {
      this.addFund(f.name, f.allocationBps);
    }
  }

  // ── Deposits ─────────────────────────────────────────────────────

  depositFunds(
    auth: AuthContext,
    amount: bigint,
    description: string,
    fundId?: Hash32,
  ): Deposit {
    return this.host.atomic(() => {
      requirePositive(amount);
      const target = fundId === undefined ? null : this.activeFund(fundId).id;
      this.host.book.transfer(NATIVE_ASSET, auth.caller, this.account, amount);
      return this.credit(auth.caller, amount, description, "funds", target);
    });
  }

  depositFees(auth: AuthContext, amount: bigint, description: string): Deposit {
    return this.host.atomic(() => {
      requireCapability(auth, "fee_collector");
      requirePositive(amount);
      this.host.book.transfer(NATIVE_ASSET, auth.caller, this.account, amount);
      return this.credit(auth.caller, amount, description, "fees", null);
    });
  }

  // ── Withdrawals ──────────────────────────────────────────────────

  withdraw(
    auth: AuthContext,
    fundId: Hash32,
    recipient: string,
    amount: bigint,
    description: string,
  ): Expense {
    return this.guard.run(() =>
      this.host.atomic(() => {
        requireCapability(auth, "spender");
        const to = requireAccount(recipient, "recipient");
        requirePositive(amount);
        const fund = this.activeFund(fundId);
        if (fund.balance < amount) {
          throw rejected(
            "insufficient_fund_balance",
            `${fund.name} holds ${fund.balance}, requested ${amount}`,
          );
        }
        fund.balance -= amount;
        const expense = this.recordExpense(fund.id, to, amount, auth.caller, description);
        this.host.book.transfer(NATIVE_ASSET, this.account, to, amount);
        return expense;
      }),
    );
  }

  /**
   * Profit-sharing withdrawal. Drains Unallocated first, otherwise draws
   * from every active fund in proportion to its balance.
   */
  withdrawFunds(auth: AuthContext, recipient: string, amount: bigint): Expense[] {
    return this.guard.run(() =>
      this.host.atomic(() => {
        requireCapability(auth, "profit_sharing");
        const to = requireAccount(recipient, "recipient");
        requirePositive(amount);

        const active = this.activeFunds();
        const plan = planProportionalDraw(
          amount,
          active.map((f) => ({ id: f.id, balance: f.balance })),
          this.unallocatedId,
        );
        if (!plan) {
          throw rejected(
            "insufficient_treasury_balance",
            `treasury holds ${this.totalBalance()}, requested ${amount}`,
          );
        }

        const out: Expense[] = [];
        for (const fund of active) {
          const take = plan.get(fund.id);
          if (take === undefined) continue;
          fund.balance -= take;
          out.push(this.recordExpense(fund.id, to, take, auth.caller, "profit sharing"));
        }
        this.host.book.transfer(NATIVE_ASSET, this.account, to, amount);
        return out;
      }),
    );
  }

  // ── Fund administration ──────────────────────────────────────────

  createFund(auth: AuthContext, name: string, allocationBps: bigint): Fund {
    return this.host.atomic(() => {
      requireCapability(auth, "treasurer");
      const fund = this.addFund(name, allocationBps);
      this.host.events.append(TREASURY_FUND_CREATED_EVENT, this.host.now(), auth.caller, {
        fundId: fund.id,
        name: fund.name,
        allocationBps: fund.allocationBps,
      });
      return { ...fund };
    });
  }

  /** Reweight a fund. Names are fixed at creation since they derive the id. */
  updateFund(auth: AuthContext, fundId: Hash32, changes: { allocationBps: bigint }): Fund {
    return this.host.atomic(() => {
      requireCapability(auth, "treasurer");
      const fund = this.activeFund(fundId);
      if (fund.id === this.unallocatedId) {
        throw rejected("unallocated_fund_immutable", "Unallocated is managed by the treasury");
      }
      if (!isBps(changes.allocationBps)) {
        throw invalid("invalid_allocation", "allocation must be within 0-10000 bps");
      }
      fund.allocationBps = changes.allocationBps;
      this.renormalize();
      this.host.events.append(TREASURY_FUND_UPDATED_EVENT, this.host.now(), auth.caller, {
        fundId: fund.id,
        name: fund.name,
        allocationBps: fund.allocationBps,
      });
      return { ...fund };
    });
  }

  /** Deactivate a fund; its balance and allocation move to Unallocated. */
  deactivateFund(auth: AuthContext, fundId: Hash32): Fund {
    return this.host.atomic(() => {
      requireCapability(auth, "treasurer");
      const fund = this.activeFund(fundId);
      if (fund.id === this.unallocatedId) {
        throw rejected("unallocated_fund_immutable", "Unallocated cannot be deactivated");
      }
      const unallocated = this.unallocated();
      const swept = fund.balance;
      unallocated.balance += swept;
      fund.balance = 0n;
      fund.allocationBps = 0n;
      fund.active = false;
      this.renormalize();
      this.host.events.append(TREASURY_FUND_DEACTIVATED_EVENT, this.host.now(), auth.caller, {
        fundId: fund.id,
        swept,
      });
      return { ...fund };
    });
  }

  /**
   * Bulk allocation update. Funds not listed keep their allocation; the
   * resulting active total must be exactly 10000 or nothing changes.
   */
  updateAllFundAllocations(
    auth: AuthContext,
    entries: ReadonlyArray<{ fundId: Hash32; allocationBps: bigint }>,
  ): Fund[] {
    return this.host.atomic(() => {
      requireCapability(auth, "treasurer");
      const seen = new Set<Hash32>();
      for (const entry of entries) {
        if (seen.has(entry.fundId)) {
          throw invalid("duplicate_fund", `fund ${entry.fundId} listed twice`);
        }
        seen.add(entry.fundId);
        if (!isBps(entry.allocationBps)) {
          throw invalid("invalid_allocation", "allocation must be within 0-10000 bps");
        }
        this.activeFund(entry.fundId).allocationBps = entry.allocationBps;
      }
      const total = this.activeAllocationTotal();
      if (total !== BPS_DENOMINATOR) {
        throw rejected(
          "allocation_sum_mismatch",
          `active allocations total ${total} bps, expected ${BPS_DENOMINATOR}`,
        );
      }
      this.host.events.append(TREASURY_ALLOCATIONS_EVENT, this.host.now(), auth.caller, {
        allocations: this.activeFunds().map((f) => ({ fundId: f.id, allocationBps: f.allocationBps })),
      });
      return this.listFunds();
    });
  }

  // ── Queries ──────────────────────────────────────────────────────

  getFundDetails(fundId: Hash32): Fund {
    const fund = this.funds.get(fundId);
    if (!fund) throw notFound("fund_not_found", `no fund ${fundId}`);
    return { ...fund };
  }

  listFunds(includeInactive = false): Fund[] {
    const out: Fund[] = [];
    for (const id of this.order.slice()) {
      const fund = this.funds.get(id);
      if (fund && (includeInactive || fund.active)) out.push({ ...fund });
    }
    return out;
  }

  getDeposits(offset = 0, limit = 50): Deposit[] {
    return this.deposits.slice(offset, limit);
  }

  getExpenses(offset = 0, limit = 50): Expense[] {
    return this.expenses.slice(offset, limit);
  }

  totalBalance(): bigint {
    return sumBigInt(this.funds.values().map((f) => f.balance));
  }

  activeAllocationTotal(): bigint {
    return sumBigInt(this.activeFunds().map((f) => f.allocationBps));
  }

  // ── Internals ────────────────────────────────────────────────────

  private addFund(rawName: string, allocationBps: bigint): Fund {
    const name = rawName.trim();
    if (!name) throw invalid("invalid_name", "fund name must not be empty");
    if (!isBps(allocationBps)) {
      throw invalid("invalid_allocation", "allocation must be within 0-10000 bps");
    }
    if (this.funds.has(fundIdFromName(name))) {
      throw rejected("fund_exists", `fund "${name}" already exists`);
    }
    const fund = this.insertFund(name, allocationBps);
    this.renormalize();
    return fund;
  }

  private insertFund(name: string, allocationBps: bigint): Fund {
    const fund: Fund = {
      id: fundIdFromName(name),
      name,
      allocationBps,
      balance: 0n,
      active: true,
      exists: true,
      createdAt: this.host.now(),
    };
    this.funds.set(fund.id, fund);
    this.order.append(fund.id);
    return fund;
  }

  /** Give Unallocated whatever the other active funds leave. */
  private renormalize(): void {
    const others = this.activeFunds()
      .filter((f) => f.id !== this.unallocatedId)
      .map((f) => f.allocationBps);
    const remainder = unallocatedRemainder(others);
    if (remainder === null) {
      throw rejected("allocation_exceeds_total", "fund allocations would exceed 10000 bps");
    }
    this.unallocated().allocationBps = remainder;
  }

  private credit(
    sender: Address,
    amount: bigint,
    description: string,
    source: DepositSource,
    fundId: Hash32 | null,
  ): Deposit {
    if (fundId !== null) {
      this.activeFund(fundId).balance += amount;
    } else {
      const shares = apportionDeposit(
        amount,
        this.activeFunds().map((f) => ({ id: f.id, allocationBps: f.allocationBps })),
        this.unallocatedId,
      );
      for (const [id, share] of shares) {
        const fund = this.funds.get(id);
        if (fund) fund.balance += share;
      }
    }
    const deposit = this.deposits.append({
      id: this.deposits.length + 1,
      sender,
      amount,
      description,
      source,
      fundId,
      timestamp: this.host.now(),
    });
    this.host.events.append(TREASURY_DEPOSIT_EVENT, deposit.timestamp, sender, { ...deposit });
    return deposit;
  }

  private recordExpense(
    fundId: Hash32,
    recipient: Address,
    amount: bigint,
    approver: Address,
    description: string,
  ): Expense {
    const expense = this.expenses.append({
      id: this.expenses.length + 1,
      fundId,
      recipient,
      amount,
      approver,
      description,
      timestamp: this.host.now(),
    });
    this.host.events.append(TREASURY_EXPENSE_EVENT, expense.timestamp, approver, { ...expense });
    return expense;
  }

  private activeFund(fundId: Hash32): Fund {
    const fund = this.funds.get(fundId);
    if (!fund) throw notFound("fund_not_found", `no fund ${fundId}`);
    if (!fund.active) throw rejected("fund_inactive", `fund ${fund.name} is inactive`);
    return fund;
  }

  private activeFunds(): Fund[] {
    const out: Fund[] = [];
    for (const id of this.order.slice()) {
      const fund = this.funds.get(id);
      if (fund?.active) out.push(fund);
    }
    return out;
  }

  private unallocated(): Fund {
    const fund = this.funds.get(this.unallocatedId);
    if (!fund) throw notFound("fund_not_found", "Unallocated fund missing");
    return fund;
  }
}
