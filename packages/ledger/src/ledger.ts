/**
 * @histcost/ledger — Core Ledger class.
 *
 * Append-only double-entry ledger. Once a posting is written it is
 * permanent; postings are only ever aggregated.
 *
 * API surface:
 * - registerAccount() / registerChart() — Build the chart of accounts
 * - append() — Append a balanced posting group
 * - getBalance() — Account balance by code
 * - getTrialBalance() — Aggregate every posting into a trial balance
 * - getEntries() — Query postings with optional filters
 * - getEntriesByCorrelation() — All postings of one group
 * - snapshot() / fromSnapshot() — Serialize and replay
 */

import type { AccountRef, Posting } from "@histcost/types";
import { AccountRegistry } from "./accounts.js";
import { computeAccountBalance, computeTrialBalance } from "./balance-calculator.js";
import { parseAmount, validateMoney } from "./money-math.js";
import type {
  AccountBalance,
  AppendOptions,
  AppendResult,
  LedgerAccount,
  LedgerSnapshot,
  PostingFilter,
  PostingGroup,
  TrialBalance,
  TrialBalanceOptions,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Append-only double-entry ledger.
 *
 * Every append must be a balanced group of postings where total debits
 * equal total credits within the same currency.
 */
export class Ledger {
  private readonly _accounts: AccountRegistry = new AccountRegistry();
  private readonly _postings: Posting[] = [];
  private readonly _postingIds: Set<string> = new Set();
  private readonly _groups: PostingGroup[] = [];

  // ─── Account Management ──────────────────────────────────────────────

  registerAccount(ref: AccountRef, timestamp?: string): LedgerAccount {
    const ts = timestamp ?? new Date().toISOString();
    return this._accounts.register(ref, ts);
  }

  /**
   * Register a whole chart of accounts at once.
   */
  registerChart(refs: readonly AccountRef[], timestamp?: string): readonly LedgerAccount[] {
    const ts = timestamp ?? new Date().toISOString();
    return this._accounts.registerAll(refs, ts);
  }

  getAccount(id: string): LedgerAccount | undefined {
    return this._accounts.get(id);
  }

  hasAccount(id: string): boolean {
    return this._accounts.has(id);
  }

  getAccounts(): readonly LedgerAccount[] {
    return this._accounts.getAll();
  }

  // ─── Core Append (The Only Write Operation) ──────────────────────────

  /**
   * Append a balanced posting group.
   *
   * Validation rules (all must pass):
   * 1. Postings array must not be empty
   * 2. All postings must share the same correlationId
   * 3. All posting IDs must be unique (globally)
   * 4. All referenced accounts must exist
   * 5. All Money values must be valid
   * 6. All posting amounts must be positive
   * 7. Total debits must equal total credits (per currency)
   *
   * Throws LedgerError if any validation fails; nothing is written then.
   */
  append(postings: readonly Posting[], options?: AppendOptions): AppendResult {
    const [first] = postings;
    if (first === undefined) {
      throw new LedgerError("EMPTY_TRANSACTION", "Cannot append an empty set of postings");
    }

    const correlationId = first.correlationId;
    for (const posting of postings) {
      if (posting.correlationId !== correlationId) {
        throw new LedgerError(
          "MIXED_CORRELATION_ID",
          `All postings must share the same correlationId. Expected "${correlationId}", got "${posting.correlationId}"`,
        );
      }
    }

    const batchIds = new Set<string>();
    for (const posting of postings) {
      if (this._postingIds.has(posting.id)) {
        throw new LedgerError(
          "DUPLICATE_ENTRY_ID",
          `Posting ID already exists in ledger: "${posting.id}"`,
        );
      }
      if (batchIds.has(posting.id)) {
        throw new LedgerError(
          "DUPLICATE_ENTRY_ID",
          `Duplicate posting ID within group: "${posting.id}"`,
        );
      }
      batchIds.add(posting.id);
    }

    for (const posting of postings) {
      this._accounts.assertExists(posting.accountId);
      validateMoney(posting.money);
    }

    for (const posting of postings) {
      const scaled = parseAmount(posting.money.amount, posting.money.decimals);
      if (scaled <= 0n) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `Posting amounts must be positive. Posting "${posting.id}" has amount "${posting.money.amount}"`,
        );
      }
    }

    this._assertBalanced(postings);

    for (const posting of postings) {
      this._postings.push(posting);
      this._postingIds.add(posting.id);
    }

    this._groups.push({
      correlationId,
      postings: [...postings],
      timestamp: first.timestamp,
      sourceRef: options?.sourceRef ?? first.sourceRef,
      description: options?.description,
    });

    return {
      correlationId,
      postingCount: postings.length,
      timestamp: first.timestamp,
    };
  }

  private _assertBalanced(postings: readonly Posting[]): void {
    const currencyTotals = new Map<string, { debits: bigint; credits: bigint }>();

    for (const posting of postings) {
      const currency = posting.money.currency;
      let totals = currencyTotals.get(currency);
      if (totals === undefined) {
        totals = { debits: 0n, credits: 0n };
        currencyTotals.set(currency, totals);
      }

      const amount = parseAmount(posting.money.amount, posting.money.decimals);

      if (posting.type === "debit") {
        totals.debits += amount;
      } else {
        totals.credits += amount;
      }
    }

    for (const [currency, totals] of currencyTotals) {
      if (totals.debits !== totals.credits) {
        throw new LedgerError(
          "UNBALANCED_TRANSACTION",
          `Posting group is unbalanced for currency "${currency}": debits=${totals.debits.toString()}, credits=${totals.credits.toString()}`,
        );
      }
    }
  }

  // ─── Query Operations ────────────────────────────────────────────────

  getBalance(accountId: string): AccountBalance {
    return computeAccountBalance(accountId, this._postings, this._accounts);
  }

  /**
   * Sum every posting into the trial balance.
   */
  getTrialBalance(options?: TrialBalanceOptions): TrialBalance {
    return computeTrialBalance(this._postings, this._accounts, options);
  }

  /**
   * Get all postings, optionally filtered.
   */
  getEntries(filter?: PostingFilter): readonly Posting[] {
    if (filter === undefined) {
      return [...this._postings];
    }

    return this._postings.filter((posting) => {
      if (filter.accountId !== undefined && posting.accountId !== filter.accountId) {
        return false;
      }
      if (filter.correlationId !== undefined && posting.correlationId !== filter.correlationId) {
        return false;
      }
      if (filter.sourceRef !== undefined && posting.sourceRef !== filter.sourceRef) {
        return false;
      }
      if (filter.currency !== undefined && posting.money.currency !== filter.currency) {
        return false;
      }
      if (filter.fromTimestamp !== undefined && posting.timestamp < filter.fromTimestamp) {
        return false;
      }
      if (filter.toTimestamp !== undefined && posting.timestamp > filter.toTimestamp) {
        return false;
      }
      return true;
    });
  }

  getEntriesByCorrelation(correlationId: string): readonly Posting[] {
    return this._postings.filter((p) => p.correlationId === correlationId);
  }

  /**
   * All posting groups, in append order.
   */
  getGroups(): readonly PostingGroup[] {
    return [...this._groups];
  }

  get entryCount(): number {
    return this._postings.length;
  }

  get groupCount(): number {
    return this._groups.length;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      accounts: this._accounts.getAll(),
      postings: [...this._postings],
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Replays all accounts and postings, preserving full validation.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): Ledger {
    const ledger = new Ledger();

    for (const account of snapshot.accounts) {
      ledger._accounts.register(account.ref, account.createdAt);
    }

    const groups = new Map<string, Posting[]>();
    for (const posting of snapshot.postings) {
      let group = groups.get(posting.correlationId);
      if (group === undefined) {
        group = [];
        groups.set(posting.correlationId, group);
      }
      group.push(posting);
    }

    for (const postings of groups.values()) {
      ledger.append(postings);
    }

    return ledger;
  }
}
