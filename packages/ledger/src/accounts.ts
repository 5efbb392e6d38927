/**
 * @histcost/ledger — Chart of accounts.
 *
 * Codes are fixed once registered; the account type decides which
 * trial-balance column a positive balance lands in.
 */

import type { AccountRef } from "@histcost/types";
import type { AccountType, LedgerAccount, NormalBalance } from "./types.js";
import { LedgerError, NORMAL_BALANCE } from "./types.js";

const ACCOUNT_CODE = /^\S+$/;

function checkRef(ref: AccountRef): void {
  if (!ACCOUNT_CODE.test(ref.id)) {
    throw new LedgerError("INVALID_ACCOUNT", `Account code "${ref.id}" must be non-empty with no spaces`);
  }
  if (ref.name.trim() === "") {
    throw new LedgerError("INVALID_ACCOUNT", `Account ${ref.id} needs a name`);
  }
}

export class AccountRegistry {
  private readonly byCode = new Map<string, LedgerAccount>();

  register(ref: AccountRef, timestamp: string): LedgerAccount {
    this.admit([ref]);
    return this.insert(ref, timestamp);
  }

  /**
   * Register a whole chart. Nothing is registered if any entry is
   * malformed or its code is already taken, here or earlier in `refs`.
   */
  registerAll(refs: readonly AccountRef[], timestamp: string): readonly LedgerAccount[] {
    this.admit(refs);
    return refs.map((ref) => this.insert(ref, timestamp));
  }

  get(code: string): LedgerAccount | undefined {
    return this.byCode.get(code);
  }

  has(code: string): boolean {
    return this.byCode.has(code);
  }

  assertExists(code: string): LedgerAccount {
    const account = this.byCode.get(code);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account ${code}`);
    }
    return account;
  }

  getType(code: string): AccountType {
    return this.assertExists(code).ref.type;
  }

  getName(code: string): string {
    return this.assertExists(code).ref.name;
  }

  getNormalBalance(code: string): NormalBalance {
    return NORMAL_BALANCE[this.getType(code)];
  }

  /** Registration order. */
  getAll(): readonly LedgerAccount[] {
    return [...this.byCode.values()];
  }

  get count(): number {
    return this.byCode.size;
  }

  ofType(type: AccountType): readonly LedgerAccount[] {
    return this.getAll().filter((a) => a.ref.type === type);
  }

  private admit(refs: readonly AccountRef[]): void {
    const seen = new Set<string>();
    for (const ref of refs) {
      checkRef(ref);
      if (this.byCode.has(ref.id) || seen.has(ref.id)) {
        throw new LedgerError("DUPLICATE_ACCOUNT_ID", `Account code ${ref.id} already exists`);
      }
      seen.add(ref.id);
    }
  }

  private insert(ref: AccountRef, timestamp: string): LedgerAccount {
    const account: LedgerAccount = { ref: { ...ref }, createdAt: timestamp };
    this.byCode.set(ref.id, account);
    return account;
  }
}
