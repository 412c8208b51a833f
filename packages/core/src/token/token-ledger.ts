// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { LogicalClock } from "../clock/clock.js";
import {
  assertAmount,
  InsufficientBalanceError,
  NotTokenOwnerError,
  VerificationFailedError,
} from "../exceptions.js";
import type { ContractState, LedgerDatabase } from "../store/database.js";
import type { Principal, TokenJournalEntry, TokenMetadata } from "../types.js";

export const SUPPLY_KEY = "total_supply";

/**
 * Fungible reward token. Balances are never negative and the total supply
 * always equals the sum of every mint; transfers are supply-neutral.
 * Callers are expected to run each operation inside a transaction.
 */
export class TokenLedger {
  constructor(
    private db: LedgerDatabase,
    private state: ContractState,
    private clock: LogicalClock,
    metadata: TokenMetadata,
  ) {
    this.state.init(SUPPLY_KEY, 0);
    const seed = this.db.prepare(
      `INSERT INTO token_metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO NOTHING`,
    );
    seed.run("name", metadata.name);
    seed.run("symbol", metadata.symbol);
    seed.run("decimals", String(metadata.decimals));
    seed.run("uri", metadata.uri);
  }

  getBalance(principal: Principal): number {
    const row = this.db
      .prepare<[string], { balance: number }>(`SELECT balance FROM token_balances WHERE principal = ?`)
      .get(principal);
    return row ? row.balance : 0;
  }

  getTotalSupply(): number {
    return this.state.get(SUPPLY_KEY);
  }

  getMetadata(): TokenMetadata {
    return {
      name: this.readMetadata("name") ?? "",
      symbol: this.readMetadata("symbol") ?? "",
      decimals: Number(this.readMetadata("decimals") ?? 0),
      uri: this.readMetadata("uri"),
    };
  }

  setTokenUri(uri: string | null): void {
    this.db
      .prepare(
        `INSERT INTO token_metadata (key, value) VALUES ('uri', ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
      )
      .run(uri);
  }

  /** Only the verification flow mints; nothing outside the core reaches this. */
  mint(recipient: Principal, amount: number): void {
    assertAmount(amount);
    const supply = this.getTotalSupply();
    if (!Number.isSafeInteger(supply + amount)) {
      throw new VerificationFailedError(`Minting ${amount} would overflow the token supply`);
    }

    this.credit(recipient, amount);
    this.state.set(SUPPLY_KEY, supply + amount);
    this.appendJournal("mint", null, recipient, amount, null);
  }

  /**
   * Moves `amount` from `from` to `to`. The caller must be `from` or a
   * delegate that `from` approved.
   */
  transfer(caller: Principal, amount: number, from: Principal, to: Principal, memo?: string): void {
    if (caller !== from && !this.isDelegate(from, caller)) {
      throw new NotTokenOwnerError(caller, from);
    }
    assertAmount(amount);

    const balance = this.getBalance(from);
    if (balance < amount) {
      throw new InsufficientBalanceError(balance, amount);
    }

    this.db.prepare(`UPDATE token_balances SET balance = balance - ? WHERE principal = ?`).run(amount, from);
    this.credit(to, amount);
    this.appendJournal("transfer", from, to, amount, memo ?? null);
  }

  approveDelegate(owner: Principal, delegate: Principal): void {
    this.db
      .prepare(`INSERT INTO token_delegates (owner, delegate) VALUES (?, ?) ON CONFLICT DO NOTHING`)
      .run(owner, delegate);
  }

  revokeDelegate(owner: Principal, delegate: Principal): void {
    this.db.prepare(`DELETE FROM token_delegates WHERE owner = ? AND delegate = ?`).run(owner, delegate);
  }

  isDelegate(owner: Principal, delegate: Principal): boolean {
    const row = this.db
      .prepare<[string, string], { found: number }>(
        `SELECT 1 AS found FROM token_delegates WHERE owner = ? AND delegate = ?`,
      )
      .get(owner, delegate);
    return row !== undefined;
  }

  /** Journal rows where the principal sent or received tokens, newest first. */
  getHistory(principal: Principal, limit = 50): TokenJournalEntry[] {
    return this.db
      .prepare<[string, string, number], TokenJournalEntry>(
        `SELECT seq, kind, sender, recipient, amount, memo, clock FROM token_journal
         WHERE sender = ? OR recipient = ? ORDER BY seq DESC LIMIT ?`,
      )
      .all(principal, principal, limit);
  }

  sumBalances(): number {
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COALESCE(SUM(balance), 0) AS total FROM token_balances`)
      .get();
    return row ? row.total : 0;
  }

  sumMinted(): number {
    const row = this.db
      .prepare<[], { total: number }>(
        `SELECT COALESCE(SUM(amount), 0) AS total FROM token_journal WHERE kind = 'mint'`,
      )
      .get();
    return row ? row.total : 0;
  }

  negativeBalances(): Array<{ principal: string; balance: number }> {
    return this.db
      .prepare<[], { principal: string; balance: number }>(
        `SELECT principal, balance FROM token_balances WHERE balance < 0`,
      )
      .all();
  }

  private credit(principal: Principal, amount: number): void {
    this.db
      .prepare(
        `INSERT INTO token_balances (principal, balance) VALUES (?, ?)
         ON CONFLICT(principal) DO UPDATE SET balance = balance + ?`,
      )
      .run(principal, amount, amount);
  }

  private appendJournal(
    kind: "mint" | "transfer",
    sender: Principal | null,
    recipient: Principal,
    amount: number,
    memo: string | null,
  ): void {
    this.db
      .prepare(
        `INSERT INTO token_journal (kind, sender, recipient, amount, memo, clock)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(kind, sender, recipient, amount, memo, this.clock.now());
  }

  private readMetadata(key: string): string | null {
    const row = this.db
      .prepare<[string], { value: string | null }>(`SELECT value FROM token_metadata WHERE key = ?`)
      .get(key);
    return row ? row.value : null;
  }
}
