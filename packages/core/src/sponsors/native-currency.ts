// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { assertAmount, InsufficientBalanceError } from "../exceptions.js";
import type { LedgerDatabase } from "../store/database.js";
import type { Principal } from "../types.js";

/**
 * The host's native value-transfer primitive. Sponsor contributions move
 * real funds through it, and it can fail independently of the reward ledger.
 */
export interface NativeCurrency {
  balanceOf(principal: Principal): number;
  /** Throws InsufficientBalanceError when `from` cannot cover `amount`. */
  transfer(amount: number, from: Principal, to: Principal): void;
}

/**
 * Native balances kept in the ledger database, so a contribution and its
 * value transfer commit or roll back together.
 */
export class SqliteNativeCurrency implements NativeCurrency {
  constructor(private db: LedgerDatabase) {}

  balanceOf(principal: Principal): number {
    const row = this.db
      .prepare<[string], { balance: number }>(`SELECT balance FROM native_balances WHERE principal = ?`)
      .get(principal);
    return row ? row.balance : 0;
  }

  /** Host-side funding of a principal, e.g. when bridging deposits in. */
  deposit(principal: Principal, amount: number): number {
    assertAmount(amount);
    this.db
      .prepare(
        `INSERT INTO native_balances (principal, balance) VALUES (?, ?)
         ON CONFLICT(principal) DO UPDATE SET balance = balance + ?`,
      )
      .run(principal, amount, amount);
    return this.balanceOf(principal);
  }

  transfer(amount: number, from: Principal, to: Principal): void {
    assertAmount(amount);

    // Conditional debit: no row changes when the balance is short
    const info = this.db
      .prepare(`UPDATE native_balances SET balance = balance - ? WHERE principal = ? AND balance >= ?`)
      .run(amount, from, amount);
    if (info.changes === 0) {
      throw new InsufficientBalanceError(this.balanceOf(from), amount);
    }

    this.db
      .prepare(
        `INSERT INTO native_balances (principal, balance) VALUES (?, ?)
         ON CONFLICT(principal) DO UPDATE SET balance = balance + ?`,
      )
      .run(to, amount, amount);
  }
}
