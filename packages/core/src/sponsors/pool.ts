// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * SponsorPool — corporate sponsors and the funds they contribute.
 *
 * Contributions only ever add to `totalContributed` and `availableBalance`.
 * Nothing draws the available balance down yet: reward mints are not funded
 * from this pool.
 */

import type { LogicalClock } from "../clock/clock.js";
import { assertAmount, SponsorNotFoundError } from "../exceptions.js";
import type { LedgerDatabase } from "../store/database.js";
import type { Principal, Sponsor, SponsorContribution } from "../types.js";
import type { NativeCurrency } from "./native-currency.js";

interface SponsorRow {
  name: string;
  total_contributed: number;
  available_balance: number;
  active: number;
}

export class SponsorPool {
  constructor(
    private db: LedgerDatabase,
    private currency: NativeCurrency,
    private clock: LogicalClock,
    private poolPrincipal: Principal,
  ) {}

  /** Full overwrite by key: re-registering resets the balances to zero. */
  register(sponsor: Principal, name: string): Sponsor {
    this.db
      .prepare(
        `INSERT INTO sponsors (principal, name, total_contributed, available_balance, active)
         VALUES (?, ?, 0, 0, 1)
         ON CONFLICT(principal) DO UPDATE SET
           name = excluded.name, total_contributed = 0, available_balance = 0, active = 1`,
      )
      .run(sponsor, name);
    return { name, totalContributed: 0, availableBalance: 0, active: true };
  }

  contribute(sponsor: Principal, amount: number): Sponsor {
    const current = this.get(sponsor);
    if (!current || !current.active) {
      throw new SponsorNotFoundError(sponsor);
    }
    assertAmount(amount);

    this.currency.transfer(amount, sponsor, this.poolPrincipal);

    this.db
      .prepare(
        `UPDATE sponsors
         SET total_contributed = total_contributed + ?, available_balance = available_balance + ?
         WHERE principal = ?`,
      )
      .run(amount, amount, sponsor);
    this.db
      .prepare(`INSERT INTO sponsor_contributions (sponsor, amount, clock) VALUES (?, ?, ?)`)
      .run(sponsor, amount, this.clock.now());

    return {
      ...current,
      totalContributed: current.totalContributed + amount,
      availableBalance: current.availableBalance + amount,
    };
  }

  get(sponsor: Principal): Sponsor | null {
    const row = this.db
      .prepare<[string], SponsorRow>(
        `SELECT name, total_contributed, available_balance, active FROM sponsors WHERE principal = ?`,
      )
      .get(sponsor);
    if (!row) return null;
    return {
      name: row.name,
      totalContributed: row.total_contributed,
      availableBalance: row.available_balance,
      active: row.active === 1,
    };
  }

  /** Contributions of one sponsor, newest first. */
  contributions(sponsor: Principal, limit = 50): SponsorContribution[] {
    return this.db
      .prepare<[string, number], SponsorContribution>(
        `SELECT seq, sponsor, amount, clock FROM sponsor_contributions
         WHERE sponsor = ? ORDER BY seq DESC LIMIT ?`,
      )
      .all(sponsor, limit);
  }
}
