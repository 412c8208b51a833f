// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { LedgerDatabase } from "../store/database.js";
import type { PendingVerification, Principal } from "../types.js";

/** Decides who may confirm an outstanding action. */
export interface VerifierPolicy {
  canVerify(caller: Principal, pending: PendingVerification | null): boolean;
}

/**
 * Set of principals allowed to verify alongside the contract owner.
 * The owner is always authorized and cannot be removed.
 */
export class VerifierRegistry implements VerifierPolicy {
  constructor(
    private db: LedgerDatabase,
    private owner: Principal,
  ) {}

  add(principal: Principal): void {
    this.db.prepare(`INSERT INTO verifiers (principal) VALUES (?) ON CONFLICT DO NOTHING`).run(principal);
  }

  remove(principal: Principal): void {
    this.db.prepare(`DELETE FROM verifiers WHERE principal = ?`).run(principal);
  }

  has(principal: Principal): boolean {
    if (principal === this.owner) return true;
    const row = this.db
      .prepare<[string], { found: number }>(`SELECT 1 AS found FROM verifiers WHERE principal = ?`)
      .get(principal);
    return row !== undefined;
  }

  list(): Principal[] {
    return this.db
      .prepare<[], { principal: string }>(`SELECT principal FROM verifiers ORDER BY principal`)
      .all()
      .map((r) => r.principal);
  }

  // Once an action has an assigned verifier, only that verifier (or the owner) may confirm it
  canVerify(caller: Principal, pending: PendingVerification | null): boolean {
    if (caller === this.owner) return true;
    if (pending?.verifier) return pending.verifier === caller;
    return this.has(caller);
  }
}

/** Strict single-verifier rule: nobody but the owner confirms actions. */
export class OwnerOnlyPolicy implements VerifierPolicy {
  constructor(private owner: Principal) {}

  canVerify(caller: Principal): boolean {
    return caller === this.owner;
  }
}
