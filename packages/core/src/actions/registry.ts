// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ActionRegistry — lifecycle of submitted environmental actions.
 *
 *   Pending ──verify──▶ Verified (terminal)
 *
 * There is no rejected state: an action whose verification never succeeds
 * stays pending. Records are never deleted; only the pending-verification
 * index shrinks.
 */

import type { LogicalClock } from "../clock/clock.js";
import { ActionNotFoundError, AlreadyVerifiedError, InvalidActionError } from "../exceptions.js";
import { isActionType, rewardAndBoost } from "../reputation/engine.js";
import type { ContractState, LedgerDatabase } from "../store/database.js";
import type { Action, ActionType, PendingVerification, Principal } from "../types.js";

export const NEXT_ACTION_ID_KEY = "next_action_id";
export const COMPLETED_KEY = "total_actions_completed";
export const ENABLED_KEY = "contract_enabled";

interface ActionRow {
  submitter: string;
  id: number;
  action_type: ActionType;
  timestamp: number;
  location_hash: string;
  proof_hash: string;
  verified: number;
  reward_amount: number;
}

interface PendingRow {
  action_id: number;
  submitter: string;
  verifier: string | null;
  submitted_at: number;
}

function toAction(row: ActionRow): Action {
  return {
    id: row.id,
    submitter: row.submitter,
    actionType: row.action_type,
    timestamp: row.timestamp,
    locationHash: row.location_hash,
    proofHash: row.proof_hash,
    verified: row.verified === 1,
    rewardAmount: row.reward_amount,
  };
}

function toPending(row: PendingRow): PendingVerification {
  return {
    actionId: row.action_id,
    submitter: row.submitter,
    verifier: row.verifier,
    submittedAt: row.submitted_at,
  };
}

export class ActionRegistry {
  constructor(
    private db: LedgerDatabase,
    private state: ContractState,
    private clock: LogicalClock,
    enabled: boolean,
  ) {
    this.state.init(NEXT_ACTION_ID_KEY, 1);
    this.state.init(COMPLETED_KEY, 0);
    this.state.init(ENABLED_KEY, enabled ? 1 : 0);
  }

  isEnabled(): boolean {
    return this.state.get(ENABLED_KEY) === 1;
  }

  setEnabled(enabled: boolean): void {
    this.state.set(ENABLED_KEY, enabled ? 1 : 0);
  }

  nextActionId(): number {
    return this.state.get(NEXT_ACTION_ID_KEY);
  }

  totalCompleted(): number {
    return this.state.get(COMPLETED_KEY);
  }

  /** Records a pending action; advances the id counter and the logical clock. */
  submit(submitter: Principal, actionType: string, locationHash: string, proofHash: string): Action {
    if (!this.isEnabled()) {
      throw new InvalidActionError("Action submissions are disabled");
    }

    const quote = rewardAndBoost(actionType);
    if (quote.rewardAmount === 0 || !isActionType(actionType)) {
      throw new InvalidActionError(`Unknown action type '${actionType}'`);
    }

    const id = this.nextActionId();
    const timestamp = this.clock.now();

    this.db
      .prepare(
        `INSERT INTO actions
           (submitter, id, action_type, timestamp, location_hash, proof_hash, verified, reward_amount)
         VALUES (?, ?, ?, ?, ?, ?, 0, ?)`,
      )
      .run(submitter, id, actionType, timestamp, locationHash, proofHash, quote.rewardAmount);

    this.db
      .prepare(
        `INSERT INTO pending_verifications (action_id, submitter, verifier, submitted_at)
         VALUES (?, ?, NULL, ?)`,
      )
      .run(id, submitter, timestamp);

    this.state.set(NEXT_ACTION_ID_KEY, id + 1);
    this.clock.advance();

    return {
      id,
      submitter,
      actionType,
      timestamp,
      locationHash,
      proofHash,
      verified: false,
      rewardAmount: quote.rewardAmount,
    };
  }

  /**
   * Loads an action that is ready to be verified. Throws when it does not
   * exist for the user or has already been verified.
   */
  requirePending(user: Principal, actionId: number): Action {
    const action = this.getAction(user, actionId);
    if (!action) {
      throw new ActionNotFoundError(actionId, user);
    }
    if (action.verified) {
      throw new AlreadyVerifiedError(user, actionId);
    }
    return action;
  }

  /** Flips the action to verified, drops it from the pending index and counts it. */
  markVerified(action: Action): void {
    this.db
      .prepare(`UPDATE actions SET verified = 1 WHERE submitter = ? AND id = ? AND verified = 0`)
      .run(action.submitter, action.id);
    this.db.prepare(`DELETE FROM pending_verifications WHERE action_id = ?`).run(action.id);
    this.state.increment(COMPLETED_KEY);
  }

  assignVerifier(actionId: number, verifier: Principal): PendingVerification {
    const pending = this.getPending(actionId);
    if (!pending) {
      throw new ActionNotFoundError(actionId);
    }
    this.db.prepare(`UPDATE pending_verifications SET verifier = ? WHERE action_id = ?`).run(verifier, actionId);
    return { ...pending, verifier };
  }

  getAction(user: Principal, actionId: number): Action | null {
    const row = this.db
      .prepare<[string, number], ActionRow>(`SELECT * FROM actions WHERE submitter = ? AND id = ?`)
      .get(user, actionId);
    return row ? toAction(row) : null;
  }

  getPending(actionId: number): PendingVerification | null {
    const row = this.db
      .prepare<[number], PendingRow>(`SELECT * FROM pending_verifications WHERE action_id = ?`)
      .get(actionId);
    return row ? toPending(row) : null;
  }

  /** Outstanding verifications, oldest first. */
  listPending(limit = 100): PendingVerification[] {
    return this.db
      .prepare<[number], PendingRow>(
        `SELECT * FROM pending_verifications ORDER BY submitted_at ASC, action_id ASC LIMIT ?`,
      )
      .all(limit)
      .map(toPending);
  }

  listUserActions(user: Principal): Action[] {
    return this.db
      .prepare<[string], ActionRow>(`SELECT * FROM actions WHERE submitter = ? ORDER BY id ASC`)
      .all(user)
      .map(toAction);
  }

  countVerified(): number {
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM actions WHERE verified = 1`)
      .get();
    return row ? row.total : 0;
  }
}
