// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { REWARD_TABLE } from "../reputation/engine.js";
import type { LedgerDatabase } from "../store/database.js";
import type { ActionType, LeaderboardEntry, Principal, UserStats } from "../types.js";

interface StatsRow {
  principal: string;
  total_actions: number;
  cleanup_count: number;
  recycling_count: number;
  energy_reduction_count: number;
  biodiversity_count: number;
  total_tokens_earned: number;
  reputation_score: number;
}

// Fixed column whitelist: the per-type counter is the only part of the SQL that varies
const COUNT_COLUMNS: Record<ActionType, string> = {
  cleanup: "cleanup_count",
  recycling: "recycling_count",
  "energy-reduction": "energy_reduction_count",
  biodiversity: "biodiversity_count",
};

function toStats(row: StatsRow): UserStats {
  return {
    totalActions: row.total_actions,
    actionCounts: {
      cleanup: row.cleanup_count,
      recycling: row.recycling_count,
      "energy-reduction": row.energy_reduction_count,
      biodiversity: row.biodiversity_count,
    },
    totalTokensEarned: row.total_tokens_earned,
    reputationScore: row.reputation_score,
  };
}

export function emptyStats(): UserStats {
  return {
    totalActions: 0,
    actionCounts: { cleanup: 0, recycling: 0, "energy-reduction": 0, biodiversity: 0 },
    totalTokensEarned: 0,
    reputationScore: 0,
  };
}

/** Per-user counters derived from verified actions. They only ever grow. */
export class UserStatsAggregator {
  constructor(private db: LedgerDatabase) {}

  get(principal: Principal): UserStats {
    const row = this.db
      .prepare<[string], StatsRow>(`SELECT * FROM user_stats WHERE principal = ?`)
      .get(principal);
    return row ? toStats(row) : emptyStats();
  }

  /** All four counters move in one upsert. */
  recordVerified(principal: Principal, actionType: ActionType, rewardAmount: number): UserStats {
    const column = COUNT_COLUMNS[actionType];
    const boost = REWARD_TABLE[actionType].reputationDelta;

    this.db
      .prepare(
        `INSERT INTO user_stats
           (principal, total_actions, ${column}, total_tokens_earned, reputation_score)
         VALUES (@principal, 1, 1, @reward, @boost)
         ON CONFLICT(principal) DO UPDATE SET
           total_actions       = total_actions + 1,
           ${column}           = ${column} + 1,
           total_tokens_earned = total_tokens_earned + @reward,
           reputation_score    = reputation_score + @boost`,
      )
      .run({ principal, reward: rewardAmount, boost });

    return this.get(principal);
  }

  /** Highest reputation first; ties broken by tokens earned, then principal. */
  leaderboard(limit = 10): LeaderboardEntry[] {
    return this.db
      .prepare<[number], StatsRow>(
        `SELECT * FROM user_stats
         ORDER BY reputation_score DESC, total_tokens_earned DESC, principal ASC
         LIMIT ?`,
      )
      .all(limit)
      .map((row) => ({ principal: row.principal, ...toStats(row) }));
  }
}
