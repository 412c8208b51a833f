// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { ACTION_TYPES, type ActionType, type RewardQuote } from "../types.js";

// Token reward and reputation boost per verified action
export const REWARD_TABLE: Readonly<Record<ActionType, RewardQuote>> = {
  cleanup: { rewardAmount: 100, reputationDelta: 10 },
  recycling: { rewardAmount: 50, reputationDelta: 5 },
  "energy-reduction": { rewardAmount: 75, reputationDelta: 8 },
  biodiversity: { rewardAmount: 150, reputationDelta: 15 },
};

const NO_REWARD: RewardQuote = { rewardAmount: 0, reputationDelta: 0 };

export function isActionType(value: string): value is ActionType {
  return ACTION_TYPES.some((t) => t === value);
}

/**
 * Total over every string: unknown action types quote 0/0, which the
 * registry treats as an invalid submission.
 */
export function rewardAndBoost(actionType: string): RewardQuote {
  return isActionType(actionType) ? REWARD_TABLE[actionType] : NO_REWARD;
}
