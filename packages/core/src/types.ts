// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Core shared types for GreenProof.
 * The ledger engine, the HTTP API and the CLI operate on these types.
 */

/** Opaque caller identity, authenticated by the host before it reaches the core. */
export type Principal = string;

export const ACTION_TYPES = ["cleanup", "recycling", "energy-reduction", "biodiversity"] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export interface Action {
  id: number;
  submitter: Principal;
  actionType: ActionType;
  /** Logical clock value at submission. */
  timestamp: number;
  locationHash: string;
  proofHash: string;
  verified: boolean;
  /** Fixed at submission, never recomputed. */
  rewardAmount: number;
}

export interface PendingVerification {
  actionId: number;
  submitter: Principal;
  /** null until the owner assigns a specific verifier. */
  verifier: Principal | null;
  submittedAt: number;
}

export type ActionCounts = Record<ActionType, number>;

export interface UserStats {
  totalActions: number;
  actionCounts: ActionCounts;
  totalTokensEarned: number;
  reputationScore: number;
}

export interface LeaderboardEntry extends UserStats {
  principal: Principal;
}

export interface Sponsor {
  name: string;
  totalContributed: number;
  availableBalance: number;
  active: boolean;
}

export interface SponsorContribution {
  seq: number;
  sponsor: Principal;
  amount: number;
  clock: number;
}

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
  uri: string | null;
}

export interface TokenJournalEntry {
  seq: number;
  kind: "mint" | "transfer";
  /** null for mints. */
  sender: Principal | null;
  recipient: Principal;
  amount: number;
  memo: string | null;
  clock: number;
}

export interface RewardQuote {
  rewardAmount: number;
  reputationDelta: number;
}

export interface LedgerTotals {
  nextActionId: number;
  currentTimestamp: number;
  totalActionsCompleted: number;
  totalSupply: number;
  contractEnabled: boolean;
}

export interface LedgerAuditResult {
  passed: boolean;
  negativeBalanceCount: number;
  issues: string[];
}

// ── Configuration ────────────────────────────────────────────────────────────

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface GreenProofConfig {
  contract: {
    owner: Principal;
    poolPrincipal: Principal;
    enabled: boolean;
  };
  token: TokenMetadata;
  verifiers: Principal[];
  storage: {
    dbPath: string;
  };
  api: {
    host: string;
    port: number;
    apiKey?: string;
    prettyLogs: boolean;
  };
  logging: {
    level: LogLevel;
  };
}
