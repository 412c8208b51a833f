// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * GreenProof public API.
 * Import from this module when embedding the reward ledger as a library.
 */

export { VERSION } from "./version.js";
export { ACTION_TYPES } from "./types.js";
export type {
  Action,
  ActionCounts,
  ActionType,
  GreenProofConfig,
  LeaderboardEntry,
  LedgerAuditResult,
  LedgerTotals,
  LogLevel,
  PendingVerification,
  Principal,
  RewardQuote,
  Sponsor,
  SponsorContribution,
  TokenJournalEntry,
  TokenMetadata,
  UserStats,
} from "./types.js";
export {
  GreenProofError,
  ConfigurationError,
  LedgerError,
  LEDGER_ERROR_CODES,
  OwnerOnlyError,
  NotTokenOwnerError,
  InsufficientBalanceError,
  InvalidActionError,
  AlreadyVerifiedError,
  VerificationFailedError,
  SponsorNotFoundError,
  InvalidAmountError,
  ActionNotFoundError,
} from "./exceptions.js";
export type { LedgerErrorCode } from "./exceptions.js";
export { loadConfig, parseConfig, defaultConfig } from "./config/config.js";
export { RewardContract } from "./contract.js";
export type { LedgerFailure, LedgerResult, RewardContractOptions } from "./contract.js";
export { openLedgerDatabase } from "./store/database.js";
export type { LedgerDatabase } from "./store/database.js";
export { CounterClock, StoredLogicalClock } from "./clock/clock.js";
export type { LogicalClock } from "./clock/clock.js";
export { OwnerOnlyPolicy, VerifierRegistry } from "./actions/verifiers.js";
export type { VerifierPolicy } from "./actions/verifiers.js";
export { SqliteNativeCurrency } from "./sponsors/native-currency.js";
export type { NativeCurrency } from "./sponsors/native-currency.js";
export { REWARD_TABLE, rewardAndBoost, isActionType } from "./reputation/engine.js";
