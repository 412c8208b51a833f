// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * RewardContract — the public surface of the reward ledger.
 *
 * Every state-changing entry point runs as one better-sqlite3 transaction.
 * A failed precondition throws a LedgerError inside that transaction, which
 * rolls back every write made so far; the error is then returned to the
 * caller as data. Other faults (I/O, schema) are rethrown untouched.
 *
 * The caller principal is always supplied by the host, already authenticated.
 */

import { type LogicalClock, StoredLogicalClock } from "./clock/clock.js";
import { ActionRegistry } from "./actions/registry.js";
import { type VerifierPolicy, VerifierRegistry } from "./actions/verifiers.js";
import { LedgerError, OwnerOnlyError, type LedgerErrorCode } from "./exceptions.js";
import { type NativeCurrency, SqliteNativeCurrency } from "./sponsors/native-currency.js";
import { SponsorPool } from "./sponsors/pool.js";
import { UserStatsAggregator } from "./stats/user-stats.js";
import { ContractState, type LedgerDatabase, openLedgerDatabase } from "./store/database.js";
import { TokenLedger } from "./token/token-ledger.js";
import type {
  Action,
  GreenProofConfig,
  LeaderboardEntry,
  LedgerAuditResult,
  LedgerTotals,
  PendingVerification,
  Principal,
  Sponsor,
  SponsorContribution,
  TokenJournalEntry,
  TokenMetadata,
  UserStats,
} from "./types.js";

export interface LedgerFailure {
  code: LedgerErrorCode;
  numericCode: number;
  message: string;
}

/** Set once the configured verifiers have been written; later changes go through add/removeVerifier. */
const VERIFIERS_SEEDED_KEY = "verifiers_seeded";

export type LedgerResult<T> = { ok: true; value: T } | { ok: false; error: LedgerFailure };

export interface RewardContractOptions {
  db: LedgerDatabase;
  config: Pick<GreenProofConfig, "contract" | "token" | "verifiers">;
  /** Defaults to a clock stored in the ledger database. */
  clock?: LogicalClock;
  /** Defaults to the owner plus the registered verifier set. */
  verifierPolicy?: VerifierPolicy;
  /** Defaults to native balances kept in the ledger database. */
  nativeCurrency?: NativeCurrency;
}

export class RewardContract {
  readonly owner: Principal;

  private readonly db: LedgerDatabase;
  private readonly clock: LogicalClock;
  private readonly token: TokenLedger;
  private readonly registry: ActionRegistry;
  private readonly verifiers: VerifierRegistry;
  private readonly policy: VerifierPolicy;
  private readonly sponsors: SponsorPool;
  private readonly stats: UserStatsAggregator;

  constructor(opts: RewardContractOptions) {
    const { db, config } = opts;
    const state = new ContractState(db);

    this.db = db;
    this.owner = config.contract.owner;
    this.clock = opts.clock ?? new StoredLogicalClock(state);
    this.token = new TokenLedger(db, state, this.clock, config.token);
    this.registry = new ActionRegistry(db, state, this.clock, config.contract.enabled);
    this.verifiers = new VerifierRegistry(db, this.owner);
    this.policy = opts.verifierPolicy ?? this.verifiers;
    this.sponsors = new SponsorPool(
      db,
      opts.nativeCurrency ?? new SqliteNativeCurrency(db),
      this.clock,
      config.contract.poolPrincipal,
    );
    this.stats = new UserStatsAggregator(db);

    if (state.get(VERIFIERS_SEEDED_KEY) === 0) {
      db.transaction(() => {
        for (const verifier of config.verifiers) {
          this.verifiers.add(verifier);
        }
        state.set(VERIFIERS_SEEDED_KEY, 1);
      })();
    }
  }

  /** Opens the configured database file and builds a contract on it. */
  static open(config: GreenProofConfig, dbPath: string = config.storage.dbPath): RewardContract {
    return new RewardContract({ db: openLedgerDatabase(dbPath), config });
  }

  close(): void {
    this.db.close();
  }

  // ── Token Ledger ───────────────────────────────────────────────────────────

  transfer(caller: Principal, amount: number, from: Principal, to: Principal, memo?: string): LedgerResult<boolean> {
    return this.execute(() => {
      this.token.transfer(caller, amount, from, to, memo);
      return true;
    });
  }

  /** Sends the caller's own tokens; a thin alias over transfer. */
  tradeTokens(caller: Principal, amount: number, to: Principal): LedgerResult<boolean> {
    return this.transfer(caller, amount, caller, to);
  }

  approveDelegate(caller: Principal, delegate: Principal): LedgerResult<boolean> {
    return this.execute(() => {
      this.token.approveDelegate(caller, delegate);
      return true;
    });
  }

  revokeDelegate(caller: Principal, delegate: Principal): LedgerResult<boolean> {
    return this.execute(() => {
      this.token.revokeDelegate(caller, delegate);
      return true;
    });
  }

  // ── Action Registry ────────────────────────────────────────────────────────

  submitAction(caller: Principal, actionType: string, locationHash: string, proofHash: string): LedgerResult<number> {
    return this.execute(() => this.registry.submit(caller, actionType, locationHash, proofHash).id);
  }

  verifyAction(caller: Principal, user: Principal, actionId: number): LedgerResult<boolean> {
    return this.execute(() => {
      if (!this.policy.canVerify(caller, this.registry.getPending(actionId))) {
        throw new OwnerOnlyError("verify-action");
      }
      const action = this.registry.requirePending(user, actionId);

      this.token.mint(user, action.rewardAmount);
      this.registry.markVerified(action);
      this.stats.recordVerified(user, action.actionType, action.rewardAmount);
      return true;
    });
  }

  assignVerifier(caller: Principal, actionId: number, verifier: Principal): LedgerResult<PendingVerification> {
    return this.execute(() => {
      this.requireOwner(caller, "assign-verifier");
      return this.registry.assignVerifier(actionId, verifier);
    });
  }

  addVerifier(caller: Principal, verifier: Principal): LedgerResult<boolean> {
    return this.execute(() => {
      this.requireOwner(caller, "add-verifier");
      this.verifiers.add(verifier);
      return true;
    });
  }

  removeVerifier(caller: Principal, verifier: Principal): LedgerResult<boolean> {
    return this.execute(() => {
      this.requireOwner(caller, "remove-verifier");
      this.verifiers.remove(verifier);
      return true;
    });
  }

  // ── Sponsor Pool ───────────────────────────────────────────────────────────

  registerSponsor(caller: Principal, name: string): LedgerResult<boolean> {
    return this.execute(() => {
      this.sponsors.register(caller, name);
      return true;
    });
  }

  sponsorContribute(caller: Principal, amount: number): LedgerResult<boolean> {
    return this.execute(() => {
      this.sponsors.contribute(caller, amount);
      return true;
    });
  }

  // ── Admin ──────────────────────────────────────────────────────────────────

  toggleContract(caller: Principal, enabled: boolean): LedgerResult<boolean> {
    return this.execute(() => {
      this.requireOwner(caller, "toggle-contract");
      this.registry.setEnabled(enabled);
      return true;
    });
  }

  updateTokenUri(caller: Principal, uri: string | null): LedgerResult<boolean> {
    return this.execute(() => {
      this.requireOwner(caller, "update-token-uri");
      this.token.setTokenUri(uri);
      return true;
    });
  }

  // ── Query Surface ──────────────────────────────────────────────────────────

  getName(): string {
    return this.token.getMetadata().name;
  }

  getSymbol(): string {
    return this.token.getMetadata().symbol;
  }

  getDecimals(): number {
    return this.token.getMetadata().decimals;
  }

  getTokenUri(): string | null {
    return this.token.getMetadata().uri;
  }

  getTokenMetadata(): TokenMetadata {
    return this.token.getMetadata();
  }

  getBalance(principal: Principal): number {
    return this.token.getBalance(principal);
  }

  getTotalSupply(): number {
    return this.token.getTotalSupply();
  }

  getTokenHistory(principal: Principal, limit?: number): TokenJournalEntry[] {
    return this.token.getHistory(principal, limit);
  }

  getUserAction(user: Principal, actionId: number): Action | null {
    return this.registry.getAction(user, actionId);
  }

  listUserActions(user: Principal): Action[] {
    return this.registry.listUserActions(user);
  }

  getUserStats(user: Principal): UserStats {
    return this.stats.get(user);
  }

  getLeaderboard(limit?: number): LeaderboardEntry[] {
    return this.stats.leaderboard(limit);
  }

  getSponsorInfo(sponsor: Principal): Sponsor | null {
    return this.sponsors.get(sponsor);
  }

  getSponsorContributions(sponsor: Principal, limit?: number): SponsorContribution[] {
    return this.sponsors.contributions(sponsor, limit);
  }

  getPendingVerification(actionId: number): PendingVerification | null {
    return this.registry.getPending(actionId);
  }

  listPendingVerifications(limit?: number): PendingVerification[] {
    return this.registry.listPending(limit);
  }

  listVerifiers(): Principal[] {
    return this.verifiers.list();
  }

  getTotalActions(): number {
    return this.registry.totalCompleted();
  }

  getContractStatus(): boolean {
    return this.registry.isEnabled();
  }

  getTotals(): LedgerTotals {
    return {
      nextActionId: this.registry.nextActionId(),
      currentTimestamp: this.clock.now(),
      totalActionsCompleted: this.registry.totalCompleted(),
      totalSupply: this.token.getTotalSupply(),
      contractEnabled: this.registry.isEnabled(),
    };
  }

  /** Cross-checks the ledger's invariants against the stored records. */
  audit(): LedgerAuditResult {
    const issues: string[] = [];

    const negatives = this.token.negativeBalances();
    for (const neg of negatives) {
      issues.push(`Principal ${neg.principal} has forbidden negative balance: ${neg.balance}.`);
    }

    const supply = this.token.getTotalSupply();
    const held = this.token.sumBalances();
    if (supply !== held) {
      issues.push(`Total supply ${supply} does not match the sum of balances ${held}.`);
    }
    const minted = this.token.sumMinted();
    if (supply !== minted) {
      issues.push(`Total supply ${supply} does not match the minted journal total ${minted}.`);
    }

    const completed = this.registry.totalCompleted();
    const verified = this.registry.countVerified();
    if (completed !== verified) {
      issues.push(`Completed-action counter ${completed} does not match ${verified} verified actions.`);
    }

    return {
      passed: issues.length === 0,
      negativeBalanceCount: negatives.length,
      issues,
    };
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private requireOwner(caller: Principal, operation: string): void {
    if (caller !== this.owner) {
      throw new OwnerOnlyError(operation);
    }
  }

  private execute<T>(fn: () => T): LedgerResult<T> {
    try {
      return { ok: true, value: this.db.transaction(fn)() };
    } catch (err) {
      if (err instanceof LedgerError) {
        return { ok: false, error: { code: err.code, numericCode: err.numericCode, message: err.message } };
      }
      throw err;
    }
  }
}
