// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Ledger database — every table of the reward ledger lives in one SQLite file
 * (or `:memory:`), so any entry point can commit all of its writes in a single
 * better-sqlite3 transaction.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS contract_state (
    key   TEXT PRIMARY KEY,
    value INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS token_metadata (
    key   TEXT PRIMARY KEY,
    value TEXT
  );

  CREATE TABLE IF NOT EXISTS token_balances (
    principal TEXT PRIMARY KEY,
    balance   INTEGER NOT NULL DEFAULT 0 CHECK (balance >= 0)
  );

  CREATE TABLE IF NOT EXISTS token_delegates (
    owner    TEXT NOT NULL,
    delegate TEXT NOT NULL,
    PRIMARY KEY (owner, delegate)
  );

  -- Append-only: rows are never updated or deleted
  CREATE TABLE IF NOT EXISTS token_journal (
    seq       INTEGER PRIMARY KEY AUTOINCREMENT,
    kind      TEXT    NOT NULL,
    sender    TEXT,
    recipient TEXT    NOT NULL,
    amount    INTEGER NOT NULL,
    memo      TEXT,
    clock     INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_journal_sender ON token_journal(sender, seq DESC);
  CREATE INDEX IF NOT EXISTS idx_journal_recipient ON token_journal(recipient, seq DESC);

  CREATE TABLE IF NOT EXISTS actions (
    submitter     TEXT    NOT NULL,
    id            INTEGER NOT NULL,
    action_type   TEXT    NOT NULL,
    timestamp     INTEGER NOT NULL,
    location_hash TEXT    NOT NULL,
    proof_hash    TEXT    NOT NULL,
    verified      INTEGER NOT NULL DEFAULT 0,
    reward_amount INTEGER NOT NULL,
    PRIMARY KEY (submitter, id)
  );

  CREATE TABLE IF NOT EXISTS pending_verifications (
    action_id    INTEGER PRIMARY KEY,
    submitter    TEXT    NOT NULL,
    verifier     TEXT,
    submitted_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS verifiers (
    principal TEXT PRIMARY KEY
  );

  CREATE TABLE IF NOT EXISTS user_stats (
    principal               TEXT PRIMARY KEY,
    total_actions           INTEGER NOT NULL DEFAULT 0,
    cleanup_count           INTEGER NOT NULL DEFAULT 0,
    recycling_count         INTEGER NOT NULL DEFAULT 0,
    energy_reduction_count  INTEGER NOT NULL DEFAULT 0,
    biodiversity_count      INTEGER NOT NULL DEFAULT 0,
    total_tokens_earned     INTEGER NOT NULL DEFAULT 0,
    reputation_score        INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS sponsors (
    principal         TEXT PRIMARY KEY,
    name              TEXT    NOT NULL,
    total_contributed INTEGER NOT NULL DEFAULT 0,
    available_balance INTEGER NOT NULL DEFAULT 0,
    active            INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS sponsor_contributions (
    seq     INTEGER PRIMARY KEY AUTOINCREMENT,
    sponsor TEXT    NOT NULL,
    amount  INTEGER NOT NULL,
    clock   INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS native_balances (
    principal TEXT PRIMARY KEY,
    balance   INTEGER NOT NULL DEFAULT 0 CHECK (balance >= 0)
  );
`;

export type LedgerDatabase = Database.Database;

/** Open (or create) a ledger database and make sure every table exists. */
export function openLedgerDatabase(dbPath: string): LedgerDatabase {
  if (dbPath !== ":memory:") {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA_SQL);
  return db;
}

/**
 * Integer counters of the contract. Every read and write happens on the
 * caller's connection, inside whatever transaction is open.
 */
export class ContractState {
  constructor(private db: LedgerDatabase) {}

  /** Seeds a counter only if it has never been written. */
  init(key: string, value: number): void {
    this.db
      .prepare(`INSERT INTO contract_state (key, value) VALUES (?, ?) ON CONFLICT(key) DO NOTHING`)
      .run(key, value);
  }

  get(key: string): number {
    const row = this.db
      .prepare<[string], { value: number }>(`SELECT value FROM contract_state WHERE key = ?`)
      .get(key);
    return row ? row.value : 0;
  }

  set(key: string, value: number): void {
    this.db
      .prepare(
        `INSERT INTO contract_state (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
      )
      .run(key, value);
  }

  /** Adds `delta` and returns the new value. */
  increment(key: string, delta = 1): number {
    const next = this.get(key) + delta;
    this.set(key, next);
    return next;
  }
}
