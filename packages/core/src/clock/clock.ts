// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { ContractState } from "../store/database.js";

/**
 * Monotonic logical clock. Stands in for submission ordering; it is never
 * wall-clock time. `advance()` is called once per submitted action.
 */
export interface LogicalClock {
  now(): number;
  /** Moves the clock forward by one tick and returns the new value. */
  advance(): number;
}

export const CLOCK_KEY = "current_timestamp";

/** Default clock: the counter lives in contract_state and rolls back with the transaction. */
export class StoredLogicalClock implements LogicalClock {
  constructor(private state: ContractState) {
    this.state.init(CLOCK_KEY, 0);
  }

  now(): number {
    return this.state.get(CLOCK_KEY);
  }

  advance(): number {
    return this.state.increment(CLOCK_KEY);
  }
}

/** In-process clock for hosts that keep ordering outside the ledger database. */
export class CounterClock implements LogicalClock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(): number {
    this.current += 1;
    return this.current;
  }
}
