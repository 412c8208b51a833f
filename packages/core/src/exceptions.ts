// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for GreenProof. */

export const LEDGER_ERROR_CODES = {
  OwnerOnly: 100,
  NotTokenOwner: 101,
  InsufficientBalance: 102,
  InvalidAction: 103,
  AlreadyVerified: 104,
  VerificationFailed: 105,
  SponsorNotFound: 106,
  InsufficientSponsorBalance: 107,
  InvalidAmount: 108,
  ActionNotFound: 109,
} as const;

export type LedgerErrorCode = keyof typeof LEDGER_ERROR_CODES;

export class GreenProofError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GreenProofError";
  }
}

export class ConfigurationError extends GreenProofError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A failed ledger precondition. Thrown inside a transaction so that every
 * write of the entry point rolls back, then surfaced to callers as data.
 */
export class LedgerError extends GreenProofError {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "LedgerError";
  }

  get numericCode(): number {
    return LEDGER_ERROR_CODES[this.code];
  }
}

export class OwnerOnlyError extends LedgerError {
  constructor(operation: string) {
    super("OwnerOnly", `'${operation}' is restricted to the contract owner`);
    this.name = "OwnerOnlyError";
  }
}

export class NotTokenOwnerError extends LedgerError {
  constructor(caller: string, owner: string) {
    super("NotTokenOwner", `${caller} may not move tokens held by ${owner}`);
    this.name = "NotTokenOwnerError";
  }
}

export class InsufficientBalanceError extends LedgerError {
  constructor(
    public readonly balance: number,
    public readonly required: number,
  ) {
    super("InsufficientBalance", `Insufficient balance. Balance: ${balance}, Required: ${required}`);
    this.name = "InsufficientBalanceError";
  }
}

export class InvalidActionError extends LedgerError {
  constructor(reason: string) {
    super("InvalidAction", reason);
    this.name = "InvalidActionError";
  }
}

export class AlreadyVerifiedError extends LedgerError {
  constructor(user: string, actionId: number) {
    super("AlreadyVerified", `Action ${actionId} of ${user} is already verified`);
    this.name = "AlreadyVerifiedError";
  }
}

export class VerificationFailedError extends LedgerError {
  constructor(reason: string) {
    super("VerificationFailed", reason);
    this.name = "VerificationFailedError";
  }
}

export class SponsorNotFoundError extends LedgerError {
  constructor(sponsor: string) {
    super("SponsorNotFound", `No active sponsor registered for ${sponsor}`);
    this.name = "SponsorNotFoundError";
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(amount: number) {
    super("InvalidAmount", `Amount must be a positive integer, got ${amount}`);
    this.name = "InvalidAmountError";
  }
}

export class ActionNotFoundError extends LedgerError {
  constructor(actionId: number, user?: string) {
    super("ActionNotFound", user ? `No action ${actionId} for ${user}` : `No pending action ${actionId}`);
    this.name = "ActionNotFoundError";
  }
}

/** Rejects anything that is not a positive safe integer. */
export function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new InvalidAmountError(amount);
  }
}
