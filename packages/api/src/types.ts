// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/types.ts
// Shared types for the GreenProof REST API layer.

import type { GreenProofConfig, LedgerErrorCode, RewardContract } from "@greenproof/core";

export interface ApiServerOptions {
    contract: RewardContract;
    config: GreenProofConfig;
    /** false silences request logging (tests); defaults to the configured level. */
    logger?: boolean;
    /** Serves the OpenAPI document and Swagger UI under /docs; defaults to true. */
    docs?: boolean;
}

export interface ApiErrorBody {
    error: {
        code: LedgerErrorCode | "Unauthenticated" | "InvalidApiKey" | "NotFound";
        numericCode?: number;
        message: string;
    };
}

// ── Request bodies ───────────────────────────────────────────────────────────

export interface TransferBody {
    amount: number;
    from: string;
    to: string;
    memo?: string;
}

export interface TradeBody {
    amount: number;
    to: string;
}

export interface DelegateBody {
    delegate: string;
}

export interface SubmitActionBody {
    actionType: string;
    locationHash: string;
    proofHash: string;
}

export interface AssignVerifierBody {
    verifier: string;
}

export interface VerifierBody {
    principal: string;
}

export interface RegisterSponsorBody {
    name: string;
}

export interface ContributeBody {
    amount: number;
}

export interface ToggleBody {
    enabled: boolean;
}

export interface TokenUriBody {
    uri: string | null;
}

// ── Responses ────────────────────────────────────────────────────────────────

export interface StatusResponse {
    status: "ok";
    version: string;
    contractEnabled: boolean;
    nextActionId: number;
    currentTimestamp: number;
    totalActionsCompleted: number;
    totalSupply: number;
}
