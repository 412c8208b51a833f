// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, expect, it } from "vitest";
import { isActionType, rewardAndBoost } from "../../../src/reputation/engine.js";

describe("rewardAndBoost()", () => {
    it("quotes the fixed reward and reputation boost per action type", () => {
        expect(rewardAndBoost("cleanup")).toEqual({ rewardAmount: 100, reputationDelta: 10 });
        expect(rewardAndBoost("recycling")).toEqual({ rewardAmount: 50, reputationDelta: 5 });
        expect(rewardAndBoost("energy-reduction")).toEqual({ rewardAmount: 75, reputationDelta: 8 });
        expect(rewardAndBoost("biodiversity")).toEqual({ rewardAmount: 150, reputationDelta: 15 });
    });

    it("quotes nothing for unknown types", () => {
        expect(rewardAndBoost("Cleanup")).toEqual({ rewardAmount: 0, reputationDelta: 0 });
        expect(rewardAndBoost("")).toEqual({ rewardAmount: 0, reputationDelta: 0 });
    });
});

describe("isActionType()", () => {
    it("accepts only the four known action types", () => {
        expect(isActionType("energy-reduction")).toBe(true);
        expect(isActionType("energy_reduction")).toBe(false);
    });
});
