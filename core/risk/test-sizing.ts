/**
 * Risk sizer unit tests
 * Validates: sizeForRisk() caps, clamps, degenerate stops, monotonicity
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_RISK_POLICY, type RiskPolicy } from "./risk_config.js";
import { PolicyRiskSizer, applyRiskCaps, sizeForRisk } from "./sizing.js";

const basePolicy: RiskPolicy = {
    ...DEFAULT_RISK_POLICY,
    max_risk_pct: 0.5,
    max_units: 300000,
};

describe("applyRiskCaps", () => {
    it("takes the smallest of requested, global and instrument caps", () => {
        const policy: RiskPolicy = { ...basePolicy, symbol_risk_caps: { NAS100_USD: 0.1 } };
        assert.equal(applyRiskCaps("US30_USD", 0.05, policy), 0.05);
        assert.equal(applyRiskCaps("US30_USD", 2, policy), 0.5);
        assert.equal(applyRiskCaps("NAS100_USD", 0.3, policy), 0.1);
    });

    it("floors at zero and treats non-finite requests as zero", () => {
        assert.equal(applyRiskCaps("US30_USD", -1, basePolicy), 0);
        assert.equal(applyRiskCaps("US30_USD", Number.NaN, basePolicy), 0);
    });
});

describe("sizeForRisk", () => {
    it("sizes the reference index trade", () => {
        // 1,000,000 * 0.05% = 500 risk; 500 / 150 = 3.33 -> 3
        const sized = sizeForRisk("US30_USD", 1_000_000, 0.05, 39250, 39100, basePolicy);
        assert.equal(sized.units, 3);
        assert.equal(sized.applied_risk_pct, 0.05);
        assert.equal(sized.stop_distance, 150);
        assert.equal(sized.mode, "RISK");
        assert.equal(sized.adjustment_reason, undefined);
    });

    it("caps requested risk at the global maximum", () => {
        // 10,000 * 0.5% = 50; 50 / 10 = 5
        const sized = sizeForRisk("US30_USD", 10_000, 2, 100, 90, basePolicy);
        assert.equal(sized.applied_risk_pct, 0.5);
        assert.equal(sized.units, 5);
    });

    it("applies per-instrument risk caps", () => {
        const policy: RiskPolicy = { ...basePolicy, symbol_risk_caps: { US30_USD: 0.1 } };
        // 100,000 * 0.1% = 100; 100 / 10 = 10
        const sized = sizeForRisk("US30_USD", 100_000, 0.5, 100, 90, policy);
        assert.equal(sized.applied_risk_pct, 0.1);
        assert.equal(sized.units, 10);
    });

    it("clamps to the global unit ceiling", () => {
        // 1e9 * 0.5% = 5,000,000; / 10 = 500,000 > 300,000
        const sized = sizeForRisk("US30_USD", 1_000_000_000, 0.5, 100, 90, basePolicy);
        assert.equal(sized.units, 300000);
        assert.equal(sized.adjustment_reason, "Global unit cap");
    });

    it("clamps to the instrument unit cap after the global ceiling", () => {
        const policy: RiskPolicy = { ...basePolicy, symbol_unit_caps: { US30_USD: 20 } };
        const sized = sizeForRisk("US30_USD", 100_000, 0.5, 100, 90, policy);
        assert.equal(sized.units, 20);
        assert.equal(sized.adjustment_reason, "Instrument unit cap");

        const both = sizeForRisk("US30_USD", 1_000_000_000, 0.5, 100, 90, policy);
        assert.equal(both.units, 20);
        assert.equal(both.adjustment_reason, "Global unit cap & Instrument unit cap");
    });

    it("never sizes below one unit", () => {
        // 100 * 0.5% = 0.5; 0.5 / 10 = 0.05 -> 0 -> 1
        const sized = sizeForRisk("US30_USD", 100, 0.5, 100, 90, basePolicy);
        assert.equal(sized.units, 1);
        assert.equal(sized.adjustment_reason, "Minimum unit");

        const zeroRisk = sizeForRisk("US30_USD", 100_000, -3, 100, 90, basePolicy);
        assert.equal(zeroRisk.applied_risk_pct, 0);
        assert.equal(zeroRisk.units, 1);
    });

    it("falls back to a nominal unit without a usable stop", () => {
        for (const stop of [null, 100, Number.NaN, Number.POSITIVE_INFINITY]) {
            const sized = sizeForRisk("US30_USD", 1_000_000, 0.5, 100, stop, basePolicy);
            assert.equal(sized.units, 1, String(stop));
            assert.equal(sized.mode, "NOMINAL");
            assert.equal(sized.stop_distance, null);
        }
    });

    it("is non-decreasing in balance and non-increasing in stop distance", () => {
        const policy: RiskPolicy = { ...basePolicy, symbol_unit_caps: { US30_USD: 5000 } };

        let previous = 0;
        for (const balance of [0, 500, 10_000, 250_000, 1_000_000, 50_000_000, 1e10]) {
            const { units } = sizeForRisk("US30_USD", balance, 0.5, 39250, 39100, policy);
            assert.ok(units >= previous, `balance ${balance}: ${units} < ${previous}`);
            assert.ok(units <= Math.min(policy.max_units, 5000));
            previous = units;
        }

        previous = Number.POSITIVE_INFINITY;
        for (const distance of [0.5, 1, 10, 150, 1000, 20_000]) {
            const { units } = sizeForRisk("US30_USD", 1_000_000, 0.5, 39250, 39250 - distance, policy);
            assert.ok(units <= previous, `distance ${distance}: ${units} > ${previous}`);
            assert.ok(units <= Math.min(policy.max_units, 5000));
            previous = units;
        }
    });
});

describe("PolicyRiskSizer", () => {
    it("delegates to sizeForRisk with its policy", () => {
        const sizer = new PolicyRiskSizer(basePolicy);
        assert.deepEqual(
            sizer.size("US30_USD", 1_000_000, 0.05, 39250, 39100),
            sizeForRisk("US30_USD", 1_000_000, 0.05, 39250, 39100, basePolicy)
        );
        assert.equal(sizer.policy, basePolicy);
    });
});
