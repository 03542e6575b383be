import type { RiskPolicy } from "./risk_config.js";

export type SizingMode = "RISK" | "NOMINAL";

export interface SizedOrder {
    readonly instrument: string;
    readonly units: number;
    readonly requested_risk_pct: number;
    readonly applied_risk_pct: number;
    readonly risk_amount: number;
    readonly stop_distance: number | null;
    readonly mode: SizingMode;
    readonly adjustment_reason?: string;
}

export interface RiskSizer {
    size(
        instrument: string,
        balance: number,
        requestedRiskPct: number,
        entryPrice: number,
        stopPrice: number | null
    ): SizedOrder;
}

/**
 * Applied risk = min(requested, global cap, instrument cap), floored at zero.
 */
export function applyRiskCaps(instrument: string, requestedRiskPct: number, policy: RiskPolicy): number {
    const requested = Number.isFinite(requestedRiskPct) ? requestedRiskPct : 0;
    const instrumentCap = policy.symbol_risk_caps[instrument];
    const capped = Math.min(
        requested,
        policy.max_risk_pct,
        instrumentCap ?? Number.POSITIVE_INFINITY
    );
    return Math.max(0, capped);
}

/**
 * Pure function to size an order from a risk budget.
 *
 * Logic:
 * 1. Risk Amount = balance * applied_risk_pct / 100
 * 2. Units = floor(Risk Amount / |entry - stop|)
 * 3. Clamp to [1, max_units], then to [1, instrument unit cap]
 *
 * Without a usable stop the order degrades to a single nominal unit (after caps).
 */
export function sizeForRisk(
    instrument: string,
    balance: number,
    requestedRiskPct: number,
    entryPrice: number,
    stopPrice: number | null,
    policy: RiskPolicy
): SizedOrder {
    const appliedRiskPct = applyRiskCaps(instrument, requestedRiskPct, policy);
    const riskAmount = balance * (appliedRiskPct / 100);
    const unitCap = policy.symbol_unit_caps[instrument];

    const clampGlobal = (units: number): number => Math.max(1, Math.min(units, policy.max_units));
    const clampInstrument = (units: number): number =>
        unitCap === undefined ? units : Math.max(1, Math.min(units, unitCap));

    const hasStop = stopPrice !== null && Number.isFinite(stopPrice) && stopPrice !== entryPrice;
    const stopDistance = hasStop ? Math.abs(entryPrice - stopPrice) : 0;

    if (!hasStop || stopDistance <= 0) {
        return {
            instrument,
            units: clampInstrument(clampGlobal(1)),
            requested_risk_pct: requestedRiskPct,
            applied_risk_pct: appliedRiskPct,
            risk_amount: riskAmount,
            stop_distance: null,
            mode: "NOMINAL",
            adjustment_reason: "No stop distance",
        };
    }

    const rawUnits = Math.floor(riskAmount / stopDistance);
    const riskUnits = Number.isFinite(rawUnits) ? rawUnits : 1;

    let adjustmentReason = "";
    const globalUnits = clampGlobal(riskUnits);
    if (riskUnits > policy.max_units) {
        adjustmentReason = "Global unit cap";
    } else if (riskUnits < 1) {
        adjustmentReason = "Minimum unit";
    }

    const units = clampInstrument(globalUnits);
    if (units < globalUnits) {
        adjustmentReason = adjustmentReason ? `${adjustmentReason} & Instrument unit cap` : "Instrument unit cap";
    }

    return {
        instrument,
        units,
        requested_risk_pct: requestedRiskPct,
        applied_risk_pct: appliedRiskPct,
        risk_amount: riskAmount,
        stop_distance: stopDistance,
        mode: "RISK",
        adjustment_reason: adjustmentReason || undefined,
    };
}

export class PolicyRiskSizer implements RiskSizer {
    readonly #policy: RiskPolicy;

    constructor(policy: RiskPolicy) {
        this.#policy = policy;
    }

    get policy(): RiskPolicy {
        return this.#policy;
    }

    size(
        instrument: string,
        balance: number,
        requestedRiskPct: number,
        entryPrice: number,
        stopPrice: number | null
    ): SizedOrder {
        return sizeForRisk(instrument, balance, requestedRiskPct, entryPrice, stopPrice, this.#policy);
    }
}
