/**
 * RiskPolicy for the order sizer.
 * Per-instrument maps are keyed by canonical instrument id.
 */
export interface RiskPolicy {
    readonly max_risk_pct: number;              // e.g. 0.5 (= 0.5% of balance per trade)
    readonly max_units: number;                 // absolute unit ceiling
    readonly symbol_unit_caps: Readonly<Record<string, number>>;
    readonly symbol_risk_caps: Readonly<Record<string, number>>;  // percent, same scale as max_risk_pct
}

export const DEFAULT_RISK_POLICY: RiskPolicy = Object.freeze({
    max_risk_pct: 0.5,
    max_units: 300000,
    symbol_unit_caps: Object.freeze({}),
    symbol_risk_caps: Object.freeze({}),
});
