import type { UnitKind } from "../symbols/unit_converter.js";

export type Side = "BUY" | "SELL";

export interface Distance {
    readonly quantity: number;
    readonly unit: UnitKind;
}

/**
 * One incoming trade instruction, immutable once parsed.
 */
export interface Signal {
    readonly side: Side;
    /** Symbol token as received, uppercased */
    readonly tv_symbol: string;
    /** Quote at signal time */
    readonly price: number;
    readonly order_id: string;
    /** True when the client sent no order id and one was generated */
    readonly order_id_generated: boolean;
    readonly sl: Distance | null;
    readonly tp: Distance | null;
    /** Percent of balance, e.g. 0.05 = 0.05% */
    readonly risk_pct: number;
}

export const DEFAULT_RISK_PCT = 0.05;
