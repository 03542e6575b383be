/**
 * Test-signal generation for the send_signal CLI.
 */

import type { Side } from "../signal/signal_contract.js";

export interface TestSignalPayload {
    readonly symbol: string;
    readonly action: Side;
    readonly price: number;
    readonly order_id: string;
    readonly sl?: number;
    readonly sl_type?: string;
    readonly tp?: number;
    readonly tp_type?: string;
    readonly risk_pct?: number;
}

export interface BurstOptions {
    readonly symbol: string;
    readonly count: number;
    readonly startPrice: number;
    /** Largest absolute price move between consecutive signals */
    readonly maxMove: number;
    /** Fixed side; alternates at random when omitted */
    readonly side?: Side;
    readonly sl?: number;
    readonly tp?: number;
    readonly distanceType?: string;
    readonly riskPct?: number;
    readonly idPrefix: string;
    /** Uniform [0, 1) source */
    readonly random?: () => number;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

/**
 * Random-walk burst: each price moves up to maxMove from the previous one,
 * floored at 1. Order ids are `${idPrefix}_${index}`.
 */
export function randomWalkBurst(options: BurstOptions): TestSignalPayload[] {
    const random = options.random ?? Math.random;
    const payloads: TestSignalPayload[] = [];
    let price = options.startPrice;

    for (let i = 0; i < options.count; i++) {
        const action: Side = options.side ?? (random() < 0.5 ? "BUY" : "SELL");
        price = Math.max(price + (random() * 2 - 1) * options.maxMove, 1);

        payloads.push({
            symbol: options.symbol,
            action,
            price: round2(price),
            order_id: `${options.idPrefix}_${i}`,
            ...(options.sl !== undefined ? { sl: options.sl, sl_type: options.distanceType } : {}),
            ...(options.tp !== undefined ? { tp: options.tp, tp_type: options.distanceType } : {}),
            ...(options.riskPct !== undefined ? { risk_pct: options.riskPct } : {}),
        });
    }
    return payloads;
}

/**
 * BOT_YYYYMMDDHHMMSS (UTC) for the given instant.
 */
export function timestampPrefix(now: Date): string {
    return `BOT_${now.toISOString().replace(/[-:T]/g, "").slice(0, 14)}`;
}
