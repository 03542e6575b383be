/**
 * Position Census
 *
 * Cached count of open broker trades, globally and per instrument.
 * Fails open to zero counts with degraded=true.
 */

import { CachedValue } from "./cached_value.js";

export const DEFAULT_POSITION_TTL_MS = 5_000;

export interface PositionSource {
    /** Canonical instrument id of every open trade, one entry per trade. */
    fetchOpenTrades(): Promise<readonly string[]>;
}

export interface PositionCounts {
    readonly global: number;
    readonly perInstrument: Readonly<Record<string, number>>;
}

export interface PositionReading extends PositionCounts {
    readonly degraded: boolean;
    readonly fetchedAt: number;
    readonly error?: string;
}

export interface PositionCensusOptions {
    readonly ttlMs?: number;
    readonly now?: () => number;
}

const EMPTY_COUNTS: PositionCounts = Object.freeze({ global: 0, perInstrument: Object.freeze({}) });

export function countOpenTrades(instruments: readonly string[]): PositionCounts {
    const perInstrument: Record<string, number> = {};
    for (const instrument of instruments) {
        perInstrument[instrument] = (perInstrument[instrument] ?? 0) + 1;
    }
    return { global: instruments.length, perInstrument };
}

export class PositionCensus {
    readonly #cache: CachedValue<PositionCounts>;

    constructor(source: PositionSource | null, options: PositionCensusOptions = {}) {
        this.#cache = new CachedValue(
            async () => {
                if (!source) {
                    throw new Error("position source not configured");
                }
                return countOpenTrades(await source.fetchOpenTrades());
            },
            {
                ttlMs: options.ttlMs ?? DEFAULT_POSITION_TTL_MS,
                fallback: EMPTY_COUNTS,
                now: options.now,
            }
        );
    }

    async openPositions(): Promise<PositionReading> {
        const reading = await this.#cache.get();
        if (reading.degraded) {
            console.warn(`[ORACLE] positions degraded error=${reading.error ?? "unknown"}`);
        }
        return {
            global: reading.value.global,
            perInstrument: reading.value.perInstrument,
            degraded: reading.degraded,
            fetchedAt: reading.fetchedAt,
            error: reading.error,
        };
    }
}
