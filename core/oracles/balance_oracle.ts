/**
 * Balance Oracle
 *
 * Cached account equity. Upstream trouble (timeout, auth, missing
 * credentials, a non-positive figure) yields the fallback balance flagged
 * as degraded. Never throws.
 */

import { CachedValue } from "./cached_value.js";

export const DEFAULT_BALANCE_TTL_MS = 15_000;

export interface BalanceSource {
    /** Account NAV, else balance, in account currency. */
    fetchBalance(): Promise<number>;
}

export interface BalanceReading {
    readonly value: number;
    readonly degraded: boolean;
    readonly fetchedAt: number;
    readonly error?: string;
}

export interface BalanceOracleOptions {
    readonly ttlMs?: number;
    readonly fallbackBalance: number;
    readonly now?: () => number;
}

export class BalanceOracle {
    readonly #cache: CachedValue<number>;

    constructor(source: BalanceSource | null, options: BalanceOracleOptions) {
        this.#cache = new CachedValue(
            async () => {
                if (!source) {
                    throw new Error("balance source not configured");
                }
                const balance = await source.fetchBalance();
                if (!Number.isFinite(balance) || balance <= 0) {
                    throw new Error(`unusable balance ${balance}`);
                }
                return balance;
            },
            {
                ttlMs: options.ttlMs ?? DEFAULT_BALANCE_TTL_MS,
                fallback: options.fallbackBalance,
                now: options.now,
            }
        );
    }

    async currentBalance(): Promise<BalanceReading> {
        const reading = await this.#cache.get();
        if (reading.degraded) {
            console.warn(`[ORACLE] balance degraded fallback=${reading.value} error=${reading.error ?? "unknown"}`);
        }
        return reading;
    }
}
