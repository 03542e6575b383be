/**
 * Balance oracle / position census tests
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { CachedValue } from "./cached_value.js";
import { BalanceOracle, type BalanceSource } from "./balance_oracle.js";
import { PositionCensus, countOpenTrades, type PositionSource } from "./position_census.js";

function manualClock(start = 1_000_000) {
    let now = start;
    return {
        now: () => now,
        advance: (ms: number) => {
            now += ms;
        },
    };
}

class ScriptedBalance implements BalanceSource {
    calls = 0;
    constructor(private readonly results: Array<number | Error>) {}

    async fetchBalance(): Promise<number> {
        const result = this.results[Math.min(this.calls, this.results.length - 1)];
        this.calls++;
        if (result instanceof Error) {
            throw result;
        }
        return result;
    }
}

describe("CachedValue", () => {
    it("serves from cache inside the TTL and reloads after it", async () => {
        const clock = manualClock();
        let loads = 0;
        const cache = new CachedValue(async () => ++loads, { ttlMs: 100, fallback: 0, now: clock.now });

        assert.equal((await cache.get()).value, 1);
        clock.advance(99);
        assert.equal((await cache.get()).value, 1);
        clock.advance(1);
        assert.equal((await cache.get()).value, 2);
    });

    it("shares one in-flight load between concurrent readers", async () => {
        let loads = 0;
        let release: (value: number) => void = () => undefined;
        const gate = new Promise<number>((resolve) => {
            release = resolve;
        });
        const cache = new CachedValue(
            async () => {
                loads++;
                return gate;
            },
            { ttlMs: 1_000, fallback: 0 }
        );

        const first = cache.get();
        const second = cache.get();
        release(42);

        const [a, b] = await Promise.all([first, second]);
        assert.equal(loads, 1);
        assert.equal(a.value, 42);
        assert.equal(b.value, 42);
    });

    it("does not cache failures", async () => {
        const clock = manualClock();
        let attempt = 0;
        const cache = new CachedValue(
            async () => {
                attempt++;
                if (attempt === 1) {
                    throw new Error("upstream down");
                }
                return 7;
            },
            { ttlMs: 10_000, fallback: -1, now: clock.now }
        );

        const failed = await cache.get();
        assert.deepEqual(failed, { value: -1, degraded: true, fetchedAt: 1_000_000, error: "upstream down" });

        const recovered = await cache.get();
        assert.equal(recovered.value, 7);
        assert.equal(recovered.degraded, false);
        assert.equal(attempt, 2);
    });

    it("goes upstream again after invalidate()", async () => {
        let loads = 0;
        const cache = new CachedValue(async () => ++loads, { ttlMs: 60_000, fallback: 0 });
        await cache.get();
        cache.invalidate();
        assert.equal((await cache.get()).value, 2);
    });
});

describe("BalanceOracle", () => {
    it("returns the upstream balance when healthy", async () => {
        const source = new ScriptedBalance([25_000]);
        const oracle = new BalanceOracle(source, { fallbackBalance: 1_000_000 });
        const reading = await oracle.currentBalance();
        assert.equal(reading.value, 25_000);
        assert.equal(reading.degraded, false);
    });

    it("falls back on upstream errors and retries next time", async () => {
        const source = new ScriptedBalance([new Error("401 Unauthorized"), 9_800]);
        const oracle = new BalanceOracle(source, { fallbackBalance: 1_000_000 });

        const degraded = await oracle.currentBalance();
        assert.equal(degraded.value, 1_000_000);
        assert.equal(degraded.degraded, true);
        assert.equal(degraded.error, "401 Unauthorized");

        const healthy = await oracle.currentBalance();
        assert.equal(healthy.value, 9_800);
        assert.equal(healthy.degraded, false);
    });

    it("treats non-positive balances as unusable", async () => {
        for (const bad of [0, -5, Number.NaN]) {
            const oracle = new BalanceOracle(new ScriptedBalance([bad]), { fallbackBalance: 500 });
            const reading = await oracle.currentBalance();
            assert.equal(reading.value, 500);
            assert.equal(reading.degraded, true);
        }
    });

    it("degrades when no source is configured", async () => {
        const oracle = new BalanceOracle(null, { fallbackBalance: 1_000_000 });
        const reading = await oracle.currentBalance();
        assert.equal(reading.degraded, true);
        assert.equal(reading.error, "balance source not configured");
    });

    it("caches for the configured TTL", async () => {
        const clock = manualClock();
        const source = new ScriptedBalance([100, 200]);
        const oracle = new BalanceOracle(source, { fallbackBalance: 1, ttlMs: 15_000, now: clock.now });

        await oracle.currentBalance();
        clock.advance(14_999);
        assert.equal((await oracle.currentBalance()).value, 100);
        clock.advance(1);
        assert.equal((await oracle.currentBalance()).value, 200);
        assert.equal(source.calls, 2);
    });
});

describe("PositionCensus", () => {
    it("counts open trades globally and per instrument", () => {
        assert.deepEqual(countOpenTrades(["US30_USD", "EUR_USD", "US30_USD"]), {
            global: 3,
            perInstrument: { US30_USD: 2, EUR_USD: 1 },
        });
    });

    it("reads counts from the source", async () => {
        const source: PositionSource = { fetchOpenTrades: async () => ["US30_USD", "US30_USD"] };
        const census = new PositionCensus(source);
        const reading = await census.openPositions();
        assert.equal(reading.global, 2);
        assert.equal(reading.perInstrument["US30_USD"], 2);
        assert.equal(reading.degraded, false);
    });

    it("fails open to zero counts", async () => {
        const source: PositionSource = {
            fetchOpenTrades: async () => {
                throw new Error("timeout");
            },
        };
        const census = new PositionCensus(source);
        const reading = await census.openPositions();
        assert.equal(reading.global, 0);
        assert.deepEqual(reading.perInstrument, {});
        assert.equal(reading.degraded, true);
        assert.equal(reading.error, "timeout");
    });
});
