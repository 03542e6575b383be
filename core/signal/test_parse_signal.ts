/**
 * Signal Parser Unit Tests
 * Validates: field aliases, numeric strings, side parsing, generated ids
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { MalformedSignalError, parseDryRunSignal, parseSignal, sideFrom } from "./parse_signal.js";

const fixedId = () => "tv-0000abcd";

describe("parseSignal", () => {
    it("parses a full payload", () => {
        const signal = parseSignal({
            action: "buy",
            symbol: "us30",
            price: 39250,
            order_id: "abc-1",
            sl: 150,
            sl_type: "points",
            tp: 300,
            tp_type: "PIPS",
            risk_pct: 0.1,
        });
        assert.deepEqual(signal, {
            side: "BUY",
            tv_symbol: "US30",
            price: 39250,
            order_id: "abc-1",
            order_id_generated: false,
            sl: { quantity: 150, unit: "points" },
            tp: { quantity: 300, unit: "pips" },
            risk_pct: 0.1,
        });
    });

    it("accepts numeric strings", () => {
        const signal = parseSignal({ signal: "SELL_SIGNAL", symbol: "EURUSD", price: " 1.0850 ", sl: "15", risk_pct: "0.2" });
        assert.equal(signal.side, "SELL");
        assert.equal(signal.price, 1.085);
        assert.equal(signal.sl?.quantity, 15);
        assert.equal(signal.risk_pct, 0.2);
    });

    it("fills defaults for optional fields", () => {
        const signal = parseSignal({ action: "BUY", symbol: "XAUUSD", price: 2345.5 }, { generateId: fixedId });
        assert.equal(signal.order_id, "tv-0000abcd");
        assert.equal(signal.order_id_generated, true);
        assert.equal(signal.sl, null);
        assert.equal(signal.tp, null);
        assert.equal(signal.risk_pct, 0.05);
    });

    it("defaults the distance unit to points", () => {
        const signal = parseSignal({ action: "BUY", symbol: "US30", price: 1, sl: 10, sl_type: "ticks", tp: 20 });
        assert.equal(signal.sl?.unit, "points");
        assert.equal(signal.tp?.unit, "points");
    });

    it("generates ids for empty or blank client ids", () => {
        for (const orderId of ["", "   ", null]) {
            const signal = parseSignal({ action: "BUY", symbol: "US30", price: 1, order_id: orderId }, { generateId: fixedId });
            assert.equal(signal.order_id_generated, true);
        }
        assert.equal(parseSignal({ action: "BUY", symbol: "US30", price: 1, order_id: 42 }).order_id, "42");
    });

    it("generates tv-prefixed hex ids", () => {
        assert.match(parseSignal({ action: "BUY", symbol: "US30", price: 1 }).order_id, /^tv-[0-9a-f]{8}$/);
    });

    it("rejects payloads without a side", () => {
        assert.throws(
            () => parseSignal({ action: "close", symbol: "US30", price: 1 }),
            (error: unknown) => error instanceof MalformedSignalError && /Missing side/.test(error.message)
        );
    });

    it("rejects missing or empty symbols", () => {
        assert.throws(() => parseSignal({ action: "BUY", price: 1 }), /symbol/);
        assert.throws(() => parseSignal({ action: "BUY", symbol: "  ", price: 1 }), /symbol: Missing symbol/);
    });

    it("rejects bad prices", () => {
        assert.throws(() => parseSignal({ action: "BUY", symbol: "US30" }), /price/);
        assert.throws(() => parseSignal({ action: "BUY", symbol: "US30", price: "abc" }), /price: Expected a number/);
        assert.throws(() => parseSignal({ action: "BUY", symbol: "US30", price: -5 }), /price: Price must be positive/);
    });

    it("rejects negative distances", () => {
        assert.throws(() => parseSignal({ action: "BUY", symbol: "US30", price: 1, sl: -3 }), /sl: Stop distance must not be negative/);
    });

    it("rejects non-object bodies", () => {
        for (const body of [null, "BUY US30", [1, 2]]) {
            assert.throws(() => parseSignal(body), MalformedSignalError);
        }
    });
});

describe("sideFrom", () => {
    it("prefers action over signal", () => {
        assert.equal(sideFrom("SELL", "BUY"), "SELL");
        assert.equal(sideFrom("", "buy_signal"), "BUY");
        assert.equal(sideFrom(null, undefined), null);
    });
});

describe("parseDryRunSignal", () => {
    it("falls back to the reference index trade", () => {
        const signal = parseDryRunSignal({}, { generateId: fixedId });
        assert.equal(signal.side, "BUY");
        assert.equal(signal.tv_symbol, "US30");
        assert.equal(signal.price, 39250);
        assert.deepEqual(signal.sl, { quantity: 150, unit: "points" });
        assert.deepEqual(signal.tp, { quantity: 300, unit: "points" });
        assert.equal(signal.risk_pct, 0.05);
    });

    it("keeps supplied fields and ignores empty ones", () => {
        const signal = parseDryRunSignal({ signal: "SELL", symbol: "NAS100", price: "", sl: null });
        assert.equal(signal.side, "SELL");
        assert.equal(signal.tv_symbol, "NAS100");
        assert.equal(signal.price, 39250);
        assert.equal(signal.sl?.quantity, 150);
    });

    it("tolerates a missing body", () => {
        assert.equal(parseDryRunSignal(undefined).tv_symbol, "US30");
    });
});
