/**
 * Admission guard chain tests
 * Validates: each rule in isolation, chain ordering, short-circuit vs snapshot
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ReasonCode } from "../events/admission_event.js";
import type { GuardContext, GuardPolicy, GuardSignal } from "./guard_context.js";
import { DEFAULT_KILL_SWITCH_CONFIG, buildKillSwitch, checkKillSwitch } from "./kill_switch.js";
import { assertTimeZone, localTimeIn, type LocalTime } from "./local_clock.js";
import { checkTradingWindow, isWithinWindow, parseTradingWindow } from "./rules/trading_window.js";
import { checkDailyLoss, dailyLossInfo } from "./rules/daily_loss.js";
import { checkConcurrency } from "./rules/concurrency.js";
import { checkMinStop } from "./rules/min_stop.js";
import { checkAllowlist } from "./rules/allowlist.js";
import { evaluateAdmission } from "./evaluate.js";
import { AdmissionGate } from "./gate.js";

// Monday 2026-03-02 10:00 local
const mondayMorning: LocalTime = { timeZone: "America/Halifax", date: "2026-03-02", weekday: 1, minutes: 600 };

function at(weekday: number, hh: number, mm: number): LocalTime {
    return { ...mondayMorning, weekday, minutes: hh * 60 + mm };
}

const signal: GuardSignal = { instrument: "US30_USD", side: "BUY", price: 39250, stop_distance: 150 };

const context: GuardContext = {
    balance: 1_000_000,
    balance_degraded: false,
    start_of_day_balance: 1_000_000,
    open_positions: 0,
    open_positions_for_instrument: 0,
    positions_degraded: false,
    local_time: mondayMorning,
};

const policy: GuardPolicy = {
    kill_switch: DEFAULT_KILL_SWITCH_CONFIG,
    trading_window: null,
    daily_loss_stop_pct: 0,
    max_open_positions: 0,
    max_open_per_instrument: 0,
    min_stop_distance: {},
    allowlist: new Set(["US30_USD", "NAS100_USD", "XAU_USD", "EUR_USD"]),
};

describe("kill switch", () => {
    it("skips every signal when trading is disabled", () => {
        const config = buildKillSwitch(false, [], "", (t) => t);
        const decision = checkKillSwitch(signal, config);
        assert.equal(decision.outcome, "SKIPPED");
        assert.equal(decision.reason_code, ReasonCode.TRADING_DISABLED);
        assert.equal(decision.reason, "TRADING_ENABLED=false");
    });

    it("skips killed instruments, resolving the configured tokens", () => {
        const config = buildKillSwitch(true, ["us30", " "], "maintenance", (t) => (t.toUpperCase() === "US30" ? "US30_USD" : t));
        assert.deepEqual(config.symbol_kill, { US30_USD: true });

        const decision = checkKillSwitch(signal, config);
        assert.equal(decision.reason_code, ReasonCode.SYMBOL_KILL_ACTIVE);
        assert.equal(decision.reason, "maintenance");

        const other = checkKillSwitch({ ...signal, instrument: "EUR_USD" }, config);
        assert.equal(other.outcome, "PASSED");
    });
});

describe("local clock", () => {
    it("renders wall-clock time in the trading zone", () => {
        assert.deepEqual(localTimeIn("America/Halifax", new Date("2026-01-15T14:30:00Z")), {
            timeZone: "America/Halifax",
            date: "2026-01-15",
            weekday: 4,
            minutes: 630,
        });
        assert.deepEqual(localTimeIn("Asia/Tokyo", new Date("2026-01-15T20:00:00Z")), {
            timeZone: "Asia/Tokyo",
            date: "2026-01-16",
            weekday: 5,
            minutes: 300,
        });
    });

    it("reports midnight as minute zero", () => {
        assert.equal(localTimeIn("UTC", new Date("2026-01-15T00:00:00Z")).minutes, 0);
    });

    it("rejects unknown time zones", () => {
        assert.throws(() => assertTimeZone("Not/AZone"), RangeError);
    });
});

describe("trading window", () => {
    it("parses day ranges and clock bounds", () => {
        const window = parseTradingWindow("Mon-Fri 09:30-16:00");
        assert.deepEqual([...(window.days ?? [])].sort(), [1, 2, 3, 4, 5]);
        assert.equal(window.start, 570);
        assert.equal(window.end, 960);

        assert.equal(parseTradingWindow("09:30-16:00").days, null);
        assert.deepEqual([...(parseTradingWindow("Fri-Mon 00:00-23:59").days ?? [])].sort(), [0, 1, 5, 6]);
        assert.deepEqual([...(parseTradingWindow("Tue,Thu 08:00-09:00").days ?? [])].sort(), [2, 4]);
    });

    it("rejects malformed windows", () => {
        for (const raw of ["9-5", "25:00-26:00", "Xyz 09:00-10:00", "09:30 - ", ""]) {
            assert.throws(() => parseTradingWindow(raw), /Invalid trading window/, raw);
        }
    });

    it("treats both bounds as inclusive", () => {
        const window = parseTradingWindow("Mon-Fri 09:30-16:00");
        assert.equal(isWithinWindow(window, at(1, 9, 29)), false);
        assert.equal(isWithinWindow(window, at(1, 9, 30)), true);
        assert.equal(isWithinWindow(window, at(3, 16, 0)), true);
        assert.equal(isWithinWindow(window, at(3, 16, 1)), false);
        assert.equal(isWithinWindow(window, at(6, 10, 0)), false);
    });

    it("wraps past midnight when the end precedes the start", () => {
        const window = parseTradingWindow("22:00-02:00");
        assert.equal(isWithinWindow(window, at(2, 23, 0)), true);
        assert.equal(isWithinWindow(window, at(2, 1, 59)), true);
        assert.equal(isWithinWindow(window, at(2, 2, 0)), true);
        assert.equal(isWithinWindow(window, at(2, 12, 0)), false);
    });

    it("skips signals outside the window", () => {
        const guarded: GuardPolicy = { ...policy, trading_window: parseTradingWindow("Mon-Fri 09:30-16:00") };
        const decision = checkTradingWindow({ ...context, local_time: at(1, 17, 5) }, guarded);
        assert.equal(decision.outcome, "SKIPPED");
        assert.equal(decision.reason_code, ReasonCode.OUTSIDE_TRADING_WINDOW);
        assert.equal(decision.details?.["local_time"], "17:05");

        assert.equal(checkTradingWindow(context, guarded).outcome, "PASSED");
        assert.equal(checkTradingWindow({ ...context, local_time: at(1, 3, 0) }, policy).outcome, "PASSED");
    });
});

describe("daily loss stop", () => {
    const guarded: GuardPolicy = { ...policy, daily_loss_stop_pct: 1.5 };

    it("rejects once drawdown reaches the threshold", () => {
        const decision = checkDailyLoss({ ...context, start_of_day_balance: 10_000, balance: 9_800 }, guarded);
        assert.equal(decision.outcome, "REJECTED");
        assert.equal(decision.reason_code, ReasonCode.DAILY_LOSS_STOP);
        assert.equal(decision.details?.["drawdown_pct"], 2);

        const edge = checkDailyLoss({ ...context, start_of_day_balance: 10_000, balance: 9_850 }, guarded);
        assert.equal(edge.outcome, "REJECTED");
    });

    it("compares the unrounded drawdown against the threshold", () => {
        const justBelow = checkDailyLoss({ ...context, start_of_day_balance: 10_000, balance: 9_850.004 }, guarded);
        assert.equal(justBelow.outcome, "PASSED");
        assert.equal(justBelow.details?.["drawdown_pct"], 1.5);
    });

    it("passes below the threshold and on gains", () => {
        assert.equal(checkDailyLoss({ ...context, start_of_day_balance: 10_000, balance: 9_900 }, guarded).outcome, "PASSED");
        const gain = dailyLossInfo({ ...context, start_of_day_balance: 10_000, balance: 12_000 }, guarded);
        assert.equal(gain.drawdown_pct, 0);
    });

    it("fails open on degraded balances and missing baselines", () => {
        const degraded = { ...context, start_of_day_balance: 10_000, balance: 1_000_000, balance_degraded: true };
        assert.equal(checkDailyLoss(degraded, guarded).outcome, "PASSED");
        assert.equal(dailyLossInfo(degraded, guarded).degraded, true);

        assert.equal(checkDailyLoss({ ...context, start_of_day_balance: null, balance: 1 }, guarded).outcome, "PASSED");
    });

    it("is disabled at a zero threshold", () => {
        const decision = checkDailyLoss({ ...context, start_of_day_balance: 10_000, balance: 1 }, policy);
        assert.equal(decision.outcome, "PASSED");
        assert.equal(decision.details?.["enabled"], false);
    });
});

describe("concurrency caps", () => {
    it("rejects at the per-instrument cap", () => {
        const decision = checkConcurrency(
            signal,
            { ...context, open_positions: 2, open_positions_for_instrument: 2 },
            { ...policy, max_open_per_instrument: 2 }
        );
        assert.equal(decision.outcome, "REJECTED");
        assert.equal(decision.reason_code, ReasonCode.MAX_OPEN_PER_INSTRUMENT);
    });

    it("checks the global cap first", () => {
        const decision = checkConcurrency(
            signal,
            { ...context, open_positions: 5, open_positions_for_instrument: 3 },
            { ...policy, max_open_positions: 5, max_open_per_instrument: 2 }
        );
        assert.equal(decision.reason_code, ReasonCode.MAX_OPEN_POSITIONS);
    });

    it("treats zero caps as disabled", () => {
        const decision = checkConcurrency(signal, { ...context, open_positions: 99, open_positions_for_instrument: 99 }, policy);
        assert.equal(decision.outcome, "PASSED");
    });
});

describe("minimum stop distance", () => {
    const guarded: GuardPolicy = { ...policy, min_stop_distance: { US30_USD: 50 } };

    it("rejects stops closer than the minimum", () => {
        const decision = checkMinStop({ ...signal, stop_distance: 40 }, guarded);
        assert.equal(decision.reason_code, ReasonCode.STOP_TOO_CLOSE);
    });

    it("passes at the minimum, without a stop, or without a rule", () => {
        assert.equal(checkMinStop({ ...signal, stop_distance: 50 }, guarded).outcome, "PASSED");
        assert.equal(checkMinStop({ ...signal, stop_distance: null }, guarded).outcome, "PASSED");
        assert.equal(checkMinStop({ ...signal, instrument: "EUR_USD", stop_distance: 0.0001 }, guarded).outcome, "PASSED");
    });
});

describe("allow-list", () => {
    it("admits only listed instruments", () => {
        assert.equal(checkAllowlist(signal, policy).outcome, "PASSED");
        const decision = checkAllowlist({ ...signal, instrument: "BTCUSD" }, policy);
        assert.equal(decision.outcome, "REJECTED");
        assert.equal(decision.reason_code, ReasonCode.SYMBOL_NOT_ALLOWED);
        assert.equal(decision.reason, "Symbol BTCUSD not allowed");
    });
});

describe("evaluateAdmission", () => {
    const hostile: GuardPolicy = {
        ...policy,
        kill_switch: buildKillSwitch(false, [], "", (t) => t),
        daily_loss_stop_pct: 1,
        allowlist: new Set(),
    };
    const losing: GuardContext = { ...context, start_of_day_balance: 10_000, balance: 5_000 };

    it("passes a clean signal through every guard", () => {
        const result = evaluateAdmission(signal, context, policy);
        assert.equal(result.outcome, "PASSED");
        assert.equal(result.reason_code, ReasonCode.PASSED);
        assert.deepEqual(
            result.decisions.map((d) => d.guard),
            ["kill_switch", "trading_window", "daily_loss", "concurrency", "min_stop", "allowlist"]
        );
    });

    it("stops at the first veto", () => {
        const result = evaluateAdmission(signal, losing, hostile);
        assert.equal(result.outcome, "SKIPPED");
        assert.equal(result.reason_code, ReasonCode.TRADING_DISABLED);
        assert.equal(result.decisions.length, 1);
    });

    it("runs every guard in snapshot mode but keeps the first veto", () => {
        const result = evaluateAdmission(signal, losing, hostile, { shortCircuit: false });
        assert.equal(result.reason_code, ReasonCode.TRADING_DISABLED);
        assert.equal(result.decisions.length, 6);
        assert.deepEqual(
            result.decisions.filter((d) => d.outcome !== "PASSED").map((d) => d.reason_code),
            [ReasonCode.TRADING_DISABLED, ReasonCode.DAILY_LOSS_STOP, ReasonCode.SYMBOL_NOT_ALLOWED]
        );
    });

    it("reports the allow-list veto last in order", () => {
        const result = new AdmissionGate(policy).evaluate({ ...signal, instrument: "BTCUSD" }, context);
        assert.equal(result.outcome, "REJECTED");
        assert.equal(result.veto?.guard, "allowlist");
    });
});
