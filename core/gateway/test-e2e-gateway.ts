/**
 * End-to-end gateway tests: payload -> guards -> sizing -> routing -> audit.
 * Every collaborator runs in process; no network, no files.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ReasonCode } from "../events/admission_event.js";
import type { ExecutionTarget, RoutedOrder } from "../exchange/adapters/base/ExecutionTarget.js";
import { DEFAULT_EXECUTION_CONFIG, type ExecutionRouterConfig } from "../exchange/execution/ExecutionConfig.js";
import { ExecutionRouter } from "../exchange/execution/ExecutionRouter.js";
import type { RoutedExecution } from "../events/target_outcome.js";
import { AdmissionGate } from "../execution/gate.js";
import type { GuardPolicy } from "../execution/guard_context.js";
import { buildKillSwitch, DEFAULT_KILL_SWITCH_CONFIG } from "../execution/kill_switch.js";
import { IdempotencyFilter } from "../idempotency/idempotency_filter.js";
import { EquitySeries } from "../ops/equity_series.js";
import { BalanceOracle } from "../oracles/balance_oracle.js";
import { PositionCensus } from "../oracles/position_census.js";
import { DEFAULT_RISK_POLICY } from "../risk/risk_config.js";
import { PolicyRiskSizer, type SizedOrder } from "../risk/sizing.js";
import { parseInstrumentCatalog } from "../symbols/instrument_meta.js";
import { SymbolResolver } from "../symbols/symbol_resolver.js";
import { UnitConverter } from "../symbols/unit_converter.js";
import {
    FakeTarget,
    FixedBalance,
    FixedPositions,
    MemoryAuditSink,
    RecordingNotifier
} from "../testing/fakes.js";
import { httpStatusFor, SignalGateway } from "./SignalGateway.js";

// Monday 2026-03-02, 11:00 in Halifax (UTC-4 until the March DST switch)
const NOW = Date.parse("2026-03-02T15:00:00Z");
const LOCAL_DATE = "2026-03-02";

const resolver = new SymbolResolver(parseInstrumentCatalog({
    instruments: [
        { id: "US30_USD", kind: "index", point: 1.0, precision: 1, aliases: ["US30", "DJI"] },
        { id: "EUR_USD", kind: "fx", pip: 0.0001, precision: 5, aliases: ["EURUSD"] },
    ],
}));

class CountingSizer extends PolicyRiskSizer {
    calls = 0;
    failure: Error | null = null;

    size(...args: Parameters<PolicyRiskSizer["size"]>): SizedOrder {
        this.calls++;
        if (this.failure) {
            throw this.failure;
        }
        return super.size(...args);
    }
}

class CountingRouter extends ExecutionRouter {
    calls = 0;

    async execute(order: RoutedOrder): Promise<RoutedExecution> {
        this.calls++;
        return super.execute(order);
    }
}

interface HarnessOptions {
    readonly policy?: Partial<GuardPolicy>;
    readonly routing?: Partial<ExecutionRouterConfig>;
    readonly balance?: FixedBalance | null;
    readonly positions?: FixedPositions;
    readonly relay?: ExecutionTarget | null;
}

function harness(options: HarnessOptions = {}) {
    const policy: GuardPolicy = {
        kill_switch: DEFAULT_KILL_SWITCH_CONFIG,
        trading_window: null,
        daily_loss_stop_pct: 0,
        max_open_positions: 0,
        max_open_per_instrument: 0,
        min_stop_distance: {},
        allowlist: new Set(["US30_USD", "EUR_USD"]),
        ...options.policy,
    };
    const now = () => NOW;
    const broker = new FakeTarget("broker", { statusCode: 201, message: "OANDA order filled", reference: "6372" });
    const sizer = new CountingSizer(DEFAULT_RISK_POLICY);
    const router = new CountingRouter(
        { ...DEFAULT_EXECUTION_CONFIG, ...options.routing },
        { broker, relay: options.relay === undefined ? new FakeTarget("relay") : options.relay },
        now
    );
    const audit = new MemoryAuditSink();
    const notifier = new RecordingNotifier();
    const idempotency = new IdempotencyFilter(90_000, now);
    const equity = new EquitySeries(null, now);
    const balance = options.balance === undefined ? new FixedBalance(1_000_000) : options.balance;

    const gateway = new SignalGateway({
        resolver,
        converter: new UnitConverter(resolver),
        gate: new AdmissionGate(policy),
        sizer,
        idempotency,
        balance: new BalanceOracle(balance, { fallbackBalance: 1_000_000, now }),
        positions: new PositionCensus(options.positions ?? new FixedPositions(), { now }),
        equity,
        router,
        audit,
        notifier,
        timeZone: "America/Halifax",
        now,
    });

    return { gateway, broker, sizer, router, audit, notifier, idempotency, equity };
}

const us30Buy = {
    action: "BUY",
    symbol: "US30",
    price: 39250,
    sl: 150,
    sl_type: "points",
    tp: 300,
    tp_type: "points",
    risk_pct: 0.05,
    order_id: "abc-1",
};

describe("httpStatusFor", () => {
    it("maps terminal states to HTTP codes", () => {
        assert.equal(httpStatusFor("ok", ReasonCode.EXECUTED), 200);
        assert.equal(httpStatusFor("partial", ReasonCode.PARTIAL_EXECUTION), 200);
        assert.equal(httpStatusFor("skipped", ReasonCode.OUTSIDE_TRADING_WINDOW), 200);
        assert.equal(httpStatusFor("ignored", ReasonCode.DUPLICATE_ORDER_ID), 200);
        assert.equal(httpStatusFor("rejected", ReasonCode.SYMBOL_NOT_ALLOWED), 403);
        assert.equal(httpStatusFor("rejected", ReasonCode.MALFORMED_SIGNAL), 400);
        assert.equal(httpStatusFor("error", ReasonCode.EXECUTION_FAILED), 500);
    });
});

describe("SignalGateway.handle", () => {
    it("sizes and simulates a dry-run index trade", async () => {
        const h = harness();

        const { httpStatus, body } = await h.gateway.handle(us30Buy);

        // risk = 1,000,000 * 0.05% = 500; 500 / 150 points = 3.33 -> 3 units
        assert.equal(httpStatus, 200);
        assert.equal(body.status, "ok");
        assert.equal(body.reason_code, ReasonCode.EXECUTED);
        assert.equal(body.instrument, "US30_USD");
        assert.equal(body.units, 3);
        assert.equal(body.sl_price, 39100);
        assert.equal(body.tp_price, 39550);
        assert.equal(body.risk_pct_applied, 0.05);
        assert.equal(body.broker?.simulated, true);
        assert.equal(body.relay?.simulated, true);
        assert.equal(body.broker?.message, "broker not called (DRY_RUN)");
        assert.equal(h.broker.orders.length, 0);

        assert.equal(h.audit.records.length, 1);
        const [record] = h.audit.records;
        assert.equal(record?.status, "ok");
        assert.equal(record?.order_id, "abc-1");
        assert.equal(record?.local_date, LOCAL_DATE);
        assert.equal(record?.guards.length, 6);
        assert.deepEqual(h.notifier.sent.map((n) => n.title), ["New Signal"]);
    });

    it("mirrors stop and target for sells", async () => {
        const h = harness();
        const { body } = await h.gateway.handle({ ...us30Buy, action: undefined, signal: "SELL_SIGNAL" });
        assert.equal(body.side, "SELL");
        assert.equal(body.sl_price, 39400);
        assert.equal(body.tp_price, 38950);
    });

    it("rejects on the daily loss stop without routing", async () => {
        const h = harness({ policy: { daily_loss_stop_pct: 1.5 }, balance: new FixedBalance(9_800) });
        await h.equity.record(10_000, LOCAL_DATE);

        const { httpStatus, body } = await h.gateway.handle(us30Buy);

        assert.equal(httpStatus, 403);
        assert.equal(body.status, "rejected");
        assert.equal(body.reason_code, ReasonCode.DAILY_LOSS_STOP);
        assert.equal(body.reason, "daily loss stop hit (2% >= 1.5%)");
        assert.equal(body.daily_loss_info?.start_balance, 10_000);
        assert.equal(body.daily_loss_info?.drawdown_pct, 2);
        assert.equal(h.sizer.calls, 0);
        assert.equal(h.router.calls, 0);
        assert.equal(h.audit.records.length, 1);
        assert.deepEqual(h.notifier.sent.map((n) => n.title), ["Blocked by Daily Loss Stop"]);
        assert.equal(h.notifier.sent[0]?.fields["drawdown_pct"], 2);
    });

    it("records the first healthy balance of the day as the baseline", async () => {
        const h = harness({ policy: { daily_loss_stop_pct: 1.5 }, balance: new FixedBalance(10_000) });

        const { body } = await h.gateway.handle(us30Buy);

        assert.equal(body.status, "ok");
        assert.equal(h.equity.firstForDate(LOCAL_DATE)?.balance, 10_000);
    });

    it("ignores a repeated client order id", async () => {
        const h = harness();

        const first = await h.gateway.handle(us30Buy);
        const second = await h.gateway.handle(us30Buy);

        assert.equal(first.body.status, "ok");
        assert.equal(second.httpStatus, 200);
        assert.equal(second.body.status, "ignored");
        assert.equal(second.body.reason_code, ReasonCode.DUPLICATE_ORDER_ID);
        assert.equal(h.router.calls, 1);
        assert.deepEqual(h.audit.records.map((r) => r.status), ["ok", "ignored"]);
        assert.equal(h.notifier.sent.length, 1);
    });

    it("admits concurrent signals sharing an order id only once", async () => {
        const h = harness();

        const results = await Promise.all([
            h.gateway.handle(us30Buy),
            h.gateway.handle(us30Buy),
            h.gateway.handle(us30Buy),
        ]);

        assert.deepEqual(results.map((r) => r.body.status), ["ok", "ignored", "ignored"]);
        assert.equal(h.router.calls, 1);
        assert.equal(h.sizer.calls, 1);
    });

    it("never treats generated order ids as duplicates", async () => {
        const h = harness();
        const { order_id: _omitted, ...anonymous } = us30Buy;

        const first = await h.gateway.handle(anonymous);
        const second = await h.gateway.handle(anonymous);

        assert.equal(first.body.status, "ok");
        assert.equal(second.body.status, "ok");
        assert.match(first.body.order_id ?? "", /^tv-[0-9a-f]{8}$/);
        assert.equal(h.idempotency.size(), 0);
    });

    it("rejects at the per-instrument concurrency cap", async () => {
        const h = harness({
            policy: { max_open_per_instrument: 2 },
            positions: new FixedPositions(["US30_USD", "US30_USD"]),
        });

        const { httpStatus, body } = await h.gateway.handle(us30Buy);

        assert.equal(httpStatus, 403);
        assert.equal(body.reason_code, ReasonCode.MAX_OPEN_PER_INSTRUMENT);
        assert.equal(h.router.calls, 0);
    });

    it("never sizes or routes a symbol outside the allow-list", async () => {
        const h = harness();

        const { httpStatus, body } = await h.gateway.handle({ ...us30Buy, symbol: "BTCUSD" });

        assert.equal(httpStatus, 403);
        assert.equal(body.reason_code, ReasonCode.SYMBOL_NOT_ALLOWED);
        assert.equal(body.instrument, "BTCUSD");
        assert.equal(h.sizer.calls, 0);
        assert.equal(h.router.calls, 0);
        assert.deepEqual(h.notifier.sent.map((n) => n.title), ["Signal Rejected"]);
    });

    it("skips every signal while trading is disabled", async () => {
        const h = harness({
            policy: { kill_switch: buildKillSwitch(false, [], "", (t) => t) },
            routing: { tradingEnabled: false },
        });

        const { httpStatus, body } = await h.gateway.handle(us30Buy);

        assert.equal(httpStatus, 200);
        assert.equal(body.status, "skipped");
        assert.equal(body.reason_code, ReasonCode.TRADING_DISABLED);
        assert.equal(body.trading_enabled, false);
        assert.deepEqual(h.notifier.sent.map((n) => n.title), ["Trading Disabled"]);
    });

    it("answers malformed payloads with 400 and an audit line only", async () => {
        const h = harness();

        const { httpStatus, body } = await h.gateway.handle({ action: "BUY", symbol: "US30" });

        assert.equal(httpStatus, 400);
        assert.equal(body.status, "rejected");
        assert.equal(body.reason_code, ReasonCode.MALFORMED_SIGNAL);
        assert.equal(body.order_id, null);
        assert.equal(h.audit.records.length, 1);
        assert.equal(h.audit.records[0]?.order_id, "");
        assert.equal(h.notifier.sent.length, 0);
    });

    it("reports partial when only the broker accepts", async () => {
        const h = harness({ routing: { dryRun: false }, relay: null });

        const { httpStatus, body } = await h.gateway.handle(us30Buy);

        assert.equal(httpStatus, 200);
        assert.equal(body.status, "partial");
        assert.equal(body.reason_code, ReasonCode.PARTIAL_EXECUTION);
        assert.equal(body.reason, "relay: relay not configured");
        assert.equal(h.broker.orders[0]?.units, 3);
        assert.equal(h.broker.orders[0]?.slPrice, 39100);
    });

    it("reports error with HTTP 500 when both targets fail", async () => {
        const h = harness({ routing: { dryRun: false }, relay: new FakeTarget("relay", new Error("relay down")) });
        h.broker.respondWith(new Error("broker down"));

        const { httpStatus, body } = await h.gateway.handle(us30Buy);

        assert.equal(httpStatus, 500);
        assert.equal(body.status, "error");
        assert.equal(body.reason_code, ReasonCode.EXECUTION_FAILED);
        assert.equal(body.reason, "broker: broker down; relay: relay down");
        assert.deepEqual(h.notifier.sent.map((n) => n.title), ["Execution Error"]);
    });

    it("turns internal faults into a single error record", async () => {
        const h = harness();
        h.sizer.failure = new Error("sizer exploded");

        const { httpStatus, body } = await h.gateway.handle(us30Buy);

        assert.equal(httpStatus, 500);
        assert.equal(body.status, "error");
        assert.equal(body.reason_code, ReasonCode.INTERNAL_ERROR);
        assert.equal(body.reason, "sizer exploded");
        assert.equal(h.audit.records.length, 1);
        assert.deepEqual(h.notifier.sent.map((n) => n.title), ["Webhook Exception"]);
    });

    it("falls back to the configured balance when the oracle is degraded", async () => {
        const h = harness({ balance: new FixedBalance(new Error("401 Unauthorized")) });

        const { body } = await h.gateway.handle(us30Buy);

        assert.equal(body.status, "ok");
        assert.equal(body.balance, 1_000_000);
        assert.equal(body.balance_degraded, true);
        assert.equal(h.equity.latest(), undefined);
    });
});

describe("SignalGateway.plan", () => {
    it("plans the reference trade without recording anything", async () => {
        const h = harness();

        const plan = await h.gateway.plan({});

        assert.equal(plan.instrument, "US30_USD");
        assert.equal(plan.side, "BUY");
        assert.equal(plan.units, 3);
        assert.equal(plan.sl_price, 39100);
        assert.equal(plan.tp_price, 39550);
        assert.equal(plan.sizing_mode, "RISK");
        assert.equal(plan.admission, "PASSED");
        assert.equal(plan.note, "dry run only; nothing sent");
        assert.equal(h.audit.records.length, 0);
        assert.equal(h.router.calls, 0);
        assert.equal(h.idempotency.size(), 0);
        assert.equal(h.equity.latest(), undefined);
    });

    it("runs every guard even after a veto", async () => {
        const h = harness();

        const plan = await h.gateway.plan({ symbol: "BTCUSD", signal: "SELL" });

        assert.equal(plan.admission, "REJECTED");
        assert.equal(plan.reason_code, ReasonCode.SYMBOL_NOT_ALLOWED);
        assert.equal(plan.guards.length, 6);
        assert.equal(plan.known_instrument, false);
    });
});

describe("SignalGateway.riskStatus", () => {
    it("reports balance, positions and limits", async () => {
        const h = harness({
            policy: { max_open_positions: 5 },
            positions: new FixedPositions(["US30_USD", "EUR_USD", "US30_USD"]),
        });

        const status = await h.gateway.riskStatus();

        assert.equal(status.local_date, LOCAL_DATE);
        assert.equal(status.local_time, "11:00");
        assert.equal(status.balance, 1_000_000);
        assert.equal(status.open_positions_total, 3);
        assert.deepEqual(status.open_positions_by_instrument, { US30_USD: 2, EUR_USD: 1 });
        assert.equal(status.max_open_positions, 5);
        assert.deepEqual(status.allowlist, ["EUR_USD", "US30_USD"]);
        assert.deepEqual(status.trading_window, { window: null, open: true });
        assert.equal(status.daily_loss_info.enabled, false);
    });
});
