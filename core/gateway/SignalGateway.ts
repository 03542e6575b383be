/**
 * Signal Gateway
 *
 * Per-signal orchestration:
 * 1. Parse the webhook payload (malformed => 400, audit only)
 * 2. Drop repeated client order ids (ignored, audit only)
 * 3. Resolve the instrument and turn stop/target distances into prices
 * 4. Build the guard context (balance, start-of-day baseline, open positions, local time)
 * 5. Run the admission guards (veto => rejected/skipped, audited and notified)
 * 6. Size the order from the risk budget
 * 7. Route to broker + relay and reduce to ok/partial/error
 *
 * Exactly one audit record per signal. handle() never throws.
 */

import { ReasonCode, type GuardDecision, type GuardOutcome } from "../events/admission_event.js";
import { auditEventId, type AuditRecord, type GatewayStatus } from "../events/audit_record.js";
import type { RoutedExecution, TargetOutcome } from "../events/target_outcome.js";
import type { ExecutionRouter } from "../exchange/execution/ExecutionRouter.js";
import type { AdmissionGate } from "../execution/gate.js";
import type { GuardContext, GuardSignal } from "../execution/guard_context.js";
import { formatMinutes, localTimeIn, type LocalTime } from "../execution/local_clock.js";
import { dailyLossInfo, type DailyLossInfo } from "../execution/rules/daily_loss.js";
import { isWithinWindow } from "../execution/rules/trading_window.js";
import type { IdempotencyFilter } from "../idempotency/idempotency_filter.js";
import type { AuditSink } from "../ops/audit_log.js";
import type { EquitySeries } from "../ops/equity_series.js";
import { NotifyColor, type Notifier, type NotifyFields } from "../ops/notifier.js";
import type { BalanceOracle } from "../oracles/balance_oracle.js";
import type { PositionCensus } from "../oracles/position_census.js";
import type { PolicyRiskSizer, SizingMode } from "../risk/sizing.js";
import { MalformedSignalError, parseDryRunSignal, parseSignal } from "../signal/parse_signal.js";
import type { Side, Signal } from "../signal/signal_contract.js";
import type { SymbolResolver } from "../symbols/symbol_resolver.js";
import { roundPrice, type UnitConverter } from "../symbols/unit_converter.js";

// ============================================================================
// Types
// ============================================================================

export interface SignalGatewayDeps {
    readonly resolver: SymbolResolver;
    readonly converter: UnitConverter;
    readonly gate: AdmissionGate;
    readonly sizer: PolicyRiskSizer;
    readonly idempotency: IdempotencyFilter;
    readonly balance: BalanceOracle;
    readonly positions: PositionCensus;
    readonly equity: EquitySeries;
    readonly router: ExecutionRouter;
    readonly audit: AuditSink;
    readonly notifier: Notifier;
    /** IANA zone used for trading days, windows and audit dates */
    readonly timeZone: string;
    readonly now?: () => number;
}

export interface GatewayResponseBody {
    readonly status: GatewayStatus;
    readonly reason_code: ReasonCode;
    readonly reason: string;
    readonly order_id: string | null;
    readonly tv_symbol: string | null;
    readonly instrument: string | null;
    readonly side: Side | null;
    readonly entry: number | null;
    readonly sl_price: number | null;
    readonly tp_price: number | null;
    readonly risk_pct_requested: number | null;
    readonly risk_pct_applied: number | null;
    readonly units: number | null;
    readonly balance: number | null;
    readonly balance_degraded: boolean | null;
    readonly dry_run: boolean;
    readonly trading_enabled: boolean;
    readonly guards: readonly GuardDecision[];
    readonly broker: TargetOutcome | null;
    readonly relay: TargetOutcome | null;
    readonly daily_loss_info?: DailyLossInfo;
}

export interface GatewayResponse {
    readonly httpStatus: number;
    readonly body: GatewayResponseBody;
}

export interface SignalPlan {
    readonly order_id: string;
    readonly tv_symbol: string;
    readonly instrument: string;
    readonly known_instrument: boolean;
    readonly side: Side;
    readonly entry: number;
    readonly stop_distance: number | null;
    readonly sl_price: number | null;
    readonly tp_price: number | null;
    readonly risk_pct_requested: number;
    readonly risk_pct_applied: number;
    readonly units: number;
    readonly sizing_mode: SizingMode;
    readonly adjustment_reason: string | null;
    readonly balance: number;
    readonly balance_degraded: boolean;
    readonly admission: GuardOutcome;
    readonly reason_code: ReasonCode;
    readonly reason: string;
    readonly guards: readonly GuardDecision[];
    readonly daily_loss_info: DailyLossInfo;
    readonly open_positions_total: number;
    readonly open_positions_for_instrument: number;
    readonly positions_degraded: boolean;
    readonly dry_run: boolean;
    readonly trading_enabled: boolean;
    readonly note: string;
}

export interface RiskStatus {
    readonly time_zone: string;
    readonly local_date: string;
    readonly local_time: string;
    readonly trading_enabled: boolean;
    readonly dry_run: boolean;
    readonly kill_switch: {
        readonly global: boolean;
        readonly instruments: readonly string[];
        readonly reason: string;
    };
    readonly trading_window: {
        readonly window: string | null;
        readonly open: boolean;
    };
    readonly balance: number;
    readonly balance_degraded: boolean;
    readonly daily_loss_info: DailyLossInfo;
    readonly open_positions_total: number;
    readonly open_positions_by_instrument: Readonly<Record<string, number>>;
    readonly positions_degraded: boolean;
    readonly max_open_positions: number;
    readonly max_open_per_instrument: number;
    readonly max_risk_pct: number;
    readonly max_units: number;
    readonly allowlist: readonly string[];
}

interface PriceLevels {
    readonly stop_distance: number | null;
    readonly sl_price: number | null;
    readonly tp_price: number | null;
}

/** What is known about a signal so far; filled in as it moves through the pipeline. */
interface SignalTrace {
    readonly received_at: number;
    readonly local_time: LocalTime;
    order_id: string | null;
    tv_symbol: string | null;
    instrument: string | null;
    side: Side | null;
    entry: number | null;
    sl_price: number | null;
    tp_price: number | null;
    risk_pct_requested: number | null;
    risk_pct_applied: number | null;
    units: number | null;
    balance: number | null;
    balance_degraded: boolean | null;
    guards: readonly GuardDecision[];
    execution: RoutedExecution | null;
    daily_loss_info?: DailyLossInfo;
}

const VETO_NOTICES: Partial<Record<ReasonCode, { title: string; color: number }>> = {
    [ReasonCode.TRADING_DISABLED]: { title: "Trading Disabled", color: NotifyColor.DISABLED },
    [ReasonCode.SYMBOL_KILL_ACTIVE]: { title: "Instrument Kill Switch", color: NotifyColor.DISABLED },
    [ReasonCode.OUTSIDE_TRADING_WINDOW]: { title: "Blocked by Trading Window", color: NotifyColor.BLOCKED },
    [ReasonCode.DAILY_LOSS_STOP]: { title: "Blocked by Daily Loss Stop", color: NotifyColor.ERROR },
};

export function httpStatusFor(status: GatewayStatus, reasonCode: ReasonCode): number {
    switch (status) {
        case "ok":
        case "partial":
        case "skipped":
        case "ignored":
            return 200;
        case "rejected":
            return reasonCode === ReasonCode.MALFORMED_SIGNAL ? 400 : 403;
        case "error":
            return 500;
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Signal Gateway
// ============================================================================

export class SignalGateway {
    readonly #deps: SignalGatewayDeps;
    readonly #now: () => number;

    constructor(deps: SignalGatewayDeps) {
        this.#deps = deps;
        this.#now = deps.now ?? Date.now;
    }

    get dryRun(): boolean {
        return this.#deps.router.config.dryRun;
    }

    get tradingEnabled(): boolean {
        return this.#deps.router.config.tradingEnabled;
    }

    async handle(payload: unknown): Promise<GatewayResponse> {
        const receivedAt = this.#now();
        const trace: SignalTrace = {
            received_at: receivedAt,
            local_time: localTimeIn(this.#deps.timeZone, new Date(receivedAt)),
            order_id: null,
            tv_symbol: null,
            instrument: null,
            side: null,
            entry: null,
            sl_price: null,
            tp_price: null,
            risk_pct_requested: null,
            risk_pct_applied: null,
            units: null,
            balance: null,
            balance_degraded: null,
            guards: [],
            execution: null,
        };

        try {
            return await this.process(payload, trace);
        } catch (error) {
            const message = errorMessage(error);
            console.error(`[GATEWAY] order_id=${trace.order_id ?? "-"} internal error: ${message}`);
            this.#deps.notifier.notify(
                "Webhook Exception",
                { order_id: trace.order_id, symbol: trace.tv_symbol, error: message },
                NotifyColor.ERROR
            );
            return this.finish(trace, "error", ReasonCode.INTERNAL_ERROR, message);
        }
    }

    /**
     * Mapping, price levels, sizing and a full guard snapshot for a payload.
     * Nothing is recorded: no idempotency entry, audit line, equity sample or order.
     * @throws MalformedSignalError
     */
    async plan(payload: unknown): Promise<SignalPlan> {
        const signal = parseDryRunSignal(payload);
        const instrument = this.#deps.resolver.resolve(signal.tv_symbol);
        const levels = this.priceLevels(signal, instrument);
        const local = localTimeIn(this.#deps.timeZone, new Date(this.#now()));
        const context = await this.guardContext(instrument, local, false);

        const admission = this.#deps.gate.evaluate(this.guardSignal(signal, instrument, levels), context, {
            shortCircuit: false,
        });
        const sized = this.#deps.sizer.size(instrument, context.balance, signal.risk_pct, signal.price, levels.sl_price);

        return {
            order_id: signal.order_id,
            tv_symbol: signal.tv_symbol,
            instrument,
            known_instrument: this.#deps.resolver.isKnown(instrument),
            side: signal.side,
            entry: signal.price,
            stop_distance: levels.stop_distance,
            sl_price: levels.sl_price,
            tp_price: levels.tp_price,
            risk_pct_requested: signal.risk_pct,
            risk_pct_applied: sized.applied_risk_pct,
            units: sized.units,
            sizing_mode: sized.mode,
            adjustment_reason: sized.adjustment_reason ?? null,
            balance: context.balance,
            balance_degraded: context.balance_degraded,
            admission: admission.outcome,
            reason_code: admission.reason_code,
            reason: admission.reason,
            guards: admission.decisions,
            daily_loss_info: dailyLossInfo(context, this.#deps.gate.policy),
            open_positions_total: context.open_positions,
            open_positions_for_instrument: context.open_positions_for_instrument,
            positions_degraded: context.positions_degraded,
            dry_run: this.dryRun,
            trading_enabled: this.tradingEnabled,
            note: "dry run only; nothing sent",
        };
    }

    async riskStatus(): Promise<RiskStatus> {
        const local = localTimeIn(this.#deps.timeZone, new Date(this.#now()));
        const [balance, positions] = await Promise.all([
            this.#deps.balance.currentBalance(),
            this.#deps.positions.openPositions(),
        ]);
        const policy = this.#deps.gate.policy;
        const risk = this.#deps.sizer.policy;
        const context: GuardContext = {
            balance: balance.value,
            balance_degraded: balance.degraded,
            start_of_day_balance: this.peekBaseline(balance.value, balance.degraded, local.date),
            open_positions: positions.global,
            open_positions_for_instrument: 0,
            positions_degraded: positions.degraded,
            local_time: local,
        };

        return {
            time_zone: local.timeZone,
            local_date: local.date,
            local_time: formatMinutes(local.minutes),
            trading_enabled: this.tradingEnabled,
            dry_run: this.dryRun,
            kill_switch: {
                global: policy.kill_switch.global_kill,
                instruments: Object.keys(policy.kill_switch.symbol_kill).filter((id) => policy.kill_switch.symbol_kill[id]),
                reason: policy.kill_switch.reason,
            },
            trading_window: {
                window: policy.trading_window?.raw ?? null,
                open: policy.trading_window ? isWithinWindow(policy.trading_window, local) : true,
            },
            balance: balance.value,
            balance_degraded: balance.degraded,
            daily_loss_info: dailyLossInfo(context, policy),
            open_positions_total: positions.global,
            open_positions_by_instrument: positions.perInstrument,
            positions_degraded: positions.degraded,
            max_open_positions: policy.max_open_positions,
            max_open_per_instrument: policy.max_open_per_instrument,
            max_risk_pct: risk.max_risk_pct,
            max_units: risk.max_units,
            allowlist: Array.from(policy.allowlist).sort(),
        };
    }

    // -------------------------------------------------------------------------
    // Pipeline
    // -------------------------------------------------------------------------

    private async process(payload: unknown, trace: SignalTrace): Promise<GatewayResponse> {
        let signal: Signal;
        try {
            signal = parseSignal(payload);
        } catch (error) {
            if (error instanceof MalformedSignalError) {
                return this.finish(trace, "rejected", ReasonCode.MALFORMED_SIGNAL, error.message);
            }
            throw error;
        }

        trace.order_id = signal.order_id;
        trace.tv_symbol = signal.tv_symbol;
        trace.side = signal.side;
        trace.entry = signal.price;
        trace.risk_pct_requested = signal.risk_pct;

        // Generated ids are unique by construction; only client ids can repeat
        if (!signal.order_id_generated && this.#deps.idempotency.seen(signal.order_id)) {
            return this.finish(trace, "ignored", ReasonCode.DUPLICATE_ORDER_ID, "duplicate order_id");
        }

        const instrument = this.#deps.resolver.resolve(signal.tv_symbol);
        const levels = this.priceLevels(signal, instrument);
        trace.instrument = instrument;
        trace.sl_price = levels.sl_price;
        trace.tp_price = levels.tp_price;

        const context = await this.guardContext(instrument, trace.local_time, true);
        trace.balance = context.balance;
        trace.balance_degraded = context.balance_degraded;
        trace.daily_loss_info = dailyLossInfo(context, this.#deps.gate.policy);

        const admission = this.#deps.gate.evaluate(this.guardSignal(signal, instrument, levels), context);
        trace.guards = admission.decisions;

        if (admission.outcome !== "PASSED") {
            const notice = VETO_NOTICES[admission.reason_code] ?? { title: "Signal Rejected", color: NotifyColor.BLOCKED };
            const fields: NotifyFields = {
                symbol: signal.tv_symbol,
                instrument,
                side: signal.side,
                price: signal.price,
                order_id: signal.order_id,
                reason: admission.reason,
                ...(admission.reason_code === ReasonCode.DAILY_LOSS_STOP ? trace.daily_loss_info : {}),
            };
            this.#deps.notifier.notify(notice.title, fields, notice.color);
            return this.finish(
                trace,
                admission.outcome === "SKIPPED" ? "skipped" : "rejected",
                admission.reason_code,
                admission.reason
            );
        }

        const sized = this.#deps.sizer.size(instrument, context.balance, signal.risk_pct, signal.price, levels.sl_price);
        trace.risk_pct_applied = sized.applied_risk_pct;
        trace.units = sized.units;

        const execution = await this.#deps.router.execute({
            orderId: signal.order_id,
            instrument,
            side: signal.side,
            units: sized.units,
            entryPrice: signal.price,
            slPrice: levels.sl_price,
            tpPrice: levels.tp_price,
        });
        trace.execution = execution;

        const failures = [execution.broker, execution.relay]
            .filter((outcome) => !outcome.success)
            .map((outcome) => `${outcome.target}: ${outcome.message}`);

        this.#deps.notifier.notify(
            execution.status === "error" ? "Execution Error" : "New Signal",
            {
                status: execution.status,
                symbol: signal.tv_symbol,
                instrument,
                side: signal.side,
                price: signal.price,
                units: sized.units,
                risk_pct: sized.applied_risk_pct,
                sl: levels.sl_price,
                tp: levels.tp_price,
                broker: execution.broker.message,
                relay_status: execution.relay.statusCode,
            },
            execution.status === "ok" ? NotifyColor.OK : execution.status === "partial" ? NotifyColor.PARTIAL : NotifyColor.ERROR
        );

        switch (execution.status) {
            case "ok":
                return this.finish(trace, "ok", ReasonCode.EXECUTED, "");
            case "partial":
                return this.finish(trace, "partial", ReasonCode.PARTIAL_EXECUTION, failures.join("; "));
            case "error":
                return this.finish(trace, "error", ReasonCode.EXECUTION_FAILED, failures.join("; "));
        }
    }

    private priceLevels(signal: Signal, instrument: string): PriceLevels {
        const meta = this.#deps.resolver.meta(instrument);
        const direction = signal.side === "BUY" ? 1 : -1;

        let stopDistance: number | null = null;
        let slPrice: number | null = null;
        if (signal.sl) {
            stopDistance = this.#deps.converter.toPriceDelta(instrument, signal.sl.quantity, signal.sl.unit);
            slPrice = roundPrice(meta, signal.price - direction * stopDistance);
        }

        let tpPrice: number | null = null;
        if (signal.tp) {
            const delta = this.#deps.converter.toPriceDelta(instrument, signal.tp.quantity, signal.tp.unit);
            tpPrice = roundPrice(meta, signal.price + direction * delta);
        }

        return { stop_distance: stopDistance, sl_price: slPrice, tp_price: tpPrice };
    }

    private guardSignal(signal: Signal, instrument: string, levels: PriceLevels): GuardSignal {
        return {
            instrument,
            side: signal.side,
            price: signal.price,
            stop_distance: levels.stop_distance,
        };
    }

    private async guardContext(instrument: string, local: LocalTime, record: boolean): Promise<GuardContext> {
        const [balance, positions] = await Promise.all([
            this.#deps.balance.currentBalance(),
            this.#deps.positions.openPositions(),
        ]);

        const startOfDay = record
            ? await this.#deps.equity.observe(balance.value, balance.degraded, local.date)
            : this.peekBaseline(balance.value, balance.degraded, local.date);

        return {
            balance: balance.value,
            balance_degraded: balance.degraded,
            start_of_day_balance: startOfDay,
            open_positions: positions.global,
            open_positions_for_instrument: positions.perInstrument[instrument] ?? 0,
            positions_degraded: positions.degraded,
            local_time: local,
        };
    }

    /**
     * The baseline observe() would report, without recording a sample.
     */
    private peekBaseline(balance: number, degraded: boolean, localDate: string): number | null {
        const first = this.#deps.equity.firstForDate(localDate);
        if (first) {
            return first.balance;
        }
        return !degraded && balance > 0 ? balance : null;
    }

    private async finish(
        trace: SignalTrace,
        status: GatewayStatus,
        reasonCode: ReasonCode,
        reason: string
    ): Promise<GatewayResponse> {
        const completedAt = this.#now();
        const orderId = trace.order_id ?? "";

        const record: AuditRecord = {
            event_type: "SIGNAL_PROCESSED",
            event_id: auditEventId(orderId, trace.received_at, status),
            order_id: orderId,
            status,
            reason_code: reasonCode,
            reason,
            tv_symbol: trace.tv_symbol,
            instrument: trace.instrument,
            side: trace.side,
            price: trace.entry,
            sl_price: trace.sl_price,
            tp_price: trace.tp_price,
            risk_pct_requested: trace.risk_pct_requested,
            risk_pct_applied: trace.risk_pct_applied,
            units: trace.units,
            balance: trace.balance,
            balance_degraded: trace.balance_degraded,
            dry_run: this.dryRun,
            trading_enabled: this.tradingEnabled,
            guards: trace.guards,
            broker: trace.execution?.broker ?? null,
            relay: trace.execution?.relay ?? null,
            received_at: trace.received_at,
            completed_at: completedAt,
            local_date: trace.local_time.date,
        };
        await this.#deps.audit.append(record);

        console.log(
            `[GATEWAY] order_id=${orderId || "-"} status=${status} reason_code=${reasonCode}` +
            (trace.instrument ? ` instrument=${trace.instrument}` : "") +
            (trace.units !== null ? ` units=${trace.units}` : "") +
            ` latency=${completedAt - trace.received_at}ms`
        );

        return {
            httpStatus: httpStatusFor(status, reasonCode),
            body: {
                status,
                reason_code: reasonCode,
                reason,
                order_id: trace.order_id,
                tv_symbol: trace.tv_symbol,
                instrument: trace.instrument,
                side: trace.side,
                entry: trace.entry,
                sl_price: trace.sl_price,
                tp_price: trace.tp_price,
                risk_pct_requested: trace.risk_pct_requested,
                risk_pct_applied: trace.risk_pct_applied,
                units: trace.units,
                balance: trace.balance,
                balance_degraded: trace.balance_degraded,
                dry_run: this.dryRun,
                trading_enabled: this.tradingEnabled,
                guards: trace.guards,
                broker: record.broker,
                relay: record.relay,
                daily_loss_info: trace.daily_loss_info,
            },
        };
    }
}
