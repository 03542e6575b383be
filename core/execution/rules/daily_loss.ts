import { ReasonCode, type GuardDecision } from "../../events/admission_event.js";
import type { GuardContext, GuardPolicy } from "../guard_context.js";

export type DailyLossInfo = {
    readonly enabled: boolean;
    readonly start_balance: number | null;
    readonly current_balance: number;
    readonly drawdown_pct: number;
    readonly limit_pct: number;
    readonly degraded: boolean;
};

function round4(value: number): number {
    return Math.round(value * 10_000) / 10_000;
}

/**
 * drawdown% = (start - current) / start * 100, floored at 0.
 * A degraded balance or a missing baseline reports zero drawdown.
 */
function drawdownPct(context: GuardContext): number {
    const start = context.start_of_day_balance;
    const usable = !context.balance_degraded && start !== null && start > 0;
    return usable ? Math.max(0, ((start - context.balance) / start) * 100) : 0;
}

/**
 * Reported drawdown is rounded to 4 places; the guard compares the unrounded value.
 */
export function dailyLossInfo(context: GuardContext, policy: GuardPolicy): DailyLossInfo {
    const start = context.start_of_day_balance;
    const drawdown = drawdownPct(context);

    return {
        enabled: policy.daily_loss_stop_pct > 0,
        start_balance: start,
        current_balance: context.balance,
        drawdown_pct: round4(drawdown),
        limit_pct: policy.daily_loss_stop_pct,
        degraded: context.balance_degraded,
    };
}

export function checkDailyLoss(context: GuardContext, policy: GuardPolicy): GuardDecision {
    const info = dailyLossInfo(context, policy);

    if (!info.enabled || drawdownPct(context) < info.limit_pct) {
        return { guard: "daily_loss", outcome: "PASSED", reason_code: ReasonCode.PASSED, reason: "", details: info };
    }

    return {
        guard: "daily_loss",
        outcome: "REJECTED",
        reason_code: ReasonCode.DAILY_LOSS_STOP,
        reason: `daily loss stop hit (${info.drawdown_pct}% >= ${info.limit_pct}%)`,
        details: info,
    };
}
