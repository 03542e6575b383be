import { ReasonCode, type GuardDecision, type GuardOutcome } from "../events/admission_event.js";
import type { GuardContext, GuardPolicy, GuardSignal } from "./guard_context.js";
import { checkKillSwitch } from "./kill_switch.js";
import { checkTradingWindow } from "./rules/trading_window.js";
import { checkDailyLoss } from "./rules/daily_loss.js";
import { checkConcurrency } from "./rules/concurrency.js";
import { checkMinStop } from "./rules/min_stop.js";
import { checkAllowlist } from "./rules/allowlist.js";

export type Guard = (signal: GuardSignal, context: GuardContext, policy: GuardPolicy) => GuardDecision;

/**
 * Admission order. The first veto decides the reason code.
 */
export const GUARD_CHAIN: readonly Guard[] = [
    (signal, _context, policy) => checkKillSwitch(signal, policy.kill_switch),
    (_signal, context, policy) => checkTradingWindow(context, policy),
    (_signal, context, policy) => checkDailyLoss(context, policy),
    (signal, context, policy) => checkConcurrency(signal, context, policy),
    (signal, _context, policy) => checkMinStop(signal, policy),
    (signal, _context, policy) => checkAllowlist(signal, policy),
];

export interface AdmissionResult {
    readonly outcome: GuardOutcome;
    readonly reason_code: ReasonCode;
    readonly reason: string;
    /** Decisions in evaluation order; stops at the first veto when short-circuiting */
    readonly decisions: readonly GuardDecision[];
    readonly veto?: GuardDecision;
}

export interface EvaluateOptions {
    /** false = run every guard (snapshot mode); the first veto still decides the outcome */
    readonly shortCircuit?: boolean;
    readonly chain?: readonly Guard[];
}

export function evaluateAdmission(
    signal: GuardSignal,
    context: GuardContext,
    policy: GuardPolicy,
    options: EvaluateOptions = {}
): AdmissionResult {
    const shortCircuit = options.shortCircuit ?? true;
    const chain = options.chain ?? GUARD_CHAIN;

    const decisions: GuardDecision[] = [];
    let veto: GuardDecision | undefined;

    // Fail-fast checks in order
    for (const guard of chain) {
        const decision = guard(signal, context, policy);
        decisions.push(decision);
        if (decision.outcome !== "PASSED" && !veto) {
            veto = decision;
            if (shortCircuit) break;
        }
    }

    if (veto) {
        return { outcome: veto.outcome, reason_code: veto.reason_code, reason: veto.reason, decisions, veto };
    }
    return { outcome: "PASSED", reason_code: ReasonCode.PASSED, reason: "", decisions };
}
