import { ReasonCode, type GuardDecision } from "../../events/admission_event.js";
import type { GuardContext, GuardPolicy, GuardSignal } from "../guard_context.js";

export function checkConcurrency(signal: GuardSignal, context: GuardContext, policy: GuardPolicy): GuardDecision {
    const details = {
        open_positions: context.open_positions,
        open_positions_for_instrument: context.open_positions_for_instrument,
        max_open_positions: policy.max_open_positions,
        max_open_per_instrument: policy.max_open_per_instrument,
        degraded: context.positions_degraded,
    };

    if (policy.max_open_positions > 0 && context.open_positions >= policy.max_open_positions) {
        return {
            guard: "concurrency",
            outcome: "REJECTED",
            reason_code: ReasonCode.MAX_OPEN_POSITIONS,
            reason: `open positions ${context.open_positions} >= cap ${policy.max_open_positions}`,
            details,
        };
    }

    if (policy.max_open_per_instrument > 0 && context.open_positions_for_instrument >= policy.max_open_per_instrument) {
        return {
            guard: "concurrency",
            outcome: "REJECTED",
            reason_code: ReasonCode.MAX_OPEN_PER_INSTRUMENT,
            reason: `open ${signal.instrument} positions ${context.open_positions_for_instrument} >= cap ${policy.max_open_per_instrument}`,
            details,
        };
    }

    return { guard: "concurrency", outcome: "PASSED", reason_code: ReasonCode.PASSED, reason: "", details };
}
