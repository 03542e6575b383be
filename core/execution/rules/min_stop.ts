import { ReasonCode, type GuardDecision } from "../../events/admission_event.js";
import type { GuardPolicy, GuardSignal } from "../guard_context.js";

export function checkMinStop(signal: GuardSignal, policy: GuardPolicy): GuardDecision {
    const minimum = policy.min_stop_distance[signal.instrument];

    if (minimum === undefined || signal.stop_distance === null || signal.stop_distance >= minimum) {
        return { guard: "min_stop", outcome: "PASSED", reason_code: ReasonCode.PASSED, reason: "" };
    }

    return {
        guard: "min_stop",
        outcome: "REJECTED",
        reason_code: ReasonCode.STOP_TOO_CLOSE,
        reason: `stop distance ${signal.stop_distance} < minimum ${minimum}`,
        details: { stop_distance: signal.stop_distance, min_stop_distance: minimum },
    };
}
