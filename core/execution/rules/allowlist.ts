import { ReasonCode, type GuardDecision } from "../../events/admission_event.js";
import type { GuardPolicy, GuardSignal } from "../guard_context.js";

export function checkAllowlist(signal: GuardSignal, policy: GuardPolicy): GuardDecision {
    if (policy.allowlist.has(signal.instrument)) {
        return { guard: "allowlist", outcome: "PASSED", reason_code: ReasonCode.PASSED, reason: "" };
    }
    return {
        guard: "allowlist",
        outcome: "REJECTED",
        reason_code: ReasonCode.SYMBOL_NOT_ALLOWED,
        reason: `Symbol ${signal.instrument} not allowed`,
    };
}
