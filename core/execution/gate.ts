import type { GuardContext, GuardPolicy, GuardSignal } from "./guard_context.js";
import { evaluateAdmission, type AdmissionResult, type EvaluateOptions } from "./evaluate.js";

/**
 * AdmissionGate
 * Holds the immutable guard policy; evaluation itself is pure.
 * Context (balances, counts, local time) is injected per call.
 */
export class AdmissionGate {
    readonly #policy: GuardPolicy;

    constructor(policy: GuardPolicy) {
        this.#policy = policy;
    }

    get policy(): GuardPolicy {
        return this.#policy;
    }

    evaluate(signal: GuardSignal, context: GuardContext, options?: EvaluateOptions): AdmissionResult {
        return evaluateAdmission(signal, context, this.#policy, options);
    }
}
