import type { AggregateStatus, TargetOutcome } from "../../events/target_outcome.js";

/**
 * ok iff every target succeeded, error iff none did, partial otherwise.
 */
export function aggregateOutcomes(outcomes: readonly TargetOutcome[]): AggregateStatus {
    const succeeded = outcomes.filter((outcome) => outcome.success).length;
    if (succeeded === outcomes.length) return "ok";
    if (succeeded === 0) return "error";
    return "partial";
}
