/**
 * Execution Router Configuration
 */

import type { TargetName } from "../../events/target_outcome.js";

export interface ExecutionRouterConfig {
    /** Global dry run: every target is simulated */
    readonly dryRun: boolean;

    /** Mirrors the global kill switch */
    readonly tradingEnabled: boolean;

    /** Per-target forwarding flags */
    readonly forward: Readonly<Record<TargetName, boolean>>;
}

export const DEFAULT_EXECUTION_CONFIG: ExecutionRouterConfig = {
    dryRun: true,
    tradingEnabled: true,
    forward: { broker: true, relay: true }
};

/**
 * Why a target call is replaced by a no-op, or null when it goes out for real.
 */
export function simulationReason(config: ExecutionRouterConfig, target: TargetName): string | null {
    const reasons: string[] = [];
    if (config.dryRun) reasons.push("DRY_RUN");
    if (!config.forward[target]) reasons.push("forwarding disabled");
    if (!config.tradingEnabled) reasons.push("trading disabled");
    return reasons.length > 0 ? reasons.join(" / ") : null;
}
