/**
 * Kill switch: global and per-instrument.
 * Overrides every other guard when active.
 */

import { ReasonCode, type GuardDecision } from "../events/admission_event.js";
import type { GuardSignal } from "./guard_context.js";

export interface KillSwitchConfig {
    /** Global kill-switch: mirrors TRADING_ENABLED=false */
    readonly global_kill: boolean;

    /** Per-instrument kill-switches, keyed by canonical id */
    readonly symbol_kill: Readonly<Record<string, boolean>>;

    /** Reason for kill-switch activation (for audit) */
    readonly reason: string;
}

export const DEFAULT_KILL_SWITCH_CONFIG: KillSwitchConfig = Object.freeze({
    global_kill: false,
    symbol_kill: Object.freeze({}),
    reason: "",
});

/**
 * Build a kill-switch config from raw settings.
 * Instrument tokens are canonicalized through the supplied resolver.
 */
export function buildKillSwitch(
    tradingEnabled: boolean,
    symbolKillTokens: readonly string[],
    reason: string,
    resolve: (token: string) => string
): KillSwitchConfig {
    const symbolKill: Record<string, boolean> = {};
    for (const token of symbolKillTokens) {
        const trimmed = token.trim();
        if (trimmed) symbolKill[resolve(trimmed)] = true;
    }

    return Object.freeze({
        global_kill: !tradingEnabled,
        symbol_kill: Object.freeze(symbolKill),
        reason,
    });
}

/**
 * Pure function: no side effects, no I/O.
 */
export function checkKillSwitch(signal: GuardSignal, config: KillSwitchConfig): GuardDecision {
    // RULE 1: Global kill-switch overrides everything
    if (config.global_kill) {
        return {
            guard: "kill_switch",
            outcome: "SKIPPED",
            reason_code: ReasonCode.TRADING_DISABLED,
            reason: config.reason || "TRADING_ENABLED=false",
        };
    }

    // RULE 2: Per-instrument kill-switch
    if (config.symbol_kill[signal.instrument]) {
        return {
            guard: "kill_switch",
            outcome: "SKIPPED",
            reason_code: ReasonCode.SYMBOL_KILL_ACTIVE,
            reason: config.reason || `Instrument ${signal.instrument} kill-switch active`,
            details: { instrument: signal.instrument },
        };
    }

    return { guard: "kill_switch", outcome: "PASSED", reason_code: ReasonCode.PASSED, reason: "" };
}
