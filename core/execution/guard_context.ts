import type { LocalTime } from "./local_clock.js";
import type { KillSwitchConfig } from "./kill_switch.js";
import type { TradingWindow } from "./rules/trading_window.js";

export type Side = "BUY" | "SELL";

/** The slice of a signal the admission guards look at. */
export interface GuardSignal {
    readonly instrument: string;
    readonly side: Side;
    readonly price: number;
    /** Stop distance already converted to price units, null when the signal has no stop. */
    readonly stop_distance: number | null;
}

/**
 * Derived per request, never persisted.
 */
export interface GuardContext {
    readonly balance: number;
    readonly balance_degraded: boolean;
    readonly start_of_day_balance: number | null;
    readonly open_positions: number;
    readonly open_positions_for_instrument: number;
    readonly positions_degraded: boolean;
    readonly local_time: LocalTime;
}

export interface GuardPolicy {
    readonly kill_switch: KillSwitchConfig;
    /** null = no trading-window restriction */
    readonly trading_window: TradingWindow | null;
    /** 0 disables the daily loss stop */
    readonly daily_loss_stop_pct: number;
    /** 0 disables the cap */
    readonly max_open_positions: number;
    /** 0 disables the cap */
    readonly max_open_per_instrument: number;
    /** Minimum stop distance in price units, keyed by canonical instrument id */
    readonly min_stop_distance: Readonly<Record<string, number>>;
    /** Canonical instrument ids */
    readonly allowlist: ReadonlySet<string>;
}
