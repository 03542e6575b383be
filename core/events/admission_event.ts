export type GuardOutcome = "PASSED" | "REJECTED" | "SKIPPED";

export type GuardName =
    | "kill_switch"
    | "trading_window"
    | "daily_loss"
    | "concurrency"
    | "min_stop"
    | "allowlist";

export enum ReasonCode {
    PASSED = "PASSED",
    TRADING_DISABLED = "TRADING_DISABLED",
    SYMBOL_KILL_ACTIVE = "SYMBOL_KILL_ACTIVE",
    OUTSIDE_TRADING_WINDOW = "OUTSIDE_TRADING_WINDOW",
    DAILY_LOSS_STOP = "DAILY_LOSS_STOP",
    MAX_OPEN_POSITIONS = "MAX_OPEN_POSITIONS",
    MAX_OPEN_PER_INSTRUMENT = "MAX_OPEN_PER_INSTRUMENT",
    STOP_TOO_CLOSE = "STOP_TOO_CLOSE",
    SYMBOL_NOT_ALLOWED = "SYMBOL_NOT_ALLOWED",
    MALFORMED_SIGNAL = "MALFORMED_SIGNAL",
    DUPLICATE_ORDER_ID = "DUPLICATE_ORDER_ID",
    EXECUTED = "EXECUTED",
    PARTIAL_EXECUTION = "PARTIAL_EXECUTION",
    EXECUTION_FAILED = "EXECUTION_FAILED",
    INTERNAL_ERROR = "INTERNAL_ERROR",
}

export type GuardDetailValue = string | number | boolean | null;
export type GuardDetails = Readonly<Record<string, GuardDetailValue>>;

export interface GuardDecision {
    readonly guard: GuardName;
    readonly outcome: GuardOutcome;
    readonly reason_code: ReasonCode;
    readonly reason: string;
    readonly details?: GuardDetails;
}
