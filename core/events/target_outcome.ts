/**
 * TargetOutcome: result of one downstream execution call.
 */

export type TargetName = "broker" | "relay";

export type AggregateStatus = "ok" | "partial" | "error";

export interface TargetOutcome {
    readonly target: TargetName;

    readonly success: boolean;

    /** HTTP status (or synthetic: 200 simulated, 400 not configured, 500 transport failure) */
    readonly statusCode: number;

    readonly message: string;

    /** True when the call was replaced by a no-op (dry-run / forwarding off / trading disabled) */
    readonly simulated: boolean;

    readonly latencyMs: number;

    /** Downstream order / transaction id, when one came back */
    readonly reference?: string;

    /** Normalized error code on failure */
    readonly errorCode?: string;
}

export interface RoutedExecution {
    readonly status: AggregateStatus;
    readonly broker: TargetOutcome;
    readonly relay: TargetOutcome;
}
