/**
 * AuditRecord: one append-only line per processed signal.
 * Written once by the gateway, never mutated.
 */

import { createHash } from "node:crypto";
import type { GuardDecision, ReasonCode } from "./admission_event.js";
import type { TargetOutcome } from "./target_outcome.js";

/** Terminal state of a signal */
export type GatewayStatus = "ok" | "partial" | "error" | "rejected" | "skipped" | "ignored";

export interface AuditRecord {
    readonly event_type: "SIGNAL_PROCESSED";

    /** Deterministic event ID (SHA-256, 16 chars) */
    readonly event_id: string;

    readonly order_id: string;
    readonly status: GatewayStatus;
    readonly reason_code: ReasonCode;
    readonly reason: string;

    /** Symbol as received */
    readonly tv_symbol: string | null;
    /** Canonical instrument id */
    readonly instrument: string | null;
    readonly side: "BUY" | "SELL" | null;
    readonly price: number | null;
    readonly sl_price: number | null;
    readonly tp_price: number | null;

    readonly risk_pct_requested: number | null;
    readonly risk_pct_applied: number | null;
    readonly units: number | null;
    readonly balance: number | null;
    readonly balance_degraded: boolean | null;

    readonly dry_run: boolean;
    readonly trading_enabled: boolean;

    readonly guards: readonly GuardDecision[];
    readonly broker: TargetOutcome | null;
    readonly relay: TargetOutcome | null;

    /** Unix ms */
    readonly received_at: number;
    readonly completed_at: number;
    /** YYYY-MM-DD in the trading time zone */
    readonly local_date: string;
}

export function auditEventId(orderId: string, receivedAt: number, status: GatewayStatus): string {
    return createHash("sha256")
        .update(`${orderId}:${receivedAt}:${status}`)
        .digest("hex")
        .substring(0, 16);
}
