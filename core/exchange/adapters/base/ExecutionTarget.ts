/**
 * Execution Target - Abstract Base Class
 *
 * One downstream destination for a sized order (broker, copy-trade relay).
 * Concrete targets implement submit(); the router owns timing, dry-run
 * substitution and error normalization.
 */

import type { TargetName } from "../../../events/target_outcome.js";
import { defaultFetch, fetchWithTimeout, type FetchLike } from "./http.js";

// ============================================================================
// Type Definitions
// ============================================================================

export type OrderSide = "BUY" | "SELL";

export interface RoutedOrder {
    readonly orderId: string;
    /** Canonical instrument id */
    readonly instrument: string;
    readonly side: OrderSide;
    /** Always positive; the side carries the direction */
    readonly units: number;
    readonly entryPrice: number;
    readonly slPrice: number | null;
    readonly tpPrice: number | null;
}

export interface TargetSubmission {
    readonly statusCode: number;
    readonly message: string;
    readonly reference?: string;
}

export interface ExecutionTargetOptions {
    readonly timeoutMs: number;
    readonly fetchImpl?: FetchLike;
}

// ============================================================================
// Abstract Base Class
// ============================================================================

export abstract class ExecutionTarget {
    abstract readonly target: TargetName;

    protected readonly timeoutMs: number;
    protected readonly fetchImpl: FetchLike;

    constructor(options: ExecutionTargetOptions) {
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetchImpl ?? defaultFetch;
    }

    /**
     * Send the order downstream.
     * Resolves on acceptance; throws ExecutionTargetError otherwise.
     */
    abstract submit(order: RoutedOrder): Promise<TargetSubmission>;

    /**
     * fetch and read the response, bounded by this target's timeout.
     */
    protected request<T>(url: string, options: RequestInit, read: (response: Response) => Promise<T>): Promise<T> {
        return fetchWithTimeout(this.fetchImpl, this.target, url, options, this.timeoutMs, read);
    }
}
