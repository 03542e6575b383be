/**
 * Copy-trade relay wire format.
 * The relay fans the master order out to follower accounts and scales size itself.
 */

export interface RelayOrderPayload {
    /** Master account label */
    readonly source: string;
    readonly symbol: string;
    readonly side: "BUY" | "SELL";
    readonly orderType: "MARKET";
    /** Master size; followers are scaled downstream */
    readonly units: number;
    readonly entryPrice: number;
    readonly slPrice: number | null;
    readonly tpPrice: number | null;
    /** `${tag}-${8 hex}`, unique per forwarded order */
    readonly clientOrderId: string;
    readonly comment: string;
}

export const DEFAULT_RELAY_ORDERS_PATH = "/orders";
export const DEFAULT_RELAY_MASTER_SOURCE = "BROKER_MASTER";
export const DEFAULT_RELAY_TAG = "tv_v1";

/** Longest relay response body echoed into an outcome message */
export const MAX_RELAY_MESSAGE_LENGTH = 500;
