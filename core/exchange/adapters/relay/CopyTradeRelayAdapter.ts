/**
 * Copy-Trade Relay Adapter
 *
 * Forwards the sized master order to a trade-copying service.
 * Auth styles:
 * - headers / token: X-Auth-Username + X-Auth-Token
 * - bearer:          Authorization: Bearer <token>
 * - basic:           Authorization: Basic base64(user:token)
 */

import { randomBytes } from "node:crypto";
import {
    ExecutionTarget,
    type ExecutionTargetOptions,
    type RoutedOrder,
    type TargetSubmission
} from "../base/ExecutionTarget.js";
import type { RelayCredentials } from "../base/TargetCredentials.js";
import { ExecutionTargetError, errorCodeForStatus } from "../base/ExecutionTargetError.js";
import {
    DEFAULT_RELAY_MASTER_SOURCE,
    DEFAULT_RELAY_TAG,
    MAX_RELAY_MESSAGE_LENGTH,
    type RelayOrderPayload
} from "./relay_types.js";

export interface CopyTradeRelayOptions extends ExecutionTargetOptions {
    readonly masterSource?: string;
    readonly tag?: string;
    readonly now?: () => Date;
    readonly clientIdSuffix?: () => string;
}

export function relayAuthHeaders(credentials: RelayCredentials): Record<string, string> {
    switch (credentials.authStyle) {
        case "bearer":
            return { "Authorization": `Bearer ${credentials.token}` };
        case "basic":
            return {
                "Authorization": `Basic ${Buffer.from(`${credentials.user}:${credentials.token}`).toString("base64")}`
            };
        case "headers":
        case "token":
            return { "X-Auth-Username": credentials.user, "X-Auth-Token": credentials.token };
    }
}

export class CopyTradeRelayAdapter extends ExecutionTarget {
    readonly target = "relay";

    readonly #credentials: RelayCredentials;
    readonly #masterSource: string;
    readonly #tag: string;
    readonly #now: () => Date;
    readonly #clientIdSuffix: () => string;

    constructor(credentials: RelayCredentials, options: CopyTradeRelayOptions) {
        super(options);
        this.#credentials = credentials;
        this.#masterSource = options.masterSource ?? DEFAULT_RELAY_MASTER_SOURCE;
        this.#tag = options.tag ?? DEFAULT_RELAY_TAG;
        this.#now = options.now ?? (() => new Date());
        this.#clientIdSuffix = options.clientIdSuffix ?? (() => randomBytes(4).toString("hex"));
    }

    buildPayload(order: RoutedOrder): RelayOrderPayload {
        return {
            source: this.#masterSource,
            symbol: order.instrument,
            side: order.side,
            orderType: "MARKET",
            units: order.units,
            entryPrice: order.entryPrice,
            slPrice: order.slPrice,
            tpPrice: order.tpPrice,
            clientOrderId: `${this.#tag}-${this.#clientIdSuffix()}`,
            comment: `TV->${this.#masterSource} ${this.#now().toISOString()}`
        };
    }

    async submit(order: RoutedOrder): Promise<TargetSubmission> {
        const payload = this.buildPayload(order);
        const url = `${this.#credentials.baseUrl}${this.#credentials.ordersPath}`;

        const { status, ok, text } = await this.request(
            url,
            {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    ...relayAuthHeaders(this.#credentials)
                },
                body: JSON.stringify(payload)
            },
            async (response) => ({
                status: response.status,
                ok: response.ok,
                text: (await response.text()).slice(0, MAX_RELAY_MESSAGE_LENGTH)
            })
        );

        if (!ok) {
            throw new ExecutionTargetError({
                code: errorCodeForStatus(status),
                message: text || `HTTP ${status}`,
                target: this.target,
                statusCode: status,
                originalMessage: text,
                timestamp: Date.now()
            });
        }

        return {
            statusCode: status,
            message: text || "Relay accepted order",
            reference: payload.clientOrderId
        };
    }
}
