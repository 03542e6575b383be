/**
 * OANDA v20 Adapter
 *
 * Broker execution target plus the account reads behind the balance
 * oracle (summary NAV) and the position census (open trades).
 */

import type { z } from "zod";
import {
    ExecutionTarget,
    type ExecutionTargetOptions,
    type RoutedOrder,
    type TargetSubmission
} from "../base/ExecutionTarget.js";
import type { OandaCredentials } from "../base/TargetCredentials.js";
import {
    ExecutionTargetError,
    ExecutionTargetErrorCode,
    errorCodeForStatus
} from "../base/ExecutionTargetError.js";
import { readJsonBody } from "../base/http.js";
import type { BalanceSource } from "../../../oracles/balance_oracle.js";
import type { PositionSource } from "../../../oracles/position_census.js";
import {
    OANDA_LIVE_BASE,
    OANDA_PRACTICE_BASE,
    OandaAccountSummarySchema,
    OandaErrorSchema,
    OandaOpenTradesSchema,
    OandaOrderResponseSchema,
    type OandaMarketOrderRequest
} from "./oanda_types.js";

export interface OandaAdapterOptions extends ExecutionTargetOptions {
    /** Overrides the environment's base URL */
    readonly baseUrl?: string;
}

export class OandaAdapter extends ExecutionTarget implements BalanceSource, PositionSource {
    readonly target = "broker";

    readonly #credentials: OandaCredentials;
    readonly #baseUrl: string;

    constructor(credentials: OandaCredentials, options: OandaAdapterOptions) {
        super(options);
        this.#credentials = credentials;
        this.#baseUrl = options.baseUrl
            ?? (credentials.environment === "live" ? OANDA_LIVE_BASE : OANDA_PRACTICE_BASE);
    }

    get environment(): string {
        return this.#credentials.environment;
    }

    // -------------------------------------------------------------------------
    // Order Operations
    // -------------------------------------------------------------------------

    async submit(order: RoutedOrder): Promise<TargetSubmission> {
        const body: OandaMarketOrderRequest = {
            order: {
                instrument: order.instrument,
                units: String(order.side === "BUY" ? order.units : -order.units),
                type: "MARKET",
                positionFill: "DEFAULT",
                clientExtensions: { comment: order.orderId }
            }
        };

        const { status, data } = await this.request(
            this.accountUrl("/orders"),
            { method: "POST", headers: this.headers(), body: JSON.stringify(body) },
            async (response) => ({
                status: response.status,
                data: await this.handleResponse(response, OandaOrderResponseSchema)
            })
        );

        // A 201 can still carry a cancellation (market halted, insufficient margin, ...)
        const cancel = data.orderCancelTransaction;
        if (cancel) {
            const reason = cancel.reason ?? "UNKNOWN";
            throw new ExecutionTargetError({
                code: reason.includes("MARGIN")
                    ? ExecutionTargetErrorCode.INSUFFICIENT_MARGIN
                    : ExecutionTargetErrorCode.ORDER_REJECTED,
                message: `OANDA order cancelled: ${reason}`,
                target: this.target,
                statusCode: status,
                originalCode: reason,
                timestamp: Date.now()
            });
        }

        const fill = data.orderFillTransaction;
        return {
            statusCode: status,
            message: fill ? "OANDA order filled" : "OANDA order placed",
            reference: fill?.id ?? data.orderCreateTransaction?.id ?? data.lastTransactionID
        };
    }

    // -------------------------------------------------------------------------
    // Account Operations
    // -------------------------------------------------------------------------

    async fetchBalance(): Promise<number> {
        const { account } = await this.request(
            this.accountUrl("/summary"),
            { method: "GET", headers: this.headers() },
            (response) => this.handleResponse(response, OandaAccountSummarySchema)
        );
        const balance = account.NAV ?? account.balance;
        if (balance === undefined) {
            throw new Error("Account summary has neither NAV nor balance");
        }
        return balance;
    }

    async fetchOpenTrades(): Promise<readonly string[]> {
        const { trades } = await this.request(
            this.accountUrl("/openTrades"),
            { method: "GET", headers: this.headers() },
            (response) => this.handleResponse(response, OandaOpenTradesSchema)
        );
        return trades.map((trade) => trade.instrument);
    }

    // -------------------------------------------------------------------------
    // Helpers
    // -------------------------------------------------------------------------

    private accountUrl(suffix: string): string {
        return `${this.#baseUrl}/v3/accounts/${encodeURIComponent(this.#credentials.accountId)}${suffix}`;
    }

    private headers(): Record<string, string> {
        return {
            "Authorization": `Bearer ${this.#credentials.token}`,
            "Content-Type": "application/json",
            "Accept-Datetime-Format": "RFC3339"
        };
    }

    private async handleResponse<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        const data = await readJsonBody(response);

        if (!response.ok) {
            const error = OandaErrorSchema.safeParse(data);
            const detail = error.success ? error.data : undefined;
            throw new ExecutionTargetError({
                code: errorCodeForStatus(response.status),
                message: detail?.errorMessage ?? `HTTP ${response.status}`,
                target: this.target,
                statusCode: response.status,
                originalCode: detail?.errorCode ?? detail?.orderRejectTransaction?.reason,
                originalMessage: detail?.errorMessage,
                timestamp: Date.now()
            });
        }

        const parsed = schema.safeParse(data);
        if (!parsed.success) {
            throw new ExecutionTargetError({
                code: ExecutionTargetErrorCode.BAD_RESPONSE,
                message: `Unexpected OANDA response: ${parsed.error.issues[0]?.message ?? "invalid body"}`,
                target: this.target,
                statusCode: response.status,
                timestamp: Date.now()
            });
        }
        return parsed.data;
    }
}
