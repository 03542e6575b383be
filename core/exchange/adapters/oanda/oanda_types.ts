/**
 * OANDA v20 REST Type Definitions
 *
 * Practice: https://api-fxpractice.oanda.com
 * Live:     https://api-fxtrade.oanda.com
 */

import { z } from "zod";

export const OANDA_PRACTICE_BASE = "https://api-fxpractice.oanda.com";
export const OANDA_LIVE_BASE = "https://api-fxtrade.oanda.com";

// ============================================================================
// Requests
// ============================================================================

export interface OandaMarketOrderRequest {
    readonly order: {
        readonly instrument: string;
        /** Signed: negative = sell */
        readonly units: string;
        readonly type: "MARKET";
        readonly positionFill: "DEFAULT";
        readonly clientExtensions?: {
            readonly comment?: string;
            readonly tag?: string;
        };
    };
}

// ============================================================================
// Responses (validated at the boundary)
// ============================================================================

const TransactionSchema = z
    .object({
        id: z.string().optional(),
        type: z.string().optional(),
        reason: z.string().optional(),
    })
    .passthrough();

export const OandaOrderResponseSchema = z
    .object({
        orderCreateTransaction: TransactionSchema.optional(),
        orderFillTransaction: TransactionSchema.optional(),
        orderCancelTransaction: TransactionSchema.optional(),
        lastTransactionID: z.string().optional(),
    })
    .passthrough();

export type OandaOrderResponse = z.infer<typeof OandaOrderResponseSchema>;

export const OandaErrorSchema = z
    .object({
        errorMessage: z.string().optional(),
        errorCode: z.string().optional(),
        orderRejectTransaction: TransactionSchema.optional(),
    })
    .passthrough();

/** OANDA encodes decimals as strings */
const DecimalString = z.union([z.string(), z.number()]).pipe(z.coerce.number().finite());

export const OandaAccountSummarySchema = z.object({
    account: z
        .object({
            NAV: DecimalString.optional(),
            balance: DecimalString.optional(),
            currency: z.string().optional(),
        })
        .passthrough(),
});

export const OandaOpenTradesSchema = z.object({
    trades: z.array(
        z
            .object({
                id: z.string(),
                instrument: z.string(),
                currentUnits: z.string().optional(),
            })
            .passthrough()
    ),
});
