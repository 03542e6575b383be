/**
 * Webhook payload -> Signal.
 *
 * Accepts { action | signal, symbol, price, order_id?, sl?, sl_type?, tp?, tp_type?, risk_pct? }.
 * Numeric fields may be numbers or numeric strings. The side comes from
 * whichever of action/signal contains BUY or SELL ("BUY_SIGNAL" works).
 */

import { randomBytes } from "node:crypto";
import { z } from "zod";
import { normalizeUnitKind } from "../symbols/unit_converter.js";
import { DEFAULT_RISK_PCT, type Distance, type Side, type Signal } from "./signal_contract.js";

export class MalformedSignalError extends Error {
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super(`Malformed signal: ${issues.join("; ")}`);
        this.name = "MalformedSignalError";
        this.issues = issues;
    }
}

const finiteNumber = z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number({ invalid_type_error: "Expected a number" }).finite());

const optionalNumber = finiteNumber.nullish();

const SignalPayloadSchema = z
    .object({
        action: z.string().nullish(),
        signal: z.string().nullish(),
        symbol: z.string().trim().min(1, "Missing symbol"),
        price: finiteNumber.refine((v) => v > 0, "Price must be positive"),
        order_id: z.union([z.string(), z.number()]).nullish(),
        sl: optionalNumber.refine((v) => v == null || v >= 0, "Stop distance must not be negative"),
        sl_type: z.string().nullish(),
        tp: optionalNumber.refine((v) => v == null || v >= 0, "Target distance must not be negative"),
        tp_type: z.string().nullish(),
        risk_pct: optionalNumber,
    })
    .passthrough();

export function sideFrom(action: string | null | undefined, signal: string | null | undefined): Side | null {
    const text = (action || signal || "").toUpperCase();
    if (text.includes("BUY")) return "BUY";
    if (text.includes("SELL")) return "SELL";
    return null;
}

export function generateOrderId(): string {
    return `tv-${randomBytes(4).toString("hex")}`;
}

function distance(quantity: number | null | undefined, unit: string | null | undefined): Distance | null {
    if (quantity === null || quantity === undefined) {
        return null;
    }
    return { quantity, unit: normalizeUnitKind(unit) };
}

export interface ParseSignalOptions {
    readonly generateId?: () => string;
}

/**
 * @throws MalformedSignalError
 */
export function parseSignal(payload: unknown, options: ParseSignalOptions = {}): Signal {
    const parsed = SignalPayloadSchema.safeParse(payload);
    if (!parsed.success) {
        throw new MalformedSignalError(
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        );
    }
    const data = parsed.data;

    const side = sideFrom(data.action, data.signal);
    if (!side) {
        throw new MalformedSignalError(["action: Missing side (expected BUY or SELL)"]);
    }

    const clientId = data.order_id === null || data.order_id === undefined ? "" : String(data.order_id).trim();
    const generateId = options.generateId ?? generateOrderId;

    return Object.freeze({
        side,
        tv_symbol: data.symbol.toUpperCase(),
        price: data.price,
        order_id: clientId || generateId(),
        order_id_generated: !clientId,
        sl: distance(data.sl, data.sl_type),
        tp: distance(data.tp, data.tp_type),
        risk_pct: data.risk_pct ?? DEFAULT_RISK_PCT,
    });
}

export const DRY_RUN_DEFAULTS = Object.freeze({
    symbol: "US30",
    price: 39250,
    sl: 150,
    sl_type: "points",
    tp: 300,
    tp_type: "points",
    risk_pct: DEFAULT_RISK_PCT,
});

/**
 * Dry-run payloads fall back to a reference index trade for any field left
 * out, null or empty.
 */
export function parseDryRunSignal(payload: unknown, options: ParseSignalOptions = {}): Signal {
    const supplied: Record<string, unknown> = {};
    if (payload !== null && typeof payload === "object" && !Array.isArray(payload)) {
        for (const [key, value] of Object.entries(payload)) {
            if (value !== null && value !== undefined && value !== "") {
                supplied[key] = value;
            }
        }
    }
    if (supplied.action === undefined && supplied.signal === undefined) {
        supplied.action = "BUY_SIGNAL";
    }
    return parseSignal({ ...DRY_RUN_DEFAULTS, ...supplied }, options);
}
