/**
 * UnitConverter: stop/target distances to price deltas.
 *
 * Unit kinds:
 * - price:  distance already expressed in price units
 * - pips:   distance x pip size (fx convention)
 * - points: distance x point size for index/metal, pip size otherwise
 *
 * Unrecognized unit kinds are treated as points. Never throws.
 */

import type { InstrumentMeta } from "./instrument_meta.js";
import type { SymbolResolver } from "./symbol_resolver.js";

export type UnitKind = "pips" | "points" | "price";

export const DEFAULT_PIP_SIZE = 0.0001;
export const DEFAULT_POINT_SIZE = 1.0;

export function normalizeUnitKind(raw: string | null | undefined): UnitKind {
    const unit = (raw ?? "").trim().toLowerCase();
    if (unit === "price" || unit === "pips") {
        return unit;
    }
    return "points";
}

export function priceDeltaFor(meta: InstrumentMeta | undefined, quantity: number, unitKind: string | null | undefined): number {
    const unit = normalizeUnitKind(unitKind);

    if (unit === "price") {
        return quantity;
    }

    const pip = meta?.pip ?? DEFAULT_PIP_SIZE;

    if (unit === "pips") {
        return quantity * pip;
    }

    if (meta && (meta.kind === "index" || meta.kind === "metal")) {
        return quantity * (meta.point ?? DEFAULT_POINT_SIZE);
    }

    return quantity * pip;
}

export class UnitConverter {
    readonly #resolver: SymbolResolver;

    constructor(resolver: SymbolResolver) {
        this.#resolver = resolver;
    }

    toPriceDelta(canonicalId: string, quantity: number, unitKind: string | null | undefined): number {
        return priceDeltaFor(this.#resolver.meta(canonicalId), quantity, unitKind);
    }
}

/**
 * Round a published price to the instrument precision, when one is declared.
 */
export function roundPrice(meta: InstrumentMeta | undefined, price: number): number {
    if (meta?.precision === undefined) {
        return price;
    }
    const factor = 10 ** meta.precision;
    return Math.round(price * factor) / factor;
}
