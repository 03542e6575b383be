import type { InstrumentMeta } from "./instrument_meta.js";

const SEPARATORS = /[\s:./]/g;

/**
 * Normalize a client ticker: uppercase, separators stripped.
 * "oanda:eurusd" -> "OANDAEURUSD", "US30.cash" -> "US30CASH"
 */
export function normalizeToken(raw: string): string {
    return raw.toUpperCase().replace(SEPARATORS, "");
}

/**
 * SymbolResolver
 * Maps arbitrary incoming tickers onto canonical instrument ids.
 * Unknown tokens pass through normalized; the allow-list decides admission.
 */
export class SymbolResolver {
    readonly #aliases: ReadonlyMap<string, string>;
    readonly #meta: ReadonlyMap<string, InstrumentMeta>;

    constructor(instruments: readonly InstrumentMeta[]) {
        const aliases = new Map<string, string>();
        const meta = new Map<string, InstrumentMeta>();

        for (const instrument of instruments) {
            meta.set(instrument.id, instrument);
            aliases.set(normalizeToken(instrument.id), instrument.id);
            for (const alias of instrument.aliases) {
                aliases.set(normalizeToken(alias), instrument.id);
            }
        }

        this.#aliases = aliases;
        this.#meta = meta;
    }

    resolve(rawToken: string): string {
        const token = normalizeToken(rawToken);
        return this.#aliases.get(token) ?? token;
    }

    meta(canonicalId: string): InstrumentMeta | undefined {
        return this.#meta.get(canonicalId);
    }

    isKnown(canonicalId: string): boolean {
        return this.#meta.has(canonicalId);
    }

    instruments(): InstrumentMeta[] {
        return Array.from(this.#meta.values());
    }
}
