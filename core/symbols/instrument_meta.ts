/**
 * InstrumentMeta: reference data for every tradable instrument.
 * Loaded once at startup, never mutated at request time.
 */

import fs from "node:fs/promises";
import { z } from "zod";

export type InstrumentClass = "fx" | "metal" | "index" | "commodity" | "crypto";

export interface InstrumentMeta {
    /** Canonical broker identifier, e.g. "EUR_USD" */
    readonly id: string;

    readonly kind: InstrumentClass;

    /** Pip size (fx convention) */
    readonly pip?: number;

    /** Point size (index / metal convention) */
    readonly point?: number;

    /** Decimal places used when publishing stop/target prices */
    readonly precision?: number;

    /** Accepted client tokens, matched case/punctuation-insensitively */
    readonly aliases: readonly string[];
}

const instrumentSchema = z.object({
    id: z.string().min(1),
    kind: z.enum(["fx", "metal", "index", "commodity", "crypto"]),
    pip: z.number().positive().optional(),
    point: z.number().positive().optional(),
    precision: z.number().int().min(0).max(10).optional(),
    aliases: z.array(z.string().min(1)).default([]),
});

const catalogSchema = z.object({
    instruments: z.array(instrumentSchema).min(1),
});

/**
 * Parse an instrument catalog document.
 * Throws with the flattened validation issues when the document is invalid.
 */
export function parseInstrumentCatalog(document: unknown): InstrumentMeta[] {
    const parsed = catalogSchema.safeParse(document);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid instrument catalog: ${issues}`);
    }

    const seen = new Set<string>();
    for (const instrument of parsed.data.instruments) {
        if (seen.has(instrument.id)) {
            throw new Error(`Invalid instrument catalog: duplicate id ${instrument.id}`);
        }
        seen.add(instrument.id);
    }

    return parsed.data.instruments.map((instrument) => Object.freeze({
        ...instrument,
        aliases: Object.freeze([...instrument.aliases]),
    }));
}

export async function loadInstrumentCatalog(filePath: string): Promise<InstrumentMeta[]> {
    const content = await fs.readFile(filePath, "utf-8");
    return parseInstrumentCatalog(JSON.parse(content));
}
