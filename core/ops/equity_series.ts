/**
 * Equity Series
 *
 * Append-only balance samples (JSONL), indexed by local trading date.
 * Feeds the daily loss stop: the first sample of a local date is that
 * day's baseline. Samples from earlier dates are never reused.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { readJSONL } from "./readers/JSONLReader.js";

export interface EquitySample {
    /** Unix ms */
    readonly ts: number;
    /** YYYY-MM-DD in the trading time zone */
    readonly local_date: string;
    readonly balance: number;
}

export const EquitySampleSchema = z.object({
    ts: z.number(),
    local_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    balance: z.number().positive(),
});

export function parseEquitySample(line: unknown): EquitySample | null {
    const parsed = EquitySampleSchema.safeParse(line);
    return parsed.success ? parsed.data : null;
}

export class EquitySeries {
    readonly #filePath: string | null;
    readonly #now: () => number;
    readonly #firstByDate: Map<string, EquitySample>;

    #latest?: EquitySample;
    #writes: Promise<void> = Promise.resolve();

    /**
     * @param filePath JSONL file, or null for an in-memory series
     */
    constructor(filePath: string | null, now: () => number = Date.now) {
        this.#filePath = filePath;
        this.#now = now;
        this.#firstByDate = new Map();
    }

    /**
     * Create the data directory and load existing samples.
     */
    async init(): Promise<void> {
        if (!this.#filePath) {
            return;
        }
        await fs.mkdir(path.dirname(this.#filePath), { recursive: true });
        const samples = await readJSONL(this.#filePath, { parse: parseEquitySample });
        for (const sample of samples) {
            this.index(sample);
        }
    }

    firstForDate(localDate: string): EquitySample | undefined {
        return this.#firstByDate.get(localDate);
    }

    latest(): EquitySample | undefined {
        return this.#latest;
    }

    /**
     * Start-of-day balance for a local date.
     * A healthy balance is recorded when the date has no sample yet or the
     * balance moved since the last sample; degraded balances are never recorded.
     */
    async observe(balance: number, degraded: boolean, localDate: string): Promise<number | null> {
        if (!degraded && balance > 0) {
            const latest = this.#latest;
            if (!this.#firstByDate.has(localDate) || !latest || latest.balance !== balance) {
                await this.record(balance, localDate);
            }
        }
        return this.#firstByDate.get(localDate)?.balance ?? null;
    }

    async record(balance: number, localDate: string): Promise<EquitySample> {
        const sample: EquitySample = Object.freeze({ ts: this.#now(), local_date: localDate, balance });
        this.index(sample);
        await this.append(sample);
        return sample;
    }

    /**
     * Read samples back from disk, optionally for one local date.
     */
    async read(localDate?: string): Promise<EquitySample[]> {
        if (!this.#filePath) {
            return [];
        }
        await this.#writes;
        return readJSONL(this.#filePath, {
            parse: parseEquitySample,
            filter: localDate ? (sample) => sample.local_date === localDate : undefined,
        });
    }

    /**
     * Wait for queued appends.
     */
    async flush(): Promise<void> {
        await this.#writes;
    }

    private index(sample: EquitySample): void {
        if (!this.#firstByDate.has(sample.local_date)) {
            this.#firstByDate.set(sample.local_date, sample);
        }
        this.#latest = sample;
    }

    private append(sample: EquitySample): Promise<void> {
        const filePath = this.#filePath;
        if (!filePath) {
            return Promise.resolve();
        }
        // Appends are chained so lines never interleave
        this.#writes = this.#writes.then(async () => {
            try {
                await fs.appendFile(filePath, JSON.stringify(sample) + "\n", "utf-8");
            } catch (error) {
                console.error(`[EQUITY] append failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        });
        return this.#writes;
    }
}
