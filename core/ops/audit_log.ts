/**
 * Audit log: append-only JSONL of AuditRecords.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { AuditRecord } from "../events/audit_record.js";
import { readJSONL } from "./readers/JSONLReader.js";

export interface AuditSink {
    /** Never rejects: write failures are logged. */
    append(record: AuditRecord): Promise<void>;
}

export interface AuditQuery {
    /** YYYY-MM-DD local trading date */
    readonly localDate?: string;
    /** Most recent N records */
    readonly limit?: number;
}

// Loose shape check for read-back; records were written by this process
const AuditLineSchema = z
    .object({
        event_type: z.literal("SIGNAL_PROCESSED"),
        order_id: z.string(),
        status: z.string(),
        local_date: z.string(),
    })
    .passthrough();

export type AuditLine = z.infer<typeof AuditLineSchema>;

export class JsonlAuditLog implements AuditSink {
    readonly #filePath: string;
    #writes: Promise<void> = Promise.resolve();

    constructor(filePath: string) {
        this.#filePath = filePath;
    }

    get filePath(): string {
        return this.#filePath;
    }

    async init(): Promise<void> {
        await fs.mkdir(path.dirname(this.#filePath), { recursive: true });
    }

    append(record: AuditRecord): Promise<void> {
        this.#writes = this.#writes.then(async () => {
            try {
                await fs.appendFile(this.#filePath, JSON.stringify(record) + "\n", "utf-8");
            } catch (error) {
                console.error(
                    `[AUDIT] append failed order_id=${record.order_id}: ` +
                    `${error instanceof Error ? error.message : String(error)}`
                );
            }
        });
        return this.#writes;
    }

    async read(query: AuditQuery = {}): Promise<AuditLine[]> {
        await this.#writes;
        return readJSONL(this.#filePath, {
            parse: (line) => {
                const parsed = AuditLineSchema.safeParse(line);
                return parsed.success ? parsed.data : null;
            },
            filter: query.localDate ? (line) => line.local_date === query.localDate : undefined,
            tail: query.limit,
        });
    }
}
