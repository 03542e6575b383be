import fs from "node:fs";
import readline from "node:readline";

export interface JSONLOptions<T> {
    /** Validates one parsed line; return null to skip it */
    parse: (line: unknown) => T | null;
    filter?: (item: T) => boolean;
    /** Keep only the last N matches */
    tail?: number;
}

export async function readJSONL<T>(filePath: string, options: JSONLOptions<T>): Promise<T[]> {
    if (!fs.existsSync(filePath)) {
        return [];
    }

    const results: T[] = [];
    const fileStream = fs.createReadStream(filePath);
    const rl = readline.createInterface({
        input: fileStream,
        crlfDelay: Infinity
    });

    let skipped = 0;
    for await (const line of rl) {
        if (!line.trim()) continue;

        let raw: unknown;
        try {
            raw = JSON.parse(line);
        } catch {
            skipped++;
            continue;
        }

        const item = options.parse(raw);
        if (item === null) {
            skipped++;
            continue;
        }
        if (!options.filter || options.filter(item)) {
            results.push(item);
            if (options.tail && results.length > options.tail) {
                results.shift();
            }
        }
    }

    if (skipped > 0) {
        console.warn(`[JSONL] ${filePath}: skipped ${skipped} invalid line(s)`);
    }

    return results;
}
