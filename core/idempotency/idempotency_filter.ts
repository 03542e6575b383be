/**
 * Idempotency Filter
 *
 * Remembers client order ids for a trailing window and reports repeats.
 * Entries are purged lazily on every lookup. State is process-local and
 * does not survive a restart.
 */

export const DEFAULT_IDEMPOTENCY_TTL_MS = 90_000;

export type Clock = () => number;

export class IdempotencyFilter {
    readonly #ttlMs: number;
    readonly #now: Clock;
    readonly #firstSeen: Map<string, number>;

    constructor(ttlMs: number = DEFAULT_IDEMPOTENCY_TTL_MS, now: Clock = Date.now) {
        this.#ttlMs = ttlMs;
        this.#now = now;
        this.#firstSeen = new Map();
    }

    get ttlMs(): number {
        return this.#ttlMs;
    }

    /**
     * Check-and-insert. Returns true when the id was already seen inside the window.
     * Must stay synchronous: no await between the lookup and the insert.
     */
    seen(orderId: string | null | undefined): boolean {
        const now = this.#now();
        this.purge(now);

        if (!orderId) {
            return false;
        }
        if (this.#firstSeen.has(orderId)) {
            return true;
        }
        this.#firstSeen.set(orderId, now);
        return false;
    }

    size(): number {
        return this.#firstSeen.size;
    }

    clear(): void {
        this.#firstSeen.clear();
    }

    private purge(now: number): void {
        for (const [orderId, firstSeenAt] of this.#firstSeen) {
            if (now - firstSeenAt > this.#ttlMs) {
                this.#firstSeen.delete(orderId);
            }
        }
    }
}
