/**
 * Cached Value
 *
 * TTL cache around one async loader with a fallback value.
 * - Concurrent refreshes share a single in-flight load
 * - Failures are not cached: the next read retries upstream
 * - A failed read returns the fallback with degraded=true
 */

export interface CachedReading<T> {
    readonly value: T;
    readonly degraded: boolean;
    readonly fetchedAt: number;
    readonly error?: string;
}

export interface CachedValueOptions<T> {
    readonly ttlMs: number;
    readonly fallback: T;
    readonly now?: () => number;
}

export class CachedValue<T> {
    readonly #loader: () => Promise<T>;
    readonly #ttlMs: number;
    readonly #fallback: T;
    readonly #now: () => number;

    #cached?: CachedReading<T>;
    #inflight?: Promise<CachedReading<T>>;

    constructor(loader: () => Promise<T>, options: CachedValueOptions<T>) {
        this.#loader = loader;
        this.#ttlMs = options.ttlMs;
        this.#fallback = options.fallback;
        this.#now = options.now ?? Date.now;
    }

    async get(): Promise<CachedReading<T>> {
        const cached = this.#cached;
        if (cached && this.#now() - cached.fetchedAt < this.#ttlMs) {
            return cached;
        }

        if (!this.#inflight) {
            this.#inflight = this.refresh().finally(() => {
                this.#inflight = undefined;
            });
        }
        return this.#inflight;
    }

    /**
     * Drop the cached reading so the next get() goes upstream.
     */
    invalidate(): void {
        this.#cached = undefined;
    }

    private async refresh(): Promise<CachedReading<T>> {
        try {
            const value = await this.#loader();
            const reading: CachedReading<T> = { value, degraded: false, fetchedAt: this.#now() };
            this.#cached = reading;
            return reading;
        } catch (error) {
            return {
                value: this.#fallback,
                degraded: true,
                fetchedAt: this.#now(),
                error: error instanceof Error ? error.message : String(error),
            };
        }
    }
}
