/**
 * Notifier: Discord-compatible webhook embeds.
 *
 * Fire-and-forget: notify() never blocks or throws. Pending sends are
 * tracked so shutdown can drain them.
 */

import { defaultFetch, fetchWithTimeout, type FetchLike } from "../exchange/adapters/base/http.js";

export const NotifyColor = {
    OK: 0x2ecc71,
    PARTIAL: 0xf39c12,
    ERROR: 0xe74c3c,
    BLOCKED: 0xe67e22,
    DISABLED: 0xf1c40f,
    INFO: 0x3498db,
} as const;

export type NotifyFields = Readonly<Record<string, string | number | boolean | null | undefined>>;

export interface Notifier {
    notify(title: string, fields: NotifyFields, color?: number): void;
    /** Resolves once every pending send has settled */
    drain(): Promise<void>;
}

export interface DiscordEmbed {
    readonly title: string;
    readonly color: number;
    readonly fields: ReadonlyArray<{ name: string; value: string; inline: boolean }>;
    readonly timestamp: string;
}

export function buildEmbed(title: string, fields: NotifyFields, color: number, at: Date = new Date()): DiscordEmbed {
    return {
        title,
        color,
        fields: Object.entries(fields)
            .filter(([, value]) => value !== undefined)
            .map(([name, value]) => ({ name, value: String(value), inline: true })),
        timestamp: at.toISOString(),
    };
}

export interface DiscordNotifierOptions {
    /** Unset = notifications disabled */
    readonly webhookUrl?: string;
    readonly timeoutMs?: number;
    readonly fetchImpl?: FetchLike;
}

export class DiscordNotifier implements Notifier {
    readonly #webhookUrl?: string;
    readonly #timeoutMs: number;
    readonly #fetch: FetchLike;
    readonly #pending: Set<Promise<void>>;

    constructor(options: DiscordNotifierOptions = {}) {
        this.#webhookUrl = options.webhookUrl;
        this.#timeoutMs = options.timeoutMs ?? 8000;
        this.#fetch = options.fetchImpl ?? defaultFetch;
        this.#pending = new Set();
    }

    get enabled(): boolean {
        return Boolean(this.#webhookUrl);
    }

    get pendingCount(): number {
        return this.#pending.size;
    }

    notify(title: string, fields: NotifyFields, color: number = NotifyColor.OK): void {
        const url = this.#webhookUrl;
        if (!url) {
            return;
        }

        const send = this.send(url, buildEmbed(title, fields, color))
            .catch((error: unknown) => {
                console.warn(`[NOTIFY] "${title}" failed: ${error instanceof Error ? error.message : String(error)}`);
            })
            .finally(() => {
                this.#pending.delete(send);
            });
        this.#pending.add(send);
    }

    async drain(): Promise<void> {
        while (this.#pending.size > 0) {
            await Promise.allSettled([...this.#pending]);
        }
    }

    private async send(url: string, embed: DiscordEmbed): Promise<void> {
        const response = await fetchWithTimeout(
            this.#fetch,
            "notify",
            url,
            {
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body: JSON.stringify({ embeds: [embed] }),
            },
            this.#timeoutMs,
            async (res) => {
                await res.text();
                return res;
            }
        );
        if (!response.ok) {
            throw new Error(`HTTP ${response.status}`);
        }
    }
}
