/**
 * In-process stand-ins for tests: fetch, execution targets, sinks.
 */

import type { AuditRecord } from "../events/audit_record.js";
import type { TargetName } from "../events/target_outcome.js";
import {
    ExecutionTarget,
    type RoutedOrder,
    type TargetSubmission
} from "../exchange/adapters/base/ExecutionTarget.js";
import type { FetchLike } from "../exchange/adapters/base/http.js";
import type { AuditSink } from "../ops/audit_log.js";
import type { Notifier, NotifyFields } from "../ops/notifier.js";
import type { BalanceSource } from "../oracles/balance_oracle.js";
import type { PositionSource } from "../oracles/position_census.js";

export interface RecordedRequest {
    readonly url: string;
    readonly method: string;
    /** Lower-cased header names */
    readonly headers: Record<string, string>;
    readonly body: string | null;
}

export function recordingFetch(
    respond: (request: RecordedRequest) => Response | Promise<Response>
): { fetchImpl: FetchLike; requests: RecordedRequest[] } {
    const requests: RecordedRequest[] = [];
    const fetchImpl: FetchLike = async (url, init) => {
        const request: RecordedRequest = {
            url,
            method: init?.method ?? "GET",
            headers: Object.fromEntries(new Headers(init?.headers).entries()),
            body: typeof init?.body === "string" ? init.body : null,
        };
        requests.push(request);
        return respond(request);
    };
    return { fetchImpl, requests };
}

export function jsonResponse(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { "Content-Type": "application/json" },
    });
}

export class FakeTarget extends ExecutionTarget {
    readonly target: TargetName;
    readonly orders: RoutedOrder[] = [];
    #result: TargetSubmission | Error;

    constructor(target: TargetName, result: TargetSubmission | Error = { statusCode: 201, message: "accepted" }) {
        super({ timeoutMs: 1000 });
        this.target = target;
        this.#result = result;
    }

    respondWith(result: TargetSubmission | Error): void {
        this.#result = result;
    }

    async submit(order: RoutedOrder): Promise<TargetSubmission> {
        this.orders.push(order);
        if (this.#result instanceof Error) {
            throw this.#result;
        }
        return this.#result;
    }
}

export class MemoryAuditSink implements AuditSink {
    readonly records: AuditRecord[] = [];

    async append(record: AuditRecord): Promise<void> {
        this.records.push(record);
    }
}

export interface SentNotification {
    readonly title: string;
    readonly fields: NotifyFields;
    readonly color?: number;
}

export class RecordingNotifier implements Notifier {
    readonly sent: SentNotification[] = [];

    notify(title: string, fields: NotifyFields, color?: number): void {
        this.sent.push({ title, fields, color });
    }

    async drain(): Promise<void> {
        return;
    }
}

export class FixedBalance implements BalanceSource {
    calls = 0;

    constructor(public value: number | Error) {}

    async fetchBalance(): Promise<number> {
        this.calls++;
        if (this.value instanceof Error) {
            throw this.value;
        }
        return this.value;
    }
}

export class FixedPositions implements PositionSource {
    calls = 0;

    constructor(public instruments: readonly string[] = []) {}

    async fetchOpenTrades(): Promise<readonly string[]> {
        this.calls++;
        return this.instruments;
    }
}
