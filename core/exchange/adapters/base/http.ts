/**
 * Shared HTTP plumbing for outbound calls.
 */

import { ExecutionTargetError, ExecutionTargetErrorCode, createExecutionTargetError } from "./ExecutionTargetError.js";

/** Injectable fetch; tests pass an in-process stand-in. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (input, init) => fetch(input, init);

/**
 * fetch plus a read of the response, both bounded by one AbortController timeout.
 * The timer runs until `read` settles, so a stalled body times out like a stalled connect.
 * Timeouts and transport errors are thrown as ExecutionTargetError.
 */
export async function fetchWithTimeout<T>(
    fetchImpl: FetchLike,
    target: string,
    url: string,
    options: RequestInit,
    timeoutMs: number,
    read: (response: Response) => Promise<T>
): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const expired = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(timeoutError(target, timeoutMs));
        }, timeoutMs);
    });

    const exchange = async (): Promise<T> => {
        const response = await fetchImpl(url, {
            ...options,
            signal: controller.signal
        });
        return read(response);
    };

    try {
        return await Promise.race([exchange(), expired]);
    } catch (error) {
        if (error instanceof ExecutionTargetError) {
            throw error;
        }
        if (error instanceof Error && error.name === "AbortError") {
            throw timeoutError(target, timeoutMs);
        }
        throw createExecutionTargetError(target, error, ExecutionTargetErrorCode.NETWORK_ERROR);
    } finally {
        clearTimeout(timer);
    }
}

function timeoutError(target: string, timeoutMs: number): ExecutionTargetError {
    return new ExecutionTargetError({
        code: ExecutionTargetErrorCode.TIMEOUT,
        message: `Request timeout after ${timeoutMs}ms`,
        target,
        statusCode: 500,
        timestamp: Date.now()
    });
}

/**
 * Read a response body as JSON, or null when it is empty or not JSON.
 */
export async function readJsonBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (!text) {
        return null;
    }
    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch {
        return null;
    }
}
