/**
 * Execution Target Error Taxonomy
 *
 * Standardized error codes for downstream execution calls.
 * Every adapter maps target-specific failures onto these codes.
 */

export enum ExecutionTargetErrorCode {
    // Authentication errors
    AUTH_FAILED = "AUTH_FAILED",

    // Rate limiting
    RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",

    // Order errors
    ORDER_REJECTED = "ORDER_REJECTED",
    INSUFFICIENT_MARGIN = "INSUFFICIENT_MARGIN",
    INSTRUMENT_NOT_FOUND = "INSTRUMENT_NOT_FOUND",

    // Configuration
    NOT_CONFIGURED = "NOT_CONFIGURED",

    // Network errors
    NETWORK_ERROR = "NETWORK_ERROR",
    TIMEOUT = "TIMEOUT",
    CONNECTION_REFUSED = "CONNECTION_REFUSED",

    // Server errors
    SERVER_ERROR = "SERVER_ERROR",
    SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
    BAD_RESPONSE = "BAD_RESPONSE",

    // Unknown
    UNKNOWN = "UNKNOWN"
}

export interface ExecutionTargetErrorDetail {
    readonly code: ExecutionTargetErrorCode;
    readonly message: string;
    readonly target: string;
    /** HTTP status reported downstream, or a synthetic one for transport failures */
    readonly statusCode: number;
    readonly originalCode?: string | number;
    readonly originalMessage?: string;
    readonly timestamp: number;
}

export class ExecutionTargetError extends Error {
    readonly code: ExecutionTargetErrorCode;
    readonly target: string;
    readonly statusCode: number;
    readonly originalCode?: string | number;
    readonly originalMessage?: string;
    readonly timestamp: number;

    constructor(detail: ExecutionTargetErrorDetail) {
        super(detail.message);
        this.name = "ExecutionTargetError";
        this.code = detail.code;
        this.target = detail.target;
        this.statusCode = detail.statusCode;
        this.originalCode = detail.originalCode;
        this.originalMessage = detail.originalMessage;
        this.timestamp = detail.timestamp;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, ExecutionTargetError);
        }
    }

    toJSON(): ExecutionTargetErrorDetail {
        return {
            code: this.code,
            message: this.message,
            target: this.target,
            statusCode: this.statusCode,
            originalCode: this.originalCode,
            originalMessage: this.originalMessage,
            timestamp: this.timestamp
        };
    }
}

export function errorCodeForStatus(status: number): ExecutionTargetErrorCode {
    if (status === 401 || status === 403) return ExecutionTargetErrorCode.AUTH_FAILED;
    if (status === 429) return ExecutionTargetErrorCode.RATE_LIMIT_EXCEEDED;
    if (status === 404) return ExecutionTargetErrorCode.INSTRUMENT_NOT_FOUND;
    if (status === 503) return ExecutionTargetErrorCode.SERVICE_UNAVAILABLE;
    if (status >= 500) return ExecutionTargetErrorCode.SERVER_ERROR;
    if (status >= 400) return ExecutionTargetErrorCode.ORDER_REJECTED;
    return ExecutionTargetErrorCode.UNKNOWN;
}

/**
 * Create a standardized ExecutionTargetError from any error.
 * Transport failures carry status 500.
 */
export function createExecutionTargetError(
    target: string,
    error: unknown,
    defaultCode: ExecutionTargetErrorCode = ExecutionTargetErrorCode.UNKNOWN
): ExecutionTargetError {
    const now = Date.now();

    if (error instanceof ExecutionTargetError) {
        return error;
    }

    if (error instanceof Error) {
        const cause = error.cause instanceof Error ? error.cause.message : "";
        const text = `${error.message} ${cause}`;

        if (text.includes("ECONNREFUSED")) {
            return new ExecutionTargetError({
                code: ExecutionTargetErrorCode.CONNECTION_REFUSED,
                message: `Connection refused to ${target}`,
                target,
                statusCode: 500,
                originalMessage: error.message,
                timestamp: now
            });
        }

        if (error.name === "AbortError" || text.includes("ETIMEDOUT") || text.includes("timeout")) {
            return new ExecutionTargetError({
                code: ExecutionTargetErrorCode.TIMEOUT,
                message: `Request timeout to ${target}`,
                target,
                statusCode: 500,
                originalMessage: error.message,
                timestamp: now
            });
        }

        if (error.name === "TypeError" && error.message === "fetch failed") {
            return new ExecutionTargetError({
                code: ExecutionTargetErrorCode.NETWORK_ERROR,
                message: cause ? `Network error to ${target}: ${cause}` : `Network error to ${target}`,
                target,
                statusCode: 500,
                originalMessage: error.message,
                timestamp: now
            });
        }

        return new ExecutionTargetError({
            code: defaultCode,
            message: error.message,
            target,
            statusCode: 500,
            originalMessage: error.message,
            timestamp: now
        });
    }

    return new ExecutionTargetError({
        code: defaultCode,
        message: String(error),
        target,
        statusCode: 500,
        timestamp: now
    });
}
