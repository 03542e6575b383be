/**
 * Execution Target Credentials
 *
 * Credentials come from the environment only, never from files.
 * Loaders return null when a target is not configured.
 */

export type OandaEnvironment = "practice" | "live";

export interface OandaCredentials {
    readonly token: string;
    readonly accountId: string;
    readonly environment: OandaEnvironment;
}

export type RelayAuthStyle = "headers" | "token" | "bearer" | "basic";

export interface RelayCredentials {
    /** Base URL without trailing slash */
    readonly baseUrl: string;
    readonly user: string;
    readonly token: string;
    readonly authStyle: RelayAuthStyle;
    readonly ordersPath: string;
}

export interface OandaSettings {
    readonly token?: string;
    readonly accountId?: string;
    readonly environment: OandaEnvironment;
}

export interface RelaySettings {
    readonly baseUrl?: string;
    readonly user?: string;
    readonly token?: string;
    readonly authStyle: RelayAuthStyle;
    readonly ordersPath: string;
}

export function loadOandaCredentials(settings: OandaSettings): OandaCredentials | null {
    if (!settings.token || !settings.accountId) {
        return null;
    }
    return {
        token: settings.token,
        accountId: settings.accountId,
        environment: settings.environment
    };
}

export function loadRelayCredentials(settings: RelaySettings): RelayCredentials | null {
    const baseUrl = (settings.baseUrl ?? "").trim().replace(/\/+$/, "");
    if (!baseUrl) {
        return null;
    }
    const ordersPath = settings.ordersPath.startsWith("/") ? settings.ordersPath : `/${settings.ordersPath}`;
    return {
        baseUrl,
        user: settings.user ?? "",
        token: settings.token ?? "",
        authStyle: settings.authStyle,
        ordersPath
    };
}

/**
 * Mask a secret for logging (shows only first/last 4 chars).
 */
export function maskSecret(value: string | undefined | null): string | null {
    if (!value) {
        return null;
    }
    return value.length > 8 ? `${value.slice(0, 4)}...${value.slice(-4)}` : "***";
}
