import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { ExecutionRouterConfig } from '../exchange/execution/ExecutionConfig.js';
import { maskSecret, type OandaSettings, type RelaySettings } from '../exchange/adapters/base/TargetCredentials.js';
import {
    DEFAULT_RELAY_MASTER_SOURCE,
    DEFAULT_RELAY_ORDERS_PATH,
    DEFAULT_RELAY_TAG
} from '../exchange/adapters/relay/relay_types.js';
import type { GuardPolicy } from '../execution/guard_context.js';
import { buildKillSwitch } from '../execution/kill_switch.js';
import { assertTimeZone } from '../execution/local_clock.js';
import { parseTradingWindow, type TradingWindow } from '../execution/rules/trading_window.js';
import type { RiskPolicy } from '../risk/risk_config.js';
import type { SymbolResolver } from '../symbols/symbol_resolver.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// core/gateway-api -> repo root
export const REPO_ROOT = path.resolve(__dirname, '../..');

/**
 * Load .env from the repo root (or the given path) into process.env.
 * Variables already set in the environment win.
 */
export function loadEnvFile(envPath: string = path.join(REPO_ROOT, '.env')): boolean {
    if (!fs.existsSync(envPath)) {
        console.log(`[CONFIG] No .env found at: ${envPath}`);
        return false;
    }
    dotenv.config({ path: envPath });
    console.log(`[CONFIG] Loaded .env from: ${envPath}`);
    return true;
}

// ============================================================================
// Environment schema
// ============================================================================

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

function blankToUndefined(value: unknown): unknown {
    return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const envNumber = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().finite().min(0).default(fallback));

const envInt = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(fallback));

const envFlag = (fallback: boolean) =>
    z.string().trim().toLowerCase().optional().transform((value, ctx) => {
        if (!value) return fallback;
        if (TRUE_VALUES.has(value)) return true;
        if (FALSE_VALUES.has(value)) return false;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${value}"` });
        return z.NEVER;
    });

const envString = (fallback: string) =>
    z.string().trim().optional().transform((value) => value || fallback);

const envSecret = z.string().trim().optional().transform((value) => value || undefined);

const envList = (fallback: string) =>
    z.string().optional().transform((value) =>
        (value === undefined ? fallback : value)
            .split(',')
            .map((token) => token.trim())
            .filter(Boolean)
    );

/**
 * Per-symbol numbers, as a JSON object ({"US30": 5}) or a list ("US30:5,NAS100:3").
 * Keys are raw tokens; they are resolved to canonical ids later.
 */
export function parseSymbolMap(raw: string): Record<string, number> {
    const text = raw.trim();
    if (!text) {
        return {};
    }

    const entries: Array<[string, unknown]> = [];
    if (text.startsWith('{')) {
        const parsed: unknown = JSON.parse(text);
        if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
            throw new Error('expected a JSON object');
        }
        entries.push(...Object.entries(parsed));
    } else {
        for (const pair of text.split(',')) {
            if (!pair.trim()) continue;
            const separator = pair.lastIndexOf(':');
            if (separator <= 0) {
                throw new Error(`expected SYMBOL:value, got "${pair.trim()}"`);
            }
            entries.push([pair.slice(0, separator).trim(), pair.slice(separator + 1).trim()]);
        }
    }

    const result: Record<string, number> = {};
    for (const [symbol, value] of entries) {
        const numeric = typeof value === 'number' ? value : Number(value);
        if (typeof value === 'boolean' || value === '' || !Number.isFinite(numeric) || numeric < 0) {
            throw new Error(`invalid value for ${symbol}`);
        }
        result[symbol] = numeric;
    }
    return result;
}

const envSymbolMap = z.string().optional().transform((value, ctx) => {
    try {
        return parseSymbolMap(value ?? '');
    } catch (error) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: error instanceof Error ? error.message : String(error)
        });
        return z.NEVER;
    }
});

const GatewayEnvSchema = z.object({
    GATEWAY_PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(8080)),
    GATEWAY_HOST: envString('0.0.0.0'),
    GATEWAY_TOKEN: envSecret,
    GATEWAY_RATE_LIMIT_PER_MIN: envInt(120),

    TRADING_ENABLED: envFlag(true),
    DRY_RUN: envFlag(true),
    SYMBOL_KILL: envList(''),
    KILL_REASON: envString(''),

    TRADING_TZ: envString('America/Halifax'),
    TRADING_WINDOW: envString(''),
    DAILY_LOSS_STOP_PCT: envNumber(0),

    MAX_RISK_PCT: envNumber(0.5),
    MAX_UNITS: envInt(300000),
    FALLBACK_BALANCE: envNumber(1000000),
    SYMBOL_ALLOWLIST: envList('US30,NAS100,XAUUSD,EURUSD'),
    SYMBOL_UNIT_CAPS: envSymbolMap,
    SYMBOL_RISK_CAPS: envSymbolMap,
    MIN_STOP_DISTANCE: envSymbolMap,
    MAX_OPEN_POSITIONS: envInt(0),
    MAX_OPEN_PER_INSTRUMENT: envInt(0),

    IDEMPOTENCY_TTL_SEC: envNumber(90),
    BALANCE_CACHE_TTL_MS: envInt(15000),
    POSITION_CACHE_TTL_MS: envInt(5000),

    OANDA_TOKEN: envSecret,
    OANDA_ACCOUNT_ID: envSecret,
    OANDA_ENV: z.preprocess(
        (value) => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
        z.enum(['practice', 'live']).default('practice')
    ),
    FORWARD_TO_BROKER: envFlag(true),
    BROKER_TIMEOUT_MS: envInt(10000),

    RELAY_BASE: envSecret,
    RELAY_USER: envSecret,
    RELAY_TOKEN: envSecret,
    RELAY_AUTH_STYLE: z.preprocess(
        (value) => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
        z.enum(['headers', 'token', 'bearer', 'basic']).default('headers')
    ),
    RELAY_ORDERS_PATH: envString(DEFAULT_RELAY_ORDERS_PATH),
    RELAY_MASTER_SOURCE: envString(DEFAULT_RELAY_MASTER_SOURCE),
    RELAY_TAG: envString(DEFAULT_RELAY_TAG),
    FORWARD_TO_RELAY: envFlag(true),
    RELAY_TIMEOUT_MS: envInt(12000),

    NOTIFY_WEBHOOK_URL: envSecret,
    NOTIFY_TIMEOUT_MS: envInt(8000),

    DATA_DIR: envString('data'),
    INSTRUMENTS_FILE: envString('config/instruments.json')
});

export type GatewayEnv = z.infer<typeof GatewayEnvSchema>;

/**
 * @throws Error listing every invalid variable
 */
export function parseGatewayEnv(env: NodeJS.ProcessEnv): GatewayEnv {
    const parsed = GatewayEnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid gateway environment: ${issues.join('; ')}`);
    }
    return parsed.data;
}

// ============================================================================
// Gateway config
// ============================================================================

export interface GatewayConfig {
    readonly server: {
        readonly port: number;
        readonly host: string;
        readonly token?: string;
        readonly rateLimitPerMin: number;
    };
    readonly timeZone: string;
    /** Raw TRADING_WINDOW value; guards.trading_window is null when it is empty or malformed */
    readonly tradingWindowRaw: string;
    readonly tradingWindowError: string | null;
    readonly guards: GuardPolicy;
    readonly risk: RiskPolicy;
    readonly routing: ExecutionRouterConfig;
    readonly fallbackBalance: number;
    readonly cache: {
        readonly balanceTtlMs: number;
        readonly positionTtlMs: number;
        readonly idempotencyTtlMs: number;
    };
    readonly oanda: OandaSettings & { readonly timeoutMs: number };
    readonly relay: RelaySettings & {
        readonly masterSource: string;
        readonly tag: string;
        readonly timeoutMs: number;
    };
    readonly notify: {
        readonly webhookUrl?: string;
        readonly timeoutMs: number;
    };
    readonly paths: {
        readonly dataDir: string;
        readonly instrumentsFile: string;
        readonly tradesFile: string;
        readonly equityFile: string;
    };
    /** Allow-list tokens as configured, before resolution */
    readonly allowlistTokens: readonly string[];
}

function resolveFromRoot(target: string): string {
    return path.isAbsolute(target) ? target : path.resolve(REPO_ROOT, target);
}

/**
 * Re-key a per-symbol map by canonical instrument id.
 */
function canonicalMap(map: Readonly<Record<string, number>>, resolver: SymbolResolver): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [token, value] of Object.entries(map)) {
        result[resolver.resolve(token)] = value;
    }
    return result;
}

/**
 * A malformed window fails open: no restriction, plus the parse error for validation to report.
 */
function tryParseWindow(raw: string): { window: TradingWindow | null; error: string | null } {
    if (!raw) {
        return { window: null, error: null };
    }
    try {
        return { window: parseTradingWindow(raw), error: null };
    } catch (error) {
        return { window: null, error: error instanceof Error ? error.message : String(error) };
    }
}

/**
 * Instrument files are resolved against the repo root.
 */
export function instrumentsPath(env: GatewayEnv): string {
    return resolveFromRoot(env.INSTRUMENTS_FILE);
}

export function buildGatewayConfig(env: GatewayEnv, resolver: SymbolResolver): GatewayConfig {
    const dataDir = resolveFromRoot(env.DATA_DIR);
    const tradingWindow = tryParseWindow(env.TRADING_WINDOW);

    return Object.freeze({
        server: {
            port: env.GATEWAY_PORT,
            host: env.GATEWAY_HOST,
            token: env.GATEWAY_TOKEN,
            rateLimitPerMin: env.GATEWAY_RATE_LIMIT_PER_MIN
        },
        timeZone: env.TRADING_TZ,
        tradingWindowRaw: env.TRADING_WINDOW,
        tradingWindowError: tradingWindow.error,
        guards: {
            kill_switch: buildKillSwitch(env.TRADING_ENABLED, env.SYMBOL_KILL, env.KILL_REASON, (token) => resolver.resolve(token)),
            trading_window: tradingWindow.window,
            daily_loss_stop_pct: env.DAILY_LOSS_STOP_PCT,
            max_open_positions: env.MAX_OPEN_POSITIONS,
            max_open_per_instrument: env.MAX_OPEN_PER_INSTRUMENT,
            min_stop_distance: canonicalMap(env.MIN_STOP_DISTANCE, resolver),
            allowlist: new Set(env.SYMBOL_ALLOWLIST.map((token) => resolver.resolve(token)))
        },
        risk: {
            max_risk_pct: env.MAX_RISK_PCT,
            max_units: env.MAX_UNITS,
            symbol_unit_caps: canonicalMap(env.SYMBOL_UNIT_CAPS, resolver),
            symbol_risk_caps: canonicalMap(env.SYMBOL_RISK_CAPS, resolver)
        },
        routing: {
            dryRun: env.DRY_RUN,
            tradingEnabled: env.TRADING_ENABLED,
            forward: { broker: env.FORWARD_TO_BROKER, relay: env.FORWARD_TO_RELAY }
        },
        fallbackBalance: env.FALLBACK_BALANCE,
        cache: {
            balanceTtlMs: env.BALANCE_CACHE_TTL_MS,
            positionTtlMs: env.POSITION_CACHE_TTL_MS,
            idempotencyTtlMs: env.IDEMPOTENCY_TTL_SEC * 1000
        },
        oanda: {
            token: env.OANDA_TOKEN,
            accountId: env.OANDA_ACCOUNT_ID,
            environment: env.OANDA_ENV,
            timeoutMs: env.BROKER_TIMEOUT_MS
        },
        relay: {
            baseUrl: env.RELAY_BASE,
            user: env.RELAY_USER,
            token: env.RELAY_TOKEN,
            authStyle: env.RELAY_AUTH_STYLE,
            ordersPath: env.RELAY_ORDERS_PATH,
            masterSource: env.RELAY_MASTER_SOURCE,
            tag: env.RELAY_TAG,
            timeoutMs: env.RELAY_TIMEOUT_MS
        },
        notify: {
            webhookUrl: env.NOTIFY_WEBHOOK_URL,
            timeoutMs: env.NOTIFY_TIMEOUT_MS
        },
        paths: {
            dataDir,
            instrumentsFile: instrumentsPath(env),
            tradesFile: path.join(dataDir, 'trades.jsonl'),
            equityFile: path.join(dataDir, 'equity.jsonl')
        },
        allowlistTokens: env.SYMBOL_ALLOWLIST
    });
}

// ============================================================================
// Validation
// ============================================================================

export interface ConfigValidation {
    readonly valid: boolean;
    readonly errors: string[];
    readonly warnings: string[];
}

/**
 * Errors abort startup; warnings are logged.
 */
export function validateGatewayConfig(config: GatewayConfig, resolver: SymbolResolver): ConfigValidation {
    const errors: string[] = [];
    const warnings: string[] = [];

    try {
        assertTimeZone(config.timeZone);
    } catch {
        errors.push(`TRADING_TZ "${config.timeZone}" is not a known time zone`);
    }

    if (config.risk.max_units < 1) {
        errors.push('MAX_UNITS must be at least 1');
    }
    if (config.fallbackBalance <= 0) {
        errors.push('FALLBACK_BALANCE must be positive');
    }

    if (config.tradingWindowError) {
        warnings.push(`${config.tradingWindowError}; no window restriction applied`);
    }

    if (config.guards.allowlist.size === 0) {
        warnings.push('SYMBOL_ALLOWLIST is empty: every signal will be rejected');
    }
    for (const token of config.allowlistTokens) {
        if (!resolver.isKnown(resolver.resolve(token))) {
            warnings.push(`SYMBOL_ALLOWLIST entry "${token}" is not in the instrument catalog`);
        }
    }

    if (!config.server.token) {
        warnings.push('GATEWAY_TOKEN not set: /webhook accepts unauthenticated requests');
    }

    if (!config.routing.dryRun && config.routing.tradingEnabled) {
        if (config.routing.forward.broker && (!config.oanda.token || !config.oanda.accountId)) {
            warnings.push('Broker forwarding is on but OANDA_TOKEN / OANDA_ACCOUNT_ID are missing');
        }
        if (config.routing.forward.relay && !config.relay.baseUrl) {
            warnings.push('Relay forwarding is on but RELAY_BASE is missing');
        }
        if (config.oanda.environment === 'live') {
            warnings.push('LIVE broker environment: real orders will be placed');
        }
    }

    return { valid: errors.length === 0, errors, warnings };
}

/**
 * Effective configuration for /env-check and the startup banner. Secrets masked.
 */
export function describeConfig(config: GatewayConfig) {
    return {
        trading_enabled: config.routing.tradingEnabled,
        dry_run: config.routing.dryRun,
        forward_to_broker: config.routing.forward.broker,
        forward_to_relay: config.routing.forward.relay,
        trading_tz: config.timeZone,
        trading_window: config.tradingWindowRaw || null,
        trading_window_active: config.guards.trading_window !== null,
        daily_loss_stop_pct: config.guards.daily_loss_stop_pct,
        max_open_positions: config.guards.max_open_positions,
        max_open_per_instrument: config.guards.max_open_per_instrument,
        min_stop_distance: config.guards.min_stop_distance,
        symbol_kill: Object.keys(config.guards.kill_switch.symbol_kill),
        symbol_allowlist: Array.from(config.guards.allowlist).sort(),
        max_risk_pct: config.risk.max_risk_pct,
        max_units: config.risk.max_units,
        symbol_unit_caps: config.risk.symbol_unit_caps,
        symbol_risk_caps: config.risk.symbol_risk_caps,
        fallback_balance: config.fallbackBalance,
        idempotency_ttl_ms: config.cache.idempotencyTtlMs,
        gateway_token: maskSecret(config.server.token),
        oanda_env: config.oanda.environment,
        oanda_account_id: maskSecret(config.oanda.accountId),
        oanda_token: maskSecret(config.oanda.token),
        relay_base: config.relay.baseUrl ?? null,
        relay_user: config.relay.user ?? null,
        relay_token: maskSecret(config.relay.token),
        relay_auth_style: config.relay.authStyle,
        relay_orders_path: config.relay.ordersPath,
        relay_master_source: config.relay.masterSource,
        notify_enabled: Boolean(config.notify.webhookUrl),
        data_dir: config.paths.dataDir
    };
}
