/**
 * Process-wide services, constructed once at startup and shared by every request.
 */

import {
    CopyTradeRelayAdapter,
    ExecutionRouter,
    loadOandaCredentials,
    loadRelayCredentials,
    OandaAdapter,
    type FetchLike
} from '../exchange/index.js';
import { AdmissionGate } from '../execution/gate.js';
import { SignalGateway } from '../gateway/SignalGateway.js';
import { IdempotencyFilter } from '../idempotency/idempotency_filter.js';
import { JsonlAuditLog } from '../ops/audit_log.js';
import { EquitySeries } from '../ops/equity_series.js';
import { DiscordNotifier } from '../ops/notifier.js';
import { BalanceOracle } from '../oracles/balance_oracle.js';
import { PositionCensus } from '../oracles/position_census.js';
import { PolicyRiskSizer } from '../risk/sizing.js';
import type { SymbolResolver } from '../symbols/symbol_resolver.js';
import { UnitConverter } from '../symbols/unit_converter.js';
import type { GatewayConfig } from './config.js';

export interface GatewayServices {
    readonly gateway: SignalGateway;
    readonly auditLog: JsonlAuditLog;
    readonly equity: EquitySeries;
    readonly notifier: DiscordNotifier;
    readonly broker: OandaAdapter | null;
    readonly relay: CopyTradeRelayAdapter | null;
}

export interface GatewayServiceOptions {
    /** Outbound HTTP for broker, relay and notifications */
    readonly fetchImpl?: FetchLike;
    readonly now?: () => number;
}

/**
 * Wire the gateway and load the persisted equity series.
 */
export async function buildGatewayServices(
    config: GatewayConfig,
    resolver: SymbolResolver,
    options: GatewayServiceOptions = {}
): Promise<GatewayServices> {
    const now = options.now ?? Date.now;

    const oandaCredentials = loadOandaCredentials(config.oanda);
    const broker = oandaCredentials
        ? new OandaAdapter(oandaCredentials, { timeoutMs: config.oanda.timeoutMs, fetchImpl: options.fetchImpl })
        : null;

    const relayCredentials = loadRelayCredentials(config.relay);
    const relay = relayCredentials
        ? new CopyTradeRelayAdapter(relayCredentials, {
            timeoutMs: config.relay.timeoutMs,
            fetchImpl: options.fetchImpl,
            masterSource: config.relay.masterSource,
            tag: config.relay.tag
        })
        : null;

    const auditLog = new JsonlAuditLog(config.paths.tradesFile);
    await auditLog.init();

    const equity = new EquitySeries(config.paths.equityFile, now);
    await equity.init();

    const notifier = new DiscordNotifier({
        webhookUrl: config.notify.webhookUrl,
        timeoutMs: config.notify.timeoutMs,
        fetchImpl: options.fetchImpl
    });

    const gateway = new SignalGateway({
        resolver,
        converter: new UnitConverter(resolver),
        gate: new AdmissionGate(config.guards),
        sizer: new PolicyRiskSizer(config.risk),
        idempotency: new IdempotencyFilter(config.cache.idempotencyTtlMs, now),
        balance: new BalanceOracle(broker, {
            ttlMs: config.cache.balanceTtlMs,
            fallbackBalance: config.fallbackBalance,
            now
        }),
        positions: new PositionCensus(broker, { ttlMs: config.cache.positionTtlMs, now }),
        equity,
        router: new ExecutionRouter(config.routing, { broker, relay }, now),
        audit: auditLog,
        notifier,
        timeZone: config.timeZone,
        now
    });

    return { gateway, auditLog, equity, notifier, broker, relay };
}
