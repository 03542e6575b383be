/**
 * Gateway configuration tests: env parsing, canonicalization, validation, masking.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseInstrumentCatalog } from '../symbols/instrument_meta.js';
import { SymbolResolver } from '../symbols/symbol_resolver.js';
import {
    buildGatewayConfig,
    describeConfig,
    parseGatewayEnv,
    parseSymbolMap,
    validateGatewayConfig
} from './config.js';

const resolver = new SymbolResolver(parseInstrumentCatalog({
    instruments: [
        { id: 'US30_USD', kind: 'index', point: 1, aliases: ['US30'] },
        { id: 'NAS100_USD', kind: 'index', point: 1, aliases: ['NAS100'] },
        { id: 'XAU_USD', kind: 'metal', point: 0.1, aliases: ['XAUUSD'] },
        { id: 'EUR_USD', kind: 'fx', pip: 0.0001, aliases: ['EURUSD'] },
    ],
}));

function configFor(env: NodeJS.ProcessEnv) {
    return buildGatewayConfig(parseGatewayEnv(env), resolver);
}

describe('parseGatewayEnv', () => {
    it('applies defaults to an empty environment', () => {
        const env = parseGatewayEnv({});
        assert.equal(env.GATEWAY_PORT, 8080);
        assert.equal(env.GATEWAY_HOST, '0.0.0.0');
        assert.equal(env.GATEWAY_TOKEN, undefined);
        assert.equal(env.TRADING_ENABLED, true);
        assert.equal(env.DRY_RUN, true);
        assert.equal(env.TRADING_TZ, 'America/Halifax');
        assert.equal(env.MAX_RISK_PCT, 0.5);
        assert.equal(env.MAX_UNITS, 300000);
        assert.equal(env.FALLBACK_BALANCE, 1000000);
        assert.deepEqual(env.SYMBOL_ALLOWLIST, ['US30', 'NAS100', 'XAUUSD', 'EURUSD']);
        assert.equal(env.OANDA_ENV, 'practice');
        assert.equal(env.RELAY_AUTH_STYLE, 'headers');
        assert.equal(env.RELAY_ORDERS_PATH, '/orders');
        assert.equal(env.RELAY_TAG, 'tv_v1');
    });

    it('treats blank values as unset', () => {
        const env = parseGatewayEnv({ GATEWAY_PORT: '  ', DRY_RUN: '', OANDA_ENV: '' });
        assert.equal(env.GATEWAY_PORT, 8080);
        assert.equal(env.DRY_RUN, true);
        assert.equal(env.OANDA_ENV, 'practice');
    });

    it('parses flags and numbers', () => {
        const env = parseGatewayEnv({
            TRADING_ENABLED: 'False',
            DRY_RUN: '0',
            FORWARD_TO_RELAY: 'no',
            DAILY_LOSS_STOP_PCT: '1.5',
            MAX_OPEN_POSITIONS: '3',
            OANDA_ENV: 'LIVE',
        });
        assert.equal(env.TRADING_ENABLED, false);
        assert.equal(env.DRY_RUN, false);
        assert.equal(env.FORWARD_TO_RELAY, false);
        assert.equal(env.DAILY_LOSS_STOP_PCT, 1.5);
        assert.equal(env.MAX_OPEN_POSITIONS, 3);
        assert.equal(env.OANDA_ENV, 'live');
    });

    it('reports every invalid variable', () => {
        assert.throws(
            () => parseGatewayEnv({ DRY_RUN: 'maybe', MAX_UNITS: 'lots' }),
            (error: unknown) => {
                assert.ok(error instanceof Error);
                assert.match(error.message, /^Invalid gateway environment: /);
                assert.match(error.message, /DRY_RUN: Expected a boolean, got "maybe"/);
                assert.match(error.message, /MAX_UNITS: /);
                return true;
            }
        );
    });
});

describe('parseSymbolMap', () => {
    it('accepts JSON objects and SYMBOL:value lists', () => {
        assert.deepEqual(parseSymbolMap('{"US30": 5, "NAS100": "2"}'), { US30: 5, NAS100: 2 });
        assert.deepEqual(parseSymbolMap('US30:5, NAS100:2.5,'), { US30: 5, NAS100: 2.5 });
        assert.deepEqual(parseSymbolMap('OANDA:US30USD:10'), { 'OANDA:US30USD': 10 });
        assert.deepEqual(parseSymbolMap(''), {});
    });

    it('rejects malformed entries', () => {
        assert.throws(() => parseSymbolMap('US30'), /expected SYMBOL:value, got "US30"/);
        assert.throws(() => parseSymbolMap('US30:-1'), /invalid value for US30/);
        assert.throws(() => parseSymbolMap('US30:abc'), /invalid value for US30/);
        assert.throws(() => parseSymbolMap('{US30: 5}'), SyntaxError);
        assert.throws(() => parseSymbolMap('{"US30": true}'), /invalid value for US30/);
    });

    it('surfaces map errors through the env schema', () => {
        assert.throws(() => parseGatewayEnv({ SYMBOL_UNIT_CAPS: 'US30' }), /SYMBOL_UNIT_CAPS: expected SYMBOL:value/);
    });
});

describe('buildGatewayConfig', () => {
    it('resolves symbol tokens to canonical ids', () => {
        const config = configFor({
            SYMBOL_ALLOWLIST: 'us30, eur/usd',
            SYMBOL_KILL: 'nas100',
            SYMBOL_UNIT_CAPS: 'US30:5',
            SYMBOL_RISK_CAPS: '{"XAUUSD": 0.1}',
            MIN_STOP_DISTANCE: 'EURUSD:0.0005',
        });

        assert.deepEqual(Array.from(config.guards.allowlist).sort(), ['EUR_USD', 'US30_USD']);
        assert.deepEqual(config.guards.kill_switch.symbol_kill, { NAS100_USD: true });
        assert.equal(config.guards.kill_switch.global_kill, false);
        assert.deepEqual(config.risk.symbol_unit_caps, { US30_USD: 5 });
        assert.deepEqual(config.risk.symbol_risk_caps, { XAU_USD: 0.1 });
        assert.deepEqual(config.guards.min_stop_distance, { EUR_USD: 0.0005 });
    });

    it('mirrors TRADING_ENABLED into the kill switch and the router', () => {
        const config = configFor({ TRADING_ENABLED: 'false', KILL_REASON: 'news' });
        assert.equal(config.guards.kill_switch.global_kill, true);
        assert.equal(config.guards.kill_switch.reason, 'news');
        assert.equal(config.routing.tradingEnabled, false);
    });

    it('converts the idempotency TTL to milliseconds', () => {
        assert.equal(configFor({}).cache.idempotencyTtlMs, 90000);
        assert.equal(configFor({ IDEMPOTENCY_TTL_SEC: '30' }).cache.idempotencyTtlMs, 30000);
    });

    it('places the JSONL logs under the data directory', () => {
        const config = configFor({ DATA_DIR: '/var/lib/gateway' });
        assert.equal(config.paths.tradesFile, '/var/lib/gateway/trades.jsonl');
        assert.equal(config.paths.equityFile, '/var/lib/gateway/equity.jsonl');
    });

    it('parses a trading window', () => {
        const config = configFor({ TRADING_WINDOW: 'Mon-Fri 09:30-16:00' });
        assert.equal(config.guards.trading_window?.start, 570);
        assert.equal(config.guards.trading_window?.end, 960);
        assert.equal(config.tradingWindowError, null);
    });
});

describe('validateGatewayConfig', () => {
    it('accepts the defaults with a token warning only', () => {
        const validation = validateGatewayConfig(configFor({}), resolver);
        assert.equal(validation.valid, true);
        assert.deepEqual(validation.errors, []);
        assert.deepEqual(validation.warnings, ['GATEWAY_TOKEN not set: /webhook accepts unauthenticated requests']);
    });

    it('fails on an unknown time zone', () => {
        const validation = validateGatewayConfig(configFor({ TRADING_TZ: 'Mars/Olympus' }), resolver);
        assert.equal(validation.valid, false);
        assert.deepEqual(validation.errors, ['TRADING_TZ "Mars/Olympus" is not a known time zone']);
    });

    it('fails open on a malformed trading window', () => {
        const config = configFor({ TRADING_WINDOW: 'bogus', GATEWAY_TOKEN: 'test-secret' });
        const validation = validateGatewayConfig(config, resolver);

        assert.equal(config.guards.trading_window, null);
        assert.equal(validation.valid, true);
        assert.deepEqual(validation.warnings, [
            'Invalid trading window "bogus": expected "[days ]HH:MM-HH:MM"; no window restriction applied',
        ]);
    });

    it('warns about an empty allow-list and unknown tokens', () => {
        const empty = validateGatewayConfig(configFor({ SYMBOL_ALLOWLIST: '', GATEWAY_TOKEN: 'test-secret' }), resolver);
        assert.deepEqual(empty.warnings, ['SYMBOL_ALLOWLIST is empty: every signal will be rejected']);

        const unknown = validateGatewayConfig(configFor({ SYMBOL_ALLOWLIST: 'US30,BTCUSD', GATEWAY_TOKEN: 'test-secret' }), resolver);
        assert.deepEqual(unknown.warnings, ['SYMBOL_ALLOWLIST entry "BTCUSD" is not in the instrument catalog']);
    });

    it('warns when live forwarding lacks credentials', () => {
        const validation = validateGatewayConfig(
            configFor({ DRY_RUN: 'false', GATEWAY_TOKEN: 'test-secret' }),
            resolver
        );
        assert.deepEqual(validation.warnings, [
            'Broker forwarding is on but OANDA_TOKEN / OANDA_ACCOUNT_ID are missing',
            'Relay forwarding is on but RELAY_BASE is missing',
        ]);
    });
});

describe('describeConfig', () => {
    it('masks secrets', () => {
        const described = describeConfig(configFor({
            GATEWAY_TOKEN: 'test-secret',
            OANDA_TOKEN: 'placeholder-token',
            OANDA_ACCOUNT_ID: '001-001-1234567-001',
            RELAY_TOKEN: 'short',
        }));

        assert.equal(described.gateway_token, 'test...cret');
        assert.equal(described.oanda_token, 'plac...oken');
        assert.equal(described.oanda_account_id, '001-...-001');
        assert.equal(described.relay_token, '***');
        assert.equal(described.notify_enabled, false);
        assert.deepEqual(described.symbol_allowlist, ['EUR_USD', 'NAS100_USD', 'US30_USD', 'XAU_USD']);
    });
});
