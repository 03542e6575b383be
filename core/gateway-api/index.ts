import { createServer } from 'http';
import { loadInstrumentCatalog } from '../symbols/instrument_meta.js';
import { SymbolResolver } from '../symbols/symbol_resolver.js';
import { createGatewayApp } from './app.js';
import {
    buildGatewayConfig,
    describeConfig,
    instrumentsPath,
    loadEnvFile,
    parseGatewayEnv,
    validateGatewayConfig
} from './config.js';
import { buildGatewayServices } from './services.js';

const SHUTDOWN_GRACE_MS = 10000;

async function main(): Promise<void> {
    // ENV must be loaded before anything reads it
    loadEnvFile();
    const env = parseGatewayEnv(process.env);

    const catalog = await loadInstrumentCatalog(instrumentsPath(env));
    const resolver = new SymbolResolver(catalog);

    const config = buildGatewayConfig(env, resolver);
    const validation = validateGatewayConfig(config, resolver);
    for (const warning of validation.warnings) {
        console.warn(`[CONFIG] warning: ${warning}`);
    }
    if (!validation.valid) {
        throw new Error(`Invalid gateway config: ${validation.errors.join(', ')}`);
    }

    const services = await buildGatewayServices(config, resolver);
    const app = createGatewayApp({
        gateway: services.gateway,
        config,
        auditLog: services.auditLog,
        equity: services.equity
    });

    const server = createServer(app);

    let shuttingDown = false;
    const shutdown = (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.log(`[GATEWAY] ${signal} received, shutting down...`);

        const forced = setTimeout(() => {
            console.error('[GATEWAY] forced exit after grace period');
            process.exit(1);
        }, SHUTDOWN_GRACE_MS);
        forced.unref();

        server.close(() => {
            Promise.all([services.notifier.drain(), services.equity.flush()])
                .then(() => {
                    console.log('[GATEWAY] Server closed.');
                    process.exit(0);
                })
                .catch((error: unknown) => {
                    console.error(`[GATEWAY] drain failed: ${error instanceof Error ? error.message : String(error)}`);
                    process.exit(1);
                });
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    server.listen(config.server.port, config.server.host, () => {
        const effective = describeConfig(config);
        console.log(`============================================================`);
        console.log(`Signal Gateway`);
        console.log(`Mode: ${effective.dry_run ? 'DRY_RUN' : 'LIVE'} | trading_enabled=${effective.trading_enabled}`);
        console.log(`Broker: ${services.broker ? `OANDA ${effective.oanda_env} ${effective.oanda_account_id}` : 'not configured'}`);
        console.log(`Relay: ${services.relay ? effective.relay_base : 'not configured'}`);
        console.log(`Allow-list: ${effective.symbol_allowlist.join(', ')}`);
        console.log(`Listening on http://${config.server.host}:${config.server.port}`);
        console.log(`============================================================`);
    });
}

main().catch((error: unknown) => {
    console.error(`[GATEWAY] startup failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
