import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { SignalGateway } from '../gateway/SignalGateway.js';
import type { GatewayConfig } from './config.js';
import { requestLogger } from './middleware/logger.js';
import { webhookAuth } from './middleware/auth.js';
import { webhookRoutes } from './routes/webhook.js';
import { healthRoutes } from './routes/health.js';
import { auditRoutes, type AuditReader, type EquityReader } from './routes/audit.js';

export interface GatewayAppDeps {
    readonly gateway: SignalGateway;
    readonly config: GatewayConfig;
    readonly auditLog: AuditReader;
    readonly equity: EquityReader;
    readonly now?: () => number;
}

/**
 * Build the express app without listening, so tests can mount it on an ephemeral port.
 */
export function createGatewayApp(deps: GatewayAppDeps): Express {
    const app = express();

    app.use(cors({
        origin: '*',
        methods: ['GET', 'POST'],
    }));

    app.use(requestLogger);
    app.use(express.json({ limit: '64kb' }));

    // Signal intake (token + rate limit)
    const guard = webhookAuth({
        token: deps.config.server.token,
        rateLimitPerMin: deps.config.server.rateLimitPerMin,
        now: deps.now
    });
    app.use('/webhook', guard);
    app.use('/dryrun', guard);
    app.use('/', webhookRoutes(deps.gateway));

    // Read-only surfaces
    app.use('/', healthRoutes(deps.gateway, deps.config));
    app.use('/', auditRoutes(deps.auditLog, deps.equity, { timeZone: deps.config.timeZone, now: deps.now }));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: 'NOT_FOUND' });
    });

    // Body parser failures arrive here; everything else is a 500
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof SyntaxError) {
            console.error(`[REQ] invalid JSON body on ${req.method} ${req.path}`);
            res.status(400).json({ status: 'rejected', reason_code: 'MALFORMED_SIGNAL', reason: 'Invalid JSON body' });
            return;
        }
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[REQ] unhandled error on ${req.method} ${req.path}: ${message}`);
        res.status(500).json({ status: 'error', reason_code: 'INTERNAL_ERROR', reason: message });
    });

    return app;
}
