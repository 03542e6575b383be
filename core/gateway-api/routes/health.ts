import { Router, type Request, type Response } from 'express';
import type { SignalGateway } from '../../gateway/SignalGateway.js';
import { describeConfig, type GatewayConfig } from '../config.js';

export function healthRoutes(gateway: SignalGateway, config: GatewayConfig): Router {
    const router = Router();

    const liveness = (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            service: 'signal-gateway',
            dry_run: gateway.dryRun,
            trading_enabled: gateway.tradingEnabled,
            time: new Date().toISOString()
        });
    };

    // GET / and GET /health
    router.get('/', liveness);
    router.get('/health', liveness);

    // GET /env-check - effective config, secrets masked
    router.get('/env-check', (_req: Request, res: Response) => {
        res.json(describeConfig(config));
    });

    // GET /risk-status - balance, positions, limits, window and daily loss state
    router.get('/risk-status', async (_req: Request, res: Response) => {
        try {
            res.json(await gateway.riskStatus());
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            console.error(`[GATEWAY] risk-status failed: ${message}`);
            res.status(500).json({ error: message });
        }
    });

    return router;
}
