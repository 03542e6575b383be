/**
 * Signal Routes
 *
 * POST /webhook - admit, size and route one signal
 * POST /dryrun  - mapping, sizing and guard snapshot only; nothing recorded or sent
 */

import { Router, type Request, type Response } from 'express';
import type { SignalGateway } from '../../gateway/SignalGateway.js';
import { MalformedSignalError } from '../../signal/parse_signal.js';

export function webhookRoutes(gateway: SignalGateway): Router {
    const router = Router();

    router.post('/webhook', async (req: Request, res: Response) => {
        const { httpStatus, body } = await gateway.handle(req.body);
        res.locals.orderId = body.order_id ?? undefined;
        res.locals.outcome = body.status;
        return res.status(httpStatus).json(body);
    });

    router.post('/dryrun', async (req: Request, res: Response) => {
        try {
            const plan = await gateway.plan(req.body);
            res.locals.orderId = plan.order_id;
            res.locals.outcome = 'dry_run';
            return res.json(plan);
        } catch (e) {
            if (e instanceof MalformedSignalError) {
                return res.status(400).json({ status: 'rejected', reason_code: 'MALFORMED_SIGNAL', reason: e.message });
            }
            const message = e instanceof Error ? e.message : String(e);
            console.error(`[GATEWAY] dryrun failed: ${message}`);
            return res.status(500).json({ status: 'error', reason_code: 'INTERNAL_ERROR', reason: message });
        }
    });

    return router;
}
