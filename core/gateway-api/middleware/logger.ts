import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
    const requestId = randomUUID();
    const start = Date.now();

    // Attach ID to response
    res.setHeader('x-request-id', requestId);

    // Log on finish
    res.on('finish', () => {
        const duration = Date.now() - start;
        const orderId = typeof res.locals.orderId === 'string' ? res.locals.orderId : '-';
        const outcome = typeof res.locals.outcome === 'string' ? res.locals.outcome : '-';
        console.log(`[REQ] ${requestId} | ${req.method} ${req.path} | status=${res.statusCode} | ${duration}ms | order_id=${orderId} | outcome=${outcome}`);
    });

    next();
};
