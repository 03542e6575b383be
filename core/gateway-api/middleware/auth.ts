import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface WebhookAuthOptions {
    /** Shared secret; unset = no token check */
    readonly token?: string;
    /** Requests per IP and path per minute; 0 disables the limit */
    readonly rateLimitPerMin: number;
    readonly now?: () => number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Alert platforms cannot always set headers, so the token may also arrive
 * as ?token= or as a "token" field in the JSON body.
 */
export function presentedToken(req: Request): string {
    const authHeader = req.headers.authorization;
    if (authHeader && authHeader.startsWith('Bearer ')) {
        return authHeader.substring(7);
    }
    if (typeof req.query.token === 'string') {
        return req.query.token;
    }
    const body: unknown = req.body;
    if (isRecord(body) && typeof body.token === 'string') {
        return body.token;
    }
    return '';
}

export interface RateLimiter {
    /** Records a hit for key and reports whether it exceeds the limit */
    isLimited(key: string): boolean;
    /** Number of keys with hits inside the current window */
    trackedKeys(): number;
}

/**
 * Sliding one-minute window per key. Keys whose hits have all aged out are
 * dropped on every call, so the map only holds recently active clients.
 */
export function createRateLimiter(limitPerMin: number, now: () => number = Date.now): RateLimiter {
    const windowMs = 60000;
    const rateLimitMap = new Map<string, number[]>();

    function evictStale(current: number): void {
        for (const [key, timestamps] of rateLimitMap) {
            while (timestamps.length > 0 && (timestamps[0] ?? 0) <= current - windowMs) timestamps.shift();
            if (timestamps.length === 0) rateLimitMap.delete(key);
        }
    }

    return {
        isLimited(key: string): boolean {
            if (limitPerMin <= 0) return false;
            const current = now();
            evictStale(current);
            const timestamps = rateLimitMap.get(key) ?? [];
            if (timestamps.length >= limitPerMin) return true;
            timestamps.push(current);
            rateLimitMap.set(key, timestamps);
            return false;
        },
        trackedKeys(): number {
            return rateLimitMap.size;
        }
    };
}

export function webhookAuth(options: WebhookAuthOptions): RequestHandler {
    const limiter = createRateLimiter(options.rateLimitPerMin, options.now);

    return (req: Request, res: Response, next: NextFunction) => {
        // mounted on /webhook and /dryrun: req.path is relative to the mount
        const path = req.originalUrl.split('?')[0] ?? req.path;
        const ip = req.ip || 'unknown';

        if (limiter.isLimited(`${ip} ${path}`)) {
            console.error(`[AUTH] code=TOO_MANY_REQUESTS ip=${ip} path=${path}`);
            res.status(429).json({ error: 'TOO_MANY_REQUESTS', message: `Limit ${options.rateLimitPerMin}/min` });
            return;
        }

        if (options.token && presentedToken(req) !== options.token) {
            console.error(`[AUTH] code=UNAUTHORIZED ip=${ip} path=${path}`);
            res.status(401).json({ error: 'UNAUTHORIZED', message: 'Valid token required' });
            return;
        }

        next();
    };
}
