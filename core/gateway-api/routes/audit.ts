/**
 * Audit Routes (read-only)
 *
 * GET /audit/trades?date=YYYYMMDD&limit=N - processed signals for a local trading date
 * GET /audit/equity?date=YYYYMMDD         - equity samples for a local trading date
 *
 * date defaults to today in the trading time zone.
 */

import { Router, type Request, type Response } from 'express';
import { localTimeIn } from '../../execution/local_clock.js';
import type { AuditLine, AuditQuery } from '../../ops/audit_log.js';
import type { EquitySample } from '../../ops/equity_series.js';

export interface AuditReader {
    read(query: AuditQuery): Promise<AuditLine[]>;
}

export interface EquityReader {
    read(localDate?: string): Promise<EquitySample[]>;
}

export interface AuditRouteOptions {
    readonly timeZone: string;
    readonly now?: () => number;
}

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

/**
 * YYYYMMDD (or YYYY-MM-DD) -> YYYY-MM-DD, null when invalid.
 */
export function parseDateParam(raw: string): string | null {
    const match = /^(\d{4})-?(\d{2})-?(\d{2})$/.exec(raw.trim());
    if (!match) {
        return null;
    }
    const [, year, month, day] = match;
    const iso = `${year}-${month}-${day}`;
    const parsed = new Date(`${iso}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(iso) ? iso : null;
}

export function auditRoutes(trades: AuditReader, equity: EquityReader, options: AuditRouteOptions): Router {
    const router = Router();
    const now = options.now ?? Date.now;

    function localDateFrom(req: Request): string | null {
        const raw = req.query.date;
        if (raw === undefined) {
            return localTimeIn(options.timeZone, new Date(now())).date;
        }
        return typeof raw === 'string' ? parseDateParam(raw) : null;
    }

    router.get('/audit/trades', async (req: Request, res: Response) => {
        const localDate = localDateFrom(req);
        if (!localDate) {
            return res.status(400).json({ error: 'Valid date parameter YYYYMMDD is required' });
        }

        const rawLimit = typeof req.query.limit === 'string' ? Number(req.query.limit) : DEFAULT_LIMIT;
        if (!Number.isInteger(rawLimit) || rawLimit < 1) {
            return res.status(400).json({ error: 'limit must be a positive integer' });
        }
        const limit = Math.min(rawLimit, MAX_LIMIT);

        try {
            const records = await trades.read({ localDate, limit });
            res.locals.resultCount = records.length;
            return res.json({ date: localDate, count: records.length, records });
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            console.error(`[AUDIT] read failed: ${message}`);
            return res.status(500).json({ error: message });
        }
    });

    router.get('/audit/equity', async (req: Request, res: Response) => {
        const localDate = localDateFrom(req);
        if (!localDate) {
            return res.status(400).json({ error: 'Valid date parameter YYYYMMDD is required' });
        }

        try {
            const samples = await equity.read(localDate);
            return res.json({
                date: localDate,
                count: samples.length,
                start_of_day: samples[0]?.balance ?? null,
                latest: samples[samples.length - 1]?.balance ?? null,
                samples
            });
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            console.error(`[EQUITY] read failed: ${message}`);
            return res.status(500).json({ error: message });
        }
    });

    return router;
}
