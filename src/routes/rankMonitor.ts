import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requireApiKey } from '../middleware/auth.js';
import { parseRequest } from '../middleware/validate.js';
import { checkRankingBodySchema, createMonitorBodySchema, reportParamsSchema } from '../schemas/index.js';
import type { CredentialService } from '../services/credentials.js';
import type { RankMonitorService } from '../services/rankMonitor.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Demo ranking API. Every route answers 401 for a missing or unusable key.
 */
export function createRankMonitorRouter(
    rankMonitor: RankMonitorService,
    credentials: CredentialService,
    now: () => number = Date.now,
): Router {
    const router = Router();
    const authenticate = requireApiKey(credentials);

    router.post('/check-ranking', authenticate, (req, res) => {
        const body = parseRequest(checkRankingBodySchema, req.body, 'body');
        res.json({
            domain: body.domain,
            keyword: body.keyword,
            checked_at: new Date(now()).toISOString(),
            results: rankMonitor.checkRanking(body.domain, body.keyword, body.locations),
        });
    });

    router.post('/monitor', authenticate, asyncHandler(async (req, res) => {
        const body = parseRequest(createMonitorBodySchema, req.body, 'body');
        const monitor = await rankMonitor.createMonitor(body.domain, body.keywords, body.locations);
        res.status(201).json({
            message: 'Monitor created successfully',
            monitor_id: monitor.id,
            domain: monitor.domain,
            keywords_count: monitor.keywords.length,
            locations_count: monitor.locations.length,
            next_check: new Date(monitor.createdAt.getTime() + HOUR_MS).toISOString(),
        });
    }));

    router.get('/locations', authenticate, (_req, res) => {
        res.json({ count: rankMonitor.locations.length, locations: rankMonitor.locations });
    });

    router.get('/report/:monitorId', authenticate, asyncHandler(async (req, res) => {
        const { monitorId } = parseRequest(reportParamsSchema, req.params, 'params');
        const report = await rankMonitor.report(monitorId);
        res.json({
            monitor_id: monitorId,
            domain: report.domain,
            generated_at: new Date(now()).toISOString(),
            period: 'last_7_days',
            data: report.data,
        });
    }));

    return router;
}
