import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { authenticatedCredential, requireApiKey } from '../middleware/auth.js';
import { parseRequest } from '../middleware/validate.js';
import { usageQuerySchema } from '../schemas/index.js';
import type { CredentialService } from '../services/credentials.js';
import { QUOTA_WINDOW_HOURS, type QuotaPolicy } from '../services/quotaPolicy.js';
import type { UsageLedger } from '../services/usageLedger.js';

/**
 * Usage for the presented key. The call itself is recorded after the
 * response, so it is not part of the counts it reports.
 */
export function createUsageRouter(credentials: CredentialService, ledger: UsageLedger, policy: QuotaPolicy): Router {
    const router = Router();

    router.get('/usage', requireApiKey(credentials), asyncHandler(async (req, res) => {
        const credential = authenticatedCredential(req);
        const { days } = parseRequest(usageQuerySchema, req.query, 'query');

        const callsToday = await ledger.countWindow(credential.credentialId, QUOTA_WINDOW_HOURS);
        const decision = policy.evaluate(credential.planTier, callsToday);
        const summary = await ledger.summary(credential.credentialId, days);

        res.json({
            key_prefix: credential.keyPrefix,
            plan: decision.planTier,
            limit: decision.ceiling,
            calls_today: callsToday,
            remaining: decision.remaining,
            period_days: days,
            total_calls: summary.totalCalls,
            average_latency_ms: summary.averageLatencyMs,
            top_endpoints: summary.byEndpoint,
        });
    }));

    return router;
}
