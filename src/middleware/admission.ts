import type { Request, RequestHandler, Response } from 'express';
import type { CredentialService } from '../services/credentials.js';
import { QUOTA_RESET_SECONDS, QUOTA_WINDOW_HOURS, type QuotaPolicy } from '../services/quotaPolicy.js';
import type { UsageLedger } from '../services/usageLedger.js';
import type { CredentialInfo, QuotaDecision } from '../types/plan.js';
import { asyncHandler } from './asyncHandler.js';
import { lookupCredential, readApiKey } from './auth.js';

export const EXEMPT_PATHS: readonly string[] = ['/health', '/api/health'];

export const RATE_LIMIT_HEADERS = {
    limit: 'X-RateLimit-Limit',
    remaining: 'X-RateLimit-Remaining',
    reset: 'X-RateLimit-Reset',
} as const;

export const GATEWAY_TIMEOUT_STATUS = 504;
/** Recorded when the client went away before the response finished. */
export const CLIENT_CLOSED_STATUS = 499;

export interface AdmissionOptions {
    credentials: CredentialService;
    ledger: UsageLedger;
    policy: QuotaPolicy;
    handlerTimeoutMs: number;
    now?: () => number;
}

/**
 * Express matches routes case-insensitively, so `/API/locations` reaches the
 * same handler as `/api/locations` and must be metered the same way.
 */
export function isMeteredPath(path: string): boolean {
    const normalized = path.toLowerCase();
    if (!normalized.startsWith('/api/')) return false;
    return !EXEMPT_PATHS.some((exempt) => normalized === exempt || normalized.startsWith(`${exempt}/`));
}

export function quotaExceededBody(decision: QuotaDecision, path: string) {
    return {
        success: false,
        error: 'Rate limit exceeded',
        plan: decision.planTier,
        limit: decision.ceiling,
        used: decision.countInWindow,
        resets_in: '24 hours',
        details: { reset_in_seconds: QUOTA_RESET_SECONDS },
        path,
    };
}

/**
 * Per-request quota gate for `/api/` routes.
 *
 * Requests without a key, or with a key that does not resolve, pass through
 * unmetered; `requireApiKey` on the route answers them with 401. Every
 * metered request, admitted or rejected, is written to the ledger exactly
 * once when its response finishes.
 *
 * The window count is read before the current call is recorded and nothing
 * serializes concurrent calls, so requests racing at the ceiling may all be
 * admitted.
 */
export function createAdmissionMiddleware(options: AdmissionOptions): RequestHandler {
    const { credentials, ledger, policy, handlerTimeoutMs } = options;
    const now = options.now ?? Date.now;

    const trackOutcome = (req: Request, res: Response, credential: CredentialInfo, startedAt: number) => {
        const endpoint = req.path;
        let timer: NodeJS.Timeout | undefined;
        let logged = false;

        const log = (statusCode: number) => {
            clearTimeout(timer);
            if (logged) return;
            logged = true;
            void ledger.record({
                credentialId: credential.credentialId,
                endpoint,
                latencyMs: Math.max(0, Math.round(now() - startedAt)),
                statusCode,
            });
        };

        res.once('finish', () => log(res.statusCode));
        res.once('close', () => log(res.writableFinished ? res.statusCode : CLIENT_CLOSED_STATUS));

        return {
            armTimeout: () => {
                timer = setTimeout(() => {
                    if (res.headersSent) return;
                    console.warn(`[Admission] ${req.method} ${endpoint} exceeded ${handlerTimeoutMs}ms`);
                    res.status(GATEWAY_TIMEOUT_STATUS).json({
                        success: false,
                        error: 'Gateway timeout',
                        details: { message: 'The request took too long to process' },
                        path: endpoint,
                    });
                }, handlerTimeoutMs);
            },
        };
    };

    return asyncHandler(async (req, res, next) => {
        if (!isMeteredPath(req.path)) {
            next();
            return;
        }

        const startedAt = now();
        const token = readApiKey(req);
        if (!token) {
            next();
            return;
        }

        const credential = await lookupCredential(req, credentials, token);
        if (!credential) {
            next();
            return;
        }

        const count = await ledger.countWindow(credential.credentialId, QUOTA_WINDOW_HOURS);
        const decision = policy.evaluate(credential.planTier, count);
        const outcome = trackOutcome(req, res, credential, startedAt);

        res.setHeader(RATE_LIMIT_HEADERS.limit, String(decision.ceiling));
        res.setHeader(RATE_LIMIT_HEADERS.reset, String(QUOTA_RESET_SECONDS));

        if (!decision.admitted) {
            res.setHeader(RATE_LIMIT_HEADERS.remaining, '0');
            res.status(429).json(quotaExceededBody(decision, req.path));
            return;
        }

        res.setHeader(RATE_LIMIT_HEADERS.remaining, String(Math.max(0, decision.remaining - 1)));
        outcome.armTimeout();
        next();
    });
}
