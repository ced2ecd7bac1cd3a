import type { Request, RequestHandler } from 'express';
import { InvalidApiKeyError } from '../errors.js';
import type { CredentialService } from '../services/credentials.js';
import type { CredentialInfo } from '../types/plan.js';
import { asyncHandler } from './asyncHandler.js';

export const API_KEY_HEADER = 'x-api-key';

/**
 * Outcome of resolving the request's key, kept so that the key is looked up
 * at most once per request.
 */
export interface CredentialLookup {
    credential: CredentialInfo | null;
}

declare global {
    namespace Express {
        interface Request {
            credentialLookup?: CredentialLookup;
            credential?: CredentialInfo;
        }
    }
}

export function readApiKey(req: Request): string | null {
    const value = req.get(API_KEY_HEADER)?.trim();
    return value ? value : null;
}

/**
 * Resolves the presented key, reusing an earlier resolution from the
 * admission middleware when there is one.
 */
export async function lookupCredential(
    req: Request,
    credentials: CredentialService,
    token: string,
): Promise<CredentialInfo | null> {
    if (!req.credentialLookup) {
        req.credentialLookup = { credential: await credentials.resolve(token) };
    }
    return req.credentialLookup.credential;
}

/**
 * Rejects requests without a usable key with 401 and attaches the resolved
 * credential to `req.credential` otherwise.
 */
export function requireApiKey(credentials: CredentialService): RequestHandler {
    return asyncHandler(async (req, _res, next) => {
        const token = readApiKey(req);
        if (!token) {
            throw new InvalidApiKeyError('missing');
        }

        const credential = await lookupCredential(req, credentials, token);
        if (!credential) {
            throw new InvalidApiKeyError('invalid');
        }

        req.credential = credential;
        next();
    });
}

export function authenticatedCredential(req: Request): CredentialInfo {
    if (!req.credential) {
        throw new InvalidApiKeyError('missing');
    }
    return req.credential;
}
