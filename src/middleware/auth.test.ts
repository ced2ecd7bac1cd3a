import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import { authenticatedCredential, readApiKey, requireApiKey } from './auth.js';
import { InvalidApiKeyError } from '../errors.js';
import { createMemoryStores } from '../db/repositories/index.js';
import { CredentialService } from '../services/credentials.js';
import { PlanTier, type CredentialInfo } from '../types/plan.js';

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('Auth Middleware', () => {
    let credentials: CredentialService;
    let headers: Record<string, string>;
    let req: Partial<Request>;
    let res: Partial<Response>;
    let next: NextFunction;

    beforeEach(() => {
        credentials = new CredentialService(createMemoryStores());
        headers = {};
        req = { get: ((name: string) => headers[name.toLowerCase()]) as Request['get'] };
        res = {};
        next = vi.fn();
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    const run = async () => {
        requireApiKey(credentials)(req as Request, res as Response, next);
        await flush();
    };

    it('rejects if api key is missing', async () => {
        await run();
        expect(next).toHaveBeenCalledWith(expect.any(InvalidApiKeyError));
        expect(vi.mocked(next).mock.calls[0][0]).toMatchObject({ statusCode: 401, details: { reason: 'missing' } });
    });

    it('treats a blank header as missing', async () => {
        headers['x-api-key'] = '   ';
        expect(readApiKey(req as Request)).toBeNull();
    });

    it('rejects if api key is invalid', async () => {
        headers['x-api-key'] = 'invalid-key';
        await run();
        expect(vi.mocked(next).mock.calls[0][0]).toMatchObject({ statusCode: 401, details: { reason: 'invalid' } });
    });

    it('attaches the credential and calls next if valid', async () => {
        const stores = createMemoryStores();
        credentials = new CredentialService(stores);
        const account = await stores.accounts.create('owner@example.com');
        const { apiKey, credential } = await credentials.issue(account.id, PlanTier.PRO);
        headers['x-api-key'] = apiKey;

        await run();

        expect(next).toHaveBeenCalledWith();
        expect(req.credential).toEqual({
            credentialId: credential.id,
            accountId: account.id,
            planTier: PlanTier.PRO,
            keyPrefix: apiKey.slice(0, 8),
        });
        expect(authenticatedCredential(req as Request)).toBe(req.credential);
    });

    it('reuses an earlier resolution instead of resolving again', async () => {
        const earlier: CredentialInfo = {
            credentialId: '7',
            accountId: '3',
            planTier: PlanTier.STARTER,
            keyPrefix: 'abcd1234',
        };
        headers['x-api-key'] = 'abcd1234-whatever';
        req.credentialLookup = { credential: earlier };
        const resolve = vi.spyOn(credentials, 'resolve');

        await run();

        expect(resolve).not.toHaveBeenCalled();
        expect(req.credential).toBe(earlier);
        expect(next).toHaveBeenCalledWith();
    });

    it('authenticatedCredential throws when nothing was attached', () => {
        expect(() => authenticatedCredential(req as Request)).toThrow(InvalidApiKeyError);
    });
});
