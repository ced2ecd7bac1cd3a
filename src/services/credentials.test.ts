import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CredentialService, MAX_ISSUE_ATTEMPTS, fingerprintToken, generateToken } from './credentials.js';
import { MemoryState, createMemoryStores, type Stores } from '../db/repositories/index.js';
import { CredentialIssuanceError, NotFoundError } from '../errors.js';
import { PlanTier } from '../types/plan.js';

describe('generateToken', () => {
    it('produces an 8 char prefix and a 128-bit suffix', () => {
        const { token, prefix } = generateToken();
        expect(token).toMatch(/^[0-9a-f]{8}-[0-9a-f]{32}$/);
        expect(token.startsWith(`${prefix}-`)).toBe(true);
    });

    it('fingerprints with sha256 hex', () => {
        expect(fingerprintToken('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });
});

describe('CredentialService', () => {
    let state: MemoryState;
    let stores: Stores;
    let service: CredentialService;
    let accountId: string;

    beforeEach(async () => {
        state = new MemoryState();
        stores = createMemoryStores(state);
        service = new CredentialService(stores);
        accountId = (await stores.accounts.create('owner@example.com')).id;
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    it('issues a key and stores only its fingerprint', async () => {
        const { apiKey, credential } = await service.issue(accountId, PlanTier.STARTER);

        expect(credential).toMatchObject({
            accountId,
            keyPrefix: apiKey.slice(0, 8),
            planTier: PlanTier.STARTER,
            active: true,
        });
        const stored = state.credentials.get(credential.id);
        expect(stored?.fingerprint).toBe(fingerprintToken(apiKey));
        expect(JSON.stringify([...state.credentials.values()])).not.toContain(apiKey.slice(9));
    });

    it('resolves the same credential on every call until revoked', async () => {
        const { apiKey, credential } = await service.issue(accountId, PlanTier.PRO);
        const expected = {
            credentialId: credential.id,
            accountId,
            planTier: PlanTier.PRO,
            keyPrefix: credential.keyPrefix,
        };

        expect(await service.resolve(apiKey)).toEqual(expected);
        expect(await service.resolve(apiKey)).toEqual(expected);

        expect(await service.revoke(credential.id)).toBe(true);
        expect(await service.resolve(apiKey)).toBeNull();
        expect(await service.revoke(credential.id)).toBe(true);
        expect(await service.resolve(apiKey)).toBeNull();
    });

    it('reports revoking an unknown credential', async () => {
        expect(await service.revoke('404')).toBe(false);
    });

    it('returns null for unknown tokens', async () => {
        await service.issue(accountId, PlanTier.FREE);
        expect(await service.resolve('00000000-00000000000000000000000000000000')).toBeNull();
    });

    it('returns null once the owning account is deactivated', async () => {
        const { apiKey } = await service.issue(accountId, PlanTier.FREE);
        await stores.accounts.setActive(accountId, false);
        expect(await service.resolve(apiKey)).toBeNull();
    });

    it('issues distinct, independently resolvable keys for one account', async () => {
        const first = await service.issue(accountId, PlanTier.FREE);
        const second = await service.issue(accountId, PlanTier.FREE);

        expect(first.apiKey).not.toBe(second.apiKey);
        expect((await service.resolve(first.apiKey))?.credentialId).toBe(first.credential.id);
        expect((await service.resolve(second.apiKey))?.credentialId).toBe(second.credential.id);

        await service.revoke(first.credential.id);
        expect(await service.resolve(second.apiKey)).not.toBeNull();
    });

    it('lists an account\'s keys newest first', async () => {
        const first = await service.issue(accountId, PlanTier.FREE);
        const second = await service.issue(accountId, PlanTier.PRO);

        const listed = await service.listForAccount(accountId);

        expect(listed.map((record) => record.id)).toEqual([second.credential.id, first.credential.id]);
        expect(listed[0]).not.toHaveProperty('fingerprint');
    });

    it('rejects issuance for an unknown account', async () => {
        await expect(service.issue('999', PlanTier.FREE)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('regenerates the token after a fingerprint collision', async () => {
        const taken = await service.issue(accountId, PlanTier.FREE);
        const generate = vi
            .fn()
            .mockReturnValueOnce({ token: taken.apiKey, prefix: taken.credential.keyPrefix })
            .mockReturnValueOnce({ token: 'aaaaaaaa-bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb', prefix: 'aaaaaaaa' });
        const retrying = new CredentialService(stores, { generate });

        const issued = await retrying.issue(accountId, PlanTier.FREE);

        expect(generate).toHaveBeenCalledTimes(2);
        expect(issued.apiKey).toBe('aaaaaaaa-bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb');
        expect(issued.credential.keyPrefix).toBe('aaaaaaaa');
    });

    it('gives up after the maximum number of collisions', async () => {
        const taken = await service.issue(accountId, PlanTier.FREE);
        const generate = vi.fn(() => ({ token: taken.apiKey, prefix: taken.credential.keyPrefix }));
        const retrying = new CredentialService(stores, { generate });

        await expect(retrying.issue(accountId, PlanTier.FREE)).rejects.toBeInstanceOf(CredentialIssuanceError);
        expect(generate).toHaveBeenCalledTimes(MAX_ISSUE_ATTEMPTS);
    });

    it('notifies the key-issued listener', async () => {
        const onKeyIssued = vi.fn();
        const notifying = new CredentialService(stores, { onKeyIssued });

        const { credential } = await notifying.issue(accountId, PlanTier.FREE);

        expect(onKeyIssued).toHaveBeenCalledWith(credential);
    });

    it('still issues when the listener fails', async () => {
        const notifying = new CredentialService(stores, {
            onKeyIssued: async () => {
                throw new Error('mail queue down');
            },
        });

        const { apiKey } = await notifying.issue(accountId, PlanTier.FREE);

        expect(await notifying.resolve(apiKey)).not.toBeNull();
        expect(console.error).toHaveBeenCalledWith(
            expect.stringContaining('onKeyIssued listener failed'),
            expect.any(Error),
        );
    });
});
