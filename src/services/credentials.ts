import { createHash, randomBytes } from 'crypto';
import { ConflictError, CredentialIssuanceError, NotFoundError } from '../errors.js';
import type { CredentialRecord, Stores } from '../db/repositories/index.js';
import type { CredentialInfo, PlanTier } from '../types/plan.js';

export const MAX_ISSUE_ATTEMPTS = 3;

export interface GeneratedToken {
    token: string;
    prefix: string;
}

export type TokenGenerator = () => GeneratedToken;

export type KeyIssuedListener = (credential: CredentialRecord) => void | Promise<void>;

export interface IssuedKey {
    /** The full secret. Only ever returned here. */
    apiKey: string;
    credential: CredentialRecord;
}

/**
 * 8 hex chars of non-secret prefix, 32 hex chars (128 bits) of secret suffix.
 */
export const generateToken: TokenGenerator = () => {
    const prefix = randomBytes(4).toString('hex');
    const suffix = randomBytes(16).toString('hex');
    return { token: `${prefix}-${suffix}`, prefix };
};

export function fingerprintToken(token: string): string {
    return createHash('sha256').update(token, 'utf8').digest('hex');
}

export interface CredentialServiceOptions {
    generate?: TokenGenerator;
    onKeyIssued?: KeyIssuedListener;
}

/**
 * Issues, resolves and revokes API keys. Only fingerprints are stored.
 */
export class CredentialService {
    private readonly generate: TokenGenerator;
    private readonly onKeyIssued?: KeyIssuedListener;

    constructor(
        private readonly stores: Pick<Stores, 'accounts' | 'credentials'>,
        options: CredentialServiceOptions = {},
    ) {
        this.generate = options.generate ?? generateToken;
        this.onKeyIssued = options.onKeyIssued;
    }

    /**
     * Creates a credential for the account and returns the secret once.
     * A fingerprint collision is retried with fresh randomness.
     */
    public async issue(accountId: string, planTier: PlanTier): Promise<IssuedKey> {
        const account = await this.stores.accounts.findById(accountId);
        if (!account) {
            throw new NotFoundError('Account', accountId);
        }

        for (let attempt = 1; attempt <= MAX_ISSUE_ATTEMPTS; attempt++) {
            const { token, prefix } = this.generate();
            try {
                const credential = await this.stores.credentials.create({
                    accountId,
                    fingerprint: fingerprintToken(token),
                    keyPrefix: prefix,
                    planTier,
                });
                console.log(`[CredentialService] Issued key ${prefix}… (${planTier}) for account ${accountId}`);
                await this.notifyIssued(credential);
                return { apiKey: token, credential };
            } catch (err) {
                if (!(err instanceof ConflictError)) {
                    throw err;
                }
                console.warn(`[CredentialService] Fingerprint collision on attempt ${attempt}; regenerating`);
            }
        }

        throw new CredentialIssuanceError(MAX_ISSUE_ATTEMPTS);
    }

    /**
     * Resolves a presented token. Unknown, revoked and inactive-account keys
     * all come back as null.
     */
    public async resolve(token: string): Promise<CredentialInfo | null> {
        const match = await this.stores.credentials.findByFingerprint(fingerprintToken(token));
        if (!match || !match.active || !match.accountActive) {
            return null;
        }
        return {
            credentialId: match.id,
            accountId: match.accountId,
            planTier: match.planTier,
            keyPrefix: match.keyPrefix,
        };
    }

    /**
     * Idempotent. Returns false only when no credential has this id.
     */
    public async revoke(credentialId: string): Promise<boolean> {
        const revoked = await this.stores.credentials.deactivate(credentialId);
        if (revoked) {
            console.log(`[CredentialService] Revoked credential ${credentialId}`);
        }
        return revoked;
    }

    public async get(credentialId: string): Promise<CredentialRecord | null> {
        return this.stores.credentials.findById(credentialId);
    }

    public async listForAccount(accountId: string): Promise<CredentialRecord[]> {
        return this.stores.credentials.listByAccount(accountId);
    }

    private async notifyIssued(credential: CredentialRecord): Promise<void> {
        if (!this.onKeyIssued) return;
        try {
            await this.onKeyIssued(credential);
        } catch (err) {
            console.error(`[CredentialService] onKeyIssued listener failed for credential ${credential.id}:`, err);
        }
    }
}
