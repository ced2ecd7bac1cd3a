export enum PlanTier {
    FREE = 'free',
    STARTER = 'starter',
    PRO = 'pro',
    ENTERPRISE = 'enterprise',
}

export const PLAN_TIERS: readonly PlanTier[] = Object.values(PlanTier);

/**
 * What the gateway knows about a presented key once it resolves.
 * Never carries the secret or its fingerprint.
 */
export interface CredentialInfo {
    credentialId: string;
    accountId: string;
    planTier: PlanTier;
    keyPrefix: string;
}

export interface QuotaDecision {
    planTier: PlanTier;
    ceiling: number;
    countInWindow: number;
    remaining: number; // before the current request is recorded
    admitted: boolean;
}

export function parsePlanTier(value: unknown): PlanTier | null {
    return PLAN_TIERS.find((tier) => tier === value) ?? null;
}
