import { PlanTier, type QuotaDecision } from '../types/plan.js';

/** Ceilings used when configuration does not override them. */
export const DEFAULT_CEILINGS: Readonly<Record<PlanTier, number>> = {
    [PlanTier.FREE]: 10,
    [PlanTier.STARTER]: 500,
    [PlanTier.PRO]: 5000,
    [PlanTier.ENTERPRISE]: 999999,
};

export const QUOTA_WINDOW_HOURS = 24;
export const QUOTA_RESET_SECONDS = QUOTA_WINDOW_HOURS * 60 * 60;

/**
 * Fixed per-tier daily ceilings. Admission is decided against the count
 * BEFORE the current request is recorded, so with ceiling C the C-th call in
 * a window is the last one admitted.
 */
export class QuotaPolicy {
    private readonly ceilings: Readonly<Record<PlanTier, number>>;

    constructor(ceilings: Readonly<Record<PlanTier, number>> = DEFAULT_CEILINGS) {
        this.ceilings = { ...ceilings };
    }

    public ceilingFor(tier: PlanTier): number {
        return this.ceilings[tier];
    }

    public evaluate(tier: PlanTier, countInWindow: number): QuotaDecision {
        const ceiling = this.ceilingFor(tier);
        const remaining = Math.max(0, ceiling - countInWindow);
        return {
            planTier: tier,
            ceiling,
            countInWindow,
            remaining,
            admitted: remaining > 0,
        };
    }
}
