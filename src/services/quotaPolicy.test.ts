import { describe, it, expect } from 'vitest';
import { QuotaPolicy, DEFAULT_CEILINGS } from './quotaPolicy.js';
import { PlanTier, parsePlanTier } from '../types/plan.js';

describe('QuotaPolicy', () => {
    const policy = new QuotaPolicy();

    it('looks up the default ceiling for every tier', () => {
        expect(policy.ceilingFor(PlanTier.FREE)).toBe(10);
        expect(policy.ceilingFor(PlanTier.STARTER)).toBe(500);
        expect(policy.ceilingFor(PlanTier.PRO)).toBe(5000);
        expect(policy.ceilingFor(PlanTier.ENTERPRISE)).toBe(999999);
    });

    it('uses configured ceilings when given', () => {
        const custom = new QuotaPolicy({ ...DEFAULT_CEILINGS, [PlanTier.FREE]: 3 });
        expect(custom.ceilingFor(PlanTier.FREE)).toBe(3);
        expect(custom.ceilingFor(PlanTier.PRO)).toBe(5000);
    });

    it('admits the call that brings the count up to the ceiling', () => {
        expect(policy.evaluate(PlanTier.FREE, 9)).toEqual({
            planTier: PlanTier.FREE,
            ceiling: 10,
            countInWindow: 9,
            remaining: 1,
            admitted: true,
        });
    });

    it('rejects once the window already holds the ceiling', () => {
        const decision = policy.evaluate(PlanTier.FREE, 10);
        expect(decision.admitted).toBe(false);
        expect(decision.remaining).toBe(0);
    });

    it('floors remaining at zero when the count overshoots', () => {
        const decision = policy.evaluate(PlanTier.FREE, 11);
        expect(decision.remaining).toBe(0);
        expect(decision.admitted).toBe(false);
    });

    it('rejects every call for a zero ceiling', () => {
        const closed = new QuotaPolicy({ ...DEFAULT_CEILINGS, [PlanTier.STARTER]: 0 });
        expect(closed.evaluate(PlanTier.STARTER, 0).admitted).toBe(false);
    });
});

describe('parsePlanTier', () => {
    it('accepts the four known tiers', () => {
        expect(parsePlanTier('free')).toBe(PlanTier.FREE);
        expect(parsePlanTier('starter')).toBe(PlanTier.STARTER);
        expect(parsePlanTier('pro')).toBe(PlanTier.PRO);
        expect(parsePlanTier('enterprise')).toBe(PlanTier.ENTERPRISE);
    });

    it('returns null for anything else', () => {
        expect(parsePlanTier('PRO')).toBeNull();
        expect(parsePlanTier('platinum')).toBeNull();
        expect(parsePlanTier(undefined)).toBeNull();
    });
});
