import { describe, it, expect } from 'vitest';
import { fromOpportunityRow, toOpportunityRow } from '../index';
import type { OpportunityRow } from '../schema';
import { scoreSymbol } from '../../scanner';
import { DEFAULT_SCANNER_CONFIG } from '../../config/settings';
import { risingBars, risingSnapshot } from '../../__tests__/fixtures';
import type { Opportunity } from '../../../types';

function sampleOpportunity(): Opportunity {
    const outcome = scoreSymbol('GOOD', risingBars(60), risingSnapshot(), { ...DEFAULT_SCANNER_CONFIG, minScore: 0 }, {
        now: 1_750_000_000_000,
        idFactory: () => '00000000-0000-4000-8000-000000000001',
    });
    if (outcome.kind !== 'opportunity') throw new Error('expected an opportunity');
    return outcome.opportunity;
}

function asStoredRow(opportunity: Opportunity, userId: string | null): OpportunityRow {
    const inserted = toOpportunityRow(opportunity, userId);
    return {
        ...inserted,
        userId: inserted.userId ?? null,
        target2: inserted.target2 ?? null,
        guardrailReason: inserted.guardrailReason ?? null,
    };
}

describe('toOpportunityRow', () => {
    it('flattens scores, setup and risk into columns', () => {
        const opp = sampleOpportunity();
        const row = toOpportunityRow(opp, 'user-1');
        expect(row.id).toBe('00000000-0000-4000-8000-000000000001');
        expect(row.userId).toBe('user-1');
        expect(row.ts).toBe(1_750_000_000_000);
        expect(row.signalScore).toBe(40);
        expect(row.entryPrice).toBe(129.5);
        expect(row.stopLoss).toBe(126.5);
        expect(row.target2).toBe(141.5);
        expect(row.guardrailStatus).toBe('review');
        expect(row.features).toBe(opp.features);
    });
});

describe('fromOpportunityRow', () => {
    it('restores the stored opportunity', () => {
        const opp = sampleOpportunity();
        expect(fromOpportunityRow(asStoredRow(opp, null))).toEqual(opp);
    });

    it('maps nullable columns back to their defaults', () => {
        const row = { ...asStoredRow(sampleOpportunity(), null), target2: null, guardrailReason: null };
        const restored = fromOpportunityRow(row);
        expect(restored.setup.target2).toBeUndefined();
        expect(restored.guardrailReason).toBe('');
    });

    it('marks rows without risk per share as degenerate', () => {
        const row = { ...asStoredRow(sampleOpportunity(), null), riskPerShare: 0 };
        expect(fromOpportunityRow(row).setup.degenerate).toBe(true);
    });

    it('rejects an unknown guardrail status', () => {
        const row = { ...asStoredRow(sampleOpportunity(), null), guardrailStatus: 'pending' };
        expect(() => fromOpportunityRow(row)).toThrow("Unknown guardrail status 'pending'");
    });
});
