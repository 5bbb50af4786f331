// src/lib/services/guardrails.ts
// =============================================================================
// GUARDRAILS – approved / review / blocked verdict for a built opportunity.
// Checks run in order and the first failure wins, so every BLOCKED check is
// evaluated before any REVIEW check.
// =============================================================================

import type { GuardrailResult, ScannerConfig, TradeSetup } from '../../types';
import { positionRiskFraction } from '../utils/riskUtils';

export interface GuardrailCandidate {
    setup: Pick<TradeSetup, 'positionSizeShares' | 'riskPerShare' | 'rrRatio'>;
    netExpectedR: number;
    signalScore: number;
    atrPercent: number;
}

export type GuardrailPolicy = Pick<
    ScannerConfig,
    | 'portfolioValue'
    | 'riskPctPerTrade'
    | 'minRrRatio'
    | 'minNetExpectedR'
    | 'reviewScoreThreshold'
    | 'maxAtrPercent'
>;

export function evaluateGuardrails(candidate: GuardrailCandidate, policy: GuardrailPolicy): GuardrailResult {
    const { setup } = candidate;

    // 1. Dollars at risk may not exceed twice the per-trade budget
    const riskFraction = positionRiskFraction(setup.positionSizeShares, setup.riskPerShare, policy.portfolioValue);
    const maxRiskFraction = 2 * policy.riskPctPerTrade;
    if (riskFraction > maxRiskFraction) {
        return {
            status: 'blocked',
            check: 'position_risk',
            reason: `Position risk ${(riskFraction * 100).toFixed(2)}% exceeds limit ${(maxRiskFraction * 100).toFixed(2)}%`,
        };
    }

    // 2. Reward:risk floor
    if (setup.rrRatio < policy.minRrRatio) {
        return {
            status: 'blocked',
            check: 'rr_ratio',
            reason: `R:R ${setup.rrRatio.toFixed(2)} below minimum ${policy.minRrRatio}`,
        };
    }

    // 3. Expectancy after costs
    if (candidate.netExpectedR < policy.minNetExpectedR) {
        return {
            status: 'blocked',
            check: 'net_expected_r',
            reason: `Net expected R ${candidate.netExpectedR.toFixed(3)} below minimum ${policy.minNetExpectedR}`,
        };
    }

    // 4. Weak signal → human review
    if (candidate.signalScore < policy.reviewScoreThreshold) {
        return {
            status: 'review',
            check: 'signal_score',
            reason: `Signal score ${candidate.signalScore.toFixed(2)} below review threshold ${policy.reviewScoreThreshold}`,
        };
    }

    // 5. Volatility too high for the stop distance
    if (candidate.atrPercent > policy.maxAtrPercent) {
        return {
            status: 'review',
            check: 'atr_percent',
            reason: `ATR ${candidate.atrPercent.toFixed(2)}% above ${policy.maxAtrPercent}%`,
        };
    }

    return { status: 'approved', check: 'passed', reason: 'All guardrail checks passed' };
}
