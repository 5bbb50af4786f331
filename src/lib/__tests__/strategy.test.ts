import { describe, it, expect } from 'vitest';
import { combineScores, generateTradeSetup, scoreFeatures, SCORE_WEIGHTS } from '../strategy';
import { neutralFeatures } from './fixtures';

const POLICY = { portfolioValue: 100_000, riskPct: 0.005 };

// ============================================================================
// Scoring
// ============================================================================

describe('scoreFeatures', () => {
    it('scores 0 everywhere when no rule fires', () => {
        const { scores, reasons } = scoreFeatures(neutralFeatures());
        expect(scores).toEqual({ price: 0, volume: 0, volatility: 0, overall: 0 });
        expect(reasons).toEqual([]);
    });

    it('caps every sub-score at 100 for maximally favourable inputs', () => {
        const { scores } = scoreFeatures(
            neutralFeatures({
                emaAlignmentBull: true,
                priceVsEma20Pct: 0.03,
                rsi14: 55,
                rvol: 2.5,
                aboveVwap: true,
                vwapDistancePct: 0.005,
                pivotProximityScore: 10,
                atrPercentile: 70,
                bidAskSpreadBps: 5,
            })
        );
        expect(scores).toEqual({ price: 100, volume: 100, volatility: 100, overall: 100 });
    });

    it('scores a healthy breakout with moderate volume', () => {
        const { scores, reasons } = scoreFeatures(
            neutralFeatures({
                emaAlignmentBull: true,
                priceVsEma20Pct: 0.01,
                rsi14: 58,
                rvol: 1.8,
                aboveVwap: true,
                vwapDistancePct: 0.008,
                atrPercentile: 70,
                bidAskSpreadBps: 20,
            })
        );
        expect(scores).toEqual({ price: 85, volume: 70, volatility: 90, overall: 81.43 });
        expect(reasons).toContain('Bullish EMA stack (20 > 50 > 200)');
        expect(reasons).toContain('Price 1.0% above EMA20');
        expect(reasons).toContain('RSI 58.0 in sweet spot');
        expect(reasons).toContain('Above-average volume 1.80x');
        expect(reasons).toContain('Holding just above VWAP');
    });

    it('gives no RSI points at exactly 30 and oversold points below it', () => {
        expect(scoreFeatures(neutralFeatures({ rsi14: 30 })).scores.price).toBe(0);
        expect(scoreFeatures(neutralFeatures({ rsi14: 29 })).scores.price).toBe(10);
    });

    it('rewards a VWAP test from below', () => {
        const { scores } = scoreFeatures(neutralFeatures({ vwapDistancePct: -0.003 }));
        expect(scores.volume).toBe(20);
    });

    it('adds at most one point for pivot proximity', () => {
        const { scores } = scoreFeatures(neutralFeatures({ pivotProximityScore: 6 }));
        expect(scores.volume).toBe(6);
    });
});

describe('combineScores', () => {
    it('normalises by the weight sum', () => {
        expect(SCORE_WEIGHTS).toEqual({ price: 0.4, volume: 0.2, volatility: 0.1 });
        expect(combineScores(85, 70, 90)).toBe(81.43);
        expect(combineScores(100, 100, 100)).toBe(100);
        expect(combineScores(0, 0, 0)).toBe(0);
    });
});

// ============================================================================
// Trade setup
// ============================================================================

describe('generateTradeSetup', () => {
    it('places the stop 1.5 ATR below entry with 2.5R and 4R targets', () => {
        const setup = generateTradeSetup({ atr: 2 }, 100, POLICY);
        expect(setup).toEqual({
            entry: 100,
            stop: 97,
            target1: 107.5,
            target2: 112,
            positionSizeUsd: 16_600,
            positionSizeShares: 166,
            rrRatio: 2.5,
            riskPerShare: 3,
            degenerate: false,
        });
    });

    it('keeps the reward:risk ratio consistent with its prices', () => {
        const setup = generateTradeSetup({ atr: 1.37 }, 47.21, POLICY);
        const implied = (setup.target1 - setup.entry) / (setup.entry - setup.stop);
        expect(Math.abs(setup.rrRatio - implied)).toBeLessThan(1e-6);
        expect(Math.abs(setup.rrRatio - 2.5)).toBeLessThan(1e-6);
        expect(setup.stop).toBeLessThan(setup.entry);
        expect(setup.entry).toBeLessThan(setup.target1);
    });

    it('returns a zero-size degenerate setup when ATR is zero', () => {
        const setup = generateTradeSetup({ atr: 0 }, 50, POLICY);
        expect(setup.degenerate).toBe(true);
        expect(setup.positionSizeShares).toBe(0);
        expect(setup.positionSizeUsd).toBe(0);
        expect(setup.rrRatio).toBe(0);
        expect(setup.stop).toBe(50);
    });
});
