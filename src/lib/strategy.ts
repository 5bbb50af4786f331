// src/lib/strategy.ts
// ---------------------------------------------------------------
// STRATEGY ENGINE: rule-based scoring + long trade setup
//   • Price / volume / volatility point buckets (each 0–10 → 0–100)
//   • Fixed-weight overall score
//   • ATR-based stop, 2.5R / 4R targets, fixed-fractional sizing
// ---------------------------------------------------------------

import type { FeatureScores, FeatureSet, TradeSetup } from '../types';
import { positionSizing } from './utils/riskUtils';

// ---------------------------------------------------------------
// SCORING CONSTANTS
// ---------------------------------------------------------------
const SUB_SCORE_CAP = 10;
const SCALE = 10;                               // ← 0–10 points → 0–100 score

const BULL_STACK_POINTS = 4;                    // ← EMA20 > EMA50 > EMA200
const EMA20_STRONG_POINTS = 3;                  // ← > 2% above EMA20
const EMA20_MILD_POINTS = 1.5;                  // ← > 0.5% above EMA20
const EMA20_STRETCHED_DOWN_POINTS = 0.5;        // ← > 2% below EMA20
const RSI_SWEET_SPOT_POINTS = 3;                // ← 45–65
const RSI_DECENT_POINTS = 2;                    // ← 35–45 or 65–75
const RSI_OVERSOLD_POINTS = 1;                  // ← < 30

const RVOL_HIGH_POINTS = 6;                     // ← ≥ 2.0
const RVOL_ABOVE_POINTS = 4;                    // ← ≥ 1.5
const RVOL_SLIGHT_POINTS = 2;                   // ← ≥ 1.2
const RVOL_DEAD_POINTS = 0.5;                   // ← < 0.5
const VWAP_ABOVE_NEAR_POINTS = 3;               // ← above and within 1%
const VWAP_ABOVE_POINTS = 1.5;
const VWAP_NEAR_POINTS = 2;                     // ← within 0.5% either side
const PIVOT_MAX_POINTS = 1;                     // ← pivotScore / 10

const ATR_SWEET_POINTS = 6;                     // ← percentile 60–85
const ATR_MODERATE_POINTS = 4;                  // ← 40–60 or 85–95
const ATR_EXTREME_POINTS = 1;                   // ← > 95
const ATR_QUIET_POINTS = 2;                     // ← < 20
const SPREAD_TIGHT_POINTS = 4;                  // ← ≤ 10 bps
const SPREAD_OK_POINTS = 3;                     // ← ≤ 25 bps
const SPREAD_WIDE_POINTS = 1;                   // ← ≤ 50 bps

/**
 * Overall = Σ(weight × sub-score) / Σ(weight).
 * RSI momentum is scored inside the price bucket; there is no separate
 * momentum sub-score.
 */
export const SCORE_WEIGHTS = Object.freeze({
    price: 0.4,
    volume: 0.2,
    volatility: 0.1,
});

// ---------------------------------------------------------------
// TRADE SETUP CONSTANTS
// ---------------------------------------------------------------
export const STOP_ATR_MULTIPLIER = 1.5;
export const TARGET1_R = 2.5;
export const TARGET2_R = 4.0;

export interface RiskPolicy {
    portfolioValue: number;
    riskPct: number;
}

export interface ScoreBreakdown {
    scores: FeatureScores;
    reasons: string[];
}

const clampPoints = (points: number): number => Math.min(SUB_SCORE_CAP, Math.max(0, points));
const toScore = (points: number): number => Number((clampPoints(points) * SCALE).toFixed(2));

// ---------------------------------------------------------------
// SUB-SCORES
// ---------------------------------------------------------------
function scorePrice(f: FeatureSet, reasons: string[]): number {
    let points = 0;

    if (f.emaAlignmentBull) {
        points += BULL_STACK_POINTS;
        reasons.push('Bullish EMA stack (20 > 50 > 200)');
    }

    const vsEma20 = f.priceVsEma20Pct;
    if (vsEma20 > 0.02) {
        points += EMA20_STRONG_POINTS;
        reasons.push(`Price ${(vsEma20 * 100).toFixed(1)}% above EMA20`);
    } else if (vsEma20 > 0.005) {
        points += EMA20_MILD_POINTS;
        reasons.push(`Price ${(vsEma20 * 100).toFixed(1)}% above EMA20`);
    } else if (vsEma20 < -0.02) {
        points += EMA20_STRETCHED_DOWN_POINTS;
        reasons.push(`Price stretched ${(Math.abs(vsEma20) * 100).toFixed(1)}% below EMA20`);
    }

    const rsi = f.rsi14;
    if (rsi >= 45 && rsi <= 65) {
        points += RSI_SWEET_SPOT_POINTS;
        reasons.push(`RSI ${rsi.toFixed(1)} in sweet spot`);
    } else if ((rsi >= 35 && rsi < 45) || (rsi > 65 && rsi <= 75)) {
        points += RSI_DECENT_POINTS;
        reasons.push(`RSI ${rsi.toFixed(1)} decent momentum`);
    } else if (rsi < 30) {
        points += RSI_OVERSOLD_POINTS;
        reasons.push(`RSI ${rsi.toFixed(1)} oversold`);
    }

    return points;
}

function scoreVolume(f: FeatureSet, reasons: string[]): number {
    let points = 0;

    const rvol = f.rvol;
    if (rvol >= 2.0) {
        points += RVOL_HIGH_POINTS;
        reasons.push(`High relative volume ${rvol.toFixed(2)}x`);
    } else if (rvol >= 1.5) {
        points += RVOL_ABOVE_POINTS;
        reasons.push(`Above-average volume ${rvol.toFixed(2)}x`);
    } else if (rvol >= 1.2) {
        points += RVOL_SLIGHT_POINTS;
        reasons.push(`Slightly elevated volume ${rvol.toFixed(2)}x`);
    } else if (rvol < 0.5) {
        points += RVOL_DEAD_POINTS;
    }

    const vwapDistance = Math.abs(f.vwapDistancePct);
    if (f.aboveVwap && vwapDistance < 0.01) {
        points += VWAP_ABOVE_NEAR_POINTS;
        reasons.push('Holding just above VWAP');
    } else if (f.aboveVwap) {
        points += VWAP_ABOVE_POINTS;
        reasons.push('Above VWAP');
    } else if (vwapDistance < 0.005) {
        points += VWAP_NEAR_POINTS;
        reasons.push('Testing VWAP');
    }

    if (f.pivotProximityScore > 0) {
        points += Math.min(PIVOT_MAX_POINTS, f.pivotProximityScore / 10);
        reasons.push(`Near pivot level (${f.pivotProximityScore}/10)`);
    }

    return points;
}

function scoreVolatility(f: FeatureSet, reasons: string[]): number {
    let points = 0;

    const pct = f.atrPercentile;
    if (pct >= 60 && pct <= 85) {
        points += ATR_SWEET_POINTS;
        reasons.push(`ATR percentile ${pct.toFixed(0)} elevated but not extreme`);
    } else if ((pct >= 40 && pct < 60) || (pct > 85 && pct <= 95)) {
        points += ATR_MODERATE_POINTS;
    } else if (pct > 95) {
        points += ATR_EXTREME_POINTS;
        reasons.push(`ATR percentile ${pct.toFixed(0)} too volatile`);
    } else if (pct < 20) {
        points += ATR_QUIET_POINTS;
    }

    const spread = f.bidAskSpreadBps;
    if (spread <= 10) {
        points += SPREAD_TIGHT_POINTS;
        reasons.push(`Tight spread ${spread.toFixed(1)} bps`);
    } else if (spread <= 25) {
        points += SPREAD_OK_POINTS;
    } else if (spread <= 50) {
        points += SPREAD_WIDE_POINTS;
    }

    return points;
}

/**
 * Fixed-weight combination of the three 0–100 sub-scores, rounded to 2dp.
 */
export function combineScores(price: number, volume: number, volatility: number): number {
    const { price: wp, volume: wv, volatility: wx } = SCORE_WEIGHTS;
    const overall = (price * wp + volume * wv + volatility * wx) / (wp + wv + wx);
    return Number(Math.min(100, Math.max(0, overall)).toFixed(2));
}

/**
 * Scores a feature record. Every sub-score and the overall lie in [0, 100].
 */
export function scoreFeatures(features: FeatureSet): ScoreBreakdown {
    const reasons: string[] = [];
    const price = toScore(scorePrice(features, reasons));
    const volume = toScore(scoreVolume(features, reasons));
    const volatility = toScore(scoreVolatility(features, reasons));

    return {
        scores: { price, volume, volatility, overall: combineScores(price, volume, volatility) },
        reasons,
    };
}

// ---------------------------------------------------------------
// TRADE SETUP
// ---------------------------------------------------------------
/**
 * Long-only setup: stop 1.5 ATR below entry, targets at 2.5R and 4R,
 * fixed-fractional sizing. A non-positive risk per share yields a
 * degenerate zero-size setup instead of an error.
 */
export function generateTradeSetup(
    features: Pick<FeatureSet, 'atr'>,
    currentPrice: number,
    policy: RiskPolicy
): TradeSetup {
    const entry = currentPrice;
    const stop = entry - STOP_ATR_MULTIPLIER * features.atr;
    const risk = entry - stop;

    if (!(risk > 0)) {
        return {
            entry,
            stop: entry,
            target1: entry,
            target2: entry,
            positionSizeUsd: 0,
            positionSizeShares: 0,
            rrRatio: 0,
            riskPerShare: 0,
            degenerate: true,
        };
    }

    const target1 = entry + TARGET1_R * risk;
    const target2 = entry + TARGET2_R * risk;
    const { shares, usd } = positionSizing(entry, stop, policy.portfolioValue, policy.riskPct);

    return {
        entry,
        stop,
        target1,
        target2,
        positionSizeUsd: usd,
        positionSizeShares: shares,
        rrRatio: (target1 - entry) / risk,
        riskPerShare: risk,
        degenerate: false,
    };
}
