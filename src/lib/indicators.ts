// src/lib/indicators.ts
// =============================================================================
// TECHNICAL INDICATORS
// Pure functions – no side effects, no external state
// Used by: featureUtils (feature extraction)
// Series outputs drop the warm-up values, so they are shorter than the input.
// =============================================================================

import * as ti from 'technicalindicators';
import type { Bar, OhlcvData } from '../types';

export const DEFAULT_RSI_PERIOD = 14;
export const DEFAULT_ATR_PERIOD = 14;
export const DEFAULT_PIVOT_WINDOW = 10;

// Pivot proximity bands: max relative distance → points
const PIVOT_PROXIMITY_BANDS: ReadonlyArray<readonly [number, number]> = [
    [0.005, 10],
    [0.01, 8],
    [0.02, 6],
    [0.05, 3],
];

// -----------------------------------------------------------------------------
// 1. HELPERS
// -----------------------------------------------------------------------------
function assertSameLength(name: string, ...series: ReadonlyArray<readonly number[]>): void {
    const expected = series[0]?.length ?? 0;
    for (const s of series) {
        if (s.length !== expected) {
            throw new Error(`${name}: input series must have equal length (got ${series.map(x => x.length).join(', ')})`);
        }
    }
}

/** Bars (oldest first) → column arrays for the indicator functions */
export function toOhlcvData(bars: readonly Bar[], symbol?: string): OhlcvData {
    return {
        symbol,
        timestamps: bars.map(b => b.timestamp ?? 0),
        opens: bars.map(b => b.open),
        highs: bars.map(b => b.high),
        lows: bars.map(b => b.low),
        closes: bars.map(b => b.close),
        volumes: bars.map(b => b.volume),
        length: bars.length,
    };
}

// -----------------------------------------------------------------------------
// 2. MOVING AVERAGES
// -----------------------------------------------------------------------------
export function calculateSMA(values: number[], period: number): number[] {
    if (period <= 0 || values.length < period) return [];
    return ti.sma({ values, period });
}

/**
 * EMA seeded with the SMA of the first `period` values, α = 2/(period+1).
 * Output length is `values.length - period + 1`.
 */
export function calculateEMA(values: number[], period: number): number[] {
    if (period <= 0 || values.length < period) return [];
    return ti.ema({ values, period });
}

// -----------------------------------------------------------------------------
// 3. MOMENTUM
// -----------------------------------------------------------------------------
/**
 * Wilder RSI (values rounded to 2dp). The first value uses the simple average
 * gain/loss of the first `period` changes; an average loss of zero yields 100.
 */
export function calculateRSI(values: number[], period: number = DEFAULT_RSI_PERIOD): number[] {
    if (period <= 0 || values.length < period + 1) return [];
    return ti.rsi({ values, period });
}

// -----------------------------------------------------------------------------
// 4. VOLATILITY
// -----------------------------------------------------------------------------
/**
 * Wilder ATR. True ranges start at the second bar; the first ATR is the mean
 * of the first `period` true ranges.
 */
export function calculateATR(
    highs: number[],
    lows: number[],
    closes: number[],
    period: number = DEFAULT_ATR_PERIOD
): number[] {
    assertSameLength('calculateATR', highs, lows, closes);
    if (period <= 0 || highs.length < period + 1) return [];
    return ti.atr({ high: highs, low: lows, close: closes, period });
}

// -----------------------------------------------------------------------------
// 5. VOLUME-WEIGHTED PRICE
// -----------------------------------------------------------------------------
/**
 * Running VWAP over the whole series, one value per bar. Where cumulative
 * volume is still zero the bar's close is emitted.
 */
export function calculateVWAP(highs: number[], lows: number[], closes: number[], volumes: number[]): number[] {
    assertSameLength('calculateVWAP', highs, lows, closes, volumes);

    const result: number[] = [];
    let cumulativePv = 0;
    let cumulativeVolume = 0;
    for (let i = 0; i < closes.length; i++) {
        const typical = (highs[i] + lows[i] + closes[i]) / 3;
        cumulativePv += typical * volumes[i];
        cumulativeVolume += volumes[i];
        result.push(cumulativeVolume > 0 ? cumulativePv / cumulativeVolume : closes[i]);
    }
    return result;
}

// -----------------------------------------------------------------------------
// 6. PIVOTS (support / resistance)
// -----------------------------------------------------------------------------
function findPivot(values: number[], window: number, kind: 'high' | 'low'): number | null {
    if (window <= 0) return null;
    const slice = values.slice(-3 * window);
    const beats = (a: number, b: number): boolean => (kind === 'high' ? a > b : a < b);

    let best: number | null = null;
    for (let i = window; i < slice.length - window; i++) {
        let isPivot = true;
        for (let j = i - window; j <= i + window && isPivot; j++) {
            if (j !== i && !beats(slice[i], slice[j])) isPivot = false;
        }
        if (isPivot && (best === null || beats(slice[i], best))) {
            best = slice[i];
        }
    }
    return best;
}

/**
 * Highest bar in the trailing `3 × window` bars that is strictly above every
 * neighbour within ±window. Null when none qualifies.
 */
export function pivotHigh(highs: number[], window: number = DEFAULT_PIVOT_WINDOW): number | null {
    return findPivot(highs, window, 'high');
}

/** Mirror of pivotHigh for lows */
export function pivotLow(lows: number[], window: number = DEFAULT_PIVOT_WINDOW): number | null {
    return findPivot(lows, window, 'low');
}

/**
 * 0–10 score for how close `currentPrice` sits to the detected pivots.
 */
export function pivotProximityScore(
    currentPrice: number,
    highs: number[],
    lows: number[],
    window: number = DEFAULT_PIVOT_WINDOW
): number {
    if (currentPrice <= 0) return 0;
    const pivots = [pivotHigh(highs, window), pivotLow(lows, window)];

    let score = 0;
    for (const pivot of pivots) {
        if (pivot === null) continue;
        const distance = Math.abs(currentPrice - pivot) / currentPrice;
        const band = PIVOT_PROXIMITY_BANDS.find(([maxDistance]) => distance <= maxDistance);
        score = Math.max(score, band ? band[1] : 0);
    }
    return score;
}

// -----------------------------------------------------------------------------
// 7. DISTRIBUTION HELPERS
// -----------------------------------------------------------------------------
/** Share of `values` ≤ `current`, ×100. Empty input → 50. */
export function percentileRank(values: readonly number[], current: number): number {
    if (values.length === 0) return 50;
    const atOrBelow = values.filter(v => v <= current).length;
    return (atOrBelow / values.length) * 100;
}
