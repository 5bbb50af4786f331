// src/lib/__tests__/fixtures.ts
// Shared synthetic market data for the test suites.

import type { Bar, FeatureSet, Snapshot } from '../../types';

/**
 * Steady uptrend: close = start + step·i, high/low = close ± 1,
 * open = close − 0.25, constant volume. Every true range is exactly 2.
 */
export function risingBars(count: number, start = 100, step = 0.5, volume = 1_000_000): Bar[] {
    return Array.from({ length: count }, (_, i) => {
        const close = start + step * i;
        return {
            open: close - 0.25,
            high: close + 1,
            low: close - 1,
            close,
            volume,
            timestamp: 1_700_000_000_000 + i * 86_400_000,
        };
    });
}

/** Snapshot at the last close of `risingBars(60)` with a 10-cent spread */
export function risingSnapshot(overrides: Partial<Snapshot> = {}): Snapshot {
    return {
        price: 129.5,
        volume: 1_800_000,
        bid: 129.45,
        ask: 129.55,
        ...overrides,
    };
}

/** Neutral feature record: every scoring rule is off */
export function neutralFeatures(overrides: Partial<FeatureSet> = {}): FeatureSet {
    return {
        currentPrice: 100,
        ema20: 100,
        ema50: 100,
        ema200: 100,
        emaAlignmentBull: false,
        priceVsEma20Pct: 0,
        priceVsEma50Pct: 0,
        rsi14: 80,
        rsiOversold: false,
        rsiOverbought: true,
        atr: 2,
        atrPercent: 2,
        atrPercentile: 30,
        volume: 1_000_000,
        volumeSma20: 1_000_000,
        rvol: 1,
        volumeSpike: false,
        vwap: 102,
        vwapDistancePct: -0.02,
        aboveVwap: false,
        pivotHigh: null,
        pivotLow: null,
        pivotProximityScore: 0,
        dailyRangePct: 2,
        gapVsPrev: 0,
        bidAskSpreadBps: 80,
        marketCap: null,
        barsCount: 60,
        computedAt: 0,
        ...overrides,
    };
}
