// src/lib/utils/featureUtils.ts
// =============================================================================
// FEATURE EXTRACTION
// Bars + snapshot (+ optional reference data) → typed FeatureSet.
// Inputs are validated here once; downstream stages trust the record.
// =============================================================================

import { z } from 'zod';
import type { Bar, FeatureSet, ReferenceData, Snapshot } from '../../types';
import { InsufficientDataError, MarketDataError } from '../errors';
import {
    calculateATR,
    calculateEMA,
    calculateRSI,
    calculateSMA,
    calculateVWAP,
    percentileRank,
    pivotHigh,
    pivotLow,
    pivotProximityScore,
    toOhlcvData,
} from '../indicators';

export const MIN_BARS = 50;

const EMA_FAST = 20;
const EMA_MEDIUM = 50;
const EMA_SLOW = 200;
const VOLUME_SMA_PERIOD = 20;
const ATR_PERCENTILE_LOOKBACK = 20;
const DEFAULT_SPREAD_BPS = 50;
const RSI_FALLBACK = 50;
const ATR_FALLBACK_PCT = 0.02;
const VOLUME_SPIKE_MULTIPLIER = 2;

const positivePrice = z.number().finite().positive();
const volume = z.number().finite().nonnegative();

const BarSchema = z.object({
    open: positivePrice,
    high: positivePrice,
    low: positivePrice,
    close: positivePrice,
    volume,
    timestamp: z.number().optional(),
});

const SnapshotSchema = z.object({
    price: positivePrice,
    volume,
    bid: z.number().finite().optional(),
    ask: z.number().finite().optional(),
    prevDay: BarSchema.optional(),
});

function validateInputs(bars: readonly Bar[], snapshot: Snapshot, symbol?: string): void {
    const barsResult = z.array(BarSchema).safeParse(bars);
    if (!barsResult.success) {
        const issue = barsResult.error.issues[0];
        throw new MarketDataError(`Invalid bar data${symbol ? ` for ${symbol}` : ''}: ${issue.path.join('.')} ${issue.message}`, {
            symbol,
            path: issue.path,
        });
    }
    const snapResult = SnapshotSchema.safeParse(snapshot);
    if (!snapResult.success) {
        const issue = snapResult.error.issues[0];
        throw new MarketDataError(`Invalid snapshot${symbol ? ` for ${symbol}` : ''}: ${issue.path.join('.')} ${issue.message}`, {
            symbol,
            path: issue.path,
        });
    }
}

/**
 * Spread in basis points of the mid price; 50 bps when either side is missing
 * or non-positive.
 */
export function calculateSpreadBps(bid: number | undefined, ask: number | undefined): number {
    if (bid === undefined || ask === undefined || bid <= 0 || ask <= 0) return DEFAULT_SPREAD_BPS;
    const mid = (ask + bid) / 2;
    return ((ask - bid) / mid) * 10_000;
}

function last(values: number[], fallback: number): number {
    return values.length > 0 ? values[values.length - 1] : fallback;
}

/**
 * @throws InsufficientDataError when fewer than 50 bars are supplied
 * @throws MarketDataError when bars or snapshot fail validation
 */
export function computeFeatures(
    bars: readonly Bar[],
    snapshot: Snapshot,
    refData?: ReferenceData | null,
    now: number = Date.now()
): FeatureSet {
    const symbol = snapshot.symbol;
    if (bars.length < MIN_BARS) {
        throw new InsufficientDataError(MIN_BARS, bars.length, symbol);
    }
    validateInputs(bars, snapshot, symbol);

    const { opens, highs, lows, closes, volumes } = toOhlcvData(bars);
    const currentPrice = snapshot.price;
    const currentVolume = snapshot.volume;

    // ----- 1. Trend -----
    const ema20 = last(calculateEMA(closes, EMA_FAST), currentPrice);
    const ema50 = last(calculateEMA(closes, EMA_MEDIUM), currentPrice);
    const ema200 = last(calculateEMA(closes, EMA_SLOW), currentPrice);

    // ----- 2. Momentum -----
    const rsi14 = last(calculateRSI(closes), RSI_FALLBACK);

    // ----- 3. Volatility -----
    const atrSeries = calculateATR(highs, lows, closes);
    const atr = last(atrSeries, ATR_FALLBACK_PCT * currentPrice);

    // ----- 4. Volume -----
    const volumeSma20 = last(calculateSMA(volumes, VOLUME_SMA_PERIOD), currentVolume);
    const rvol = volumeSma20 > 0 ? currentVolume / volumeSma20 : 1.0;

    // ----- 5. VWAP -----
    const vwap = last(calculateVWAP(highs, lows, closes, volumes), currentPrice);
    const vwapDistancePct = (currentPrice - vwap) / vwap;

    // ----- 6. Structure -----
    const lastBar = bars[bars.length - 1];
    const prevClose = snapshot.prevDay?.close ?? closes[closes.length - 2];

    return {
        currentPrice,

        ema20,
        ema50,
        ema200,
        emaAlignmentBull: ema20 > ema50 && ema50 > ema200,
        priceVsEma20Pct: (currentPrice - ema20) / ema20,
        priceVsEma50Pct: (currentPrice - ema50) / ema50,

        rsi14,
        rsiOversold: rsi14 < 30,
        rsiOverbought: rsi14 > 70,

        atr,
        atrPercent: (atr / currentPrice) * 100,
        atrPercentile: percentileRank(atrSeries.slice(-ATR_PERCENTILE_LOOKBACK), atr),

        volume: currentVolume,
        volumeSma20,
        rvol,
        volumeSpike: currentVolume > VOLUME_SPIKE_MULTIPLIER * volumeSma20,

        vwap,
        vwapDistancePct,
        aboveVwap: currentPrice > vwap,

        pivotHigh: pivotHigh(highs),
        pivotLow: pivotLow(lows),
        pivotProximityScore: pivotProximityScore(currentPrice, highs, lows),

        dailyRangePct: ((lastBar.high - lastBar.low) / lastBar.close) * 100,
        gapVsPrev: (opens[opens.length - 1] - prevClose) / prevClose,
        bidAskSpreadBps: calculateSpreadBps(snapshot.bid, snapshot.ask),

        marketCap: refData?.marketCap ?? null,
        barsCount: bars.length,
        computedAt: now,
    };
}
