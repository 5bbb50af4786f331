// src/types/index.ts
// =============================================================================
// CORE TYPE DEFINITIONS – SCANNER PIPELINE
// Shared by indicators, feature extraction, scoring, guardrails, scanner and DB.
// Monte Carlo types live in ./simulation
// =============================================================================

/**
 * One OHLCV observation. Sequences are ordered oldest first.
 */
export interface Bar {
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
    /** Unix epoch milliseconds */
    timestamp?: number;
}

/**
 * Column-oriented view of a bar sequence – every array has the same length.
 * This is the shape the indicator functions consume.
 */
export interface OhlcvData {
    symbol?: string;
    timestamps: number[];
    opens: number[];
    highs: number[];
    lows: number[];
    closes: number[];
    volumes: number[];
    length: number;
}

/**
 * Current-moment view of a ticker, supplied fresh per scan.
 */
export interface Snapshot {
    symbol?: string;
    /** Last traded / last close price */
    price: number;
    /** Session volume so far */
    volume: number;
    bid?: number;
    ask?: number;
    /** Previous trading day bar, when the data source provides it */
    prevDay?: Bar;
    timestamp?: number;
}

/** Ticker overview data – optional, only market cap is used */
export interface ReferenceData {
    marketCap?: number;
}

/**
 * Typed feature record built once per symbol per scan.
 *
 * Fractions are signed (0.02 = 2%). Only `atrPercent` and `dailyRangePct`
 * are multiplied by 100; `priceVsEma20Pct`, `priceVsEma50Pct` and
 * `vwapDistancePct` stay fractions.
 */
export interface FeatureSet {
    currentPrice: number;

    // ----- Trend -----
    ema20: number;
    ema50: number;
    ema200: number;
    emaAlignmentBull: boolean;
    priceVsEma20Pct: number;
    priceVsEma50Pct: number;

    // ----- Momentum -----
    rsi14: number;
    rsiOversold: boolean;
    rsiOverbought: boolean;

    // ----- Volatility -----
    atr: number;
    atrPercent: number;
    /** 0–100 rank of the current ATR within the trailing 20 ATR values */
    atrPercentile: number;

    // ----- Volume -----
    volume: number;
    volumeSma20: number;
    rvol: number;
    volumeSpike: boolean;

    // ----- VWAP -----
    vwap: number;
    vwapDistancePct: number;
    aboveVwap: boolean;

    // ----- Structure -----
    pivotHigh: number | null;
    pivotLow: number | null;
    /** 0–10 */
    pivotProximityScore: number;

    // ----- Microstructure -----
    dailyRangePct: number;
    gapVsPrev: number;
    bidAskSpreadBps: number;

    marketCap: number | null;
    barsCount: number;
    computedAt: number;
}

/** Sub-scores and weighted overall, each in [0, 100] */
export interface FeatureScores {
    price: number;
    volume: number;
    volatility: number;
    overall: number;
}

export interface TradeSetup {
    entry: number;
    stop: number;
    target1: number;
    target2?: number;
    positionSizeUsd: number;
    positionSizeShares: number;
    rrRatio: number;
    riskPerShare: number;
    /** True when risk per share was not positive – zero size, zero reward */
    degenerate: boolean;
}

/** Opportunity-level risk figures */
export interface RiskMetrics {
    pTarget: number;
    netExpectedR: number;
    costsR: number;
    slippageBps: number;
}

export type GuardrailStatus = 'approved' | 'review' | 'blocked';

export type GuardrailCheck =
    | 'position_risk'
    | 'rr_ratio'
    | 'net_expected_r'
    | 'signal_score'
    | 'atr_percent'
    | 'min_score'
    | 'passed';

export interface GuardrailResult {
    status: GuardrailStatus;
    check: GuardrailCheck;
    reason: string;
}

/**
 * Terminal output of the scanner for one symbol. Frozen once built.
 */
export interface Opportunity {
    id: string;
    symbol: string;
    timestamp: number;
    /** Same value as `scores.overall` */
    signalScore: number;
    scores: FeatureScores;
    setup: TradeSetup;
    risk: RiskMetrics;
    features: FeatureSet;
    guardrailStatus: GuardrailStatus;
    guardrailReason: string;
    /** Human-readable list of scoring buckets that fired */
    reasons: string[];
    version: string;
}

/**
 * Explicit configuration passed into the core. Nothing in the pipeline reads
 * the environment – see buildScannerConfig() in config/settings.
 */
export interface ScannerConfig {
    portfolioValue: number;
    riskPctPerTrade: number;
    /** Portfolio heat cap; never below 2 × riskPctPerTrade (enforced on the env config) */
    maxHeatPct: number;
    /** Opportunities below this overall score are not built (0–100) */
    minScore: number;
    /** Scores below this are sent to review (0–100) */
    reviewScoreThreshold: number;
    minRrRatio: number;
    minNetExpectedR: number;
    maxAtrPercent: number;
    feesUsd: number;
    /** Added on top of the quoted spread for the slippage assumption */
    impactBps: number;
    liquidity: LiquidityFilter;
}

export interface LiquidityFilter {
    minVolume: number;
    minPrice: number;
    maxPrice: number;
}

// =============================================================================
// COLLABORATOR INTERFACES
// =============================================================================

/** Market data provider consumed by MarketScanner */
export interface BarsSource {
    /** Most recent `count` bars, oldest first */
    getBars(symbol: string, count: number): Promise<Bar[]>;
    getSnapshot(symbol: string): Promise<Snapshot | null>;
    getReferenceData?(symbol: string): Promise<ReferenceData | null>;
}

/** Persistence sink for scan results */
export interface OpportunitySink {
    saveOpportunities(opportunities: readonly Opportunity[]): Promise<void>;
}
