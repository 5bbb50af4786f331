// src/lib/config/settings.ts
// =============================================================================
// CENTRAL CONFIGURATION
// Zod + dotenv validation & defaults for the entry points.
// The scanner and Monte Carlo core never import this module's `config` –
// callers turn it into an explicit ScannerConfig / SimulationParameters.
// =============================================================================

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { ScannerConfig } from '../../types';
import type { SimulationParameters } from '../../types/simulation';

// Load .env early
dotenvConfig();

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform(v => v === 'true' || v === '1');

/**
 * Zod schema – validates every config value at startup
 */
export const ConfigSchema = z
    .object({
        // ──────────────────────────────────────────────────────────────
        // Core Environment
        // ──────────────────────────────────────────────────────────────
        ENV: z.enum(['dev', 'test', 'prod']).default('dev'),
        LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        LOG_TO_FILE: booleanFlag,

        // ──────────────────────────────────────────────────────────────
        // Database (only needed when persisting opportunities)
        // ──────────────────────────────────────────────────────────────
        DATABASE_URL: z.string().url().optional(),

        // ──────────────────────────────────────────────────────────────
        // Universe
        // ──────────────────────────────────────────────────────────────
        SYMBOLS: z.string().default('AAPL,MSFT,NVDA,AMD,TSLA').transform(str =>
            str
                .split(',')
                .map(s => s.trim().toUpperCase())
                .filter(s => s.length > 0)
        ),
        SCAN_LIMIT: z.coerce.number().int().positive().default(50),
        SCAN_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
        BARS_LOOKBACK: z.coerce.number().int().min(50).default(250),
        FIXTURES_DIR: z.string().default('./fixtures'),

        // ──────────────────────────────────────────────────────────────
        // Scoring thresholds (0–100 scale)
        // ──────────────────────────────────────────────────────────────
        MIN_SCORE: z.coerce.number().min(0).max(100).default(60),
        REVIEW_SCORE: z.coerce.number().min(0).max(100).default(50),

        // ──────────────────────────────────────────────────────────────
        // Risk policy
        // ──────────────────────────────────────────────────────────────
        PORTFOLIO_VALUE: z.coerce.number().positive().default(100_000),
        RISK_PCT_PER_TRADE: z.coerce.number().min(0.0001).max(0.1).default(0.005),
        MAX_HEAT_PCT: z.coerce.number().min(0.0001).max(1).default(0.02),
        MIN_RR_RATIO: z.coerce.number().positive().default(2.0),
        MIN_NET_EXPECTED_R: z.coerce.number().default(0.05),
        MAX_ATR_PERCENT: z.coerce.number().positive().default(5.0),

        // ──────────────────────────────────────────────────────────────
        // Cost assumptions
        // ──────────────────────────────────────────────────────────────
        FEES_USD: z.coerce.number().min(0).default(1.0),
        IMPACT_BPS: z.coerce.number().min(0).default(5),

        // ──────────────────────────────────────────────────────────────
        // Liquidity pre-filter
        // ──────────────────────────────────────────────────────────────
        MIN_VOLUME: z.coerce.number().min(0).default(1_000_000),
        MIN_PRICE: z.coerce.number().min(0).default(5),
        MAX_PRICE: z.coerce.number().positive().default(500),

        // ──────────────────────────────────────────────────────────────
        // Monte Carlo defaults (CLI)
        // ──────────────────────────────────────────────────────────────
        MC_P_WIN: z.coerce.number().default(0.45),
        MC_R_WIN: z.coerce.number().default(2.5),
        MC_RISK_PCT: z.coerce.number().default(0.005),
        MC_TRADES_PER_WEEK: z.coerce.number().default(10),
        MC_WEEKS: z.coerce.number().default(52),
        MC_COST_PER_TRADE_USD: z.coerce.number().default(1),
        MC_SLIPPAGE_BPS: z.coerce.number().default(10),
        MC_STARTING_CAPITAL: z.coerce.number().default(10_000),
        MC_NUM_SIMULATIONS: z.coerce.number().default(1_000),
        MC_SEED: z.coerce.number().int().optional(),
    })
    // Heat must leave room for at least one position at the blocking limit
    .refine(env => env.MAX_HEAT_PCT >= 2 * env.RISK_PCT_PER_TRADE, {
        message: 'MAX_HEAT_PCT must be at least 2 × RISK_PCT_PER_TRADE',
        path: ['MAX_HEAT_PCT'],
    });

/**
 * Parse & validate – throws on startup if config is wrong
 */
const rawConfig = ConfigSchema.parse(process.env);

export const config = {
    env: rawConfig.ENV,
    log_level: rawConfig.LOG_LEVEL,
    logToFile: rawConfig.LOG_TO_FILE,

    /** Full MySQL connection URL – undefined disables persistence */
    databaseUrl: rawConfig.DATABASE_URL,

    symbols: rawConfig.SYMBOLS,

    scanner: {
        limit: rawConfig.SCAN_LIMIT,
        concurrency: rawConfig.SCAN_CONCURRENCY,
        barsLookback: rawConfig.BARS_LOOKBACK,
        fixturesDir: rawConfig.FIXTURES_DIR,
        minScore: rawConfig.MIN_SCORE,
        reviewScore: rawConfig.REVIEW_SCORE,
        liquidity: {
            minVolume: rawConfig.MIN_VOLUME,
            minPrice: rawConfig.MIN_PRICE,
            maxPrice: rawConfig.MAX_PRICE,
        },
    },

    risk: {
        portfolioValue: rawConfig.PORTFOLIO_VALUE,
        riskPctPerTrade: rawConfig.RISK_PCT_PER_TRADE,
        maxHeatPct: rawConfig.MAX_HEAT_PCT,
        minRrRatio: rawConfig.MIN_RR_RATIO,
        minNetExpectedR: rawConfig.MIN_NET_EXPECTED_R,
        maxAtrPercent: rawConfig.MAX_ATR_PERCENT,
        feesUsd: rawConfig.FEES_USD,
        impactBps: rawConfig.IMPACT_BPS,
    },

    /** Unvalidated – validateSimulationParameters() owns the bounds */
    monteCarlo: {
        pWin: rawConfig.MC_P_WIN,
        rWin: rawConfig.MC_R_WIN,
        riskPct: rawConfig.MC_RISK_PCT,
        tradesPerWeek: rawConfig.MC_TRADES_PER_WEEK,
        weeks: rawConfig.MC_WEEKS,
        costPerTradeUsd: rawConfig.MC_COST_PER_TRADE_USD,
        slippageBps: rawConfig.MC_SLIPPAGE_BPS,
        startingCapital: rawConfig.MC_STARTING_CAPITAL,
        numSimulations: rawConfig.MC_NUM_SIMULATIONS,
        seed: rawConfig.MC_SEED,
    } satisfies SimulationParameters,
};

export type Config = typeof config;

/**
 * Env-free defaults for library callers and tests.
 */
export const DEFAULT_SCANNER_CONFIG: Readonly<ScannerConfig> = Object.freeze({
    portfolioValue: 100_000,
    riskPctPerTrade: 0.005,
    maxHeatPct: 0.02,
    minScore: 60,
    reviewScoreThreshold: 50,
    minRrRatio: 2.0,
    minNetExpectedR: 0.05,
    maxAtrPercent: 5.0,
    feesUsd: 1.0,
    impactBps: 5,
    liquidity: Object.freeze({ minVolume: 1_000_000, minPrice: 5, maxPrice: 500 }),
});

/**
 * Turns the env-driven config into the explicit value the core consumes.
 */
export function buildScannerConfig(source: Config = config): ScannerConfig {
    return {
        portfolioValue: source.risk.portfolioValue,
        riskPctPerTrade: source.risk.riskPctPerTrade,
        maxHeatPct: source.risk.maxHeatPct,
        minScore: source.scanner.minScore,
        reviewScoreThreshold: source.scanner.reviewScore,
        minRrRatio: source.risk.minRrRatio,
        minNetExpectedR: source.risk.minNetExpectedR,
        maxAtrPercent: source.risk.maxAtrPercent,
        feesUsd: source.risk.feesUsd,
        impactBps: source.risk.impactBps,
        liquidity: { ...source.scanner.liquidity },
    };
}
