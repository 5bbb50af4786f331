// src/lib/scanner.ts
// =============================================================================
// MARKET SCANNER – CORE PIPELINE
// bars + snapshot → features → scores → trade setup → probability & costs
// → guardrails → Opportunity
//
// scoreSymbol() is pure; MarketScanner adds the I/O around it (bounded
// concurrency, retries on data fetches, liquidity pre-filter, persistence).
// =============================================================================

import { randomUUID } from 'crypto';
import type {
    Bar,
    BarsSource,
    FeatureScores,
    Opportunity,
    OpportunitySink,
    ReferenceData,
    ScannerConfig,
    Snapshot,
} from '../types';
import { createLogger } from './logger';
import { errorMessage, InsufficientDataError } from './errors';
import { computeFeatures } from './utils/featureUtils';
import { generateTradeSetup, scoreFeatures } from './strategy';
import { costsInR, netExpectedR } from './utils/riskUtils';
import { defaultCalibrator, type ProbabilityCalibrator } from './services/probabilityCalibrator';
import { evaluateGuardrails } from './services/guardrails';

const logger = createLogger('MarketScanner');

export const OPPORTUNITY_SCHEMA_VERSION = '1.0.0';

export type ScoreOutcome =
    | { kind: 'opportunity'; opportunity: Opportunity }
    | {
          kind: 'below_threshold';
          symbol: string;
          scores: FeatureScores;
          guardrailStatus: 'blocked';
          reason: string;
      };

export interface ScoreOptions {
    calibrator?: ProbabilityCalibrator;
    refData?: ReferenceData | null;
    /** Epoch ms stamped on the features and the opportunity */
    now?: number;
    idFactory?: () => string;
}

function freezeOpportunity(opportunity: Opportunity): Opportunity {
    Object.freeze(opportunity.scores);
    Object.freeze(opportunity.setup);
    Object.freeze(opportunity.risk);
    Object.freeze(opportunity.features);
    Object.freeze(opportunity.reasons);
    return Object.freeze(opportunity);
}

/**
 * Runs the full pipeline for one symbol.
 *
 * Scores under `config.minScore` short-circuit before a setup is built and
 * come back as a blocked `below_threshold` outcome.
 *
 * @throws InsufficientDataError for fewer than 50 bars
 * @throws MarketDataError for invalid bars or snapshot
 */
export function scoreSymbol(
    symbol: string,
    bars: readonly Bar[],
    snapshot: Snapshot,
    config: ScannerConfig,
    options: ScoreOptions = {}
): ScoreOutcome {
    const now = options.now ?? Date.now();
    const calibrator = options.calibrator ?? defaultCalibrator;

    const features = computeFeatures(bars, { ...snapshot, symbol }, options.refData, now);
    const { scores, reasons } = scoreFeatures(features);

    if (scores.overall < config.minScore) {
        return {
            kind: 'below_threshold',
            symbol,
            scores,
            guardrailStatus: 'blocked',
            reason: `Score ${scores.overall.toFixed(2)} below minimum ${config.minScore}`,
        };
    }

    const setup = generateTradeSetup(features, features.currentPrice, {
        portfolioValue: config.portfolioValue,
        riskPct: config.riskPctPerTrade,
    });

    const pTarget = calibrator.toProbability(scores.overall);
    const slippageBps = features.bidAskSpreadBps + config.impactBps;
    const costsR = costsInR(slippageBps, config.feesUsd, setup.entry, setup.riskPerShare);
    const netR = netExpectedR(pTarget, setup.rrRatio, costsR);

    const guardrail = evaluateGuardrails(
        { setup, netExpectedR: netR, signalScore: scores.overall, atrPercent: features.atrPercent },
        config
    );

    return {
        kind: 'opportunity',
        opportunity: freezeOpportunity({
            id: (options.idFactory ?? randomUUID)(),
            symbol,
            timestamp: now,
            signalScore: scores.overall,
            scores,
            setup,
            risk: {
                pTarget: Number(pTarget.toFixed(4)),
                netExpectedR: Number(netR.toFixed(4)),
                costsR: Number(costsR.toFixed(4)),
                slippageBps: Number(slippageBps.toFixed(2)),
            },
            features,
            guardrailStatus: guardrail.status,
            guardrailReason: guardrail.reason,
            reasons,
            version: OPPORTUNITY_SCHEMA_VERSION,
        }),
    };
}

export function passesLiquidityFilter(snapshot: Snapshot, filter: ScannerConfig['liquidity']): boolean {
    return snapshot.volume > filter.minVolume && snapshot.price > filter.minPrice && snapshot.price < filter.maxPrice;
}

type ScannerOptions = {
    concurrency?: number;
    retries?: number;
    retryDelayMs?: number;
    barsLookback?: number;
    calibrator?: ProbabilityCalibrator;
    sink?: OpportunitySink | null;
};

export interface ScanStats {
    requested: number;
    filtered: number;
    belowThreshold: number;
    insufficientData: number;
    failed: number;
    opportunities: number;
}

const emptyStats = (requested: number): ScanStats => ({
    requested,
    filtered: 0,
    belowThreshold: 0,
    insufficientData: 0,
    failed: 0,
    opportunities: 0,
});

/**
 * Universe scanner. One failing symbol never aborts the scan.
 */
export class MarketScanner {
    private readonly opts: Required<ScannerOptions>;
    private lastStats: ScanStats = emptyStats(0);

    /**
     * @param source - Market data provider (bars + snapshots).
     * @param config - Risk policy and thresholds; never read from env here.
     * @param opts - Concurrency, retry and persistence options.
     */
    constructor(
        private readonly source: BarsSource,
        private readonly config: ScannerConfig,
        opts: ScannerOptions = {}
    ) {
        this.opts = {
            concurrency: 4,
            retries: 2,
            retryDelayMs: 300,
            barsLookback: 250,
            calibrator: defaultCalibrator,
            sink: null,
            ...opts,
        };

        logger.info('MarketScanner initialized', {
            concurrency: this.opts.concurrency,
            calibrator: this.opts.calibrator.name,
            persistence: this.opts.sink !== null,
        });
    }

    /** Counters from the most recent scanUniverse() call */
    public get stats(): Readonly<ScanStats> {
        return this.lastStats;
    }

    /**
     * Scores every symbol and returns the opportunities ordered by overall
     * score (highest first), truncated to `limit`.
     */
    public async scanUniverse(
        symbols: readonly string[],
        minScore: number = this.config.minScore,
        limit: number = 50
    ): Promise<Opportunity[]> {
        const start = Date.now();
        const queue = [...new Set(symbols.map(s => s.trim().toUpperCase()).filter(s => s.length > 0))];
        const stats = emptyStats(queue.length);
        const found: Opportunity[] = [];
        const config: ScannerConfig = { ...this.config, minScore };

        logger.info(`Scanning ${queue.length} symbols`, { minScore, limit });

        const workers = Array.from({ length: Math.min(this.opts.concurrency, queue.length) }, () =>
            this.processWorker(queue, config, found, stats)
        );
        await Promise.all(workers);

        const result = found.sort((a, b) => b.scores.overall - a.scores.overall).slice(0, Math.max(0, limit));
        stats.opportunities = result.length;
        this.lastStats = stats;

        if (this.opts.sink && result.length > 0) {
            try {
                await this.opts.sink.saveOpportunities(result);
            } catch (err) {
                logger.error('Failed to persist opportunities', { error: errorMessage(err), count: result.length });
            }
        }

        logger.info(`Scan finished in ${Date.now() - start}ms`, { ...stats });
        return result;
    }

    /**
     * Single-symbol analysis without the liquidity filter or the score cut.
     * Null when the source has no snapshot or too few bars.
     */
    public async scanSymbol(symbol: string): Promise<Opportunity | null> {
        const upper = symbol.trim().toUpperCase();
        const snapshot = await this.withRetries(() => this.source.getSnapshot(upper), this.opts.retries);
        if (!snapshot) return null;

        try {
            const outcome = await this.analyze(upper, snapshot, { ...this.config, minScore: 0 });
            return outcome.kind === 'opportunity' ? outcome.opportunity : null;
        } catch (err) {
            if (err instanceof InsufficientDataError) {
                logger.debug(err.message);
                return null;
            }
            throw err;
        }
    }

    private async processWorker(
        queue: string[],
        config: ScannerConfig,
        found: Opportunity[],
        stats: ScanStats
    ): Promise<void> {
        while (queue.length) {
            const symbol = queue.shift();
            if (!symbol) break;
            await this.processSymbol(symbol, config, found, stats);
        }
    }

    private async processSymbol(
        symbol: string,
        config: ScannerConfig,
        found: Opportunity[],
        stats: ScanStats
    ): Promise<void> {
        try {
            const snapshot = await this.withRetries(() => this.source.getSnapshot(symbol), this.opts.retries);
            if (!snapshot || !passesLiquidityFilter(snapshot, config.liquidity)) {
                stats.filtered++;
                return;
            }

            const outcome = await this.analyze(symbol, snapshot, config);
            if (outcome.kind === 'below_threshold') {
                stats.belowThreshold++;
                logger.debug(`${symbol}: ${outcome.reason}`);
                return;
            }
            found.push(outcome.opportunity);
        } catch (err) {
            if (err instanceof InsufficientDataError) {
                stats.insufficientData++;
                logger.debug(`Skipping ${symbol}: ${err.message}`);
                return;
            }
            stats.failed++;
            logger.warn(`Failed processing ${symbol}`, { error: errorMessage(err) });
        }
    }

    private async analyze(symbol: string, snapshot: Snapshot, config: ScannerConfig): Promise<ScoreOutcome> {
        const bars = await this.withRetries(() => this.source.getBars(symbol, this.opts.barsLookback), this.opts.retries);
        const refData = await this.withRetries(() => this.fetchReferenceData(symbol), this.opts.retries);

        return scoreSymbol(symbol, bars, snapshot, config, {
            calibrator: this.opts.calibrator,
            refData,
        });
    }

    private async fetchReferenceData(symbol: string): Promise<ReferenceData | null> {
        return this.source.getReferenceData ? this.source.getReferenceData(symbol) : null;
    }

    private async withRetries<T>(fn: () => Promise<T>, retries: number): Promise<T> {
        let lastErr: unknown;
        for (let i = 0; i <= retries; i++) {
            try {
                return await fn();
            } catch (err) {
                lastErr = err;
                if (i < retries) {
                    const delay = this.opts.retryDelayMs * (i + 1);
                    logger.warn(`Retry ${i + 1}/${retries} after error`, { error: errorMessage(err) });
                    await new Promise(r => setTimeout(r, delay));
                }
            }
        }
        throw lastErr;
    }
}
