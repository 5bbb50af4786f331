// src/lib/services/monteCarlo.ts
// =============================================================================
// MONTE CARLO RISK ENGINE
//
// Simulates numSimulations independent equity paths of a fixed-fractional
// strategy (win → +rWin·risk, loss → −risk, minus costs) and derives
// distribution statistics. Runs are reproducible from (params, seed).
//
// Grids are stored as one Float64Array per path (row-major).
// =============================================================================

import * as ss from 'simple-statistics';
import { z } from 'zod';
import { createLogger } from '../logger';
import { InvalidParameterError } from '../errors';
import { createRng, randomSeed } from '../utils/random';
import type {
    EquityPoint,
    PromotionGate,
    SimulationParameters,
    SimulationReport,
    SimulationResults,
    SimulationRiskMetrics,
} from '../../types/simulation';

const logger = createLogger('MonteCarlo');

const PERIODS_PER_YEAR = 52;
const MAX_REPORT_PATHS = 20;
const MAX_DISTRIBUTION_POINTS = 1000;
// Below this the return series is treated as constant
const MIN_RETURN_STD = 1e-12;

/** Strategy promotion thresholds */
export const PROMOTION_GATES = Object.freeze({
    MC_PROB_DOUBLE_MIN: 0.4,
    MC_MAX_DRAWDOWN_P95: 0.2,
    EXPECTANCY_MIN_R: 0.1,
});

// ----- 1. VALIDATION -----
const SimulationParametersSchema = z.object({
    pWin: z.number().finite().min(0).max(1),
    rWin: z.number().finite().positive().max(10),
    riskPct: z.number().finite().positive().max(0.1),
    tradesPerWeek: z.number().int().positive().max(100),
    weeks: z.number().int().positive().max(520),
    costPerTradeUsd: z.number().finite().min(0),
    slippageBps: z.number().finite().min(0),
    startingCapital: z.number().finite().positive().default(10_000),
    numSimulations: z.number().int().positive().max(10_000).default(1_000),
    seed: z.number().int().optional(),
});

export type SimulationInput = z.input<typeof SimulationParametersSchema>;

/**
 * Checks every bound before any work is done.
 * @throws InvalidParameterError naming the first offending field
 */
export function validateSimulationParameters(input: SimulationInput): SimulationParameters {
    const result = SimulationParametersSchema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue.path.length > 0 ? issue.path.join('.') : 'params';
        throw new InvalidParameterError(field, issue.message, { issues: result.error.issues });
    }
    return result.data;
}

// ----- 2. SIMULATION -----
/**
 * Per-trade fractional return for a win or a loss, net of the fixed cost
 * (as a fraction of starting capital) and slippage (as a fraction of risk).
 */
export function tradeReturnFor(win: boolean, params: SimulationParameters): number {
    const gross = win ? params.rWin * params.riskPct : -params.riskPct;
    const costFraction = params.costPerTradeUsd / params.startingCapital;
    const slippageFraction = (params.slippageBps / 10_000) * params.riskPct;
    return gross - costFraction - slippageFraction;
}

export function runSimulation(input: SimulationInput): SimulationResults {
    const validated = validateSimulationParameters(input);
    const seed = validated.seed ?? randomSeed();
    const params: Required<SimulationParameters> = { ...validated, seed };

    const totalTrades = params.tradesPerWeek * params.weeks;
    const winReturn = tradeReturnFor(true, params);
    const lossReturn = tradeReturnFor(false, params);
    const rng = createRng(seed);

    logger.debug('Running simulation', { paths: params.numSimulations, totalTrades, seed });

    const equityPaths: Float64Array[] = [];
    const tradeReturns: Float64Array[] = [];
    for (let p = 0; p < params.numSimulations; p++) {
        const returns = new Float64Array(totalTrades);
        const equity = new Float64Array(totalTrades + 1);
        equity[0] = params.startingCapital;

        for (let t = 0; t < totalTrades; t++) {
            const r = rng() < params.pWin ? winReturn : lossReturn;
            returns[t] = r;
            // Ruin is absorbing – equity never goes negative
            equity[t + 1] = Math.max(0, equity[t] * (1 + r));
        }

        tradeReturns.push(returns);
        equityPaths.push(equity);
    }

    const finalEquity = Float64Array.from(equityPaths, path => path[totalTrades]);
    const maxDrawdowns = calculateMaxDrawdowns(equityPaths);
    const finals = Array.from(finalEquity);
    const capital = params.startingCapital;

    return Object.freeze({
        params: Object.freeze(params),
        seed,
        totalTrades,
        equityPaths,
        tradeReturns,
        finalEquity,
        maxDrawdowns,
        meanFinalEquity: ss.mean(finals),
        medianFinalEquity: ss.median(finals),
        stdFinalEquity: ss.standardDeviation(finals),
        prob2x: fractionWhere(finals, v => v >= 2 * capital),
        prob3x: fractionWhere(finals, v => v >= 3 * capital),
        probLoss: fractionWhere(finals, v => v < capital),
        p95MaxDrawdown: ss.quantile(Array.from(maxDrawdowns), 0.95),
        sharpeRatio: calculateSharpe(equityPaths),
        minEquity: ss.min(finals),
        maxEquity: ss.max(finals),
    });
}

function fractionWhere(values: readonly number[], predicate: (v: number) => boolean): number {
    if (values.length === 0) return 0;
    let hits = 0;
    for (const v of values) if (predicate(v)) hits++;
    return hits / values.length;
}

/**
 * Largest peak-to-trough decline of each path as a fraction of the peak.
 */
export function calculateMaxDrawdowns(equityPaths: readonly Float64Array[]): Float64Array {
    const drawdowns = new Float64Array(equityPaths.length);
    equityPaths.forEach((path, i) => {
        let peak = path.length > 0 ? path[0] : 0;
        let maxDd = 0;
        for (const equity of path) {
            if (equity > peak) peak = equity;
            if (peak > 0) {
                const dd = (peak - equity) / peak;
                if (dd > maxDd) maxDd = dd;
            }
        }
        drawdowns[i] = maxDd;
    });
    return drawdowns;
}

/**
 * Annualised Sharpe of the step-to-step equity returns across all paths
 * (mean / population std × √52). Steps starting from zero equity are skipped.
 */
function calculateSharpe(equityPaths: readonly Float64Array[]): number {
    let count = 0;
    let sum = 0;
    for (const path of equityPaths) {
        for (let t = 1; t < path.length; t++) {
            if (path[t - 1] > 0) {
                sum += (path[t] - path[t - 1]) / path[t - 1];
                count++;
            }
        }
    }
    if (count === 0) return 0;
    const mean = sum / count;

    let sqDiff = 0;
    for (const path of equityPaths) {
        for (let t = 1; t < path.length; t++) {
            if (path[t - 1] > 0) {
                const d = (path[t] - path[t - 1]) / path[t - 1] - mean;
                sqDiff += d * d;
            }
        }
    }
    const std = Math.sqrt(sqDiff / count);
    return std > MIN_RETURN_STD ? (mean / std) * Math.sqrt(PERIODS_PER_YEAR) : 0;
}

// ----- 3. DERIVED METRICS -----
/**
 * Gross profit / gross loss over every simulated trade.
 * Infinity with wins and no losses; 1 with neither.
 */
export function calculateProfitFactor(tradeReturns: readonly Float64Array[]): number {
    let grossProfit = 0;
    let grossLoss = 0;
    let wins = 0;
    let losses = 0;
    for (const row of tradeReturns) {
        for (const r of row) {
            if (r > 0) {
                grossProfit += r;
                wins++;
            } else if (r < 0) {
                grossLoss -= r;
                losses++;
            }
        }
    }
    if (losses === 0) return wins > 0 ? Infinity : 1;
    return grossLoss > 0 ? grossProfit / grossLoss : Infinity;
}

export function calculateRiskMetrics(results: SimulationResults): SimulationRiskMetrics {
    const capital = results.params.startingCapital;
    const finalReturns = Array.from(results.finalEquity, v => v / capital - 1);
    const var95 = finalReturns.length > 0 ? ss.quantile(finalReturns, 0.05) : 0;
    const tail = finalReturns.filter(r => r <= var95);

    let total = 0;
    let winCount = 0;
    let winSum = 0;
    let lossCount = 0;
    let lossSum = 0;
    let largestWin = -Infinity;
    let largestLoss = Infinity;
    for (const row of results.tradeReturns) {
        for (const r of row) {
            total++;
            if (r > 0) {
                winCount++;
                winSum += r;
            } else if (r < 0) {
                lossCount++;
                lossSum += r;
            }
            if (r > largestWin) largestWin = r;
            if (r < largestLoss) largestLoss = r;
        }
    }

    return {
        var95,
        cvar95: tail.length > 0 ? ss.mean(tail) : var95,
        profitFactor: calculateProfitFactor(results.tradeReturns),
        winRate: total > 0 ? winCount / total : 0,
        avgWin: winCount > 0 ? winSum / winCount : 0,
        avgLoss: lossCount > 0 ? lossSum / lossCount : 0,
        largestWin: total > 0 ? largestWin : 0,
        largestLoss: total > 0 ? largestLoss : 0,
    };
}

/** `count` evenly spaced indices over [0, length − 1] */
function spacedIndices(length: number, count: number): number[] {
    if (count >= length) return Array.from({ length }, (_, i) => i);
    if (count <= 1) return count === 1 ? [0] : [];
    return Array.from({ length: count }, (_, i) => Math.floor((i * (length - 1)) / (count - 1)));
}

/**
 * Evenly spaced subset of the equity paths, for charting.
 */
export function getSamplePaths(results: SimulationResults, numPaths = 10): Float64Array[] {
    return spacedIndices(results.equityPaths.length, numPaths).map(i => results.equityPaths[i]);
}

// ----- 4. REPORT -----
function evaluatePromotionGates(results: SimulationResults): PromotionGate[] {
    const { params } = results;
    const expectancyR = params.pWin * params.rWin - (1 - params.pWin);

    return [
        {
            name: 'prob_double',
            threshold: PROMOTION_GATES.MC_PROB_DOUBLE_MIN,
            actual: results.prob2x,
            passed: results.prob2x >= PROMOTION_GATES.MC_PROB_DOUBLE_MIN,
        },
        {
            name: 'p95_max_drawdown',
            threshold: PROMOTION_GATES.MC_MAX_DRAWDOWN_P95,
            actual: results.p95MaxDrawdown,
            passed: results.p95MaxDrawdown <= PROMOTION_GATES.MC_MAX_DRAWDOWN_P95,
        },
        {
            name: 'expectancy_r',
            threshold: PROMOTION_GATES.EXPECTANCY_MIN_R,
            actual: Number(expectancyR.toFixed(4)),
            passed: expectancyR >= PROMOTION_GATES.EXPECTANCY_MIN_R,
        },
    ];
}

/**
 * Runs a simulation and shapes it for presentation: summary statistics,
 * risk metrics, up to 20 sample paths, a ≤1000-point final-equity
 * distribution and promotion-gate verdicts.
 */
export function buildSimulationReport(input: SimulationInput): SimulationReport {
    const started = Date.now();
    const results = runSimulation(input);
    const riskMetrics = calculateRiskMetrics(results);

    const samplePaths = getSamplePaths(results, MAX_REPORT_PATHS).map(path =>
        Array.from(path, (equity, step): EquityPoint => ({ step, equity }))
    );
    const finalEquityDistribution = spacedIndices(results.finalEquity.length, MAX_DISTRIBUTION_POINTS).map(
        i => results.finalEquity[i]
    );

    const computationTimeMs = Date.now() - started;
    logger.info(`Simulation finished in ${computationTimeMs}ms`, {
        paths: results.params.numSimulations,
        totalTrades: results.totalTrades,
        seed: results.seed,
    });

    return {
        params: results.params,
        summary: {
            meanFinalEquity: results.meanFinalEquity,
            medianFinalEquity: results.medianFinalEquity,
            stdFinalEquity: results.stdFinalEquity,
            prob2x: results.prob2x,
            prob3x: results.prob3x,
            probLoss: results.probLoss,
            p95MaxDrawdown: results.p95MaxDrawdown,
            sharpeRatio: results.sharpeRatio,
            minEquity: results.minEquity,
            maxEquity: results.maxEquity,
        },
        riskMetrics,
        samplePaths,
        finalEquityDistribution,
        promotionGates: evaluatePromotionGates(results),
        totalTrades: results.totalTrades,
        computationTimeMs,
    };
}
