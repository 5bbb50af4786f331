import { describe, it, expect } from 'vitest';
import {
    buildSimulationReport,
    calculateMaxDrawdowns,
    calculateProfitFactor,
    calculateRiskMetrics,
    getSamplePaths,
    runSimulation,
    tradeReturnFor,
    validateSimulationParameters,
    type SimulationInput,
} from '../monteCarlo';
import { InvalidParameterError } from '../../errors';

const BASE: SimulationInput = {
    pWin: 0.45,
    rWin: 2.5,
    riskPct: 0.005,
    tradesPerWeek: 10,
    weeks: 52,
    costPerTradeUsd: 1,
    slippageBps: 10,
    startingCapital: 10_000,
    numSimulations: 200,
    seed: 42,
};

/** Two trades per path, no costs, starting at 100 */
const DETERMINISTIC: SimulationInput = {
    pWin: 1,
    rWin: 2,
    riskPct: 0.01,
    tradesPerWeek: 1,
    weeks: 2,
    costPerTradeUsd: 0,
    slippageBps: 0,
    startingCapital: 100,
    numSimulations: 3,
    seed: 7,
};

function fieldOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (err) {
        if (err instanceof InvalidParameterError) return err.field;
        throw err;
    }
    return undefined;
}

// ============================================================================
// Validation
// ============================================================================

describe('validateSimulationParameters', () => {
    it('applies defaults for capital and path count', () => {
        const { startingCapital: _c, numSimulations: _n, ...rest } = BASE;
        const params = validateSimulationParameters(rest);
        expect(params.startingCapital).toBe(10_000);
        expect(params.numSimulations).toBe(1_000);
    });

    it.each<[string, Partial<SimulationInput>]>([
        ['pWin', { pWin: 1.2 }],
        ['pWin', { pWin: -0.1 }],
        ['rWin', { rWin: 0 }],
        ['riskPct', { riskPct: 0 }],
        ['riskPct', { riskPct: 0.2 }],
        ['tradesPerWeek', { tradesPerWeek: 2.5 }],
        ['weeks', { weeks: 0 }],
        ['costPerTradeUsd', { costPerTradeUsd: -1 }],
        ['slippageBps', { slippageBps: -5 }],
        ['numSimulations', { numSimulations: 0 }],
        ['startingCapital', { startingCapital: 0 }],
    ])('rejects an invalid %s', (field, override) => {
        expect(fieldOf(() => runSimulation({ ...BASE, ...override }))).toBe(field);
    });

    it('raises InvalidParameterError with the field in the message', () => {
        expect(() => validateSimulationParameters({ ...BASE, weeks: 600 })).toThrow(InvalidParameterError);
        expect(() => validateSimulationParameters({ ...BASE, weeks: 600 })).toThrow(/^weeks: /);
    });
});

describe('tradeReturnFor', () => {
    it('nets fixed cost and slippage off both legs', () => {
        const params = validateSimulationParameters(BASE);
        // win 0.0125, loss -0.005, cost 1/10000, slippage 10bps of risk
        expect(tradeReturnFor(true, params)).toBeCloseTo(0.012395, 12);
        expect(tradeReturnFor(false, params)).toBeCloseTo(-0.005105, 12);
    });
});

// ============================================================================
// Simulation
// ============================================================================

describe('runSimulation', () => {
    it('is reproducible for a fixed seed', () => {
        const a = runSimulation(BASE);
        const b = runSimulation(BASE);
        expect(Array.from(a.finalEquity)).toEqual(Array.from(b.finalEquity));
        expect(Array.from(a.maxDrawdowns)).toEqual(Array.from(b.maxDrawdowns));
        expect(a.sharpeRatio).toBe(b.sharpeRatio);
        expect(a.seed).toBe(42);
    });

    it('produces different paths for different seeds', () => {
        const a = runSimulation(BASE);
        const b = runSimulation({ ...BASE, seed: 43 });
        expect(Array.from(a.finalEquity)).not.toEqual(Array.from(b.finalEquity));
    });

    it('records a generated seed that reproduces the run', () => {
        const { seed: _seed, ...unseeded } = BASE;
        const first = runSimulation({ ...unseeded, numSimulations: 20 });
        expect(Number.isInteger(first.seed)).toBe(true);
        const replay = runSimulation({ ...unseeded, numSimulations: 20, seed: first.seed });
        expect(Array.from(replay.finalEquity)).toEqual(Array.from(first.finalEquity));
    });

    it('shapes every path as totalTrades + 1 points starting at capital', () => {
        const results = runSimulation({ ...BASE, numSimulations: 25 });
        expect(results.totalTrades).toBe(520);
        expect(results.equityPaths).toHaveLength(25);
        for (const path of results.equityPaths) {
            expect(path).toHaveLength(521);
            expect(path[0]).toBe(10_000);
        }
        expect(Object.isFrozen(results)).toBe(true);
    });

    it('keeps drawdowns and probabilities in [0, 1]', () => {
        const results = runSimulation(BASE);
        for (const dd of results.maxDrawdowns) {
            expect(dd).toBeGreaterThanOrEqual(0);
            expect(dd).toBeLessThanOrEqual(1);
        }
        for (const p of [results.prob2x, results.prob3x, results.probLoss]) {
            expect(p).toBeGreaterThanOrEqual(0);
            expect(p).toBeLessThanOrEqual(1);
        }
        expect(results.prob3x).toBeLessThanOrEqual(results.prob2x);
    });

    it('grows a positive-expectancy strategy on average', () => {
        const results = runSimulation({ ...BASE, numSimulations: 1_000 });
        expect(Number.isFinite(results.meanFinalEquity)).toBe(true);
        expect(results.meanFinalEquity).toBeGreaterThan(10_000);
        expect(results.minEquity).toBeLessThanOrEqual(results.medianFinalEquity);
        expect(results.medianFinalEquity).toBeLessThanOrEqual(results.maxEquity);
    });

    it('compounds every trade when every trade wins', () => {
        const results = runSimulation(DETERMINISTIC);
        expect(results.equityPaths[0][1]).toBeCloseTo(102, 10);
        expect(results.finalEquity[0]).toBeCloseTo(104.04, 10);
        expect(results.meanFinalEquity).toBeCloseTo(104.04, 10);
        expect(results.stdFinalEquity).toBeCloseTo(0, 10);
        expect(results.probLoss).toBe(0);
        expect(results.sharpeRatio).toBe(0);
        expect(Array.from(results.maxDrawdowns)).toEqual([0, 0, 0]);
    });

    it('floors equity at zero once a path is ruined', () => {
        const results = runSimulation({ ...DETERMINISTIC, pWin: 0, costPerTradeUsd: 300 });
        expect(results.minEquity).toBe(0);
        expect(results.probLoss).toBe(1);
        expect(Array.from(results.maxDrawdowns)).toEqual([1, 1, 1]);
    });
});

// ============================================================================
// Derived metrics
// ============================================================================

describe('calculateMaxDrawdowns', () => {
    it('measures the deepest decline from a running peak', () => {
        const paths = [Float64Array.from([100, 120, 90, 130]), Float64Array.from([100, 100])];
        expect(Array.from(calculateMaxDrawdowns(paths))).toEqual([0.25, 0]);
    });
});

describe('calculateProfitFactor', () => {
    it('divides gross profit by gross loss', () => {
        expect(calculateProfitFactor([Float64Array.from([0.02, -0.01]), Float64Array.from([-0.01, 0.02])])).toBe(2);
    });

    it('handles one-sided and empty samples', () => {
        expect(calculateProfitFactor([Float64Array.from([0.02, 0.02])])).toBe(Infinity);
        expect(calculateProfitFactor([Float64Array.from([-0.01])])).toBe(0);
        expect(calculateProfitFactor([new Float64Array(0)])).toBe(1);
    });
});

describe('calculateRiskMetrics', () => {
    it('summarises an all-win run', () => {
        const metrics = calculateRiskMetrics(runSimulation(DETERMINISTIC));
        expect(metrics.profitFactor).toBe(Infinity);
        expect(metrics.winRate).toBe(1);
        expect(metrics.avgLoss).toBe(0);
        expect(metrics.largestWin).toBeCloseTo(0.02, 12);
    });

    it('summarises an all-loss run', () => {
        const metrics = calculateRiskMetrics(runSimulation({ ...DETERMINISTIC, pWin: 0 }));
        expect(metrics.profitFactor).toBe(0);
        expect(metrics.winRate).toBe(0);
        expect(metrics.avgLoss).toBeCloseTo(-0.01, 12);
        expect(metrics.var95).toBeCloseTo(-0.0199, 10);
    });

    it('puts CVaR at or below VaR', () => {
        const metrics = calculateRiskMetrics(runSimulation(BASE));
        expect(metrics.cvar95).toBeLessThanOrEqual(metrics.var95);
        expect(metrics.winRate).toBeGreaterThan(0);
        expect(metrics.winRate).toBeLessThan(1);
    });
});

describe('getSamplePaths', () => {
    it('picks evenly spaced paths including both ends', () => {
        const results = runSimulation(BASE);
        const sample = getSamplePaths(results, 10);
        expect(sample).toHaveLength(10);
        expect(sample[0]).toBe(results.equityPaths[0]);
        expect(sample[9]).toBe(results.equityPaths[199]);
    });

    it('returns every path when fewer exist than requested', () => {
        const results = runSimulation(DETERMINISTIC);
        expect(getSamplePaths(results, 10)).toHaveLength(3);
    });
});

// ============================================================================
// Report
// ============================================================================

describe('buildSimulationReport', () => {
    it('caps sample paths at 20 and the distribution at 1000 points', () => {
        const report = buildSimulationReport({ ...BASE, weeks: 1, numSimulations: 1_500 });
        expect(report.samplePaths).toHaveLength(20);
        expect(report.samplePaths[0]).toHaveLength(11);
        expect(report.samplePaths[0][0]).toEqual({ step: 0, equity: 10_000 });
        expect(report.finalEquityDistribution).toHaveLength(1_000);
        expect(report.totalTrades).toBe(10);
        expect(report.computationTimeMs).toBeGreaterThanOrEqual(0);
    });

    it('evaluates the promotion gates', () => {
        const report = buildSimulationReport(BASE);
        expect(report.promotionGates.map(g => g.name)).toEqual(['prob_double', 'p95_max_drawdown', 'expectancy_r']);
        const expectancy = report.promotionGates[2];
        expect(expectancy.actual).toBe(0.575);
        expect(expectancy.passed).toBe(true);
    });

    it('keeps the full distribution for small runs', () => {
        const report = buildSimulationReport(DETERMINISTIC);
        expect(report.samplePaths).toHaveLength(3);
        expect(report.finalEquityDistribution).toHaveLength(3);
        expect(report.params.seed).toBe(7);
    });
});
