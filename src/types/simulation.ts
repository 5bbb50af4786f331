// src/types/simulation.ts
// =============================================================================
// MONTE CARLO ENGINE – PARAMETER, RESULT AND REPORT TYPES
// =============================================================================

export interface SimulationParameters {
    /** Probability a trade hits target, in [0, 1] */
    pWin: number;
    /** Reward multiple on a win (R) */
    rWin: number;
    /** Fraction of equity risked per trade, in (0, 0.1] */
    riskPct: number;
    tradesPerWeek: number;
    weeks: number;
    costPerTradeUsd: number;
    slippageBps: number;
    startingCapital: number;
    numSimulations: number;
    /** Replays a run exactly when supplied */
    seed?: number;
}

export interface SimulationResults {
    /** Validated parameters with the seed actually used */
    params: Readonly<Required<SimulationParameters>>;
    seed: number;
    totalTrades: number;

    /** numSimulations rows × (totalTrades + 1) columns, column 0 = starting capital */
    equityPaths: readonly Float64Array[];
    /** numSimulations rows × totalTrades columns */
    tradeReturns: readonly Float64Array[];
    finalEquity: Float64Array;
    maxDrawdowns: Float64Array;

    meanFinalEquity: number;
    medianFinalEquity: number;
    stdFinalEquity: number;
    prob2x: number;
    prob3x: number;
    probLoss: number;
    p95MaxDrawdown: number;
    sharpeRatio: number;
    minEquity: number;
    maxEquity: number;
}

export interface SimulationRiskMetrics {
    var95: number;
    cvar95: number;
    profitFactor: number;
    winRate: number;
    avgWin: number;
    avgLoss: number;
    largestWin: number;
    largestLoss: number;
}

export interface EquityPoint {
    step: number;
    equity: number;
}

export interface PromotionGate {
    name: string;
    threshold: number;
    actual: number;
    passed: boolean;
}

export interface SimulationReport {
    params: Readonly<Required<SimulationParameters>>;
    summary: {
        meanFinalEquity: number;
        medianFinalEquity: number;
        stdFinalEquity: number;
        prob2x: number;
        prob3x: number;
        probLoss: number;
        p95MaxDrawdown: number;
        sharpeRatio: number;
        minEquity: number;
        maxEquity: number;
    };
    riskMetrics: SimulationRiskMetrics;
    samplePaths: EquityPoint[][];
    finalEquityDistribution: number[];
    promotionGates: PromotionGate[];
    totalTrades: number;
    computationTimeMs: number;
}
