// src/index.ts
// Public API of the scanner and Monte Carlo engine.

export * from './types';
export * from './types/simulation';

export {
    ScannerError,
    InvalidParameterError,
    InsufficientDataError,
    MarketDataError,
    type ScannerErrorCode,
} from './lib/errors';

export {
    calculateEMA,
    calculateSMA,
    calculateRSI,
    calculateATR,
    calculateVWAP,
    pivotHigh,
    pivotLow,
    pivotProximityScore,
    percentileRank,
    toOhlcvData,
} from './lib/indicators';

export { computeFeatures, calculateSpreadBps, MIN_BARS } from './lib/utils/featureUtils';
export { scoreFeatures, combineScores, generateTradeSetup, SCORE_WEIGHTS, type RiskPolicy } from './lib/strategy';
export { positionSizing, costsInR, netExpectedR, positionRiskFraction } from './lib/utils/riskUtils';
export {
    PiecewiseSigmoidCalibrator,
    defaultCalibrator,
    scoreToProbability,
    validateCalibration,
    getCalibrationInfo,
    type ProbabilityCalibrator,
} from './lib/services/probabilityCalibrator';
export { evaluateGuardrails, type GuardrailCandidate, type GuardrailPolicy } from './lib/services/guardrails';
export {
    scoreSymbol,
    passesLiquidityFilter,
    MarketScanner,
    OPPORTUNITY_SCHEMA_VERSION,
    type ScoreOutcome,
    type ScoreOptions,
    type ScanStats,
} from './lib/scanner';
export {
    runSimulation,
    validateSimulationParameters,
    calculateMaxDrawdowns,
    calculateRiskMetrics,
    calculateProfitFactor,
    getSamplePaths,
    buildSimulationReport,
    PROMOTION_GATES,
    type SimulationInput,
} from './lib/services/monteCarlo';
export { FixtureBarsSource } from './lib/services/fixtureBarsSource';
export { OpportunityRepository, toOpportunityRow, fromOpportunityRow } from './lib/db';
export { DEFAULT_SCANNER_CONFIG, buildScannerConfig } from './lib/config/settings';
