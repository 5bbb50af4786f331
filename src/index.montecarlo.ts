// src/index.montecarlo.ts

/**
 * Entry point for a one-off Monte Carlo risk simulation.
 * Parameters come from the MC_* environment variables (see .env.example).
 */
import { config } from './lib/config/settings';
import { createLogger } from './lib/logger';
import { buildSimulationReport } from './lib/services/monteCarlo';
import { errorMessage } from './lib/errors';

const logger = createLogger('index.montecarlo');

const pct = (v: number): string => `${(v * 100).toFixed(1)}%`;

async function main(): Promise<void> {
    logger.info('Starting Monte Carlo simulation', { params: config.monteCarlo });

    const report = buildSimulationReport(config.monteCarlo);
    const { summary, riskMetrics } = report;

    logger.info('Simulation completed', {
        seed: report.params.seed,
        totalTrades: report.totalTrades,
        computationTimeMs: report.computationTimeMs,
    });
    logger.info(`Mean final equity: $${summary.meanFinalEquity.toFixed(2)} (median $${summary.medianFinalEquity.toFixed(2)})`);
    logger.info(`P(2x): ${pct(summary.prob2x)} | P(3x): ${pct(summary.prob3x)} | P(loss): ${pct(summary.probLoss)}`);
    logger.info(`P95 max drawdown: ${pct(summary.p95MaxDrawdown)} | Sharpe: ${summary.sharpeRatio.toFixed(2)}`);
    logger.info(`Win rate: ${pct(riskMetrics.winRate)} | Profit factor: ${riskMetrics.profitFactor.toFixed(2)} | VaR95: ${pct(riskMetrics.var95)}`);

    for (const gate of report.promotionGates) {
        logger.info(`Gate ${gate.name}: ${gate.passed ? 'PASS' : 'FAIL'}`, { threshold: gate.threshold, actual: gate.actual });
    }
}

main().catch((err: unknown) => {
    logger.error('Unhandled error in main', { error: errorMessage(err) });
    process.exit(1);
});
