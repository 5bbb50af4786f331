// src/index.scan.ts

/**
 * Entry point for a single universe scan over fixture market data.
 * Persists results when DATABASE_URL is set.
 */
import { buildScannerConfig, config } from './lib/config/settings';
import { createLogger } from './lib/logger';
import { MarketScanner } from './lib/scanner';
import { FixtureBarsSource } from './lib/services/fixtureBarsSource';
import { OpportunityRepository } from './lib/db';
import { errorMessage } from './lib/errors';

const logger = createLogger('index.scan');

async function main(): Promise<void> {
    const repository = config.databaseUrl ? new OpportunityRepository(config.databaseUrl) : null;
    if (repository) await repository.initialize();

    try {
        const scanner = new MarketScanner(new FixtureBarsSource(config.scanner.fixturesDir), buildScannerConfig(), {
            concurrency: config.scanner.concurrency,
            barsLookback: config.scanner.barsLookback,
            sink: repository,
        });

        const opportunities = await scanner.scanUniverse(config.symbols, config.scanner.minScore, config.scanner.limit);

        for (const opp of opportunities) {
            logger.info(
                `${opp.symbol} score=${opp.signalScore.toFixed(2)} ${opp.guardrailStatus.toUpperCase()} ` +
                    `entry=${opp.setup.entry.toFixed(2)} stop=${opp.setup.stop.toFixed(2)} t1=${opp.setup.target1.toFixed(2)} ` +
                    `p=${opp.risk.pTarget} netR=${opp.risk.netExpectedR}`,
                { reason: opp.guardrailReason }
            );
        }
        logger.info('Scan summary', { ...scanner.stats });
    } finally {
        await repository?.close();
    }
}

main().catch((err: unknown) => {
    logger.error('Unhandled error in main', { error: errorMessage(err) });
    process.exit(1);
});
