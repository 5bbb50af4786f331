// src/lib/db/index.ts
// =============================================================================
// OPPORTUNITY PERSISTENCE – DRIZZLE ORM + MYSQL2
//
//   • Connection pool with exponential backoff on startup
//   • Upsert-by-id of scan results (implements OpportunitySink)
//   • Pure row mappers shared by writes and reads
//
// Constructed explicitly with a connection URL and passed to MarketScanner;
// nothing here runs at import time.
// =============================================================================

import { drizzle, type MySql2Database } from 'drizzle-orm/mysql2';
import mysql from 'mysql2/promise';
import { desc, eq } from 'drizzle-orm';

import * as schema from './schema';
import { opportunities, type NewOpportunityRow, type OpportunityRow } from './schema';
import type { GuardrailStatus, Opportunity, OpportunitySink } from '../../types';
import { createLogger } from '../logger';
import { errorMessage } from '../errors';

const logger = createLogger('db');

type Database = MySql2Database<typeof schema>;

export interface RepositoryOptions {
    maxRetries?: number;
    baseDelayMs?: number;
    connectionLimit?: number;
    /** Attached to every row written by this repository */
    userId?: string | null;
    logQueries?: boolean;
}

// =============================================================================
// ROW MAPPERS
// =============================================================================
const GUARDRAIL_STATUSES: readonly GuardrailStatus[] = ['approved', 'review', 'blocked'];

function isGuardrailStatus(value: string): value is GuardrailStatus {
    return GUARDRAIL_STATUSES.some(s => s === value);
}

export function toOpportunityRow(opportunity: Opportunity, userId: string | null = null): NewOpportunityRow {
    const { scores, setup, risk } = opportunity;
    return {
        id: opportunity.id,
        userId,
        symbol: opportunity.symbol,
        ts: opportunity.timestamp,
        signalScore: opportunity.signalScore,
        priceScore: scores.price,
        volumeScore: scores.volume,
        volatilityScore: scores.volatility,
        entryPrice: setup.entry,
        stopLoss: setup.stop,
        target1: setup.target1,
        target2: setup.target2 ?? null,
        positionSizeUsd: setup.positionSizeUsd,
        positionSizeShares: setup.positionSizeShares,
        rrRatio: setup.rrRatio,
        riskPerShare: setup.riskPerShare,
        pTarget: risk.pTarget,
        netExpectedR: risk.netExpectedR,
        costsR: risk.costsR,
        slippageBps: risk.slippageBps,
        guardrailStatus: opportunity.guardrailStatus,
        guardrailReason: opportunity.guardrailReason,
        features: opportunity.features,
        reasons: [...opportunity.reasons],
        version: opportunity.version,
    };
}

/**
 * @throws Error when the stored guardrail status is not a known value
 */
export function fromOpportunityRow(row: OpportunityRow): Opportunity {
    if (!isGuardrailStatus(row.guardrailStatus)) {
        throw new Error(`Unknown guardrail status '${row.guardrailStatus}' for opportunity ${row.id}`);
    }
    return {
        id: row.id,
        symbol: row.symbol,
        timestamp: row.ts,
        signalScore: row.signalScore,
        scores: {
            price: row.priceScore,
            volume: row.volumeScore,
            volatility: row.volatilityScore,
            overall: row.signalScore,
        },
        setup: {
            entry: row.entryPrice,
            stop: row.stopLoss,
            target1: row.target1,
            target2: row.target2 ?? undefined,
            positionSizeUsd: row.positionSizeUsd,
            positionSizeShares: row.positionSizeShares,
            rrRatio: row.rrRatio,
            riskPerShare: row.riskPerShare,
            degenerate: !(row.riskPerShare > 0),
        },
        risk: {
            pTarget: row.pTarget,
            netExpectedR: row.netExpectedR,
            costsR: row.costsR,
            slippageBps: row.slippageBps,
        },
        features: row.features,
        guardrailStatus: row.guardrailStatus,
        guardrailReason: row.guardrailReason ?? '',
        reasons: row.reasons,
        version: row.version,
    };
}

// =============================================================================
// REPOSITORY
// =============================================================================
export class OpportunityRepository implements OpportunitySink {
    private pool: mysql.Pool | null = null;
    private drizzleDb: Database | null = null;
    private readonly opts: Required<RepositoryOptions>;

    constructor(private readonly databaseUrl: string, opts: RepositoryOptions = {}) {
        this.opts = {
            maxRetries: 3,
            baseDelayMs: 2000,
            connectionLimit: 5,
            userId: null,
            logQueries: false,
            ...opts,
        };
    }

    /**
     * Connects with exponential backoff (2s → 4s → 8s by default) and
     * verifies the pool with `SELECT 1`.
     */
    public async initialize(): Promise<void> {
        const { maxRetries, baseDelayMs } = this.opts;

        for (let attempt = 1; attempt <= maxRetries; attempt++) {
            try {
                logger.info(`Attempting MySQL connection (attempt ${attempt}/${maxRetries})`);

                this.pool = mysql.createPool({
                    uri: this.databaseUrl,
                    connectionLimit: this.opts.connectionLimit,
                    waitForConnections: true,
                    queueLimit: 0,
                    timezone: '+00:00',
                    charset: 'utf8mb4',
                });
                await this.pool.execute('SELECT 1');

                this.drizzleDb = drizzle(this.pool, {
                    schema,
                    mode: 'default',
                    logger: this.opts.logQueries,
                });

                logger.info('MySQL connection established and Drizzle ORM initialized');
                return;
            } catch (err) {
                logger.error(`Database connection failed (attempt ${attempt})`, { error: errorMessage(err) });
                await this.pool?.end().catch((endErr: unknown) =>
                    logger.warn('Failed to release pool after connection error', { error: errorMessage(endErr) })
                );
                this.pool = null;

                if (attempt === maxRetries) {
                    throw new Error(`Failed to connect to MySQL after ${maxRetries} attempts: ${errorMessage(err)}`);
                }

                const delay = baseDelayMs * Math.pow(2, attempt - 1);
                logger.warn(`Retrying in ${delay / 1000} seconds...`);
                await new Promise(resolve => setTimeout(resolve, delay));
            }
        }
    }

    public get db(): Database {
        if (!this.drizzleDb) {
            throw new Error('Database not initialized. Call initialize() first.');
        }
        return this.drizzleDb;
    }

    public async close(): Promise<void> {
        if (this.pool) {
            await this.pool.end();
            logger.info('MySQL connection pool closed gracefully');
            this.pool = null;
            this.drizzleDb = null;
        }
    }

    /**
     * Upserts by id in one transaction; a re-scan of the same opportunity
     * overwrites its scores, setup and verdict.
     */
    public async saveOpportunities(items: readonly Opportunity[]): Promise<void> {
        if (items.length === 0) return;
        const rows = items.map(o => toOpportunityRow(o, this.opts.userId));

        await this.db.transaction(async tx => {
            for (const row of rows) {
                const { id: _id, ...updatable } = row;
                await tx.insert(opportunities).values(row).onDuplicateKeyUpdate({ set: updatable });
            }
        });

        logger.debug(`Persisted ${rows.length} opportunities`);
    }

    /** Newest first, optionally for a single user */
    public async getRecent(limit = 50, offset = 0, userId?: string): Promise<Opportunity[]> {
        const rows = await this.db
            .select()
            .from(opportunities)
            .where(userId ? eq(opportunities.userId, userId) : undefined)
            .orderBy(desc(opportunities.ts))
            .limit(limit)
            .offset(offset)
            .execute();
        return rows.map(fromOpportunityRow);
    }
}
