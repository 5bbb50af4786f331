// src/lib/db/schema.ts
import { mysqlTable, varchar, bigint, json, index, double, int, text } from 'drizzle-orm/mysql-core';
import type { FeatureSet } from '../../types';

/**
 * =============================================================================
 * OPPORTUNITIES
 * One row per scanned opportunity. Scores are 0–100, prices in USD.
 * =============================================================================
 */
export const opportunities = mysqlTable(
    'opportunities',
    {
        id: varchar('id', { length: 36 }).primaryKey(), // UUID v4
        userId: varchar('user_id', { length: 255 }),
        symbol: varchar('symbol', { length: 16 }).notNull(),
        ts: bigint('ts', { mode: 'number' }).notNull(), // epoch ms

        // Scores
        signalScore: double('signal_score').notNull(),
        priceScore: double('price_score').notNull(),
        volumeScore: double('volume_score').notNull(),
        volatilityScore: double('volatility_score').notNull(),

        // Trade setup
        entryPrice: double('entry_price').notNull(),
        stopLoss: double('stop_loss').notNull(),
        target1: double('target_1').notNull(),
        target2: double('target_2'),
        positionSizeUsd: double('position_size_usd').notNull(),
        positionSizeShares: int('position_size_shares').notNull(),
        rrRatio: double('rr_ratio').notNull(),
        riskPerShare: double('risk_per_share').notNull(),

        // Risk
        pTarget: double('p_target').notNull(),
        netExpectedR: double('net_expected_r').notNull(),
        costsR: double('costs_r').notNull(),
        slippageBps: double('slippage_bps').notNull(),

        // Guardrails
        guardrailStatus: varchar('guardrail_status', { length: 10 }).notNull(), // approved | review | blocked
        guardrailReason: text('guardrail_reason'),

        features: json('features').$type<FeatureSet>().notNull(),
        reasons: json('reasons').$type<string[]>().notNull(),
        version: varchar('version', { length: 16 }).notNull(),
    },
    (table) => ({
        symbolIdx: index('idx_opp_symbol').on(table.symbol),
        tsIdx: index('idx_opp_ts').on(table.ts),
        statusIdx: index('idx_opp_status').on(table.guardrailStatus),
        userIdx: index('idx_opp_user').on(table.userId),
    })
);

/**
 * =============================================================================
 * TYPE INFERENCE
 * =============================================================================
 */
export type OpportunityRow = typeof opportunities.$inferSelect;
export type NewOpportunityRow = typeof opportunities.$inferInsert;
