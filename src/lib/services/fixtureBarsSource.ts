// src/lib/services/fixtureBarsSource.ts
// =============================================================================
// FIXTURE MARKET DATA
// BarsSource backed by one JSON file per symbol (<dir>/<SYMBOL>.json):
//   { "bars": Bar[], "snapshot": Snapshot, "refData"?: ReferenceData }
// Used for offline runs of the scanner CLI.
// =============================================================================

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { Bar, BarsSource, ReferenceData, Snapshot } from '../../types';
import { MarketDataError } from '../errors';
import { createLogger } from '../logger';

const logger = createLogger('FixtureBarsSource');

const BarSchema = z.object({
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    volume: z.number(),
    timestamp: z.number().optional(),
});

const FixtureSchema = z.object({
    bars: z.array(BarSchema),
    snapshot: z.object({
        price: z.number(),
        volume: z.number(),
        bid: z.number().optional(),
        ask: z.number().optional(),
        prevDay: BarSchema.optional(),
        timestamp: z.number().optional(),
    }),
    refData: z.object({ marketCap: z.number().optional() }).optional(),
});

type Fixture = z.infer<typeof FixtureSchema>;

export class FixtureBarsSource implements BarsSource {
    private readonly cache = new Map<string, Fixture | null>();

    constructor(private readonly directory: string) {}

    public async getBars(symbol: string, count: number): Promise<Bar[]> {
        const fixture = await this.load(symbol);
        return fixture ? fixture.bars.slice(-count) : [];
    }

    public async getSnapshot(symbol: string): Promise<Snapshot | null> {
        const fixture = await this.load(symbol);
        return fixture ? { ...fixture.snapshot, symbol } : null;
    }

    public async getReferenceData(symbol: string): Promise<ReferenceData | null> {
        const fixture = await this.load(symbol);
        return fixture?.refData ?? null;
    }

    /** Null when no file exists for the symbol */
    private async load(symbol: string): Promise<Fixture | null> {
        const cached = this.cache.get(symbol);
        if (cached !== undefined) return cached;

        const file = path.join(this.directory, `${symbol}.json`);
        let raw: string;
        try {
            raw = await fs.readFile(file, 'utf8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
                logger.debug(`No fixture for ${symbol}`, { file });
                this.cache.set(symbol, null);
                return null;
            }
            throw err;
        }

        const parsed = FixtureSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
            throw new MarketDataError(`Malformed fixture ${file}: ${parsed.error.issues[0].message}`, { symbol, file });
        }
        this.cache.set(symbol, parsed.data);
        return parsed.data;
    }
}
