// src/lib/errors.ts
// =============================================================================
// ERROR TAXONOMY
// Degenerate setups and calibrator clamping are values, not errors.
// =============================================================================

export type ScannerErrorCode = 'INVALID_PARAMETER' | 'INSUFFICIENT_DATA' | 'INVALID_MARKET_DATA';

export class ScannerError extends Error {
    constructor(
        public readonly code: ScannerErrorCode,
        message: string,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'ScannerError';
    }
}

/**
 * A simulation parameter is outside its documented bound.
 * Raised before any simulation work starts.
 */
export class InvalidParameterError extends ScannerError {
    constructor(
        public readonly field: string,
        message: string,
        details?: Record<string, unknown>
    ) {
        super('INVALID_PARAMETER', `${field}: ${message}`, details);
        this.name = 'InvalidParameterError';
    }
}

/**
 * Fewer bars than the feature extractor needs. Callers skip the symbol.
 */
export class InsufficientDataError extends ScannerError {
    constructor(
        public readonly required: number,
        public readonly received: number,
        symbol?: string
    ) {
        super(
            'INSUFFICIENT_DATA',
            `${symbol ? `${symbol}: ` : ''}need at least ${required} bars, got ${received}`,
            { required, received, symbol }
        );
        this.name = 'InsufficientDataError';
    }
}

/** Bars or snapshot failed validation (non-positive price, negative volume, NaN) */
export class MarketDataError extends ScannerError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('INVALID_MARKET_DATA', message, details);
        this.name = 'MarketDataError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
