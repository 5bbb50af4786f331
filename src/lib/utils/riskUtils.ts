// src/lib/utils/riskUtils.ts
// =============================================================================
// COST MODEL & POSITION SIZING (R-multiple arithmetic)
// All helpers return neutral values when risk per share is not positive.
// =============================================================================

export interface PositionSize {
    shares: number;
    usd: number;
}

/**
 * Fixed-fractional sizing: risk `portfolioValue × riskPct` dollars across
 * `|entry − stop|` per share.
 */
export function positionSizing(entry: number, stop: number, portfolioValue: number, riskPct: number): PositionSize {
    const riskPerShare = Math.abs(entry - stop);
    if (!(riskPerShare > 0)) return { shares: 0, usd: 0 };

    const shares = Math.floor((portfolioValue * riskPct) / riskPerShare);
    return { shares, usd: shares * entry };
}

/**
 * Round-trip slippage plus fixed fees, expressed in R.
 */
export function costsInR(slippageBps: number, feesUsd: number, entryPrice: number, riskPerShare: number): number {
    if (!(riskPerShare > 0)) return 0;

    const slippagePerShare = (slippageBps / 10_000) * entryPrice * 2;
    return slippagePerShare / riskPerShare + feesUsd / riskPerShare;
}

/** E[R] with the loss leg fixed at −1R, net of costs */
export function netExpectedR(pTarget: number, rRatio: number, costsR: number): number {
    return pTarget * rRatio - (1 - pTarget) - costsR;
}

/** Dollars at risk as a fraction of the portfolio */
export function positionRiskFraction(shares: number, riskPerShare: number, portfolioValue: number): number {
    if (!(portfolioValue > 0)) return 0;
    return (shares * riskPerShare) / portfolioValue;
}
