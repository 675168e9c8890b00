import type { Fill } from '../execution/types.js';

/**
 * Lifecycle of one delta-neutral trade
 */
export type ArbState = 'FLAT' | 'ENTERING' | 'IN_POSITION' | 'EXITING' | 'ERROR';

/**
 * Open hedge, built from actual fills
 */
export interface Position {
    size: number;
    entrySpotPrice: number;
    entryPerpPrice: number;
    entrySpread: number;
    entryTime: Date;
    entryFees: number;
}

/**
 * Live market context the entry decision reads synchronously
 */
export interface MarketContext {
    getFundingRate(): number | null;
    getAvailableMargin(): number | null;
}

export interface StrategyConfig {
    spotSymbol: string;
    perpSymbol: string;
    minSpreadThreshold: number;
    exitThreshold: number;
    maxPositionUsd: number;
    checkFundingRate: boolean;
    dryRun: boolean;
    takerFeeRate: number;
    slippage: number;
    sizeDecimals: number;
    priceDecimals: number;
    opportunityCooldownMs: number;
}

/**
 * Outcome of both legs of an entry or exit
 */
export interface LegResults {
    spot: Fill;
    perp: Fill;
}

/**
 * Reason an entry signal did not turn into orders
 */
export type SkipReason =
    | 'funding_unknown'
    | 'funding_negative'
    | 'margin_unknown'
    | 'size_too_small';

/**
 * Net result of a closed trade
 */
export interface TradePnl {
    spotPnl: number;
    perpPnl: number;
    grossPnl: number;
    fees: number;
    netPnl: number;
}
