import type { Position, TradePnl } from './types.js';

// Absorbs float noise such as 1.2 / 0.1 = 11.999999999999998
const FLOOR_EPSILON = 1e-9;

export function roundTo(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
}

export function floorTo(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    return Math.floor(value * factor + FLOOR_EPSILON) / factor;
}

/**
 * Base-asset size for a new hedge: notional capped by margin, floored to
 * the instrument's size precision. A null margin means "not limited".
 */
export function positionSize(
    maxPositionUsd: number,
    availableMargin: number | null,
    spotAsk: number,
    sizeDecimals: number
): number {
    if (spotAsk <= 0) {
        return 0;
    }
    const notional = availableMargin === null
        ? maxPositionUsd
        : Math.min(maxPositionUsd, availableMargin);

    return notional > 0 ? floorTo(notional / spotAsk, sizeDecimals) : 0;
}

/**
 * IOC limit price nudged through the touch: above the ask to buy, below
 * the bid to sell
 */
export function aggressivePrice(touch: number, isBuy: boolean, slippage: number, priceDecimals: number): number {
    const factor = isBuy ? 1 + slippage : 1 - slippage;
    return roundTo(touch * factor, priceDecimals);
}

/**
 * Equal within half a size step
 */
export function sizesMatch(a: number, b: number, sizeDecimals: number): boolean {
    return Math.abs(a - b) < Math.pow(10, -sizeDecimals) / 2;
}

/**
 * Spot is long, perp is short: the perp leg earns entry minus exit
 */
export function computeTradePnl(
    position: Position,
    exitSpotPrice: number,
    exitPerpPrice: number,
    exitFees: number
): TradePnl {
    const spotPnl = (exitSpotPrice - position.entrySpotPrice) * position.size;
    const perpPnl = (position.entryPerpPrice - exitPerpPrice) * position.size;
    const grossPnl = spotPnl + perpPnl;
    const fees = position.entryFees + exitFees;

    return {
        spotPnl,
        perpPnl,
        grossPnl,
        fees,
        netPnl: grossPnl - fees,
    };
}
