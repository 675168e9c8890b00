import type { L2Level } from './types.js';

/**
 * Top of book for one leg
 */
export interface OrderBookState {
    readonly symbol: string;
    readonly bestBid: number;
    readonly bestAsk: number;
    readonly bidSize: number;
    readonly askSize: number;
    readonly lastUpdate: number;      // Local timestamp (ms)
}

/**
 * Spot and perp books observed together
 */
export interface PriceState {
    readonly spot: OrderBookState;
    readonly perp: OrderBookState;
}

export function emptyBook(symbol: string): OrderBookState {
    return {
        symbol,
        bestBid: 0,
        bestAsk: 0,
        bidSize: 0,
        askSize: 0,
        lastUpdate: 0,
    };
}

export function emptyPriceState(spotSymbol: string, perpSymbol: string): PriceState {
    return {
        spot: emptyBook(spotSymbol),
        perp: emptyBook(perpSymbol),
    };
}

export function isBookValid(book: OrderBookState): boolean {
    return book.bestBid > 0 && book.bestAsk > 0;
}

export function isReady(state: PriceState): boolean {
    return isBookValid(state.spot) && isBookValid(state.perp);
}

/**
 * (perp bid - spot ask) / spot ask; positive means buy spot, short perp.
 * 0 when either leg is missing.
 */
export function entrySpread(state: PriceState): number {
    if (!isReady(state)) {
        return 0;
    }
    return (state.perp.bestBid - state.spot.bestAsk) / state.spot.bestAsk;
}

/**
 * (perp ask - spot bid) / spot bid; the position closes when this falls
 * to the exit threshold. +Infinity when either leg is missing.
 */
export function exitSpread(state: PriceState): number {
    if (!isReady(state)) {
        return Number.POSITIVE_INFINITY;
    }
    return (state.perp.bestAsk - state.spot.bestBid) / state.spot.bestBid;
}

function parseDecimal(value: string | undefined): number {
    if (value === undefined) {
        return 0;
    }
    const parsed = parseFloat(value);
    return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Build a book snapshot from the best levels of an L2 update
 */
export function bookFromLevels(
    symbol: string,
    bids: readonly L2Level[],
    asks: readonly L2Level[],
    now: number
): OrderBookState {
    const topBid = bids[0];
    const topAsk = asks[0];

    return {
        symbol,
        bestBid: parseDecimal(topBid?.px),
        bestAsk: parseDecimal(topAsk?.px),
        bidSize: parseDecimal(topBid?.sz),
        askSize: parseDecimal(topAsk?.sz),
        lastUpdate: now,
    };
}
