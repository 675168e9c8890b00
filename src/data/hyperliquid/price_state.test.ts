import { describe, expect, it } from 'vitest';
import {
    bookFromLevels,
    emptyPriceState,
    entrySpread,
    exitSpread,
    isBookValid,
    isReady,
    type OrderBookState,
    type PriceState,
} from './price_state.js';

function book(symbol: string, bestBid: number, bestAsk: number): OrderBookState {
    return { symbol, bestBid, bestAsk, bidSize: 1, askSize: 1, lastUpdate: 1 };
}

function state(spotBid: number, spotAsk: number, perpBid: number, perpAsk: number): PriceState {
    return { spot: book('@107', spotBid, spotAsk), perp: book('HYPE', perpBid, perpAsk) };
}

describe('price state', () => {
    it('computes the entry spread from perp bid over spot ask', () => {
        expect(entrySpread(state(9.99, 10.0, 10.02, 10.03))).toBeCloseTo(0.002, 12);
    });

    it('computes the exit spread from perp ask over spot bid', () => {
        expect(exitSpread(state(10.0, 10.01, 9.99, 9.995))).toBeCloseTo(-0.0005, 12);
    });

    it.each([
        [0, 10, 10, 10],
        [10, 0, 10, 10],
        [10, 10, 0, 10],
        [10, 10, 10, 0],
    ])('treats a zero price as no signal (%d/%d/%d/%d)', (spotBid, spotAsk, perpBid, perpAsk) => {
        const prices = state(spotBid, spotAsk, perpBid, perpAsk);

        expect(isReady(prices)).toBe(false);
        expect(entrySpread(prices)).toBe(0);
        expect(exitSpread(prices)).toBe(Number.POSITIVE_INFINITY);
    });

    it('starts empty and not ready', () => {
        const prices = emptyPriceState('@107', 'HYPE');

        expect(prices.spot.symbol).toBe('@107');
        expect(prices.perp.symbol).toBe('HYPE');
        expect(isBookValid(prices.spot)).toBe(false);
        expect(isReady(prices)).toBe(false);
    });

    it('takes the top level of each side from an L2 update', () => {
        const result = bookFromLevels(
            'HYPE',
            [{ px: '25.10', sz: '3.5' }, { px: '25.00', sz: '10' }],
            [{ px: '25.20', sz: '1.25' }],
            1700000000000
        );

        expect(result).toEqual({
            symbol: 'HYPE',
            bestBid: 25.1,
            bestAsk: 25.2,
            bidSize: 3.5,
            askSize: 1.25,
            lastUpdate: 1700000000000,
        });
    });

    it('leaves a missing or unparseable side at zero', () => {
        const noAsks = bookFromLevels('HYPE', [{ px: '25.10', sz: '3' }], [], 5);
        const garbage = bookFromLevels('HYPE', [{ px: 'abc', sz: '3' }], [{ px: '25.2', sz: '1' }], 5);

        expect(noAsks.bestAsk).toBe(0);
        expect(isBookValid(noAsks)).toBe(false);
        expect(garbage.bestBid).toBe(0);
        expect(isBookValid(garbage)).toBe(false);
    });
});
