import { afterEach, describe, expect, it, vi } from 'vitest';
import { AccountFeed, type AccountInfoSource } from './account_feed.js';

function source(overrides: Partial<AccountInfoSource> = {}): AccountInfoSource {
    return {
        getFundingRate: vi.fn(async () => 0.0000125),
        getAvailableMargin: vi.fn(async () => 42.5),
        ...overrides,
    };
}

describe('AccountFeed', () => {
    let feed: AccountFeed | null = null;

    afterEach(() => {
        feed?.stop();
        feed = null;
        vi.useRealTimers();
    });

    it('is unknown until the first poll', () => {
        feed = new AccountFeed(source(), { perpSymbol: 'HYPE', accountAddress: '0xabc', intervalMs: 1000 });

        expect(feed.getFundingRate()).toBeNull();
        expect(feed.getAvailableMargin()).toBeNull();
    });

    it('reads funding and margin for the configured account', async () => {
        const info = source();
        feed = new AccountFeed(info, { perpSymbol: 'HYPE', accountAddress: '0xabc', intervalMs: 1000 });

        await feed.poll();

        expect(feed.getFundingRate()).toBe(0.0000125);
        expect(feed.getAvailableMargin()).toBe(42.5);
        expect(info.getFundingRate).toHaveBeenCalledWith('HYPE');
        expect(info.getAvailableMargin).toHaveBeenCalledWith('0xabc');
    });

    it('leaves margin unknown without an account address', async () => {
        const info = source();
        feed = new AccountFeed(info, { perpSymbol: 'HYPE', accountAddress: '', intervalMs: 1000 });

        await feed.poll();

        expect(feed.getFundingRate()).toBe(0.0000125);
        expect(feed.getAvailableMargin()).toBeNull();
        expect(info.getAvailableMargin).not.toHaveBeenCalled();
    });

    it('keeps the last reading when a poll fails', async () => {
        const getFundingRate = vi.fn<(perpSymbol: string) => Promise<number>>()
            .mockResolvedValueOnce(-0.0002)
            .mockRejectedValueOnce(new Error('Info API error: 502 Bad Gateway'));
        feed = new AccountFeed(source({ getFundingRate }), { perpSymbol: 'HYPE', accountAddress: '', intervalMs: 1000 });

        await feed.poll();
        await feed.poll();

        expect(feed.getFundingRate()).toBe(-0.0002);
    });

    it('forgets readings after repeated failures', async () => {
        const getFundingRate = vi.fn<(perpSymbol: string) => Promise<number>>()
            .mockResolvedValueOnce(0.0000125)
            .mockRejectedValue(new Error('fetch failed'));
        feed = new AccountFeed(source({ getFundingRate }), {
            perpSymbol: 'HYPE',
            accountAddress: '0xabc',
            intervalMs: 1000,
            staleAfterErrors: 3,
        });

        await feed.poll();
        await feed.poll();
        await feed.poll();
        expect(feed.getFundingRate()).toBe(0.0000125);
        expect(feed.getAvailableMargin()).toBe(42.5);

        await feed.poll();
        expect(feed.getFundingRate()).toBeNull();
        expect(feed.getAvailableMargin()).toBeNull();
    });

    it('polls again on the interval after start', async () => {
        vi.useFakeTimers();
        const info = source();
        feed = new AccountFeed(info, { perpSymbol: 'HYPE', accountAddress: '', intervalMs: 1000 });

        await feed.start();
        expect(info.getFundingRate).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(1000);
        expect(info.getFundingRate).toHaveBeenCalledTimes(2);

        feed.stop();
        await vi.advanceTimersByTimeAsync(5000);
        expect(info.getFundingRate).toHaveBeenCalledTimes(2);
    });

    it('backs off after consecutive failures', async () => {
        vi.useFakeTimers();
        const getFundingRate = vi.fn<(perpSymbol: string) => Promise<number>>()
            .mockRejectedValue(new Error('fetch failed'));
        feed = new AccountFeed(source({ getFundingRate }), { perpSymbol: 'HYPE', accountAddress: '', intervalMs: 1000 });

        await feed.start();                           // fails, next in 1000
        await vi.advanceTimersByTimeAsync(1000);      // fails, next in 2000
        expect(getFundingRate).toHaveBeenCalledTimes(2);

        await vi.advanceTimersByTimeAsync(1000);
        expect(getFundingRate).toHaveBeenCalledTimes(2);

        await vi.advanceTimersByTimeAsync(1000);
        expect(getFundingRate).toHaveBeenCalledTimes(3);
    });
});
