import { logger, describeError } from '../../infra/logger.js';
import type { MarketContext } from '../../strategy/types.js';

/**
 * Source of funding and margin readings (the info client, or a fake)
 */
export interface AccountInfoSource {
    getFundingRate(perpSymbol: string): Promise<number>;
    getAvailableMargin(user: string): Promise<number>;
}

export interface AccountFeedOptions {
    perpSymbol: string;
    accountAddress: string;     // empty: margin is not polled
    intervalMs: number;
    maxBackoffMs?: number;
    staleAfterErrors?: number;  // consecutive failures before readings reset to unknown
}

/**
 * Polls funding rate and available margin so the strategy can read them
 * synchronously on every price update
 */
export class AccountFeed implements MarketContext {
    private pollTimer: NodeJS.Timeout | null = null;
    private inFlight = false;
    private isRunning = false;
    private consecutiveErrors = 0;
    private currentBackoffMs = 0;

    private fundingRate: number | null = null;
    private availableMargin: number | null = null;

    private readonly maxBackoffMs: number;
    private readonly staleAfterErrors: number;

    constructor(
        private readonly source: AccountInfoSource,
        private readonly options: AccountFeedOptions
    ) {
        this.maxBackoffMs = options.maxBackoffMs ?? 30000;
        this.staleAfterErrors = options.staleAfterErrors ?? 3;
    }

    public getFundingRate(): number | null {
        return this.fundingRate;
    }

    public getAvailableMargin(): number | null {
        return this.availableMargin;
    }

    /**
     * Poll once immediately, then on the interval
     */
    public async start(): Promise<void> {
        if (this.isRunning) {
            logger.warn('account.feed.already_running', { perpSymbol: this.options.perpSymbol });
            return;
        }

        this.isRunning = true;
        this.consecutiveErrors = 0;
        this.currentBackoffMs = 0;

        logger.info('account.feed.started', {
            perpSymbol: this.options.perpSymbol,
            interval: this.options.intervalMs,
            pollsMargin: this.options.accountAddress.length > 0,
        });

        await this.poll();
        this.schedulePoll();
    }

    public stop(): void {
        if (this.pollTimer) {
            clearTimeout(this.pollTimer);
            this.pollTimer = null;
        }

        this.isRunning = false;

        logger.info('account.feed.stopped', { perpSymbol: this.options.perpSymbol });
    }

    /**
     * Schedule next poll with setTimeout (no overlap)
     */
    private schedulePoll(): void {
        if (!this.isRunning) {
            return;
        }

        const delay = this.currentBackoffMs > 0
            ? this.currentBackoffMs
            : this.options.intervalMs;

        this.pollTimer = setTimeout(() => {
            this.poll()
                .catch(error => logger.error('account.poll.unhandled', describeError(error)))
                .finally(() => this.schedulePoll());
        }, delay);
    }

    public async poll(): Promise<void> {
        if (this.inFlight) {
            logger.warn('account.poll.skipped', { reason: 'previous poll still in flight' });
            return;
        }

        this.inFlight = true;

        try {
            this.fundingRate = await this.source.getFundingRate(this.options.perpSymbol);

            if (this.options.accountAddress) {
                this.availableMargin = await this.source.getAvailableMargin(this.options.accountAddress);
            }

            this.consecutiveErrors = 0;
            this.currentBackoffMs = 0;

            logger.debug('account.snapshot', {
                perpSymbol: this.options.perpSymbol,
                fundingRate: this.fundingRate,
                availableMargin: this.availableMargin,
            });
        } catch (error) {
            this.handlePollError(error);
        } finally {
            this.inFlight = false;
        }
    }

    /**
     * Keep the last known values until too many polls in a row fail, then
     * report them as unknown. Back off: double each time up to the cap.
     */
    private handlePollError(error: unknown): void {
        this.consecutiveErrors++;

        this.currentBackoffMs = Math.min(
            this.options.intervalMs * Math.pow(2, this.consecutiveErrors - 1),
            this.maxBackoffMs
        );

        logger.error('account.poll.error', {
            ...describeError(error),
            consecutiveErrors: this.consecutiveErrors,
            nextBackoffMs: this.currentBackoffMs,
        });

        if (this.consecutiveErrors >= this.staleAfterErrors && (this.fundingRate !== null || this.availableMargin !== null)) {
            this.fundingRate = null;
            this.availableMargin = null;
            logger.warn('account.stale', {
                perpSymbol: this.options.perpSymbol,
                consecutiveErrors: this.consecutiveErrors,
            });
        }
    }
}
