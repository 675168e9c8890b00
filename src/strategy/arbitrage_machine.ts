import { logger } from '../infra/logger.js';
import { env } from '../config/env.js';
import type { EventBus } from '../infra/event_bus.js';
import { submitLeg } from '../execution/submit.js';
import type { ExecutionGateway, OrderRequest } from '../execution/types.js';
import { entrySpread, exitSpread, isReady, type PriceState } from '../data/hyperliquid/price_state.js';
import { aggressivePrice, computeTradePnl, positionSize, sizesMatch } from './pricing.js';
import type {
    ArbState,
    LegResults,
    MarketContext,
    Position,
    SkipReason,
    StrategyConfig,
} from './types.js';

export function strategyConfigFromEnv(): StrategyConfig {
    return {
        spotSymbol: env.SPOT_SYMBOL,
        perpSymbol: env.PERP_SYMBOL,
        minSpreadThreshold: env.MIN_SPREAD_THRESHOLD,
        exitThreshold: env.EXIT_THRESHOLD,
        maxPositionUsd: env.MAX_POSITION_USD,
        checkFundingRate: env.CHECK_FUNDING_RATE,
        dryRun: env.DRY_RUN,
        takerFeeRate: env.TAKER_FEE_RATE,
        slippage: env.ORDER_SLIPPAGE,
        sizeDecimals: env.SIZE_DECIMALS,
        priceDecimals: env.PRICE_DECIMALS,
        opportunityCooldownMs: env.OPPORTUNITY_COOLDOWN_MS,
    };
}

/**
 * Spot/perp spread state machine.
 *
 * FLAT -> ENTERING -> IN_POSITION -> EXITING -> FLAT, with ENTERING and
 * EXITING falling into ERROR when a leg fails or the legs disagree on size.
 * ERROR holds until an operator calls `clearError()`; nothing is unwound
 * automatically. Price updates that arrive while an evaluation (including
 * in-flight orders) is running are dropped.
 */
export class ArbitrageStateMachine {
    private state: ArbState = 'FLAT';
    private position: Position | null = null;
    private evaluating = false;
    private lastOpportunityAt: number | null = null;

    constructor(
        private readonly config: StrategyConfig,
        private readonly gateway: ExecutionGateway,
        private readonly events: EventBus,
        private readonly market: MarketContext,
        private readonly now: () => number = Date.now
    ) {
        logger.info('arb.engine.init', {
            gateway: gateway.name,
            spotSymbol: config.spotSymbol,
            perpSymbol: config.perpSymbol,
            minSpreadThreshold: config.minSpreadThreshold,
            exitThreshold: config.exitThreshold,
            maxPositionUsd: config.maxPositionUsd,
            checkFundingRate: config.checkFundingRate,
            dryRun: config.dryRun,
        });
    }

    public getState(): ArbState {
        return this.state;
    }

    public getPosition(): Position | null {
        return this.position;
    }

    /**
     * Evaluate one ready price snapshot
     */
    public async handlePriceUpdate(prices: PriceState): Promise<void> {
        if (!isReady(prices)) {
            return;
        }

        if (this.evaluating) {
            logger.debug('arb.skip.busy', { state: this.state });
            return;
        }

        this.evaluating = true;
        try {
            if (this.state === 'FLAT') {
                await this.evaluateEntry(prices);
            } else if (this.state === 'IN_POSITION') {
                await this.evaluateExit(prices);
            }
        } finally {
            this.evaluating = false;
        }
    }

    /**
     * Operator acknowledgement of an ERROR. The exchange-side exposure must
     * already have been dealt with by hand.
     */
    public async clearError(): Promise<void> {
        if (this.state !== 'ERROR') {
            logger.warn('arb.clear_error.ignored', { state: this.state });
            return;
        }

        logger.warn('arb.clear_error', { droppedPosition: this.position });
        this.position = null;
        this.transition('FLAT', { reason: 'operator_clear' });
        await this.events.clearPosition();
    }

    private async evaluateEntry(prices: PriceState): Promise<void> {
        const spread = entrySpread(prices);
        if (spread < this.config.minSpreadThreshold) {
            return;
        }

        if (this.config.checkFundingRate) {
            const fundingRate = this.market.getFundingRate();
            if (fundingRate === null) {
                await this.skip('funding_unknown', spread, {});
                return;
            }
            if (fundingRate < 0) {
                await this.skip('funding_negative', spread, { fundingRate });
                return;
            }
        }

        const margin = this.market.getAvailableMargin();
        if (margin === null && !this.config.dryRun) {
            await this.skip('margin_unknown', spread, {});
            return;
        }

        const size = positionSize(this.config.maxPositionUsd, margin, prices.spot.bestAsk, this.config.sizeDecimals);
        if (size <= 0) {
            await this.skip('size_too_small', spread, { margin, spotAsk: prices.spot.bestAsk });
            return;
        }

        this.transition('ENTERING', { spread, size });
        await this.enter(prices, spread, size);
    }

    private async enter(prices: PriceState, spread: number, size: number): Promise<void> {
        const { slippage, priceDecimals } = this.config;

        const legs = await this.submitLegs(
            {
                symbol: this.config.spotSymbol,
                isBuy: true,
                size,
                limitPrice: aggressivePrice(prices.spot.bestAsk, true, slippage, priceDecimals),
                timeInForce: 'Ioc',
                reduceOnly: false,
            },
            {
                symbol: this.config.perpSymbol,
                isBuy: false,
                size,
                limitPrice: aggressivePrice(prices.perp.bestBid, false, slippage, priceDecimals),
                timeInForce: 'Ioc',
                reduceOnly: false,
            }
        );

        const { spot, perp } = legs;
        if (!spot.success || !perp.success || !sizesMatch(spot.size, perp.size, this.config.sizeDecimals)) {
            await this.fail('Entry failed', legs, { requestedSize: size, spread });
            return;
        }

        const position: Position = {
            size: spot.size,
            entrySpotPrice: spot.price,
            entryPerpPrice: perp.price,
            entrySpread: spread,
            entryTime: new Date(this.now()),
            entryFees: spot.fee + perp.fee,
        };
        this.position = position;

        logger.warn('arb.entry.filled', {
            size: position.size,
            spotPrice: position.entrySpotPrice,
            perpPrice: position.entryPerpPrice,
            signalSpreadPct: (spread * 100).toFixed(4),
            filledSpreadPct: (((perp.price - spot.price) / spot.price) * 100).toFixed(4),
            fees: position.entryFees,
        });

        await this.events.recordEntry({
            size: position.size,
            spotPrice: position.entrySpotPrice,
            perpPrice: position.entryPerpPrice,
            spread,
            entryTime: position.entryTime,
        });

        this.transition('IN_POSITION', { size: position.size });
    }

    private async evaluateExit(prices: PriceState): Promise<void> {
        const position = this.position;
        if (!position) {
            logger.error('arb.position.missing', { state: this.state });
            this.transition('ERROR', { reason: 'position_missing' });
            await this.events.recordError('In position without a recorded position', {});
            return;
        }

        const spread = exitSpread(prices);
        if (spread > this.config.exitThreshold) {
            return;
        }

        this.transition('EXITING', { spread, size: position.size });

        const { slippage, priceDecimals } = this.config;
        const legs = await this.submitLegs(
            {
                symbol: this.config.spotSymbol,
                isBuy: false,
                size: position.size,
                limitPrice: aggressivePrice(prices.spot.bestBid, false, slippage, priceDecimals),
                timeInForce: 'Ioc',
                reduceOnly: false,
            },
            {
                symbol: this.config.perpSymbol,
                isBuy: true,
                size: position.size,
                limitPrice: aggressivePrice(prices.perp.bestAsk, true, slippage, priceDecimals),
                timeInForce: 'Ioc',
                reduceOnly: true,
            }
        );

        const { spot, perp } = legs;
        if (
            !spot.success ||
            !perp.success ||
            !sizesMatch(spot.size, position.size, this.config.sizeDecimals) ||
            !sizesMatch(perp.size, position.size, this.config.sizeDecimals)
        ) {
            await this.fail('Exit failed', legs, { positionSize: position.size, spread });
            return;
        }

        const pnl = computeTradePnl(position, spot.price, perp.price, spot.fee + perp.fee);
        this.position = null;

        logger.warn('arb.exit.filled', {
            size: position.size,
            spotPrice: spot.price,
            perpPrice: perp.price,
            spotPnl: pnl.spotPnl,
            perpPnl: pnl.perpPnl,
            grossPnl: pnl.grossPnl,
            fees: pnl.fees,
            netPnl: pnl.netPnl,
            heldMs: this.now() - position.entryTime.getTime(),
        });

        await this.events.recordExit({
            size: position.size,
            spotPrice: spot.price,
            perpPrice: perp.price,
            grossPnl: pnl.grossPnl,
            fees: pnl.fees,
            netPnl: pnl.netPnl,
        });

        this.transition('FLAT', { netPnl: pnl.netPnl });
    }

    /**
     * Send both legs before looking at either result
     */
    private async submitLegs(spotOrder: OrderRequest, perpOrder: OrderRequest): Promise<LegResults> {
        const [spot, perp] = await Promise.all([
            submitLeg(this.gateway, spotOrder, this.config.takerFeeRate),
            submitLeg(this.gateway, perpOrder, this.config.takerFeeRate),
        ]);
        return { spot, perp };
    }

    private async fail(message: string, legs: LegResults, context: Record<string, unknown>): Promise<void> {
        this.transition('ERROR', { message });

        logger.error('arb.error', {
            message,
            spotLeg: legs.spot,
            perpLeg: legs.perp,
            ...context,
        });

        await this.events.recordError(message, {
            spot_leg: legs.spot,
            perp_leg: legs.perp,
            ...context,
        });
    }

    /**
     * Log a signalled entry that was not taken; record it at most once per
     * cooldown window
     */
    private async skip(reason: SkipReason, spread: number, data: Record<string, unknown>): Promise<void> {
        logger.debug('arb.discard', {
            reason,
            spreadPct: (spread * 100).toFixed(4),
            ...data,
        });

        const now = this.now();
        if (
            this.lastOpportunityAt !== null &&
            now - this.lastOpportunityAt < this.config.opportunityCooldownMs
        ) {
            return;
        }
        this.lastOpportunityAt = now;

        await this.events.recordOpportunity(
            `Spread ${(spread * 100).toFixed(4)}% above entry threshold, skipped: ${reason}`,
            { reason, spread, ...data }
        );
    }

    private transition(next: ArbState, data: Record<string, unknown>): void {
        logger.info('arb.state', {
            from: this.state,
            to: next,
            ...data,
        });
        this.state = next;
    }
}
