import { logger } from '../infra/logger.js';
import { isReady, type PriceState } from '../data/hyperliquid/price_state.js';
import { aggressivePrice, computeTradePnl, positionSize } from '../strategy/pricing.js';
import type { LegResults, Position, TradePnl } from '../strategy/types.js';
import { submitLeg } from './submit.js';
import type { ExecutionGateway } from './types.js';

export interface RoundTripConfig {
    spotSymbol: string;
    perpSymbol: string;
    sizeUsd: number;
    slippage: number;
    sizeDecimals: number;
    priceDecimals: number;
    takerFeeRate: number;
}

export interface RoundTripReport {
    size: number;
    entryPrices: PriceState;
    entry: LegResults;
    exit: LegResults | null;
    pnl: TradePnl | null;
}

/**
 * Open and immediately close one hedge: buy spot + short perp, `hold()`,
 * then sell spot + buy back perp at the filled sizes.
 *
 * Stops after the entry when either entry leg fails; `exit` and `pnl` are
 * null then and whatever did fill is left for the operator.
 */
export async function runRoundTrip(
    gateway: ExecutionGateway,
    config: RoundTripConfig,
    quote: () => Promise<PriceState>,
    hold: () => Promise<void>
): Promise<RoundTripReport> {
    const entryPrices = await quote();
    if (!isReady(entryPrices)) {
        throw new Error('Order books not ready');
    }

    const size = positionSize(config.sizeUsd, null, entryPrices.spot.bestAsk, config.sizeDecimals);
    if (size <= 0) {
        throw new Error(`Size rounds to zero for $${config.sizeUsd} at ${entryPrices.spot.bestAsk}`);
    }

    logger.info('roundtrip.entry', { size, sizeUsd: config.sizeUsd, gateway: gateway.name });

    const [entrySpot, entryPerp] = await Promise.all([
        submitLeg(gateway, {
            symbol: config.spotSymbol,
            isBuy: true,
            size,
            limitPrice: aggressivePrice(entryPrices.spot.bestAsk, true, config.slippage, config.priceDecimals),
            timeInForce: 'Ioc',
            reduceOnly: false,
        }, config.takerFeeRate),
        submitLeg(gateway, {
            symbol: config.perpSymbol,
            isBuy: false,
            size,
            limitPrice: aggressivePrice(entryPrices.perp.bestBid, false, config.slippage, config.priceDecimals),
            timeInForce: 'Ioc',
            reduceOnly: false,
        }, config.takerFeeRate),
    ]);
    const entry: LegResults = { spot: entrySpot, perp: entryPerp };

    if (!entrySpot.success || !entryPerp.success) {
        logger.warn('roundtrip.entry_failed', { entry });
        return { size, entryPrices, entry, exit: null, pnl: null };
    }

    await hold();

    const exitPrices = await quote();
    if (!isReady(exitPrices)) {
        throw new Error('Order books not ready for exit; position left open');
    }

    logger.info('roundtrip.exit', { spotSize: entrySpot.size, perpSize: entryPerp.size });

    const [exitSpot, exitPerp] = await Promise.all([
        submitLeg(gateway, {
            symbol: config.spotSymbol,
            isBuy: false,
            size: entrySpot.size,
            limitPrice: aggressivePrice(exitPrices.spot.bestBid, false, config.slippage, config.priceDecimals),
            timeInForce: 'Ioc',
            reduceOnly: false,
        }, config.takerFeeRate),
        submitLeg(gateway, {
            symbol: config.perpSymbol,
            isBuy: true,
            size: entryPerp.size,
            limitPrice: aggressivePrice(exitPrices.perp.bestAsk, true, config.slippage, config.priceDecimals),
            timeInForce: 'Ioc',
            reduceOnly: true,
        }, config.takerFeeRate),
    ]);
    const exit: LegResults = { spot: exitSpot, perp: exitPerp };

    if (!exitSpot.success || !exitPerp.success) {
        logger.warn('roundtrip.exit_failed', { exit });
        return { size, entryPrices, entry, exit, pnl: null };
    }

    const position: Position = {
        size: entrySpot.size,
        entrySpotPrice: entrySpot.price,
        entryPerpPrice: entryPerp.price,
        entrySpread: entryPerp.price / entrySpot.price - 1,
        entryTime: new Date(),
        entryFees: entrySpot.fee + entryPerp.fee,
    };
    const pnl = computeTradePnl(position, exitSpot.price, exitPerp.price, exitSpot.fee + exitPerp.fee);

    logger.info('roundtrip.done', { ...pnl });

    return { size, entryPrices, entry, exit, pnl };
}
