import { logger, describeError } from '../infra/logger.js';
import { parseOrderResponse } from './fills.js';
import type { ExecutionGateway, Fill, OrderRequest } from './types.js';

/**
 * Send one leg and reduce the reply to a fill. Never rejects: a thrown
 * gateway error comes back as a failed fill.
 */
export async function submitLeg(gateway: ExecutionGateway, order: OrderRequest, takerFeeRate: number): Promise<Fill> {
    try {
        const response = await gateway.order(order);
        const fill = parseOrderResponse(response, takerFeeRate);

        logger.info('exec.leg', {
            gateway: gateway.name,
            symbol: order.symbol,
            side: order.isBuy ? 'buy' : 'sell',
            requestedSize: order.size,
            limitPrice: order.limitPrice,
            reduceOnly: order.reduceOnly,
            fill,
        });

        return fill;
    } catch (error) {
        const detail = describeError(error);
        logger.error('exec.leg.exception', { symbol: order.symbol, ...detail });
        return { success: false, error: detail.error };
    }
}
