import { logger } from '../infra/logger.js';
import type { ExecutionGateway, OrderRequest, OrderResponse } from './types.js';

/**
 * Dry-run gateway: every IOC order fills in full at its limit price
 */
export class PaperGateway implements ExecutionGateway {
    public readonly name = 'paper';
    private nextOrderId = 1;

    async order(request: OrderRequest): Promise<OrderResponse> {
        const oid = this.nextOrderId++;

        logger.info('exec.paper.order', {
            oid,
            symbol: request.symbol,
            side: request.isBuy ? 'buy' : 'sell',
            size: request.size,
            limitPrice: request.limitPrice,
            reduceOnly: request.reduceOnly,
        });

        return {
            status: 'ok',
            response: {
                type: 'order',
                data: {
                    statuses: [
                        {
                            filled: {
                                totalSz: String(request.size),
                                avgPx: String(request.limitPrice),
                                oid,
                            },
                        },
                    ],
                },
            },
        };
    }
}
