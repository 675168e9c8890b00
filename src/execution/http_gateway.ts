import { z } from 'zod';
import { logger, describeError } from '../infra/logger.js';
import type { ExecutionGateway, OrderRequest, OrderResponse } from './types.js';

const orderResponseSchema = z.object({
    status: z.string(),
    response: z.union([
        z.string(),
        z.object({
            type: z.string(),
            data: z.object({
                statuses: z.array(z.record(z.unknown())),
            }).optional(),
        }),
    ]),
});

/**
 * Live gateway that forwards orders to an executor service.
 *
 * The executor owns the exchange key and signing; this side only speaks
 * the order request / exchange reply shapes. Transport failures come back
 * as `status: 'err'` so callers always get a leg outcome.
 */
export class HttpExecutionGateway implements ExecutionGateway {
    public readonly name = 'http';
    private readonly url: string;

    constructor(baseUrl: string) {
        this.url = `${baseUrl.replace(/\/+$/, '')}/order`;
    }

    async order(request: OrderRequest): Promise<OrderResponse> {
        const body = {
            coin: request.symbol,
            is_buy: request.isBuy,
            sz: request.size,
            limit_px: request.limitPrice,
            order_type: { limit: { tif: request.timeInForce } },
            reduce_only: request.reduceOnly,
        };

        logger.info('exec.http.order', body);

        try {
            const response = await fetch(this.url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(body),
            });

            if (!response.ok) {
                throw new Error(`Executor error: ${response.status} ${response.statusText}`);
            }

            const parsed = orderResponseSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw new Error(`Malformed executor reply: ${parsed.error.message}`);
            }

            return parsed.data;
        } catch (error) {
            const detail = describeError(error);
            logger.error('exec.http.failed', { coin: request.symbol, ...detail });
            return { status: 'err', response: detail.error };
        }
    }
}
