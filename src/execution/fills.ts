import type { Fill, OrderResponse, OrderStatus, FilledStatus, ErrorStatus } from './types.js';

export function estimateFee(size: number, price: number, takerFeeRate: number): number {
    return size * price * takerFeeRate;
}

function isFilled(status: OrderStatus): status is FilledStatus {
    return 'filled' in status && typeof status.filled === 'object' && status.filled !== null;
}

function isError(status: OrderStatus): status is ErrorStatus {
    return 'error' in status && typeof status.error === 'string';
}

/**
 * Reduce an exchange order reply to a leg outcome.
 *
 * Any non-ok status or an `error` entry is a failed fill. When the reply
 * carries no fee the taker rate is applied to the filled notional.
 */
export function parseOrderResponse(result: OrderResponse, takerFeeRate: number): Fill {
    if (result.status !== 'ok') {
        return {
            success: false,
            error: typeof result.response === 'string' ? result.response : JSON.stringify(result.response),
        };
    }

    if (typeof result.response === 'string' || result.response.type !== 'order' || !result.response.data) {
        return { success: false, error: 'Unknown order response' };
    }

    for (const status of result.response.data.statuses) {
        if (isFilled(status)) {
            const size = parseFloat(status.filled.totalSz);
            const price = parseFloat(status.filled.avgPx);

            if (!Number.isFinite(size) || !Number.isFinite(price) || size <= 0 || price <= 0) {
                return { success: false, error: `Empty fill: ${status.filled.totalSz} @ ${status.filled.avgPx}` };
            }

            const reportedFee = status.filled.fee !== undefined ? parseFloat(status.filled.fee) : NaN;

            return {
                success: true,
                size,
                price,
                fee: Number.isFinite(reportedFee) ? reportedFee : estimateFee(size, price, takerFeeRate),
                orderId: String(status.filled.oid),
            };
        }

        if (isError(status)) {
            return { success: false, error: status.error };
        }
    }

    return { success: false, error: 'Unknown order response' };
}
