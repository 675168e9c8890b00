import { afterEach, describe, expect, it, vi } from 'vitest';
import { HttpExecutionGateway } from './http_gateway.js';
import { PaperGateway } from './paper_gateway.js';
import { parseOrderResponse } from './fills.js';
import { createGateway } from './create_gateway.js';
import type { OrderRequest } from './types.js';

const SPOT_BUY: OrderRequest = {
    symbol: '@107',
    isBuy: true,
    size: 1.2,
    limitPrice: 10.01,
    timeInForce: 'Ioc',
    reduceOnly: false,
};

describe('PaperGateway', () => {
    it('fills the whole request at the limit price', async () => {
        const gateway = new PaperGateway();

        const fill = parseOrderResponse(await gateway.order(SPOT_BUY), 0.00025);

        expect(fill).toMatchObject({ success: true, size: 1.2, price: 10.01, orderId: '1' });
    });

    it('numbers orders sequentially', async () => {
        const gateway = new PaperGateway();
        await gateway.order(SPOT_BUY);

        const fill = parseOrderResponse(await gateway.order(SPOT_BUY), 0.00025);

        expect(fill.success && fill.orderId).toBe('2');
    });
});

describe('HttpExecutionGateway', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('posts the order and returns the executor reply', async () => {
        const reply = {
            status: 'ok',
            response: { type: 'order', data: { statuses: [{ filled: { totalSz: '1.2', avgPx: '10.005', oid: 77 } }] } },
        };
        const fetchMock = vi.fn(async () => new Response(JSON.stringify(reply), { status: 200 }));
        vi.stubGlobal('fetch', fetchMock);

        const gateway = new HttpExecutionGateway('http://127.0.0.1:8080/');
        const response = await gateway.order({ ...SPOT_BUY, symbol: 'HYPE', isBuy: false, reduceOnly: true });

        expect(response).toEqual(reply);
        expect(fetchMock).toHaveBeenCalledWith('http://127.0.0.1:8080/order', {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({
                coin: 'HYPE',
                is_buy: false,
                sz: 1.2,
                limit_px: 10.01,
                order_type: { limit: { tif: 'Ioc' } },
                reduce_only: true,
            }),
        });
    });

    it('turns a transport failure into a failed reply', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => {
            throw new Error('connect ECONNREFUSED 127.0.0.1:8080');
        }));

        const gateway = new HttpExecutionGateway('http://127.0.0.1:8080');
        const response = await gateway.order(SPOT_BUY);

        expect(response).toEqual({ status: 'err', response: 'connect ECONNREFUSED 127.0.0.1:8080' });
        expect(parseOrderResponse(response, 0.00025)).toEqual({
            success: false,
            error: 'connect ECONNREFUSED 127.0.0.1:8080',
        });
    });

    it('rejects a reply of the wrong shape', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ ok: true }), { status: 200 })));

        const gateway = new HttpExecutionGateway('http://127.0.0.1:8080');
        const response = await gateway.order(SPOT_BUY);

        expect(response.status).toBe('err');
    });
});

describe('createGateway', () => {
    it('uses paper fills in dry run', () => {
        expect(createGateway(true, '').name).toBe('paper');
    });

    it('uses the executor for live orders', () => {
        expect(createGateway(false, 'http://127.0.0.1:8080').name).toBe('http');
    });

    it('refuses live orders without an executor', () => {
        expect(() => createGateway(false, '')).toThrow('EXECUTION_GATEWAY_URL is required for live orders');
    });
});
