import { logger } from '../../infra/logger.js';
import { clearinghouseStateSchema, metaAndAssetCtxsSchema } from './types.js';

/**
 * Read-only Hyperliquid info endpoint client
 */
export class HyperliquidInfoClient {
    private readonly url: string;

    constructor(apiUrl: string) {
        this.url = `${apiUrl.replace(/\/+$/, '')}/info`;
    }

    /**
     * Current hourly funding rate of a perp (positive: shorts earn)
     */
    async getFundingRate(perpSymbol: string): Promise<number> {
        const [meta, ctxs] = metaAndAssetCtxsSchema.parse(await this.post({ type: 'metaAndAssetCtxs' }));

        const index = meta.universe.findIndex(asset => asset.name === perpSymbol);
        const ctx = index >= 0 ? ctxs[index] : undefined;
        if (!ctx) {
            throw new Error(`Unknown perp symbol: ${perpSymbol}`);
        }

        const funding = parseFloat(ctx.funding);
        if (!Number.isFinite(funding)) {
            throw new Error(`Invalid funding for ${perpSymbol}: ${ctx.funding}`);
        }

        return funding;
    }

    /**
     * Withdrawable perp margin of an account, in USD
     */
    async getAvailableMargin(user: string): Promise<number> {
        const state = clearinghouseStateSchema.parse(await this.post({ type: 'clearinghouseState', user }));
        const margin = parseFloat(state.withdrawable);

        if (!Number.isFinite(margin)) {
            throw new Error(`Invalid withdrawable margin: ${state.withdrawable}`);
        }

        return margin;
    }

    private async post(body: Record<string, unknown>): Promise<unknown> {
        logger.debug('hl.info.request', body);

        const response = await fetch(this.url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
        });

        if (!response.ok) {
            throw new Error(`Info API error: ${response.status} ${response.statusText}`);
        }

        return response.json();
    }
}
