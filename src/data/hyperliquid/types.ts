import { z } from 'zod';

/**
 * One price level of an L2 book (decimal strings on the wire)
 */
export const l2LevelSchema = z.object({
    px: z.string(),
    sz: z.string(),
    n: z.number().optional(),
});

/**
 * Payload of an `l2Book` channel message: levels = [bids, asks], best first
 */
export const l2BookDataSchema = z.object({
    coin: z.string(),
    time: z.number().optional(),
    levels: z.array(z.array(l2LevelSchema)),
});

/**
 * Any inbound WebSocket frame, keyed by channel
 */
export const wsFrameSchema = z.object({
    channel: z.string(),
    data: z.unknown().optional(),
});

export type L2Level = z.infer<typeof l2LevelSchema>;
export type L2BookData = z.infer<typeof l2BookDataSchema>;
export type WsFrame = z.infer<typeof wsFrameSchema>;

/**
 * Subscription request sent after connect
 */
export interface SubscribeRequest {
    method: 'subscribe';
    subscription: {
        type: 'l2Book';
        coin: string;
    };
}

/**
 * Subset of the `metaAndAssetCtxs` info response needed for funding
 */
export const metaAndAssetCtxsSchema = z.tuple([
    z.object({
        universe: z.array(z.object({ name: z.string() })),
    }),
    z.array(z.object({ funding: z.string() })),
]);

/**
 * Subset of the `clearinghouseState` info response needed for sizing
 */
export const clearinghouseStateSchema = z.object({
    withdrawable: z.string(),
    marginSummary: z.object({
        accountValue: z.string(),
    }).optional(),
});

export type MetaAndAssetCtxs = z.infer<typeof metaAndAssetCtxsSchema>;
export type ClearinghouseState = z.infer<typeof clearinghouseStateSchema>;
