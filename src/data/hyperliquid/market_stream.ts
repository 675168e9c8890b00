import WebSocket from 'ws';
import { logger, describeError } from '../../infra/logger.js';
import { env } from '../../config/env.js';
import { ExponentialBackoff } from '../../infra/backoff.js';
import {
    bookFromLevels,
    emptyPriceState,
    entrySpread,
    exitSpread,
    isReady,
    type PriceState,
} from './price_state.js';
import { l2BookDataSchema, wsFrameSchema, type L2BookData, type SubscribeRequest, type WsFrame } from './types.js';

export interface MarketStreamOptions {
    wsUrl: string;
    spotSymbol: string;
    perpSymbol: string;
    reconnectDelayMs: number;
    reconnectMaxDelayMs: number;
    pingIntervalMs: number;
    snapshotIntervalMs: number;
    testTimeoutMs: number;
}

export function streamOptionsFromEnv(): MarketStreamOptions {
    return {
        wsUrl: env.HL_WS_URL,
        spotSymbol: env.SPOT_SYMBOL,
        perpSymbol: env.PERP_SYMBOL,
        reconnectDelayMs: env.WS_RECONNECT_DELAY_MS,
        reconnectMaxDelayMs: env.WS_RECONNECT_MAX_DELAY_MS,
        pingIntervalMs: env.WS_PING_INTERVAL_MS,
        snapshotIntervalMs: env.SPREAD_SNAPSHOT_INTERVAL_MS,
        testTimeoutMs: env.WS_TEST_TIMEOUT_MS,
    };
}

export type PriceListener = (prices: PriceState) => void;

/**
 * Hyperliquid L2 book stream for one spot/perp pair.
 *
 * Owns a single socket at a time. Each `l2Book` frame replaces the matching
 * leg's snapshot, and the listener only ever sees a state where both legs
 * are valid.
 */
export class HyperliquidMarketStream {
    private ws: WebSocket | null = null;
    private running = false;
    private prices: PriceState;
    private listener: PriceListener | null = null;
    private pingTimer: NodeJS.Timeout | null = null;
    private snapshotTimer: NodeJS.Timeout | null = null;
    private pendingWait: { timer: NodeJS.Timeout; resolve: () => void } | null = null;
    private loop: Promise<void> | null = null;

    private readonly backoff: ExponentialBackoff;
    private readonly textDecoder = new TextDecoder();

    constructor(private readonly options: MarketStreamOptions = streamOptionsFromEnv()) {
        this.prices = emptyPriceState(options.spotSymbol, options.perpSymbol);
        this.backoff = new ExponentialBackoff(options.reconnectDelayMs, options.reconnectMaxDelayMs);
    }

    public onPriceUpdate(listener: PriceListener): void {
        this.listener = listener;
    }

    public getPrices(): PriceState {
        return this.prices;
    }

    public isRunning(): boolean {
        return this.running;
    }

    /**
     * Connect and keep reconnecting until `disconnect()` is called.
     * Resolves once the reconnect loop has ended.
     */
    public async connect(): Promise<void> {
        if (this.loop) {
            logger.warn('hl.stream.already_running', { url: this.options.wsUrl });
            return;
        }

        this.running = true;
        this.loop = this.runLoop();

        try {
            await this.loop;
        } finally {
            this.loop = null;
        }
    }

    /**
     * Stop the stream and wait for the current socket to close; safe to call
     * repeatedly
     */
    public async disconnect(): Promise<void> {
        this.running = false;

        if (this.pendingWait) {
            clearTimeout(this.pendingWait.timer);
            this.pendingWait.resolve();
            this.pendingWait = null;
        }

        this.stopPing();
        this.stopSnapshotTimer();

        const ws = this.ws;
        if (ws && ws.readyState !== WebSocket.CLOSED && ws.readyState !== WebSocket.CLOSING) {
            ws.close();
            logger.info('hl.ws.closing', { url: this.options.wsUrl });
        }

        if (this.loop) {
            await this.loop;
        }
    }

    private async runLoop(): Promise<void> {
        this.backoff.reset();
        this.startSnapshotTimer();

        while (this.running) {
            await this.runSession();

            if (!this.running) {
                break;
            }

            const delayMs = this.backoff.next();
            logger.info('hl.ws.reconnecting', {
                delayMs,
                nextDelayMs: this.backoff.peek(),
            });
            await this.wait(delayMs);
        }

        this.stopSnapshotTimer();
        logger.info('hl.stream.stopped', { url: this.options.wsUrl });
    }

    /**
     * One-shot health check on its own socket. Resolves true once any frame
     * arrives for a perp subscription within the timeout.
     */
    public testConnection(timeoutMs: number = this.options.testTimeoutMs): Promise<boolean> {
        return new Promise(resolve => {
            let settled = false;
            let socket: WebSocket;
            let timer: NodeJS.Timeout | null = null;

            const finish = (ok: boolean, detail: Record<string, unknown>) => {
                if (settled) {
                    return;
                }
                settled = true;
                if (timer) {
                    clearTimeout(timer);
                }
                if (ok) {
                    logger.info('hl.test.ok', detail);
                } else {
                    logger.error('hl.test.failed', detail);
                }
                if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
                    socket.terminate();
                }
                resolve(ok);
            };

            try {
                socket = new WebSocket(this.options.wsUrl);
            } catch (error) {
                logger.error('hl.test.failed', describeError(error));
                resolve(false);
                return;
            }

            timer = setTimeout(() => finish(false, { reason: 'timeout', timeoutMs }), timeoutMs);

            socket.on('open', () => {
                socket.send(JSON.stringify(this.subscription(this.options.perpSymbol)));
            });
            socket.on('message', (data: WebSocket.RawData) => {
                const parsed = this.parseFrame(this.decode(data));
                finish(true, { channel: parsed?.channel ?? 'unknown' });
            });
            socket.on('error', (error: Error) => finish(false, describeError(error)));
            socket.on('close', () => finish(false, { reason: 'closed' }));
        });
    }

    /**
     * Apply one raw frame. Public so feeds can be replayed without a socket.
     */
    public handleMessage(raw: string): void {
        const frame = this.parseFrame(raw);
        if (!frame) {
            return;
        }

        if (frame.channel === 'subscriptionResponse') {
            logger.debug('hl.ws.subscribed', { data: frame.data });
            return;
        }

        if (frame.channel !== 'l2Book') {
            return;
        }

        const book = l2BookDataSchema.safeParse(frame.data);
        if (!book.success) {
            logger.error('hl.ws.parse_error', {
                channel: frame.channel,
                error: book.error.message,
            });
            return;
        }

        this.applyBook(book.data);
    }

    private applyBook(data: L2BookData): void {
        const bids = data.levels[0] ?? [];
        const asks = data.levels[1] ?? [];
        const book = bookFromLevels(data.coin, bids, asks, Date.now());

        if (data.coin === this.options.spotSymbol) {
            this.prices = { spot: book, perp: this.prices.perp };
        } else if (data.coin === this.options.perpSymbol) {
            this.prices = { spot: this.prices.spot, perp: book };
        } else {
            logger.debug('hl.book.unknown_coin', { coin: data.coin });
            return;
        }

        logger.debug('hl.book', {
            coin: book.symbol,
            bid: book.bestBid,
            ask: book.bestAsk,
        });

        if (!this.listener || !isReady(this.prices)) {
            return;
        }

        try {
            this.listener(this.prices);
        } catch (error) {
            logger.error('hl.listener.error', describeError(error));
        }
    }

    /**
     * Run one socket until it closes
     */
    private runSession(): Promise<void> {
        return new Promise(resolve => {
            let ws: WebSocket;
            try {
                ws = new WebSocket(this.options.wsUrl);
            } catch (error) {
                logger.error('hl.ws.connection_failed', describeError(error));
                resolve();
                return;
            }

            this.ws = ws;

            ws.on('open', () => {
                this.backoff.reset();
                for (const symbol of [this.options.spotSymbol, this.options.perpSymbol]) {
                    ws.send(JSON.stringify(this.subscription(symbol)));
                }
                this.startPing(ws);
                logger.info('hl.ws.connected', {
                    url: this.options.wsUrl,
                    symbols: [this.options.spotSymbol, this.options.perpSymbol],
                });
            });

            ws.on('message', (data: WebSocket.RawData) => {
                this.handleMessage(this.decode(data));
            });

            ws.on('error', (error: Error) => {
                logger.error('hl.ws.error', describeError(error));
            });

            ws.on('close', (code: number, reason: Buffer) => {
                this.stopPing();
                if (this.ws === ws) {
                    this.ws = null;
                }
                // Books from a dead session must not pair with fresh ones
                this.prices = emptyPriceState(this.options.spotSymbol, this.options.perpSymbol);
                logger.warn('hl.ws.disconnected', {
                    code,
                    reason: reason.toString(),
                    shuttingDown: !this.running,
                });
                resolve();
            });
        });
    }

    /**
     * Backoff sleep that `disconnect()` can cut short
     */
    private wait(ms: number): Promise<void> {
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.pendingWait = null;
                resolve();
            }, ms);
            this.pendingWait = { timer, resolve };
        });
    }

    private subscription(coin: string): SubscribeRequest {
        return {
            method: 'subscribe',
            subscription: { type: 'l2Book', coin },
        };
    }

    private parseFrame(raw: string): WsFrame | null {
        try {
            const result = wsFrameSchema.safeParse(JSON.parse(raw));
            if (!result.success) {
                logger.error('hl.ws.parse_error', { error: result.error.message });
                return null;
            }
            return result.data;
        } catch (error) {
            logger.error('hl.ws.parse_error', describeError(error));
            return null;
        }
    }

    private decode(data: WebSocket.RawData): string {
        if (Buffer.isBuffer(data)) {
            return data.toString('utf-8');
        }
        if (Array.isArray(data)) {
            return Buffer.concat(data).toString('utf-8');
        }
        return this.textDecoder.decode(data);
    }

    private startPing(ws: WebSocket): void {
        this.stopPing();
        this.pingTimer = setInterval(() => {
            if (ws.readyState === WebSocket.OPEN) {
                ws.ping();
            }
        }, this.options.pingIntervalMs);
    }

    private stopPing(): void {
        if (this.pingTimer) {
            clearInterval(this.pingTimer);
            this.pingTimer = null;
        }
    }

    /**
     * Periodic spread log while the stream runs
     */
    private startSnapshotTimer(): void {
        this.stopSnapshotTimer();
        this.snapshotTimer = setInterval(() => {
            if (!isReady(this.prices)) {
                return;
            }
            logger.info('hl.spread.snapshot', {
                spot: { bid: this.prices.spot.bestBid, ask: this.prices.spot.bestAsk },
                perp: { bid: this.prices.perp.bestBid, ask: this.prices.perp.bestAsk },
                entrySpreadPct: (entrySpread(this.prices) * 100).toFixed(4),
                exitSpreadPct: (exitSpread(this.prices) * 100).toFixed(4),
            });
        }, this.options.snapshotIntervalMs);
    }

    private stopSnapshotTimer(): void {
        if (this.snapshotTimer) {
            clearInterval(this.snapshotTimer);
            this.snapshotTimer = null;
        }
    }
}
