import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { logger, describeError } from './logger.js';

export const MAX_EVENTS = 100;

const tradeEventSchema = z.object({
    timestamp: z.string(),
    event_type: z.enum(['entry', 'exit', 'opportunity', 'error']),
    message: z.string(),
    details: z.record(z.unknown()).default({}),
});

const positionMirrorSchema = z.object({
    size: z.number(),
    entry_spot: z.number(),
    entry_perp: z.number(),
    entry_spread: z.number(),
    entry_time: z.string(),
});

const eventFileSchema = z.object({
    events: z.array(tradeEventSchema).default([]),
    trades_executed: z.number().int().nonnegative().default(0),
    total_pnl: z.number().default(0),
    current_position: positionMirrorSchema.nullable().default(null),
    last_update: z.string().optional(),
});

export type TradeEvent = z.infer<typeof tradeEventSchema>;
export type TradeEventKind = TradeEvent['event_type'];
export type PositionMirror = z.infer<typeof positionMirrorSchema>;
export type EventFile = z.infer<typeof eventFileSchema>;

export interface EventStats {
    trades_executed: number;
    total_pnl: number;
    current_position: PositionMirror | null;
}

export interface EntryRecord {
    size: number;
    spotPrice: number;
    perpPrice: number;
    spread: number;
    entryTime: Date;
}

export interface ExitRecord {
    size: number;
    spotPrice: number;
    perpPrice: number;
    grossPnl: number;
    fees: number;
    netPnl: number;
}

/**
 * Append-only trade/error record shared with the dashboard through a JSON
 * file. Every mutation persists the whole snapshot before resolving; reads
 * reload from disk so another process sees the latest state.
 */
export class EventBus {
    private events: TradeEvent[] = [];
    private tradesExecuted = 0;
    private totalPnl = 0;
    private currentPosition: PositionMirror | null = null;
    private initialLoad: Promise<void> | null = null;
    private persistFailed = false;
    // Bumped on every mutation; a reload that straddles one is discarded
    private version = 0;

    // Serializes snapshot writes
    private writeChain: Promise<void> = Promise.resolve();

    constructor(
        private readonly filePath: string,
        private readonly assetLabel: string = ''
    ) {}

    async recordEntry(entry: EntryRecord): Promise<void> {
        await this.ensureLoaded();

        this.currentPosition = {
            size: entry.size,
            entry_spot: entry.spotPrice,
            entry_perp: entry.perpPrice,
            entry_spread: entry.spread,
            entry_time: entry.entryTime.toISOString(),
        };

        await this.append(
            'entry',
            `ENTRY: ${entry.size}${this.asset()} @ Spot $${entry.spotPrice.toFixed(4)}, Perp $${entry.perpPrice.toFixed(4)}`,
            {
                size: entry.size,
                spot_price: entry.spotPrice,
                perp_price: entry.perpPrice,
                spread: entry.spread,
            }
        );
    }

    async recordExit(exit: ExitRecord): Promise<void> {
        await this.ensureLoaded();

        this.tradesExecuted += 1;
        this.totalPnl += exit.netPnl;
        this.currentPosition = null;

        await this.append(
            'exit',
            `EXIT: ${exit.size}${this.asset()} @ Spot $${exit.spotPrice.toFixed(4)}, Perp $${exit.perpPrice.toFixed(4)} | P&L: ${formatSigned(exit.netPnl)}`,
            {
                size: exit.size,
                spot_price: exit.spotPrice,
                perp_price: exit.perpPrice,
                gross_pnl: exit.grossPnl,
                fees: exit.fees,
                net_pnl: exit.netPnl,
            }
        );
    }

    async recordError(message: string, details: Record<string, unknown> = {}): Promise<void> {
        await this.ensureLoaded();
        await this.append('error', `ERROR: ${message}`, details);
    }

    async recordOpportunity(message: string, details: Record<string, unknown> = {}): Promise<void> {
        await this.ensureLoaded();
        await this.append('opportunity', message, details);
    }

    /**
     * Drop the position mirror without counting a trade (operator clear)
     */
    async clearPosition(): Promise<void> {
        await this.ensureLoaded();
        this.currentPosition = null;
        await this.persist();
    }

    async reset(): Promise<void> {
        this.initialLoad = Promise.resolve();
        this.events = [];
        this.tradesExecuted = 0;
        this.totalPnl = 0;
        this.currentPosition = null;
        await this.persist();
    }

    async listRecent(limit: number = 50): Promise<TradeEvent[]> {
        await this.refresh();
        return limit > 0 ? this.events.slice(-limit) : [];
    }

    async getStats(): Promise<EventStats> {
        await this.refresh();
        return {
            trades_executed: this.tradesExecuted,
            total_pnl: this.totalPnl,
            current_position: this.currentPosition,
        };
    }

    /**
     * Reload for readers. While the file lags behind memory (last write
     * failed) the in-memory state stays authoritative.
     */
    private async refresh(): Promise<void> {
        await this.ensureLoaded();
        await this.writeChain;
        if (this.persistFailed) {
            return;
        }
        await this.reload();
    }

    private asset(): string {
        return this.assetLabel ? ` ${this.assetLabel}` : '';
    }

    private ensureLoaded(): Promise<void> {
        if (!this.initialLoad) {
            this.initialLoad = this.reload();
        }
        return this.initialLoad;
    }

    /**
     * Replace in-memory state with the file contents, unless a mutation
     * landed while the file was being read
     */
    private async reload(): Promise<void> {
        const seen = this.version;
        const stored = await this.readStored();

        if (!stored || this.version !== seen) {
            return;
        }

        this.events = stored.events.slice(-MAX_EVENTS);
        this.tradesExecuted = stored.trades_executed;
        this.totalPnl = stored.total_pnl;
        this.currentPosition = stored.current_position;
    }

    private async readStored(): Promise<EventFile | null> {
        let raw: string;
        try {
            raw = await readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (!isMissingFile(error)) {
                logger.warn('events.load_failed', { file: this.filePath, ...describeError(error) });
            }
            return null;
        }

        try {
            const parsed = eventFileSchema.safeParse(JSON.parse(raw));
            if (!parsed.success) {
                logger.warn('events.load_invalid', { file: this.filePath, error: parsed.error.message });
                return null;
            }
            return parsed.data;
        } catch (error) {
            logger.warn('events.load_invalid', { file: this.filePath, ...describeError(error) });
            return null;
        }
    }

    private async append(kind: TradeEventKind, message: string, details: Record<string, unknown>): Promise<void> {
        this.events.push({
            timestamp: new Date().toISOString(),
            event_type: kind,
            message,
            details,
        });
        await this.persist();
    }

    /**
     * Write the truncated snapshot; failures are logged, never thrown
     */
    private persist(): Promise<void> {
        this.version++;
        this.events = this.events.slice(-MAX_EVENTS);

        const snapshot: EventFile = {
            events: [...this.events],
            trades_executed: this.tradesExecuted,
            total_pnl: this.totalPnl,
            current_position: this.currentPosition,
            last_update: new Date().toISOString(),
        };

        const write = this.writeChain.then(async () => {
            try {
                const tmpPath = `${this.filePath}.tmp`;
                await mkdir(dirname(this.filePath), { recursive: true });
                await writeFile(tmpPath, JSON.stringify(snapshot, null, 2), 'utf-8');
                await rename(tmpPath, this.filePath);
                this.persistFailed = false;
            } catch (error) {
                this.persistFailed = true;
                logger.error('events.persist_failed', { file: this.filePath, ...describeError(error) });
            }
        });

        this.writeChain = write;
        return write;
    }
}

function formatSigned(value: number): string {
    return `${value >= 0 ? '+' : '-'}$${Math.abs(value).toFixed(4)}`;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
