import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { parseEnv } from './env.js';

describe('parseEnv', () => {
    it('fills in defaults for an empty environment', () => {
        const parsed = parseEnv({});

        expect(parsed).toMatchObject({
            SPOT_SYMBOL: '@107',
            PERP_SYMBOL: 'HYPE',
            MIN_SPREAD_THRESHOLD: 0.0015,
            EXIT_THRESHOLD: 0.0003,
            CHECK_FUNDING_RATE: true,
            MAX_POSITION_USD: 12,
            DRY_RUN: true,
            TAKER_FEE_RATE: 0.00025,
            WS_RECONNECT_DELAY_MS: 5000,
            WS_RECONNECT_MAX_DELAY_MS: 60000,
            EVENTS_FILE: 'trade_events.json',
        });
    });

    it('coerces numbers and flags from strings', () => {
        const parsed = parseEnv({
            MIN_SPREAD_THRESHOLD: '0.002',
            CHECK_FUNDING_RATE: 'false',
            SIZE_DECIMALS: '1',
        });

        expect(parsed.MIN_SPREAD_THRESHOLD).toBe(0.002);
        expect(parsed.CHECK_FUNDING_RATE).toBe(false);
        expect(parsed.SIZE_DECIMALS).toBe(1);
    });

    it('requires an account and executor for live trading', () => {
        expect(() => parseEnv({ DRY_RUN: 'false' })).toThrow(ZodError);
        expect(parseEnv({
            DRY_RUN: 'false',
            ACCOUNT_ADDRESS: '0x0000000000000000000000000000000000000001',
            EXECUTION_GATEWAY_URL: 'http://127.0.0.1:8080',
        }).DRY_RUN).toBe(false);
    });

    it('rejects a reconnect cap below the initial delay', () => {
        expect(() => parseEnv({ WS_RECONNECT_DELAY_MS: '5000', WS_RECONNECT_MAX_DELAY_MS: '1000' })).toThrow(ZodError);
    });
});
