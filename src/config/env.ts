import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
loadEnv();

const booleanFlag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false']).default(fallback).transform(val => val === 'true');

// Define the schema for environment variables
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_TO_FILE: booleanFlag('true'),
    LOG_DIR: z.string().default('./logs'),

    // Hyperliquid endpoints
    HL_WS_URL: z.string().url().default('wss://api.hyperliquid.xyz/ws'),
    HL_API_URL: z.string().url().default('https://api.hyperliquid.xyz'),

    // Trading pair (spot coin uses the @index form)
    SPOT_SYMBOL: z.string().min(1).default('@107'),
    PERP_SYMBOL: z.string().min(1).default('HYPE'),

    // Strategy thresholds (fractions, 0.0015 = 0.15%)
    MIN_SPREAD_THRESHOLD: z.coerce.number().finite().default(0.0015),
    EXIT_THRESHOLD: z.coerce.number().finite().default(0.0003),
    CHECK_FUNDING_RATE: booleanFlag('true'),

    // Risk and order shaping
    MAX_POSITION_USD: z.coerce.number().positive().finite().default(12),
    DRY_RUN: booleanFlag('true'),
    TAKER_FEE_RATE: z.coerce.number().nonnegative().finite().default(0.00025),
    ORDER_SLIPPAGE: z.coerce.number().nonnegative().max(0.05).default(0.001),
    SIZE_DECIMALS: z.coerce.number().int().min(0).max(8).default(2),
    PRICE_DECIMALS: z.coerce.number().int().min(0).max(8).default(4),

    // WebSocket session
    WS_RECONNECT_DELAY_MS: z.coerce.number().int().positive().finite().default(5000),
    WS_RECONNECT_MAX_DELAY_MS: z.coerce.number().int().positive().finite().default(60000),
    WS_PING_INTERVAL_MS: z.coerce.number().int().positive().finite().default(20000),
    WS_TEST_TIMEOUT_MS: z.coerce.number().int().positive().finite().default(5000),
    SPREAD_SNAPSHOT_INTERVAL_MS: z.coerce.number().int().positive().finite().default(30000),

    // Account polling (funding rate + margin)
    ACCOUNT_ADDRESS: z.string().default(''),
    ACCOUNT_POLL_INTERVAL_MS: z.coerce.number().int().positive().finite().default(15000),
    ACCOUNT_STALE_AFTER_ERRORS: z.coerce.number().int().positive().default(3),

    // Live order executor (holds the signing key, outside this process)
    EXECUTION_GATEWAY_URL: z.string().default(''),

    // Trade event file shared with the dashboard
    EVENTS_FILE: z.string().default('trade_events.json'),
    OPPORTUNITY_COOLDOWN_MS: z.coerce.number().int().nonnegative().finite().default(60000),
})
    .refine(cfg => cfg.WS_RECONNECT_MAX_DELAY_MS >= cfg.WS_RECONNECT_DELAY_MS, {
        message: 'Must be >= WS_RECONNECT_DELAY_MS',
        path: ['WS_RECONNECT_MAX_DELAY_MS'],
    })
    .refine(cfg => cfg.DRY_RUN || cfg.ACCOUNT_ADDRESS.length > 0, {
        message: 'Required when DRY_RUN=false',
        path: ['ACCOUNT_ADDRESS'],
    })
    .refine(cfg => cfg.DRY_RUN || cfg.EXECUTION_GATEWAY_URL.length > 0, {
        message: 'Required when DRY_RUN=false',
        path: ['EXECUTION_GATEWAY_URL'],
    });

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment map without side effects
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
    return envSchema.parse(source);
}

// Parse and validate environment variables
function validateEnv(): Env {
    try {
        return parseEnv(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error('❌ Invalid environment variables:');
            error.errors.forEach(err => {
                console.error(`  - ${err.path.join('.')}: ${err.message}`);
            });
            process.exit(1);
        }
        throw error;
    }
}

// Export validated environment configuration
export const env = validateEnv();
