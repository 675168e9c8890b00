import { env } from './config/env.js';
import { logger, describeError } from './infra/logger.js';
import { EventBus } from './infra/event_bus.js';
import { HyperliquidMarketStream } from './data/hyperliquid/market_stream.js';
import { HyperliquidInfoClient } from './data/hyperliquid/info_client.js';
import { AccountFeed } from './data/hyperliquid/account_feed.js';
import { ArbitrageStateMachine, strategyConfigFromEnv } from './strategy/arbitrage_machine.js';
import { createGateway } from './execution/create_gateway.js';

// Global references for shutdown
let stream: HyperliquidMarketStream | null = null;
let accountFeed: AccountFeed | null = null;

/**
 * Main application entry point
 */
async function main() {
    logger.info('app.boot', {
        message: 'Application starting...',
        environment: env.NODE_ENV,
    });

    console.log('\n✅ Boot OK');
    console.log(`⏰ Timestamp: ${new Date().toISOString()}`);
    console.log(`🌍 Environment: ${env.NODE_ENV}`);
    console.log(`📝 Log Level: ${env.LOG_LEVEL}`);
    console.log(`\n🔸 Pair:`);
    console.log(`  📊 Spot: ${env.SPOT_SYMBOL}`);
    console.log(`  📊 Perp: ${env.PERP_SYMBOL}`);
    console.log(`\n🎯 Strategy:`);
    console.log(`  📈 Entry Threshold: ${(env.MIN_SPREAD_THRESHOLD * 100).toFixed(2)}%`);
    console.log(`  📉 Exit Threshold: ${(env.EXIT_THRESHOLD * 100).toFixed(2)}%`);
    console.log(`  💰 Max Position: $${env.MAX_POSITION_USD}`);
    console.log(`  💹 Funding Gate: ${env.CHECK_FUNDING_RATE ? 'Enabled' : 'Disabled'}`);
    console.log(`  🧪 Dry Run: ${env.DRY_RUN ? 'Yes' : 'NO - LIVE ORDERS'}\n`);

    if (!env.DRY_RUN) {
        logger.warn('app.live_mode', { message: 'Live trading enabled, real orders will be placed' });
    }

    const events = new EventBus(env.EVENTS_FILE, env.PERP_SYMBOL);

    accountFeed = new AccountFeed(new HyperliquidInfoClient(env.HL_API_URL), {
        perpSymbol: env.PERP_SYMBOL,
        accountAddress: env.ACCOUNT_ADDRESS,
        intervalMs: env.ACCOUNT_POLL_INTERVAL_MS,
        staleAfterErrors: env.ACCOUNT_STALE_AFTER_ERRORS,
    });
    await accountFeed.start();

    const gateway = createGateway(env.DRY_RUN, env.EXECUTION_GATEWAY_URL);
    const machine = new ArbitrageStateMachine(strategyConfigFromEnv(), gateway, events, accountFeed);

    stream = new HyperliquidMarketStream();
    stream.onPriceUpdate(prices => {
        machine.handlePriceUpdate(prices).catch(error => {
            logger.error('arb.update.failed', describeError(error));
        });
    });

    logger.info('app.ready', {
        message: 'Application initialized successfully',
        state: machine.getState(),
    });

    await stream.connect();
}

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string) {
    logger.info('app.shutdown', {
        message: `Received ${signal}, shutting down gracefully...`,
    });

    accountFeed?.stop();
    await stream?.disconnect();

    setTimeout(() => {
        process.exit(0);
    }, 1000);
}

function onSignal(signal: string) {
    gracefulShutdown(signal).catch(error => {
        logger.error('app.shutdown_failed', describeError(error));
        process.exit(1);
    });
}

process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));

main().catch((error) => {
    logger.error('app.fatal', {
        message: 'Fatal error during application startup',
        ...describeError(error),
    });
    process.exit(1);
});
