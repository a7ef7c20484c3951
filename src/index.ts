/**
 * Weather Webhook Bot
 * Entry point
 */

import { Server } from 'http';
import { config, hasWebhookSecret } from './config.js';
import { logger } from './logger.js';
import { errorMeta } from './errors.js';
import { LookupOrchestrator } from './lookup/orchestrator.js';
import { LookupMetrics } from './metrics/lookup-metrics.js';
import { createWeatherStore, resolveDatabaseTarget } from './storage/index.js';
import { OpenWeatherClient } from './weather/openweather-client.js';
import { RateLimiter } from './web/rate-limiter.js';
import { createApp } from './web/server.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', errorMeta(reason));
});

process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', errorMeta(error));
    process.exit(1);
});

// Idle sender windows are dropped on this interval
const RATE_LIMIT_PRUNE_INTERVAL_MS = 5 * 60 * 1000;

async function main(): Promise<void> {
    const target = resolveDatabaseTarget(config);
    const store = createWeatherStore(config, target);

    try {
        logger.info(`Initializing ${target.kind} database...`);
        await store.init();
        logger.info('Database initialized successfully');
    } catch (error) {
        // Keep serving; /health reports the database as disconnected
        logger.error('Failed to initialize database on startup', errorMeta(error));
    }

    const weatherClient = new OpenWeatherClient({
        apiKey: config.weatherApiKey,
        baseUrl: config.weatherApiUrl,
        timeoutMs: config.weatherTimeoutMs,
        maxAttempts: config.weatherMaxAttempts,
        backoffBaseMs: config.weatherBackoffBaseMs,
        backoffJitterMs: config.weatherBackoffJitterMs,
    });

    const rateLimiter = new RateLimiter({
        windowSeconds: config.rateLimitWindowSeconds,
        maxRequests: config.rateLimitMaxRequests,
    });
    const metrics = new LookupMetrics();

    const orchestrator = new LookupOrchestrator({
        weatherClient,
        store,
        rateLimiter,
        metrics,
        webhookSecret: config.webhookAuthToken,
    });

    const app = createApp({
        orchestrator,
        store,
        weatherClient,
        metrics,
        webhookSecretConfigured: hasWebhookSecret(config),
        webhookPublicUrl: config.webhookPublicUrl,
        trustProxy: config.trustProxy,
    });

    const pruneTimer = setInterval(() => {
        const removed = rateLimiter.prune();
        if (removed > 0) {
            logger.debug(`Rate limiter cleanup: removed ${removed} idle senders`);
        }
    }, RATE_LIMIT_PRUNE_INTERVAL_MS);
    pruneTimer.unref();

    const server: Server = app.listen(config.port, config.host, () => {
        logger.info(`Server listening on http://${config.host}:${config.port}`);
    });

    let shuttingDown = false;
    const shutdown = (signal: string): void => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`Received ${signal}, shutting down...`);
        clearInterval(pruneTimer);

        server.close((closeError) => {
            if (closeError) {
                logger.error('Error closing HTTP server', errorMeta(closeError));
            }
            store.close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('Error closing database', errorMeta(error));
                    process.exit(1);
                });
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    logger.error('Fatal error', errorMeta(error));
    process.exit(1);
});
