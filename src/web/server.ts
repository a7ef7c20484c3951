import express, { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import compression from 'compression';
import cors from 'cors';
import { logger } from '../logger.js';
import { RateLimitError, errorMeta } from '../errors.js';
import { LookupOrchestrator, LookupOutcome } from '../lookup/orchestrator.js';
import { toMessagingXml } from '../lookup/reply-formatter.js';
import { LookupMetrics } from '../metrics/lookup-metrics.js';
import { WeatherStore } from '../storage/types.js';
import { WeatherProvider } from '../weather/types.js';
import { captureRawBody, extractSignature, getRawBody, resolveCallbackUrl } from './middleware/webhook-validator.js';

export interface ServerDeps {
    orchestrator: LookupOrchestrator;
    store: WeatherStore;
    weatherClient: WeatherProvider;
    metrics: LookupMetrics;
    webhookSecretConfigured: boolean;
    webhookPublicUrl: string;
    trustProxy: boolean;
}

export const OUTCOME_HEADER = 'X-Lookup-Outcome';

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}

function outcomeLabel(outcome: LookupOutcome): string {
    return outcome.kind === 'error' ? outcome.error.kind : outcome.kind;
}

function clientKey(req: Request): string {
    return `ip:${req.ip ?? req.socket.remoteAddress ?? 'unknown'}`;
}

function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

export function createApp(deps: ServerDeps): Express {
    const app = express();
    const { orchestrator, store, weatherClient, metrics } = deps;

    app.set('trust proxy', deps.trustProxy);
    app.use(compression());
    app.use(cors());

    // Webhook bodies are parsed with the raw bytes kept for signature checks
    const webhookParser = express.urlencoded({ extended: false, verify: captureRawBody });
    const jsonParser = express.json();

    app.get('/', (req, res) => {
        res.json({ message: 'Weather Webhook Bot', status: 'running' });
    });

    app.get('/health', asyncRoute(async (req, res) => {
        const databaseConnected = await store.healthcheck();

        res.status(databaseConnected ? 200 : 503).json({
            status: databaseConnected ? 'healthy' : 'unhealthy',
            weatherApiConfigured: weatherClient.isConfigured(),
            webhookSecretConfigured: deps.webhookSecretConfigured,
            databaseBackend: store.backend,
            databaseConnected,
            uptime: process.uptime(),
            timestamp: new Date().toISOString(),
        });
    }));

    app.get('/metrics', (req, res) => {
        res.json(metrics.snapshot());
    });

    app.post('/weather', jsonParser, asyncRoute(async (req, res) => {
        const outcome = await orchestrator.handleDirect({ clientKey: clientKey(req), body: req.body });
        res.set(OUTCOME_HEADER, outcomeLabel(outcome));

        if (outcome.kind === 'weather') {
            const { record } = outcome;
            res.json({
                id: record.id,
                city: record.city,
                temperature: record.temperature,
                feelsLike: record.feelsLike,
                description: record.description,
                humidity: record.humidity,
                createdAt: record.createdAt.toISOString(),
                mode: outcome.mode,
            });
            return;
        }

        const { error } = outcome;
        if (error instanceof RateLimitError) {
            res.set('Retry-After', String(error.retryAfterSeconds));
        }
        res.status(error.statusCode).json({
            error: error.kind,
            message: error.message,
            timestamp: new Date().toISOString(),
        });
    }));

    app.post('/webhook', webhookParser, asyncRoute(async (req, res) => {
        const outcome = await orchestrator.handleWebhook({
            url: resolveCallbackUrl(req, deps.webhookPublicUrl),
            rawBody: getRawBody(req),
            signature: extractSignature(req),
            form: req.body,
        });
        res.set(OUTCOME_HEADER, outcomeLabel(outcome));

        if (outcome.kind === 'error') {
            const { error } = outcome;
            if (error.kind === 'authentication') {
                res.status(403).type('text/plain').send('Forbidden');
                return;
            }
            if (error instanceof RateLimitError) {
                res.set('Retry-After', String(error.retryAfterSeconds));
                res.status(429).type('text/plain').send(outcome.reply);
                return;
            }
        }

        // Everything else is answered in the conversation so the sender sees it
        res.status(200).type('application/xml').send(toMessagingXml(outcome.reply));
        logger.info(`Webhook processed, replying with ${outcomeLabel(outcome)} message`, { replyLength: outcome.reply.length });
    }));

    app.use((req, res) => {
        res.status(404).json({ error: 'not_found', message: `No route for ${req.method} ${req.path}` });
    });

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        const status = statusOf(error);
        if (status !== undefined && status >= 400 && status < 500) {
            logger.warn(`Rejected malformed request to ${req.path}`, { status, ...errorMeta(error) });
            res.status(status).json({ error: 'bad_request', message: 'Malformed request body' });
            return;
        }

        logger.error(`Unhandled error on ${req.method} ${req.path}`, errorMeta(error));
        res.status(500).json({ error: 'internal', message: 'Internal server error' });
    });

    return app;
}
