/**
 * Lookup Orchestrator
 * Runs one inbound request through
 *   received → authenticated → rate-checked → validated → fetched → persisted → responded
 * stopping at the first failing stage. Nothing here retries; the provider
 * client retries internally.
 */

import { logger } from '../logger.js';
import { AuthenticationError, LookupError, RateLimitError } from '../errors.js';
import { LookupMetrics, MessageType } from '../metrics/lookup-metrics.js';
import { WeatherStore } from '../storage/types.js';
import { normalizeCity, parseWith, weatherRequestSchema, webhookFormSchema } from '../weather/city-validation.js';
import { FetchMode, WeatherProvider, WeatherRecord } from '../weather/types.js';
import { RateLimiter } from '../web/rate-limiter.js';
import { verifySignature } from '../web/signature.js';
import {
    GREETING_REPLY,
    HELP_REPLY,
    PING_REPLY,
    formatErrorReply,
    formatWeatherReply,
} from './reply-formatter.js';

export type MessageCommand = 'greeting' | 'help' | 'ping';

export type WeatherOutcome = { kind: 'weather'; record: WeatherRecord; mode: FetchMode; reply: string };
export type CommandOutcome = { kind: 'command'; command: MessageCommand; reply: string };
export type ErrorOutcome = { kind: 'error'; error: LookupError; reply: string };

export type LookupOutcome = WeatherOutcome | CommandOutcome | ErrorOutcome;

/**
 * The direct channel has no commands
 */
export type DirectOutcome = WeatherOutcome | ErrorOutcome;

export interface WebhookCall {
    url: string;
    rawBody: string;
    signature: string | undefined;
    form: unknown;
}

export interface DirectCall {
    clientKey: string;
    body: unknown;
}

export interface LookupOrchestratorDeps {
    weatherClient: WeatherProvider;
    store: WeatherStore;
    rateLimiter: RateLimiter;
    metrics: LookupMetrics;
    webhookSecret: string;
}

const COMMANDS = new Map<string, MessageCommand>([
    ['hello', 'greeting'],
    ['hi', 'greeting'],
    ['start', 'greeting'],
    ['help', 'help'],
    ['?', 'help'],
    ['ping', 'ping'],
]);

const COMMAND_REPLIES: Record<MessageCommand, string> = {
    greeting: GREETING_REPLY,
    help: HELP_REPLY,
    ping: PING_REPLY,
};

export function matchCommand(text: string): MessageCommand | undefined {
    return COMMANDS.get(text.trim().toLowerCase());
}

function messageTypeFor(error: LookupError): MessageType {
    switch (error.kind) {
        case 'authentication':
            return 'unauthorized';
        case 'rate_limit':
            return 'rate_limited';
        case 'validation':
            return 'invalid_input';
        case 'upstream':
            return 'weather_error';
        case 'persistence':
            return 'database_error';
    }
}

export class LookupOrchestrator {
    private readonly deps: LookupOrchestratorDeps;

    constructor(deps: LookupOrchestratorDeps) {
        this.deps = deps;
        if (!deps.webhookSecret) {
            logger.warn('Webhook secret not configured, signature verification is disabled (insecure mode)');
        }
    }

    /**
     * Messaging-platform webhook: signed form post with sender and text
     */
    async handleWebhook(call: WebhookCall): Promise<LookupOutcome> {
        try {
            this.authenticate(call);

            const form = parseWith(webhookFormSchema, call.form);
            logger.info(`Webhook received from ${form.From}, body length: ${form.Body.length}`);

            this.checkRateLimit(form.From);

            const command = matchCommand(form.Body);
            if (command) {
                this.deps.metrics.recordMessage(command);
                return { kind: 'command', command, reply: COMMAND_REPLIES[command] };
            }

            const outcome = await this.lookup(form.Body);
            this.deps.metrics.recordMessage('weather_success');
            return outcome;
        } catch (error) {
            return this.fail(error, 'webhook');
        }
    }

    /**
     * Direct API call: JSON body with a city field, rate limited per client
     */
    async handleDirect(call: DirectCall): Promise<DirectOutcome> {
        try {
            this.checkRateLimit(call.clientKey);
            const request = parseWith(weatherRequestSchema, call.body);
            logger.info(`Weather API requested for city: ${request.city}`);
            return await this.lookup(request.city);
        } catch (error) {
            return this.fail(error, 'direct');
        }
    }

    private authenticate(call: WebhookCall): void {
        const secret = this.deps.webhookSecret;
        if (!secret) {
            logger.debug('Skipping webhook signature verification, no secret configured');
            return;
        }

        const valid = verifySignature({
            url: call.url,
            rawBody: call.rawBody,
            signature: call.signature,
            secret,
        });
        if (!valid) {
            throw new AuthenticationError(call.signature ? 'Invalid webhook signature' : 'Missing webhook signature');
        }
    }

    private checkRateLimit(senderKey: string): void {
        const { rateLimiter, metrics } = this.deps;
        if (!rateLimiter.admit(senderKey)) {
            metrics.recordRateLimited(senderKey);
            throw new RateLimitError(senderKey, rateLimiter.retryAfterSeconds(senderKey));
        }
    }

    /**
     * validated → fetched → persisted
     */
    private async lookup(rawCity: unknown): Promise<WeatherOutcome> {
        const city = normalizeCity(rawCity);
        const { weatherClient, store, metrics } = this.deps;

        const result = await weatherClient.fetchCurrent(city).catch((error: unknown) => {
            metrics.recordLookup(city, 'error');
            throw error;
        });

        const record = await store.save(result.reading).catch((error: unknown) => {
            metrics.recordLookup(city, 'error');
            throw error;
        });
        metrics.recordLookup(city, result.mode === 'live' ? 'success' : 'offline');

        logger.info(`Weather lookup completed for ${city}`, { id: record.id, mode: result.mode });
        return {
            kind: 'weather',
            record,
            mode: result.mode,
            reply: formatWeatherReply(record, result.mode),
        };
    }

    private fail(error: unknown, channel: 'webhook' | 'direct'): ErrorOutcome {
        if (!(error instanceof LookupError)) {
            throw error;
        }

        if (channel === 'webhook') {
            this.deps.metrics.recordMessage(messageTypeFor(error));
        }

        const meta = { channel, kind: error.kind };
        if (error.kind === 'upstream' || error.kind === 'persistence') {
            logger.error(`Lookup failed: ${error.message}`, meta);
        } else {
            logger.warn(`Request rejected: ${error.message}`, meta);
        }

        return { kind: 'error', error, reply: formatErrorReply(error) };
    }
}
