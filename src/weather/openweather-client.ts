/**
 * OpenWeatherMap API Client
 * Current conditions by place name, with retry on transient failures.
 * Falls back to an offline placeholder when no API key is configured.
 * Documentation: https://openweathermap.org/current
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../logger.js';
import { UpstreamError, errorMessage } from '../errors.js';
import { withRetry } from './retry.js';
import { WeatherFetchResult, WeatherProvider, WeatherReading } from './types.js';

export const OFFLINE_DESCRIPTION = 'offline mode: live weather unavailable';

/**
 * Subset of the /weather response we read
 */
const currentWeatherSchema = z.object({
    name: z.string().optional(),
    weather: z.array(z.object({ description: z.string() })).min(1),
    main: z.object({
        temp: z.number(),
        feels_like: z.number(),
        humidity: z.number(),
    }),
});

export type OWMCurrentResponse = z.infer<typeof currentWeatherSchema>;

export interface OpenWeatherClientOptions {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffJitterMs: number;
    http?: AxiosInstance;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export function offlineReading(city: string): WeatherReading {
    return {
        city,
        temperature: 0,
        feelsLike: 0,
        description: OFFLINE_DESCRIPTION,
        humidity: 0,
    };
}

/**
 * Timeouts, dropped connections, 5xx and 429 are worth another attempt;
 * other 4xx answers (unknown city, bad key) will not change on retry.
 */
export function isTransientError(error: unknown): boolean {
    if (error instanceof UpstreamError) {
        return error.retryable;
    }
    if (!axios.isAxiosError(error)) {
        return false;
    }
    if (error.code === 'ERR_CANCELED') {
        return false;
    }
    const status = error.response?.status;
    if (status === undefined) {
        return true;
    }
    return status >= 500 || status === 429;
}

function toUpstreamError(error: unknown, city: string): UpstreamError {
    if (error instanceof UpstreamError) {
        return error;
    }

    const retryable = isTransientError(error);

    if (axios.isAxiosError(error)) {
        const status = error.response?.status ?? null;
        if (status === 404) {
            return new UpstreamError(`City not found: ${city}`, status, false, { cause: error });
        }
        if (status !== null) {
            return new UpstreamError(`Weather provider returned HTTP ${status}`, status, retryable, { cause: error });
        }
        return new UpstreamError(
            `Weather provider unreachable: ${error.code ?? error.message}`,
            null,
            retryable,
            { cause: error }
        );
    }

    return new UpstreamError(`Weather lookup failed: ${errorMessage(error)}`, null, retryable, { cause: error });
}

export class OpenWeatherClient implements WeatherProvider {
    private client: AxiosInstance;
    private readonly options: OpenWeatherClientOptions;

    constructor(options: OpenWeatherClientOptions) {
        this.options = options;
        this.client = options.http ?? axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
        });

        if (!this.isConfigured()) {
            logger.warn('Weather API key not found, lookups will return offline placeholder data');
        }
    }

    /**
     * Check if the client is configured with an API key
     */
    isConfigured(): boolean {
        return this.options.apiKey.length > 0;
    }

    async fetchCurrent(city: string): Promise<WeatherFetchResult> {
        if (!this.isConfigured()) {
            logger.info(`Using offline weather placeholder for ${city}`);
            return { mode: 'offline', reading: offlineReading(city) };
        }

        try {
            const reading = await withRetry(() => this.requestCurrent(city), {
                attempts: this.options.maxAttempts,
                baseDelayMs: this.options.backoffBaseMs,
                jitterMs: this.options.backoffJitterMs,
                shouldRetry: isTransientError,
                sleep: this.options.sleep,
                random: this.options.random,
                onRetry: ({ attempt, attempts, delayMs, error }) => {
                    logger.warn(`Transient error fetching weather for ${city} (attempt ${attempt}/${attempts}), retrying in ${delayMs}ms`, {
                        error: errorMessage(error),
                    });
                },
            });

            logger.info(`Weather data fetched for ${city}, temperature: ${reading.temperature}°C`);
            return { mode: 'live', reading };
        } catch (error) {
            throw toUpstreamError(error, city);
        }
    }

    private async requestCurrent(city: string): Promise<WeatherReading> {
        const response = await this.client.get<unknown>('/weather', {
            params: {
                q: city,
                appid: this.options.apiKey,
                units: 'metric',
            },
        });

        const parsed = currentWeatherSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new UpstreamError('Malformed response from weather provider', response.status, false);
        }

        const data = parsed.data;
        return {
            city,
            temperature: data.main.temp,
            feelsLike: data.main.feels_like,
            description: data.weather[0].description,
            humidity: Math.min(100, Math.max(0, Math.round(data.main.humidity))),
        };
    }
}
