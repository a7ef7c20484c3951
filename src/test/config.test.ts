import { describe, it, expect } from '@jest/globals';
import {
    WEATHER_API_KEY_PLACEHOLDER,
    getEnvVarNumber,
    hasWeatherCredentials,
    hasWebhookSecret,
    loadConfig,
} from '../config.js';

describe('loadConfig', () => {
    it('applies defaults for an empty environment', () => {
        const cfg = loadConfig({});

        expect(cfg).toMatchObject({
            host: '0.0.0.0',
            port: 8000,
            trustProxy: false,
            logLevel: 'info',
            logDir: 'logs',
            logToFile: true,
            weatherApiKey: '',
            weatherApiUrl: 'https://api.openweathermap.org/data/2.5',
            weatherTimeoutMs: 5000,
            weatherMaxAttempts: 3,
            weatherBackoffBaseMs: 500,
            weatherBackoffJitterMs: 100,
            webhookAuthToken: '',
            webhookPublicUrl: '',
            rateLimitWindowSeconds: 60,
            rateLimitMaxRequests: 5,
            databaseUrl: '',
            databasePort: 5432,
            databaseSslRejectUnauthorized: true,
            databasePoolSize: 5,
            sqlitePath: 'data/weather_bot.db',
            healthcheckTimeoutMs: 2000,
        });
        expect(hasWeatherCredentials(cfg)).toBe(false);
        expect(hasWebhookSecret(cfg)).toBe(false);
    });

    it('reads custom values', () => {
        const cfg = loadConfig({
            PORT: '9090',
            LOG_LEVEL: 'DEBUG',
            LOG_TO_FILE: 'false',
            TRUST_PROXY: 'true',
            WEATHER_API_KEY: ' test-key ',
            TWILIO_AUTH_TOKEN: 'test-secret',
            RATE_LIMIT_WINDOW_SECONDS: '30',
            RATE_LIMIT_MAX_REQUESTS: '10',
            DB_SSL_REJECT_UNAUTHORIZED: 'false',
        });

        expect(cfg.port).toBe(9090);
        expect(cfg.logLevel).toBe('debug');
        expect(cfg.logToFile).toBe(false);
        expect(cfg.trustProxy).toBe(true);
        expect(cfg.weatherApiKey).toBe('test-key');
        expect(cfg.rateLimitWindowSeconds).toBe(30);
        expect(cfg.rateLimitMaxRequests).toBe(10);
        expect(cfg.databaseSslRejectUnauthorized).toBe(false);
        expect(hasWeatherCredentials(cfg)).toBe(true);
        expect(hasWebhookSecret(cfg)).toBe(true);
    });

    it('prefers PORT over API_PORT', () => {
        expect(loadConfig({ API_PORT: '8100' }).port).toBe(8100);
        expect(loadConfig({ API_PORT: '8100', PORT: '8200' }).port).toBe(8200);
    });

    it('treats the sample placeholder key as missing', () => {
        const cfg = loadConfig({ WEATHER_API_KEY: WEATHER_API_KEY_PLACEHOLDER });

        expect(cfg.weatherApiKey).toBe('');
        expect(hasWeatherCredentials(cfg)).toBe(false);
    });

    it('falls back to defaults for invalid or non-positive limits', () => {
        const cfg = loadConfig({
            RATE_LIMIT_MAX_REQUESTS: 'lots',
            RATE_LIMIT_WINDOW_SECONDS: '-5',
            WEATHER_MAX_ATTEMPTS: '0',
        });

        expect(cfg.rateLimitMaxRequests).toBe(5);
        expect(cfg.rateLimitWindowSeconds).toBe(60);
        expect(cfg.weatherMaxAttempts).toBe(3);
    });
});

describe('getEnvVarNumber', () => {
    it('parses floats and falls back on garbage', () => {
        expect(getEnvVarNumber({ X: '2.5' }, 'X', 1)).toBe(2.5);
        expect(getEnvVarNumber({ X: 'abc' }, 'X', 1)).toBe(1);
        expect(getEnvVarNumber({}, 'X', 1)).toBe(1);
    });
});
