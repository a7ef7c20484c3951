import dotenv from 'dotenv';

dotenv.config();

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

/**
 * Placeholder shipped in sample .env files; treated as "no key configured"
 */
export const WEATHER_API_KEY_PLACEHOLDER = 'your_openweathermap_api_key_here';

export interface Config {
    // Server
    host: string;
    port: number;
    trustProxy: boolean;

    // Logging
    logLevel: string;
    logDir: string;
    logToFile: boolean;

    // Weather provider
    weatherApiKey: string;
    weatherApiUrl: string;
    weatherTimeoutMs: number;        // Per-attempt timeout
    weatherMaxAttempts: number;      // Total attempts including the first one
    weatherBackoffBaseMs: number;    // Delay before the 2nd attempt, doubled after
    weatherBackoffJitterMs: number;  // Upper bound of the random delay added to each backoff

    // Webhook
    webhookAuthToken: string;        // Shared secret for request signatures (empty = verification off)
    webhookPublicUrl: string;        // Callback URL as registered with the messaging platform

    // Rate limiting
    rateLimitWindowSeconds: number;
    rateLimitMaxRequests: number;

    // Database
    databaseUrl: string;
    databaseHost: string;
    databasePort: number;
    databaseName: string;
    databaseUser: string;
    databasePassword: string;
    databaseSslRejectUnauthorized: boolean;
    databasePoolSize: number;
    sqlitePath: string;
    healthcheckTimeoutMs: number;
}

function getEnvVarOptional(env: EnvSource, name: string, defaultValue: string): string {
    return env[name] || defaultValue;
}

function getEnvVarBool(env: EnvSource, name: string, defaultValue: boolean): boolean {
    const value = env[name];
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true';
}

export function getEnvVarNumber(env: EnvSource, name: string, defaultValue: number): number {
    const value = env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

function getEnvVarPositiveNumber(env: EnvSource, name: string, defaultValue: number): number {
    const parsed = getEnvVarNumber(env, name, defaultValue);
    return parsed > 0 ? parsed : defaultValue;
}

function getEnvVarPositiveInt(env: EnvSource, name: string, defaultValue: number): number {
    const parsed = Math.trunc(getEnvVarNumber(env, name, defaultValue));
    return parsed > 0 ? parsed : defaultValue;
}

export function loadConfig(env: EnvSource = process.env): Config {
    const weatherApiKey = getEnvVarOptional(env, 'WEATHER_API_KEY', '').trim();

    return {
        host: getEnvVarOptional(env, 'API_HOST', '0.0.0.0'),
        port: getEnvVarPositiveInt(env, 'PORT', getEnvVarPositiveInt(env, 'API_PORT', 8000)),
        trustProxy: getEnvVarBool(env, 'TRUST_PROXY', false),

        logLevel: getEnvVarOptional(env, 'LOG_LEVEL', 'info').toLowerCase(),
        logDir: getEnvVarOptional(env, 'LOG_DIR', 'logs'),
        logToFile: getEnvVarBool(env, 'LOG_TO_FILE', true),

        weatherApiKey: weatherApiKey === WEATHER_API_KEY_PLACEHOLDER ? '' : weatherApiKey,
        weatherApiUrl: getEnvVarOptional(env, 'WEATHER_API_URL', 'https://api.openweathermap.org/data/2.5'),
        weatherTimeoutMs: getEnvVarPositiveInt(env, 'WEATHER_TIMEOUT_MS', 5000),
        weatherMaxAttempts: getEnvVarPositiveInt(env, 'WEATHER_MAX_ATTEMPTS', 3),
        weatherBackoffBaseMs: getEnvVarNumber(env, 'WEATHER_BACKOFF_BASE_MS', 500),
        weatherBackoffJitterMs: getEnvVarNumber(env, 'WEATHER_BACKOFF_JITTER_MS', 100),

        webhookAuthToken: getEnvVarOptional(env, 'TWILIO_AUTH_TOKEN', ''),
        webhookPublicUrl: getEnvVarOptional(env, 'WEBHOOK_PUBLIC_URL', ''),

        rateLimitWindowSeconds: getEnvVarPositiveNumber(env, 'RATE_LIMIT_WINDOW_SECONDS', 60),
        rateLimitMaxRequests: getEnvVarPositiveInt(env, 'RATE_LIMIT_MAX_REQUESTS', 5),

        databaseUrl: getEnvVarOptional(env, 'DATABASE_URL', ''),
        databaseHost: getEnvVarOptional(env, 'DB_HOST', ''),
        databasePort: getEnvVarPositiveInt(env, 'DB_PORT', 5432),
        databaseName: getEnvVarOptional(env, 'DB_NAME', ''),
        databaseUser: getEnvVarOptional(env, 'DB_USER', ''),
        databasePassword: getEnvVarOptional(env, 'DB_PASSWORD', ''),
        databaseSslRejectUnauthorized: getEnvVarBool(env, 'DB_SSL_REJECT_UNAUTHORIZED', true),
        databasePoolSize: getEnvVarPositiveInt(env, 'DB_POOL_SIZE', 5),
        sqlitePath: getEnvVarOptional(env, 'SQLITE_PATH', 'data/weather_bot.db'),
        healthcheckTimeoutMs: getEnvVarPositiveInt(env, 'HEALTHCHECK_TIMEOUT_MS', 2000),
    };
}

export const config: Config = loadConfig();

/**
 * Whether lookups go to the live provider or return the offline placeholder
 */
export function hasWeatherCredentials(cfg: Config = config): boolean {
    return cfg.weatherApiKey.length > 0;
}

export function hasWebhookSecret(cfg: Config = config): boolean {
    return cfg.webhookAuthToken.length > 0;
}
