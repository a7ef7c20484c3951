/**
 * Store selection
 * Picks the networked store when PostgreSQL settings are present, the
 * embedded one otherwise. Evaluated once at startup.
 */

import { Config } from '../config.js';
import { PostgresConnection, PostgresWeatherStore } from './postgres-store.js';
import { SqliteWeatherStore } from './sqlite-store.js';
import { WeatherStore } from './types.js';

export type DatabaseTarget =
    | { kind: 'postgres'; connection: PostgresConnection }
    | { kind: 'sqlite'; filename: string };

const SQLITE_URL_PREFIX = 'sqlite:///';

function isPostgresUrl(url: string): boolean {
    return url.startsWith('postgres://') || url.startsWith('postgresql://');
}

export function resolveDatabaseTarget(cfg: Config): DatabaseTarget {
    const url = cfg.databaseUrl.trim();

    if (isPostgresUrl(url)) {
        return { kind: 'postgres', connection: { connectionString: url } };
    }

    if (cfg.databaseHost && cfg.databaseName && cfg.databaseUser && cfg.databasePassword) {
        return {
            kind: 'postgres',
            connection: {
                host: cfg.databaseHost,
                port: cfg.databasePort,
                database: cfg.databaseName,
                user: cfg.databaseUser,
                password: cfg.databasePassword,
            },
        };
    }

    if (url.startsWith(SQLITE_URL_PREFIX) && url.length > SQLITE_URL_PREFIX.length) {
        return { kind: 'sqlite', filename: url.slice(SQLITE_URL_PREFIX.length) };
    }

    return { kind: 'sqlite', filename: cfg.sqlitePath };
}

export function createWeatherStore(cfg: Config, target: DatabaseTarget = resolveDatabaseTarget(cfg)): WeatherStore {
    switch (target.kind) {
        case 'postgres':
            return new PostgresWeatherStore({
                connection: target.connection,
                sslRejectUnauthorized: cfg.databaseSslRejectUnauthorized,
                poolSize: cfg.databasePoolSize,
                healthcheckTimeoutMs: cfg.healthcheckTimeoutMs,
            });
        case 'sqlite':
            return new SqliteWeatherStore({ filename: target.filename });
    }
}

export type { WeatherStore, StoreBackend } from './types.js';
export { PostgresWeatherStore } from './postgres-store.js';
export { SqliteWeatherStore } from './sqlite-store.js';
