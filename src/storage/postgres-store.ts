/**
 * Networked weather store
 * PostgreSQL through a pg connection pool. TLS is always on; concurrent
 * writers across instances are handled by the database.
 */

import { Pool, PoolConfig } from 'pg';
import { logger } from '../logger.js';
import { PersistenceError, errorMessage } from '../errors.js';
import { WeatherReading, WeatherRecord } from '../weather/types.js';
import { WEATHER_TABLE, WeatherStore, isWeatherRow, rowToRecord, withTimeout } from './types.js';

export const POSTGRES_SCHEMA = `
  CREATE TABLE IF NOT EXISTS ${WEATHER_TABLE} (
    id SERIAL PRIMARY KEY,
    city VARCHAR(100) NOT NULL,
    temperature DOUBLE PRECISION NOT NULL,
    description VARCHAR(200),
    humidity INTEGER,
    feels_like DOUBLE PRECISION,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS idx_${WEATHER_TABLE}_city ON ${WEATHER_TABLE}(city);
`;

const RECORD_COLUMNS = 'id, city, temperature, description, humidity, feels_like, created_at';

/**
 * The slice of pg.Pool this store uses
 */
export interface SqlExecutor {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
    end(): Promise<void>;
}

export type PostgresConnection =
    | { connectionString: string }
    | { host: string; port: number; database: string; user: string; password: string };

export interface PostgresStoreOptions {
    connection: PostgresConnection;
    sslRejectUnauthorized: boolean;
    poolSize: number;
    healthcheckTimeoutMs: number;
    executor?: SqlExecutor;
}

/**
 * Drop any sslmode from the URL so it cannot turn TLS off
 */
export function stripSslMode(connectionString: string): string {
    try {
        const url = new URL(connectionString);
        if (!url.searchParams.has('sslmode')) return connectionString;
        const mode = url.searchParams.get('sslmode');
        if (mode === 'disable') {
            logger.warn('Ignoring sslmode=disable in DATABASE_URL, TLS is required for the networked store');
        }
        url.searchParams.delete('sslmode');
        return url.toString();
    } catch {
        return connectionString;
    }
}

export function buildPoolConfig(options: PostgresStoreOptions): PoolConfig {
    const ssl = { rejectUnauthorized: options.sslRejectUnauthorized };
    const pool: PoolConfig = {
        max: options.poolSize,
        connectionTimeoutMillis: options.healthcheckTimeoutMs * 2,
        idleTimeoutMillis: 30_000,
        ssl,
    };

    if ('connectionString' in options.connection) {
        return { ...pool, connectionString: stripSslMode(options.connection.connectionString) };
    }
    return { ...pool, ...options.connection };
}

function describeTarget(connection: PostgresConnection): string {
    if ('connectionString' in connection) {
        try {
            const url = new URL(connection.connectionString);
            return `${url.hostname}:${url.port || '5432'}${url.pathname}`;
        } catch {
            return 'postgres';
        }
    }
    return `${connection.host}:${connection.port}/${connection.database}`;
}

function toRecord(row: unknown): WeatherRecord {
    if (!isWeatherRow(row)) {
        throw new Error('unexpected row shape');
    }
    return rowToRecord(row);
}

export class PostgresWeatherStore implements WeatherStore {
    readonly backend = 'postgres' as const;
    private readonly pool: SqlExecutor;
    private readonly healthcheckTimeoutMs: number;
    // Cleared on failure so the next call tries again
    private schemaReady: Promise<void> | null = null;

    constructor(options: PostgresStoreOptions) {
        this.healthcheckTimeoutMs = options.healthcheckTimeoutMs;
        this.pool = options.executor ?? new Pool(buildPoolConfig(options));
        logger.info(`Using networked PostgreSQL store at ${describeTarget(options.connection)}`);
    }

    /**
     * Create the schema once. Reads and writes call this too, so a store
     * whose startup init failed recovers when the database comes back.
     */
    init(): Promise<void> {
        if (!this.schemaReady) {
            this.schemaReady = this.pool.query(POSTGRES_SCHEMA)
                .then(() => undefined)
                .catch((error: unknown) => {
                    this.schemaReady = null;
                    throw new PersistenceError(`Failed to create schema: ${errorMessage(error)}`, { cause: error });
                });
        }
        return this.schemaReady;
    }

    async save(reading: WeatherReading): Promise<WeatherRecord> {
        try {
            await this.init();
            const result = await this.pool.query(
                `INSERT INTO ${WEATHER_TABLE} (city, temperature, description, humidity, feels_like)
                 VALUES ($1, $2, $3, $4, $5)
                 RETURNING ${RECORD_COLUMNS}`,
                [reading.city, reading.temperature, reading.description, reading.humidity, reading.feelsLike]
            );
            if (result.rows.length === 0) {
                throw new Error('insert returned no row');
            }
            const record = toRecord(result.rows[0]);
            logger.info(`Weather data stored for ${record.city}, record ID: ${record.id}`);
            return record;
        } catch (error) {
            if (error instanceof PersistenceError) throw error;
            throw new PersistenceError(`Failed to store weather data for ${reading.city}: ${errorMessage(error)}`, { cause: error });
        }
    }

    async findById(id: number): Promise<WeatherRecord | null> {
        try {
            await this.init();
            const result = await this.pool.query(
                `SELECT ${RECORD_COLUMNS} FROM ${WEATHER_TABLE} WHERE id = $1`,
                [id]
            );
            return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
        } catch (error) {
            if (error instanceof PersistenceError) throw error;
            throw new PersistenceError(`Failed to read weather record ${id}: ${errorMessage(error)}`, { cause: error });
        }
    }

    async listRecent(limit: number): Promise<WeatherRecord[]> {
        try {
            await this.init();
            const result = await this.pool.query(
                `SELECT ${RECORD_COLUMNS} FROM ${WEATHER_TABLE} ORDER BY id DESC LIMIT $1`,
                [limit]
            );
            return result.rows.map(toRecord);
        } catch (error) {
            if (error instanceof PersistenceError) throw error;
            throw new PersistenceError(`Failed to list weather records: ${errorMessage(error)}`, { cause: error });
        }
    }

    async healthcheck(): Promise<boolean> {
        const check = this.pool.query('SELECT 1')
            .then(() => true)
            .catch((error: unknown) => {
                logger.error('Database connection test failed', { backend: this.backend, error: errorMessage(error) });
                return false;
            });
        return withTimeout(check, this.healthcheckTimeoutMs);
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
