/**
 * Embedded weather store
 * File-backed SQLite through better-sqlite3. Single writer: statements run
 * synchronously, so writes from concurrent requests are serialized on the
 * event loop.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../logger.js';
import { PersistenceError, errorMessage } from '../errors.js';
import { WeatherReading, WeatherRecord } from '../weather/types.js';
import { WEATHER_TABLE, WeatherRow, WeatherStore, rowToRecord } from './types.js';

export const SQLITE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS ${WEATHER_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    city VARCHAR(100) NOT NULL,
    temperature REAL NOT NULL,
    description VARCHAR(200),
    humidity INTEGER,
    feels_like REAL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  );
  CREATE INDEX IF NOT EXISTS idx_${WEATHER_TABLE}_city ON ${WEATHER_TABLE}(city);
`;

const IN_MEMORY = ':memory:';

export interface SqliteStoreOptions {
    filename: string;
}

export class SqliteWeatherStore implements WeatherStore {
    readonly backend = 'sqlite' as const;
    private db: Database.Database | null = null;
    private readonly filename: string;

    constructor(options: SqliteStoreOptions) {
        this.filename = options.filename === IN_MEMORY
            ? IN_MEMORY
            : path.resolve(process.cwd(), options.filename);
    }

    /**
     * Open the database file on first use, creating its directory and
     * the schema
     */
    private connection(): Database.Database {
        if (this.db) return this.db;

        try {
            if (this.filename !== IN_MEMORY) {
                const dir = path.dirname(this.filename);
                if (!fs.existsSync(dir)) {
                    fs.mkdirSync(dir, { recursive: true });
                    logger.info(`Created database directory: ${dir}`);
                }
            }

            const db = new Database(this.filename);
            try {
                if (this.filename !== IN_MEMORY) {
                    db.pragma('journal_mode = WAL');
                }
                db.exec(SQLITE_SCHEMA);
            } catch (error) {
                db.close();
                throw error;
            }
            this.db = db;
            logger.info(`Using embedded SQLite store at ${this.filename}`);
            return db;
        } catch (error) {
            throw new PersistenceError(`Failed to open SQLite database: ${errorMessage(error)}`, { cause: error });
        }
    }

    async init(): Promise<void> {
        this.connection();
    }

    async save(reading: WeatherReading): Promise<WeatherRecord> {
        try {
            const row = this.connection()
                .prepare<[string, number, string, number, number], WeatherRow>(
                    `INSERT INTO ${WEATHER_TABLE} (city, temperature, description, humidity, feels_like)
                     VALUES (?, ?, ?, ?, ?)
                     RETURNING id, city, temperature, description, humidity, feels_like, created_at`
                )
                .get(reading.city, reading.temperature, reading.description, reading.humidity, reading.feelsLike);

            if (!row) {
                throw new Error('insert returned no row');
            }

            const record = rowToRecord(row);
            logger.info(`Weather data stored for ${record.city}, record ID: ${record.id}`);
            return record;
        } catch (error) {
            if (error instanceof PersistenceError) throw error;
            throw new PersistenceError(`Failed to store weather data for ${reading.city}: ${errorMessage(error)}`, { cause: error });
        }
    }

    async findById(id: number): Promise<WeatherRecord | null> {
        try {
            const row = this.connection()
                .prepare<[number], WeatherRow>(`SELECT * FROM ${WEATHER_TABLE} WHERE id = ?`)
                .get(id);
            return row ? rowToRecord(row) : null;
        } catch (error) {
            if (error instanceof PersistenceError) throw error;
            throw new PersistenceError(`Failed to read weather record ${id}: ${errorMessage(error)}`, { cause: error });
        }
    }

    async listRecent(limit: number): Promise<WeatherRecord[]> {
        try {
            const rows = this.connection()
                .prepare<[number], WeatherRow>(`SELECT * FROM ${WEATHER_TABLE} ORDER BY id DESC LIMIT ?`)
                .all(limit);
            return rows.map(rowToRecord);
        } catch (error) {
            if (error instanceof PersistenceError) throw error;
            throw new PersistenceError(`Failed to list weather records: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Local file access; no timeout needed
     */
    async healthcheck(): Promise<boolean> {
        try {
            this.connection().prepare('SELECT 1').get();
            return true;
        } catch (error) {
            logger.error('Database connection test failed', { backend: this.backend, error: errorMessage(error) });
            return false;
        }
    }

    async close(): Promise<void> {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }
}
