/**
 * Storage contract shared by the embedded and networked backends.
 *
 * Keep this file backend-agnostic so the sqlite and postgres implementations
 * expose exactly the same behaviour to the orchestrator.
 */

import { WeatherReading, WeatherRecord } from '../weather/types.js';

export type StoreBackend = 'sqlite' | 'postgres';

export const WEATHER_TABLE = 'weather_data';

/**
 * Row shape of the weather_data table (snake_case columns)
 */
export interface WeatherRow {
    id: number | string;
    city: string;
    temperature: number | string;
    description: string | null;
    humidity: number | string | null;
    feels_like: number | string | null;
    created_at: Date | string;
}

export interface WeatherStore {
    readonly backend: StoreBackend;

    /**
     * Create the schema if absent. Safe to call on every start.
     */
    init(): Promise<void>;

    /**
     * Insert one lookup. The store assigns id and created_at.
     * Rejects with PersistenceError when the write fails.
     */
    save(reading: WeatherReading): Promise<WeatherRecord>;

    findById(id: number): Promise<WeatherRecord | null>;

    /**
     * Most recent records first
     */
    listRecent(limit: number): Promise<WeatherRecord[]>;

    /**
     * Connectivity check for the health surface. Bounded by a short timeout,
     * never retried, never throws.
     */
    healthcheck(): Promise<boolean>;

    close(): Promise<void>;
}

function toNumber(value: number | string | null, fallback: number): number {
    if (value === null) return fallback;
    const parsed = typeof value === 'number' ? value : Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Both drivers hand back timestamps without zone info in some setups;
 * stored values are always UTC.
 */
export function parseUtcTimestamp(value: Date | string): Date {
    if (value instanceof Date) return value;
    const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(value);
    return new Date(hasZone ? value : `${value.replace(' ', 'T')}Z`);
}

function isNumeric(value: unknown): value is number | string {
    return typeof value === 'number' || typeof value === 'string';
}

export function isWeatherRow(value: unknown): value is WeatherRow {
    if (typeof value !== 'object' || value === null) return false;
    const row: Record<string, unknown> = { ...value };
    return isNumeric(row.id)
        && typeof row.city === 'string'
        && isNumeric(row.temperature)
        && (row.description === null || typeof row.description === 'string')
        && (row.humidity === null || isNumeric(row.humidity))
        && (row.feels_like === null || isNumeric(row.feels_like))
        && (row.created_at instanceof Date || typeof row.created_at === 'string');
}

export function rowToRecord(row: WeatherRow): WeatherRecord {
    return {
        id: toNumber(row.id, 0),
        city: row.city,
        temperature: toNumber(row.temperature, 0),
        feelsLike: toNumber(row.feels_like, 0),
        description: row.description ?? '',
        humidity: toNumber(row.humidity, 0),
        createdAt: parseUtcTimestamp(row.created_at),
    };
}

/**
 * Resolve with the check result, or false once the timeout elapses
 */
export async function withTimeout(check: Promise<boolean>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
        return await Promise.race([check, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
