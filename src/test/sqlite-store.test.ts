import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PersistenceError } from '../errors.js';
import { SqliteWeatherStore } from '../storage/sqlite-store.js';
import { WeatherReading } from '../weather/types.js';

jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

const LONDON: WeatherReading = {
    city: 'London',
    temperature: 12.5,
    feelsLike: 11.25,
    description: 'light rain',
    humidity: 82,
};

describe('SqliteWeatherStore', () => {
    let store: SqliteWeatherStore;

    beforeEach(async () => {
        store = new SqliteWeatherStore({ filename: ':memory:' });
        await store.init();
    });

    afterEach(async () => {
        await store.close();
    });

    it('reports the sqlite backend', () => {
        expect(store.backend).toBe('sqlite');
    });

    it('can initialize an existing schema again', async () => {
        await expect(store.init()).resolves.toBeUndefined();
    });

    it('returns the stored record with an assigned id and timestamp', async () => {
        const before = Date.now();
        const record = await store.save(LONDON);
        const after = Date.now();

        expect(record).toMatchObject({ id: 1, ...LONDON });
        expect(record.createdAt).toBeInstanceOf(Date);
        // SQLite timestamps have millisecond precision
        expect(record.createdAt.getTime()).toBeGreaterThanOrEqual(before - 1000);
        expect(record.createdAt.getTime()).toBeLessThanOrEqual(after + 1000);
    });

    it('reads back exactly what was saved', async () => {
        const saved = await store.save(LONDON);

        await expect(store.findById(saved.id)).resolves.toEqual(saved);
    });

    it('returns null for an unknown id', async () => {
        await expect(store.findById(999)).resolves.toBeNull();
    });

    it('assigns increasing ids and non-decreasing timestamps', async () => {
        const first = await store.save(LONDON);
        const second = await store.save({ ...LONDON, city: 'Paris' });
        const third = await store.save({ ...LONDON, city: 'Oslo' });

        expect(second.id).toBeGreaterThan(first.id);
        expect(third.id).toBeGreaterThan(second.id);
        expect(second.createdAt.getTime()).toBeGreaterThanOrEqual(first.createdAt.getTime());
        expect(third.createdAt.getTime()).toBeGreaterThanOrEqual(second.createdAt.getTime());
    });

    it('lists the most recent records first', async () => {
        await store.save({ ...LONDON, city: 'London' });
        await store.save({ ...LONDON, city: 'Paris' });
        await store.save({ ...LONDON, city: 'Oslo' });

        const recent = await store.listRecent(2);

        expect(recent.map((record) => record.city)).toEqual(['Oslo', 'Paris']);
    });

    it('stores the same city as separate records', async () => {
        await store.save(LONDON);
        await store.save(LONDON);

        expect(await store.listRecent(10)).toHaveLength(2);
    });

    it('passes the healthcheck when open', async () => {
        await expect(store.healthcheck()).resolves.toBe(true);
    });

    it('creates the schema on first write without init', async () => {
        const fresh = new SqliteWeatherStore({ filename: ':memory:' });

        await expect(fresh.save(LONDON)).resolves.toMatchObject({ id: 1, city: 'London' });
        await fresh.close();
    });
});

describe('SqliteWeatherStore on disk', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'weather-store-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('creates missing parent directories', async () => {
        const filename = path.join(dir, 'nested', 'data', 'weather.db');
        const store = new SqliteWeatherStore({ filename });

        await store.init();
        await store.save(LONDON);
        await store.close();

        expect(fs.existsSync(filename)).toBe(true);
    });

    it('wraps open failures in PersistenceError', async () => {
        fs.writeFileSync(path.join(dir, 'blocker'), '');
        const store = new SqliteWeatherStore({ filename: path.join(dir, 'blocker', 'weather.db') });

        const error = await store.save(LONDON).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(PersistenceError);
        expect(error).toMatchObject({ message: expect.stringMatching(/^Failed to open SQLite database: /) });
        await store.close();
    });

    it('keeps records across reopening', async () => {
        const filename = path.join(dir, 'weather.db');

        const writer = new SqliteWeatherStore({ filename });
        await writer.init();
        const saved = await writer.save(LONDON);
        await writer.close();

        const reader = new SqliteWeatherStore({ filename });
        await reader.init();
        await expect(reader.findById(saved.id)).resolves.toEqual(saved);
        await reader.close();
    });
});
