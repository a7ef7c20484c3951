import { describe, it, expect } from '@jest/globals';
import {
    AuthenticationError,
    PersistenceError,
    RateLimitError,
    UpstreamError,
    ValidationError,
} from '../errors.js';
import {
    escapeXml,
    formatErrorReply,
    formatWeatherReply,
    toMessagingXml,
} from '../lookup/reply-formatter.js';
import { WeatherRecord } from '../weather/types.js';

const RECORD: WeatherRecord = {
    id: 42,
    city: 'London',
    temperature: 20,
    feelsLike: 19.5,
    description: 'scattered clouds',
    humidity: 60,
    createdAt: new Date('2026-10-18T12:30:45.123Z'),
};

describe('formatWeatherReply', () => {
    it('formats a live reading', () => {
        expect(formatWeatherReply(RECORD, 'live')).toBe([
            'Weather Update for London',
            '',
            'Temperature: 20°C',
            'Conditions: Scattered Clouds',
            'Feels like: 19.5°C',
            'Humidity: 60%',
            '',
            'Last updated: 2026-10-18 12:30:45 UTC',
        ].join('\n'));
    });

    it('marks offline readings', () => {
        const lines = formatWeatherReply(RECORD, 'offline').split('\n');

        expect(lines[lines.length - 1]).toBe('(offline mode: no live weather provider configured)');
    });
});

describe('formatErrorReply', () => {
    it('explains validation failures', () => {
        expect(formatErrorReply(new ValidationError('City name cannot be only numbers')))
            .toBe('Invalid Input\n\nError: City name cannot be only numbers\n\nPlease send a valid city name.');
    });

    it('explains provider failures', () => {
        expect(formatErrorReply(new UpstreamError('City not found: Atlantis', 404, false)))
            .toBe('Weather Error\n\nCity not found: Atlantis\n\nTry a different city name.');
    });

    it('does not leak storage details', () => {
        expect(formatErrorReply(new PersistenceError('disk I/O error at /var/lib/bot/weather.db')))
            .toBe('Sorry, your lookup could not be saved. Please try again later.');
    });

    it('covers rate limits and authentication', () => {
        expect(formatErrorReply(new RateLimitError('whatsapp:+15550000001', 30)))
            .toBe('Too many requests, please try again later.');
        expect(formatErrorReply(new AuthenticationError('Invalid webhook signature'))).toBe('Forbidden');
    });
});

describe('toMessagingXml', () => {
    it('escapes markup characters', () => {
        expect(escapeXml(`<a href="x">Tom & Jerry's</a>`))
            .toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&apos;s&lt;/a&gt;');
    });

    it('wraps the reply in a message response', () => {
        expect(toMessagingXml('Rain & wind'))
            .toBe('<?xml version="1.0" encoding="UTF-8"?><Response><Message>Rain &amp; wind</Message></Response>');
    });
});
