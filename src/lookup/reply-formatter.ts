/**
 * Reply text for the messaging channel
 */

import { LookupError } from '../errors.js';
import { FetchMode, WeatherRecord } from '../weather/types.js';

export const GREETING_REPLY = `Weather Bot

Commands:
- Send a city name for weather (e.g. 'London' or 'New York')
- 'help' for commands
- 'ping' to test

Example: London`;

export const HELP_REPLY = `Available commands:
- Send a city name for weather
- 'ping' - test bot
- 'help' - show commands

Supported: any city worldwide`;

export const PING_REPLY = 'Weather bot is working!';

function titleCase(text: string): string {
    return text.replace(/\b\w/g, (c) => c.toUpperCase());
}

function formatUtc(date: Date): string {
    return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function formatWeatherReply(record: WeatherRecord, mode: FetchMode): string {
    const lines = [
        `Weather Update for ${record.city}`,
        '',
        `Temperature: ${record.temperature}°C`,
        `Conditions: ${titleCase(record.description)}`,
        `Feels like: ${record.feelsLike}°C`,
        `Humidity: ${record.humidity}%`,
        '',
        `Last updated: ${formatUtc(record.createdAt)}`,
    ];
    if (mode === 'offline') {
        lines.push('(offline mode: no live weather provider configured)');
    }
    return lines.join('\n');
}

export function formatErrorReply(error: LookupError): string {
    switch (error.kind) {
        case 'validation':
            return `Invalid Input\n\nError: ${error.message}\n\nPlease send a valid city name.`;
        case 'upstream':
            return `Weather Error\n\n${error.message}\n\nTry a different city name.`;
        case 'persistence':
            return 'Sorry, your lookup could not be saved. Please try again later.';
        case 'rate_limit':
            return 'Too many requests, please try again later.';
        case 'authentication':
            return 'Forbidden';
    }
}

export function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

/**
 * Wrap a reply in the XML document messaging webhooks answer with
 */
export function toMessagingXml(text: string): string {
    return `<?xml version="1.0" encoding="UTF-8"?><Response><Message>${escapeXml(text)}</Message></Response>`;
}
