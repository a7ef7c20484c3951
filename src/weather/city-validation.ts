import { z } from 'zod';
import { ValidationError } from '../errors.js';

export const MAX_CITY_LENGTH = 100;

const DIGITS_ONLY = /^\d+$/;

/**
 * Trim and check a raw place name. No geocoding happens here;
 * ambiguous names are left for the provider to resolve.
 */
export function normalizeCity(raw: unknown): string {
    if (typeof raw !== 'string') {
        throw new ValidationError('City name must be a string');
    }

    const city = raw.trim();

    if (city.length === 0) {
        throw new ValidationError('City name cannot be empty');
    }
    if (DIGITS_ONLY.test(city)) {
        throw new ValidationError('City name cannot be only numbers');
    }
    // Length in code points, not UTF-16 units
    if ([...city].length > MAX_CITY_LENGTH) {
        throw new ValidationError(`City name cannot be longer than ${MAX_CITY_LENGTH} characters`);
    }

    return city;
}

/**
 * Body of a direct weather request
 */
export const weatherRequestSchema = z.object({
    city: z.string({ required_error: 'city is required', invalid_type_error: 'city must be a string' }),
});

export type WeatherRequest = z.infer<typeof weatherRequestSchema>;

/**
 * Form fields posted by the messaging platform
 */
export const webhookFormSchema = z.object({
    From: z.string().trim().min(1, 'From is required'),
    Body: z.string({ required_error: 'Body is required' }),
});

export type WebhookForm = z.infer<typeof webhookFormSchema>;

/**
 * Parse a value with a schema, surfacing shape errors as ValidationError
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        const message = issue ? issue.message : 'Invalid request body';
        throw new ValidationError(message);
    }
    return result.data;
}
