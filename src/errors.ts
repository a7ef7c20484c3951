/**
 * Lookup pipeline errors
 * Each terminal failure of a request maps to exactly one of these kinds
 */

export type LookupErrorKind =
    | 'authentication'
    | 'rate_limit'
    | 'validation'
    | 'upstream'
    | 'persistence';

export abstract class LookupError extends Error {
    abstract readonly kind: LookupErrorKind;
    abstract readonly statusCode: number;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing or mismatched webhook signature
 */
export class AuthenticationError extends LookupError {
    readonly kind = 'authentication' as const;
    readonly statusCode = 403;
}

export class RateLimitError extends LookupError {
    readonly kind = 'rate_limit' as const;
    readonly statusCode = 429;

    constructor(
        readonly senderKey: string,
        readonly retryAfterSeconds: number
    ) {
        super(`Rate limit exceeded for sender ${senderKey}`);
    }
}

/**
 * Bad place name or malformed request body; correctable by the user
 */
export class ValidationError extends LookupError {
    readonly kind = 'validation' as const;
    readonly statusCode = 400;
}

export class UpstreamError extends LookupError {
    readonly kind = 'upstream' as const;
    readonly statusCode = 502;

    constructor(
        message: string,
        readonly status: number | null,
        readonly retryable: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * The store could not be reached or rejected the write
 */
export class PersistenceError extends LookupError {
    readonly kind = 'persistence' as const;
    readonly statusCode = 503;
}

/**
 * Normalize an unknown thrown value into log metadata
 */
export function errorMeta(error: unknown): { error: string; stack?: string } {
    if (error instanceof Error) {
        return { error: error.message, stack: error.stack };
    }
    return { error: String(error) };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
