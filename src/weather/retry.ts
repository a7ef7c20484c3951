export interface RetryContext {
    attempt: number;
    attempts: number;
    delayMs: number;
    error: unknown;
}

export interface RetryOptions {
    attempts?: number;
    baseDelayMs?: number;
    jitterMs?: number;
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (context: RetryContext) => void;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}

function normalizeAttempts(attempts?: number): number {
    if (attempts === undefined || !Number.isFinite(attempts)) {
        return 3;
    }
    return Math.max(1, Math.trunc(attempts));
}

/**
 * Delay before the attempt following `attempt`: base * 2^(attempt-1) plus
 * uniform jitter in [0, jitterMs)
 */
export function backoffDelay(
    attempt: number,
    baseDelayMs: number,
    jitterMs: number,
    random: () => number = Math.random
): number {
    const exponential = baseDelayMs * 2 ** (attempt - 1);
    const jitter = jitterMs > 0 ? Math.floor(random() * jitterMs) : 0;
    return exponential + jitter;
}

/**
 * Run a task, retrying with exponential backoff while `shouldRetry` accepts
 * the error. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
    task: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const attempts = normalizeAttempts(options.attempts);
    const baseDelayMs = options.baseDelayMs ?? 100;
    const jitterMs = options.jitterMs ?? 0;
    const shouldRetry = options.shouldRetry ?? (() => true);
    const onRetry = options.onRetry ?? (() => {});
    const wait = options.sleep ?? sleep;
    const random = options.random ?? Math.random;

    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
        try {
            return await task(attempt);
        } catch (error) {
            lastError = error;
            if (attempt === attempts || !shouldRetry(error)) {
                break;
            }
            const delayMs = backoffDelay(attempt, baseDelayMs, jitterMs, random);
            onRetry({ attempt, attempts, delayMs, error });
            await wait(delayMs);
        }
    }

    throw lastError;
}
