/**
 * Per-sender sliding window rate limiter.
 * State is process-local; each process holds its own instance and senders
 * are not shared across instances.
 */

export interface RateLimiterOptions {
    windowSeconds: number;
    maxRequests: number;
    now?: () => number;
}

export class RateLimiter {
    // sender -> admission times (ms), oldest first
    private windows: Map<string, number[]> = new Map();
    private readonly windowMs: number;
    private readonly maxRequests: number;
    private readonly now: () => number;

    constructor(options: RateLimiterOptions) {
        this.windowMs = options.windowSeconds * 1000;
        this.maxRequests = options.maxRequests;
        this.now = options.now ?? Date.now;
    }

    /**
     * Record a request for the sender if the window has room.
     * Rejected requests are not recorded.
     */
    admit(senderKey: string): boolean {
        const now = this.now();
        const timestamps = this.purge(senderKey, now);

        if (timestamps.length >= this.maxRequests) {
            return false;
        }

        timestamps.push(now);
        this.windows.set(senderKey, timestamps);
        return true;
    }

    remaining(senderKey: string): number {
        const timestamps = this.purge(senderKey, this.now());
        return Math.max(0, this.maxRequests - timestamps.length);
    }

    /**
     * Seconds until the sender's oldest request leaves the window (0 if admissible now)
     */
    retryAfterSeconds(senderKey: string): number {
        const now = this.now();
        const timestamps = this.purge(senderKey, now);
        if (timestamps.length < this.maxRequests) {
            return 0;
        }
        const oldest = timestamps[0];
        return Math.max(1, Math.ceil((oldest + this.windowMs - now) / 1000));
    }

    /**
     * Drop senders with no requests left in the window
     */
    prune(): number {
        const now = this.now();
        let removed = 0;
        for (const senderKey of [...this.windows.keys()]) {
            if (this.purge(senderKey, now).length === 0) {
                removed++;
            }
        }
        return removed;
    }

    size(): number {
        return this.windows.size;
    }

    private purge(senderKey: string, now: number): number[] {
        const timestamps = this.windows.get(senderKey);
        if (!timestamps) {
            return [];
        }

        const cutoff = now - this.windowMs;
        let expired = 0;
        while (expired < timestamps.length && timestamps[expired] < cutoff) {
            expired++;
        }
        if (expired > 0) {
            timestamps.splice(0, expired);
        }
        if (timestamps.length === 0) {
            this.windows.delete(senderKey);
        }
        return timestamps;
    }
}
