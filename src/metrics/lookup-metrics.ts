/**
 * Lookup Metrics
 * In-process counters scraped through GET /metrics
 */

export type LookupStatus = 'success' | 'offline' | 'error';

export type MessageType =
    | 'weather_success'
    | 'weather_error'
    | 'invalid_input'
    | 'database_error'
    | 'greeting'
    | 'help'
    | 'ping'
    | 'rate_limited'
    | 'unauthorized';

export interface MetricsSnapshot {
    rate_limited_total: Record<string, number>;
    weather_requests_total: Record<string, Record<string, number>>;
    messages_total: Record<string, number>;
    started_at: string;
}

/** Label that absorbs senders and cities once a counter is full */
export const OVERFLOW_LABEL = 'other';

export const DEFAULT_MAX_LABELS = 10_000;

export interface LookupMetricsOptions {
    /** Distinct senders or cities kept per counter */
    maxLabels?: number;
}

export class LookupMetrics {
    private rateLimitedBySender: Map<string, number> = new Map();
    private lookupsByCity: Map<string, Map<LookupStatus, number>> = new Map();
    private messagesByType: Map<MessageType, number> = new Map();
    private readonly startedAt: Date = new Date();
    private readonly maxLabels: number;

    constructor(options: LookupMetricsOptions = {}) {
        this.maxLabels = options.maxLabels ?? DEFAULT_MAX_LABELS;
    }

    recordRateLimited(senderKey: string): void {
        const label = this.labelFor(this.rateLimitedBySender, senderKey);
        this.rateLimitedBySender.set(label, (this.rateLimitedBySender.get(label) || 0) + 1);
    }

    recordLookup(city: string, status: LookupStatus): void {
        const label = this.labelFor(this.lookupsByCity, city);
        let byStatus = this.lookupsByCity.get(label);
        if (!byStatus) {
            byStatus = new Map();
            this.lookupsByCity.set(label, byStatus);
        }
        byStatus.set(status, (byStatus.get(status) || 0) + 1);
    }

    recordMessage(type: MessageType): void {
        this.messagesByType.set(type, (this.messagesByType.get(type) || 0) + 1);
    }

    getRateLimitedCount(senderKey: string): number {
        return this.rateLimitedBySender.get(senderKey) || 0;
    }

    getLookupCount(city: string, status: LookupStatus): number {
        return this.lookupsByCity.get(city)?.get(status) || 0;
    }

    getMessageCount(type: MessageType): number {
        return this.messagesByType.get(type) || 0;
    }

    // Keys come from user input; past the cap, new ones share one label
    private labelFor(counter: ReadonlyMap<string, unknown>, key: string): string {
        return counter.has(key) || counter.size < this.maxLabels ? key : OVERFLOW_LABEL;
    }

    snapshot(): MetricsSnapshot {
        const weatherRequests: MetricsSnapshot['weather_requests_total'] = {};
        for (const [city, byStatus] of this.lookupsByCity.entries()) {
            weatherRequests[city] = Object.fromEntries(byStatus);
        }

        return {
            rate_limited_total: Object.fromEntries(this.rateLimitedBySender),
            weather_requests_total: weatherRequests,
            messages_total: Object.fromEntries(this.messagesByType),
            started_at: this.startedAt.toISOString(),
        };
    }
}
