import type { HttpClient, HttpRequestOptions, HttpResponse } from '../net/http.js';
import { RateLimiter, systemClock, type Clock } from '../net/rate-limiter.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface ModuleContext {
    http: HttpClient;
    /** Requests per minute; omitted means unlimited. */
    rateLimit?: number;
    clock?: Clock;
}

/**
 * Common plumbing for network-facing OSINT modules: one rate limiter per
 * module and a request helper that logs transport failures instead of
 * aborting the whole lookup.
 */
export abstract class OsintModule {
    protected readonly http: HttpClient;
    protected readonly clock: Clock;
    private readonly limiter: RateLimiter | null;

    constructor(public readonly id: string, public readonly title: string, context: ModuleContext) {
        this.http = context.http;
        this.clock = context.clock ?? systemClock;
        this.limiter = context.rateLimit ? new RateLimiter(context.rateLimit, this.clock) : null;
    }

    protected async throttle(): Promise<void> {
        await this.limiter?.waitIfNeeded();
    }

    /** Rate-limited request; null when the transport failed. */
    protected async fetch(url: string, options?: HttpRequestOptions): Promise<HttpResponse | null> {
        await this.throttle();
        try {
            return await this.http.request(url, options);
        } catch (error) {
            Logger.warn(`[${this.id}] ${errorMessage(error)}`);
            return null;
        }
    }

    /** Parsed JSON of a 2xx response, otherwise null. */
    protected async fetchJson(url: string, options?: HttpRequestOptions): Promise<unknown> {
        const response = await this.fetch(url, options);
        if (!response || !response.ok) {
            if (response) Logger.debug(`[${this.id}] ${url} -> HTTP ${response.status}`);
            return null;
        }
        try {
            return JSON.parse(response.body);
        } catch {
            Logger.warn(`[${this.id}] ${url} returned invalid JSON`);
            return null;
        }
    }
}
