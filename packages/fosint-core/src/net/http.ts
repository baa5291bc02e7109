import fetch from 'node-fetch';
import type { Agent } from 'http';
import { Logger } from '../utils/logger.js';
import { NetworkError, errorMessage } from '../utils/errors.js';

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:109.0) Gecko/20100101 Firefox/115.0',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
    'Accept-Encoding': 'gzip, deflate',
    'DNT': '1',
    'Connection': 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
};

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    params?: QueryParams;
    headers?: Record<string, string>;
    body?: string;
    timeoutMs?: number;
}

export interface HttpResponse {
    status: number;
    ok: boolean;
    url: string;
    headers: Record<string, string>;
    body: string;
}

/**
 * Transport used by every network-facing module. Non-2xx responses are
 * returned, not thrown; only transport failures throw NetworkError.
 */
export interface HttpClient {
    request(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export function buildUrl(url: string, params?: QueryParams): string {
    if (!params) return url;
    const target = new URL(url);
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) target.searchParams.set(key, String(value));
    }
    return target.toString();
}

export function parseJsonBody(response: HttpResponse): unknown {
    try {
        return JSON.parse(response.body);
    } catch (error) {
        throw new NetworkError(`Invalid JSON from ${response.url}: ${errorMessage(error)}`, response.url, { cause: error, status: response.status });
    }
}

export interface FetchHttpClientOptions {
    agent?: Agent;
    headers?: Record<string, string>;
    timeoutMs?: number;
}

export class FetchHttpClient implements HttpClient {
    private readonly headers: Record<string, string>;
    private readonly timeoutMs: number;

    constructor(private readonly options: FetchHttpClientOptions = {}) {
        this.headers = { ...DEFAULT_HEADERS, ...options.headers };
        this.timeoutMs = options.timeoutMs ?? 30_000;
    }

    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const target = buildUrl(url, options.params);
        Logger.debug(`${options.method ?? 'GET'} ${target}`);
        try {
            const response = await fetch(target, {
                method: options.method ?? 'GET',
                headers: { ...this.headers, ...options.headers },
                body: options.body,
                agent: this.options.agent,
                signal: AbortSignal.timeout(options.timeoutMs ?? this.timeoutMs),
                redirect: 'follow',
            });
            const headers: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                headers[key] = value;
            });
            return {
                status: response.status,
                ok: response.ok,
                url: response.url || target,
                headers,
                body: await response.text(),
            };
        } catch (error) {
            throw new NetworkError(`Request to ${target} failed: ${errorMessage(error)}`, target, { cause: error });
        }
    }
}
