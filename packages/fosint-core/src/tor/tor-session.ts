import net from 'net';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { FetchHttpClient, parseJsonBody, type HttpClient, type HttpRequestOptions, type HttpResponse } from '../net/http.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/guards.js';

export const TOR_CHECK_URL = 'https://check.torproject.org/api/ip';
export const IP_ECHO_URL = 'https://httpbin.org/ip';

/** TCP connect check; resolves false on refusal or timeout. */
export function isTorServiceRunning(host = '127.0.0.1', port = 9050, timeoutMs = 2_000): Promise<boolean> {
    return new Promise(resolve => {
        const socket = new net.Socket();
        socket.setTimeout(timeoutMs);
        socket.on('connect', () => {
            socket.destroy();
            resolve(true);
        });
        socket.on('timeout', () => {
            socket.destroy();
            resolve(false);
        });
        socket.on('error', () => resolve(false));
        socket.connect(port, host);
    });
}

export interface TorSessionOptions {
    host?: string;
    port?: number;
    timeoutMs?: number;
    /** Replaces the SOCKS-backed client; used by tests. */
    client?: HttpClient;
}

/**
 * HTTP client whose traffic goes through the Tor SOCKS proxy. `socks5h`
 * makes the proxy resolve host names, which .onion addresses require.
 */
export class TorSession implements HttpClient {
    readonly proxyUrl: string;
    private readonly client: HttpClient;

    constructor(options: TorSessionOptions = {}) {
        const host = options.host ?? '127.0.0.1';
        const port = options.port ?? 9050;
        this.proxyUrl = `socks5h://${host}:${port}`;
        this.client = options.client ?? new FetchHttpClient({
            agent: new SocksProxyAgent(this.proxyUrl),
            timeoutMs: options.timeoutMs ?? 60_000,
        });
    }

    request(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
        return this.client.request(url, options);
    }

    async checkTorConnection(): Promise<boolean> {
        try {
            const response = await this.client.request(TOR_CHECK_URL, { timeoutMs: 30_000 });
            if (!response.ok) return false;
            const body = parseJsonBody(response);
            return isRecord(body) && body.IsTor === true;
        } catch (error) {
            Logger.debug(`Tor check failed: ${errorMessage(error)}`);
            return false;
        }
    }

    async getTorIp(): Promise<string | null> {
        try {
            const response = await this.client.request(IP_ECHO_URL, { timeoutMs: 30_000 });
            if (!response.ok) return null;
            const body = parseJsonBody(response);
            return isRecord(body) && typeof body.origin === 'string' ? body.origin : null;
        } catch (error) {
            Logger.debug(`Tor IP lookup failed: ${errorMessage(error)}`);
            return null;
        }
    }
}
