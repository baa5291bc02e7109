import net from 'net';
import fs from 'fs-extra';
import { Logger } from '../utils/logger.js';
import { TorError, errorMessage } from '../utils/errors.js';

export interface ControlReply {
    code: number;
    /** Reply text with the status prefix removed; data blocks are appended line by line. */
    lines: string[];
}

export interface RelayRef {
    fingerprint: string;
    nickname: string | null;
}

export interface CircuitInfo {
    id: string;
    status: string;
    path: RelayRef[];
    purpose: string | null;
    buildFlags: string[];
}

export interface StreamInfo {
    id: string;
    status: string;
    circuitId: string;
    target: string;
    targetPort: number | null;
}

/**
 * Parse one complete control-port reply out of `buffer`.
 * Returns null while the final `NNN ` line has not arrived yet.
 */
export function parseControlReply(buffer: string): { reply: ControlReply; rest: string } | null {
    const lines: string[] = [];
    let inData = false;
    let offset = 0;

    while (offset < buffer.length) {
        const end = buffer.indexOf('\r\n', offset);
        if (end === -1) return null;
        const line = buffer.slice(offset, end);
        offset = end + 2;

        if (inData) {
            if (line === '.') {
                inData = false;
            } else {
                lines.push(line.startsWith('..') ? line.slice(1) : line);
            }
            continue;
        }

        const match = /^(\d{3})([ +-])(.*)$/.exec(line);
        if (!match) continue;
        lines.push(match[3]);
        if (match[2] === '+') inData = true;
        if (match[2] === ' ') {
            return { reply: { code: Number(match[1]), lines }, rest: buffer.slice(offset) };
        }
    }
    return null;
}

/** Lines of a `GETINFO <key>` reply that belong to `key`, single- or multi-line form. */
export function extractInfoValue(reply: ControlReply, key: string): string[] {
    const values: string[] = [];
    let collecting = false;
    for (const line of reply.lines) {
        if (line.startsWith(`${key}=`)) {
            collecting = true;
            const inline = line.slice(key.length + 1);
            if (inline) values.push(inline);
            continue;
        }
        if (line === 'OK') {
            collecting = false;
            continue;
        }
        if (collecting && line) values.push(line);
    }
    return values;
}

export function parseRelay(entry: string): RelayRef {
    const trimmed = entry.startsWith('$') ? entry.slice(1) : entry;
    const separator = trimmed.search(/[~=]/);
    if (separator === -1) {
        return { fingerprint: trimmed, nickname: null };
    }
    return { fingerprint: trimmed.slice(0, separator), nickname: trimmed.slice(separator + 1) };
}

function keywordArgs(fields: string[]): Map<string, string> {
    const args = new Map<string, string>();
    for (const field of fields) {
        const eq = field.indexOf('=');
        if (eq > 0) args.set(field.slice(0, eq), field.slice(eq + 1));
    }
    return args;
}

// "<id> <status> [<path>] [KEY=VALUE ...]"
export function parseCircuitLine(line: string): CircuitInfo | null {
    const [id, status, ...rest] = line.trim().split(/\s+/);
    if (!id || !status) return null;
    const hasPath = rest.length > 0 && !/^[A-Z_]+=/.test(rest[0]);
    const path = hasPath ? rest[0].split(',').filter(Boolean).map(parseRelay) : [];
    const args = keywordArgs(hasPath ? rest.slice(1) : rest);
    return {
        id,
        status,
        path,
        purpose: args.get('PURPOSE') ?? null,
        buildFlags: args.get('BUILD_FLAGS')?.split(',') ?? [],
    };
}

// "<id> <status> <circuit id> <target host:port> [KEY=VALUE ...]"
export function parseStreamLine(line: string): StreamInfo | null {
    const [id, status, circuitId, target] = line.trim().split(/\s+/);
    if (!id || !status || circuitId === undefined || !target) return null;
    const colon = target.lastIndexOf(':');
    const port = colon === -1 ? NaN : Number(target.slice(colon + 1));
    return {
        id,
        status,
        circuitId,
        target: colon === -1 ? target : target.slice(0, colon),
        targetPort: Number.isInteger(port) ? port : null,
    };
}

export function quoteControlString(value: string): string {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export interface TorControllerOptions {
    host?: string;
    port?: number;
    password?: string;
    timeoutMs?: number;
}

interface PendingReply {
    resolve: (reply: ControlReply) => void;
    reject: (error: Error) => void;
}

export class TorController {
    private socket: net.Socket | null = null;
    private buffer = '';
    private pending: PendingReply | null = null;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(private readonly options: TorControllerOptions = {}) {}

    get connected(): boolean {
        return this.socket !== null && !this.socket.destroyed;
    }

    connect(): Promise<void> {
        const host = this.options.host ?? '127.0.0.1';
        const port = this.options.port ?? 9051;
        return new Promise((resolve, reject) => {
            let established = false;
            const socket = net.createConnection({ host, port });
            socket.setEncoding('utf-8');
            socket.setTimeout(this.options.timeoutMs ?? 10_000);
            socket.once('connect', () => {
                established = true;
                // Only the connect attempt is bounded; command replies carry their own timer.
                socket.setTimeout(0);
                this.socket = socket;
                resolve();
            });
            socket.once('timeout', () => {
                socket.destroy();
                reject(new TorError(`Timed out connecting to Tor control port ${host}:${port}`));
            });
            socket.on('error', error => {
                if (!established) {
                    reject(new TorError(`Cannot reach Tor control port ${host}:${port}: ${error.message}`, { cause: error }));
                    return;
                }
                Logger.debug(`tor control socket error: ${error.message}`);
                this.failPending(new TorError(`Tor control connection failed: ${error.message}`, { cause: error }));
            });
            socket.on('data', (chunk: string) => this.onData(chunk));
            socket.on('close', () => {
                if (this.socket === socket) this.socket = null;
                this.failPending(new TorError('Tor control connection closed'));
            });
        });
    }

    private failPending(error: Error): void {
        const pending = this.pending;
        this.pending = null;
        pending?.reject(error);
    }

    private onData(chunk: string): void {
        this.buffer += chunk;
        const parsed = parseControlReply(this.buffer);
        if (!parsed) return;
        this.buffer = parsed.rest;
        const pending = this.pending;
        this.pending = null;
        pending?.resolve(parsed.reply);
    }

    /** Send one command and wait for its reply. Commands are serialised. */
    command(line: string): Promise<ControlReply> {
        const run = async (): Promise<ControlReply> => {
            const socket = this.socket;
            if (!socket || socket.destroyed) {
                throw new TorError('Tor controller is not connected');
            }
            const reply = await new Promise<ControlReply>((resolve, reject) => {
                const timer = setTimeout(() => {
                    this.pending = null;
                    reject(new TorError(`No reply to "${line.split(' ')[0]}" from Tor control port`));
                }, this.options.timeoutMs ?? 10_000);
                this.pending = {
                    resolve: reply => {
                        clearTimeout(timer);
                        resolve(reply);
                    },
                    reject: error => {
                        clearTimeout(timer);
                        reject(error);
                    },
                };
                socket.write(`${line}\r\n`);
            });
            Logger.debug(`tor control: ${line.split(' ')[0]} -> ${reply.code}`);
            return reply;
        };
        const result = this.queue.then(run, run);
        this.queue = result.catch(() => undefined);
        return result;
    }

    private async expectOk(line: string): Promise<ControlReply> {
        const reply = await this.command(line);
        if (reply.code !== 250) {
            throw new TorError(`Tor refused ${line.split(' ')[0]}: ${reply.code} ${reply.lines.join(' ')}`);
        }
        return reply;
    }

    /**
     * Authenticate with the configured password, otherwise with the cookie file
     * announced by PROTOCOLINFO, otherwise with no credentials.
     */
    async authenticate(): Promise<void> {
        if (this.options.password !== undefined) {
            await this.expectOk(`AUTHENTICATE ${quoteControlString(this.options.password)}`);
            return;
        }

        const info = await this.expectOk('PROTOCOLINFO 1');
        const authLine = info.lines.find(line => line.startsWith('AUTH ')) ?? '';
        const methods = /METHODS=(\S+)/.exec(authLine)?.[1].split(',') ?? [];
        const cookieFile = /COOKIEFILE="((?:[^"\\]|\\.)*)"/.exec(authLine)?.[1];

        if (methods.includes('COOKIE') && cookieFile) {
            try {
                const cookie = await fs.readFile(cookieFile.replace(/\\(.)/g, '$1'));
                await this.expectOk(`AUTHENTICATE ${cookie.toString('hex')}`);
                return;
            } catch (error) {
                if (error instanceof TorError) throw error;
                throw new TorError(`Cannot read Tor auth cookie ${cookieFile}: ${errorMessage(error)}`, { cause: error });
            }
        }
        await this.expectOk('AUTHENTICATE');
    }

    async signalNewnym(): Promise<void> {
        await this.expectOk('SIGNAL NEWNYM');
    }

    async getCircuits(): Promise<CircuitInfo[]> {
        const reply = await this.expectOk('GETINFO circuit-status');
        return extractInfoValue(reply, 'circuit-status')
            .map(parseCircuitLine)
            .filter((circuit): circuit is CircuitInfo => circuit !== null);
    }

    async getStreams(): Promise<StreamInfo[]> {
        const reply = await this.expectOk('GETINFO stream-status');
        return extractInfoValue(reply, 'stream-status')
            .map(parseStreamLine)
            .filter((stream): stream is StreamInfo => stream !== null);
    }

    close(): void {
        if (this.socket && !this.socket.destroyed) {
            this.socket.end('QUIT\r\n');
        }
        this.socket = null;
    }
}
