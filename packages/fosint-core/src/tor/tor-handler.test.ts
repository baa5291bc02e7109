import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import net from 'net';
import path from 'path';
import { TorHandler } from './tor-handler.js';
import { TorSession } from './tor-session.js';
import { TorController, type CircuitInfo, type StreamInfo } from './control.js';
import { FakeHttpClient } from '../testing/fake-http.js';
import { TorError } from '../utils/errors.js';
import type { Clock } from '../net/rate-limiter.js';

class FakeController extends TorController {
    newnyms = 0;
    private open = false;

    constructor(private readonly failConnect = false) {
        super();
    }

    override get connected(): boolean {
        return this.open;
    }

    override async connect(): Promise<void> {
        if (this.failConnect) throw new TorError('Cannot reach Tor control port 127.0.0.1:9051');
        this.open = true;
    }

    override async authenticate(): Promise<void> {}

    override async signalNewnym(): Promise<void> {
        this.newnyms++;
    }

    override async getCircuits(): Promise<CircuitInfo[]> {
        return [
            {
                id: '7',
                status: 'BUILT',
                path: [{ fingerprint: 'AAAA', nickname: 'guard' }, { fingerprint: 'CCCC', nickname: 'exit' }],
                purpose: 'GENERAL',
                buildFlags: [],
            },
        ];
    }

    override async getStreams(): Promise<StreamInfo[]> {
        return [];
    }

    override close(): void {
        this.open = false;
    }
}

const noWait: Clock = { now: () => 0, sleep: async () => {} };

function torHttp(): FakeHttpClient {
    return new FakeHttpClient()
        .on('https://check.torproject.org/api/ip', { body: { IsTor: true, IP: '203.0.113.7' } })
        .on('https://httpbin.org/ip', { body: { origin: '203.0.113.7' } });
}

describe('TorHandler', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fosint-torhandler-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.remove(dir);
    });

    it('reuses a proxy that is already listening', async () => {
        const portOpen = vi.fn(async () => true);
        const handler = new TorHandler({ portOpen, socksPort: 9150 });

        expect(await handler.start()).toBe(true);
        expect(portOpen).toHaveBeenCalledWith('127.0.0.1', 9150);
        expect(handler.getSession().proxyUrl).toBe('socks5h://127.0.0.1:9150');
    });

    it('wraps a failed launch in a TorError', async () => {
        const handler = new TorHandler({ portOpen: async () => false, clock: noWait });
        await expect(handler.start()).rejects.toThrow('Failed to launch tor: tor is not available in tests');
    });

    it('reports status through the session', async () => {
        const handler = new TorHandler({
            portOpen: async () => true,
            createSession: (host, port) => new TorSession({ host, port, client: torHttp() }),
        });

        expect(await handler.getStatus()).toEqual({
            isRunning: true,
            socksPort: 9050,
            controlPort: 9051,
            hasController: false,
            connectionOk: true,
            currentIp: '203.0.113.7',
        });
    });

    it('skips the network when tor is down', async () => {
        const http = torHttp();
        const handler = new TorHandler({
            portOpen: async () => false,
            createSession: (host, port) => new TorSession({ host, port, client: http }),
        });

        expect(await handler.checkConnection()).toBe(false);
        expect(await handler.getCurrentIp()).toBeNull();
        expect(http.calls).toEqual([]);
    });

    it('signals NEWNYM through the controller', async () => {
        const controller = new FakeController();
        const handler = new TorHandler({ clock: noWait, createController: () => controller });

        expect(await handler.newIdentity()).toBe(true);
        expect(await handler.newIdentity()).toBe(true);
        expect(controller.newnyms).toBe(2);
    });

    it('returns false when the control port is unreachable', async () => {
        const handler = new TorHandler({ clock: noWait, createController: () => new FakeController(true) });
        expect(await handler.newIdentity()).toBe(false);
    });

    it('closes the control connection when authentication is refused', async () => {
        const open = new Set<net.Socket>();
        const server = net.createServer(socket => {
            open.add(socket);
            socket.setEncoding('utf-8');
            socket.on('error', () => socket.destroy());
            socket.on('close', () => open.delete(socket));
            socket.on('data', (chunk: string) => {
                if (chunk.startsWith('AUTHENTICATE')) socket.write('515 Authentication failed\r\n');
            });
        });
        await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
        const address = server.address();
        const controlPort = typeof address === 'object' && address ? address.port : 0;

        try {
            const handler = new TorHandler({ clock: noWait, controlPort, controlPassword: 'wrong' });
            expect(await handler.newIdentity()).toBe(false);
            handler.close();
            await vi.waitFor(() => expect(open.size).toBe(0));
        } finally {
            await new Promise<void>(resolve => server.close(() => resolve()));
        }
    });

    it('names the last hop of the first circuit as the exit node', async () => {
        const handler = new TorHandler({ createController: () => new FakeController() });
        const report = await handler.getCircuitInfo();
        expect(report.circuits).toHaveLength(1);
        expect(report.exitNode).toEqual({ fingerprint: 'CCCC', nickname: 'exit' });
    });

    it('leaves tor alone when no pid was recorded', async () => {
        const handler = new TorHandler({ pidFile: path.join(dir, 'tor.pid') });
        expect(await handler.stop()).toBe(false);
    });

    it('discards an unreadable pid file', async () => {
        const pidFile = path.join(dir, 'tor.pid');
        await fs.writeFile(pidFile, 'not-a-pid');
        const handler = new TorHandler({ pidFile });

        expect(await handler.stop()).toBe(false);
        expect(await fs.pathExists(pidFile)).toBe(false);
    });
});
