import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
    TorController,
    TorError,
    TorHandler,
    TorSession,
    type CircuitInfo,
    type Clock,
    type StreamInfo,
    type TorHandlerOptions,
} from '@fosint/core';
import { FakeHttpClient } from '@fosint/core/testing';
import { torCircuitsCommand, torNewnymCommand, torStartCommand, torStatusCommand, torStopCommand } from './tor.js';

class StubController extends TorController {
    newnyms = 0;
    private open = false;

    constructor(private readonly refuse = false) {
        super();
    }

    override get connected(): boolean {
        return this.open;
    }

    override async connect(): Promise<void> {
        if (this.refuse) throw new TorError('Cannot reach Tor control port 127.0.0.1:9051');
        this.open = true;
    }

    override async authenticate(): Promise<void> {}

    override async signalNewnym(): Promise<void> {
        this.newnyms++;
    }

    override async getCircuits(): Promise<CircuitInfo[]> {
        return [{
            id: '7',
            status: 'BUILT',
            path: [{ fingerprint: 'AAAA', nickname: 'guard' }, { fingerprint: 'CCCC', nickname: 'exit' }],
            purpose: 'GENERAL',
            buildFlags: [],
        }];
    }

    override async getStreams(): Promise<StreamInfo[]> {
        return [];
    }

    override close(): void {
        this.open = false;
    }
}

const noWait: Clock = { now: () => 0, sleep: async () => {} };

function torWeb(): FakeHttpClient {
    return new FakeHttpClient()
        .on('https://check.torproject.org/api/ip', { body: { IsTor: true, IP: '203.0.113.7' } })
        .on('https://httpbin.org/ip', { body: { origin: '203.0.113.7' } });
}

function handler(options: TorHandlerOptions = {}): TorHandler {
    const http = torWeb();
    return new TorHandler({
        clock: noWait,
        portOpen: async () => true,
        createSession: (host, port) => new TorSession({ host, port, client: http }),
        ...options,
    });
}

describe('tor commands', () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'fosint-tor-cmd-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.remove(root);
    });

    it('writes a default torrc and reuses a running proxy', async () => {
        await torStartCommand(root, { tor: handler() });

        const torrc = await fs.readFile(path.join(root, 'config', 'tor_config.txt'), 'utf-8');
        expect(torrc.split('\n')).toContain('SocksPort 9050');
    });

    it('fails when tor cannot be launched', async () => {
        await expect(torStartCommand(root, { tor: handler({ portOpen: async () => false }) })).rejects.toThrow('Failed to launch tor');
    });

    it('prints ports and the exit address', async () => {
        await torStatusCommand(root, { tor: handler() });

        expect(console.log).toHaveBeenCalledWith('  SOCKS port: 9050');
        expect(console.log).toHaveBeenCalledWith('  Control port: 9051');
        expect(console.log).toHaveBeenCalledWith('  Exit IP: 203.0.113.7');
    });

    it('signals NEWNYM through the control port', async () => {
        const controller = new StubController();
        await torNewnymCommand(root, { tor: handler({ createController: () => controller }) });
        expect(controller.newnyms).toBe(1);
        expect(controller.connected).toBe(false);
    });

    it('reports a refused NEWNYM as a TorError', async () => {
        const tor = handler({ createController: () => new StubController(true) });
        await expect(torNewnymCommand(root, { tor })).rejects.toThrow('Could not request a new identity; is the control port enabled?');
    });

    it('lists circuits and the exit node', async () => {
        await torCircuitsCommand(root, { tor: handler({ createController: () => new StubController() }) });

        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('guard → exit'));
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Exit node: exit'));
    });

    it('leaves a tor it did not start alone', async () => {
        await torStopCommand(root, { tor: handler() });
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('No Tor process started by fosint was found'));
    });
});
