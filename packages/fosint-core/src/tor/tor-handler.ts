import path from 'path';
import fs from 'fs-extra';
import { execa } from 'execa';
import { Logger } from '../utils/logger.js';
import { TorError, errorMessage } from '../utils/errors.js';
import { systemClock, type Clock } from '../net/rate-limiter.js';
import { TorController, type CircuitInfo, type RelayRef, type StreamInfo, type TorControllerOptions } from './control.js';
import { TorSession, isTorServiceRunning } from './tor-session.js';

export interface TorHandlerOptions {
    socksHost?: string;
    socksPort?: number;
    controlPort?: number;
    controlPassword?: string;
    /** Where the pid of a tor process we launched is kept, so a later `stop` can find it. */
    pidFile?: string;
    startupTimeoutMs?: number;
    newnymWaitMs?: number;
    clock?: Clock;
    portOpen?: (host: string, port: number) => Promise<boolean>;
    createController?: (options: TorControllerOptions) => TorController;
    createSession?: (host: string, port: number) => TorSession;
}

export interface CircuitReport {
    circuits: CircuitInfo[];
    streams: StreamInfo[];
    exitNode: RelayRef | null;
}

export interface TorStatus {
    isRunning: boolean;
    socksPort: number;
    controlPort: number;
    hasController: boolean;
    connectionOk: boolean;
    currentIp: string | null;
}

/**
 * Owns the local Tor proxy: reuses one that is already listening, or launches
 * `tor` and waits for its SOCKS port.
 */
export class TorHandler {
    readonly socksHost: string;
    readonly socksPort: number;
    readonly controlPort: number;
    private readonly clock: Clock;
    private readonly portOpen: (host: string, port: number) => Promise<boolean>;
    private controller: TorController | null = null;
    private session: TorSession | null = null;
    private running = false;

    constructor(private readonly options: TorHandlerOptions = {}) {
        this.socksHost = options.socksHost ?? '127.0.0.1';
        this.socksPort = options.socksPort ?? 9050;
        this.controlPort = options.controlPort ?? 9051;
        this.clock = options.clock ?? systemClock;
        this.portOpen = options.portOpen ?? ((host, port) => isTorServiceRunning(host, port));
    }

    async start(configFile?: string): Promise<boolean> {
        if (await this.portOpen(this.socksHost, this.socksPort)) {
            Logger.debug(`Tor already listening on ${this.socksHost}:${this.socksPort}`);
            this.running = true;
            this.getSession();
            return true;
        }

        const args = configFile && (await fs.pathExists(configFile))
            ? ['-f', configFile]
            : ['--SocksPort', String(this.socksPort), '--ControlPort', String(this.controlPort), '--CookieAuthentication', '1', '--ExitPolicy', 'reject *:*'];

        Logger.info(`Launching tor ${args.join(' ')}`);
        try {
            const child = execa('tor', args, { detached: true, stdio: 'ignore', cleanup: false });
            child.catch(error => Logger.debug(`tor exited: ${errorMessage(error)}`));
            child.unref();
            if (child.pid === undefined) {
                throw new TorError('Failed to launch tor: is it installed and on PATH?');
            }
            if (this.options.pidFile) {
                await fs.ensureDir(path.dirname(this.options.pidFile));
                await fs.writeFile(this.options.pidFile, String(child.pid), 'utf-8');
            }
        } catch (error) {
            if (error instanceof TorError) throw error;
            throw new TorError(`Failed to launch tor: ${errorMessage(error)}`, { cause: error });
        }

        const deadline = this.clock.now() + (this.options.startupTimeoutMs ?? 60_000);
        while (this.clock.now() < deadline) {
            if (await this.portOpen(this.socksHost, this.socksPort)) {
                this.running = true;
                this.getSession();
                return true;
            }
            await this.clock.sleep(1_000);
        }
        Logger.warn(`Tor did not open ${this.socksHost}:${this.socksPort} in time`);
        return false;
    }

    /** Stop a tor process this tool launched. A proxy started elsewhere is left alone. */
    async stop(): Promise<boolean> {
        this.controller?.close();
        this.controller = null;
        this.session = null;
        this.running = false;

        const pidFile = this.options.pidFile;
        if (!pidFile || !(await fs.pathExists(pidFile))) {
            return false;
        }
        const pid = Number((await fs.readFile(pidFile, 'utf-8')).trim());
        await fs.remove(pidFile);
        if (!Number.isInteger(pid) || pid <= 0) {
            return false;
        }
        try {
            process.kill(pid, 'SIGTERM');
            return true;
        } catch (error) {
            Logger.debug(`Could not signal tor pid ${pid}: ${errorMessage(error)}`);
            return false;
        }
    }

    async isRunning(): Promise<boolean> {
        this.running = await this.portOpen(this.socksHost, this.socksPort);
        return this.running;
    }

    getSession(): TorSession {
        if (!this.session) {
            this.session = this.options.createSession
                ? this.options.createSession(this.socksHost, this.socksPort)
                : new TorSession({ host: this.socksHost, port: this.socksPort });
        }
        return this.session;
    }

    private async getController(): Promise<TorController> {
        if (this.controller?.connected) {
            return this.controller;
        }
        const options: TorControllerOptions = {
            host: this.socksHost,
            port: this.controlPort,
            password: this.options.controlPassword,
        };
        const controller = this.options.createController ? this.options.createController(options) : new TorController(options);
        await controller.connect();
        try {
            await controller.authenticate();
        } catch (error) {
            controller.close();
            throw error;
        }
        this.controller = controller;
        return controller;
    }

    async newIdentity(): Promise<boolean> {
        try {
            const controller = await this.getController();
            await controller.signalNewnym();
            await this.clock.sleep(this.options.newnymWaitMs ?? 5_000);
            return true;
        } catch (error) {
            Logger.error(`New identity request failed: ${errorMessage(error)}`, error);
            return false;
        }
    }

    async checkConnection(): Promise<boolean> {
        if (!(await this.isRunning())) return false;
        return this.getSession().checkTorConnection();
    }

    async getCurrentIp(): Promise<string | null> {
        if (!(await this.isRunning())) return null;
        return this.getSession().getTorIp();
    }

    async getCircuitInfo(): Promise<CircuitReport> {
        const report: CircuitReport = { circuits: [], streams: [], exitNode: null };
        try {
            const controller = await this.getController();
            report.circuits = await controller.getCircuits();
            report.streams = await controller.getStreams();
            const firstPath = report.circuits[0]?.path ?? [];
            report.exitNode = firstPath.length > 0 ? firstPath[firstPath.length - 1] : null;
        } catch (error) {
            Logger.error(`Failed to read circuit info: ${errorMessage(error)}`, error);
        }
        return report;
    }

    async getStatus(): Promise<TorStatus> {
        const isRunning = await this.isRunning();
        const status: TorStatus = {
            isRunning,
            socksPort: this.socksPort,
            controlPort: this.controlPort,
            hasController: this.controller?.connected ?? false,
            connectionOk: false,
            currentIp: null,
        };
        if (isRunning) {
            status.connectionOk = await this.getSession().checkTorConnection();
            status.currentIp = await this.getSession().getTorIp();
        }
        return status;
    }

    close(): void {
        this.controller?.close();
        this.controller = null;
    }
}
