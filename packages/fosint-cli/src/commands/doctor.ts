import chalk from 'chalk';
import fs from 'fs-extra';
import { execFileSync } from 'child_process';
import { API_KEY_NAMES, type Settings } from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';

export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface DoctorCheck {
    name: string;
    status: CheckStatus;
    detail: string;
}

function runText(command: string, args: string[]): string {
    try {
        return execFileSync(command, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'ignore'] }).trim();
    } catch {
        return '';
    }
}

/** "Tor version 0.4.8.10." → "0.4.8.10" */
export function parseTorVersion(output: string): string | null {
    const match = /Tor version (\d+(?:\.\d+)+)/i.exec(output);
    return match ? match[1] : null;
}

export function nodeVersionCheck(version: string = process.versions.node): DoctorCheck {
    const major = Number(version.split('.')[0]);
    return major >= 20
        ? { name: 'Node.js', status: 'ok', detail: `v${version}` }
        : { name: 'Node.js', status: 'fail', detail: `v${version}; Node.js 20 or newer is required` };
}

export function apiKeyCheck(settings: Settings): DoctorCheck {
    const configured = API_KEY_NAMES.filter(name => settings.api_keys[name]);
    const missing = API_KEY_NAMES.filter(name => !settings.api_keys[name]);
    if (missing.length === 0) {
        return { name: 'API keys', status: 'ok', detail: configured.join(', ') };
    }
    return {
        name: 'API keys',
        status: 'warn',
        detail: `missing ${missing.join(', ')} (fosint settings set-key <name> <key>)`,
    };
}

export function worstStatus(checks: DoctorCheck[]): CheckStatus {
    if (checks.some(check => check.status === 'fail')) return 'fail';
    if (checks.some(check => check.status === 'warn')) return 'warn';
    return 'ok';
}

const ICONS: Record<CheckStatus, string> = {
    ok: chalk.green('✓'),
    warn: chalk.yellow('!'),
    fail: chalk.red('✘'),
};

export async function doctorCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    console.log(ctx.ui.heading('\nfosint Doctor\n'));

    const checks: DoctorCheck[] = [nodeVersionCheck()];

    checks.push(await fs.pathExists(ctx.paths.settingsFile)
        ? { name: 'Settings', status: 'ok', detail: ctx.paths.settingsFile }
        : { name: 'Settings', status: 'warn', detail: 'no config/settings.json; defaults in use' });
    checks.push(apiKeyCheck(ctx.settings));

    const torVersion = parseTorVersion(runText('tor', ['--version']));
    checks.push(torVersion
        ? { name: 'Tor binary', status: 'ok', detail: `tor ${torVersion}` }
        : { name: 'Tor binary', status: 'warn', detail: 'tor not found on PATH; install it or run a system Tor service' });

    const running = await ctx.tor.isRunning();
    checks.push(running
        ? { name: 'Tor proxy', status: 'ok', detail: `listening on ${ctx.tor.socksHost}:${ctx.tor.socksPort}` }
        : { name: 'Tor proxy', status: 'warn', detail: `nothing on ${ctx.tor.socksHost}:${ctx.tor.socksPort}; run fosint tor start` });

    checks.push(await fs.pathExists(ctx.torConfigFile)
        ? { name: 'Tor config', status: 'ok', detail: ctx.torConfigFile }
        : { name: 'Tor config', status: 'warn', detail: `${ctx.torConfigFile} missing; fosint tor start writes a default` });

    const removed = await ctx.sessions.cleanupExpired();
    checks.push({
        name: 'Accounts',
        status: 'ok',
        detail: `${await ctx.users.activeCount()} active user(s), ${await ctx.sessions.activeCount()} live session(s)${removed > 0 ? `, ${removed} expired removed` : ''}`,
    });

    for (const check of checks) {
        console.log(`${ICONS[check.status]} ${chalk.bold(check.name.padEnd(12))} ${chalk.dim(check.detail)}`);
    }

    const worst = worstStatus(checks);
    console.log('');
    if (worst === 'ok') {
        console.log(chalk.green('All checks passed.'));
    } else if (worst === 'warn') {
        console.log(chalk.yellow('Some optional pieces are missing; the affected modules will be limited.'));
    } else {
        console.log(chalk.red('fosint cannot run correctly until the failed checks are fixed.'));
        process.exitCode = 1;
    }
}
