import { Command } from 'commander';
import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { TorError, ensureTorConfig, resolveWorkspaceRoot } from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { run } from '../utils/errors.js';

export async function torStartCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const configFile = ctx.torConfigFile;
    const written = await ensureTorConfig(configFile, {
        socksPort: ctx.settings.tor.socks_port,
        controlPort: ctx.settings.tor.control_port,
        dataDirectory: path.join(ctx.paths.temp, 'tor-data'),
    });
    if (written) {
        console.log(chalk.dim(`Wrote default Tor configuration to ${path.relative(root, configFile)}`));
    }

    const spinner = ora('Starting Tor...').start();
    try {
        if (!(await ctx.tor.start(configFile))) {
            spinner.fail('Tor did not come up in time');
            throw new TorError(`Tor is not listening on ${ctx.tor.socksHost}:${ctx.tor.socksPort}`);
        }
        spinner.text = 'Checking Tor connectivity...';
        const ok = await ctx.tor.checkConnection();
        if (ok) {
            spinner.succeed(`Tor is running on ${ctx.tor.socksHost}:${ctx.tor.socksPort}`);
        } else {
            spinner.warn('Tor is listening but the connectivity check did not confirm Tor routing');
        }
    } finally {
        ctx.tor.close();
    }
}

export async function torStopCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    if (await ctx.tor.stop()) {
        console.log(ctx.ui.success('✓ Tor stopped'));
    } else {
        console.log(chalk.dim('No Tor process started by fosint was found; a system Tor service is left running.'));
    }
}

export async function torStatusCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    try {
        const status = await ctx.tor.getStatus();
        const { ui } = ctx;
        console.log(ui.heading('\nTor Status\n'));
        console.log(`  Running: ${status.isRunning ? ui.success('yes') : ui.danger('no')}`);
        console.log(`  SOCKS port: ${status.socksPort}`);
        console.log(`  Control port: ${status.controlPort}`);
        if (status.isRunning) {
            console.log(`  Tor routing confirmed: ${status.connectionOk ? ui.success('yes') : ui.warning('no')}`);
            console.log(`  Exit IP: ${status.currentIp ?? ui.muted('unknown')}`);
        }
        console.log('');
    } finally {
        ctx.tor.close();
    }
}

export async function torNewnymCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const spinner = ora('Requesting a new Tor identity...').start();
    try {
        if (!(await ctx.tor.newIdentity())) {
            spinner.fail('Tor refused the NEWNYM signal');
            throw new TorError('Could not request a new identity; is the control port enabled?');
        }
        const ip = await ctx.tor.getCurrentIp();
        spinner.succeed(`New identity in use${ip ? `, exit IP ${ip}` : ''}`);
    } finally {
        ctx.tor.close();
    }
}

export async function torCircuitsCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    try {
        const report = await ctx.tor.getCircuitInfo();
        const { ui } = ctx;
        if (report.circuits.length === 0) {
            console.log(chalk.dim('No circuits reported (is the control port reachable?).'));
            return;
        }
        for (const circuit of report.circuits) {
            const hops = circuit.path.map(relay => relay.nickname ?? relay.fingerprint.slice(0, 8)).join(' → ');
            console.log(`${chalk.bold(circuit.id.padStart(4))} ${circuit.status.padEnd(9)} ${hops} ${ui.muted(circuit.purpose ?? '')}`);
        }
        if (report.exitNode) {
            console.log(`\nExit node: ${report.exitNode.nickname ?? ''} ${ui.muted(report.exitNode.fingerprint)}`);
        }
        console.log(ui.muted(`${report.streams.length} active stream(s)`));
    } finally {
        ctx.tor.close();
    }
}

export const torCommand = new Command('tor')
    .description('Control the local Tor proxy')
    .addHelpText('after', `
Examples:
  $ fosint tor start
  $ fosint tor status
  $ fosint tor newnym
    `);

torCommand
    .command('start')
    .description('Use a running Tor or launch one with config/tor_config.txt')
    .action(run(async () => {
        await torStartCommand(resolveWorkspaceRoot());
    }));

torCommand
    .command('stop')
    .description('Stop a Tor process started by fosint')
    .action(run(async () => {
        await torStopCommand(resolveWorkspaceRoot());
    }));

torCommand
    .command('status')
    .description('Ports, connectivity and exit IP')
    .action(run(async () => {
        await torStatusCommand(resolveWorkspaceRoot());
    }));

torCommand
    .command('newnym')
    .description('Ask Tor for new circuits')
    .action(run(async () => {
        await torNewnymCommand(resolveWorkspaceRoot());
    }));

torCommand
    .command('circuits')
    .description('List circuits and streams from the control port')
    .action(run(async () => {
        await torCircuitsCommand(resolveWorkspaceRoot());
    }));
