import { Command } from 'commander';
import chalk from 'chalk';
import {
    ValidationError,
    analyzeActivity,
    exportAddresses,
    identifyCurrency,
    resolveWorkspaceRoot,
    type ActivityLevel,
    type CryptoAddress,
    type Severity,
} from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { run } from '../utils/errors.js';
import { emit, exportsToStdout, parseExportFormat } from '../utils/output.js';

const ACTIVITY_SEVERITY: Record<ActivityLevel, Severity> = {
    inactive: 'info',
    low: 'info',
    moderate: 'low',
    high: 'medium',
    very_high: 'high',
};

const TICKERS: Record<CryptoAddress['currency'], string> = {
    bitcoin: 'BTC',
    ethereum: 'ETH',
    litecoin: 'LTC',
    monero: 'XMR',
    unknown: '',
};

function printAddress(ctx: CliContext, addr: CryptoAddress): void {
    const analysis = analyzeActivity(addr);
    const ticker = TICKERS[addr.currency];
    console.log(`${chalk.bold(addr.address)} ${ctx.ui.accent(addr.currency)}`);
    if (addr.currency !== 'bitcoin' && addr.currency !== 'ethereum') {
        console.log(ctx.ui.muted('    Identified only; no public explorer lookup for this currency'));
        return;
    }
    console.log(`    Balance: ${addr.balance} ${ticker}`);
    if (addr.currency === 'bitcoin') {
        console.log(`    Received: ${addr.totalReceived} ${ticker} · Sent: ${addr.totalSent} ${ticker}`);
    }
    console.log(`    Transactions: ${addr.transactionCount} · Activity: ${analysis.activityLevel} · Privacy score: ${analysis.privacyScore}`);
    if (addr.firstSeen) console.log(ctx.ui.muted(`    Seen ${addr.firstSeen} → ${addr.lastSeen}`));
    for (const tx of addr.transactions.slice(0, 5)) {
        const amount = tx.amount >= 0 ? ctx.ui.success(`+${tx.amount}`) : ctx.ui.danger(String(tx.amount));
        console.log(`      ${tx.txHash.slice(0, 16)}… ${amount} ${ctx.ui.muted(tx.timestamp || 'unconfirmed')}`);
    }
    for (const indicator of analysis.riskIndicators) {
        console.log(ctx.ui.warning(`    ! ${indicator}`));
    }
    for (const pattern of analysis.notablePatterns) {
        console.log(ctx.ui.muted(`    · ${pattern}`));
    }
}

export async function cryptoTrackCommand(root: string, addresses: string[], options: { format?: string; output?: string } = {}, overrides: ContextOverrides = {}): Promise<void> {
    const unknown = addresses.filter(address => identifyCurrency(address) === 'unknown');
    if (unknown.length > 0) {
        throw new ValidationError(`Unrecognised address format: ${unknown.join(', ')}`);
    }
    const format = parseExportFormat(options.format);
    const ctx = await CliContext.open(root, overrides);
    const results = await ctx.cryptoTracker().trackMany(addresses);
    if (!exportsToStdout(format, options.output)) {
        for (const addr of results) {
            printAddress(ctx, addr);
        }
    }

    await ctx.record('crypto-tracker', addresses.join(','), results.length, results.map(addr => {
        const analysis = analyzeActivity(addr);
        return {
            module: 'crypto-tracker',
            title: `${addr.currency} address ${addr.address} (${analysis.activityLevel})`,
            target: addr.address,
            severity: ACTIVITY_SEVERITY[analysis.activityLevel],
            details: { balance: addr.balance, transactionCount: addr.transactionCount, riskIndicators: analysis.riskIndicators },
        };
    }));
    if (format) {
        await emit(exportAddresses(results, format), root, options.output);
    }
}

export function cryptoIdentifyCommand(addresses: string[]): void {
    for (const address of addresses) {
        const currency = identifyCurrency(address);
        const label = currency === 'unknown' ? chalk.yellow('unknown') : chalk.green(currency);
        console.log(`${address}: ${label}`);
    }
}

export const cryptoCommand = new Command('crypto')
    .description('Identify and track cryptocurrency addresses')
    .addHelpText('after', `
Examples:
  $ fosint crypto identify 1BoatSLRHtKNngkdXEeobR76b53LETtpyT
  $ fosint crypto track 0x00000000219ab540356cBB839Cbe05303d7705Fa -f json
    `);

cryptoCommand
    .command('track')
    .description('Balance, history and activity of Bitcoin and Ethereum addresses')
    .argument('<addresses...>', 'Addresses')
    .option('-f, --format <format>', 'Export as json or csv')
    .option('-o, --output <file>', 'Write the export to a file')
    .action(run(async (addresses: string[], options: { format?: string; output?: string }) => {
        await cryptoTrackCommand(resolveWorkspaceRoot(), addresses, options);
    }));

cryptoCommand
    .command('identify')
    .description('Name the currency an address belongs to')
    .argument('<addresses...>', 'Addresses')
    .action((addresses: string[]) => {
        cryptoIdentifyCommand(addresses);
    });
