import { Command } from 'commander';
import chalk from 'chalk';
import {
    NotFoundError,
    ValidationError,
    analyzeKeyStrength,
    exportPgpKeys,
    isValidEmail,
    normalizeKeyId,
    resolveWorkspaceRoot,
    type KeyStrength,
    type PgpKey,
    type PgpSearchType,
    type Severity,
} from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { run } from '../utils/errors.js';
import { emit, exportsToStdout, parseExportFormat } from '../utils/output.js';

export interface PgpCommandOptions {
    format?: string;
    output?: string;
}

const STRENGTH_SEVERITY: Record<KeyStrength, Severity> = {
    strong: 'info',
    good: 'info',
    fair: 'low',
    weak: 'medium',
};

function printKeys(ctx: CliContext, keys: PgpKey[]): void {
    for (const key of keys) {
        const analysis = analyzeKeyStrength(key);
        const color = analysis.strength === 'weak' ? ctx.ui.danger : analysis.strength === 'fair' ? ctx.ui.warning : ctx.ui.success;
        console.log(`${chalk.bold(key.keyId || '(unknown id)')} ${key.algorithm}${key.keySize ? `/${key.keySize}` : ''} ${color(analysis.strength)}`);
        for (const uid of key.userIds) {
            console.log(`    ${uid}`);
        }
        const dates = [key.creationDate && `created ${key.creationDate}`, key.expirationDate && `expires ${key.expirationDate}`].filter(Boolean);
        console.log(ctx.ui.muted(`    ${[...dates, key.keyServer].join(' · ')}`));
        for (const recommendation of analysis.recommendations) {
            console.log(ctx.ui.warning(`    ! ${recommendation}`));
        }
    }
}

async function runSearch(root: string, type: PgpSearchType, query: string, options: PgpCommandOptions, overrides: ContextOverrides): Promise<void> {
    const format = parseExportFormat(options.format);
    const ctx = await CliContext.open(root, overrides);
    const search = ctx.pgpSearch();
    const keys = type === 'email'
        ? await search.searchByEmail(query)
        : type === 'name' ? await search.searchByName(query) : await search.searchByKeyId(query);

    if (!exportsToStdout(format, options.output)) {
        if (keys.length === 0) {
            console.log(chalk.dim(`No PGP keys found for ${query}`));
        } else {
            console.log(ctx.ui.heading(`${keys.length} key(s) found for ${query}\n`));
            printKeys(ctx, keys);
        }
    }

    await ctx.record('pgp-search', `${type}:${query}`, keys.length, keys.map(key => ({
        module: 'pgp-search',
        title: `PGP key ${key.keyId || 'unknown'} (${key.userIds[0] ?? query})`,
        target: query,
        severity: STRENGTH_SEVERITY[analyzeKeyStrength(key).strength],
        details: { keyId: key.keyId, algorithm: key.algorithm, keySize: key.keySize, keyServer: key.keyServer, userIds: key.userIds },
    })));
    if (format) {
        await emit(exportPgpKeys(keys, format), root, options.output);
    }
}

export async function pgpEmailCommand(root: string, email: string, options: PgpCommandOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    if (!isValidEmail(email)) {
        throw new ValidationError(`Invalid email address: ${email}`);
    }
    await runSearch(root, 'email', email, options, overrides);
}

export async function pgpNameCommand(root: string, name: string, options: PgpCommandOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    if (name.trim().length < 3) {
        throw new ValidationError('Name searches need at least 3 characters');
    }
    await runSearch(root, 'name', name, options, overrides);
}

export async function pgpKeyIdCommand(root: string, keyId: string, options: PgpCommandOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    if (!normalizeKeyId(keyId)) {
        throw new ValidationError(`Invalid key id: ${keyId}`);
    }
    await runSearch(root, 'keyid', keyId, options, overrides);
}

export async function pgpGetCommand(root: string, keyId: string, options: { server?: string; output?: string } = {}, overrides: ContextOverrides = {}): Promise<void> {
    if (!normalizeKeyId(keyId)) {
        throw new ValidationError(`Invalid key id: ${keyId}`);
    }
    const ctx = await CliContext.open(root, overrides);
    const armored = await ctx.pgpSearch().getPublicKey(keyId, options.server);
    if (!armored) {
        throw new NotFoundError(`No public key for ${keyId}`);
    }
    await emit(armored, root, options.output);
}

export const pgpCommand = new Command('pgp')
    .description('Search PGP key servers')
    .addHelpText('after', `
Examples:
  $ fosint pgp email someone@example.com
  $ fosint pgp keyid 0xDEADBEEF12345678
  $ fosint pgp get DEADBEEF12345678 -o key.asc
    `);

pgpCommand
    .command('email')
    .description('Keys whose user id contains an email address')
    .argument('<email>', 'Email address')
    .option('-f, --format <format>', 'Export as json or csv')
    .option('-o, --output <file>', 'Write the export to a file')
    .action(run(async (email: string, options: PgpCommandOptions) => {
        await pgpEmailCommand(resolveWorkspaceRoot(), email, options);
    }));

pgpCommand
    .command('name')
    .description('Keys whose user id contains a name')
    .argument('<name>', 'Name (at least 3 characters)')
    .option('-f, --format <format>', 'Export as json or csv')
    .option('-o, --output <file>', 'Write the export to a file')
    .action(run(async (name: string, options: PgpCommandOptions) => {
        await pgpNameCommand(resolveWorkspaceRoot(), name, options);
    }));

pgpCommand
    .command('keyid')
    .description('Keys by 8, 16 or 40 hex digit id')
    .argument('<keyid>', 'Key id, with or without 0x')
    .option('-f, --format <format>', 'Export as json or csv')
    .option('-o, --output <file>', 'Write the export to a file')
    .action(run(async (keyId: string, options: PgpCommandOptions) => {
        await pgpKeyIdCommand(resolveWorkspaceRoot(), keyId, options);
    }));

pgpCommand
    .command('get')
    .description('Download an armored public key')
    .argument('<keyid>', 'Key id')
    .option('-s, --server <url>', 'Key server (default: the first configured)')
    .option('-o, --output <file>', 'Write the key to a file')
    .action(run(async (keyId: string, options: { server?: string; output?: string }) => {
        await pgpGetCommand(resolveWorkspaceRoot(), keyId, options);
    }));
