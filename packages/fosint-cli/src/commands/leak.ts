import { Command } from 'commander';
import path from 'path';
import fs from 'fs-extra';
import chalk from 'chalk';
import {
    Logger,
    NotFoundError,
    ValidationError,
    analyzeBreachSeverity,
    exportLeakResults,
    generateEmailVariations,
    isValidEmail,
    resolveWorkspaceRoot,
    type Breach,
    type BreachSeverity,
    type ExportFormat,
    type LeakResult,
    type Severity,
} from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { run } from '../utils/errors.js';
import { emit, exportsToStdout, parseExportFormat } from '../utils/output.js';
import { severityColor } from '../utils/theme.js';

export interface LeakExportOptions {
    format?: string;
    output?: string;
}

export function findingSeverity(severity: BreachSeverity): Severity {
    switch (severity) {
        case 'none':
        case 'minimal':
            return 'info';
        default:
            return severity;
    }
}

function printBreaches(ctx: CliContext, breaches: Breach[]): void {
    for (const breach of breaches) {
        console.log(`    ${ctx.ui.danger('•')} ${chalk.bold(breach.title || breach.name)} ${ctx.ui.muted(`(${breach.breachDate}, ${breach.pwnCount.toLocaleString('en-US')} accounts)`)}`);
        if (breach.dataClasses.length > 0) {
            console.log(ctx.ui.muted(`      ${breach.dataClasses.join(', ')}`));
        }
    }
}

function printResult(ctx: CliContext, result: LeakResult): void {
    const analysis = analyzeBreachSeverity(result.breaches);
    const color = severityColor(ctx.ui, analysis.severity);
    console.log(`${chalk.bold(result.email)}: ${color(analysis.severity.toUpperCase())} ${ctx.ui.muted(`(risk ${analysis.riskScore}/100)`)}`);
    if (result.breaches.length === 0) {
        console.log(ctx.ui.success('    No breaches found'));
    } else {
        printBreaches(ctx, result.breaches);
    }
    if (result.pastes.length > 0) {
        console.log(ctx.ui.warning(`    Found in ${result.pastes.length} paste(s): ${result.pastes.map(p => `${p.source}/${p.id}`).join(', ')}`));
    }
}

async function recordResults(ctx: CliContext, query: string, results: LeakResult[]): Promise<void> {
    const findings = results
        .filter(result => result.breaches.length > 0 || result.pastes.length > 0)
        .map(result => {
            const analysis = analyzeBreachSeverity(result.breaches);
            return {
                module: 'leak-checker',
                title: `${result.email} found in ${result.breaches.length} breach(es)`,
                target: result.email,
                severity: findingSeverity(analysis.severity),
                details: { breaches: result.breaches.map(b => b.name), pastes: result.pastes.length, riskScore: analysis.riskScore },
            };
        });
    await ctx.record('leak-checker', query, results.reduce((sum, r) => sum + r.breaches.length, 0), findings);
}

async function exportIfRequested(root: string, results: LeakResult[], format: ExportFormat | undefined, output?: string): Promise<void> {
    if (format) {
        await emit(exportLeakResults(results, format), root, output);
    }
}

export async function leakEmailCommand(root: string, email: string, options: LeakExportOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    if (!isValidEmail(email)) {
        throw new ValidationError(`Invalid email address: ${email}`);
    }
    const format = parseExportFormat(options.format);
    const ctx = await CliContext.open(root, overrides);
    const result = await ctx.leakChecker().checkEmail(email);
    if (!exportsToStdout(format, options.output)) {
        printResult(ctx, result);
    }
    await recordResults(ctx, email, [result]);
    await exportIfRequested(root, [result], format, options.output);
}

/** Check every address listed one per line in `file`; blank lines and `#` comments are skipped. */
export async function leakBulkCommand(root: string, file: string, options: LeakExportOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    const format = parseExportFormat(options.format);
    const source = path.resolve(root, file);
    if (!(await fs.pathExists(source))) {
        throw new NotFoundError(`File not found: ${source}`);
    }
    const emails = (await fs.readFile(source, 'utf-8'))
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line && !line.startsWith('#'));
    const invalid = emails.filter(email => !isValidEmail(email));
    if (invalid.length > 0) {
        Logger.warn(`Skipping ${invalid.length} invalid address(es): ${invalid.join(', ')}`);
    }
    const valid = emails.filter(isValidEmail);
    if (valid.length === 0) {
        throw new ValidationError(`No valid email addresses in ${source}`);
    }

    const ctx = await CliContext.open(root, overrides);
    const results = await ctx.leakChecker().bulkCheck(valid);
    if (!exportsToStdout(format, options.output)) {
        for (const result of results) {
            printResult(ctx, result);
        }
        const compromised = results.filter(r => r.breaches.length > 0).length;
        console.log(`\n${chalk.bold(`${compromised}/${results.length}`)} addresses appear in known breaches`);
    }
    await recordResults(ctx, `bulk:${path.basename(source)}`, results);
    await exportIfRequested(root, results, format, options.output);
}

export async function leakUsernameCommand(root: string, username: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const hits = await ctx.leakChecker().checkUsername(username);
    if (hits.length === 0) {
        console.log(ctx.ui.success(`No breaches found for ${username} on common mail providers`));
    }
    for (const hit of hits) {
        console.log(chalk.bold(hit.email));
        printBreaches(ctx, hit.breaches);
    }
    await ctx.record('leak-checker', `username:${username}`, hits.length, hits.map(hit => ({
        module: 'leak-checker',
        title: `${hit.email} found in ${hit.breaches.length} breach(es)`,
        target: hit.email,
        severity: findingSeverity(analyzeBreachSeverity(hit.breaches).severity),
        details: { username, domain: hit.domain, breaches: hit.breaches.map(b => b.name) },
    })));
}

export async function leakPhoneCommand(root: string, phone: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const check = ctx.leakChecker().checkPhone(phone);
    if (!check.valid) {
        throw new ValidationError(`${check.message}: ${phone}`);
    }
    console.log(`${chalk.bold(check.phone)} → ${check.normalized ?? ''}`);
    console.log(ctx.ui.muted(`  ${check.message}. Phone breach search is not offered by the breach API.`));
    await ctx.record('leak-checker', `phone:${phone}`, 0);
}

export async function leakBreachCommand(root: string, name: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const breach = await ctx.leakChecker().getBreachDetails(name);
    if (!breach) {
        throw new NotFoundError(`Breach "${name}" not found`);
    }
    console.log(ctx.ui.heading(breach.title || breach.name));
    console.log(`  Domain: ${breach.domain || 'n/a'}`);
    console.log(`  Breach date: ${breach.breachDate}`);
    console.log(`  Accounts: ${breach.pwnCount.toLocaleString('en-US')}`);
    console.log(`  Verified: ${breach.isVerified ? 'yes' : 'no'}`);
    console.log(`  Data: ${breach.dataClasses.join(', ')}`);
    if (breach.description) {
        console.log(`\n  ${breach.description.replace(/<[^>]+>/g, '')}`);
    }
}

export function leakVariationsCommand(username: string, options: { domains?: string } = {}): void {
    const domains = options.domains ? options.domains.split(',').map(d => d.trim()).filter(Boolean) : undefined;
    for (const email of generateEmailVariations(username, domains)) {
        console.log(email);
    }
}

export const leakCommand = new Command('leak')
    .description('Check emails, usernames and phone numbers against breach data')
    .addHelpText('after', `
Examples:
  $ fosint leak email someone@example.com
  $ fosint leak bulk emails.txt -f csv -o leaks.csv
  $ fosint leak breach Adobe
    `);

leakCommand
    .command('email')
    .description('Breaches and pastes for one email address')
    .argument('<email>', 'Email address')
    .option('-f, --format <format>', 'Export as json or csv')
    .option('-o, --output <file>', 'Write the export to a file')
    .action(run(async (email: string, options: LeakExportOptions) => {
        await leakEmailCommand(resolveWorkspaceRoot(), email, options);
    }));

leakCommand
    .command('bulk')
    .description('Check every address in a file (one per line)')
    .argument('<file>', 'Text file of email addresses')
    .option('-f, --format <format>', 'Export as json or csv')
    .option('-o, --output <file>', 'Write the export to a file')
    .action(run(async (file: string, options: LeakExportOptions) => {
        await leakBulkCommand(resolveWorkspaceRoot(), file, options);
    }));

leakCommand
    .command('username')
    .description('Try a username on common mail providers')
    .argument('<username>', 'Username')
    .action(run(async (username: string) => {
        await leakUsernameCommand(resolveWorkspaceRoot(), username);
    }));

leakCommand
    .command('phone')
    .description('Validate and normalise a phone number')
    .argument('<phone>', 'Phone number')
    .action(run(async (phone: string) => {
        await leakPhoneCommand(resolveWorkspaceRoot(), phone);
    }));

leakCommand
    .command('breach')
    .description('Details of a named breach')
    .argument('<name>', 'Breach name, e.g. Adobe')
    .action(run(async (name: string) => {
        await leakBreachCommand(resolveWorkspaceRoot(), name);
    }));

leakCommand
    .command('variations')
    .description('List likely addresses for a username')
    .argument('<username>', 'Username')
    .option('-d, --domains <list>', 'Comma-separated mail domains')
    .action((username: string, options: { domains?: string }) => {
        leakVariationsCommand(username, options);
    });
