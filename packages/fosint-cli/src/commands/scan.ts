import chalk from 'chalk';
import ora from 'ora';
import {
    TorError,
    ValidationError,
    analyzeContent,
    isOnionUrl,
    isValidUrl,
    type NewFinding,
    type ScanResult,
    type ScanSummary,
    type Severity,
} from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { emit, exportsToStdout, parseExportFormat, parsePositiveInt } from '../utils/output.js';

export interface ScanOptions {
    depth?: string;
    maxPages?: string;
    format?: string;
    output?: string;
}

function findingFor(result: ScanResult): NewFinding {
    const analysis = analyzeContent(result);
    let severity: Severity = 'info';
    if (analysis.potentialMarketplace) severity = 'high';
    else if (analysis.suspiciousIndicators.length > 0) severity = 'medium';
    return {
        module: 'darkweb-scanner',
        title: result.title ? `${result.title} (${result.url})` : result.url,
        target: result.url,
        severity,
        details: {
            emails: result.emails,
            keywords: analysis.keywordsFound,
            suspicious: analysis.suspiciousIndicators,
            loginForm: analysis.hasLoginForm,
        },
    };
}

export async function scanCommand(root: string, urls: string[], options: ScanOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    const invalid = urls.filter(url => !isValidUrl(url));
    if (invalid.length > 0) {
        throw new ValidationError(`Invalid URL: ${invalid.join(', ')}`);
    }
    const format = parseExportFormat(options.format);
    const ctx = await CliContext.open(root, overrides);
    if (urls.some(isOnionUrl) && !(await ctx.tor.isRunning())) {
        throw new TorError('Tor is not running. Start it with `fosint tor start`.');
    }

    const scanner = ctx.scanner({
        maxDepth: options.depth !== undefined ? Number(options.depth) : undefined,
        maxPages: options.maxPages !== undefined ? parsePositiveInt(options.maxPages, '--max-pages') : undefined,
    });
    if (!Number.isInteger(scanner.maxDepth) || scanner.maxDepth < 0) {
        throw new ValidationError(`--depth must be a non-negative integer, got "${options.depth ?? ''}"`);
    }

    const spinner = ora(`Crawling ${urls.length} seed(s), depth ${scanner.maxDepth}...`).start();
    const interrupt = () => {
        spinner.text = 'Stopping after the current page...';
        scanner.stop();
    };
    process.once('SIGINT', interrupt);
    try {
        await scanner.scan(urls, result => {
            spinner.text = `[${scanner.getResults().length}] ${result.url}`;
        });
    } finally {
        process.removeListener('SIGINT', interrupt);
    }

    const results = scanner.getResults();
    const summary = scanner.summary();
    spinner.succeed(`Scanned ${results.length} page(s)`);

    if (!exportsToStdout(format, options.output)) {
        printResults(ctx, results, summary);
    }

    await ctx.record('darkweb-scanner', urls.join(' '), results.length,
        results.filter(result => result.statusCode === 200).map(findingFor));
    if (format) {
        await emit(scanner.export(format), root, options.output);
    }
}

function printResults(ctx: CliContext, results: ScanResult[], summary: ScanSummary | null): void {
    for (const result of results) {
        if (result.statusCode !== 200) {
            console.log(`${ctx.ui.danger('✘')} ${result.url} ${ctx.ui.muted(result.error || `HTTP ${result.statusCode}`)}`);
            continue;
        }
        const analysis = analyzeContent(result);
        console.log(`${ctx.ui.success('✓')} ${chalk.bold(result.title || '(untitled)')} ${ctx.ui.muted(result.url)}`);
        const facts = [`${result.links.length} links`, `${result.emails.length} emails`, `${result.forms.length} forms`];
        console.log(ctx.ui.muted(`    ${facts.join(' · ')}`));
        if (analysis.potentialMarketplace) console.log(ctx.ui.danger('    Looks like a marketplace'));
        if (analysis.suspiciousIndicators.length > 0) console.log(ctx.ui.warning(`    Suspicious terms: ${analysis.suspiciousIndicators.join(', ')}`));
        if (result.emails.length > 0) console.log(`    Emails: ${result.emails.join(', ')}`);
    }

    if (summary) {
        console.log(`\n${summary.successfulScans}/${summary.totalScanned} pages fetched across ${summary.uniqueDomains} domain(s); ` +
            `${summary.totalEmailsFound} emails, ${summary.totalFormsFound} forms`);
    }
}
