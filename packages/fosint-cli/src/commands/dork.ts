import { Command } from 'commander';
import chalk from 'chalk';
import {
    ValidationError,
    analyzeResults,
    buildDork,
    customDork,
    exportDorkResults,
    getDorkTemplates,
    resolveWorkspaceRoot,
    type DorkOperators,
    type DorkResult,
} from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { run } from '../utils/errors.js';
import { emit, exportsToStdout, parseExportFormat, parsePositiveInt } from '../utils/output.js';

export interface DorkOptions {
    /** `category/name` from the template catalogue. */
    template?: string;
    exclude?: string;
    site?: string;
    filetype?: string;
    inurl?: string;
    intitle?: string;
    intext?: string;
    excludeSite?: string;
    excludeTerm?: string;
    exact?: string;
    or?: string[];
}

/** Apply an optional catalogue template, then any explicit operators. */
export function composeDork(query: string, options: DorkOptions = {}): string {
    let base = query;
    if (options.template) {
        const [category, name] = options.template.split('/');
        if (!category || !name || getDorkTemplates()[category]?.[name] === undefined) {
            throw new ValidationError(`Unknown dork template "${options.template}". Run \`fosint dork templates\` to list them.`);
        }
        base = buildDork(category, name, query, options.exclude ? { exclude: options.exclude } : {});
    }
    const operators: DorkOperators = {
        site: options.site,
        filetype: options.filetype,
        inurl: options.inurl,
        intitle: options.intitle,
        intext: options.intext,
        exclude_site: options.excludeSite,
        exclude_term: options.excludeTerm,
        exact_phrase: options.exact,
        or_terms: options.or && options.or.length > 0 ? options.or : undefined,
    };
    return customDork(base, operators);
}

export function dorkBuildCommand(query: string, options: DorkOptions = {}): void {
    console.log(composeDork(query, options));
}

export function dorkTemplatesCommand(category?: string): void {
    const templates = getDorkTemplates();
    const categories = category ? [category] : Object.keys(templates);
    for (const name of categories) {
        const entries = templates[name];
        if (!entries) {
            throw new ValidationError(`Unknown template category "${name}" (expected one of: ${Object.keys(templates).join(', ')})`);
        }
        console.log(chalk.bold(name));
        for (const [key, template] of Object.entries(entries)) {
            console.log(`  ${chalk.cyan(`${name}/${key}`.padEnd(32))} ${chalk.dim(template)}`);
        }
    }
}

function printResults(ctx: CliContext, results: DorkResult[]): void {
    if (results.length === 0) {
        console.log(chalk.dim('No results (the search engine may be rate limiting this address).'));
    }
    results.forEach((result, index) => {
        console.log(`${ctx.ui.muted(`${index + 1}.`)} ${chalk.bold(result.title)}`);
        console.log(`   ${ctx.ui.accent(result.url)}`);
        if (result.snippet) console.log(ctx.ui.muted(`   ${result.snippet}`));
    });

    const analysis = analyzeResults(results);
    if (analysis) {
        console.log(`\n${analysis.totalResults} results across ${analysis.uniqueDomains} domains`);
        if (analysis.topDomains.length > 0) {
            console.log(ctx.ui.muted(`Top domains: ${analysis.topDomains.slice(0, 5).map(([domain, count]) => `${domain} (${count})`).join(', ')}`));
        }
        if (analysis.fileTypesFound.length > 0) {
            console.log(ctx.ui.muted(`File types: ${analysis.fileTypesFound.map(([ext, count]) => `${ext} (${count})`).join(', ')}`));
        }
    }
}

export interface DorkSearchOptions extends DorkOptions {
    num?: string;
    format?: string;
    output?: string;
}

export async function dorkSearchCommand(root: string, query: string, options: DorkSearchOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    const dork = composeDork(query, options);
    const format = parseExportFormat(options.format);
    const ctx = await CliContext.open(root, overrides);
    const limit = options.num ? parsePositiveInt(options.num, '--num') : ctx.settings.dorking.max_results;

    const listing = !exportsToStdout(format, options.output);
    if (listing) console.log(ctx.ui.muted(`Searching: ${dork}\n`));
    const results = await ctx.dorking().search(dork, limit);
    if (listing) printResults(ctx, results);

    await ctx.record('google-dorking', dork, results.length, results.slice(0, 20).map(result => ({
        module: 'google-dorking',
        title: result.title || result.url,
        target: query,
        details: { url: result.url, domain: result.domain, snippet: result.snippet },
    })));
    if (format) {
        await emit(exportDorkResults(results, format), root, options.output);
    }
}

function withDorkOptions(command: Command): Command {
    return command
        .option('-t, --template <category/name>', 'Start from a catalogue template')
        .option('--exclude <domain>', 'Domain for templates with an {exclude} slot')
        .option('--site <domain>', 'site: operator')
        .option('--filetype <ext>', 'filetype: operator')
        .option('--inurl <text>', 'inurl: operator')
        .option('--intitle <text>', 'intitle: operator')
        .option('--intext <text>', 'intext: operator')
        .option('--exclude-site <domain>', '-site: operator')
        .option('--exclude-term <term>', 'Exclude a term')
        .option('--exact <phrase>', 'Exact phrase')
        .option('--or <terms...>', 'Alternative terms joined with OR');
}

export const dorkCommand = new Command('dork')
    .description('Build and run Google dorks')
    .addHelpText('after', `
Examples:
  $ fosint dork templates sensitive_info
  $ fosint dork build example.com -t sensitive_info/login_pages
  $ fosint dork search "annual report" --site example.com --filetype pdf -n 20
    `);

withDorkOptions(dorkCommand
    .command('search')
    .description('Run a dork and list the results')
    .argument('<query>', 'Search terms')
    .option('-n, --num <n>', 'Number of results (default from settings)')
    .option('-f, --format <format>', 'Export as json or csv')
    .option('-o, --output <file>', 'Write the export to a file'))
    .action(run(async (query: string, options: DorkSearchOptions) => {
        await dorkSearchCommand(resolveWorkspaceRoot(), query, options);
    }));

withDorkOptions(dorkCommand
    .command('build')
    .description('Print the dork without searching')
    .argument('<query>', 'Search terms'))
    .action(run(async (query: string, options: DorkOptions) => {
        dorkBuildCommand(query, options);
    }));

dorkCommand
    .command('templates')
    .description('List the template catalogue')
    .argument('[category]', 'Only this category')
    .action(run(async (category: string | undefined) => {
        dorkTemplatesCommand(category);
    }));
