import { Command } from 'commander';
import chalk from 'chalk';
import {
    AlertSeveritySchema,
    MonitorSourceSchema,
    NotFoundError,
    RULE_TEMPLATES,
    ValidationError,
    exportAlerts,
    resolveWorkspaceRoot,
    type Alert,
    type KeywordMonitor,
    type MonitorSource,
    type MonitoringRule,
    type RuleFilters,
} from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { run } from '../utils/errors.js';
import { emit, parseExportFormat, parsePositiveInt } from '../utils/output.js';
import { severityColor } from '../utils/theme.js';

export function parseSources(value: string): MonitorSource[] {
    const sources: MonitorSource[] = [];
    for (const raw of value.split(',').map(s => s.trim()).filter(Boolean)) {
        const parsed = MonitorSourceSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ValidationError(`Unknown source "${raw}" (expected: ${MonitorSourceSchema.options.join(', ')})`);
        }
        if (!sources.includes(parsed.data)) sources.push(parsed.data);
    }
    return sources;
}

/** Crawl onion pages only when Tor answers; darkweb sources are skipped otherwise. */
async function openMonitor(ctx: CliContext, wantsDarkweb: boolean): Promise<KeywordMonitor> {
    if (wantsDarkweb && await ctx.tor.isRunning()) {
        return ctx.monitor(ctx.scanner());
    }
    return ctx.monitor();
}

async function resolveRule(monitor: KeywordMonitor, ref: string): Promise<MonitoringRule> {
    const direct = await monitor.getRule(ref);
    if (direct) return direct;
    const matches = (await monitor.listRules()).filter(rule => rule.ruleId.startsWith(ref));
    if (matches.length === 1) return matches[0];
    if (matches.length > 1) {
        throw new ValidationError(`"${ref}" matches ${matches.length} rules; use the full rule id`);
    }
    throw new NotFoundError(`Monitoring rule ${ref} not found`);
}

function printRule(ctx: CliContext, rule: MonitoringRule): void {
    const state = rule.enabled ? ctx.ui.success('enabled') : ctx.ui.muted('disabled');
    console.log(`${chalk.bold(rule.name || '(unnamed)')} ${ctx.ui.muted(rule.ruleId)} ${state}`);
    console.log(`    Keywords: ${rule.keywords.join(', ')}`);
    console.log(`    Sources: ${rule.sources.join(', ')} · every ${rule.frequencyMinutes} min · last run ${rule.lastRun ?? 'never'}`);
    const filters = Object.entries(rule.filters).filter(([, value]) => value !== undefined);
    if (filters.length > 0) {
        console.log(ctx.ui.muted(`    Filters: ${filters.map(([key, value]) => `${key}=${Array.isArray(value) ? value.join(' ') : String(value)}`).join(', ')}`));
    }
}

function printAlert(ctx: CliContext, alert: Alert): void {
    const color = severityColor(ctx.ui, alert.severity);
    console.log(`${color(alert.severity.toUpperCase().padEnd(8))} ${chalk.bold(alert.title || alert.url)} ${ctx.ui.muted(`[${alert.source}] "${alert.keyword}" ${Math.round(alert.confidence * 100)}%`)}`);
    console.log(`         ${ctx.ui.accent(alert.url)}`);
}

async function recordAlerts(ctx: CliContext, query: string, alerts: Alert[]): Promise<void> {
    await ctx.record('keyword-monitor', query, alerts.length, alerts.map(alert => ({
        module: 'keyword-monitor',
        title: `"${alert.keyword}" on ${alert.source}: ${alert.title || alert.url}`,
        target: alert.keyword,
        severity: alert.severity,
        details: { url: alert.url, source: alert.source, confidence: alert.confidence, ruleId: alert.ruleId },
    })));
}

export interface MonitorAddOptions {
    name?: string;
    sources?: string;
    frequency?: string;
    dateRange?: string;
    site?: string;
    onion?: string[];
    disabled?: boolean;
}

export async function monitorAddCommand(root: string, keywords: string[], options: MonitorAddOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    const filters: RuleFilters = {};
    if (options.dateRange) filters.date_range = options.dateRange;
    if (options.site) filters.site = options.site;
    if (options.onion && options.onion.length > 0) filters.onion_urls = options.onion;

    const ctx = await CliContext.open(root, overrides);
    const rule = await ctx.monitor().addRule({
        name: options.name,
        keywords,
        sources: parseSources(options.sources ?? 'google'),
        frequencyMinutes: options.frequency ? parsePositiveInt(options.frequency, '--frequency') : undefined,
        enabled: !options.disabled,
        filters,
    });
    console.log(ctx.ui.success(`✓ Monitoring rule created: ${rule.ruleId}`));
    printRule(ctx, rule);
}

export async function monitorTemplateCommand(root: string, template: string | undefined, keywords: string[], overrides: ContextOverrides = {}): Promise<void> {
    if (!template) {
        for (const [name, preset] of Object.entries(RULE_TEMPLATES)) {
            console.log(`${chalk.bold(name)}: ${preset.sources.join(', ')} every ${preset.frequencyMinutes} min`);
        }
        return;
    }
    const ctx = await CliContext.open(root, overrides);
    const rule = await ctx.monitor().addRuleFromTemplate(template, keywords);
    console.log(ctx.ui.success(`✓ Monitoring rule created from ${template}: ${rule.ruleId}`));
    printRule(ctx, rule);
}

export async function monitorListCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const rules = await ctx.monitor().listRules();
    if (rules.length === 0) {
        console.log(chalk.dim('No monitoring rules. Add one with: fosint monitor add <keywords...>'));
        return;
    }
    for (const rule of rules) {
        printRule(ctx, rule);
    }
}

export async function monitorRemoveCommand(root: string, ref: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const monitor = ctx.monitor();
    const rule = await resolveRule(monitor, ref);
    await monitor.removeRule(rule.ruleId);
    console.log(ctx.ui.success(`✓ Removed rule ${rule.name || rule.ruleId}`));
}

export async function monitorToggleCommand(root: string, ref: string, enabled: boolean, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const monitor = ctx.monitor();
    const rule = await resolveRule(monitor, ref);
    await monitor.setEnabled(rule.ruleId, enabled);
    console.log(ctx.ui.success(`✓ Rule ${rule.name || rule.ruleId} ${enabled ? 'enabled' : 'disabled'}`));
}

/** Run one rule now, or every enabled rule when no rule is named. */
export async function monitorRunCommand(root: string, ref: string | undefined, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const listing = ctx.monitor();
    const rules = ref ? [await resolveRule(listing, ref)] : (await listing.listRules()).filter(rule => rule.enabled);
    if (rules.length === 0) {
        console.log(chalk.dim('No enabled monitoring rules.'));
        return;
    }

    const monitor = await openMonitor(ctx, rules.some(rule => rule.sources.includes('darkweb')));
    let total = 0;
    for (const rule of rules) {
        console.log(ctx.ui.muted(`Running ${rule.name || rule.ruleId}...`));
        const alerts = await monitor.runRule(rule.ruleId);
        alerts.forEach(alert => printAlert(ctx, alert));
        await recordAlerts(ctx, rule.keywords.join(','), alerts);
        total += alerts.length;
    }
    console.log(`\n${chalk.bold(String(total))} new alert(s)`);
}

function interrupted(): Promise<void> {
    return new Promise(resolve => process.once('SIGINT', () => resolve()));
}

/** Keep running due rules until `until` settles (Ctrl+C by default). */
export async function monitorStartCommand(root: string, overrides: ContextOverrides = {}, until?: Promise<void>): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const rules = await ctx.monitor().listRules();
    if (!rules.some(rule => rule.enabled)) {
        console.log(chalk.dim('No enabled monitoring rules.'));
        return;
    }
    const monitor = await openMonitor(ctx, rules.some(rule => rule.enabled && rule.sources.includes('darkweb')));
    // Alerts arrive one at a time; recording is chained so project writes never overlap.
    let recording = Promise.resolve();
    monitor.onAlert(alert => {
        printAlert(ctx, alert);
        recording = recording.then(() => recordAlerts(ctx, alert.keyword, [alert]));
    });
    monitor.start();
    console.log(ctx.ui.heading('Monitoring started. Press Ctrl+C to stop.\n'));

    await (until ?? interrupted());
    monitor.stop();
    await recording;
    const stats = await monitor.getStatistics();
    console.log(`\nMonitoring stopped. ${stats.totalAlerts} alert(s) on record.`);
}

export interface MonitorAlertsOptions {
    hours?: string;
    severity?: string;
    format?: string;
    output?: string;
}

export async function monitorAlertsCommand(root: string, options: MonitorAlertsOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    const format = parseExportFormat(options.format);
    const hours = options.hours ? parsePositiveInt(options.hours, '--hours') : 24;
    const ctx = await CliContext.open(root, overrides);
    const monitor = ctx.monitor();

    let alerts: Alert[];
    if (options.severity) {
        const severity = AlertSeveritySchema.safeParse(options.severity);
        if (!severity.success) {
            throw new ValidationError(`Unknown severity "${options.severity}" (expected: ${AlertSeveritySchema.options.join(', ')})`);
        }
        alerts = await monitor.getAlertsBySeverity(severity.data, hours);
    } else {
        alerts = await monitor.getRecentAlerts(hours);
    }

    if (format) {
        await emit(exportAlerts(alerts, format), root, options.output);
        return;
    }
    if (alerts.length === 0) {
        console.log(chalk.dim(`No alerts in the last ${hours}h.`));
        return;
    }
    alerts.forEach(alert => printAlert(ctx, alert));
}

export async function monitorStatsCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const stats = await ctx.monitor().getStatistics();
    console.log(`Rules: ${stats.totalRules} (${stats.activeRules} enabled)`);
    console.log(`Alerts: ${stats.totalAlerts}`);
    for (const [severity, count] of Object.entries(stats.alertsBySeverity)) {
        console.log(`  ${severityColor(ctx.ui, severity)(severity.padEnd(8))} ${count}`);
    }
    for (const [minutes, count] of Object.entries(stats.rulesByFrequency)) {
        console.log(ctx.ui.muted(`  every ${minutes} min: ${count} rule(s)`));
    }
}

export const monitorCommand = new Command('monitor')
    .description('Keyword monitoring rules and alerts')
    .addHelpText('after', `
Examples:
  $ fosint monitor add "example corp" leak -s google,paste_sites --date-range 1w
  $ fosint monitor add acme -s darkweb --onion http://example2zyxwvutsrqp.onion
  $ fosint monitor template brand_monitoring "Example Corp"
  $ fosint monitor run
  $ fosint monitor alerts --severity high --hours 72
    `);

monitorCommand
    .command('add')
    .description('Create a monitoring rule')
    .argument('<keywords...>', 'Keywords to watch for')
    .option('-n, --name <name>', 'Rule name')
    .option('-s, --sources <list>', 'google, social_media, paste_sites, darkweb (comma-separated)', 'google')
    .option('--frequency <minutes>', 'Minutes between runs', '60')
    .option('--date-range <range>', 'Only results newer than 1d, 2w, 3m, 1y or YYYY-MM-DD')
    .option('--site <domain>', 'Restrict search results to a site')
    .option('--onion <urls...>', 'Onion pages to crawl for the darkweb source')
    .option('--disabled', 'Create the rule disabled')
    .action(run(async (keywords: string[], options: MonitorAddOptions) => {
        await monitorAddCommand(resolveWorkspaceRoot(), keywords, options);
    }));

monitorCommand
    .command('template')
    .description('Create a rule from a template, or list templates')
    .argument('[template]', 'security_monitoring, brand_monitoring or threat_intelligence')
    .argument('[keywords...]', 'Keywords to watch for')
    .action(run(async (template: string | undefined, keywords: string[]) => {
        await monitorTemplateCommand(resolveWorkspaceRoot(), template, keywords);
    }));

monitorCommand
    .command('list')
    .description('List monitoring rules')
    .action(run(async () => {
        await monitorListCommand(resolveWorkspaceRoot());
    }));

monitorCommand
    .command('remove')
    .description('Delete a rule')
    .argument('<rule>', 'Rule id or unique prefix')
    .action(run(async (ref: string) => {
        await monitorRemoveCommand(resolveWorkspaceRoot(), ref);
    }));

monitorCommand
    .command('enable')
    .description('Enable a rule')
    .argument('<rule>', 'Rule id or unique prefix')
    .action(run(async (ref: string) => {
        await monitorToggleCommand(resolveWorkspaceRoot(), ref, true);
    }));

monitorCommand
    .command('disable')
    .description('Disable a rule')
    .argument('<rule>', 'Rule id or unique prefix')
    .action(run(async (ref: string) => {
        await monitorToggleCommand(resolveWorkspaceRoot(), ref, false);
    }));

monitorCommand
    .command('run')
    .description('Run one rule now, or every enabled rule')
    .argument('[rule]', 'Rule id or unique prefix')
    .action(run(async (ref: string | undefined) => {
        await monitorRunCommand(resolveWorkspaceRoot(), ref);
    }));

monitorCommand
    .command('start')
    .description('Run due rules continuously until Ctrl+C')
    .action(run(async () => {
        await monitorStartCommand(resolveWorkspaceRoot());
    }));

monitorCommand
    .command('alerts')
    .description('Show recent alerts')
    .option('--hours <n>', 'How far back to look', '24')
    .option('--severity <level>', 'critical, high, medium or low')
    .option('-f, --format <format>', 'Export as json or csv')
    .option('-o, --output <file>', 'Write the export to a file')
    .action(run(async (options: MonitorAlertsOptions) => {
        await monitorAlertsCommand(resolveWorkspaceRoot(), options);
    }));

monitorCommand
    .command('stats')
    .description('Rule and alert counts')
    .action(run(async () => {
        await monitorStatsCommand(resolveWorkspaceRoot());
    }));
