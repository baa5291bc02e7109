import path from 'path';
import crypto from 'crypto';
import { z } from 'zod';
import { systemClock, type Clock } from '../net/rate-limiter.js';
import { Logger } from '../utils/logger.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { loadJson, saveJson } from '../utils/files.js';
import { toCsv, type ExportFormat } from '../utils/csv.js';
import {
    AlertSchema,
    MonitoringRuleSchema,
    type Alert,
    type AlertSeverity,
    type MonitorSource,
    type MonitoringRule,
} from '../types/index.js';
import type { DorkResult } from './dorking.js';
import type { ScanResult } from './darkweb-scanner.js';

export const SEVERITY_KEYWORDS: Record<AlertSeverity, string[]> = {
    critical: ['hack', 'breach', 'leak', 'dump', 'stolen', 'password', 'database'],
    high: ['vulnerability', 'exploit', 'attack', 'malware', 'threat'],
    medium: ['security', 'risk', 'warning', 'suspicious'],
    low: ['mention', 'reference', 'discussion'],
};

const SEVERITY_BONUS: Record<Exclude<AlertSeverity, 'low'>, number> = {
    critical: 0.2,
    high: 0.15,
    medium: 0.1,
};

export const SOCIAL_PLATFORMS = ['twitter', 'facebook', 'linkedin', 'instagram'];
export const PASTE_SITES = ['pastebin.com', 'paste.org', 'hastebin.com'];

export type RuleFilters = MonitoringRule['filters'];

export interface RuleTemplate {
    sources: MonitorSource[];
    frequencyMinutes: number;
    filters: RuleFilters;
}

export const RULE_TEMPLATES: Record<string, RuleTemplate> = {
    security_monitoring: {
        sources: ['google', 'darkweb', 'paste_sites'],
        frequencyMinutes: 60,
        filters: { date_range: '1d' },
    },
    brand_monitoring: {
        sources: ['google', 'social_media'],
        frequencyMinutes: 30,
        filters: {},
    },
    threat_intelligence: {
        sources: ['darkweb', 'paste_sites'],
        frequencyMinutes: 120,
        filters: {},
    },
};

const TICK_MS = 30_000;
const SOURCE_DELAY_MS = 2_000;
const ALERT_RETENTION = 1_000;
const CSV_CONTENT_LIMIT = 100;

export interface AlertScore {
    severity: AlertSeverity;
    confidence: number;
}

/**
 * Confidence starts at 0.5, gains 0.3 when the keyword appears in any case
 * and 0.2 more for an exact-case match. The highest severity whose keyword
 * list hits the content wins and adds its bonus. Capped at 1.
 */
export function scoreAlert(keyword: string, content: string): AlertScore {
    const text = content.toLowerCase();
    let confidence = 0.5;
    if (text.includes(keyword.toLowerCase())) confidence += 0.3;
    if (content.includes(keyword)) confidence += 0.2;

    let severity: AlertSeverity = 'low';
    for (const level of ['critical', 'high', 'medium'] as const) {
        if (SEVERITY_KEYWORDS[level].some(word => text.includes(word))) {
            severity = level;
            confidence += SEVERITY_BONUS[level];
            break;
        }
    }
    return { severity, confidence: Math.min(1, Math.round(confidence * 100) / 100) };
}

/** `1d`, `2w`, `3m`, `1y` become a `YYYY-MM-DD` date that far back; anything else is used as given. */
export function resolveDateRange(range: string, now: Date): string {
    const match = /^(\d+)([dwmy])$/.exec(range.trim());
    if (!match) return range;
    const amount = Number(match[1]);
    const date = new Date(now.getTime());
    switch (match[2]) {
        case 'd': date.setUTCDate(date.getUTCDate() - amount); break;
        case 'w': date.setUTCDate(date.getUTCDate() - amount * 7); break;
        case 'm': date.setUTCMonth(date.getUTCMonth() - amount); break;
        default: date.setUTCFullYear(date.getUTCFullYear() - amount);
    }
    return date.toISOString().slice(0, 10);
}

export function alertKey(alert: Pick<Alert, 'source' | 'url' | 'keyword'>): string {
    return `${alert.source}|${alert.url}|${alert.keyword.toLowerCase()}`;
}

export function exportAlerts(alerts: Alert[], format: ExportFormat): string {
    if (format === 'csv') {
        return toCsv(
            ['Alert ID', 'Rule ID', 'Keyword', 'Source', 'Content', 'URL', 'Timestamp', 'Severity', 'Confidence'],
            alerts.map(a => [
                a.alertId,
                a.ruleId,
                a.keyword,
                a.source,
                a.content.length > CSV_CONTENT_LIMIT ? `${a.content.slice(0, CSV_CONTENT_LIMIT)}...` : a.content,
                a.url,
                a.timestamp,
                a.severity,
                a.confidence,
            ]),
        );
    }
    return JSON.stringify(alerts, null, 2);
}

/** What the monitor needs from the dorking module. */
export interface KeywordSearcher {
    search(query: string, numResults?: number): Promise<DorkResult[]>;
    searchSocialMedia(query: string, platform: string, numResults?: number): Promise<DorkResult[]>;
}

/** What the monitor needs from the dark-web crawler. */
export interface PageCrawler {
    scan(urls: string[]): Promise<boolean>;
    getResults(): ScanResult[];
}

export interface NewRule {
    name?: string;
    keywords: string[];
    sources: MonitorSource[];
    frequencyMinutes?: number;
    enabled?: boolean;
    filters?: RuleFilters;
}

export type RuleUpdate = Partial<Pick<MonitoringRule, 'name' | 'keywords' | 'sources' | 'frequencyMinutes' | 'enabled' | 'filters'>>;

export interface MonitorStatistics {
    totalRules: number;
    activeRules: number;
    isMonitoring: boolean;
    totalAlerts: number;
    alertsBySeverity: Record<AlertSeverity, number>;
    rulesByFrequency: Record<string, number>;
}

export type AlertListener = (alert: Alert) => void;

export interface MonitorHit {
    source: string;
    title: string;
    content: string;
    url: string;
}

export interface KeywordMonitorOptions {
    /** Directory holding `rules.json` and `alerts.json`. */
    dir: string;
    searcher: KeywordSearcher;
    /** Absent when no Tor session is available; darkweb sources are then skipped. */
    crawler?: PageCrawler | null;
    clock?: Clock;
    tickMs?: number;
    sourceDelayMs?: number;
    /** Alerts kept in `alerts.json`; dedupe keys are dropped with the alerts they belong to. */
    alertRetention?: number;
}

const JsonArraySchema = z.array(z.unknown());

/**
 * Keyword rules run against search engines, social sites, paste sites and
 * onion pages. Rules and alerts persist in the monitoring directory so that
 * alerts stay de-duplicated across runs.
 */
export class KeywordMonitor {
    private readonly rulesFile: string;
    private readonly alertsFile: string;
    private readonly searcher: KeywordSearcher;
    private readonly crawler: PageCrawler | null;
    private readonly clock: Clock;
    private readonly tickMs: number;
    private readonly sourceDelayMs: number;
    private readonly alertRetention: number;

    private rules = new Map<string, MonitoringRule>();
    private alerts: Alert[] = [];
    private seen = new Set<string>();
    private listeners: AlertListener[] = [];
    private loaded = false;
    private timer: NodeJS.Timeout | null = null;
    private ticking = false;

    constructor(options: KeywordMonitorOptions) {
        this.rulesFile = path.join(options.dir, 'rules.json');
        this.alertsFile = path.join(options.dir, 'alerts.json');
        this.searcher = options.searcher;
        this.crawler = options.crawler ?? null;
        this.clock = options.clock ?? systemClock;
        this.tickMs = options.tickMs ?? TICK_MS;
        this.sourceDelayMs = options.sourceDelayMs ?? SOURCE_DELAY_MS;
        this.alertRetention = options.alertRetention ?? ALERT_RETENTION;
    }

    private nowIso(): string {
        return new Date(this.clock.now()).toISOString();
    }

    private async ensureLoaded(): Promise<void> {
        if (this.loaded) return;
        const rawRules = JsonArraySchema.safeParse(await loadJson(this.rulesFile));
        for (const entry of rawRules.success ? rawRules.data : []) {
            const rule = MonitoringRuleSchema.safeParse(entry);
            if (rule.success) {
                this.rules.set(rule.data.ruleId, rule.data);
            } else {
                Logger.warn(`Skipping malformed monitoring rule in ${this.rulesFile}`);
            }
        }
        const rawAlerts = JsonArraySchema.safeParse(await loadJson(this.alertsFile));
        for (const entry of rawAlerts.success ? rawAlerts.data : []) {
            const alert = AlertSchema.safeParse(entry);
            if (alert.success) {
                this.alerts.push(alert.data);
                this.seen.add(alertKey(alert.data));
            }
        }
        this.loaded = true;
    }

    private async saveRules(): Promise<void> {
        await saveJson(this.rulesFile, [...this.rules.values()]);
    }

    private async saveAlerts(): Promise<void> {
        await saveJson(this.alertsFile, this.alerts);
    }

    async addRule(input: NewRule): Promise<MonitoringRule> {
        await this.ensureLoaded();
        const parsed = MonitoringRuleSchema.safeParse({
            ruleId: crypto.randomUUID(),
            name: input.name ?? '',
            keywords: input.keywords.map(k => k.trim()).filter(Boolean),
            sources: input.sources,
            frequencyMinutes: input.frequencyMinutes,
            enabled: input.enabled,
            lastRun: null,
            createdAt: this.nowIso(),
            filters: input.filters,
        });
        if (!parsed.success) {
            throw new ValidationError(`Invalid monitoring rule: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`);
        }
        this.rules.set(parsed.data.ruleId, parsed.data);
        await this.saveRules();
        return parsed.data;
    }

    async addRuleFromTemplate(templateName: string, keywords: string[]): Promise<MonitoringRule> {
        const template = RULE_TEMPLATES[templateName];
        if (!template) {
            throw new ValidationError(`Unknown template: ${templateName}. Available: ${Object.keys(RULE_TEMPLATES).join(', ')}`);
        }
        return this.addRule({
            name: templateName,
            keywords,
            sources: [...template.sources],
            frequencyMinutes: template.frequencyMinutes,
            filters: { ...template.filters },
        });
    }

    async removeRule(ruleId: string): Promise<boolean> {
        await this.ensureLoaded();
        if (!this.rules.delete(ruleId)) return false;
        await this.saveRules();
        return true;
    }

    async updateRule(ruleId: string, updates: RuleUpdate): Promise<MonitoringRule | null> {
        await this.ensureLoaded();
        const existing = this.rules.get(ruleId);
        if (!existing) return null;
        const parsed = MonitoringRuleSchema.safeParse({ ...existing, ...updates });
        if (!parsed.success) {
            throw new ValidationError(`Invalid rule update: ${parsed.error.issues.map(i => i.message).join('; ')}`);
        }
        this.rules.set(ruleId, parsed.data);
        await this.saveRules();
        return parsed.data;
    }

    setEnabled(ruleId: string, enabled: boolean): Promise<MonitoringRule | null> {
        return this.updateRule(ruleId, { enabled });
    }

    async getRule(ruleId: string): Promise<MonitoringRule | null> {
        await this.ensureLoaded();
        return this.rules.get(ruleId) ?? null;
    }

    async listRules(): Promise<MonitoringRule[]> {
        await this.ensureLoaded();
        return [...this.rules.values()].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    }

    onAlert(listener: AlertListener): () => void {
        this.listeners.push(listener);
        return () => this.removeAlertListener(listener);
    }

    removeAlertListener(listener: AlertListener): void {
        this.listeners = this.listeners.filter(l => l !== listener);
    }

    private emit(alert: Alert): void {
        for (const listener of this.listeners) {
            try {
                listener(alert);
            } catch (error) {
                Logger.error('Error in alert listener', error);
            }
        }
    }

    /** Run every keyword of a rule against every source; returns the alerts not seen before. */
    async runRule(ruleId: string): Promise<Alert[]> {
        await this.ensureLoaded();
        const rule = this.rules.get(ruleId);
        if (!rule) {
            throw new ValidationError(`Unknown rule: ${ruleId}`);
        }

        const fresh: Alert[] = [];
        let pages: ScanResult[] | null = null;
        for (const keyword of rule.keywords) {
            for (const source of rule.sources) {
                let hits: MonitorHit[] = [];
                try {
                    if (source === 'darkweb') {
                        pages ??= await this.crawlOnions(rule.filters.onion_urls ?? []);
                        hits = matchPages(pages, keyword);
                    } else {
                        hits = await this.searchSource(keyword, source, rule.filters);
                    }
                } catch (error) {
                    Logger.warn(`Error searching ${source} for "${keyword}": ${errorMessage(error)}`);
                }

                for (const hit of hits) {
                    const alert = this.recordHit(rule.ruleId, keyword, hit);
                    if (alert) fresh.push(alert);
                }
                if (source !== 'darkweb' && this.sourceDelayMs > 0) {
                    await this.clock.sleep(this.sourceDelayMs);
                }
            }
        }

        rule.lastRun = this.nowIso();
        await this.saveRules();
        if (fresh.length > 0) await this.saveAlerts();
        return fresh;
    }

    private recordHit(ruleId: string, keyword: string, hit: MonitorHit): Alert | null {
        const key = alertKey({ source: hit.source, url: hit.url, keyword });
        if (this.seen.has(key)) return null;
        this.seen.add(key);

        const score = scoreAlert(keyword, hit.content);
        const alert: Alert = {
            alertId: crypto.randomUUID(),
            ruleId,
            keyword,
            source: hit.source,
            title: hit.title,
            content: hit.content,
            url: hit.url,
            timestamp: this.nowIso(),
            severity: score.severity,
            confidence: score.confidence,
        };
        this.alerts.push(alert);
        if (this.alerts.length > this.alertRetention) {
            const dropped = this.alerts.splice(0, this.alerts.length - this.alertRetention);
            for (const old of dropped) this.seen.delete(alertKey(old));
        }
        this.emit(alert);
        return alert;
    }

    private async searchSource(keyword: string, source: Exclude<MonitorSource, 'darkweb'>, filters: RuleFilters): Promise<MonitorHit[]> {
        const toHits = (results: DorkResult[], label: string): MonitorHit[] =>
            results.map(r => ({ source: label, title: r.title, content: r.snippet, url: r.url }));

        switch (source) {
            case 'google': {
                let query = keyword;
                if (filters.date_range) query += ` after:${resolveDateRange(filters.date_range, new Date(this.clock.now()))}`;
                if (filters.site) query += ` site:${filters.site}`;
                return toHits(await this.searcher.search(query, 10), 'google');
            }
            case 'social_media': {
                const hits: MonitorHit[] = [];
                for (const platform of SOCIAL_PLATFORMS) {
                    hits.push(...toHits(await this.searcher.searchSocialMedia(keyword, platform, 5), `social_media_${platform}.com`));
                }
                return hits;
            }
            case 'paste_sites': {
                const hits: MonitorHit[] = [];
                for (const site of PASTE_SITES) {
                    hits.push(...toHits(await this.searcher.search(`site:${site} "${keyword}"`, 5), `paste_${site}`));
                }
                return hits;
            }
        }
    }

    private async crawlOnions(urls: string[]): Promise<ScanResult[]> {
        if (urls.length === 0) {
            Logger.debug('darkweb source without onion_urls filter; nothing to crawl');
            return [];
        }
        if (!this.crawler) {
            Logger.warn('Tor is not available; skipping darkweb source');
            return [];
        }
        if (!(await this.crawler.scan(urls))) {
            Logger.warn('A dark web scan is already running; skipping darkweb source');
            return [];
        }
        return this.crawler.getResults();
    }

    /** Run every enabled rule whose frequency has elapsed since its last run. */
    async tick(): Promise<number> {
        if (this.ticking) return 0;
        this.ticking = true;
        let count = 0;
        try {
            await this.ensureLoaded();
            const now = this.clock.now();
            for (const rule of [...this.rules.values()]) {
                if (!rule.enabled) continue;
                // A rule that never ran counts from its creation time.
                const last = Date.parse(rule.lastRun ?? rule.createdAt);
                if (!isNaN(last) && now - last < rule.frequencyMinutes * 60_000) continue;
                try {
                    count += (await this.runRule(rule.ruleId)).length;
                } catch (error) {
                    Logger.error(`Error executing monitoring rule ${rule.ruleId}`, error);
                }
            }
        } finally {
            this.ticking = false;
        }
        return count;
    }

    get isMonitoring(): boolean {
        return this.timer !== null;
    }

    /** Tick now and then every `tickMs`. False when already running. */
    start(): boolean {
        if (this.timer) return false;
        const run = () => {
            this.tick().catch(error => Logger.error('Error in monitoring loop', error));
        };
        this.timer = setInterval(run, this.tickMs);
        run();
        return true;
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    async getRecentAlerts(hours = 24): Promise<Alert[]> {
        await this.ensureLoaded();
        const cutoff = this.clock.now() - hours * 3_600_000;
        return this.alerts
            .filter(alert => Date.parse(alert.timestamp) >= cutoff)
            .sort((a, b) => b.timestamp.localeCompare(a.timestamp));
    }

    async getAlertsBySeverity(severity: AlertSeverity, hours = 24 * 7): Promise<Alert[]> {
        return (await this.getRecentAlerts(hours)).filter(alert => alert.severity === severity);
    }

    async getStatistics(): Promise<MonitorStatistics> {
        await this.ensureLoaded();
        const rules = [...this.rules.values()];
        const alertsBySeverity: Record<AlertSeverity, number> = { critical: 0, high: 0, medium: 0, low: 0 };
        for (const alert of this.alerts) alertsBySeverity[alert.severity]++;
        const rulesByFrequency: Record<string, number> = {};
        for (const rule of rules) {
            const key = String(rule.frequencyMinutes);
            rulesByFrequency[key] = (rulesByFrequency[key] ?? 0) + 1;
        }
        return {
            totalRules: rules.length,
            activeRules: rules.filter(rule => rule.enabled).length,
            isMonitoring: this.isMonitoring,
            totalAlerts: this.alerts.length,
            alertsBySeverity,
            rulesByFrequency,
        };
    }
}

/** Onion pages whose title or text mention the keyword, case-insensitively. */
export function matchPages(pages: ScanResult[], keyword: string): MonitorHit[] {
    const needle = keyword.toLowerCase();
    const hits: MonitorHit[] = [];
    for (const page of pages) {
        const text = page.content.toLowerCase();
        const index = text.indexOf(needle);
        if (index < 0 && !page.title.toLowerCase().includes(needle)) continue;
        const start = Math.max(0, index - 100);
        const excerpt = index < 0 ? page.content.slice(0, 200) : page.content.slice(start, index + needle.length + 100);
        hits.push({ source: 'darkweb', title: page.title, content: excerpt.replace(/\s+/g, ' ').trim(), url: page.url });
    }
    return hits;
}
