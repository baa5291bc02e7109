import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
    KeywordMonitor,
    exportAlerts,
    matchPages,
    resolveDateRange,
    scoreAlert,
    type KeywordSearcher,
    type PageCrawler,
} from './keyword-monitor.js';
import type { DorkResult } from './dorking.js';
import type { ScanResult } from './darkweb-scanner.js';
import type { Clock } from '../net/rate-limiter.js';
import type { Alert } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';

const START = Date.parse('2025-03-01T00:00:00.000Z');

class TestClock implements Clock {
    current = START;
    now(): number {
        return this.current;
    }
    async sleep(): Promise<void> {}
}

function result(title: string, url: string, snippet: string): DorkResult {
    return { title, url, snippet, domain: new URL(url).hostname, timestamp: '2025-03-01T00:00:00.000Z' };
}

class FakeSearcher implements KeywordSearcher {
    readonly queries: string[] = [];
    readonly socialQueries: string[] = [];
    constructor(private readonly results: Record<string, DorkResult[]> = {}) {}

    async search(query: string): Promise<DorkResult[]> {
        this.queries.push(query);
        return this.results[query] ?? [];
    }

    async searchSocialMedia(query: string, platform: string): Promise<DorkResult[]> {
        this.socialQueries.push(`${platform}:${query}`);
        return this.results[`${platform}:${query}`] ?? [];
    }
}

function page(url: string, title: string, content: string): ScanResult {
    return { url, depth: 0, statusCode: 200, title, content, links: [], forms: [], emails: [], error: '', timestamp: '2025-03-01T00:00:00.000Z' };
}

class FakeCrawler implements PageCrawler {
    readonly scanned: string[][] = [];
    constructor(private readonly pages: ScanResult[]) {}

    async scan(urls: string[]): Promise<boolean> {
        this.scanned.push(urls);
        return true;
    }

    getResults(): ScanResult[] {
        return this.pages;
    }
}

describe('scoreAlert', () => {
    it('rates exact matches with critical terms at full confidence', () => {
        expect(scoreAlert('Acme', 'Acme database dump posted')).toEqual({ severity: 'critical', confidence: 1 });
    });

    it('adds the high severity bonus for a case-insensitive match', () => {
        expect(scoreAlert('acme', 'ACME exploit released')).toEqual({ severity: 'high', confidence: 0.95 });
    });

    it('falls back to low severity', () => {
        expect(scoreAlert('acme', 'nothing of note')).toEqual({ severity: 'low', confidence: 0.5 });
    });
});

describe('resolveDateRange', () => {
    const now = new Date('2025-03-01T12:00:00.000Z');

    it('turns relative ranges into dates', () => {
        expect(resolveDateRange('1d', now)).toBe('2025-02-28');
        expect(resolveDateRange('2w', now)).toBe('2025-02-15');
        expect(resolveDateRange('1m', now)).toBe('2025-02-01');
        expect(resolveDateRange('1y', now)).toBe('2024-03-01');
    });

    it('keeps anything else as given', () => {
        expect(resolveDateRange('2024-12-31', now)).toBe('2024-12-31');
    });
});

describe('matchPages', () => {
    it('matches page text and titles case-insensitively', () => {
        const pages = [
            page('http://aaaaexample.onion/', 'Shop', 'Welcome to the market. Fresh ACME credentials for sale.'),
            page('http://bbbbexample.onion/', 'Acme fan club', 'Members only'),
            page('http://ccccexample.onion/', 'Forum', 'Unrelated talk'),
        ];

        expect(matchPages(pages, 'acme')).toEqual([
            { source: 'darkweb', title: 'Shop', content: 'Welcome to the market. Fresh ACME credentials for sale.', url: 'http://aaaaexample.onion/' },
            { source: 'darkweb', title: 'Acme fan club', content: 'Members only', url: 'http://bbbbexample.onion/' },
        ]);
    });
});

describe('exportAlerts', () => {
    it('writes CSV with truncated content', () => {
        const alert: Alert = {
            alertId: 'a1',
            ruleId: 'r1',
            keyword: 'acme',
            source: 'google',
            title: 'Hit',
            content: 'x'.repeat(120),
            url: 'https://example.com/a',
            timestamp: '2025-03-01T00:00:00.000Z',
            severity: 'low',
            confidence: 0.5,
        };

        expect(exportAlerts([alert], 'csv')).toBe(
            'Alert ID,Rule ID,Keyword,Source,Content,URL,Timestamp,Severity,Confidence\r\n' +
            `a1,r1,acme,google,${'x'.repeat(100)}...,https://example.com/a,2025-03-01T00:00:00.000Z,low,0.5\r\n`,
        );
    });
});

describe('KeywordMonitor', () => {
    let dir: string;
    let clock: TestClock;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fosint-monitor-'));
        clock = new TestClock();
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.remove(dir);
    });

    function monitor(searcher: KeywordSearcher, crawler?: PageCrawler): KeywordMonitor {
        return new KeywordMonitor({ dir, searcher, crawler, clock, sourceDelayMs: 0 });
    }

    it('applies defaults and persists new rules', async () => {
        const rule = await monitor(new FakeSearcher()).addRule({ keywords: [' acme ', ''], sources: ['google'] });

        expect(rule.keywords).toEqual(['acme']);
        expect(rule.frequencyMinutes).toBe(60);
        expect(rule.enabled).toBe(true);
        expect(rule.lastRun).toBeNull();
        expect(rule.createdAt).toBe('2025-03-01T00:00:00.000Z');

        const reloaded = await monitor(new FakeSearcher()).listRules();
        expect(reloaded.map(r => r.ruleId)).toEqual([rule.ruleId]);
    });

    it('rejects rules without keywords', async () => {
        await expect(monitor(new FakeSearcher()).addRule({ keywords: ['  '], sources: ['google'] }))
            .rejects.toBeInstanceOf(ValidationError);
    });

    it('creates rules from templates', async () => {
        const rule = await monitor(new FakeSearcher()).addRuleFromTemplate('security_monitoring', ['acme']);
        expect(rule.name).toBe('security_monitoring');
        expect(rule.sources).toEqual(['google', 'darkweb', 'paste_sites']);
        expect(rule.filters).toEqual({ date_range: '1d' });
        await expect(monitor(new FakeSearcher()).addRuleFromTemplate('nope', ['acme'])).rejects.toThrow('Unknown template: nope');
    });

    it('searches google with date and site filters and scores the hits', async () => {
        const searcher = new FakeSearcher({
            'acme after:2025-02-28 site:example.com': [result('Acme database leak', 'https://a.example.com/1', 'dump of acme users')],
        });
        const m = monitor(searcher);
        const rule = await m.addRule({ keywords: ['acme'], sources: ['google'], filters: { date_range: '1d', site: 'example.com' } });

        const alerts = await m.runRule(rule.ruleId);

        expect(searcher.queries).toEqual(['acme after:2025-02-28 site:example.com']);
        expect(alerts).toHaveLength(1);
        expect(alerts[0]).toMatchObject({
            ruleId: rule.ruleId,
            keyword: 'acme',
            source: 'google',
            url: 'https://a.example.com/1',
            severity: 'critical',
            confidence: 1,
            timestamp: '2025-03-01T00:00:00.000Z',
        });
        expect((await m.getRule(rule.ruleId))?.lastRun).toBe('2025-03-01T00:00:00.000Z');
    });

    it('does not alert twice for the same hit, across instances', async () => {
        const searcher = new FakeSearcher({ acme: [result('Acme', 'https://example.com/a', 'acme news')] });
        const first = monitor(searcher);
        const rule = await first.addRule({ keywords: ['acme'], sources: ['google'] });

        expect(await first.runRule(rule.ruleId)).toHaveLength(1);
        expect(await first.runRule(rule.ruleId)).toHaveLength(0);
        expect(await monitor(searcher).runRule(rule.ruleId)).toHaveLength(0);
    });

    it('queries every social platform and paste site', async () => {
        const searcher = new FakeSearcher({
            'twitter:acme': [result('Post', 'https://twitter.com/x/1', 'acme mention')],
            'site:pastebin.com "acme"': [result('Paste', 'https://pastebin.com/abc', 'acme password list')],
        });
        const m = monitor(searcher);
        const rule = await m.addRule({ keywords: ['acme'], sources: ['social_media', 'paste_sites'] });

        const alerts = await m.runRule(rule.ruleId);

        expect(searcher.socialQueries).toEqual(['twitter:acme', 'facebook:acme', 'linkedin:acme', 'instagram:acme']);
        expect(searcher.queries).toEqual(['site:pastebin.com "acme"', 'site:paste.org "acme"', 'site:hastebin.com "acme"']);
        expect(alerts.map(a => [a.source, a.severity])).toEqual([
            ['social_media_twitter.com', 'low'],
            ['paste_pastebin.com', 'critical'],
        ]);
    });

    it('crawls onion urls once per run for the darkweb source', async () => {
        const crawler = new FakeCrawler([page('http://aaaaexample.onion/', 'Shop', 'acme and globex accounts')]);
        const m = monitor(new FakeSearcher(), crawler);
        const rule = await m.addRule({
            keywords: ['acme', 'globex'],
            sources: ['darkweb'],
            filters: { onion_urls: ['http://aaaaexample.onion/'] },
        });

        const alerts = await m.runRule(rule.ruleId);

        expect(crawler.scanned).toEqual([['http://aaaaexample.onion/']]);
        expect(alerts.map(a => a.keyword)).toEqual(['acme', 'globex']);
    });

    it('skips the darkweb source without a crawler', async () => {
        const m = monitor(new FakeSearcher(), undefined);
        const rule = await m.addRule({ keywords: ['acme'], sources: ['darkweb'], filters: { onion_urls: ['http://aaaaexample.onion/'] } });
        expect(await m.runRule(rule.ruleId)).toEqual([]);
    });

    it('waits one full frequency before the first run of a new rule', async () => {
        const searcher = new FakeSearcher();
        const m = monitor(searcher);
        await m.addRule({ keywords: ['acme'], sources: ['google'], frequencyMinutes: 60 });
        await m.addRule({ keywords: ['globex'], sources: ['google'], frequencyMinutes: 60, enabled: false });

        await m.tick();
        expect(searcher.queries).toEqual([]);

        clock.current += 60 * 60_000;
        await m.tick();
        expect(searcher.queries).toEqual(['acme']);

        clock.current += 30 * 60_000;
        await m.tick();
        expect(searcher.queries).toEqual(['acme']);

        clock.current += 30 * 60_000;
        await m.tick();
        expect(searcher.queries).toEqual(['acme', 'acme']);
    });

    it('forgets dedupe keys of alerts that fall out of retention', async () => {
        const searcher = new FakeSearcher({
            acme: [result('A', 'https://example.com/a', 'acme')],
            globex: [result('G', 'https://example.com/g', 'globex')],
            initech: [result('I', 'https://example.com/i', 'initech')],
        });
        const m = new KeywordMonitor({ dir, searcher, clock, sourceDelayMs: 0, alertRetention: 2 });
        const acme = await m.addRule({ keywords: ['acme'], sources: ['google'] });
        const globex = await m.addRule({ keywords: ['globex'], sources: ['google'] });
        const initech = await m.addRule({ keywords: ['initech'], sources: ['google'] });

        await m.runRule(acme.ruleId);
        await m.runRule(globex.ruleId);
        await m.runRule(initech.ruleId);

        expect((await m.getRecentAlerts()).map(a => a.keyword)).toEqual(['globex', 'initech']);
        expect((await m.runRule(acme.ruleId)).map(a => a.url)).toEqual(['https://example.com/a']);
        expect(await m.runRule(initech.ruleId)).toEqual([]);
    });

    it('notifies listeners until they unsubscribe', async () => {
        const searcher = new FakeSearcher({
            acme: [result('A', 'https://example.com/a', 'acme')],
            globex: [result('G', 'https://example.com/g', 'globex')],
        });
        const m = monitor(searcher);
        const seen: string[] = [];
        const unsubscribe = m.onAlert(alert => seen.push(alert.keyword));
        const first = await m.addRule({ keywords: ['acme'], sources: ['google'] });
        const second = await m.addRule({ keywords: ['globex'], sources: ['google'] });

        await m.runRule(first.ruleId);
        unsubscribe();
        await m.runRule(second.ruleId);

        expect(seen).toEqual(['acme']);
    });

    it('filters recent alerts and counts statistics', async () => {
        const searcher = new FakeSearcher({ acme: [result('Acme exploit', 'https://example.com/a', 'new exploit for acme')] });
        const m = monitor(searcher);
        const rule = await m.addRule({ keywords: ['acme'], sources: ['google'], frequencyMinutes: 30 });
        await m.runRule(rule.ruleId);

        expect(await m.getAlertsBySeverity('high')).toHaveLength(1);
        clock.current += 25 * 3_600_000;
        expect(await m.getRecentAlerts(24)).toEqual([]);
        expect(await m.getStatistics()).toEqual({
            totalRules: 1,
            activeRules: 1,
            isMonitoring: false,
            totalAlerts: 1,
            alertsBySeverity: { critical: 0, high: 1, medium: 0, low: 0 },
            rulesByFrequency: { '30': 1 },
        });
    });

    it('enables, disables and removes rules', async () => {
        const m = monitor(new FakeSearcher());
        const rule = await m.addRule({ keywords: ['acme'], sources: ['google'] });

        expect((await m.setEnabled(rule.ruleId, false))?.enabled).toBe(false);
        expect(await m.setEnabled('missing', true)).toBeNull();
        expect(await m.removeRule(rule.ruleId)).toBe(true);
        expect(await m.removeRule(rule.ruleId)).toBe(false);
        await expect(m.runRule(rule.ruleId)).rejects.toBeInstanceOf(ValidationError);
    });

    it('starts the loop once', () => {
        const m = new KeywordMonitor({ dir, searcher: new FakeSearcher(), clock, tickMs: 3_600_000 });
        expect(m.start()).toBe(true);
        expect(m.start()).toBe(false);
        expect(m.isMonitoring).toBe(true);
        m.stop();
        expect(m.isMonitoring).toBe(false);
    });
});
