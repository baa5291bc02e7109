import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { GOOGLE_SEARCH_URL, KeywordMonitor, ValidationError, getWorkspacePaths, type Alert } from '@fosint/core';
import { FakeHttpClient } from '@fosint/core/testing';
import { signinCommand, signupCommand } from './auth.js';
import { projectCreateCommand } from './project.js';
import {
    monitorAddCommand,
    monitorAlertsCommand,
    monitorRemoveCommand,
    monitorStartCommand,
    monitorToggleCommand,
    parseSources,
} from './monitor.js';
import { CliContext } from '../utils/context.js';

const idleSearcher = {
    search: async () => [],
    searchSocialMedia: async () => [],
};

function alert(overrides: Partial<Alert>): Alert {
    return {
        alertId: 'a1',
        ruleId: 'r1',
        keyword: 'acme',
        source: 'google',
        title: 'Hit',
        content: 'acme',
        url: 'https://example.com/a',
        timestamp: new Date().toISOString(),
        severity: 'low',
        confidence: 0.5,
        ...overrides,
    };
}

describe('parseSources', () => {
    it('splits, trims and de-duplicates', () => {
        expect(parseSources('google, darkweb,google')).toEqual(['google', 'darkweb']);
    });

    it('rejects unknown sources', () => {
        expect(() => parseSources('google,ftp')).toThrow('Unknown source "ftp" (expected: google, social_media, paste_sites, darkweb)');
    });
});

describe('monitor commands', () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'fosint-monitor-cmd-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.remove(root);
    });

    const rules = () => new KeywordMonitor({ dir: getWorkspacePaths(root).monitoring, searcher: idleSearcher }).listRules();

    it('adds a rule with filters', async () => {
        await monitorAddCommand(root, ['acme', 'globex'], {
            name: 'brands',
            sources: 'google,paste_sites',
            frequency: '30',
            dateRange: '1w',
            site: 'example.com',
        });

        const [rule] = await rules();
        expect(rule).toMatchObject({
            name: 'brands',
            keywords: ['acme', 'globex'],
            sources: ['google', 'paste_sites'],
            frequencyMinutes: 30,
            enabled: true,
            filters: { date_range: '1w', site: 'example.com' },
        });
    });

    it('rejects a non-numeric frequency', async () => {
        await expect(monitorAddCommand(root, ['acme'], { frequency: 'often' })).rejects.toThrow(
            '--frequency must be a positive integer, got "often"',
        );
    });

    it('toggles and removes rules by id prefix', async () => {
        await monitorAddCommand(root, ['acme'], {});
        const [rule] = await rules();

        await monitorToggleCommand(root, rule.ruleId.slice(0, 8), false);
        expect((await rules())[0].enabled).toBe(false);

        await monitorRemoveCommand(root, rule.ruleId);
        expect(await rules()).toEqual([]);
    });

    it('exports recent alerts filtered by severity', async () => {
        const high = alert({ alertId: 'a2', severity: 'high', url: 'https://example.com/b' });
        await fs.outputJson(path.join(getWorkspacePaths(root).monitoring, 'alerts.json'), [alert({}), high]);

        await monitorAlertsCommand(root, { severity: 'high', format: 'json', output: 'alerts-out.json' });

        expect(await fs.readJson(path.join(root, 'alerts-out.json'))).toEqual([high]);
    });

    it('rejects unknown severities', async () => {
        await expect(monitorAlertsCommand(root, { severity: 'urgent' })).rejects.toBeInstanceOf(ValidationError);
    });
});

describe('monitorStartCommand', () => {
    const CREATED = Date.parse('2024-05-01T12:00:00Z');
    let root: string;
    let now: number;
    const clock = { now: () => now, sleep: async () => {} };

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'fosint-monitor-start-'));
        now = CREATED;
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        await signupCommand(root, 'analyst', { email: 'analyst@example.com', password: 'Test-secret1!' });
        await signinCommand(root, 'analyst', { password: 'Test-secret1!' });
        await projectCreateCommand(root, 'Acme case');
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.remove(root);
    });

    it('records alerts from the loop into the selected project', async () => {
        const http = new FakeHttpClient().on(GOOGLE_SEARCH_URL, url => ({
            body: url.includes('start=0')
                ? '<div class="g"><a href="https://paste.example.com/x1"><h3>Acme dump</h3></a><div class="s">acme database dump posted</div></div>'
                : '<html></html>',
        }));
        await monitorAddCommand(root, ['acme'], { frequency: '60' }, { clock });
        now = CREATED + 61 * 60_000;

        const stored = () => new KeywordMonitor({ dir: getWorkspacePaths(root).monitoring, searcher: idleSearcher }).getStatistics();
        const finished = vi.waitFor(async () => expect((await stored()).totalAlerts).toBe(1), { timeout: 5_000 }).then(() => undefined);
        await monitorStartCommand(root, { http, clock }, finished);

        const project = (await CliContext.open(root)).projects.currentProject;
        expect(project?.data.searches.map(s => [s.module, s.query, s.resultCount])).toEqual([['keyword-monitor', 'acme', 1]]);
        expect(project?.data.findings.map(f => [f.title, f.severity, f.target])).toEqual([
            ['"acme" on google: Acme dump', 'critical', 'acme'],
        ]);
    });

    it('returns at once without enabled rules', async () => {
        await monitorAddCommand(root, ['acme'], { disabled: true }, { clock });
        await monitorStartCommand(root, { http: new FakeHttpClient(), clock }, new Promise(() => {}));
        expect(console.log).toHaveBeenCalledWith(expect.stringContaining('No enabled monitoring rules.'));
    });
});
