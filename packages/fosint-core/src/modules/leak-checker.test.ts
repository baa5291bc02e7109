import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
    HIBP_BASE_URL,
    LeakChecker,
    analyzeBreachSeverity,
    exportLeakResults,
    generateEmailVariations,
    parseBreach,
    type Breach,
} from './leak-checker.js';
import { FakeHttpClient } from '../testing/fake-http.js';
import type { Clock } from '../net/rate-limiter.js';

const clock: Clock = { now: () => Date.parse('2025-03-01T00:00:00.000Z'), sleep: async () => {} };

const ADOBE = {
    Name: 'Adobe',
    Title: 'Adobe',
    Domain: 'adobe.com',
    BreachDate: '2013-10-04',
    PwnCount: 152445165,
    DataClasses: ['Email addresses', 'Passwords'],
    IsVerified: true,
    Description: 'Test breach',
};

const FORUM = {
    Name: 'ExampleForum',
    Domain: 'forum.example.com',
    BreachDate: '2020-01-01',
    PwnCount: 1000,
    DataClasses: ['Usernames'],
};

function breach(overrides: Partial<Breach> = {}): Breach {
    return {
        name: 'B', title: 'B', domain: '', breachDate: '', pwnCount: 1,
        dataClasses: [], isVerified: false, description: '', ...overrides,
    };
}

describe('LeakChecker', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('collects breaches and pastes with an API key', async () => {
        const http = new FakeHttpClient()
            .on(`${HIBP_BASE_URL}/breachedaccount/someone%40example.com`, { body: [ADOBE, FORUM] })
            .on(`${HIBP_BASE_URL}/pasteaccount/someone%40example.com`, { body: [{ Source: 'Pastebin', Id: 'abc123', Title: null, Date: '2021-05-01T00:00:00Z', EmailCount: 42 }] });
        const checker = new LeakChecker({ http, clock, apiKey: 'test-secret' });

        const result = await checker.checkEmail('someone@example.com');

        expect(result.breaches.map(b => b.name)).toEqual(['Adobe', 'ExampleForum']);
        expect(result.breaches[1].title).toBe('ExampleForum');
        expect(result.pastes).toEqual([{ source: 'Pastebin', id: 'abc123', title: null, date: '2021-05-01T00:00:00Z', emailCount: 42 }]);
        expect(result.checkedAt).toBe('2025-03-01T00:00:00.000Z');
        expect(http.calls[0].url).toBe(`${HIBP_BASE_URL}/breachedaccount/someone%40example.com?truncateResponse=false`);
        expect(http.calls[0].options.headers).toEqual({ 'User-Agent': 'fosint', 'hibp-api-key': 'test-secret' });
    });

    it('treats 404 as not pwned and skips pastes without a key', async () => {
        const http = new FakeHttpClient().on(`${HIBP_BASE_URL}/breachedaccount/`, { status: 404, body: '' });
        const checker = new LeakChecker({ http, clock });

        const result = await checker.checkEmail('clean@example.com');

        expect(result.breaches).toEqual([]);
        expect(result.pastes).toEqual([]);
        expect(http.calls).toHaveLength(1);
    });

    it('does not query for an invalid address', async () => {
        const http = new FakeHttpClient();
        const result = await new LeakChecker({ http, clock }).checkEmail('not-an-email');
        expect(result.breaches).toEqual([]);
        expect(http.calls).toEqual([]);
    });

    it('keeps going when the transport fails', async () => {
        const results = await new LeakChecker({ http: new FakeHttpClient(), clock }).bulkCheck(['a@example.com', 'b@example.com']);
        expect(results.map(r => r.email)).toEqual(['a@example.com', 'b@example.com']);
        expect(results.every(r => r.breaches.length === 0)).toBe(true);
    });

    it('returns only the mail providers with hits for a username', async () => {
        const http = new FakeHttpClient()
            .on(`${HIBP_BASE_URL}/breachedaccount/`, { status: 404, body: '' })
            .on(`${HIBP_BASE_URL}/breachedaccount/jdoe%40yahoo.com`, { body: [FORUM] });

        const hits = await new LeakChecker({ http, clock }).checkUsername('jdoe');

        expect(hits).toHaveLength(1);
        expect(hits[0]).toMatchObject({ email: 'jdoe@yahoo.com', username: 'jdoe', domain: 'yahoo.com' });
        expect(http.calls).toHaveLength(6);
    });

    it('validates and normalises phone numbers', () => {
        const checker = new LeakChecker({ http: new FakeHttpClient(), clock });
        expect(checker.checkPhone('+1 555 010 9999')).toEqual({
            phone: '+1 555 010 9999',
            normalized: '+15550109999',
            valid: true,
            breaches: [],
            message: 'Phone number validation successful',
        });
        expect(checker.checkPhone('call me').valid).toBe(false);
    });

    it('fetches breach details by name', async () => {
        const http = new FakeHttpClient()
            .on(`${HIBP_BASE_URL}/breach/Adobe`, { body: ADOBE })
            .on(`${HIBP_BASE_URL}/breach/Nope`, { status: 404, body: '' });
        const checker = new LeakChecker({ http, clock });

        expect((await checker.getBreachDetails('Adobe'))?.pwnCount).toBe(152445165);
        expect(await checker.getBreachDetails('Nope')).toBeNull();
    });
});

describe('breach helpers', () => {
    it('ignores breach entries without a name', () => {
        expect(parseBreach({ Title: 'No name' })).toBeNull();
        expect(parseBreach('Adobe')).toBeNull();
    });

    it('scores breaches by count and sensitive data', () => {
        expect(analyzeBreachSeverity([])).toEqual({ severity: 'none', riskScore: 0, totalBreaches: 0, totalAccountsAffected: 0, sensitiveBreaches: 0 });
        expect(analyzeBreachSeverity([breach()]).severity).toBe('minimal');
        expect(analyzeBreachSeverity([breach({ pwnCount: 5, dataClasses: ['Passwords'] }), breach({ pwnCount: 7 })])).toEqual({
            severity: 'medium', riskScore: 40, totalBreaches: 2, totalAccountsAffected: 12, sensitiveBreaches: 1,
        });
        const many = Array.from({ length: 5 }, () => breach({ dataClasses: ['Credit cards'] }));
        expect(analyzeBreachSeverity(many)).toMatchObject({ severity: 'critical', riskScore: 100 });
    });

    it('generates address variations', () => {
        const variations = generateEmailVariations('jdoe', ['a.com', 'b.com']);
        expect(variations.slice(0, 4)).toEqual(['jdoe@a.com', 'jdoe@b.com', 'jdoe0@a.com', 'jdoe0@b.com']);
        expect(variations.slice(-2)).toEqual(['jd.oe@a.com', 'jd.oe@b.com']);
        expect(variations).toHaveLength(2 + 20 + 2);
        expect(generateEmailVariations('abc', ['a.com'])).toHaveLength(11);
    });

    it('exports results as CSV', () => {
        const csv = exportLeakResults([
            { email: 'someone@example.com', breaches: [breach({ dataClasses: ['Passwords'] })], pastes: [], checkedAt: '2025-03-01T00:00:00.000Z' },
        ], 'csv');
        expect(csv).toBe('Email,Breaches Count,Pastes Count,Risk Level,Checked At\r\nsomeone@example.com,1,0,low,2025-03-01T00:00:00.000Z\r\n');
    });
});
