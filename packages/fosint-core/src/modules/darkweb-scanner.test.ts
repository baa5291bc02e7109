import { describe, it, expect } from 'vitest';
import { DarkWebScanner, analyzeContent, exportScanResults, extractEmails, parsePage, type ScanResult } from './darkweb-scanner.js';
import { FakeHttpClient } from '../testing/fake-http.js';
import type { Clock } from '../net/rate-limiter.js';

const clock: Clock = { now: () => Date.parse('2025-03-01T00:00:00.000Z'), sleep: async () => {} };

const HOME = 'http://aaaaexample.onion/';
const ABOUT = 'http://aaaaexample.onion/about';
const OTHER = 'http://bbbbexample.onion/';

const HOME_HTML = `<html><head><title> Example Market </title><script>var tracking = "hack";</script></head><body>
<h1>Welcome</h1>
<p>We buy and sell. See the price list; escrow payment only. Contact admin@aaaaexample.onion</p>
<a href="/about">About</a>
<a href="${OTHER}">Partner</a>
<a href="https://example.com/">Clearnet mirror</a>
<a href="/about#team">Team</a>
<form action="/login" method="post">
  <input name="username" required>
  <input type="password" name="password" placeholder="Password">
</form>
</body></html>`;

function site(): FakeHttpClient {
    return new FakeHttpClient()
        .on(HOME, { body: HOME_HTML })
        .on(ABOUT, { body: `<html><head><title>About</title></head><body><a href="${HOME}">Home</a></body></html>` })
        .on(OTHER, { status: 404, body: 'Not found' });
}

function scanner(http: FakeHttpClient, options: { maxDepth?: number; maxPages?: number } = {}): DarkWebScanner {
    return new DarkWebScanner({ http, clock, delayMinMs: 0, delayMaxMs: 0, ...options });
}

describe('parsePage', () => {
    it('extracts title, onion links, forms and emails', () => {
        const page = parsePage(HOME_HTML, HOME);
        expect(page.title).toBe('Example Market');
        expect(page.links).toEqual([ABOUT, OTHER]);
        expect(page.forms).toEqual([{
            action: '/login',
            method: 'POST',
            fields: [
                { type: 'text', name: 'username', placeholder: '', required: true },
                { type: 'password', name: 'password', placeholder: 'Password', required: false },
            ],
        }]);
        expect(page.emails).toEqual(['admin@aaaaexample.onion']);
        expect(page.content).not.toContain('tracking');
    });

    it('de-duplicates emails', () => {
        expect(extractEmails('a@example.com, b@example.org and a@example.com')).toEqual(['a@example.com', 'b@example.org']);
    });
});

describe('DarkWebScanner', () => {
    it('crawls onion links depth-first and records failures', async () => {
        const http = site();
        const crawler = scanner(http);

        expect(await crawler.scan([HOME])).toBe(true);

        const results = crawler.getResults();
        expect(results.map(r => [r.url, r.depth, r.statusCode])).toEqual([
            [HOME, 0, 200],
            [ABOUT, 1, 200],
            [OTHER, 1, 404],
        ]);
        expect(http.calls.map(c => c.url)).toEqual([HOME, ABOUT, OTHER]);
        expect(crawler.summary()).toEqual({
            totalScanned: 3,
            successfulScans: 2,
            failedScans: 1,
            totalLinksFound: 3,
            totalEmailsFound: 1,
            totalFormsFound: 1,
            uniqueDomains: 2,
        });
    });

    it('honours the depth and page limits', async () => {
        const shallow = scanner(site(), { maxDepth: 0 });
        await shallow.scan([HOME]);
        expect(shallow.getResults().map(r => r.url)).toEqual([HOME]);

        const capped = scanner(site(), { maxPages: 2 });
        await capped.scan([HOME]);
        expect(capped.getResults().map(r => r.url)).toEqual([HOME, ABOUT]);
    });

    it('stops after the page in flight', async () => {
        const crawler = scanner(site());
        await crawler.scan([HOME], () => crawler.stop());
        expect(crawler.getResults()).toHaveLength(1);
        expect(crawler.isScanning).toBe(false);
    });

    it('refuses a second scan while one is running', async () => {
        const crawler = scanner(site());
        const first = crawler.scan([HOME]);
        expect(await crawler.scan([OTHER])).toBe(false);
        expect(await first).toBe(true);
    });

    it('keeps the transport error on the result', async () => {
        const result = await scanner(new FakeHttpClient()).scanUrl('http://cccceexample.onion/');
        expect(result.statusCode).toBe(0);
        expect(result.error).toBe('Request error: No fake route for http://cccceexample.onion/');
        expect(result.timestamp).toBe('2025-03-01T00:00:00.000Z');
    });
});

describe('analyzeContent', () => {
    it('spots marketplaces and login forms', async () => {
        const crawler = scanner(site(), { maxDepth: 0 });
        await crawler.scan([HOME]);
        const analysis = analyzeContent(crawler.getResults()[0]);

        expect(analysis.potentialMarketplace).toBe(true);
        expect(analysis.hasLoginForm).toBe(true);
        expect(analysis.hasRegistrationForm).toBe(false);
        expect(analysis.keywordsFound).toEqual(expect.arrayContaining(['market', 'buy', 'sell', 'escrow', 'payment']));
        expect(analysis.suspiciousIndicators).toEqual([]);
        expect(analysis.emailCount).toBe(1);
    });
});

describe('exportScanResults', () => {
    it('writes one CSV row per page', () => {
        const result: ScanResult = {
            url: HOME, depth: 0, statusCode: 200, title: 'T', content: '', links: [ABOUT], forms: [],
            emails: [], error: '', timestamp: 't',
        };
        expect(exportScanResults([result], 'csv')).toBe(
            `URL,Title,Status Code,Links,Emails,Forms,Timestamp,Error\r\n${HOME},T,200,1,0,0,t,\r\n`,
        );
    });
});
