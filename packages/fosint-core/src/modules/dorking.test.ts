import { describe, it, expect } from 'vitest';
import {
    GOOGLE_SEARCH_URL,
    GoogleDorking,
    analyzeResults,
    buildDork,
    customDork,
    exportDorkResults,
    getDorkTemplates,
    parseGoogleResults,
    unwrapGoogleRedirect,
    type DorkResult,
} from './dorking.js';
import { FakeHttpClient } from '../testing/fake-http.js';
import type { Clock } from '../net/rate-limiter.js';

const NOW = new Date('2025-03-01T00:00:00.000Z');
const clock: Clock = { now: () => NOW.getTime(), sleep: async () => {} };

const PAGE = `
<html><body>
<div class="g"><a href="/url?q=https://example.com/files/report.pdf&amp;sa=U"><h3>Annual report</h3></a><span data-ved="x1">Revenue grew</span></div>
<div class="g"><a href="https://docs.example.org/page"><h3>Docs</h3></a><div class="s">Snippet two</div></div>
<div class="g"><h3>No link</h3></div>
</body></html>`;

function resultsPage(start: number, count: number): string {
    const blocks = Array.from({ length: count }, (_, i) =>
        `<div class="g"><a href="https://site${start + i}.example.com/"><h3>Result ${start + i}</h3></a></div>`);
    return `<html><body>${blocks.join('')}</body></html>`;
}

describe('dork building', () => {
    it('loads the template catalogue', () => {
        expect(Object.keys(getDorkTemplates())).toEqual(['file_types', 'sensitive_info', 'social_media', 'vulnerabilities', 'domain_info']);
    });

    it('fills templates', () => {
        expect(buildDork('sensitive_info', 'login_pages', 'example.com')).toBe('inurl:login OR inurl:signin OR inurl:admin "example.com"');
        expect(buildDork('domain_info', 'exclude_site', 'acme', { exclude: 'acme.com' })).toBe('"acme" -site:acme.com');
        expect(buildDork('domain_info', 'exclude_site', 'acme')).toBe('"acme" -site:{exclude}');
        expect(buildDork('nope', 'missing', 'acme')).toBe('acme');
    });

    it('appends operators in a fixed order', () => {
        expect(customDork('report', {
            exact_phrase: 'annual report',
            site: 'example.com',
            exclude_term: 'draft',
            filetype: 'pdf',
            or_terms: ['2023', '2024'],
        })).toBe('report site:example.com filetype:pdf -draft "annual report" 2023 OR 2024');
        expect(customDork('q', { or_terms: 'x', wildcard: 'admin', exclude_site: 'a.com' })).toBe('q -site:a.com OR x *admin*');
        expect(customDork('q')).toBe('q');
    });
});

describe('result parsing', () => {
    it('unwraps redirect links', () => {
        expect(unwrapGoogleRedirect('/url?q=https://example.com/a&sa=U')).toBe('https://example.com/a');
        expect(unwrapGoogleRedirect('https://example.com/b')).toBe('https://example.com/b');
    });

    it('reads title, link and snippet from result blocks', () => {
        expect(parseGoogleResults(PAGE, NOW)).toEqual([
            { title: 'Annual report', url: 'https://example.com/files/report.pdf', snippet: 'Revenue grew', domain: 'example.com', timestamp: '2025-03-01T00:00:00.000Z' },
            { title: 'Docs', url: 'https://docs.example.org/page', snippet: 'Snippet two', domain: 'docs.example.org', timestamp: '2025-03-01T00:00:00.000Z' },
        ]);
    });

    it('summarises domains and file types', () => {
        expect(analyzeResults(parseGoogleResults(PAGE, NOW))).toEqual({
            totalResults: 2,
            uniqueDomains: 2,
            topDomains: [['example.com', 1], ['docs.example.org', 1]],
            fileTypesFound: [['pdf', 1]],
            avgSnippetLength: 11.5,
        });
        expect(analyzeResults([])).toBeNull();
    });

    it('exports results as CSV', () => {
        const result: DorkResult = { title: 'A, B', url: 'https://example.com/', snippet: 'x', domain: 'example.com', timestamp: 't' };
        expect(exportDorkResults([result], 'csv')).toBe('Title,URL,Domain,Snippet,Timestamp\r\n"A, B",https://example.com/,example.com,x,t\r\n');
    });
});

describe('GoogleDorking', () => {
    it('pages through results until a short page runs dry', async () => {
        const http = new FakeHttpClient().on(GOOGLE_SEARCH_URL, url => {
            const start = Number(new URL(url).searchParams.get('start'));
            return { body: start === 0 ? resultsPage(0, 10) : start === 10 ? resultsPage(10, 3) : resultsPage(0, 0) };
        });
        const dorking = new GoogleDorking({ http, clock });

        const results = await dorking.search('site:example.com', 15);

        expect(results).toHaveLength(13);
        expect(results[12].title).toBe('Result 12');
        expect(http.calls.map(c => new URL(c.url).searchParams.get('num'))).toEqual(['10', '5', '2']);
        expect(http.calls[0].url).toBe(`${GOOGLE_SEARCH_URL}?q=site%3Aexample.com&start=0&num=10&hl=en&lr=lang_en`);
    });

    it('stops at the requested count', async () => {
        const http = new FakeHttpClient().on(GOOGLE_SEARCH_URL, { body: resultsPage(0, 10) });
        const results = await new GoogleDorking({ http, clock }).search('x', 4);
        expect(results).toHaveLength(4);
        expect(http.calls).toHaveLength(1);
    });

    it('gives no results when Google refuses', async () => {
        const http = new FakeHttpClient().on(GOOGLE_SEARCH_URL, { status: 429, body: 'Too Many Requests' });
        const dorking = new GoogleDorking({ http, clock });
        expect(await dorking.search('x', 10)).toEqual([]);
    });

    it('builds template searches from the catalogue', async () => {
        const http = new FakeHttpClient().on(GOOGLE_SEARCH_URL, { body: resultsPage(0, 0) });
        const dorking = new GoogleDorking({ http, clock });
        await dorking.searchFileType('budget', 'pdf', 10);
        await dorking.searchSocialMedia('acme', 'mastodon', 10);
        await dorking.searchDomain('example.com', 'exclude_site', 'example.com');

        expect(http.calls.map(c => new URL(c.url).searchParams.get('q'))).toEqual([
            'filetype:pdf "budget"',
            'site:mastodon.com "acme"',
            '"example.com" -site:example.com',
        ]);
    });
});
