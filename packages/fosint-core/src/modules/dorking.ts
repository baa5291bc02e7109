import * as cheerio from 'cheerio';
import { z } from 'zod';
import { OsintModule, type ModuleContext } from './base.js';
import { randomDelay } from '../net/rate-limiter.js';
import { readPackageData } from '../utils/data.js';
import { Logger } from '../utils/logger.js';
import { toCsv, type ExportFormat } from '../utils/csv.js';

export const GOOGLE_SEARCH_URL = 'https://www.google.com/search';

const TemplatesSchema = z.record(z.record(z.string()));
export type DorkTemplates = z.infer<typeof TemplatesSchema>;

let cachedTemplates: DorkTemplates | null = null;

/** Template catalogue by category then name; `{query}` is the search term. */
export function getDorkTemplates(): DorkTemplates {
    if (!cachedTemplates) {
        cachedTemplates = TemplatesSchema.parse(readPackageData('dork-templates.json'));
    }
    return cachedTemplates;
}

export interface DorkResult {
    title: string;
    url: string;
    snippet: string;
    domain: string;
    timestamp: string;
}

export interface DorkOperators {
    site?: string;
    filetype?: string;
    inurl?: string;
    intitle?: string;
    intext?: string;
    exclude_site?: string;
    exclude_term?: string;
    exact_phrase?: string;
    or_terms?: string | string[];
    wildcard?: string;
}

export interface DorkAnalysis {
    totalResults: number;
    uniqueDomains: number;
    topDomains: Array<[string, number]>;
    fileTypesFound: Array<[string, number]>;
    avgSnippetLength: number;
}

/**
 * Fill a catalogue template. Unknown categories or names give the bare query;
 * templates without `{query}` get the query appended.
 */
export function buildDork(category: string, name: string, query: string, extra: Record<string, string> = {}): string {
    const template = getDorkTemplates()[category]?.[name];
    if (template === undefined) return query;
    if (!template.includes('{query}')) return `${template} ${query}`;
    return template.replace(/\{(\w+)\}/g, (match, key: string) => {
        if (key === 'query') return query;
        return extra[key] ?? match;
    });
}

export function customDork(query: string, operators: DorkOperators = {}): string {
    const parts = [query];
    if (operators.site) parts.push(`site:${operators.site}`);
    if (operators.filetype) parts.push(`filetype:${operators.filetype}`);
    if (operators.inurl) parts.push(`inurl:${operators.inurl}`);
    if (operators.intitle) parts.push(`intitle:${operators.intitle}`);
    if (operators.intext) parts.push(`intext:${operators.intext}`);
    if (operators.exclude_site) parts.push(`-site:${operators.exclude_site}`);
    if (operators.exclude_term) parts.push(`-${operators.exclude_term}`);
    if (operators.exact_phrase) parts.push(`"${operators.exact_phrase}"`);
    if (operators.or_terms) {
        parts.push(Array.isArray(operators.or_terms) ? operators.or_terms.join(' OR ') : `OR ${operators.or_terms}`);
    }
    if (operators.wildcard) parts.push(`*${operators.wildcard}*`);
    return parts.join(' ');
}

function hostOf(url: string): string {
    try {
        return new URL(url).host;
    } catch {
        return '';
    }
}

/** `/url?q=<target>&...` redirect links unwrap to their target. */
export function unwrapGoogleRedirect(href: string): string {
    if (!href.startsWith('/url?')) return href;
    const target = new URLSearchParams(href.slice('/url?'.length)).get('q');
    return target ?? href;
}

export function parseGoogleResults(html: string, now: Date = new Date()): DorkResult[] {
    const $ = cheerio.load(html);
    const results: DorkResult[] = [];
    $('div.g').each((_, element) => {
        const block = $(element);
        const heading = block.find('h3').first();
        if (heading.length === 0) return;
        const href = heading.parent().attr('href');
        if (!href) return;

        let snippetNode = block.find('span[data-ved]').first();
        if (snippetNode.length === 0) snippetNode = block.find('div.s').first();

        const url = unwrapGoogleRedirect(href);
        results.push({
            title: heading.text(),
            url,
            snippet: snippetNode.text(),
            domain: hostOf(url),
            timestamp: now.toISOString(),
        });
    });
    return results;
}

export function analyzeResults(results: DorkResult[]): DorkAnalysis | null {
    if (results.length === 0) return null;
    const domains = new Map<string, number>();
    const extensions = new Map<string, number>();

    for (const result of results) {
        domains.set(result.domain, (domains.get(result.domain) ?? 0) + 1);
        let pathname = '';
        try {
            pathname = new URL(result.url).pathname;
        } catch {
            pathname = '';
        }
        if (pathname.includes('.')) {
            const ext = pathname.split('.').pop()?.toLowerCase() ?? '';
            if (ext.length > 0 && ext.length <= 4) {
                extensions.set(ext, (extensions.get(ext) ?? 0) + 1);
            }
        }
    }

    const top = (counts: Map<string, number>) => [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, 10);
    return {
        totalResults: results.length,
        uniqueDomains: domains.size,
        topDomains: top(domains),
        fileTypesFound: top(extensions),
        avgSnippetLength: results.reduce((sum, r) => sum + r.snippet.length, 0) / results.length,
    };
}

export function exportDorkResults(results: DorkResult[], format: ExportFormat): string {
    if (format === 'csv') {
        return toCsv(['Title', 'URL', 'Domain', 'Snippet', 'Timestamp'], results.map(r => [r.title, r.url, r.domain, r.snippet, r.timestamp]));
    }
    return JSON.stringify(results, null, 2);
}

export interface GoogleDorkingOptions extends ModuleContext {
    maxResults?: number;
    delayMs?: number;
    language?: string;
}

export class GoogleDorking extends OsintModule {
    private readonly maxResults: number;
    private readonly delayMs: number;
    private readonly language: string;

    constructor(options: GoogleDorkingOptions) {
        super('google-dorking', 'Google Dorking', options);
        this.maxResults = options.maxResults ?? 100;
        this.delayMs = options.delayMs ?? 2_000;
        this.language = options.language ?? 'en';
    }

    /** Page through results ten at a time until `numResults` or an empty page. */
    async search(query: string, numResults: number = this.maxResults): Promise<DorkResult[]> {
        const results: DorkResult[] = [];
        let start = 0;
        while (results.length < numResults) {
            const batch = await this.searchPage(query, start, Math.min(10, numResults - results.length));
            if (batch.length === 0) break;
            results.push(...batch);
            start += 10;
            if (results.length < numResults) {
                await randomDelay(this.delayMs, this.delayMs + 2_000, this.clock);
            }
        }
        return results.slice(0, numResults);
    }

    private async searchPage(query: string, start: number, num: number): Promise<DorkResult[]> {
        const response = await this.fetch(GOOGLE_SEARCH_URL, {
            params: { q: query, start, num, hl: this.language, lr: `lang_${this.language}` },
            timeoutMs: 15_000,
        });
        if (!response) return [];
        if (!response.ok) {
            Logger.warn(`Google answered HTTP ${response.status}; results may be rate limited`);
            return [];
        }
        return parseGoogleResults(response.body, new Date(this.clock.now()));
    }

    searchFileType(query: string, fileType: string, numResults?: number): Promise<DorkResult[]> {
        const dork = getDorkTemplates().file_types?.[fileType] ? buildDork('file_types', fileType, query) : `filetype:${fileType} "${query}"`;
        return this.search(dork, numResults);
    }

    searchSensitiveInfo(query: string, infoType: string, numResults?: number): Promise<DorkResult[]> {
        return this.search(buildDork('sensitive_info', infoType, query), numResults);
    }

    searchSocialMedia(query: string, platform: string, numResults?: number): Promise<DorkResult[]> {
        const dork = getDorkTemplates().social_media?.[platform] ? buildDork('social_media', platform, query) : `site:${platform}.com "${query}"`;
        return this.search(dork, numResults);
    }

    searchDomain(domain: string, searchType = 'specific_site', excludeDomain?: string): Promise<DorkResult[]> {
        const known = getDorkTemplates().domain_info?.[searchType] !== undefined;
        const dork = known
            ? buildDork('domain_info', searchType, domain, excludeDomain ? { exclude: excludeDomain } : {})
            : `site:${domain}`;
        return this.search(dork);
    }

    searchVulnerabilities(query: string, vulnType: string, numResults?: number): Promise<DorkResult[]> {
        return this.search(buildDork('vulnerabilities', vulnType, query), numResults);
    }
}
