import * as cheerio from 'cheerio';
import { OsintModule, type ModuleContext } from './base.js';
import { randomDelay } from '../net/rate-limiter.js';
import { getDomainFromUrl, isOnionUrl, resolveHref } from '../net/url.js';
import { errorMessage } from '../utils/errors.js';
import { toCsv, type ExportFormat } from '../utils/csv.js';

const EMAIL_REGEX = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const CONTENT_LIMIT = 5000;

export const INTEREST_KEYWORDS = [
    'marketplace', 'market', 'shop', 'store', 'buy', 'sell',
    'forum', 'board', 'discussion', 'community',
    'leak', 'database', 'dump', 'breach', 'hack',
    'drugs', 'weapons', 'counterfeit', 'fraud',
    'bitcoin', 'cryptocurrency', 'payment', 'escrow',
    'login', 'register', 'account', 'profile',
];
const MARKETPLACE_INDICATORS = ['buy', 'sell', 'price', 'payment', 'escrow', 'vendor'];
const SUSPICIOUS_WORDS = ['hack', 'crack', 'stolen', 'leaked', 'dump', 'breach'];

export interface FormField {
    type: string;
    name: string;
    placeholder: string;
    required: boolean;
}

export interface PageForm {
    action: string;
    method: string;
    fields: FormField[];
}

export interface ScanResult {
    url: string;
    depth: number;
    statusCode: number;
    title: string;
    content: string;
    links: string[];
    forms: PageForm[];
    emails: string[];
    error: string;
    timestamp: string;
}

export interface ContentAnalysis {
    keywordsFound: string[];
    potentialMarketplace: boolean;
    hasLoginForm: boolean;
    hasRegistrationForm: boolean;
    emailCount: number;
    linkCount: number;
    formCount: number;
    contentLength: number;
    suspiciousIndicators: string[];
}

export interface ScanSummary {
    totalScanned: number;
    successfulScans: number;
    failedScans: number;
    totalLinksFound: number;
    totalEmailsFound: number;
    totalFormsFound: number;
    uniqueDomains: number;
}

function unique<T>(items: T[]): T[] {
    return [...new Set(items)];
}

export function extractEmails(text: string): string[] {
    return unique(text.match(EMAIL_REGEX) ?? []);
}

/**
 * Title, visible text, onion links, forms and e-mail addresses of one page.
 */
export function parsePage(html: string, baseUrl: string): Pick<ScanResult, 'title' | 'content' | 'links' | 'forms' | 'emails'> {
    const $ = cheerio.load(html);
    const title = $('title').first().text().trim();

    const links = unique(
        $('a[href], link[href]')
            .map((_, el) => resolveHref(baseUrl, $(el).attr('href') ?? ''))
            .get()
            .filter((link): link is string => typeof link === 'string' && isOnionUrl(link)),
    );

    const forms: PageForm[] = $('form').map((_, form) => {
        const node = $(form);
        const fields: FormField[] = node.find('input, textarea, select').map((__, input) => {
            const field = $(input);
            return {
                type: field.attr('type') ?? 'text',
                name: field.attr('name') ?? '',
                placeholder: field.attr('placeholder') ?? '',
                required: field.attr('required') !== undefined,
            };
        }).get();
        return { action: node.attr('action') ?? '', method: (node.attr('method') ?? 'GET').toUpperCase(), fields };
    }).get();

    const emails = extractEmails(html);
    $('script, style, noscript').remove();
    const content = $.root().text().slice(0, CONTENT_LIMIT);
    return { title, content, links, forms, emails };
}

export function analyzeContent(result: ScanResult): ContentAnalysis {
    const text = result.content.toLowerCase();
    const analysis: ContentAnalysis = {
        keywordsFound: INTEREST_KEYWORDS.filter(keyword => text.includes(keyword)),
        potentialMarketplace: MARKETPLACE_INDICATORS.filter(indicator => text.includes(indicator)).length >= 3,
        hasLoginForm: false,
        hasRegistrationForm: false,
        emailCount: result.emails.length,
        linkCount: result.links.length,
        formCount: result.forms.length,
        contentLength: result.content.length,
        suspiciousIndicators: SUSPICIOUS_WORDS.filter(word => text.includes(word)),
    };

    for (const form of result.forms) {
        const names = form.fields.map(field => field.name.toLowerCase());
        if (names.some(n => ['username', 'email', 'login'].includes(n)) && names.some(n => ['password', 'pass'].includes(n))) {
            analysis.hasLoginForm = true;
        }
        if (names.some(n => ['register', 'signup', 'email'].includes(n))) {
            analysis.hasRegistrationForm = true;
        }
    }
    return analysis;
}

export function summarizeScan(results: ScanResult[]): ScanSummary | null {
    if (results.length === 0) return null;
    const successful = results.filter(r => r.statusCode === 200).length;
    return {
        totalScanned: results.length,
        successfulScans: successful,
        failedScans: results.length - successful,
        totalLinksFound: results.reduce((sum, r) => sum + r.links.length, 0),
        totalEmailsFound: results.reduce((sum, r) => sum + r.emails.length, 0),
        totalFormsFound: results.reduce((sum, r) => sum + r.forms.length, 0),
        uniqueDomains: new Set(results.map(r => getDomainFromUrl(r.url) ?? r.url)).size,
    };
}

export function exportScanResults(results: ScanResult[], format: ExportFormat): string {
    if (format === 'csv') {
        return toCsv(
            ['URL', 'Title', 'Status Code', 'Links', 'Emails', 'Forms', 'Timestamp', 'Error'],
            results.map(r => [r.url, r.title, r.statusCode, r.links.length, r.emails.length, r.forms.length, r.timestamp, r.error]),
        );
    }
    return JSON.stringify(results.map(r => ({
        url: r.url,
        title: r.title,
        statusCode: r.statusCode,
        linksCount: r.links.length,
        emailsCount: r.emails.length,
        formsCount: r.forms.length,
        emails: r.emails,
        timestamp: r.timestamp,
        error: r.error,
    })), null, 2);
}

export interface DarkWebScannerOptions extends ModuleContext {
    maxDepth?: number;
    timeoutMs?: number;
    delayMinMs?: number;
    delayMaxMs?: number;
    maxPages?: number;
}

/**
 * Depth-first crawler over .onion links. `http` is expected to be a Tor
 * session; the scanner itself does not check that the proxy is up.
 */
export class DarkWebScanner extends OsintModule {
    readonly maxDepth: number;
    private readonly timeoutMs: number;
    private readonly delayMinMs: number;
    private readonly delayMaxMs: number;
    private readonly maxPages: number;
    private visited = new Set<string>();
    private results: ScanResult[] = [];
    private scanning = false;

    constructor(options: DarkWebScannerOptions) {
        super('darkweb-scanner', 'Dark Web Scanner', options);
        this.maxDepth = options.maxDepth ?? 3;
        this.timeoutMs = options.timeoutMs ?? 60_000;
        this.delayMinMs = options.delayMinMs ?? 1_000;
        this.delayMaxMs = options.delayMaxMs ?? 3_000;
        this.maxPages = options.maxPages ?? 200;
    }

    get isScanning(): boolean {
        return this.scanning;
    }

    getResults(): ScanResult[] {
        return [...this.results];
    }

    /** Crawl from each seed in turn. Returns false without scanning when a scan is already running. */
    async scan(urls: string[], onResult?: (result: ScanResult) => void): Promise<boolean> {
        if (this.scanning) return false;
        this.scanning = true;
        this.visited = new Set();
        this.results = [];
        try {
            for (const url of urls) {
                if (!this.scanning) break;
                await this.crawl(url, 0, onResult);
            }
        } finally {
            this.scanning = false;
        }
        return true;
    }

    /** Ends the crawl after the page in flight. */
    stop(): void {
        this.scanning = false;
    }

    private async crawl(url: string, depth: number, onResult?: (result: ScanResult) => void): Promise<void> {
        if (depth > this.maxDepth || !this.scanning || this.visited.has(url) || this.results.length >= this.maxPages) {
            return;
        }
        this.visited.add(url);

        const result = await this.scanUrl(url, depth);
        this.results.push(result);
        onResult?.(result);

        if (result.statusCode !== 200) return;
        for (const link of result.links) {
            if (!this.scanning) return;
            if (!isOnionUrl(link) || this.visited.has(link)) continue;
            await randomDelay(this.delayMinMs, this.delayMaxMs, this.clock);
            await this.crawl(link, depth + 1, onResult);
        }
    }

    async scanUrl(url: string, depth = 0): Promise<ScanResult> {
        const result: ScanResult = {
            url,
            depth,
            statusCode: 0,
            title: '',
            content: '',
            links: [],
            forms: [],
            emails: [],
            error: '',
            timestamp: new Date(this.clock.now()).toISOString(),
        };
        await this.throttle();
        try {
            const response = await this.http.request(url, { timeoutMs: this.timeoutMs });
            result.statusCode = response.status;
            if (response.status === 200) {
                Object.assign(result, parsePage(response.body, response.url || url));
            }
        } catch (error) {
            result.error = `Request error: ${errorMessage(error)}`;
        }
        return result;
    }

    summary(): ScanSummary | null {
        return summarizeScan(this.results);
    }

    export(format: ExportFormat): string {
        return exportScanResults(this.results, format);
    }
}
