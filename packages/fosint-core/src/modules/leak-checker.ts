import { OsintModule, type ModuleContext } from './base.js';
import { Logger } from '../utils/logger.js';
import { toCsv, type ExportFormat } from '../utils/csv.js';
import { asArray, asNumber, asString, asStringArray, isRecord } from '../utils/guards.js';

export const HIBP_BASE_URL = 'https://haveibeenpwned.com/api/v3';
const USER_AGENT = 'fosint';

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
export const PHONE_PATTERN = /^\+?[\d\s\-()]{7,15}$/;

export const COMMON_MAIL_DOMAINS = ['gmail.com', 'yahoo.com', 'hotmail.com', 'outlook.com', 'protonmail.com', 'tutanota.com'];
export const VARIATION_DOMAINS = [...COMMON_MAIL_DOMAINS, 'mail.com'];
export const SENSITIVE_DATA_CLASSES = ['Passwords', 'Social security numbers', 'Credit cards', 'Phone numbers'];

export interface Breach {
    name: string;
    title: string;
    domain: string;
    breachDate: string;
    pwnCount: number;
    dataClasses: string[];
    isVerified: boolean;
    description: string;
}

export interface Paste {
    source: string;
    id: string;
    title: string | null;
    date: string | null;
    emailCount: number;
}

export interface LeakResult {
    email: string;
    breaches: Breach[];
    pastes: Paste[];
    checkedAt: string;
}

export interface UsernameLeak {
    email: string;
    username: string;
    domain: string;
    breaches: Breach[];
}

export interface PhoneCheck {
    phone: string;
    normalized: string | null;
    valid: boolean;
    breaches: Breach[];
    message: string;
}

export type BreachSeverity = 'none' | 'minimal' | 'low' | 'medium' | 'high' | 'critical';

export interface SeverityAnalysis {
    severity: BreachSeverity;
    riskScore: number;
    totalBreaches: number;
    totalAccountsAffected: number;
    sensitiveBreaches: number;
}

export function isValidEmail(email: string): boolean {
    return EMAIL_PATTERN.test(email);
}

export function isValidPhone(phone: string): boolean {
    return PHONE_PATTERN.test(phone);
}

export function normalizePhone(phone: string): string {
    return phone.replace(/[^\d+]/g, '');
}

export function parseBreach(value: unknown): Breach | null {
    if (!isRecord(value)) return null;
    const name = asString(value.Name);
    if (!name) return null;
    return {
        name,
        title: asString(value.Title, name),
        domain: asString(value.Domain),
        breachDate: asString(value.BreachDate),
        pwnCount: asNumber(value.PwnCount),
        dataClasses: asStringArray(value.DataClasses),
        isVerified: value.IsVerified === true,
        description: asString(value.Description),
    };
}

function parsePaste(value: unknown): Paste | null {
    if (!isRecord(value)) return null;
    return {
        source: asString(value.Source),
        id: asString(value.Id),
        title: typeof value.Title === 'string' ? value.Title : null,
        date: typeof value.Date === 'string' ? value.Date : null,
        emailCount: asNumber(value.EmailCount),
    };
}

/**
 * Plain address per domain, then digits 0-9 and an `xx.rest` split on the
 * first three domains.
 */
export function generateEmailVariations(username: string, domains: string[] = VARIATION_DOMAINS): string[] {
    const variations = domains.map(domain => `${username}@${domain}`);
    for (let i = 0; i < 10; i++) {
        for (const domain of domains.slice(0, 3)) {
            variations.push(`${username}${i}@${domain}`);
        }
    }
    if (username.length > 3) {
        for (const domain of domains.slice(0, 3)) {
            variations.push(`${username.slice(0, 2)}.${username.slice(2)}@${domain}`);
        }
    }
    return variations;
}

export function analyzeBreachSeverity(breaches: Breach[]): SeverityAnalysis {
    if (breaches.length === 0) {
        return { severity: 'none', riskScore: 0, totalBreaches: 0, totalAccountsAffected: 0, sensitiveBreaches: 0 };
    }
    const sensitiveBreaches = breaches.filter(b => b.dataClasses.some(c => SENSITIVE_DATA_CLASSES.includes(c))).length;
    const riskScore = Math.min(100, breaches.length * 10 + sensitiveBreaches * 20);
    let severity: BreachSeverity = 'minimal';
    if (riskScore >= 80) severity = 'critical';
    else if (riskScore >= 60) severity = 'high';
    else if (riskScore >= 40) severity = 'medium';
    else if (riskScore >= 20) severity = 'low';
    return {
        severity,
        riskScore,
        totalBreaches: breaches.length,
        totalAccountsAffected: breaches.reduce((sum, b) => sum + b.pwnCount, 0),
        sensitiveBreaches,
    };
}

export function exportLeakResults(results: LeakResult[], format: ExportFormat): string {
    if (format === 'csv') {
        return toCsv(
            ['Email', 'Breaches Count', 'Pastes Count', 'Risk Level', 'Checked At'],
            results.map(r => [r.email, r.breaches.length, r.pastes.length, analyzeBreachSeverity(r.breaches).severity, r.checkedAt]),
        );
    }
    return JSON.stringify(results.map(r => ({
        email: r.email,
        breachesCount: r.breaches.length,
        pastesCount: r.pastes.length,
        breaches: r.breaches,
        pastes: r.pastes,
        checkedAt: r.checkedAt,
    })), null, 2);
}

export interface LeakCheckerOptions extends ModuleContext {
    apiKey?: string;
}

export class LeakChecker extends OsintModule {
    private readonly apiKey?: string;
    private warnedMissingKey = false;

    constructor(options: LeakCheckerOptions) {
        super('leak-checker', 'Leak Checker', options);
        this.apiKey = options.apiKey;
    }

    private headers(): Record<string, string> {
        return this.apiKey ? { 'User-Agent': USER_AGENT, 'hibp-api-key': this.apiKey } : { 'User-Agent': USER_AGENT };
    }

    private newResult(email: string): LeakResult {
        return { email, breaches: [], pastes: [], checkedAt: new Date(this.clock.now()).toISOString() };
    }

    /**
     * Breaches (and pastes, when a key is set) for one address. An invalid
     * address gives an empty result without any request; 404 means "not pwned".
     */
    async checkEmail(email: string): Promise<LeakResult> {
        const result = this.newResult(email);
        if (!isValidEmail(email)) {
            return result;
        }
        if (!this.apiKey && !this.warnedMissingKey) {
            Logger.warn('No haveibeenpwned API key configured; breach lookups will likely be refused');
            this.warnedMissingKey = true;
        }

        const breaches = await this.fetch(`${HIBP_BASE_URL}/breachedaccount/${encodeURIComponent(email)}`, {
            headers: this.headers(),
            params: { truncateResponse: 'false' },
        });
        if (breaches?.status === 200) {
            result.breaches = this.parseList(breaches.body, parseBreach);
        } else if (breaches && breaches.status !== 404) {
            Logger.warn(`HIBP breach lookup for ${email} returned HTTP ${breaches.status}`);
        }

        if (this.apiKey) {
            const pastes = await this.fetch(`${HIBP_BASE_URL}/pasteaccount/${encodeURIComponent(email)}`, { headers: this.headers() });
            if (pastes?.status === 200) {
                result.pastes = this.parseList(pastes.body, parsePaste);
            } else if (pastes && pastes.status !== 404) {
                Logger.warn(`HIBP paste lookup for ${email} returned HTTP ${pastes.status}`);
            }
        }
        return result;
    }

    private parseList<T>(body: string, parse: (value: unknown) => T | null): T[] {
        try {
            return asArray(JSON.parse(body)).map(parse).filter((item): item is T => item !== null);
        } catch {
            Logger.warn(`[${this.id}] unparseable response body`);
            return [];
        }
    }

    async bulkCheck(emails: string[]): Promise<LeakResult[]> {
        const results: LeakResult[] = [];
        for (const email of emails) {
            results.push(await this.checkEmail(email));
        }
        return results;
    }

    /** Try `<username>@<domain>` on common mail providers; only hits are returned. */
    async checkUsername(username: string): Promise<UsernameLeak[]> {
        const hits: UsernameLeak[] = [];
        for (const domain of COMMON_MAIL_DOMAINS) {
            const email = `${username}@${domain}`;
            if (!isValidEmail(email)) continue;
            const result = await this.checkEmail(email);
            if (result.breaches.length > 0) {
                hits.push({ email, username, domain, breaches: result.breaches });
            }
        }
        return hits;
    }

    checkPhone(phone: string): PhoneCheck {
        if (!isValidPhone(phone)) {
            return { phone, normalized: null, valid: false, breaches: [], message: 'Invalid phone number format' };
        }
        return {
            phone,
            normalized: normalizePhone(phone),
            valid: true,
            breaches: [],
            message: 'Phone number validation successful',
        };
    }

    async getBreachDetails(name: string): Promise<Breach | null> {
        const body = await this.fetchJson(`${HIBP_BASE_URL}/breach/${encodeURIComponent(name)}`, {
            headers: { 'User-Agent': USER_AGENT },
        });
        return parseBreach(body);
    }
}
