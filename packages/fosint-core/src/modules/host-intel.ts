import { isIP } from 'net';
import { OsintModule, type ModuleContext } from './base.js';
import { Logger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { asArray, asNumber, asString, asStringArray, isRecord } from '../utils/guards.js';

export const SHODAN_API = 'https://api.shodan.io';

export interface HostService {
    port: number;
    transport: string;
    product: string;
    version: string;
}

export interface HostReport {
    ip: string;
    found: boolean;
    ports: number[];
    hostnames: string[];
    org: string;
    isp: string;
    os: string;
    country: string;
    city: string;
    vulns: string[];
    services: HostService[];
    lastUpdate: string;
}

function emptyReport(ip: string): HostReport {
    return {
        ip,
        found: false,
        ports: [],
        hostnames: [],
        org: '',
        isp: '',
        os: '',
        country: '',
        city: '',
        vulns: [],
        services: [],
        lastUpdate: '',
    };
}

/** Shodan lists vulns as an array in newer responses and as a CVE-keyed object in older ones. */
function parseVulns(value: unknown): string[] {
    if (Array.isArray(value)) return asStringArray(value);
    if (isRecord(value)) return Object.keys(value);
    return [];
}

export function parseShodanHost(ip: string, body: unknown): HostReport {
    if (!isRecord(body)) return emptyReport(ip);
    return {
        ip: asString(body.ip_str, ip),
        found: true,
        ports: asArray(body.ports).filter((p): p is number => typeof p === 'number').sort((a, b) => a - b),
        hostnames: asStringArray(body.hostnames),
        org: asString(body.org),
        isp: asString(body.isp),
        os: asString(body.os),
        country: asString(body.country_name),
        city: asString(body.city),
        vulns: parseVulns(body.vulns).sort(),
        services: asArray(body.data).filter(isRecord).map(service => ({
            port: asNumber(service.port),
            transport: asString(service.transport, 'tcp'),
            product: asString(service.product),
            version: asString(service.version),
        })),
        lastUpdate: asString(body.last_update),
    };
}

export interface HostIntelOptions extends ModuleContext {
    shodanApiKey?: string;
}

export class HostIntel extends OsintModule {
    private readonly shodanApiKey?: string;

    constructor(options: HostIntelOptions) {
        super('host-intel', 'Host Intelligence', options);
        this.shodanApiKey = options.shodanApiKey;
    }

    /** Null without an API key or when Shodan could not be reached. */
    async lookup(ip: string): Promise<HostReport | null> {
        if (isIP(ip) === 0) {
            throw new ValidationError(`Not an IP address: ${ip}`);
        }
        if (!this.shodanApiKey) {
            Logger.warn('No Shodan API key configured; set one with `fosint settings set-key shodan <key>`');
            return null;
        }

        const response = await this.fetch(`${SHODAN_API}/shodan/host/${ip}`, { params: { key: this.shodanApiKey } });
        if (!response) return null;
        if (response.status === 404) return emptyReport(ip);
        if (!response.ok) {
            Logger.warn(`[${this.id}] Shodan answered HTTP ${response.status}`);
            return null;
        }
        try {
            return parseShodanHost(ip, JSON.parse(response.body));
        } catch {
            Logger.warn(`[${this.id}] Shodan returned invalid JSON`);
            return null;
        }
    }
}
