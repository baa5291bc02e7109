import { OsintModule, type ModuleContext } from './base.js';
import { Logger } from '../utils/logger.js';
import { toCsv, type ExportFormat } from '../utils/csv.js';
import { EMAIL_PATTERN } from './leak-checker.js';

export const KEY_SERVERS = [
    'https://keys.openpgp.org',
    'https://keyserver.ubuntu.com',
    'https://pgp.mit.edu',
    'https://keys.gnupg.net',
] as const;

export type PgpSearchType = 'email' | 'name' | 'keyid';

export interface PgpKey {
    keyId: string;
    userIds: string[];
    fingerprint: string;
    algorithm: string;
    keySize: number;
    creationDate: string;
    expirationDate: string;
    keyServer: string;
    publicKey: string;
}

export type KeyStrength = 'strong' | 'good' | 'fair' | 'weak';

export interface KeyStrengthAnalysis {
    keyId: string;
    strength: KeyStrength;
    algorithmSecure: boolean;
    keySizeAdequate: boolean;
    expired: boolean;
    recommendations: string[];
}

// RFC 4880 / RFC 6637 public-key algorithm ids as used in HKP `options=mr` output.
const ALGORITHM_NAMES: Record<string, string> = {
    '1': 'RSA',
    '2': 'RSA',
    '3': 'RSA',
    '16': 'ELGAMAL',
    '17': 'DSA',
    '18': 'ECDH',
    '19': 'ECDSA',
    '22': 'EDDSA',
};

const SECURE_ALGORITHMS = ['RSA', 'DSA', 'ECDSA', 'EDDSA'];

export function algorithmName(id: string): string {
    return ALGORITHM_NAMES[id] ?? id.toUpperCase();
}

function epochToIso(value: string): string {
    if (!/^\d+$/.test(value)) return value;
    return new Date(Number(value) * 1000).toISOString();
}

export function normalizeKeyId(keyId: string): string {
    return keyId.trim().replace(/^0x/i, '').toUpperCase();
}

function decodeUid(encoded: string): string {
    try {
        return decodeURIComponent(encoded);
    } catch {
        return encoded;
    }
}

function emptyKey(keyId: string): PgpKey {
    return {
        keyId,
        userIds: [],
        fingerprint: '',
        algorithm: '',
        keySize: 0,
        creationDate: '',
        expirationDate: '',
        keyServer: '',
        publicKey: '',
    };
}

/**
 * Parse HKP machine-readable index output:
 * `pub:<keyid>:<algo>:<keylen>:<created>:<expires>:<flags>` followed by
 * `uid:<escaped uid>:<created>:<expires>:<flags>` lines.
 */
export function parseHkpIndex(text: string): PgpKey[] {
    const keys: PgpKey[] = [];
    let current: PgpKey | null = null;

    for (const raw of text.split('\n')) {
        const line = raw.trim();
        if (line.startsWith('pub:')) {
            const parts = line.split(':');
            if (parts.length < 6) continue;
            const id = parts[1].toUpperCase();
            current = {
                ...emptyKey(id.length > 16 ? id.slice(-16) : id),
                fingerprint: id.length > 16 ? id : '',
                algorithm: algorithmName(parts[2]),
                keySize: /^\d+$/.test(parts[3]) ? Number(parts[3]) : 0,
                creationDate: epochToIso(parts[4]),
                expirationDate: parts[5] ? epochToIso(parts[5]) : '',
            };
            keys.push(current);
        } else if (line.startsWith('uid:') && current) {
            const uid = decodeUid(line.split(':')[1] ?? '');
            if (uid && !current.userIds.includes(uid)) {
                current.userIds.push(uid);
            }
        }
    }
    return keys;
}

export function deduplicateKeys(keys: PgpKey[]): PgpKey[] {
    const seen = new Set<string>();
    return keys.filter(key => {
        if (seen.has(key.keyId)) return false;
        seen.add(key.keyId);
        return true;
    });
}

export function analyzeKeyStrength(key: PgpKey, now: Date = new Date()): KeyStrengthAnalysis {
    const analysis: KeyStrengthAnalysis = {
        keyId: key.keyId,
        strength: 'weak',
        algorithmSecure: false,
        keySizeAdequate: false,
        expired: false,
        recommendations: [],
    };
    const algorithm = key.algorithm.toUpperCase();

    if (algorithm) {
        if (SECURE_ALGORITHMS.includes(algorithm)) {
            analysis.algorithmSecure = true;
        } else {
            analysis.recommendations.push('Consider using RSA, ECDSA, or EdDSA algorithm');
        }
    }

    if (key.keySize) {
        if ((algorithm === 'RSA' && key.keySize >= 2048) || ((algorithm === 'ECDSA' || algorithm === 'EDDSA') && key.keySize >= 256)) {
            analysis.keySizeAdequate = true;
        } else {
            analysis.recommendations.push('Increase key size for better security');
        }
    }

    if (key.expirationDate) {
        const expires = new Date(key.expirationDate);
        if (!isNaN(expires.getTime()) && expires.getTime() < now.getTime()) {
            analysis.expired = true;
            analysis.recommendations.push('Key has expired');
        }
    }

    if (analysis.algorithmSecure && analysis.keySizeAdequate && !analysis.expired) {
        analysis.strength = 'strong';
    } else if (analysis.algorithmSecure && analysis.keySizeAdequate) {
        analysis.strength = 'good';
    } else if (analysis.algorithmSecure) {
        analysis.strength = 'fair';
    }
    return analysis;
}

export function exportPgpKeys(keys: PgpKey[], format: ExportFormat): string {
    if (format === 'csv') {
        return toCsv(
            ['Key ID', 'User IDs', 'Algorithm', 'Key Size', 'Creation Date', 'Key Server'],
            keys.map(k => [k.keyId, k.userIds.join('; '), k.algorithm, k.keySize, k.creationDate, k.keyServer]),
        );
    }
    return JSON.stringify(keys.map(({ publicKey: _armored, ...rest }) => rest), null, 2);
}

export interface PgpSearchOptions extends ModuleContext {
    servers?: readonly string[];
}

export class PgpSearch extends OsintModule {
    readonly servers: readonly string[];

    constructor(options: PgpSearchOptions) {
        super('pgp-search', 'PGP Key Search', options);
        this.servers = options.servers ?? KEY_SERVERS;
    }

    async searchByEmail(email: string): Promise<PgpKey[]> {
        if (!EMAIL_PATTERN.test(email)) return [];
        return this.searchAll(email, 'email');
    }

    async searchByName(name: string): Promise<PgpKey[]> {
        if (name.trim().length < 3) return [];
        return this.searchAll(name.trim(), 'name');
    }

    async searchByKeyId(keyId: string): Promise<PgpKey[]> {
        const normalized = normalizeKeyId(keyId);
        if (!normalized) return [];
        return this.searchAll(normalized, 'keyid');
    }

    private async searchAll(query: string, type: PgpSearchType): Promise<PgpKey[]> {
        const found: PgpKey[] = [];
        for (const server of this.servers) {
            const keys = await this.searchServer(server, query, type);
            for (const key of keys) key.keyServer = server;
            found.push(...keys);
        }
        return deduplicateKeys(found);
    }

    private async searchServer(server: string, query: string, type: PgpSearchType): Promise<PgpKey[]> {
        if (server.includes('keys.openpgp.org')) {
            return this.searchVks(server, query, type);
        }
        const response = await this.fetch(`${server}/pks/lookup`, {
            params: { op: 'index', search: type === 'keyid' ? `0x${query}` : query, options: 'mr' },
        });
        if (!response) return [];
        if (response.status === 404) return [];
        if (!response.ok) {
            Logger.debug(`[${this.id}] ${server} answered HTTP ${response.status}`);
            return [];
        }
        return parseHkpIndex(response.body);
    }

    // keys.openpgp.org answers e-mail lookups with the armored key itself.
    private async searchVks(server: string, query: string, type: PgpSearchType): Promise<PgpKey[]> {
        if (type !== 'email') return [];
        const response = await this.fetch(`${server}/vks/v1/by-email/${encodeURIComponent(query)}`);
        if (!response?.ok || !response.body.includes('BEGIN PGP PUBLIC KEY')) return [];
        return [{ ...emptyKey('unknown'), userIds: [query], publicKey: response.body }];
    }

    /** Armored public key, or an empty string when the server has none. */
    async getPublicKey(keyId: string, server: string = this.servers[0]): Promise<string> {
        const response = await this.fetch(`${server}/pks/lookup`, {
            params: { op: 'get', search: `0x${normalizeKeyId(keyId)}`, options: 'mr' },
        });
        return response?.ok ? response.body : '';
    }
}
