import crypto from 'crypto';

const SCRYPT_KEYLEN = 64;
const HASH_PREFIX = 'scrypt';
const KDF_SALT = 'fosint-data-key';
const KDF_ITERATIONS = 100_000;

function scrypt(password: string, salt: Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        crypto.scrypt(password, salt, SCRYPT_KEYLEN, (error, key) => (error ? reject(error) : resolve(key)));
    });
}

export function safeEqual(a: string, b: string): boolean {
    const aBuffer = Buffer.from(a);
    const bBuffer = Buffer.from(b);
    if (aBuffer.length !== bBuffer.length) {
        return false;
    }
    return crypto.timingSafeEqual(aBuffer, bBuffer);
}

/** `scrypt$<salt>$<hash>`, both base64url. */
export async function hashPassword(password: string): Promise<string> {
    const salt = crypto.randomBytes(16);
    const derived = await scrypt(password, salt);
    return `${HASH_PREFIX}$${salt.toString('base64url')}$${derived.toString('base64url')}`;
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
    const [prefix, salt, expected] = stored.split('$');
    if (prefix !== HASH_PREFIX || !salt || !expected) {
        return false;
    }
    const derived = await scrypt(password, Buffer.from(salt, 'base64url'));
    return safeEqual(derived.toString('base64url'), expected);
}

export function generateSessionToken(): string {
    return crypto.randomBytes(32).toString('base64url');
}

/**
 * AES-256-GCM with a key derived from a passphrase (PBKDF2-SHA256).
 * Ciphertext layout: base64url(iv | tag | data).
 */
export class DataEncryption {
    private readonly key: Buffer;

    constructor(passphrase: string) {
        this.key = crypto.pbkdf2Sync(passphrase, KDF_SALT, KDF_ITERATIONS, 32, 'sha256');
    }

    encrypt(plain: string): string {
        const iv = crypto.randomBytes(12);
        const cipher = crypto.createCipheriv('aes-256-gcm', this.key, iv);
        const data = Buffer.concat([cipher.update(plain, 'utf-8'), cipher.final()]);
        return Buffer.concat([iv, cipher.getAuthTag(), data]).toString('base64url');
    }

    /** Null when the payload is malformed or was encrypted under another key. */
    decrypt(payload: string): string | null {
        const raw = Buffer.from(payload, 'base64url');
        if (raw.length < 28) {
            return null;
        }
        try {
            const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, raw.subarray(0, 12));
            decipher.setAuthTag(raw.subarray(12, 28));
            return Buffer.concat([decipher.update(raw.subarray(28)), decipher.final()]).toString('utf-8');
        } catch {
            return null;
        }
    }

    encryptJson(value: unknown): string {
        return this.encrypt(JSON.stringify(value));
    }

    decryptJson(payload: string): unknown {
        const plain = this.decrypt(payload);
        if (plain === null) return null;
        try {
            return JSON.parse(plain);
        } catch {
            return null;
        }
    }
}
