import { describe, it, expect } from 'vitest';
import { DataEncryption, generateSessionToken, hashPassword, safeEqual, verifyPassword } from './crypto.js';

describe('password hashing', () => {
    it('verifies the original password only', async () => {
        const stored = await hashPassword('Test-secret1!');
        expect(stored.startsWith('scrypt$')).toBe(true);
        expect(await verifyPassword('Test-secret1!', stored)).toBe(true);
        expect(await verifyPassword('Test-secret2!', stored)).toBe(false);
    });

    it('salts every hash', async () => {
        expect(await hashPassword('Test-secret1!')).not.toBe(await hashPassword('Test-secret1!'));
    });

    it('rejects hashes in another format', async () => {
        expect(await verifyPassword('Test-secret1!', 'sha256$abc$def')).toBe(false);
        expect(await verifyPassword('Test-secret1!', 'scrypt$$')).toBe(false);
    });

    it('compares strings of different length', () => {
        expect(safeEqual('abc', 'abc')).toBe(true);
        expect(safeEqual('abc', 'abcd')).toBe(false);
    });

    it('generates url-safe session tokens', () => {
        expect(generateSessionToken()).toMatch(/^[A-Za-z0-9_-]{43}$/);
    });
});

describe('DataEncryption', () => {
    it('round-trips with the same passphrase', () => {
        const payload = new DataEncryption('test-secret').encryptJson({ projectId: 'p-1' });
        expect(new DataEncryption('test-secret').decryptJson(payload)).toEqual({ projectId: 'p-1' });
    });

    it('gives null under another key or for garbage', () => {
        const payload = new DataEncryption('test-secret').encrypt('hello');
        expect(new DataEncryption('other-secret').decrypt(payload)).toBeNull();
        expect(new DataEncryption('test-secret').decrypt('c2hvcnQ')).toBeNull();
    });
});
