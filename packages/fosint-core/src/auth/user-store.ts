import path from 'path';
import crypto from 'crypto';
import { z } from 'zod';
import { Logger } from '../utils/logger.js';
import { AuthError, NotFoundError, ValidationError } from '../utils/errors.js';
import { loadJson, saveJson } from '../utils/files.js';
import { UserSchema, type PublicUser, type User } from '../types/index.js';
import { hashPassword, verifyPassword } from './crypto.js';

const UsersFileSchema = z.record(UserSchema);

export const PASSWORD_SPECIALS = '!@#$%^&*(),.?":{}|<>';
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export interface PasswordCheck {
    valid: boolean;
    problems: string[];
}

export function validatePassword(password: string): PasswordCheck {
    const problems: string[] = [];
    if (password.length < 8) problems.push('at least 8 characters');
    if (!/[A-Z]/.test(password)) problems.push('an uppercase letter');
    if (!/[a-z]/.test(password)) problems.push('a lowercase letter');
    if (!/\d/.test(password)) problems.push('a digit');
    if (![...password].some(ch => PASSWORD_SPECIALS.includes(ch))) problems.push(`one of ${PASSWORD_SPECIALS}`);
    return { valid: problems.length === 0, problems };
}

export function toPublicUser(user: User): PublicUser {
    const { passwordHash: _omit, ...rest } = user;
    return rest;
}

/**
 * Users persisted in `data/users/users.json`, keyed by user id.
 */
export class UserStore {
    private readonly usersFile: string;
    private users = new Map<string, User>();
    private loaded = false;

    constructor(usersDir: string, private readonly now: () => Date = () => new Date()) {
        this.usersFile = path.join(usersDir, 'users.json');
    }

    private async ensureLoaded(): Promise<void> {
        if (this.loaded) return;
        const raw = await loadJson(this.usersFile);
        if (raw !== null) {
            const parsed = UsersFileSchema.safeParse(raw);
            if (parsed.success) {
                this.users = new Map(Object.entries(parsed.data));
            } else {
                Logger.warn(`Ignoring malformed users file ${this.usersFile}`);
            }
        }
        this.loaded = true;
    }

    private async persist(): Promise<void> {
        await saveJson(this.usersFile, Object.fromEntries(this.users));
    }

    async register(username: string, email: string, password: string): Promise<User> {
        await this.ensureLoaded();
        const name = username.trim();
        const mail = email.trim();
        if (!name) {
            throw new ValidationError('Username is required');
        }
        if (!EMAIL_PATTERN.test(mail)) {
            throw new ValidationError(`Invalid email address: ${mail}`);
        }
        for (const user of this.users.values()) {
            if (user.username === name) throw new ValidationError('Username already exists');
            if (user.email === mail) throw new ValidationError('Email already exists');
        }
        const check = validatePassword(password);
        if (!check.valid) {
            throw new ValidationError(`Password must contain ${check.problems.join(', ')}`);
        }

        const user: User = {
            userId: crypto.randomUUID(),
            username: name,
            email: mail,
            passwordHash: await hashPassword(password),
            createdAt: this.now().toISOString(),
            lastLogin: null,
            isActive: true,
        };
        this.users.set(user.userId, user);
        await this.persist();
        Logger.debug(`Registered user ${name}`);
        return user;
    }

    /** Null for unknown users, wrong passwords and deactivated accounts alike. */
    async authenticate(username: string, password: string): Promise<User | null> {
        await this.ensureLoaded();
        for (const user of this.users.values()) {
            if (user.username !== username || !user.isActive) continue;
            if (await verifyPassword(password, user.passwordHash)) {
                user.lastLogin = this.now().toISOString();
                await this.persist();
                return user;
            }
        }
        return null;
    }

    async getById(userId: string): Promise<User | null> {
        await this.ensureLoaded();
        return this.users.get(userId) ?? null;
    }

    async getByUsername(username: string): Promise<User | null> {
        await this.ensureLoaded();
        for (const user of this.users.values()) {
            if (user.username === username) return user;
        }
        return null;
    }

    async updatePassword(userId: string, oldPassword: string, newPassword: string): Promise<void> {
        const user = await this.getById(userId);
        if (!user) {
            throw new NotFoundError(`User ${userId} not found`);
        }
        if (!(await verifyPassword(oldPassword, user.passwordHash))) {
            throw new AuthError('Current password is incorrect');
        }
        const check = validatePassword(newPassword);
        if (!check.valid) {
            throw new ValidationError(`New password must contain ${check.problems.join(', ')}`);
        }
        user.passwordHash = await hashPassword(newPassword);
        await this.persist();
    }

    async deactivate(userId: string): Promise<boolean> {
        const user = await this.getById(userId);
        if (!user) return false;
        user.isActive = false;
        await this.persist();
        return true;
    }

    async count(): Promise<number> {
        await this.ensureLoaded();
        return this.users.size;
    }

    async activeCount(): Promise<number> {
        await this.ensureLoaded();
        return [...this.users.values()].filter(user => user.isActive).length;
    }
}
