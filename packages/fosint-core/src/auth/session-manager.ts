import path from 'path';
import fs from 'fs-extra';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { loadJson, safeDeleteFile, saveJson } from '../utils/files.js';
import { SessionSchema, type Session, type User } from '../types/index.js';
import { DataEncryption, generateSessionToken } from './crypto.js';

const HOUR_MS = 60 * 60 * 1000;
export const SESSION_HOURS = 24;
export const REMEMBER_ME_HOURS = 24 * 7;
const CURRENT_POINTER = '.current';

export function isSessionValid(session: Session, now: Date): boolean {
    return now.getTime() < new Date(session.expiresAt).getTime();
}

/**
 * File-backed sessions in `sessions/<id>.json`. The id of the signed-in
 * session is kept in `sessions/.current` so separate CLI invocations share it.
 */
export class SessionManager {
    private current: Session | null = null;
    private encryption: DataEncryption | null = null;

    constructor(private readonly sessionsDir: string, private readonly now: () => Date = () => new Date()) {}

    private sessionFile(sessionId: string): string {
        return path.join(this.sessionsDir, `${path.basename(sessionId)}.json`);
    }

    private get pointerFile(): string {
        return path.join(this.sessionsDir, CURRENT_POINTER);
    }

    get currentSession(): Session | null {
        return this.current;
    }

    async start(user: Pick<User, 'userId' | 'username'>, rememberMe = false): Promise<Session> {
        const now = this.now();
        const hours = rememberMe ? REMEMBER_ME_HOURS : SESSION_HOURS;
        const session: Session = {
            sessionId: generateSessionToken(),
            userId: user.userId,
            username: user.username,
            createdAt: now.toISOString(),
            expiresAt: new Date(now.getTime() + hours * HOUR_MS).toISOString(),
            lastActivity: now.toISOString(),
            data: {},
        };
        await saveJson(this.sessionFile(session.sessionId), session);
        await fs.outputFile(this.pointerFile, session.sessionId, 'utf-8');
        this.current = session;
        this.encryption = new DataEncryption(session.sessionId);
        Logger.debug(`Session started for ${user.username}, expires ${session.expiresAt}`);
        return session;
    }

    private async read(sessionId: string): Promise<Session | null> {
        const raw = await loadJson(this.sessionFile(sessionId));
        if (raw === null) return null;
        const parsed = SessionSchema.safeParse(raw);
        if (!parsed.success) {
            Logger.warn(`Discarding malformed session file for ${sessionId.slice(0, 8)}…`);
            await safeDeleteFile(this.sessionFile(sessionId));
            return null;
        }
        return parsed.data;
    }

    /** Load and activate a session. Expired sessions are deleted and give null. */
    async load(sessionId: string): Promise<Session | null> {
        const session = await this.read(sessionId);
        if (!session) return null;
        if (!isSessionValid(session, this.now())) {
            await safeDeleteFile(this.sessionFile(sessionId));
            return null;
        }
        session.lastActivity = this.now().toISOString();
        await saveJson(this.sessionFile(sessionId), session);
        this.current = session;
        this.encryption = new DataEncryption(sessionId);
        return session;
    }

    /** Re-activate the session named in `sessions/.current`, if any. */
    async resume(): Promise<Session | null> {
        if (!(await fs.pathExists(this.pointerFile))) return null;
        const sessionId = (await fs.readFile(this.pointerFile, 'utf-8')).trim();
        if (!sessionId) return null;
        const session = await this.load(sessionId);
        if (!session) {
            await safeDeleteFile(this.pointerFile);
        }
        return session;
    }

    async end(sessionId?: string): Promise<void> {
        const id = sessionId ?? this.current?.sessionId;
        if (id) {
            await safeDeleteFile(this.sessionFile(id));
            try {
                if (await fs.pathExists(this.pointerFile)) {
                    const pointed = (await fs.readFile(this.pointerFile, 'utf-8')).trim();
                    if (pointed === id) await fs.remove(this.pointerFile);
                }
            } catch (error) {
                Logger.warn(`Failed to clear current session pointer: ${errorMessage(error)}`);
            }
        }
        if (!sessionId || sessionId === this.current?.sessionId) {
            this.current = null;
            this.encryption = null;
        }
    }

    hasValidSession(): boolean {
        return this.current !== null && isSessionValid(this.current, this.now());
    }

    getData(key: string): string | null {
        if (!this.current || !this.encryption) return null;
        const encrypted = this.current.data[key];
        return encrypted === undefined ? null : this.encryption.decrypt(encrypted);
    }

    async setData(key: string, value: string): Promise<void> {
        if (!this.current || !this.encryption) return;
        this.current.data[key] = this.encryption.encrypt(value);
        await saveJson(this.sessionFile(this.current.sessionId), this.current);
    }

    get currentUserId(): string | null {
        return this.current?.userId ?? null;
    }

    get currentUsername(): string | null {
        return this.current?.username ?? null;
    }

    private async sessionIds(): Promise<string[]> {
        if (!(await fs.pathExists(this.sessionsDir))) return [];
        const files = await fs.readdir(this.sessionsDir);
        return files.filter(file => file.endsWith('.json')).map(file => file.slice(0, -'.json'.length));
    }

    /** Delete every expired session file. Returns how many were removed. */
    async cleanupExpired(): Promise<number> {
        let removed = 0;
        const now = this.now();
        for (const id of await this.sessionIds()) {
            const session = await this.read(id);
            if (session && !isSessionValid(session, now)) {
                await safeDeleteFile(this.sessionFile(id));
                removed++;
            }
        }
        return removed;
    }

    async activeCount(): Promise<number> {
        let count = 0;
        const now = this.now();
        for (const id of await this.sessionIds()) {
            const session = await this.read(id);
            if (session && isSessionValid(session, now)) count++;
        }
        return count;
    }
}
