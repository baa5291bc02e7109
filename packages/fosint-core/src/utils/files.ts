import path from 'path';
import fs from 'fs-extra';
import { Logger } from './logger.js';
import { StorageError, errorMessage } from './errors.js';

export async function saveJson(filePath: string, data: unknown): Promise<void> {
    try {
        await fs.ensureDir(path.dirname(filePath));
        await fs.writeJson(filePath, data, { spaces: 2 });
    } catch (error) {
        throw new StorageError(`Failed to save ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
}

/**
 * Read a JSON file. Missing files give `null`; unreadable or malformed files
 * are logged and also give `null`, so callers fall back to an empty state.
 */
export async function loadJson(filePath: string): Promise<unknown> {
    if (!(await fs.pathExists(filePath))) {
        return null;
    }
    try {
        return await fs.readJson(filePath);
    } catch (error) {
        Logger.warn(`Failed to read ${filePath}: ${errorMessage(error)}`);
        return null;
    }
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** `20250131_142501` in local time. */
export function formatTimestamp(date: Date = new Date()): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function generateFilename(prefix: string, extension: string, timestamp: Date | false = new Date()): string {
    const safePrefix = prefix.trim().replace(/[^A-Za-z0-9._-]+/g, '_') || 'file';
    return timestamp ? `${safePrefix}_${formatTimestamp(timestamp)}.${extension}` : `${safePrefix}.${extension}`;
}

export async function safeDeleteFile(filePath: string): Promise<boolean> {
    try {
        await fs.remove(filePath);
        return true;
    } catch (error) {
        Logger.warn(`Failed to delete ${filePath}: ${errorMessage(error)}`);
        return false;
    }
}
