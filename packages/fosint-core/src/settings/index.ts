import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { Logger } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { isRecord, type JsonRecord } from '../utils/guards.js';
import { SettingsSchema, type ApiKeyName, type Settings } from './schema.js';

export * from './schema.js';

export function defaultSettings(): Settings {
    return SettingsSchema.parse({});
}

/**
 * Load config/settings.json.
 * A missing file gives defaults; malformed JSON or an invalid shape is
 * reported and also gives defaults so the tool still starts.
 */
export function loadSettings(settingsPath: string): Settings {
    try {
        if (!fs.existsSync(settingsPath)) {
            Logger.debug(`Settings file not found at ${settingsPath}`);
            return defaultSettings();
        }

        const content = fs.readFileSync(settingsPath, 'utf-8');
        const parsed = SettingsSchema.safeParse(JSON.parse(content));
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            Logger.warn(`Invalid settings in ${settingsPath}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
            return defaultSettings();
        }
        Logger.debug(`Settings loaded from ${settingsPath}`);
        return parsed.data;
    } catch (error) {
        if (error instanceof SyntaxError) {
            Logger.warn(`Malformed JSON in ${settingsPath}: ${error.message}`);
        } else {
            Logger.warn(`Failed to read settings from ${settingsPath}: ${errorMessage(error)}`);
        }
        return defaultSettings();
    }
}

export function saveSettings(settingsPath: string, settings: Settings): void {
    try {
        fs.ensureDirSync(path.dirname(settingsPath));
        fs.writeFileSync(settingsPath, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
        Logger.debug(`Settings saved to ${settingsPath}`);
    } catch (error) {
        Logger.error(`Failed to save settings to ${settingsPath}: ${errorMessage(error)}`);
        throw new ConfigError(`Failed to save settings to ${settingsPath}`, { cause: error });
    }
}

/** "true"/"false" become booleans, numeric strings become numbers. */
export function coerceSettingValue(value: string): string | number | boolean {
    if (value === 'true') return true;
    if (value === 'false') return false;
    if (value.trim() !== '' && !isNaN(Number(value))) return Number(value);
    return value;
}

const RESERVED_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype']);

function splitKey(key: string): string[] {
    const parts = key.split('.').filter(Boolean);
    if (parts.length === 0) {
        throw new ConfigError('Setting key must not be empty');
    }
    const reserved = parts.find(part => RESERVED_SEGMENTS.has(part));
    if (reserved) {
        throw new ConfigError(`Invalid setting key ${key}: "${reserved}" is not a setting`);
    }
    return parts;
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
    let current = schema;
    for (;;) {
        if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) current = current.unwrap();
        else if (current instanceof z.ZodDefault) current = current.removeDefault();
        else return current;
    }
}

/** Schema of the field at `parts`, or undefined for keys the schema does not define. */
function fieldSchema(parts: string[]): z.ZodTypeAny | undefined {
    let schema: z.ZodTypeAny = SettingsSchema;
    for (const part of parts) {
        const object = unwrap(schema);
        if (!(object instanceof z.ZodObject)) return undefined;
        const shape: z.ZodRawShape = object.shape;
        if (!Object.hasOwn(shape, part)) return undefined;
        schema = shape[part];
    }
    return unwrap(schema);
}

/** Typed by the field: strings stay as given, so a numeric password is kept verbatim. */
function coerceForField(parts: string[], raw: string): string | number | boolean {
    const field = fieldSchema(parts);
    if (field instanceof z.ZodString || field instanceof z.ZodEnum) return raw;
    if (field instanceof z.ZodNumber) return raw.trim() !== '' && !isNaN(Number(raw)) ? Number(raw) : raw;
    if (field instanceof z.ZodBoolean) return raw === 'true' ? true : raw === 'false' ? false : raw;
    return coerceSettingValue(raw);
}

/** Read a value by dot-notation key, e.g. `tor.socks_port`. */
export function getSettingValue(settings: Settings, key: string): unknown {
    let value: unknown = settings;
    for (const part of key.split('.')) {
        if (!isRecord(value) || !Object.hasOwn(value, part)) return undefined;
        value = value[part];
    }
    return value;
}

/**
 * Set a value by dot-notation key and re-validate the whole document.
 * Throws ConfigError when the result does not satisfy the schema.
 */
export function setSettingValue(settings: Settings, key: string, rawValue: string): Settings {
    const parts = splitKey(key);
    const draft: JsonRecord = JSON.parse(JSON.stringify(settings));

    let target: JsonRecord = draft;
    for (const part of parts.slice(0, -1)) {
        const next = target[part];
        if (isRecord(next)) {
            target = next;
        } else {
            const created: JsonRecord = {};
            target[part] = created;
            target = created;
        }
    }
    target[parts[parts.length - 1]] = coerceForField(parts, rawValue);

    const parsed = SettingsSchema.safeParse(draft);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigError(`Invalid value for ${key}: ${issue?.message ?? 'rejected by schema'}`);
    }
    return parsed.data;
}

export function setApiKey(settings: Settings, name: ApiKeyName, apiKey: string): Settings {
    return { ...settings, api_keys: { ...settings.api_keys, [name]: apiKey } };
}

export function removeApiKey(settings: Settings, name: ApiKeyName): Settings {
    const apiKeys = { ...settings.api_keys };
    delete apiKeys[name];
    return { ...settings, api_keys: apiKeys };
}

export function maskKey(key: string): string {
    if (key.length <= 8) return '***';
    return key.substring(0, 6) + '...' + key.substring(key.length - 4);
}
