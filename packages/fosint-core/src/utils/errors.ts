/**
 * Error hierarchy shared by every module. `code` is stable and is what the CLI
 * maps to exit codes and remediation hints.
 */

export type ErrorCode =
    | 'VALIDATION'
    | 'AUTH'
    | 'NOT_FOUND'
    | 'NETWORK'
    | 'TOR'
    | 'CONFIG'
    | 'STORAGE';

export class FosintError extends Error {
    constructor(message: string, public readonly code: ErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ValidationError extends FosintError {
    constructor(message: string) {
        super(message, 'VALIDATION');
    }
}

export class AuthError extends FosintError {
    constructor(message: string) {
        super(message, 'AUTH');
    }
}

export class NotFoundError extends FosintError {
    constructor(message: string) {
        super(message, 'NOT_FOUND');
    }
}

export class NetworkError extends FosintError {
    readonly status?: number;

    constructor(message: string, public readonly url: string, options?: { cause?: unknown; status?: number }) {
        super(message, 'NETWORK', options);
        this.status = options?.status;
    }
}

export class TorError extends FosintError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'TOR', options);
    }
}

export class ConfigError extends FosintError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'CONFIG', options);
    }
}

export class StorageError extends FosintError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'STORAGE', options);
    }
}

/** Maps error codes to what the user should check next. */
export const REMEDIATION_HINTS: Record<ErrorCode, string> = {
    VALIDATION: 'Check the value you passed and try again.',
    AUTH: 'Sign in again with `fosint signin`.',
    NOT_FOUND: 'List what exists with `fosint project list`.',
    NETWORK: 'Check connectivity, API keys in config/settings.json, and rate limits.',
    TOR: 'Make sure Tor is running (SOCKS on localhost:9050) or run `fosint tor start`.',
    CONFIG: 'Inspect config/settings.json with `fosint settings show`.',
    STORAGE: 'Check file permissions under data/, sessions/ and reports/.',
};

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
