import { describe, it, expect, afterEach, vi } from 'vitest';
import { LogLevel, Logger, levelFromEnv } from './logger.js';

describe('Logger', () => {
    afterEach(() => {
        Logger.setLevel(LogLevel.INFO);
        vi.restoreAllMocks();
    });

    it('keeps stdout for info and sends warnings to stderr', () => {
        const out = vi.spyOn(console, 'log').mockImplementation(() => {});
        const err = vi.spyOn(console, 'error').mockImplementation(() => {});

        Logger.info('fetched');
        Logger.warn('no api key');
        Logger.debug('hidden');

        expect(out).toHaveBeenCalledTimes(1);
        expect(err).toHaveBeenCalledTimes(1);
        expect(String(err.mock.calls[0][0])).toContain('no api key');
    });

    it('enables debug output from the environment', () => {
        expect(levelFromEnv({ FOSINT_DEBUG: 'true' })).toBe(LogLevel.DEBUG);
        expect(levelFromEnv({ FOSINT_DEBUG: '0' })).toBe(LogLevel.INFO);
        expect(levelFromEnv({})).toBe(LogLevel.INFO);
    });
});
