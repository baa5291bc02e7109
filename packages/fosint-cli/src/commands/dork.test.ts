import { describe, it, expect, afterEach, vi } from 'vitest';
import { ValidationError } from '@fosint/core';
import { composeDork, dorkBuildCommand } from './dork.js';

describe('composeDork', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('starts from a catalogue template and appends operators', () => {
        expect(composeDork('example.com', { template: 'sensitive_info/login_pages', filetype: 'php' }))
            .toBe('inurl:login OR inurl:signin OR inurl:admin "example.com" filetype:php');
    });

    it('fills the exclude slot of a template', () => {
        expect(composeDork('acme', { template: 'domain_info/exclude_site', exclude: 'acme.com' })).toBe('"acme" -site:acme.com');
    });

    it('uses the plain query without a template', () => {
        expect(composeDork('report', { site: 'example.com', or: ['2023', '2024'] })).toBe('report site:example.com 2023 OR 2024');
        expect(composeDork('report', { or: [] })).toBe('report');
    });

    it('rejects unknown templates', () => {
        expect(() => composeDork('acme', { template: 'sensitive_info/nothing' })).toThrow(ValidationError);
        expect(() => composeDork('acme', { template: 'login_pages' })).toThrow(ValidationError);
    });

    it('prints the composed dork', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        dorkBuildCommand('acme', { intitle: 'index of' });
        expect(log).toHaveBeenCalledWith('acme intitle:index of');
    });
});
