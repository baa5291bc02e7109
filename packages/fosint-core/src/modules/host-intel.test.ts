import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HostIntel, SHODAN_API, parseShodanHost } from './host-intel.js';
import { FakeHttpClient } from '../testing/fake-http.js';
import { ValidationError } from '../utils/errors.js';

const HOST = {
    ip_str: '198.51.100.7',
    ports: [443, 22, 80],
    hostnames: ['gw.example.net'],
    org: 'Example Hosting',
    isp: 'Example ISP',
    os: null,
    country_name: 'Netherlands',
    city: 'Amsterdam',
    vulns: { 'CVE-2023-0002': {}, 'CVE-2021-0001': {} },
    data: [
        { port: 22, transport: 'tcp', product: 'OpenSSH', version: '9.6' },
        { port: 443, product: 'nginx' },
    ],
    last_update: '2025-02-01T12:00:00.000000',
};

describe('parseShodanHost', () => {
    it('normalises a host record', () => {
        expect(parseShodanHost('198.51.100.7', HOST)).toEqual({
            ip: '198.51.100.7',
            found: true,
            ports: [22, 80, 443],
            hostnames: ['gw.example.net'],
            org: 'Example Hosting',
            isp: 'Example ISP',
            os: '',
            country: 'Netherlands',
            city: 'Amsterdam',
            vulns: ['CVE-2021-0001', 'CVE-2023-0002'],
            services: [
                { port: 22, transport: 'tcp', product: 'OpenSSH', version: '9.6' },
                { port: 443, transport: 'tcp', product: 'nginx', version: '' },
            ],
            lastUpdate: '2025-02-01T12:00:00.000000',
        });
    });

    it('accepts vulns as a list', () => {
        expect(parseShodanHost('198.51.100.7', { vulns: ['CVE-2024-0003'] }).vulns).toEqual(['CVE-2024-0003']);
    });

    it('returns an empty report for non-objects', () => {
        const report = parseShodanHost('198.51.100.7', null);
        expect(report.found).toBe(false);
        expect(report.ports).toEqual([]);
    });
});

describe('HostIntel', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('queries Shodan with the API key', async () => {
        const http = new FakeHttpClient().on(`${SHODAN_API}/shodan/host/198.51.100.7`, { body: HOST });
        const intel = new HostIntel({ http, shodanApiKey: 'test-secret' });

        const report = await intel.lookup('198.51.100.7');

        expect(report?.org).toBe('Example Hosting');
        expect(http.calls[0].url).toBe(`${SHODAN_API}/shodan/host/198.51.100.7?key=test-secret`);
    });

    it('reports unknown hosts as not found', async () => {
        const http = new FakeHttpClient().on(`${SHODAN_API}/shodan/host/`, { status: 404, body: { error: 'No information available' } });
        const intel = new HostIntel({ http, shodanApiKey: 'test-secret' });

        const report = await intel.lookup('203.0.113.9');

        expect(report?.found).toBe(false);
        expect(report?.ip).toBe('203.0.113.9');
    });

    it('returns null on other HTTP errors and invalid JSON', async () => {
        const http = new FakeHttpClient()
            .on(`${SHODAN_API}/shodan/host/203.0.113.1`, { status: 401, body: '' })
            .on(`${SHODAN_API}/shodan/host/203.0.113.2`, { body: '<html>' });
        const intel = new HostIntel({ http, shodanApiKey: 'test-secret' });

        expect(await intel.lookup('203.0.113.1')).toBeNull();
        expect(await intel.lookup('203.0.113.2')).toBeNull();
    });

    it('returns null without an API key', async () => {
        const http = new FakeHttpClient();
        expect(await new HostIntel({ http }).lookup('203.0.113.9')).toBeNull();
        expect(http.calls).toHaveLength(0);
    });

    it('rejects values that are not IP addresses', async () => {
        const intel = new HostIntel({ http: new FakeHttpClient(), shodanApiKey: 'test-secret' });
        await expect(intel.lookup('example.com')).rejects.toBeInstanceOf(ValidationError);
    });
});
