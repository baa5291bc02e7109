import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { HIBP_BASE_URL } from '@fosint/core';
import { FakeHttpClient } from '@fosint/core/testing';
import { signinCommand, signupCommand } from './auth.js';
import { projectCreateCommand } from './project.js';
import { leakBulkCommand, leakEmailCommand } from './leak.js';
import { CliContext } from '../utils/context.js';
import { run } from '../utils/errors.js';

const PASSWORD = 'Test-secret1!';
const clock = { now: () => Date.parse('2024-05-01T12:00:00Z'), sleep: async () => {} };

const adobe = {
    Name: 'Adobe',
    Title: 'Adobe',
    Domain: 'adobe.com',
    BreachDate: '2013-10-04',
    PwnCount: 152445165,
    DataClasses: ['Email addresses', 'Passwords'],
    IsVerified: true,
    Description: 'Test breach',
};

function breachedHttp(): FakeHttpClient {
    return new FakeHttpClient()
        .on(`${HIBP_BASE_URL}/breachedaccount/`, { status: 404, body: '' })
        .on(`${HIBP_BASE_URL}/breachedaccount/ops%40example.com`, { body: [adobe] });
}

describe('leak commands', () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'fosint-leak-cmd-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
        await fs.remove(root);
    });

    const stdout = () => vi.mocked(console.log).mock.calls.map(call => call.join(' ')).join('\n');

    it('keeps stdout parseable when exporting json without a file', async () => {
        await leakEmailCommand(root, 'ops@example.com', { format: 'json' }, { http: breachedHttp(), clock });

        const exported = JSON.parse(stdout());
        expect(exported).toHaveLength(1);
        expect(exported[0]).toMatchObject({ email: 'ops@example.com', breachesCount: 1, pastesCount: 0 });
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining('No haveibeenpwned API key configured'));
    });

    it('exports csv rows for a bulk file', async () => {
        await fs.writeFile(path.join(root, 'emails.txt'), '# suppliers\nops@example.com\n\nclean@example.com\nnot-an-address\n');
        await leakBulkCommand(root, 'emails.txt', { format: 'csv' }, { http: breachedHttp(), clock });

        const lines = stdout().split('\r\n').filter(Boolean);
        expect(lines[0]).toBe('Email,Breaches Count,Pastes Count,Risk Level,Checked At');
        expect(lines.slice(1).map(line => line.split(',').slice(0, 4).join(','))).toEqual([
            'ops@example.com,1,0,low',
            'clean@example.com,0,0,none',
        ]);
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Skipping 1 invalid address(es): not-an-address'));
    });

    it('records the search and a finding in the selected project', async () => {
        await signupCommand(root, 'analyst', { email: 'analyst@example.com', password: PASSWORD });
        await signinCommand(root, 'analyst', { password: PASSWORD });
        await projectCreateCommand(root, 'Acme case');

        await leakEmailCommand(root, 'ops@example.com', {}, { http: breachedHttp(), clock });

        const project = (await CliContext.open(root)).projects.currentProject;
        expect(project?.data.searches.map(s => [s.module, s.query, s.resultCount])).toEqual([['leak-checker', 'ops@example.com', 1]]);
        expect(project?.data.findings).toHaveLength(1);
        expect(project?.data.findings[0]).toMatchObject({
            module: 'leak-checker',
            title: 'ops@example.com found in 1 breach(es)',
            target: 'ops@example.com',
            severity: 'low',
            details: { breaches: ['Adobe'], pastes: 0, riskScore: 30 },
        });
    });

    it('exits with the usage code for an invalid address', async () => {
        const http = breachedHttp();
        await run(() => leakEmailCommand(root, 'not-an-address', {}, { http, clock }))();

        expect(process.exitCode).toBe(2);
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Invalid email address: not-an-address'));
        expect(http.calls).toEqual([]);
    });
});
