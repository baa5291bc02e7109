import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { signinCommand, signupCommand } from '../commands/auth.js';
import { projectCreateCommand } from '../commands/project.js';
import { CliContext } from './context.js';

const PASSWORD = 'Test-secret1!';

describe('CliContext.record', () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'fosint-context-'));
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        await signupCommand(root, 'analyst', { email: 'analyst@example.com', password: PASSWORD });
        await signinCommand(root, 'analyst', { password: PASSWORD });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.remove(root);
    });

    it('does nothing without a selected project', async () => {
        const ctx = await CliContext.open(root);
        const addSearch = vi.spyOn(ctx.projects, 'addSearch');

        await ctx.record('host-intel', '203.0.113.7', 1);

        expect(addSearch).not.toHaveBeenCalled();
    });

    it('saves the search and its findings', async () => {
        await projectCreateCommand(root, 'Acme case');
        await (await CliContext.open(root)).record('leak-checker', 'ops@example.com', 2, [
            { module: 'leak-checker', title: 'first', target: 'ops@example.com', severity: 'high' },
            { module: 'leak-checker', title: 'second', target: 'ops@example.com' },
        ]);

        const project = (await CliContext.open(root)).projects.currentProject;
        expect(project?.data.searches.map(s => [s.module, s.query, s.resultCount])).toEqual([['leak-checker', 'ops@example.com', 2]]);
        expect(project?.data.findings.map(f => [f.title, f.severity])).toEqual([['first', 'high'], ['second', 'info']]);
    });

    it('turns a failed save into a warning', async () => {
        await projectCreateCommand(root, 'Acme case');
        const ctx = await CliContext.open(root);
        vi.spyOn(ctx.projects, 'addSearch').mockRejectedValue(new Error('disk full'));

        await expect(ctx.record('pgp-search', 'name:Jane Doe', 0)).resolves.toBeUndefined();
        expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Could not record pgp-search results in project: disk full'));
    });
});
