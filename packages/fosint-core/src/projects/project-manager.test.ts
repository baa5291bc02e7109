import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ProjectManager, projectStats } from './project-manager.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

function ticking(start = Date.parse('2025-03-01T00:00:00.000Z')): () => Date {
    let tick = 0;
    return () => new Date(start + (tick++) * 1_000);
}

describe('ProjectManager', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fosint-projects-'));
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    it('creates a project and makes it current', async () => {
        const manager = new ProjectManager(dir, 'user-1', { now: ticking() });
        const project = await manager.create('  Acme investigation ', 'Supplier leak', ['leak', ' ', 'acme ']);

        expect(project.name).toBe('Acme investigation');
        expect(project.tags).toEqual(['leak', 'acme']);
        expect(project.userId).toBe('user-1');
        expect(manager.currentProject?.projectId).toBe(project.projectId);
        expect(await fs.pathExists(path.join(dir, `${project.projectId}.json`))).toBe(true);
    });

    it('rejects an empty name', async () => {
        await expect(new ProjectManager(dir).create('   ')).rejects.toThrow(ValidationError);
    });

    it('lists only the owner\'s projects, most recently updated first', async () => {
        const mine = new ProjectManager(dir, 'user-1', { now: ticking() });
        const older = await mine.create('older');
        const newer = await mine.create('newer');
        await new ProjectManager(dir, 'user-2', { now: ticking() }).create('someone else');

        await mine.use(older.projectId);
        await mine.addNote('touch');

        expect((await mine.list()).map(p => p.name)).toEqual(['older', 'newer']);
        expect(newer.userId).toBe('user-1');
        expect(await mine.list(null)).toHaveLength(3);
    });

    it('searches names, descriptions and tags case-insensitively', async () => {
        const manager = new ProjectManager(dir, 'user-1');
        await manager.create('Alpha', 'ransomware actor');
        await manager.create('Beta', '', ['Phishing']);
        await manager.create('Gamma');

        expect((await manager.search('RANSOM')).map(p => p.name)).toEqual(['Alpha']);
        expect((await manager.search('phish')).map(p => p.name)).toEqual(['Beta']);
        expect(await manager.search('delta')).toEqual([]);
    });

    it('records targets, findings, searches, notes and reports', async () => {
        const manager = new ProjectManager(dir, 'user-1', { now: ticking() });
        const project = await manager.create('case');
        await manager.addTarget({ type: 'email', value: 'someone@example.com' });
        const finding = await manager.addFinding({ module: 'leak-checker', title: 'Found in 2 breaches' });
        await manager.addSearch({ module: 'leak-checker', query: 'someone@example.com', resultCount: 2 });
        await manager.addNote('Check the paste', 'todo');
        await manager.addReport('/tmp/report.md', 'md');

        expect(finding.severity).toBe('info');
        expect(finding.details).toEqual({});
        const summary = await manager.summary(project.projectId);
        expect(summary?.stats).toEqual({ targets: 1, findings: 1, searches: 1, notes: 1, reports: 1 });
        expect(projectStats(project).findings).toBe(1);
        expect(summary?.updatedAt).toBe('2025-03-01T00:00:10.000Z');
    });

    it('keeps changes in memory when auto-save is off', async () => {
        const manager = new ProjectManager(dir, 'user-1', { autoSave: false });
        const project = await manager.create('case');
        await manager.addNote('unsaved');

        expect((await manager.load(project.projectId))?.data.notes).toHaveLength(0);
        await manager.save();
        expect((await manager.load(project.projectId))?.data.notes).toHaveLength(1);
    });

    it('requires a current project for mutations', async () => {
        await expect(new ProjectManager(dir).addNote('x')).rejects.toThrow('No project selected');
        await expect(new ProjectManager(dir).use('missing')).rejects.toThrow(NotFoundError);
    });

    it('exports and imports under a fresh id and owner', async () => {
        const source = new ProjectManager(dir, 'user-1');
        const project = await source.create('shared', 'handover');
        await source.addNote('keep me');
        const exportPath = path.join(dir, 'exports', 'shared.json');
        await source.export(project.projectId, exportPath);

        const importer = new ProjectManager(dir, 'user-2', { now: () => new Date('2025-04-01T00:00:00.000Z') });
        const imported = await importer.import(exportPath);

        expect(imported.projectId).not.toBe(project.projectId);
        expect(imported.userId).toBe('user-2');
        expect(imported.importedAt).toBe('2025-04-01T00:00:00.000Z');
        expect(imported.data.notes.map(n => n.content)).toEqual(['keep me']);
    });

    it('rejects files that are not project exports', async () => {
        const file = path.join(dir, 'bogus.json');
        await fs.writeJson(file, { hello: 'world' });
        await expect(new ProjectManager(dir).import(file)).rejects.toThrow(`${file} is not a project export`);
    });

    it('deletes projects and clears the selection', async () => {
        const manager = new ProjectManager(dir);
        const project = await manager.create('temp');
        expect(await manager.delete(project.projectId)).toBe(true);
        expect(manager.currentProject).toBeNull();
        expect(await manager.delete(project.projectId)).toBe(false);
    });
});
