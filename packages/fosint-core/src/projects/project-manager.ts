import path from 'path';
import crypto from 'crypto';
import fs from 'fs-extra';
import { Logger } from '../utils/logger.js';
import { NotFoundError, StorageError, ValidationError } from '../utils/errors.js';
import { loadJson, safeDeleteFile, saveJson } from '../utils/files.js';
import {
    ProjectSchema,
    type Finding,
    type Note,
    type Project,
    type ReportFormat,
    type ReportRecord,
    type SearchRecord,
    type Target,
} from '../types/index.js';

export interface ProjectStats {
    targets: number;
    findings: number;
    searches: number;
    notes: number;
    reports: number;
}

export interface ProjectSummary {
    projectId: string;
    name: string;
    description: string;
    createdAt: string;
    updatedAt: string;
    tags: string[];
    stats: ProjectStats;
}

export type NewTarget = Omit<Target, 'id' | 'addedAt'>;
export type NewFinding = Omit<Finding, 'id' | 'foundAt' | 'severity' | 'details'> & Partial<Pick<Finding, 'severity' | 'details'>>;
export type NewSearch = Omit<SearchRecord, 'id' | 'performedAt'>;

export function projectStats(project: Project): ProjectStats {
    return {
        targets: project.data.targets.length,
        findings: project.data.findings.length,
        searches: project.data.searches.length,
        notes: project.data.notes.length,
        reports: project.data.reports.length,
    };
}

/**
 * Projects stored one per file in `data/projects/<id>.json`. Mutators save
 * immediately when auto-save is on.
 */
export class ProjectManager {
    private current: Project | null = null;

    constructor(
        private readonly projectsDir: string,
        private readonly userId: string | null = null,
        private readonly options: { autoSave?: boolean; now?: () => Date } = {},
    ) {}

    private now(): string {
        return (this.options.now ? this.options.now() : new Date()).toISOString();
    }

    private projectFile(projectId: string): string {
        return path.join(this.projectsDir, `${path.basename(projectId)}.json`);
    }

    get currentProject(): Project | null {
        return this.current;
    }

    async create(name: string, description = '', tags: string[] = []): Promise<Project> {
        const trimmed = name.trim();
        if (!trimmed) {
            throw new ValidationError('Project name is required');
        }
        const timestamp = this.now();
        const project: Project = {
            projectId: crypto.randomUUID(),
            name: trimmed,
            description,
            userId: this.userId,
            createdAt: timestamp,
            updatedAt: timestamp,
            tags: tags.map(tag => tag.trim()).filter(Boolean),
            data: { targets: [], findings: [], reports: [], searches: [], notes: [] },
        };
        await this.write(project);
        this.current = project;
        Logger.debug(`Created project ${project.projectId} (${trimmed})`);
        return project;
    }

    async load(projectId: string): Promise<Project | null> {
        const raw = await loadJson(this.projectFile(projectId));
        if (raw === null) return null;
        const parsed = ProjectSchema.safeParse(raw);
        if (!parsed.success) {
            Logger.warn(`Skipping malformed project file ${this.projectFile(projectId)}`);
            return null;
        }
        return parsed.data;
    }

    async use(projectId: string): Promise<Project> {
        const project = await this.load(projectId);
        if (!project) {
            throw new NotFoundError(`Project ${projectId} not found`);
        }
        this.current = project;
        return project;
    }

    private async write(project: Project): Promise<void> {
        await saveJson(this.projectFile(project.projectId), project);
    }

    /** Save the current project, bumping `updatedAt`. */
    async save(project: Project | null = this.current): Promise<void> {
        if (!project) {
            throw new ValidationError('No project selected');
        }
        project.updatedAt = this.now();
        await this.write(project);
    }

    async delete(projectId: string): Promise<boolean> {
        const file = this.projectFile(projectId);
        if (!(await fs.pathExists(file))) return false;
        const deleted = await safeDeleteFile(file);
        if (deleted && this.current?.projectId === projectId) {
            this.current = null;
        }
        return deleted;
    }

    /** Projects of `userId` (or of the manager's user), newest `updatedAt` first. */
    async list(userId: string | null = this.userId): Promise<Project[]> {
        if (!(await fs.pathExists(this.projectsDir))) return [];
        const projects: Project[] = [];
        for (const file of await fs.readdir(this.projectsDir)) {
            if (!file.endsWith('.json')) continue;
            const project = await this.load(file.slice(0, -'.json'.length));
            if (project && (!userId || project.userId === userId)) {
                projects.push(project);
            }
        }
        return projects.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
    }

    async search(query: string, userId: string | null = this.userId): Promise<Project[]> {
        const needle = query.toLowerCase();
        return (await this.list(userId)).filter(project =>
            project.name.toLowerCase().includes(needle) ||
            project.description.toLowerCase().includes(needle) ||
            project.tags.some(tag => tag.toLowerCase().includes(needle)),
        );
    }

    async summary(projectId: string): Promise<ProjectSummary | null> {
        const project = await this.load(projectId);
        if (!project) return null;
        return {
            projectId: project.projectId,
            name: project.name,
            description: project.description,
            createdAt: project.createdAt,
            updatedAt: project.updatedAt,
            tags: project.tags,
            stats: projectStats(project),
        };
    }

    async export(projectId: string, exportPath: string): Promise<void> {
        const project = await this.load(projectId);
        if (!project) {
            throw new NotFoundError(`Project ${projectId} not found`);
        }
        await saveJson(exportPath, project);
    }

    /** Import a project file under a fresh id, owned by this manager's user. */
    async import(importPath: string): Promise<Project> {
        const raw = await loadJson(importPath);
        if (raw === null) {
            throw new StorageError(`Cannot read project file ${importPath}`);
        }
        const parsed = ProjectSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ValidationError(`${importPath} is not a project export`);
        }
        const project: Project = {
            ...parsed.data,
            projectId: crypto.randomUUID(),
            userId: this.userId ?? 'anonymous',
            importedAt: this.now(),
        };
        await this.save(project);
        return project;
    }

    private async touch(project: Project): Promise<void> {
        project.updatedAt = this.now();
        if (this.options.autoSave ?? true) {
            await this.write(project);
        }
    }

    private requireCurrent(): Project {
        if (!this.current) {
            throw new ValidationError('No project selected. Use `fosint project use <id>` first.');
        }
        return this.current;
    }

    async addTarget(target: NewTarget): Promise<Target> {
        const project = this.requireCurrent();
        const entry: Target = { ...target, id: crypto.randomUUID(), addedAt: this.now() };
        project.data.targets.push(entry);
        await this.touch(project);
        return entry;
    }

    async addFinding(finding: NewFinding): Promise<Finding> {
        const project = this.requireCurrent();
        const entry: Finding = {
            ...finding,
            severity: finding.severity ?? 'info',
            details: finding.details ?? {},
            id: crypto.randomUUID(),
            foundAt: this.now(),
        };
        project.data.findings.push(entry);
        await this.touch(project);
        return entry;
    }

    async addSearch(search: NewSearch): Promise<SearchRecord> {
        const project = this.requireCurrent();
        const entry: SearchRecord = { ...search, id: crypto.randomUUID(), performedAt: this.now() };
        project.data.searches.push(entry);
        await this.touch(project);
        return entry;
    }

    async addNote(content: string, category = 'general'): Promise<Note> {
        const project = this.requireCurrent();
        const entry: Note = { id: crypto.randomUUID(), content, category, createdAt: this.now() };
        project.data.notes.push(entry);
        await this.touch(project);
        return entry;
    }

    async addReport(reportPath: string, format: ReportFormat): Promise<ReportRecord> {
        const project = this.requireCurrent();
        const entry: ReportRecord = { id: crypto.randomUUID(), path: reportPath, format, generatedAt: this.now() };
        project.data.reports.push(entry);
        await this.touch(project);
        return entry;
    }
}
