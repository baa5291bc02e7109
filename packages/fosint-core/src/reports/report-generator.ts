import path from 'path';
import fs from 'fs-extra';
import PDFDocument from 'pdfkit';
import { projectStats, type ProjectManager, type ProjectStats } from '../projects/project-manager.js';
import { ValidationError } from '../utils/errors.js';
import { generateFilename } from '../utils/files.js';
import { Logger } from '../utils/logger.js';
import type { Finding, Note, Project, ReportFormat, ReportRecord, SearchRecord, Severity, Target } from '../types/index.js';

const SEVERITY_ORDER: Severity[] = ['critical', 'high', 'medium', 'low', 'info'];

export interface ReportModel {
    metadata: {
        project: string;
        projectId: string;
        description: string;
        tags: string[];
        author: string | null;
        createdAt: string;
        updatedAt: string;
        generatedAt: string;
    };
    summary: ProjectStats & { severityBreakdown: Record<Severity, number> };
    targets: Target[];
    findingsByModule: Array<{ module: string; findings: Finding[] }>;
    searches: SearchRecord[];
    notes: Note[];
}

export function buildReport(project: Project, options: { author?: string | null; generatedAt?: Date } = {}): ReportModel {
    const severityBreakdown: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
    const byModule = new Map<string, Finding[]>();
    for (const finding of project.data.findings) {
        severityBreakdown[finding.severity]++;
        const group = byModule.get(finding.module) ?? [];
        group.push(finding);
        byModule.set(finding.module, group);
    }
    const rank = (finding: Finding) => SEVERITY_ORDER.indexOf(finding.severity);

    return {
        metadata: {
            project: project.name,
            projectId: project.projectId,
            description: project.description,
            tags: project.tags,
            author: options.author ?? null,
            createdAt: project.createdAt,
            updatedAt: project.updatedAt,
            generatedAt: (options.generatedAt ?? new Date()).toISOString(),
        },
        summary: { ...projectStats(project), severityBreakdown },
        targets: project.data.targets,
        findingsByModule: [...byModule.entries()]
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([module, findings]) => ({ module, findings: [...findings].sort((a, b) => rank(a) - rank(b)) })),
        searches: [...project.data.searches].sort((a, b) => b.performedAt.localeCompare(a.performedAt)),
        notes: project.data.notes,
    };
}

function cell(value: string): string {
    return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

function detailLines(details: Record<string, unknown>): string[] {
    return Object.entries(details).map(([key, value]) =>
        `${key}: ${typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' ? String(value) : JSON.stringify(value)}`,
    );
}

export function renderMarkdown(report: ReportModel): string {
    const lines: string[] = [];
    const meta = report.metadata;

    lines.push(`# OSINT Report: ${meta.project}`);
    lines.push('');
    if (meta.description) {
        lines.push(meta.description);
        lines.push('');
    }
    lines.push(`**Project ID:** ${meta.projectId}`);
    lines.push(`**Generated:** ${meta.generatedAt}`);
    if (meta.author) lines.push(`**Analyst:** ${meta.author}`);
    if (meta.tags.length > 0) lines.push(`**Tags:** ${meta.tags.join(', ')}`);
    lines.push('');

    lines.push('## Summary');
    lines.push('');
    lines.push('| Metric | Value |');
    lines.push('|:-------|:------|');
    lines.push(`| Targets | ${report.summary.targets} |`);
    lines.push(`| Findings | ${report.summary.findings} |`);
    lines.push(`| Searches | ${report.summary.searches} |`);
    lines.push(`| Notes | ${report.summary.notes} |`);
    lines.push('');

    if (report.summary.findings > 0) {
        lines.push('## Severity Breakdown');
        lines.push('');
        lines.push('| Severity | Count |');
        lines.push('|:---------|:------|');
        for (const severity of SEVERITY_ORDER) {
            const count = report.summary.severityBreakdown[severity];
            if (count > 0) lines.push(`| ${capitalize(severity)} | ${count} |`);
        }
        lines.push('');
    }

    if (report.targets.length > 0) {
        lines.push('## Targets');
        lines.push('');
        lines.push('| Type | Value | Added | Notes |');
        lines.push('|:-----|:------|:------|:------|');
        for (const target of report.targets) {
            lines.push(`| ${cell(target.type)} | ${cell(target.value)} | ${target.addedAt} | ${cell(target.notes ?? '')} |`);
        }
        lines.push('');
    }

    if (report.findingsByModule.length > 0) {
        lines.push('## Findings');
        lines.push('');
        for (const group of report.findingsByModule) {
            lines.push(`### ${group.module}`);
            lines.push('');
            group.findings.forEach((finding, i) => {
                lines.push(`${i + 1}. **[${finding.severity.toUpperCase()}] ${finding.title}**`);
                if (finding.target) lines.push(`   - Target: ${finding.target}`);
                lines.push(`   - Found: ${finding.foundAt}`);
                for (const detail of detailLines(finding.details)) {
                    lines.push(`   - ${detail}`);
                }
            });
            lines.push('');
        }
    }

    if (report.searches.length > 0) {
        lines.push('## Search History');
        lines.push('');
        lines.push('| Module | Query | Results | Performed |');
        lines.push('|:-------|:------|:--------|:----------|');
        for (const search of report.searches) {
            lines.push(`| ${cell(search.module)} | ${cell(search.query)} | ${search.resultCount} | ${search.performedAt} |`);
        }
        lines.push('');
    }

    if (report.notes.length > 0) {
        lines.push('## Notes');
        lines.push('');
        for (const note of report.notes) {
            lines.push(`- _${note.category}_ (${note.createdAt}): ${note.content}`);
        }
        lines.push('');
    }

    lines.push('---');
    lines.push(`*Generated by fosint on ${meta.generatedAt}*`);
    lines.push('');
    return lines.join('\n');
}

/** Write the report as an A4 PDF; resolves once the file is flushed. */
export async function renderPdf(report: ReportModel, outputPath: string): Promise<void> {
    const meta = report.metadata;
    const doc = new PDFDocument({
        size: 'A4',
        margin: 50,
        info: { Title: `OSINT Report: ${meta.project}`, Author: meta.author ?? 'fosint', Subject: meta.description },
    });
    const stream = fs.createWriteStream(outputPath);
    const finished = new Promise<void>((resolve, reject) => {
        stream.on('finish', resolve);
        stream.on('error', reject);
        doc.on('error', reject);
    });
    doc.pipe(stream);

    const heading = (text: string) => {
        doc.moveDown().font('Helvetica-Bold').fontSize(14).fillColor('#1f2937').text(text);
        doc.moveDown(0.3).font('Helvetica').fontSize(10).fillColor('#111827');
    };

    doc.font('Helvetica-Bold').fontSize(20).text(`OSINT Report: ${meta.project}`);
    doc.font('Helvetica').fontSize(10).fillColor('#4b5563');
    if (meta.description) doc.text(meta.description);
    doc.text(`Project ID: ${meta.projectId}`);
    doc.text(`Generated: ${meta.generatedAt}`);
    if (meta.author) doc.text(`Analyst: ${meta.author}`);
    if (meta.tags.length > 0) doc.text(`Tags: ${meta.tags.join(', ')}`);

    heading('Summary');
    doc.text(`Targets: ${report.summary.targets}`);
    doc.text(`Findings: ${report.summary.findings}`);
    doc.text(`Searches: ${report.summary.searches}`);
    doc.text(`Notes: ${report.summary.notes}`);
    const breakdown = SEVERITY_ORDER
        .filter(severity => report.summary.severityBreakdown[severity] > 0)
        .map(severity => `${capitalize(severity)} ${report.summary.severityBreakdown[severity]}`);
    if (breakdown.length > 0) doc.text(`Severity: ${breakdown.join(', ')}`);

    if (report.targets.length > 0) {
        heading('Targets');
        for (const target of report.targets) {
            doc.text(`${target.type}: ${target.value}${target.notes ? ` (${target.notes})` : ''}`);
        }
    }

    for (const group of report.findingsByModule) {
        heading(`Findings: ${group.module}`);
        for (const finding of group.findings) {
            doc.font('Helvetica-Bold').text(`[${finding.severity.toUpperCase()}] ${finding.title}`);
            doc.font('Helvetica');
            if (finding.target) doc.text(`Target: ${finding.target}`, { indent: 12 });
            doc.text(`Found: ${finding.foundAt}`, { indent: 12 });
            for (const detail of detailLines(finding.details)) {
                doc.text(detail, { indent: 12 });
            }
            doc.moveDown(0.4);
        }
    }

    if (report.searches.length > 0) {
        heading('Search History');
        for (const search of report.searches) {
            doc.text(`${search.performedAt}  ${search.module}  "${search.query}"  (${search.resultCount} results)`);
        }
    }

    if (report.notes.length > 0) {
        heading('Notes');
        for (const note of report.notes) {
            doc.text(`[${note.category}] ${note.content}`);
        }
    }

    doc.end();
    await finished;
}

export interface GeneratedReport {
    path: string;
    record: ReportRecord;
}

/**
 * Renders the current project of a ProjectManager into `reports/` and records
 * the file back into that project.
 */
export class ReportGenerator {
    constructor(
        private readonly reportsDir: string,
        private readonly projects: ProjectManager,
        private readonly now: () => Date = () => new Date(),
    ) {}

    async generate(format: ReportFormat, options: { author?: string | null } = {}): Promise<GeneratedReport> {
        const project = this.projects.currentProject;
        if (!project) {
            throw new ValidationError('No project selected. Use `fosint project use <id>` first.');
        }
        const generatedAt = this.now();
        const report = buildReport(project, { author: options.author, generatedAt });
        await fs.ensureDir(this.reportsDir);
        const outputPath = path.join(this.reportsDir, generateFilename(project.name, format, generatedAt));

        if (format === 'pdf') {
            await renderPdf(report, outputPath);
        } else {
            await fs.writeFile(outputPath, renderMarkdown(report), 'utf-8');
        }
        Logger.debug(`Wrote ${format} report ${outputPath}`);

        const record = await this.projects.addReport(outputPath, format);
        return { path: outputPath, record };
    }
}
