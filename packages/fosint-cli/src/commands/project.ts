import { Command } from 'commander';
import path from 'path';
import chalk from 'chalk';
import { NotFoundError, ValidationError, projectStats, resolveWorkspaceRoot, type Project } from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { run } from '../utils/errors.js';
import { promptConfirm } from '../utils/prompt.js';

/**
 * Find one of the signed-in user's projects by id, unique id prefix or
 * case-insensitive name.
 */
export async function resolveProject(ctx: CliContext, ref: string): Promise<Project> {
    const user = ctx.requireUser();
    const direct = await ctx.projects.load(ref);
    if (direct && direct.userId === user.userId) return direct;

    const owned = await ctx.projects.list(user.userId);
    const byName = owned.filter(project => project.name.toLowerCase() === ref.toLowerCase());
    const matches = byName.length > 0 ? byName : owned.filter(project => project.projectId.startsWith(ref));
    if (matches.length === 0) {
        throw new NotFoundError(`Project ${ref} not found`);
    }
    if (matches.length > 1) {
        throw new ValidationError(`"${ref}" matches ${matches.length} projects; use the full project id`);
    }
    return matches[0];
}

function printProjectLine(ctx: CliContext, project: Project, current: boolean): void {
    const stats = projectStats(project);
    const marker = current ? ctx.ui.success('*') : ' ';
    console.log(`${marker} ${ctx.ui.heading(project.name)} ${ctx.ui.muted(project.projectId)}`);
    if (project.description) console.log(`    ${project.description}`);
    console.log(ctx.ui.muted(`    ${stats.targets} targets, ${stats.findings} findings, ${stats.searches} searches · updated ${project.updatedAt}`));
}

export interface CreateProjectOptions {
    description?: string;
    tags?: string;
}

export async function projectCreateCommand(root: string, name: string, options: CreateProjectOptions = {}, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    ctx.requireUser();
    const tags = options.tags ? options.tags.split(',') : [];
    const project = await ctx.projects.create(name, options.description ?? '', tags);
    await ctx.selectProject(project.projectId);
    console.log(ctx.ui.success(`✓ Project "${project.name}" created and selected`));
    console.log(chalk.dim(`  id: ${project.projectId}`));
}

export async function projectListCommand(root: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const user = ctx.requireUser();
    const projects = await ctx.projects.list(user.userId);
    if (projects.length === 0) {
        console.log(chalk.dim('No projects yet. Create one with: fosint project create <name>'));
        return;
    }
    const currentId = ctx.projects.currentProject?.projectId;
    for (const project of projects) {
        printProjectLine(ctx, project, project.projectId === currentId);
    }
}

export async function projectSearchCommand(root: string, query: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const user = ctx.requireUser();
    const projects = await ctx.projects.search(query, user.userId);
    if (projects.length === 0) {
        console.log(chalk.dim(`No projects match "${query}"`));
        return;
    }
    const currentId = ctx.projects.currentProject?.projectId;
    for (const project of projects) {
        printProjectLine(ctx, project, project.projectId === currentId);
    }
}

export async function projectShowCommand(root: string, ref: string | undefined, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    ctx.requireUser();
    const project = ref ? await resolveProject(ctx, ref) : ctx.projects.currentProject;
    if (!project) {
        throw new ValidationError('No project selected. Use `fosint project use <id>` or pass a project.');
    }
    const { ui } = ctx;
    const stats = projectStats(project);

    console.log(ui.heading(`\n${project.name}`));
    console.log(ui.muted(`  ${project.projectId}`));
    if (project.description) console.log(`  ${project.description}`);
    if (project.tags.length > 0) console.log(`  Tags: ${project.tags.join(', ')}`);
    console.log(`  Created ${project.createdAt}, updated ${project.updatedAt}`);
    console.log(`  ${stats.targets} targets · ${stats.findings} findings · ${stats.searches} searches · ${stats.notes} notes · ${stats.reports} reports\n`);

    if (project.data.targets.length > 0) {
        console.log(chalk.bold('  Targets:'));
        for (const target of project.data.targets) {
            console.log(`    [${target.type}] ${target.value}${target.notes ? ui.muted(` (${target.notes})`) : ''}`);
        }
        console.log('');
    }
    if (project.data.findings.length > 0) {
        console.log(chalk.bold('  Recent findings:'));
        for (const finding of project.data.findings.slice(-10)) {
            console.log(`    ${finding.severity.toUpperCase().padEnd(8)} ${finding.module}: ${finding.title}`);
        }
        console.log('');
    }
    if (project.data.notes.length > 0) {
        console.log(chalk.bold('  Notes:'));
        for (const note of project.data.notes) {
            console.log(`    [${note.category}] ${note.content}`);
        }
        console.log('');
    }
}

export async function projectUseCommand(root: string, ref: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const project = await resolveProject(ctx, ref);
    await ctx.selectProject(project.projectId);
    console.log(ctx.ui.success(`✓ Now working in "${project.name}"`));
}

export async function projectDeleteCommand(root: string, ref: string, options: { yes?: boolean } = {}, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const project = await resolveProject(ctx, ref);
    if (!options.yes && !(await promptConfirm(`Delete project "${project.name}"? This cannot be undone.`))) {
        console.log(chalk.dim('Aborted.'));
        return;
    }
    const wasCurrent = ctx.projects.currentProject?.projectId === project.projectId;
    await ctx.projects.delete(project.projectId);
    if (wasCurrent) {
        await ctx.clearProject();
    }
    console.log(ctx.ui.success(`✓ Deleted project "${project.name}"`));
}

export async function projectExportCommand(root: string, ref: string, output: string | undefined, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const project = await resolveProject(ctx, ref);
    const target = path.resolve(root, output ?? `${project.name.replace(/[^a-zA-Z0-9_-]+/g, '_')}.json`);
    await ctx.projects.export(project.projectId, target);
    console.log(ctx.ui.success(`✓ Exported "${project.name}" to ${target}`));
}

export async function projectImportCommand(root: string, file: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    ctx.requireUser();
    const project = await ctx.projects.import(path.resolve(root, file));
    console.log(ctx.ui.success(`✓ Imported "${project.name}"`));
    console.log(chalk.dim(`  id: ${project.projectId}`));
}

function requireCurrentProject(ctx: CliContext): Project {
    ctx.requireUser();
    const project = ctx.projects.currentProject;
    if (!project) {
        throw new ValidationError('No project selected. Use `fosint project use <id>` first.');
    }
    return project;
}

export async function projectNoteCommand(root: string, content: string, options: { category?: string } = {}, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const project = requireCurrentProject(ctx);
    await ctx.projects.addNote(content, options.category);
    console.log(ctx.ui.success(`✓ Note added to "${project.name}"`));
}

export async function projectTargetCommand(root: string, type: string, value: string, options: { notes?: string } = {}, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const project = requireCurrentProject(ctx);
    await ctx.projects.addTarget({ type, value, notes: options.notes });
    console.log(ctx.ui.success(`✓ Target ${type}:${value} added to "${project.name}"`));
}

export const projectCommand = new Command('project')
    .description('Manage investigation projects')
    .addHelpText('after', `
Examples:
  $ fosint project create "Acme leak" -d "Exposure review" -t acme,leak
  $ fosint project use "Acme leak"
  $ fosint project target email ops@example.com
  $ fosint project note "Vendor confirmed the incident" -c contact
    `);

projectCommand
    .command('create')
    .description('Create a project and select it')
    .argument('<name>', 'Project name')
    .option('-d, --description <text>', 'Description')
    .option('-t, --tags <tags>', 'Comma-separated tags')
    .action(run(async (name: string, options: CreateProjectOptions) => {
        await projectCreateCommand(resolveWorkspaceRoot(), name, options);
    }));

projectCommand
    .command('list')
    .description('List your projects, most recently updated first')
    .action(run(async () => {
        await projectListCommand(resolveWorkspaceRoot());
    }));

projectCommand
    .command('show')
    .description('Show a project (default: the selected one)')
    .argument('[project]', 'Project id, id prefix or name')
    .action(run(async (ref: string | undefined) => {
        await projectShowCommand(resolveWorkspaceRoot(), ref);
    }));

projectCommand
    .command('search')
    .description('Find projects by name, description or tag')
    .argument('<query>', 'Text to look for')
    .action(run(async (query: string) => {
        await projectSearchCommand(resolveWorkspaceRoot(), query);
    }));

projectCommand
    .command('use')
    .description('Select the project that module results are recorded in')
    .argument('<project>', 'Project id, id prefix or name')
    .action(run(async (ref: string) => {
        await projectUseCommand(resolveWorkspaceRoot(), ref);
    }));

projectCommand
    .command('delete')
    .description('Delete a project')
    .argument('<project>', 'Project id, id prefix or name')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(run(async (ref: string, options: { yes?: boolean }) => {
        await projectDeleteCommand(resolveWorkspaceRoot(), ref, options);
    }));

projectCommand
    .command('export')
    .description('Write a project to a JSON file')
    .argument('<project>', 'Project id, id prefix or name')
    .argument('[file]', 'Output file (default: <name>.json)')
    .action(run(async (ref: string, file: string | undefined) => {
        await projectExportCommand(resolveWorkspaceRoot(), ref, file);
    }));

projectCommand
    .command('import')
    .description('Import a project export under a new id')
    .argument('<file>', 'Project JSON file')
    .action(run(async (file: string) => {
        await projectImportCommand(resolveWorkspaceRoot(), file);
    }));

projectCommand
    .command('note')
    .description('Add a note to the selected project')
    .argument('<text>', 'Note text')
    .option('-c, --category <name>', 'Note category', 'general')
    .action(run(async (text: string, options: { category?: string }) => {
        await projectNoteCommand(resolveWorkspaceRoot(), text, options);
    }));

projectCommand
    .command('target')
    .description('Add a target to the selected project')
    .argument('<type>', 'Target type, e.g. email, domain, onion, address')
    .argument('<value>', 'Target value')
    .option('-n, --notes <text>', 'Notes about the target')
    .action(run(async (type: string, value: string, options: { notes?: string }) => {
        await projectTargetCommand(resolveWorkspaceRoot(), type, value, options);
    }));
