import path from 'path';
import chalk from 'chalk';
import { ReportFormatSchema, ValidationError } from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';

export async function reportGenerateCommand(root: string, options: { format?: string; author?: string } = {}, overrides: ContextOverrides = {}): Promise<void> {
    const format = ReportFormatSchema.safeParse(options.format ?? 'md');
    if (!format.success) {
        throw new ValidationError(`Unknown report format "${options.format ?? ''}" (expected md or pdf)`);
    }
    const ctx = await CliContext.open(root, overrides);
    const user = ctx.requireUser();
    const { path: reportPath } = await ctx.reports().generate(format.data, { author: options.author ?? user.username });
    console.log(ctx.ui.success(`✓ Report written to ${path.relative(root, reportPath)}`));
    console.log(chalk.dim(`  Recorded in project "${ctx.projects.currentProject?.name ?? ''}"`));
}
