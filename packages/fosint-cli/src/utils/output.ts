import path from 'path';
import fs from 'fs-extra';
import chalk from 'chalk';
import { ValidationError, isExportFormat, type ExportFormat } from '@fosint/core';

export function parseExportFormat(value: string | undefined): ExportFormat | undefined {
    if (value === undefined) return undefined;
    if (!isExportFormat(value)) {
        throw new ValidationError(`Unknown format "${value}" (expected json or csv)`);
    }
    return value;
}

/** An export without `--output` owns stdout; the human listing is left out. */
export function exportsToStdout(format: string | undefined, output?: string): boolean {
    return format !== undefined && !output;
}

/** Write an export to `output` (relative to the workspace) or print it. */
export async function emit(content: string, root: string, output?: string): Promise<void> {
    if (!output) {
        console.log(content);
        return;
    }
    const target = path.resolve(root, output);
    await fs.outputFile(target, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
    console.log(chalk.green(`✓ Written to ${path.relative(root, target) || target}`));
}

export function parsePositiveInt(value: string, name: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new ValidationError(`${name} must be a positive integer, got "${value}"`);
    }
    return parsed;
}
