import { Command } from 'commander';
import path from 'path';
import chalk from 'chalk';
import {
    ValidationError,
    analyzePrivacyRisk,
    exportMetadata,
    resolveWorkspaceRoot,
    type FileMetadata,
    type MetadataDetails,
    type MetadataExportFormat,
    type RiskLevel,
} from '@fosint/core';
import { CliContext, type ContextOverrides } from '../utils/context.js';
import { run } from '../utils/errors.js';
import { emit } from '../utils/output.js';
import { severityColor } from '../utils/theme.js';

function parseMetadataFormat(value: string | undefined): MetadataExportFormat | undefined {
    if (value === undefined) return undefined;
    if (value !== 'json' && value !== 'text') {
        throw new ValidationError(`Unknown format "${value}" (expected json or text)`);
    }
    return value;
}

function detailLines(details: MetadataDetails): string[] {
    switch (details.kind) {
        case 'image': {
            const lines = [`Image: ${details.format} ${details.dimensions}`];
            if (details.cameraMake || details.cameraModel) lines.push(`Camera: ${[details.cameraMake, details.cameraModel].filter(Boolean).join(' ')}`);
            if (details.software) lines.push(`Software: ${details.software}`);
            if (details.dateTaken) lines.push(`Taken: ${details.dateTaken}`);
            if (details.gps) lines.push(`GPS: ${details.gps.coordinates}${details.gps.altitude !== undefined ? ` (${details.gps.altitude} m)` : ''}`);
            lines.push(`EXIF tags: ${Object.keys(details.exif).length}`);
            return lines;
        }
        case 'document': {
            const lines: string[] = [];
            if (details.pdfVersion) lines.push(`PDF version: ${details.pdfVersion}`);
            if (details.pageCount !== undefined) lines.push(`Pages: ${details.pageCount}`);
            for (const [key, value] of Object.entries(details.info)) lines.push(`${key}: ${value}`);
            if (details.note) lines.push(details.note);
            return lines;
        }
        case 'archive': {
            const lines = [
                `Entries: ${details.fileCount}`,
                `Uncompressed: ${details.totalUncompressedSize} bytes (ratio ${details.compressionRatio})`,
            ];
            for (const entry of details.files) lines.push(`  ${entry.filename} ${entry.fileSize}B ${entry.dateTime}`);
            if (details.note) lines.push(details.note);
            return lines;
        }
        case 'basic': {
            const lines = [`Signature: ${details.fileSignature}`];
            if (details.identifiedType) lines.push(`Identified as: ${details.identifiedType}`);
            if (details.textPreview) lines.push(`Preview: ${details.textPreview}`);
            return lines;
        }
        case 'note':
            return [details.note];
        case 'error':
            return [`Extraction failed: ${details.error}`];
    }
}

const RISK_FINDING: Record<RiskLevel, 'high' | 'medium' | 'info'> = {
    high: 'high',
    medium: 'medium',
    low: 'info',
};

function printFile(ctx: CliContext, file: FileMetadata): void {
    const privacy = analyzePrivacyRisk(file);
    console.log(ctx.ui.heading(file.filename));
    console.log(ctx.ui.muted(`  ${file.fileType} · ${file.mimeType} · ${file.fileSize} bytes · modified ${file.modifiedDate}`));
    for (const line of detailLines(file.metadata)) {
        console.log(`  ${line}`);
    }
    console.log(`  Privacy risk: ${severityColor(ctx.ui, privacy.riskLevel)(privacy.riskLevel.toUpperCase())}`);
    for (const concern of privacy.privacyConcerns) {
        console.log(ctx.ui.warning(`    ! ${concern}`));
    }
    for (const recommendation of privacy.recommendations) {
        console.log(ctx.ui.muted(`    → ${recommendation}`));
    }
}

/** One JSON document (an array for several files) or text blocks separated by a blank line. */
export function exportMetadataList(files: FileMetadata[], format: MetadataExportFormat): string {
    if (format === 'json' && files.length > 1) {
        return JSON.stringify(files, null, 2);
    }
    return files.map(file => exportMetadata(file, format)).join('\n\n');
}

export async function metadataExtractCommand(root: string, files: string[], options: { format?: string; output?: string } = {}, overrides: ContextOverrides = {}): Promise<void> {
    const format = parseMetadataFormat(options.format);
    const ctx = await CliContext.open(root, overrides);
    const extractor = ctx.metadataExtractor();

    const extracted: FileMetadata[] = [];
    for (const file of files) {
        const metadata = await extractor.extract(path.resolve(root, file));
        extracted.push(metadata);
        if (!format) printFile(ctx, metadata);
        const privacy = analyzePrivacyRisk(metadata);
        await ctx.record('metadata-extractor', metadata.filename, 1, privacy.privacyConcerns.length === 0 ? [] : [{
            module: 'metadata-extractor',
            title: `${metadata.filename}: ${privacy.privacyConcerns.join('; ')}`,
            target: metadata.filename,
            severity: RISK_FINDING[privacy.riskLevel],
            details: { concerns: privacy.privacyConcerns, sensitive: privacy.sensitiveDataFound },
        }]);
    }
    if (format) {
        await emit(exportMetadataList(extracted, format), root, options.output);
    }
}

export async function metadataStripCommand(root: string, file: string, options: { output?: string } = {}, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const source = path.resolve(root, file);
    const target = options.output ? path.resolve(root, options.output) : source;
    const stripped = await ctx.metadataExtractor().removeMetadata(source, target);
    if (!stripped) {
        throw new ValidationError(`Could not strip metadata from ${file}; only JPEG images are supported`);
    }
    console.log(ctx.ui.success(`✓ Metadata removed${target === source ? '' : `, written to ${path.relative(root, target)}`}`));
}

export async function metadataReputationCommand(root: string, file: string, overrides: ContextOverrides = {}): Promise<void> {
    const ctx = await CliContext.open(root, overrides);
    const reputation = await ctx.metadataExtractor().checkReputation(path.resolve(root, file));
    if (!reputation) {
        console.log(chalk.dim('No reputation data available.'));
        return;
    }
    console.log(`${chalk.bold(path.basename(file))} ${ctx.ui.muted(reputation.sha256)}`);
    if (!reputation.found) {
        console.log(ctx.ui.muted('  Not known to VirusTotal'));
    } else {
        const verdict = reputation.malicious > 0 ? ctx.ui.danger : reputation.suspicious > 0 ? ctx.ui.warning : ctx.ui.success;
        console.log(`  ${verdict(`${reputation.malicious} malicious, ${reputation.suspicious} suspicious`)}, ${reputation.harmless} harmless, ${reputation.undetected} undetected`);
        if (reputation.typeDescription) console.log(`  Type: ${reputation.typeDescription}`);
        if (reputation.meaningfulName) console.log(`  Name: ${reputation.meaningfulName}`);
    }
    console.log(ctx.ui.muted(`  ${reputation.permalink}`));

    await ctx.record('metadata-extractor', `reputation:${reputation.sha256}`, reputation.found ? 1 : 0, reputation.malicious > 0 ? [{
        module: 'metadata-extractor',
        title: `${path.basename(file)} flagged by ${reputation.malicious} engine(s)`,
        target: reputation.sha256,
        severity: 'high',
        details: { malicious: reputation.malicious, suspicious: reputation.suspicious },
    }] : []);
}

export const metadataCommand = new Command('metadata')
    .description('Extract, strip and check file metadata')
    .addHelpText('after', `
Examples:
  $ fosint metadata extract photo.jpg report.pdf
  $ fosint metadata extract photo.jpg -f json -o photo.json
  $ fosint metadata strip photo.jpg -o clean.jpg
    `);

metadataCommand
    .command('extract')
    .description('Show metadata and privacy risks of files')
    .argument('<files...>', 'Files to inspect')
    .option('-f, --format <format>', 'Export as json or text')
    .option('-o, --output <file>', 'Write the export to a file')
    .action(run(async (files: string[], options: { format?: string; output?: string }) => {
        await metadataExtractCommand(resolveWorkspaceRoot(), files, options);
    }));

metadataCommand
    .command('strip')
    .description('Remove EXIF and other metadata segments from a JPEG')
    .argument('<file>', 'JPEG file')
    .option('-o, --output <file>', 'Write the cleaned copy here instead of in place')
    .action(run(async (file: string, options: { output?: string }) => {
        await metadataStripCommand(resolveWorkspaceRoot(), file, options);
    }));

metadataCommand
    .command('reputation')
    .description('Look up a file hash on VirusTotal')
    .argument('<file>', 'File to hash')
    .action(run(async (file: string) => {
        await metadataReputationCommand(resolveWorkspaceRoot(), file);
    }));
