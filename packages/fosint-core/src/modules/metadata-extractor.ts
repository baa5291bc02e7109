import fs from 'fs-extra';
import path from 'path';
import { createHash } from 'crypto';
import { open } from 'fs/promises';
import { parse as parseExif } from 'exifr';
import { imageSize } from 'image-size';
import mime from 'mime-types';
import { OsintModule, type ModuleContext } from './base.js';
import { Logger } from '../utils/logger.js';
import { NotFoundError, errorMessage } from '../utils/errors.js';
import { asNumber, asString, isRecord, type JsonRecord } from '../utils/guards.js';

export const VIRUSTOTAL_API = 'https://www.virustotal.com/api/v3';

export type FileCategory = 'image' | 'document' | 'archive' | 'media' | 'unknown';

type KnownCategory = Exclude<FileCategory, 'unknown'>;

export const SUPPORTED_TYPES: Record<KnownCategory, string[]> = {
    image: ['.jpg', '.jpeg', '.png', '.tiff', '.bmp', '.gif'],
    document: ['.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx'],
    archive: ['.zip', '.rar', '.7z', '.tar', '.gz'],
    media: ['.mp3', '.mp4', '.avi', '.mov', '.wav', '.flac'],
};

const SIGNATURES: Array<[Buffer, string]> = [
    [Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]), 'PNG Image'],
    [Buffer.from([0xff, 0xd8, 0xff]), 'JPEG Image'],
    [Buffer.from('GIF87a', 'latin1'), 'GIF Image'],
    [Buffer.from('GIF89a', 'latin1'), 'GIF Image'],
    [Buffer.from('%PDF', 'latin1'), 'PDF Document'],
    [Buffer.from([0x50, 0x4b, 0x03, 0x04]), 'ZIP Archive'],
    [Buffer.from('Rar!', 'latin1'), 'RAR Archive'],
    [Buffer.from([0x7f, 0x45, 0x4c, 0x46]), 'ELF Executable'],
    [Buffer.from('MZ', 'latin1'), 'Windows Executable'],
];

const PDF_INFO_KEYS = ['Title', 'Author', 'Subject', 'Keywords', 'Creator', 'Producer', 'CreationDate', 'ModDate'];
const ZIP_LISTING_LIMIT = 20;
const PREVIEW_LENGTH = 200;

export interface GpsInfo {
    latitude: number;
    longitude: number;
    coordinates: string;
    altitude?: number;
}

export type ExifValue = string | number;

export interface ImageDetails {
    kind: 'image';
    dimensions: string;
    format: string;
    dateTaken?: string;
    cameraMake?: string;
    cameraModel?: string;
    software?: string;
    gps?: GpsInfo;
    exif: Record<string, ExifValue>;
}

export interface DocumentDetails {
    kind: 'document';
    pdfVersion?: string;
    pageCount?: number;
    info: Record<string, string>;
    note?: string;
}

export interface ArchiveEntry {
    filename: string;
    fileSize: number;
    compressSize: number;
    dateTime: string;
}

export interface ArchiveDetails {
    kind: 'archive';
    fileCount: number;
    totalUncompressedSize: number;
    compressionRatio: number;
    files: ArchiveEntry[];
    note?: string;
}

export interface BasicDetails {
    kind: 'basic';
    fileSignature: string;
    identifiedType?: string;
    appearsToBeText: boolean;
    textPreview?: string;
}

export interface NoteDetails {
    kind: 'note';
    note: string;
}

export interface ErrorDetails {
    kind: 'error';
    error: string;
}

export type MetadataDetails = ImageDetails | DocumentDetails | ArchiveDetails | BasicDetails | NoteDetails | ErrorDetails;

export interface FileMetadata {
    filename: string;
    filePath: string;
    fileSize: number;
    fileType: FileCategory;
    mimeType: string;
    createdDate: string;
    modifiedDate: string;
    accessedDate: string;
    metadata: MetadataDetails;
}

export type RiskLevel = 'low' | 'medium' | 'high';

export interface PrivacyAnalysis {
    riskLevel: RiskLevel;
    privacyConcerns: string[];
    sensitiveDataFound: string[];
    recommendations: string[];
}

export interface FileReputation {
    sha256: string;
    found: boolean;
    malicious: number;
    suspicious: number;
    harmless: number;
    undetected: number;
    reputation: number;
    typeDescription: string;
    meaningfulName: string;
    permalink: string;
}

export type MetadataExportFormat = 'json' | 'text';

export function getFileCategory(fileName: string): FileCategory {
    const ext = path.extname(fileName).toLowerCase();
    const categories: KnownCategory[] = ['image', 'document', 'archive', 'media'];
    return categories.find(category => SUPPORTED_TYPES[category].includes(ext)) ?? 'unknown';
}

export function identifyBySignature(signature: Buffer): string | undefined {
    for (const [magic, label] of SIGNATURES) {
        if (signature.length >= magic.length && signature.subarray(0, magic.length).equals(magic)) {
            return label;
        }
    }
    return undefined;
}

function exifValue(value: unknown): ExifValue | undefined {
    if (typeof value === 'string') return value.replace(/\0+$/, '').trim();
    if (typeof value === 'number') return value;
    if (value instanceof Date) return isNaN(value.getTime()) ? undefined : value.toISOString();
    if (value instanceof Uint8Array) return `<${value.length} bytes>`;
    if (Array.isArray(value) && value.every(item => typeof item === 'number')) return value.join(', ');
    return undefined;
}

/** Flatten exifr output into printable tag values and pick out the fields that matter for privacy. */
export function interpretExif(tags: JsonRecord): Omit<ImageDetails, 'kind' | 'dimensions' | 'format'> {
    const exif: Record<string, ExifValue> = {};
    for (const [tag, raw] of Object.entries(tags)) {
        const value = exifValue(raw);
        if (value !== undefined && value !== '') exif[tag] = value;
    }

    const details: Omit<ImageDetails, 'kind' | 'dimensions' | 'format'> = { exif };
    const taken = exif.DateTimeOriginal ?? exif.ModifyDate;
    if (taken !== undefined) details.dateTaken = String(taken);
    if (typeof exif.Make === 'string') details.cameraMake = exif.Make;
    if (typeof exif.Model === 'string') details.cameraModel = exif.Model;
    if (typeof exif.Software === 'string') details.software = exif.Software;

    if (typeof tags.latitude === 'number' && typeof tags.longitude === 'number') {
        const gps: GpsInfo = {
            latitude: tags.latitude,
            longitude: tags.longitude,
            coordinates: `${tags.latitude}, ${tags.longitude}`,
        };
        if (tags.GPSAltitude !== undefined) {
            const altitude = asNumber(tags.GPSAltitude);
            gps.altitude = tags.GPSAltitudeRef === 1 ? -altitude : altitude;
        }
        details.gps = gps;
    }
    return details;
}

function dosDateTime(date: number, time: number): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    const year = (date >> 9) + 1980;
    const month = (date >> 5) & 0x0f;
    const day = date & 0x1f;
    return `${year}-${pad(month)}-${pad(day)} ${pad(time >> 11)}:${pad((time >> 5) & 0x3f)}:${pad((time & 0x1f) * 2)}`;
}

/** Reads the central directory of a ZIP archive; does not inflate anything. */
export function parseZipDirectory(buffer: Buffer): ArchiveDetails {
    const searchStart = Math.max(0, buffer.length - 0xffff - 22);
    let eocd = -1;
    for (let i = buffer.length - 22; i >= searchStart; i--) {
        if (buffer.readUInt32LE(i) === 0x06054b50) {
            eocd = i;
            break;
        }
    }
    if (eocd < 0) {
        throw new Error('End of central directory not found');
    }

    const total = buffer.readUInt16LE(eocd + 10);
    let offset = buffer.readUInt32LE(eocd + 16);
    const entries: ArchiveEntry[] = [];
    for (let i = 0; i < total; i++) {
        if (offset + 46 > buffer.length || buffer.readUInt32LE(offset) !== 0x02014b50) {
            throw new Error(`Corrupt central directory entry ${i}`);
        }
        const nameLength = buffer.readUInt16LE(offset + 28);
        const extraLength = buffer.readUInt16LE(offset + 30);
        const commentLength = buffer.readUInt16LE(offset + 32);
        entries.push({
            filename: buffer.toString('utf8', offset + 46, offset + 46 + nameLength),
            fileSize: buffer.readUInt32LE(offset + 24),
            compressSize: buffer.readUInt32LE(offset + 20),
            dateTime: dosDateTime(buffer.readUInt16LE(offset + 14), buffer.readUInt16LE(offset + 12)),
        });
        offset += 46 + nameLength + extraLength + commentLength;
    }

    const uncompressed = entries.reduce((sum, e) => sum + e.fileSize, 0);
    const compressed = entries.reduce((sum, e) => sum + e.compressSize, 0);
    const details: ArchiveDetails = {
        kind: 'archive',
        fileCount: entries.length,
        totalUncompressedSize: uncompressed,
        compressionRatio: uncompressed > 0 ? compressed / uncompressed : 0,
        files: entries.slice(0, ZIP_LISTING_LIMIT),
    };
    if (entries.length > ZIP_LISTING_LIMIT) {
        details.note = `Showing first ${ZIP_LISTING_LIMIT} files out of ${entries.length} total files`;
    }
    return details;
}

function decodePdfLiteral(raw: string): string {
    const unescaped = raw.replace(/\\([nrtbf()\\]|[0-7]{1,3})/g, (_, esc: string) => {
        switch (esc) {
            case 'n': return '\n';
            case 'r': return '\r';
            case 't': return '\t';
            case 'b': return '\b';
            case 'f': return '\f';
            case '(': case ')': case '\\': return esc;
            default: return String.fromCharCode(parseInt(esc, 8));
        }
    });
    if (unescaped.startsWith('\u00fe\u00ff') && unescaped.length % 2 === 0) {
        return Buffer.from(unescaped.slice(2), 'latin1').swap16().toString('utf16le');
    }
    return unescaped;
}

function decodePdfHex(hex: string): string {
    const clean = hex.replace(/\s+/g, '');
    const bytes = Buffer.from(clean.length % 2 ? `${clean}0` : clean, 'hex');
    if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
        const body = Buffer.from(bytes.subarray(2));
        return body.length % 2 === 0 ? body.swap16().toString('utf16le') : body.toString('latin1');
    }
    return bytes.toString('latin1');
}

/** `D:YYYYMMDDHHmmSS` PDF dates become ISO-like strings; anything else is kept. */
export function formatPdfDate(value: string): string {
    const match = /^D:(\d{4})(\d{2})?(\d{2})?(\d{2})?(\d{2})?(\d{2})?/.exec(value);
    if (!match) return value;
    const [, year, month = '01', day = '01', hour = '00', minute = '00', second = '00'] = match;
    return `${year}-${month}-${day}T${hour}:${minute}:${second}`;
}

function readPdfDictionary(text: string, start: number): string {
    let depth = 0;
    for (let i = start; i < text.length - 1; i++) {
        if (text[i] === '<' && text[i + 1] === '<') {
            depth++;
            i++;
        } else if (text[i] === '>' && text[i + 1] === '>') {
            depth--;
            i++;
            if (depth === 0) return text.slice(start, i + 1);
        }
    }
    return text.slice(start);
}

/**
 * Version, page count and the document information dictionary of an
 * uncompressed PDF trailer. Info dictionaries inside object streams are not
 * reached.
 */
export function parsePdfInfo(buffer: Buffer): DocumentDetails {
    const text = buffer.toString('latin1');
    const details: DocumentDetails = { kind: 'document', info: {} };
    const version = /^%PDF-(\d\.\d)/.exec(text);
    if (version) details.pdfVersion = version[1];
    details.pageCount = (text.match(/\/Type\s*\/Page(?![a-zA-Z])/g) ?? []).length;

    let dictionary = '';
    const infoRefs = [...text.matchAll(/\/Info\s+(\d+)\s+(\d+)\s+R/g)];
    const infoRef = infoRefs[infoRefs.length - 1];
    if (infoRef) {
        const objectStart = text.search(new RegExp(`(^|\\s)${infoRef[1]}\\s+${infoRef[2]}\\s+obj`));
        const dictStart = objectStart >= 0 ? text.indexOf('<<', objectStart) : -1;
        if (dictStart >= 0) dictionary = readPdfDictionary(text, dictStart);
    }
    if (!dictionary) {
        details.note = 'No document information dictionary found';
        return details;
    }

    for (const key of PDF_INFO_KEYS) {
        const literal = new RegExp(`/${key}\\s*\\(((?:\\\\.|[^\\\\)])*)\\)`).exec(dictionary);
        const hex = literal ? null : new RegExp(`/${key}\\s*<([0-9A-Fa-f\\s]*)>`).exec(dictionary);
        let value: string | undefined;
        if (literal) value = decodePdfLiteral(literal[1]);
        else if (hex) value = decodePdfHex(hex[1]);
        if (value === undefined || value === '') continue;
        details.info[key] = key.endsWith('Date') ? formatPdfDate(value) : value;
    }
    return details;
}

export function basicDetails(sample: Buffer): BasicDetails {
    const details: BasicDetails = {
        kind: 'basic',
        fileSignature: sample.subarray(0, 16).toString('hex'),
        appearsToBeText: false,
    };
    const identified = identifyBySignature(sample);
    if (identified) details.identifiedType = identified;

    if (!sample.includes(0)) {
        const preview = sample.toString('utf8');
        if (preview.trim()) {
            details.appearsToBeText = true;
            details.textPreview = preview.length > PREVIEW_LENGTH ? `${preview.slice(0, PREVIEW_LENGTH)}...` : preview;
        }
    }
    return details;
}

/**
 * JPEG with every APP1-APP15 and COM segment removed. APP0 (JFIF) and the
 * image data are kept byte for byte. Null when the buffer is not a JPEG.
 */
export function stripJpegMetadata(buffer: Buffer): Buffer | null {
    if (buffer.length < 4 || buffer[0] !== 0xff || buffer[1] !== 0xd8) return null;
    const kept: Buffer[] = [buffer.subarray(0, 2)];
    let offset = 2;

    while (offset + 4 <= buffer.length) {
        if (buffer[offset] !== 0xff) return null;
        const marker = buffer[offset + 1];
        if (marker === 0xda) {
            kept.push(buffer.subarray(offset));
            return Buffer.concat(kept);
        }
        const length = buffer.readUInt16BE(offset + 2);
        const end = offset + 2 + length;
        if (end > buffer.length) return null;
        const isMetadata = (marker >= 0xe1 && marker <= 0xef) || marker === 0xfe;
        if (!isMetadata) kept.push(buffer.subarray(offset, end));
        offset = end;
    }
    kept.push(buffer.subarray(offset));
    return Buffer.concat(kept);
}

export function analyzePrivacyRisk(file: FileMetadata): PrivacyAnalysis {
    const analysis: PrivacyAnalysis = {
        riskLevel: 'low',
        privacyConcerns: [],
        sensitiveDataFound: [],
        recommendations: [],
    };
    const details = file.metadata;

    if (details.kind === 'image') {
        if (details.gps) {
            analysis.privacyConcerns.push('GPS coordinates found');
            analysis.sensitiveDataFound.push(`Location: ${details.gps.coordinates}`);
            analysis.recommendations.push('Remove GPS data before sharing');
        }
        if (details.cameraMake || details.cameraModel) {
            analysis.privacyConcerns.push('Camera information found');
            analysis.recommendations.push('Consider removing camera metadata');
        }
        if (details.software) {
            analysis.privacyConcerns.push('Software information found');
            analysis.sensitiveDataFound.push(`Software: ${details.software}`);
        }
    }
    if (details.kind === 'document') {
        if (details.info.Author) {
            analysis.privacyConcerns.push('Author information found');
            analysis.sensitiveDataFound.push(`Author: ${details.info.Author}`);
        }
        const tool = details.info.Producer ?? details.info.Creator;
        if (tool) {
            analysis.privacyConcerns.push('Software information found');
            analysis.sensitiveDataFound.push(`Software: ${tool}`);
        }
    }
    if (file.createdDate) {
        analysis.sensitiveDataFound.push(`Created: ${file.createdDate}`);
    }

    const hasGps = details.kind === 'image' && details.gps !== undefined;
    if (hasGps || analysis.privacyConcerns.length >= 3) {
        analysis.riskLevel = 'high';
    } else if (analysis.privacyConcerns.length >= 1) {
        analysis.riskLevel = 'medium';
    }
    return analysis;
}

function describe(value: unknown): string {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
        ? String(value)
        : JSON.stringify(value);
}

export function exportMetadata(file: FileMetadata, format: MetadataExportFormat): string {
    if (format === 'json') {
        return JSON.stringify(file, null, 2);
    }
    const lines = [
        `File: ${file.filename}`,
        `Size: ${file.fileSize} bytes`,
        `Type: ${file.fileType}`,
        `MIME Type: ${file.mimeType}`,
        `Created: ${file.createdDate}`,
        `Modified: ${file.modifiedDate}`,
        `Accessed: ${file.accessedDate}`,
        '',
        'Metadata:',
    ];
    for (const [key, value] of Object.entries(file.metadata)) {
        if (key === 'kind') continue;
        lines.push(`  ${key}: ${describe(value)}`);
    }
    return lines.join('\n');
}

export interface MetadataExtractorOptions extends ModuleContext {
    virustotalApiKey?: string;
}

export class MetadataExtractor extends OsintModule {
    private readonly virustotalApiKey?: string;

    constructor(options: MetadataExtractorOptions) {
        super('metadata-extractor', 'Metadata Extractor', options);
        this.virustotalApiKey = options.virustotalApiKey;
    }

    async extract(filePath: string): Promise<FileMetadata> {
        if (!(await fs.pathExists(filePath))) {
            throw new NotFoundError(`File not found: ${filePath}`);
        }
        const stat = await fs.stat(filePath);
        const filename = path.basename(filePath);
        const created = stat.birthtimeMs > 0 ? stat.birthtime : stat.ctime;
        const file: FileMetadata = {
            filename,
            filePath: path.resolve(filePath),
            fileSize: stat.size,
            fileType: getFileCategory(filename),
            mimeType: mime.lookup(filename) || 'unknown',
            createdDate: created.toISOString(),
            modifiedDate: stat.mtime.toISOString(),
            accessedDate: stat.atime.toISOString(),
            metadata: { kind: 'note', note: '' },
        };

        try {
            file.metadata = await this.extractDetails(filePath, file.fileType);
        } catch (error) {
            Logger.warn(`Error extracting metadata from ${filename}: ${errorMessage(error)}`);
            file.metadata = { kind: 'error', error: errorMessage(error) };
        }
        return file;
    }

    private async extractDetails(filePath: string, category: FileCategory): Promise<MetadataDetails> {
        const ext = path.extname(filePath).toLowerCase();
        switch (category) {
            case 'image':
                return this.extractImage(await fs.readFile(filePath));
            case 'document':
                if (ext === '.pdf') return parsePdfInfo(await fs.readFile(filePath));
                return { kind: 'note', note: `Document metadata extraction not implemented for ${ext}` };
            case 'archive':
                if (ext === '.zip') return parseZipDirectory(await fs.readFile(filePath));
                return { kind: 'note', note: `Archive metadata extraction not implemented for ${ext}` };
            case 'media':
                return { kind: 'note', note: `Media metadata extraction not implemented for ${ext}` };
            default:
                return basicDetails(await this.readHead(filePath, 500));
        }
    }

    private async readHead(filePath: string, bytes: number): Promise<Buffer> {
        const handle = await open(filePath, 'r');
        try {
            const buffer = Buffer.alloc(bytes);
            const { bytesRead } = await handle.read(buffer, 0, bytes, 0);
            return buffer.subarray(0, bytesRead);
        } finally {
            await handle.close();
        }
    }

    private async extractImage(buffer: Buffer): Promise<ImageDetails> {
        const size = imageSize(buffer);
        const details: ImageDetails = {
            kind: 'image',
            dimensions: `${size.width ?? 0}x${size.height ?? 0}`,
            format: (size.type ?? 'unknown').toUpperCase(),
            exif: {},
        };

        let tags: unknown;
        try {
            tags = await parseExif(buffer, { tiff: true, exif: true, gps: true, translateValues: false });
        } catch (error) {
            Logger.debug(`No EXIF block: ${errorMessage(error)}`);
            return details;
        }
        return isRecord(tags) ? { ...details, ...interpretExif(tags) } : details;
    }

    /** Strip JPEG metadata into `outputPath` (in place by default). False for other formats. */
    async removeMetadata(filePath: string, outputPath: string = filePath): Promise<boolean> {
        const ext = path.extname(filePath).toLowerCase();
        if (ext !== '.jpg' && ext !== '.jpeg') {
            Logger.warn(`Metadata removal not implemented for ${ext || 'extension-less'} files`);
            return false;
        }
        const stripped = stripJpegMetadata(await fs.readFile(filePath));
        if (!stripped) {
            Logger.warn(`${path.basename(filePath)} is not a well-formed JPEG`);
            return false;
        }
        await fs.writeFile(outputPath, stripped);
        return true;
    }

    async sha256(filePath: string): Promise<string> {
        return createHash('sha256').update(await fs.readFile(filePath)).digest('hex');
    }

    /** VirusTotal verdict for the file's SHA-256; null without an API key or on failure. */
    async checkReputation(filePath: string): Promise<FileReputation | null> {
        if (!this.virustotalApiKey) {
            Logger.warn('No VirusTotal API key configured; set one with `fosint settings set-key virustotal <key>`');
            return null;
        }
        const sha256 = await this.sha256(filePath);
        const reputation: FileReputation = {
            sha256,
            found: false,
            malicious: 0,
            suspicious: 0,
            harmless: 0,
            undetected: 0,
            reputation: 0,
            typeDescription: '',
            meaningfulName: '',
            permalink: `https://www.virustotal.com/gui/file/${sha256}`,
        };

        const response = await this.fetch(`${VIRUSTOTAL_API}/files/${sha256}`, {
            headers: { 'x-apikey': this.virustotalApiKey, 'Accept': 'application/json' },
        });
        if (!response) return null;
        if (response.status === 404) return reputation;
        if (!response.ok) {
            Logger.warn(`[${this.id}] VirusTotal answered HTTP ${response.status}`);
            return null;
        }

        let body: unknown;
        try {
            body = JSON.parse(response.body);
        } catch {
            Logger.warn(`[${this.id}] VirusTotal returned invalid JSON`);
            return null;
        }
        const attributes: JsonRecord = isRecord(body) && isRecord(body.data) && isRecord(body.data.attributes) ? body.data.attributes : {};
        const stats: JsonRecord = isRecord(attributes.last_analysis_stats) ? attributes.last_analysis_stats : {};
        return {
            ...reputation,
            found: true,
            malicious: asNumber(stats.malicious),
            suspicious: asNumber(stats.suspicious),
            harmless: asNumber(stats.harmless),
            undetected: asNumber(stats.undetected),
            reputation: asNumber(attributes.reputation),
            typeDescription: asString(attributes.type_description),
            meaningfulName: asString(attributes.meaningful_name),
        };
    }
}
