export type CsvCell = string | number | boolean | null | undefined;

export function escapeCsvCell(value: CsvCell): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** RFC 4180 style, CRLF line endings, trailing newline. */
export function toCsv(header: string[], rows: CsvCell[][]): string {
    return [header, ...rows].map(row => row.map(escapeCsvCell).join(',')).join('\r\n') + '\r\n';
}

export type ExportFormat = 'json' | 'csv';

export function isExportFormat(value: string): value is ExportFormat {
    return value === 'json' || value === 'csv';
}
