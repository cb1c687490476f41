import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { ResultRecord } from '../types.js';

/** Report columns, in output order */
export const CSV_COLUMNS = [
  'path',
  'size_bytes',
  'current_ext',
  'detected_ext',
  'detected_mime',
  'confidence',
  'is_match',
  'action',
  'new_path',
  'error',
  'reason',
] as const;

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a field when it contains a comma, quote, CR or LF (RFC 4180)
 */
export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvRow(record: ResultRecord): string[] {
  return [
    record.path,
    String(record.sizeBytes),
    record.currentExt,
    record.detectedExt,
    record.detectedMime,
    record.confidence.toFixed(2),
    String(record.isMatch),
    record.action,
    record.newPath,
    record.error,
    record.reason,
  ];
}

/**
 * Render the header and one line per record, CRLF-terminated
 */
export function toCsv(records: readonly ResultRecord[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const record of records) {
    lines.push(toCsvRow(record).map(escapeCsvField).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

/**
 * Write the report, creating parent directories as needed
 */
export async function writeCsvReport(path: string, records: readonly ResultRecord[]): Promise<string> {
  const abs = resolve(path);
  await mkdir(dirname(abs), { recursive: true });
  await writeFile(abs, toCsv(records), 'utf-8');
  return abs;
}
