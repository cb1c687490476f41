/**
 * Batch / directory scanning for Node.js environments.
 *
 * Provides scanPath() and scanFiles() which walk all files, sniff each
 * one, decide on an action, optionally move mismatched files, and return
 * one ResultRecord per file.
 */

import { existsSync } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { decide } from '../decide.js';
import { Sniffer } from '../detect.js';
import { ReadError, formatError } from '../errors.js';
import { buildErrorRecord, buildRecord } from '../record.js';
import { FileSource, extensionOf } from '../source.js';
import type { DetectionResult, ResultRecord, ScanOptions, ScanResult, ScanSummary } from '../types.js';
import { moveExclusive } from './move.js';

// ─── File collection ──────────────────────────────────────────────────────────

/**
 * Collect all regular files under a directory. Symbolic links are not
 * followed.
 */
export async function collectFiles(dir: string, recursive = true): Promise<string[]> {
  const results: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (recursive) {
        results.push(...(await collectFiles(fullPath, recursive)));
      }
    } else if (entry.isFile()) {
      results.push(fullPath);
    }
  }

  return results;
}

// ─── Single-file pipeline ─────────────────────────────────────────────────────

interface ScanContext {
  sniffer: Sniffer;
  options: ScanOptions;
  /** Rename targets claimed by this batch and not yet visible on disk */
  reserved: Set<string>;
}

async function sizeOrZero(source: FileSource): Promise<number> {
  try {
    return await source.size();
  } catch {
    return 0;
  }
}

async function scanSingleFile(path: string, ctx: ScanContext): Promise<ResultRecord> {
  const source = new FileSource(path);
  const currentExt = source.extension();

  let detection: DetectionResult | ReadError;
  try {
    detection = await ctx.sniffer.detectSource(source);
  } catch (err) {
    if (!(err instanceof ReadError)) throw err;
    detection = err;
  }
  const sizeBytes = await sizeOrZero(source);

  // No await between deciding and reserving the target
  const verdict = decide(
    { path, currentExt, detection },
    {
      renameEnabled: ctx.options.rename === true,
      minConfidence: ctx.options.minConfidence ?? 0,
      families: ctx.sniffer.families,
      pathExists: p => ctx.reserved.has(p) || existsSync(p),
    },
  );

  if (verdict.newPath !== undefined) {
    ctx.reserved.add(verdict.newPath);
  }

  const record = buildRecord({ path, sizeBytes, currentExt, detection, verdict });

  if (verdict.action === 'rename' && verdict.newPath !== undefined) {
    const target = verdict.newPath;
    try {
      await moveExclusive(path, target);
    } catch (err) {
      ctx.reserved.delete(target);
      return { ...record, action: 'error', newPath: '', error: formatError(err), reason: 'rename-failed' };
    }
  }

  return record;
}

// ─── Concurrency helper ───────────────────────────────────────────────────────

async function runConcurrent<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next++];
      if (item === undefined) break;
      results.push(await fn(item));
    }
  };

  await Promise.all(Array.from({ length: concurrency }, worker));
  return results;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Counters over a set of records
 */
export function summarize(records: readonly ResultRecord[]): ScanSummary {
  return {
    total: records.length,
    mismatches: records.filter(r => !r.isMatch && r.action !== 'error').length,
    renamed: records.filter(r => r.action === 'rename').length,
    errors: records.filter(r => r.action === 'error').length,
  };
}

/**
 * Scan an explicit list of file paths.
 *
 * One file's failure never stops the batch: it becomes a record with
 * `action: 'error'`. Records are returned sorted by path.
 */
export async function scanFiles(
  filePaths: readonly string[],
  options: ScanOptions = {},
  sniffer: Sniffer = new Sniffer(),
): Promise<ScanResult> {
  const ctx: ScanContext = { sniffer, options, reserved: new Set() };
  const concurrency = Math.max(1, options.concurrency ?? 4);

  const records = await runConcurrent(
    filePaths.map(f => resolve(f)),
    concurrency,
    async file => {
      let record: ResultRecord;
      try {
        record = await scanSingleFile(file, ctx);
      } catch (err) {
        record = buildErrorRecord(file, 0, extensionOf(file), err, 'internal-error');
      }
      options.onRecord?.(record);
      return record;
    },
  );

  records.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { records, summary: summarize(records) };
}

/**
 * Expand files and directories into a de-duplicated list of absolute
 * file paths.
 *
 * @throws when an input does not exist
 */
export async function expandInputs(inputs: readonly string[], recursive = true): Promise<string[]> {
  const files = new Set<string>();
  for (const input of inputs) {
    const abs = resolve(input);
    const info = await stat(abs);
    const found = info.isDirectory() ? await collectFiles(abs, recursive) : [abs];
    for (const f of found) files.add(f);
  }
  return [...files];
}

/**
 * Scan a single file, or every file under a directory.
 *
 * @param inputPath  File or directory to scan.
 * @param options    Scan options (rename, minConfidence, concurrency, recursive, …)
 */
export async function scanPath(
  inputPath: string,
  options: ScanOptions = {},
  sniffer?: Sniffer,
): Promise<ScanResult> {
  const files = await expandInputs([inputPath], options.recursive ?? true);
  return scanFiles(files, options, sniffer);
}
