/**
 * extsniff CLI: check file extensions against file content
 *
 * Features:
 *  • Single files and directories (recursive by default)
 *  • CSV report, one row per file
 *  • Optional collision-safe renaming to the detected extension
 *  • JSON parameter file (flags override it)
 *  • Concurrency control
 */

import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadParams, resolveSettings, type Params, type Settings } from './config.js';
import { ExtsniffError, UsageError } from './errors.js';
import { expandInputs, scanFiles } from './operations/scan.js';
import { writeCsvReport } from './report/csv.js';
import type { ResultRecord, ScanSummary } from './types.js';

/** Exit codes */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_MISMATCHES = 2;
export const EXIT_FILE_ERRORS = 3;

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function describeRecord(r: ResultRecord): string | undefined {
  const current = r.currentExt ? `.${r.currentExt}` : '(no extension)';
  switch (r.action) {
    case 'rename':
      return `  ✓ ${r.path} → ${r.newPath}`;
    case 'none':
      return r.isMatch
        ? undefined
        : `  ! ${r.path}: ${current} but content is ${r.detectedExt} (${r.confidence.toFixed(2)}, ${r.reason})`;
    case 'error':
      return undefined;
  }
}

// ─── Help text ────────────────────────────────────────────────────────────────

const HELP = `
extsniff <file|dir...> [options]

Check that file extensions match file content (magic bytes), report
mismatches as CSV, and optionally rename files to the right extension.

INPUT
  --input <path>              File or directory to scan (instead of positionals)
  --no-recursive              Do not descend into sub-directories

OUTPUT
  --report <file.csv>         CSV report path (default: report.csv)
  -q, --quiet                 Suppress per-file output

RENAMING
  --rename                    Rename mismatched files to the detected extension
  --min-confidence <0..1>     Only rename at or above this confidence (default: 0.8)

BATCH
  --concurrency <N>           Max parallel files (default: 4)
  --config <file.json>        JSON parameter file (default: ./params.json if present)

  -h, --help                  Show this help
  -v, --version               Show version

EXIT CODES
  0 all files match · 1 usage error · 2 mismatches found without --rename
  3 at least one file could not be processed
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

interface CliArgs extends Params {
  inputs: string[];
  quiet: boolean;
  config?: string;
}

function parseArgs(raw: readonly string[]): CliArgs {
  const args: CliArgs = { inputs: [], quiet: false };

  const take = (i: number, flag: string): [number, string] => {
    const val = raw[i + 1];
    if (val === undefined || val.startsWith('-')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return [i + 1, val];
  };

  for (let i = 0; i < raw.length; i++) {
    const a = raw[i] ?? '';
    switch (a) {
      case '-q': case '--quiet':      args.quiet = true; break;
      case '--rename':                args.rename = true; break;
      case '--no-recursive':          args.recursive = false; break;

      case '--input': {
        const [ni, v] = take(i, a); i = ni; args.input = v; break;
      }
      case '--report': {
        const [ni, v] = take(i, a); i = ni; args.report = v; break;
      }
      case '--config': {
        const [ni, v] = take(i, a); i = ni; args.config = v; break;
      }
      case '--concurrency': {
        const [ni, v] = take(i, a); i = ni;
        const n = Number(v);
        if (!Number.isInteger(n) || n < 1) {
          throw new UsageError('--concurrency must be a positive integer');
        }
        args.concurrency = n;
        break;
      }
      case '--min-confidence': {
        const [ni, v] = take(i, a); i = ni;
        const n = Number(v);
        if (v.trim() === '' || Number.isNaN(n) || n < 0 || n > 1) {
          throw new UsageError('--min-confidence must be a number between 0 and 1');
        }
        args.minConfidence = n;
        break;
      }
      default:
        if (a.startsWith('-')) {
          throw new UsageError(`Unknown option: ${a}`);
        }
        args.inputs.push(a);
    }
  }

  return args;
}

function printSummary(summary: ScanSummary, reportPath: string, rename: boolean): void {
  console.log(
    `Done. Total: ${summary.total} | Mismatches: ${summary.mismatches} | Renamed: ${summary.renamed} | Errors: ${summary.errors}`,
  );
  console.log(`Report: ${reportPath}`);
  console.log(
    rename
      ? 'Rename was enabled. See the action and new_path columns for results.'
      : 'Rename was not enabled (report only).',
  );
}

/**
 * Exit code for a finished scan: errors win over mismatches
 */
export function exitCodeFor(summary: ScanSummary, rename: boolean): number {
  if (summary.errors > 0) return EXIT_FILE_ERRORS;
  if (summary.mismatches > 0 && !rename) return EXIT_MISMATCHES;
  return EXIT_OK;
}

// ─── Main ─────────────────────────────────────────────────────────────────────

export interface RunOptions {
  /** Directory relative paths and the default params.json resolve against */
  cwd?: string;
}

/**
 * Run the CLI with the given arguments and return the exit code
 */
export async function run(rawArgs: readonly string[], options: RunOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();

  if (rawArgs.includes('-h') || rawArgs.includes('--help')) {
    console.log(HELP);
    return EXIT_OK;
  }
  if (rawArgs.includes('-v') || rawArgs.includes('--version')) {
    console.log(getVersion());
    return EXIT_OK;
  }

  let a: CliArgs;
  let settings: Settings;
  try {
    a = parseArgs(rawArgs);
    settings = resolveSettings(a, await loadParams(a.config, cwd));
  } catch (err) {
    if (err instanceof ExtsniffError) {
      console.error(`Error: ${err.message}`);
      return EXIT_FAILURE;
    }
    throw err;
  }

  if (settings.inputs.length === 0) {
    console.error('Error: No input files or directories specified (use --input or set "input" in params.json)');
    console.error('Run with --help for usage.');
    return EXIT_FAILURE;
  }

  let files: string[];
  try {
    files = await expandInputs(settings.inputs.map(p => resolve(cwd, p)), settings.recursive);
  } catch (err) {
    console.error(`Error: Input not found: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_FAILURE;
  }

  const quiet = a.quiet;
  if (!quiet) console.log(`Scanning ${settings.inputs.join(', ')} (${files.length} files)`);

  const { records, summary } = await scanFiles(files, {
    rename: settings.rename,
    minConfidence: settings.minConfidence,
    concurrency: settings.concurrency,
    onRecord: record => {
      if (record.action === 'error') {
        console.error(`  ✗ ${record.path}: ${record.error}`);
        return;
      }
      const line = describeRecord(record);
      if (line !== undefined && !quiet) console.log(line);
    },
  });

  const reportPath = await writeCsvReport(resolve(cwd, settings.report), records);
  if (!quiet) printSummary(summary, reportPath, settings.rename);

  return exitCodeFor(summary, settings.rename);
}
