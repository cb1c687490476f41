/**
 * JSON parameter file and its merge with command-line flags.
 *
 * ```json
 * { "input": "./downloads", "report": "out/report.csv", "rename": true }
 * ```
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

/** Parameter file picked up from the working directory when present */
export const DEFAULT_CONFIG_FILE = 'params.json';
export const DEFAULT_REPORT_FILE = 'report.csv';
/** Rename threshold of the CLI; scanFiles() itself defaults to 0 */
export const DEFAULT_MIN_CONFIDENCE = 0.8;
export const DEFAULT_CONCURRENCY = 4;

export const paramsSchema = z
  .object({
    input: z.string().min(1).optional(),
    report: z.string().min(1).optional(),
    rename: z.boolean().optional(),
    concurrency: z.number().int().positive().optional(),
    minConfidence: z.number().min(0).max(1).optional(),
    recursive: z.boolean().optional(),
  })
  .strict();

export type Params = z.infer<typeof paramsSchema>;

/**
 * Fully resolved settings for one run
 */
export interface Settings {
  inputs: string[];
  report: string;
  rename: boolean;
  concurrency: number;
  minConfidence: number;
  recursive: boolean;
}

/**
 * Validate an already-parsed parameter object
 */
export function parseParams(raw: unknown, source = 'parameters'): Params {
  const result = paramsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid ${source}`, issues);
  }
  return result.data;
}

/**
 * Read and validate a parameter file.
 *
 * @throws ConfigError when the file is unreadable, not JSON, or invalid
 */
export async function loadParamsFile(path: string): Promise<Params> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseParams(raw, path);
}

/**
 * Load the explicit parameter file, or `params.json` from `cwd` when it
 * exists. An explicit file that is missing is an error; a missing default
 * file is not.
 */
export async function loadParams(explicitPath: string | undefined, cwd = process.cwd()): Promise<Params> {
  if (explicitPath !== undefined) {
    return loadParamsFile(resolve(cwd, explicitPath));
  }
  const fallback = resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? loadParamsFile(fallback) : {};
}

/**
 * Merge flags over file parameters over defaults. Positional inputs take
 * precedence over both `--input` and the file's `input`.
 */
export function resolveSettings(flags: Params & { inputs?: string[] }, file: Params): Settings {
  const positional = flags.inputs ?? [];
  const single = flags.input ?? file.input;
  return {
    inputs: positional.length > 0 ? positional : single !== undefined ? [single] : [],
    report: flags.report ?? file.report ?? DEFAULT_REPORT_FILE,
    rename: flags.rename ?? file.rename ?? false,
    concurrency: flags.concurrency ?? file.concurrency ?? DEFAULT_CONCURRENCY,
    minConfidence: flags.minConfidence ?? file.minConfidence ?? DEFAULT_MIN_CONFIDENCE,
    recursive: flags.recursive ?? file.recursive ?? true,
  };
}
