/**
 * Turns (current extension, detection) into a verdict, and picks a
 * collision-free path when a rename is due.
 */

import { basename, dirname, extname, join } from 'node:path';
import { ReadError } from './errors.js';
import { DEFAULT_FAMILIES, type FamilyMap } from './families.js';
import type { DetectionResult, FileVerdict } from './types.js';

export interface DecisionInput {
  path: string;
  /** Current extension, with or without the dot, any case */
  currentExt: string;
  /** The sniffer's answer, or the error that stopped it */
  detection: DetectionResult | ReadError;
}

export interface DecisionOptions {
  renameEnabled: boolean;
  /** Existence probe used to avoid overwriting files */
  pathExists: (path: string) => boolean;
  /** Mismatches detected below this confidence are reported, not renamed */
  minConfidence?: number;
  families?: FamilyMap;
}

/**
 * Path with its last extension replaced (or added, when there is none)
 */
export function replaceExtension(path: string, ext: string): string {
  const name = basename(path);
  const current = extname(name);
  const stem = current ? name.slice(0, -current.length) : name;
  return join(dirname(path), `${stem}.${ext}`);
}

/**
 * First of `candidate`, `stem_1.ext`, `stem_2.ext`, … that the probe
 * reports as free. Only the probe is consulted.
 */
export function resolveCollision(candidate: string, pathExists: (path: string) => boolean): string {
  if (!pathExists(candidate)) {
    return candidate;
  }
  const dir = dirname(candidate);
  const ext = extname(candidate);
  const stem = basename(candidate, ext);
  for (let k = 1; ; k++) {
    const next = join(dir, `${stem}_${k}${ext}`);
    if (!pathExists(next)) {
      return next;
    }
  }
}

function verdict(v: FileVerdict): FileVerdict {
  return Object.freeze(v);
}

/**
 * Decide what to do with one file. Rules, first match wins:
 *
 * 1. read failure → `error` / `unreadable`
 * 2. `bin` at confidence 0 → match / `inconclusive`
 * 3. same family → match / `match`
 * 4. otherwise a mismatch, renamed only when enabled and confident enough
 *
 * Never throws, except InvariantError when the detected extension is
 * missing from the family map.
 */
export function decide(input: DecisionInput, options: DecisionOptions): FileVerdict {
  const { detection } = input;
  const families = options.families ?? DEFAULT_FAMILIES;

  if (detection instanceof ReadError) {
    return verdict({ isMatch: false, action: 'error', reason: 'unreadable' });
  }

  if (detection.detectedExt === 'bin' && detection.confidence === 0) {
    return verdict({ isMatch: true, action: 'none', reason: 'inconclusive' });
  }

  const detectedFamily = families.requireFamily(detection.detectedExt);
  if (families.familyOf(input.currentExt) === detectedFamily.id) {
    return verdict({ isMatch: true, action: 'none', reason: 'match' });
  }

  if (!options.renameEnabled) {
    return verdict({ isMatch: false, action: 'none', reason: 'mismatch-report-only' });
  }
  if (detection.confidence < (options.minConfidence ?? 0)) {
    return verdict({ isMatch: false, action: 'none', reason: 'mismatch-low-confidence' });
  }

  const candidate = replaceExtension(input.path, detectedFamily.canonical);
  return verdict({
    isMatch: false,
    action: 'rename',
    reason: 'mismatch-rename',
    newPath: resolveCollision(candidate, options.pathExists),
  });
}
