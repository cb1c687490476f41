import type { FamilyMap } from '../families.js';
import type { DetectionResult } from '../types.js';

/**
 * Build a frozen DetectionResult with the canonical extension, its MIME
 * type, and a confidence clamped to [0, 1].
 */
export function makeResult(
  families: FamilyMap,
  ext: string,
  confidence: number,
  basis: string,
): DetectionResult {
  const family = families.requireFamily(ext);
  return Object.freeze({
    detectedExt: family.canonical,
    detectedMime: family.mime,
    confidence: Math.max(0, Math.min(1, confidence)),
    basis,
  });
}
