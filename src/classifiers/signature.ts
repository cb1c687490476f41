import type { FamilyMap } from '../families.js';
import type { SignatureTable } from '../signatures.js';
import type { Classifier } from '../types.js';
import { refineContainer } from './container.js';
import { makeResult } from './result.js';

/** Confidence for an exact binary signature match */
export const SIGNATURE_CONFIDENCE = 1.0;

/**
 * Most specific signature in the table. A generic container is narrowed
 * when the prefix or the declared extension allows it.
 */
export function signatureClassifier(table: SignatureTable, families: FamilyMap): Classifier {
  return (data, context) => {
    const best = table.best(data);
    if (!best) return undefined;

    const { ext } = best.signature;
    return (
      refineContainer(ext, data, context, families) ??
      makeResult(families, ext, SIGNATURE_CONFIDENCE, `signature:${ext}`)
    );
  };
}
