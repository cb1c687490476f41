import { ReadError, formatError } from './errors.js';
import { normalizeExt } from './families.js';
import type { DetectionResult, FileVerdict, ResultRecord, VerdictReason } from './types.js';

export interface RecordInput {
  path: string;
  sizeBytes: number;
  currentExt: string;
  detection: DetectionResult | ReadError;
  verdict: FileVerdict;
}

/**
 * Flatten one file's detection and verdict into a report row
 */
export function buildRecord(input: RecordInput): ResultRecord {
  const { detection, verdict } = input;
  const detected = detection instanceof ReadError ? undefined : detection;

  return {
    path: input.path,
    sizeBytes: input.sizeBytes,
    currentExt: normalizeExt(input.currentExt),
    detectedExt: detected?.detectedExt ?? '',
    detectedMime: detected?.detectedMime ?? '',
    confidence: detected?.confidence ?? 0,
    isMatch: verdict.isMatch,
    action: verdict.action,
    newPath: verdict.newPath ?? '',
    error: detection instanceof ReadError ? formatError(detection) : '',
    reason: verdict.reason,
  };
}

/**
 * Row for a file whose processing failed outside detection
 */
export function buildErrorRecord(
  path: string,
  sizeBytes: number,
  currentExt: string,
  error: unknown,
  reason: VerdictReason,
): ResultRecord {
  return {
    path,
    sizeBytes,
    currentExt: normalizeExt(currentExt),
    detectedExt: '',
    detectedMime: '',
    confidence: 0,
    isMatch: false,
    action: 'error',
    newPath: '',
    error: formatError(error),
    reason,
  };
}
