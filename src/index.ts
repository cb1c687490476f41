/**
 * extsniff - file extension verification library
 *
 * Detects a file's real type from its magic bytes (with light heuristics
 * for text formats), compares it with the extension the file carries, and
 * proposes a collision-free rename when they disagree.
 *
 * @packageDocumentation
 */

// Detection
export { Sniffer, detectType, getMimeType, defaultClassifiers } from './detect.js';
export type { SnifferOptions, DetectOptions } from './detect.js';

// Signature table
export {
  SignatureTable,
  createSignatureTable,
  parseSignatures,
  specificityOf,
  DEFAULT_SIGNATURES,
  DEFAULT_SIGNATURE_TABLE,
  DEFAULT_SNIFF_WINDOW,
} from './signatures.js';
export type { SignatureTableOptions } from './signatures.js';

// Extension families
export {
  FamilyMap,
  createFamilyMap,
  familyOf,
  canonicalExtension,
  normalizeExt,
  DEFAULT_FAMILIES,
} from './families.js';
export type { ExtensionFamily, FamilyDefinition } from './families.js';

// Decisions and report rows
export { decide, resolveCollision, replaceExtension } from './decide.js';
export type { DecisionInput, DecisionOptions } from './decide.js';
export { buildRecord, buildErrorRecord } from './record.js';
export type { RecordInput } from './record.js';

// Sources
export { FileSource, MemorySource, extensionOf } from './source.js';
export type { RawFileSource } from './source.js';

// Batch processing and I/O
export { scanFiles, scanPath, expandInputs, collectFiles, summarize } from './operations/scan.js';
export { moveExclusive } from './operations/move.js';
export { toCsv, toCsvRow, escapeCsvField, writeCsvReport, CSV_COLUMNS } from './report/csv.js';

// Types
export type {
  Signature,
  SignatureAnchor,
  SignatureCandidate,
  DetectionResult,
  SniffContext,
  Classifier,
  FileVerdict,
  VerdictAction,
  VerdictReason,
  ResultRecord,
  ScanOptions,
  ScanResult,
  ScanSummary,
} from './types.js';

// Error classes
export {
  ExtsniffError,
  ReadError,
  InvariantError,
  RenameError,
  ConfigError,
  UsageError,
  formatError,
} from './errors.js';
