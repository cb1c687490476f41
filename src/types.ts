/**
 * A byte pattern anchored at a fixed offset
 */
export interface SignatureAnchor {
  offset: number;
  pattern: Uint8Array;
}

/**
 * One entry of the signature table.
 *
 * `pattern` must appear at `offset`; every entry of `also` must match as
 * well. Specificity is the total number of anchored bytes.
 */
export interface Signature extends SignatureAnchor {
  /** Canonical extension, without the dot */
  ext: string;
  mime: string;
  also?: readonly SignatureAnchor[];
}

/**
 * A signature that matched a prefix, with its specificity
 */
export interface SignatureCandidate {
  signature: Signature;
  specificity: number;
}

/**
 * What the sniffer concluded about a byte prefix.
 */
export interface DetectionResult {
  /** Detected extension, `bin` when nothing matched */
  readonly detectedExt: string;
  readonly detectedMime: string;
  /** 1.0 for binary signatures, lower for heuristics, 0.0 for no signal */
  readonly confidence: number;
  /** Name of the rule that produced the result, e.g. `signature:png` */
  readonly basis: string;
}

/**
 * Context handed to every classifier in the sniffing chain
 */
export interface SniffContext {
  /** Extension the file currently carries, lowercase, no dot */
  declaredExt: string;
  /** True when the prefix holds the whole file */
  complete: boolean;
}

/**
 * One step of the sniffing chain. Returns `undefined` to defer to the next.
 */
export type Classifier = (data: Uint8Array, context: SniffContext) => DetectionResult | undefined;

export type VerdictAction = 'rename' | 'none' | 'error';

export type VerdictReason =
  | 'unreadable'
  | 'inconclusive'
  | 'match'
  | 'mismatch-report-only'
  | 'mismatch-low-confidence'
  | 'mismatch-rename'
  | 'rename-failed'
  | 'internal-error';

/**
 * Outcome of comparing the current extension with the detected type
 */
export interface FileVerdict {
  readonly isMatch: boolean;
  readonly action: VerdictAction;
  readonly reason: VerdictReason;
  /** Set only when `action` is `rename` */
  readonly newPath?: string;
}

/**
 * One row of the scan report
 */
export interface ResultRecord {
  path: string;
  sizeBytes: number;
  currentExt: string;
  detectedExt: string;
  detectedMime: string;
  confidence: number;
  isMatch: boolean;
  action: VerdictAction;
  newPath: string;
  error: string;
  reason: VerdictReason;
}

/**
 * Options for batch scanning
 */
export interface ScanOptions {
  /** Rename mismatched files to their detected extension */
  rename?: boolean;
  /** Minimum detection confidence required before renaming (default: 0) */
  minConfidence?: number;
  /** Max files processed in parallel (default: 4) */
  concurrency?: number;
  /** Descend into sub-directories (default: true) */
  recursive?: boolean;
  /** Called once per finished file, in completion order */
  onRecord?: (record: ResultRecord) => void;
}

/**
 * Counters over a finished scan
 */
export interface ScanSummary {
  total: number;
  mismatches: number;
  renamed: number;
  errors: number;
}

/**
 * Result of scanFiles() / scanPath()
 */
export interface ScanResult {
  /** Records sorted by path */
  records: ResultRecord[];
  summary: ScanSummary;
}
