import { signatureClassifier } from './classifiers/signature.js';
import { htmlClassifier, jsonClassifier, plainTextClassifier, xmlClassifier } from './classifiers/text.js';
import { ReadError } from './errors.js';
import { DEFAULT_FAMILIES, normalizeExt, type FamilyMap } from './families.js';
import { DEFAULT_SIGNATURE_TABLE, type SignatureTable } from './signatures.js';
import type { RawFileSource } from './source.js';
import type { Classifier, DetectionResult, SniffContext } from './types.js';

export interface SnifferOptions {
  table?: SignatureTable;
  families?: FamilyMap;
  /** Replace the default classifier chain */
  classifiers?: readonly Classifier[];
}

export interface DetectOptions {
  /** Extension the file currently carries, with or without the dot */
  declaredExt?: string;
  /**
   * Whether `data` holds the whole file. Defaults to true when `data`
   * fits in the sniff window.
   */
  complete?: boolean;
}

/**
 * The default chain: binary signatures first, then text heuristics from
 * most to least specific.
 */
export function defaultClassifiers(table: SignatureTable, families: FamilyMap): Classifier[] {
  return [
    signatureClassifier(table, families),
    jsonClassifier(families),
    htmlClassifier(families),
    xmlClassifier(families),
    plainTextClassifier(families),
  ];
}

/**
 * Maps a file prefix to a DetectionResult by running an ordered chain of
 * classifiers; the first one to answer wins. When none answers the
 * result is `bin` with confidence 0.
 */
export class Sniffer {
  readonly table: SignatureTable;
  readonly families: FamilyMap;
  readonly classifiers: readonly Classifier[];
  private readonly fallback: DetectionResult;

  constructor(options: SnifferOptions = {}) {
    this.table = options.table ?? DEFAULT_SIGNATURE_TABLE;
    this.families = options.families ?? DEFAULT_FAMILIES;
    this.classifiers = Object.freeze([...(options.classifiers ?? defaultClassifiers(this.table, this.families))]);
    this.fallback = Object.freeze({
      detectedExt: 'bin',
      detectedMime: 'application/octet-stream',
      confidence: 0,
      basis: 'no-signal',
    });
  }

  /**
   * Detect the type of a byte prefix. Only the first `table.maxWindow`
   * bytes are considered.
   */
  detect(data: Uint8Array, options: DetectOptions = {}): DetectionResult {
    const window = data.subarray(0, this.table.maxWindow);
    const context: SniffContext = {
      declaredExt: normalizeExt(options.declaredExt ?? ''),
      complete: options.complete ?? data.length <= this.table.maxWindow,
    };

    for (const classify of this.classifiers) {
      const result = classify(window, context);
      if (result) return result;
    }
    return this.fallback;
  }

  /**
   * Read one bounded prefix from the source and detect its type.
   *
   * @throws ReadError when the source cannot be opened or read
   */
  async detectSource(source: RawFileSource): Promise<DetectionResult> {
    let prefix: Uint8Array;
    let size: number;
    try {
      prefix = await source.readPrefix(this.table.maxWindow);
      size = await source.size();
    } catch (err) {
      throw err instanceof ReadError ? err : new ReadError(source.path, err);
    }
    return this.detect(prefix, {
      declaredExt: source.extension(),
      complete: prefix.length >= size,
    });
  }
}

const defaultSniffer = new Sniffer();

/**
 * Detect the type of `data` with the built-in tables
 */
export function detectType(data: Uint8Array, declaredExt?: string): DetectionResult {
  return defaultSniffer.detect(data, declaredExt !== undefined ? { declaredExt } : {});
}

/**
 * MIME type for an extension in the built-in family map
 */
export function getMimeType(ext: string): string {
  return DEFAULT_FAMILIES.mimeOf(ext);
}
