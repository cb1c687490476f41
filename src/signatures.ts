/**
 * File format signatures (magic bytes) and the table that matches them
 * against a file prefix.
 */

import { z } from 'zod';
import { matchesAt, fromAscii } from './binary/buffer.js';
import { InvariantError } from './errors.js';
import { DEFAULT_FAMILIES, type FamilyMap } from './families.js';
import type { Signature, SignatureAnchor, SignatureCandidate } from './types.js';
import signatureData from './data/signatures.json' with { type: 'json' };

/**
 * Bytes read from each file. Covers the deepest anchor in the built-in
 * table (tar at 257) and leaves room to find ZIP entry names.
 */
export const DEFAULT_SNIFF_WINDOW = 16 * 1024;

const anchorShape = z.object({
  offset: z.number().int().nonnegative().default(0),
  hex: z.string().regex(/^(?:[0-9a-f]{2})+$/i).optional(),
  ascii: z.string().min(1).optional(),
});

type AnchorDefinition = z.infer<typeof anchorShape>;

const oneEncoding = (a: AnchorDefinition): boolean => (a.hex === undefined) !== (a.ascii === undefined);
const oneEncodingMessage = { message: 'exactly one of "hex" or "ascii" is required' };

const signatureSchema = anchorShape
  .extend({
    ext: z.string().min(1),
    also: z.array(anchorShape.refine(oneEncoding, oneEncodingMessage)).optional(),
  })
  .refine(oneEncoding, oneEncodingMessage);

function toAnchor(def: AnchorDefinition): SignatureAnchor {
  const pattern =
    def.hex !== undefined
      ? Uint8Array.from(def.hex.match(/../g) ?? [], byte => parseInt(byte, 16))
      : fromAscii(def.ascii ?? '');
  return { offset: def.offset, pattern };
}

/**
 * Parse signature definitions (as stored in `data/signatures.json`) and
 * attach each one's MIME type from the family map.
 */
export function parseSignatures(definitions: unknown, families: FamilyMap = DEFAULT_FAMILIES): Signature[] {
  return z.array(signatureSchema).parse(definitions).map(def => {
    const family = families.requireFamily(def.ext);
    const main = toAnchor(def);
    return {
      ext: family.canonical,
      mime: family.mime,
      offset: main.offset,
      pattern: main.pattern,
      ...(def.also !== undefined && { also: def.also.map(toAnchor) }),
    };
  });
}

function anchorsOf(signature: Signature): readonly SignatureAnchor[] {
  return [signature, ...(signature.also ?? [])];
}

/**
 * Number of anchored bytes; longer patterns are more specific
 */
export function specificityOf(signature: Signature): number {
  return anchorsOf(signature).reduce((sum, a) => sum + a.pattern.length, 0);
}

export interface SignatureTableOptions {
  /** Largest prefix the sniffer will read (default: 16 KiB) */
  maxWindow?: number;
}

/**
 * Immutable, ordered set of signatures.
 */
export class SignatureTable {
  readonly signatures: readonly Signature[];
  readonly maxWindow: number;
  private readonly ranked: readonly SignatureCandidate[];

  constructor(signatures: readonly Signature[], options: SignatureTableOptions = {}) {
    const maxWindow = options.maxWindow ?? DEFAULT_SNIFF_WINDOW;
    if (!Number.isInteger(maxWindow) || maxWindow < 1) {
      throw new InvariantError(`sniff window must be a positive integer, got ${maxWindow}`);
    }

    for (const signature of signatures) {
      for (const anchor of anchorsOf(signature)) {
        if (anchor.pattern.length === 0) {
          throw new InvariantError(`empty pattern in "${signature.ext}" signature`);
        }
        if (!Number.isInteger(anchor.offset) || anchor.offset < 0) {
          throw new InvariantError(`negative or fractional offset in "${signature.ext}" signature`);
        }
        if (anchor.offset + anchor.pattern.length > maxWindow) {
          throw new InvariantError(
            `"${signature.ext}" signature ends at byte ${anchor.offset + anchor.pattern.length}, past the ${maxWindow}-byte window`,
          );
        }
      }
    }

    // Stable sort keeps declaration order among equal specificities
    this.ranked = Object.freeze(
      signatures
        .map(signature => ({ signature, specificity: specificityOf(signature) }))
        .sort((a, b) => b.specificity - a.specificity),
    );
    this.signatures = Object.freeze([...signatures]);
    this.maxWindow = maxWindow;
    Object.freeze(this);
  }

  /**
   * Signatures whose every anchor matches the prefix, most specific first.
   * Anchors beyond the end of a short prefix simply fail to match.
   */
  match(prefix: Uint8Array): SignatureCandidate[] {
    return this.ranked.filter(({ signature }) =>
      anchorsOf(signature).every(a => matchesAt(prefix, a.offset, a.pattern)),
    );
  }

  /**
   * The most specific match, if any
   */
  best(prefix: Uint8Array): SignatureCandidate | undefined {
    return this.ranked.find(({ signature }) =>
      anchorsOf(signature).every(a => matchesAt(prefix, a.offset, a.pattern)),
    );
  }
}

export function createSignatureTable(
  signatures: readonly Signature[],
  options: SignatureTableOptions = {},
): SignatureTable {
  return new SignatureTable(signatures, options);
}

export const DEFAULT_SIGNATURES: readonly Signature[] = Object.freeze(parseSignatures(signatureData));

export const DEFAULT_SIGNATURE_TABLE: SignatureTable = createSignatureTable(DEFAULT_SIGNATURES);
