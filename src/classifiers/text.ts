/**
 * Heuristics for text formats, tried after no binary signature matched.
 */

import { decodeUtf8, stripBom, toAscii, trimIncompleteUtf8 } from '../binary/buffer.js';
import type { FamilyMap } from '../families.js';
import type { Classifier, SniffContext } from '../types.js';
import { makeResult } from './result.js';

export const JSON_CONFIDENCE = 0.7;
export const MARKUP_CONFIDENCE = 0.6;
export const TEXT_CONFIDENCE = 0.4;

/** Minimum share of printable or whitespace characters for plain text */
export const PRINTABLE_RATIO = 0.95;

/** How far into the text markup markers are looked for */
const MARKUP_HEAD = 1024;
const SVG_HEAD = 4096;

const HTML_MARKERS = ['<!doctype html', '<html'];
/** Common HTML elements, matched only as the document's first tag */
const HTML_TAG_OPENER =
  /^<(?:head|body|meta|title|script|style|link|div|span|p|a|table|form|iframe|h[1-6]|ul|ol|br|img)[\s>/]/;

/**
 * Start of a JSON document whose first value is visible: `{` then a key or
 * `}`, or `[` then a value followed by `,` or `]`. `[2024-01-01] …` does
 * not qualify.
 */
const JSON_OPENING =
  /^(?:\{\s*["}]|\[\s*(?:[[{"\]]|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?\s*[,\]]|(?:true|false|null)\s*[,\]]))/;

/**
 * Decode the prefix as strict UTF-8 after dropping a BOM. When the prefix
 * is not the whole file, a code point cut by the window edge is ignored.
 */
export function decodeText(data: Uint8Array, context: SniffContext): string | undefined {
  const body = stripBom(data);
  return decodeUtf8(context.complete ? body : trimIncompleteUtf8(body));
}

function isPrintable(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  if (code === 0x09 || code === 0x0a || code === 0x0b || code === 0x0c || code === 0x0d) {
    return true;
  }
  return code >= 0x20 && !(code >= 0x7f && code <= 0x9f);
}

/**
 * Share of code points that are printable or whitespace
 */
export function printableRatio(text: string): number {
  let total = 0;
  let printable = 0;
  for (const ch of text) {
    total++;
    if (isPrintable(ch)) printable++;
  }
  return total === 0 ? 0 : printable / total;
}

/**
 * `{` or `[` after whitespace, valid UTF-8. A file that fits in the
 * window must also parse; a longer one must open like JSON.
 */
export function jsonClassifier(families: FamilyMap): Classifier {
  return (data, context) => {
    const text = decodeText(data, context);
    if (text === undefined) return undefined;

    const trimmed = text.trimStart();
    const first = trimmed[0];
    if (first !== '{' && first !== '[') return undefined;

    if (context.complete) {
      try {
        JSON.parse(text);
      } catch {
        return undefined;
      }
    } else if (!JSON_OPENING.test(trimmed)) {
      return undefined;
    }
    return makeResult(families, 'json', JSON_CONFIDENCE, 'json-heuristic');
  };
}

/**
 * HTML doctype or `<html` near the start, or a document whose first tag is
 * a common HTML element. XML prologues and `<svg` roots are left to the
 * XML classifier. Legacy single-byte encodings are read as ASCII.
 */
export function htmlClassifier(families: FamilyMap): Classifier {
  return (data, context) => {
    const head = (decodeText(data, context) ?? toAscii(data, 0, MARKUP_HEAD)).slice(0, MARKUP_HEAD);
    if (head.includes('\0')) return undefined;

    const lower = head.toLowerCase();
    const trimmed = lower.trimStart();
    if (HTML_MARKERS.some(marker => lower.includes(marker))) {
      return makeResult(families, 'html', MARKUP_CONFIDENCE, 'html-heuristic');
    }
    if (HTML_TAG_OPENER.test(trimmed)) {
      return makeResult(families, 'html', MARKUP_CONFIDENCE, 'html-heuristic');
    }
    return undefined;
  };
}

/**
 * XML prologue or a bare `<svg` root. SVG needs the element itself or
 * the W3C SVG namespace, so XHTML and other XML stay `xml`.
 */
export function xmlClassifier(families: FamilyMap): Classifier {
  return (data, context) => {
    const text = decodeText(data, context);
    if (text === undefined) return undefined;

    const lower = text.slice(0, SVG_HEAD).toLowerCase();
    const trimmed = lower.trimStart();
    if (!trimmed.startsWith('<?xml') && !trimmed.startsWith('<svg')) {
      return undefined;
    }
    if (lower.includes('<svg') || lower.includes('http://www.w3.org/2000/svg')) {
      return makeResult(families, 'svg', MARKUP_CONFIDENCE, 'svg-heuristic');
    }
    return makeResult(families, 'xml', MARKUP_CONFIDENCE, 'xml-heuristic');
  };
}

/**
 * Non-empty, valid UTF-8, no NUL bytes, and mostly printable
 */
export function plainTextClassifier(families: FamilyMap): Classifier {
  return (data, context) => {
    const text = decodeText(data, context);
    if (text === undefined || text.length === 0 || text.includes('\0')) {
      return undefined;
    }
    if (printableRatio(text) <= PRINTABLE_RATIO) {
      return undefined;
    }
    return makeResult(families, 'txt', TEXT_CONFIDENCE, 'text-heuristic');
  };
}
