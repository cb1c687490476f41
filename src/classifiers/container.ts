/**
 * Narrowing of generic containers (ZIP, OLE compound files) to the format
 * packaged inside them, using only what the sniffed prefix shows.
 */

import { indexOf, readUint16LE, toAscii } from '../binary/buffer.js';
import type { FamilyMap } from '../families.js';
import type { DetectionResult, SniffContext } from '../types.js';
import { makeResult } from './result.js';

const ZIP_LOCAL_HEADER = new Uint8Array([0x50, 0x4b, 0x03, 0x04]);
const ZIP_HEADER_SIZE = 30;
const MAX_ENTRY_NAME = 512;

/** Confidence for a format named by a ZIP entry inside the window */
export const ENTRY_NAME_CONFIDENCE = 0.95;
/** Confidence for a container confirmed only by the file's own extension */
export const DECLARED_EXTENSION_CONFIDENCE = 0.9;

interface EntryHint {
  ext: string;
  matches: (name: string) => boolean;
}

// APKs also carry META-INF/MANIFEST.MF, so they are checked before jar
const ZIP_ENTRY_HINTS: readonly EntryHint[] = [
  { ext: 'docx', matches: name => name.startsWith('word/') },
  { ext: 'xlsx', matches: name => name.startsWith('xl/') },
  { ext: 'pptx', matches: name => name.startsWith('ppt/') },
  { ext: 'apk', matches: name => name === 'AndroidManifest.xml' || name === 'classes.dex' },
  { ext: 'jar', matches: name => name === 'META-INF/MANIFEST.MF' },
];

/**
 * Names of the ZIP local file headers that start inside the window.
 * A name truncated by the window edge is dropped.
 */
export function zipEntryNames(data: Uint8Array): string[] {
  const names: string[] = [];
  let offset = indexOf(data, ZIP_LOCAL_HEADER);

  while (offset !== -1) {
    const nameLength = readUint16LE(data, offset + 26);
    const nameStart = offset + ZIP_HEADER_SIZE;
    if (
      nameLength !== undefined &&
      nameLength > 0 &&
      nameLength <= MAX_ENTRY_NAME &&
      nameStart + nameLength <= data.length
    ) {
      const name = toAscii(data, nameStart, nameLength);
      if (/^[\x20-\x7e]+$/.test(name)) {
        names.push(name);
      }
    }
    offset = indexOf(data, ZIP_LOCAL_HEADER, offset + ZIP_LOCAL_HEADER.length);
  }

  return names;
}

/**
 * Try to name the format inside a generic container.
 *
 * Returns undefined when the prefix carries no indicator and the declared
 * extension is not one of the container's formats; the caller then keeps
 * the generic container type.
 */
export function refineContainer(
  container: string,
  data: Uint8Array,
  context: SniffContext,
  families: FamilyMap,
): DetectionResult | undefined {
  const members = families.membersOfContainer(container);
  if (members.length === 0) {
    return undefined;
  }

  if (container === 'zip') {
    const names = zipEntryNames(data);
    for (const hint of ZIP_ENTRY_HINTS) {
      if (members.includes(hint.ext) && names.some(hint.matches)) {
        return makeResult(families, hint.ext, ENTRY_NAME_CONFIDENCE, `zip-entry:${hint.ext}`);
      }
    }
  }

  const declared = families.lookup(context.declaredExt);
  if (declared?.container === container) {
    return makeResult(families, declared.canonical, DECLARED_EXTENSION_CONFIDENCE, `${container}-extension:${declared.canonical}`);
  }

  return undefined;
}
