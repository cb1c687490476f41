/**
 * Check if pattern exists at a specific offset. Out-of-range offsets
 * never match.
 */
export function matchesAt(data: Uint8Array, offset: number, pattern: Uint8Array): boolean {
  if (offset < 0 || offset + pattern.length > data.length) {
    return false;
  }
  for (let i = 0; i < pattern.length; i++) {
    if (data[offset + i] !== pattern[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Find a pattern in a Uint8Array
 */
export function indexOf(data: Uint8Array, pattern: Uint8Array, startOffset = 0): number {
  const maxOffset = data.length - pattern.length;

  for (let i = Math.max(0, startOffset); i <= maxOffset; i++) {
    if (matchesAt(data, i, pattern)) {
      return i;
    }
  }
  return -1;
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Convert a string to Uint8Array using ASCII encoding.
 * Accepts `\xNN` escapes already resolved by the JS string literal.
 */
export function fromAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}

/**
 * Convert Uint8Array to ASCII string
 */
export function toAscii(data: Uint8Array, offset = 0, length?: number): string {
  const end = length !== undefined ? offset + length : data.length;
  let result = '';
  for (let i = offset; i < end && i < data.length; i++) {
    result += String.fromCharCode(data[i] ?? 0);
  }
  return result;
}

/**
 * Read an unsigned 16-bit little-endian integer, or undefined past the end
 */
export function readUint16LE(data: Uint8Array, offset: number): number | undefined {
  const lo = data[offset];
  const hi = data[offset + 1];
  if (lo === undefined || hi === undefined) {
    return undefined;
  }
  return lo | (hi << 8);
}

const UTF8_BOM = new Uint8Array([0xef, 0xbb, 0xbf]);

/**
 * Drop a leading UTF-8 byte order mark
 */
export function stripBom(data: Uint8Array): Uint8Array {
  return matchesAt(data, 0, UTF8_BOM) ? data.subarray(UTF8_BOM.length) : data;
}

/**
 * Drop a multi-byte UTF-8 sequence cut off by the end of the buffer.
 *
 * Only the last (at most three) bytes are inspected; a sequence that is
 * malformed rather than merely short is left for the decoder to reject.
 */
export function trimIncompleteUtf8(data: Uint8Array): Uint8Array {
  for (let back = 1; back <= Math.min(3, data.length); back++) {
    const byte = data[data.length - back] ?? 0;
    if ((byte & 0xc0) === 0x80) {
      continue; // continuation byte, keep looking for the lead
    }
    const needed = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
    return needed > back ? data.subarray(0, data.length - back) : data;
  }
  return data;
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode as UTF-8, returning undefined instead of throwing on invalid input
 */
export function decodeUtf8(data: Uint8Array): string | undefined {
  try {
    return strictUtf8.decode(data);
  } catch {
    return undefined;
  }
}
