/**
 * Byte sources the sniffer reads from.
 */

import { open } from 'node:fs/promises';
import { extname } from 'node:path';
import { normalizeExt } from './families.js';

/**
 * A file the core can inspect without knowing where its bytes live
 */
export interface RawFileSource {
  readonly path: string;
  /** Current extension, lowercase, without the dot (`''` when none) */
  extension(): string;
  /** Total size in bytes */
  size(): Promise<number>;
  /** Up to `maxBytes` bytes from the start of the file */
  readPrefix(maxBytes: number): Promise<Uint8Array>;
}

/**
 * Extension of a path as the normalizer sees it: `a/Photo.JPG` → `jpg`,
 * `.bashrc` → `''`
 */
export function extensionOf(path: string): string {
  return normalizeExt(extname(path));
}

/**
 * A file on disk. `readPrefix` opens the file once, records its size from
 * the same handle, and reads at most `maxBytes`.
 */
export class FileSource implements RawFileSource {
  readonly path: string;
  private knownSize: number | undefined;

  constructor(path: string) {
    this.path = path;
  }

  extension(): string {
    return extensionOf(this.path);
  }

  async size(): Promise<number> {
    if (this.knownSize === undefined) {
      const handle = await open(this.path, 'r');
      try {
        this.knownSize = (await handle.stat()).size;
      } finally {
        await handle.close();
      }
    }
    return this.knownSize;
  }

  async readPrefix(maxBytes: number): Promise<Uint8Array> {
    const handle = await open(this.path, 'r');
    try {
      const stats = await handle.stat();
      this.knownSize = stats.size;
      const buf = new Uint8Array(Math.min(maxBytes, stats.size));
      let filled = 0;
      while (filled < buf.length) {
        const { bytesRead } = await handle.read(buf, filled, buf.length - filled, filled);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
      return buf.subarray(0, filled);
    } finally {
      await handle.close();
    }
  }
}

/**
 * Bytes already in memory, e.g. stdin or test data
 */
export class MemorySource implements RawFileSource {
  readonly path: string;
  private readonly data: Uint8Array;

  constructor(path: string, data: Uint8Array) {
    this.path = path;
    this.data = data;
  }

  extension(): string {
    return extensionOf(this.path);
  }

  async size(): Promise<number> {
    return this.data.length;
  }

  async readPrefix(maxBytes: number): Promise<Uint8Array> {
    return this.data.subarray(0, maxBytes);
  }
}
