/**
 * Extension families: sets of extensions that name the same content type,
 * so that `photo.jpeg` holding JPEG data is not reported against `jpg`.
 */

import { z } from 'zod';
import { InvariantError } from './errors.js';
import familyData from './data/families.json' with { type: 'json' };

const familySchema = z.object({
  canonical: z.string().min(1),
  members: z.array(z.string().min(1)).min(1),
  mime: z.string().min(1),
  /** Generic container format this one is packaged in (e.g. docx → zip) */
  container: z.string().min(1).optional(),
});

export type FamilyDefinition = z.infer<typeof familySchema>;

export interface ExtensionFamily {
  /** Family id; the canonical extension for known families */
  readonly id: string;
  readonly canonical: string;
  readonly members: readonly string[];
  readonly mime: string;
  readonly container?: string;
}

/**
 * Lowercase and strip a leading dot: `.JPG` → `jpg`
 */
export function normalizeExt(ext: string): string {
  return ext.replace(/^\./, '').toLowerCase();
}

/**
 * Immutable lookup from extension to family.
 */
export class FamilyMap {
  private readonly byExt: ReadonlyMap<string, ExtensionFamily>;
  readonly families: readonly ExtensionFamily[];

  constructor(definitions: readonly FamilyDefinition[]) {
    const byExt = new Map<string, ExtensionFamily>();
    const families: ExtensionFamily[] = [];

    for (const def of definitions) {
      const canonical = normalizeExt(def.canonical);
      const members = def.members.map(normalizeExt);
      if (!members.includes(canonical)) {
        throw new InvariantError(`family "${canonical}" does not list itself as a member`);
      }
      const family: ExtensionFamily = Object.freeze({
        id: canonical,
        canonical,
        members: Object.freeze(members),
        mime: def.mime,
        ...(def.container !== undefined && { container: normalizeExt(def.container) }),
      });
      for (const ext of members) {
        const existing = byExt.get(ext);
        if (existing) {
          throw new InvariantError(`extension "${ext}" belongs to both "${existing.id}" and "${canonical}"`);
        }
        byExt.set(ext, family);
      }
      families.push(family);
    }

    for (const family of families) {
      if (family.container !== undefined && !byExt.has(family.container)) {
        throw new InvariantError(`family "${family.id}" names unknown container "${family.container}"`);
      }
    }

    this.byExt = byExt;
    this.families = Object.freeze(families);
    Object.freeze(this);
  }

  /**
   * Family id of an extension. Unknown extensions, including the empty
   * one, get a synthetic `unknown-<ext>` id that equals no known family.
   */
  familyOf(ext: string): string {
    const norm = normalizeExt(ext);
    return this.byExt.get(norm)?.id ?? `unknown-${norm}`;
  }

  /**
   * The family record for an extension, or undefined when it is unknown
   */
  lookup(ext: string): ExtensionFamily | undefined {
    return this.byExt.get(normalizeExt(ext));
  }

  /**
   * The family record for an extension the built-in tables produced.
   * A miss here means the tables disagree with each other.
   */
  requireFamily(ext: string): ExtensionFamily {
    const family = this.lookup(ext);
    if (!family) {
      throw new InvariantError(`no family registered for detected extension "${ext}"`);
    }
    return family;
  }

  /**
   * Preferred spelling of an extension: `jpeg` → `jpg`.
   * Unknown extensions are returned normalized.
   */
  canonicalExtension(ext: string): string {
    return this.lookup(ext)?.canonical ?? normalizeExt(ext);
  }

  mimeOf(ext: string): string {
    return this.lookup(ext)?.mime ?? 'application/octet-stream';
  }

  /**
   * Canonical extensions of every format packaged in the given container
   */
  membersOfContainer(container: string): string[] {
    const norm = normalizeExt(container);
    return this.families.filter(f => f.container === norm).map(f => f.canonical);
  }
}

/**
 * Build a family map from untrusted definitions (e.g. a test fixture)
 */
export function createFamilyMap(definitions: unknown): FamilyMap {
  return new FamilyMap(z.array(familySchema).parse(definitions));
}

export const DEFAULT_FAMILIES: FamilyMap = createFamilyMap(familyData);

/**
 * Family id of an extension in the built-in map
 */
export function familyOf(ext: string): string {
  return DEFAULT_FAMILIES.familyOf(ext);
}

/**
 * Canonical extension in the built-in map
 */
export function canonicalExtension(ext: string): string {
  return DEFAULT_FAMILIES.canonicalExtension(ext);
}
