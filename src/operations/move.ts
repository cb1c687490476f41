/**
 * Moving a file to a path that must not already exist.
 *
 * The target is chosen earlier (see decide.ts) from an existence probe,
 * so another process may create it in between. Both strategies here fail
 * with EEXIST instead of overwriting in that case.
 */

import { constants } from 'node:fs';
import { copyFile, link, unlink } from 'node:fs/promises';
import { RenameError } from '../errors.js';

/** Errors after which a hard link is impossible but a copy may work */
const LINK_UNSUPPORTED = new Set(['EXDEV', 'EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS', 'EMLINK']);

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

async function placeExclusive(from: string, to: string): Promise<void> {
  try {
    await link(from, to);
  } catch (err) {
    const code = errorCode(err);
    if (code === undefined || !LINK_UNSUPPORTED.has(code)) {
      throw err;
    }
    await copyFile(from, to, constants.COPYFILE_EXCL);
  }
}

/**
 * Move `from` to `to`, failing if `to` exists.
 *
 * @throws RenameError wrapping the underlying filesystem error
 */
export async function moveExclusive(from: string, to: string): Promise<void> {
  try {
    await placeExclusive(from, to);
  } catch (err) {
    throw new RenameError(from, to, err);
  }
  try {
    await unlink(from);
  } catch (err) {
    // Drop the new name so only the original remains
    await unlink(to).catch((cleanupErr: unknown) => {
      throw new RenameError(from, to, cleanupErr);
    });
    throw new RenameError(from, to, err);
  }
}
