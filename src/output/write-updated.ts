/**
 * Write-if-changed helper for generated pages
 *
 * Rewrites a file only when its contents differ, and reports whether it
 * did. A test or CI step can fail on `true` to catch checked-in pages that
 * are out of date.
 */

import fs from 'fs/promises';
import path from 'path';
import { OutputError } from '../errors/roff-error.js';

/**
 * Compare `contents` with the file at `filePath` and write it when they differ.
 * A missing file counts as empty.
 *
 * @returns true when the file was written
 * @throws OutputError when reading or writing fails
 */
export async function writeUpdated(filePath: string, contents: string | Uint8Array): Promise<boolean> {
  const next = typeof contents === 'string' ? Buffer.from(contents, 'utf-8') : Buffer.from(contents);
  const current = await readCurrent(filePath);
  if (current.equals(next)) {
    return false;
  }
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, next);
  } catch (err) {
    throw new OutputError(`Failed to write ${filePath}: ${errorMessage(err)}`, { path: filePath });
  }
  return true;
}

/** True when writing `contents` to `filePath` would change the file. */
export async function isOutdated(filePath: string, contents: string | Uint8Array): Promise<boolean> {
  const next = typeof contents === 'string' ? Buffer.from(contents, 'utf-8') : Buffer.from(contents);
  const current = await readCurrent(filePath);
  return !current.equals(next);
}

async function readCurrent(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return Buffer.alloc(0);
    }
    throw new OutputError(`Failed to read ${filePath}: ${errorMessage(err)}`, { path: filePath });
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
