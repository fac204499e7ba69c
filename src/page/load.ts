/**
 * Read a page description from disk.
 */

import fs from 'fs/promises';
import { PageSpecError } from '../errors/roff-error.js';
import { parsePageSpec } from './page-spec.js';
import type { PageSpec } from './page-spec.js';

export async function loadPageSpec(filePath: string): Promise<PageSpec> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PageSpecError(`Cannot read page description ${filePath}`, [message], { source: filePath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PageSpecError(`Page description ${filePath} is not valid JSON`, [message], { source: filePath });
  }
  return parsePageSpec(parsed, filePath);
}
