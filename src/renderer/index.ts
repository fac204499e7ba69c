/**
 * Renderer module
 *
 * Converts a RoffDocument into ROFF source text.
 */

export { RoffRenderer, render, RESTORE_FONT } from './roff-renderer.js';
export type { RenderOptions } from './roff-renderer.js';
export {
  APOSTROPHE_PREAMBLE,
  ZERO_WIDTH,
  escapeArgument,
  escapeChar,
  escapeComment,
  needsQuotes,
} from './escape.js';
export type { Apostrophes, EscapeOptions } from './escape.js';
