/**
 * Page descriptions: JSON format, validation and conversion to a Manpage.
 */

export { parsePageSpec } from './page-spec.js';
export type { PageSpec, BlockSpec, BlockType, SpanSpec, SpanStyle } from './page-spec.js';
export { buildManpage, toSpan } from './build.js';
export { loadPageSpec } from './load.js';
