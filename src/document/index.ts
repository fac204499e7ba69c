/**
 * Document model: element types, span factories and the append-only builder.
 */

export { RoffDocument, isValidMacroName } from './roff-document.js';
export { plain, bold, italic, mono, monoBold, lineBreak } from './spans.js';
export type {
  InlineSpan,
  PlainSpan,
  BoldSpan,
  ItalicSpan,
  MonoSpan,
  MonoBoldSpan,
  LineBreakSpan,
  StyledSpan,
  TextSpan,
  Element,
  ElementType,
  ControlLine,
  TextLine,
  CommentLine,
} from './types.js';
