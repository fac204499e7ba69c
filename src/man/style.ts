/**
 * Semantic styles
 *
 * What a piece of man page text means, mapped onto the fonts man pages
 * conventionally use for it.
 */

import { plain, bold, italic } from '../document/spans.js';
import type { PlainSpan, BoldSpan, ItalicSpan } from '../document/types.js';

export type Style =
  /** Something the user types literally: command names, flags */
  | 'argument'
  /** A placeholder the user replaces with their own value */
  | 'metavar'
  | 'normal';

export type StyledText = PlainSpan | BoldSpan | ItalicSpan;

export const STYLES: readonly Style[] = ['argument', 'metavar', 'normal'];

export function styled(style: Style, text: string): StyledText {
  switch (style) {
    case 'argument':
      return bold(text);
    case 'metavar':
      return italic(text);
    case 'normal':
      return plain(text);
  }
}

export function argument(text: string): BoldSpan {
  return bold(text);
}

export function metavar(text: string): ItalicSpan {
  return italic(text);
}

export function normal(text: string): PlainSpan {
  return plain(text);
}
