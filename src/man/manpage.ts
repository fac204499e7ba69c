/**
 * Manpage
 *
 * High-level builder for pages using the man(7) macro package. Every call
 * appends to an underlying RoffDocument, so anything the man macros don't
 * cover can still be added through `raw()`.
 *
 * @example
 * ```ts
 * const page = new Manpage('CORRUPT', 'general')
 *   .section('NAME')
 *   .paragraph([normal('corrupt - modify files by randomly changing bits')])
 *   .section('OPTIONS')
 *   .label([argument('-n'), normal('='), metavar('BITS')])
 *   .text([normal('Set the number of bits to modify')])
 *   .render();
 * ```
 */

import { RoffDocument } from '../document/roff-document.js';
import { plain } from '../document/spans.js';
import type { InlineSpan } from '../document/types.js';
import { RoffRenderer } from '../renderer/roff-renderer.js';
import type { RenderOptions } from '../renderer/roff-renderer.js';
import { sectionNumber } from './section.js';
import type { ManSection } from './section.js';

/** Headings already start a paragraph; `.PP` right after one is redundant. */
const PARAGRAPH_STARTS: ReadonlySet<string> = new Set(['SH', 'SS']);

const NEWLINE = /\r\n?|\n/g;

/** `.TP` takes a single input line as its tag. */
function onOneLine(span: InlineSpan): InlineSpan {
  if (span.type === 'lineBreak') return plain(' ');
  const text = span.text.replace(NEWLINE, ' ');
  return text === span.text ? span : Object.freeze({ ...span, text });
}

export class Manpage {
  private readonly document = new RoffDocument();

  /**
   * @param extra - up to three fields for the header and footer corners:
   *   the date the page was last changed, the project or suite the program
   *   belongs to, and a longer human-readable title. Further items are dropped.
   */
  constructor(title: string, section: ManSection, extra: readonly string[] = []) {
    this.document.title(title, sectionNumber(section), ...extra);
  }

  /** `.SH` unnumbered section heading. */
  section(title: string): this {
    this.document.heading(title);
    return this;
  }

  subsection(title: string): this {
    this.document.subheading(title);
    return this;
  }

  /** New paragraph holding the given text; `.PP` unless a heading precedes it. */
  paragraph(spans: readonly InlineSpan[]): this {
    if (!this.atParagraphStart()) {
      this.document.paragraph();
    }
    this.document.text(spans);
    return this;
  }

  /** Text continuing the current paragraph, such as the body under a label. */
  text(spans: readonly InlineSpan[]): this {
    this.document.text(spans);
    return this;
  }

  /**
   * Tagged paragraph: `.TP` followed by the tag line. Text added after it is
   * indented under the tag until the next paragraph or heading. Newlines and
   * line breaks inside the tag become spaces.
   */
  label(spans: readonly InlineSpan[], offset?: string): this {
    this.document.tagged(offset).text(spans.map(onOneLine));
    return this;
  }

  indent(offset?: string): this {
    this.document.indent(offset);
    return this;
  }

  outdent(): this {
    this.document.outdent();
    return this;
  }

  lineBreak(): this {
    this.document.lineBreak();
    return this;
  }

  comment(text: string): this {
    this.document.comment(text);
    return this;
  }

  private atParagraphStart(): boolean {
    const last = this.document.elements.at(-1);
    return last?.type === 'control' && PARAGRAPH_STARTS.has(last.macro);
  }

  /** The underlying document, for requests this class has no method for. */
  raw(): RoffDocument {
    return this.document;
  }

  /** Render the page. Apostrophes are handled unless the options say otherwise. */
  render(options: RenderOptions = {}): string {
    return new RoffRenderer({
      ...options,
      apostrophes: options.apostrophes ?? 'handle',
    }).render(this.document);
  }
}
