/**
 * ROFF Renderer
 *
 * Walks a RoffDocument once and produces ROFF source. Rendering never
 * fails and never mutates the document: the same document and options
 * always give the same bytes.
 */

import type { RoffDocument } from '../document/roff-document.js';
import type { Element, InlineSpan, StyledSpan, ControlLine, TextLine } from '../document/types.js';
import { APOSTROPHE_PREAMBLE, escapeArgument, escapeComment } from './escape.js';
import type { Apostrophes } from './escape.js';
import { LineWriter } from './line-writer.js';
import type { TextWriteOptions } from './line-writer.js';

export interface RenderOptions {
  /** Default: 'ignore' */
  apostrophes?: Apostrophes;
  /** Turn newlines inside text spans into spaces. Default: false */
  stripNewlines?: boolean;
}

/** Return to the previous font. */
export const RESTORE_FONT = '\\fP';

const FONT_ESCAPES: Record<StyledSpan['type'], string> = {
  bold: '\\fB',
  italic: '\\fI',
  mono: '\\f(CR',
  monoBold: '\\f(CB',
};

const BREAK_REQUEST = '.br';

export class RoffRenderer {
  private readonly options: TextWriteOptions;

  constructor(options: RenderOptions = {}) {
    this.options = {
      apostrophes: options.apostrophes ?? 'ignore',
      stripNewlines: options.stripNewlines ?? false,
    };
  }

  render(document: RoffDocument): string {
    if (document.isEmpty()) return '';

    const writer = new LineWriter();
    if (this.options.apostrophes === 'handle') {
      writer.block(APOSTROPHE_PREAMBLE);
    }
    for (const element of document.elements) {
      this.renderElement(element, writer);
    }
    writer.endLine();
    return writer.toString();
  }

  // ─── Elements ─────────────────────────────────────────────────────────────

  private renderElement(element: Element, writer: LineWriter): void {
    switch (element.type) {
      case 'control':
        writer.line(this.controlLine(element));
        return;
      case 'text':
        this.renderText(element, writer);
        return;
      case 'comment': {
        const text = escapeComment(element.text);
        writer.line(text === '' ? '.\\"' : `.\\" ${text}`);
        return;
      }
      default:
        assertNever(element);
    }
  }

  private controlLine(line: ControlLine): string {
    const args = line.args.map((arg) => ' ' + escapeArgument(arg, this.options));
    return `.${line.macro}${args.join('')}`;
  }

  private renderText(line: TextLine, writer: LineWriter): void {
    writer.endLine();
    for (const span of line.spans) {
      this.renderSpan(span, writer);
    }
    writer.endLine();
  }

  private renderSpan(span: InlineSpan, writer: LineWriter): void {
    switch (span.type) {
      case 'plain':
        writer.text(span.text, this.options);
        return;
      case 'bold':
      case 'italic':
      case 'mono':
      case 'monoBold':
        writer.raw(FONT_ESCAPES[span.type]);
        writer.text(span.text, this.options);
        writer.raw(RESTORE_FONT);
        return;
      case 'lineBreak':
        writer.line(BREAK_REQUEST);
        return;
      default:
        assertNever(span);
    }
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(value)}`);
}

/** Render a document with a one-off renderer. */
export function render(document: RoffDocument, options?: RenderOptions): string {
  return new RoffRenderer(options).render(document);
}
