/**
 * Man page rendering for semantic documents
 *
 * Writes a SemanticDocument into a Manpage: sections become `.SH`/`.SS`,
 * definition terms become `.TP` tags, list items become `.IP` paragraphs.
 * Literal text is set in constant-width bold, mono text in constant-width
 * roman, metavariables in italics and important text in bold.
 */

import { plain, bold, italic, mono, monoBold } from '../document/spans.js';
import type { InlineSpan, TextSpan } from '../document/types.js';
import type { Manpage } from '../man/manpage.js';
import type { RenderOptions } from '../renderer/roff-renderer.js';
import type { SemanticDocument, SemanticBlock, SemanticStyle } from './semantic-document.js';

type ListBlock = Extract<SemanticBlock, 'unnumberedList' | 'numberedList' | 'definitionList'>;

interface OpenList {
  readonly block: ListBlock;
  count: number;
}

/** Bullet and number widths for `.IP`, in ens. */
const BULLET_INDENT = '2';
const NUMBER_INDENT = '4';

const NEWLINE = /\r\n?|\n/g;

function toSpan(style: SemanticStyle, value: string): TextSpan {
  switch (style) {
    case 'literal':
      return monoBold(value);
    case 'metavar':
      return italic(value);
    case 'mono':
      return mono(value);
    case 'text':
      return plain(value);
    case 'important':
      return bold(value);
  }
}

class ManpageWriter {
  private pending: InlineSpan[] = [];
  /** Heading text being collected, while inside a section or subsection */
  private heading: string | undefined;
  private readonly lists: OpenList[] = [];
  /** One entry per open item: whether it has written anything yet */
  private readonly items: boolean[] = [];
  /** Open paragraphs and terms; their text is joined onto one line */
  private joining = 0;

  constructor(private readonly page: Manpage) {}

  start(block: SemanticBlock): void {
    switch (block) {
      case 'section':
      case 'subsection':
        this.flush();
        this.heading = '';
        return;
      case 'paragraph':
      case 'term':
        this.flush();
        this.joining++;
        return;
      case 'unnumberedList':
      case 'numberedList':
      case 'definitionList':
        this.flush();
        this.lists.push({ block, count: 0 });
        return;
      case 'item':
        this.flush();
        this.openItem();
        return;
    }
  }

  end(block: SemanticBlock): void {
    switch (block) {
      case 'section':
        this.page.section(this.heading ?? '');
        this.heading = undefined;
        return;
      case 'subsection':
        this.page.subsection(this.heading ?? '');
        this.heading = undefined;
        return;
      case 'paragraph':
        this.joining--;
        this.endParagraph();
        return;
      case 'term':
        this.joining--;
        this.page.label(this.take());
        return;
      case 'unnumberedList':
      case 'numberedList':
      case 'definitionList':
        this.flush();
        this.lists.pop();
        return;
      case 'item':
        this.flush();
        this.items.pop();
        return;
    }
  }

  text(style: SemanticStyle, value: string): void {
    if (this.heading !== undefined) {
      this.heading += value;
      return;
    }
    this.pending.push(toSpan(style, this.joining > 0 ? value.replace(NEWLINE, ' ') : value));
  }

  /** Write text collected outside any paragraph. */
  flush(): void {
    const spans = this.take();
    if (spans.length === 0) return;
    this.page.text(spans);
    this.markItemWritten();
  }

  private openItem(): void {
    this.items.push(false);
    const list = this.lists.at(-1);
    if (list === undefined || list.block === 'definitionList') return;
    list.count++;
    const marker = list.block === 'numberedList' ? `${list.count}.` : '-';
    const indent = list.block === 'numberedList' ? NUMBER_INDENT : BULLET_INDENT;
    this.page.raw().control('IP', [marker, indent]);
  }

  /**
   * `.PP` would end the indentation of a list item, so paragraphs inside one
   * continue it with `.IP` instead.
   */
  private endParagraph(): void {
    const spans = this.take();
    const inItem = this.items.length > 0;
    if (!inItem) {
      this.page.paragraph(spans);
      return;
    }
    if (this.items[this.items.length - 1]) {
      this.page.raw().control('IP');
    }
    this.page.text(spans);
    this.markItemWritten();
  }

  private markItemWritten(): void {
    if (this.items.length > 0) {
      this.items[this.items.length - 1] = true;
    }
  }

  private take(): InlineSpan[] {
    const spans = this.pending;
    this.pending = [];
    return spans;
  }
}

/** Write a semantic document into a man page and return the page. */
export function writeManpage(doc: SemanticDocument, page: Manpage): Manpage {
  const writer = new ManpageWriter(page);
  for (const event of doc.events) {
    switch (event.kind) {
      case 'start':
        writer.start(event.block);
        break;
      case 'end':
        writer.end(event.block);
        break;
      case 'text':
        writer.text(event.style, event.text);
        break;
    }
  }
  writer.flush();
  return page;
}

/** Write a semantic document into a man page and render it. */
export function renderManpage(doc: SemanticDocument, page: Manpage, options?: RenderOptions): string {
  return writeManpage(doc, page).render(options);
}
