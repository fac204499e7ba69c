/**
 * Semantic document
 *
 * Documentation written in terms of what things are (an option name, a
 * placeholder, a definition list) rather than how they look. The same
 * document renders to markdown for a README or to a man page.
 *
 * Internally a flat list of events: block starts and ends with styled text
 * between them. Adjacent text of the same style is merged.
 *
 * @example
 * ```ts
 * const doc = new SemanticDocument()
 *   .section('Usage')
 *   .paragraph([text('Program takes '), literal('--help'), text(' flag')])
 *   .definitionList((d) => d.definition(literal('-v'), text('Verbose output')));
 * ```
 */

export type SemanticStyle =
  /** Typed literally by the user: option names, commands */
  | 'literal'
  /** Replaced by the user's own value */
  | 'metavar'
  | 'mono'
  | 'text'
  /** Highlighted prose */
  | 'important';

export interface SemanticText {
  readonly style: SemanticStyle;
  readonly text: string;
}

export type SemanticBlock =
  | 'section'
  | 'subsection'
  | 'paragraph'
  | 'unnumberedList'
  | 'numberedList'
  | 'definitionList'
  /** Key of a definition list entry */
  | 'term'
  /** List item, or the definition following a term */
  | 'item';

export type SemanticEvent =
  | { readonly kind: 'start'; readonly block: SemanticBlock }
  | { readonly kind: 'end'; readonly block: SemanticBlock }
  | { readonly kind: 'text'; readonly style: SemanticStyle; readonly text: string };

/**
 * Anything that can be written into a document: a plain string (text
 * style), styled text, another document, a callback that writes into this
 * one, or a list of any of these.
 */
export type SemanticContent =
  | string
  | SemanticText
  | SemanticDocument
  | ((doc: SemanticDocument) => void)
  | readonly SemanticContent[];

export const SEMANTIC_STYLES: readonly SemanticStyle[] = ['literal', 'metavar', 'mono', 'text', 'important'];

// ─── Styled text ─────────────────────────────────────────────────────────────

function styledText(style: SemanticStyle, value: string): SemanticText {
  return Object.freeze({ style, text: value });
}

export function literal(value: string): SemanticText {
  return styledText('literal', value);
}

export function metavar(value: string): SemanticText {
  return styledText('metavar', value);
}

export function mono(value: string): SemanticText {
  return styledText('mono', value);
}

export function text(value: string): SemanticText {
  return styledText('text', value);
}

export function important(value: string): SemanticText {
  return styledText('important', value);
}

function isContentList(content: SemanticContent): content is readonly SemanticContent[] {
  return Array.isArray(content);
}

// ─── Builder ─────────────────────────────────────────────────────────────────

export class SemanticDocument {
  private readonly items: SemanticEvent[] = [];

  get events(): readonly SemanticEvent[] {
    return this.items;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  section(name: string): this {
    return this.scoped('section', text(name));
  }

  subsection(name: string): this {
    return this.scoped('subsection', text(name));
  }

  /** A paragraph; paragraphs are set apart by blank lines or indentation. */
  paragraph(content: SemanticContent): this {
    return this.scoped('paragraph', content);
  }

  /** Holds `item` blocks. */
  numberedList(items: SemanticContent): this {
    return this.scoped('numberedList', items);
  }

  /** Holds `item` blocks. */
  unnumberedList(items: SemanticContent): this {
    return this.scoped('unnumberedList', items);
  }

  /** Holds `term` / `item` pairs, usually written with `definition`. */
  definitionList(items: SemanticContent): this {
    return this.scoped('definitionList', items);
  }

  item(content: SemanticContent): this {
    return this.scoped('item', content);
  }

  term(content: SemanticContent): this {
    return this.scoped('term', content);
  }

  /** A term followed by its definition. */
  definition(term: SemanticContent, definition: SemanticContent): this {
    return this.scoped('term', term).scoped('item', definition);
  }

  /** Write content without opening a block. */
  text(content: SemanticContent): this {
    this.write(content);
    return this;
  }

  /** Append every event of another document, which may be this one. */
  append(other: SemanticDocument): this {
    this.write(other);
    return this;
  }

  private scoped(block: SemanticBlock, content: SemanticContent): this {
    this.items.push(Object.freeze({ kind: 'start', block }));
    this.write(content);
    this.items.push(Object.freeze({ kind: 'end', block }));
    return this;
  }

  private write(content: SemanticContent): void {
    if (typeof content === 'string') {
      this.pushText('text', content);
    } else if (typeof content === 'function') {
      content(this);
    } else if (content instanceof SemanticDocument) {
      for (const event of content.events.slice()) {
        if (event.kind === 'text') {
          this.pushText(event.style, event.text);
        } else {
          this.items.push(event);
        }
      }
    } else if (isContentList(content)) {
      for (const part of content) {
        this.write(part);
      }
    } else {
      this.pushText(content.style, content.text);
    }
  }

  private pushText(style: SemanticStyle, value: string): void {
    const last = this.items.at(-1);
    if (last?.kind === 'text' && last.style === style) {
      this.items[this.items.length - 1] = Object.freeze({ kind: 'text', style, text: last.text + value });
      return;
    }
    this.items.push(Object.freeze({ kind: 'text', style, text: value }));
  }
}
