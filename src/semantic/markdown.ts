/**
 * Markdown rendering for semantic documents
 *
 * Headings use `#`/`##`, lists are written as inline HTML (`<dl>`, `<ul>`,
 * `<ol>`) so definition lists survive, and styled text becomes `<tt>`, `<b>`
 * and `<i>` tags. Dashes in literal and mono text are escaped inside
 * paragraphs, where markdown would otherwise read `--` as punctuation.
 */

import type { SemanticDocument, SemanticBlock, SemanticStyle } from './semantic-document.js';

type ListBlock = Extract<SemanticBlock, 'unnumberedList' | 'numberedList' | 'definitionList'>;

const BLOCK_SEPARATOR = '\n\n';

const LIST_TAGS: Record<ListBlock, string> = {
  unnumberedList: 'ul',
  numberedList: 'ol',
  definitionList: 'dl',
};

class MarkdownWriter {
  private out = '';
  private readonly lists: ListBlock[] = [];
  private paragraphDepth = 0;

  toString(): string {
    return this.out;
  }

  start(block: SemanticBlock): void {
    switch (block) {
      case 'section':
        this.separate();
        this.out += '# ';
        return;
      case 'subsection':
        this.separate();
        this.out += '## ';
        return;
      case 'paragraph':
        this.separate();
        this.paragraphDepth++;
        return;
      case 'unnumberedList':
      case 'numberedList':
      case 'definitionList':
        this.separate();
        this.lists.push(block);
        this.out += `<${LIST_TAGS[block]}>`;
        return;
      case 'term':
        this.out += '\n<dt>';
        return;
      case 'item':
        this.out += `\n<${this.itemTag()}>`;
        return;
    }
  }

  end(block: SemanticBlock): void {
    switch (block) {
      case 'section':
      case 'subsection':
        return;
      case 'paragraph':
        this.paragraphDepth--;
        return;
      case 'unnumberedList':
      case 'numberedList':
      case 'definitionList':
        this.lists.pop();
        this.out += `</${LIST_TAGS[block]}>`;
        return;
      case 'term':
        this.out += '</dt>';
        return;
      case 'item':
        this.out += `</${this.itemTag()}>`;
        return;
    }
  }

  text(style: SemanticStyle, value: string): void {
    switch (style) {
      case 'literal':
        this.out += `<tt><b>${this.dashes(value)}</b></tt>`;
        return;
      case 'metavar':
        this.out += `<tt><i>${value}</i></tt>`;
        return;
      case 'mono':
        this.out += `<tt>${this.dashes(value)}</tt>`;
        return;
      case 'text':
        this.out += value;
        return;
      case 'important':
        this.out += `<b>${value}</b>`;
        return;
    }
  }

  private separate(): void {
    if (this.out !== '') this.out += BLOCK_SEPARATOR;
  }

  private itemTag(): 'dd' | 'li' {
    return this.lists.at(-1) === 'definitionList' ? 'dd' : 'li';
  }

  private dashes(value: string): string {
    return this.paragraphDepth > 0 ? value.replace(/-/g, '\\-') : value;
  }
}

/** Render a semantic document as markdown with inline HTML. */
export function renderMarkdown(doc: SemanticDocument): string {
  const writer = new MarkdownWriter();
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
  return writer.toString();
}
