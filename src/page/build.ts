/**
 * Build a Manpage from a checked page description.
 */

import { Manpage } from '../man/manpage.js';
import { styled } from '../man/style.js';
import { plain, bold, italic, lineBreak } from '../document/spans.js';
import type { InlineSpan } from '../document/types.js';
import type { PageSpec, SpanSpec, BlockSpec } from './page-spec.js';

export function toSpan(spec: SpanSpec): InlineSpan {
  if ('break' in spec) return lineBreak();
  switch (spec.style) {
    case 'bold':
      return bold(spec.text);
    case 'italic':
      return italic(spec.text);
    case 'plain':
      return plain(spec.text);
    default:
      return styled(spec.style, spec.text);
  }
}

function addBlock(page: Manpage, block: BlockSpec): void {
  switch (block.type) {
    case 'section':
      page.section(block.title);
      break;
    case 'subsection':
      page.subsection(block.title);
      break;
    case 'paragraph':
      page.paragraph(block.spans.map(toSpan));
      break;
    case 'text':
      page.text(block.spans.map(toSpan));
      break;
    case 'label':
      page.label(block.spans.map(toSpan), block.offset);
      break;
    case 'indent':
      page.indent(block.offset);
      break;
    case 'outdent':
      page.outdent();
      break;
    case 'break':
      page.lineBreak();
      break;
    case 'comment':
      page.comment(block.text);
      break;
    case 'control':
      page.raw().control(block.macro, block.args);
      break;
  }
}

export function buildManpage(spec: PageSpec): Manpage {
  const page = new Manpage(spec.title, spec.section, spec.extra);
  for (const block of spec.blocks) {
    addBlock(page, block);
  }
  return page;
}
