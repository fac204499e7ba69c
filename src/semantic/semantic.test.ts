/**
 * Semantic document tests: builder, markdown and man page rendering
 */

import { describe, it, expect } from 'vitest';
import {
  SemanticDocument,
  literal,
  metavar,
  mono,
  text,
  important,
} from './semantic-document.js';
import { renderMarkdown } from './markdown.js';
import { renderManpage, writeManpage } from './man.js';
import { Manpage } from '../man/manpage.js';

function optionsDocument(): SemanticDocument {
  const doc = new SemanticDocument();
  doc.section('Description');
  doc.paragraph([text('Pass '), literal('--help'), text(' for info.')]);
  doc.section('Options');
  doc.definitionList((d) => {
    d.definition([literal('-v'), mono(' '), literal('--verbose')], text('Use verbose output'))
      .definition(literal('--help'), text('Print usage'))
      .definition(literal('--version'), text('Print version'));
  });
  doc.paragraph(text('Exit code:\n 0: if OK\n 1: if not OK'));
  return doc;
}

// ─── Builder ─────────────────────────────────────────────────────────────────

describe('SemanticDocument', () => {
  it('records blocks around their text', () => {
    const doc = new SemanticDocument().section('Usage').paragraph('Run it.');
    expect(doc.events).toEqual([
      { kind: 'start', block: 'section' },
      { kind: 'text', style: 'text', text: 'Usage' },
      { kind: 'end', block: 'section' },
      { kind: 'start', block: 'paragraph' },
      { kind: 'text', style: 'text', text: 'Run it.' },
      { kind: 'end', block: 'paragraph' },
    ]);
  });

  it('merges adjacent text of the same style', () => {
    const doc = new SemanticDocument().text([literal('--'), literal('bits'), text(' '), 'BITS']);
    expect(doc.events).toEqual([
      { kind: 'text', style: 'literal', text: '--bits' },
      { kind: 'text', style: 'text', text: ' BITS' },
    ]);
  });

  it('does not merge text across a block boundary', () => {
    const doc = new SemanticDocument().paragraph('a').paragraph('b');
    expect(doc.events.filter((e) => e.kind === 'text')).toHaveLength(2);
  });

  it('writes a definition as a term followed by an item', () => {
    const doc = new SemanticDocument().definition(literal('-v'), 'verbose');
    expect(doc.events.map((e) => (e.kind === 'text' ? e.text : `${e.kind}:${e.block}`))).toEqual([
      'start:term',
      '-v',
      'end:term',
      'start:item',
      'verbose',
      'end:item',
    ]);
  });

  it('appends another document, including itself', () => {
    const doc = new SemanticDocument().paragraph('a');
    doc.append(new SemanticDocument().paragraph('b')).append(doc);
    expect(doc.events).toHaveLength(12);
    expect(doc.isEmpty()).toBe(false);
  });

  it('accepts callbacks and nested lists as content', () => {
    const doc = new SemanticDocument().unnumberedList([
      (d: SemanticDocument) => d.item('one'),
      [(d: SemanticDocument) => d.item([important('two')])],
    ]);
    expect(doc.events.filter((e) => e.kind === 'start').map((e) => (e.kind === 'start' ? e.block : ''))).toEqual([
      'unnumberedList',
      'item',
      'item',
    ]);
  });
});

// ─── Markdown ────────────────────────────────────────────────────────────────

describe('renderMarkdown', () => {
  it('renders sections, paragraphs and definition lists', () => {
    expect(renderMarkdown(optionsDocument())).toBe(
      [
        '# Description',
        '',
        'Pass <tt><b>\\-\\-help</b></tt> for info.',
        '',
        '# Options',
        '',
        '<dl>',
        '<dt><tt><b>-v</b></tt><tt> </tt><tt><b>--verbose</b></tt></dt>',
        '<dd>Use verbose output</dd>',
        '<dt><tt><b>--help</b></tt></dt>',
        '<dd>Print usage</dd>',
        '<dt><tt><b>--version</b></tt></dt>',
        '<dd>Print version</dd></dl>',
        '',
        'Exit code:',
        ' 0: if OK',
        ' 1: if not OK',
      ].join('\n')
    );
  });

  it('renders an empty document as an empty string', () => {
    expect(renderMarkdown(new SemanticDocument())).toBe('');
  });

  it('renders subsections, styles and other lists', () => {
    const doc = new SemanticDocument()
      .subsection('Notes')
      .paragraph([metavar('FILE'), text(' is '), important('required'), text(', see '), mono('a-b')])
      .numberedList((d) => d.item('first').item('second'))
      .unnumberedList((d) => d.item(literal('-x')));
    expect(renderMarkdown(doc)).toBe(
      '## Notes\n\n<tt><i>FILE</i></tt> is <b>required</b>, see <tt>a\\-b</tt>\n\n' +
        '<ol>\n<li>first</li>\n<li>second</li></ol>\n\n<ul>\n<li><tt><b>-x</b></tt></li></ul>'
    );
  });

  it('uses list items inside a definition nested in a list', () => {
    const doc = new SemanticDocument().definitionList((d) =>
      d.term('key').item((inner) => inner.unnumberedList((l) => l.item('x')))
    );
    expect(renderMarkdown(doc)).toBe('<dl>\n<dt>key</dt>\n<dd>\n\n<ul>\n<li>x</li></ul></dd></dl>');
  });
});

// ─── Man page ────────────────────────────────────────────────────────────────

describe('renderManpage', () => {
  it('renders sections, paragraphs and definition lists', () => {
    const output = renderManpage(optionsDocument(), new Manpage('SIMPLE', 'general'), { apostrophes: 'ignore' });
    expect(output).toBe(
      [
        '.TH SIMPLE 1',
        '.SH Description',
        'Pass \\f(CB\\-\\-help\\fP for info.',
        '.SH Options',
        '.TP',
        '\\f(CB\\-v\\fP\\f(CR \\fP\\f(CB\\-\\-verbose\\fP',
        'Use verbose output',
        '.TP',
        '\\f(CB\\-\\-help\\fP',
        'Print usage',
        '.TP',
        '\\f(CB\\-\\-version\\fP',
        'Print version',
        '.PP',
        'Exit code:  0: if OK  1: if not OK',
        '',
      ].join('\n')
    );
  });

  it('handles apostrophes like any other man page', () => {
    const doc = new SemanticDocument().paragraph("It's fine.");
    expect(renderManpage(doc, new Manpage('X', 'general'))).toBe(
      ".ie \\n(.g .ds Aq \\(aq\n.el .ds Aq '\n.TH X 1\n.PP\nIt\\*(Aqs fine.\n"
    );
  });

  it('writes numbered and bullet items as indented paragraphs', () => {
    const doc = new SemanticDocument()
      .section('Steps')
      .numberedList((d) => d.item('Build.').item([metavar('FILE'), ' is written.']))
      .unnumberedList((d) => d.item(important('Done')));
    expect(renderManpage(doc, new Manpage('X', 'general'), { apostrophes: 'ignore' })).toBe(
      '.TH X 1\n.SH Steps\n.IP 1. 4\nBuild.\n.IP 2. 4\n\\fIFILE\\fP is written.\n.IP \\- 2\n\\fBDone\\fP\n'
    );
  });

  it('keeps paragraphs inside an item under its indentation', () => {
    const doc = new SemanticDocument().definitionList((d) =>
      d.definition(literal('-q'), (item) => item.paragraph('Quiet.').paragraph('Really\nquiet.'))
    );
    expect(renderManpage(doc, new Manpage('X', 'general'), { apostrophes: 'ignore' })).toBe(
      '.TH X 1\n.TP\n\\f(CB\\-q\\fP\nQuiet.\n.IP\nReally quiet.\n'
    );
  });

  it('writes a subsection heading and returns the page it wrote to', () => {
    const page = new Manpage('X', 'general');
    const doc = new SemanticDocument().text([]).subsection('Exit status');
    expect(writeManpage(doc, page)).toBe(page);
    expect(page.render({ apostrophes: 'ignore' })).toBe('.TH X 1\n.SS "Exit status"\n');
  });
});
