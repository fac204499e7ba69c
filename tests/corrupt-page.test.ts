/**
 * End-to-end page generation
 *
 * Builds the same page through the JSON loader and the Manpage API and
 * checks both against the checked-in ROFF file.
 */

import { describe, it, expect } from 'vitest';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { loadPageSpec, buildManpage } from '../src/page/index.js';
import { Manpage, argument, metavar, normal } from '../src/man/index.js';
import { isOutdated } from '../src/output/index.js';

const PAGE_JSON = fileURLToPath(new URL('./fixtures/corrupt.json', import.meta.url));
const PAGE_ROFF = fileURLToPath(new URL('./fixtures/corrupt.1', import.meta.url));

function corruptPage(): Manpage {
  return new Manpage('CORRUPT', 'general')
    .section('NAME')
    .paragraph([normal('corrupt - modify files by randomly changing bits')])
    .section('SYNOPSIS')
    .paragraph([
      argument('corrupt'),
      normal(' ['),
      argument('-n'),
      normal(' '),
      metavar('BITS'),
      normal('] ['),
      argument('--bits'),
      normal(' '),
      metavar('BITS'),
      normal('] '),
      metavar('file'),
      normal('...'),
    ])
    .section('DESCRIPTION')
    .paragraph([argument('corrupt'), normal(' modifies files by toggling a randomly chosen bit.')])
    .paragraph([normal("It's harmless.")])
    .section('OPTIONS')
    .label([argument('-n'), normal(', '), argument('--bits'), normal('='), metavar('BITS')])
    .text([normal('Set the number of bits to modify. Default is one bit.')]);
}

describe('corrupt(1)', () => {
  it('renders the checked-in page from the API', () => {
    expect(corruptPage().render()).toBe(fs.readFileSync(PAGE_ROFF, 'utf-8'));
  });

  it('renders the checked-in page from its JSON description', async () => {
    const rendered = buildManpage(await loadPageSpec(PAGE_JSON)).render();
    expect(await isOutdated(PAGE_ROFF, rendered)).toBe(false);
  });

  it('drops the preamble and keeps apostrophes when asked', () => {
    const lines = corruptPage().render({ apostrophes: 'ignore' }).split('\n');
    expect(lines[0]).toBe('.TH CORRUPT 1');
    expect(lines).toContain("It's harmless.");
  });
});
