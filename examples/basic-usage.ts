/**
 * Basic Usage Example
 *
 * Builds a small man page with the Manpage API, prints it, and keeps a
 * copy under ./man up to date.
 *
 * Run with: npx tsx examples/basic-usage.ts
 */

import { Manpage, argument, metavar, normal, writeUpdated, ErrorHandler } from '../src/index.js';

async function main() {
  // 1. Describe the page
  const page = new Manpage('GREET', 'general', ['2024-05-01', 'greet 1.0'])
    .section('NAME')
    .paragraph([normal('greet - print a greeting')])
    .section('SYNOPSIS')
    .paragraph([argument('greet'), normal(' ['), argument('-n'), normal(' '), metavar('NAME'), normal(']')])
    .section('OPTIONS')
    .label([argument('-n'), normal(', '), argument('--name'), normal('='), metavar('NAME')])
    .text([normal("Who to greet. Defaults to the current user's login name.")]);

  // 2. Render it
  const roff = page.render();
  console.log(roff);

  // 3. Write it only if it changed
  const result = await ErrorHandler.wrap(() => writeUpdated('man/greet.1', roff), { page: 'greet.1' });
  if (result.error) {
    console.error(ErrorHandler.toUserMessage(result.error));
    process.exitCode = 1;
    return;
  }
  console.log(result.data ? 'Updated man/greet.1' : 'man/greet.1 is up to date');
}

main().catch(console.error);
