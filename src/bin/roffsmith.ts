#!/usr/bin/env node
/**
 * roffsmith CLI entry point
 *
 * Compiled to dist/bin/roffsmith.js by TypeScript.
 * Registered as the `roffsmith` binary in package.json.
 */

import { RoffsmithCLI } from '../cli/cli.js';

const cli = new RoffsmithCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
