/**
 * CLI: commander program, output formatting and progress reporting.
 */

export { RoffsmithCLI, VERSION, defaultFileName } from './cli.js';
export { OutputFormatter } from './formatter.js';
export type { RenderSummary } from './formatter.js';
export { ProgressReporter } from './progress.js';
export type { StatusOutput } from './progress.js';
