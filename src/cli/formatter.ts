/**
 * Output Formatter
 *
 * Formats render results, config problems and errors into human-readable
 * strings for CLI output.
 */

import { ErrorHandler } from '../errors/error-handler.js';
import { PageSpecError } from '../errors/roff-error.js';

/** What the render command did with one page. */
export interface RenderSummary {
  path: string;
  /** true when the file was (or, in check mode, would be) rewritten */
  changed: boolean;
  checkOnly: boolean;
  bytes: number;
  lines: number;
}

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number | undefined): string {
  if (value === undefined) return '';
  return `  ${DIM}${label.padEnd(12)}${RESET}${value}`;
}

export class OutputFormatter {
  /**
   * Format the outcome of rendering one page to a file.
   */
  formatRenderResult(summary: RenderSummary): string {
    let status: string;
    if (summary.checkOnly) {
      status = summary.changed ? `${RED}✗ out of date${RESET}` : `${GREEN}✓ up to date${RESET}`;
    } else {
      status = summary.changed ? `${GREEN}✓ written${RESET}` : `${DIM}unchanged${RESET}`;
    }
    const lines = [
      header('Rendered page'),
      field('File', summary.path),
      field('Status', status),
      field('Size', `${summary.bytes} bytes, ${summary.lines} lines`),
    ];
    return lines.filter(Boolean).join('\n');
  }

  /**
   * Format the problems found by `config validate`.
   */
  formatConfigErrors(errors: readonly string[]): string {
    if (!errors.length) {
      return `${GREEN}✅ Configuration is valid${RESET}`;
    }
    const lines = [`${RED}❌ Configuration has errors:${RESET}`];
    for (const err of errors) {
      lines.push(`  - ${err}`);
    }
    return lines.join('\n');
  }

  /**
   * Format an error into a friendly, actionable message.
   */
  formatError(error: unknown): string {
    const lines = [`\n${RED}${BOLD}Error:${RESET} ${ErrorHandler.toUserMessage(error)}`];

    if (error instanceof PageSpecError) {
      for (const issue of error.issues) {
        lines.push(`  ${DIM}-${RESET} ${issue}`);
      }
      return lines.join('\n');
    }

    // Provide hints for common error patterns
    const msg = error instanceof Error ? error.message.toLowerCase() : '';
    if (msg.includes('enoent') || msg.includes('no such file')) {
      lines.push(`${YELLOW}Hint:${RESET} The specified file or path does not exist. Check the path and try again.`);
    } else if (msg.includes('eacces') || msg.includes('permission denied')) {
      lines.push(`${YELLOW}Hint:${RESET} Permission denied. Check file permissions.`);
    } else if (msg.includes('macro')) {
      lines.push(`${YELLOW}Hint:${RESET} Macro names are written without the leading dot, e.g. SH or TP.`);
    }

    return lines.join('\n');
  }
}
