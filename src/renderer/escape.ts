/**
 * ROFF escaping
 *
 * Turns caller text into characters that can never start a request or
 * change fonts: backslashes, dashes, tabs and quotes are rewritten, and a
 * `\&` guard goes in front of anything that would be read as a control
 * character at the start of a line.
 */

export type Apostrophes = 'handle' | 'ignore';

/**
 * Defines the `Aq` string as groff's straight apostrophe glyph, falling back
 * to a plain `'` on other formatters.
 */
export const APOSTROPHE_PREAMBLE = ".ie \\n(.g .ds Aq \\(aq\n.el .ds Aq '\n";

/** Zero-width guard that stops a leading character from being read as a request. */
export const ZERO_WIDTH = '\\&';

const APOSTROPHE_STRING = '\\*(Aq';

export interface EscapeOptions {
  apostrophes: Apostrophes;
}

/** Characters that make a text line a control line, or break it, in column one. */
export function isLineStartSpecial(ch: string): boolean {
  return ch === '.' || ch === "'" || ch === ' ';
}

/**
 * Escape a single character of caller text. Newlines are left to the caller,
 * since what they become depends on where the text goes.
 */
export function escapeChar(ch: string, options: EscapeOptions): string {
  switch (ch) {
    case '\\':
      return '\\\\';
    case '-':
      return '\\-';
    case '\t':
      return '\\t';
    case "'":
      return options.apostrophes === 'handle' ? APOSTROPHE_STRING : ch;
    default:
      return ch;
  }
}

/**
 * Escape one macro argument and quote it when needed.
 *
 * Empty arguments and arguments holding whitespace or `"` are wrapped in
 * double quotes with inner quotes doubled. Newlines become spaces, since a
 * control line cannot span source lines.
 */
export function escapeArgument(arg: string, options: EscapeOptions): string {
  let body = '';
  let first = true;
  for (const ch of arg) {
    if (first && (ch === '.' || ch === "'")) {
      body += ZERO_WIDTH;
    }
    first = false;
    if (ch === '\n' || ch === '\r') {
      body += ' ';
    } else if (ch === '"') {
      body += '""';
    } else {
      body += escapeChar(ch, options);
    }
  }
  return needsQuotes(arg) ? `"${body}"` : body;
}

export function needsQuotes(arg: string): boolean {
  return arg === '' || /[\s"]/.test(arg);
}

/** Comment text is not interpreted, it only has to stay on one source line. */
export function escapeComment(text: string): string {
  return text.replace(/\r?\n|\r/g, ' ');
}
