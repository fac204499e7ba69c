/**
 * Line Writer
 *
 * Output buffer that knows where source lines begin, so the renderer can
 * guard the first character of every text line and never emit a blank line
 * by accident.
 */

import { escapeChar, isLineStartSpecial, ZERO_WIDTH } from './escape.js';
import type { EscapeOptions } from './escape.js';

export interface TextWriteOptions extends EscapeOptions {
  stripNewlines: boolean;
}

export class LineWriter {
  private readonly chunks: string[] = [];
  /** Anything written on the current source line, escapes included */
  private lineOpen = false;
  /** Caller text written on the current source line */
  private lineHasText = false;

  /** Write a font escape or other generated sequence as is. */
  raw(sequence: string): void {
    if (sequence === '') return;
    this.chunks.push(sequence);
    this.lineOpen = true;
  }

  /** Write caller text, escaping every character that has a meaning to ROFF. */
  text(text: string, options: TextWriteOptions): void {
    let out = '';
    for (const ch of text.replace(/\r\n?/g, '\n')) {
      if (ch !== '\n') {
        out += this.guard(ch) + escapeChar(ch, options);
      } else if (options.stripNewlines) {
        out += this.guard(' ') + ' ';
      } else {
        out += ch;
        this.lineOpen = false;
        this.lineHasText = false;
      }
    }
    this.chunks.push(out);
  }

  /** Terminate the current source line, unless nothing has been written on it. */
  endLine(): void {
    if (!this.lineOpen) return;
    this.chunks.push('\n');
    this.lineOpen = false;
    this.lineHasText = false;
  }

  /** Write a complete, already escaped control line on a line of its own. */
  line(content: string): void {
    this.endLine();
    this.chunks.push(content, '\n');
  }

  /** Write complete source lines, each already terminated by a newline. */
  block(lines: string): void {
    this.endLine();
    this.chunks.push(lines);
  }

  toString(): string {
    return this.chunks.join('');
  }

  private guard(ch: string): string {
    const first = !this.lineHasText;
    this.lineOpen = true;
    this.lineHasText = true;
    return first && isLineStartSpecial(ch) ? ZERO_WIDTH : '';
  }
}
