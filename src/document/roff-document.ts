/**
 * ROFF Document
 *
 * Append-only builder for a sequence of control lines, text lines and
 * comments. Elements are frozen when appended and are never edited or
 * removed afterwards; escaping happens later, in the renderer.
 */

import { InvalidMacroNameError } from '../errors/roff-error.js';
import type { Element, InlineSpan, ControlLine, TextLine, CommentLine } from './types.js';

const MACRO_NAME = /^[A-Za-z0-9]+$/;

/** `TH` takes the title, the section and at most three extra fields. */
const MAX_TITLE_EXTRAS = 3;

export function isValidMacroName(name: string): boolean {
  return MACRO_NAME.test(name);
}

export class RoffDocument {
  private readonly items: Element[] = [];

  /** Elements in document order. */
  get elements(): readonly Element[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  // ─── Core appends ─────────────────────────────────────────────────────────

  /**
   * Append a control line such as `.SH NAME`.
   *
   * @param macro - macro or request name without the leading dot
   * @throws InvalidMacroNameError when the name is empty or not alphanumeric
   */
  control(macro: string, args: readonly string[] = []): this {
    if (!isValidMacroName(macro)) {
      throw new InvalidMacroNameError(macro, { args: [...args] });
    }
    const line: ControlLine = Object.freeze({
      type: 'control',
      macro,
      args: Object.freeze([...args]),
    });
    this.items.push(line);
    return this;
  }

  /** Append a line of prose made of inline spans. */
  text(spans: readonly InlineSpan[]): this {
    const line: TextLine = Object.freeze({ type: 'text', spans: Object.freeze([...spans]) });
    this.items.push(line);
    return this;
  }

  comment(text: string): this {
    const line: CommentLine = Object.freeze({ type: 'comment', text });
    this.items.push(line);
    return this;
  }

  /** Append every element of another document, which may be this one. */
  append(other: RoffDocument): this {
    const elements = other.elements.slice();
    for (const element of elements) {
      this.items.push(element);
    }
    return this;
  }

  // ─── Macro sugar ──────────────────────────────────────────────────────────

  /** `.TH` page title; extras past the third are dropped. */
  title(name: string, section: string, ...extra: string[]): this {
    return this.control('TH', [name, section, ...extra.slice(0, MAX_TITLE_EXTRAS)]);
  }

  heading(title: string): this {
    return this.control('SH', [title]);
  }

  subheading(title: string): this {
    return this.control('SS', [title]);
  }

  paragraph(): this {
    return this.control('PP');
  }

  /** `.RS`, start a relative indent. */
  indent(offset?: string): this {
    return this.control('RS', offset === undefined ? [] : [offset]);
  }

  /** `.RE`, end the innermost relative indent. */
  outdent(): this {
    return this.control('RE');
  }

  /** `.TP`, the next text line is a tag for the indented paragraph after it. */
  tagged(offset?: string): this {
    return this.control('TP', offset === undefined ? [] : [offset]);
  }

  lineBreak(): this {
    return this.control('br');
  }
}
