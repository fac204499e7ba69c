/**
 * Page descriptions
 *
 * A JSON format for man pages, so a page can be kept as data and rendered
 * by the CLI. `parsePageSpec` checks an untrusted value and reports every
 * problem with its JSON path before anything is built.
 */

import { PageSpecError } from '../errors/roff-error.js';
import { isValidMacroName } from '../document/roff-document.js';
import { MAN_SECTIONS } from '../man/section.js';

export type SpanStyle = 'argument' | 'metavar' | 'normal' | 'bold' | 'italic' | 'plain';

export type SpanSpec = { style: SpanStyle; text: string } | { break: true };

export type BlockSpec =
  | { type: 'section'; title: string }
  | { type: 'subsection'; title: string }
  | { type: 'paragraph'; spans: SpanSpec[] }
  | { type: 'text'; spans: SpanSpec[] }
  | { type: 'label'; spans: SpanSpec[]; offset?: string }
  | { type: 'indent'; offset?: string }
  | { type: 'outdent' }
  | { type: 'break' }
  | { type: 'comment'; text: string }
  | { type: 'control'; macro: string; args: string[] };

export type BlockType = BlockSpec['type'];

export interface PageSpec {
  title: string;
  section: string;
  extra: string[];
  blocks: BlockSpec[];
}

const SPAN_STYLES: readonly SpanStyle[] = ['argument', 'metavar', 'normal', 'bold', 'italic', 'plain'];

const SECTION = /^[1-8]\S*$/;

// ─── Parser ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSpanStyle(value: unknown): value is SpanStyle {
  return typeof value === 'string' && SPAN_STYLES.some((style) => style === value);
}

class SpecReader {
  readonly issues: string[] = [];

  string(value: unknown, at: string): string {
    if (typeof value === 'string') return value;
    this.issues.push(`${at} must be a string`);
    return '';
  }

  optionalString(value: unknown, at: string): string | undefined {
    return value === undefined ? undefined : this.string(value, at);
  }

  strings(value: unknown, at: string): string[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      this.issues.push(`${at} must be an array of strings`);
      return [];
    }
    return value.map((item, i) => this.string(item, `${at}[${i}]`));
  }

  spans(value: unknown, at: string): SpanSpec[] {
    if (!Array.isArray(value)) {
      this.issues.push(`${at} must be an array`);
      return [];
    }
    return value.map((item, i) => this.span(item, `${at}[${i}]`));
  }

  span(value: unknown, at: string): SpanSpec {
    // A bare string is normal text
    if (typeof value === 'string') {
      return { style: 'normal', text: value };
    }
    if (!isRecord(value)) {
      this.issues.push(`${at} must be a string or an object`);
      return { style: 'normal', text: '' };
    }
    if (value.break !== undefined) {
      if (value.break !== true) {
        this.issues.push(`${at}.break must be true`);
      }
      return { break: true };
    }
    const style = value.style ?? 'normal';
    if (!isSpanStyle(style)) {
      this.issues.push(`${at}.style must be one of ${SPAN_STYLES.join(' | ')}`);
      return { style: 'normal', text: this.string(value.text, `${at}.text`) };
    }
    return { style, text: this.string(value.text, `${at}.text`) };
  }

  block(value: unknown, at: string): BlockSpec | undefined {
    if (!isRecord(value)) {
      this.issues.push(`${at} must be an object`);
      return undefined;
    }
    switch (value.type) {
      case 'section':
        return { type: 'section', title: this.string(value.title, `${at}.title`) };
      case 'subsection':
        return { type: 'subsection', title: this.string(value.title, `${at}.title`) };
      case 'paragraph':
        return { type: 'paragraph', spans: this.spans(value.spans, `${at}.spans`) };
      case 'text':
        return { type: 'text', spans: this.spans(value.spans, `${at}.spans`) };
      case 'label': {
        const offset = this.optionalString(value.offset, `${at}.offset`);
        const spans = this.spans(value.spans, `${at}.spans`);
        return offset === undefined ? { type: 'label', spans } : { type: 'label', spans, offset };
      }
      case 'indent': {
        const offset = this.optionalString(value.offset, `${at}.offset`);
        return offset === undefined ? { type: 'indent' } : { type: 'indent', offset };
      }
      case 'outdent':
        return { type: 'outdent' };
      case 'break':
        return { type: 'break' };
      case 'comment':
        return { type: 'comment', text: this.string(value.text, `${at}.text`) };
      case 'control': {
        const macro = this.string(value.macro, `${at}.macro`);
        if (typeof value.macro === 'string' && !isValidMacroName(macro)) {
          this.issues.push(`${at}.macro must be letters and digits only, got: "${macro}"`);
        }
        return { type: 'control', macro, args: this.strings(value.args, `${at}.args`) };
      }
      default:
        this.issues.push(`${at}.type is not a known block type: ${String(value.type)}`);
        return undefined;
    }
  }

  section(value: unknown, at: string): string {
    if (typeof value === 'number' && Number.isInteger(value)) {
      value = String(value);
    }
    const section = this.string(value, at);
    const named = Object.prototype.hasOwnProperty.call(MAN_SECTIONS, section);
    if (typeof value === 'string' && !named && !SECTION.test(section)) {
      this.issues.push(`${at} must be a section name or start with a digit from 1 to 8, got: "${section}"`);
    }
    return section;
  }
}

/**
 * Check an untrusted value (usually parsed JSON) and return it as a PageSpec.
 *
 * @throws PageSpecError listing every problem found
 */
export function parsePageSpec(value: unknown, source?: string): PageSpec {
  const reader = new SpecReader();
  if (!isRecord(value)) {
    throw new PageSpecError('Page description must be a JSON object', ['(root) must be an object'], { source });
  }

  const title = reader.string(value.title, 'title');
  if (title === '' && typeof value.title === 'string') {
    reader.issues.push('title must not be empty');
  }
  const section = reader.section(value.section, 'section');
  const extra = reader.strings(value.extra, 'extra');
  if (extra.length > 3) {
    reader.issues.push(`extra takes at most 3 items, got ${extra.length}`);
  }

  const blocks: BlockSpec[] = [];
  if (!Array.isArray(value.blocks)) {
    reader.issues.push('blocks must be an array');
  } else {
    value.blocks.forEach((item, i) => {
      const block = reader.block(item, `blocks[${i}]`);
      if (block) blocks.push(block);
    });
  }

  if (reader.issues.length > 0) {
    throw new PageSpecError(
      `Page description has ${reader.issues.length} problem${reader.issues.length === 1 ? '' : 's'}`,
      reader.issues,
      { source }
    );
  }
  return { title, section, extra, blocks };
}
