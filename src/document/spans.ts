/**
 * Inline span factories
 */

import type { PlainSpan, BoldSpan, ItalicSpan, MonoSpan, MonoBoldSpan, LineBreakSpan } from './types.js';

export function plain(text: string): PlainSpan {
  return Object.freeze({ type: 'plain', text });
}

export function bold(text: string): BoldSpan {
  return Object.freeze({ type: 'bold', text });
}

export function italic(text: string): ItalicSpan {
  return Object.freeze({ type: 'italic', text });
}

export function mono(text: string): MonoSpan {
  return Object.freeze({ type: 'mono', text });
}

export function monoBold(text: string): MonoBoldSpan {
  return Object.freeze({ type: 'monoBold', text });
}

const LINE_BREAK: LineBreakSpan = Object.freeze({ type: 'lineBreak' });

export function lineBreak(): LineBreakSpan {
  return LINE_BREAK;
}
