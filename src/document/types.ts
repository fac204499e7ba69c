/**
 * Type definitions for the ROFF document model
 *
 * Elements and inline spans are closed unions discriminated by `type`, so the
 * renderer can switch over every kind exhaustively.
 */

// ─── Inline spans ────────────────────────────────────────────────────────────

export interface PlainSpan {
  readonly type: 'plain';
  readonly text: string;
}

export interface BoldSpan {
  readonly type: 'bold';
  readonly text: string;
}

export interface ItalicSpan {
  readonly type: 'italic';
  readonly text: string;
}

/** Constant-width roman, for code and file names. */
export interface MonoSpan {
  readonly type: 'mono';
  readonly text: string;
}

/** Constant-width bold, for literal command-line input. */
export interface MonoBoldSpan {
  readonly type: 'monoBold';
  readonly text: string;
}

export interface LineBreakSpan {
  readonly type: 'lineBreak';
}

export type InlineSpan = PlainSpan | BoldSpan | ItalicSpan | MonoSpan | MonoBoldSpan | LineBreakSpan;

/** Spans that carry text and switch font while it is written. */
export type StyledSpan = BoldSpan | ItalicSpan | MonoSpan | MonoBoldSpan;

/** Spans that carry text. */
export type TextSpan = PlainSpan | StyledSpan;

// ─── Elements ────────────────────────────────────────────────────────────────

export interface ControlLine {
  readonly type: 'control';
  /** Letters and digits only, without the leading `.` */
  readonly macro: string;
  readonly args: readonly string[];
}

export interface TextLine {
  readonly type: 'text';
  readonly spans: readonly InlineSpan[];
}

/** `.\"` source comment; never shows up in formatted output. */
export interface CommentLine {
  readonly type: 'comment';
  readonly text: string;
}

export type Element = ControlLine | TextLine | CommentLine;

export type ElementType = Element['type'];
