/**
 * Semantic documents: markup by meaning, rendered to markdown or a man page.
 */

export {
  SemanticDocument,
  SEMANTIC_STYLES,
  literal,
  metavar,
  mono,
  text,
  important,
} from './semantic-document.js';
export type {
  SemanticStyle,
  SemanticText,
  SemanticBlock,
  SemanticEvent,
  SemanticContent,
} from './semantic-document.js';
export { renderMarkdown } from './markdown.js';
export { writeManpage, renderManpage } from './man.js';
