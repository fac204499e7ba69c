/**
 * Man page layer: man(7) builder, sections and semantic styles.
 */

export { Manpage } from './manpage.js';
export { MAN_SECTIONS, sectionNumber } from './section.js';
export type { ManSection, NamedSection } from './section.js';
export { STYLES, styled, argument, metavar, normal } from './style.js';
export type { Style, StyledText } from './style.js';
