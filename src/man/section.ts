/**
 * Manual sections
 */

import { InvalidSectionError } from '../errors/roff-error.js';

export const MAN_SECTIONS = {
  /** General commands */
  general: '1',
  systemCall: '2',
  /** Library functions such as the C standard library */
  libraryFunction: '3',
  /** Special files (usually devices in /dev) and drivers */
  specialFile: '4',
  fileFormat: '5',
  game: '6',
  misc: '7',
  /** System administration commands and daemons */
  sysadmin: '8',
} as const;

export type NamedSection = keyof typeof MAN_SECTIONS;

/**
 * A named section, or a custom one such as `3p` or `1ssl`: a digit from
 * 1 to 8, optionally followed by a subsection suffix.
 */
export type ManSection = NamedSection | (string & {});

const CUSTOM_SECTION = /^[1-8]\S*$/;

function isNamedSection(section: string): section is NamedSection {
  return Object.prototype.hasOwnProperty.call(MAN_SECTIONS, section);
}

/** Resolve a section to the string written into `.TH`. */
export function sectionNumber(section: ManSection): string {
  if (isNamedSection(section)) {
    return MAN_SECTIONS[section];
  }
  if (!CUSTOM_SECTION.test(section)) {
    throw new InvalidSectionError(section);
  }
  return section;
}
