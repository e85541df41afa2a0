/**
 * Literal path vs. symbolic name classification
 */

// Characters a namespace or assembly name can never contain
const RESERVED_PATH_CHARS: readonly string[] = [
  ":",
  "*",
  "?",
  "<",
  ">",
  "|",
  '"',
];

/**
 * True when the string contains a character that is illegal in a symbolic
 * name, meaning it can only be meant as a literal path.
 *
 * Pure string scan, no file-system access.
 */
export const hasReservedPathChars = (name: string): boolean =>
  RESERVED_PATH_CHARS.some((ch) => name.includes(ch));

/**
 * True when the string can be treated as a namespace or assembly name.
 * The empty string qualifies; callers decide whether it is meaningful.
 */
export const isSymbolicName = (name: string): boolean =>
  !hasReservedPathChars(name);
