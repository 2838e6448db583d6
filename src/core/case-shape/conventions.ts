/**
 * The seven word-casing conventions a compound word is expanded into.
 */

export type CaseConventionName =
  | 'camel'
  | 'pascal'
  | 'kebab'
  | 'snake'
  | 'train'
  | 'screaming-snake'
  | 'cobol';

export interface CaseConvention {
  name: CaseConventionName;
  /** Example rendering, for display */
  label: string;
  convert: (words: readonly string[]) => string;
}

const lower = (word: string): string => word.toLowerCase();
const upper = (word: string): string => word.toUpperCase();
const capitalize = (word: string): string =>
  word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

export const CASE_CONVENTIONS: readonly CaseConvention[] = Object.freeze([
  {
    name: 'camel',
    label: 'camelCase',
    convert: (words) => words.map((w, i) => (i === 0 ? lower(w) : capitalize(w))).join(''),
  },
  { name: 'pascal', label: 'PascalCase', convert: (words) => words.map(capitalize).join('') },
  { name: 'kebab', label: 'kebab-case', convert: (words) => words.map(lower).join('-') },
  { name: 'snake', label: 'snake_case', convert: (words) => words.map(lower).join('_') },
  { name: 'train', label: 'Train-Case', convert: (words) => words.map(capitalize).join('-') },
  {
    name: 'screaming-snake',
    label: 'SCREAMING_SNAKE_CASE',
    convert: (words) => words.map(upper).join('_'),
  },
  { name: 'cobol', label: 'COBOL-CASE', convert: (words) => words.map(upper).join('-') },
]);

/**
 * Split a compound word into its words.
 *
 * Boundaries: runs of `-`, `_` or whitespace; lowercase letter or digit
 * followed by an uppercase letter; the last capital of an uppercase run that
 * starts a capitalized word (`HTTPServer` -> `HTTP`, `Server`).
 */
export function splitWords(input: string): string[] {
  return input
    .replace(/([\p{Ll}\p{N}])(\p{Lu})/gu, '$1 $2')
    .replace(/(\p{Lu})(\p{Lu}\p{Ll})/gu, '$1 $2')
    .split(/[\s_-]+/)
    .filter((word) => word.length > 0);
}

export function getConvention(name: CaseConventionName): CaseConvention {
  const convention = CASE_CONVENTIONS.find((c) => c.name === name);
  if (!convention) {
    throw new Error(`Unknown case convention: ${name}`);
  }
  return convention;
}

/**
 * Re-case `input` in the named convention.
 */
export function toCase(input: string, name: CaseConventionName): string {
  return getConvention(name).convert(splitWords(input));
}
