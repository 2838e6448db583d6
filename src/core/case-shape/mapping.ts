/**
 * Case-shape mapping generation.
 *
 * Given a compound token (`example-name`) and a compound replacement
 * (`{{ project-name }}`), derive one pair per casing convention:
 * `exampleName -> {{ projectName }}`, `EXAMPLE_NAME -> {{ PROJECT_NAME }}`, ...
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { findPlaceholder, unwrapPlaceholder, wrapPlaceholder } from '../placeholder.js';
import { CASE_CONVENTIONS, toCase, type CaseConventionName } from './conventions.js';

export type CompoundWordField = 'token' | 'replacement';

export interface CaseShapeMapping {
  /** Convention that produced the pair, or 'literal' for the as-typed pair */
  convention: CaseConventionName | 'literal';
  original: string;
  replacement: string;
}

/**
 * A word is compound when it has a hyphen, an underscore or an uppercase letter.
 * Placeholder delimiters are stripped first.
 */
export function isCompoundWord(word: string): boolean {
  const inner = unwrapPlaceholder(word);
  return /[-_]/.test(inner) || /\p{Lu}/u.test(inner);
}

export function validateCompoundWord(word: string, field: CompoundWordField): void {
  if (!isCompoundWord(word)) {
    throw new ValidationError(
      ErrorCodes.INVALID_COMPOUND_WORD,
      `The ${field} '${word}' does not appear to be a compound word. ` +
        'Compound words should contain separators like hyphens (-), underscores (_), ' +
        "or mixed case (e.g., 'example-name', 'project_name', 'ProjectName')",
      { field, value: word }
    );
  }
}

/**
 * Re-case a token or replacement. When the word carries a placeholder, only
 * the first placeholder's variable is converted and surrounding text is kept
 * as typed.
 */
export function recase(word: string, convention: CaseConventionName): string {
  const placeholder = findPlaceholder(word);
  if (!placeholder) {
    return toCase(word, convention);
  }
  return (
    placeholder.prefix +
    wrapPlaceholder(toCase(placeholder.inner, convention)) +
    placeholder.suffix
  );
}

/**
 * Build the mapping table for a token/replacement pair.
 * Keys are unique; the literal pair is inserted last and wins on a clash.
 *
 * @throws ValidationError when either input is not a compound word
 */
export function buildCaseShapeMappings(token: string, replacement: string): CaseShapeMapping[] {
  validateCompoundWord(token, 'token');
  validateCompoundWord(replacement, 'replacement');

  const table = new Map<string, CaseShapeMapping>();
  for (const convention of CASE_CONVENTIONS) {
    const original = recase(token, convention.name);
    table.set(original, {
      convention: convention.name,
      original,
      replacement: recase(replacement, convention.name),
    });
  }
  table.set(token, { convention: 'literal', original: token, replacement });

  return [...table.values()];
}
