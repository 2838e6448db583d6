/**
 * The double-brace placeholder syntax of the target template engine.
 *
 * `{{ name }}` is a placeholder; anything else is literal text. Only fixed
 * patterns are detected and produced here, nothing is rendered.
 */

/** Source of the placeholder pattern. The inner expression is capture group 1. */
export const PLACEHOLDER_SOURCE = String.raw`\{\{\s*([^}]+?)\s*\}\}`;

/** Expression that renders a single literal opening brace. */
export const ESCAPED_OPEN_BRACE = "{{'{'}}";

export interface PlaceholderMatch {
  /** Text before the placeholder */
  prefix: string;
  /** Inner expression, trimmed */
  inner: string;
  /** Text after the placeholder */
  suffix: string;
}

/**
 * Find the first placeholder in `text`.
 */
export function findPlaceholder(text: string): PlaceholderMatch | null {
  const match = new RegExp(PLACEHOLDER_SOURCE).exec(text);
  if (!match) {
    return null;
  }
  return {
    prefix: text.slice(0, match.index),
    inner: match[1].trim(),
    suffix: text.slice(match.index + match[0].length),
  };
}

/**
 * Canonical placeholder form: one space inside each delimiter.
 */
export function wrapPlaceholder(inner: string): string {
  return `{{ ${inner} }}`;
}

/**
 * Inner variable name of a placeholder-wrapped word, or the word itself.
 */
export function unwrapPlaceholder(text: string): string {
  return findPlaceholder(text)?.inner ?? text;
}
