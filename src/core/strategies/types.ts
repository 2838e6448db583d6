/**
 * Shared contract for substitution strategies.
 */

export type StrategyKind = 'exact' | 'case-shape' | 'syntax-escape';

/**
 * A substitution strategy. Instances are immutable once constructed.
 *
 * Every method returns null when nothing matched, which callers treat as
 * "no change needed".
 */
export interface TemplateStrategy {
  readonly kind: StrategyKind;
  /** Short description of a content change, shown when asking for approval */
  readonly description: string;
  /** Whether path methods can ever return a value */
  readonly transformsPaths: boolean;

  transformContent(content: string): string | null;
  /** New final segment for `filePath` */
  transformPathComponent(filePath: string): string | null;
  /** New path (forward slashes) with matches allowed across segment boundaries */
  transformFullPath(filePath: string): string | null;
}

/** Input needed to build each kind of strategy. */
export type StrategyDefinition =
  | { kind: 'exact'; token: string; replacement: string }
  | { kind: 'case-shape'; token: string; replacement: string }
  | { kind: 'syntax-escape' };
