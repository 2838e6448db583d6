/**
 * Strategy exports and factory.
 */
import { CaseShapeStrategy } from './case-shape.js';
import { ExactStrategy } from './exact.js';
import { SyntaxEscapeStrategy } from './syntax-escape.js';
import type { StrategyDefinition, TemplateStrategy } from './types.js';

export { ExactStrategy, CaseShapeStrategy, SyntaxEscapeStrategy };
export type { StrategyKind, StrategyDefinition, TemplateStrategy } from './types.js';

/**
 * Build the strategy described by `definition`.
 *
 * @throws ValidationError for a case-shape definition whose words are not compound
 */
export function createStrategy(definition: StrategyDefinition): TemplateStrategy {
  switch (definition.kind) {
    case 'exact':
      return new ExactStrategy(definition.token, definition.replacement);
    case 'case-shape':
      return new CaseShapeStrategy(definition.token, definition.replacement);
    case 'syntax-escape':
      return new SyntaxEscapeStrategy();
  }
}
