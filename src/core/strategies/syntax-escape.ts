import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { ESCAPED_OPEN_BRACE, PLACEHOLDER_SOURCE } from '../placeholder.js';
import type { StrategyKind, TemplateStrategy } from './types.js';

const log = logger.child('escape');

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, 'g');
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PATTERN_ERROR,
      `Failed to create syntax escaper: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    );
  }
}

/**
 * Escapes existing `{{ expr }}` placeholders so they survive rendering as
 * literal text.
 *
 * `{{ expr }}` becomes `{{'{'}}{ expr }}`: the first expression renders a
 * single `{`, and `{ expr }}` is plain text, so the rendered output is
 * `{{ expr }}` again.
 */
export class SyntaxEscapeStrategy implements TemplateStrategy {
  readonly kind: StrategyKind = 'syntax-escape';
  readonly description = 'Syntax escaping';
  readonly transformsPaths = false;

  private readonly pattern: RegExp;

  /**
   * @throws SystemError if the detection pattern does not compile
   */
  constructor(source: string = PLACEHOLDER_SOURCE) {
    this.pattern = compilePattern(source);
  }

  transformContent(content: string): string | null {
    let count = 0;
    const escaped = content.replace(this.pattern, (_match, inner: string) => {
      count++;
      return `${ESCAPED_OPEN_BRACE}{ ${inner.trim()} }}`;
    });
    if (count === 0) {
      return null;
    }
    log.debug(`Syntax escaping: found ${count} placeholder expressions`);
    return escaped;
  }

  transformPathComponent(): string | null {
    return null;
  }

  transformFullPath(): string | null {
    return null;
  }
}
