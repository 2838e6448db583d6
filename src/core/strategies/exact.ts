import { lastSegment, toPosixPath } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { StrategyKind, TemplateStrategy } from './types.js';

const log = logger.child('exact');

/**
 * Replaces every literal occurrence of a token.
 */
export class ExactStrategy implements TemplateStrategy {
  readonly kind: StrategyKind = 'exact';
  readonly description = 'Content change';
  readonly transformsPaths = true;

  constructor(
    readonly token: string,
    readonly replacement: string
  ) {}

  transformContent(content: string): string | null {
    const count = this.countMatches(content, this.token);
    if (count === 0) {
      return null;
    }
    log.debug(`Content replacement: found ${count} occurrences`);
    return content.split(this.token).join(this.replacement);
  }

  transformPathComponent(filePath: string): string | null {
    const name = lastSegment(filePath);
    if (this.countMatches(name, this.token) === 0) {
      return null;
    }
    const newName = name.split(this.token).join(this.replacement);
    log.debug(`Path replacement: '${name}' -> '${newName}'`);
    return newName;
  }

  transformFullPath(filePath: string): string | null {
    const normalizedPath = toPosixPath(filePath);
    const normalizedToken = toPosixPath(this.token);
    if (this.countMatches(normalizedPath, normalizedToken) === 0) {
      return null;
    }
    const newPath = normalizedPath.split(normalizedToken).join(this.replacement);
    log.debug(`Full path replacement: '${filePath}' -> '${newPath}'`);
    return newPath;
  }

  private countMatches(text: string, token: string): number {
    // An empty token never matches.
    return token.length === 0 ? 0 : text.split(token).length - 1;
  }
}
