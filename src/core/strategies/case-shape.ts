import { lastSegment, toPosixPath } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { buildCaseShapeMappings, type CaseShapeMapping } from '../case-shape/mapping.js';
import type { StrategyKind, TemplateStrategy } from './types.js';

const log = logger.child('shapes');

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replaces every casing variant of a compound token with the same casing of
 * the replacement.
 */
export class CaseShapeStrategy implements TemplateStrategy {
  readonly kind: StrategyKind = 'case-shape';
  readonly description = 'Case shape change';
  readonly transformsPaths = true;

  private readonly mappings: readonly CaseShapeMapping[];
  private readonly lookup: ReadonlyMap<string, string>;
  private readonly pattern: RegExp;

  /**
   * @throws ValidationError when token or replacement is not a compound word
   */
  constructor(token: string, replacement: string) {
    this.mappings = buildCaseShapeMappings(token, replacement);
    this.lookup = new Map(this.mappings.map((m) => [m.original, m.replacement]));

    // Longest key first, so a variant that is a substring of another never
    // claims a position the longer variant also matches.
    const keys = this.mappings
      .map((m) => m.original)
      .sort((a, b) => b.length - a.length || a.localeCompare(b));
    this.pattern = new RegExp(keys.map(escapeRegExp).join('|'), 'g');

    for (const mapping of this.mappings) {
      log.debug(`Case shape mapping: ${mapping.original} -> ${mapping.replacement}`);
    }
  }

  getMappings(): CaseShapeMapping[] {
    return this.mappings.map((m) => ({ ...m }));
  }

  transformContent(content: string): string | null {
    let matched = false;
    const result = content.replace(this.pattern, (key) => {
      matched = true;
      return this.lookup.get(key) ?? key;
    });
    return matched ? result : null;
  }

  transformPathComponent(filePath: string): string | null {
    const name = lastSegment(filePath);
    const newName = this.transformContent(name);
    if (newName === null || newName === name) {
      return null;
    }
    log.debug(`Case shape path replacement: '${name}' -> '${newName}'`);
    return newName;
  }

  transformFullPath(filePath: string): string | null {
    const normalizedPath = toPosixPath(filePath);
    const newPath = this.transformContent(normalizedPath);
    if (newPath === null || newPath === normalizedPath) {
      return null;
    }
    log.debug(`Case shape full path replacement: '${filePath}' -> '${newPath}'`);
    return newPath;
  }
}
