/**
 * Tests for the syntax-escape strategy and the strategy factory.
 */
import { describe, it, expect } from 'vitest';
import { SyntaxEscapeStrategy } from '../../../../src/core/strategies/syntax-escape.js';
import {
  CaseShapeStrategy,
  ExactStrategy,
  createStrategy,
} from '../../../../src/core/strategies/index.js';
import { SystemError, ErrorCodes } from '../../../../src/utils/errors.js';
import { captureError } from '../../../helpers/errors.js';

/** What the template engine prints for the escaped opening brace. */
function render(escaped: string): string {
  return escaped.split("{{'{'}}").join('{');
}

describe('SyntaxEscapeStrategy', () => {
  const strategy = new SyntaxEscapeStrategy();

  describe('transformContent', () => {
    it('should escape a placeholder', () => {
      expect(strategy.transformContent('Hi {{ name }}!')).toBe("Hi {{'{'}}{ name }}!");
    });

    it('should render back to the original text', () => {
      const original = 'Hello {{ name }}, welcome to {{ place }}.';
      const escaped = strategy.transformContent(original);

      expect(escaped).toBe("Hello {{'{'}}{ name }}, welcome to {{'{'}}{ place }}.");
      expect(render(escaped ?? '')).toBe(original);
    });

    it('should normalize inner whitespace', () => {
      const result = strategy.transformContent('{{  spaced-var  }} and {{another-var}}');

      expect(result).toBe("{{'{'}}{ spaced-var }} and {{'{'}}{ another-var }}");
    });

    it('should escape each placeholder on a line separately', () => {
      expect(strategy.transformContent('{{ a }}{{ b }}')).toBe("{{'{'}}{ a }}{{'{'}}{ b }}");
    });

    it('should return null when there is nothing to escape', () => {
      expect(strategy.transformContent('plain text with { single } braces')).toBeNull();
    });
  });

  describe('path methods', () => {
    it('should never rename', () => {
      expect(strategy.transformsPaths).toBe(false);
      expect(strategy.transformPathComponent()).toBeNull();
      expect(strategy.transformFullPath()).toBeNull();
    });
  });

  describe('construction', () => {
    it('should reject a pattern that does not compile', () => {
      const error = captureError(() => new SyntaxEscapeStrategy('('));

      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe(ErrorCodes.PATTERN_ERROR);
        expect(error.details).toEqual({ source: '(' });
      }
    });
  });
});

describe('createStrategy', () => {
  it('should build each kind of strategy', () => {
    const exact = createStrategy({ kind: 'exact', token: 'acme', replacement: '{{ org }}' });
    const shapes = createStrategy({
      kind: 'case-shape',
      token: 'acme-app',
      replacement: '{{ app-name }}',
    });
    const escape = createStrategy({ kind: 'syntax-escape' });

    expect(exact).toBeInstanceOf(ExactStrategy);
    expect(shapes).toBeInstanceOf(CaseShapeStrategy);
    expect(escape).toBeInstanceOf(SyntaxEscapeStrategy);
    expect([exact.kind, shapes.kind, escape.kind]).toEqual(['exact', 'case-shape', 'syntax-escape']);
  });
});
