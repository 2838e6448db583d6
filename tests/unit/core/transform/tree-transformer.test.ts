/**
 * Tests for the tree transformer.
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { TreeTransformer, transformTree } from '../../../../src/core/transform/tree-transformer.js';
import type {
  ChangeApprover,
  PathChangeType,
  TransformOptions,
} from '../../../../src/core/transform/types.js';
import { CaseShapeStrategy } from '../../../../src/core/strategies/case-shape.js';
import { ExactStrategy } from '../../../../src/core/strategies/exact.js';
import { SyntaxEscapeStrategy } from '../../../../src/core/strategies/syntax-escape.js';
import { SystemError, ErrorCodes } from '../../../../src/utils/errors.js';
import { logger } from '../../../../src/utils/logger.js';
import { captureRejection } from '../../../helpers/errors.js';
import {
  exists,
  listFiles,
  makeTempDir,
  readTreeFile,
  removeDir,
  writeTree,
} from '../../../helpers/temp-tree.js';

const BOTH: TransformOptions = { paths: true, contents: true, dryRun: false };
const PATHS_ONLY: TransformOptions = { paths: true, contents: false, dryRun: false };
const CONTENTS_ONLY: TransformOptions = { paths: false, contents: true, dryRun: false };

type Decision = boolean | ((change: PathChangeType | 'Content') => boolean);

function recordingApprover(answer: Decision = true) {
  const decide = (change: PathChangeType | 'Content'): boolean =>
    typeof answer === 'boolean' ? answer : answer(change);
  const pathCalls: Array<[string, PathChangeType]> = [];
  const contentCalls: string[] = [];
  const approver: ChangeApprover = {
    approveContent: async (filePath) => {
      contentCalls.push(path.basename(filePath));
      return decide('Content');
    },
    approvePath: async (oldPath, _newPath, changeType) => {
      pathCalls.push([path.basename(oldPath), changeType]);
      return decide(changeType);
    },
  };
  return { approver, pathCalls, contentCalls };
}

describe('TreeTransformer', () => {
  let base: string;
  let root: string;
  const exact = new ExactStrategy('example-name', '{{ project-name }}');

  beforeAll(() => {
    logger.setLevel('silent');
  });

  afterAll(() => {
    logger.setLevel('info');
  });

  beforeEach(async () => {
    base = await makeTempDir();
    root = path.join(base, 'workspace');
    await fs.mkdir(root);
  });

  afterEach(async () => {
    await removeDir(base);
  });

  describe('exact strategy', () => {
    beforeEach(async () => {
      await writeTree(root, {
        'example-name/example-name.txt': 'Hello example-name',
        'README.md': 'example-name docs',
        'plain.txt': 'nothing here',
      });
    });

    it('should rewrite contents and rename files and directories', async () => {
      const result = await transformTree(root, exact, BOTH);

      expect(result).toEqual({ filesProcessed: 3, pathsRenamed: 2, contentChanges: 2 });
      expect(await listFiles(root)).toEqual([
        'README.md',
        'plain.txt',
        '{{ project-name }}/{{ project-name }}.txt',
      ]);
      expect(await readTreeFile(root, '{{ project-name }}/{{ project-name }}.txt')).toBe(
        'Hello {{ project-name }}'
      );
      expect(await readTreeFile(root, 'README.md')).toBe('{{ project-name }} docs');
    });

    it('should only rename when contents are off', async () => {
      const result = await transformTree(root, exact, PATHS_ONLY);

      expect(result).toEqual({ filesProcessed: 3, pathsRenamed: 2, contentChanges: 0 });
      expect(await readTreeFile(root, 'README.md')).toBe('example-name docs');
    });

    it('should only rewrite contents when paths are off', async () => {
      const result = await transformTree(root, exact, CONTENTS_ONLY);

      expect(result).toEqual({ filesProcessed: 3, pathsRenamed: 0, contentChanges: 2 });
      expect(await exists(path.join(root, 'example-name', 'example-name.txt'))).toBe(true);
    });

    it('should count the same in a dry run and leave the tree untouched', async () => {
      const copy = path.join(base, 'copy');
      await fs.cp(root, copy, { recursive: true });

      const dry = await transformTree(copy, exact, { ...BOTH, dryRun: true });
      const real = await transformTree(root, exact, BOTH);

      expect(dry).toEqual(real);
      expect(await listFiles(copy)).toEqual([
        'README.md',
        'example-name/example-name.txt',
        'plain.txt',
      ]);
      expect(await readTreeFile(copy, 'README.md')).toBe('example-name docs');
    });
  });

  describe('traversal order', () => {
    it('should rename nested directories after their contents', async () => {
      await writeTree(root, {
        'acme-widgets/AcmeWidgets.java': 'class AcmeWidgets {}',
        'acme-widgets/acme_widgets/config.yml': 'name: acme_widgets',
      });
      const strategy = new CaseShapeStrategy('acme-widgets', '{{ app-name }}');

      const result = await transformTree(root, strategy, BOTH);

      expect(result).toEqual({ filesProcessed: 2, pathsRenamed: 3, contentChanges: 2 });
      expect(await listFiles(root)).toEqual([
        '{{ app-name }}/{{ AppName }}.java',
        '{{ app-name }}/{{ app_name }}/config.yml',
      ]);
      expect(await readTreeFile(root, '{{ app-name }}/{{ app_name }}/config.yml')).toBe(
        'name: {{ app_name }}'
      );
    });

    it('should rename sibling directories last to first', async () => {
      await writeTree(root, {
        'alpha-example-name/keep.txt': 'a',
        'beta-example-name/keep.txt': 'b',
      });
      const { approver, pathCalls } = recordingApprover();

      await transformTree(root, exact, PATHS_ONLY, approver);

      expect(pathCalls).toEqual([
        ['beta-example-name', 'Directory'],
        ['alpha-example-name', 'Directory'],
      ]);
    });

    it('should rename the target directory itself last', async () => {
      const target = path.join(base, 'example-name');
      await writeTree(target, { 'example-name.txt': 'x' });
      const { approver, pathCalls } = recordingApprover();

      const result = await transformTree(target, exact, PATHS_ONLY, approver);

      expect(result.pathsRenamed).toBe(2);
      expect(pathCalls).toEqual([
        ['example-name.txt', 'File'],
        ['example-name', 'Target Directory'],
      ]);
      expect(await listFiles(path.join(base, '{{ project-name }}'))).toEqual([
        '{{ project-name }}.txt',
      ]);
    });
  });

  describe('binary files', () => {
    it('should skip binary contents but still count and rename the file', async () => {
      const bytes = new Uint8Array([0xff, 0xfe, 0x00, 0x80]);
      await writeTree(root, {
        'example-name.bin': bytes,
        'notes.txt': 'see example-name',
      });

      const result = await transformTree(root, exact, BOTH);

      expect(result).toEqual({ filesProcessed: 2, pathsRenamed: 1, contentChanges: 1 });
      const kept = await fs.readFile(path.join(root, '{{ project-name }}.bin'));
      expect([...kept]).toEqual([0xff, 0xfe, 0x00, 0x80]);
    });
  });

  describe('byte order marks', () => {
    it('should keep a leading BOM when rewriting contents', async () => {
      await writeTree(root, {
        'bom.txt': new Uint8Array([0xef, 0xbb, 0xbf, ...Buffer.from('example-name')]),
      });
      const strategy = new ExactStrategy('example-name', 'X');

      const result = await transformTree(root, strategy, CONTENTS_ONLY);

      expect(result.contentChanges).toBe(1);
      expect([...(await fs.readFile(path.join(root, 'bom.txt')))]).toEqual([0xef, 0xbb, 0xbf, 0x58]);
    });
  });

  describe('approval', () => {
    beforeEach(async () => {
      await writeTree(root, { 'example-name.txt': 'example-name' });
    });

    it('should skip and not count declined changes', async () => {
      const { approver, pathCalls, contentCalls } = recordingApprover(false);

      const result = await transformTree(root, exact, BOTH, approver);

      expect(result).toEqual({ filesProcessed: 1, pathsRenamed: 0, contentChanges: 0 });
      expect(contentCalls).toEqual(['example-name.txt']);
      expect(pathCalls).toEqual([['example-name.txt', 'File']]);
      expect(await readTreeFile(root, 'example-name.txt')).toBe('example-name');
    });

    it('should decide each change on its own', async () => {
      const { approver } = recordingApprover((changeType) => changeType === 'File');

      const result = await transformTree(root, exact, BOTH, approver);

      expect(result).toEqual({ filesProcessed: 1, pathsRenamed: 1, contentChanges: 0 });
      expect(await readTreeFile(root, '{{ project-name }}.txt')).toBe('example-name');
    });

    it('should abort when the approver fails', async () => {
      const failure = new Error('input closed');
      const approver: ChangeApprover = {
        approveContent: async () => {
          throw failure;
        },
        approvePath: async () => true,
      };

      await expect(transformTree(root, exact, BOTH, approver)).rejects.toBe(failure);
    });
  });

  describe('full-path renames', () => {
    it('should move an entry when a match spans several segments', async () => {
      await writeTree(root, {
        'src/main/java/com/acme/widgets/User.java': 'package com.acme.widgets;',
      });
      const strategy = new ExactStrategy('com/acme/widgets', 'org/{{ package-root }}');

      const result = await transformTree(root, strategy, BOTH);

      expect(result).toEqual({ filesProcessed: 1, pathsRenamed: 1, contentChanges: 0 });
      expect(await listFiles(root)).toEqual(['src/main/java/org/{{ package-root }}/User.java']);
      expect(await exists(path.join(root, 'src', 'main', 'java', 'com', 'acme'))).toBe(true);
    });

    it('should not walk a moved subtree again inside a sibling listed later', async () => {
      await writeTree(root, {
        'java/com/acme/widgets/User.java': 'class User {}',
        'java/org/Other.java': 'class Other {}',
      });
      const copy = path.join(base, 'copy');
      await fs.cp(root, copy, { recursive: true });
      const strategy = new ExactStrategy('com/acme/widgets', 'org/{{ package-root }}');

      const dry = await transformTree(copy, strategy, { ...BOTH, dryRun: true });
      const real = await transformTree(root, strategy, BOTH);

      expect(dry).toEqual({ filesProcessed: 2, pathsRenamed: 1, contentChanges: 0 });
      expect(real).toEqual(dry);
      expect(await listFiles(root)).toEqual([
        'java/org/Other.java',
        'java/org/{{ package-root }}/User.java',
      ]);
    });

    it('should not walk directories created for a move', async () => {
      await writeTree(root, {
        'java/com/acme/widgets/User.java': 'com/acme/widgets',
        'java/org/Other.java': 'class Other {}',
      });
      const copy = path.join(base, 'copy');
      await fs.cp(root, copy, { recursive: true });
      const strategy = new ExactStrategy('com/acme/widgets', 'org/extra/{{ package-root }}');

      const dry = await transformTree(copy, strategy, { ...BOTH, dryRun: true });
      const real = await transformTree(root, strategy, BOTH);

      expect(dry).toEqual({ filesProcessed: 2, pathsRenamed: 1, contentChanges: 1 });
      expect(real).toEqual(dry);
      expect(await readTreeFile(root, 'java/org/extra/{{ package-root }}/User.java')).toBe(
        'org/extra/{{ package-root }}'
      );
    });
  });

  describe('targets', () => {
    it('should process a single file target', async () => {
      await writeTree(root, { 'example-name.txt': 'example-name' });

      const result = await transformTree(path.join(root, 'example-name.txt'), exact, BOTH);

      expect(result).toEqual({ filesProcessed: 1, pathsRenamed: 1, contentChanges: 1 });
      expect(await readTreeFile(root, '{{ project-name }}.txt')).toBe('{{ project-name }}');
    });

    it('should reject a missing target', async () => {
      const missing = path.join(base, 'missing');

      const error = await captureRejection(transformTree(missing, exact, BOTH));

      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe(ErrorCodes.TARGET_NOT_FOUND);
        expect(error.message).toBe(`Target does not exist: ${missing}`);
      }
    });
  });

  describe('ignore patterns', () => {
    it('should skip ignored entries entirely', async () => {
      await writeTree(root, {
        '.git/config': 'example-name',
        'node_modules/example-name/index.js': 'example-name',
        'src/example-name.ts': 'export const name = "example-name";',
      });
      const transformer = new TreeTransformer(exact, {
        ...BOTH,
        ignore: ['.git', 'node_modules'],
      });

      const result = await transformer.run(root);

      expect(result).toEqual({ filesProcessed: 1, pathsRenamed: 1, contentChanges: 1 });
      expect(await readTreeFile(root, '.git/config')).toBe('example-name');
      expect(await readTreeFile(root, 'src/{{ project-name }}.ts')).toBe(
        'export const name = "{{ project-name }}";'
      );
    });
  });

  describe('collisions', () => {
    beforeEach(async () => {
      await writeTree(root, {
        'example-name.txt': 'first',
        '{{ project-name }}.txt': 'second',
      });
    });

    it('should refuse to overwrite an existing destination', async () => {
      const error = await captureRejection(transformTree(root, exact, PATHS_ONLY));

      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe(ErrorCodes.RENAME_COLLISION);
      }
      expect(await readTreeFile(root, '{{ project-name }}.txt')).toBe('second');
    });

    it.runIf(process.platform === 'linux')(
      'should refuse a case-only rename onto a different existing file',
      async () => {
        await writeTree(root, { 'acme.txt': 'lower', 'ACME.txt': 'upper' });
        const upper = new ExactStrategy('acme', 'ACME');

        const error = await captureRejection(transformTree(root, upper, PATHS_ONLY));

        expect(error).toBeInstanceOf(SystemError);
        if (error instanceof SystemError) {
          expect(error.code).toBe(ErrorCodes.RENAME_COLLISION);
        }
        expect(await readTreeFile(root, 'acme.txt')).toBe('lower');
        expect(await readTreeFile(root, 'ACME.txt')).toBe('upper');
      }
    );

    it('should only warn in a dry run', async () => {
      const result = await transformTree(root, exact, { ...PATHS_ONLY, dryRun: true });

      expect(result).toEqual({ filesProcessed: 2, pathsRenamed: 1, contentChanges: 0 });
    });
  });

  describe('syntax-escape strategy', () => {
    it('should rewrite contents and never rename', async () => {
      const target = path.join(base, '{{ name }}');
      await writeTree(target, { '{{ name }}.txt': 'Hi {{ name }}' });

      const result = await transformTree(target, new SyntaxEscapeStrategy(), BOTH);

      expect(result).toEqual({ filesProcessed: 1, pathsRenamed: 0, contentChanges: 1 });
      expect(await readTreeFile(target, '{{ name }}.txt')).toBe("Hi {{'{'}}{ name }}");
    });
  });
});
