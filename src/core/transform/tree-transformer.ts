/**
 * Tree transformer - applies a strategy to every file and path under a target.
 *
 * Per directory: enumerate once, recurse into child directories (contents
 * only), rename the child directories last-to-first, then process the files
 * of the directory. The target directory itself is renamed at the very end.
 * A path is therefore never renamed while anything below it still has to be
 * read or written.
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import {
  fileExists,
  getPathKind,
  isSameEntry,
  missingParents,
  movePath,
  readTextFile,
  toPosixPath,
  writeFile,
} from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { TemplateStrategy } from '../strategies/types.js';
import { autoApprove } from './approval.js';
import { ResultAccumulator } from './result.js';
import type {
  ChangeApprover,
  PathChangeType,
  TransformOptions,
  TransformResult,
} from './types.js';

const log = logger.child('transform');

/** State owned by one run. */
interface WalkContext {
  /** Directory that full-path renames are computed against */
  root: string;
  result: ResultAccumulator;
  /** Entries created by full-path moves; already handled, never listed again */
  arrived: Set<string>;
}

interface PlannedRename {
  newPath: string | null;
  /** True when the entry leaves its directory */
  moved: boolean;
}

const RENAME_VERBS: Record<PathChangeType, string> = {
  File: 'file',
  Directory: 'directory',
  'Target Directory': 'target directory',
};

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name < b.name) return -1;
  return a.name > b.name ? 1 : 0;
}

export class TreeTransformer {
  private readonly approver: ChangeApprover;

  constructor(
    private readonly strategy: TemplateStrategy,
    private readonly options: TransformOptions,
    approver: ChangeApprover = autoApprove
  ) {
    this.approver = approver;
  }

  /**
   * Walk `target` (a file or a directory) and return the counters.
   *
   * @throws SystemError if the target is missing or is neither file nor directory
   */
  async run(target: string): Promise<TransformResult> {
    const targetPath = path.resolve(target);
    const context: WalkContext = {
      root: targetPath,
      result: new ResultAccumulator(),
      arrived: new Set(),
    };

    log.info(`Starting ${this.strategy.kind} templating: ${targetPath}`);

    const kind = await getPathKind(targetPath);
    switch (kind) {
      case 'file':
        context.root = path.dirname(targetPath);
        await this.processFile(targetPath, context);
        break;
      case 'directory':
        await this.processDirectoryContents(targetPath, context);
        if (this.renamesPaths()) {
          await this.renamePath(targetPath, 'Target Directory', context);
        }
        break;
      case 'missing':
        throw new SystemError(
          ErrorCodes.TARGET_NOT_FOUND,
          `Target does not exist: ${targetPath}`,
          { target: targetPath }
        );
      default:
        throw new SystemError(
          ErrorCodes.UNSUPPORTED_TARGET,
          `Target is not a file or directory: ${targetPath}`,
          { target: targetPath, kind }
        );
    }

    const result = context.result.toResult();
    log.info(
      `Processing complete: ${result.filesProcessed} files processed, ` +
        `${result.pathsRenamed} paths renamed, ${result.contentChanges} content changes`
    );
    return result;
  }

  private renamesPaths(): boolean {
    return this.options.paths && this.strategy.transformsPaths;
  }

  private async processDirectoryContents(dir: string, context: WalkContext): Promise<void> {
    log.debug(`Processing directory contents: ${dir}`);

    // One listing per directory; later renames never re-read it.
    const entries = (await fs.readdir(dir, { withFileTypes: true })).sort(byName);
    const directories: string[] = [];
    const files: string[] = [];

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (this.isIgnored(entryPath, context)) {
        log.debug(`Ignoring: ${entryPath}`);
      } else if (context.arrived.has(entryPath)) {
        log.debug(`Already processed before moving: ${entryPath}`);
      } else if (entry.isDirectory()) {
        directories.push(entryPath);
      } else if (entry.isFile()) {
        files.push(entryPath);
      } else {
        log.debug(`Skipping non-regular entry: ${entryPath}`);
      }
    }

    for (const childDir of directories) {
      await this.processDirectoryContents(childDir, context);
    }

    if (this.renamesPaths()) {
      for (const childDir of [...directories].reverse()) {
        await this.renamePath(childDir, 'Directory', context);
      }
    }

    for (const file of files) {
      await this.processFile(file, context);
    }
  }

  private async processFile(file: string, context: WalkContext): Promise<void> {
    log.debug(`Processing file: ${file}`);
    context.result.recordFile();

    if (this.options.contents) {
      await this.rewriteContents(file, context);
    }
    if (this.renamesPaths()) {
      await this.renamePath(file, 'File', context);
    }
  }

  private async rewriteContents(file: string, context: WalkContext): Promise<void> {
    const content = await readTextFile(file);
    if (content === null) {
      log.debug(`Skipping binary file: ${file}`);
      return;
    }

    const newContent = this.strategy.transformContent(content);
    if (newContent === null) {
      return;
    }

    const approved = await this.approver.approveContent(
      file,
      content,
      newContent,
      this.strategy.description
    );
    if (!approved) {
      log.debug(`Content change declined: ${file}`);
      return;
    }

    if (this.options.dryRun) {
      log.info(`Would update contents of: ${file}`);
    } else {
      log.info(`Updating contents of: ${file}`);
      await writeFile(file, newContent);
    }
    context.result.recordContentChange();
  }

  private async renamePath(
    current: string,
    changeType: PathChangeType,
    context: WalkContext
  ): Promise<void> {
    const planned =
      changeType === 'Target Directory'
        ? { newPath: this.renameComponent(current), moved: false }
        : this.planRename(current, context);
    const { newPath, moved } = planned;
    if (newPath === null) {
      return;
    }

    await this.checkCollision(current, newPath);

    const approved = await this.approver.approvePath(current, newPath, changeType);
    if (!approved) {
      log.debug(`Rename declined: ${current}`);
      return;
    }

    const verb = RENAME_VERBS[changeType];
    if (this.options.dryRun) {
      log.info(`Would rename ${verb}: ${current} -> ${newPath}`);
    } else {
      log.info(`Renaming ${verb}: ${current} -> ${newPath}`);
      if (moved) {
        // The destination may sit in a directory the walk has yet to list.
        for (const created of await missingParents(newPath)) {
          context.arrived.add(created);
        }
        context.arrived.add(newPath);
      }
      await movePath(current, newPath);
    }
    context.result.recordRename();
  }

  /**
   * Destination for an entry below the root. A match spanning several
   * segments moves the entry to a new location, unless the parent path
   * matches on its own (the entry then travels with that ancestor and only
   * its own name is considered).
   */
  private planRename(current: string, context: WalkContext): PlannedRename {
    const relative = toPosixPath(path.relative(context.root, current));
    const parent = path.posix.dirname(relative);

    if (parent !== '.' && this.strategy.transformFullPath(parent) === null) {
      const destination = this.strategy.transformFullPath(relative);
      if (destination !== null) {
        const newPath = path.join(context.root, ...destination.split('/'));
        return { newPath, moved: path.dirname(newPath) !== path.dirname(current) };
      }
    }
    return { newPath: this.renameComponent(current), moved: false };
  }

  private renameComponent(current: string): string | null {
    const newName = this.strategy.transformPathComponent(current);
    return newName === null ? null : path.join(path.dirname(current), newName);
  }

  private async checkCollision(current: string, newPath: string): Promise<void> {
    if (!(await fileExists(newPath))) {
      return;
    }
    // Same entry: the path itself, or a case-only rename on a case-insensitive filesystem.
    if (await isSameEntry(current, newPath)) {
      return;
    }
    if (this.options.dryRun) {
      log.warn(`Rename destination already exists: ${newPath}`);
      return;
    }
    throw new SystemError(
      ErrorCodes.RENAME_COLLISION,
      `Cannot rename ${current} -> ${newPath}: destination already exists`,
      { from: current, to: newPath }
    );
  }

  private isIgnored(entryPath: string, context: WalkContext): boolean {
    const patterns = this.options.ignore ?? [];
    if (patterns.length === 0) {
      return false;
    }
    const relative = toPosixPath(path.relative(context.root, entryPath));
    return patterns.some((pattern) =>
      minimatch(relative, pattern, { dot: true, matchBase: true })
    );
  }
}

/**
 * Run a strategy over `target` once.
 */
export async function transformTree(
  target: string,
  strategy: TemplateStrategy,
  options: TransformOptions,
  approver: ChangeApprover = autoApprove
): Promise<TransformResult> {
  return new TreeTransformer(strategy, options, approver).run(target);
}
