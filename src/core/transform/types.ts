/**
 * Types for walking a tree and applying a strategy to it.
 */

/**
 * Options for one traversal. Validated by the caller, not by the engine.
 */
export interface TransformOptions {
  /** Rename files and directories */
  paths: boolean;
  /** Rewrite file contents */
  contents: boolean;
  /** Detect and count, but do not touch the filesystem */
  dryRun: boolean;
  /** Globs matched against root-relative POSIX paths; matches are skipped */
  ignore?: string[];
}

/**
 * Counters reported at the end of a traversal.
 */
export interface TransformResult {
  /** Every visited file, changed or not */
  filesProcessed: number;
  /** Files and directories renamed (or that would be, in a dry run) */
  pathsRenamed: number;
  /** Files whose contents were rewritten */
  contentChanges: number;
}

/** Label passed to path approval. */
export type PathChangeType = 'File' | 'Directory' | 'Target Directory';

/**
 * Decides whether each detected change is applied.
 * A rejected change is skipped and not counted; a thrown error aborts the traversal.
 */
export interface ChangeApprover {
  approveContent(
    filePath: string,
    oldContent: string,
    newContent: string,
    description: string
  ): Promise<boolean>;
  approvePath(oldPath: string, newPath: string, changeType: PathChangeType): Promise<boolean>;
}
