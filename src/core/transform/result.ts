import type { TransformResult } from './types.js';

/**
 * Counters owned by a single traversal.
 */
export class ResultAccumulator {
  private filesProcessed = 0;
  private pathsRenamed = 0;
  private contentChanges = 0;

  recordFile(): void {
    this.filesProcessed++;
  }

  recordRename(): void {
    this.pathsRenamed++;
  }

  recordContentChange(): void {
    this.contentChanges++;
  }

  toResult(): TransformResult {
    return {
      filesProcessed: this.filesProcessed,
      pathsRenamed: this.pathsRenamed,
      contentChanges: this.contentChanges,
    };
  }
}
