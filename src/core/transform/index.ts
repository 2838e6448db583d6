export { TreeTransformer, transformTree } from './tree-transformer.js';
export { ResultAccumulator } from './result.js';
export { autoApprove } from './approval.js';
export type {
  ChangeApprover,
  PathChangeType,
  TransformOptions,
  TransformResult,
} from './types.js';
