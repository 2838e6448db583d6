import type { ChangeApprover } from './types.js';

/**
 * Approver for non-interactive runs: every change is applied.
 */
export const autoApprove: ChangeApprover = {
  approveContent: async () => true,
  approvePath: async () => true,
};
