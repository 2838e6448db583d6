/**
 * Terminal approval for interactive runs: show each change, ask before applying it.
 */
import chalk from 'chalk';
import { structuredPatch } from 'diff';
import type { ChangeApprover, PathChangeType } from '../core/transform/types.js';
import type { Prompter } from './prompt.js';

const HUNK_SEPARATOR = '-'.repeat(40);

/**
 * Render a unified line diff with three lines of context.
 * Returns null when no line differs.
 */
export function renderContentDiff(
  filePath: string,
  oldContent: string,
  newContent: string
): string | null {
  const patch = structuredPatch(filePath, filePath, oldContent, newContent, '', '', {
    context: 3,
  });
  const hunks = patch.hunks.filter((hunk) =>
    hunk.lines.some((line) => line.startsWith('+') || line.startsWith('-'))
  );
  if (hunks.length === 0) {
    return null;
  }

  const output: string[] = [];
  hunks.forEach((hunk, index) => {
    if (index > 0) {
      output.push(chalk.dim(HUNK_SEPARATOR));
    }
    for (const line of hunk.lines) {
      const text = line.slice(1);
      switch (line.charAt(0)) {
        case '-':
          output.push(chalk.red(`- ${text}`));
          break;
        case '+':
          output.push(chalk.green(`+ ${text}`));
          break;
        case ' ':
          output.push(`  ${text}`);
          break;
        // "\ No newline at end of file"
        default:
          break;
      }
    }
  });
  return output.join('\n');
}

export function renderPathChange(oldPath: string, newPath: string): string {
  return [`  ${chalk.red(`- ${oldPath}`)}`, `  ${chalk.green(`+ ${newPath}`)}`].join('\n');
}

export class TerminalApprover implements ChangeApprover {
  constructor(private readonly prompter: Prompter) {}

  async approveContent(
    filePath: string,
    oldContent: string,
    newContent: string,
    description: string
  ): Promise<boolean> {
    console.log();
    console.log(chalk.bold(`📝 ${description}: ${filePath}`));

    const diff = renderContentDiff(filePath, oldContent, newContent);
    if (diff === null) {
      console.log('No changes detected.');
      return false;
    }
    console.log(diff);
    return this.prompter.confirm('Apply this change?');
  }

  async approvePath(oldPath: string, newPath: string, changeType: PathChangeType): Promise<boolean> {
    console.log();
    console.log(chalk.bold(`📁 ${changeType} rename:`));
    console.log(renderPathChange(oldPath, newPath));
    return this.prompter.confirm('Apply this rename?');
  }
}
