import { Command } from 'commander';
import { ExactStrategy } from '../../core/strategies/exact.js';
import { logger as log } from '../../utils/logger.js';
import { Prompter } from '../prompt.js';
import {
  addCommonOptions,
  addSelectionOptions,
  loadCommandConfig,
  printSummary,
  reportError,
  resolveSelection,
  runTransform,
  type SelectionOptions,
} from './shared.js';

/**
 * Create the exact command.
 */
export function createExactCommand(): Command {
  const command = new Command('exact')
    .description('Replace exact token with exact template syntax')
    .argument('<token>', 'Exact token to replace')
    .argument('<replacement>', 'Exact template syntax to replace it with')
    .argument('[target]', 'Target file or directory (defaults to current directory)');

  return addCommonOptions(addSelectionOptions(command)).action(
    async (token: string, replacement: string, target: string | undefined, options: SelectionOptions) => {
      const prompter = new Prompter();
      try {
        await runExact(token, replacement, target, options, prompter);
      } catch (error) {
        reportError(error, options);
        process.exit(1);
      } finally {
        prompter.close();
      }
    }
  );
}

async function runExact(
  token: string,
  replacement: string,
  target: string | undefined,
  options: SelectionOptions,
  prompter: Prompter
): Promise<void> {
  const config = await loadCommandConfig(options);
  const strategy = new ExactStrategy(token, replacement);
  const selection = await resolveSelection(options, config.defaults, prompter);

  log.info(`Exact replacement: '${token}' -> '${replacement}'`);
  const result = await runTransform(strategy, target, selection, options, config, prompter);
  printSummary('Templating complete!', result, options);
}
