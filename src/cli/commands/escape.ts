import { Command } from 'commander';
import { SyntaxEscapeStrategy } from '../../core/strategies/syntax-escape.js';
import { logger as log } from '../../utils/logger.js';
import { Prompter } from '../prompt.js';
import {
  addCommonOptions,
  loadCommandConfig,
  printSummary,
  reportError,
  runTransform,
  type CommonOptions,
} from './shared.js';

/**
 * Create the escape command.
 */
export function createEscapeCommand(): Command {
  const command = new Command('escape')
    .description('Escape existing template syntax in file contents')
    .argument('[target]', 'Target file or directory (defaults to current directory)');

  return addCommonOptions(command).action(async (target: string | undefined, options: CommonOptions) => {
    const prompter = new Prompter();
    try {
      await runEscape(target, options, prompter);
    } catch (error) {
      reportError(error, options);
      process.exit(1);
    } finally {
      prompter.close();
    }
  });
}

async function runEscape(
  target: string | undefined,
  options: CommonOptions,
  prompter: Prompter
): Promise<void> {
  const config = await loadCommandConfig(options);
  const strategy = new SyntaxEscapeStrategy();

  log.info('Escaping existing template syntax');
  const result = await runTransform(
    strategy,
    target,
    { paths: false, contents: true },
    options,
    config,
    prompter
  );
  printSummary('Escaping complete!', result, options, false);
}
