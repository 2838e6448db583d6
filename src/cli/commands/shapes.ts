import { Command } from 'commander';
import chalk from 'chalk';
import { CaseShapeStrategy } from '../../core/strategies/case-shape.js';
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

interface ShapesOptions extends SelectionOptions {
  showMappings?: boolean;
}

/**
 * Create the shapes command.
 */
export function createShapesCommand(): Command {
  const command = new Command('shapes')
    .description('Replace compound words with case shape variants')
    .argument('<token>', "Compound word token to replace (e.g., 'example-name')")
    .argument('<replacement>', "Compound word replacement (e.g., '{{ project-name }}')")
    .argument('[target]', 'Target file or directory (defaults to current directory)')
    .option('--show-mappings', 'Print the generated case variants and exit');

  return addCommonOptions(addSelectionOptions(command)).action(
    async (token: string, replacement: string, target: string | undefined, options: ShapesOptions) => {
      const prompter = new Prompter();
      try {
        await runShapes(token, replacement, target, options, prompter);
      } catch (error) {
        reportError(error, options);
        process.exit(1);
      } finally {
        prompter.close();
      }
    }
  );
}

async function runShapes(
  token: string,
  replacement: string,
  target: string | undefined,
  options: ShapesOptions,
  prompter: Prompter
): Promise<void> {
  const config = await loadCommandConfig(options);
  // Validates both words before anything else happens.
  const strategy = new CaseShapeStrategy(token, replacement);

  if (options.showMappings) {
    printMappings(strategy, options.json === true);
    return;
  }

  const selection = await resolveSelection(options, config.defaults, prompter);

  log.info(`Shapes replacement: '${token}' -> '${replacement}'`);
  const result = await runTransform(strategy, target, selection, options, config, prompter);
  printSummary('Case shapes templating complete!', result, options);
}

function printMappings(strategy: CaseShapeStrategy, json: boolean): void {
  const mappings = strategy.getMappings();
  if (json) {
    console.log(JSON.stringify(mappings, null, 2));
    return;
  }

  console.log(chalk.bold('Case shape mappings:'));
  for (const mapping of mappings) {
    console.log(`  ${chalk.dim(mapping.convention.padEnd(16))}${mapping.original} -> ${mapping.replacement}`);
  }
}
