/**
 * Option handling and reporting shared by the exact, shapes and escape commands.
 */
import * as path from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import type { Config, TransformDefaults } from '../../core/config/schema.js';
import type { TemplateStrategy } from '../../core/strategies/types.js';
import { autoApprove } from '../../core/transform/approval.js';
import { transformTree } from '../../core/transform/tree-transformer.js';
import type { TransformResult } from '../../core/transform/types.js';
import { TemplatizeError, ValidationError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { TerminalApprover } from '../interactive.js';
import type { Prompter } from '../prompt.js';

export interface CommonOptions {
  dryRun?: boolean;
  interactive?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  config?: string;
}

export interface SelectionOptions extends CommonOptions {
  path?: boolean;
  contents?: boolean;
}

export interface Selection {
  paths: boolean;
  contents: boolean;
}

export function addSelectionOptions(command: Command): Command {
  return command
    .option('-p, --path', 'Templatize file and directory paths')
    .option('-c, --contents', 'Templatize file contents');
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('--dry-run', 'Perform a dry run without making changes')
    .option('-i, --interactive', 'Interactive mode - prompt for each change')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only show errors')
    .option('--json', 'Output the result as JSON')
    .option('--config <file>', 'Config file (default: .templatize.yaml)');
}

/**
 * Load the config file and set the log level. Flags win over the config file.
 */
export async function loadCommandConfig(options: CommonOptions): Promise<Config> {
  const config = await loadConfig(process.cwd(), options.config);
  if (options.quiet) {
    log.setLevel('error');
  } else if (options.verbose) {
    log.setLevel('debug');
  } else if (options.json) {
    log.setLevel('warn');
  } else if (config.log_level) {
    log.setLevel(config.log_level);
  }
  return config;
}

/**
 * Decide which of paths/contents to templatize. Explicit flags win, then the
 * config defaults, then the user is asked.
 *
 * @throws ValidationError if both end up disabled
 */
export async function resolveSelection(
  options: SelectionOptions,
  defaults: TransformDefaults,
  prompter: Prompter
): Promise<Selection> {
  let selection: Selection;
  if (options.path || options.contents) {
    selection = { paths: options.path === true, contents: options.contents === true };
  } else if (defaults.paths !== undefined || defaults.contents !== undefined) {
    selection = { paths: defaults.paths ?? false, contents: defaults.contents ?? false };
  } else {
    selection = {
      paths: await prompter.confirm('Enable path templating (-p)?'),
      contents: await prompter.confirm('Enable contents templating (-c)?'),
    };
  }

  if (!selection.paths && !selection.contents) {
    throw new ValidationError(
      ErrorCodes.NO_TRANSFORM_SELECTED,
      'At least one of --path (-p) or --contents (-c) must be enabled'
    );
  }
  return selection;
}

/**
 * Run the strategy over the target, asking for each change in interactive mode.
 */
export async function runTransform(
  strategy: TemplateStrategy,
  target: string | undefined,
  selection: Selection,
  options: CommonOptions,
  config: Config,
  prompter: Prompter
): Promise<TransformResult> {
  const targetPath = path.resolve(target ?? process.cwd());

  log.info(`Target: ${targetPath}`);
  log.info(`Path templating: ${selection.paths}`);
  log.info(`Contents templating: ${selection.contents}`);
  log.info(`Interactive mode: ${options.interactive === true}`);
  if (options.dryRun) {
    log.warn('Dry run mode - no changes will be made');
  }

  const approver = options.interactive ? new TerminalApprover(prompter) : autoApprove;
  return transformTree(
    targetPath,
    strategy,
    {
      paths: selection.paths,
      contents: selection.contents,
      dryRun: options.dryRun === true,
      ignore: config.ignore,
    },
    approver
  );
}

export function printSummary(
  heading: string,
  result: TransformResult,
  options: CommonOptions,
  includePaths: boolean = true
): void {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log(chalk.green(heading));
  console.log(`  Files processed: ${result.filesProcessed}`);
  if (includePaths) {
    console.log(`  Paths renamed: ${result.pathsRenamed}`);
  }
  console.log(`  Content changes: ${result.contentChanges}`);
}

/**
 * Report a failed command. With `--json`, errors raised by templatize are
 * printed as their JSON form on stdout.
 */
export function reportError(error: unknown, options: CommonOptions): void {
  if (options.json && error instanceof TemplatizeError) {
    console.log(JSON.stringify(error.toJSON(), null, 2));
    return;
  }
  log.error(error instanceof Error ? error.message : 'Unknown error');
}
