import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { OverlayError } from './errors.js';
import { loadEnvFiles } from './env-loader.js';
import { Logger, createLogger, verbosityFrom } from './logger.js';
import { handleExecCommand } from './commands/exec.js';
import { LayerInputOptions } from './commands/inputs.js';
import { handlePlanCommand, parseFormat } from './commands/plan.js';
import { handlePruneCommand } from './commands/prune.js';

const PackageJsonSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const packageJsonPath = join(__dirname, '..', 'package.json');
  return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8'))).version;
}

interface VerbosityOptions {
  verbose?: boolean;
  quiet?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function addVerbosityOptions(command: Command): Command {
  return command
    .option('-v, --verbose', 'Enable verbose output', false)
    .option('-q, --quiet', 'Only print warnings and errors', false);
}

function addLayerOptions(command: Command): Command {
  return command
    .option(
      '-s, --search-path <path>',
      'Library search path entry (repeatable; defaults to STRATA_SEARCH_PATH)',
      collect,
      []
    )
    .option('-p, --prefix <dir>', 'Canonical installation root (defaults to STRATA_PREFIX)')
    .option('--python <executable>', 'Interpreter to probe for its search path and prefix')
    .option('-c, --config <file>', 'Settings file (defaults to ./strata.yaml when present)')
    .option('--marker <name>', 'Directory name that marks an environment package directory')
    .option('--data-suffix <path>', 'Data subtree below each environment root')
    .option('--config-suffix <path>', 'Config subtree below each environment root')
    .option('--data-home <dir>', 'Parent directory for overlays (defaults to the user data directory)');
}

/**
 * Report a failed command and exit with status 1
 */
function fail(logger: Logger, error: unknown, verbose: boolean | undefined): never {
  if (error instanceof Error) {
    logger.error(error.message);
    if (error instanceof OverlayError && error.hint) {
      logger.info(`Hint: ${error.hint}`);
    }
    if (verbose && error.stack) {
      logger.debug('Stack trace:');
      logger.debug(error.stack);
    }
  } else {
    logger.error(String(error));
  }
  process.exit(1);
}

function commandLogger(options: VerbosityOptions): Logger {
  try {
    return createLogger(verbosityFrom(options));
  } catch (error) {
    return fail(createLogger(), error, false);
  }
}

function commandContext(logger: Logger) {
  const cwd = process.cwd();
  const loaded = loadEnvFiles(cwd, (message) => logger.warn(message));
  for (const file of loaded) {
    logger.debug(`Loaded environment file ${file}`);
  }
  return { cwd, env: process.env, logger };
}

/**
 * Create the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('strata')
    .description('Merge per-environment data directories into one overlay for a downstream process')
    .version(readVersion())
    .enablePositionalOptions();

  addLayerOptions(addVerbosityOptions(
    program
      .command('plan')
      .description('Show the layers and config paths that would be merged, without writing anything')
      .option('--format <format>', 'Output format: text or json', 'text')
  )).action(async (options: LayerInputOptions & VerbosityOptions & { format: string }) => {
    const logger = commandLogger(options);
    try {
      await handlePlanCommand(options, commandContext(logger));
    } catch (error) {
      fail(logger, error, options.verbose);
    }
  });

  addLayerOptions(addVerbosityOptions(
    program
      .command('exec')
      .description('Build the overlay, run a command with it, and remove the overlay afterwards')
      .argument('<command>', 'Command to run')
      .argument('[args...]', 'Arguments for the command')
      .passThroughOptions()
  )).action(async (command: string, args: string[], options: LayerInputOptions & VerbosityOptions) => {
    const logger = commandLogger(options);
    let exitCode: number;
    try {
      exitCode = await handleExecCommand(command, args, options, commandContext(logger));
    } catch (error) {
      fail(logger, error, options.verbose);
    }
    process.exit(exitCode);
  });

  addVerbosityOptions(
    program
      .command('prune')
      .description('Remove overlays left behind by processes that no longer exist')
      .option('-c, --config <file>', 'Settings file (defaults to ./strata.yaml when present)')
      .option('--data-home <dir>', 'Parent directory for overlays (defaults to the user data directory)')
  ).action(async (options: { config?: string; dataHome?: string } & VerbosityOptions) => {
    const logger = commandLogger(options);
    try {
      await handlePruneCommand(options, commandContext(logger));
    } catch (error) {
      fail(logger, error, options.verbose);
    }
  });

  program
    .command('version')
    .description("Display strata's version")
    .option('--output-format <format>', 'Output format: text or json', 'text')
    .action((options: { outputFormat: string }) => {
      const logger = createLogger();
      try {
        const format = parseFormat(options.outputFormat);
        console.log(formatVersion(readVersion(), format));
      } catch (error) {
        fail(logger, error, false);
      }
    });

  return program;
}

export function formatVersion(version: string, format: 'text' | 'json'): string {
  return format === 'json' ? JSON.stringify({ version }) : `strata ${version}`;
}

/**
 * Parse command line arguments and execute
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
