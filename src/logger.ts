/**
 * Console logger for the CLI.
 *
 * Every level writes to stderr so that stdout stays reserved for structured
 * output (plans, version JSON) and for the output of the wrapped command.
 */

export type Verbosity = 'quiet' | 'default' | 'verbose';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  divider(): void;
}

export type LogSink = (line: string) => void;

const defaultSink: LogSink = (line) => console.error(line);

export function createLogger(verbosity: Verbosity = 'default', sink: LogSink = defaultSink): Logger {
  const quiet = verbosity === 'quiet';
  const verbose = verbosity === 'verbose';

  return {
    info: (message) => {
      if (!quiet) sink(`[INFO] ${message}`);
    },
    // Warnings and errors survive --quiet
    warn: (message) => sink(`[WARN] ${message}`),
    error: (message) => sink(`[ERROR] ${message}`),
    debug: (message) => {
      if (verbose) sink(`[DEBUG] ${message}`);
    },
    divider: () => {
      if (verbose) sink('─'.repeat(60));
    },
  };
}

export function verbosityFrom(options: { verbose?: boolean; quiet?: boolean }): Verbosity {
  if (options.verbose && options.quiet) {
    throw new Error('--verbose and --quiet cannot be used together');
  }
  if (options.verbose) return 'verbose';
  if (options.quiet) return 'quiet';
  return 'default';
}
