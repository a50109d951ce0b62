/**
 * The format command: rewrite files in place, check them, or filter stdin.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { resolveFiles } from '../../core/files/resolver.js';
import { checkFiles, formatFiles, formatStream } from '../../core/runner/runner.js';
import { readStream } from '../../utils/file-system.js';
import { ErrorCodes, SexpfmtError, SystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { StatusReporter, type RunMode } from '../reporter.js';

export interface FormatCommandOptions {
  check?: boolean;
  ignore?: string[];
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
}

/** Streams used by the command; replaced in tests. */
export interface CommandIO {
  stdin: NodeJS.ReadableStream;
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
  colors: boolean;
  cwd: string;
}

function defaultIO(): CommandIO {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    colors: Boolean(process.stderr.isTTY),
    cwd: process.cwd(),
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create the format command.
 */
export function createFormatCommand(): Command {
  return new Command('format')
    .description('Format S-expression files in place (stdin to stdout when no paths are given)')
    .argument('[paths...]', 'Files, directories or glob patterns to format')
    .option('-c, --check', 'Check if files are formatted instead of writing them')
    .option('-i, --ignore <pattern>', 'Skip files matching a gitignore-style pattern (repeatable)', collect, [])
    .option('-v, --verbose', 'List every file processed')
    .option('-q, --quiet', 'Only print errors')
    .option('--config <path>', 'Path to config file')
    .action(async (paths: string[], options: FormatCommandOptions) => {
      process.exitCode = await runFormatCommand(paths, options);
    });
}

/**
 * Run the format command and return its exit code.
 */
export async function runFormatCommand(
  paths: string[],
  options: FormatCommandOptions,
  io: CommandIO = defaultIO()
): Promise<number> {
  if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  }

  try {
    if (paths.length === 0) {
      if (options.check) {
        throw new SystemError(ErrorCodes.STDIN_CHECK, 'cannot check stdin');
      }
      return await formatStdin(io);
    }

    const config = await loadConfig(io.cwd, options.config);
    const files = await resolveFiles(paths, {
      projectRoot: io.cwd,
      ignore: [...config.ignore, ...(options.ignore ?? [])],
      useIgnoreFiles: config.gitignore,
    });

    if (files.length === 0) {
      logger.warn('No files found matching the given patterns.');
      return 0;
    }

    const mode: RunMode = options.check ? 'check' : 'format';
    const runOptions = { concurrency: config.concurrency, cwd: io.cwd };
    const summary = mode === 'check' ? await checkFiles(files, runOptions) : await formatFiles(files, runOptions);

    const reporter = new StatusReporter({ colors: io.colors, verbose: options.verbose });
    for (const line of reporter.formatRun(summary, mode)) {
      io.stderr.write(`${line}\n`);
    }

    return summary.failed === 0 ? 0 : 1;
  } catch (error) {
    if (error instanceof SexpfmtError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}

async function formatStdin(io: CommandIO): Promise<number> {
  const source = await readStream(io.stdin);
  // ParseError propagates to the command's error handler
  io.stdout.write(formatStream(source));
  return 0;
}
