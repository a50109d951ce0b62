/**
 * Runs the pipeline over many files.
 *
 * Files are independent: each is read, formatted and written on its own, and
 * one failure never stops the rest.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import { formatOrThrow, formatWithChanges } from '../pipeline/pipeline.js';
import { readFile, writeFile } from '../../utils/file-system.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { FileResult, RunOptions, RunSummary } from './types.js';

/** 75% of available CPUs, min 2, max 16. */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/**
 * Format files in place. Files already in canonical form are not written.
 */
export async function formatFiles(files: string[], options: RunOptions = {}): Promise<RunSummary> {
  return runAll(files, options, async (file) => {
    const fullPath = path.resolve(options.cwd ?? process.cwd(), file);
    const source = await readSource(fullPath, file);
    const result = formatWithChanges(source, { maxWidth: options.maxWidth });
    if (!result.ok) {
      return { file, status: 'error', error: result.error };
    }
    if (!result.value.changed) {
      return { file, status: 'unchanged' };
    }
    try {
      await writeFile(fullPath, result.value.output);
    } catch (error) {
      throw new SystemError(ErrorCodes.FILE_WRITE_ERROR, `Failed to write ${file}: ${describe(error)}`, { file });
    }
    return { file, status: 'formatted' };
  });
}

/**
 * Check that files are canonically formatted without touching them.
 */
export async function checkFiles(files: string[], options: RunOptions = {}): Promise<RunSummary> {
  return runAll(files, options, async (file) => {
    const source = await readSource(path.resolve(options.cwd ?? process.cwd(), file), file);
    const result = formatWithChanges(source, { maxWidth: options.maxWidth });
    if (!result.ok) {
      return { file, status: 'error', error: result.error };
    }
    return { file, status: result.value.changed ? 'fail' : 'ok' };
  });
}

/**
 * Format text read from a stream.
 * @throws ParseError when the text does not parse
 */
export function formatStream(source: string, options: RunOptions = {}): string {
  return formatOrThrow(source, { maxWidth: options.maxWidth });
}

async function readSource(fullPath: string, file: string): Promise<string> {
  try {
    return await readFile(fullPath);
  } catch (error) {
    throw new SystemError(ErrorCodes.FILE_READ_ERROR, `Failed to read ${file}: ${describe(error)}`, { file });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

async function runAll(
  files: string[],
  options: RunOptions,
  task: (file: string) => Promise<FileResult>
): Promise<RunSummary> {
  const concurrency = options.concurrency ?? defaultConcurrency();
  const results: FileResult[] = [];

  logger.debug(`Processing ${files.length} file(s)`, { concurrency });

  for (let i = 0; i < files.length; i += concurrency) {
    const batch = files.slice(i, i + concurrency);
    const settled = await Promise.allSettled(batch.map((file) => task(file)));

    settled.forEach((outcome, j) => {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
      } else {
        const reason: unknown = outcome.reason;
        results.push({
          file: batch[j],
          status: 'error',
          error: reason instanceof Error ? reason : new Error(String(reason)),
        });
      }
    });
  }

  return {
    results,
    total: results.length,
    failed: results.filter((r) => r.status === 'fail' || r.status === 'error').length,
  };
}
