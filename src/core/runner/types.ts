/**
 * Runner result types.
 */

/**
 * Per-file outcome.
 * - formatted: rewritten in place
 * - unchanged: already canonical, not written
 * - ok / fail: check mode verdicts
 * - error: unreadable, unwritable or unparseable
 */
export type FileStatus = 'formatted' | 'unchanged' | 'ok' | 'fail' | 'error';

export interface FileResult {
  file: string;
  status: FileStatus;
  error?: Error;
}

export interface RunSummary {
  results: FileResult[];
  total: number;
  /** Files with status `fail` or `error` */
  failed: number;
}

export interface RunOptions {
  /** Directory relative file paths are resolved against (default: process cwd) */
  cwd?: string;
  /** Files processed in parallel */
  concurrency?: number;
  /** Column budget passed through to the pipeline */
  maxWidth?: number;
}
