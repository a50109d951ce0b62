/**
 * Per-file status lines for the format and check commands.
 */
import chalk from 'chalk';
import type { FileResult, RunSummary } from '../core/runner/types.js';

export type RunMode = 'format' | 'check';

export interface ReporterOptions {
  /** Use colors in output */
  colors: boolean;
  /** Also list files that need no attention */
  verbose: boolean;
}

type Color = 'green' | 'yellow' | 'red' | 'blue';

/**
 * Renders run results as tab-separated `STATUS\tfile[\tmessage]` lines.
 */
export class StatusReporter {
  private options: ReporterOptions;

  constructor(options: Partial<ReporterOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  /** Line for one file, or null when the file is not worth a line. */
  formatResult(result: FileResult): string | null {
    switch (result.status) {
      case 'error':
        return `${this.colorize('ERROR', 'red')}\t${result.file}\t${result.error?.message ?? 'unknown error'}`;
      case 'fail':
        return `${this.colorize('FAIL', 'yellow')}\t${result.file}`;
      case 'formatted':
        return this.options.verbose ? `${this.colorize('FORMAT', 'blue')}\t${result.file}` : null;
      case 'ok':
      case 'unchanged':
        return this.options.verbose ? `${this.colorize('OK', 'green')}\t${result.file}` : null;
    }
  }

  /** Closing line, or null when nothing failed. */
  formatSummary(summary: RunSummary, mode: RunMode): string | null {
    if (summary.failed === 0) {
      return null;
    }
    const suffix = mode === 'format' ? ' to format' : '';
    return `${summary.failed} / ${summary.total} file(s) failed${suffix}`;
  }

  formatRun(summary: RunSummary, mode: RunMode): string[] {
    const lines: string[] = [];
    for (const result of summary.results) {
      const line = this.formatResult(result);
      if (line !== null) lines.push(line);
    }
    const closing = this.formatSummary(summary, mode);
    if (closing !== null) lines.push(closing);
    return lines;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }
    return chalk[color](text);
  }
}
