/**
 * Gitignore-style exclusion: `.gitignore`, `.sexpfmtignore` and ad-hoc
 * patterns share one matcher.
 */
import { readFile } from 'fs/promises';
import { join } from 'path';
import ignore, { type Ignore } from 'ignore';
import { fileExists } from './file-system.js';

export const IGNORE_FILENAMES = ['.gitignore', '.sexpfmtignore'];

/** Always skipped, whatever the ignore files say. */
export const BUILTIN_PATTERNS = ['node_modules/', '.git/'];

export interface IgnoreFilter {
  /**
   * Check if a file path should be ignored.
   * @param filePath - Relative path from project root
   */
  ignores(filePath: string): boolean;
}

/**
 * Load the ignore files found at the project root. Missing files contribute
 * nothing.
 */
export async function loadIgnoreFiles(projectRoot: string, extraPatterns: string[] = []): Promise<IgnoreFilter> {
  const patterns: string[] = [];

  for (const name of IGNORE_FILENAMES) {
    const filePath = join(projectRoot, name);
    if (await fileExists(filePath)) {
      patterns.push(...parseIgnoreFile(await readFile(filePath, 'utf-8')));
    }
  }

  return createIgnoreFilter([...patterns, ...extraPatterns]);
}

/**
 * Create an IgnoreFilter from patterns. Paths outside the project root
 * (`../x`) are never ignored.
 */
export function createIgnoreFilter(patterns: string[]): IgnoreFilter {
  const ig: Ignore = ignore().add([...BUILTIN_PATTERNS, ...patterns]);

  return {
    ignores(filePath: string): boolean {
      const normalizedPath = filePath.replace(/\\/g, '/').replace(/^\.\//, '');
      if (normalizedPath === '' || normalizedPath.startsWith('../') || normalizedPath.startsWith('/')) {
        return false;
      }
      return ig.ignores(normalizedPath);
    },
  };
}

/**
 * Parse ignore file content.
 * Follows gitignore syntax:
 * - Lines starting with # are comments
 * - Empty lines are ignored
 * - Patterns starting with ! are negations
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
