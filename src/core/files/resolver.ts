/**
 * Resolves command-line paths and globs to the files to format.
 */
import * as path from 'node:path';
import { globFiles, isDirectory, isGlobPattern, relativePosixPath } from '../../utils/file-system.js';
import { createIgnoreFilter, loadIgnoreFiles, type IgnoreFilter } from '../../utils/ignore-file.js';
import { logger } from '../../utils/logger.js';

/** Extensions picked up when a directory is given instead of a file. */
export const SOURCE_EXTENSIONS = [
  'scm', 'ss', 'sls', 'sld', 'sps', 'rkt', 'lisp', 'lsp', 'cl', 'el', 'clj', 'cljs', 'cljc', 'edn', 'fnl', 'janet', 'hy',
];

const ALWAYS_EXCLUDED = ['**/node_modules/**', '**/.git/**'];

export interface ResolveOptions {
  /** Directory that globs and ignore files are relative to */
  projectRoot: string;
  /** Additional gitignore-style exclusions */
  ignore?: string[];
  /** Read .gitignore and .sexpfmtignore from the project root */
  useIgnoreFiles?: boolean;
}

/**
 * Expand paths into a sorted, de-duplicated list of files. Literal file
 * paths are kept even when they don't exist so that the runner reports them.
 */
export async function resolveFiles(paths: string[], options: ResolveOptions): Promise<string[]> {
  const { projectRoot } = options;
  const filter: IgnoreFilter = options.useIgnoreFiles === false
    ? createIgnoreFilter(options.ignore ?? [])
    : await loadIgnoreFiles(projectRoot, options.ignore ?? []);

  const found = new Set<string>();

  for (const input of paths) {
    for (const file of await expandPath(input, projectRoot)) {
      const relative = relativePosixPath(projectRoot, path.resolve(projectRoot, file));
      if (filter.ignores(relative)) {
        logger.debug(`Ignoring ${file}`);
        continue;
      }
      found.add(file);
    }
  }

  return [...found].sort();
}

async function expandPath(input: string, projectRoot: string): Promise<string[]> {
  if (isGlobPattern(input)) {
    return globFiles(input, { cwd: projectRoot, ignore: ALWAYS_EXCLUDED });
  }

  if (await isDirectory(path.resolve(projectRoot, input))) {
    const base = input.replace(/\\/g, '/').replace(/^\.\//, '').replace(/\/+$/, '');
    const prefix = base === '' || base === '.' ? '' : `${base}/`;
    return globFiles(`${prefix}**/*.{${SOURCE_EXTENSIONS.join(',')}}`, { cwd: projectRoot, ignore: ALWAYS_EXCLUDED });
  }

  return [input];
}
