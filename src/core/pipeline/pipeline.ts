/**
 * Formatting pipeline: scan, parse, build, render.
 *
 * Pure and synchronous; every call owns its own trees.
 */
import { ParseError } from '../../utils/errors.js';
import { build } from '../document/builder.js';
import { MAX_WIDTH, render } from '../layout/renderer.js';
import { parse } from '../parser/parser.js';
import { scan } from '../scanner/scanner.js';
import type { CheckResult, FormatResult, FormattedSource, PipelineOptions, Result } from './types.js';

/**
 * Format source text, throwing ParseError on malformed input.
 */
export function formatOrThrow(input: string, options: PipelineOptions = {}): string {
  return render(build(parse(scan(input))), options.maxWidth ?? MAX_WIDTH);
}

/**
 * Format source text into its canonical layout.
 */
export function format(input: string, options: PipelineOptions = {}): FormatResult {
  return capture(() => formatOrThrow(input, options));
}

/**
 * Format source text and report whether the layout changed.
 */
export function formatWithChanges(input: string, options: PipelineOptions = {}): Result<FormattedSource, ParseError> {
  return capture(() => {
    const output = formatOrThrow(input, options);
    return { output, changed: output !== input };
  });
}

/**
 * Whether the input is already canonically formatted.
 */
export function check(input: string, options: PipelineOptions = {}): CheckResult {
  return capture(() => formatOrThrow(input, options) === input);
}

function capture<T>(run: () => T): Result<T, ParseError> {
  try {
    return { ok: true, value: run() };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}
