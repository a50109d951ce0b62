/**
 * Pipeline result types.
 */
import type { ParseError } from '../../utils/errors.js';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface PipelineOptions {
  /** Column budget handed to the layout engine. */
  maxWidth?: number;
}

export interface FormattedSource {
  output: string;
  /** False when the input was already canonical. */
  changed: boolean;
}

export type FormatResult = Result<string, ParseError>;

export type CheckResult = Result<boolean, ParseError>;
