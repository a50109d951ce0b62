/**
 * Token definitions produced by the scanner.
 */

/** 1-based source position plus the offset into the normalized source. */
export interface Position {
  line: number;
  column: number;
  offset: number;
}

export type DelimiterKind = 'paren' | 'bracket' | 'brace';

export type QuoteKind =
  | 'quote'
  | 'quasiquote'
  | 'unquote'
  | 'unquote-splicing'
  | 'datum-comment'
  | 'hash';

export type DirectiveKind = 'shebang' | 'lang';

export type Token =
  | { kind: 'open'; delimiter: DelimiterKind; position: Position }
  | { kind: 'close'; delimiter: DelimiterKind; position: Position }
  | { kind: 'atom'; text: string; position: Position }
  | { kind: 'string'; text: string; terminated: boolean; position: Position }
  | { kind: 'quote'; quote: QuoteKind; text: string; position: Position }
  | { kind: 'comment'; text: string; position: Position }
  | { kind: 'block-comment'; text: string; terminated: boolean; position: Position }
  | { kind: 'directive'; directive: DirectiveKind; text: string; position: Position }
  | { kind: 'blank-line'; position: Position };

export const OPEN_DELIMITERS: Record<DelimiterKind, string> = {
  paren: '(',
  bracket: '[',
  brace: '{',
};

export const CLOSE_DELIMITERS: Record<DelimiterKind, string> = {
  paren: ')',
  bracket: ']',
  brace: '}',
};
