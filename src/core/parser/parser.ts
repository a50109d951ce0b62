/**
 * Parser from tokens to the lossless syntax tree.
 *
 * Lists are tracked on an explicit frame stack, so nesting depth is bounded by
 * memory rather than by the call stack.
 */
import { ParseError } from '../../utils/errors.js';
import { CLOSE_DELIMITERS, OPEN_DELIMITERS, type DelimiterKind, type Position, type Token } from '../scanner/types.js';
import type { CommentNode, ListNode, SyntaxNode } from './types.js';

type QuoteToken = Extract<Token, { kind: 'quote' }>;

interface Frame {
  /** The open delimiter, or null for the top-level sequence. */
  open: { delimiter: DelimiterKind; position: Position } | null;
  children: SyntaxNode[];
  /** Prefixes still waiting for their datum, outermost first. */
  prefixes: QuoteToken[];
  /** Comments met between a prefix and its datum. */
  held: CommentNode[];
}

function lastLine(position: Position, text: string): number {
  let line = position.line;
  for (const char of text) {
    if (char === '\n') line++;
  }
  return line;
}

function createFrame(open: Frame['open']): Frame {
  return { open, children: [], prefixes: [], held: [] };
}

/**
 * Parse a token sequence into top-level nodes.
 * @throws ParseError on unbalanced or dangling structure
 */
export function parse(tokens: Token[]): SyntaxNode[] {
  return new Parser().run(tokens);
}

class Parser {
  private readonly stack: Frame[] = [createFrame(null)];

  run(tokens: Token[]): SyntaxNode[] {
    // Directives are only recognized before the first form
    let inPrefix = true;

    for (const token of tokens) {
      if (token.kind === 'directive' && inPrefix) {
        this.top().children.push({
          kind: 'directive',
          directive: token.directive,
          text: token.text,
          position: token.position,
          endLine: token.position.line,
        });
        continue;
      }
      if (token.kind !== 'blank-line') {
        inPrefix = false;
      }
      this.accept(token);
    }

    const frame = this.top();
    const pending = frame.prefixes[frame.prefixes.length - 1];
    if (pending) {
      throw dangling(pending);
    }
    if (frame.open) {
      const { delimiter, position } = frame.open;
      throw new ParseError('UnclosedList', position.line, position.column, `unclosed '${OPEN_DELIMITERS[delimiter]}'`);
    }
    return frame.children;
  }

  private accept(token: Token): void {
    const frame = this.top();

    switch (token.kind) {
      case 'blank-line':
        // Blank lines between a prefix and its datum are dropped
        if (frame.prefixes.length === 0) {
          this.blank(frame, token.position);
        }
        return;
      case 'comment':
        this.comment(frame, token.text, 'line', token.position, token.position.line);
        return;
      case 'block-comment':
        if (!token.terminated) {
          throw new ParseError(
            'UnterminatedComment',
            token.position.line,
            token.position.column,
            'unterminated block comment'
          );
        }
        this.comment(frame, token.text, 'block', token.position, lastLine(token.position, token.text));
        return;
      case 'directive':
        // Out of place: kept verbatim on a line of its own.
        this.trivia(frame, {
          kind: 'comment',
          text: token.text,
          style: 'line',
          attachment: 'leading',
          position: token.position,
          endLine: token.position.line,
        });
        return;
      case 'atom':
        this.complete({ kind: 'atom', text: token.text, position: token.position, endLine: lastLine(token.position, token.text) });
        return;
      case 'string':
        if (!token.terminated) {
          throw new ParseError(
            'UnterminatedString',
            token.position.line,
            token.position.column,
            'unterminated string literal'
          );
        }
        this.complete({ kind: 'atom', text: token.text, position: token.position, endLine: lastLine(token.position, token.text) });
        return;
      case 'quote':
        frame.prefixes.push(token);
        return;
      case 'open':
        this.stack.push(createFrame({ delimiter: token.delimiter, position: token.position }));
        return;
      case 'close':
        this.close(frame, token.delimiter, token.position);
        return;
    }
  }

  private close(frame: Frame, delimiter: DelimiterKind, position: Position): void {
    const pending = frame.prefixes[frame.prefixes.length - 1];
    if (pending) {
      throw dangling(pending);
    }
    if (frame.open === null) {
      throw new ParseError('UnexpectedClose', position.line, position.column, `unexpected '${CLOSE_DELIMITERS[delimiter]}'`);
    }

    const open = frame.open;
    if (open.delimiter !== delimiter) {
      throw new ParseError(
        'MismatchedDelimiter',
        position.line,
        position.column,
        `expected '${CLOSE_DELIMITERS[open.delimiter]}' to close '${OPEN_DELIMITERS[open.delimiter]}' ` +
          `from line ${open.position.line}, column ${open.position.column}, found '${CLOSE_DELIMITERS[delimiter]}'`
      );
    }

    this.stack.pop();
    if (frame.children[frame.children.length - 1]?.kind === 'blank') {
      frame.children.pop();
    }
    const list: ListNode = {
      kind: 'list',
      delimiter,
      children: frame.children,
      position: open.position,
      endLine: position.line,
    };
    this.complete(list);
  }

  /**
   * Add a finished datum to the current frame, wrapped in any pending
   * prefixes. Comments held back by those prefixes go in front of it.
   */
  private complete(datum: SyntaxNode): void {
    const frame = this.top();
    let node = datum;
    for (let prefix = frame.prefixes.pop(); prefix !== undefined; prefix = frame.prefixes.pop()) {
      node = {
        kind: 'quoted',
        quote: prefix.quote,
        prefix: prefix.text,
        inner: node,
        position: prefix.position,
        endLine: node.endLine,
      };
    }
    frame.children.push(...frame.held, node);
    frame.held = [];
  }

  private blank(frame: Frame, position: Position): void {
    const previous = frame.children[frame.children.length - 1];
    if (previous === undefined || previous.kind === 'blank') {
      return;
    }
    frame.children.push({ kind: 'blank', position, endLine: position.line });
  }

  private comment(frame: Frame, text: string, style: CommentNode['style'], position: Position, endLine: number): void {
    const previous = frame.children[frame.children.length - 1];
    const trailing = previous !== undefined && previous.kind !== 'blank' && previous.endLine === position.line;
    this.trivia(frame, { kind: 'comment', text, style, attachment: trailing ? 'trailing' : 'leading', position, endLine });
  }

  private trivia(frame: Frame, comment: CommentNode): void {
    if (frame.prefixes.length > 0) {
      frame.held.push({ ...comment, attachment: 'leading' });
    } else {
      frame.children.push(comment);
    }
  }

  private top(): Frame {
    return this.stack[this.stack.length - 1];
  }
}

function dangling(prefix: QuoteToken): ParseError {
  return new ParseError(
    'DanglingQuote',
    prefix.position.line,
    prefix.position.column,
    `'${prefix.text}' is not followed by a datum`
  );
}
