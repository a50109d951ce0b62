/**
 * Scanner: turns source text into positioned tokens.
 *
 * Total over any input. Characters that cannot start anything else end up in
 * atoms, so structural problems surface in the parser with a position.
 */
import type { DelimiterKind, Position, QuoteKind, Token } from './types.js';

const OPENERS: Record<string, DelimiterKind> = { '(': 'paren', '[': 'bracket', '{': 'brace' };
const CLOSERS: Record<string, DelimiterKind> = { ')': 'paren', ']': 'bracket', '}': 'brace' };

const QUOTES: Record<string, QuoteKind> = {
  "'": 'quote',
  '`': 'quasiquote',
  ',': 'unquote',
};

/** Drop a leading byte order mark and normalize line endings to `\n`. */
export function normalizeSource(source: string): string {
  return source.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n');
}

export function isWhitespace(char: string | undefined): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === '\f' || char === '\v';
}

function isAtomTerminator(char: string): boolean {
  return isWhitespace(char) || char in OPENERS || char in CLOSERS || char === ';';
}

/**
 * Scan source text into tokens.
 */
export function scan(source: string): Token[] {
  return new Scanner(normalizeSource(source)).run();
}

class Scanner {
  private offset = 0;
  private line = 1;
  private column = 1;
  private depth = 0;
  private readonly tokens: Token[] = [];

  constructor(private readonly source: string) {}

  run(): Token[] {
    while (this.offset < this.source.length) {
      this.next();
    }
    return this.tokens;
  }

  private next(): void {
    const char = this.peek();
    const position = this.position();

    if (isWhitespace(char)) {
      this.whitespace(position);
      return;
    }

    if (char in OPENERS) {
      this.advance(1);
      this.depth++;
      this.tokens.push({ kind: 'open', delimiter: OPENERS[char], position });
      return;
    }

    if (char in CLOSERS) {
      this.advance(1);
      this.depth = Math.max(0, this.depth - 1);
      this.tokens.push({ kind: 'close', delimiter: CLOSERS[char], position });
      return;
    }

    if (char === ';') {
      const text = this.restOfLine().trimEnd();
      this.tokens.push({ kind: 'comment', text, position });
      return;
    }

    if (char === '"') {
      const terminated = this.skipDelimited('"');
      this.tokens.push({ kind: 'string', text: this.slice(position), terminated, position });
      return;
    }

    if (char === '#') {
      if (this.hashForm(position)) return;
    }

    if (char in QUOTES) {
      const text = char === ',' && this.peek(1) === '@' ? ',@' : char;
      if (!isWhitespace(this.peek(text.length))) {
        this.advance(text.length);
        const quote: QuoteKind = text === ',@' ? 'unquote-splicing' : QUOTES[char];
        this.tokens.push({ kind: 'quote', quote, text, position });
        return;
      }
    }

    this.atom(position);
  }

  /** Directives, block comments and `#;`. Returns false for ordinary atoms. */
  private hashForm(position: Position): boolean {
    if (this.offset === 0 && this.peek(1) === '!') {
      this.tokens.push({ kind: 'directive', directive: 'shebang', text: this.restOfLine().trimEnd(), position });
      return true;
    }
    if (this.column === 1 && this.depth === 0 && this.startsLangLine()) {
      this.tokens.push({ kind: 'directive', directive: 'lang', text: this.restOfLine().trimEnd(), position });
      return true;
    }
    if (this.peek(1) === '|') {
      const terminated = this.blockComment();
      this.tokens.push({ kind: 'block-comment', text: this.slice(position), terminated, position });
      return true;
    }
    if (this.peek(1) === ';') {
      this.advance(2);
      this.tokens.push({ kind: 'quote', quote: 'datum-comment', text: '#;', position });
      return true;
    }
    return false;
  }

  private atom(position: Position): void {
    do {
      const char = this.peek();
      if (char === '\\') {
        this.advance(Math.min(2, this.source.length - this.offset));
      } else if (char === '"' || (char === '|' && this.closesOnLine('|'))) {
        this.skipDelimited(char);
      } else {
        this.advance(1);
      }
    } while (this.offset < this.source.length && !isAtomTerminator(this.peek()));

    const text = this.slice(position);
    // `#(`, `#u8(`, `#'(`: the hash syntax belongs to the following list.
    if (text.startsWith('#') && this.peek() in OPENERS) {
      this.tokens.push({ kind: 'quote', quote: 'hash', text, position });
      return;
    }
    this.tokens.push({ kind: 'atom', text, position });
  }

  private whitespace(position: Position): void {
    let newlines = 0;
    while (this.offset < this.source.length && isWhitespace(this.peek())) {
      if (this.peek() === '\n') newlines++;
      this.advance(1);
    }
    if (newlines >= 2) {
      this.tokens.push({ kind: 'blank-line', position });
    }
  }

  /** Consume a `quote`-delimited run with backslash escapes. */
  private skipDelimited(quote: string): boolean {
    this.advance(1);
    while (this.offset < this.source.length) {
      const char = this.peek();
      if (char === '\\') {
        this.advance(Math.min(2, this.source.length - this.offset));
      } else {
        this.advance(1);
        if (char === quote) return true;
      }
    }
    return false;
  }

  /** Consume a nested `#| ... |#` comment. */
  private blockComment(): boolean {
    let nesting = 0;
    while (this.offset < this.source.length) {
      if (this.source.startsWith('#|', this.offset)) {
        nesting++;
        this.advance(2);
      } else if (this.source.startsWith('|#', this.offset)) {
        nesting--;
        this.advance(2);
        if (nesting === 0) return true;
      } else {
        this.advance(1);
      }
    }
    return false;
  }

  private startsLangLine(): boolean {
    return this.source.startsWith('#lang', this.offset) && (this.peek(5) === '' || isWhitespace(this.peek(5)));
  }

  /** Whether an unescaped `quote` follows on the current line. */
  private closesOnLine(quote: string): boolean {
    for (let i = this.offset + 1; i < this.source.length; i++) {
      const char = this.source[i];
      if (char === '\\') {
        i++;
      } else if (char === quote) {
        return true;
      } else if (char === '\n') {
        return false;
      }
    }
    return false;
  }

  private restOfLine(): string {
    const start = this.offset;
    const end = this.source.indexOf('\n', start);
    this.advance((end === -1 ? this.source.length : end) - start);
    return this.source.slice(start, this.offset);
  }

  private advance(count: number): void {
    for (let i = 0; i < count; i++) {
      if (this.source[this.offset] === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.offset++;
    }
  }

  private peek(ahead = 0): string {
    return this.source[this.offset + ahead] ?? '';
  }

  private slice(from: Position): string {
    return this.source.slice(from.offset, this.offset);
  }

  private position(): Position {
    return { line: this.line, column: this.column, offset: this.offset };
  }
}
