/**
 * Tests for the scanner.
 */
import { describe, it, expect } from 'vitest';
import { scan } from '../../../../src/core/scanner/scanner.js';
import type { Token } from '../../../../src/core/scanner/types.js';

function summarize(tokens: Token[]): string[] {
  return tokens.map((token) => {
    switch (token.kind) {
      case 'open':
      case 'close':
        return `${token.kind}:${token.delimiter}`;
      case 'blank-line':
        return 'blank-line';
      case 'quote':
        return `quote:${token.quote}:${token.text}`;
      case 'directive':
        return `directive:${token.directive}:${token.text}`;
      default:
        return `${token.kind}:${token.text}`;
    }
  });
}

describe('scan', () => {
  describe('lists and atoms', () => {
    it('should scan a simple list with positions', () => {
      const tokens = scan('(foo bar)');

      expect(summarize(tokens)).toEqual(['open:paren', 'atom:foo', 'atom:bar', 'close:paren']);
      expect(tokens.map((t) => t.position)).toEqual([
        { line: 1, column: 1, offset: 0 },
        { line: 1, column: 2, offset: 1 },
        { line: 1, column: 6, offset: 5 },
        { line: 1, column: 9, offset: 8 },
      ]);
    });

    it('should recognize all three delimiter kinds', () => {
      expect(summarize(scan('[a]{b}'))).toEqual([
        'open:bracket',
        'atom:a',
        'close:bracket',
        'open:brace',
        'atom:b',
        'close:brace',
      ]);
    });

    it('should track lines and columns across newlines', () => {
      const tokens = scan('a\n  b');

      expect(tokens[1].position).toEqual({ line: 2, column: 3, offset: 4 });
    });

    it('should keep quote characters inside an atom', () => {
      expect(summarize(scan("foo'bar"))).toEqual(["atom:foo'bar"]);
    });

    it('should keep escaped delimiters in character literals', () => {
      expect(summarize(scan('#\\( #\\) #\\;'))).toEqual(['atom:#\\(', 'atom:#\\)', 'atom:#\\;']);
    });

    it('should keep a |quoted symbol| whole', () => {
      expect(summarize(scan('|two words| x'))).toEqual(['atom:|two words|', 'atom:x']);
    });

    it('should treat an unclosed bar as an ordinary character', () => {
      expect(summarize(scan('a|b c'))).toEqual(['atom:a|b', 'atom:c']);
    });
  });

  describe('strings', () => {
    it('should scan a string with escaped quotes as one token', () => {
      const tokens = scan('"a \\"b\\" c"');

      expect(tokens).toHaveLength(1);
      expect(tokens[0]).toMatchObject({ kind: 'string', text: '"a \\"b\\" c"', terminated: true });
    });

    it('should keep newlines inside strings', () => {
      expect(summarize(scan('"a\n\n\nb"'))).toEqual(['string:"a\n\n\nb"']);
    });

    it('should flag an unterminated string', () => {
      expect(scan('"abc')[0]).toMatchObject({ kind: 'string', terminated: false });
    });
  });

  describe('comments and blank lines', () => {
    it('should scan a line comment without its newline or trailing spaces', () => {
      expect(summarize(scan('foo ; note  \nbar'))).toEqual(['atom:foo', 'comment:; note', 'atom:bar']);
    });

    it('should collapse a run of newlines into one blank line', () => {
      const tokens = scan('a\n\n\nb');

      expect(summarize(tokens)).toEqual(['atom:a', 'blank-line', 'atom:b']);
      expect(tokens[1].position).toEqual({ line: 1, column: 2, offset: 1 });
    });

    it('should count whitespace-only lines as blank', () => {
      expect(summarize(scan('a \n  \n b'))).toEqual(['atom:a', 'blank-line', 'atom:b']);
    });

    it('should not emit a blank line for a single newline', () => {
      expect(summarize(scan('a\nb'))).toEqual(['atom:a', 'atom:b']);
    });

    it('should scan nested block comments', () => {
      expect(summarize(scan('#| a #| nested |# b |#c'))).toEqual(['block-comment:#| a #| nested |# b |#', 'atom:c']);
    });

    it('should flag an unterminated block comment', () => {
      expect(scan('#| open')[0]).toMatchObject({ kind: 'block-comment', terminated: false });
    });
  });

  describe('quote prefixes', () => {
    it('should scan quote prefixes before a datum', () => {
      expect(summarize(scan('`(a ,b ,@c)'))).toEqual([
        'quote:quasiquote:`',
        'open:paren',
        'atom:a',
        'quote:unquote:,',
        'atom:b',
        'quote:unquote-splicing:,@',
        'atom:c',
        'close:paren',
      ]);
    });

    it('should treat a quote followed by whitespace as an atom', () => {
      expect(summarize(scan("' a"))).toEqual(["atom:'", 'atom:a']);
    });

    it('should treat a quote at end of input as a prefix', () => {
      expect(summarize(scan("'"))).toEqual(["quote:quote:'"]);
    });

    it('should scan the datum comment prefix', () => {
      expect(summarize(scan('#;(a)'))).toEqual(['quote:datum-comment:#;', 'open:paren', 'atom:a', 'close:paren']);
    });

    it('should glue hash syntax to the following list', () => {
      expect(summarize(scan('#(1) #u8(2)'))).toEqual([
        'quote:hash:#',
        'open:paren',
        'atom:1',
        'close:paren',
        'quote:hash:#u8',
        'open:paren',
        'atom:2',
        'close:paren',
      ]);
    });
  });

  describe('directives', () => {
    it('should scan a shebang at the start of the file', () => {
      expect(summarize(scan('#!/usr/bin/env gsi\n(foo)'))).toEqual([
        'directive:shebang:#!/usr/bin/env gsi',
        'open:paren',
        'atom:foo',
        'close:paren',
      ]);
    });

    it('should not treat #! later in the file as a shebang', () => {
      expect(summarize(scan('a\n#!eof'))).toEqual(['atom:a', 'atom:#!eof']);
    });

    it('should scan a #lang line at the top level', () => {
      expect(summarize(scan('#lang racket/base\n(x)'))).toEqual([
        'directive:lang:#lang racket/base',
        'open:paren',
        'atom:x',
        'close:paren',
      ]);
    });

    it('should not scan #lang inside a list as a directive', () => {
      expect(summarize(scan('(\n#lang x)'))).toEqual(['open:paren', 'atom:#lang', 'atom:x', 'close:paren']);
    });

    it('should not confuse longer words with #lang', () => {
      expect(summarize(scan('#language'))).toEqual(['atom:#language']);
    });
  });

  it('should normalize CRLF line endings', () => {
    const tokens = scan('a\r\n\r\nb');

    expect(summarize(tokens)).toEqual(['atom:a', 'blank-line', 'atom:b']);
    expect(tokens[2].position).toEqual({ line: 3, column: 1, offset: 3 });
  });

  it('should strip a leading byte order mark', () => {
    const tokens = scan('\uFEFF(a)');

    expect(summarize(tokens)).toEqual(['open:paren', 'atom:a', 'close:paren']);
    expect(tokens[0].position).toEqual({ line: 1, column: 1, offset: 0 });
  });

  it('should return no tokens for empty input', () => {
    expect(scan('')).toEqual([]);
  });
});
