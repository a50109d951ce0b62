/**
 * Tests for the layout engine.
 */
import { describe, it, expect } from 'vitest';
import { render, MAX_WIDTH } from '../../../../src/core/layout/renderer.js';
import { concat, group, hardLine, indent, line, text } from '../../../../src/core/document/types.js';

const pair = group(concat([text('a'), line, text('b')]));

function list(...items: string[]) {
  const parts = items.flatMap((item, i) => (i === 0 ? [text(item)] : [line, text(item)]));
  return concat([text('('), group(indent(2, concat(parts))), text(')')]);
}

describe('render', () => {
  it('should default to an 80 column budget', () => {
    expect(MAX_WIDTH).toBe(80);
  });

  it('should render nothing as the empty string', () => {
    expect(render(concat([]))).toBe('');
  });

  it('should end output with exactly one newline', () => {
    expect(render(concat([text('a'), hardLine, hardLine]))).toBe('a\n');
  });

  describe('groups', () => {
    it('should flatten a group that fits', () => {
      expect(render(pair)).toBe('a b\n');
    });

    it('should flatten a group that exactly fills the width', () => {
      expect(render(pair, 3)).toBe('a b\n');
    });

    it('should break a group that overflows', () => {
      expect(render(pair, 2)).toBe('a\nb\n');
    });

    it('should count text after the group up to the next line break', () => {
      expect(render(list('a', 'b'), 5)).toBe('(a b)\n');
      expect(render(list('a', 'b'), 4)).toBe('(a\n  b)\n');
    });

    it('should never flatten a group holding a hard line', () => {
      const doc = group(concat([text('a'), line, text('b'), hardLine, text('c')]));

      expect(render(doc)).toBe('a\nb\nc\n');
    });

    it('should never flatten a group holding multi-line text', () => {
      const doc = group(concat([text('"a\nb"'), line, text('c')]));

      expect(render(doc)).toBe('"a\nb"\nc\n');
    });

    it('should fit nested groups independently', () => {
      const doc = group(concat([text('x'), line, group(concat([text('aa'), line, text('bb')]))]));

      expect(render(doc, 6)).toBe('x\naa bb\n');
    });

    it('should break nested lists from the outside in', () => {
      const doc = concat([
        text('('),
        group(indent(2, concat([text('a'), line, list('b', 'c', 'd', 'e', 'f'), line, text('g')]))),
        text(')'),
      ]);

      expect(render(doc, 10)).toBe('(a\n  (b\n    c\n    d\n    e\n    f)\n  g)\n');
    });
  });

  describe('indentation', () => {
    it('should indent lines inside an indent', () => {
      expect(render(list('a', 'b', 'c'), 5)).toBe('(a\n  b\n  c)\n');
    });

    it('should not indent blank lines', () => {
      const doc = indent(2, concat([text('a'), hardLine, hardLine, text('b')]));

      expect(render(doc)).toBe('a\n\n  b\n');
    });

    it('should not leave trailing whitespace on a line that stays empty', () => {
      const doc = concat([indent(2, concat([text('a'), hardLine])), hardLine, text('b')]);

      expect(render(doc)).toBe('a\n\nb\n');
    });
  });
});
