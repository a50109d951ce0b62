/**
 * Document builder: syntax tree to layout document.
 *
 * Lists are built bottom-up from an explicit work stack, so deeply nested
 * input never exhausts the call stack.
 */
import { CLOSE_DELIMITERS, OPEN_DELIMITERS } from '../scanner/types.js';
import { endsLine, type ListNode, type QuotedNode, type SyntaxNode } from '../parser/types.js';
import { concat, group, hardLine, indent, line, text, type Doc } from './types.js';

/** Indentation of list children relative to the enclosing line. */
export const INDENT_WIDTH = 2;

/**
 * Build the document for a whole source file.
 */
export function build(nodes: SyntaxNode[]): Doc {
  const { parts } = sequence(nodes, buildAll(nodes), hardLine);
  return concat(parts);
}

/**
 * Build the document for a single node.
 */
export function buildNode(node: SyntaxNode): Doc {
  return buildAll([node])[0];
}

interface Frame {
  nodes: SyntaxNode[];
  next: number;
  /** Built documents, one per node already visited. */
  docs: Doc[];
  /** The list these nodes belong to, absent for the outermost sequence. */
  list?: ListNode;
  /** Prefix text glued in front of the list. */
  prefix: string;
}

/** Documents for `nodes`, one per node. */
function buildAll(nodes: SyntaxNode[]): Doc[] {
  const root: Frame = { nodes, next: 0, docs: [], prefix: '' };
  const stack: Frame[] = [root];

  for (let frame = root; ; frame = stack[stack.length - 1]) {
    if (frame.next < frame.nodes.length) {
      const node = frame.nodes[frame.next++];
      const { prefix, datum } = unwrap(node);
      if (datum.kind === 'list') {
        stack.push({ nodes: datum.children, next: 0, docs: [], list: datum, prefix });
      } else {
        frame.docs.push(withPrefix(prefix, leaf(datum)));
      }
      continue;
    }

    stack.pop();
    if (frame.list === undefined) {
      return frame.docs;
    }
    stack[stack.length - 1].docs.push(withPrefix(frame.prefix, buildList(frame.list, frame.docs)));
  }
}

type Unquoted = Exclude<SyntaxNode, QuotedNode>;

/** Strip quote prefixes down to the datum they apply to. */
function unwrap(node: SyntaxNode): { prefix: string; datum: Unquoted } {
  let prefix = '';
  let datum = node;
  while (datum.kind === 'quoted') {
    prefix += datum.prefix;
    datum = datum.inner;
  }
  return { prefix, datum };
}

function withPrefix(prefix: string, doc: Doc): Doc {
  return prefix === '' ? doc : concat([text(prefix), doc]);
}

function leaf(node: Exclude<Unquoted, ListNode>): Doc {
  switch (node.kind) {
    case 'atom':
    case 'comment':
    case 'directive':
      return text(node.text);
    case 'blank':
      return hardLine;
  }
}

function buildList(node: ListNode, docs: Doc[]): Doc {
  const { parts, endsWithLine } = sequence(node.children, docs, line);
  return concat([
    text(OPEN_DELIMITERS[node.delimiter]),
    group(concat([indent(INDENT_WIDTH, concat(parts)), ...(endsWithLine ? [hardLine] : [])])),
    text(CLOSE_DELIMITERS[node.delimiter]),
  ]);
}

interface Sequence {
  parts: Doc[];
  /** The last node was a line comment, whose line break is still owed. */
  endsWithLine: boolean;
}

/**
 * Lay out sibling nodes with `separator` between forms. Comments and blank
 * markers adjust the separator in front of the node that follows them.
 */
function sequence(nodes: SyntaxNode[], docs: Doc[], separator: Doc): Sequence {
  const parts: Doc[] = [];
  let previous: SyntaxNode | undefined;
  let blank = false;

  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    if (node.kind === 'blank') {
      blank = previous !== undefined;
      continue;
    }

    if (previous !== undefined) {
      parts.push(...separate(previous, node, blank, separator));
    }
    parts.push(docs[i]);
    previous = node;
    blank = false;
  }

  return { parts, endsWithLine: previous !== undefined && endsLine(previous) };
}

function separate(previous: SyntaxNode, node: SyntaxNode, blank: boolean, separator: Doc): Doc[] {
  if (blank) {
    return [hardLine, hardLine];
  }
  if (endsLine(previous)) {
    return [hardLine];
  }
  if (node.kind === 'comment' && node.style === 'line') {
    return node.attachment === 'trailing' ? [text(' ')] : [hardLine];
  }
  return [separator];
}
