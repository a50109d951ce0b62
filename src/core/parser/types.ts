/**
 * Lossless syntax tree.
 *
 * Comments and blank-line markers are ordinary children, kept in source order
 * next to the forms they surround.
 */
import type { DelimiterKind, DirectiveKind, Position, QuoteKind } from '../scanner/types.js';

export type CommentAttachment = 'trailing' | 'leading';

export type CommentStyle = 'line' | 'block';

interface NodeBase {
  position: Position;
  /** Line on which the node's last character sits. */
  endLine: number;
}

export interface AtomNode extends NodeBase {
  kind: 'atom';
  text: string;
}

export interface ListNode extends NodeBase {
  kind: 'list';
  delimiter: DelimiterKind;
  children: SyntaxNode[];
}

export interface QuotedNode extends NodeBase {
  kind: 'quoted';
  quote: QuoteKind;
  prefix: string;
  inner: SyntaxNode;
}

export interface CommentNode extends NodeBase {
  kind: 'comment';
  text: string;
  style: CommentStyle;
  attachment: CommentAttachment;
}

export interface DirectiveNode extends NodeBase {
  kind: 'directive';
  directive: DirectiveKind;
  text: string;
}

export interface BlankNode extends NodeBase {
  kind: 'blank';
}

export type SyntaxNode = AtomNode | ListNode | QuotedNode | CommentNode | DirectiveNode | BlankNode;

/** A line comment ends its output line. */
export function endsLine(node: SyntaxNode): boolean {
  return (node.kind === 'comment' && node.style === 'line') || node.kind === 'directive';
}
