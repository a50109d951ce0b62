/**
 * Layout document IR.
 */

export type Doc = TextDoc | ConcatDoc | IndentDoc | LineDoc | HardLineDoc | GroupDoc;

export interface TextDoc {
  kind: 'text';
  text: string;
}

export interface ConcatDoc {
  kind: 'concat';
  parts: Doc[];
}

export interface IndentDoc {
  kind: 'indent';
  width: number;
  content: Doc;
}

/** Soft break: a space when its group is flat, else a newline. */
export interface LineDoc {
  kind: 'line';
}

export interface HardLineDoc {
  kind: 'hardline';
}

export interface GroupDoc {
  kind: 'group';
  content: Doc;
  /** Set when the content holds a hard line; such a group never flattens. */
  breaks: boolean;
}

export const line: LineDoc = { kind: 'line' };

export const hardLine: HardLineDoc = { kind: 'hardline' };

export function text(value: string): TextDoc {
  return { kind: 'text', text: value };
}

export function concat(parts: Doc[]): ConcatDoc {
  return { kind: 'concat', parts };
}

export function indent(width: number, content: Doc): IndentDoc {
  return { kind: 'indent', width, content };
}

export function group(content: Doc): GroupDoc {
  return { kind: 'group', content, breaks: containsHardLine(content) };
}

function containsHardLine(doc: Doc): boolean {
  const pending: Doc[] = [doc];
  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    switch (current.kind) {
      case 'hardline':
        return true;
      case 'group':
        // Nested groups already know
        if (current.breaks) return true;
        break;
      case 'concat':
        for (const part of current.parts) pending.push(part);
        break;
      case 'indent':
        pending.push(current.content);
        break;
      case 'text':
      case 'line':
        break;
    }
  }
  return false;
}
