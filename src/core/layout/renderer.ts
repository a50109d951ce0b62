/**
 * Layout engine: renders a document within a column budget.
 *
 * A group is printed flat when its flat rendering, followed by whatever comes
 * after it up to the next line break, fits in the remaining width. The probe
 * never reads past that break.
 */
import type { Doc } from '../document/types.js';

/** Column budget of the canonical style. */
export const MAX_WIDTH = 80;

type Mode = 'flat' | 'break';

interface Command {
  indent: number;
  mode: Mode;
  doc: Doc;
}

/**
 * Render a document to text. Lines carry no trailing whitespace and the
 * result ends with exactly one newline unless it is empty.
 */
export function render(doc: Doc, maxWidth: number = MAX_WIDTH): string {
  const out: string[] = [];
  let column = 0;
  // Indentation owed to the current line, written before its first text.
  let pendingIndent: number | null = null;
  const stack: Command[] = [{ indent: 0, mode: 'break', doc }];

  const write = (value: string): void => {
    if (value.length === 0) return;
    if (pendingIndent !== null) {
      out.push(' '.repeat(pendingIndent));
      column = pendingIndent;
      pendingIndent = null;
    }
    out.push(value);
    const newline = value.lastIndexOf('\n');
    column = newline === -1 ? column + value.length : value.length - newline - 1;
  };

  const newline = (indentation: number): void => {
    out.push('\n');
    column = 0;
    pendingIndent = indentation;
  };

  let command = stack.pop();
  while (command !== undefined) {
    const { indent, mode, doc: current } = command;

    switch (current.kind) {
      case 'text':
        write(current.text);
        break;
      case 'concat':
        for (let i = current.parts.length - 1; i >= 0; i--) {
          stack.push({ indent, mode, doc: current.parts[i] });
        }
        break;
      case 'indent':
        stack.push({ indent: indent + current.width, mode, doc: current.content });
        break;
      case 'line':
        if (mode === 'flat') {
          write(' ');
        } else {
          newline(indent);
        }
        break;
      case 'hardline':
        newline(indent);
        break;
      case 'group': {
        if (mode === 'flat') {
          stack.push({ indent, mode: 'flat', doc: current.content });
          break;
        }
        const flat: Command = { indent, mode: 'flat', doc: current.content };
        const start = pendingIndent ?? column;
        const groupMode: Mode = !current.breaks && fits(flat, stack, maxWidth - start) ? 'flat' : 'break';
        stack.push({ indent, mode: groupMode, doc: current.content });
        break;
      }
    }

    command = stack.pop();
  }

  const output = out.join('').replace(/\n+$/, '');
  return output.length === 0 ? '' : `${output}\n`;
}

/**
 * Whether `next`, followed by the pending commands up to the first line
 * break, fits in `width` columns.
 */
function fits(next: Command, rest: Command[], width: number): boolean {
  let remaining = width;
  let restIndex = rest.length;
  const commands: Command[] = [next];

  while (remaining >= 0) {
    const command = commands.pop();
    if (command === undefined) {
      if (restIndex === 0) return true;
      restIndex--;
      commands.push(rest[restIndex]);
      continue;
    }

    const { mode, doc } = command;
    switch (doc.kind) {
      case 'text': {
        const newline = doc.text.indexOf('\n');
        if (newline === -1) {
          remaining -= doc.text.length;
          break;
        }
        return mode === 'break' && remaining - newline >= 0;
      }
      case 'concat':
        for (let i = doc.parts.length - 1; i >= 0; i--) {
          commands.push({ indent: command.indent, mode, doc: doc.parts[i] });
        }
        break;
      case 'indent':
        commands.push({ indent: command.indent + doc.width, mode, doc: doc.content });
        break;
      case 'line':
        if (mode === 'break') return true;
        remaining -= 1;
        break;
      case 'hardline':
        return true;
      case 'group':
        commands.push({ indent: command.indent, mode: doc.breaks ? 'break' : mode, doc: doc.content });
        break;
    }
  }

  return false;
}
