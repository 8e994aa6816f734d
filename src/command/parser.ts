/**
 * Command Line Parsing
 *
 * Splits an input line into a command or an expression. Prefixes:
 * - `!!expr` always evaluates
 * - `!word ...` runs command `word` when one exists, otherwise evaluates
 * - `expr?` / `expr??` inspect / show the source of a value
 */

export type Escape = '' | '!' | '!!';

export type ParsedLine =
  | { type: 'empty' }
  | { type: 'command'; name: string; arg: string; escape: Escape }
  | { type: 'evaluate'; source: string; escape: Escape };

export interface ParseContext {
  isCommand(name: string): boolean;
  /** Whether `name` is a local of the current frame */
  isLocal(name: string): boolean;
}

const WORD = /^([A-Za-z_$][\w$]*)([\s\S]*)$/;
const ASSIGNMENT = /^(?:=(?!=)|\*\*=|<<=|>>>?=|&&=|\|\|=|\?\?=|[-+*/%&|^]=)/;

function splitWord(text: string): { word: string; rest: string } | null {
  const match = text.match(WORD);
  return match ? { word: match[1], rest: match[2] } : null;
}

/**
 * The text after a command word makes the line an expression: member access,
 * a call, indexing or an assignment.
 */
export function continuesAsExpression(rest: string): boolean {
  if (/^[.([]/.test(rest)) {
    return true;
  }
  return ASSIGNMENT.test(rest.trimStart());
}

export function parseLine(line: string, context: ParseContext): ParsedLine {
  const text = line.trim();
  if (text === '') {
    return { type: 'empty' };
  }

  if (text.startsWith('!!')) {
    return { type: 'evaluate', source: text.slice(2).trimStart(), escape: '!!' };
  }

  if (text.startsWith('!')) {
    const body = text.slice(1).trimStart();
    const split = splitWord(body);
    if (split && context.isCommand(split.word) && !continuesAsExpression(split.rest)) {
      return { type: 'command', name: split.word, arg: split.rest.trim(), escape: '!' };
    }
    return { type: 'evaluate', source: body, escape: '!' };
  }

  if (text.length > 2 && text.endsWith('??') && context.isCommand('source')) {
    return { type: 'command', name: 'source', arg: text.slice(0, -2).trim(), escape: '' };
  }
  if (text.length > 1 && text.endsWith('?') && !text.endsWith('??') && context.isCommand('inspect')) {
    return { type: 'command', name: 'inspect', arg: text.slice(0, -1).trim(), escape: '' };
  }

  const split = splitWord(text);
  if (!split || !context.isCommand(split.word) || continuesAsExpression(split.rest)) {
    return { type: 'evaluate', source: text, escape: '' };
  }
  if (context.isLocal(split.word) && split.rest.trim() === '') {
    return { type: 'evaluate', source: text, escape: '' };
  }
  return { type: 'command', name: split.word, arg: split.rest.trim(), escape: '' };
}
