/**
 * Built-in Commands
 *
 * The command table: navigation, listing, watches, breakpoints, execution
 * control, recursion, editing, hidden-frame control and help.
 */

import * as fs from 'node:fs';
import { locateUnit } from '../display/code-unit.js';
import { splitLines } from '../display/source.js';
import { prettyFormatValue, safeRepr } from '../output/repr.js';
import { describeBreakpoint } from '../session/breakpoints.js';
import { EvaluationError } from '../session/errors.js';
import { HIDDEN_FRAMES_HINT } from '../session/hidden.js';
import type { Session } from '../session/session.js';
import { buildEditorCommand, parseEditTarget, resolveEditor, spawnEditor } from './editor.js';
import type { CommandSpec } from './router.js';

const HIDDEN_FRAMES_HELP = [
  'Some frames might be marked as "hidden": by default, hidden frames are not',
  'shown in the stack trace, and cannot be reached using `up` and `down`.',
  'A frame is hidden when the tracer marks it, when its module matches the',
  'skipModules option, when it defines a truthy `__tracebackhide__` local or',
  'when its file belongs to the runtime or to node_modules.',
  '',
  'You can use `hf_unhide` to tell the debugger to ignore the hidden status',
  '(i.e., to treat hidden frames as normal ones), and `hf_hide` to hide them',
  'again. `hf_list` prints a list of hidden frames.',
].join('\n');

function parseCount(arg: string, fallback: number): number {
  const text = arg.trim();
  if (text === '') {
    return fallback;
  }
  if (!/^-?\d+$/.test(text)) {
    throw new EvaluationError(`Invalid frame count (${text})`);
  }
  return parseInt(text, 10);
}

function requireArg(arg: string, usage: string): string {
  if (arg.trim() === '') {
    throw new EvaluationError(`Usage: ${usage}`);
  }
  return arg.trim();
}

function parseId(arg: string): number {
  if (!/^\d+$/.test(arg)) {
    throw new EvaluationError(`Non-numeric breakpoint number ${arg}`);
  }
  return parseInt(arg, 10);
}

function afterMove(session: Session): void {
  session.listCursor = null;
  session.printCurrent();
}

function resume(kind: 'step' | 'next' | 'return' | 'quit'): CommandSpec['run'] {
  return () => ({ kind });
}

function list(session: Session, arg: string): void {
  const frame = session.currentFrame;
  const window = session.options.listWindow;
  const marks = session.marksFor(frame);
  const text = arg.trim();
  let first: number;
  let last: number;

  if (text === '') {
    const cursor = session.listCursor;
    if (cursor && cursor.file === frame.file) {
      first = cursor.next;
    } else {
      first = Math.max(1, frame.line - Math.floor(window / 2));
    }
    last = first + window - 1;
  } else if (text === '.') {
    first = Math.max(1, frame.line - Math.floor(window / 2));
    last = first + window - 1;
  } else {
    const match = text.match(/^(\d+)\s*(?:,\s*(\d+))?$/);
    if (!match) {
      throw new EvaluationError(`Error in argument: '${text}'`);
    }
    const a = parseInt(match[1], 10);
    if (match[2] === undefined) {
      first = Math.max(1, a - Math.floor(window / 2));
      last = first + window - 1;
    } else {
      const b = parseInt(match[2], 10);
      first = a;
      last = b < a ? a + b : b;
    }
  }

  const result = session.display.listRange(frame.file, first, last, marks);
  for (const line of result.lines) {
    session.write(line);
  }
  session.listCursor = { file: frame.file, next: result.last + 1 };
}

function inspectValue(session: Session, arg: string): void {
  const value = session.evaluate(requireArg(arg, 'inspect <expr>'));
  const typeName =
    value === null
      ? 'null'
      : typeof value === 'object'
        ? value.constructor?.name ?? 'Object'
        : typeof value;
  session.write(`Type:        ${typeName}`);
  session.write(`String Form: ${session.repr(value)}`);
  if (typeof value === 'function') {
    const header = safeRepr(value, (fn) => String(fn).split('\n')[0]);
    session.write(`Definition:  ${header}`);
  } else if (typeof value === 'string' || Array.isArray(value)) {
    session.write(`Length:      ${value.length}`);
  }
}

function showSource(session: Session, arg: string): void {
  const text = requireArg(arg, 'source <name | file:line>');
  const location = text.match(/^(.+):(\d+)$/);
  if (location && fs.existsSync(location[1])) {
    const file = location[1];
    const line = parseInt(location[2], 10);
    const lines = splitLines(fs.readFileSync(file, 'utf-8'));
    const unit = locateUnit(file, lines, { line, functionName: '<source>' });
    const span = unit && unit.name !== '<module>' ? unit : { start: line, end: line };
    const result = session.display.listRange(file, span.start, span.end);
    for (const out of result.lines) {
      session.write(out);
    }
    return;
  }

  const value = session.evaluate(text);
  if (typeof value !== 'function') {
    throw new EvaluationError(`source is only available for functions, got ${typeof value}`);
  }
  for (const line of String(value).split('\n')) {
    session.write(line);
  }
}

function listBreakpoints(session: Session): void {
  const all = session.breakpoints.list();
  if (all.length === 0) {
    session.write('No breakpoints');
    return;
  }
  session.write('Num Type         Disp Enb   Where');
  for (const bp of all) {
    const disp = bp.temporary ? 'del ' : 'keep';
    const enabled = bp.enabled ? 'yes' : 'no ';
    session.write(`${String(bp.id).padEnd(4)}breakpoint   ${disp} ${enabled}   at ${bp.file}:${bp.line}`);
    if (bp.condition) {
      session.write(`\tstop only if ${bp.condition}`);
    }
    if (bp.hits > 0) {
      session.write(`\tbreakpoint already hit ${bp.hits} time${bp.hits === 1 ? '' : 's'}`);
    }
  }
}

function setBreakpoint(session: Session, arg: string, temporary: boolean): void {
  if (arg.trim() === '') {
    listBreakpoints(session);
    return;
  }
  const bp = session.breakpoints.add(arg, session.currentFrame.file, temporary);
  session.write(describeBreakpoint(bp));
}

async function readCommandList(session: Session, arg: string): Promise<void> {
  const all = session.breakpoints.list();
  const id = arg.trim() === '' ? all[all.length - 1]?.id : parseId(arg.trim());
  if (id === undefined) {
    throw new EvaluationError('No breakpoints');
  }
  session.breakpoints.get(id);

  const lines: string[] = [];
  for (;;) {
    const line = await session.readLine('(com) ');
    if (line === null || line.trim() === 'end') {
      break;
    }
    if (line.trim() !== '') {
      lines.push(line.trim());
    }
  }
  session.breakpoints.setCommands(id, lines);
}

function help(session: Session, arg: string): void {
  const topic = arg.trim();
  if (topic === 'hidden_frames') {
    session.write(HIDDEN_FRAMES_HELP);
    return;
  }
  if (topic !== '') {
    const spec = session.router.lookup(topic);
    if (!spec) {
      throw new EvaluationError(`No help for '${topic}'`);
    }
    session.write(spec.usage);
    session.write(spec.help);
    return;
  }

  session.write('Documented commands (type help <topic>):');
  session.write('========================================');
  const names = session.router.commands.map((spec) => spec.name).sort();
  for (let i = 0; i < names.length; i += 8) {
    session.write(names.slice(i, i + 8).join('  '));
  }
  session.write('');
  session.write('Miscellaneous help topics:');
  session.write('==========================');
  session.write('hidden_frames');
}

export const builtinCommands: CommandSpec[] = [
  {
    name: 'up',
    aliases: ['u'],
    usage: 'u(p) [count]',
    help: 'Move the current frame count (default one) levels up in the stack trace (to an older frame).',
    run: (session, arg) => {
      session.stack.move(-parseCount(arg, 1));
      afterMove(session);
    },
  },
  {
    name: 'down',
    aliases: ['d'],
    usage: 'd(own) [count]',
    help: 'Move the current frame count (default one) levels down in the stack trace (to a newer frame).',
    run: (session, arg) => {
      session.stack.move(parseCount(arg, 1));
      afterMove(session);
    },
  },
  {
    name: 'frame',
    aliases: ['f'],
    usage: 'f(rame) [index]',
    help: 'Go to the frame at index; negative indexes count from the newest frame. Without an index, show the current frame.',
    run: (session, arg) => {
      if (arg.trim() !== '') {
        session.stack.jump(parseCount(arg, 0));
      }
      afterMove(session);
    },
  },
  {
    name: 'top',
    usage: 'top',
    help: 'Go to the oldest visible frame.',
    run: (session) => {
      session.stack.top();
      afterMove(session);
    },
  },
  {
    name: 'bottom',
    usage: 'bottom',
    help: 'Go to the newest visible frame.',
    run: (session) => {
      session.stack.bottom();
      afterMove(session);
    },
  },
  {
    name: 'where',
    aliases: ['w', 'bt'],
    usage: 'w(here)',
    help: 'Print the visible frames, oldest first; ">" marks the current frame.',
    run: (session) => {
      const { stack } = session;
      for (const view of stack.frames) {
        if (view.hidden) continue;
        const marker = view.index === stack.cursor ? '>' : ' ';
        session.write(`${marker} ${session.frameLabel(view.index)} ${session.frameLocation(view.ref)}`);
        session.write(`-> ${session.sourceLine(view.ref)}`);
      }
      if (session.options.showHiddenFramesCount && stack.hiddenCount > 0) {
        session.write(`   ${stack.hiddenCount} frames hidden ${HIDDEN_FRAMES_HINT}`);
      }
    },
  },
  {
    name: 'list',
    aliases: ['l'],
    usage: 'l(ist) [first[, last | count]] | .',
    help: 'List source around the current line; without arguments, continue the previous listing.',
    repeatable: false,
    run: list,
  },
  {
    name: 'longlist',
    aliases: ['ll'],
    usage: 'longlist | ll',
    help: 'List the whole source of the current function or method.',
    repeatable: false,
    run: (session) => {
      const frame = session.currentFrame;
      for (const line of session.display.listWholeFunction(frame, session.marksFor(frame))) {
        session.write(line);
      }
    },
  },
  {
    name: 'sticky',
    usage: 'sticky [start end]',
    help: 'Toggle sticky mode, which redraws the current function on every stop. With a range, show those lines.',
    repeatable: false,
    run: (session, arg) => {
      const text = arg.trim();
      if (text !== '') {
        const match = text.match(/^(\d+)\s+(\d+)$/);
        if (!match) {
          throw new EvaluationError('sticky takes a start and an end line');
        }
        session.stickyRanges.set(session.currentFrame, [parseInt(match[1], 10), parseInt(match[2], 10)]);
        session.sticky = true;
      } else {
        session.sticky = !session.sticky;
      }
      session.printCurrent();
    },
  },
  {
    name: 'source',
    usage: 'source <name | file:line>',
    help: 'Show the source of a function, or of the unit around file:line. `expr??` is a shortcut.',
    repeatable: false,
    run: showSource,
  },
  {
    name: 'inspect',
    usage: 'inspect <expr>',
    help: 'Show the type and string form of a value. `expr?` is a shortcut.',
    run: inspectValue,
  },
  {
    name: 'p',
    usage: 'p <expr>',
    help: 'Print the value of the expression.',
    run: (session, arg) => {
      session.write(session.repr(session.evaluate(requireArg(arg, 'p <expr>'))));
    },
  },
  {
    name: 'pp',
    usage: 'pp <expr>',
    help: 'Pretty-print the value of the expression.',
    run: (session, arg) => {
      const value = session.evaluate(requireArg(arg, 'pp <expr>'));
      session.write(session.hooks.formatValue ? session.repr(value) : safeRepr(value, prettyFormatValue));
    },
  },
  {
    name: 'retval',
    aliases: ['rv'],
    usage: 'retval | rv',
    help: 'Print the return value of the frame that just returned.',
    run: (session) => {
      const stop = session.stop;
      if (stop.kind !== 'return' || session.currentFrame !== stop.frame) {
        throw new EvaluationError('Not yet returned!');
      }
      session.write(session.repr(stop.returnValue));
    },
  },
  {
    name: 'display',
    usage: 'display [expr]',
    help: 'Print the value of expr whenever it changes at a stop. Without expr, list the watched expressions.',
    repeatable: false,
    run: (session, arg) => {
      const expression = arg.trim();
      if (expression === '') {
        session.write('Currently displaying:');
        for (const [watched, value] of session.watch.list()) {
          session.write(`${watched}: ${value}`);
        }
        return;
      }
      const value = session.watch.add(expression, (text) => session.repr(session.evaluate(text)));
      session.write(`display ${expression}: ${value}`);
    },
  },
  {
    name: 'undisplay',
    usage: 'undisplay [expr]',
    help: 'Stop watching expr; without expr, stop watching everything.',
    repeatable: false,
    run: (session, arg) => {
      const expression = arg.trim();
      if (expression === '') {
        session.watch.clear();
      } else if (!session.watch.remove(expression)) {
        throw new EvaluationError(`not displaying ${expression}`);
      }
    },
  },
  {
    name: 'break',
    aliases: ['b'],
    usage: 'b(reak) [[file:]line[, condition]]',
    help: 'Set a breakpoint; without arguments, list all breakpoints.',
    run: (session, arg) => setBreakpoint(session, arg, false),
  },
  {
    name: 'tbreak',
    usage: 'tbreak [[file:]line[, condition]]',
    help: 'Set a temporary breakpoint, removed when first hit.',
    run: (session, arg) => setBreakpoint(session, arg, true),
  },
  {
    name: 'clear',
    aliases: ['cl'],
    usage: 'cl(ear) [id ...]',
    help: 'Delete the given breakpoints, or all of them.',
    run: (session, arg) => {
      const ids = arg.trim() === '' ? [] : arg.trim().split(/\s+/).map(parseId);
      for (const bp of session.breakpoints.clear(ids)) {
        session.write(`Deleted breakpoint ${bp.id} at ${bp.file}:${bp.line}`);
      }
    },
  },
  {
    name: 'condition',
    usage: 'condition <id> [expr]',
    help: 'Make breakpoint id conditional on expr; without expr, make it unconditional.',
    run: (session, arg) => {
      const [idText, ...rest] = requireArg(arg, 'condition <id> [expr]').split(/\s+/);
      const id = parseId(idText);
      const bp = session.breakpoints.condition(id, rest.join(' '));
      session.write(
        bp.condition ? `New condition set for breakpoint ${id}.` : `Breakpoint ${id} is now unconditional.`
      );
    },
  },
  {
    name: 'commands',
    usage: 'commands [id]',
    help: 'Attach commands to a breakpoint, one per line, ended by "end". They run when the breakpoint stops the program; "silent" as the first one skips the stop banner.',
    repeatable: false,
    run: readCommandList,
  },
  {
    name: 'continue',
    aliases: ['c', 'cont'],
    usage: 'c(ont(inue)) [lineno]',
    help: 'Continue execution; with lineno, stop again when that line of the current file is reached.',
    run: (session, arg) => {
      const text = arg.trim();
      if (text === '') {
        return { kind: 'continue' };
      }
      if (!/^\d+$/.test(text) || parseInt(text, 10) < 1) {
        throw new EvaluationError(`Invalid line number: ${text}`);
      }
      const line = parseInt(text, 10);
      const bp = session.breakpoints.addSpec({ file: session.currentFrame.file, line }, true);
      session.write(`Breakpoint ${bp.id} at ${bp.file}:${bp.line}`);
      return { kind: 'continue', line };
    },
  },
  {
    name: 'step',
    aliases: ['s'],
    usage: 's(tep)',
    help: 'Execute the current line, stopping at the first possible occasion.',
    run: resume('step'),
  },
  {
    name: 'next',
    aliases: ['n'],
    usage: 'n(ext)',
    help: 'Continue until the next line in the current function is reached or it returns.',
    run: resume('next'),
  },
  {
    name: 'return',
    aliases: ['r'],
    usage: 'r(eturn)',
    help: 'Continue until the current function returns.',
    run: resume('return'),
  },
  {
    name: 'quit',
    aliases: ['q', 'exit'],
    usage: 'q(uit) | exit',
    help: 'Quit the debugger; the program being debugged is aborted.',
    run: resume('quit'),
  },
  {
    name: 'debug',
    usage: 'debug <expr>',
    help: 'Enter a recursive debugger that steps through expr, evaluated in the current frame.',
    repeatable: false,
    run: (session, arg) => session.debugRecursive(requireArg(arg, 'debug <expr>')),
  },
  {
    name: 'edit',
    usage: 'edit [file[:line] | line]',
    help: 'Open an editor at the current line, or at the given location.',
    repeatable: false,
    run: (session, arg) => {
      const frame = session.currentFrame;
      const target = parseEditTarget(arg, { file: frame.file, line: frame.line });
      const command = buildEditorCommand(resolveEditor(session.options.editor), target);
      (session.hooks.openEditor ?? spawnEditor)(command);
    },
  },
  {
    name: 'hf_unhide',
    usage: 'hf_unhide',
    help: 'Treat hidden frames as normal ones.',
    run: (session) => session.stack.unhideAll(),
  },
  {
    name: 'hf_hide',
    usage: 'hf_hide',
    help: 'Hide hidden frames again after hf_unhide.',
    run: (session) => {
      const before = session.stack.cursor;
      session.stack.rehide();
      if (session.stack.cursor !== before) {
        afterMove(session);
      }
    },
  },
  {
    name: 'hf_list',
    usage: 'hf_list',
    help: 'List the hidden frames.',
    run: (session) => {
      for (const view of session.stack.frames) {
        if (view.reason === null) continue;
        session.write(`${session.frameLabel(view.index)} ${session.frameLocation(view.ref)}`);
        session.write(`-> ${session.sourceLine(view.ref)}`);
      }
    },
  },
  {
    name: 'help',
    aliases: ['h'],
    usage: 'h(elp) [command | topic]',
    help: 'Show help for a command or topic; without arguments, list the commands.',
    repeatable: false,
    run: help,
  },
];
