/**
 * Session Options
 *
 * Named options and hook slots consumed when a session is constructed.
 */

import type { Frame } from '../frames/frame.js';
import { ConfigurationError } from './errors.js';

export interface TracebackLimit {
  limit: number;
}

export interface SessionOptions {
  /** Base prompt, wrapped in one parenthesis layer per nesting level (default: '# ') */
  prompt?: string;
  /** Redraw the enclosing unit on every stop (default: false) */
  stickyByDefault?: boolean;
  /** Apply the hidden-frame predicate (default: true) */
  enableHiddenFrames?: boolean;
  /** Print "N frames hidden" on stops (default: true) */
  showHiddenFramesCount?: boolean;
  /** Print a stack tail after evaluation errors; a limit caps its frames (default: false) */
  showTracebackOnError?: boolean | TracebackLimit;
  /** Glob patterns of module names whose frames are hidden */
  skipModules?: string[];
  /** Share of the sticky window spent above the current line, 0..1 (default: 0.5) */
  headBias?: number;
  /** Lines shown by a plain `list` (default: 11) */
  listWindow?: number;
  /** Editor command; may contain {filename} and {lineno} */
  editor?: string;
  /** Resume reason an interrupt turns into; unset lets it propagate */
  interruptAs?: 'quit' | 'continue';
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface SessionHooks {
  highlight?: (text: string) => string;
  /** Extra hidden-frame predicate, consulted after the built-in checks */
  isHidden?: (frame: Frame) => boolean;
  formatValue?: (value: unknown) => string;
  terminalSize?: () => TerminalSize;
  openEditor?: (command: string) => void;
  /** Called before the prompt loop starts on each stop */
  beforeInteraction?: (frame: Frame) => void;
}

export interface ResolvedOptions {
  prompt: string;
  stickyByDefault: boolean;
  enableHiddenFrames: boolean;
  showHiddenFramesCount: boolean;
  /** 0 = no traceback, Infinity = unbounded */
  tracebackLimit: number;
  skipModules: string[];
  headBias: number;
  listWindow: number;
  editor?: string;
  interruptAs?: 'quit' | 'continue';
}

export function resolveOptions(options: SessionOptions = {}): ResolvedOptions {
  const headBias = options.headBias ?? 0.5;
  if (!Number.isFinite(headBias) || headBias < 0 || headBias > 1) {
    throw new ConfigurationError(`headBias must be between 0 and 1, got ${headBias}`);
  }

  const listWindow = options.listWindow ?? 11;
  if (!Number.isInteger(listWindow) || listWindow < 1) {
    throw new ConfigurationError(`listWindow must be a positive integer, got ${listWindow}`);
  }

  const prompt = options.prompt ?? '# ';
  if (prompt.trim() === '') {
    throw new ConfigurationError('prompt must not be blank');
  }

  return {
    prompt,
    stickyByDefault: options.stickyByDefault ?? false,
    enableHiddenFrames: options.enableHiddenFrames ?? true,
    showHiddenFramesCount: options.showHiddenFramesCount ?? true,
    tracebackLimit: resolveTracebackLimit(options.showTracebackOnError),
    skipModules: options.skipModules ?? [],
    headBias,
    listWindow,
    editor: options.editor,
    interruptAs: options.interruptAs,
  };
}

function resolveTracebackLimit(value: boolean | TracebackLimit | undefined): number {
  if (value === undefined || value === false) {
    return 0;
  }
  if (value === true) {
    return Infinity;
  }
  if (!Number.isInteger(value.limit) || value.limit < 0) {
    throw new ConfigurationError(`traceback limit must be a non-negative integer, got ${value.limit}`);
  }
  return value.limit;
}

/**
 * Prompt for a nesting depth: '# ', '(#) ', '((#)) ', ...
 */
export function promptForDepth(base: string, depth: number): string {
  const core = base.trimEnd();
  const trailing = base.slice(core.length);
  return '('.repeat(depth) + core + ')'.repeat(depth) + trailing;
}
