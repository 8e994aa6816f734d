/**
 * Breakpoint Management
 *
 * Parses `break` arguments, forwards breakpoint CRUD to the tracer and keeps
 * the command lists attached with `commands`.
 */

import * as path from 'node:path';
import type { Tracer, TracerBreakpoint } from '../frames/frame.js';
import type { OutputFormatter } from '../output/formatter.js';
import { EvaluationError } from './errors.js';

export interface BreakpointSpec {
  file: string;
  line: number;
  condition?: string;
}

/**
 * Resolve a breakpoint file path.
 *
 * Absolute paths are kept; relative ones resolve against `base` when given,
 * otherwise against the process working directory.
 */
export function resolveBreakpointPath(file: string, base?: string): string {
  if (path.isAbsolute(file)) {
    return file;
  }
  return base ? path.resolve(base, file) : path.resolve(file);
}

/**
 * Parse a `break` argument
 *
 * Formats supported:
 * - "45" - line in the current file
 * - "src/file.ts:45" - file and line
 * - "file.ts:45, x > 5" - with condition
 *
 * @param spec The breakpoint argument
 * @param currentFile File used when the argument names only a line; relative
 *   files resolve against its directory
 */
export function parseBreakpointSpec(
  spec: string,
  currentFile: string
): BreakpointSpec {
  const match = spec.trim().match(/^(?:(.+):)?(\d+)(?:\s*,\s*(.+))?$/);

  if (!match) {
    throw new EvaluationError(
      `Invalid breakpoint format: "${spec}". Expected "[file:]line[, condition]"`
    );
  }

  const [, file, lineStr, condition] = match;
  const line = parseInt(lineStr, 10);

  if (isNaN(line) || line < 1) {
    throw new EvaluationError(`Invalid line number: ${lineStr}`);
  }

  return {
    file: file ? resolveBreakpointPath(file, path.dirname(currentFile)) : currentFile,
    line,
    condition: condition?.trim() || undefined,
  };
}

export function describeBreakpoint(bp: TracerBreakpoint): string {
  const kind = bp.temporary ? 'Temporary breakpoint' : 'Breakpoint';
  return `${kind} ${bp.id} at ${bp.file}:${bp.line}`;
}

export class BreakpointManager {
  private tracer: Tracer;
  private formatter?: OutputFormatter;
  private commands: Map<number, string[]> = new Map();

  constructor(tracer: Tracer, formatter?: OutputFormatter) {
    this.tracer = tracer;
    this.formatter = formatter;
  }

  /**
   * Set a breakpoint from a `break` argument
   */
  add(spec: string, currentFile: string, temporary = false): TracerBreakpoint {
    const parsed = parseBreakpointSpec(spec, currentFile);
    return this.addSpec(parsed, temporary);
  }

  addSpec(spec: BreakpointSpec, temporary = false): TracerBreakpoint {
    const bp = this.tracer.setBreakpoint({ ...spec, temporary });
    this.formatter?.emit(
      this.formatter.createEvent('breakpoint_changed', {
        action: 'set',
        id: bp.id,
        location: { file: bp.file, line: bp.line },
        condition: bp.condition,
      })
    );
    return bp;
  }

  /**
   * Clear breakpoints by id; with no ids, clear every breakpoint.
   *
   * @returns the cleared breakpoints
   */
  clear(ids: number[] = []): TracerBreakpoint[] {
    const targets = ids.length > 0 ? ids.map((id) => this.get(id)) : this.tracer.listBreakpoints();
    for (const bp of targets) {
      this.tracer.clearBreakpoint(bp.id);
      this.commands.delete(bp.id);
      this.formatter?.emit(this.formatter.createEvent('breakpoint_changed', { action: 'cleared', id: bp.id }));
    }
    return targets;
  }

  condition(id: number, condition: string | undefined): TracerBreakpoint {
    this.get(id);
    const bp = this.tracer.setCondition(id, condition?.trim() || undefined);
    this.formatter?.emit(
      this.formatter.createEvent('breakpoint_changed', { action: 'condition', id, condition: bp.condition })
    );
    return bp;
  }

  get(id: number): TracerBreakpoint {
    const found = this.tracer.listBreakpoints().find((bp) => bp.id === id);
    if (!found) {
      throw new EvaluationError(`No breakpoint number ${id}`);
    }
    return found;
  }

  list(): TracerBreakpoint[] {
    return this.tracer.listBreakpoints();
  }

  setCommands(id: number, lines: string[]): void {
    this.get(id);
    if (lines.length === 0) {
      this.commands.delete(id);
    } else {
      this.commands.set(id, lines);
    }
  }

  commandsFor(id: number): string[] {
    return this.commands.get(id) ?? [];
  }
}
