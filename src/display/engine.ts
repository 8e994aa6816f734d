/**
 * Display Engine
 *
 * Renders source around a frame in three modes: a one-shot window, the whole
 * enclosing unit, and the sticky view cut down to the terminal. All modes share
 * one line-retrieval path and invalidate the file's cached lines first.
 */

import type { Frame } from '../frames/frame.js';
import { RenderError } from '../session/errors.js';
import { locateUnit, type CodeUnit } from './code-unit.js';
import { cutoff, ELLIPSIS } from './cutoff.js';
import type { SourceProvider } from './source.js';

export const EOF_MARKER = '[EOF]';
export const ELLIPSIS_LINE = '...';

export interface LineMarks {
  /** Executing line */
  current?: number;
  /** Line of the call in the caller's caller, flagged while showing an error */
  caller?: number;
}

export interface RenderedLine {
  lineno: number;
  text: string;
  current: boolean;
  callerMarker: boolean;
}

export interface ListResult {
  lines: string[];
  /** Last line shown, for a following `list` to continue after */
  last: number;
}

export interface DisplayEngineOptions {
  source: SourceProvider;
  highlight?: (text: string) => string;
  headBias?: number;
}

export class DisplayEngine {
  private source: SourceProvider;
  private highlight: (text: string) => string;
  private headBias: number;

  constructor(options: DisplayEngineOptions) {
    this.source = options.source;
    this.highlight = options.highlight ?? ((text) => text);
    this.headBias = options.headBias ?? 0.5;
  }

  formatLine(line: RenderedLine): string {
    const marker = line.current ? '->' : line.callerMarker ? '>>' : '  ';
    return `${String(line.lineno).padStart(4)}  ${marker}  ${this.highlight(line.text)}`;
  }

  /**
   * Lines `first`..`last` of `file`, or the EOF marker when nothing is left.
   */
  listRange(file: string, first: number, last: number, marks: LineMarks = {}): ListResult {
    const lines = this.fetch(file);
    const from = Math.max(1, first);
    const to = Math.min(last, lines.length);
    if (from > lines.length || from > to) {
      return { lines: [EOF_MARKER], last: lines.length };
    }
    const out: string[] = [];
    for (let lineno = from; lineno <= to; lineno++) {
      out.push(this.formatLine(this.tag(lineno, lines[lineno - 1], marks)));
    }
    return { lines: out, last: to };
  }

  listAround(file: string, center: number, window: number, marks: LineMarks = {}): ListResult {
    const first = Math.max(1, center - Math.floor(window / 2));
    return this.listRange(file, first, first + window - 1, marks);
  }

  /**
   * The whole unit the frame executes in.
   */
  listWholeFunction(frame: Frame, marks: LineMarks = {}): string[] {
    const { lines, unit } = this.unitOf(frame);
    const out: string[] = [];
    for (let lineno = unit.start; lineno <= unit.end; lineno++) {
      out.push(this.formatLine(this.tag(lineno, lines[lineno - 1], marks)));
    }
    return out;
  }

  /**
   * The unit (or the given line range) cut down to `height` lines around the executing line.
   */
  sticky(frame: Frame, height: number, marks: LineMarks = {}, range?: [number, number]): string[] {
    let lines: string[];
    let unit: CodeUnit;
    if (range) {
      lines = this.fetch(frame.file);
      const end = Math.min(range[1], lines.length);
      if (range[0] > end) {
        return [EOF_MARKER];
      }
      unit = { start: range[0], definition: range[0], end, name: frame.functionName };
    } else {
      ({ lines, unit } = this.unitOf(frame));
    }

    const length = unit.end - unit.start + 1;
    const currentLine = marks.current ?? frame.line;
    const inside = currentLine >= unit.start && currentLine <= unit.end;
    const entries = cutoff({
      length,
      current: inside ? currentLine - unit.start : 0,
      decorators: unit.definition - unit.start,
      height,
      headBias: this.headBias,
    });

    return entries.map((entry) =>
      entry === ELLIPSIS
        ? ELLIPSIS_LINE
        : this.formatLine(this.tag(unit.start + entry, lines[unit.start + entry - 1], marks))
    );
  }

  private tag(lineno: number, text: string | undefined, marks: LineMarks): RenderedLine {
    return {
      lineno,
      text: text ?? '',
      current: marks.current === lineno,
      callerMarker: marks.caller === lineno && marks.current !== lineno,
    };
  }

  private fetch(file: string): string[] {
    this.source.invalidate(file);
    const lines = this.source.getLines(file);
    if (!lines) {
      throw new RenderError(`could not get source for ${file}`);
    }
    return lines;
  }

  private unitOf(frame: Frame): { lines: string[]; unit: CodeUnit } {
    const lines = this.fetch(frame.file);
    const unit = locateUnit(frame.file, lines, frame);
    if (!unit) {
      throw new RenderError('could not get source code');
    }
    return { lines, unit };
  }
}
