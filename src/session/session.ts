/**
 * Debugging Session
 *
 * Owns the stack model, display engine and command router for one thread's
 * suspensions. `interact` runs the prompt loop for a stop and returns the
 * resume reason for the tracer.
 */

import { builtinCommands } from '../command/builtins.js';
import { CommandRouter } from '../command/router.js';
import { DisplayEngine, type LineMarks } from '../display/engine.js';
import { FileSourceCache, OverlaySource, type SourceProvider } from '../display/source.js';
import type { Frame, ResumeReason, StopEvent, ThreadId, Tracer } from '../frames/frame.js';
import { MemoryTracer } from '../frames/memory-tracer.js';
import type { OutputFormatter } from '../output/formatter.js';
import {
  defaultFormatValue,
  describeException,
  safeRepr,
  stackTail,
  truncate,
} from '../output/repr.js';
import { BreakpointManager } from './breakpoints.js';
import { isSessionError, RecursionGuardError } from './errors.js';
import { FrameEvaluator, classifySource, type Evaluator } from './evaluator.js';
import { createHiddenPredicate, HIDDEN_FRAMES_HINT } from './hidden.js';
import { InputLock, InterruptedError, type InputSource } from './input.js';
import {
  promptForDepth,
  resolveOptions,
  type ResolvedOptions,
  type SessionHooks,
  type SessionOptions,
  type TerminalSize,
} from './options.js';
import { StackModel } from './stack.js';
import { WatchList } from './watch.js';

export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export interface SessionInit {
  input: InputSource;
  /** Where session text goes (default: stdout) */
  output?: NodeJS.WritableStream;
  threadId?: ThreadId;
  /** Debugger class identity used by the registry (default: 'default') */
  kind?: string;
  depth?: number;
  tracer?: Tracer;
  options?: SessionOptions;
  hooks?: SessionHooks;
  source?: SourceProvider;
  evaluator?: Evaluator;
  journal?: OutputFormatter;
  inputLock?: InputLock;
}

export type ResumeListener = (session: Session, reason: ResumeReason) => void;

/** Cursor of a continuing `list` */
interface ListCursor {
  file: string;
  next: number;
}

export class Session {
  readonly threadId: ThreadId;
  readonly kind: string;
  readonly depth: number;
  readonly options: ResolvedOptions;
  readonly hooks: SessionHooks;
  readonly display: DisplayEngine;
  readonly router: CommandRouter;
  readonly watch = new WatchList();
  readonly breakpoints: BreakpointManager;
  readonly tracer: Tracer;
  readonly evaluator: Evaluator;
  readonly journal?: OutputFormatter;

  /** Set while the sticky view is on */
  sticky: boolean;
  /** Sticky line ranges chosen with `sticky start end`, per frame */
  readonly stickyRanges: Map<Frame, [number, number]> = new Map();
  listCursor: ListCursor | null = null;

  private init: SessionInit;
  private input: InputSource;
  private output: NodeJS.WritableStream;
  private source: SourceProvider;
  private inputLock: InputLock;
  private stackModel: StackModel | null = null;
  private stopEvent: StopEvent | null = null;
  private interacting = false;
  private resumeListeners: ResumeListener[] = [];

  constructor(init: SessionInit) {
    this.init = init;
    this.options = resolveOptions(init.options);
    this.hooks = init.hooks ?? {};
    this.threadId = init.threadId ?? 0;
    this.kind = init.kind ?? 'default';
    this.depth = init.depth ?? 0;
    this.input = init.input;
    this.output = init.output ?? process.stdout;
    this.source = init.source ?? new FileSourceCache();
    this.tracer = init.tracer ?? new MemoryTracer();
    this.evaluator = init.evaluator ?? new FrameEvaluator();
    this.journal = init.journal;
    this.inputLock = init.inputLock ?? new InputLock();
    this.sticky = this.options.stickyByDefault;
    this.display = new DisplayEngine({
      source: this.source,
      highlight: this.hooks.highlight,
      headBias: this.options.headBias,
    });
    this.breakpoints = new BreakpointManager(this.tracer, this.journal);
    this.router = new CommandRouter(this, builtinCommands);
  }

  get prompt(): string {
    return promptForDepth(this.options.prompt, this.depth);
  }

  get isInteracting(): boolean {
    return this.interacting;
  }

  get stack(): StackModel {
    if (!this.stackModel) {
      throw new Error('session has not stopped yet');
    }
    return this.stackModel;
  }

  get stop(): StopEvent {
    if (!this.stopEvent) {
      throw new Error('session has not stopped yet');
    }
    return this.stopEvent;
  }

  get currentFrame(): Frame {
    return this.stack.current.ref;
  }

  get terminalSize(): TerminalSize {
    if (this.hooks.terminalSize) {
      return this.hooks.terminalSize();
    }
    return { columns: process.stdout.columns ?? 80, rows: process.stdout.rows ?? 24 };
  }

  onResume(listener: ResumeListener): void {
    this.resumeListeners.push(listener);
  }

  write(text: string): void {
    this.output.write(text + '\n');
  }

  readLine(prompt: string): Promise<string | null> {
    return this.input.readLine(prompt);
  }

  hasLocal(name: string): boolean {
    return this.stackModel !== null && Object.prototype.hasOwnProperty.call(this.currentFrame.locals, name);
  }

  repr(value: unknown): string {
    return safeRepr(value, this.hooks.formatValue ?? defaultFormatValue);
  }

  /**
   * Command names and current locals starting with `text`.
   */
  complete(text: string): string[] {
    const locals = this.stackModel ? Object.keys(this.currentFrame.locals) : [];
    const candidates = new Set([...this.router.names, ...locals].filter((name) => name.startsWith(text)));
    return [...candidates].sort();
  }

  /**
   * Run the prompt loop for one stop.
   */
  async interact(stop: StopEvent): Promise<ResumeReason> {
    if (this.interacting) {
      const guard = new RecursionGuardError(
        `recursive stop at ${stop.frame.file}(${stop.frame.line}) ignored, continuing`
      );
      this.write(`*** ${guard.message}`);
      this.journal?.emit(
        this.journal.createEvent('recursion_guard', {
          location: { file: stop.frame.file, line: stop.frame.line, function: stop.frame.functionName },
        })
      );
      return { kind: 'continue' };
    }

    this.interacting = true;
    await this.inputLock.acquire(this.threadId);
    try {
      const reason = await this.run(stop);
      this.journal?.emit(
        this.journal.createEvent('session_resume', { depth: this.depth, reason: reason.kind, line: reason.line })
      );
      for (const listener of this.resumeListeners) {
        listener(this, reason);
      }
      return reason;
    } finally {
      this.interacting = false;
      this.inputLock.release(this.threadId);
    }
  }

  private async run(stop: StopEvent): Promise<ResumeReason> {
    this.setup(stop);
    this.reporting('stop', () => this.hooks.beforeInteraction?.(stop.frame));

    const scripted = this.breakpointCommands(stop);
    const silent = scripted[0] === 'silent';
    if (!silent) {
      this.reporting('stop', () => this.printStop());
    }
    this.reporting('stop', () => this.refreshWatches());

    for (const line of silent ? scripted.slice(1) : scripted) {
      const result = await this.router.onecmd(line);
      if (result) {
        return result;
      }
    }
    return this.router.loop();
  }

  /**
   * Run a step of the stop outside the command loop, printing its failure
   * instead of ending the interaction.
   */
  private reporting(step: string, run: () => void): void {
    try {
      run();
    } catch (error) {
      this.reportError(error, step);
    }
  }

  private setup(stop: StopEvent): void {
    this.stopEvent = stop;
    this.stackModel = StackModel.build(
      stop.frame,
      createHiddenPredicate({
        enabled: this.options.enableHiddenFrames,
        skipModules: this.options.skipModules,
        isHidden: this.hooks.isHidden,
      })
    );
    this.listCursor = null;
    this.router.resetForSuspension();

    this.journal?.emit(
      this.journal.createEvent('session_stop', {
        event: stop.kind,
        depth: this.depth,
        location: { file: stop.frame.file, line: stop.frame.line, function: stop.frame.functionName },
        frameIndex: this.stack.cursor,
        hiddenFrames: this.stack.hiddenCount,
        breakpointIds: stop.hitBreakpointIds,
      })
    );
  }

  private breakpointCommands(stop: StopEvent): string[] {
    const lines: string[] = [];
    for (const id of stop.hitBreakpointIds ?? []) {
      lines.push(...this.breakpoints.commandsFor(id));
    }
    return lines;
  }

  /**
   * Print the stop: event banner, frame entry and hidden count, or the sticky view.
   */
  printStop(): void {
    if (this.sticky && this.tryDrawSticky()) {
      return;
    }
    const stop = this.stop;
    if (stop.kind === 'call') {
      this.write('--Call--');
    } else if (stop.kind === 'return') {
      this.write('--Return--');
    } else if (stop.kind === 'exception') {
      this.write(describeException(stop.exception));
    }
    this.printEntry();
    if (this.options.showHiddenFramesCount && this.stack.hiddenCount > 0) {
      this.write(`   ${this.stack.hiddenCount} frames hidden ${HIDDEN_FRAMES_HINT}`);
    }
  }

  /**
   * Show the current frame after navigation.
   */
  printCurrent(): void {
    if (this.sticky && this.tryDrawSticky()) {
      return;
    }
    this.printEntry();
  }

  frameLabel(index: number): string {
    const width = String(this.stack.length - 1).length;
    return `[${String(index).padStart(width)}]`;
  }

  /**
   * `file(line)function()`, with `->value` when the frame has returned.
   */
  frameLocation(frame: Frame): string {
    let text = `${frame.file}(${frame.line})${frame.functionName}()`;
    if (frame === this.stop.frame && this.stop.kind === 'return') {
      text += `->${this.repr(this.stop.returnValue)}`;
    }
    return text;
  }

  sourceLine(frame: Frame): string {
    this.source.invalidate(frame.file);
    const line = this.source.getLines(frame.file)?.[frame.line - 1];
    return line?.trim() ?? '';
  }

  printEntry(index: number = this.stack.cursor): void {
    const view = this.stack.frames[index];
    this.write(`${this.frameLabel(index)} > ${this.frameLocation(view.ref)}`);
    this.write(`-> ${this.sourceLine(view.ref)}`);
  }

  marksFor(frame: Frame): LineMarks {
    const marks: LineMarks = { current: frame.line };
    if (this.stop.kind === 'exception' && frame.exceptionLine !== undefined) {
      marks.caller = frame.exceptionLine;
    }
    return marks;
  }

  /**
   * Draw the sticky view; false when the frame's source cannot be rendered.
   */
  tryDrawSticky(): boolean {
    const frame = this.currentFrame;
    const { columns, rows } = this.terminalSize;
    let body: string[];
    try {
      body = this.display.sticky(frame, rows - 4, this.marksFor(frame), this.stickyRanges.get(frame));
    } catch (error) {
      if (isSessionError(error)) {
        this.write(`*** ${error.message}`);
        return false;
      }
      throw error;
    }

    this.output.write(CLEAR_SCREEN);
    let header = `${this.frameLabel(this.stack.cursor)} > ${this.frameLocation(frame)}`;
    if (this.options.showHiddenFramesCount && this.stack.hiddenCount > 0) {
      header += `, ${this.stack.hiddenCount} frames hidden`;
    }
    this.write(header);
    this.write('');
    for (const line of body) {
      this.write(line);
    }

    const trailer = this.stickyTrailer(frame);
    if (trailer !== undefined) {
      this.write(truncate(trailer, columns));
    }
    return true;
  }

  private stickyTrailer(frame: Frame): string | undefined {
    if (frame !== this.stop.frame) {
      return undefined;
    }
    if (this.stop.kind === 'return') {
      return ` return ${this.repr(this.stop.returnValue)}`;
    }
    if (this.stop.kind === 'exception') {
      return describeException(this.stop.exception);
    }
    return undefined;
  }

  refreshWatches(): void {
    const changes = this.watch.refresh((expression) => this.repr(this.evaluator.evaluate(expression, this.currentFrame)));
    for (const change of changes) {
      this.write(change);
    }
  }

  /**
   * Evaluate an expression and print its value, or run statements.
   */
  runSource(source: string): void {
    if (source === '') {
      return;
    }
    if (classifySource(source) === 'expression') {
      const value = this.evaluator.evaluate(source, this.currentFrame);
      if (value !== undefined) {
        this.write(this.repr(value));
      }
    } else {
      this.evaluator.execute(source, this.currentFrame);
    }
  }

  evaluate(source: string): unknown {
    return this.evaluator.evaluate(source, this.currentFrame);
  }

  /**
   * Print a failed command: `*** Name: message` for evaluation errors, the
   * message alone for session errors, plus a stack tail when enabled.
   */
  reportError(error: unknown, command: string): void {
    if (isSessionError(error)) {
      this.write(`*** ${error.message}`);
    } else {
      this.write(`*** ${describeException(error)}`);
      for (const line of stackTail(error, this.options.tracebackLimit)) {
        this.write(`    ${line}`);
      }
    }
    this.journal?.emit(
      this.journal.createEvent('command_error', {
        command,
        errorKind: isSessionError(error) ? error.kind : 'evaluation',
        message: isSessionError(error) ? error.message : describeException(error),
      })
    );
  }

  journalCommand(name: string, arg: string, repeated: boolean): void {
    this.journal?.emit(
      this.journal.createEvent('command', { name, arg, repeated: repeated || undefined })
    );
  }

  /**
   * Debug `source` in a nested session one level deeper, then return to this one.
   */
  async debugRecursive(source: string): Promise<void> {
    const frame = this.currentFrame;
    this.write('ENTERING RECURSIVE DEBUGGER');
    try {
      if (this.tracer.trace) {
        const child = this.createChild(this.source);
        await this.tracer.trace(source, frame, (stop) => child.interact(stop));
      } else {
        const child = this.createChild(new OverlaySource(this.source, { '<debug>': source }));
        const entry: Frame = {
          file: '<debug>',
          line: 1,
          functionName: '<module>',
          locals: frame.locals,
          caller: frame,
        };
        const reason = await child.interact({ kind: 'call', frame: entry });
        if (reason.kind !== 'quit') {
          const value = this.evaluator.evaluate(source, frame);
          if (value !== undefined) {
            this.write(this.repr(value));
          }
        }
      }
    } catch (error) {
      if (!(error instanceof InterruptedError)) {
        throw error;
      }
      this.write('--KeyboardInterrupt--');
    } finally {
      this.write('LEAVING RECURSIVE DEBUGGER');
    }
  }

  private createChild(source: SourceProvider): Session {
    return new Session({
      ...this.init,
      threadId: this.threadId,
      kind: this.kind,
      depth: this.depth + 1,
      tracer: this.tracer,
      source,
      evaluator: this.evaluator,
      inputLock: this.inputLock,
      output: this.output,
    });
  }
}
