/**
 * Frame Model
 *
 * The shapes the session engine consumes from an execution tracer: activation
 * records linked to their callers, stop events, breakpoint CRUD and the resume
 * reason handed back when an interaction ends.
 */

export type ThreadId = number | string;

export interface Frame {
  file: string;
  line: number;
  functionName: string;
  /** Module name, matched against the skip list */
  module?: string;
  /** Live local bindings; evaluation reads and writes through this object */
  locals: Record<string, unknown>;
  caller: Frame | null;
  /** First line of the enclosing code unit, when the tracer knows it */
  firstLine?: number;
  /** Explicit hide marker set by the tracer */
  hidden?: boolean;
  /** Line an exception passed through, when it differs from `line` */
  exceptionLine?: number;
}

export type FrameEvent = 'call' | 'line' | 'return' | 'exception';

export interface StopEvent {
  kind: FrameEvent;
  frame: Frame;
  /** Set on 'return' stops */
  returnValue?: unknown;
  /** Set on 'exception' stops */
  exception?: unknown;
  /** Breakpoints that caused this stop */
  hitBreakpointIds?: number[];
}

export type ResumeKind = 'continue' | 'step' | 'next' | 'return' | 'quit';

export interface ResumeReason {
  kind: ResumeKind;
  /** Target line for `continue <lineno>` */
  line?: number;
}

export interface BreakpointRequest {
  file: string;
  line: number;
  condition?: string;
  temporary?: boolean;
}

export interface TracerBreakpoint extends BreakpointRequest {
  id: number;
  enabled: boolean;
  hits: number;
}

/**
 * Stop callback handed to a tracer running nested code.
 */
export type StopHandler = (stop: StopEvent) => Promise<ResumeReason>;

export interface Tracer {
  setBreakpoint(request: BreakpointRequest): TracerBreakpoint;
  clearBreakpoint(id: number): boolean;
  setCondition(id: number, condition: string | undefined): TracerBreakpoint;
  listBreakpoints(): TracerBreakpoint[];
  /**
   * Run `source` in the namespace of `frame` under tracing, calling `onStop`
   * on each suspension. Tracers that cannot trace nested code omit this.
   */
  trace?(source: string, frame: Frame, onStop: StopHandler): Promise<unknown>;
}

/**
 * Walk caller links from `start` to the outermost frame.
 *
 * @returns frames ordered outer to inner
 */
export function walkFrames(start: Frame): Frame[] {
  const chain: Frame[] = [];
  const seen = new Set<Frame>();
  let frame: Frame | null = start;
  while (frame && !seen.has(frame)) {
    seen.add(frame);
    chain.push(frame);
    frame = frame.caller;
  }
  return chain.reverse();
}
