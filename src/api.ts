/**
 * Library entry point.
 */

export type {
  BreakpointRequest,
  Frame,
  FrameEvent,
  ResumeKind,
  ResumeReason,
  StopEvent,
  StopHandler,
  ThreadId,
  Tracer,
  TracerBreakpoint,
} from './frames/frame.js';
export { walkFrames } from './frames/frame.js';
export { MemoryTracer } from './frames/memory-tracer.js';
export { loadSnapshot, parseSnapshot, snapshotSchema, SnapshotError } from './frames/snapshot.js';

export { Session, CLEAR_SCREEN, type SessionInit } from './session/session.js';
export { SessionRegistry, type ObtainRequest, type RegistryOptions } from './session/registry.js';
export { StackModel } from './session/stack.js';
export { FrameView } from './session/frame-view.js';
export { createHiddenPredicate, globToRegExp, type HiddenPredicate } from './session/hidden.js';
export { FrameEvaluator, classifySource, type Evaluator } from './session/evaluator.js';
export { InputLock, ReadlineInput, ScriptedInput, InterruptedError, INTERRUPT, type InputSource } from './session/input.js';
export { WatchList } from './session/watch.js';
export { BreakpointManager, parseBreakpointSpec } from './session/breakpoints.js';
export {
  resolveOptions,
  promptForDepth,
  type SessionOptions,
  type SessionHooks,
  type ResolvedOptions,
} from './session/options.js';
export {
  SessionError,
  BoundaryError,
  FrameRangeError,
  EvaluationError,
  RenderError,
  RecursionGuardError,
  ConfigurationError,
} from './session/errors.js';

export { DisplayEngine, EOF_MARKER, ELLIPSIS_LINE } from './display/engine.js';
export { FileSourceCache, OverlaySource, type SourceProvider } from './display/source.js';
export { cutoff, MIN_STICKY_HEIGHT } from './display/cutoff.js';
export { locateUnit, type CodeUnit } from './display/code-unit.js';

export { CommandRouter, type CommandSpec } from './command/router.js';
export { builtinCommands } from './command/builtins.js';
export { parseLine, type ParsedLine } from './command/parser.js';

export { OutputFormatter, type FormatterOptions } from './output/formatter.js';
export type { SessionEvent } from './output/events.js';
