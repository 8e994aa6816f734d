/**
 * Journal Event Types
 *
 * Events a session writes to its NDJSON journal.
 */

import type { FrameEvent, ResumeKind, ThreadId } from '../frames/frame.js';
import type { SessionErrorKind } from '../session/errors.js';

export interface SourceLocation {
  file: string;
  line: number;
  function?: string;
}

interface BaseEvent {
  type: string;
  timestamp: string;
}

export interface SessionObtainedEvent extends BaseEvent {
  type: 'session_obtained';
  threadId: ThreadId;
  kind: string;
  depth: number;
  /** True when an active session was reused */
  reused: boolean;
  global: boolean;
}

export interface SessionStopEvent extends BaseEvent {
  type: 'session_stop';
  event: FrameEvent;
  depth: number;
  location: SourceLocation;
  frameIndex: number;
  hiddenFrames: number;
  breakpointIds?: number[];
}

export interface CommandEvent extends BaseEvent {
  type: 'command';
  name: string;
  arg: string;
  /** True when the line was a blank-line repeat */
  repeated?: boolean;
}

export interface CommandErrorEvent extends BaseEvent {
  type: 'command_error';
  command: string;
  /** Errors thrown by evaluated code count as 'evaluation' */
  errorKind: SessionErrorKind;
  message: string;
}

export interface SessionResumeEvent extends BaseEvent {
  type: 'session_resume';
  depth: number;
  reason: ResumeKind;
  line?: number;
}

export interface RecursionGuardEvent extends BaseEvent {
  type: 'recursion_guard';
  location: SourceLocation;
}

export interface BreakpointChangedEvent extends BaseEvent {
  type: 'breakpoint_changed';
  action: 'set' | 'cleared' | 'condition';
  id: number;
  location?: SourceLocation;
  condition?: string;
}

export type SessionEvent =
  | SessionObtainedEvent
  | SessionStopEvent
  | CommandEvent
  | CommandErrorEvent
  | SessionResumeEvent
  | RecursionGuardEvent
  | BreakpointChangedEvent;

export type SessionEventType = SessionEvent['type'];
