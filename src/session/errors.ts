/**
 * Session Errors
 *
 * Failures raised inside a session. The command router catches every one of
 * them at the dispatch boundary and prints a diagnostic.
 */

export type SessionErrorKind =
  | 'boundary'
  | 'range'
  | 'evaluation'
  | 'render'
  | 'recursion'
  | 'configuration';

export abstract class SessionError extends Error {
  abstract readonly kind: SessionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type Edge = 'oldest' | 'newest';

export class BoundaryError extends SessionError {
  readonly kind = 'boundary';

  constructor(readonly edge: Edge) {
    super(edge === 'oldest' ? 'Oldest frame' : 'Newest frame');
  }
}

export class FrameRangeError extends SessionError {
  readonly kind = 'range';

  constructor(readonly requested: number) {
    super('Out of range');
  }
}

export class EvaluationError extends SessionError {
  readonly kind = 'evaluation';
}

export class RenderError extends SessionError {
  readonly kind = 'render';
}

export class RecursionGuardError extends SessionError {
  readonly kind = 'recursion';
}

export class ConfigurationError extends SessionError {
  readonly kind = 'configuration';
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}
