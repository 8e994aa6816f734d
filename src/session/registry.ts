/**
 * Session Registry
 *
 * Process-wide table of the active session per (thread, debugger class).
 * Decides whether a suspension reuses the previous session, which keeps its
 * watch list, or gets a fresh one.
 */

import * as os from 'node:os';
import type { ThreadId } from '../frames/frame.js';
import type { OutputFormatter } from '../output/formatter.js';
import { InputLock } from './input.js';
import { Session, type SessionInit } from './session.js';

export interface ObtainRequest extends Omit<SessionInit, 'threadId' | 'kind' | 'depth' | 'inputLock'> {
  threadId: ThreadId;
  /** Debugger class identity (default: 'default') */
  kind?: string;
  /** Register the new session as the active one (default: true) */
  wantGlobal?: boolean;
  /** Return the active session when there is one (default: true) */
  wantReuse?: boolean;
}

export interface RegistryOptions {
  /** Environment fingerprint; a change disables reuse (default: the home directory) */
  environmentKey?: () => string;
  journal?: OutputFormatter;
  /** Lock every session of this registry takes before reading input (default: a new one) */
  inputLock?: InputLock;
}

interface Entry {
  session: Session;
  environment: string;
}

export function defaultEnvironmentKey(): string {
  return process.env.HOME ?? os.homedir();
}

function keyOf(threadId: ThreadId, kind: string): string {
  return `${typeof threadId}:${threadId}\u0000${kind}`;
}

export class SessionRegistry {
  private active: Map<string, Entry> = new Map();
  private environmentKey: () => string;
  private journal?: OutputFormatter;
  private lock: InputLock;

  constructor(options: RegistryOptions = {}) {
    this.environmentKey = options.environmentKey ?? defaultEnvironmentKey;
    this.journal = options.journal;
    this.lock = options.inputLock ?? new InputLock();
  }

  /** Shared by every session this registry creates, so threads take turns on the input */
  get inputLock(): InputLock {
    return this.lock;
  }

  get size(): number {
    return this.active.size;
  }

  /**
   * Return the active session for the request's thread and class, or create one.
   *
   * Runs synchronously so concurrent suspensions on the event loop never
   * interleave inside it.
   */
  obtain(request: ObtainRequest): Session {
    const { threadId, kind = 'default', wantGlobal = true, wantReuse = true, ...init } = request;
    const key = keyOf(threadId, kind);
    const environment = this.environmentKey();
    const existing = this.active.get(key);

    if (wantReuse && existing && existing.environment === environment) {
      this.announce(existing.session, true, true);
      return existing.session;
    }

    const session = new Session({
      ...init,
      journal: init.journal ?? this.journal,
      inputLock: this.lock,
      threadId,
      kind,
    });
    if (wantGlobal) {
      if (process.env.DEBUG_STEPDB && existing) {
        console.error(`[registry] replacing session for thread ${threadId} (${kind})`);
      }
      this.active.set(key, { session, environment });
      session.onResume((resumed, reason) => {
        if (reason.kind === 'quit') {
          this.release(resumed);
        }
      });
    }
    this.announce(session, false, wantGlobal);
    return session;
  }

  lookup(threadId: ThreadId, kind = 'default'): Session | undefined {
    return this.active.get(keyOf(threadId, kind))?.session;
  }

  /**
   * Drop `session` if it is the active one for its key.
   */
  release(session: Session): boolean {
    const key = keyOf(session.threadId, session.kind);
    if (this.active.get(key)?.session !== session) {
      return false;
    }
    this.active.delete(key);
    return true;
  }

  clear(): void {
    this.active.clear();
  }

  private announce(session: Session, reused: boolean, global: boolean): void {
    const journal = session.journal;
    journal?.emit(
      journal.createEvent('session_obtained', {
        threadId: session.threadId,
        kind: session.kind,
        depth: session.depth,
        reused,
        global,
      })
    );
  }
}
