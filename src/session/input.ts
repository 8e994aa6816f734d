/**
 * Operator Input
 *
 * Line sources for the prompt loop and the lock that hands the shared input
 * stream from one suspended thread to the next.
 */

import * as readline from 'node:readline';
import type { ThreadId } from '../frames/frame.js';

export class InterruptedError extends Error {
  constructor() {
    super('KeyboardInterrupt');
    this.name = 'InterruptedError';
  }
}

export interface InputSource {
  /** Next line, or null at end of input; rejects with InterruptedError on an interrupt */
  readLine(prompt: string): Promise<string | null>;
}

export type Completer = (text: string) => string[];

export interface ReadlineInputOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  completer?: Completer;
}

interface PendingRead {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
}

export class ReadlineInput implements InputSource {
  private rl: readline.Interface;
  private pending: PendingRead | null = null;
  private buffered: string[] = [];
  private closed = false;

  constructor(options: ReadlineInputOptions = {}) {
    const completer = options.completer;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
      completer: completer
        ? (line: string): [string[], string] => {
            const word = line.split(/\s+/).pop() ?? '';
            return [completer(word), word];
          }
        : undefined,
    });

    this.rl.on('line', (line) => {
      const pending = this.pending;
      this.pending = null;
      if (pending) {
        pending.resolve(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      const pending = this.pending;
      this.pending = null;
      pending?.resolve(null);
    });
    this.rl.on('SIGINT', () => {
      const pending = this.pending;
      this.pending = null;
      if (pending) {
        pending.reject(new InterruptedError());
      } else {
        this.rl.close();
      }
    });
  }

  readLine(prompt: string): Promise<string | null> {
    const next = this.buffered.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    this.rl.setPrompt(prompt);
    this.rl.prompt();
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  close(): void {
    this.rl.close();
  }
}

/** Scripted entry that raises an interrupt instead of returning a line */
export const INTERRUPT = Symbol('interrupt');

/**
 * Input from a fixed list of lines; end of input once the list runs out.
 */
export class ScriptedInput implements InputSource {
  readonly prompts: string[] = [];
  private lines: Array<string | typeof INTERRUPT>;

  constructor(lines: Array<string | typeof INTERRUPT>) {
    this.lines = [...lines];
  }

  get remaining(): number {
    return this.lines.length;
  }

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    const next = this.lines.shift();
    if (next === INTERRUPT) {
      throw new InterruptedError();
    }
    return next ?? null;
  }
}

interface Waiter {
  owner: ThreadId;
  resolve: () => void;
}

/**
 * Input ownership: one thread reads at a time, others wait in arrival order.
 * The owner may acquire again (nested sessions on the same thread).
 */
export class InputLock {
  private owner: ThreadId | null = null;
  private holds = 0;
  private waiters: Waiter[] = [];

  get currentOwner(): ThreadId | null {
    return this.owner;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(owner: ThreadId): Promise<void> {
    if (this.owner === null || this.owner === owner) {
      this.owner = owner;
      this.holds++;
      return;
    }
    if (process.env.DEBUG_STEPDB) {
      console.error(`[input] thread ${owner} waiting for thread ${this.owner}`);
    }
    await new Promise<void>((resolve) => this.waiters.push({ owner, resolve }));
  }

  release(owner: ThreadId): void {
    if (this.owner !== owner) {
      throw new Error(`thread ${owner} does not own the input (owner: ${this.owner})`);
    }
    this.holds--;
    if (this.holds > 0) {
      return;
    }
    const next = this.waiters.shift();
    if (next) {
      this.owner = next.owner;
      this.holds = 1;
      next.resolve();
    } else {
      this.owner = null;
    }
  }
}
