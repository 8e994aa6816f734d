/**
 * Command Router
 *
 * Reads lines, parses them and dispatches to the command table until a
 * terminal command produces a resume reason. Handler failures are printed and
 * the loop continues.
 */

import type { ResumeReason } from '../frames/frame.js';
import type { Session } from '../session/session.js';
import { InterruptedError } from '../session/input.js';
import { parseLine, type Escape, type ParsedLine } from './parser.js';

export type CommandResult = ResumeReason | void;

export interface CommandSpec {
  name: string;
  aliases?: string[];
  /** One-line usage shown by `help` */
  usage: string;
  help: string;
  /** Whether a blank line repeats this command (default: true) */
  repeatable?: boolean;
  run(session: Session, arg: string): CommandResult | Promise<CommandResult>;
}

interface Remembered {
  /** Line without its escape prefix */
  body: string;
}

export class CommandRouter {
  private session: Session;
  private table: Map<string, CommandSpec> = new Map();
  private specs: CommandSpec[];
  private last: Remembered | null = null;
  private escape: Escape = '';

  constructor(session: Session, specs: CommandSpec[]) {
    this.session = session;
    this.specs = specs;
    for (const spec of specs) {
      this.table.set(spec.name, spec);
      for (const alias of spec.aliases ?? []) {
        this.table.set(alias, spec);
      }
    }
  }

  /** Escape prefix remembered for blank-line repeats */
  get lastEscape(): Escape {
    return this.escape;
  }

  /** Line a blank input would repeat, escape included */
  get repeatLine(): string | null {
    return this.last ? this.escape + this.last.body : null;
  }

  get commands(): CommandSpec[] {
    return this.specs;
  }

  /** Command names and aliases */
  get names(): string[] {
    return [...this.table.keys()];
  }

  lookup(name: string): CommandSpec | undefined {
    return this.table.get(name);
  }

  isCommand(name: string): boolean {
    return this.table.has(name);
  }

  /**
   * Forget the escape prefix; called on every new suspension.
   */
  resetForSuspension(): void {
    this.escape = '';
  }

  parse(line: string): ParsedLine {
    return parseLine(line, {
      isCommand: (name) => this.isCommand(name),
      isLocal: (name) => this.session.hasLocal(name),
    });
  }

  /**
   * Read and dispatch lines until a command resumes execution. End of input quits.
   */
  async loop(): Promise<ResumeReason> {
    for (;;) {
      let line: string | null;
      try {
        line = await this.session.readLine(this.session.prompt);
      } catch (error) {
        if (error instanceof InterruptedError && this.session.options.interruptAs) {
          this.session.write('--KeyboardInterrupt--');
          return { kind: this.session.options.interruptAs };
        }
        throw error;
      }

      if (line === null) {
        this.session.write('');
        return { kind: 'quit' };
      }

      const result = await this.onecmd(line);
      if (result) {
        return result;
      }
    }
  }

  /**
   * Dispatch one line. A blank line repeats the last repeatable one.
   */
  async onecmd(line: string): Promise<ResumeReason | undefined> {
    let parsed = this.parse(line);
    let repeated = false;
    if (parsed.type === 'empty') {
      const again = this.repeatLine;
      if (again === null) {
        return undefined;
      }
      parsed = this.parse(again);
      repeated = true;
      if (parsed.type === 'empty') {
        return undefined;
      }
    }

    if (parsed.type === 'evaluate') {
      const source = parsed.source;
      this.remember(parsed.escape, source);
      this.session.journalCommand('evaluate', source, repeated);
      return this.guard('evaluate', () => {
        this.session.runSource(source);
      });
    }

    const { name, arg, escape } = parsed;
    const body = arg ? `${name} ${arg}` : name;
    const spec = this.table.get(name);
    if (!spec) {
      throw new Error(`parser produced unregistered command ${name}`);
    }

    if (spec.repeatable === false) {
      this.last = null;
    } else {
      this.remember(escape, body);
    }
    this.session.journalCommand(spec.name, arg, repeated);
    return this.guard(spec.name, () => spec.run(this.session, arg));
  }

  private remember(escape: Escape, body: string): void {
    this.escape = escape;
    this.last = { body };
  }

  private async guard(
    command: string,
    run: () => CommandResult | Promise<CommandResult>
  ): Promise<ResumeReason | undefined> {
    try {
      const result = await run();
      return typeof result === 'object' ? result : undefined;
    } catch (error) {
      if (error instanceof InterruptedError) {
        throw error;
      }
      this.session.reportError(error, command);
      return undefined;
    }
  }
}
