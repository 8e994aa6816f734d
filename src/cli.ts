/**
 * CLI Interface
 *
 * Argument parsing and command handling using Commander.
 */

import { Command } from "commander";
import * as fs from "node:fs";
import * as path from "node:path";
import { FileSourceCache } from "./display/source.js";
import { MemoryTracer } from "./frames/memory-tracer.js";
import { loadSnapshot, SnapshotError, type LoadedSnapshot } from "./frames/snapshot.js";
import { OutputFormatter, type FormatterOptions } from "./output/formatter.js";
import { ConfigurationError } from "./session/errors.js";
import { ReadlineInput } from "./session/input.js";
import type { SessionOptions } from "./session/options.js";
import { SessionRegistry } from "./session/registry.js";

export interface InspectCliOptions {
  sticky?: boolean;
  hiddenFrames?: boolean;
  hiddenCount?: boolean;
  tracebackLimit?: string;
  editor?: string;
  skip?: string[];
  events?: string;
  pretty?: boolean;
  compact?: boolean;
  include?: string[];
  exclude?: string[];
}

export function parseTracebackLimit(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`Invalid traceback limit: ${value}. Use a non-negative integer`);
  }
  return parseInt(value, 10);
}

/**
 * Map inspector flags onto session options.
 */
export function toSessionOptions(options: InspectCliOptions): SessionOptions {
  return {
    stickyByDefault: options.sticky ?? false,
    enableHiddenFrames: options.hiddenFrames ?? true,
    showHiddenFramesCount: options.hiddenCount ?? true,
    showTracebackOnError:
      options.tracebackLimit !== undefined ? { limit: parseTracebackLimit(options.tracebackLimit) } : false,
    editor: options.editor,
    skipModules: options.skip ?? [],
    interruptAs: "quit",
  };
}

/**
 * Map journal flags onto formatter options.
 */
export function toFormatterOptions(options: InspectCliOptions, stream: NodeJS.WritableStream): FormatterOptions {
  return {
    stream,
    pretty: options.pretty ?? false,
    compact: options.compact ?? false,
    include: options.include,
    exclude: options.exclude,
  };
}

export function createCli(): Command {
  const program = new Command();

  program
    .name("stepdb")
    .description("Interactive debugging sessions over a pluggable execution tracer")
    .version("0.1.0");

  program
    .command("inspect <snapshot>")
    .description("Open a post-mortem session over a JSON frame snapshot")
    .option("--sticky", "Start in sticky mode", false)
    .option("--no-hidden-frames", "Show frames that would be hidden")
    .option("--no-hidden-count", "Do not print the hidden frame count on stops")
    .option("--traceback-limit <count>", "Print up to <count> stack lines after evaluation errors")
    .option("--editor <command>", "Editor command for `edit`; may use {filename} and {lineno}")
    .option("--skip <glob...>", "Hide frames of modules matching these globs")
    .option("--events <path>", "Write an NDJSON event journal to this file")
    .option("--pretty", "Pretty print journal JSON", false)
    .option("--compact", "Abbreviate file paths in the journal", false)
    .option("--include <types...>", "Only journal these event types")
    .option("--exclude <types...>", "Do not journal these event types")
    .action(async (snapshotPath: string, options: InspectCliOptions) => {
      await runInspect(snapshotPath, options);
    });

  return program;
}

async function runInspect(snapshotPath: string, options: InspectCliOptions): Promise<void> {
  let sessionOptions: SessionOptions;
  let loaded: LoadedSnapshot;
  try {
    sessionOptions = toSessionOptions(options);
    loaded = loadSnapshot(path.resolve(snapshotPath));
  } catch (error) {
    if (error instanceof SnapshotError || error instanceof ConfigurationError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const journalStream = options.events ? fs.createWriteStream(options.events) : undefined;
  const journal = journalStream ? new OutputFormatter(toFormatterOptions(options, journalStream)) : undefined;
  const registry = new SessionRegistry({ journal });

  let completer: (text: string) => string[] = () => [];
  const input = new ReadlineInput({ completer: (text) => completer(text) });

  try {
    const session = registry.obtain({
      threadId: process.pid,
      input,
      tracer: new MemoryTracer(),
      source: new FileSourceCache(loaded.sources),
      options: sessionOptions,
    });
    completer = (text) => session.complete(text);
    await session.interact(loaded.stop);
  } finally {
    input.close();
    journalStream?.end();
  }
}
