/**
 * Frame Snapshots
 *
 * JSON captures of a stopped program: the frame chain, the stop event and
 * optionally the sources. Validated with zod and turned into linked frames
 * for a post-mortem session.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import type { Frame, StopEvent } from './frame.js';

const frameSchema = z.object({
  file: z.string().min(1),
  line: z.number().int().positive(),
  function: z.string().default('<module>'),
  module: z.string().optional(),
  locals: z.record(z.unknown()).default({}),
  firstLine: z.number().int().positive().optional(),
  exceptionLine: z.number().int().positive().optional(),
  hidden: z.boolean().optional(),
});

export const snapshotSchema = z.object({
  event: z.enum(['call', 'line', 'return', 'exception']).default('line'),
  /** Outermost frame first */
  frames: z.array(frameSchema).min(1),
  returnValue: z.unknown().optional(),
  exception: z
    .object({
      name: z.string().default('Error'),
      message: z.string().default(''),
    })
    .optional(),
  /** Source text by file name, served instead of reading the files */
  sources: z.record(z.string()).default({}),
});

export type Snapshot = z.infer<typeof snapshotSchema>;

export interface LoadedSnapshot {
  stop: StopEvent;
  sources: Record<string, string>;
}

export class SnapshotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotError';
  }
}

function toError(exception: { name: string; message: string }): Error {
  const error = new Error(exception.message);
  error.name = exception.name;
  return error;
}

export function snapshotToStop(snapshot: Snapshot): LoadedSnapshot {
  let caller: Frame | null = null;
  for (const entry of snapshot.frames) {
    const frame: Frame = {
      file: entry.file,
      line: entry.line,
      functionName: entry.function,
      module: entry.module,
      locals: { ...entry.locals },
      caller,
      firstLine: entry.firstLine,
      exceptionLine: entry.exceptionLine,
      hidden: entry.hidden,
    };
    caller = frame;
  }
  if (!caller) {
    throw new SnapshotError('snapshot has no frames');
  }

  return {
    stop: {
      kind: snapshot.event,
      frame: caller,
      returnValue: snapshot.returnValue,
      exception: snapshot.exception ? toError(snapshot.exception) : undefined,
    },
    sources: snapshot.sources,
  };
}

export function parseSnapshot(text: string): LoadedSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new SnapshotError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const result = snapshotSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new SnapshotError(`invalid snapshot: ${issues.join('; ')}`);
  }
  return snapshotToStop(result.data);
}

export function loadSnapshot(file: string): LoadedSnapshot {
  return parseSnapshot(fs.readFileSync(file, 'utf-8'));
}
