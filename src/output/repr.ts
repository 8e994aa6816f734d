/**
 * Value and Error Text
 *
 * Turns values and thrown errors into the text a session prints. Formatting
 * failures degrade to fixed placeholders.
 */

import { inspect } from 'node:util';
import { isLibraryFile } from '../session/hidden.js';

export const UNPRINTABLE = '(unprintable)';

export type ValueFormatter = (value: unknown) => string;

export const defaultFormatValue: ValueFormatter = (value) =>
  inspect(value, { depth: 4, breakLength: Infinity });

export function safeRepr(value: unknown, format: ValueFormatter = defaultFormatValue): string {
  try {
    return format(value);
  } catch {
    return UNPRINTABLE;
  }
}

function errorName(error: unknown): string {
  try {
    if (error instanceof Error) {
      return error.name;
    }
    if (error !== null && typeof error === 'object') {
      return error.constructor?.name ?? 'Object';
    }
    return 'Error';
  } catch {
    return 'Error';
  }
}

/**
 * `Name: message` for a thrown value.
 */
export function describeException(error: unknown): string {
  const name = errorName(error);
  try {
    const message = error instanceof Error ? String(error.message) : safeStringify(error);
    return message === '' ? name : `${name}: ${message}`;
  } catch (inner) {
    try {
      return `${name}: (unprintable exception: ${describeException(inner)})`;
    } catch {
      return `${name}: (unprintable exception)`;
    }
  }
}

function safeStringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return inspect(value, { depth: 1, breakLength: Infinity });
}

/**
 * Stack lines of `error` outside library files, newest first, at most `limit`.
 */
export function stackTail(error: unknown, limit: number): string[] {
  if (limit <= 0 || !(error instanceof Error) || typeof error.stack !== 'string') {
    return [];
  }
  return error.stack
    .split('\n')
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.startsWith('at ') && !isLibraryFile(locationOf(line)))
    .slice(0, limit);
}

function locationOf(stackLine: string): string {
  const match = stackLine.match(/\(([^)]+)\)$/) ?? stackLine.match(/^at (.+)$/);
  return match ? match[1] : stackLine;
}

/**
 * Truncate to `width` columns, marking the cut with an ellipsis character.
 */
export function truncate(text: string, width: number): string {
  if (text.length <= width) {
    return text;
  }
  return width <= 1 ? '…'.slice(0, width) : text.slice(0, width - 1) + '…';
}

export const prettyFormatValue: ValueFormatter = (value) =>
  inspect(value, { depth: 6, breakLength: 80 });
