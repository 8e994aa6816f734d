/**
 * Sticky Cutoff
 *
 * Cuts a code unit down to a viewport around the executing line. Each elided
 * range becomes a single ellipsis entry.
 */

export const MIN_STICKY_HEIGHT = 6;

export const ELLIPSIS = 'ellipsis';

/** Indices into the unit's lines, or an ellipsis marker */
export type CutEntry = number | typeof ELLIPSIS;

export interface CutoffInput {
  /** Total lines in the unit */
  length: number;
  /** Index of the executing line within the unit */
  current: number;
  /** Leading decorator lines */
  decorators: number;
  height: number;
  /** Share of the window above the executing line */
  headBias: number;
}

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i++) {
    out.push(i);
  }
  return out;
}

export function cutoff(input: CutoffInput): CutEntry[] {
  const height = Math.max(input.height, MIN_STICKY_HEIGHT);
  const { length, current, headBias } = input;
  if (length <= height) {
    return range(0, length - 1);
  }

  const decorators = current < input.decorators ? 0 : Math.min(input.decorators, length);
  const head: CutEntry[] = decorators > 3 ? [0, ELLIPSIS, decorators - 1] : range(0, decorators - 1);

  const n = length - decorators;
  const c = current - decorators;
  const space = height - head.length;
  const at = (i: number) => decorators + i;

  if (n <= space) {
    return [...head, ...range(decorators, length - 1)];
  }

  const content = space - 2;
  // The decorator head takes its share of the lines above the executing line.
  const before = Math.max(0, Math.floor((height - 3) * headBias) - head.length);
  const after = content - 1 - before;
  const first = c - before;
  const last = c + after;

  if (first <= 1) {
    return [...head, ...range(at(0), at(space - 2)), ELLIPSIS];
  }
  if (last >= n - 2) {
    return [...head, ELLIPSIS, ...range(at(n - space + 1), at(n - 1))];
  }
  return [...head, ELLIPSIS, ...range(at(first), at(last)), ELLIPSIS];
}
