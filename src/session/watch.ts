/**
 * Watch List
 *
 * Expressions re-evaluated on every stop; a change prints `expr: old --> new`.
 */

export const UNDEFINED_WATCH = '<undefined>';

/** Evaluates a watched expression to its display text, throwing when it cannot */
export type WatchEvaluator = (expression: string) => string;

export class WatchList {
  private entries: Map<string, string> = new Map();

  get size(): number {
    return this.entries.size;
  }

  has(expression: string): boolean {
    return this.entries.has(expression);
  }

  lastValue(expression: string): string | undefined {
    return this.entries.get(expression);
  }

  /**
   * Start watching `expression`, returning its current display text.
   */
  add(expression: string, evaluate: WatchEvaluator): string {
    const value = read(expression, evaluate);
    this.entries.set(expression, value);
    return value;
  }

  remove(expression: string): boolean {
    return this.entries.delete(expression);
  }

  clear(): void {
    this.entries.clear();
  }

  list(): Array<[string, string]> {
    return [...this.entries];
  }

  /**
   * Re-evaluate every expression, returning a line per changed value.
   */
  refresh(evaluate: WatchEvaluator): string[] {
    const changes: string[] = [];
    for (const [expression, previous] of this.entries) {
      const current = read(expression, evaluate);
      if (current !== previous) {
        changes.push(`${expression}: ${previous} --> ${current}`);
        this.entries.set(expression, current);
      }
    }
    return changes;
  }
}

function read(expression: string, evaluate: WatchEvaluator): string {
  try {
    return evaluate(expression);
  } catch {
    return UNDEFINED_WATCH;
  }
}
