/**
 * Source Lines
 *
 * Line retrieval for rendering. The display engine invalidates a file before
 * every render so edits on disk show up on the next one.
 */

import * as fs from 'node:fs';

export interface SourceProvider {
  /** Lines of `file` without terminators, or undefined when it cannot be read */
  getLines(file: string): string[] | undefined;
  invalidate(file: string): void;
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export class FileSourceCache implements SourceProvider {
  private cache: Map<string, string[]> = new Map();
  private inline: Map<string, string[]>;

  /**
   * @param inline sources served without touching the filesystem, keyed by file name
   */
  constructor(inline: Record<string, string> = {}) {
    this.inline = new Map(Object.entries(inline).map(([file, text]) => [file, splitLines(text)]));
  }

  getLines(file: string): string[] | undefined {
    const inline = this.inline.get(file);
    if (inline) {
      return inline;
    }

    const cached = this.cache.get(file);
    if (cached) {
      return cached;
    }

    let text: string;
    try {
      text = fs.readFileSync(file, 'utf-8');
    } catch {
      return undefined;
    }
    const lines = splitLines(text);
    this.cache.set(file, lines);
    return lines;
  }

  invalidate(file: string): void {
    this.cache.delete(file);
  }
}

/**
 * A provider with extra in-memory files layered over another.
 */
export class OverlaySource implements SourceProvider {
  private base: SourceProvider;
  private files: Map<string, string[]>;

  constructor(base: SourceProvider, files: Record<string, string>) {
    this.base = base;
    this.files = new Map(Object.entries(files).map(([file, text]) => [file, splitLines(text)]));
  }

  getLines(file: string): string[] | undefined {
    return this.files.get(file) ?? this.base.getLines(file);
  }

  invalidate(file: string): void {
    if (!this.files.has(file)) {
      this.base.invalidate(file);
    }
  }
}
