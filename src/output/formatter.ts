/**
 * Output Formatter
 *
 * Serializes session events to an NDJSON journal.
 */

import type { SessionEvent, SessionEventType, SourceLocation } from './events.js';

export interface FormatterOptions {
  /** Write to a custom stream (default: stdout) */
  stream?: NodeJS.WritableStream;
  /** Pretty print JSON (default: false) */
  pretty?: boolean;
  /** Only emit these event types (if specified) */
  include?: string[];
  /** Suppress these event types */
  exclude?: string[];
  /** Abbreviate file paths */
  compact?: boolean;
}

export class OutputFormatter {
  private stream: NodeJS.WritableStream;
  private pretty: boolean;
  private include?: Set<string>;
  private exclude?: Set<string>;
  private compact: boolean;

  constructor(options: FormatterOptions = {}) {
    this.stream = options.stream ?? process.stdout;
    this.pretty = options.pretty ?? false;
    this.include = options.include ? new Set(options.include) : undefined;
    this.exclude = options.exclude ? new Set(options.exclude) : undefined;
    this.compact = options.compact ?? false;
  }

  /**
   * Check if an event type should be emitted based on include/exclude filters
   */
  private shouldEmit(type: string): boolean {
    if (this.include && !this.include.has(type)) {
      return false;
    }
    if (this.exclude && this.exclude.has(type)) {
      return false;
    }
    return true;
  }

  emit(event: SessionEvent): void {
    if (!this.shouldEmit(event.type)) {
      return;
    }

    const outputEvent = this.compact ? this.compactifyEvent(event) : event;
    const json = this.pretty ? JSON.stringify(outputEvent, null, 2) : JSON.stringify(outputEvent);

    this.stream.write(json + '\n');
  }

  /**
   * Create an event with timestamp
   */
  createEvent<T extends SessionEventType>(
    type: T,
    data: Omit<Extract<SessionEvent, { type: T }>, 'type' | 'timestamp'>
  ): Extract<SessionEvent, { type: T }> {
    return {
      type,
      timestamp: new Date().toISOString(),
      ...data,
    } as Extract<SessionEvent, { type: T }>;
  }

  /**
   * Shorten a path: home directory to ~, node_modules collapsed, long paths to the last 3 segments
   */
  abbreviatePath(filePath: string): string {
    const nodeModulesMatch = filePath.match(/node_modules\/(.+)/);
    if (nodeModulesMatch) {
      const moduleSegments = nodeModulesMatch[1].split('/');
      return moduleSegments.length > 3
        ? `<node_modules>/${moduleSegments.slice(0, 2).join('/')}/...`
        : `<node_modules>/${nodeModulesMatch[1]}`;
    }

    let abbreviated = filePath;
    const homeDir = process.env.HOME || process.env.USERPROFILE || '';
    if (homeDir && abbreviated.startsWith(homeDir)) {
      abbreviated = '~' + abbreviated.slice(homeDir.length);
    }

    const segments = abbreviated.split('/');
    if (segments.length > 4) {
      abbreviated = '.../' + segments.slice(-3).join('/');
    }
    return abbreviated;
  }

  private compactifyLocation(location: SourceLocation): SourceLocation {
    return { ...location, file: this.abbreviatePath(location.file) };
  }

  private compactifyEvent(event: SessionEvent): SessionEvent {
    switch (event.type) {
      case 'session_stop':
      case 'recursion_guard':
        return { ...event, location: this.compactifyLocation(event.location) };
      case 'breakpoint_changed':
        return event.location ? { ...event, location: this.compactifyLocation(event.location) } : event;
      default:
        return event;
    }
  }
}
