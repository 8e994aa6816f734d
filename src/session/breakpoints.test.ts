/**
 * Unit tests for breakpoint parsing and management
 */

import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { Writable } from 'stream';
import { MemoryTracer } from '../frames/memory-tracer.js';
import { OutputFormatter } from '../output/formatter.js';
import {
  BreakpointManager,
  describeBreakpoint,
  parseBreakpointSpec,
  resolveBreakpointPath,
} from './breakpoints.js';

/**
 * Helper to create a platform-independent absolute path for testing.
 */
function makeAbsolutePath(...parts: string[]): string {
  const root = path.parse(process.cwd()).root;
  return path.join(root, 'tmp', ...parts);
}

const CURRENT = makeAbsolutePath('project', 'src', 'orders.ts');

describe('parseBreakpointSpec', () => {
  describe('basic parsing', () => {
    it('parses a bare line in the current file', () => {
      expect(parseBreakpointSpec('45', CURRENT)).toEqual({ file: CURRENT, line: 45, condition: undefined });
    });

    it('parses file:line format', () => {
      const result = parseBreakpointSpec('cart.ts:12', CURRENT);
      expect(result.file).toBe(makeAbsolutePath('project', 'src', 'cart.ts'));
      expect(result.line).toBe(12);
    });

    it('parses a trailing condition', () => {
      const result = parseBreakpointSpec('cart.ts:10, total > 5', CURRENT);
      expect(result.line).toBe(10);
      expect(result.condition).toBe('total > 5');
    });

    it('throws on invalid format', () => {
      expect(() => parseBreakpointSpec('invalid', CURRENT)).toThrow('Invalid breakpoint format');
    });

    it('throws on invalid line number', () => {
      expect(() => parseBreakpointSpec('cart.ts:0', CURRENT)).toThrow('Invalid line number');
      expect(() => parseBreakpointSpec('cart.ts:-1', CURRENT)).toThrow('Invalid breakpoint format');
    });
  });

  describe('path resolution', () => {
    it('resolves relative paths against the current file directory', () => {
      const result = parseBreakpointSpec('../lib/util.ts:3', CURRENT);
      expect(result.file).toBe(makeAbsolutePath('project', 'lib', 'util.ts'));
    });

    it('preserves absolute paths', () => {
      const absolute = makeAbsolutePath('other', 'file.ts');
      expect(parseBreakpointSpec(`${absolute}:7`, CURRENT).file).toBe(absolute);
    });
  });
});

describe('resolveBreakpointPath', () => {
  it('resolves against the process working directory without a base', () => {
    expect(resolveBreakpointPath('src/file.ts')).toBe(path.resolve('src/file.ts'));
  });
});

describe('BreakpointManager', () => {
  it('sets breakpoints through the tracer', () => {
    const tracer = new MemoryTracer();
    const manager = new BreakpointManager(tracer);

    const bp = manager.add('12', CURRENT);
    const temp = manager.add('14, ready', CURRENT, true);

    expect(describeBreakpoint(bp)).toBe(`Breakpoint 1 at ${CURRENT}:12`);
    expect(describeBreakpoint(temp)).toBe(`Temporary breakpoint 2 at ${CURRENT}:14`);
    expect(tracer.listBreakpoints().map((b) => b.condition)).toEqual([undefined, 'ready']);
  });

  it('clears by id or all at once', () => {
    const manager = new BreakpointManager(new MemoryTracer());
    manager.add('1', CURRENT);
    manager.add('2', CURRENT);
    manager.add('3', CURRENT);

    expect(manager.clear([2]).map((bp) => bp.id)).toEqual([2]);
    expect(manager.clear().map((bp) => bp.id)).toEqual([1, 3]);
    expect(manager.list()).toEqual([]);
  });

  it('rejects unknown ids', () => {
    const manager = new BreakpointManager(new MemoryTracer());
    expect(() => manager.clear([4])).toThrow('No breakpoint number 4');
    expect(() => manager.condition(4, 'x')).toThrow('No breakpoint number 4');
  });

  it('sets and removes conditions', () => {
    const manager = new BreakpointManager(new MemoryTracer());
    manager.add('5', CURRENT);

    expect(manager.condition(1, ' count > 2 ').condition).toBe('count > 2');
    expect(manager.condition(1, '').condition).toBeUndefined();
  });

  it('keeps command lists until the breakpoint is cleared', () => {
    const manager = new BreakpointManager(new MemoryTracer());
    manager.add('5', CURRENT);
    manager.setCommands(1, ['p total', 'c']);

    expect(manager.commandsFor(1)).toEqual(['p total', 'c']);
    manager.clear([1]);
    expect(manager.commandsFor(1)).toEqual([]);
  });

  it('journals changes', () => {
    const lines: string[] = [];
    const stream = new Writable({
      write(chunk, _encoding, callback) {
        lines.push(...chunk.toString().split('\n').filter((l: string) => l));
        callback();
      },
    });
    const manager = new BreakpointManager(new MemoryTracer(), new OutputFormatter({ stream }));

    manager.add('5', CURRENT);
    manager.clear([1]);

    expect(lines.map((line) => JSON.parse(line).action)).toEqual(['set', 'cleared']);
  });
});
