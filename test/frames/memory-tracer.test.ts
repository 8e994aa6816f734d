/**
 * Tests for MemoryTracer
 */

import { describe, it, expect } from 'vitest';
import { MemoryTracer } from '../../src/frames/memory-tracer.js';

describe('MemoryTracer', () => {
  it('assigns increasing ids and lists breakpoints by id', () => {
    const tracer = new MemoryTracer();
    tracer.setBreakpoint({ file: '/app/b.ts', line: 3 });
    tracer.setBreakpoint({ file: '/app/a.ts', line: 9 });
    tracer.setBreakpoint({ file: '/app/b.ts', line: 1 });

    expect(tracer.listBreakpoints().map((bp) => [bp.id, bp.file, bp.line])).toEqual([
      [1, '/app/b.ts', 3],
      [2, '/app/a.ts', 9],
      [3, '/app/b.ts', 1],
    ]);
  });

  it('clears breakpoints', () => {
    const tracer = new MemoryTracer();
    tracer.setBreakpoint({ file: '/app/a.ts', line: 1 });

    expect(tracer.clearBreakpoint(1)).toBe(true);
    expect(tracer.clearBreakpoint(1)).toBe(false);
    expect(tracer.listBreakpoints()).toEqual([]);
  });

  it('keeps the temporary flag', () => {
    const tracer = new MemoryTracer();
    tracer.setBreakpoint({ file: '/app/a.ts', line: 5 });
    tracer.setBreakpoint({ file: '/app/a.ts', line: 6, temporary: true });

    expect(tracer.listBreakpoints()).toMatchObject([
      { id: 1, temporary: false, enabled: true, hits: 0 },
      { id: 2, temporary: true },
    ]);
  });

  it('sets conditions on known breakpoints only', () => {
    const tracer = new MemoryTracer();
    tracer.setBreakpoint({ file: '/app/a.ts', line: 5 });

    expect(tracer.setCondition(1, 'n > 1').condition).toBe('n > 1');
    expect(() => tracer.setCondition(2, 'n > 1')).toThrow('No breakpoint number 2');
  });
});
