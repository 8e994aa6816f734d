/**
 * Unit tests for frame evaluation
 */

import { describe, it, expect } from 'vitest';
import { classifySource, FrameEvaluator } from '../../src/session/evaluator.js';
import type { Frame } from '../../src/frames/frame.js';

function frameWith(locals: Record<string, unknown>): Frame {
  return { file: '/app/x.ts', line: 1, functionName: 'f', locals, caller: null };
}

describe('classifySource', () => {
  it('treats single expressions as expressions', () => {
    expect(classifySource('x')).toBe('expression');
    expect(classifySource('f(1, 2)')).toBe('expression');
    expect(classifySource('x == 1')).toBe('expression');
  });

  it('treats assignments, declarations and sequences as statements', () => {
    expect(classifySource('x = 1')).toBe('statements');
    expect(classifySource('x += 1')).toBe('statements');
    expect(classifySource('x++')).toBe('statements');
    expect(classifySource('let y = 2')).toBe('statements');
    expect(classifySource('a; b')).toBe('statements');
    expect(classifySource('f();')).toBe('statements');
  });
});

describe('FrameEvaluator', () => {
  const evaluator = new FrameEvaluator();

  it('reads locals', () => {
    expect(evaluator.evaluate('a + b', frameWith({ a: 1, b: 2 }))).toBe(3);
  });

  it('falls back to globals', () => {
    expect(evaluator.evaluate('Math.max(a, 4)', frameWith({ a: 9 }))).toBe(9);
  });

  it('lets locals shadow globals', () => {
    expect(evaluator.evaluate('Math', frameWith({ Math: 'local' }))).toBe('local');
  });

  it('writes assignments into the frame', () => {
    const frame = frameWith({ a: 1 });
    evaluator.execute('a = 5', frame);
    expect(frame.locals.a).toBe(5);
  });

  it('creates locals with var', () => {
    const frame = frameWith({});
    evaluator.execute('var created = 9', frame);
    expect(frame.locals.created).toBe(9);
  });

  it('raises ReferenceError for unknown names', () => {
    expect(() => evaluator.evaluate('missing', frameWith({}))).toThrow(ReferenceError);
    expect(() => evaluator.evaluate('missing', frameWith({}))).toThrow('missing is not defined');
  });

  it('propagates errors thrown by the evaluated code', () => {
    expect(() => evaluator.execute('throw new TypeError("bad")', frameWith({}))).toThrow('bad');
  });
});
