/**
 * Tests for StackModel navigation and hidden frames
 */

import { describe, it, expect } from 'vitest';
import type { Frame } from '../frames/frame.js';
import { BoundaryError, FrameRangeError } from './errors.js';
import { StackModel } from './stack.js';

function linear(count: number, hidden: number[] = []): Frame {
  let caller: Frame | null = null;
  for (let i = 0; i < count; i++) {
    caller = { file: '/app/x.ts', line: i + 1, functionName: `f${i}`, locals: {}, caller, hidden: hidden.includes(i) };
  }
  if (!caller) throw new Error('empty');
  return caller;
}

const byMarker = (frame: Frame) => (frame.hidden ? ('marked' as const) : null);

describe('StackModel.build', () => {
  it('orders frames outer to inner with the cursor on the start frame', () => {
    const stack = StackModel.build(linear(4));
    expect(stack.frames.map((v) => v.ref.functionName)).toEqual(['f0', 'f1', 'f2', 'f3']);
    expect(stack.frames.map((v) => v.index)).toEqual([0, 1, 2, 3]);
    expect(stack.cursor).toBe(3);
  });

  it('counts hidden frames', () => {
    const stack = StackModel.build(linear(5, [1, 2]), byMarker);
    expect(stack.hiddenCount).toBe(2);
    expect(stack.hiddenFrames.map((v) => v.index)).toEqual([1, 2]);
  });

  it('evaluates the predicate once per frame', () => {
    let calls = 0;
    const stack = StackModel.build(linear(3), () => {
      calls++;
      return null;
    });
    stack.move(-1);
    stack.move(1);
    expect(calls).toBe(3);
  });

  it('forces the innermost frame visible when every frame is hidden', () => {
    const stack = StackModel.build(linear(3, [0, 1, 2]), byMarker);
    expect(stack.cursor).toBe(2);
    expect(stack.current.hidden).toBe(false);
    expect(stack.current.forced).toBe(true);
    expect(stack.hiddenCount).toBe(2);
  });

  it('moves a cursor starting on a hidden frame to the nearest visible one', () => {
    const stack = StackModel.build(linear(4, [3]), byMarker);
    expect(stack.cursor).toBe(2);
  });

  it('stops walking at a caller cycle', () => {
    const a: Frame = { file: '/a.ts', line: 1, functionName: 'a', locals: {}, caller: null };
    const b: Frame = { file: '/a.ts', line: 2, functionName: 'b', locals: {}, caller: a };
    a.caller = b;
    expect(StackModel.build(b).length).toBe(2);
  });
});

describe('StackModel.move', () => {
  it('moves over visible frames only', () => {
    const stack = StackModel.build(linear(5, [2, 3]), byMarker);
    expect(stack.cursor).toBe(4);
    stack.move(-1);
    expect(stack.cursor).toBe(1);
    stack.move(1);
    expect(stack.cursor).toBe(4);
  });

  it('clamps at the last reachable visible frame', () => {
    const stack = StackModel.build(linear(5));
    stack.move(-10);
    expect(stack.cursor).toBe(0);
  });

  it('raises BoundaryError at the oldest frame and keeps the cursor', () => {
    const stack = StackModel.build(linear(3));
    stack.move(-2);
    let caught: unknown;
    try {
      stack.move(-1);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(BoundaryError);
    expect(caught).toMatchObject({ edge: 'oldest', message: 'Oldest frame' });
    expect(stack.cursor).toBe(0);
  });

  it('raises BoundaryError at the newest frame', () => {
    const stack = StackModel.build(linear(3));
    expect(() => stack.move(1)).toThrow('Newest frame');
    expect(stack.cursor).toBe(2);
  });

  it('treats hidden outer frames as the edge', () => {
    const stack = StackModel.build(linear(3, [0, 1]), byMarker);
    expect(() => stack.move(-1)).toThrow('Oldest frame');
  });
});

describe('StackModel.jump', () => {
  it('jumps to absolute and negative indexes', () => {
    const stack = StackModel.build(linear(5));
    stack.jump(1);
    expect(stack.cursor).toBe(1);
    stack.jump(-2);
    expect(stack.cursor).toBe(3);
  });

  it('raises FrameRangeError out of range and keeps the cursor', () => {
    const stack = StackModel.build(linear(3));
    expect(() => stack.jump(3)).toThrow(FrameRangeError);
    expect(() => stack.jump(-4)).toThrow('Out of range');
    expect(stack.cursor).toBe(2);
  });

  it('snaps a hidden target to the nearest visible frame, newer on ties', () => {
    const stack = StackModel.build(linear(5, [2]), byMarker);
    stack.jump(2);
    expect(stack.cursor).toBe(3);
  });

  it('lands where top() and bottom() do for 0 and -1', () => {
    for (const hidden of [[], [0], [4], [0, 4], [0, 1, 3]]) {
      const viaJump = StackModel.build(linear(5, hidden), byMarker);
      const viaEdge = StackModel.build(linear(5, hidden), byMarker);

      viaJump.jump(0);
      viaEdge.top();
      expect(viaJump.cursor).toBe(viaEdge.cursor);

      viaJump.jump(-1);
      viaEdge.bottom();
      expect(viaJump.cursor).toBe(viaEdge.cursor);
    }
  });
});

describe('StackModel.top / bottom', () => {
  it('raises Oldest when top() is repeated', () => {
    const stack = StackModel.build(linear(3));
    stack.top();
    expect(stack.cursor).toBe(0);
    expect(() => stack.top()).toThrow('Oldest frame');
    expect(stack.cursor).toBe(0);
  });

  it('raises Newest when already at the bottom', () => {
    const stack = StackModel.build(linear(3));
    expect(() => stack.bottom()).toThrow('Newest frame');
    expect(stack.cursor).toBe(2);
  });

  it('goes to the first visible frame', () => {
    const stack = StackModel.build(linear(4, [0]), byMarker);
    stack.top();
    expect(stack.cursor).toBe(1);
  });
});

describe('StackModel hide / unhide', () => {
  it('unhides every frame and hides them again', () => {
    const stack = StackModel.build(linear(4, [1, 2]), byMarker);
    stack.unhideAll();
    expect(stack.hiddenCount).toBe(0);
    stack.move(-1);
    expect(stack.cursor).toBe(2);
    stack.rehide();
    expect(stack.hiddenCount).toBe(2);
    expect(stack.current.hidden).toBe(false);
    expect(stack.cursor).toBe(3);
  });

  it('moves off a frame hidden under the cursor', () => {
    const stack = StackModel.build(linear(4));
    stack.move(-1);
    stack.hide(2);
    expect(stack.cursor).toBe(3);
    expect(stack.hiddenCount).toBe(1);
  });

  it('rejects hiding an index outside the stack', () => {
    const stack = StackModel.build(linear(2));
    expect(() => stack.hide(5)).toThrow(FrameRangeError);
  });

  it('keeps the cursor on a visible frame after any navigation', () => {
    const stack = StackModel.build(linear(8, [1, 3, 4, 6]), byMarker);
    const steps: Array<() => unknown> = [
      () => stack.move(-1),
      () => stack.move(-2),
      () => stack.move(3),
      () => stack.jump(4),
      () => stack.jump(-3),
      () => stack.top(),
      () => stack.bottom(),
    ];
    for (const step of steps) {
      try {
        step();
      } catch (error) {
        expect(error).toBeInstanceOf(BoundaryError);
      }
      expect(stack.current.hidden).toBe(false);
    }
  });
});
