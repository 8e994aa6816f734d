/**
 * Stack Model
 *
 * Materializes a frame chain into an indexed array of views and owns the
 * navigation cursor. Navigation works on integer indices only.
 */

import { walkFrames, type Frame } from '../frames/frame.js';
import { BoundaryError, FrameRangeError } from './errors.js';
import { FrameView } from './frame-view.js';
import type { HiddenPredicate } from './hidden.js';

export class StackModel {
  readonly frames: FrameView[];
  private cursorIndex: number;

  private constructor(frames: FrameView[], cursor: number) {
    this.frames = frames;
    this.cursorIndex = cursor;
    this.normalize();
  }

  /**
   * Walk from `start` to the outermost frame, evaluating `predicate` once per frame.
   */
  static build(start: Frame, predicate: HiddenPredicate = () => null): StackModel {
    const chain = walkFrames(start);
    const views = chain.map((frame, index) => new FrameView(frame, index, predicate(frame)));
    return new StackModel(views, views.length - 1);
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  get current(): FrameView {
    return this.frames[this.cursorIndex];
  }

  get length(): number {
    return this.frames.length;
  }

  get hiddenCount(): number {
    return this.frames.filter((view) => view.hidden).length;
  }

  get hiddenFrames(): FrameView[] {
    return this.frames.filter((view) => view.hidden);
  }

  /**
   * The frame that called the current one, if any.
   */
  get callerOfCurrent(): FrameView | undefined {
    return this.cursorIndex > 0 ? this.frames[this.cursorIndex - 1] : undefined;
  }

  /**
   * Move by `delta` visible frames; negative moves toward the outermost frame.
   * Clamps at the last visible frame reachable and fails only when no move is possible.
   */
  move(delta: number): FrameView {
    const step = delta < 0 ? -1 : 1;
    let remaining = Math.abs(delta);
    let target = this.cursorIndex;

    for (let i = this.cursorIndex + step; remaining > 0 && i >= 0 && i < this.frames.length; i += step) {
      if (!this.frames[i].hidden) {
        target = i;
        remaining--;
      }
    }

    if (target === this.cursorIndex) {
      throw new BoundaryError(step < 0 ? 'oldest' : 'newest');
    }
    this.cursorIndex = target;
    return this.current;
  }

  /**
   * Jump to an absolute index in the unfiltered chain; negative counts from the newest.
   * A hidden target lands on the nearest visible frame.
   */
  jump(n: number): FrameView {
    const index = n < 0 ? this.frames.length + n : n;
    if (!Number.isInteger(index) || index < 0 || index >= this.frames.length) {
      throw new FrameRangeError(n);
    }
    this.cursorIndex = this.nearestVisible(index);
    return this.current;
  }

  top(): FrameView {
    const first = this.frames.findIndex((view) => !view.hidden);
    if (first === this.cursorIndex) {
      throw new BoundaryError('oldest');
    }
    this.cursorIndex = first;
    return this.current;
  }

  bottom(): FrameView {
    let last = this.frames.length - 1;
    while (last > 0 && this.frames[last].hidden) {
      last--;
    }
    if (last === this.cursorIndex) {
      throw new BoundaryError('newest');
    }
    this.cursorIndex = last;
    return this.current;
  }

  unhideAll(): void {
    for (const view of this.frames) {
      view.hidden = false;
      view.forced = false;
    }
  }

  hide(index: number): void {
    const view = this.frames[index];
    if (!view) {
      throw new FrameRangeError(index);
    }
    view.hidden = true;
    this.normalize();
  }

  /**
   * Restore the visibility computed at build time.
   */
  rehide(): void {
    for (const view of this.frames) {
      view.hidden = view.reason !== null;
      view.forced = false;
    }
    this.normalize();
  }

  private normalize(): void {
    if (this.frames.every((view) => view.hidden)) {
      const innermost = this.frames[this.frames.length - 1];
      innermost.hidden = false;
      innermost.forced = true;
    }
    if (this.current.hidden) {
      this.cursorIndex = this.nearestVisible(this.cursorIndex);
    }
  }

  /** Nearest visible index to `index`; ties go to the newer frame */
  private nearestVisible(index: number): number {
    for (let distance = 0; distance < this.frames.length; distance++) {
      const newer = this.frames[index + distance];
      if (newer && !newer.hidden) {
        return index + distance;
      }
      const older = this.frames[index - distance];
      if (older && !older.hidden) {
        return index - distance;
      }
    }
    return index;
  }
}
