/**
 * Frame View
 *
 * One entry of a built stack: a borrowed frame, its position in the full chain
 * and its visibility.
 */

import type { Frame } from '../frames/frame.js';
import type { HiddenReason } from './hidden.js';

export class FrameView {
  /** Visibility; mutated by hide/unhide without rebuilding the stack */
  hidden: boolean;
  /** Set when this frame was made visible because every frame was hidden */
  forced = false;

  constructor(
    readonly ref: Frame,
    readonly index: number,
    readonly reason: HiddenReason | null
  ) {
    this.hidden = reason !== null;
  }

  get location(): string {
    return `${this.ref.file}(${this.ref.line})${this.ref.functionName}()`;
  }
}
