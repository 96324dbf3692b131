/**
 * World Distance Blend - Frame Gate
 * At most one recomputation per frame.
 *
 * @module distance-blend/core
 */

import { FRAME_NEVER } from '../types';

/**
 * Remembers the frame of the last recomputation.
 * The frame counter is supplied by the caller on every query.
 */
export class FrameGate {
  private lastUpdateFrame: number = FRAME_NEVER;

  /**
   * True if `frame` differs from the last stamped frame.
   */
  shouldRecompute(frame: number): boolean {
    return frame !== this.lastUpdateFrame;
  }

  /**
   * Record that a recomputation happened in `frame`.
   */
  stamp(frame: number): void {
    this.lastUpdateFrame = frame;
  }

  /**
   * Forget the last stamp so the next query recomputes.
   */
  reset(): void {
    this.lastUpdateFrame = FRAME_NEVER;
  }

  /** Last stamped frame, FRAME_NEVER if none */
  get lastFrame(): number {
    return this.lastUpdateFrame;
  }
}

/**
 * Monotonic frame counter for hosts without one.
 * Pass `current` into queries and call `advance()` once per tick.
 */
export class FrameCounter {
  private frame: number;

  constructor(start: number = 0) {
    this.frame = start;
  }

  get current(): number {
    return this.frame;
  }

  /** Move to the next frame and return it */
  advance(): number {
    this.frame += 1;
    return this.frame;
  }
}
