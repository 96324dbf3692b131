/**
 * World Distance Blend - Frame Gate Tests
 * @module distance-blend/__tests__/FrameGate
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FrameGate, FrameCounter } from '../core/FrameGate';
import { FRAME_NEVER } from '../types';

describe('FrameGate', () => {
  let gate: FrameGate;

  beforeEach(() => {
    gate = new FrameGate();
  });

  it('starts at FRAME_NEVER', () => {
    expect(gate.lastFrame).toBe(FRAME_NEVER);
  });

  it('requires recomputation for any frame before the first stamp', () => {
    expect(gate.shouldRecompute(0)).toBe(true);
    expect(gate.shouldRecompute(42)).toBe(true);
  });

  it('does not require recomputation for the stamped frame', () => {
    gate.stamp(7);

    expect(gate.shouldRecompute(7)).toBe(false);
    expect(gate.lastFrame).toBe(7);
  });

  it('requires recomputation for any other frame', () => {
    gate.stamp(7);

    expect(gate.shouldRecompute(8)).toBe(true);
    expect(gate.shouldRecompute(6)).toBe(true);
  });

  it('reset forces recomputation of the stamped frame', () => {
    gate.stamp(7);
    gate.reset();

    expect(gate.shouldRecompute(7)).toBe(true);
    expect(gate.lastFrame).toBe(FRAME_NEVER);
  });
});

describe('FrameCounter', () => {
  it('starts at 0 by default', () => {
    expect(new FrameCounter().current).toBe(0);
  });

  it('advances by one and returns the new frame', () => {
    const counter = new FrameCounter(10);

    expect(counter.advance()).toBe(11);
    expect(counter.advance()).toBe(12);
    expect(counter.current).toBe(12);
  });
});
