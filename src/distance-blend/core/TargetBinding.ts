/**
 * World Distance Blend - Target Binding
 * Non-owning reference to the entity distances are measured from.
 *
 * @module distance-blend/core
 */

import type { BlendTarget, Vec3 } from '../types';

/**
 * Holds the blend target through a WeakRef.
 *
 * A target that has been garbage collected, or that reports
 * `isAlive() === false`, resolves to null exactly like an unassigned one.
 */
export class TargetBinding<T extends BlendTarget = BlendTarget> {
  private ref: WeakRef<T> | null = null;

  /**
   * Assign the target (null clears it).
   * Returns true if the target changed by identity.
   */
  assign(newTarget: T | null): boolean {
    const changed = newTarget !== this.get();
    this.ref = newTarget ? new WeakRef(newTarget) : null;
    return changed;
  }

  /**
   * Currently held target, without a liveness check.
   */
  get(): T | null {
    return this.ref?.deref() ?? null;
  }

  /**
   * Target if still alive, otherwise null.
   */
  resolve(): T | null {
    const target = this.get();
    if (!target) return null;
    if (target.isAlive && !target.isAlive()) return null;
    return target;
  }
}

/**
 * View point if the target has one, position otherwise.
 */
export function resolveTargetPoint(target: BlendTarget): Vec3 {
  return target.getViewPoint ? target.getViewPoint() : target.getPosition();
}
