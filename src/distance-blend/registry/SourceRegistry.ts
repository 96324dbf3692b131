/**
 * World Distance Blend - Source Registry
 * Ordered, duplicate-free set of blend sources.
 *
 * @module distance-blend/registry
 */

import type { BlendSource } from '../types';

/**
 * Registered blend sources in first-registration order.
 *
 * Order is significant: it is the order of the computed weight records.
 * Entries are not validated when read; a source must be unregistered
 * before it is destroyed.
 */
export class SourceRegistry<S extends BlendSource = BlendSource> implements Iterable<S> {
  /** Insertion-ordered membership (Set preserves first-seen order) */
  private sources = new Set<S>();

  /**
   * Register a source. No-op if already registered.
   * Returns true if the source was added.
   */
  register(source: S): boolean {
    if (this.sources.has(source)) return false;
    this.sources.add(source);
    return true;
  }

  /**
   * Unregister a source. No-op if not registered.
   * Returns true if the source was removed.
   */
  unregister(source: S): boolean {
    return this.sources.delete(source);
  }

  /**
   * Check if source is registered.
   */
  has(source: S): boolean {
    return this.sources.has(source);
  }

  /** Number of registered sources */
  get size(): number {
    return this.sources.size;
  }

  [Symbol.iterator](): Iterator<S> {
    return this.sources.values();
  }

  /**
   * Snapshot of registered sources in order.
   */
  toArray(): S[] {
    return Array.from(this.sources);
  }

  /**
   * Remove all sources.
   */
  clear(): void {
    this.sources.clear();
  }
}

/**
 * Create empty source registry.
 */
export function createSourceRegistry<S extends BlendSource = BlendSource>(): SourceRegistry<S> {
  return new SourceRegistry<S>();
}
