import type { DestinationKey, Event } from '../domain/index.js';

/**
 * Events deferred out of an oversize batch, keyed by destination.
 *
 * Holds at most one ordered slice per key: a repeat overflow on the
 * same key appends to that slice. Slices are removed with `take()` the
 * next time the aggregator processes their key.
 *
 * Only the running aggregation pass touches the store, and passes never
 * overlap, so each key has a single writer at any time.
 */
export class OverflowStore {
  private readonly slices = new Map<DestinationKey, Event[]>();

  /** Appends `events` to the slice for `key`, preserving order. */
  append(key: DestinationKey, events: readonly Event[]): void {
    if (events.length === 0) return;
    const existing = this.slices.get(key);
    if (existing) {
      existing.push(...events);
    } else {
      this.slices.set(key, [...events]);
    }
  }

  /** Removes and returns the slice for `key` (empty when none). */
  take(key: DestinationKey): Event[] {
    const slice = this.slices.get(key) ?? [];
    this.slices.delete(key);
    return slice;
  }

  /** Keys with a pending slice, in insertion order. A copy, safe to iterate while taking. */
  keys(): DestinationKey[] {
    return [...this.slices.keys()];
  }

  has(key: DestinationKey): boolean {
    return this.slices.has(key);
  }

  pendingFor(key: DestinationKey): number {
    return this.slices.get(key)?.length ?? 0;
  }

  /** Number of keys with a pending slice. */
  get keyCount(): number {
    return this.slices.size;
  }

  /** Total deferred events across all keys. */
  get size(): number {
    let total = 0;
    for (const slice of this.slices.values()) {
      total += slice.length;
    }
    return total;
  }

  isEmpty(): boolean {
    return this.slices.size === 0;
  }
}
