/**
 * collector.ts
 *
 * Deduplicating collector and the scroll loop built on it.
 * Infinite scroll keeps earlier items in the DOM, so every read returns
 * everything seen so far; the collector keeps one copy of each.
 */

import type { ScrollLimits, ScrollOutcome, ScrollRound } from './types';

export class UniqueCollector<T> {
  private readonly seen = new Map<string, T>();

  constructor(private readonly keyOf: (item: T) => string = String) {}

  // true when the item was not collected before
  add(item: T): boolean {
    const key = this.keyOf(item);
    if (this.seen.has(key)) return false;
    this.seen.set(key, item);
    return true;
  }

  addAll(items: Iterable<T>): number {
    let added = 0;
    for (const item of items) {
      if (this.add(item)) added++;
    }
    return added;
  }

  get size(): number {
    return this.seen.size;
  }

  items(): T[] {
    return [...this.seen.values()];
  }
}

// Call step until maxIdleRounds consecutive rounds add nothing, or maxScrolls rounds have run.
// The idle check wins when both trip on the same round.
export async function scrollUntilExhausted<T>(
  collector: UniqueCollector<T>,
  step: (round: number) => Promise<T[]>,
  limits: ScrollLimits,
  onRound?: (r: ScrollRound) => void,
): Promise<ScrollOutcome<T>> {
  if (limits.maxScrolls < 1 || limits.maxIdleRounds < 1) {
    throw new Error(
      `scroll limits must be at least 1 (maxScrolls=${limits.maxScrolls}, maxIdleRounds=${limits.maxIdleRounds})`,
    );
  }

  let idleRounds = 0;
  for (let round = 1; round <= limits.maxScrolls; round++) {
    const added = collector.addAll(await step(round));
    idleRounds = added === 0 ? idleRounds + 1 : 0;
    onRound?.({ round, added, total: collector.size, idleRounds });

    if (idleRounds >= limits.maxIdleRounds) {
      return { items: collector.items(), scrolls: round, stoppedBy: 'idle' };
    }
  }
  return { items: collector.items(), scrolls: limits.maxScrolls, stoppedBy: 'cap' };
}
