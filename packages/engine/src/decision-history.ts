import type { DecisionCategory } from "./types";

/**
 * Per-game record of decided categories, oldest first.
 *
 * Owned by one game. Not safe to share between games or to mutate from
 * overlapping decideMove() calls; turns of a game are sequential.
 */
export class DecisionHistory {
  private readonly entries: DecisionCategory[] = [];

  record(category: DecisionCategory): void {
    this.entries.push(category);
  }

  /** The last `window` categories, oldest first. */
  recent(window: number): readonly DecisionCategory[] {
    if (window <= 0) return [];
    return this.entries.slice(-window);
  }

  /** Whether `category` was played within the last `window` decisions. */
  usedRecently(category: DecisionCategory, window: number): boolean {
    return this.recent(window).includes(category);
  }

  get length(): number {
    return this.entries.length;
  }

  all(): readonly DecisionCategory[] {
    return [...this.entries];
  }

  tally(): Record<DecisionCategory, number> {
    const counts: Record<DecisionCategory, number> = {
      best: 0,
      brilliant: 0,
      inaccuracy: 0,
      blunder: 0,
    };
    for (const category of this.entries) counts[category]++;
    return counts;
  }
}
