import type { DieRoll } from '@/engine/utils/EventBus';

export const HitCalculator = {
  /** A hit is produced for each die equal to or greater than the threshold */
  countHits(results: readonly number[], threshold: number): number {
    let hits = 0;
    for (const value of results) {
      if (value >= threshold) hits++;
    }
    return hits;
  },

  /** Hits across already-evaluated rolls with mixed thresholds */
  tally(rolls: readonly DieRoll[]): number {
    return rolls.filter(r => r.hit).length;
  },
};
