import type { CombatUnit } from '@/engine/data/types/Unit';
import type { GameStateGateway } from './CombatContext';

export const SustainDamageResolver = {
  /** Only an undamaged unit with the capability may sustain */
  offerSustain(unit: CombatUnit): boolean {
    return unit.sustainDamage && !unit.damaged;
  },

  /**
   * Marks the unit damaged and returns how many hits the use cancels:
   * one, unless a modifier resolved outside combat raised `sustainCapacity`.
   * Returns 0 when the unit is not eligible.
   */
  applySustain(unit: CombatUnit, state: GameStateGateway): number {
    if (!SustainDamageResolver.offerSustain(unit)) return 0;
    state.markDamaged(unit.id);
    return Math.max(1, Math.floor(unit.sustainCapacity));
  },
};
