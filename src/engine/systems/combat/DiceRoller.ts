// ─────────────────────────────────────────────
//  Dice Roller
//  One die per die-count slot; same-threshold units roll together.
//  Randomness is always injected.
// ─────────────────────────────────────────────

import type { CombatUnit, RollValue } from '@/engine/data/types/Unit';
import type { CombatRole, CombatScope, RollChannel } from '@/engine/data/types/Combat';
import type { DieRoll } from '@/engine/utils/EventBus';
import type { RandomSource } from '@/engine/utils/MathUtils';
import { MathUtils } from '@/engine/utils/MathUtils';
import { DEFAULT_COMBAT_CONFIG } from '@/config';
import type { CombatContext } from './CombatContext';
import { HitCalculator } from './HitCalculator';

export interface ThresholdGroup {
  threshold: number;
  units: CombatUnit[];
}

export interface GroupRoll {
  threshold: number;
  /** Modified results: face plus the side's roll modifier */
  results: number[];
  hits: number;
}

export interface RollOutcome {
  rolls: DieRoll[];
  groups: GroupRoll[];
  hits: number;
}

export const DiceRoller = {
  rollDie(rng: RandomSource, sides: number = DEFAULT_COMBAT_CONFIG.dieSides): number {
    return MathUtils.randInt(1, sides, rng);
  },

  /** The roll value a unit uses on a channel; barrage never borrows the combat value */
  valueFor(unit: CombatUnit, channel: RollChannel): RollValue | null {
    const value = channel === 'barrage' ? unit.antiFighterBarrage : unit.combat;
    if (!value || value.dice <= 0) return null;
    return value;
  },

  /** Units able to roll on the channel, grouped by threshold (lowest first) */
  groupByThreshold(units: readonly CombatUnit[], channel: RollChannel): ThresholdGroup[] {
    const groups = new Map<number, CombatUnit[]>();
    for (const unit of units) {
      const value = DiceRoller.valueFor(unit, channel);
      if (!value) continue;
      const members = groups.get(value.threshold) ?? [];
      members.push(unit);
      groups.set(value.threshold, members);
    }
    return [...groups.entries()]
      .sort(([a], [b]) => a - b)
      .map(([threshold, members]) => ({ threshold, units: members }));
  },

  /** What the context's modifier adds to each die of this side on the channel */
  modifierFor(ctx: CombatContext, scope: CombatScope, role: CombatRole, channel: RollChannel): number {
    return ctx.rollModifier?.(role, channel, scope) ?? 0;
  },

  roll(
    units: readonly CombatUnit[],
    rng: RandomSource,
    channel: RollChannel = 'combat',
    sides: number = DEFAULT_COMBAT_CONFIG.dieSides,
    modifier = 0,
  ): RollOutcome {
    const rolls: DieRoll[] = [];
    const groups: GroupRoll[] = [];

    for (const group of DiceRoller.groupByThreshold(units, channel)) {
      const results: number[] = [];
      for (const unit of group.units) {
        const dice = DiceRoller.valueFor(unit, channel)?.dice ?? 0;
        for (let i = 0; i < dice; i++) {
          const value = DiceRoller.rollDie(rng, sides);
          results.push(value + modifier);
          rolls.push({ unitId: unit.id, value, modifier, threshold: group.threshold, hit: value + modifier >= group.threshold });
        }
      }
      groups.push({ threshold: group.threshold, results, hits: HitCalculator.countHits(results, group.threshold) });
    }

    return { rolls, groups, hits: MathUtils.sumBy(groups, g => g.hits) };
  },

  /** Expected hits per round, used by bot policies to weigh a fight */
  expectedHits(
    units: readonly CombatUnit[],
    channel: RollChannel = 'combat',
    sides: number = DEFAULT_COMBAT_CONFIG.dieSides,
  ): number {
    return MathUtils.sumBy(units, u => {
      const value = DiceRoller.valueFor(u, channel);
      if (!value) return 0;
      const p = MathUtils.clamp((sides - value.threshold + 1) / sides, 0, 1);
      return value.dice * p;
    });
  },
};
