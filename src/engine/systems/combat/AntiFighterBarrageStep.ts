// ─────────────────────────────────────────────
//  Anti-Fighter Barrage: first round of space combat only.
//  Rolled on its own channel: ordinary combat-roll modifiers never see it.
// ─────────────────────────────────────────────

import type { CombatRole, CombatSetup } from '@/engine/data/types/Combat';
import { CombatEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import type { CombatContext } from './CombatContext';
import { CombatQuery } from './CombatQuery';
import { DiceRoller } from './DiceRoller';
import type { HitAssignmentResolver } from './HitAssignmentResolver';

export interface BarrageOutcome {
  /** Hits produced by each side */
  hits: Record<CombatRole, number>;
  /** Fighters each side lost */
  destroyed: Record<CombatRole, string[]>;
}

export const AntiFighterBarrageStep = {
  isApplicable(ctx: CombatContext, setup: CombatSetup, round: number): boolean {
    if (setup.variant !== 'space' || round !== 1) return false;
    return [setup.attacker, setup.defender].some(p =>
      CombatQuery.combatants(ctx.state, setup, p).some(u => DiceRoller.valueFor(u, 'barrage') !== null),
    );
  },

  /**
   * Both sides roll before any fighter is lost; each side then
   * destroys one of its own fighters per hit its opponent produced.
   */
  async resolve(
    ctx: CombatContext,
    setup: CombatSetup,
    resolver: HitAssignmentResolver,
    round: number,
  ): Promise<BarrageOutcome> {
    const hits: Record<CombatRole, number> = { attacker: 0, defender: 0 };

    for (const participant of [setup.attacker, setup.defender]) {
      const units = CombatQuery.combatants(ctx.state, setup, participant);
      const modifier = DiceRoller.modifierFor(ctx, setup, participant.role, 'barrage');
      const outcome = DiceRoller.roll(units, ctx.rng, 'barrage', ctx.config.dieSides, modifier);
      if (outcome.rolls.length === 0) continue;

      hits[participant.role] = outcome.hits;
      CombatEventBus.emit('diceRolled', {
        combatId: setup.combatId,
        participantId: participant.id,
        channel: 'barrage',
        rolls: outcome.rolls,
        hits: outcome.hits,
      });
      Logger.log(
        `🎯 ${participant.id} barrage [${outcome.rolls.map(r => r.value).join(', ')}] → ${outcome.hits} hit(s)`,
        'dice',
      );
    }

    const onDefender = await resolver.assign(setup.defender, hits.attacker, round, 'barrage');
    const onAttacker = await resolver.assign(setup.attacker, hits.defender, round, 'barrage');

    return {
      hits,
      destroyed: { attacker: onAttacker.destroyed, defender: onDefender.destroyed },
    };
  },
};
