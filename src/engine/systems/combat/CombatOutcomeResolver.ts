// ─────────────────────────────────────────────
//  Combat Outcome Resolver
//  Winner / loser / draw, then capacity-overflow cleanup for the winner.
// ─────────────────────────────────────────────

import type { CombatUnit } from '@/engine/data/types/Unit';
import { needsTransport } from '@/engine/data/types/Unit';
import type {
  CombatEnding,
  CombatParticipant,
  CombatResult,
  CombatRoundSummary,
  CombatSetup,
} from '@/engine/data/types/Combat';
import { CombatEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { MathUtils } from '@/engine/utils/MathUtils';
import type { CombatContext } from './CombatContext';
import { InvalidOverflowRemovalError } from './CombatErrors';
import { CombatQuery } from './CombatQuery';
import { requestDecision } from './DecisionGate';
import { DiceRoller } from './DiceRoller';

export interface Verdict {
  winner: CombatParticipant | null;
  loser: CombatParticipant | null;
  isDraw: boolean;
}

/** Everything a combat accumulated on its way to a terminal state */
export interface CombatTally {
  destroyedUnitIds: string[];
  retreatedUnitIds: string[];
  removedUnitIds: string[];
  rounds: CombatRoundSummary[];
  roundsFought: number;
  endedBy: CombatEnding;
}

export interface CapacityReport {
  capacity: number;
  cargo: CombatUnit[];
  excess: number;
}

export const CombatOutcomeResolver = {
  /** Terminal once either side has no unit left at the location */
  isTerminal(ctx: CombatContext, setup: CombatSetup): boolean {
    return CombatQuery.combatants(ctx.state, setup, setup.attacker).length === 0
      || CombatQuery.combatants(ctx.state, setup, setup.defender).length === 0;
  },

  /** True while the side has a combatant whose modified roll can still reach its threshold */
  canScore(ctx: CombatContext, setup: CombatSetup, participant: CombatParticipant): boolean {
    const modifier = DiceRoller.modifierFor(ctx, setup, participant.role, 'combat');
    return CombatQuery.combatants(ctx.state, setup, participant).some(u => {
      const value = DiceRoller.valueFor(u, 'combat');
      return value !== null && value.threshold - modifier <= ctx.config.dieSides;
    });
  },

  isStalemate(ctx: CombatContext, setup: CombatSetup): boolean {
    return !CombatOutcomeResolver.canScore(ctx, setup, setup.attacker)
      && !CombatOutcomeResolver.canScore(ctx, setup, setup.defender);
  },

  verdict(ctx: CombatContext, setup: CombatSetup): Verdict {
    const attackerLeft = CombatQuery.combatants(ctx.state, setup, setup.attacker).length;
    const defenderLeft = CombatQuery.combatants(ctx.state, setup, setup.defender).length;

    if (attackerLeft > 0 && defenderLeft === 0) return { winner: setup.attacker, loser: setup.defender, isDraw: false };
    if (defenderLeft > 0 && attackerLeft === 0) return { winner: setup.defender, loser: setup.attacker, isDraw: false };
    if (attackerLeft === 0 && defenderLeft === 0) return { winner: null, loser: null, isDraw: true };
    return { winner: null, loser: null, isDraw: false };
  },

  /** Fighters and ground forces in space against the capacity of the side's ships */
  capacityReport(ctx: CombatContext, systemId: string, participant: CombatParticipant): CapacityReport {
    const units = CombatQuery.spaceUnits(ctx.state, systemId, participant);
    const capacity = MathUtils.sumBy(units.filter(u => u.unitClass === 'ship'), u => u.capacity);
    const cargo = units.filter(needsTransport);
    return { capacity, cargo, excess: Math.max(0, cargo.length - capacity) };
  },

  /** The winner removes, by its own choice, whatever its ships can no longer carry */
  async enforceCapacity(
    ctx: CombatContext,
    setup: CombatSetup,
    winner: CombatParticipant,
    round: number,
  ): Promise<string[]> {
    if (setup.variant !== 'space') return [];
    const report = CombatOutcomeResolver.capacityReport(ctx, setup.systemId, winner);
    if (report.excess === 0) return [];

    return requestDecision<string[], string[]>({
      combatId: setup.combatId,
      participant: winner,
      maxAttempts: ctx.config.maxDecisionAttempts,
      ask: rejection => ctx.decisions.chooseOverflowRemoval({
        combatId: setup.combatId,
        participant: winner,
        round,
        systemId: setup.systemId,
        capacity: report.capacity,
        excess: report.excess,
        candidates: report.cargo,
        rejection,
      }),
      accept: unitIds => {
        if (unitIds.length !== report.excess || new Set(unitIds).size !== unitIds.length) {
          throw new InvalidOverflowRemovalError(`Exactly ${report.excess} distinct unit(s) must be removed`);
        }
        const chosen = unitIds.map(id => {
          const unit = report.cargo.find(u => u.id === id);
          if (!unit) throw new InvalidOverflowRemovalError(`${id} is not transported cargo of ${winner.id}`);
          return unit;
        });
        for (const unit of chosen) {
          ctx.state.removeUnit(unit.id);
          ctx.reinforcements.returnToReinforcements(unit, 'removed');
          CombatEventBus.emit('unitRemoved', { combatId: setup.combatId, unitId: unit.id, reason: 'capacity' });
        }
        Logger.log(`${winner.id} removes ${chosen.length} unit(s) over capacity`, 'result');
        return chosen.map(u => u.id);
      },
    });
  },

  async resolve(ctx: CombatContext, setup: CombatSetup, tally: CombatTally): Promise<CombatResult> {
    const verdict = CombatOutcomeResolver.verdict(ctx, setup);
    // A location found already terminal issues no command at all
    const overflow = verdict.winner && tally.endedBy !== 'already_resolved'
      ? await CombatOutcomeResolver.enforceCapacity(ctx, setup, verdict.winner, tally.roundsFought)
      : [];

    const result: CombatResult = {
      combatId: setup.combatId,
      variant: setup.variant,
      systemId: setup.systemId,
      planetId: setup.planetId,
      attackerId: setup.attacker.id,
      defenderId: setup.defender.id,
      winnerId: verdict.winner?.id ?? null,
      loserId: verdict.loser?.id ?? null,
      isDraw: verdict.isDraw,
      destroyedUnitIds: [...tally.destroyedUnitIds],
      retreatedUnitIds: [...tally.retreatedUnitIds],
      removedUnitIds: [...tally.removedUnitIds, ...overflow],
      roundsFought: tally.roundsFought,
      endedBy: tally.endedBy,
      rounds: tally.rounds,
    };

    if (result.isDraw) Logger.log(`Combat ${setup.combatId} ends in a draw`, 'result');
    else if (result.winnerId) Logger.log(`Combat ${setup.combatId}: ${result.winnerId} wins`, 'result');
    else Logger.log(`Combat ${setup.combatId} ends in a stalemate after ${result.roundsFought} round(s)`, 'result');

    return result;
  },
};
