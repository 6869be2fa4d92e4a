// ─────────────────────────────────────────────
//  Hit Assignment Resolver
//  The owing side absorbs hits with its own units:
//  sustain damage is offered first, then a unit is destroyed.
// ─────────────────────────────────────────────

import type { CombatUnit } from '@/engine/data/types/Unit';
import type { CombatParticipant, CombatSetup, RollChannel } from '@/engine/data/types/Combat';
import { CombatEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import type { CombatContext } from './CombatContext';
import { HitAssignmentOverflowError, InvalidHitTargetError } from './CombatErrors';
import { CombatQuery } from './CombatQuery';
import { requestDecision } from './DecisionGate';
import { SustainDamageResolver } from './SustainDamageResolver';

export interface AssignmentOutcome {
  destroyed: string[];
  sustained: string[];
  hitsCancelled: number;
  /** Hits left over once the side ran out of eligible units */
  discarded: number;
}

interface SustainChoice {
  unitId: string;
  cancelled: number;
}

function emptyOutcome(): AssignmentOutcome {
  return { destroyed: [], sustained: [], hitsCancelled: 0, discarded: 0 };
}

export class HitAssignmentResolver {
  constructor(
    private readonly ctx: CombatContext,
    private readonly setup: CombatSetup,
  ) {}

  /** Units that may absorb a hit: barrage hits only ever land on fighters */
  candidates(participant: CombatParticipant, channel: RollChannel = 'combat'): CombatUnit[] {
    const units = CombatQuery.combatants(this.ctx.state, this.setup, participant);
    return channel === 'barrage' ? units.filter(u => u.unitClass === 'fighter') : units;
  }

  /**
   * Resolves exactly `hitsOwed` cancellation-or-destruction decisions.
   * Hits beyond the side's eligible units are discarded.
   */
  async assign(
    participant: CombatParticipant,
    hitsOwed: number,
    round: number,
    channel: RollChannel = 'combat',
  ): Promise<AssignmentOutcome> {
    const outcome = emptyOutcome();
    let remaining = Math.max(0, Math.floor(hitsOwed));

    while (remaining > 0) {
      const pool = this.candidates(participant, channel);
      if (pool.length === 0) {
        outcome.discarded = remaining;
        Logger.log(`${participant.id}: ${remaining} excess hit(s) discarded`, 'hit');
        break;
      }

      if (channel === 'combat') {
        const sustainable = pool.filter(u => SustainDamageResolver.offerSustain(u));
        if (sustainable.length > 0) {
          const hitsRemaining = remaining;
          const choice = await requestDecision<string | null, SustainChoice | null>({
            combatId: this.setup.combatId,
            participant,
            maxAttempts: this.ctx.config.maxDecisionAttempts,
            ask: rejection => this.ctx.decisions.chooseSustainOrNot({
              combatId: this.setup.combatId,
              participant,
              round,
              hitsRemaining,
              candidates: sustainable,
              rejection,
            }),
            accept: unitId => this.acceptSustain(unitId, sustainable),
          });

          if (choice) {
            const cancelled = Math.min(choice.cancelled, remaining);
            remaining -= cancelled;
            outcome.sustained.push(choice.unitId);
            outcome.hitsCancelled += cancelled;
            CombatEventBus.emit('unitSustained', { combatId: this.setup.combatId, unitId: choice.unitId, hitsCancelled: cancelled });
            Logger.log(`🛡 ${choice.unitId} sustains damage (${cancelled} hit cancelled)`, 'sustain');
            continue;
          }
        }
      }

      const hitsRemaining = remaining;
      const destroyedId = await requestDecision<string, string>({
        combatId: this.setup.combatId,
        participant,
        maxAttempts: this.ctx.config.maxDecisionAttempts,
        ask: rejection => this.ctx.decisions.chooseUnitToDestroy({
          combatId: this.setup.combatId,
          participant,
          round,
          hitsRemaining,
          candidates: pool,
          channel,
          rejection,
        }),
        accept: unitId => {
          const unit = pool.find(u => u.id === unitId);
          if (!unit) throw new InvalidHitTargetError(`${unitId} cannot absorb this hit for ${participant.id}`);
          this.destroy(unit, channel);
          return unit.id;
        },
      });

      outcome.destroyed.push(destroyedId);
      remaining -= 1;
    }

    return outcome;
  }

  /**
   * Applies a pre-selected list of destructions (no sustain offer).
   * Everything is validated before the first unit is removed.
   */
  assignExplicit(
    participant: CombatParticipant,
    hitsOwed: number,
    unitIds: readonly string[],
    channel: RollChannel = 'combat',
  ): AssignmentOutcome {
    if (unitIds.length > hitsOwed) throw new HitAssignmentOverflowError(hitsOwed, unitIds.length);
    if (new Set(unitIds).size !== unitIds.length) {
      throw new InvalidHitTargetError('The same unit cannot be destroyed twice');
    }

    const pool = this.candidates(participant, channel);
    const required = Math.min(hitsOwed, pool.length);
    if (unitIds.length < required) {
      throw new InvalidHitTargetError(`${required} unit(s) must absorb hits, ${unitIds.length} chosen`);
    }
    const chosen = unitIds.map(id => {
      const unit = pool.find(u => u.id === id);
      if (!unit) throw new InvalidHitTargetError(`${id} cannot absorb this hit for ${participant.id}`);
      return unit;
    });

    const outcome = emptyOutcome();
    for (const unit of chosen) {
      this.destroy(unit, channel);
      outcome.destroyed.push(unit.id);
    }
    outcome.discarded = hitsOwed - chosen.length;
    return outcome;
  }

  private acceptSustain(unitId: string | null, sustainable: CombatUnit[]): SustainChoice | null {
    if (unitId === null) return null;
    const unit = sustainable.find(u => u.id === unitId);
    if (!unit) throw new InvalidHitTargetError(`${unitId} cannot sustain damage`);
    return { unitId: unit.id, cancelled: SustainDamageResolver.applySustain(unit, this.ctx.state) };
  }

  private destroy(unit: CombatUnit, channel: RollChannel): void {
    this.ctx.state.removeUnit(unit.id);
    this.ctx.reinforcements.returnToReinforcements(unit, 'destroyed');
    CombatEventBus.emit('unitDestroyed', {
      combatId: this.setup.combatId,
      unitId: unit.id,
      ownerId: unit.ownerId,
      channel,
    });
    Logger.log(`💥 ${unit.name} (${unit.id}) destroyed`, 'hit');
  }
}
