// ─────────────────────────────────────────────
//  Combat Step FSM
//  Within a round, steps only ever move forward.
// ─────────────────────────────────────────────

import type { CombatStep, CombatVariant } from '@/engine/data/types/Combat';
import { CombatEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

const STEP_ORDER: Record<CombatVariant, readonly CombatStep[]> = {
  space:  ['ANTI_FIGHTER_BARRAGE', 'ANNOUNCE_RETREATS', 'ROLL_DICE', 'ASSIGN_HITS', 'RETREAT'],
  ground: ['ROLL_DICE', 'ASSIGN_HITS'],
};

/** Steps that only exist in the first round */
const FIRST_ROUND_ONLY: readonly CombatStep[] = ['ANTI_FIGHTER_BARRAGE'];

export class CombatStepMachine {
  private _step: CombatStep | null = null;
  private _round = 0;

  constructor(
    readonly variant: CombatVariant,
    private readonly combatId: string,
  ) {}

  get step(): CombatStep | null { return this._step; }
  get round(): number           { return this._round; }
  get steps(): readonly CombatStep[] { return STEP_ORDER[this.variant]; }

  /** Opens the next round with no step taken yet */
  startRound(): number {
    this._round += 1;
    this._step = null;
    CombatEventBus.emit('roundStarted', { combatId: this.combatId, round: this._round });
    Logger.log(`─── Round ${this._round} ───`, 'system');
    return this._round;
  }

  canTransition(next: CombatStep): boolean {
    if (this._round === 0) return false;
    const order = STEP_ORDER[this.variant];
    const target = order.indexOf(next);
    if (target === -1) return false;
    if (this._round > 1 && FIRST_ROUND_ONLY.includes(next)) return false;
    const current = this._step === null ? -1 : order.indexOf(this._step);
    return target > current;
  }

  /** Move to a later step of this round. Refuses (and reports) any backward move. */
  transition(next: CombatStep): boolean {
    if (!this.canTransition(next)) {
      Logger.log(
        `[CombatStepMachine] Invalid transition: ${this._step ?? 'START'} → ${next} (round ${this._round})`,
        'warn',
      );
      return false;
    }
    this._step = next;
    CombatEventBus.emit('stepChanged', { combatId: this.combatId, round: this._round, step: next });
    return true;
  }
}
