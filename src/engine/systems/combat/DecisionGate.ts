// ─────────────────────────────────────────────
//  Decision Gate
//  The engine never proceeds past a decision point
//  without a validated answer. A refused answer goes
//  back to the provider together with the reason.
// ─────────────────────────────────────────────

import type { CombatParticipant } from '@/engine/data/types/Combat';
import { CombatEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import type { Awaitable } from './CombatContext';
import type { CombatRuleError } from './CombatErrors';
import { isCombatRuleError } from './CombatErrors';

export interface DecisionGateOptions<T, R> {
  combatId: string;
  participant: CombatParticipant;
  maxAttempts: number;
  ask: (rejection: CombatRuleError | undefined) => Awaitable<T>;
  /** Validates and applies the answer; throws a CombatRuleError to refuse it */
  accept: (answer: T) => R;
}

export async function requestDecision<T, R>(opts: DecisionGateOptions<T, R>): Promise<R> {
  let rejection: CombatRuleError | undefined;

  for (let attempt = 1; ; attempt++) {
    const answer = await opts.ask(rejection);
    try {
      return opts.accept(answer);
    } catch (err) {
      if (!isCombatRuleError(err)) throw err;

      Logger.log(`${opts.participant.id}: decision refused (${err.code}) ${err.message}`, 'warn');
      CombatEventBus.emit('decisionRejected', {
        combatId: opts.combatId,
        participantId: opts.participant.id,
        code: err.code,
        message: err.message,
        attempt,
      });

      if (attempt >= opts.maxAttempts) throw err;
      rejection = err;
    }
  }
}
