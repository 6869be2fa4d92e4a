// ─────────────────────────────────────────────
//  Decision Router: sends each decision to the deciding
//  player's provider (UI bridge for humans, bot otherwise).
// ─────────────────────────────────────────────

import type { CombatParticipant } from '@/engine/data/types/Combat';
import type {
  Awaitable,
  DecisionProvider,
  DestroyDecisionRequest,
  OverflowDecisionRequest,
  RetreatDecisionRequest,
  SustainDecisionRequest,
} from '@/engine/systems/combat/CombatContext';

export class DecisionRouter implements DecisionProvider {
  private readonly providers = new Map<string, DecisionProvider>();

  constructor(private readonly fallback: DecisionProvider) {}

  register(playerId: string, provider: DecisionProvider): this {
    this.providers.set(playerId, provider);
    return this;
  }

  unregister(playerId: string): void {
    this.providers.delete(playerId);
  }

  /** A merged defender decides through its first owner (sorted) that has a provider */
  providerFor(participant: CombatParticipant): DecisionProvider {
    for (const ownerId of participant.ownerIds) {
      const provider = this.providers.get(ownerId);
      if (provider) return provider;
    }
    return this.fallback;
  }

  chooseRetreatDestination(req: RetreatDecisionRequest): Awaitable<string | null> {
    return this.providerFor(req.participant).chooseRetreatDestination(req);
  }

  chooseSustainOrNot(req: SustainDecisionRequest): Awaitable<string | null> {
    return this.providerFor(req.participant).chooseSustainOrNot(req);
  }

  chooseUnitToDestroy(req: DestroyDecisionRequest): Awaitable<string> {
    return this.providerFor(req.participant).chooseUnitToDestroy(req);
  }

  chooseOverflowRemoval(req: OverflowDecisionRequest): Awaitable<string[]> {
    return this.providerFor(req.participant).chooseOverflowRemoval(req);
  }
}
