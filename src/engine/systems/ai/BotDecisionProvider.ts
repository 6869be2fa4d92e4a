// ─────────────────────────────────────────────
//  Bot Decision Provider: rule-of-thumb combat choices
//  for computer players. Never inspects anything but the request.
// ─────────────────────────────────────────────

import type { CombatUnit } from '@/engine/data/types/Unit';
import type {
  DecisionProvider,
  DestroyDecisionRequest,
  OverflowDecisionRequest,
  RetreatDecisionRequest,
  SustainDecisionRequest,
} from '@/engine/systems/combat/CombatContext';
import { DiceRoller } from '@/engine/systems/combat/DiceRoller';
import { DEFAULT_COMBAT_CONFIG } from '@/config';

export type BotPersonality = 'aggressive' | 'cautious';

// ── Bot Personality Weights ────────────────────

export interface BotWeights {
  /** Own/opposing expected-hit ratio below which the bot announces a retreat */
  retreatRatio: number;
}

const WEIGHTS: Record<BotPersonality, BotWeights> = {
  aggressive: {
    retreatRatio: 0.25,  // only leaves a hopeless fight
  },
  cautious: {
    retreatRatio: 0.75,
  },
};

export function getBotWeights(personality: BotPersonality): BotWeights {
  return WEIGHTS[personality];
}

/** Threshold a unit hits on; units without a combat value sort last */
function thresholdOf(unit: CombatUnit, sides: number): number {
  return unit.combat?.threshold ?? sides + 1;
}

/** Cheapest first, then the weakest roller. Stable on candidate order. */
function byExpendability(sides: number) {
  return (a: CombatUnit, b: CombatUnit): number =>
    a.cost - b.cost || thresholdOf(b, sides) - thresholdOf(a, sides);
}

export class BotDecisionProvider implements DecisionProvider {
  readonly weights: BotWeights;

  constructor(
    readonly personality: BotPersonality = 'aggressive',
    private readonly sides: number = DEFAULT_COMBAT_CONFIG.dieSides,
  ) {
    this.weights = getBotWeights(personality);
  }

  chooseRetreatDestination(req: RetreatDecisionRequest): string | null {
    const destination = req.eligibleDestinations[0];
    if (destination === undefined) return null;

    const own = DiceRoller.expectedHits(req.ownUnits, 'combat', this.sides);
    const opposing = DiceRoller.expectedHits(req.opposingUnits, 'combat', this.sides);
    if (opposing === 0) return null;

    return own / opposing < this.weights.retreatRatio ? destination : null;
  }

  /** Always sustains, on the strongest roller */
  chooseSustainOrNot(req: SustainDecisionRequest): string | null {
    const [best] = [...req.candidates].sort((a, b) =>
      thresholdOf(a, this.sides) - thresholdOf(b, this.sides)
      || (b.combat?.dice ?? 0) - (a.combat?.dice ?? 0),
    );
    return best?.id ?? null;
  }

  chooseUnitToDestroy(req: DestroyDecisionRequest): string {
    const [victim] = [...req.candidates].sort(byExpendability(this.sides));
    if (!victim) throw new Error(`No candidate to destroy for ${req.participant.id}`);
    return victim.id;
  }

  chooseOverflowRemoval(req: OverflowDecisionRequest): string[] {
    return [...req.candidates]
      .sort(byExpendability(this.sides))
      .slice(0, req.excess)
      .map(u => u.id);
  }
}
