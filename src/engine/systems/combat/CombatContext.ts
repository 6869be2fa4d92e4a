// ─────────────────────────────────────────────
//  Combat Context: the collaborators a combat is resolved against.
//  Passed explicitly per invocation; the engine owns none of it.
// ─────────────────────────────────────────────

import type { CombatConfig } from '@/config';
import type { CombatUnit } from '@/engine/data/types/Unit';
import type { CombatParticipant, CombatRole, CombatScope, RollChannel } from '@/engine/data/types/Combat';
import type { RandomSource } from '@/engine/utils/MathUtils';
import type { CombatRuleError } from './CombatErrors';

export type Awaitable<T> = T | Promise<T>;

/** Game-state query plus the unit mutation commands the engine issues */
export interface GameStateGateway {
  getUnit(unitId: string): CombatUnit | undefined;
  /** Every unit in the system, space area and planets alike */
  unitsInSystem(systemId: string): CombatUnit[];
  removeUnit(unitId: string): void;
  /** Moves a unit into the space area of another system */
  relocateUnit(unitId: string, systemId: string): void;
  markDamaged(unitId: string): void;
}

export interface AdjacencyQuery {
  isAdjacent(a: string, b: string): boolean;
  neighborsOf(systemId: string): string[];
}

export interface CommandTokenPort {
  placeCommandToken(playerId: string, systemId: string): void;
}

export type ReturnCause = 'destroyed' | 'removed';

/** Destroyed units trigger destruction effects in the host; removed ones do not */
export interface ReinforcementPort {
  returnToReinforcements(unit: CombatUnit, cause: ReturnCause): void;
}

// ── Decision requests ────────────────────────

interface DecisionRequestBase {
  combatId: string;
  participant: CombatParticipant;
  round: number;
  /** Why the previous answer was refused, when this is a repeat request */
  rejection?: CombatRuleError;
}

export interface RetreatDecisionRequest extends DecisionRequestBase {
  role: CombatRole;
  systemId: string;
  eligibleDestinations: string[];
  ownUnits: CombatUnit[];
  opposingUnits: CombatUnit[];
}

export interface SustainDecisionRequest extends DecisionRequestBase {
  hitsRemaining: number;
  candidates: CombatUnit[];
}

export interface DestroyDecisionRequest extends DecisionRequestBase {
  hitsRemaining: number;
  candidates: CombatUnit[];
  channel: RollChannel;
}

export interface OverflowDecisionRequest extends DecisionRequestBase {
  systemId: string;
  capacity: number;
  excess: number;
  candidates: CombatUnit[];
}

/** Human UI or bot policy. One call per decision point; answers are re-validated. */
export interface DecisionProvider {
  /** Destination system id, or null to stay and fight */
  chooseRetreatDestination(req: RetreatDecisionRequest): Awaitable<string | null>;
  /** Unit id to sustain damage, or null to decline */
  chooseSustainOrNot(req: SustainDecisionRequest): Awaitable<string | null>;
  chooseUnitToDestroy(req: DestroyDecisionRequest): Awaitable<string>;
  /** Exactly `excess` unit ids from the candidates */
  chooseOverflowRemoval(req: OverflowDecisionRequest): Awaitable<string[]>;
}

/**
 * Added to every die a side rolls on the channel before hits are counted.
 * Barrage rolls are only affected when the modifier returns a value for them.
 */
export type RollModifier = (role: CombatRole, channel: RollChannel, scope: CombatScope) => number;

export interface CombatContext {
  state: GameStateGateway;
  map: AdjacencyQuery;
  tokens: CommandTokenPort;
  reinforcements: ReinforcementPort;
  decisions: DecisionProvider;
  rng: RandomSource;
  config: CombatConfig;
  rollModifier?: RollModifier;
}
