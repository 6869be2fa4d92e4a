export type { CombatConfig } from './config';
export { DEFAULT_COMBAT_CONFIG, resolveCombatConfig } from './config';

export type {
  CombatUnit,
  RollValue,
  UnitClass,
  UnitData,
  UnitLocation,
} from './engine/data/types/Unit';
export {
  createUnit,
  getUnitData,
  listUnitData,
  isGroundCombatant,
  isSpaceCombatant,
  needsTransport,
  resetUnitIdCounter,
} from './engine/data/types/Unit';
export type { GalaxyMapData, Lane, PlanetNode, SystemNode } from './engine/data/types/Galaxy';
export type {
  CombatEnding,
  CombatParticipant,
  CombatResult,
  CombatRole,
  CombatRound,
  CombatRoundSummary,
  CombatScope,
  CombatSetup,
  CombatStep,
  CombatVariant,
  RetreatAnnouncement,
  RetreatStatus,
  RollChannel,
} from './engine/data/types/Combat';

export type {
  AdjacencyQuery,
  Awaitable,
  CombatContext,
  CommandTokenPort,
  DecisionProvider,
  DestroyDecisionRequest,
  GameStateGateway,
  OverflowDecisionRequest,
  ReinforcementPort,
  RetreatDecisionRequest,
  ReturnCause,
  RollModifier,
  SustainDecisionRequest,
} from './engine/systems/combat/CombatContext';
export * from './engine/systems/combat/CombatErrors';
export { AntiFighterBarrageStep } from './engine/systems/combat/AntiFighterBarrageStep';
export type { CombatDetected, Detection, NoCombat } from './engine/systems/combat/CombatDetector';
export { CombatDetector } from './engine/systems/combat/CombatDetector';
export { CombatOutcomeResolver } from './engine/systems/combat/CombatOutcomeResolver';
export { CombatQuery, makeParticipant } from './engine/systems/combat/CombatQuery';
export { CombatRoundEngine } from './engine/systems/combat/CombatRoundEngine';
export { CombatStepMachine } from './engine/systems/combat/CombatStepMachine';
export { requestDecision } from './engine/systems/combat/DecisionGate';
export { DiceRoller } from './engine/systems/combat/DiceRoller';
export { HitAssignmentResolver } from './engine/systems/combat/HitAssignmentResolver';
export { HitCalculator } from './engine/systems/combat/HitCalculator';
export type { NebulaQuery } from './engine/systems/combat/RollModifiers';
export { NEBULA_DEFENDER_BONUS, nebulaDefenderBonus } from './engine/systems/combat/RollModifiers';
export type { RetreatExecution } from './engine/systems/combat/RetreatManager';
export { RetreatManager } from './engine/systems/combat/RetreatManager';
export { SustainDamageResolver } from './engine/systems/combat/SustainDamageResolver';

export type { BotPersonality, BotWeights } from './engine/systems/ai/BotDecisionProvider';
export { BotDecisionProvider, getBotWeights } from './engine/systems/ai/BotDecisionProvider';
export { DecisionRouter } from './engine/systems/ai/DecisionRouter';

export type { GalaxyState, ReinforcementEntry } from './engine/state/GalaxyState';
export { GalaxyStateQuery } from './engine/state/GalaxyState';
export { GalaxyStore } from './engine/state/GalaxyStore';
export { GalaxyMap, buildAdjacencyMap } from './engine/systems/galaxy/GalaxyMap';

export {
  CombatCoordinator,
  createStoreContext,
  locationKey,
  resetCombatIdCounter,
} from './engine/coordinator/CombatCoordinator';

export type { CombatEventMap, DieRoll } from './engine/utils/EventBus';
export { CombatEventBus } from './engine/utils/EventBus';
export type { LogClass } from './engine/utils/Logger';
export { Logger } from './engine/utils/Logger';
export type { RandomSource } from './engine/utils/MathUtils';
export { MathUtils, mulberry32 } from './engine/utils/MathUtils';
