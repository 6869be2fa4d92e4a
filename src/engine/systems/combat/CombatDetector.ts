// ─────────────────────────────────────────────
//  Combat Detector: does this location need a combat, and who fights?
//  Pure query over the game-state gateway.
// ─────────────────────────────────────────────

import type { CombatParticipant, CombatScope } from '@/engine/data/types/Combat';
import type { GameStateGateway } from './CombatContext';
import { CombatQuery, makeParticipant } from './CombatQuery';

export interface NoCombat {
  combat: false;
  reason: 'NoParticipants';
}

export interface CombatDetected {
  combat: true;
  scope: CombatScope;
  attacker: CombatParticipant;
  defender: CombatParticipant;
}

export type Detection = NoCombat | CombatDetected;

const NO_COMBAT: NoCombat = { combat: false, reason: 'NoParticipants' };

export const CombatDetector = {
  /**
   * The active player attacks; every other owner with combatants in
   * the scope is merged into a single defender.
   */
  detect(state: GameStateGateway, scope: CombatScope, activePlayerId: string): Detection {
    const owners = CombatQuery.owners(state, scope);
    if (owners.length < 2 || !owners.includes(activePlayerId)) return NO_COMBAT;

    return {
      combat: true,
      scope,
      attacker: makeParticipant('attacker', [activePlayerId]),
      defender: makeParticipant('defender', owners.filter(o => o !== activePlayerId)),
    };
  },

  detectSpaceCombat(state: GameStateGateway, systemId: string, activePlayerId: string): Detection {
    return CombatDetector.detect(state, { variant: 'space', systemId, planetId: null }, activePlayerId);
  },

  /** One detection per contested planet, in the order planets first appear among the units */
  detectGroundCombats(state: GameStateGateway, systemId: string, activePlayerId: string): CombatDetected[] {
    const planetIds: string[] = [];
    for (const unit of state.unitsInSystem(systemId)) {
      const planetId = unit.location.planetId;
      if (planetId !== null && !planetIds.includes(planetId)) planetIds.push(planetId);
    }

    const detected: CombatDetected[] = [];
    for (const planetId of planetIds) {
      const outcome = CombatDetector.detect(state, { variant: 'ground', systemId, planetId }, activePlayerId);
      if (outcome.combat) detected.push(outcome);
    }
    return detected;
  },
};
