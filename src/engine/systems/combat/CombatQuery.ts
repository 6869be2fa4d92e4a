// ─────────────────────────────────────────────
//  Combat queries: who is fighting where.
//  Pure functions over the game-state gateway.
// ─────────────────────────────────────────────

import type { CombatUnit } from '@/engine/data/types/Unit';
import { isGroundCombatant, isSpaceCombatant } from '@/engine/data/types/Unit';
import type { CombatParticipant, CombatRole, CombatScope } from '@/engine/data/types/Combat';
import type { GameStateGateway } from './CombatContext';

export function makeParticipant(role: CombatRole, ownerIds: string[]): CombatParticipant {
  const owners = [...new Set(ownerIds)].sort();
  return { id: owners.join('+'), role, ownerIds: owners };
}

export function isOwnedBy(unit: CombatUnit, participant: CombatParticipant): boolean {
  return participant.ownerIds.includes(unit.ownerId);
}

function inScope(unit: CombatUnit, scope: CombatScope): boolean {
  if (unit.location.systemId !== scope.systemId) return false;
  if (scope.variant === 'space') return unit.location.planetId === null && isSpaceCombatant(unit);
  return unit.location.planetId === scope.planetId && isGroundCombatant(unit);
}

export const CombatQuery = {
  /** Units of the participant that fight (and can be hit) in this scope */
  combatants(state: GameStateGateway, scope: CombatScope, participant: CombatParticipant): CombatUnit[] {
    return state.unitsInSystem(scope.systemId)
      .filter(u => isOwnedBy(u, participant) && inScope(u, scope));
  },

  /** Everything the participant has in the system's space area, cargo included */
  spaceUnits(state: GameStateGateway, systemId: string, participant: CombatParticipant): CombatUnit[] {
    return state.unitsInSystem(systemId)
      .filter(u => isOwnedBy(u, participant) && u.location.planetId === null);
  },

  /** Distinct owners with at least one combatant in the scope, in first-seen order */
  owners(state: GameStateGateway, scope: CombatScope): string[] {
    const owners: string[] = [];
    for (const u of state.unitsInSystem(scope.systemId)) {
      if (!inScope(u, scope)) continue;
      if (!owners.includes(u.ownerId)) owners.push(u.ownerId);
    }
    return owners;
  },
};
