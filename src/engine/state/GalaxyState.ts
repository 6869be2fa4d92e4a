// ─────────────────────────────────────────────
//  Galaxy State: immutable board state
//  Units live in one record keyed by id; everything else holds ids.
// ─────────────────────────────────────────────

import type { CombatUnit } from '@/engine/data/types/Unit';
import type { SystemNode } from '@/engine/data/types/Galaxy';
import type { ReturnCause } from '@/engine/systems/combat/CombatContext';

export interface ReinforcementEntry {
  unitId: string;
  dataId: string;
  cause: ReturnCause;
}

export type UnitMap = Record<string, CombatUnit>;

export interface GalaxyState {
  readonly systems: Record<string, SystemNode>;
  readonly units: UnitMap;
  /** systemId → players with a command token there */
  readonly commandTokens: Record<string, string[]>;
  /** playerId → units returned to the reinforcement pool, oldest first */
  readonly reinforcements: Record<string, ReinforcementEntry[]>;
}

export const GalaxyStateQuery = {
  unit(state: GalaxyState, unitId: string): CombatUnit | undefined {
    return state.units[unitId];
  },

  /** Units in a system in insertion order, space area and planets alike */
  inSystem(state: GalaxyState, systemId: string): CombatUnit[] {
    return Object.values(state.units).filter(u => u.location.systemId === systemId);
  },

  onPlanet(state: GalaxyState, systemId: string, planetId: string): CombatUnit[] {
    return GalaxyStateQuery.inSystem(state, systemId).filter(u => u.location.planetId === planetId);
  },

  hasCommandToken(state: GalaxyState, playerId: string, systemId: string): boolean {
    return state.commandTokens[systemId]?.includes(playerId) ?? false;
  },
};
