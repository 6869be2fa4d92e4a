// ─────────────────────────────────────────────
//  Galaxy Store: board state for hosts without their own store
//  immer produce for every mutation + subscribe.
//  Implements the collaborator ports a combat is resolved against.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { CombatUnit } from '@/engine/data/types/Unit';
import type { GalaxyMapData } from '@/engine/data/types/Galaxy';
import type {
  AdjacencyQuery,
  CommandTokenPort,
  GameStateGateway,
  ReinforcementPort,
  ReturnCause,
} from '@/engine/systems/combat/CombatContext';
import { GalaxyMap } from '@/engine/systems/galaxy/GalaxyMap';
import type { GalaxyState } from './GalaxyState';
import { GalaxyStateQuery } from './GalaxyState';

type StoreListener = (state: GalaxyState) => void;

export class GalaxyStore implements GameStateGateway, AdjacencyQuery, CommandTokenPort, ReinforcementPort {
  private state: GalaxyState;
  private listeners: StoreListener[] = [];
  readonly map: GalaxyMap;

  constructor(galaxy: GalaxyMapData, units: CombatUnit[] = []) {
    this.map = new GalaxyMap(galaxy);
    this.state = {
      systems: Object.fromEntries(galaxy.systems.map(s => [s.id, s])),
      units: Object.fromEntries(units.map(u => [u.id, u])),
      commandTokens: {},
      reinforcements: {},
    };
  }

  getState(): GalaxyState {
    return this.state;
  }

  apply(recipe: (draft: Draft<GalaxyState>) => void): void {
    this.state = produce(this.state, recipe);
    this.notify();
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  addUnits(...units: CombatUnit[]): void {
    for (const unit of units) {
      if (!this.state.systems[unit.location.systemId]) {
        throw new Error(`Unknown system ${unit.location.systemId} for ${unit.id}`);
      }
    }
    this.apply(draft => {
      for (const unit of units) draft.units[unit.id] = unit;
    });
  }

  isNebula(systemId: string): boolean {
    return this.state.systems[systemId]?.nebula === true;
  }

  // ── GameStateGateway ──────────────────────

  getUnit(unitId: string): CombatUnit | undefined {
    return GalaxyStateQuery.unit(this.state, unitId);
  }

  unitsInSystem(systemId: string): CombatUnit[] {
    return GalaxyStateQuery.inSystem(this.state, systemId);
  }

  removeUnit(unitId: string): void {
    if (!this.state.units[unitId]) return;
    this.apply(draft => {
      delete draft.units[unitId];
    });
  }

  /** Into the space area of the destination; the unit remembers where it came from */
  relocateUnit(unitId: string, systemId: string): void {
    if (!this.state.systems[systemId]) throw new Error(`Unknown system ${systemId}`);
    this.apply(draft => {
      const unit = draft.units[unitId];
      if (!unit) return;
      unit.arrivedFrom = unit.location.systemId;
      unit.location = { systemId, planetId: null };
    });
  }

  markDamaged(unitId: string): void {
    this.apply(draft => {
      const unit = draft.units[unitId];
      if (unit) unit.damaged = true;
    });
  }

  // ── AdjacencyQuery ────────────────────────

  isAdjacent(a: string, b: string): boolean {
    return this.map.isAdjacent(a, b);
  }

  neighborsOf(systemId: string): string[] {
    return this.map.neighborsOf(systemId);
  }

  // ── CommandTokenPort ──────────────────────

  placeCommandToken(playerId: string, systemId: string): void {
    if (GalaxyStateQuery.hasCommandToken(this.state, playerId, systemId)) return;
    this.apply(draft => {
      const tokens = draft.commandTokens[systemId] ?? [];
      tokens.push(playerId);
      draft.commandTokens[systemId] = tokens;
    });
  }

  // ── ReinforcementPort ─────────────────────

  returnToReinforcements(unit: CombatUnit, cause: ReturnCause): void {
    this.apply(draft => {
      const pool = draft.reinforcements[unit.ownerId] ?? [];
      pool.push({ unitId: unit.id, dataId: unit.dataId, cause });
      draft.reinforcements[unit.ownerId] = pool;
    });
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}
