// ─────────────────────────────────────────────
//  Galaxy Map: lane graph queries
//  Pure functions, no side effects.
// ─────────────────────────────────────────────

import type { GalaxyMapData, Lane } from '@/engine/data/types/Galaxy';
import type { AdjacencyQuery } from '@/engine/systems/combat/CombatContext';

function isPassable(lane: Lane): boolean {
  return lane.passable ?? true;
}

function isBidirectional(lane: Lane): boolean {
  return lane.bidirectional ?? true;
}

/** Build an adjacency list from lanes for fast neighbor lookups. */
export function buildAdjacencyMap(galaxy: GalaxyMapData): Record<string, string[]> {
  const adj: Record<string, string[]> = {};

  for (const system of galaxy.systems) {
    adj[system.id] = [];
  }

  const link = (from: string, to: string): void => {
    const list = adj[from];
    if (list && !list.includes(to)) list.push(to);
  };

  for (const lane of galaxy.lanes) {
    if (!isPassable(lane)) continue;
    link(lane.from, lane.to);
    if (isBidirectional(lane)) link(lane.to, lane.from);
  }

  return adj;
}

/** Adjacency query over a fixed lane graph */
export class GalaxyMap implements AdjacencyQuery {
  private readonly adjacency: Record<string, string[]>;

  constructor(galaxy: GalaxyMapData) {
    this.adjacency = buildAdjacencyMap(galaxy);
  }

  isAdjacent(a: string, b: string): boolean {
    return this.adjacency[a]?.includes(b) ?? false;
  }

  neighborsOf(systemId: string): string[] {
    return [...(this.adjacency[systemId] ?? [])];
  }
}
