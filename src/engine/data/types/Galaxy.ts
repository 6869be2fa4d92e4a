// ─────────────────────────────────────────────
//  Galaxy Map Data Types: graph of systems joined by lanes
//  Units are stored once, keyed by id; systems hold only ids.
// ─────────────────────────────────────────────

export interface PlanetNode {
  id: string;
  name: string;
}

export interface SystemNode {
  id: string;
  name: string;
  planets: PlanetNode[];
  /** Defenders fighting inside a nebula roll with a bonus */
  nebula?: boolean;
}

export interface Lane {
  from: string;                   // System id
  to: string;                     // System id
  /** Lanes are two-way unless stated otherwise */
  bidirectional?: boolean;
  passable?: boolean;
}

export interface GalaxyMapData {
  systems: SystemNode[];
  lanes: Lane[];
}
