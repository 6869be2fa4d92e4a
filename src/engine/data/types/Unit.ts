// ─────────────────────────────────────────────
//  Unit Types
//  Capability fields are resolved once, before combat starts.
// ─────────────────────────────────────────────

import catalogJson from '@/engine/data/catalog/units.json';

export type UnitClass = 'ship' | 'fighter' | 'ground_force' | 'structure';

/** A threshold/die-count pair: combat value or anti-fighter barrage */
export interface RollValue {
  /** Minimum die value that counts as a hit */
  threshold: number;
  /** 1, or the number of burst icons */
  dice: number;
}

/** Where a unit sits: the space area of a system (planetId null) or a planet */
export interface UnitLocation {
  systemId: string;
  planetId: string | null;
}

/** Static template loaded from JSON: never mutated */
export interface UnitData {
  id: string;
  name: string;
  unitClass: UnitClass;
  cost: number;
  move: number;
  capacity: number;
  combat: RollValue | null;
  antiFighterBarrage: RollValue | null;
  sustainDamage: boolean;
}

/** Runtime view of a unit as the combat engine sees it */
export interface CombatUnit {
  readonly id: string;
  readonly dataId: string;
  name: string;
  ownerId: string;
  unitClass: UnitClass;
  location: UnitLocation;
  cost: number;
  /** 0 = no move value; such units cannot retreat */
  move: number;
  capacity: number;
  combat: RollValue | null;
  antiFighterBarrage: RollValue | null;
  sustainDamage: boolean;
  /** Hits cancelled by one sustain use (1 unless a modifier grants more) */
  sustainCapacity: number;
  damaged: boolean;
  /** System this unit most recently moved in from */
  arrivedFrom: string | null;
}

const CATALOG: Record<string, UnitData> = Object.fromEntries(
  (catalogJson as UnitData[]).map(u => [u.id, u]),
);

export function getUnitData(dataId: string): UnitData | undefined {
  return CATALOG[dataId];
}

export function listUnitData(): UnitData[] {
  return Object.values(CATALOG);
}

let unitIdCounter = 0;

export function resetUnitIdCounter(): void {
  unitIdCounter = 0;
}

/**
 * Creates a CombatUnit from catalog data at the given location.
 * `overrides` lets a host apply pre-resolved technology or faction modifiers.
 */
export function createUnit(
  dataId: string,
  ownerId: string,
  location: UnitLocation,
  overrides: Partial<Omit<CombatUnit, 'dataId' | 'ownerId' | 'location'>> = {},
): CombatUnit {
  const data = CATALOG[dataId];
  if (!data) throw new Error(`Unknown unit type: ${dataId}`);

  return {
    id: `${ownerId}_${dataId}_${++unitIdCounter}`,
    dataId: data.id,
    name: data.name,
    ownerId,
    unitClass: data.unitClass,
    location: { ...location },
    cost: data.cost,
    move: data.move,
    capacity: data.capacity,
    combat: data.combat ? { ...data.combat } : null,
    antiFighterBarrage: data.antiFighterBarrage ? { ...data.antiFighterBarrage } : null,
    sustainDamage: data.sustainDamage,
    sustainCapacity: 1,
    damaged: false,
    arrivedFrom: null,
    ...overrides,
  };
}

/** Ships and fighters fight in space; fighters and ground forces need transport there */
export function isSpaceCombatant(unit: CombatUnit): boolean {
  return unit.unitClass === 'ship' || unit.unitClass === 'fighter';
}

export function isGroundCombatant(unit: CombatUnit): boolean {
  return unit.unitClass === 'ground_force';
}

export function needsTransport(unit: CombatUnit): boolean {
  return unit.unitClass === 'fighter' || unit.unitClass === 'ground_force';
}
