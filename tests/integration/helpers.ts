// ─────────────────────────────────────────────
//  Combat Test Helpers
//  Headless combat scenarios over a small galaxy:
//  fixed die faces, scripted decisions, an in-memory store.
// ─────────────────────────────────────────────

import { vi } from 'vitest';
import type { CombatConfig } from '@/config';
import type { CombatUnit, UnitLocation } from '@/engine/data/types/Unit';
import type { GalaxyMapData } from '@/engine/data/types/Galaxy';
import type { CombatSetup } from '@/engine/data/types/Combat';
import type { CombatContext, DecisionProvider, RollModifier } from '@/engine/systems/combat/CombatContext';
import { makeParticipant } from '@/engine/systems/combat/CombatQuery';
import { createStoreContext } from '@/engine/coordinator/CombatCoordinator';
import { GalaxyStore } from '@/engine/state/GalaxyStore';
import type { RandomSource } from '@/engine/utils/MathUtils';

// ── Galaxy ───────────────────────────────────

/**
 *   beta ── alpha ── gamma ── delta
 *
 * alpha is where the fighting happens; it has one planet.
 */
export const TEST_GALAXY: GalaxyMapData = {
  systems: [
    { id: 'alpha', name: 'Alpha', planets: [{ id: 'alpha_prime', name: 'Alpha Prime' }] },
    { id: 'beta',  name: 'Beta',  planets: [] },
    { id: 'gamma', name: 'Gamma', planets: [] },
    { id: 'delta', name: 'Delta', planets: [] },
  ],
  lanes: [
    { from: 'alpha', to: 'beta' },
    { from: 'alpha', to: 'gamma' },
    { from: 'gamma', to: 'delta' },
  ],
};

export function space(systemId = 'alpha'): UnitLocation {
  return { systemId, planetId: null };
}

export function onPlanet(planetId = 'alpha_prime', systemId = 'alpha'): UnitLocation {
  return { systemId, planetId };
}

// ── Dice ─────────────────────────────────────

/**
 * Random source that makes a d10 land on the given faces, in order.
 * Throws once the faces run out so an unexpected extra roll fails loudly.
 */
export function diceRng(...faces: number[]): RandomSource {
  let i = 0;
  return () => {
    const face = faces[i++];
    if (face === undefined) throw new Error(`Dice sequence exhausted after ${faces.length} roll(s)`);
    return (face - 0.5) / 10;
  };
}

// ── Decisions ────────────────────────────────

/**
 * Decision provider with spy methods. Defaults: never retreat,
 * never sustain, destroy the first candidate, remove the first
 * `excess` candidates.
 */
export function scriptedDecisions(overrides: Partial<DecisionProvider> = {}) {
  return {
    chooseRetreatDestination: vi.fn<DecisionProvider['chooseRetreatDestination']>(
      overrides.chooseRetreatDestination ?? (() => null),
    ),
    chooseSustainOrNot: vi.fn<DecisionProvider['chooseSustainOrNot']>(
      overrides.chooseSustainOrNot ?? (() => null),
    ),
    chooseUnitToDestroy: vi.fn<DecisionProvider['chooseUnitToDestroy']>(
      overrides.chooseUnitToDestroy ?? (req => req.candidates[0]?.id ?? 'none'),
    ),
    chooseOverflowRemoval: vi.fn<DecisionProvider['chooseOverflowRemoval']>(
      overrides.chooseOverflowRemoval ?? (req => req.candidates.slice(0, req.excess).map(u => u.id)),
    ),
  };
}

export type ScriptedDecisions = ReturnType<typeof scriptedDecisions>;

// ── Harness ──────────────────────────────────

export interface HarnessOptions {
  units?: CombatUnit[];
  rng?: RandomSource;
  decisions?: DecisionProvider;
  config?: Partial<CombatConfig>;
  rollModifier?: RollModifier;
  galaxy?: GalaxyMapData;
}

export interface Harness<D extends DecisionProvider> {
  store: GalaxyStore;
  ctx: CombatContext;
  decisions: D;
}

export function createHarness(opts?: HarnessOptions & { decisions?: undefined }): Harness<ScriptedDecisions>;
export function createHarness<D extends DecisionProvider>(opts: HarnessOptions & { decisions: D }): Harness<D>;
export function createHarness(opts: HarnessOptions = {}): Harness<DecisionProvider> {
  const store = new GalaxyStore(opts.galaxy ?? TEST_GALAXY, opts.units ?? []);
  const decisions = opts.decisions ?? scriptedDecisions();
  const ctx = createStoreContext(store, {
    decisions,
    rng: opts.rng ?? diceRng(),
    config: opts.config,
    rollModifier: opts.rollModifier,
  });
  return { store, ctx, decisions };
}

export function spaceSetup(attackerId = 'p1', defenderIds: string[] = ['p2'], systemId = 'alpha'): CombatSetup {
  return {
    combatId: 'test_combat',
    variant: 'space',
    systemId,
    planetId: null,
    attacker: makeParticipant('attacker', [attackerId]),
    defender: makeParticipant('defender', defenderIds),
  };
}

export function groundSetup(attackerId = 'p1', defenderIds: string[] = ['p2'], planetId = 'alpha_prime'): CombatSetup {
  return {
    combatId: 'test_combat',
    variant: 'ground',
    systemId: 'alpha',
    planetId,
    attacker: makeParticipant('attacker', [attackerId]),
    defender: makeParticipant('defender', defenderIds),
  };
}

/** Current state of a unit; fails the test when it is gone */
export function unitIn(store: GalaxyStore, unitId: string): CombatUnit {
  const unit = store.getUnit(unitId);
  if (!unit) throw new Error(`Unit ${unitId} is not on the board`);
  return unit;
}
