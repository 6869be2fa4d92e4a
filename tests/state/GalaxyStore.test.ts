import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createUnit, resetUnitIdCounter } from '@/engine/data/types/Unit';
import type { GalaxyMapData } from '@/engine/data/types/Galaxy';
import { GalaxyStore } from '@/engine/state/GalaxyStore';
import { GalaxyStateQuery } from '@/engine/state/GalaxyState';
import { buildAdjacencyMap } from '@/engine/systems/galaxy/GalaxyMap';
import { TEST_GALAXY, onPlanet, space, unitIn } from '../integration/helpers';

describe('buildAdjacencyMap', () => {
  it('links lanes both ways unless marked one-way, and skips impassable lanes', () => {
    const galaxy: GalaxyMapData = {
      systems: [
        { id: 'a', name: 'A', planets: [] },
        { id: 'b', name: 'B', planets: [] },
        { id: 'c', name: 'C', planets: [] },
      ],
      lanes: [
        { from: 'a', to: 'b' },
        { from: 'b', to: 'c', bidirectional: false },
        { from: 'a', to: 'c', passable: false },
      ],
    };
    expect(buildAdjacencyMap(galaxy)).toEqual({ a: ['b'], b: ['a', 'c'], c: [] });
  });
});

describe('GalaxyStore', () => {
  let store: GalaxyStore;

  beforeEach(() => {
    resetUnitIdCounter();
    store = new GalaxyStore(TEST_GALAXY);
  });

  // ── Adjacency ────────────────────────────────────────────────────
  it('answers adjacency from the lane graph', () => {
    expect(store.isAdjacent('alpha', 'beta')).toBe(true);
    expect(store.isAdjacent('beta', 'alpha')).toBe(true);
    expect(store.isAdjacent('alpha', 'delta')).toBe(false);
    expect(store.neighborsOf('gamma')).toEqual(['alpha', 'delta']);
  });

  // ── Units ────────────────────────────────────────────────────────
  it('lists the units of a system, space area and planets alike', () => {
    const cruiser = createUnit('cruiser', 'p1', space());
    const infantry = createUnit('infantry', 'p1', onPlanet());
    const elsewhere = createUnit('cruiser', 'p2', space('beta'));
    store.addUnits(cruiser, infantry, elsewhere);

    expect(store.unitsInSystem('alpha').map(u => u.id)).toEqual([cruiser.id, infantry.id]);
    expect(GalaxyStateQuery.onPlanet(store.getState(), 'alpha', 'alpha_prime').map(u => u.id)).toEqual([infantry.id]);
  });

  it('refuses units placed in an unknown system', () => {
    expect(() => store.addUnits(createUnit('cruiser', 'p1', space('nowhere')))).toThrow('Unknown system');
  });

  it('relocates a unit into the destination\'s space area and remembers its origin', () => {
    const mech = createUnit('mech', 'p1', onPlanet());
    store.addUnits(mech);
    store.relocateUnit(mech.id, 'beta');

    expect(unitIn(store, mech.id).location).toEqual({ systemId: 'beta', planetId: null });
    expect(unitIn(store, mech.id).arrivedFrom).toBe('alpha');
  });

  it('marks damage and removes units', () => {
    const dreadnought = createUnit('dreadnought', 'p1', space());
    store.addUnits(dreadnought);

    store.markDamaged(dreadnought.id);
    expect(unitIn(store, dreadnought.id).damaged).toBe(true);

    store.removeUnit(dreadnought.id);
    expect(store.getUnit(dreadnought.id)).toBeUndefined();
  });

  it('never mutates a previous state', () => {
    const cruiser = createUnit('cruiser', 'p1', space());
    store.addUnits(cruiser);
    const before = store.getState();

    store.relocateUnit(cruiser.id, 'beta');

    expect(before.units[cruiser.id]?.location.systemId).toBe('alpha');
    expect(store.getState()).not.toBe(before);
  });

  // ── Tokens and reinforcements ────────────────────────────────────
  it('places one command token per player and system', () => {
    store.placeCommandToken('p1', 'beta');
    store.placeCommandToken('p1', 'beta');
    store.placeCommandToken('p2', 'beta');
    expect(store.getState().commandTokens).toEqual({ beta: ['p1', 'p2'] });
  });

  it('records units returned to reinforcements with the reason', () => {
    const fighter = createUnit('fighter', 'p1', space());
    const cruiser = createUnit('cruiser', 'p1', space());
    store.returnToReinforcements(fighter, 'removed');
    store.returnToReinforcements(cruiser, 'destroyed');

    expect(store.getState().reinforcements).toEqual({
      p1: [
        { unitId: fighter.id, dataId: 'fighter', cause: 'removed' },
        { unitId: cruiser.id, dataId: 'cruiser', cause: 'destroyed' },
      ],
    });
  });

  // ── Subscription ─────────────────────────────────────────────────
  it('notifies subscribers until they unsubscribe', () => {
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    store.placeCommandToken('p1', 'alpha');
    unsubscribe();
    store.placeCommandToken('p2', 'alpha');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ commandTokens: { alpha: ['p1'] } }));
  });
});
