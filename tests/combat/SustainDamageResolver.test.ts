import { describe, it, expect, beforeEach } from 'vitest';
import { createUnit, resetUnitIdCounter } from '@/engine/data/types/Unit';
import { SustainDamageResolver } from '@/engine/systems/combat/SustainDamageResolver';
import { GalaxyStore } from '@/engine/state/GalaxyStore';
import { TEST_GALAXY, space, unitIn } from '../integration/helpers';

describe('SustainDamageResolver', () => {
  beforeEach(() => {
    resetUnitIdCounter();
  });

  it('offers sustain only to an undamaged unit with the capability', () => {
    expect(SustainDamageResolver.offerSustain(createUnit('dreadnought', 'p1', space()))).toBe(true);
    expect(SustainDamageResolver.offerSustain(createUnit('cruiser', 'p1', space()))).toBe(false);
    expect(SustainDamageResolver.offerSustain(createUnit('dreadnought', 'p1', space(), { damaged: true }))).toBe(false);
  });

  it('marks the unit damaged and cancels one hit', () => {
    const dreadnought = createUnit('dreadnought', 'p1', space());
    const store = new GalaxyStore(TEST_GALAXY, [dreadnought]);

    expect(SustainDamageResolver.applySustain(dreadnought, store)).toBe(1);
    expect(unitIn(store, dreadnought.id).damaged).toBe(true);
  });

  it('cannot be used a second time without repair', () => {
    const dreadnought = createUnit('dreadnought', 'p1', space());
    const store = new GalaxyStore(TEST_GALAXY, [dreadnought]);

    SustainDamageResolver.applySustain(dreadnought, store);
    const damaged = unitIn(store, dreadnought.id);
    expect(SustainDamageResolver.offerSustain(damaged)).toBe(false);
    expect(SustainDamageResolver.applySustain(damaged, store)).toBe(0);
  });

  it('cancels more than one hit only when the unit carries a raised sustain capacity', () => {
    const warSun = createUnit('war_sun', 'p1', space(), { sustainCapacity: 2 });
    const store = new GalaxyStore(TEST_GALAXY, [warSun]);
    expect(SustainDamageResolver.applySustain(warSun, store)).toBe(2);
  });

  it('keeps every other capability of a damaged unit', () => {
    const dreadnought = createUnit('dreadnought', 'p1', space());
    const store = new GalaxyStore(TEST_GALAXY, [dreadnought]);
    SustainDamageResolver.applySustain(dreadnought, store);

    const damaged = unitIn(store, dreadnought.id);
    expect(damaged.combat).toEqual({ threshold: 5, dice: 1 });
    expect(damaged.move).toBe(1);
    expect(damaged.capacity).toBe(1);
  });
});
