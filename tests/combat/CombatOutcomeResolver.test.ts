import { describe, it, expect, beforeEach } from 'vitest';
import { createUnit, resetUnitIdCounter } from '@/engine/data/types/Unit';
import { CombatOutcomeResolver } from '@/engine/systems/combat/CombatOutcomeResolver';
import { InvalidOverflowRemovalError } from '@/engine/systems/combat/CombatErrors';
import { CombatEventBus } from '@/engine/utils/EventBus';
import type { CombatEventMap } from '@/engine/utils/EventBus';
import { createHarness, groundSetup, onPlanet, scriptedDecisions, space, spaceSetup } from '../integration/helpers';

describe('CombatOutcomeResolver', () => {
  const setup = spaceSetup();

  beforeEach(() => {
    CombatEventBus.clear();
    resetUnitIdCounter();
  });

  // ── Verdict ──────────────────────────────────────────────────────
  it('is not terminal while both sides have units', () => {
    const { ctx } = createHarness({
      units: [createUnit('cruiser', 'p1', space()), createUnit('cruiser', 'p2', space())],
    });
    expect(CombatOutcomeResolver.isTerminal(ctx, setup)).toBe(false);
    expect(CombatOutcomeResolver.verdict(ctx, setup)).toEqual({ winner: null, loser: null, isDraw: false });
  });

  it('sees a stalemate only when neither side has a die that can reach its threshold', () => {
    const blind = createUnit('cruiser', 'p1', space(), { combat: null });
    const outranged = createUnit('cruiser', 'p2', space(), { combat: { threshold: 11, dice: 1 } });
    const { ctx } = createHarness({ units: [blind, outranged] });

    expect(CombatOutcomeResolver.canScore(ctx, setup, setup.attacker)).toBe(false);
    expect(CombatOutcomeResolver.canScore(ctx, setup, setup.defender)).toBe(false);
    expect(CombatOutcomeResolver.isStalemate(ctx, setup)).toBe(true);
  });

  it('counts a roll modifier when deciding whether a side can score', () => {
    const blind = createUnit('cruiser', 'p1', space(), { combat: null });
    const outranged = createUnit('cruiser', 'p2', space(), { combat: { threshold: 11, dice: 1 } });
    const { ctx } = createHarness({
      units: [blind, outranged],
      rollModifier: role => (role === 'defender' ? 1 : 0),
    });

    expect(CombatOutcomeResolver.canScore(ctx, setup, setup.defender)).toBe(true);
    expect(CombatOutcomeResolver.isStalemate(ctx, setup)).toBe(false);
  });

  it('names the side with units left as the winner', () => {
    const { ctx } = createHarness({ units: [createUnit('cruiser', 'p2', space())] });
    expect(CombatOutcomeResolver.isTerminal(ctx, setup)).toBe(true);
    expect(CombatOutcomeResolver.verdict(ctx, setup)).toEqual({
      winner: setup.defender,
      loser: setup.attacker,
      isDraw: false,
    });
  });

  it('calls a draw when neither side has units left', () => {
    const { ctx } = createHarness({ units: [createUnit('cruiser', 'p1', space('beta'))] });
    expect(CombatOutcomeResolver.verdict(ctx, setup)).toEqual({ winner: null, loser: null, isDraw: true });
  });

  // ── Capacity ─────────────────────────────────────────────────────
  it('compares cargo in space against the capacity of the side\'s ships', () => {
    const { ctx } = createHarness({
      units: [
        createUnit('cruiser_ii', 'p1', space()), // capacity 1
        createUnit('fighter', 'p1', space()),
        createUnit('infantry', 'p1', space()),
        createUnit('infantry', 'p1', onPlanet()),
      ],
    });
    const report = CombatOutcomeResolver.capacityReport(ctx, 'alpha', setup.attacker);
    expect(report.capacity).toBe(1);
    expect(report.cargo).toHaveLength(2);
    expect(report.excess).toBe(1);
  });

  it('has the winner remove its excess fighters and ground forces', async () => {
    const cruiser = createUnit('cruiser_ii', 'p1', space());
    const f1 = createUnit('fighter', 'p1', space());
    const f2 = createUnit('fighter', 'p1', space());
    const decisions = scriptedDecisions({ chooseOverflowRemoval: () => [f2.id] });
    const { store, ctx } = createHarness({ units: [cruiser, f1, f2], decisions });
    const removed: CombatEventMap['unitRemoved'][] = [];
    CombatEventBus.on('unitRemoved', e => removed.push(e));

    const ids = await CombatOutcomeResolver.enforceCapacity(ctx, setup, setup.attacker, 1);

    expect(ids).toEqual([f2.id]);
    expect(store.getUnit(f1.id)).toBeDefined();
    expect(store.getUnit(f2.id)).toBeUndefined();
    expect(store.getState().reinforcements['p1']).toEqual([{ unitId: f2.id, dataId: 'fighter', cause: 'removed' }]);
    expect(removed).toEqual([{ combatId: 'test_combat', unitId: f2.id, reason: 'capacity' }]);
    expect(decisions.chooseOverflowRemoval.mock.calls[0]?.[0]).toMatchObject({ capacity: 1, excess: 1 });
  });

  it('asks again when the removal does not match the excess', async () => {
    const cruiser = createUnit('cruiser', 'p1', space());
    const fighter = createUnit('fighter', 'p1', space());
    const { store, ctx, decisions } = createHarness({ units: [cruiser, fighter] });
    decisions.chooseOverflowRemoval.mockReturnValueOnce([]);

    const ids = await CombatOutcomeResolver.enforceCapacity(ctx, setup, setup.attacker, 1);

    expect(ids).toEqual([fighter.id]);
    expect(store.getUnit(fighter.id)).toBeUndefined();
    expect(decisions.chooseOverflowRemoval).toHaveBeenCalledTimes(2);
    expect(decisions.chooseOverflowRemoval.mock.calls[1]?.[0].rejection).toBeInstanceOf(InvalidOverflowRemovalError);
  });

  it('refuses to remove a ship for capacity', async () => {
    const cruiser = createUnit('cruiser', 'p1', space());
    const fighter = createUnit('fighter', 'p1', space());
    const decisions = scriptedDecisions({ chooseOverflowRemoval: () => [cruiser.id] });
    const { ctx } = createHarness({ units: [cruiser, fighter], decisions });

    await expect(CombatOutcomeResolver.enforceCapacity(ctx, setup, setup.attacker, 1))
      .rejects.toBeInstanceOf(InvalidOverflowRemovalError);
  });

  it('asks nothing when everything fits', async () => {
    const { ctx, decisions } = createHarness({
      units: [createUnit('carrier', 'p1', space()), createUnit('fighter', 'p1', space())],
    });
    expect(await CombatOutcomeResolver.enforceCapacity(ctx, setup, setup.attacker, 1)).toEqual([]);
    expect(decisions.chooseOverflowRemoval).not.toHaveBeenCalled();
  });

  it('never enforces capacity after ground combat', async () => {
    const { ctx, decisions } = createHarness({
      units: [createUnit('fighter', 'p1', space()), createUnit('infantry', 'p1', onPlanet())],
    });
    expect(await CombatOutcomeResolver.enforceCapacity(ctx, groundSetup(), groundSetup().attacker, 1)).toEqual([]);
    expect(decisions.chooseOverflowRemoval).not.toHaveBeenCalled();
  });
});
