// ─────────────────────────────────────────────
//  CombatCoordinator: entry point for the tactical-action
//  and invasion flow. Detects a combat and runs it while
//  holding its location.
// ─────────────────────────────────────────────

import type { CombatConfig } from '@/config';
import { resolveCombatConfig } from '@/config';
import type { CombatResult, CombatScope, CombatSetup } from '@/engine/data/types/Combat';
import type { GalaxyStore } from '@/engine/state/GalaxyStore';
import type { CombatContext, DecisionProvider, RollModifier } from '@/engine/systems/combat/CombatContext';
import { CombatLocationLockedError } from '@/engine/systems/combat/CombatErrors';
import type { CombatDetected } from '@/engine/systems/combat/CombatDetector';
import { CombatDetector } from '@/engine/systems/combat/CombatDetector';
import { CombatRoundEngine } from '@/engine/systems/combat/CombatRoundEngine';
import { CombatEventBus } from '@/engine/utils/EventBus';
import type { RandomSource } from '@/engine/utils/MathUtils';

let combatIdCounter = 0;

export function resetCombatIdCounter(): void {
  combatIdCounter = 0;
}

export function locationKey(scope: CombatScope): string {
  return scope.planetId === null ? scope.systemId : `${scope.systemId}/${scope.planetId}`;
}

export interface StoreContextOptions {
  decisions: DecisionProvider;
  rng?: RandomSource;
  config?: Partial<CombatConfig>;
  rollModifier?: RollModifier;
}

/** A context whose every collaborator port is served by one GalaxyStore */
export function createStoreContext(store: GalaxyStore, opts: StoreContextOptions): CombatContext {
  return {
    state: store,
    map: store,
    tokens: store,
    reinforcements: store,
    decisions: opts.decisions,
    rng: opts.rng ?? Math.random,
    config: resolveCombatConfig(opts.config),
    rollModifier: opts.rollModifier,
  };
}

export class CombatCoordinator {
  private readonly locked = new Set<string>();

  constructor(private readonly ctx: CombatContext) {}

  isLocked(scope: CombatScope): boolean {
    return this.locked.has(locationKey(scope));
  }

  /** Space combat after a tactical action moved ships in; null when nobody contests the system */
  async resolveSpaceCombat(systemId: string, activePlayerId: string): Promise<CombatResult | null> {
    const detection = CombatDetector.detectSpaceCombat(this.ctx.state, systemId, activePlayerId);
    if (!detection.combat) return null;
    return this.run(detection);
  }

  /** Ground combat on every contested planet of the system, one after another */
  async resolveGroundCombats(systemId: string, activePlayerId: string): Promise<CombatResult[]> {
    const results: CombatResult[] = [];
    for (const detection of CombatDetector.detectGroundCombats(this.ctx.state, systemId, activePlayerId)) {
      results.push(await this.run(detection));
    }
    return results;
  }

  /** Runs a detected combat while holding its location */
  async run(detection: CombatDetected): Promise<CombatResult> {
    const key = locationKey(detection.scope);
    if (this.locked.has(key)) throw new CombatLocationLockedError(key);
    this.locked.add(key);

    try {
      const setup: CombatSetup = {
        ...detection.scope,
        combatId: `combat_${++combatIdCounter}`,
        attacker: detection.attacker,
        defender: detection.defender,
      };
      CombatEventBus.emit('combatStarted', {
        combatId: setup.combatId,
        variant: setup.variant,
        systemId: setup.systemId,
        planetId: setup.planetId,
        attackerId: setup.attacker.id,
        defenderId: setup.defender.id,
      });
      return await new CombatRoundEngine(this.ctx, setup).run();
    } finally {
      this.locked.delete(key);
    }
  }
}
