// ─────────────────────────────────────────────
//  Roll Modifiers
//  Ready-made RollModifier factories for board effects.
// ─────────────────────────────────────────────

import type { RollModifier } from './CombatContext';

/** Added to each combat die of a defender fighting inside a nebula */
export const NEBULA_DEFENDER_BONUS = 1;

export interface NebulaQuery {
  isNebula(systemId: string): boolean;
}

/** Space and ground combat alike, every round; barrage rolls are untouched */
export function nebulaDefenderBonus(galaxy: NebulaQuery): RollModifier {
  return (role, channel, scope) =>
    role === 'defender' && channel === 'combat' && galaxy.isNebula(scope.systemId)
      ? NEBULA_DEFENDER_BONUS
      : 0;
}
