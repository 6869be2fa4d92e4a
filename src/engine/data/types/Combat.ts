// ─────────────────────────────────────────────
//  Combat Types: participants, rounds, retreats, results
// ─────────────────────────────────────────────

export type CombatVariant = 'space' | 'ground';

export type CombatRole = 'attacker' | 'defender';

export type CombatStep =
  | 'ANTI_FIGHTER_BARRAGE'
  | 'ANNOUNCE_RETREATS'
  | 'ROLL_DICE'
  | 'ASSIGN_HITS'
  | 'RETREAT';

export type RollChannel = 'combat' | 'barrage';

export interface CombatParticipant {
  /** Owner id, or the sorted owner ids joined by '+' for a merged defender */
  id: string;
  role: CombatRole;
  ownerIds: string[];
}

/** Where a combat is fought: a system's space area, or one planet */
export interface CombatScope {
  variant: CombatVariant;
  systemId: string;
  planetId: string | null;
}

export interface CombatSetup extends CombatScope {
  combatId: string;
  attacker: CombatParticipant;
  defender: CombatParticipant;
}

export interface CombatRound {
  number: number;
  step: CombatStep | null;
  /** Hits each side must absorb this round (produced by its opponent) */
  hitsOwed: Record<CombatRole, number>;
}

export type RetreatStatus = 'announced' | 'executed' | 'voided';

export interface RetreatAnnouncement {
  participantId: string;
  /** null = no announcement */
  destination: string | null;
  status: RetreatStatus;
  round: number;
}

export interface CombatRoundSummary {
  round: number;
  hits: Record<CombatRole, number>;
  barrageHits: Record<CombatRole, number>;
  casualties: Record<CombatRole, string[]>;
  sustained: string[];
}

export type CombatEnding =
  | 'elimination'
  | 'retreat'
  | 'barrage'
  | 'stalemate'
  | 'already_resolved';

export interface CombatResult {
  combatId: string;
  variant: CombatVariant;
  systemId: string;
  planetId: string | null;
  attackerId: string;
  defenderId: string;
  winnerId: string | null;
  loserId: string | null;
  isDraw: boolean;
  destroyedUnitIds: string[];
  retreatedUnitIds: string[];
  /** Removed without being destroyed: stranded on retreat, or capacity overflow */
  removedUnitIds: string[];
  roundsFought: number;
  endedBy: CombatEnding;
  rounds: CombatRoundSummary[];
}

export function otherRole(role: CombatRole): CombatRole {
  return role === 'attacker' ? 'defender' : 'attacker';
}
