// ─────────────────────────────────────────────
//  Combat rule errors
//  Every failure here is caller-correctable input:
//  the decision gate asks the provider again.
// ─────────────────────────────────────────────

export type CombatErrorCode =
  | 'InvalidRetreatTarget'
  | 'RetreatNotEligible'
  | 'HitAssignmentOverflow'
  | 'InvalidHitTarget'
  | 'InvalidOverflowRemoval'
  | 'CombatLocationLocked';

export class CombatRuleError extends Error {
  readonly code: CombatErrorCode;

  constructor(code: CombatErrorCode, message: string) {
    super(message);
    this.name = 'CombatRuleError';
    this.code = code;
  }
}

/** Destination not adjacent, hostile-occupied, or the origin without friendly presence */
export class InvalidRetreatTargetError extends CombatRuleError {
  constructor(message: string) {
    super('InvalidRetreatTarget', message);
    this.name = 'InvalidRetreatTargetError';
  }
}

/** Attacker after a defender announcement, no eligible destination, or nothing able to move */
export class RetreatNotEligibleError extends CombatRuleError {
  constructor(message: string) {
    super('RetreatNotEligible', message);
    this.name = 'RetreatNotEligibleError';
  }
}

export class HitAssignmentOverflowError extends CombatRuleError {
  constructor(owed: number, requested: number) {
    super('HitAssignmentOverflow', `Assigned ${requested} destructions but only ${owed} hits are owed`);
    this.name = 'HitAssignmentOverflowError';
  }
}

export class InvalidHitTargetError extends CombatRuleError {
  constructor(message: string) {
    super('InvalidHitTarget', message);
    this.name = 'InvalidHitTargetError';
  }
}

export class InvalidOverflowRemovalError extends CombatRuleError {
  constructor(message: string) {
    super('InvalidOverflowRemoval', message);
    this.name = 'InvalidOverflowRemovalError';
  }
}

export class CombatLocationLockedError extends CombatRuleError {
  constructor(locationKey: string) {
    super('CombatLocationLocked', `A combat is already being resolved at ${locationKey}`);
    this.name = 'CombatLocationLockedError';
  }
}

export function isCombatRuleError(err: unknown): err is CombatRuleError {
  return err instanceof CombatRuleError;
}
