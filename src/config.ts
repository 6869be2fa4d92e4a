export interface CombatConfig {
  /** Faces on a combat die */
  dieSides: number;
  /** Consecutive rejected decisions tolerated before the rule error surfaces */
  maxDecisionAttempts: number;
  /** A combat still running after this many rounds is an engine fault */
  maxRounds: number;
}

export const DEFAULT_COMBAT_CONFIG: Readonly<CombatConfig> = {
  dieSides: 10,
  maxDecisionAttempts: 3,
  maxRounds: 1000,
};

export function resolveCombatConfig(overrides: Partial<CombatConfig> = {}): CombatConfig {
  const config = { ...DEFAULT_COMBAT_CONFIG, ...overrides };
  if (config.dieSides < 2) throw new Error(`dieSides must be at least 2 (got ${config.dieSides})`);
  if (config.maxDecisionAttempts < 1) throw new Error('maxDecisionAttempts must be at least 1');
  if (config.maxRounds < 1) throw new Error('maxRounds must be at least 1');
  return config;
}
