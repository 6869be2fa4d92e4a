// ─────────────────────────────────────────────
//  Typed Combat Event Bus
//  Combat steps report what happened through events;
//  hosts (UI, replay recorder, analytics) listen here.
// ─────────────────────────────────────────────

import type {
  CombatResult,
  CombatStep,
  CombatVariant,
  RollChannel,
} from '@/engine/data/types/Combat';

export interface DieRoll {
  unitId: string;
  /** Face shown by the die */
  value: number;
  /** Added to the face before comparing with the threshold */
  modifier: number;
  threshold: number;
  hit: boolean;
}

/** Centralised map of all combat events and their payload types */
export interface CombatEventMap {
  // Lifecycle
  combatStarted:    { combatId: string; variant: CombatVariant; systemId: string; planetId: string | null; attackerId: string; defenderId: string };
  roundStarted:     { combatId: string; round: number };
  stepChanged:      { combatId: string; round: number; step: CombatStep };
  combatEnded:      { result: CombatResult };

  // Dice
  diceRolled:       { combatId: string; participantId: string; channel: RollChannel; rolls: DieRoll[]; hits: number };

  // Units
  unitSustained:    { combatId: string; unitId: string; hitsCancelled: number };
  unitDestroyed:    { combatId: string; unitId: string; ownerId: string; channel: RollChannel };
  unitRemoved:      { combatId: string; unitId: string; reason: 'retreat' | 'capacity' };

  // Retreat
  retreatAnnounced: { combatId: string; participantId: string; destination: string; round: number };
  retreatExecuted:  { combatId: string; participantId: string; destination: string; movedUnitIds: string[]; removedUnitIds: string[] };
  retreatVoided:    { combatId: string; participantId: string; destination: string };

  // Decisions
  decisionRejected: { combatId: string; participantId: string; code: string; message: string; attempt: number };

  // Log
  logMessage:       { text: string; cls: string };
}

type Listener<T> = (payload: T) => void;

type ListenerTable = { [K in keyof CombatEventMap]?: Listener<CombatEventMap[K]>[] };

class TypedCombatEventBus {
  private listeners: ListenerTable = {};

  on<K extends keyof CombatEventMap>(
    event: K,
    listener: Listener<CombatEventMap[K]>,
  ): void {
    const arr: Listener<CombatEventMap[K]>[] = (this.listeners[event] ??= []);
    arr.push(listener);
  }

  off<K extends keyof CombatEventMap>(
    event: K,
    listener: Listener<CombatEventMap[K]>,
  ): void {
    const arr = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof CombatEventMap>(event: K, payload: CombatEventMap[K]): void {
    const arr = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Remove all listeners (test teardown, host shutdown) */
  clear(): void {
    this.listeners = {};
  }
}

/** Singleton event bus: carries notifications only, never game state */
export const CombatEventBus = new TypedCombatEventBus();
