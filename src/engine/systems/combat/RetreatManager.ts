// ─────────────────────────────────────────────
//  Retreat Manager
//  Eligibility, announcements (defender first) and
//  relocation of a retreating side's units.
// ─────────────────────────────────────────────

import type { CombatUnit } from '@/engine/data/types/Unit';
import { needsTransport } from '@/engine/data/types/Unit';
import type { CombatParticipant, CombatSetup, RetreatAnnouncement } from '@/engine/data/types/Combat';
import { CombatEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { MathUtils } from '@/engine/utils/MathUtils';
import type { CombatContext } from './CombatContext';
import { InvalidRetreatTargetError, RetreatNotEligibleError } from './CombatErrors';
import { CombatQuery, isOwnedBy } from './CombatQuery';

export interface RetreatExecution {
  participantId: string;
  destination: string;
  status: 'executed' | 'voided';
  movedUnitIds: string[];
  removedUnitIds: string[];
}

/** Fighters board before ground forces; otherwise keep board order */
function cargoOrder(a: CombatUnit, b: CombatUnit): number {
  const rank = (u: CombatUnit) => (u.unitClass === 'fighter' ? 0 : 1);
  return rank(a) - rank(b);
}

export class RetreatManager {
  private readonly announcements: RetreatAnnouncement[] = [];
  private round = 0;

  constructor(
    private readonly ctx: CombatContext,
    private readonly setup: CombatSetup,
  ) {}

  /** Opens the announcement window of a new round */
  beginRound(round: number): void {
    this.round = round;
  }

  get history(): readonly RetreatAnnouncement[] {
    return this.announcements;
  }

  /** This round's announcement by the participant, if any */
  announcementFor(participant: CombatParticipant): RetreatAnnouncement | undefined {
    return this.announcements.find(a => a.participantId === participant.id && a.round === this.round);
  }

  /**
   * Throws InvalidRetreatTarget when the destination is not adjacent,
   * holds another player's units, or is where the fleet came from
   * and the side has nothing there.
   */
  validateDestination(participant: CombatParticipant, destination: string): void {
    const { systemId } = this.setup;

    if (destination === systemId || !this.ctx.map.isAdjacent(systemId, destination)) {
      throw new InvalidRetreatTargetError(`${destination} is not adjacent to ${systemId}`);
    }

    const occupants = this.ctx.state.unitsInSystem(destination);
    const hostile = occupants.find(u => !isOwnedBy(u, participant));
    if (hostile) {
      throw new InvalidRetreatTargetError(`${destination} contains units of ${hostile.ownerId}`);
    }

    const origins = new Set(
      CombatQuery.spaceUnits(this.ctx.state, systemId, participant)
        .map(u => u.arrivedFrom)
        .filter((from): from is string => from !== null),
    );
    const friendlyPresence = occupants.some(u => isOwnedBy(u, participant));
    if (origins.has(destination) && !friendlyPresence) {
      throw new InvalidRetreatTargetError(`${destination} is the system the fleet arrived from`);
    }
  }

  eligibleDestinations(participant: CombatParticipant): string[] {
    return this.ctx.map.neighborsOf(this.setup.systemId).filter(dest => {
      try {
        this.validateDestination(participant, dest);
        return true;
      } catch (err) {
        if (err instanceof InvalidRetreatTargetError) return false;
        throw err;
      }
    });
  }

  /** Ships able to leave under their own move value */
  movableUnits(participant: CombatParticipant): CombatUnit[] {
    return CombatQuery.spaceUnits(this.ctx.state, this.setup.systemId, participant)
      .filter(u => u.move > 0 && u.unitClass !== 'structure');
  }

  /**
   * Records a retreat announcement for the current round.
   * The defender announces first; once it has, the attacker cannot.
   */
  announce(participant: CombatParticipant, destination: string): RetreatAnnouncement {
    if (this.setup.variant !== 'space') {
      throw new RetreatNotEligibleError('Retreats only happen in space combat');
    }
    if (this.announcementFor(participant)) {
      throw new RetreatNotEligibleError(`${participant.id} already announced a retreat this round`);
    }
    if (participant.role === 'attacker' && this.defenderAnnounced()) {
      throw new RetreatNotEligibleError('The defender already announced a retreat this round');
    }
    if (this.movableUnits(participant).length === 0) {
      throw new RetreatNotEligibleError(`${participant.id} has no unit able to move`);
    }
    if (this.eligibleDestinations(participant).length === 0) {
      throw new RetreatNotEligibleError(`${participant.id} has no eligible retreat destination`);
    }
    this.validateDestination(participant, destination);

    const announcement: RetreatAnnouncement = {
      participantId: participant.id,
      destination,
      status: 'announced',
      round: this.round,
    };
    this.announcements.push(announcement);

    CombatEventBus.emit('retreatAnnounced', {
      combatId: this.setup.combatId,
      participantId: participant.id,
      destination,
      round: this.round,
    });
    Logger.log(`🏳 ${participant.id} announces a retreat to ${destination}`, 'retreat');
    return announcement;
  }

  /** Records that the participant stays this round */
  pass(participant: CombatParticipant): RetreatAnnouncement {
    const announcement: RetreatAnnouncement = {
      participantId: participant.id,
      destination: null,
      status: 'announced',
      round: this.round,
    };
    this.announcements.push(announcement);
    return announcement;
  }

  /**
   * Moves the announcing side out. Voided (not consumed) when the
   * opponent has nothing left at the location. Returns null when the
   * participant has no pending announcement.
   */
  execute(participant: CombatParticipant, opponent: CombatParticipant): RetreatExecution | null {
    const announcement = this.announcementFor(participant);
    if (!announcement || announcement.status !== 'announced' || announcement.destination === null) return null;
    const destination = announcement.destination;

    if (CombatQuery.combatants(this.ctx.state, this.setup, opponent).length === 0) {
      announcement.status = 'voided';
      CombatEventBus.emit('retreatVoided', { combatId: this.setup.combatId, participantId: participant.id, destination });
      Logger.log(`${participant.id}'s retreat is void: no opponent remains`, 'retreat');
      return { participantId: participant.id, destination, status: 'voided', movedUnitIds: [], removedUnitIds: [] };
    }

    const spaceUnits = CombatQuery.spaceUnits(this.ctx.state, this.setup.systemId, participant);
    const movers = spaceUnits.filter(u => u.move > 0 && u.unitClass !== 'structure');
    const capacity = MathUtils.sumBy(movers, u => u.capacity);
    const cargo = spaceUnits.filter(u => !movers.includes(u) && needsTransport(u)).sort(cargoOrder);
    const carried = cargo.slice(0, capacity);
    // anything else without a move value stays behind and leaves the board
    const immobile = spaceUnits.filter(u => !movers.includes(u) && !needsTransport(u));
    const stranded = [...cargo.slice(capacity), ...immobile];

    const moved = [...movers, ...carried];
    for (const unit of moved) this.ctx.state.relocateUnit(unit.id, destination);
    for (const unit of stranded) {
      this.ctx.state.removeUnit(unit.id);
      this.ctx.reinforcements.returnToReinforcements(unit, 'removed');
      CombatEventBus.emit('unitRemoved', { combatId: this.setup.combatId, unitId: unit.id, reason: 'retreat' });
    }

    if (moved.length > 0) {
      const owners = new Set(moved.map(u => u.ownerId));
      for (const owner of owners) this.ctx.tokens.placeCommandToken(owner, destination);
    }

    announcement.status = 'executed';
    const execution: RetreatExecution = {
      participantId: participant.id,
      destination,
      status: 'executed',
      movedUnitIds: moved.map(u => u.id),
      removedUnitIds: stranded.map(u => u.id),
    };
    CombatEventBus.emit('retreatExecuted', {
      combatId: this.setup.combatId,
      participantId: participant.id,
      destination,
      movedUnitIds: execution.movedUnitIds,
      removedUnitIds: execution.removedUnitIds,
    });
    Logger.log(`🏳 ${participant.id} retreats to ${destination} (${moved.length} moved, ${stranded.length} removed)`, 'retreat');
    return execution;
  }

  private defenderAnnounced(): boolean {
    return this.announcements.some(a =>
      a.round === this.round
      && a.participantId === this.setup.defender.id
      && a.destination !== null,
    );
  }
}
