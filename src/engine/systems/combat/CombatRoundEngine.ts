// ─────────────────────────────────────────────
//  Combat Round Engine
//  Sequences the steps of each round for one combat and
//  loops until the location is terminal. Owns no game state:
//  every mutation goes through the context collaborators.
// ─────────────────────────────────────────────

import type {
  CombatEnding,
  CombatParticipant,
  CombatResult,
  CombatRole,
  CombatRound,
  CombatRoundSummary,
  CombatSetup,
  CombatStep,
  RetreatAnnouncement,
} from '@/engine/data/types/Combat';
import { CombatEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { AntiFighterBarrageStep } from './AntiFighterBarrageStep';
import type { CombatContext } from './CombatContext';
import type { CombatTally } from './CombatOutcomeResolver';
import { CombatOutcomeResolver } from './CombatOutcomeResolver';
import { CombatQuery } from './CombatQuery';
import { CombatStepMachine } from './CombatStepMachine';
import { requestDecision } from './DecisionGate';
import { DiceRoller } from './DiceRoller';
import { HitAssignmentResolver } from './HitAssignmentResolver';
import { RetreatManager } from './RetreatManager';

function emptySummary(round: number): CombatRoundSummary {
  return {
    round,
    hits: { attacker: 0, defender: 0 },
    barrageHits: { attacker: 0, defender: 0 },
    casualties: { attacker: [], defender: [] },
    sustained: [],
  };
}

export class CombatRoundEngine {
  readonly machine: CombatStepMachine;
  readonly retreats: RetreatManager;
  readonly hits: HitAssignmentResolver;

  private current: CombatRound | null = null;
  private running: Promise<CombatResult> | null = null;
  private readonly tally: CombatTally = {
    destroyedUnitIds: [],
    retreatedUnitIds: [],
    removedUnitIds: [],
    rounds: [],
    roundsFought: 0,
    endedBy: 'elimination',
  };

  constructor(
    private readonly ctx: CombatContext,
    readonly setup: CombatSetup,
  ) {
    this.machine  = new CombatStepMachine(setup.variant, setup.combatId);
    this.retreats = new RetreatManager(ctx, setup);
    this.hits     = new HitAssignmentResolver(ctx, setup);
  }

  /** The round in progress, or null before the first and after the last */
  get round(): CombatRound | null {
    return this.current ? { ...this.current, hitsOwed: { ...this.current.hitsOwed } } : null;
  }

  /**
   * Resolves the combat to completion. Repeated calls share one
   * resolution and yield the same result without further mutation.
   *
   * A fresh engine on a location that is already terminal only
   * reproduces the verdict (winner, loser, draw): it reports
   * `endedBy: 'already_resolved'` with empty casualty and retreat lists.
   */
  run(): Promise<CombatResult> {
    if (!this.running) this.running = this.resolve();
    return this.running;
  }

  private async resolve(): Promise<CombatResult> {
    const { setup, ctx } = this;

    if (CombatOutcomeResolver.isTerminal(ctx, setup)) {
      this.tally.endedBy = 'already_resolved';
    } else {
      Logger.log(`⚔ ${setup.variant} combat at ${this.locationLabel()}: ${setup.attacker.id} vs ${setup.defender.id}`, 'system');
      this.tally.endedBy = setup.variant === 'space' ? await this.spaceLoop() : await this.groundLoop();
    }
    this.current = null;

    const result = await CombatOutcomeResolver.resolve(ctx, setup, this.tally);
    CombatEventBus.emit('combatEnded', { result });
    return result;
  }

  // ── Variants ──────────────────────────────

  private async spaceLoop(): Promise<CombatEnding> {
    const { setup, ctx } = this;

    for (;;) {
      const summary = this.openRound();
      const round = summary.round;

      if (AntiFighterBarrageStep.isApplicable(ctx, setup, round)) {
        this.enter('ANTI_FIGHTER_BARRAGE');
        const barrage = await AntiFighterBarrageStep.resolve(ctx, setup, this.hits, round);
        summary.barrageHits = barrage.hits;
        this.recordCasualties(summary, 'attacker', barrage.destroyed.attacker);
        this.recordCasualties(summary, 'defender', barrage.destroyed.defender);
        if (CombatOutcomeResolver.isTerminal(ctx, setup)) return 'barrage';
      }

      this.enter('ANNOUNCE_RETREATS');
      await this.announceRetreats(round);

      this.enter('ROLL_DICE');
      this.rollDice(summary);

      this.enter('ASSIGN_HITS');
      await this.assignHits(summary);

      this.enter('RETREAT');
      const retreated = this.executeRetreats();

      if (CombatOutcomeResolver.isTerminal(ctx, setup)) return retreated ? 'retreat' : 'elimination';
      if (this.stalemate()) return 'stalemate';
      this.checkRoundGuard(round);
    }
  }

  private async groundLoop(): Promise<CombatEnding> {
    for (;;) {
      const summary = this.openRound();

      this.enter('ROLL_DICE');
      this.rollDice(summary);

      this.enter('ASSIGN_HITS');
      await this.assignHits(summary);

      if (CombatOutcomeResolver.isTerminal(this.ctx, this.setup)) return 'elimination';
      if (this.stalemate()) return 'stalemate';
      this.checkRoundGuard(summary.round);
    }
  }

  // ── Steps ─────────────────────────────────

  private openRound(): CombatRoundSummary {
    const round = this.machine.startRound();
    this.retreats.beginRound(round);
    this.current = { number: round, step: null, hitsOwed: { attacker: 0, defender: 0 } };
    const summary = emptySummary(round);
    this.tally.rounds.push(summary);
    this.tally.roundsFought = round;
    return summary;
  }

  private enter(step: CombatStep): void {
    if (!this.machine.transition(step)) {
      throw new Error(`Combat ${this.setup.combatId} cannot enter ${step} from ${this.machine.step ?? 'round start'}`);
    }
    if (this.current) this.current.step = step;
  }

  /** Defender first; the attacker is only asked when the defender stays */
  private async announceRetreats(round: number): Promise<void> {
    const { setup } = this;

    for (const participant of [setup.defender, setup.attacker]) {
      if (participant.role === 'attacker' && this.retreats.announcementFor(setup.defender)?.destination) return;

      const eligibleDestinations = this.retreats.eligibleDestinations(participant);
      if (eligibleDestinations.length === 0 || this.retreats.movableUnits(participant).length === 0) {
        this.retreats.pass(participant);
        continue;
      }

      const opponent = this.opponentOf(participant);
      await requestDecision<string | null, RetreatAnnouncement>({
        combatId: setup.combatId,
        participant,
        maxAttempts: this.ctx.config.maxDecisionAttempts,
        ask: rejection => this.ctx.decisions.chooseRetreatDestination({
          combatId: setup.combatId,
          participant,
          round,
          role: participant.role,
          systemId: setup.systemId,
          eligibleDestinations,
          ownUnits: CombatQuery.combatants(this.ctx.state, setup, participant),
          opposingUnits: CombatQuery.combatants(this.ctx.state, setup, opponent),
          rejection,
        }),
        accept: destination => destination === null
          ? this.retreats.pass(participant)
          : this.retreats.announce(participant, destination),
      });
    }
  }

  /** Attacker rolls first, then defender */
  private rollDice(summary: CombatRoundSummary): void {
    const { setup, ctx } = this;

    for (const participant of [setup.attacker, setup.defender]) {
      const units = CombatQuery.combatants(ctx.state, setup, participant);
      const modifier = DiceRoller.modifierFor(ctx, setup, participant.role, 'combat');
      const outcome = DiceRoller.roll(units, ctx.rng, 'combat', ctx.config.dieSides, modifier);
      summary.hits[participant.role] = outcome.hits;

      CombatEventBus.emit('diceRolled', {
        combatId: setup.combatId,
        participantId: participant.id,
        channel: 'combat',
        rolls: outcome.rolls,
        hits: outcome.hits,
      });
      Logger.log(
        `🎲 ${participant.id} [${outcome.rolls.map(r => r.value).join(', ')}]${modifier ? ` ${modifier > 0 ? '+' : ''}${modifier}` : ''} → ${outcome.hits} hit(s)`,
        'dice',
      );
    }

    if (this.current) {
      this.current.hitsOwed = { attacker: summary.hits.defender, defender: summary.hits.attacker };
    }
  }

  /** Both sides absorb the hits rolled against them; losses are simultaneous */
  private async assignHits(summary: CombatRoundSummary): Promise<void> {
    const { setup } = this;
    const round = summary.round;

    const onDefender = await this.hits.assign(setup.defender, summary.hits.attacker, round);
    this.recordCasualties(summary, 'defender', onDefender.destroyed);
    summary.sustained.push(...onDefender.sustained);

    const onAttacker = await this.hits.assign(setup.attacker, summary.hits.defender, round);
    this.recordCasualties(summary, 'attacker', onAttacker.destroyed);
    summary.sustained.push(...onAttacker.sustained);
  }

  /** True when a side physically left the location */
  private executeRetreats(): boolean {
    const { setup } = this;
    let retreated = false;

    for (const participant of [setup.defender, setup.attacker]) {
      const execution = this.retreats.execute(participant, this.opponentOf(participant));
      if (!execution || execution.status !== 'executed') continue;
      this.tally.retreatedUnitIds.push(...execution.movedUnitIds);
      this.tally.removedUnitIds.push(...execution.removedUnitIds);
      if (execution.movedUnitIds.length > 0) retreated = true;
    }
    return retreated;
  }

  // ── Helpers ───────────────────────────────

  private recordCasualties(summary: CombatRoundSummary, role: CombatRole, unitIds: string[]): void {
    summary.casualties[role].push(...unitIds);
    this.tally.destroyedUnitIds.push(...unitIds);
  }

  /** Neither side can ever roll a hit, so nothing would change by fighting on */
  private stalemate(): boolean {
    if (!CombatOutcomeResolver.isStalemate(this.ctx, this.setup)) return false;
    Logger.log(`Combat ${this.setup.combatId}: neither side can score, fighting stops`, 'warn');
    return true;
  }

  private checkRoundGuard(round: number): void {
    if (round < this.ctx.config.maxRounds) return;
    throw new Error(`Combat ${this.setup.combatId} is still undecided after ${round} rounds`);
  }

  private opponentOf(participant: CombatParticipant): CombatParticipant {
    return participant.role === 'attacker' ? this.setup.defender : this.setup.attacker;
  }

  private locationLabel(): string {
    const { systemId, planetId } = this.setup;
    return planetId ? `${systemId}/${planetId}` : systemId;
  }
}
