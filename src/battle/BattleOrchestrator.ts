import type { EngineConfig } from '../core/config.ts';
import {
  AdmissionDeniedError,
  CreationError,
  NotFoundError,
  describeError,
  type AdmissionDeniedReason
} from '../core/errors.ts';
import { createIdFactory, type IdFactory } from '../core/ids.ts';
import { SimulationClock } from '../core/SimulationClock.ts';
import type { EngineEventBus, InvasionDetectedPayload } from '../events/index.ts';
import {
  InMemoryPlayerProfileStore,
  applyBattleRecord,
  calculateBattleExperience,
  createPlayerProfile,
  type PlayerProfileStore
} from '../profiles/PlayerProfileStore.ts';
import type { SubsystemRegistry } from '../subsystems/SubsystemRegistry.ts';
import type { SubsystemFault } from '../subsystems/types.ts';
import { createLogger, type Logger } from '../telemetry/logger.ts';
import {
  BattleSession,
  DEFAULT_TIME_LIMIT_SECONDS,
  resolveProgressRate
} from './BattleSession.ts';
import type { Battle, BattleConfig, BattleOutcome, BattlePhase, BattleResult } from './types.ts';

export type OrchestratorSettings = Pick<
  EngineConfig,
  | 'enableRealTimeInvasions'
  | 'maxConcurrentBattles'
  | 'invasionBattleTimeLimit'
  | 'defaultDefenderId'
  | 'maxBattleHistory'
>;

export interface AdmissionContext {
  readonly activeBattles: number;
  readonly config: BattleConfig | null;
}

/** Extra policy check on top of the capacity limit. */
export type AdmissionGate = (context: AdmissionContext) => boolean;

export interface BattleOrchestratorOptions {
  readonly settings: OrchestratorSettings;
  readonly registry: SubsystemRegistry;
  readonly profiles?: PlayerProfileStore;
  readonly events?: EngineEventBus | null;
  readonly clock?: SimulationClock;
  readonly idFactory?: IdFactory;
  readonly admissionGate?: AdmissionGate;
  readonly logger?: Logger;
}

export type StartBattleResult =
  | { readonly success: true; readonly battleId: string }
  | { readonly success: false; readonly error: AdmissionDeniedError | CreationError };

export type InvasionResponse =
  | { readonly status: 'started'; readonly battleId: string }
  | { readonly status: 'queued'; readonly position: number }
  | { readonly status: 'ignored'; readonly reason: 'disabled' | 'inactive' | 'duplicate' }
  | { readonly status: 'failed'; readonly error: CreationError };

function sanitizeParticipants(ids: readonly string[] | undefined): string[] {
  if (!Array.isArray(ids)) {
    return [];
  }
  const unique = new Set<string>();
  for (const id of ids) {
    if (typeof id === 'string' && id.trim().length > 0) {
      unique.add(id.trim());
    }
  }
  return [...unique];
}

/**
 * Admits battles under a concurrency cap, queues the overflow and drives
 * each admitted battle's session until it ends.
 */
export class BattleOrchestrator {
  private readonly settings: OrchestratorSettings;
  private readonly registry: SubsystemRegistry;
  private readonly profiles: PlayerProfileStore;
  private readonly events: EngineEventBus | null;
  private readonly clock: SimulationClock;
  private readonly makeId: IdFactory;
  private readonly admissionGate: AdmissionGate | null;
  private readonly logger: Logger;
  private readonly sessions = new Map<string, BattleSession>();
  private readonly lastPhase = new Map<string, BattlePhase>();
  private readonly pending: BattleConfig[] = [];
  private history: BattleResult[] = [];
  private active = true;

  constructor(options: BattleOrchestratorOptions) {
    this.settings = { ...options.settings };
    this.registry = options.registry;
    this.profiles = options.profiles ?? new InMemoryPlayerProfileStore();
    this.events = options.events ?? null;
    this.clock = options.clock ?? new SimulationClock();
    this.makeId = options.idFactory ?? createIdFactory('battle');
    this.admissionGate = options.admissionGate ?? null;
    this.logger = options.logger ?? createLogger('battles');
  }

  isActive(): boolean {
    return this.active;
  }

  canStartBattle(config?: BattleConfig): boolean {
    return this.admissionDenial(config ?? null) === null;
  }

  startBattle(config: BattleConfig): StartBattleResult {
    const denial = this.admissionDenial(config);
    if (denial) {
      return {
        success: false,
        error: new AdmissionDeniedError(denial, {
          activeBattles: this.sessions.size,
          maxConcurrentBattles: this.settings.maxConcurrentBattles
        })
      };
    }

    const participantIds = sanitizeParticipants(config.participantIds);
    if (participantIds.length === 0) {
      return this.creationFailed(
        config,
        new CreationError('Battle requires at least one participant', { name: config.name })
      );
    }
    const timeLimitSeconds = config.timeLimitSeconds ?? DEFAULT_TIME_LIMIT_SECONDS;
    if (!Number.isFinite(timeLimitSeconds) || timeLimitSeconds <= 0) {
      return this.creationFailed(
        config,
        new CreationError('Battle time limit must be positive', {
          name: config.name,
          timeLimitSeconds
        })
      );
    }

    const id = this.makeId();
    const scores: Record<string, number> = {};
    for (const participantId of participantIds) {
      scores[participantId] = 0;
    }
    const battle: Battle = {
      id,
      name: config.name.trim().length > 0 ? config.name.trim() : `Battle ${id}`,
      primaryThreatId: config.primaryThreatId ?? null,
      secondaryThreatIds: [...(config.secondaryThreatIds ?? [])],
      difficulty: config.difficulty ?? 'normal',
      origin: config.origin ?? 'manual',
      phase: 'preparation',
      progress: 0,
      participantIds,
      scores,
      startedAt: this.clock.now(),
      durationSeconds: 0,
      timeLimitSeconds,
      outcome: null
    };
    const session = new BattleSession(battle, resolveProgressRate(config));
    this.sessions.set(id, session);
    this.lastPhase.set(id, session.getCurrentPhase());

    const activation = this.registry.activateForBattle(session.getBattle());
    if (activation.failure) {
      const { failure } = activation;
      this.reportFaults([failure]);
      this.reportFaults(this.registry.cleanupForBattle(session.getBattle()));
      this.sessions.delete(id);
      this.lastPhase.delete(id);
      return this.creationFailed(
        config,
        new CreationError(
          `Subsystem ${failure.kind} failed to activate battle ${id}`,
          { battleId: id, kind: failure.kind, rolledBack: [...activation.activated] },
          failure.error
        )
      );
    }

    session.start();
    this.syncPhase(session);
    const started = session.getBattle();
    this.logger.info(`Battle started: ${started.name} (${id})`);
    this.events?.emit('battleStarted', { battle: started });
    return { success: true, battleId: id };
  }

  /**
   * Finish a battle. Unknown or already-ended ids are a no-op returning false.
   */
  endBattle(battleId: string, outcome: BattleOutcome): boolean {
    const session = this.sessions.get(battleId);
    if (!session || session.isTerminal()) {
      return false;
    }

    session.end(outcome);
    this.syncPhase(session);
    const battle = session.getBattle();
    const victory = outcome === 'victory';
    const durationSeconds = Math.max(0, this.clock.now() - battle.startedAt);

    const experienceAwarded: Record<string, number> = {};
    for (const participantId of battle.participantIds) {
      const experience = calculateBattleExperience(victory, battle.scores[participantId] ?? 0);
      experienceAwarded[participantId] = experience;
      this.recordProfile(participantId, { outcome, durationSeconds, experience });
    }

    const result: BattleResult = Object.freeze({
      battleId,
      outcome,
      victory,
      durationSeconds,
      scores: Object.freeze({ ...battle.scores }),
      experienceAwarded: Object.freeze(experienceAwarded)
    });

    this.reportFaults(this.registry.cleanupForBattle(battle));
    this.sessions.delete(battleId);
    this.lastPhase.delete(battleId);
    this.pushHistory(result);

    this.logger.info(`Battle ended: ${battle.name} (${battleId}) - ${outcome}`);
    this.events?.emit('battleEnded', { battle, result });
    return true;
  }

  /**
   * Advance one battle. A session that reaches resolution is ended in the
   * same call with the outcome it resolved to.
   */
  updateBattle(battleId: string, dt: number): boolean {
    const session = this.sessions.get(battleId);
    if (!session) {
      return false;
    }
    session.advance(dt);
    this.syncPhase(session);
    if (session.getCurrentPhase() === 'resolution') {
      this.endBattle(battleId, session.getResolvedOutcome() ?? 'error');
    }
    return true;
  }

  reportProgress(battleId: string, delta: number): boolean {
    const session = this.sessions.get(battleId);
    if (!session || !session.reportProgress(delta)) {
      return false;
    }
    this.syncPhase(session);
    return true;
  }

  recordScore(battleId: string, participantId: string, points: number): boolean {
    return this.sessions.get(battleId)?.recordScore(participantId, points) ?? false;
  }

  queueBattle(config: BattleConfig): number {
    this.pending.push(config);
    const position = this.pending.length;
    this.logger.debug(`Battle queued: ${config.name} (position ${position})`);
    this.events?.emit('battleQueued', { config, position });
    return position;
  }

  /** Admit queued battles in FIFO order while capacity allows. */
  processPendingBattles(): string[] {
    const admitted: string[] = [];
    while (this.pending.length > 0 && this.canStartBattle(this.pending[0])) {
      const result = this.startBattle(this.pending[0]);
      if (result.success) {
        this.pending.shift();
        admitted.push(result.battleId);
        continue;
      }
      if (result.error instanceof AdmissionDeniedError) {
        break;
      }
      const [dropped] = this.pending.splice(0, 1);
      this.logger.warn(`Dropped queued battle ${dropped.name}: ${result.error.message}`);
    }
    return admitted;
  }

  handleInvasion(payload: InvasionDetectedPayload): InvasionResponse {
    if (!this.settings.enableRealTimeInvasions) {
      return { status: 'ignored', reason: 'disabled' };
    }
    if (!this.active) {
      return { status: 'ignored', reason: 'inactive' };
    }
    if (this.hasBattleForThreat(payload.threatId)) {
      return { status: 'ignored', reason: 'duplicate' };
    }

    const config: BattleConfig = {
      name: `Invasion: ${payload.category}`,
      participantIds: [this.settings.defaultDefenderId],
      primaryThreatId: payload.threatId,
      secondaryThreatIds: [],
      difficulty: 'normal',
      timeLimitSeconds: this.settings.invasionBattleTimeLimit,
      origin: 'invasion'
    };
    const result = this.startBattle(config);
    if (result.success) {
      return { status: 'started', battleId: result.battleId };
    }
    if (result.error instanceof AdmissionDeniedError) {
      return { status: 'queued', position: this.queueBattle(config) };
    }
    return { status: 'failed', error: result.error };
  }

  update(dt: number): void {
    if (!this.active) {
      return;
    }
    for (const battleId of [...this.sessions.keys()]) {
      try {
        this.updateBattle(battleId, dt);
      } catch (error) {
        this.logger.error(`Battle ${battleId} failed to update: ${describeError(error)}`);
        this.forceEnd(battleId, 'error');
      }
    }
    this.reportFaults(this.registry.updateAll(dt));
    this.processPendingBattles();
  }

  /** Abandon every active battle, then drop the queue and stop admitting. */
  shutdown(): void {
    if (!this.active) {
      return;
    }
    for (const battleId of [...this.sessions.keys()]) {
      this.forceEnd(battleId, 'abandoned');
    }
    this.pending.length = 0;
    this.active = false;
    this.logger.info('Battle orchestrator shut down');
  }

  getBattle(battleId: string): Battle | null {
    return this.sessions.get(battleId)?.getBattle() ?? null;
  }

  requireBattle(battleId: string): Battle {
    const battle = this.getBattle(battleId);
    if (!battle) {
      throw new NotFoundError('battle', battleId);
    }
    return battle;
  }

  getActiveBattles(): Battle[] {
    return Array.from(this.sessions.values(), (session) => session.getBattle());
  }

  getActiveBattleCount(): number {
    return this.sessions.size;
  }

  getPendingCount(): number {
    return this.pending.length;
  }

  getPendingBattles(): BattleConfig[] {
    return this.pending.map((config) => ({ ...config }));
  }

  getBattleHistory(): BattleResult[] {
    return [...this.history];
  }

  private admissionDenial(config: BattleConfig | null): AdmissionDeniedReason | null {
    if (!this.active) {
      return 'inactive';
    }
    if (this.sessions.size >= this.settings.maxConcurrentBattles) {
      return 'capacity';
    }
    if (
      this.admissionGate &&
      !this.admissionGate({ activeBattles: this.sessions.size, config })
    ) {
      return 'policy';
    }
    return null;
  }

  private creationFailed(config: BattleConfig, error: CreationError): StartBattleResult {
    this.logger.warn(`Battle creation failed for ${config.name}: ${error.message}`);
    this.events?.emit('battleCreationFailed', { config, error });
    return { success: false, error };
  }

  private syncPhase(session: BattleSession): void {
    const phase = session.getCurrentPhase();
    const previous = this.lastPhase.get(session.id) ?? 'preparation';
    if (previous === phase) {
      return;
    }
    this.lastPhase.set(session.id, phase);
    this.events?.emit('battlePhaseChanged', { battleId: session.id, previous, phase });
  }

  private recordProfile(
    playerId: string,
    record: { outcome: BattleOutcome; durationSeconds: number; experience: number }
  ): void {
    try {
      const profile = this.profiles.get(playerId) ?? createPlayerProfile(playerId);
      this.profiles.save(applyBattleRecord(profile, record));
    } catch (error) {
      this.logger.error(`Failed to update profile ${playerId}: ${describeError(error)}`);
    }
  }

  private forceEnd(battleId: string, outcome: BattleOutcome): void {
    try {
      if (this.endBattle(battleId, outcome)) {
        return;
      }
    } catch (error) {
      this.logger.error(`Failed to end battle ${battleId}: ${describeError(error)}`);
    }
    this.sessions.delete(battleId);
    this.lastPhase.delete(battleId);
  }

  private hasBattleForThreat(threatId: string): boolean {
    for (const session of this.sessions.values()) {
      if (session.getBattle().primaryThreatId === threatId) {
        return true;
      }
    }
    return this.pending.some((config) => config.primaryThreatId === threatId);
  }

  private reportFaults(faults: readonly SubsystemFault[]): void {
    for (const fault of faults) {
      this.events?.emit('subsystemFault', fault);
    }
  }

  private pushHistory(result: BattleResult): void {
    this.history.push(result);
    if (this.history.length > this.settings.maxBattleHistory) {
      this.history = this.history.slice(-this.settings.maxBattleHistory);
    }
  }
}
