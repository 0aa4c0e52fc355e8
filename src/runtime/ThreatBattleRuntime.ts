import {
  BattleOrchestrator,
  type AdmissionGate,
  type StartBattleResult
} from '../battle/BattleOrchestrator.ts';
import type { Battle, BattleConfig, BattleOutcome, BattleResult } from '../battle/types.ts';
import {
  resolveEngineConfig,
  type EngineConfig
} from '../core/config.ts';
import { ConfigurationError, describeError } from '../core/errors.ts';
import type { RandomSource } from '../core/random.ts';
import { SimulationClock } from '../core/SimulationClock.ts';
import { TickClock } from '../core/TickClock.ts';
import {
  createEngineEventBus,
  type EngineEventBus,
  type EngineEventName,
  type EngineEvents,
  type Listener
} from '../events/index.ts';
import {
  InMemoryPlayerProfileStore,
  type PlayerProfileStore
} from '../profiles/PlayerProfileStore.ts';
import { SubsystemRegistry, createDefaultSubsystems } from '../subsystems/SubsystemRegistry.ts';
import type { Subsystem, SubsystemMetrics } from '../subsystems/types.ts';
import { LogStore } from '../telemetry/LogStore.ts';
import { createLogger, withScope, type Logger } from '../telemetry/logger.ts';
import { TelemetryBuffer, emitStructuredTelemetry } from '../telemetry/structured.ts';
import { InvasionDetector } from '../threats/InvasionDetector.ts';
import { ThreatSimulationEngine } from '../threats/ThreatSimulationEngine.ts';
import type {
  EnvironmentalConditions,
  EnvironmentalRiskAssessment,
  EnvironmentalSensor,
  Threat,
  ThreatIncident
} from '../threats/types.ts';

export type EngineConfigInput = Partial<Record<keyof EngineConfig, unknown>>;

export interface ThreatBattleRuntimeOptions {
  readonly sensor?: EnvironmentalSensor | null;
  readonly profiles?: PlayerProfileStore;
  /** Called on every initialize; each runtime generation gets fresh providers. */
  readonly subsystems?: () => Subsystem[];
  readonly random?: RandomSource;
  readonly admissionGate?: AdmissionGate;
  readonly logger?: Logger;
  readonly logStore?: LogStore;
  readonly telemetry?: TelemetryBuffer;
  /** Wall-clock milliseconds per real-time tick. */
  readonly tickIntervalMs?: number;
  /** Simulated seconds per wall-clock second while running in real time. */
  readonly timeScale?: number;
}

export type HealthStatus = 'healthy' | 'degraded' | 'critical';

export interface RuntimeHealthMetrics {
  readonly activeBattles: number;
  readonly pendingBattles: number;
  readonly activeThreats: number;
  readonly incidents: number;
  readonly subsystemFaults: number;
  readonly sensorFaults: number;
  readonly uptimeSeconds: number;
}

export interface RuntimeHealthCheck {
  readonly status: HealthStatus;
  readonly issues: readonly string[];
  readonly metrics: RuntimeHealthMetrics;
  readonly checkedAt: number;
}

export interface RuntimeMetrics {
  readonly battles: { readonly active: number; readonly pending: number; readonly completed: number };
  readonly threats: { readonly active: number; readonly resolved: number; readonly risk: number };
  readonly subsystems: readonly SubsystemMetrics[];
}

interface RuntimeComponents {
  readonly config: EngineConfig;
  readonly events: EngineEventBus;
  readonly clock: SimulationClock;
  readonly engine: ThreatSimulationEngine;
  readonly detector: InvasionDetector;
  readonly registry: SubsystemRegistry;
  readonly orchestrator: BattleOrchestrator;
  readonly subscriptions: Array<() => void>;
  faults: number;
  sensorFaults: number;
}

const DEFAULT_TICK_INTERVAL_MS = 1000;

/**
 * Composition root. Owns one event bus, clock, threat engine, invasion
 * detector, subsystem registry and battle orchestrator per initialization and
 * drives them from a single `tick`.
 */
export class ThreatBattleRuntime {
  private readonly options: ThreatBattleRuntimeOptions;
  private readonly logger: Logger;
  private readonly logStore: LogStore;
  private readonly telemetry: TelemetryBuffer;
  private readonly profiles: PlayerProfileStore;
  private components: RuntimeComponents | null = null;
  private lastConfigError: ConfigurationError | null = null;
  private tickClock: TickClock | null = null;
  private timeScale: number;

  constructor(options: ThreatBattleRuntimeOptions = {}) {
    this.options = options;
    this.logger = this.scopedLogger('runtime');
    this.timeScale = options.timeScale ?? 1;
    this.logStore = options.logStore ?? new LogStore({ logger: this.scopedLogger('log-store') });
    this.telemetry = options.telemetry ?? new TelemetryBuffer();
    this.profiles = options.profiles ?? new InMemoryPlayerProfileStore();
  }

  /**
   * Validate the configuration and build every component. On failure the
   * runtime stays uninitialized and the `ConfigurationError` is rethrown.
   */
  initialize(input: EngineConfigInput = {}): EngineConfig {
    let config: EngineConfig;
    try {
      config = resolveEngineConfig(input);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.lastConfigError = error;
        this.logger.error(error.message);
      }
      throw error;
    }

    if (this.components) {
      this.shutdown();
    }
    this.lastConfigError = null;
    this.components = this.build(config);
    this.logger.info('Threat battle runtime initialized', {
      maxConcurrentBattles: config.maxConcurrentBattles,
      realTimeInvasions: config.enableRealTimeInvasions
    });
    return { ...config };
  }

  isInitialized(): boolean {
    return this.components !== null;
  }

  getConfig(): EngineConfig {
    return { ...this.require().config };
  }

  /** One simulation step: threats, then invasions, then battles. */
  tick(dt: number, conditions?: EnvironmentalConditions): void {
    const components = this.require();
    if (!Number.isFinite(dt) || dt <= 0) {
      return;
    }
    components.clock.advance(dt);
    components.engine.tick(dt, conditions);
    components.detector.update(dt);
    components.orchestrator.update(dt);
  }

  /** Drive `tick` from a wall-clock interval until {@link stop}. */
  start(): void {
    this.require();
    if (this.tickClock?.isRunning()) {
      return;
    }
    this.tickClock = new TickClock(
      (stepSeconds) => {
        try {
          this.tick(stepSeconds);
        } catch (error) {
          this.logger.error(`Real-time tick failed: ${describeError(error)}`);
          this.stop();
        }
      },
      {
        intervalMs: this.options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS,
        timeScale: this.timeScale
      }
    );
    this.tickClock.start();
  }

  /** Applies to the running driver from its next step and to later starts. */
  setTimeScale(timeScale: number): void {
    if (!Number.isFinite(timeScale) || timeScale <= 0) {
      throw new Error('Time scale must be positive');
    }
    this.timeScale = timeScale;
    this.tickClock?.setTimeScale(timeScale);
  }

  getTimeScale(): number {
    return this.timeScale;
  }

  stop(): void {
    this.tickClock?.stop();
    this.tickClock = null;
  }

  isRunning(): boolean {
    return this.tickClock?.isRunning() ?? false;
  }

  on<K extends EngineEventName>(event: K, listener: Listener<EngineEvents[K]>): () => void {
    return this.require().events.on(event, listener);
  }

  startBattle(config: BattleConfig): StartBattleResult {
    return this.require().orchestrator.startBattle(config);
  }

  endBattle(battleId: string, outcome: BattleOutcome): boolean {
    return this.require().orchestrator.endBattle(battleId, outcome);
  }

  queueBattle(config: BattleConfig): number {
    return this.require().orchestrator.queueBattle(config);
  }

  reportBattleProgress(battleId: string, delta: number): boolean {
    return this.require().orchestrator.reportProgress(battleId, delta);
  }

  recordBattleScore(battleId: string, participantId: string, points: number): boolean {
    return this.require().orchestrator.recordScore(battleId, participantId, points);
  }

  containThreat(threatId: string, effectiveness: number): boolean {
    return this.require().engine.containThreat(threatId, effectiveness);
  }

  applyTreatment(threatId: string, severityReduction: number): boolean {
    return this.require().engine.applyTreatment(threatId, severityReduction);
  }

  triggerManualScan(conditions: EnvironmentalConditions): EnvironmentalRiskAssessment {
    return this.require().engine.triggerManualScan(conditions);
  }

  getActiveThreats(): Threat[] {
    return this.require().engine.getActiveThreats();
  }

  getThreatHistory(): ThreatIncident[] {
    return this.require().engine.getThreatHistory();
  }

  getCurrentRisk(): EnvironmentalRiskAssessment {
    return this.require().engine.getCurrentRisk();
  }

  getActiveBattles(): Battle[] {
    return this.require().orchestrator.getActiveBattles();
  }

  getPendingBattles(): BattleConfig[] {
    return this.require().orchestrator.getPendingBattles();
  }

  getBattleHistory(): BattleResult[] {
    return this.require().orchestrator.getBattleHistory();
  }

  getProfiles(): PlayerProfileStore {
    return this.profiles;
  }

  getLogStore(): LogStore {
    return this.logStore;
  }

  getTelemetry(): TelemetryBuffer {
    return this.telemetry;
  }

  getHealthCheck(): RuntimeHealthCheck {
    const { config, clock, engine, orchestrator, registry, faults, sensorFaults } = this.require();
    const activeThreats = engine.getActiveThreats();
    const issues: string[] = [];
    let status: HealthStatus = 'healthy';
    const degrade = (issue: string): void => {
      issues.push(issue);
      if (status === 'healthy') {
        status = 'degraded';
      }
    };

    const escalated = activeThreats.filter((threat) => threat.severity >= 1).length;
    if (escalated > 0) {
      issues.push(`${escalated} threat(s) at maximum severity`);
      status = 'critical';
    }
    if (config.maxSimultaneousThreats > 0 && activeThreats.length >= config.maxSimultaneousThreats) {
      degrade('Threat capacity reached');
    }
    if (
      orchestrator.getPendingCount() > 0 &&
      orchestrator.getActiveBattleCount() >= config.maxConcurrentBattles
    ) {
      degrade('Battle capacity saturated');
    }
    if (faults > 0) {
      degrade(`${faults} subsystem fault(s) reported`);
    }
    if (sensorFaults > 0) {
      degrade(`${sensorFaults} sensor fault(s) reported`);
    }
    for (const metrics of registry.getMetrics()) {
      if (!metrics.initialized) {
        degrade(`Subsystem ${metrics.kind} not initialized`);
      }
    }

    return {
      status,
      issues,
      metrics: {
        activeBattles: orchestrator.getActiveBattleCount(),
        pendingBattles: orchestrator.getPendingCount(),
        activeThreats: activeThreats.length,
        incidents: engine.getThreatHistory().length,
        subsystemFaults: faults,
        sensorFaults,
        uptimeSeconds: clock.now()
      },
      checkedAt: clock.now()
    };
  }

  getMetrics(): RuntimeMetrics {
    const { engine, orchestrator, registry } = this.require();
    return {
      battles: {
        active: orchestrator.getActiveBattleCount(),
        pending: orchestrator.getPendingCount(),
        completed: orchestrator.getBattleHistory().length
      },
      threats: {
        active: engine.getActiveThreatCount(),
        resolved: engine.getThreatHistory().length,
        risk: engine.getCurrentRisk().overall
      },
      subsystems: registry.getMetrics()
    };
  }

  /**
   * Tear everything down. Active battles are abandoned before any component is
   * released; afterwards the runtime is uninitialized again.
   */
  shutdown(): void {
    const components = this.components;
    if (!components) {
      return;
    }
    this.stop();
    components.orchestrator.shutdown();
    components.detector.stop();
    components.detector.reset();
    components.engine.reset();
    for (const unsubscribe of components.subscriptions) {
      unsubscribe();
    }
    components.events.clear();
    this.components = null;
    this.logger.info('Threat battle runtime shut down');
  }

  private scopedLogger(scope: string): Logger {
    return this.options.logger ? withScope(this.options.logger, scope) : createLogger(scope);
  }

  private require(): RuntimeComponents {
    if (!this.components) {
      throw this.lastConfigError ?? new ConfigurationError(['runtime has not been initialized']);
    }
    return this.components;
  }

  private build(config: EngineConfig): RuntimeComponents {
    const events = createEngineEventBus(this.logger);
    const clock = new SimulationClock();
    const engine = new ThreatSimulationEngine({
      settings: config,
      events,
      clock,
      random: this.options.random,
      sensor: this.options.sensor,
      logger: this.scopedLogger('threats')
    });
    const detector = new InvasionDetector(engine, {
      interval: config.invasionCheckInterval,
      events,
      clock,
      logger: this.scopedLogger('invasions')
    });
    const registry = new SubsystemRegistry(
      (this.options.subsystems ?? createDefaultSubsystems)(),
      { enableAIOpponents: config.enableAIOpponents, logger: this.scopedLogger('subsystems') }
    );
    const orchestrator = new BattleOrchestrator({
      settings: config,
      registry,
      profiles: this.profiles,
      events,
      clock,
      admissionGate: this.options.admissionGate,
      logger: this.scopedLogger('battles')
    });

    const components: RuntimeComponents = {
      config,
      events,
      clock,
      engine,
      detector,
      registry,
      orchestrator,
      subscriptions: [],
      faults: 0,
      sensorFaults: 0
    };
    components.subscriptions.push(
      ...this.wireLogFeed(events, clock),
      events.on('invasionDetected', (payload) => {
        orchestrator.handleInvasion(payload);
      }),
      events.on('subsystemFault', () => {
        components.faults += 1;
      }),
      events.on('sensorFault', () => {
        components.sensorFaults += 1;
      })
    );

    for (const fault of registry.initializeAll()) {
      events.emit('subsystemFault', fault);
    }
    detector.start();
    return components;
  }

  private wireLogFeed(events: EngineEventBus, clock: SimulationClock): Array<() => void> {
    const record = (event: string, payload: Record<string, unknown>): void => {
      this.telemetry.push(
        emitStructuredTelemetry(event, payload, { logger: this.logger, timestamp: clock.now() })
      );
    };
    return [
      events.on('threatDetected', ({ threat }) => {
        this.logStore.record({
          type: 'threat',
          event: 'threat.detected',
          subject: threat.id,
          message: `New ${threat.category} threat in ${threat.originLocation}`,
          metadata: { severity: threat.severity }
        });
      }),
      events.on('threatResolved', ({ incident }) => {
        this.logStore.record({
          type: 'threat',
          event: 'threat.resolved',
          subject: incident.id,
          message: `Threat ${incident.id} resolved by ${incident.resolutionMethod}`,
          metadata: { preventionScore: incident.preventionScore }
        });
      }),
      events.on('threatEscalated', ({ threat }) => {
        this.logStore.record({
          type: 'threat',
          event: 'threat.escalated',
          subject: threat.id,
          message: `Threat ${threat.id} escalated to maximum severity`,
          metadata: { spreadRadius: threat.spreadRadius }
        });
        record('threat.escalated', { threatId: threat.id, category: threat.category });
      }),
      events.on('invasionDetected', ({ threatId, category }) => {
        this.logStore.record({
          type: 'invasion',
          event: 'invasion.detected',
          subject: threatId,
          message: `Invasion detected: ${category}`
        });
        record('invasion.detected', { threatId, category });
      }),
      events.on('battleStarted', ({ battle }) => {
        this.logStore.record({
          type: 'battle',
          event: 'battle.started',
          subject: battle.id,
          message: `Battle started: ${battle.name}`,
          metadata: { origin: battle.origin }
        });
        record('battle.started', { battleId: battle.id, origin: battle.origin });
      }),
      events.on('battleEnded', ({ battle, result }) => {
        this.logStore.record({
          type: 'battle',
          event: 'battle.ended',
          subject: battle.id,
          message: `Battle ended: ${battle.name} (${result.outcome})`,
          metadata: { durationSeconds: result.durationSeconds }
        });
        record('battle.ended', {
          battleId: battle.id,
          outcome: result.outcome,
          durationSeconds: result.durationSeconds
        });
      }),
      events.on('battleCreationFailed', ({ config, error }) => {
        this.logStore.record({
          type: 'battle',
          event: 'battle.creation-failed',
          message: `Battle creation failed: ${config.name}`,
          metadata: { reason: error.message }
        });
      }),
      events.on('subsystemFault', (fault) => {
        this.logStore.record({
          type: 'subsystem',
          event: `subsystem.${fault.hook}-failed`,
          subject: fault.kind,
          message: `Subsystem ${fault.kind} failed during ${fault.hook}`,
          metadata: { battleId: fault.battleId, reason: fault.message }
        });
      }),
      events.on('sensorFault', ({ message }) => {
        this.logStore.record({
          type: 'system',
          event: 'sensor.failed',
          subject: 'environment',
          message: `Environmental sensor failed: ${message}`
        });
        record('sensor.failed', { reason: message });
      })
    ];
  }
}
