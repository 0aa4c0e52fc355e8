import { describe, expect, it, vi } from 'vitest';
import { AdmissionDeniedError, CreationError } from '../core/errors.ts';
import { SimulationClock } from '../core/SimulationClock.ts';
import {
  EventBus,
  createEngineEventBus,
  type BattlePhaseChangedPayload,
  type EngineEventBus,
  type EngineEvents
} from '../events/index.ts';
import {
  InMemoryPlayerProfileStore,
  type PlayerProfileStore
} from '../profiles/PlayerProfileStore.ts';
import { BaseSubsystem, PassiveSubsystem } from '../subsystems/BaseSubsystem.ts';
import { SubsystemRegistry, createDefaultSubsystems } from '../subsystems/SubsystemRegistry.ts';
import type { Subsystem, SubsystemKind } from '../subsystems/types.ts';
import { silentLogger } from '../telemetry/logger.ts';
import type { Threat } from '../threats/types.ts';
import {
  BattleOrchestrator,
  type AdmissionGate,
  type OrchestratorSettings
} from './BattleOrchestrator.ts';
import type { Battle, BattleConfig } from './types.ts';

const SETTINGS: OrchestratorSettings = {
  enableRealTimeInvasions: true,
  maxConcurrentBattles: 3,
  invasionBattleTimeLimit: 60,
  defaultDefenderId: 'defender',
  maxBattleHistory: 100
};

class ExplodingSubsystem extends BaseSubsystem {
  readonly kind: SubsystemKind;

  constructor(
    kind: SubsystemKind,
    private readonly failOn: 'activate' | 'activate-after-state' | 'update'
  ) {
    super();
    this.kind = kind;
  }

  activate(battle: Battle): void {
    if (this.failOn === 'activate') {
      throw new Error('activation refused');
    }
    super.activate(battle);
    if (this.failOn === 'activate-after-state') {
      throw new Error('activation refused');
    }
  }

  update(): void {
    if (this.failOn === 'update') {
      throw new Error('sensor offline');
    }
  }

  protected createBattleState(): Record<string, unknown> {
    return {};
  }
}

function isAboutBattle(payload: unknown, battleId: string): boolean {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    'battleId' in payload &&
    payload.battleId === battleId
  );
}

/** Throws once from the next phase change of the chosen battle. */
class InterruptingEventBus extends EventBus<EngineEvents> {
  interruptedBattleId: string | null = null;

  emit<K extends keyof EngineEvents & string>(event: K, payload: EngineEvents[K]): void {
    if (
      event === 'battlePhaseChanged' &&
      this.interruptedBattleId !== null &&
      isAboutBattle(payload, this.interruptedBattleId)
    ) {
      this.interruptedBattleId = null;
      throw new Error('phase feed disconnected');
    }
    super.emit(event, payload);
  }
}

interface SetupOptions {
  events?: EngineEventBus;
  settings?: Partial<OrchestratorSettings>;
  providers?: Subsystem[];
  profiles?: PlayerProfileStore;
  admissionGate?: AdmissionGate;
}

function setup(options: SetupOptions = {}) {
  const events = options.events ?? createEngineEventBus();
  const clock = new SimulationClock();
  const profiles = options.profiles ?? new InMemoryPlayerProfileStore();
  const registry = new SubsystemRegistry(options.providers ?? createDefaultSubsystems(), {
    logger: silentLogger
  });
  const orchestrator = new BattleOrchestrator({
    settings: { ...SETTINGS, ...options.settings },
    registry,
    profiles,
    events,
    clock,
    admissionGate: options.admissionGate,
    logger: silentLogger
  });
  const phases: BattlePhaseChangedPayload[] = [];
  events.on('battlePhaseChanged', (payload) => phases.push(payload));
  return { orchestrator, events, clock, profiles, phases };
}

function config(name: string, overrides: Partial<BattleConfig> = {}): BattleConfig {
  return { name, participantIds: ['grower-1'], ...overrides };
}

function makeThreat(id: string): Threat {
  return {
    id,
    category: 'fungal-disease',
    originLocation: 'drying-room',
    severity: 0.6,
    spreadRadius: 3,
    containmentEffectiveness: 0,
    contained: false,
    requiredResponse: 'environmental-modification',
    detectedAt: 0
  };
}

function invasion(threatId: string) {
  return {
    threatId,
    category: 'fungal-disease' as const,
    threat: makeThreat(threatId),
    detectedAt: 0
  };
}

describe('BattleOrchestrator', () => {
  it('denies admission at capacity and admits the queued battle once a slot frees', () => {
    const { orchestrator } = setup({ settings: { maxConcurrentBattles: 1 } });

    expect(orchestrator.startBattle(config('A'))).toEqual({ success: true, battleId: 'battle-0001' });
    const denied = orchestrator.startBattle(config('B'));
    expect(denied.success).toBe(false);
    if (denied.success) {
      return;
    }
    expect(denied.error).toBeInstanceOf(AdmissionDeniedError);
    expect(denied.error.message).toBe('Battle admission denied (capacity)');

    expect(orchestrator.queueBattle(config('B'))).toBe(1);
    expect(orchestrator.endBattle('battle-0001', 'victory')).toBe(true);
    expect(orchestrator.processPendingBattles()).toEqual(['battle-0002']);
    expect(orchestrator.getActiveBattles().map((battle) => battle.name)).toEqual(['B']);
    expect(orchestrator.getPendingCount()).toBe(0);
  });

  it('admits queued battles in FIFO order without exceeding capacity', () => {
    const { orchestrator } = setup({ settings: { maxConcurrentBattles: 2 } });
    for (const name of ['first', 'second', 'third', 'fourth']) {
      orchestrator.queueBattle(config(name));
    }

    expect(orchestrator.processPendingBattles()).toEqual(['battle-0001', 'battle-0002']);
    expect(orchestrator.getActiveBattleCount()).toBe(2);
    expect(orchestrator.getPendingBattles().map((pending) => pending.name)).toEqual([
      'third',
      'fourth'
    ]);

    orchestrator.endBattle('battle-0001', 'defeat');
    orchestrator.processPendingBattles();

    expect(orchestrator.getActiveBattles().map((battle) => battle.name)).toEqual([
      'second',
      'third'
    ]);
    expect(orchestrator.getActiveBattleCount()).toBe(2);
  });

  it('emits a phase change only when the phase differs', () => {
    const { orchestrator, phases } = setup();
    orchestrator.startBattle(config('steady'));

    orchestrator.updateBattle('battle-0001', 1);
    orchestrator.updateBattle('battle-0001', 1);
    orchestrator.updateBattle('battle-0001', 1);

    expect(phases).toEqual([{ battleId: 'battle-0001', previous: 'preparation', phase: 'active' }]);
    expect(orchestrator.getBattle('battle-0001')?.durationSeconds).toBe(3);
  });

  it('ends a battle as a victory once its progress completes', () => {
    const { orchestrator, events, clock, profiles, phases } = setup();
    const ended = vi.fn();
    events.on('battleEnded', ended);
    orchestrator.startBattle(config('sprint', { progressRate: 0.5 }));

    clock.advance(1);
    orchestrator.updateBattle('battle-0001', 1);
    clock.advance(1);
    orchestrator.updateBattle('battle-0001', 1);

    expect(orchestrator.getActiveBattleCount()).toBe(0);
    expect(phases.map((change) => change.phase)).toEqual(['active', 'resolution', 'ended']);
    const [result] = orchestrator.getBattleHistory();
    expect(result).toEqual({
      battleId: 'battle-0001',
      outcome: 'victory',
      victory: true,
      durationSeconds: 2,
      scores: { 'grower-1': 0 },
      experienceAwarded: { 'grower-1': 150 }
    });
    expect(ended).toHaveBeenCalledTimes(1);
    expect(profiles.get('grower-1')).toEqual({
      playerId: 'grower-1',
      totalBattles: 1,
      wins: 1,
      losses: 0,
      winRate: 1,
      experience: 150,
      totalBattleSeconds: 2
    });
  });

  it('times a battle out when its limit passes', () => {
    const { orchestrator, profiles } = setup();
    orchestrator.startBattle(config('slow', { progressRate: 0, timeLimitSeconds: 3 }));

    orchestrator.updateBattle('battle-0001', 3);

    expect(orchestrator.getBattleHistory()[0].outcome).toBe('timeout');
    expect(profiles.get('grower-1')?.losses).toBe(1);
  });

  it('scales experience with the recorded score', () => {
    const { orchestrator } = setup();
    orchestrator.startBattle(config('scored'));

    expect(orchestrator.recordScore('battle-0001', 'grower-1', 200)).toBe(true);
    orchestrator.endBattle('battle-0001', 'victory');

    expect(orchestrator.getBattleHistory()[0].experienceAwarded).toEqual({ 'grower-1': 170 });
  });

  it('treats unknown and repeated end requests as no-ops', () => {
    const { orchestrator, events } = setup();
    const ended = vi.fn();
    events.on('battleEnded', ended);
    orchestrator.startBattle(config('once'));

    expect(orchestrator.endBattle('battle-9999', 'victory')).toBe(false);
    expect(orchestrator.endBattle('battle-0001', 'draw')).toBe(true);
    expect(orchestrator.endBattle('battle-0001', 'victory')).toBe(false);

    expect(orchestrator.getBattleHistory()).toHaveLength(1);
    expect(ended).toHaveBeenCalledTimes(1);
    expect(orchestrator.updateBattle('battle-0001', 1)).toBe(false);
    expect(() => orchestrator.requireBattle('battle-0001')).toThrow('Unknown battle: battle-0001');
  });

  it('rejects a battle without participants', () => {
    const { orchestrator, events } = setup();
    const failed = vi.fn();
    events.on('battleCreationFailed', failed);

    const result = orchestrator.startBattle(config('empty', { participantIds: ['  '] }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(CreationError);
      expect(result.error.message).toBe('Battle requires at least one participant');
    }
    expect(failed).toHaveBeenCalledTimes(1);
    expect(orchestrator.getActiveBattleCount()).toBe(0);
  });

  it('rolls back subsystems already activated when one activation throws', () => {
    const pest = new PassiveSubsystem('pest');
    const biological = new PassiveSubsystem('biological');
    const { orchestrator, events } = setup({
      providers: [pest, biological, new ExplodingSubsystem('defense', 'activate')]
    });
    const faults = vi.fn();
    events.on('subsystemFault', faults);

    const result = orchestrator.startBattle(config('doomed'));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(CreationError);
      expect(result.error.message).toBe('Subsystem defense failed to activate battle battle-0001');
      expect(result.error.details).toEqual({
        battleId: 'battle-0001',
        kind: 'defense',
        rolledBack: ['pest', 'biological']
      });
    }
    expect(pest.hasBattle('battle-0001')).toBe(false);
    expect(pest.getMetrics().resets).toBe(1);
    expect(biological.getMetrics().resets).toBe(1);
    expect(faults).toHaveBeenCalledTimes(1);
    expect(orchestrator.getActiveBattleCount()).toBe(0);
  });

  it('resets the failing provider even when it stored state before throwing', () => {
    const chemical = new ExplodingSubsystem('chemical', 'activate-after-state');
    const { orchestrator } = setup({
      providers: [new PassiveSubsystem('pest'), chemical]
    });

    const result = orchestrator.startBattle(config('leaky'));

    expect(result.success).toBe(false);
    expect(chemical.hasBattle('battle-0001')).toBe(false);
    expect(chemical.getMetrics()).toMatchObject({ activeBattles: 0, activations: 1, resets: 1 });
  });

  it('drops a queued battle that cannot be created and keeps going', () => {
    const { orchestrator } = setup();
    orchestrator.queueBattle(config('broken', { participantIds: [] }));
    orchestrator.queueBattle(config('fine'));

    expect(orchestrator.processPendingBattles()).toEqual(['battle-0001']);
    expect(orchestrator.getPendingCount()).toBe(0);
  });

  it('honours the admission gate', () => {
    const { orchestrator } = setup({
      admissionGate: ({ config: candidate }) => candidate?.difficulty !== 'expert'
    });

    expect(orchestrator.canStartBattle()).toBe(true);
    const result = orchestrator.startBattle(config('hardcore', { difficulty: 'expert' }));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Battle admission denied (policy)');
    }
  });

  describe('invasions', () => {
    it('queues an invasion battle while at capacity and admits it once a slot frees', () => {
      const { orchestrator } = setup({ settings: { maxConcurrentBattles: 1 } });
      orchestrator.startBattle(config('manual'));

      expect(orchestrator.handleInvasion(invasion('threat-0001'))).toEqual({
        status: 'queued',
        position: 1
      });
      expect(orchestrator.handleInvasion(invasion('threat-0001'))).toEqual({
        status: 'ignored',
        reason: 'duplicate'
      });

      orchestrator.endBattle('battle-0001', 'victory');
      orchestrator.update(1);

      const [battle] = orchestrator.getActiveBattles();
      expect(battle.id).toBe('battle-0002');
      expect(battle.name).toBe('Invasion: fungal-disease');
      expect(battle.origin).toBe('invasion');
      expect(battle.participantIds).toEqual(['defender']);
      expect(battle.primaryThreatId).toBe('threat-0001');
      expect(battle.timeLimitSeconds).toBe(60);
    });

    it('starts a battle directly when capacity allows', () => {
      const { orchestrator } = setup();
      expect(orchestrator.handleInvasion(invasion('threat-0002'))).toEqual({
        status: 'started',
        battleId: 'battle-0001'
      });
    });

    it('ignores invasions while real-time invasions are disabled', () => {
      const { orchestrator } = setup({ settings: { enableRealTimeInvasions: false } });
      expect(orchestrator.handleInvasion(invasion('threat-0003'))).toEqual({
        status: 'ignored',
        reason: 'disabled'
      });
      expect(orchestrator.getActiveBattleCount()).toBe(0);
    });
  });

  it('isolates subsystem update faults during a tick', () => {
    const { orchestrator, events } = setup({
      providers: [new PassiveSubsystem('pest'), new ExplodingSubsystem('network', 'update')]
    });
    const faults = vi.fn();
    events.on('subsystemFault', faults);
    orchestrator.startBattle(config('resilient'));

    orchestrator.update(2);

    expect(faults).toHaveBeenCalledTimes(1);
    expect(faults.mock.calls[0][0]).toMatchObject({ kind: 'network', hook: 'update' });
    expect(orchestrator.getBattle('battle-0001')?.durationSeconds).toBe(2);
  });

  it('ends a battle whose update throws and keeps its siblings advancing', () => {
    const events = new InterruptingEventBus();
    const { orchestrator } = setup({ events });
    orchestrator.startBattle(config('fragile', { timeLimitSeconds: 1 }));
    orchestrator.startBattle(config('steady', { progressRate: 0.25 }));
    events.interruptedBattleId = 'battle-0001';

    orchestrator.update(1);

    expect(orchestrator.getBattleHistory().map((result) => [result.battleId, result.outcome])).toEqual([
      ['battle-0001', 'error']
    ]);
    expect(
      orchestrator.getActiveBattles().map((battle) => [battle.id, battle.durationSeconds, battle.progress])
    ).toEqual([['battle-0002', 1, 0.25]]);

    orchestrator.update(1);
    expect(orchestrator.getBattle('battle-0002')?.progress).toBe(0.5);
  });

  it('keeps only the most recent results', () => {
    const { orchestrator } = setup({ settings: { maxBattleHistory: 2 } });
    for (const name of ['one', 'two', 'three']) {
      const result = orchestrator.startBattle(config(name));
      if (result.success) {
        orchestrator.endBattle(result.battleId, 'draw');
      }
    }

    expect(orchestrator.getBattleHistory().map((result) => result.battleId)).toEqual([
      'battle-0002',
      'battle-0003'
    ]);
  });

  it('abandons every active battle on shutdown even when profiles fail', () => {
    const failingProfiles: PlayerProfileStore = {
      get: () => {
        throw new Error('store offline');
      },
      save: () => undefined
    };
    const { orchestrator, phases } = setup({ profiles: failingProfiles });
    orchestrator.startBattle(config('alpha'));
    orchestrator.startBattle(config('beta'));
    orchestrator.queueBattle(config('gamma'));

    orchestrator.shutdown();

    expect(orchestrator.getActiveBattleCount()).toBe(0);
    expect(orchestrator.getPendingCount()).toBe(0);
    expect(orchestrator.isActive()).toBe(false);
    expect(orchestrator.getBattleHistory().map((result) => result.outcome)).toEqual([
      'abandoned',
      'abandoned'
    ]);
    expect(phases.filter((change) => change.phase === 'abandoned')).toHaveLength(2);

    const after = orchestrator.startBattle(config('late'));
    expect(after.success).toBe(false);
    if (!after.success) {
      expect(after.error.message).toBe('Battle admission denied (inactive)');
    }
  });
});
