import type { Battle } from '../battle/types.ts';
import type { Subsystem, SubsystemKind, SubsystemMetrics } from './types.ts';

/**
 * Shared bookkeeping for providers. Per-battle state lives in a map keyed by
 * battle id and is dropped in `reset`, so nothing carries over between
 * battles.
 */
export abstract class BaseSubsystem<State = Record<string, unknown>> implements Subsystem {
  abstract readonly kind: SubsystemKind;

  private initialized = false;
  private readonly battles = new Map<string, State>();
  private activations = 0;
  private resets = 0;
  private readonly counters: Record<string, number> = {};

  initialize(): void {
    if (this.initialized) {
      return;
    }
    this.onInitialize();
    this.initialized = true;
  }

  activate(battle: Battle): void {
    if (this.battles.has(battle.id)) {
      return;
    }
    this.battles.set(battle.id, this.createBattleState(battle));
    this.activations += 1;
  }

  deactivate(battle: Battle): void {
    const state = this.battles.get(battle.id);
    if (state === undefined) {
      return;
    }
    this.onDeactivate(battle, state);
  }

  reset(battleId: string): void {
    if (this.battles.delete(battleId)) {
      this.resets += 1;
    }
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  hasBattle(battleId: string): boolean {
    return this.battles.has(battleId);
  }

  getMetrics(): SubsystemMetrics {
    return {
      kind: this.kind,
      initialized: this.initialized,
      activeBattles: this.battles.size,
      activations: this.activations,
      resets: this.resets,
      counters: { ...this.counters }
    };
  }

  protected abstract createBattleState(battle: Battle): State;

  protected onInitialize(): void {}

  protected onDeactivate(_battle: Battle, _state: State): void {}

  protected getBattleState(battleId: string): State | undefined {
    return this.battles.get(battleId);
  }

  protected battleIds(): string[] {
    return [...this.battles.keys()];
  }

  protected increment(counter: string, amount = 1): void {
    this.counters[counter] = (this.counters[counter] ?? 0) + amount;
  }
}

interface PassiveBattleState {
  readonly battleId: string;
  readonly participants: number;
  elapsedSeconds: number;
}

/**
 * Provider that only tracks the battles it serves and how long they have run.
 * Stands in for every capability the runtime is not given a real provider for.
 */
export class PassiveSubsystem extends BaseSubsystem<PassiveBattleState> {
  readonly kind: SubsystemKind;

  constructor(kind: SubsystemKind) {
    super();
    this.kind = kind;
  }

  update(deltaSeconds: number): void {
    if (!Number.isFinite(deltaSeconds) || deltaSeconds <= 0) {
      return;
    }
    for (const battleId of this.battleIds()) {
      const state = this.getBattleState(battleId);
      if (state) {
        state.elapsedSeconds += deltaSeconds;
      }
    }
    this.increment('updates');
  }

  getBattleElapsed(battleId: string): number | null {
    return this.getBattleState(battleId)?.elapsedSeconds ?? null;
  }

  protected createBattleState(battle: Battle): PassiveBattleState {
    this.increment('participantsServed', battle.participantIds.length);
    return { battleId: battle.id, participants: battle.participantIds.length, elapsedSeconds: 0 };
  }

  protected onDeactivate(_battle: Battle, state: PassiveBattleState): void {
    this.increment('secondsServed', state.elapsedSeconds);
  }
}
