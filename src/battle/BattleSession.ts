import {
  isTerminalPhase,
  type Battle,
  type BattleConfig,
  type BattleDifficulty,
  type BattleOutcome,
  type BattlePhase
} from './types.ts';

export const DEFAULT_TIME_LIMIT_SECONDS = 300;
export const DEFAULT_PROGRESS_RATE = 0.01;

export const DIFFICULTY_PROGRESS_SCALE: Readonly<Record<BattleDifficulty, number>> = Object.freeze({
  easy: 1.5,
  normal: 1,
  hard: 0.75,
  expert: 0.5
});

export function resolveProgressRate(config: BattleConfig): number {
  const base =
    typeof config.progressRate === 'number' && Number.isFinite(config.progressRate)
      ? Math.max(0, config.progressRate)
      : DEFAULT_PROGRESS_RATE;
  return base * DIFFICULTY_PROGRESS_SCALE[config.difficulty ?? 'normal'];
}

export function snapshotBattle(battle: Battle): Battle {
  return {
    ...battle,
    participantIds: [...battle.participantIds],
    secondaryThreatIds: [...battle.secondaryThreatIds],
    scores: { ...battle.scores }
  };
}

/**
 * Phase state machine for one battle:
 * `preparation -> active -> resolution -> ended`, with `abandoned` reachable
 * from every non-terminal phase. Terminal phases ignore further transitions.
 */
export class BattleSession {
  private readonly battle: Battle;
  private readonly progressRate: number;
  private resolvedOutcome: BattleOutcome | null = null;

  constructor(battle: Battle, progressRate: number) {
    this.battle = battle;
    this.progressRate = Number.isFinite(progressRate) ? Math.max(0, progressRate) : 0;
  }

  get id(): string {
    return this.battle.id;
  }

  getCurrentPhase(): BattlePhase {
    return this.battle.phase;
  }

  getBattle(): Battle {
    return snapshotBattle(this.battle);
  }

  /** `victory` or `timeout` once the session has reached resolution. */
  getResolvedOutcome(): BattleOutcome | null {
    return this.resolvedOutcome;
  }

  isTerminal(): boolean {
    return isTerminalPhase(this.battle.phase);
  }

  start(): boolean {
    if (this.battle.phase !== 'preparation') {
      return false;
    }
    this.battle.phase = 'active';
    return true;
  }

  advance(dt: number): BattlePhase {
    if (this.battle.phase !== 'active' || !Number.isFinite(dt) || dt <= 0) {
      return this.battle.phase;
    }
    this.battle.durationSeconds += dt;
    this.battle.progress = Math.min(1, this.battle.progress + this.progressRate * dt);
    if (this.battle.progress >= 1) {
      this.resolve('victory');
    } else if (this.battle.durationSeconds >= this.battle.timeLimitSeconds) {
      this.resolve('timeout');
    }
    return this.battle.phase;
  }

  reportProgress(delta: number): boolean {
    if (this.battle.phase !== 'active' || !Number.isFinite(delta)) {
      return false;
    }
    this.battle.progress = Math.max(0, Math.min(1, this.battle.progress + delta));
    if (this.battle.progress >= 1) {
      this.resolve('victory');
    }
    return true;
  }

  recordScore(participantId: string, points: number): boolean {
    if (this.battle.phase !== 'active' || !Number.isFinite(points)) {
      return false;
    }
    if (!this.battle.participantIds.includes(participantId)) {
      return false;
    }
    this.battle.scores[participantId] = (this.battle.scores[participantId] ?? 0) + points;
    return true;
  }

  end(outcome: BattleOutcome): boolean {
    if (this.isTerminal()) {
      return false;
    }
    this.battle.phase =
      this.battle.phase === 'resolution' && outcome !== 'abandoned' ? 'ended' : 'abandoned';
    this.battle.outcome = outcome;
    return true;
  }

  private resolve(outcome: BattleOutcome): void {
    this.battle.phase = 'resolution';
    this.resolvedOutcome = outcome;
  }
}
