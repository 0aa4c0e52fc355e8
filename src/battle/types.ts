export type BattlePhase = 'preparation' | 'active' | 'resolution' | 'ended' | 'abandoned';

export type BattleOutcome = 'victory' | 'defeat' | 'draw' | 'timeout' | 'abandoned' | 'error';

export type BattleDifficulty = 'easy' | 'normal' | 'hard' | 'expert';

export type BattleOrigin = 'manual' | 'invasion';

export interface BattleConfig {
  name: string;
  participantIds: readonly string[];
  primaryThreatId?: string | null;
  secondaryThreatIds?: readonly string[];
  difficulty?: BattleDifficulty;
  /** Seconds the battle may stay active before it times out. */
  timeLimitSeconds?: number;
  /** Progress accrued per active second before difficulty scaling. */
  progressRate?: number;
  origin?: BattleOrigin;
}

export interface Battle {
  readonly id: string;
  readonly name: string;
  readonly primaryThreatId: string | null;
  readonly secondaryThreatIds: readonly string[];
  readonly difficulty: BattleDifficulty;
  readonly origin: BattleOrigin;
  phase: BattlePhase;
  progress: number;
  readonly participantIds: readonly string[];
  scores: Record<string, number>;
  readonly startedAt: number;
  durationSeconds: number;
  readonly timeLimitSeconds: number;
  outcome: BattleOutcome | null;
}

export interface BattleResult {
  readonly battleId: string;
  readonly outcome: BattleOutcome;
  readonly victory: boolean;
  readonly durationSeconds: number;
  readonly scores: Readonly<Record<string, number>>;
  /** Experience granted to each participant. */
  readonly experienceAwarded: Readonly<Record<string, number>>;
}

export const TERMINAL_PHASES: ReadonlySet<BattlePhase> = new Set<BattlePhase>(['ended', 'abandoned']);

export function isTerminalPhase(phase: BattlePhase): boolean {
  return TERMINAL_PHASES.has(phase);
}
