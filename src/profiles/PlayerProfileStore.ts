import type { BattleOutcome } from '../battle/types.ts';

export interface PlayerProfile {
  readonly playerId: string;
  readonly totalBattles: number;
  readonly wins: number;
  readonly losses: number;
  /** wins / totalBattles, 0 before the first battle. */
  readonly winRate: number;
  readonly experience: number;
  readonly totalBattleSeconds: number;
}

export interface PlayerProfileStore {
  get(playerId: string): PlayerProfile | null;
  save(profile: PlayerProfile): void;
}

export const BASE_BATTLE_EXPERIENCE = 100;
export const VICTORY_EXPERIENCE_BONUS = 50;
export const SCORE_EXPERIENCE_FACTOR = 0.1;
export const MINIMUM_BATTLE_EXPERIENCE = 10;

export function createPlayerProfile(playerId: string): PlayerProfile {
  return {
    playerId,
    totalBattles: 0,
    wins: 0,
    losses: 0,
    winRate: 0,
    experience: 0,
    totalBattleSeconds: 0
  };
}

export function calculateBattleExperience(victory: boolean, score: number): number {
  const safeScore = Number.isFinite(score) ? score : 0;
  const experience =
    BASE_BATTLE_EXPERIENCE +
    (victory ? VICTORY_EXPERIENCE_BONUS : 0) +
    safeScore * SCORE_EXPERIENCE_FACTOR;
  return Math.max(MINIMUM_BATTLE_EXPERIENCE, experience);
}

export interface BattleRecord {
  readonly outcome: BattleOutcome;
  readonly durationSeconds: number;
  readonly experience: number;
}

/** Anything other than a victory counts as a loss. */
export function applyBattleRecord(profile: PlayerProfile, record: BattleRecord): PlayerProfile {
  const victory = record.outcome === 'victory';
  const totalBattles = profile.totalBattles + 1;
  const wins = profile.wins + (victory ? 1 : 0);
  return {
    playerId: profile.playerId,
    totalBattles,
    wins,
    losses: profile.losses + (victory ? 0 : 1),
    winRate: wins / totalBattles,
    experience: profile.experience + record.experience,
    totalBattleSeconds: profile.totalBattleSeconds + Math.max(0, record.durationSeconds)
  };
}

export class InMemoryPlayerProfileStore implements PlayerProfileStore {
  private readonly profiles = new Map<string, PlayerProfile>();

  get(playerId: string): PlayerProfile | null {
    const profile = this.profiles.get(playerId);
    return profile ? { ...profile } : null;
  }

  save(profile: PlayerProfile): void {
    this.profiles.set(profile.playerId, { ...profile });
  }

  list(): PlayerProfile[] {
    return Array.from(this.profiles.values(), (profile) => ({ ...profile }));
  }

  clear(): void {
    this.profiles.clear();
  }
}
