import { ConfigurationError } from './errors.ts';

export interface EngineConfig {
  enableRealTimeInvasions: boolean;
  enableAIOpponents: boolean;
  enableThreatGeneration: boolean;
  maxConcurrentBattles: number;
  /** Seconds between invasion polls. */
  invasionCheckInterval: number;
  baseThreatLevel: number;
  environmentalStressMultiplier: number;
  threatSpreadRate: number;
  maxSimultaneousThreats: number;
  riskAssessmentInterval: number;
  threatGenerationInterval: number;
  invasionBattleTimeLimit: number;
  defaultDefenderId: string;
  maxBattleHistory: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  enableRealTimeInvasions: true,
  enableAIOpponents: false,
  enableThreatGeneration: true,
  maxConcurrentBattles: 3,
  invasionCheckInterval: 30,
  baseThreatLevel: 0.15,
  environmentalStressMultiplier: 1.5,
  threatSpreadRate: 0.25,
  maxSimultaneousThreats: 5,
  riskAssessmentInterval: 300,
  threatGenerationInterval: 600,
  invasionBattleTimeLimit: 60,
  defaultDefenderId: 'defender',
  maxBattleHistory: 100
});

type ConfigRecord = Partial<Record<keyof EngineConfig, unknown>>;

function sanitizeBoolean(value: unknown, fallback: boolean): boolean {
  if (value === true || value === 'true') {
    return true;
  }
  if (value === false || value === 'false') {
    return false;
  }
  return fallback;
}

function sanitizeNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? Number.NaN : parsed;
  }
  return value === undefined || value === null ? fallback : Number.NaN;
}

function sanitizeString(value: unknown, fallback: string): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  return value === undefined || value === null ? fallback : '';
}

/**
 * Fill defaults and coerce string-typed values. Out-of-range values are kept
 * as given so {@link validateEngineConfig} can report them.
 */
export function sanitizeEngineConfig(record: ConfigRecord | null | undefined): EngineConfig {
  const source: ConfigRecord = record ?? {};
  const defaults = DEFAULT_ENGINE_CONFIG;
  return {
    enableRealTimeInvasions: sanitizeBoolean(
      source.enableRealTimeInvasions,
      defaults.enableRealTimeInvasions
    ),
    enableAIOpponents: sanitizeBoolean(source.enableAIOpponents, defaults.enableAIOpponents),
    enableThreatGeneration: sanitizeBoolean(
      source.enableThreatGeneration,
      defaults.enableThreatGeneration
    ),
    maxConcurrentBattles: sanitizeNumber(source.maxConcurrentBattles, defaults.maxConcurrentBattles),
    invasionCheckInterval: sanitizeNumber(
      source.invasionCheckInterval,
      defaults.invasionCheckInterval
    ),
    baseThreatLevel: sanitizeNumber(source.baseThreatLevel, defaults.baseThreatLevel),
    environmentalStressMultiplier: sanitizeNumber(
      source.environmentalStressMultiplier,
      defaults.environmentalStressMultiplier
    ),
    threatSpreadRate: sanitizeNumber(source.threatSpreadRate, defaults.threatSpreadRate),
    maxSimultaneousThreats: sanitizeNumber(
      source.maxSimultaneousThreats,
      defaults.maxSimultaneousThreats
    ),
    riskAssessmentInterval: sanitizeNumber(
      source.riskAssessmentInterval,
      defaults.riskAssessmentInterval
    ),
    threatGenerationInterval: sanitizeNumber(
      source.threatGenerationInterval,
      defaults.threatGenerationInterval
    ),
    invasionBattleTimeLimit: sanitizeNumber(
      source.invasionBattleTimeLimit,
      defaults.invasionBattleTimeLimit
    ),
    defaultDefenderId: sanitizeString(source.defaultDefenderId, defaults.defaultDefenderId),
    maxBattleHistory: sanitizeNumber(source.maxBattleHistory, defaults.maxBattleHistory)
  } satisfies EngineConfig;
}

function isInteger(value: number, min: number): boolean {
  return Number.isInteger(value) && value >= min;
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/** Every problem with the configuration; an empty list means it is usable. */
export function validateEngineConfig(config: EngineConfig): string[] {
  const issues: string[] = [];
  if (!isInteger(config.maxConcurrentBattles, 1)) {
    issues.push('maxConcurrentBattles must be an integer >= 1');
  }
  if (!isPositive(config.invasionCheckInterval)) {
    issues.push('invasionCheckInterval must be > 0 seconds');
  }
  if (!isUnitInterval(config.baseThreatLevel)) {
    issues.push('baseThreatLevel must be within [0, 1]');
  }
  if (!isNonNegative(config.environmentalStressMultiplier)) {
    issues.push('environmentalStressMultiplier must be >= 0');
  }
  if (!isNonNegative(config.threatSpreadRate)) {
    issues.push('threatSpreadRate must be >= 0');
  }
  if (!isInteger(config.maxSimultaneousThreats, 0)) {
    issues.push('maxSimultaneousThreats must be an integer >= 0');
  }
  if (!isPositive(config.riskAssessmentInterval)) {
    issues.push('riskAssessmentInterval must be > 0 seconds');
  }
  if (!isPositive(config.threatGenerationInterval)) {
    issues.push('threatGenerationInterval must be > 0 seconds');
  }
  if (!isPositive(config.invasionBattleTimeLimit)) {
    issues.push('invasionBattleTimeLimit must be > 0 seconds');
  }
  if (config.defaultDefenderId.length === 0) {
    issues.push('defaultDefenderId must be a non-empty string');
  }
  if (!isInteger(config.maxBattleHistory, 1)) {
    issues.push('maxBattleHistory must be an integer >= 1');
  }
  return issues;
}

export function resolveEngineConfig(record: ConfigRecord | null | undefined): EngineConfig {
  const config = sanitizeEngineConfig(record);
  const issues = validateEngineConfig(config);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return config;
}
