export {
  ThreatBattleRuntime,
  type EngineConfigInput,
  type HealthStatus,
  type RuntimeHealthCheck,
  type RuntimeHealthMetrics,
  type RuntimeMetrics,
  type ThreatBattleRuntimeOptions
} from './runtime/ThreatBattleRuntime.ts';

export {
  ThreatSimulationEngine,
  CATEGORY_RULES,
  type ThreatSimulationEngineOptions,
  type ThreatSimulationSettings
} from './threats/ThreatSimulationEngine.ts';
export { InvasionDetector, type InvasionDetectorOptions } from './threats/InvasionDetector.ts';
export { assessEnvironmentalRisk, humidityRisk, temperatureRisk } from './threats/risk.ts';
export {
  HIGH_RISK_THRESHOLD,
  ORIGIN_LOCATIONS,
  THREAT_CATEGORIES,
  resolveRequiredResponse
} from './threats/catalog.ts';
export type * from './threats/types.ts';

export {
  BattleOrchestrator,
  type AdmissionContext,
  type AdmissionGate,
  type BattleOrchestratorOptions,
  type InvasionResponse,
  type OrchestratorSettings,
  type StartBattleResult
} from './battle/BattleOrchestrator.ts';
export {
  BattleSession,
  DEFAULT_PROGRESS_RATE,
  DEFAULT_TIME_LIMIT_SECONDS,
  DIFFICULTY_PROGRESS_SCALE,
  resolveProgressRate
} from './battle/BattleSession.ts';
export { TERMINAL_PHASES, isTerminalPhase } from './battle/types.ts';
export type * from './battle/types.ts';

export { BaseSubsystem, PassiveSubsystem } from './subsystems/BaseSubsystem.ts';
export {
  SubsystemRegistry,
  createDefaultSubsystems,
  type ActivationReport,
  type SubsystemRegistryOptions
} from './subsystems/SubsystemRegistry.ts';
export { SUBSYSTEM_KINDS } from './subsystems/types.ts';
export type * from './subsystems/types.ts';

export {
  InMemoryPlayerProfileStore,
  applyBattleRecord,
  calculateBattleExperience,
  createPlayerProfile,
  type PlayerProfile,
  type PlayerProfileStore
} from './profiles/PlayerProfileStore.ts';

export { EventBus, createEngineEventBus, type EngineEventBus } from './events/index.ts';
export type * from './events/types.ts';

export {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  sanitizeEngineConfig,
  validateEngineConfig,
  type EngineConfig
} from './core/config.ts';
export {
  AdmissionDeniedError,
  ConfigurationError,
  CreationError,
  EngineError,
  NotFoundError,
  describeError,
  isEngineError
} from './core/errors.ts';
export { createIdFactory, type IdFactory } from './core/ids.ts';
export { type RandomSource } from './core/random.ts';
export { SimulationClock } from './core/SimulationClock.ts';
export { TickClock, type StepCallback, type TickClockOptions } from './core/TickClock.ts';

export { createLogger, silentLogger, withScope, type Logger, type LogLevel } from './telemetry/logger.ts';
export { LogStore, type LogEntry, type LogChange, type LogEventPayload } from './telemetry/LogStore.ts';
export { TelemetryBuffer, emitStructuredTelemetry } from './telemetry/structured.ts';
