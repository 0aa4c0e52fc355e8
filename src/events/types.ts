import type { Battle, BattleConfig, BattlePhase, BattleResult } from '../battle/types.ts';
import type { CreationError } from '../core/errors.ts';
import type { SubsystemFault } from '../subsystems/types.ts';
import type { Threat, ThreatCategory, ThreatIncident } from '../threats/types.ts';

export interface ThreatDetectedPayload {
  threat: Threat;
}

export interface ThreatResolvedPayload {
  incident: ThreatIncident;
}

export interface ThreatEscalatedPayload {
  threat: Threat;
}

export interface InvasionDetectedPayload {
  threatId: string;
  category: ThreatCategory;
  threat: Threat;
  detectedAt: number;
}

export interface BattleQueuedPayload {
  config: BattleConfig;
  position: number;
}

export interface BattleStartedPayload {
  battle: Battle;
}

export interface BattlePhaseChangedPayload {
  battleId: string;
  previous: BattlePhase;
  phase: BattlePhase;
}

export interface BattleEndedPayload {
  battle: Battle;
  result: BattleResult;
}

export interface BattleCreationFailedPayload {
  config: BattleConfig;
  error: CreationError;
}

export type SubsystemFaultPayload = SubsystemFault;

export interface SensorFaultPayload {
  message: string;
  error: unknown;
  at: number;
}

/** Notification names and payloads carried by the engine's event bus. */
export type EngineEvents = {
  threatDetected: ThreatDetectedPayload;
  threatResolved: ThreatResolvedPayload;
  threatEscalated: ThreatEscalatedPayload;
  invasionDetected: InvasionDetectedPayload;
  battleQueued: BattleQueuedPayload;
  battleStarted: BattleStartedPayload;
  battlePhaseChanged: BattlePhaseChangedPayload;
  battleEnded: BattleEndedPayload;
  battleCreationFailed: BattleCreationFailedPayload;
  subsystemFault: SubsystemFaultPayload;
  sensorFault: SensorFaultPayload;
};

export type EngineEventName = keyof EngineEvents;
