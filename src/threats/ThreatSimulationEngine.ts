import type { EngineConfig } from '../core/config.ts';
import { describeError } from '../core/errors.ts';
import { createIdFactory, type IdFactory } from '../core/ids.ts';
import { clamp01, defaultRandom, pickRandom, randomRange, type RandomSource } from '../core/random.ts';
import { SimulationClock } from '../core/SimulationClock.ts';
import type { EngineEventBus } from '../events/index.ts';
import { createLogger, type Logger } from '../telemetry/logger.ts';
import { ORIGIN_LOCATIONS, THREAT_CATEGORIES, resolveRequiredResponse } from './catalog.ts';
import { NEUTRAL_RISK, assessEnvironmentalRisk } from './risk.ts';
import type {
  EnvironmentalConditions,
  EnvironmentalRiskAssessment,
  EnvironmentalSensor,
  Threat,
  ThreatCategory,
  ThreatIncident,
  ThreatSource
} from './types.ts';

export type ThreatSimulationSettings = Pick<
  EngineConfig,
  | 'enableThreatGeneration'
  | 'baseThreatLevel'
  | 'environmentalStressMultiplier'
  | 'threatSpreadRate'
  | 'maxSimultaneousThreats'
  | 'riskAssessmentInterval'
  | 'threatGenerationInterval'
>;

export interface ThreatSimulationEngineOptions {
  readonly settings: ThreatSimulationSettings;
  readonly events?: EngineEventBus | null;
  readonly clock?: SimulationClock;
  readonly random?: RandomSource;
  readonly idFactory?: IdFactory;
  readonly sensor?: EnvironmentalSensor | null;
  readonly logger?: Logger;
}

interface CategoryRule {
  readonly category: ThreatCategory;
  readonly matches: (risk: EnvironmentalRiskAssessment) => boolean;
}

/** First matching rule wins; no match falls back to a uniform pick. */
export const CATEGORY_RULES: readonly CategoryRule[] = Object.freeze<CategoryRule[]>([
  {
    category: 'fungal-disease',
    matches: (risk) => risk.humidity > 0.8 && risk.airflow > 0.6
  },
  {
    category: 'sucking-insects',
    matches: (risk) => risk.temperature > 0.7 && risk.plantStress > 0.5
  },
  {
    category: 'bacterial-disease',
    matches: (risk) => risk.sanitation > 0.6
  }
]);

export const RESOLUTION_CONTAINMENT = 0.95;
export const RESOLUTION_SEVERITY = 0.01;
export const CONTAINED_THRESHOLD = 0.7;
export const ESCALATION_RADIUS_FACTOR = 1.5;

const MAX_GENERATION_PASSES_PER_TICK = 6;

function copyThreat(threat: Threat): Threat {
  return { ...threat };
}

/**
 * Owns the active-threat set. Generates threats from environmental risk,
 * evolves them every tick and moves them into history once resolved.
 */
export class ThreatSimulationEngine implements ThreatSource {
  private readonly settings: ThreatSimulationSettings;
  private readonly events: EngineEventBus | null;
  private readonly clock: SimulationClock;
  private readonly random: RandomSource;
  private readonly makeId: IdFactory;
  private readonly sensor: EnvironmentalSensor | null;
  private readonly logger: Logger;
  private readonly active = new Map<string, Threat>();
  private history: ThreatIncident[] = [];
  private currentRisk: EnvironmentalRiskAssessment = NEUTRAL_RISK;
  private riskTimer: number;
  private generationTimer = 0;

  constructor(options: ThreatSimulationEngineOptions) {
    this.settings = { ...options.settings };
    this.events = options.events ?? null;
    this.clock = options.clock ?? new SimulationClock();
    this.random = options.random ?? defaultRandom;
    this.makeId = options.idFactory ?? createIdFactory('threat');
    this.sensor = options.sensor ?? null;
    this.logger = options.logger ?? createLogger('threats');
    // the first tick assesses immediately instead of waiting a full interval
    this.riskTimer = this.settings.riskAssessmentInterval;
  }

  /**
   * Advance the simulation. Risk is reassessed and generation evaluated on
   * their own intervals; evolution runs every tick.
   */
  tick(dt: number, conditions?: EnvironmentalConditions): void {
    if (!Number.isFinite(dt) || dt <= 0) {
      return;
    }

    this.riskTimer += dt;
    if (this.riskTimer >= this.settings.riskAssessmentInterval) {
      this.riskTimer %= this.settings.riskAssessmentInterval;
      const snapshot = conditions ?? this.sampleSensor();
      if (snapshot) {
        this.assessEnvironmentalRisk(snapshot);
      }
    }

    this.generationTimer += dt;
    let passes = 0;
    while (
      this.generationTimer >= this.settings.threatGenerationInterval &&
      passes < MAX_GENERATION_PASSES_PER_TICK
    ) {
      this.generationTimer -= this.settings.threatGenerationInterval;
      this.evaluateThreatGeneration();
      passes += 1;
    }
    if (passes === MAX_GENERATION_PASSES_PER_TICK) {
      this.generationTimer %= this.settings.threatGenerationInterval;
    }

    this.processThreatEvolution(dt);
  }

  assessEnvironmentalRisk(conditions: EnvironmentalConditions): EnvironmentalRiskAssessment {
    this.currentRisk = assessEnvironmentalRisk(conditions, this.clock.now());
    if (this.currentRisk.highRiskFactors.length > 0) {
      this.logger.info(
        `High-risk factors: ${this.currentRisk.highRiskFactors.join(', ')}`,
        { overall: this.currentRisk.overall }
      );
    }
    return this.currentRisk;
  }

  /**
   * One generation attempt. The chance is per evaluation, not per second, so
   * elapsed time plays no part here.
   */
  evaluateThreatGeneration(): Threat | null {
    if (!this.settings.enableThreatGeneration) {
      return null;
    }
    if (this.active.size >= this.settings.maxSimultaneousThreats) {
      return null;
    }
    const chance =
      this.settings.baseThreatLevel *
      (1 + this.currentRisk.overall * this.settings.environmentalStressMultiplier);
    if (this.random() < chance) {
      return this.generateThreat();
    }
    return null;
  }

  selectThreatCategory(risk: EnvironmentalRiskAssessment = this.currentRisk): ThreatCategory {
    for (const rule of CATEGORY_RULES) {
      if (rule.matches(risk)) {
        return rule.category;
      }
    }
    return pickRandom(this.random, THREAT_CATEGORIES);
  }

  /**
   * Grow every active threat by `dt` seconds. A threat escalates when its
   * severity crosses 1 from below; one already at 1 is held there.
   */
  processThreatEvolution(dt: number): void {
    const step = Number.isFinite(dt) && dt > 0 ? dt : 0;
    const rate = this.settings.threatSpreadRate;
    for (const threat of [...this.active.values()]) {
      const previousSeverity = threat.severity;
      threat.severity += rate * step * (1 - threat.containmentEffectiveness);
      threat.spreadRadius += 0.5 * rate * step;

      if (
        threat.containmentEffectiveness > RESOLUTION_CONTAINMENT ||
        threat.severity < RESOLUTION_SEVERITY
      ) {
        this.resolveThreat(threat);
      } else if (threat.severity > 1) {
        if (previousSeverity < 1) {
          this.escalateThreat(threat);
        } else {
          threat.severity = 1;
        }
      }
    }
  }

  containThreat(id: string, effectiveness: number): boolean {
    const threat = this.active.get(id);
    if (!threat) {
      return false;
    }
    const clamped = clamp01(effectiveness);
    threat.containmentEffectiveness = clamped;
    threat.contained = clamped > CONTAINED_THRESHOLD;
    return true;
  }

  /** Knock severity down directly, e.g. after a physical removal. */
  applyTreatment(id: string, severityReduction: number): boolean {
    const threat = this.active.get(id);
    if (!threat) {
      return false;
    }
    const reduction = Number.isFinite(severityReduction) ? Math.max(0, severityReduction) : 0;
    threat.severity = clamp01(threat.severity - reduction);
    return true;
  }

  triggerManualScan(conditions: EnvironmentalConditions): EnvironmentalRiskAssessment {
    const risk = this.assessEnvironmentalRisk(conditions);
    this.evaluateThreatGeneration();
    this.processThreatEvolution(0);
    this.logger.info(`Manual threat scan completed - risk level ${risk.overall.toFixed(2)}`);
    return risk;
  }

  getActiveThreats(): Threat[] {
    return Array.from(this.active.values(), copyThreat);
  }

  getActiveThreatCount(): number {
    return this.active.size;
  }

  getThreat(id: string): Threat | null {
    const threat = this.active.get(id);
    return threat ? copyThreat(threat) : null;
  }

  getThreatHistory(): ThreatIncident[] {
    return [...this.history];
  }

  getCurrentRisk(): EnvironmentalRiskAssessment {
    return this.currentRisk;
  }

  reset(): void {
    this.active.clear();
    this.history = [];
    this.currentRisk = NEUTRAL_RISK;
    this.riskTimer = this.settings.riskAssessmentInterval;
    this.generationTimer = 0;
  }

  private sampleSensor(): EnvironmentalConditions | null {
    if (!this.sensor) {
      return null;
    }
    try {
      return this.sensor.sample();
    } catch (error) {
      const message = describeError(error);
      this.logger.warn(`Environmental sensor failed: ${message}`);
      this.events?.emit('sensorFault', { message, error, at: this.clock.now() });
      return null;
    }
  }

  private generateThreat(): Threat {
    const category = this.selectThreatCategory();
    const threat: Threat = {
      id: this.makeId(),
      category,
      originLocation: pickRandom(this.random, ORIGIN_LOCATIONS),
      severity: randomRange(this.random, 0.1, 0.7),
      spreadRadius: randomRange(this.random, 1, 5),
      containmentEffectiveness: 0,
      contained: false,
      requiredResponse: resolveRequiredResponse(category),
      detectedAt: this.clock.now()
    };
    this.active.set(threat.id, threat);
    this.logger.info(
      `New ${category} threat detected: ${threat.id} (severity ${threat.severity.toFixed(2)})`
    );
    this.events?.emit('threatDetected', { threat: copyThreat(threat) });
    return copyThreat(threat);
  }

  private resolveThreat(threat: Threat): void {
    const now = this.clock.now();
    threat.severity = clamp01(threat.severity);
    const incident: ThreatIncident = Object.freeze({
      id: threat.id,
      occurredAt: threat.detectedAt,
      category: threat.category,
      resolvedAt: now,
      resolutionSeconds: now - threat.detectedAt,
      resolutionMethod: threat.requiredResponse,
      preventionScore: 1 - threat.severity
    });
    this.active.delete(threat.id);
    this.history.push(incident);
    this.logger.info(
      `Threat resolved: ${threat.id} in ${(incident.resolutionSeconds / 60).toFixed(1)} minutes`
    );
    this.events?.emit('threatResolved', { incident });
  }

  private escalateThreat(threat: Threat): void {
    threat.severity = 1;
    threat.spreadRadius *= ESCALATION_RADIUS_FACTOR;
    this.logger.warn(`CRITICAL: threat ${threat.id} has escalated to maximum severity`);
    this.events?.emit('threatEscalated', { threat: copyThreat(threat) });
  }
}
