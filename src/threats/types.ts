export type ThreatCategory =
  | 'sucking-insects'
  | 'chewing-insects'
  | 'fungal-disease'
  | 'bacterial-disease'
  | 'viral-disease'
  | 'nematode-infestation'
  | 'physiological-stress'
  | 'environmental-stress';

export type ResponseCategory =
  | 'biological-control'
  | 'chemical-intervention'
  | 'environmental-modification'
  | 'physical-removal'
  | 'quarantine-measures'
  | 'systemic-treatment'
  | 'preventive-maintenance';

export type OriginLocation = 'vegetative-zone' | 'flowering-zone' | 'propagation-area' | 'drying-room';

export interface Threat {
  readonly id: string;
  readonly category: ThreatCategory;
  readonly originLocation: OriginLocation;
  /** Clamped to [0, 1]. */
  severity: number;
  spreadRadius: number;
  /** Fraction of growth neutralised by the response, [0, 1]. */
  containmentEffectiveness: number;
  contained: boolean;
  readonly requiredResponse: ResponseCategory;
  /** Simulation seconds at generation. */
  readonly detectedAt: number;
}

export interface ThreatIncident {
  readonly id: string;
  readonly occurredAt: number;
  readonly category: ThreatCategory;
  readonly resolvedAt: number;
  readonly resolutionSeconds: number;
  readonly resolutionMethod: ResponseCategory;
  readonly preventionScore: number;
}

/** Sensor snapshot supplied by the environmental subsystem. */
export interface EnvironmentalConditions {
  /** Degrees Celsius. */
  readonly temperature: number;
  /** Relative humidity, percent. */
  readonly humidity: number;
  /** Circulation index, 0 (stagnant) to 1. */
  readonly airflow: number;
  /** Sanitation index, 0 (poor) to 1. */
  readonly sanitation: number;
  /** Plant stress index, 0 (healthy) to 1. */
  readonly plantStress: number;
}

export type RiskFactor = 'temperature' | 'humidity' | 'airflow' | 'sanitation' | 'plantStress';

export type HighRiskFactor =
  | 'extreme-temperature'
  | 'humidity-imbalance'
  | 'poor-ventilation'
  | 'sanitation-issues'
  | 'plant-stress';

export interface EnvironmentalRiskAssessment {
  readonly temperature: number;
  readonly humidity: number;
  readonly airflow: number;
  readonly sanitation: number;
  readonly plantStress: number;
  readonly overall: number;
  readonly assessedAt: number;
  readonly highRiskFactors: readonly HighRiskFactor[];
}

export interface EnvironmentalSensor {
  sample(): EnvironmentalConditions;
}

/** Read side of the active-threat set, consumed by the invasion detector. */
export interface ThreatSource {
  getActiveThreats(): Threat[];
}
