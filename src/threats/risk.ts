import { clamp01 } from '../core/random.ts';
import { HIGH_RISK_THRESHOLD } from './catalog.ts';
import type {
  EnvironmentalConditions,
  EnvironmentalRiskAssessment,
  HighRiskFactor,
  RiskFactor
} from './types.ts';

const OPTIMAL_TEMPERATURE_C = 24;
const TEMPERATURE_TOLERANCE_C = 12;
const OPTIMAL_HUMIDITY_PCT = 55;
const HUMIDITY_TOLERANCE_PCT = 35;

const HIGH_RISK_LABELS: Record<RiskFactor, HighRiskFactor> = {
  temperature: 'extreme-temperature',
  humidity: 'humidity-imbalance',
  airflow: 'poor-ventilation',
  sanitation: 'sanitation-issues',
  plantStress: 'plant-stress'
};

const RISK_FACTORS: readonly RiskFactor[] = [
  'temperature',
  'humidity',
  'airflow',
  'sanitation',
  'plantStress'
];

export function temperatureRisk(celsius: number): number {
  return clamp01(Math.abs(celsius - OPTIMAL_TEMPERATURE_C) / TEMPERATURE_TOLERANCE_C);
}

export function humidityRisk(percent: number): number {
  return clamp01(Math.abs(percent - OPTIMAL_HUMIDITY_PCT) / HUMIDITY_TOLERANCE_PCT);
}

/**
 * Per-factor risks computed independently; `overall` is their mean and any
 * factor strictly above the high-risk threshold is flagged.
 */
export function assessEnvironmentalRisk(
  conditions: EnvironmentalConditions,
  assessedAt: number
): EnvironmentalRiskAssessment {
  const factors: Record<RiskFactor, number> = {
    temperature: temperatureRisk(conditions.temperature),
    humidity: humidityRisk(conditions.humidity),
    airflow: clamp01(1 - clamp01(conditions.airflow)),
    sanitation: clamp01(1 - clamp01(conditions.sanitation)),
    plantStress: clamp01(conditions.plantStress)
  };

  let total = 0;
  const highRiskFactors: HighRiskFactor[] = [];
  for (const factor of RISK_FACTORS) {
    total += factors[factor];
    if (factors[factor] > HIGH_RISK_THRESHOLD) {
      highRiskFactors.push(HIGH_RISK_LABELS[factor]);
    }
  }

  return Object.freeze({
    ...factors,
    overall: total / RISK_FACTORS.length,
    assessedAt,
    highRiskFactors: Object.freeze(highRiskFactors)
  });
}

export const NEUTRAL_RISK: EnvironmentalRiskAssessment = Object.freeze({
  temperature: 0,
  humidity: 0,
  airflow: 0,
  sanitation: 0,
  plantStress: 0,
  overall: 0,
  assessedAt: 0,
  highRiskFactors: Object.freeze([])
});
