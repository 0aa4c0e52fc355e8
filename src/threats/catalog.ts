import type { OriginLocation, ResponseCategory, ThreatCategory } from './types.ts';

export const THREAT_CATEGORIES: readonly ThreatCategory[] = Object.freeze([
  'sucking-insects',
  'chewing-insects',
  'fungal-disease',
  'bacterial-disease',
  'viral-disease',
  'nematode-infestation',
  'physiological-stress',
  'environmental-stress'
]);

export const ORIGIN_LOCATIONS: readonly OriginLocation[] = Object.freeze([
  'vegetative-zone',
  'flowering-zone',
  'propagation-area',
  'drying-room'
]);

const RESPONSE_BY_CATEGORY: Readonly<Partial<Record<ThreatCategory, ResponseCategory>>> =
  Object.freeze({
    'sucking-insects': 'biological-control',
    'fungal-disease': 'environmental-modification',
    'bacterial-disease': 'quarantine-measures',
    'viral-disease': 'physical-removal'
  });

export function resolveRequiredResponse(category: ThreatCategory): ResponseCategory {
  return RESPONSE_BY_CATEGORY[category] ?? 'preventive-maintenance';
}

export const HIGH_RISK_THRESHOLD = 0.7;
