/**
 * Placeholder flare-risk scorer.
 *
 * risk:        mean flux against two thresholds (GOES X-class / C-class by default)
 * probability: mean flux / latest flux, clamped to [0, 1]
 */

import type { Observation } from '../observations/observation.types.js';
import type { Prediction, RiskLevel } from '../predictions/prediction.types.js';
import type { ModelHandle, ScoringFunction } from './flare-model.types.js';

export const PLACEHOLDER_MODEL_VERSION = 'placeholder-1.0.0';

export interface RiskThresholds {
  high: number;
  medium: number;
}

export const DEFAULT_THRESHOLDS: RiskThresholds = { high: 1e-4, medium: 1e-6 };

export function classifyRisk(meanFlux: number, thresholds: RiskThresholds = DEFAULT_THRESHOLDS): RiskLevel {
  if (meanFlux > thresholds.high) return 'High';
  if (meanFlux > thresholds.medium) return 'Medium';
  return 'Low';
}

export function clampProbability(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function settingsFor(model: ModelHandle): { thresholds: RiskThresholds; version: string } {
  if (model.kind === 'loaded') {
    return { thresholds: model.artifact.thresholds, version: model.artifact.version };
  }
  return { thresholds: DEFAULT_THRESHOLDS, version: PLACEHOLDER_MODEL_VERSION };
}

export const scoreFlareRisk: ScoringFunction = (
  model: ModelHandle,
  observations: readonly Observation[],
  at: Date = new Date(),
): Prediction => {
  const latest = observations.reduce<Observation | undefined>(
    (acc, o) => (!acc || o.timestamp.getTime() > acc.timestamp.getTime() ? o : acc),
    undefined,
  );
  if (!latest) {
    throw new Error('scoreFlareRisk called with an empty observation window');
  }

  const { thresholds, version } = settingsFor(model);
  const meanFlux = observations.reduce((sum, o) => sum + o.flux, 0) / observations.length;
  const ratio = latest.flux === 0 ? 0 : meanFlux / latest.flux;

  return {
    timestamp: new Date(at.getTime()),
    probability: clampProbability(ratio),
    riskLevel: classifyRisk(meanFlux, thresholds),
    modelVersion: version,
  };
};
