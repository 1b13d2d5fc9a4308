/**
 * Prediction: one flare-risk forecast computed at one instant from the
 * model-input window. Keyed by its own timestamp.
 */

import { z } from 'zod';

export const RISK_LEVELS = ['Low', 'Medium', 'High'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export interface Prediction {
  timestamp: Date;
  /** Likelihood of an M-class or stronger flare, within [0, 1] */
  probability: number;
  riskLevel: RiskLevel;
  modelVersion: string;
}

export interface PredictionDto {
  timestamp: string;
  probability: number;
  risk_level: RiskLevel;
  model_version: string;
}

export interface HistoricalPredictionsResponse {
  ok: true;
  record_count: number;
  timeframe_hours: number;
  data: PredictionDto[];
}

export function toPredictionDto(p: Prediction): PredictionDto {
  return {
    timestamp: p.timestamp.toISOString(),
    probability: p.probability,
    risk_level: p.riskLevel,
    model_version: p.modelVersion,
  };
}

/** Runtime check of the Prediction contract, for scorer output and stored rows */
export const PredictionSchema = z.object({
  timestamp: z.date(),
  probability: z.number().finite().min(0).max(1),
  riskLevel: z.enum(RISK_LEVELS),
  modelVersion: z.string().min(1),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
