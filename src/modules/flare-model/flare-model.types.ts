/**
 * Flare model contracts
 *
 * The pipeline only sees ModelRegistry and ScoringFunction; what the handle
 * holds is between the registry and the scorer.
 */

import { z } from 'zod';
import type { Observation } from '../observations/observation.types.js';
import type { Prediction } from '../predictions/prediction.types.js';

export const ModelArtifactSchema = z
  .object({
    version: z.string().min(1),
    thresholds: z.object({
      high: z.number().positive(),
      medium: z.number().positive(),
    }),
  })
  .refine((a) => a.thresholds.medium < a.thresholds.high, {
    message: 'thresholds.medium must be below thresholds.high',
    path: ['thresholds'],
  });

export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;

export type ModelHandle =
  | { kind: 'placeholder' }
  | { kind: 'loaded'; source: string; artifact: ModelArtifact };

export interface ModelRegistry {
  loadModel(): Promise<ModelHandle>;
}

/** Must not be called with an empty window */
export type ScoringFunction = (
  model: ModelHandle,
  observations: readonly Observation[],
  at?: Date,
) => Prediction;
