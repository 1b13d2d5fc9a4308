/**
 * Flare prediction pipeline types
 */

import type { Prediction } from '../predictions/prediction.types.js';

export const PIPELINE_STEP_NAMES = [
  'DETERMINE_WINDOW',
  'FETCH_NEW',
  'PERSIST_OBSERVATIONS',
  'LOAD_MODEL_WINDOW',
  'LOAD_MODEL',
  'SCORE',
  'PERSIST_PREDICTION',
] as const;

export type PipelineStepName = (typeof PIPELINE_STEP_NAMES)[number];

/**
 * COMPLETED       prediction written
 * NO_NEW_DATA     feed returned nothing, no writes
 * NO_MODEL_INPUT  observations written, model window empty, no prediction
 */
export type PipelineOutcome = 'COMPLETED' | 'NO_NEW_DATA' | 'NO_MODEL_INPUT';

export interface PipelineStepResult {
  name: PipelineStepName;
  ok: boolean;
  ms: number;
  details?: Record<string, unknown>;
  error?: string;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface FetchWindow extends TimeWindow {
  /** start before the buffer was applied */
  anchor: Date;
  coldStart: boolean;
  clamped: boolean;
}

export interface PipelineWindowConfig {
  /** hours of history the scorer consumes */
  modelLookbackHours: number;
  /** furthest back a fetch may start */
  maxRetrievalHours: number;
  /** overlap subtracted from the fetch start */
  bufferHours: number;
}

export interface PipelineMetrics {
  fetched: number;
  observationsInserted: number;
  observationsUpdated: number;
  modelInputSize: number;
}

export interface PipelineContext {
  runId: string;
  now: Date;
  steps: PipelineStepResult[];
  metrics: PipelineMetrics;
  fetchWindow: FetchWindow | null;
  modelWindow: TimeWindow | null;
}

export interface PipelineRunResult {
  ok: true;
  runId: string;
  outcome: PipelineOutcome;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  fetchWindow: FetchWindow | null;
  modelWindow: TimeWindow | null;
  metrics: PipelineMetrics;
  prediction: Prediction | null;
  steps: PipelineStepResult[];
}
