/**
 * Pipeline trigger route
 *
 * POST /api/run-flare-prediction-pipeline
 *   Called by the external scheduler. Runs the pipeline to completion and
 *   answers 202 with a summary; fatal step errors go to the global error
 *   handler (5xx).
 */

import type { FastifyInstance } from 'fastify';
import { toPredictionDto, type PredictionDto } from '../predictions/prediction.types.js';
import type { FlarePredictionPipeline } from './pipeline.orchestrator.js';
import type { PipelineOutcome, PipelineRunResult } from './pipeline.types.js';
import { schedulerAuthHook, type SchedulerAuthVerifier } from './scheduler.auth.js';

export const PIPELINE_TRIGGER_PATH = '/api/run-flare-prediction-pipeline';

const OUTCOME_MESSAGES: Record<PipelineOutcome, string> = {
  COMPLETED: 'Prediction pipeline successfully completed.',
  NO_NEW_DATA: 'No new observation data fetched; pipeline finished without changes.',
  NO_MODEL_INPUT: 'No observations in the model window; no prediction produced.',
};

export interface PipelineStatusResponse {
  status: 'accepted';
  message: string;
  pipeline_completed_at: string;
  run: {
    run_id: string;
    outcome: PipelineOutcome;
    duration_ms: number;
    fetch_window: { start: string; end: string } | null;
    metrics: PipelineRunResult['metrics'];
    prediction: PredictionDto | null;
  };
}

export function toPipelineStatusResponse(result: PipelineRunResult): PipelineStatusResponse {
  return {
    status: 'accepted',
    message: OUTCOME_MESSAGES[result.outcome],
    pipeline_completed_at: result.completedAt.toISOString(),
    run: {
      run_id: result.runId,
      outcome: result.outcome,
      duration_ms: result.durationMs,
      fetch_window: result.fetchWindow
        ? { start: result.fetchWindow.start.toISOString(), end: result.fetchWindow.end.toISOString() }
        : null,
      metrics: result.metrics,
      prediction: result.prediction ? toPredictionDto(result.prediction) : null,
    },
  };
}

export async function registerPipelineRoutes(
  app: FastifyInstance,
  deps: {
    pipeline: FlarePredictionPipeline;
    verifier: SchedulerAuthVerifier;
  },
): Promise<void> {
  app.post(
    PIPELINE_TRIGGER_PATH,
    { preHandler: schedulerAuthHook(deps.verifier) },
    async (_request, reply) => {
      const result = await deps.pipeline.run();
      return reply.code(202).send(toPipelineStatusResponse(result));
    },
  );

  app.log.info(`[Pipeline] Trigger registered at ${PIPELINE_TRIGGER_PATH} (auth: ${deps.verifier.mode})`);
}
