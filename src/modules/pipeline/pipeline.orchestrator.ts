/**
 * FLARE PREDICTION PIPELINE: Orchestrator
 *
 * One call = one run, steps strictly in order:
 *
 *   DETERMINE_WINDOW → FETCH_NEW → PERSIST_OBSERVATIONS → LOAD_MODEL_WINDOW
 *     → LOAD_MODEL → SCORE → PERSIST_PREDICTION
 *
 * Early exits (NO_NEW_DATA, NO_MODEL_INPUT) are successful runs. Any step
 * failure is recorded, logged and rethrown; nothing already written is
 * rolled back. No locking between concurrent runs: every write is an upsert
 * keyed on timestamp.
 */

import { v4 as uuidv4 } from 'uuid';
import { InvalidPredictionError, errorMessage } from '../../common/errors.js';
import { systemClock, type Clock, type Logger } from '../../common/runtime.js';
import type { FeedClient } from '../goes-feed/goes-feed.types.js';
import type { ModelRegistry, ScoringFunction } from '../flare-model/flare-model.types.js';
import type { Observation } from '../observations/observation.types.js';
import { PredictionSchema, describeIssues, type Prediction } from '../predictions/prediction.types.js';
import type { TimeSeriesStore } from '../storage/timeseries.store.js';
import { computeFetchWindow, computeModelWindow } from './pipeline.window.js';
import type {
  PipelineContext,
  PipelineOutcome,
  PipelineRunResult,
  PipelineStepName,
  PipelineWindowConfig,
} from './pipeline.types.js';

export interface PipelineDeps {
  observations: TimeSeriesStore<Observation>;
  predictions: TimeSeriesStore<Prediction>;
  feed: FeedClient;
  models: ModelRegistry;
  score: ScoringFunction;
  config: PipelineWindowConfig;
  logger: Logger;
  clock?: Clock;
}

export class FlarePredictionPipeline {
  private readonly clock: Clock;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Run a single step with timing.
   * `describe` turns the step's value into the details kept on the step record.
   */
  private async runStep<T>(
    name: PipelineStepName,
    ctx: PipelineContext,
    handler: () => Promise<T>,
    describe?: (value: T) => Record<string, unknown>,
  ): Promise<T> {
    const startMs = Date.now();

    try {
      const value = await handler();
      const ms = Date.now() - startMs;
      const details = describe?.(value);
      ctx.steps.push({ name, ok: true, ms, details });
      this.deps.logger.debug?.({ runId: ctx.runId, step: name, ms, ...details }, `[Pipeline] ${name} completed`);
      return value;
    } catch (err) {
      const ms = Date.now() - startMs;
      const error = errorMessage(err);
      ctx.steps.push({ name, ok: false, ms, error });
      this.deps.logger.error({ runId: ctx.runId, step: name, ms, err }, `[Pipeline] ${name} FAILED: ${error}`);
      throw err;
    }
  }

  private finish(
    ctx: PipelineContext,
    outcome: PipelineOutcome,
    prediction: Prediction | null,
  ): PipelineRunResult {
    const completedAt = this.clock.utcNow();
    return {
      ok: true,
      runId: ctx.runId,
      outcome,
      startedAt: ctx.now,
      completedAt,
      durationMs: Math.max(0, completedAt.getTime() - ctx.now.getTime()),
      fetchWindow: ctx.fetchWindow,
      modelWindow: ctx.modelWindow,
      metrics: ctx.metrics,
      prediction,
      steps: ctx.steps,
    };
  }

  async run(): Promise<PipelineRunResult> {
    const { observations, predictions, feed, models, score, config, logger } = this.deps;

    const ctx: PipelineContext = {
      runId: uuidv4(),
      now: this.clock.utcNow(),
      steps: [],
      metrics: { fetched: 0, observationsInserted: 0, observationsUpdated: 0, modelInputSize: 0 },
      fetchWindow: null,
      modelWindow: null,
    };

    logger.info({ runId: ctx.runId, now: ctx.now.toISOString() }, '[Pipeline] Starting prediction pipeline');

    // ═══════════════════════════════════════════════════════════
    // 1. Fetch window from the latest stored observation
    // ═══════════════════════════════════════════════════════════
    const fetchWindow = await this.runStep(
      'DETERMINE_WINDOW',
      ctx,
      async () => {
        const latest = await observations.latest();
        return computeFetchWindow(latest?.timestamp ?? null, ctx.now, config);
      },
      (w) => ({ start: w.start.toISOString(), end: w.end.toISOString(), coldStart: w.coldStart, clamped: w.clamped }),
    );
    ctx.fetchWindow = fetchWindow;

    // ═══════════════════════════════════════════════════════════
    // 2. Pull new observations
    // ═══════════════════════════════════════════════════════════
    const fetched = await this.runStep(
      'FETCH_NEW',
      ctx,
      () => feed.fetch(fetchWindow.start),
      (rows) => ({ fetched: rows.length }),
    );
    ctx.metrics.fetched = fetched.length;

    if (fetched.length === 0) {
      logger.info({ runId: ctx.runId, from: fetchWindow.start.toISOString() }, '[Pipeline] No new observation data fetched');
      return this.finish(ctx, 'NO_NEW_DATA', null);
    }

    // ═══════════════════════════════════════════════════════════
    // 3. Persist (upsert by timestamp)
    // ═══════════════════════════════════════════════════════════
    const written = await this.runStep(
      'PERSIST_OBSERVATIONS',
      ctx,
      () => observations.upsertMany(fetched),
      (summary) => ({ ...summary }),
    );
    ctx.metrics.observationsInserted = written.inserted;
    ctx.metrics.observationsUpdated = written.updated;

    // ═══════════════════════════════════════════════════════════
    // 4. Model-input window
    // ═══════════════════════════════════════════════════════════
    const modelWindow = computeModelWindow(ctx.now, config);
    ctx.modelWindow = modelWindow;

    const modelInput = await this.runStep(
      'LOAD_MODEL_WINDOW',
      ctx,
      () => observations.rangeFrom(modelWindow.start),
      (rows) => ({ rows: rows.length, from: modelWindow.start.toISOString() }),
    );
    ctx.metrics.modelInputSize = modelInput.length;

    if (modelInput.length === 0) {
      logger.warn(
        { runId: ctx.runId, from: modelWindow.start.toISOString() },
        '[Pipeline] No observations in model window, skipping prediction',
      );
      return this.finish(ctx, 'NO_MODEL_INPUT', null);
    }

    // ═══════════════════════════════════════════════════════════
    // 5-6. Load model, score, check the result
    // ═══════════════════════════════════════════════════════════
    const model = await this.runStep('LOAD_MODEL', ctx, () => models.loadModel(), (m) => ({ kind: m.kind }));

    const prediction = await this.runStep(
      'SCORE',
      ctx,
      async () => {
        const parsed = PredictionSchema.safeParse(score(model, modelInput, ctx.now));
        if (!parsed.success) {
          throw new InvalidPredictionError(
            `Scoring function returned an invalid prediction: ${describeIssues(parsed.error)}`,
          );
        }
        return parsed.data;
      },
      (p) => ({ probability: p.probability, riskLevel: p.riskLevel, modelVersion: p.modelVersion }),
    );

    // ═══════════════════════════════════════════════════════════
    // 7. Persist prediction (upsert by its timestamp)
    // ═══════════════════════════════════════════════════════════
    await this.runStep(
      'PERSIST_PREDICTION',
      ctx,
      () => predictions.upsertMany([prediction]),
      (summary) => ({ ...summary }),
    );

    const result = this.finish(ctx, 'COMPLETED', prediction);
    logger.info(
      {
        runId: ctx.runId,
        durationMs: result.durationMs,
        ...ctx.metrics,
        riskLevel: prediction.riskLevel,
        probability: prediction.probability,
      },
      '[Pipeline] Prediction pipeline completed',
    );
    return result;
  }
}
