/**
 * Inference Orchestrator - sequences each request through the predictor, the
 * feedback store and the observability sinks.
 *
 * Only predictor and store errors reach the caller. Metrics and alert failures
 * are absorbed, and health probes never throw.
 */
import { performance } from 'perf_hooks';
import type { FeedbackStore } from '../database.js';
import {
  ConsentDeniedError,
  InferenceFailedError,
  InvalidInputError,
  ModelUnavailableError,
  NotFoundError,
  StoreFailureError,
  errorMessage,
  isolateSinkFailure,
} from '../errors.js';
import type {
  FeedbackUpdate,
  FeedbackUpdateResult,
  HealthReport,
  ModelPrediction,
  PetClass,
  PredictionRecord,
  PredictionResponse,
} from '../types/prediction.js';
import type { AlertSink } from './alerts.js';
import type { MetricsSink } from './metrics.js';
import type { Predictor } from './predictor.js';

export interface InferenceRequest {
  image?: Buffer;
  mimeType?: string;
  filename?: string;
  rgpdConsent: boolean;
}

export interface OrchestratorDependencies {
  store: FeedbackStore;
  predictor: Predictor;
  metrics: MetricsSink;
  alerts: AlertSink;
}

export interface OrchestratorOptions {
  latencyAlertThresholdMs: number;
}

type DatabaseState = 'connected' | 'disconnected';

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

function toPetClass(prediction: ModelPrediction['prediction']): PetClass {
  return prediction === 'Cat' ? 'cat' : 'dog';
}

function elapsedMs(start: number): number {
  return Math.max(0, Math.round(performance.now() - start));
}

export class InferenceOrchestrator {
  private readonly store: FeedbackStore;
  private readonly predictor: Predictor;
  private readonly metrics: MetricsSink;
  private readonly alerts: AlertSink;
  private readonly latencyAlertThresholdMs: number;
  private databaseState: DatabaseState = 'connected';

  constructor(deps: OrchestratorDependencies, options: OrchestratorOptions) {
    this.store = deps.store;
    this.predictor = deps.predictor;
    this.metrics = deps.metrics;
    this.alerts = deps.alerts;
    this.latencyAlertThresholdMs = options.latencyAlertThresholdMs;
  }

  // ==========================================================================
  // INFERENCE
  // ==========================================================================

  async predict(request: InferenceRequest): Promise<PredictionResponse> {
    if (!this.predictor.isLoaded()) {
      throw new ModelUnavailableError();
    }
    if (!request.mimeType || !request.mimeType.startsWith('image/')) {
      throw new InvalidInputError('Invalid image format');
    }
    if (!request.image || request.image.length === 0) {
      throw new InvalidInputError('Uploaded image is empty');
    }

    const start = performance.now();
    let result: ModelPrediction;
    try {
      result = await this.predictor.predict(request.image);
    } catch (error) {
      const inferenceTimeMs = elapsedMs(start);
      const detail = errorMessage(error);
      console.error(`[Inference] Prediction failed after ${inferenceTimeMs}ms: ${detail}`);
      isolateSinkFailure('Metrics', 'trackUsage', () => this.metrics.trackUsage('error'));
      this.recordFailure(inferenceTimeMs, detail);
      throw new InferenceFailedError(detail);
    }
    const inferenceTimeMs = elapsedMs(start);
    const label = toPetClass(result.prediction);

    isolateSinkFailure('Metrics', 'trackUsage', () => this.metrics.trackUsage('success'));
    isolateSinkFailure('Metrics', 'trackPrediction', () => this.metrics.trackPrediction(label));
    isolateSinkFailure('Metrics', 'trackInferenceTime', () => this.metrics.trackInferenceTime(inferenceTimeMs));

    let record: PredictionRecord;
    try {
      record = this.store.savePredictionFeedback({
        success: true,
        predictionResult: label,
        probaCat: result.probabilities.cat * 100,
        probaDog: result.probabilities.dog * 100,
        inferenceTimeMs,
        rgpdConsent: request.rgpdConsent,
        filename: request.rgpdConsent ? request.filename : undefined,
      });
    } catch (error) {
      console.error(`[Inference] Could not record prediction: ${errorMessage(error)}`);
      throw new StoreFailureError('Could not record prediction', error);
    }

    if (inferenceTimeMs > this.latencyAlertThresholdMs) {
      isolateSinkFailure('Alerts', 'alertHighLatency', () =>
        this.alerts.alertHighLatency(inferenceTimeMs, this.latencyAlertThresholdMs)
      );
    }

    console.log(
      `[Inference] #${record.id} ${result.prediction} (${formatPercent(result.confidence)}) in ${inferenceTimeMs}ms`
    );

    return {
      filename: request.filename,
      prediction: result.prediction,
      confidence: formatPercent(result.confidence),
      probabilities: {
        cat: formatPercent(result.probabilities.cat),
        dog: formatPercent(result.probabilities.dog),
      },
      inference_time_ms: inferenceTimeMs,
      feedback_id: record.id,
    };
  }

  /**
   * Single attempt to keep an audit row for a failed inference. If that write
   * fails too it is logged and dropped; the caller still gets the original error.
   */
  private recordFailure(inferenceTimeMs: number, detail: string): void {
    try {
      this.store.savePredictionFeedback({
        success: false,
        predictionResult: 'error',
        probaCat: 0,
        probaDog: 0,
        inferenceTimeMs,
        rgpdConsent: false,
        userComment: detail,
      });
    } catch (error) {
      console.error(`[Inference] Could not record failed prediction: ${errorMessage(error)}`);
    }
  }

  // ==========================================================================
  // FEEDBACK AMENDMENT
  // ==========================================================================

  amendFeedback(feedbackId: number, update: FeedbackUpdate): PredictionRecord {
    let result: FeedbackUpdateResult;
    try {
      result = this.store.updateFeedback(feedbackId, update);
    } catch (error) {
      console.error(`[Inference] Feedback update for #${feedbackId} rolled back: ${errorMessage(error)}`);
      throw new StoreFailureError('Could not update feedback', error);
    }

    if (result.status === 'not_found') {
      throw new NotFoundError();
    }
    if (result.status === 'consent_denied') {
      throw new ConsentDeniedError();
    }

    const { userFeedback } = update;
    if (userFeedback !== undefined) {
      const polarity = userFeedback === 1 ? 'positive' : 'negative';
      isolateSinkFailure('Metrics', 'trackFeedback', () => this.metrics.trackFeedback(polarity));
    }

    return result.record;
  }

  // ==========================================================================
  // HEALTH
  // ==========================================================================

  checkHealth(): HealthReport {
    let database = 'connected';
    let connected = true;

    try {
      this.store.ping();
    } catch (error) {
      database = `error: ${errorMessage(error)}`;
      connected = false;
    }

    if (connected) {
      if (this.databaseState === 'disconnected') {
        console.log('[Health] Database connection restored');
      }
      this.databaseState = 'connected';
    } else {
      // alert on the transition only, not on every failing probe
      if (this.databaseState === 'connected') {
        console.error(`[Health] Database disconnected: ${database}`);
        isolateSinkFailure('Alerts', 'alertDatabaseDisconnected', () =>
          this.alerts.alertDatabaseDisconnected(database)
        );
      }
      this.databaseState = 'disconnected';
    }

    isolateSinkFailure('Metrics', 'updateDbStatus', () => this.metrics.updateDbStatus(connected));

    return {
      status: connected ? 'healthy' : 'degraded',
      model_loaded: this.predictor.isLoaded(),
      database,
      monitoring: {
        prometheus: this.metrics.enabled,
        discord: this.alerts.enabled,
      },
    };
  }
}
