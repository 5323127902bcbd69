import client from 'prom-client';
import type { FeedbackPolarity, PetClass } from '../types/prediction.js';

export type UsageOutcome = 'success' | 'error';

/**
 * Counters, histograms and gauges exported to the scraper. Implementations
 * must not block; callers still wrap every call with isolateSinkFailure().
 */
export interface MetricsSink {
  readonly enabled: boolean;
  trackPrediction(label: PetClass): void;
  trackInferenceTime(inferenceTimeMs: number): void;
  trackFeedback(polarity: FeedbackPolarity): void;
  trackUsage(outcome: UsageOutcome): void;
  updateDbStatus(connected: boolean): void;
  observeHttpRequest(method: string, route: string, status: number, durationSeconds: number): void;
}

export interface MetricsExporter {
  readonly contentType: string;
  render(): Promise<string>;
}

export class PrometheusMetricsSink implements MetricsSink, MetricsExporter {
  readonly enabled = true;
  readonly register: client.Registry;

  private readonly predictions: client.Counter<'result'>;
  private readonly inferenceTime: client.Histogram;
  private readonly feedback: client.Counter<'feedback_type'>;
  private readonly usage: client.Counter<'status'>;
  private readonly databaseStatus: client.Gauge;
  private readonly httpDuration: client.Histogram<'method' | 'route' | 'status'>;

  constructor(options: { collectDefaults?: boolean } = {}) {
    // one registry per sink so tests and multiple apps do not share state
    this.register = new client.Registry();
    if (options.collectDefaults ?? true) {
      client.collectDefaultMetrics({ register: this.register, prefix: 'cv_' });
    }

    this.predictions = new client.Counter({
      name: 'cv_predictions_total',
      help: 'Total number of successful predictions by predicted class',
      labelNames: ['result'] as const,
      registers: [this.register],
    });

    this.inferenceTime = new client.Histogram({
      name: 'cv_inference_time_seconds',
      help: 'Model inference time in seconds',
      buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
      registers: [this.register],
    });

    this.feedback = new client.Counter({
      name: 'cv_user_feedback_total',
      help: 'Total user feedback received by polarity',
      labelNames: ['feedback_type'] as const,
      registers: [this.register],
    });

    this.usage = new client.Counter({
      name: 'cv_inference_requests_total',
      help: 'Total inference attempts by outcome',
      labelNames: ['status'] as const,
      registers: [this.register],
    });

    this.databaseStatus = new client.Gauge({
      name: 'cv_database_connected',
      help: 'Database connection status (1=connected, 0=disconnected)',
      registers: [this.register],
    });

    this.httpDuration = new client.Histogram({
      name: 'cv_http_request_duration_seconds',
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'route', 'status'] as const,
      buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2.5, 5, 10],
      registers: [this.register],
    });
  }

  get contentType(): string {
    return this.register.contentType;
  }

  trackPrediction(label: PetClass): void {
    this.predictions.inc({ result: label });
  }

  trackInferenceTime(inferenceTimeMs: number): void {
    this.inferenceTime.observe(inferenceTimeMs / 1000);
  }

  trackFeedback(polarity: FeedbackPolarity): void {
    this.feedback.inc({ feedback_type: polarity });
  }

  trackUsage(outcome: UsageOutcome): void {
    this.usage.inc({ status: outcome });
  }

  updateDbStatus(connected: boolean): void {
    this.databaseStatus.set(connected ? 1 : 0);
  }

  observeHttpRequest(method: string, route: string, status: number, durationSeconds: number): void {
    this.httpDuration.observe({ method, route, status: String(status) }, durationSeconds);
  }

  render(): Promise<string> {
    return this.register.metrics();
  }
}

export class NoopMetricsSink implements MetricsSink {
  readonly enabled = false;
  trackPrediction(): void {}
  trackInferenceTime(): void {}
  trackFeedback(): void {}
  trackUsage(): void {}
  updateDbStatus(): void {}
  observeHttpRequest(): void {}
}
