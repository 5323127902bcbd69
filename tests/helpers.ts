import Database from 'better-sqlite3';
import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { FeedbackStore } from '../src/server/database.js';
import { toPrediction, type Predictor, type PredictorInfo } from '../src/server/services/predictor.js';
import type { MetricsSink, UsageOutcome } from '../src/server/services/metrics.js';
import type { AlertSink } from '../src/server/services/alerts.js';
import type { FeedbackPolarity, ModelPrediction, PetClass } from '../src/server/types/prediction.js';

export function createStore(): { store: FeedbackStore; db: Database.Database } {
  const db = new Database(':memory:');
  return { store: new FeedbackStore(db), db };
}

export class FakePredictor implements Predictor {
  loaded = true;
  result: ModelPrediction | Error = toPrediction({ cat: 0.75, dog: 0.25 });
  delayMs = 0;
  calls: Buffer[] = [];

  isLoaded(): boolean {
    return this.loaded;
  }

  async predict(image: Buffer): Promise<ModelPrediction> {
    this.calls.push(image);
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }

  describe(): PredictorInfo {
    return { name: 'Cats vs Dogs Classifier', version: 'test', classes: ['Cat', 'Dog'] };
  }
}

type MetricEvent =
  | { kind: 'prediction'; label: PetClass }
  | { kind: 'inference_time'; ms: number }
  | { kind: 'feedback'; polarity: FeedbackPolarity }
  | { kind: 'usage'; outcome: UsageOutcome }
  | { kind: 'db_status'; connected: boolean };

export class RecordingMetricsSink implements MetricsSink {
  readonly enabled = true;
  events: MetricEvent[] = [];
  failure?: Error;

  private record(event: MetricEvent): void {
    if (this.failure) throw this.failure;
    this.events.push(event);
  }

  trackPrediction(label: PetClass): void {
    this.record({ kind: 'prediction', label });
  }
  trackInferenceTime(ms: number): void {
    this.record({ kind: 'inference_time', ms });
  }
  trackFeedback(polarity: FeedbackPolarity): void {
    this.record({ kind: 'feedback', polarity });
  }
  trackUsage(outcome: UsageOutcome): void {
    this.record({ kind: 'usage', outcome });
  }
  updateDbStatus(connected: boolean): void {
    this.record({ kind: 'db_status', connected });
  }
  observeHttpRequest(): void {}
}

export class RecordingAlertSink implements AlertSink {
  readonly enabled = true;
  highLatency: Array<{ inferenceTimeMs: number; thresholdMs: number }> = [];
  disconnects: string[] = [];
  failure?: Error;

  alertHighLatency(inferenceTimeMs: number, thresholdMs: number): void {
    if (this.failure) throw this.failure;
    this.highLatency.push({ inferenceTimeMs, thresholdMs });
  }

  alertDatabaseDisconnected(detail: string): void {
    if (this.failure) throw this.failure;
    this.disconnects.push(detail);
  }

  async flush(): Promise<void> {}
}

type AdapterReply = (config: InternalAxiosRequestConfig) => Promise<unknown>;

/**
 * Axios instance whose requests never leave the process: each request is
 * recorded and answered by `reply`.
 */
export function createFakeHttp(reply: AdapterReply): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const data = await reply(config);
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { http, requests };
}
