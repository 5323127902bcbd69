import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { FeedbackStore } from '../src/server/database.js';
import { InferenceOrchestrator, formatPercent } from '../src/server/services/inference.js';
import {
  ConsentDeniedError,
  InferenceFailedError,
  InvalidInputError,
  ModelUnavailableError,
  NotFoundError,
  StoreFailureError,
} from '../src/server/errors.js';
import { toPrediction } from '../src/server/services/predictor.js';
import { createStore, FakePredictor, RecordingAlertSink, RecordingMetricsSink } from './helpers.js';

const IMAGE = Buffer.from('fake image bytes');

describe('InferenceOrchestrator', () => {
  let store: FeedbackStore;
  let predictor: FakePredictor;
  let metrics: RecordingMetricsSink;
  let alerts: RecordingAlertSink;
  let orchestrator: InferenceOrchestrator;

  function build(latencyAlertThresholdMs = 60_000): InferenceOrchestrator {
    return new InferenceOrchestrator({ store, predictor, metrics, alerts }, { latencyAlertThresholdMs });
  }

  beforeEach(() => {
    ({ store } = createStore());
    predictor = new FakePredictor();
    metrics = new RecordingMetricsSink();
    alerts = new RecordingAlertSink();
    orchestrator = build();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('predict', () => {
    it('returns the formatted prediction and records it', async () => {
      const response = await orchestrator.predict({
        image: IMAGE,
        mimeType: 'image/jpeg',
        filename: 'tom.jpg',
        rgpdConsent: true,
      });

      expect(response).toMatchObject({
        filename: 'tom.jpg',
        prediction: 'Cat',
        confidence: '75.00%',
        probabilities: { cat: '75.00%', dog: '25.00%' },
        feedback_id: 1,
      });
      expect(predictor.calls).toEqual([IMAGE]);

      const record = store.getRecord(response.feedback_id);
      expect(record).toMatchObject({
        success: true,
        predictionResult: 'cat',
        probaCat: 75,
        probaDog: 25,
        inferenceTimeMs: response.inference_time_ms,
        rgpdConsent: true,
        filename: 'tom.jpg',
      });
    });

    it('updates usage, class and latency metrics', async () => {
      predictor.result = toPrediction({ cat: 0.25, dog: 0.75 });

      const response = await orchestrator.predict({ image: IMAGE, mimeType: 'image/png', rgpdConsent: false });

      expect(metrics.events).toEqual([
        { kind: 'usage', outcome: 'success' },
        { kind: 'prediction', label: 'dog' },
        { kind: 'inference_time', ms: response.inference_time_ms },
      ]);
    });

    it('keeps probabilities summing to 100% with the label on the larger one', async () => {
      predictor.result = toPrediction({ cat: 0.125, dog: 0.875 });

      const response = await orchestrator.predict({ image: IMAGE, mimeType: 'image/png', rgpdConsent: false });

      const cat = parseFloat(response.probabilities.cat);
      const dog = parseFloat(response.probabilities.dog);
      expect(cat + dog).toBeCloseTo(100, 1);
      expect(response.prediction).toBe('Dog');
      expect(parseFloat(response.confidence)).toBeGreaterThanOrEqual(50);
    });

    it('does not store the filename without consent', async () => {
      const response = await orchestrator.predict({
        image: IMAGE,
        mimeType: 'image/jpeg',
        filename: 'private.jpg',
        rgpdConsent: false,
      });

      expect(store.getRecord(response.feedback_id)?.filename).toBeUndefined();
    });

    it('rejects requests while the model is not loaded', async () => {
      predictor.loaded = false;

      await expect(
        orchestrator.predict({ image: IMAGE, mimeType: 'image/jpeg', rgpdConsent: true })
      ).rejects.toBeInstanceOf(ModelUnavailableError);
      expect(predictor.calls).toHaveLength(0);
      expect(store.countPredictions().total).toBe(0);
    });

    it('rejects uploads that are not images', async () => {
      await expect(
        orchestrator.predict({ image: IMAGE, mimeType: 'text/plain', rgpdConsent: true })
      ).rejects.toBeInstanceOf(InvalidInputError);
      await expect(orchestrator.predict({ rgpdConsent: true })).rejects.toBeInstanceOf(InvalidInputError);
      await expect(
        orchestrator.predict({ image: Buffer.alloc(0), mimeType: 'image/png', rgpdConsent: true })
      ).rejects.toBeInstanceOf(InvalidInputError);

      expect(predictor.calls).toHaveLength(0);
      expect(store.countPredictions().total).toBe(0);
    });

    it('records exactly one failure row when the model raises', async () => {
      predictor.result = new Error('model exploded');

      const error = await orchestrator
        .predict({ image: IMAGE, mimeType: 'image/jpeg', filename: 'tom.jpg', rgpdConsent: true })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InferenceFailedError);
      expect(error).toHaveProperty('status', 500);
      expect(error).toHaveProperty('detail', 'model exploded');
      expect(error).toHaveProperty('message', 'Prediction failed: model exploded');

      const rows = store.getRecent(10);
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        success: false,
        predictionResult: 'error',
        probaCat: 0,
        probaDog: 0,
        rgpdConsent: false,
        userComment: 'model exploded',
      });
      expect(rows[0].filename).toBeUndefined();
      expect(metrics.events).toEqual([{ kind: 'usage', outcome: 'error' }]);
    });

    it('still reports the original error when the failure row cannot be written', async () => {
      predictor.result = new Error('model exploded');
      vi.spyOn(store, 'savePredictionFeedback').mockImplementation(() => {
        throw new Error('disk full');
      });

      await expect(
        orchestrator.predict({ image: IMAGE, mimeType: 'image/jpeg', rgpdConsent: true })
      ).rejects.toThrow('Prediction failed: model exploded');
      expect(store.countPredictions().total).toBe(0);
    });

    it('surfaces a store failure on the success path', async () => {
      vi.spyOn(store, 'savePredictionFeedback').mockImplementation(() => {
        throw new Error('disk full');
      });

      const error = await orchestrator
        .predict({ image: IMAGE, mimeType: 'image/jpeg', rgpdConsent: true })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreFailureError);
      expect(error).toHaveProperty('status', 500);
      expect(error).toHaveProperty('message', 'Could not record prediction: disk full');
    });

    it('answers even when every sink is failing', async () => {
      metrics.failure = new Error('registry exploded');
      alerts.failure = new Error('webhook exploded');
      predictor.delayMs = 20;
      orchestrator = build(1);

      const response = await orchestrator.predict({ image: IMAGE, mimeType: 'image/jpeg', rgpdConsent: true });

      expect(response.prediction).toBe('Cat');
      expect(store.getRecord(response.feedback_id)).toBeDefined();
    });

    it('alerts when inference exceeds the latency threshold', async () => {
      predictor.delayMs = 20;
      orchestrator = build(5);

      const response = await orchestrator.predict({ image: IMAGE, mimeType: 'image/jpeg', rgpdConsent: true });

      expect(alerts.highLatency).toEqual([{ inferenceTimeMs: response.inference_time_ms, thresholdMs: 5 }]);
    });

    it('does not alert under the threshold', async () => {
      await orchestrator.predict({ image: IMAGE, mimeType: 'image/jpeg', rgpdConsent: true });

      expect(alerts.highLatency).toEqual([]);
    });
  });

  describe('amendFeedback', () => {
    async function predictWithConsent(rgpdConsent: boolean): Promise<number> {
      const response = await orchestrator.predict({ image: IMAGE, mimeType: 'image/jpeg', rgpdConsent });
      metrics.events = [];
      return response.feedback_id;
    }

    it('stores feedback and counts positive polarity', async () => {
      const id = await predictWithConsent(true);

      const record = orchestrator.amendFeedback(id, { userFeedback: 1, userComment: 'spot on' });

      expect(record.userFeedback).toBe(1);
      expect(record.userComment).toBe('spot on');
      expect(metrics.events).toEqual([{ kind: 'feedback', polarity: 'positive' }]);
    });

    it('counts 0 as negative feedback', async () => {
      const id = await predictWithConsent(true);

      orchestrator.amendFeedback(id, { userFeedback: 0 });

      expect(metrics.events).toEqual([{ kind: 'feedback', polarity: 'negative' }]);
    });

    it('does not count a comment-only amendment', async () => {
      const id = await predictWithConsent(true);

      orchestrator.amendFeedback(id, { userComment: 'nice' });

      expect(metrics.events).toEqual([]);
    });

    it('fails with NotFound for unknown ids', () => {
      expect(() => orchestrator.amendFeedback(404, { userFeedback: 1 })).toThrow(NotFoundError);
    });

    it('fails with ConsentDenied whatever the payload, leaving the record unchanged', async () => {
      const id = await predictWithConsent(false);
      const before = store.getRecord(id);

      for (const update of [{ userFeedback: 1 as const }, { userComment: 'hi' }, {}]) {
        expect(() => orchestrator.amendFeedback(id, update)).toThrow(ConsentDeniedError);
      }

      expect(store.getRecord(id)).toEqual(before);
      expect(metrics.events).toEqual([]);
    });

    it('maps store errors to StoreFailure', async () => {
      const id = await predictWithConsent(true);
      vi.spyOn(store, 'updateFeedback').mockImplementation(() => {
        throw new Error('database is locked');
      });

      expect(() => orchestrator.amendFeedback(id, { userFeedback: 1 })).toThrow(
        'Could not update feedback: database is locked'
      );
    });

    it('never tears concurrent amendments of the same record', async () => {
      const id = await predictWithConsent(true);

      await Promise.all([
        Promise.resolve().then(() => orchestrator.amendFeedback(id, { userFeedback: 1, userComment: 'first' })),
        Promise.resolve().then(() => orchestrator.amendFeedback(id, { userFeedback: 0, userComment: 'second' })),
      ]);

      const record = store.getRecord(id);
      expect([
        [1, 'first'],
        [0, 'second'],
      ]).toContainEqual([record?.userFeedback, record?.userComment]);
    });
  });

  describe('checkHealth', () => {
    it('reports healthy and sets the gauge when the database answers', () => {
      expect(orchestrator.checkHealth()).toEqual({
        status: 'healthy',
        model_loaded: true,
        database: 'connected',
        monitoring: { prometheus: true, discord: true },
      });
      expect(metrics.events).toEqual([{ kind: 'db_status', connected: true }]);
    });

    it('reports degraded when the database is unreachable but keeps model status', () => {
      store.close();

      const report = orchestrator.checkHealth();

      expect(report.status).toBe('degraded');
      expect(report.database.startsWith('error: ')).toBe(true);
      expect(report.model_loaded).toBe(true);
      expect(metrics.events).toEqual([{ kind: 'db_status', connected: false }]);
    });

    it('alerts once per transition into the disconnected state', () => {
      const ping = vi.spyOn(store, 'ping').mockImplementation(() => {
        throw new Error('database is locked');
      });

      orchestrator.checkHealth();
      orchestrator.checkHealth();
      expect(alerts.disconnects).toEqual(['error: database is locked']);

      ping.mockRestore();
      expect(orchestrator.checkHealth().status).toBe('healthy');

      vi.spyOn(store, 'ping').mockImplementation(() => {
        throw new Error('database is locked');
      });
      orchestrator.checkHealth();
      expect(alerts.disconnects).toHaveLength(2);
    });

    it('never throws when the alert sink fails', () => {
      alerts.failure = new Error('webhook exploded');
      metrics.failure = new Error('registry exploded');
      store.close();

      expect(orchestrator.checkHealth().status).toBe('degraded');
    });
  });
});

describe('formatPercent', () => {
  it('renders a fraction with two decimals', () => {
    expect(formatPercent(0.9534)).toBe('95.34%');
    expect(formatPercent(1)).toBe('100.00%');
  });
});
