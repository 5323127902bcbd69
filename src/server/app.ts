/**
 * Express application - routing layer over the inference orchestrator.
 * Built from already-constructed services so tests can drive it in-process.
 */
import express from 'express';
import type { AppConfig, ServerConfig } from './config.js';
import { createLoggerMiddleware } from './middleware/logger.js';
import { createRateLimiter } from './middleware/rate-limit.js';
import { requireApiToken } from './middleware/auth.js';
import { createImageUpload } from './middleware/upload.js';
import { errorHandler } from './middleware/error-handler.js';
import { createPredictHandler } from './handlers/predict.js';
import { createFeedbackHandler } from './handlers/feedback.js';
import {
  createHealthHandler,
  createInfoHandler,
  createMetricsHandler,
  createRecentPredictionsHandler,
  createStatisticsHandler,
} from './handlers/monitoring.js';
import type { InferenceOrchestrator } from './services/inference.js';
import type { StatisticsService } from './services/statistics.js';
import type { Predictor } from './services/predictor.js';
import type { AlertSink } from './services/alerts.js';
import type { MetricsExporter, MetricsSink } from './services/metrics.js';

export interface AppDependencies {
  config: Pick<AppConfig, 'auth' | 'upload' | 'rateLimit'> & {
    server: Pick<ServerConfig, 'trustProxy'>;
  };
  orchestrator: InferenceOrchestrator;
  statistics: StatisticsService;
  predictor: Predictor;
  metrics: MetricsSink;
  alerts: AlertSink;
  /** Present only when Prometheus export is enabled; mounts GET /metrics. */
  exporter?: MetricsExporter;
}

export function createApp(deps: AppDependencies): express.Express {
  const { config, orchestrator, statistics, predictor, metrics, alerts, exporter } = deps;

  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', config.server.trustProxy);
  app.use(createLoggerMiddleware(metrics));
  app.use(express.json({ limit: '10kb' }));
  app.use(express.urlencoded({ extended: false, limit: '10kb' }));

  const upload = createImageUpload(config.upload.maxBytes);
  const rateLimiter = createRateLimiter(config.rateLimit);

  // Inference
  app.post(
    '/api/predict',
    rateLimiter,
    requireApiToken(config.auth.apiToken),
    upload.single('file'),
    createPredictHandler(orchestrator)
  );

  // Feedback amendment (form fields may arrive urlencoded, JSON or multipart)
  const feedbackHandler = createFeedbackHandler(orchestrator);
  app.post('/api/feedback', upload.none(), feedbackHandler);
  app.post('/api/update-feedback', upload.none(), feedbackHandler);

  // Monitoring
  app.get('/api/statistics', createStatisticsHandler(statistics));
  app.get('/api/recent-predictions', createRecentPredictionsHandler(statistics));
  app.get(
    '/api/info',
    createInfoHandler(predictor, { prometheus: exporter !== undefined, discord: alerts.enabled })
  );
  app.get('/health', createHealthHandler(orchestrator));

  if (exporter) {
    app.get('/metrics', createMetricsHandler(exporter));
  }

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found', message: 'Route not found' });
  });
  app.use(errorHandler);

  return app;
}
