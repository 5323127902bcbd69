/**
 * Entry point - resolves configuration once, builds the services in dependency
 * order and starts the HTTP server.
 */
import 'dotenv/config';
import { loadConfig } from './config.js';
import { initializeDatabase } from './database.js';
import { createApp } from './app.js';
import { InferenceOrchestrator } from './services/inference.js';
import { StatisticsService } from './services/statistics.js';
import { HttpPredictor, UnavailablePredictor, type Predictor } from './services/predictor.js';
import { NoopMetricsSink, PrometheusMetricsSink, type MetricsSink } from './services/metrics.js';
import { DiscordAlertSink, NoopAlertSink, type AlertSink } from './services/alerts.js';

async function loadPredictor(serverUrl: string | undefined, timeoutMs: number): Promise<Predictor> {
  if (!serverUrl) {
    console.warn('[Server] MODEL_SERVER_URL not set - predictions will answer 503');
    return new UnavailablePredictor();
  }
  const predictor = new HttpPredictor({ baseUrl: serverUrl, timeoutMs });
  await predictor.load();
  return predictor;
}

async function main(): Promise<void> {
  const config = loadConfig();

  console.log('[Server] Initializing database...');
  const store = initializeDatabase(config.database.path);

  console.log('[Server] Loading model...');
  const predictor = await loadPredictor(config.model.serverUrl, config.model.timeoutMs);

  let metrics: MetricsSink = new NoopMetricsSink();
  let exporter: PrometheusMetricsSink | undefined;
  if (config.monitoring.enablePrometheus) {
    exporter = new PrometheusMetricsSink();
    metrics = exporter;
    console.log('[Server] Prometheus metrics enabled at /metrics');
  } else {
    console.log('[Server] Prometheus metrics disabled');
  }

  let alerts: AlertSink = new NoopAlertSink();
  if (config.monitoring.discordWebhookUrl) {
    alerts = new DiscordAlertSink({
      webhookUrl: config.monitoring.discordWebhookUrl,
      timeoutMs: config.monitoring.alertTimeoutMs,
    });
    console.log('[Server] Discord alerting enabled');
  }

  const orchestrator = new InferenceOrchestrator(
    { store, predictor, metrics, alerts },
    { latencyAlertThresholdMs: config.monitoring.latencyAlertThresholdMs }
  );
  const statistics = new StatisticsService(store);

  const app = createApp({ config, orchestrator, statistics, predictor, metrics, alerts, exporter });

  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`[Server] Running on http://${config.server.host}:${config.server.port}`);
  });

  server.timeout = config.server.timeout;
  server.keepAliveTimeout = config.server.keepAliveTimeout;
  server.headersTimeout = config.server.headersTimeout;

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log('[Server] HTTP server closed');
      void alerts
        .flush()
        .catch((error: unknown) => console.error('[Server] Alert flush failed:', error))
        .finally(() => {
          store.close();
          process.exit(0);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  console.error('[FATAL] Server initialization failed:', error);
  process.exit(1);
});
